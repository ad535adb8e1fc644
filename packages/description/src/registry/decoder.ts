import type { DecodedDescription } from '@rekening/types';
import { depad } from '../normalizer.js';
import { rejoinDescription } from '../rejoin.js';
import { isStructuredRecord, structuredTransferGrammar } from '../grammars/structured.js';
import { DEFAULT_DECODER_CONFIG } from './defaults.js';
import type {
  DescriptionDecoder,
  DescriptionDecoderConfig,
  FieldEntry,
  Grammar,
  GrammarInput,
  GrammarResult,
} from '../types.js';

const RESERVED_KEYS: readonly string[] = ['type', '__proto__'];

// Object keys in canonical integer form are enumerated before all others.
const INTEGER_KEY = /^(?:0|[1-9]\d*)$/;

function isReservedKey(key: string): boolean {
  return RESERVED_KEYS.includes(key) || INTEGER_KEY.test(key);
}

/**
 * Builds the field map. A key never replaces an earlier one: repeats
 * become "<key> (2)", "<key> (3)", ... The same suffix is given to `type`,
 * which holds the description type itself, to `__proto__` and to integer
 * keys, so a plain object built from the fields keeps their order.
 */
export function buildFieldMap(entries: readonly FieldEntry[]): Map<string, string> {
  const fields = new Map<string, string>();
  for (const [key, value] of entries) {
    let target = key;
    let n = 2;
    while (isReservedKey(target) || fields.has(target)) {
      target = `${key} (${n})`;
      n++;
    }
    fields.set(target, value);
  }
  return fields;
}

function freezeConfig(config: DescriptionDecoderConfig): DescriptionDecoderConfig {
  if (config.columnWidth < 1 || config.lineWidth < 1) {
    throw new Error(`Invalid description layout: columnWidth ${config.columnWidth}, lineWidth ${config.lineWidth}`);
  }
  return Object.freeze({
    ...config,
    structuredTags: Object.freeze([...config.structuredTags]),
    // test() on a global or sticky pattern moves lastIndex between calls.
    unknownTagPattern: new RegExp(config.unknownTagPattern.source, config.unknownTagPattern.flags.replace(/[gy]/g, '')),
    rules: Object.freeze([...config.rules]),
    labels: Object.freeze([...config.labels]),
  });
}

function selectGrammar(text: string, config: DescriptionDecoderConfig): Grammar | null {
  if (isStructuredRecord(text, config.structuredTags)) {
    return structuredTransferGrammar;
  }
  return config.rules.find((rule) => text.startsWith(rule.prefix))?.grammar ?? null;
}

function unrecognized(raw: string): DecodedDescription {
  return Object.freeze({ type: 'unrecognized', fields: new Map([['text', raw.trim()]]) });
}

export function createDescriptionDecoder(overrides: Partial<DescriptionDecoderConfig> = {}): DescriptionDecoder {
  const config = freezeConfig({ ...DEFAULT_DECODER_CONFIG, ...overrides });

  return {
    config,
    decode(raw: string): DecodedDescription {
      const text = rejoinDescription(raw, config.columnWidth, config.lineWidth).trimEnd();
      const grammar = selectGrammar(text, config);
      if (grammar === null) {
        return unrecognized(raw);
      }

      const input: GrammarInput = {
        text,
        head: text.slice(0, config.columnWidth),
        tail: text.slice(config.columnWidth),
        config,
      };
      const policy = grammar.padding ?? config.padding;
      let result: GrammarResult | null;
      try {
        result = grammar.decode(input, (value) => depad(value, policy));
      } catch {
        // A grammar that fails on its input leaves the text undecoded.
        result = null;
      }
      if (result === null) {
        return unrecognized(raw);
      }

      return Object.freeze({ type: result.type, fields: buildFieldMap(result.fields) });
    },
  };
}

let defaultDecoder: DescriptionDecoder | null = null;

/**
 * Decodes with the default configuration.
 */
export function decodeDescription(raw: string): DecodedDescription {
  if (defaultDecoder === null) {
    defaultDecoder = createDescriptionDecoder();
  }
  return defaultDecoder.decode(raw);
}
