import { VERBATIM_PADDING_POLICY } from '../normalizer.js';
import type { FieldEntry, Grammar, GrammarInput, GrammarResult } from '../types.js';

const OPENING_TAG = /^\/([^/]+)\//;

/**
 * Whether the text opens with `/TAG/` for one of the known tags.
 */
export function isStructuredRecord(text: string, knownTags: readonly string[]): boolean {
  const tag = OPENING_TAG.exec(text)?.[1];
  return tag !== undefined && knownTags.includes(tag);
}

function splitSegments(input: GrammarInput): string[] | null {
  const { structuredTags, unknownTagPattern } = input.config;
  const segments = input.text.trim().slice(1).split('/');
  const parts: string[] = [];

  for (const [index, segment] of segments.entries()) {
    if (parts.length % 2 === 1) {
      parts.push(segment);
      continue;
    }
    // A tag needs a value segment after it; anything else is part of the previous value.
    const hasValue = index < segments.length - 1;
    const isTag = structuredTags.includes(segment) || unknownTagPattern.test(segment);
    if (isTag && hasValue) {
      parts.push(segment);
      continue;
    }
    const previous = parts.pop();
    if (previous === undefined) {
      return null;
    }
    parts.push(`${previous}/${segment}`);
  }

  return parts.length % 2 === 0 ? parts : null;
}

/**
 * `/TRTP/SEPA OVERBOEKING/IBAN/NL01.../BIC/.../NAME/...`
 *
 * Values are kept exactly as they appear between the delimiters, so
 * joining `/TAG/value` for every field gives back the trimmed input.
 */
export const structuredTransferGrammar: Grammar = {
  name: 'structured_transfer',
  padding: VERBATIM_PADDING_POLICY,
  decode(input, normalize): GrammarResult | null {
    const parts = splitSegments(input);
    if (parts === null) {
      return null;
    }

    const fields: FieldEntry[] = [];
    for (let i = 0; i < parts.length; i += 2) {
      const tag = parts[i];
      const value = parts[i + 1];
      if (tag !== undefined && value !== undefined) {
        fields.push([tag, normalize(value)]);
      }
    }

    return { type: 'structured_transfer', fields };
  },
};
