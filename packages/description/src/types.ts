import type { DescriptionType, DecodedDescription } from '@rekening/types';
import type { PaddingPolicy } from './normalizer.js';

export type FieldEntry = readonly [key: string, value: string];

/** What a grammar gets to work with: the rejoined text, cut at the first column. */
export interface GrammarInput {
  /** Rejoined description without trailing padding */
  readonly text: string;
  /** First column of `text` */
  readonly head: string;
  /** Everything after the first column, still column aligned */
  readonly tail: string;
  readonly config: DescriptionDecoderConfig;
}

export interface GrammarResult {
  readonly type: DescriptionType;
  /** Fields in order of appearance. Repeated keys are allowed. */
  readonly fields: readonly FieldEntry[];
}

export interface Grammar {
  readonly name: string;
  /** Overrides the decoder's padding policy for every value this grammar emits */
  readonly padding?: PaddingPolicy;
  /**
   * Returns null when the text does not have the shape this grammar expects;
   * the decoder then reports the description as unrecognized.
   */
  decode(input: GrammarInput, normalize: (value: string) => string): GrammarResult | null;
}

export interface DecoderRule {
  /** Literal, case-sensitive prefix of the rejoined description */
  readonly prefix: string;
  readonly grammar: Grammar;
}

export interface DescriptionDecoderConfig {
  readonly columnWidth: number;
  readonly lineWidth: number;
  /** Tags that mark a slash-delimited record when they open it */
  readonly structuredTags: readonly string[];
  /** Shape of a tag outside `structuredTags` that is still kept as a tag */
  readonly unknownTagPattern: RegExp;
  /** Tried in order, first match wins */
  readonly rules: readonly DecoderRule[];
  /** Label vocabulary of `Label: value` descriptions */
  readonly labels: readonly string[];
  readonly padding: PaddingPolicy;
}

export interface DescriptionDecoder {
  readonly config: DescriptionDecoderConfig;
  decode(raw: string): DecodedDescription;
}
