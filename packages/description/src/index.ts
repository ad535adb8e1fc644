// Decoder
export { createDescriptionDecoder, decodeDescription, buildFieldMap } from './registry/decoder.js';
export {
  DEFAULT_DECODER_CONFIG,
  DEFAULT_RULES,
  DEFAULT_LABELS,
  DEFAULT_STRUCTURED_TAGS,
  DEFAULT_UNKNOWN_TAG_PATTERN,
} from './registry/defaults.js';

// Grammars
export * from './grammars/index.js';

// Layout and padding
export { rejoinDescription } from './rejoin.js';
export {
  depad,
  DEFAULT_PADDING_POLICY,
  DEFAULT_PRESERVED_PHRASES,
  VERBATIM_PADDING_POLICY,
} from './normalizer.js';
export type { PaddingPolicy } from './normalizer.js';

// Field access
export { getCounterparty, getCounterpartyIban, getRemittanceInfo, fieldsToRecord } from './accessors.js';

export type {
  DescriptionDecoder,
  DescriptionDecoderConfig,
  DecoderRule,
  Grammar,
  GrammarInput,
  GrammarResult,
  FieldEntry,
} from './types.js';
