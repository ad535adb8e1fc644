import { DESCRIPTION_COLUMN_WIDTH, DESCRIPTION_LINE_WIDTH } from '@rekening/types';
import { DEFAULT_PADDING_POLICY } from '../normalizer.js';
import {
  atmWithdrawalGrammar,
  bankFeesGrammar,
  cardPaymentGrammar,
  directDebitGrammar,
  interestGrammar,
  legacyInsuranceGrammar,
  legacyPosGrammar,
  wireTransferGrammar,
} from '../grammars/index.js';
import type { DecoderRule, DescriptionDecoderConfig } from '../types.js';

export const DEFAULT_STRUCTURED_TAGS: readonly string[] = [
  'TRTP',
  'CSID',
  'NAME',
  'REMI',
  'MARF',
  'EREF',
  'IBAN',
  'BIC',
  'ORDP',
  'ID',
];

export const DEFAULT_UNKNOWN_TAG_PATTERN = /^[A-Z]{2,4}$/;

export const DEFAULT_LABELS: readonly string[] = [
  'Incassant',
  'Naam',
  'Machtiging',
  'Omschrijving',
  'IBAN',
  'BIC',
  'Kenmerk',
  'Voor',
];

// Order matters: "SEPA Incasso" before "SEPA ".
export const DEFAULT_RULES: readonly DecoderRule[] = [
  { prefix: 'ABN AMRO Bank', grammar: bankFeesGrammar },
  { prefix: 'BEA ', grammar: legacyPosGrammar },
  { prefix: 'BEA, ', grammar: cardPaymentGrammar },
  { prefix: 'GEA, ', grammar: atmWithdrawalGrammar },
  { prefix: 'SEPA Incasso', grammar: directDebitGrammar },
  { prefix: 'SEPA ', grammar: wireTransferGrammar },
  { prefix: 'Basic interest', grammar: interestGrammar },
  { prefix: 'CREDIT INTEREST', grammar: interestGrammar },
  { prefix: 'Maandpremie ', grammar: legacyInsuranceGrammar },
  { prefix: 'Uitbetaling pakketkorting', grammar: legacyInsuranceGrammar },
  { prefix: 'PAKKETVERZ. POLISNR.', grammar: legacyInsuranceGrammar },
];

export const DEFAULT_DECODER_CONFIG: DescriptionDecoderConfig = {
  columnWidth: DESCRIPTION_COLUMN_WIDTH,
  lineWidth: DESCRIPTION_LINE_WIDTH,
  structuredTags: DEFAULT_STRUCTURED_TAGS,
  unknownTagPattern: DEFAULT_UNKNOWN_TAG_PATTERN,
  rules: DEFAULT_RULES,
  labels: DEFAULT_LABELS,
  padding: DEFAULT_PADDING_POLICY,
};
