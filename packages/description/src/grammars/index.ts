export { structuredTransferGrammar, isStructuredRecord } from './structured.js';
export { legacyPosGrammar, cardPaymentGrammar, atmWithdrawalGrammar, parsePosTimestamp } from './pos.js';
export type { PosTimestamp } from './pos.js';
export { createLabeledGrammar, directDebitGrammar, wireTransferGrammar } from './sepa.js';
export { interestGrammar } from './interest.js';
export { bankFeesGrammar } from './bank-fees.js';
export { legacyInsuranceGrammar } from './insurance.js';
