export type { DecodedDescription, Transaction, CreditCardTransaction, RecordError } from './transaction.js';
