export {
  DescriptionTypeSchema,
  DescriptionJsonSchema,
  TransactionJsonSchema,
  CreditCardTransactionJsonSchema,
  RecordErrorJsonSchema,
  StatementFormatSchema,
  StatementFileOutputSchema,
  ParserOptionsSchema,
} from './output.js';

export type {
  DescriptionType,
  DescriptionJson,
  TransactionJson,
  CreditCardTransactionJson,
  StatementFormat,
  StatementFileOutput,
  ParserOptions,
  ParserOptionsInput,
} from './output.js';
