/**
 * Output module: JSON-like documents and CSV.
 */

export {
  descriptionToJsonLike,
  transactionToJsonLike,
  creditCardTransactionToJsonLike,
  buildTsvOutput,
  buildIcsOutput,
  stringifyJsonLike,
  type StatementOutputInput,
  type StringifyOptions,
} from './serialize.js';

export {
  exportCsv,
  exportCreditCardCsv,
  type CsvExportOptions,
} from './csv-exporter.js';
