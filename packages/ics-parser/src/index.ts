// Cell conversion
export {
  MONTHS_LONG,
  MONTHS_SHORT,
  parseStatementDate,
  convertDate,
  convertAmount,
  convertDebitCredit,
  convertCell,
} from './cells.js';

export type { DebitCredit, CellConverter } from './cells.js';

// Page layout
export {
  COLUMNS,
  TABLE_FONT_SIZE,
  FOOTNOTE_FONT_SIZE,
  interval,
  inInterval,
  isBoilerplate,
  findColumn,
  buildStatementPage,
  tableRows,
} from './layout.js';

export type { Interval, TableColumn, StatementPage } from './layout.js';

// Rows to transactions
export { CARD_HEADER_PREFIX, groupRelatedRows } from './grouping.js';
export type { StatementRow } from './grouping.js';

export {
  buildCreditCardTransaction,
  convertRow,
  collectStatementRows,
  readStatementPages,
  getTransactionsFromPages,
} from './transactions.js';

export type { CreditCardTransactionFields, IcsReadResult } from './transactions.js';

export { formatTable, TABLE_WIDTH } from './format-table.js';
export type { FormatTableOptions } from './format-table.js';

export { pagesFromItems, parseIcsItems, readIcsPdfBuffer, readIcsPdf } from './reader.js';
export type { IcsStatementResult } from './reader.js';
