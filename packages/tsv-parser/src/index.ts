export { TSV_COLUMNS, filterComments, isCommentOrBlank, parseRow } from './row-reader.js';
export type { RowFields, TsvColumn } from './row-reader.js';

export { assembleTransaction, isSameTransaction, deduplicateTransactions } from './transaction.js';
export type { AssemblyContext } from './transaction.js';

export { readTsv, parseTsvText, readTsvFile } from './reader.js';
export type { TsvReadOptions, TsvReadResult } from './reader.js';
