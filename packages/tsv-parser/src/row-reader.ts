import type { Decimal } from 'decimal.js';
import { MalformedRecordError, parseCommaDecimal, parseCompactDate } from '@rekening/types';

/**
 * Column order of the `TXT*.TAB` export. The value date sits after the
 * balances here, unlike in the spreadsheet export.
 */
export const TSV_COLUMNS = [
  'account',
  'currency',
  'date',
  'startBalance',
  'endBalance',
  'valueDate',
  'amount',
  'description',
] as const;

export type TsvColumn = (typeof TSV_COLUMNS)[number];

/** One record with every column converted, before the description is decoded. */
export interface RowFields {
  account: string;
  currency: string;
  date: string;
  startBalance: Decimal;
  endBalance: Decimal;
  valueDate: string;
  amount: Decimal;
  description: string;
}

const ROW_PATTERNS = {
  account: /^\d+$/,
  currency: /^[A-Z]{3}$/,
  comment: /^\s*#/,
};

export function isCommentOrBlank(line: string): boolean {
  return line.trim() === '' || ROW_PATTERNS.comment.test(line);
}

/**
 * Skips blank lines and lines whose first non-blank character is `#`.
 */
export function* filterComments(lines: Iterable<string>): Generator<string> {
  for (const line of lines) {
    if (!isCommentOrBlank(line)) {
      yield line;
    }
  }
}

function columnValue(columns: readonly string[], column: TsvColumn): string {
  return columns[TSV_COLUMNS.indexOf(column)] ?? '';
}

function convert<T>(
  record: string,
  lineNumber: number | null,
  field: TsvColumn,
  convertValue: () => T
): T {
  try {
    return convertValue();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedRecordError(`Invalid ${field}: ${reason}`, { lineNumber, field, record });
  }
}

/**
 * Splits one export line into its eight columns and converts them.
 * Throws MalformedRecordError on the first column that does not convert.
 */
export function parseRow(line: string, lineNumber: number | null = null): RowFields {
  const record = line.replace(/[\r\n]+$/, '');
  const columns = record.split('\t');

  if (columns.length !== TSV_COLUMNS.length) {
    throw new MalformedRecordError(
      `Expected ${TSV_COLUMNS.length} tab-separated columns, found ${columns.length}`,
      { lineNumber, record }
    );
  }

  const account = columnValue(columns, 'account');
  if (!ROW_PATTERNS.account.test(account)) {
    throw new MalformedRecordError(`Invalid account: "${account}" is not a digit string`, {
      lineNumber,
      field: 'account',
      record,
    });
  }

  const currency = columnValue(columns, 'currency');
  if (!ROW_PATTERNS.currency.test(currency)) {
    throw new MalformedRecordError(`Invalid currency: "${currency}" is not a three letter code`, {
      lineNumber,
      field: 'currency',
      record,
    });
  }

  return {
    account,
    currency,
    date: convert(record, lineNumber, 'date', () => parseCompactDate(columnValue(columns, 'date'))),
    startBalance: convert(record, lineNumber, 'startBalance', () =>
      parseCommaDecimal(columnValue(columns, 'startBalance'))
    ),
    endBalance: convert(record, lineNumber, 'endBalance', () => parseCommaDecimal(columnValue(columns, 'endBalance'))),
    valueDate: convert(record, lineNumber, 'valueDate', () => parseCompactDate(columnValue(columns, 'valueDate'))),
    amount: convert(record, lineNumber, 'amount', () => parseCommaDecimal(columnValue(columns, 'amount'))),
    description: columnValue(columns, 'description'),
  };
}
