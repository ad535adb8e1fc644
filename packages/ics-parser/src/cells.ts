import { buildISODate, daysBetween } from '@rekening/types';

export const MONTHS_LONG: ReadonlyMap<string, number> = new Map(
  [
    'januari',
    'februari',
    'maart',
    'april',
    'mei',
    'juni',
    'juli',
    'augustus',
    'september',
    'oktober',
    'november',
    'december',
  ].map((name, index) => [name, index + 1])
);

// "mrt", not "maa"
export const MONTHS_SHORT: ReadonlyMap<string, number> = new Map(
  ['jan', 'feb', 'mrt', 'apr', 'mei', 'jun', 'jul', 'aug', 'sep', 'okt', 'nov', 'dec'].map((name, index) => [
    name,
    index + 1,
  ])
);

const CELL_PATTERNS = {
  shortDate: /^(\d{1,2})\s+([a-z]{3})$/,
  longDate: /^(\d{1,2})\s+([a-z]+)\s+(\d{4})$/,
  amount: /^\d{1,3}(?:\.\d{3})*,\d+$|^\d+,\d+$/,
};

/** "1 januari 2024" -> "2024-01-01" */
export function parseStatementDate(text: string): string {
  const match = CELL_PATTERNS.longDate.exec(text.trim());
  const month = match?.[2] !== undefined ? MONTHS_LONG.get(match[2]) : undefined;
  if (match?.[1] === undefined || match[3] === undefined || month === undefined) {
    throw new Error(`Invalid statement date: ${text}`);
  }
  const iso = buildISODate(parseInt(match[3], 10), month, parseInt(match[1], 10));
  if (iso === null) {
    throw new Error(`Invalid statement date: ${text}`);
  }
  return iso;
}

/**
 * "dd mmm" printed without a year. The year is the one that puts the date
 * nearest to the statement date, the previous year on a tie.
 */
export function convertDate(text: string, statementDate: string): string {
  const match = CELL_PATTERNS.shortDate.exec(text.trim());
  const month = match?.[2] !== undefined ? MONTHS_SHORT.get(match[2]) : undefined;
  if (match?.[1] === undefined || month === undefined) {
    throw new Error(`Invalid date: ${text}`);
  }
  const day = parseInt(match[1], 10);
  const year = parseInt(statementDate.slice(0, 4), 10);

  const sameYear = buildISODate(year, month, day);
  const previousYear = buildISODate(year - 1, month, day);
  if (sameYear === null || previousYear === null) {
    const only = sameYear ?? previousYear;
    if (only === null) {
      throw new Error(`Invalid date: ${text}`);
    }
    return only;
  }
  const distance = (date: string): number => Math.abs(daysBetween(date, statementDate));
  return distance(sameYear) < distance(previousYear) ? sameYear : previousYear;
}

/** "1.234,56" -> "1234.56" */
export function convertAmount(text: string): string {
  const trimmed = text.trim();
  if (!CELL_PATTERNS.amount.test(trimmed)) {
    throw new Error(`Unable to parse amount: ${text}`);
  }
  return trimmed.replace(/\./g, '').replace(',', '.');
}

export type DebitCredit = '+' | '-';

/** "Bij" is a credit, "Af" a debit. */
export function convertDebitCredit(text: string): DebitCredit {
  switch (text.trim()) {
    case 'Bij':
      return '+';
    case 'Af':
      return '-';
    default:
      throw new Error(`Expected "Bij" or "Af", found "${text}"`);
  }
}

export type CellConverter = 'date' | 'amount' | 'debitCredit' | null;

/**
 * Blank cells stay blank, whatever the converter.
 */
export function convertCell(text: string, converter: CellConverter, statementDate: string): string {
  const trimmed = text.trim();
  if (trimmed === '') {
    return '';
  }
  switch (converter) {
    case 'date':
      return convertDate(trimmed, statementDate);
    case 'amount':
      return convertAmount(trimmed);
    case 'debitCredit':
      return convertDebitCredit(trimmed);
    case null:
      return trimmed;
  }
}
