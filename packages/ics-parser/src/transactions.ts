import { Decimal } from 'decimal.js';
import type { CreditCardTransaction, ParserOptionsInput, RecordError } from '@rekening/types';
import { MalformedRecordError, ParserOptionsSchema, UnexpectedLayoutError, parseCommaDecimal } from '@rekening/types';
import { convertCell } from './cells.js';
import { CARD_HEADER_PREFIX, groupRelatedRows } from './grouping.js';
import type { StatementRow } from './grouping.js';
import { COLUMNS, tableRows } from './layout.js';
import type { StatementPage } from './layout.js';

const COLUMN_INDEX = {
  transactionDate: 0,
  bookingDate: 1,
  description: 2,
  description2: 3,
  countryCode: 4,
  foreignAmount: 5,
  foreignCurrency: 6,
  amount: 7,
  debitCredit: 8,
} as const;

const CARD_HEADER_PATTERN = new RegExp(`^${CARD_HEADER_PREFIX} ([0-9]+)`);

export interface CreditCardTransactionFields {
  cardNumber: string | null;
  date: string;
  descriptions: readonly string[];
  countryCode: string;
  amount: Decimal;
  foreignAmount?: Decimal | null;
  foreignCurrency?: string | null;
  exchangeRate?: Decimal | null;
}

export function buildCreditCardTransaction(fields: CreditCardTransactionFields): CreditCardTransaction {
  return Object.freeze({
    cardNumber: fields.cardNumber,
    date: fields.date,
    descriptions: Object.freeze([...fields.descriptions]),
    countryCode: fields.countryCode,
    amount: fields.amount,
    foreignAmount: fields.foreignAmount ?? null,
    foreignCurrency: fields.foreignCurrency ?? null,
    exchangeRate: fields.exchangeRate ?? null,
  });
}

export interface IcsReadResult {
  transactions: CreditCardTransaction[];
  /** Rows that were skipped */
  errors: RecordError[];
  warnings: string[];
}

function rowText(row: StatementRow): string {
  return row.kind === 'span' ? row.text : row.cells.join('|');
}

function recordOf(rows: readonly StatementRow[]): string {
  return rows.map(rowText).join('\n');
}

/**
 * Converts one raw table row. A first cell wider than its column spans the
 * whole table and must be the only text on its row.
 */
export function convertRow(raw: readonly string[], statementDate: string, line: number): StatementRow {
  const record = raw.join('|');
  const first = (raw[0] ?? '').trim();
  const firstColumn = COLUMNS[0];

  if (firstColumn !== undefined && first.length > firstColumn.maxLength) {
    if (raw.slice(1).some((cell) => cell.trim() !== '')) {
      throw new MalformedRecordError('Text spanning the table shares its row with other cells', {
        lineNumber: line,
        record,
      });
    }
    return { kind: 'span', line, text: first };
  }

  const cells = COLUMNS.map((column, index) => {
    try {
      return convertCell(raw[index] ?? '', column.converter, statementDate);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MalformedRecordError(`Invalid ${column.name}: ${reason}`, {
        lineNumber: line,
        field: column.name,
        record,
      });
    }
  });
  return { kind: 'cells', line, cells };
}

/**
 * Concatenates the tables of all pages. The pages must be given in order
 * and must all carry the same statement date.
 */
export function collectStatementRows(
  pages: Iterable<StatementPage>,
  onError: (error: MalformedRecordError) => void
): StatementRow[] {
  const rows: StatementRow[] = [];
  let statementDate: string | null = null;
  let position = 0;
  let line = 0;

  for (const page of pages) {
    position++;
    if (page.index !== position) {
      throw new UnexpectedLayoutError(`Pages must be in order, found page ${page.index} at position ${position}`);
    }
    if (page.statementDate === null) {
      throw new UnexpectedLayoutError('No statement date found', page.index);
    }
    if (statementDate === null) {
      statementDate = page.statementDate;
    } else if (page.statementDate !== statementDate) {
      throw new UnexpectedLayoutError(
        `Statement date ${page.statementDate} differs from ${statementDate} on the first page`,
        page.index
      );
    }

    for (const raw of tableRows(page)) {
      line++;
      try {
        rows.push(convertRow(raw, statementDate, line));
      } catch (error) {
        if (!(error instanceof MalformedRecordError)) {
          throw error;
        }
        onError(error);
      }
    }
  }

  return rows;
}

interface CardState {
  cardNumber: string | null;
}

function signedAmount(cells: readonly string[], rows: readonly StatementRow[], line: number): Decimal {
  const amount = cells[COLUMN_INDEX.amount] ?? '';
  const sign = cells[COLUMN_INDEX.debitCredit] ?? '';
  if (amount === '' || sign === '') {
    throw new MalformedRecordError('Transaction without an amount in euro', { lineNumber: line, record: recordOf(rows) });
  }
  const value = new Decimal(amount);
  return sign === '-' ? value.negated() : value;
}

function isExchangeRateRow(cells: readonly string[], currency: string): boolean {
  const blank = [
    COLUMN_INDEX.transactionDate,
    COLUMN_INDEX.bookingDate,
    COLUMN_INDEX.countryCode,
    COLUMN_INDEX.foreignAmount,
    COLUMN_INDEX.foreignCurrency,
    COLUMN_INDEX.amount,
    COLUMN_INDEX.debitCredit,
  ];
  return (
    blank.every((index) => cells[index] === '') &&
    cells[COLUMN_INDEX.description] === `Wisselkoers ${currency}` &&
    cells[COLUMN_INDEX.description2] !== ''
  );
}

/**
 * Turns one group of rows into a transaction. A card header group
 * updates the card number instead and yields nothing.
 */
function transactionFromGroup(rows: readonly StatementRow[], state: CardState): CreditCardTransaction | null {
  const [first, second, ...rest] = rows;
  if (first === undefined) {
    return null;
  }
  const malformed = (message: string): MalformedRecordError =>
    new MalformedRecordError(message, { lineNumber: first.line, record: recordOf(rows) });

  if (rest.length > 0) {
    throw malformed(`Expected at most two related rows, found ${rows.length}`);
  }

  if (first.kind === 'span') {
    const header = CARD_HEADER_PATTERN.exec(first.text);
    if (header?.[1] === undefined || (second !== undefined && second.kind !== 'span')) {
      throw malformed('Rows do not form a card header');
    }
    // The second row is the card holder's name, which is not kept.
    state.cardNumber = header[1];
    return null;
  }

  const { cells } = first;
  const foreignAmount = cells[COLUMN_INDEX.foreignAmount] ?? '';
  const foreignCurrency = cells[COLUMN_INDEX.foreignCurrency] ?? '';
  const common = {
    cardNumber: state.cardNumber,
    date: cells[COLUMN_INDEX.transactionDate] ?? '',
    descriptions: [cells[COLUMN_INDEX.description] ?? '', cells[COLUMN_INDEX.description2] ?? ''],
    countryCode: cells[COLUMN_INDEX.countryCode] ?? '',
  };

  if (common.date === '') {
    throw malformed('Rows do not start with a transaction date');
  }

  if (second === undefined && foreignAmount === '' && foreignCurrency === '') {
    return buildCreditCardTransaction({ ...common, amount: signedAmount(cells, rows, first.line) });
  }

  if (foreignAmount !== '' && foreignCurrency !== '' && second?.kind === 'cells') {
    if (!isExchangeRateRow(second.cells, foreignCurrency)) {
      throw malformed(`Expected "Wisselkoers ${foreignCurrency}" below a foreign currency transaction`);
    }
    let exchangeRate: Decimal;
    try {
      exchangeRate = parseCommaDecimal(second.cells[COLUMN_INDEX.description2] ?? '');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MalformedRecordError(`Invalid exchange rate: ${reason}`, {
        lineNumber: second.line,
        field: 'exchangeRate',
        record: recordOf(rows),
      });
    }
    return buildCreditCardTransaction({
      ...common,
      amount: signedAmount(cells, rows, first.line),
      foreignAmount: new Decimal(foreignAmount),
      foreignCurrency,
      exchangeRate,
    });
  }

  throw malformed('Rows do not form a transaction');
}

/**
 * Reads the transactions of one statement. Every group of rows is handled
 * on its own unless `strict` is set; layout problems always throw.
 */
export function readStatementPages(pages: Iterable<StatementPage>, options: ParserOptionsInput = {}): IcsReadResult {
  const { strict } = ParserOptionsSchema.parse({
    strict: options.strict,
    verbose: options.verbose,
    encoding: options.encoding,
  });
  const transactions: CreditCardTransaction[] = [];
  const errors: RecordError[] = [];
  const warnings: string[] = [];

  const report = (error: MalformedRecordError): void => {
    if (strict) {
      throw error;
    }
    errors.push({ line: error.lineNumber, field: error.field, message: error.message });
  };

  const pageList = [...pages];
  const rows = collectStatementRows(pageList, report);

  const totalPages = pageList[pageList.length - 1]?.totalPages;
  if (typeof totalPages === 'number' && totalPages !== pageList.length) {
    warnings.push(`Statement says ${totalPages} pages, found ${pageList.length}`);
  }

  const state: CardState = { cardNumber: null };
  for (const group of groupRelatedRows(rows)) {
    try {
      const transaction = transactionFromGroup(group, state);
      if (transaction !== null) {
        transactions.push(transaction);
      }
    } catch (error) {
      if (!(error instanceof MalformedRecordError)) {
        throw error;
      }
      report(error);
    }
  }

  return { transactions, errors, warnings };
}

/**
 * All transactions of one statement, in table order. Throws on the first
 * group of rows that does not form a transaction.
 */
export function getTransactionsFromPages(pages: Iterable<StatementPage>): CreditCardTransaction[] {
  return readStatementPages(pages, { strict: true }).transactions;
}
