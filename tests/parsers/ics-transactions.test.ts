import { describe, it, expect } from 'vitest';
import {
  buildCreditCardTransaction,
  getTransactionsFromPages,
  groupRelatedRows,
  readStatementPages,
} from '@rekening/ics-parser';
import type { StatementPage, StatementRow } from '@rekening/ics-parser';
import { MalformedRecordError, UnexpectedLayoutError } from '@rekening/types';
import { Decimal } from 'decimal.js';

function row(...cells: string[]): string[] {
  return [...cells, ...Array<string>(9 - cells.length).fill('')];
}

function page(
  index: number,
  rows: string[][],
  statementDate: string | null = '2024-02-01',
  totalPages: number | null = null
): StatementPage {
  return {
    index,
    statementDate,
    pageNumber: index,
    totalPages,
    table: new Map(rows.map((cells, i) => [640 - i * 10, cells])),
  };
}

const CARD_HEADER = row('Uw Card met als laatste vier cijfers 4321');
const BOOKSHOP = row('05 jan', '06 jan', 'Boekhandel Het Blad', 'AMSTERDAM', 'NLD', '', '', '45,90', 'Af');
const CAFE = row('08 jan', '08 jan', 'Cafe Zonneschijn', 'NEW YORK', 'USA', '12,00', 'USD', '11,08', 'Af');
const CAFE_RATE = row('', '', 'Wisselkoers USD', '1,08303');

describe('groupRelatedRows', () => {
  it('should start a group at every dated row and every card header', () => {
    const rows: StatementRow[] = [
      { kind: 'cells', line: 1, cells: row('2024-01-05', '2024-01-06', 'a') },
      { kind: 'span', line: 2, text: 'Uw Card met als laatste vier cijfers 4321' },
      { kind: 'span', line: 3, text: 'A DE VRIES' },
      { kind: 'cells', line: 4, cells: row('2024-01-08', '2024-01-08', 'b') },
      { kind: 'cells', line: 5, cells: row('', '', 'Wisselkoers USD', '1.08') },
      { kind: 'cells', line: 6, cells: row('2024-01-09', '2024-01-09', 'c') },
    ];

    expect(groupRelatedRows(rows).map((group) => group.map((r) => r.line))).toEqual([[1], [2, 3], [4, 5], [6]]);
  });

  it('should keep leading rows together', () => {
    const rows: StatementRow[] = [
      { kind: 'span', line: 1, text: 'Some notice' },
      { kind: 'cells', line: 2, cells: row('2024-01-05') },
    ];

    expect(groupRelatedRows(rows).map((group) => group.length)).toEqual([1, 1]);
  });

  it('should return no groups for no rows', () => {
    expect(groupRelatedRows([])).toEqual([]);
  });
});

describe('getTransactionsFromPages', () => {
  const pages = [
    page(1, [
      row('11 dec', '11 dec', 'GEINCASSEERD VORIG SALDO', '', '', '', '', '250,00', 'Bij'),
      CARD_HEADER,
      row('A DE VRIES'),
      BOOKSHOP,
      CAFE,
      CAFE_RATE,
    ]),
    page(2, [
      row('20 jan', '20 jan', 'Retour Boekhandel', 'AMSTERDAM', 'NLD', '', '', '1.045,90', 'Bij'),
      row('Uw Card met als laatste vier cijfers 8765'),
      row('B DE VRIES'),
      row('25 jan', '25 jan', 'Bakkerij', 'UTRECHT', 'NLD', '', '', '3,10', 'Af'),
    ]),
  ];

  it('should read every transaction across pages', () => {
    const transactions = getTransactionsFromPages(pages);

    expect(
      transactions.map((t) => [t.cardNumber, t.date, t.amount.toFixed(2), t.countryCode, ...t.descriptions])
    ).toEqual([
      [null, '2023-12-11', '250.00', '', 'GEINCASSEERD VORIG SALDO', ''],
      ['4321', '2024-01-05', '-45.90', 'NLD', 'Boekhandel Het Blad', 'AMSTERDAM'],
      ['4321', '2024-01-08', '-11.08', 'USA', 'Cafe Zonneschijn', 'NEW YORK'],
      ['4321', '2024-01-20', '1045.90', 'NLD', 'Retour Boekhandel', 'AMSTERDAM'],
      ['8765', '2024-01-25', '-3.10', 'NLD', 'Bakkerij', 'UTRECHT'],
    ]);
  });

  it('should read the foreign amount and the exchange rate', () => {
    const cafe = getTransactionsFromPages(pages)[2];

    expect(cafe?.foreignAmount?.toFixed(2)).toBe('12.00');
    expect(cafe?.foreignCurrency).toBe('USD');
    expect(cafe?.exchangeRate?.toString()).toBe('1.08303');
  });

  it('should leave the foreign fields empty for euro transactions', () => {
    const bookshop = getTransactionsFromPages(pages)[1];

    expect(bookshop?.foreignAmount).toBeNull();
    expect(bookshop?.foreignCurrency).toBeNull();
    expect(bookshop?.exchangeRate).toBeNull();
  });

  it('should require the pages in order', () => {
    expect(() => getTransactionsFromPages([page(2, []), page(1, [])])).toThrow(
      new UnexpectedLayoutError('Pages must be in order, found page 2 at position 1')
    );
  });

  it('should require one statement date on every page', () => {
    expect(() => getTransactionsFromPages([page(1, []), page(2, [], '2024-03-01')])).toThrow(
      'Page 2: Statement date 2024-03-01 differs from 2024-02-01 on the first page'
    );
    expect(() => getTransactionsFromPages([page(1, [], null)])).toThrow('Page 1: No statement date found');
  });

  it('should reject a foreign transaction without its exchange rate', () => {
    expect(() => getTransactionsFromPages([page(1, [CAFE, BOOKSHOP])])).toThrow(MalformedRecordError);
  });
});

describe('readStatementPages', () => {
  it('should skip groups that do not form a transaction', () => {
    const result = readStatementPages([page(1, [CAFE, row('', '', 'Wisselkoers GBP', '0,86'), BOOKSHOP])]);

    expect(result.transactions.map((t) => t.descriptions[0])).toEqual(['Boekhandel Het Blad']);
    expect(result.errors).toEqual([
      { line: 1, field: null, message: 'Expected "Wisselkoers USD" below a foreign currency transaction' },
    ]);
  });

  it('should report the column of a cell it cannot convert', () => {
    const result = readStatementPages([page(1, [row('05 jan', '06 jan', 'X', '', 'NLD', '', '', '45.90', 'Af')])]);

    expect(result.transactions).toEqual([]);
    expect(result.errors).toEqual([
      { line: 1, field: "Bedrag in euro's", message: "Invalid Bedrag in euro's: Unable to parse amount: 45.90" },
    ]);
  });

  it.each([
    ['a transaction without an amount', [row('05 jan', '06 jan', 'X', '', 'NLD')], 'Transaction without an amount in euro'],
    ['rows without a transaction date', [row('', '', 'stray'), BOOKSHOP], 'Rows do not start with a transaction date'],
    [
      'text spanning the table next to other cells',
      [row('Uw Card met als laatste vier cijfers 1', '', '', '', '', '', '', '1,00', 'Af')],
      'Text spanning the table shares its row with other cells',
    ],
    ['a card header followed by a transaction row', [CARD_HEADER, row('', '', 'extra')], 'Rows do not form a card header'],
    ['three related rows', [CAFE, CAFE_RATE, CAFE_RATE], 'Expected at most two related rows, found 3'],
  ])('should report %s', (_case, rows, message) => {
    const result = readStatementPages([page(1, rows)]);
    expect(result.errors[0]?.message).toBe(message);
  });

  it('should throw in strict mode', () => {
    expect(() => readStatementPages([page(1, [row('05 jan', '06 jan', 'X', '', 'NLD')])], { strict: true })).toThrow(
      MalformedRecordError
    );
  });

  it('should warn when pages are missing', () => {
    const result = readStatementPages([page(1, [BOOKSHOP], '2024-02-01', 3)]);
    expect(result.warnings).toEqual(['Statement says 3 pages, found 1']);
  });
});

describe('buildCreditCardTransaction', () => {
  it('should freeze the transaction and default the foreign fields', () => {
    const transaction = buildCreditCardTransaction({
      cardNumber: '4321',
      date: '2024-01-05',
      descriptions: ['Boekhandel Het Blad', 'AMSTERDAM'],
      countryCode: 'NLD',
      amount: new Decimal('-45.90'),
    });

    expect(Object.isFrozen(transaction)).toBe(true);
    expect(Object.isFrozen(transaction.descriptions)).toBe(true);
    expect(transaction.foreignAmount).toBeNull();
    expect(transaction.exchangeRate).toBeNull();
  });
});
