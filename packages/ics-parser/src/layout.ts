/**
 * Page layout of the credit card statement.
 *
 * Every text item is placed by its position: y-bands select the part of
 * the page and, in the transaction table, x-intervals select the column.
 * Anything the layout does not account for is an UnexpectedLayoutError,
 * so a changed document is noticed instead of misread.
 */
import type { TextItem } from '@rekening/pdf-extract';
import { UnexpectedLayoutError } from '@rekening/types';
import type { CellConverter } from './cells.js';
import { parseStatementDate } from './cells.js';

/** Half-open: low <= n < high */
export interface Interval {
  readonly low: number;
  readonly high: number;
}

export function interval(low: number, high: number): Interval {
  return { low, high };
}

export function inInterval(n: number, range: Interval): boolean {
  return range.low <= n && n < range.high;
}

const EMPTY = interval(0, 0);

export interface TableColumn {
  readonly name: string;
  readonly xInterval: Interval;
  /** Widest text the column holds; anything wider spans the whole table */
  readonly maxLength: number;
  readonly converter: CellConverter;
}

export const COLUMNS: readonly TableColumn[] = [
  { name: 'Datum transactie', xInterval: interval(59, 62), maxLength: 6, converter: 'date' },
  { name: 'Datum boeking', xInterval: interval(102, 106), maxLength: 6, converter: 'date' },
  // Up to 22 characters, except for "GEINCASSEERD VORIG SALDO" and the like.
  { name: 'Omschrijving', xInterval: interval(149, 155), maxLength: 24, converter: null },
  { name: 'Omschrijving 2', xInterval: interval(275, 277), maxLength: 13, converter: null },
  { name: 'Land', xInterval: interval(362, 364), maxLength: 3, converter: null },
  // Amounts are right-aligned, hence the wide intervals.
  { name: 'Bedrag in vreemde valuta', xInterval: interval(401, 440), maxLength: 8, converter: 'amount' },
  { name: 'Valuta', xInterval: interval(444, 446), maxLength: 3, converter: null },
  { name: "Bedrag in euro's", xInterval: interval(478, 530), maxLength: 8, converter: 'amount' },
  { name: 'Bij/Af', xInterval: interval(535, 539), maxLength: 3, converter: 'debitCredit' },
];

export const TABLE_FONT_SIZE = 8;
export const FOOTNOTE_FONT_SIZE = 6;

// Matched at the start of an item.
const BOILERPLATE_PATTERNS: readonly RegExp[] = [
  /^Uw betalingen aan International Card Services BV zijn bijgewerkt/,
  /^Het totale saldo ad.*zal omstreeks/,
  /^(?:machtigingsnummer )?E[0-9]+ worden geïncasseerd/,
  /^Wilt u een overboeking doen naar uw Card-rekening/,
  /^Diemen\. Vermeld bij uw betaling altijd uw ICS-klantnummer/,
  /^Nu beschikbaar: Apple Pay! Voeg eenvoudig uw Card aan uw Apple Wallet toe in onze app\./,
  /^Als u online een product besteld heeft, bent u er natuurlijk/,
  /^zuinig op\. Maar een ongeluk zit in een klein hoekje/,
  /^daarom altijd met uw ABN AMRO creditcard/,
  /^een Aankoopverzekering\. Kijk voor meer informatie/,
  /^voorwaarden op www\.zekermetjecreditcard\.nl/,
];

export function isBoilerplate(text: string): boolean {
  return BOILERPLATE_PATTERNS.some((pattern) => pattern.test(text));
}

interface PageBands {
  companyInfo: Interval;
  statementInfo: Interval;
  mainTable: Interval;
  tableHeader: Interval;
  footer: Interval;
}

/** The first page carries the company address on top and a footer below the table. */
function pageBands(index: number): PageBands {
  const first = index === 1;
  return {
    companyInfo: first ? interval(755, 9999) : EMPTY,
    statementInfo: interval(665, 721),
    mainTable: first ? interval(126, 645) : interval(0, 645),
    tableHeader: interval(633, 645),
    footer: first ? interval(0, 126) : EMPTY,
  };
}

// Statement info block, one row of values below the labels:
//   Datum | ICS-klantnummer | Volgnummer | Bladnummer
//   1 januari 2024 | 12345678901 | 1 | 2 van 2
const STATEMENT_INFO = {
  valueRow: { low: 708, high: 710 },
  dateX: { low: 59, high: 61 },
  pageNumberX: { low: 410, high: 412 },
  totalPagesMinX: 420,
};

function between(n: number, range: { low: number; high: number }): boolean {
  return range.low <= n && n <= range.high;
}

export interface StatementPage {
  /** 1-based position of the page in the document */
  readonly index: number;
  readonly statementDate: string | null;
  readonly pageNumber: number | null;
  readonly totalPages: number | null;
  /** Raw cell text by baseline, one cell per column */
  readonly table: ReadonlyMap<number, readonly string[]>;
}

function describeItem(item: TextItem): string {
  return `"${item.str}" at x=${item.x}, y=${item.y}, font size ${item.fontSize}`;
}

export function findColumn(x: number): number | null {
  const index = COLUMNS.findIndex((column) => inInterval(x, column.xInterval));
  return index === -1 ? null : index;
}

/**
 * Classifies the text items of one page and collects the statement date,
 * the page numbering and the raw transaction table.
 */
export function buildStatementPage(items: readonly TextItem[], index: number): StatementPage {
  const bands = pageBands(index);
  const table = new Map<number, string[]>();
  let statementDate: string | null = null;
  let pageNumber: number | null = null;
  let totalPages: number | null = null;

  const layoutError = (message: string, item: TextItem): UnexpectedLayoutError =>
    new UnexpectedLayoutError(`${message}: ${describeItem(item)}`, index);

  for (const item of items) {
    const text = item.str;
    if (text.trim() === '' || item.fontSize === FOOTNOTE_FONT_SIZE || isBoilerplate(text)) {
      continue;
    }
    if (item.fontSize !== TABLE_FONT_SIZE) {
      throw layoutError('Unexpected font size', item);
    }

    const { x, y } = item;

    if (inInterval(y, bands.companyInfo) || inInterval(y, bands.footer)) {
      continue;
    }

    if (inInterval(y, bands.statementInfo)) {
      if (!between(y, STATEMENT_INFO.valueRow)) {
        continue;
      }
      if (between(x, STATEMENT_INFO.dateX)) {
        try {
          statementDate = parseStatementDate(text);
        } catch (error) {
          throw layoutError(error instanceof Error ? error.message : String(error), item);
        }
      } else if (between(x, STATEMENT_INFO.pageNumberX)) {
        pageNumber = parseInt(text.trim(), 10);
        if (pageNumber !== index) {
          throw layoutError(`Page number does not match page position ${index}`, item);
        }
      } else if (x >= STATEMENT_INFO.totalPagesMinX) {
        const total = /van\s+(\d+)/.exec(text);
        if (total?.[1] === undefined) {
          throw layoutError('Expected "n van m"', item);
        }
        totalPages = parseInt(total[1], 10);
      }
      continue;
    }

    if (inInterval(y, bands.mainTable)) {
      if (inInterval(y, bands.tableHeader)) {
        continue;
      }
      const column = findColumn(x);
      if (column === null) {
        throw layoutError('Unmatched column', item);
      }
      const row = table.get(y) ?? COLUMNS.map(() => '');
      const existing = row[column] ?? '';
      row[column] = existing === '' ? text : `${existing} ${text}`;
      table.set(y, row);
      continue;
    }

    throw layoutError('Text outside every known part of the page', item);
  }

  return { index, statementDate, pageNumber, totalPages, table };
}

/** Table rows from top to bottom. */
export function tableRows(page: StatementPage): Array<readonly string[]> {
  return [...page.table.entries()].sort(([a], [b]) => b - a).map(([, row]) => row);
}
