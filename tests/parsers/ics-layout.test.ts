import { describe, it, expect } from 'vitest';
import { buildStatementPage, findColumn, isBoilerplate, tableRows } from '@rekening/ics-parser';
import type { TextItem } from '@rekening/pdf-extract';
import { UnexpectedLayoutError } from '@rekening/types';

function at(str: string, x: number, y: number, fontSize = 8): TextItem {
  return { str, x, y, width: str.length * 4, height: fontSize, fontSize, page: 1 };
}

const FIRST_PAGE: TextItem[] = [
  at('International Card Services BV', 400, 780),
  at('Datum', 60, 720),
  at('Bladnummer', 411, 720),
  at('1 februari 2024', 60, 709),
  at('12345678901', 177, 709),
  at('1', 411, 709),
  at('1 van 2', 430, 709),
  at('€ 100,00', 60, 686),
  at('Datum transactie', 61, 640),
  at('02 jan', 60, 600),
  at('03 jan', 103, 600),
  at('Boekhandel', 150, 600),
  at('Het Blad', 152, 600),
  at('AMSTERDAM', 276, 600),
  at('NLD', 363, 600),
  at('45,90', 500, 600),
  at('Af', 536, 600),
  at('Uw Card met als laatste vier cijfers 4321', 60, 610),
  at('Nu beschikbaar: Apple Pay! Voeg eenvoudig uw Card aan uw Apple Wallet toe in onze app.', 20, 300, 9),
  at('Dit product valt onder het depositogarantiestelsel.', 60, 100),
  at('Kleine lettertjes', 60, 40, 6),
  at('   ', 5, 5, 12),
];

describe('buildStatementPage', () => {
  it('should read the statement info and the table', () => {
    const page = buildStatementPage(FIRST_PAGE, 1);

    expect(page.index).toBe(1);
    expect(page.statementDate).toBe('2024-02-01');
    expect(page.pageNumber).toBe(1);
    expect(page.totalPages).toBe(2);
    expect(tableRows(page)).toEqual([
      ['Uw Card met als laatste vier cijfers 4321', '', '', '', '', '', '', '', ''],
      ['02 jan', '03 jan', 'Boekhandel Het Blad', 'AMSTERDAM', 'NLD', '', '', '45,90', 'Af'],
    ]);
  });

  it('should reject text in an unexpected font size', () => {
    expect(() => buildStatementPage([at('Saldo', 60, 600, 10)], 1)).toThrow(
      new UnexpectedLayoutError('Unexpected font size: "Saldo" at x=60, y=600, font size 10', 1)
    );
  });

  it('should reject table text outside every column', () => {
    expect(() => buildStatementPage([at('Saldo', 200, 600)], 1)).toThrow(/^Page 1: Unmatched column/);
  });

  it('should reject text between the known bands', () => {
    expect(() => buildStatementPage([at('Saldo', 60, 650)], 1)).toThrow(UnexpectedLayoutError);
    expect(() => buildStatementPage([at('Saldo', 60, 800)], 2)).toThrow(
      /^Page 2: Text outside every known part of the page/
    );
  });

  it('should treat the bottom of later pages as table', () => {
    const page = buildStatementPage([at('04 jan', 60, 100)], 2);
    expect(tableRows(page)).toEqual([['04 jan', '', '', '', '', '', '', '', '']]);
  });

  it('should reject a page number that does not match the position', () => {
    expect(() => buildStatementPage([at('1', 411, 709)], 2)).toThrow(/Page number does not match page position 2/);
  });

  it('should reject a statement date it cannot read', () => {
    expect(() => buildStatementPage([at('eerste februari 2024', 60, 709)], 1)).toThrow(
      /Invalid statement date: eerste februari 2024/
    );
  });

  it('should leave the statement info unset when it is missing', () => {
    const page = buildStatementPage([], 1);
    expect(page.statementDate).toBeNull();
    expect(page.pageNumber).toBeNull();
    expect(page.totalPages).toBeNull();
    expect(page.table.size).toBe(0);
  });
});

describe('findColumn', () => {
  it.each([
    [59, 0],
    [61.9, 0],
    [103, 1],
    [150, 2],
    [276, 3],
    [363, 4],
    [420, 5],
    [445, 6],
    [500, 7],
    [537, 8],
  ])('should place x=%s in column %s', (x, column) => {
    expect(findColumn(x)).toBe(column);
  });

  it('should return null between columns', () => {
    expect(findColumn(62)).toBeNull();
    expect(findColumn(200)).toBeNull();
  });
});

describe('isBoilerplate', () => {
  it('should match the recurring notices at the start of the text', () => {
    expect(isBoilerplate('Het totale saldo ad € 45,90 zal omstreeks 20 februari')).toBe(true);
    expect(isBoilerplate('E1234567 worden geïncasseerd')).toBe(true);
    expect(isBoilerplate('Boekhandel Het Blad')).toBe(false);
  });
});
