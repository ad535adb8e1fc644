import { COLUMNS } from './layout.js';

export interface FormatTableOptions {
  separator?: string;
  prefix?: string;
  suffix?: string;
  /** Pad every cell to its column width */
  padding?: boolean;
}

/** Width of a spanning row: every column plus the separators between them. */
export const TABLE_WIDTH = COLUMNS.reduce((sum, column) => sum + column.maxLength, 0) + COLUMNS.length - 1;

function isSpanningRow(row: readonly string[]): boolean {
  const first = row[0] ?? '';
  const firstColumn = COLUMNS[0];
  return firstColumn !== undefined && first.length > firstColumn.maxLength && row.slice(1).every((cell) => cell.trim() === '');
}

/**
 * Renders raw table rows, one line per row. The defaults draw a padded
 * table; `{ separator: ';', prefix: '', suffix: '', padding: false }`
 * gives delimited text.
 */
export function formatTable(rows: ReadonlyArray<readonly string[]>, options: FormatTableOptions = {}): string {
  const { separator = '|', prefix = '|', suffix = '|', padding = true } = options;

  const lines = rows.map((row) => {
    if (isSpanningRow(row)) {
      const text = row[0] ?? '';
      return padding ? text.padEnd(TABLE_WIDTH, ' ') : text;
    }
    return row
      .map((cell, index) => (padding ? cell.padEnd(COLUMNS[index]?.maxLength ?? 0, ' ') : cell))
      .join(separator);
  });

  return lines.map((line) => prefix + line + suffix).join('\n');
}
