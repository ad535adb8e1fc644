/**
 * A row of the concatenated statement table after cell conversion. Text
 * wider than the first column, such as a card header, spans the table.
 */
export type StatementRow =
  | { readonly kind: 'span'; readonly line: number; readonly text: string }
  | { readonly kind: 'cells'; readonly line: number; readonly cells: readonly string[] };

export const CARD_HEADER_PREFIX = 'Uw Card met als laatste vier cijfers';

function startsGroup(row: StatementRow): boolean {
  if (row.kind === 'span') {
    return row.text.startsWith(CARD_HEADER_PREFIX);
  }
  return row.cells[0] !== undefined && row.cells[0] !== '';
}

/**
 * Splits the table into the rows that belong together. A group starts at
 * a row with a transaction date or at a card header; every other row
 * continues the group before it.
 */
export function groupRelatedRows(rows: Iterable<StatementRow>): StatementRow[][] {
  const groups: StatementRow[][] = [];
  let buffer: StatementRow[] = [];

  for (const row of rows) {
    if (startsGroup(row)) {
      if (buffer.length > 0) {
        groups.push(buffer);
      }
      buffer = [row];
    } else {
      buffer.push(row);
    }
  }
  if (buffer.length > 0) {
    groups.push(buffer);
  }

  return groups;
}
