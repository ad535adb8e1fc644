/**
 * Row clustering for positioned text.
 */
import type { TextItem } from './text-items.js';

export interface Row {
  /** Average baseline of the items */
  y: number;
  page: number;
  /** Sorted by x */
  items: TextItem[];
  text: string;
}

/**
 * Groups items whose baselines are within `yTolerance` of the first item of
 * the row. Pages are kept apart; rows come out top to bottom.
 */
export function groupByRows(items: readonly TextItem[], yTolerance: number = 3.0): Row[] {
  if (items.length === 0) return [];

  const byPage = new Map<number, TextItem[]>();
  for (const item of items) {
    const pageItems = byPage.get(item.page) ?? [];
    pageItems.push(item);
    byPage.set(item.page, pageItems);
  }

  const allRows: Row[] = [];
  const pages = [...byPage.keys()].sort((a, b) => a - b);

  for (const page of pages) {
    const sorted = [...(byPage.get(page) ?? [])].sort((a, b) => b.y - a.y);

    let currentRow: TextItem[] = [];
    let currentY = sorted[0]?.y ?? 0;

    for (const item of sorted) {
      if (Math.abs(item.y - currentY) <= yTolerance) {
        currentRow.push(item);
      } else {
        if (currentRow.length > 0) {
          allRows.push(createRow(currentRow, page));
        }
        currentRow = [item];
        currentY = item.y;
      }
    }

    if (currentRow.length > 0) {
      allRows.push(createRow(currentRow, page));
    }
  }

  return allRows;
}

function createRow(items: TextItem[], page: number): Row {
  const sorted = [...items].sort((a, b) => a.x - b.x);
  const avgY = items.reduce((sum, item) => sum + item.y, 0) / items.length;

  return {
    y: avgY,
    page,
    items: sorted,
    text: buildRowText(sorted),
  };
}

/**
 * Joins sorted items, with a space wherever the gap is wider than half a
 * character of the item before it.
 */
function buildRowText(sortedItems: readonly TextItem[]): string {
  let text = '';
  let prev: TextItem | null = null;

  for (const curr of sortedItems) {
    if (prev !== null) {
      const gap = curr.x - (prev.x + prev.width);
      const avgCharWidth = prev.width / Math.max(prev.str.length, 1);
      if (gap > avgCharWidth * 0.5) {
        text += ' ';
      }
    }
    text += curr.str;
    prev = curr;
  }

  return text;
}

export function getRowsForPage(rows: readonly Row[], page: number): Row[] {
  return rows.filter((row) => row.page === page);
}
