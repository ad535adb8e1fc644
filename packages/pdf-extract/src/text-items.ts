/**
 * Positioned text extraction using pdfjs-dist.
 *
 * Coordinates are PDF user space: x grows to the right, y grows upwards,
 * so the first line of a page has the highest y.
 */
import { readFile } from 'fs/promises';

export interface TextItem {
  str: string;
  /** Left edge */
  x: number;
  /** Baseline */
  y: number;
  width: number;
  height: number;
  /** Font size in points after the text matrix is applied */
  fontSize: number;
  /** 1-based */
  page: number;
}

export interface LayoutExtractedPDF {
  items: TextItem[];
  totalPages: number;
}

interface PdfjsTextItemLike {
  str: string;
  transform: unknown[];
  width?: unknown;
  height?: unknown;
}

function isTextItem(item: unknown): item is PdfjsTextItemLike {
  return (
    typeof item === 'object' &&
    item !== null &&
    'str' in item &&
    typeof item.str === 'string' &&
    'transform' in item &&
    Array.isArray(item.transform)
  );
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function toTextItem(item: PdfjsTextItemLike, page: number): TextItem {
  // transform is [scaleX, skewY, skewX, scaleY, translateX, translateY]
  const [a, , c, d, e, f] = item.transform.map((value) => Number(value) || 0);
  const fontSize = roundTo(Math.hypot(c ?? 0, d ?? 0), 2);

  return {
    str: item.str,
    x: e ?? 0,
    y: f ?? 0,
    width: Number(item.width) || Math.abs(a ?? 1) * item.str.length * 0.6,
    height: Number(item.height) || fontSize,
    fontSize,
    page,
  };
}

export async function extractTextItems(filePath: string): Promise<LayoutExtractedPDF> {
  const dataBuffer = await readFile(filePath);
  return extractTextItemsFromBuffer(new Uint8Array(dataBuffer));
}

/**
 * Extracts every non-empty text item of every page, in content stream order.
 */
export async function extractTextItemsFromBuffer(buffer: Buffer | Uint8Array): Promise<LayoutExtractedPDF> {
  // pdfjs-dist ships ESM only
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

  const data = buffer instanceof Buffer ? new Uint8Array(buffer) : buffer;
  const loadingTask = pdfjs.getDocument({
    data,
    useSystemFonts: true,
  });

  const pdfDocument = await loadingTask.promise;
  const items: TextItem[] = [];
  const totalPages = pdfDocument.numPages;

  try {
    for (let pageNum = 1; pageNum <= totalPages; pageNum++) {
      const page = await pdfDocument.getPage(pageNum);
      const textContent = await page.getTextContent();

      for (const item of textContent.items) {
        if (!isTextItem(item) || item.str.trim().length === 0) {
          continue;
        }
        items.push(toTextItem(item, pageNum));
      }
    }
  } finally {
    await pdfDocument.destroy();
  }

  return { items, totalPages };
}

export function itemsForPage(items: readonly TextItem[], pageNumber: number): TextItem[] {
  return items.filter((item) => item.page === pageNumber);
}

/**
 * Renders items as text lines for debugging: a small gap becomes a space,
 * a large one a tab.
 */
export function buildLinesFromItems(items: readonly TextItem[]): string[] {
  const Y_TOL = 2.0;
  const SPACE_GAP = 2.5;
  const COLUMN_GAP = 18;

  if (items.length === 0) return [];

  const sorted = [...items].sort((a, b) => a.page - b.page || b.y - a.y || a.x - b.x);

  const rows: TextItem[][] = [];
  for (const item of sorted) {
    const lastRow = rows[rows.length - 1];
    const rowStart = lastRow?.[0];
    if (lastRow !== undefined && rowStart !== undefined && rowStart.page === item.page && Math.abs(item.y - rowStart.y) <= Y_TOL) {
      lastRow.push(item);
    } else {
      rows.push([item]);
    }
  }

  const lines: string[] = [];
  for (const row of rows) {
    row.sort((a, b) => a.x - b.x);

    let out = '';
    let prevEndX: number | null = null;

    for (const item of row) {
      if (item.str === '') continue;

      if (prevEndX !== null) {
        const gap = item.x - prevEndX;
        if (gap > COLUMN_GAP) {
          out += '\t';
        } else if (gap > SPACE_GAP) {
          out += ' ';
        }
      }

      out += item.str;
      prevEndX = item.x + item.width;
    }

    const cleaned = out.replace(/[ \t]+$/g, '');
    if (cleaned) {
      lines.push(cleaned);
    }
  }

  return lines;
}
