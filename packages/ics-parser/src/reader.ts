import { readFile } from 'fs/promises';
import { extractTextItemsFromBuffer, itemsForPage } from '@rekening/pdf-extract';
import type { TextItem } from '@rekening/pdf-extract';
import type { ParserOptionsInput } from '@rekening/types';
import { buildStatementPage } from './layout.js';
import type { StatementPage } from './layout.js';
import { readStatementPages } from './transactions.js';
import type { IcsReadResult } from './transactions.js';

export interface IcsStatementResult extends IcsReadResult {
  pages: StatementPage[];
}

export function pagesFromItems(items: readonly TextItem[], totalPages: number): StatementPage[] {
  const pages: StatementPage[] = [];
  for (let pageNum = 1; pageNum <= totalPages; pageNum++) {
    pages.push(buildStatementPage(itemsForPage(items, pageNum), pageNum));
  }
  return pages;
}

export function parseIcsItems(
  items: readonly TextItem[],
  totalPages: number,
  options: ParserOptionsInput = {}
): IcsStatementResult {
  const pages = pagesFromItems(items, totalPages);
  return { ...readStatementPages(pages, options), pages };
}

export async function readIcsPdfBuffer(
  buffer: Buffer | Uint8Array,
  options: ParserOptionsInput = {}
): Promise<IcsStatementResult> {
  const { items, totalPages } = await extractTextItemsFromBuffer(buffer);
  return parseIcsItems(items, totalPages, options);
}

export async function readIcsPdf(filePath: string, options: ParserOptionsInput = {}): Promise<IcsStatementResult> {
  const buffer = await readFile(filePath);
  return readIcsPdfBuffer(buffer, options);
}
