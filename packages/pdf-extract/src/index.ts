export {
  extractTextItems,
  extractTextItemsFromBuffer,
  itemsForPage,
  buildLinesFromItems,
} from './text-items.js';

export type { TextItem, LayoutExtractedPDF } from './text-items.js';

export { groupByRows, getRowsForPage } from './rows.js';

export type { Row } from './rows.js';
