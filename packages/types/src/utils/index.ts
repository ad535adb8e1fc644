export {
  PARSER_NAME,
  PARSER_VERSION,
  DESCRIPTION_COLUMN_WIDTH,
  DESCRIPTION_LINE_WIDTH,
} from './constants.js';
export {
  buildISODate,
  parseCompactDate,
  parseDutchDate,
  daysBetween,
} from './date.js';
export { parseCommaDecimal, formatDecimal } from './money.js';
