export const PARSER_NAME = 'rekening';

export const PARSER_VERSION = '0.1.0';

/** Width of one column of the fixed-width description field. */
export const DESCRIPTION_COLUMN_WIDTH = 32;

/** Width of one printed line of the description field (two columns). */
export const DESCRIPTION_LINE_WIDTH = 64;
