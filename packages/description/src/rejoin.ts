import { DESCRIPTION_COLUMN_WIDTH, DESCRIPTION_LINE_WIDTH } from '@rekening/types';

/**
 * Removes the separator spaces the export inserts into the description.
 *
 * The description was printed as a first column followed by fixed-width
 * lines, and the line breaks were later replaced by single spaces, which
 * can land in the middle of a word. Slash-delimited records carry no
 * separators. Anything that does not follow the layout is returned as is.
 */
export function rejoinDescription(
  raw: string,
  columnWidth: number = DESCRIPTION_COLUMN_WIDTH,
  lineWidth: number = DESCRIPTION_LINE_WIDTH
): string {
  if (raw.startsWith('/') || raw.length <= columnWidth || raw[columnWidth] !== ' ') {
    return raw;
  }

  const head = raw.slice(0, columnWidth);
  const rest = raw.slice(columnWidth + 1).trimEnd();
  const lines: string[] = [];

  for (let start = 0; start < rest.length; start += lineWidth + 1) {
    const separator = rest.slice(start + lineWidth, start + lineWidth + 1);
    if (separator !== '' && separator !== ' ') {
      return raw;
    }
    lines.push(rest.slice(start, start + lineWidth));
  }

  return head + lines.join('');
}
