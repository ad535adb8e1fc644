/**
 * De-padding for values cut out of fixed-width description columns.
 *
 * Values are right-padded to their column and runs of spaces appear where
 * a column boundary fell inside the text. Collapsing keeps single spaces
 * as they are and leaves the runs inside a policy's `preserve` phrases
 * untouched, since some merchant names are printed with a double space.
 */

export interface PaddingPolicy {
  /** `verbatim` returns values unchanged, `collapse` trims and collapses runs of spaces */
  readonly mode: 'collapse' | 'verbatim';
  /** Phrases whose inner runs of spaces are kept as printed */
  readonly preserve: readonly string[];
}

export const DEFAULT_PRESERVED_PHRASES: readonly string[] = ['SumUp  *'];

export const DEFAULT_PADDING_POLICY: PaddingPolicy = {
  mode: 'collapse',
  preserve: DEFAULT_PRESERVED_PHRASES,
};

export const VERBATIM_PADDING_POLICY: PaddingPolicy = {
  mode: 'verbatim',
  preserve: [],
};

interface Range {
  start: number;
  end: number;
}

function findPreservedRanges(value: string, phrases: readonly string[]): Range[] {
  const ranges: Range[] = [];
  for (const phrase of phrases) {
    if (phrase === '') {
      continue;
    }
    let index = value.indexOf(phrase);
    while (index !== -1) {
      ranges.push({ start: index, end: index + phrase.length });
      index = value.indexOf(phrase, index + phrase.length);
    }
  }
  return ranges;
}

export function depad(value: string, policy: PaddingPolicy = DEFAULT_PADDING_POLICY): string {
  if (policy.mode === 'verbatim') {
    return value;
  }

  const trimmed = value.trim();
  const preserved = findPreservedRanges(trimmed, policy.preserve);

  return trimmed.replace(/ {2,}/g, (run: string, offset: number) => {
    const end = offset + run.length;
    const keep = preserved.some((range) => offset >= range.start && end <= range.end);
    return keep ? run : ' ';
  });
}
