function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Builds an ISO date string, or null when the parts do not form a real
 * calendar date.
 */
export function buildISODate(year: number, month: number, day: number): string | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null;
  }
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }
  const check = new Date(Date.UTC(year, month - 1, day));
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return `${year.toString().padStart(4, '0')}-${pad2(month)}-${pad2(day)}`;
}

/** "20231231" -> "2023-12-31" */
export function parseCompactDate(dateStr: string): string {
  const match = dateStr.match(/^(\d{4})(\d{2})(\d{2})$/);
  if (!match) {
    throw new Error(`Invalid date format: ${dateStr}`);
  }
  const [, year, month, day] = match;
  if (year === undefined || month === undefined || day === undefined) {
    throw new Error(`Invalid date format: ${dateStr}`);
  }
  const iso = buildISODate(parseInt(year, 10), parseInt(month, 10), parseInt(day, 10));
  if (iso === null) {
    throw new Error(`Invalid calendar date: ${dateStr}`);
  }
  return iso;
}

/** "31-12-2023" -> "2023-12-31", null when not a valid date */
export function parseDutchDate(dateStr: string): string | null {
  const match = dateStr.trim().match(/^(\d{1,2})-(\d{1,2})-(\d{4})$/);
  if (!match) {
    return null;
  }
  const [, day, month, year] = match;
  if (year === undefined || month === undefined || day === undefined) {
    return null;
  }
  return buildISODate(parseInt(year, 10), parseInt(month, 10), parseInt(day, 10));
}

/** Whole days from `a` to `b`, both ISO dates. */
export function daysBetween(a: string, b: string): number {
  const msPerDay = 24 * 60 * 60 * 1000;
  return Math.round((Date.parse(`${b}T00:00:00Z`) - Date.parse(`${a}T00:00:00Z`)) / msPerDay);
}
