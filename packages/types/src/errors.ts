export interface MalformedRecordDetails {
  lineNumber?: number | null;
  field?: string | null;
  record: string;
}

/**
 * A record that cannot be turned into a transaction: wrong column count,
 * an unparsable number or date, or rows that do not form a transaction.
 */
export class MalformedRecordError extends Error {
  readonly lineNumber: number | null;
  readonly field: string | null;
  readonly record: string;

  constructor(message: string, details: MalformedRecordDetails) {
    super(message);
    this.name = 'MalformedRecordError';
    this.lineNumber = details.lineNumber ?? null;
    this.field = details.field ?? null;
    this.record = details.record;
  }
}

/** The statement document does not follow the page layout the parser knows. */
export class UnexpectedLayoutError extends Error {
  readonly page: number | null;

  constructor(message: string, page: number | null = null) {
    super(page === null ? message : `Page ${page}: ${message}`);
    this.name = 'UnexpectedLayoutError';
    this.page = page;
  }
}
