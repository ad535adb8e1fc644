import { readFile } from 'fs/promises';
import type { RecordError, Transaction } from '@rekening/types';
import { MalformedRecordError, ParserOptionsSchema } from '@rekening/types';
import type { ParserOptionsInput } from '@rekening/types';
import { createDescriptionDecoder } from '@rekening/description';
import type { DescriptionDecoder } from '@rekening/description';
import { isCommentOrBlank, parseRow } from './row-reader.js';
import { assembleTransaction } from './transaction.js';

export interface TsvReadOptions extends ParserOptionsInput {
  /** Decoder to use instead of the default configuration */
  decoder?: DescriptionDecoder;
}

export interface TsvReadResult {
  transactions: Transaction[];
  /** Records that were skipped */
  errors: RecordError[];
  warnings: string[];
}

/**
 * Reads export lines into transactions.
 *
 * Every record is handled on its own: a malformed record is reported in
 * `errors` and the rest of the input is still read, unless `strict` is
 * set, in which case the first MalformedRecordError is thrown.
 */
export function readTsv(lines: Iterable<string>, options: TsvReadOptions = {}): TsvReadResult {
  const { strict, verbose } = ParserOptionsSchema.parse({
    strict: options.strict,
    verbose: options.verbose,
    encoding: options.encoding,
  });
  const decoder = options.decoder ?? createDescriptionDecoder();
  const transactions: Transaction[] = [];
  const errors: RecordError[] = [];
  const warnings: string[] = [];

  let lineNumber = 0;
  let order = 0;
  for (const line of lines) {
    lineNumber++;
    if (isCommentOrBlank(line)) {
      continue;
    }
    order++;

    try {
      const fields = parseRow(line, lineNumber);
      const transaction = assembleTransaction(fields, order, decoder, { warnings, lineNumber });
      if (verbose && transaction.description.type === 'unrecognized') {
        warnings.push(`Line ${lineNumber}: unrecognized description "${transaction.description.fields.get('text') ?? ''}"`);
      }
      transactions.push(transaction);
    } catch (error) {
      if (strict || !(error instanceof MalformedRecordError)) {
        throw error;
      }
      errors.push({ line: error.lineNumber, field: error.field, message: error.message });
    }
  }

  return { transactions, errors, warnings };
}

export function parseTsvText(text: string, options: TsvReadOptions = {}): TsvReadResult {
  return readTsv(text.split(/\r?\n/), options);
}

/**
 * Reads an export file. The bank writes these in latin1, not UTF-8.
 */
export async function readTsvFile(filePath: string, options: TsvReadOptions = {}): Promise<TsvReadResult> {
  const { encoding } = ParserOptionsSchema.parse({ encoding: options.encoding });
  const text = await readFile(filePath, { encoding });
  return parseTsvText(text, options);
}
