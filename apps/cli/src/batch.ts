import { basename } from 'path';
import type { StatementFileInfo } from './directory-scanner.js';

export interface ParseError {
  filename: string;
  filePath: string;
  error: string;
  stack: string | undefined;
  timestamp: string;
}

export interface ParsedFile<T> {
  file: Pick<StatementFileInfo, 'filePath' | 'fileName'>;
  result: T;
}

export interface BatchProcessResult<T> {
  parsed: Array<ParsedFile<T>>;
  parseErrors: ParseError[];
  summary: {
    totalFilesFound: number;
    filesSucceeded: number;
    filesFailed: number;
  };
}

export interface BatchProcessOptions {
  onProgress?: (current: number, total: number, filename: string) => void;
  onError?: (error: ParseError) => void;
}

export function fileInfoFromPath(filePath: string): Pick<StatementFileInfo, 'filePath' | 'fileName'> {
  return { filePath, fileName: basename(filePath) };
}

/**
 * Parses files one after the other so output order follows input order.
 * A file that fails is reported and the rest are still processed.
 */
export async function processBatch<T>(
  files: ReadonlyArray<Pick<StatementFileInfo, 'filePath' | 'fileName'>>,
  parseFile: (filePath: string) => Promise<T>,
  options: BatchProcessOptions = {}
): Promise<BatchProcessResult<T>> {
  const parsed: Array<ParsedFile<T>> = [];
  const parseErrors: ParseError[] = [];

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    if (file === undefined) continue;

    if (options.onProgress !== undefined) {
      options.onProgress(i + 1, files.length, file.fileName);
    }

    try {
      const result = await parseFile(file.filePath);
      parsed.push({ file, result });
    } catch (error) {
      const parseError = createParseError(file, error);
      parseErrors.push(parseError);

      if (options.onError !== undefined) {
        options.onError(parseError);
      }
    }
  }

  return {
    parsed,
    parseErrors,
    summary: {
      totalFilesFound: files.length,
      filesSucceeded: parsed.length,
      filesFailed: parseErrors.length,
    },
  };
}

function createParseError(file: Pick<StatementFileInfo, 'filePath' | 'fileName'>, error: unknown): ParseError {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return {
    filename: file.fileName,
    filePath: file.filePath,
    error: message,
    stack,
    timestamp: new Date().toISOString(),
  };
}
