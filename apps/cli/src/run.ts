import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { readTsvFile } from '@rekening/tsv-parser';
import { formatTable, readIcsPdf, tableRows } from '@rekening/ics-parser';
import type { IcsStatementResult } from '@rekening/ics-parser';
import {
  buildIcsOutput,
  buildTsvOutput,
  exportCreditCardCsv,
  exportCsv,
  stringifyJsonLike,
} from '@rekening/output';
import { validateOutputOrThrow } from '@rekening/types';
import type { CreditCardTransaction, StatementFileOutput, Transaction } from '@rekening/types';
import { fileInfoFromPath, processBatch } from './batch.js';
import type { BatchProcessResult } from './batch.js';
import { PDF_EXTENSIONS, TSV_EXTENSIONS, scanDirectory, validateDirectory } from './directory-scanner.js';
import type { StatementFileInfo } from './directory-scanner.js';
import type { CliOptions } from './options.js';

type FileRef = Pick<StatementFileInfo, 'filePath' | 'fileName'>;

interface ParsedStatement<T> {
  document: StatementFileOutput;
  transactions: T[];
  table: string | null;
}

async function resolveFiles(
  files: readonly string[],
  options: CliOptions,
  extensions: readonly string[]
): Promise<FileRef[]> {
  const resolved: FileRef[] = files.map(fileInfoFromPath);

  if (options.inputDir !== undefined) {
    const validation = await validateDirectory(options.inputDir);
    if (!validation.valid) {
      throw new Error(validation.error ?? `Invalid directory: ${options.inputDir}`);
    }

    const scan = await scanDirectory(options.inputDir, extensions);
    if (options.verbose) {
      console.error(`[INFO] Scanning directory: ${scan.directoryPath}`);
      for (const skip of scan.skipped) {
        console.error(`[INFO] Skipped ${skip.fileName}: ${skip.reason}`);
      }
    }
    resolved.push(...scan.files);
  }

  return resolved;
}

function reportFile(fileName: string, document: StatementFileOutput): void {
  for (const warning of document.warnings) {
    console.error(`[WARN] ${fileName}: ${warning}`);
  }
  for (const error of document.errors) {
    const location = error.line === null ? '' : ` line ${error.line}`;
    console.error(`[ERROR] ${fileName}${location}: ${error.message}`);
  }
}

async function writeOutput(content: string, options: CliOptions): Promise<void> {
  if (options.out !== undefined) {
    await mkdir(dirname(options.out), { recursive: true });
    await writeFile(options.out, content.endsWith('\n') ? content : `${content}\n`, 'utf-8');
    if (options.verbose) {
      console.error(`[INFO] Output written to: ${options.out}`);
    }
  } else {
    console.log(content);
  }
}

async function runBatch<T>(
  files: readonly FileRef[],
  parse: (filePath: string) => Promise<ParsedStatement<T>>,
  toCsv: (transactions: T[]) => string,
  options: CliOptions
): Promise<number> {
  if (files.length === 0) {
    console.error('[ERROR] No input files');
    return 1;
  }

  if (options.verbose) {
    console.error(`[INFO] Processing ${files.length} file(s)`);
  }

  const batch: BatchProcessResult<ParsedStatement<T>> = await processBatch(files, parse, {
    onProgress: (current, total, filename) => {
      if (options.verbose) {
        console.error(`[INFO] [${current}/${total}] ${filename}`);
      }
    },
    onError: (error) => {
      console.error(`[ERROR] ${error.filename}: ${error.error}`);
      if (options.verbose && error.stack !== undefined) {
        console.error(error.stack);
      }
    },
  });

  for (const { file, result } of batch.parsed) {
    reportFile(file.fileName, result.document);
  }

  let content: string;
  if (options.table) {
    content = batch.parsed.map(({ result }) => result.table ?? '').join('\n');
  } else if (options.format === 'csv') {
    content = toCsv(batch.parsed.flatMap(({ result }) => result.transactions));
  } else {
    content = stringifyJsonLike(
      batch.parsed.map(({ result }) => result.document),
      { pretty: options.pretty, sortKeys: options.sortKeys }
    );
  }

  if (batch.parsed.length > 0) {
    await writeOutput(content, options);
  }

  if (options.verbose) {
    const { totalFilesFound, filesSucceeded, filesFailed } = batch.summary;
    console.error(`[INFO] ${filesSucceeded}/${totalFilesFound} file(s) parsed, ${filesFailed} failed`);
  }

  return batch.parseErrors.length > 0 ? 1 : 0;
}

function finish(document: StatementFileOutput, options: CliOptions): StatementFileOutput {
  if (options.validate) {
    validateOutputOrThrow(document);
  }
  return document;
}

/**
 * Parses account exports. Returns the process exit code.
 */
export async function runTsv(files: readonly string[], options: CliOptions): Promise<number> {
  const resolved = await resolveFiles(files, options, TSV_EXTENSIONS);

  const parse = async (filePath: string): Promise<ParsedStatement<Transaction>> => {
    const result = await readTsvFile(filePath, {
      strict: options.strict,
      verbose: options.verbose,
      encoding: options.encoding,
    });
    const document = buildTsvOutput(result.transactions, {
      source: filePath,
      warnings: result.warnings,
      errors: result.errors,
    });
    return { document: finish(document, options), transactions: result.transactions, table: null };
  };

  return runBatch(resolved, parse, (transactions) => exportCsv(transactions), { ...options, table: false });
}

function renderTable(result: IcsStatementResult): string {
  return formatTable(result.pages.flatMap(tableRows));
}

/**
 * Parses credit card statements. Returns the process exit code.
 */
export async function runIcs(files: readonly string[], options: CliOptions): Promise<number> {
  const resolved = await resolveFiles(files, options, PDF_EXTENSIONS);

  const parse = async (filePath: string): Promise<ParsedStatement<CreditCardTransaction>> => {
    const result = await readIcsPdf(filePath, { strict: options.strict, verbose: options.verbose });
    const document = buildIcsOutput(result.transactions, {
      source: filePath,
      warnings: result.warnings,
      errors: result.errors,
    });
    return {
      document: finish(document, options),
      transactions: result.transactions,
      table: options.table ? renderTable(result) : null,
    };
  };

  return runBatch(resolved, parse, (transactions) => exportCreditCardCsv(transactions), options);
}
