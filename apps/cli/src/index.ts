#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { PARSER_NAME, PARSER_VERSION } from '@rekening/types';
import { OUTPUT_FORMATS, envBool, parseCliOptions } from './options.js';
import type { CliOptions } from './options.js';
import { runIcs, runTsv } from './run.js';

const program = new Command();

program
  .name(PARSER_NAME)
  .description('Parse bank account exports and credit card statements into JSON or CSV')
  .version(PARSER_VERSION);

function addCommonOptions(command: Command, directoryHelp: string): Command {
  return command
    .option('-d, --inputDir <directory>', directoryHelp, process.env['REKENING_INPUT_DIR'])
    .option('-o, --out <file>', 'Output file path (default: stdout)', process.env['REKENING_OUT'])
    .option('-v, --verbose', 'Enable verbose output', envBool('REKENING_VERBOSE', false))
    .option('-s, --strict', 'Stop at the first malformed record', envBool('REKENING_STRICT', false))
    .option('--pretty', 'Pretty-print JSON output', envBool('REKENING_PRETTY', true))
    .option('--no-pretty', 'Disable pretty-printing')
    .option('--sort-keys', 'Sort JSON object keys', envBool('REKENING_SORT_KEYS', false))
    .option(
      '-f, --format <format>',
      `Output format (${OUTPUT_FORMATS.join(', ')})`,
      process.env['REKENING_FORMAT'] ?? 'json'
    )
    .option('--validate', 'Validate each output document against the JSON schema', envBool('REKENING_VALIDATE', false));
}

async function runAction(
  files: string[],
  rawOptions: unknown,
  run: (files: string[], options: CliOptions) => Promise<number>
): Promise<void> {
  let verbose = false;
  try {
    const options = parseCliOptions(rawOptions);
    verbose = options.verbose;
    const code = await run(files, options);
    process.exit(code);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[ERROR] ${message}`);
    if (verbose && error instanceof Error && error.stack !== undefined) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}

addCommonOptions(
  program.command('tsv').description('Parse tab-separated account exports').argument('[files...]', 'Export files'),
  'Directory of .tab/.txt exports to process'
)
  .option('-e, --encoding <encoding>', 'Input encoding (latin1, utf8)', process.env['REKENING_ENCODING'] ?? 'latin1')
  .action(async (files: string[], options: unknown) => {
    await runAction(files, options, runTsv);
  });

addCommonOptions(
  program.command('ics').description('Parse credit card statement PDFs').argument('[files...]', 'Statement PDFs'),
  'Directory of statement PDFs to process'
)
  .option('--table', 'Print the extracted statement table instead of transactions', envBool('REKENING_TABLE', false))
  .action(async (files: string[], options: unknown) => {
    await runAction(files, options, runIcs);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(`[ERROR] ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
