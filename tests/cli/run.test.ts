import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { parseCliOptions } from '../../apps/cli/src/options.js';
import { runIcs, runTsv } from '../../apps/cli/src/run.js';
import { PAYMENT_LINE, SAVINGS_LINE } from '../output/fixtures.js';

interface OutputDocument {
  source: string;
  format: string;
  transactions: Array<Record<string, unknown>>;
  warnings: string[];
  errors: Array<{ line: number | null; field: string | null; message: string }>;
}

describe('cli run', () => {
  let testDir: string;
  let errorSpy: MockInstance<typeof console.error>;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    testDir = join(tmpdir(), `rekening-cli-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  async function readDocuments(path: string): Promise<OutputDocument[]> {
    const parsed: unknown = JSON.parse(await readFile(path, 'utf-8'));
    if (!Array.isArray(parsed)) {
      throw new Error('Expected an array of documents');
    }
    return parsed;
  }

  describe('parseCliOptions', () => {
    it('should apply defaults', () => {
      expect(parseCliOptions({})).toEqual({
        pretty: true,
        sortKeys: false,
        format: 'json',
        strict: false,
        verbose: false,
        validate: false,
        encoding: 'latin1',
        table: false,
      });
    });

    it('should reject an unknown output format', () => {
      expect(() => parseCliOptions({ format: 'xml' })).toThrow('Invalid options: --format:');
    });
  });

  describe('runTsv', () => {
    it('should write one document per file and report skipped records', async () => {
      const input = join(testDir, 'export.tab');
      await writeFile(input, [PAYMENT_LINE, 'bad\trecord'].join('\n'), 'utf-8');
      const out = join(testDir, 'out', 'result.json');

      const code = await runTsv([input], parseCliOptions({ out, encoding: 'utf8', validate: true }));

      expect(code).toBe(0);
      const [document] = await readDocuments(out);
      expect(document?.source).toBe(input);
      expect(document?.format).toBe('tsv');
      expect(document?.transactions.map((t) => t['amount'])).toEqual(['-25.00']);
      expect(document?.errors).toEqual([
        { line: 2, field: null, message: 'Expected 8 tab-separated columns, found 2' },
      ]);
      expect(errorSpy).toHaveBeenCalledWith('[ERROR] export.tab line 2: Expected 8 tab-separated columns, found 2');
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('should print CSV for every file to stdout', async () => {
      const first = join(testDir, 'a.tab');
      const second = join(testDir, 'b.tab');
      await writeFile(first, PAYMENT_LINE, 'utf-8');
      await writeFile(second, SAVINGS_LINE, 'utf-8');

      const code = await runTsv([first, second], parseCliOptions({ format: 'csv', encoding: 'utf8' }));

      expect(code).toBe(0);
      expect(logSpy).toHaveBeenCalledTimes(1);
      const lines = String(logSpy.mock.calls[0]?.[0]).split('\n');
      expect(lines).toHaveLength(3);
      expect(lines[1]).toBe('2021-12-30,2021-12-30,112233445,EUR,-25.00,100.00,75.00,pos_debit,Hema EV123,,BEA');
      expect(lines[2]?.startsWith('2022-01-03,2022-01-03,998877665,EUR,10.50,500.00,510.50,')).toBe(true);
    });

    it('should pick up exports from the input directory', async () => {
      await writeFile(join(testDir, 'TXT240101.TAB'), PAYMENT_LINE, 'utf-8');
      await writeFile(join(testDir, 'notes.md'), 'not an export', 'utf-8');
      const out = join(testDir, 'result.json');

      const code = await runTsv([], parseCliOptions({ inputDir: testDir, out, encoding: 'utf8' }));

      expect(code).toBe(0);
      const documents = await readDocuments(out);
      expect(documents.map((d) => d.source)).toEqual([join(testDir, 'TXT240101.TAB')]);
    });

    it('should fail the file in strict mode and exit with 1', async () => {
      const input = join(testDir, 'broken.tab');
      await writeFile(input, 'bad\trecord', 'utf-8');

      const code = await runTsv([input], parseCliOptions({ strict: true, encoding: 'utf8' }));

      expect(code).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith('[ERROR] broken.tab: Expected 8 tab-separated columns, found 2');
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('should exit with 1 when there is nothing to parse', async () => {
      const code = await runTsv([], parseCliOptions({}));

      expect(code).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith('[ERROR] No input files');
    });

    it('should reject a missing input directory', async () => {
      const missing = join(testDir, 'missing');

      await expect(runTsv([], parseCliOptions({ inputDir: missing }))).rejects.toThrow(
        `Directory does not exist: ${missing}`
      );
    });
  });

  describe('runIcs', () => {
    it('should report a statement that cannot be read', async () => {
      const code = await runIcs([join(testDir, 'missing.pdf')], parseCliOptions({}));

      expect(code).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(expect.stringMatching(/^\[ERROR\] missing\.pdf: ENOENT/));
      expect(logSpy).not.toHaveBeenCalled();
    });
  });
});
