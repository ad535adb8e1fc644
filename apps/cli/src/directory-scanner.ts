import { readdir, stat } from 'fs/promises';
import { join, extname, normalize } from 'path';

export interface StatementFileInfo {
  filePath: string;
  fileName: string;
  sizeBytes: number;
  modifiedAt: Date;
}

export interface ScanResult {
  files: StatementFileInfo[];
  skipped: Array<{ fileName: string; reason: string }>;
  directoryPath: string;
}

/** The account export is named TXT<timestamp>.TAB; some downloads end in .txt. */
export const TSV_EXTENSIONS: readonly string[] = ['.tab', '.txt'];

export const PDF_EXTENSIONS: readonly string[] = ['.pdf'];

/**
 * Scans a directory for statement files with one of the given extensions
 * (case-insensitive), skipping temporary, hidden and empty files.
 * Returns files sorted by filename ascending for deterministic processing.
 */
export async function scanDirectory(directoryPath: string, extensions: readonly string[]): Promise<ScanResult> {
  const normalizedPath = normalize(directoryPath);
  const entries = await readdir(normalizedPath, { withFileTypes: true });

  const files: StatementFileInfo[] = [];
  const skipped: Array<{ fileName: string; reason: string }> = [];

  for (const entry of entries) {
    if (entry.isDirectory()) {
      continue;
    }

    const fileName = entry.name;
    const filePath = join(normalizedPath, fileName);

    const ext = extname(fileName).toLowerCase();
    if (!extensions.includes(ext)) {
      continue;
    }

    if (fileName.startsWith('~$') || fileName.startsWith('.')) {
      skipped.push({ fileName, reason: 'Temporary file (starts with ~$ or .)' });
      continue;
    }

    const fileStat = await stat(filePath);

    if (fileStat.size === 0) {
      skipped.push({ fileName, reason: 'Zero-byte file' });
      continue;
    }

    files.push({
      filePath,
      fileName,
      sizeBytes: fileStat.size,
      modifiedAt: fileStat.mtime,
    });
  }

  files.sort((a, b) => a.fileName.localeCompare(b.fileName));

  return {
    files,
    skipped,
    directoryPath: normalizedPath,
  };
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Validates that a directory exists and is accessible.
 */
export async function validateDirectory(directoryPath: string): Promise<{ valid: boolean; error?: string }> {
  try {
    const normalizedPath = normalize(directoryPath);
    const dirStat = await stat(normalizedPath);

    if (!dirStat.isDirectory()) {
      return { valid: false, error: `Path is not a directory: ${normalizedPath}` };
    }

    return { valid: true };
  } catch (error) {
    if (isErrnoException(error)) {
      if (error.code === 'ENOENT') {
        return { valid: false, error: `Directory does not exist: ${directoryPath}` };
      }
      if (error.code === 'EACCES') {
        return { valid: false, error: `Permission denied: ${directoryPath}` };
      }
    }
    return { valid: false, error: `Cannot access directory: ${directoryPath}` };
  }
}
