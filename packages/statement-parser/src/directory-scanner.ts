import { readdir, stat } from 'fs/promises';
import { join, normalize } from 'path';
import type { StatementFormat } from '@stmt-ingest/types';
import { detectStatementFormat } from './dispatcher.js';

export interface StatementFileInfo {
  filePath: string;
  fileName: string;
  format: StatementFormat;
}

export interface ScanResult {
  files: StatementFileInfo[];
  skipped: Array<{ fileName: string; reason: string }>;
  directoryPath: string;
}

/** Office writes `~$name.xlsx` beside a workbook that is open. */
function isOfficeLockFile(fileName: string): boolean {
  return fileName.startsWith('~$');
}

/**
 * Lists the statement files of a directory (non-recursive) in listing order.
 *
 * Only the suffix is checked here; entries are not opened or stat-ed, so an
 * unreadable entry (a dangling link, a file removed mid-scan) fails later on
 * its own instead of failing the scan.
 */
export async function scanDirectoryForStatements(directoryPath: string): Promise<ScanResult> {
  const normalizedPath = normalize(directoryPath);
  const entries = await readdir(normalizedPath, { withFileTypes: true });

  const files: StatementFileInfo[] = [];
  const skipped: Array<{ fileName: string; reason: string }> = [];

  for (const entry of entries) {
    if (entry.isDirectory()) continue;

    const format = detectStatementFormat(entry.name);
    if (format === null) continue;

    if (isOfficeLockFile(entry.name)) {
      skipped.push({ fileName: entry.name, reason: 'Office lock file' });
      continue;
    }

    files.push({ filePath: join(normalizedPath, entry.name), fileName: entry.name, format });
  }

  return { files, skipped, directoryPath: normalizedPath };
}

/**
 * Checks that a path names a readable directory; `error` says why not.
 */
export async function validateDirectory(directoryPath: string): Promise<{ valid: boolean; error?: string }> {
  try {
    const dirStat = await stat(normalize(directoryPath));
    return dirStat.isDirectory()
      ? { valid: true }
      : { valid: false, error: `Path is not a directory: ${directoryPath}` };
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    switch (code) {
      case 'ENOENT':
        return { valid: false, error: `Directory does not exist: ${directoryPath}` };
      case 'EACCES':
        return { valid: false, error: `Permission denied: ${directoryPath}` };
      default:
        return { valid: false, error: `Cannot access directory: ${directoryPath}` };
    }
  }
}
