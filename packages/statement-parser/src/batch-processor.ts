import {
  NoDirectorySpecifiedError,
  formatError,
  isIngestError,
  type BatchTransaction,
  type IngestErrorCode,
} from '@stmt-ingest/types';
import { processStatement, type ProcessStatementOptions } from './dispatcher.js';
import {
  scanDirectoryForStatements,
  validateDirectory,
  type ScanResult,
  type StatementFileInfo,
} from './directory-scanner.js';
import { sortTransactionsByDate } from './normalizers.js';

export interface ParseError {
  filename: string;
  filePath: string;
  /** Taxonomy code, or UNEXPECTED for errors raised outside the taxonomy */
  code: IngestErrorCode | 'UNEXPECTED';
  error: string;
  stack: string | undefined;
  timestamp: string;
}

export interface BatchProcessResult {
  transactions: BatchTransaction[];
  parseErrors: ParseError[];
  skipped: Array<{ fileName: string; reason: string }>;
  warnings: string[];
  summary: {
    filesFound: number;
    filesSucceeded: number;
    filesFailed: number;
    filesEmpty: number;
    totalTransactions: number;
  };
}

export interface BatchProcessOptions extends ProcessStatementOptions {
  /** Used when processDirectory is called without a directory */
  defaultDirectory?: string;
  onProgress?: (current: number, total: number, filename: string) => void;
  onError?: (error: ParseError) => void;
  onWarning?: (filename: string, warning: string) => void;
}

/**
 * Processes statement files one after another and merges their transactions
 * into a single table sorted by date.
 *
 * A file that fails is recorded in `parseErrors` and contributes nothing; the
 * batch carries on with the next file. Files that parse to an empty table
 * contribute nothing either.
 */
export async function processBatch(
  files: StatementFileInfo[],
  options: BatchProcessOptions = {}
): Promise<BatchProcessResult> {
  const perFile: BatchTransaction[][] = [];
  const parseErrors: ParseError[] = [];
  const warnings: string[] = [];
  let filesSucceeded = 0;
  let filesEmpty = 0;

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    if (file === undefined) continue;

    if (options.onProgress !== undefined) {
      options.onProgress(i + 1, files.length, file.fileName);
    }

    try {
      const result = await processStatement(file.filePath, options);
      filesSucceeded++;

      for (const warning of result.warnings) {
        warnings.push(`${file.fileName}: ${warning}`);
        if (options.onWarning !== undefined) {
          options.onWarning(file.fileName, warning);
        }
      }

      if (result.transactions.length === 0) {
        filesEmpty++;
        continue;
      }

      perFile.push(result.transactions.map(txn => ({ ...txn, sourceFile: file.fileName })));
    } catch (error) {
      const parseError = createParseError(file, error);
      parseErrors.push(parseError);

      if (options.onError !== undefined) {
        options.onError(parseError);
      }
    }
  }

  const transactions = sortTransactionsByDate(perFile.flat());

  return {
    transactions,
    parseErrors,
    skipped: [],
    warnings,
    summary: {
      filesFound: files.length,
      filesSucceeded,
      filesFailed: parseErrors.length,
      filesEmpty,
      totalTransactions: transactions.length,
    },
  };
}

function emptyResult(warnings: string[]): BatchProcessResult {
  return {
    transactions: [],
    parseErrors: [],
    skipped: [],
    warnings,
    summary: { filesFound: 0, filesSucceeded: 0, filesFailed: 0, filesEmpty: 0, totalTransactions: 0 },
  };
}

/**
 * Process every supported statement in a directory (non-recursive).
 *
 * Falls back to `options.defaultDirectory`; throws NoDirectorySpecifiedError
 * when neither is given. A directory that cannot be read yields an empty
 * result with a warning rather than an error.
 */
export async function processDirectory(
  directory?: string,
  options: BatchProcessOptions = {}
): Promise<BatchProcessResult> {
  const target = directory !== undefined && directory !== '' ? directory : options.defaultDirectory;
  if (target === undefined || target === '') {
    throw new NoDirectorySpecifiedError();
  }

  const validation = await validateDirectory(target);
  if (!validation.valid) {
    return emptyResult([validation.error ?? `Cannot access directory: ${target}`]);
  }

  let scan: ScanResult;
  try {
    scan = await scanDirectoryForStatements(target);
  } catch (error) {
    return emptyResult([`Cannot list directory ${target}: ${formatError(error)}`]);
  }

  const result = await processBatch(scan.files, options);
  return { ...result, skipped: scan.skipped };
}

/**
 * Creates a structured parse error from an exception.
 */
function createParseError(file: StatementFileInfo, error: unknown): ParseError {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return {
    filename: file.fileName,
    filePath: file.filePath,
    code: isIngestError(error) ? error.code : 'UNEXPECTED',
    error: message,
    stack,
    timestamp: new Date().toISOString(),
  };
}
