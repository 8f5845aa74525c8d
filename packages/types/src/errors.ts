/**
 * Error taxonomy for statement ingestion.
 *
 * The single-document API raises these to its caller; the batch API records
 * them per file as diagnostics.
 */

export type IngestErrorCode =
  | 'NOT_FOUND'
  | 'UNSUPPORTED_FORMAT'
  | 'EXTRACTION_FAILURE'
  | 'UNRECODABLE_FILE'
  | 'MISSING_COLUMNS'
  | 'NO_DIRECTORY_SPECIFIED';

export interface IngestErrorDetails {
  message: string;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class IngestError extends Error {
  public readonly code: IngestErrorCode;
  public readonly context: Record<string, unknown>;

  constructor(code: IngestErrorCode, details: IngestErrorDetails) {
    super(details.message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'IngestError';
    this.code = code;
    this.context = details.context ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): { code: IngestErrorCode; message: string; context: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export class NotFoundError extends IngestError {
  constructor(filePath: string) {
    super('NOT_FOUND', { message: `File not found: ${filePath}`, context: { filePath } });
    this.name = 'NotFoundError';
  }
}

export class UnsupportedFormatError extends IngestError {
  constructor(filePath: string, extension: string) {
    super('UNSUPPORTED_FORMAT', {
      message: `Unsupported file format: ${extension === '' ? '(no extension)' : extension}`,
      context: { filePath, extension },
    });
    this.name = 'UnsupportedFormatError';
  }
}

export class ExtractionFailureError extends IngestError {
  constructor(filePath: string, attempts: string[], cause?: unknown) {
    super('EXTRACTION_FAILURE', {
      message: `No usable text extracted from ${filePath}: ${attempts.join(' | ')}`,
      context: { filePath, attempts },
      cause,
    });
    this.name = 'ExtractionFailureError';
  }
}

export class UnrecodableFileError extends IngestError {
  constructor(filePath: string, attempts: Array<{ encoding: string; error: string }>) {
    super('UNRECODABLE_FILE', {
      message: `Could not read ${filePath} with any candidate encoding (${attempts.map(a => a.encoding).join(', ')})`,
      context: { filePath, attempts },
    });
    this.name = 'UnrecodableFileError';
  }
}

export class MissingColumnsError extends IngestError {
  constructor(missing: string[], columns: string[]) {
    super('MISSING_COLUMNS', {
      message: `Could not identify required columns: ${missing.join(', ')}`,
      context: { missing, columns },
    });
    this.name = 'MissingColumnsError';
  }
}

export class NoDirectorySpecifiedError extends IngestError {
  constructor() {
    super('NO_DIRECTORY_SPECIFIED', { message: 'No directory specified' });
    this.name = 'NoDirectorySpecifiedError';
  }
}

export function isIngestError(error: unknown): error is IngestError {
  return error instanceof IngestError;
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof IngestError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
