import { stat } from 'fs/promises';
import { extname } from 'path';
import {
  NotFoundError,
  UnsupportedFormatError,
  SUPPORTED_EXTENSIONS,
  type StatementFormat,
  type Transaction,
} from '@stmt-ingest/types';
import { extractStatementText, type ExtractionStrategy, type TextSourceOptions } from '@stmt-ingest/pdf-extract';
import { parseStatementText, type TextParserOptions } from './text-parser.js';
import { standardizeTable, type StandardizeOptions } from './tabular-standardizer.js';
import {
  loadDelimitedTableWithFallback,
  loadSpreadsheetTable,
  type DelimitedTableLoader,
  type SpreadsheetTableLoader,
} from './table-loaders.js';

export interface ProcessStatementOptions extends TextSourceOptions, TextParserOptions, StandardizeOptions {
  /** Candidate encodings for CSV input, in the order they are tried */
  encodings?: readonly string[];
  delimitedLoader?: DelimitedTableLoader;
  spreadsheetLoader?: SpreadsheetTableLoader;
}

export interface ProcessedStatement {
  filePath: string;
  format: StatementFormat;
  transactions: Transaction[];
  warnings: string[];
  /** PDF only: where the text came from */
  extraction?: ExtractionStrategy;
  /** CSV only: the encoding that decoded the file */
  encoding?: string;
}

/** Format for a path by its case-insensitive suffix, or null when unsupported. */
export function detectStatementFormat(filePath: string): StatementFormat | null {
  return SUPPORTED_EXTENSIONS[extname(filePath).toLowerCase()] ?? null;
}

async function assertExists(filePath: string): Promise<void> {
  try {
    await stat(filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      throw new NotFoundError(filePath);
    }
    throw error;
  }
}

/**
 * Process one statement file into a sorted transaction table.
 *
 * PDFs go through text extraction (text layer, then OCR) and the text parser;
 * CSV and Excel files through their table loader and the standardizer. Every
 * failure is raised to the caller.
 */
export async function processStatement(
  filePath: string,
  options: ProcessStatementOptions = {}
): Promise<ProcessedStatement> {
  await assertExists(filePath);

  const format = detectStatementFormat(filePath);
  if (format === null) {
    throw new UnsupportedFormatError(filePath, extname(filePath).toLowerCase());
  }

  switch (format) {
    case 'document': {
      const extracted = await extractStatementText(filePath, options);
      return {
        filePath,
        format,
        transactions: parseStatementText(extracted.text, options),
        warnings: extracted.warnings,
        extraction: extracted.strategy,
      };
    }
    case 'delimited-text': {
      const decoded = await loadDelimitedTableWithFallback(filePath, {
        encodings: options.encodings,
        loader: options.delimitedLoader,
      });
      return {
        filePath,
        format,
        transactions: standardizeTable(decoded.table, options),
        warnings: [],
        encoding: decoded.encoding,
      };
    }
    case 'spreadsheet': {
      const loader = options.spreadsheetLoader ?? loadSpreadsheetTable;
      const table = await loader(filePath);
      return {
        filePath,
        format,
        transactions: standardizeTable(table, options),
        warnings: [],
      };
    }
  }
}
