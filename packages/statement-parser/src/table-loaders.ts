import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import { DEFAULT_CSV_ENCODINGS, UnrecodableFileError, formatError } from '@stmt-ingest/types';

/**
 * A table as read from a CSV or spreadsheet: the header row and the data rows
 * as positional cells.
 */
export interface RawTable {
  columns: string[];
  rows: unknown[][];
}

export type DelimitedTableLoader = (filePath: string, encoding: string) => Promise<RawTable>;

export type SpreadsheetTableLoader = (filePath: string) => Promise<RawTable>;

function toRawTable(records: unknown[]): RawTable {
  const arrays = records.filter((record): record is unknown[] => Array.isArray(record));
  const [header, ...rows] = arrays;
  return {
    columns: (header ?? []).map(cell => (cell === null || cell === undefined ? '' : String(cell).trim())),
    rows,
  };
}

/** `;` when it outnumbers `,` on the header line. */
export function detectDelimiter(text: string): ',' | ';' {
  const firstLine = text.split(/\r?\n/).find(line => line.trim() !== '') ?? '';
  const semicolons = firstLine.split(';').length - 1;
  const commas = firstLine.split(',').length - 1;
  return semicolons > commas ? ';' : ',';
}

/**
 * Decode a delimited-text file with one encoding and parse it. Invalid byte
 * sequences for the encoding raise instead of being replaced.
 */
export async function loadDelimitedTable(filePath: string, encoding: string): Promise<RawTable> {
  const bytes = await readFile(filePath);
  const text = new TextDecoder(encoding, { fatal: true }).decode(bytes);

  const records: unknown = parse(text, {
    delimiter: detectDelimiter(text),
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  });

  if (!Array.isArray(records)) {
    throw new Error(`Unexpected CSV parser output for ${filePath}`);
  }
  return toRawTable(records);
}

export interface EncodingFallbackOptions {
  encodings?: readonly string[];
  loader?: DelimitedTableLoader;
}

export interface DecodedTable {
  table: RawTable;
  encoding: string;
}

/**
 * Try each candidate encoding in order; the first one that decodes and parses
 * the file is used. Failed attempts are dropped. Fails with
 * UnrecodableFileError when no candidate works.
 */
export async function loadDelimitedTableWithFallback(
  filePath: string,
  options: EncodingFallbackOptions = {}
): Promise<DecodedTable> {
  const encodings = options.encodings ?? DEFAULT_CSV_ENCODINGS;
  const loader = options.loader ?? loadDelimitedTable;
  const attempts: Array<{ encoding: string; error: string }> = [];

  for (const encoding of encodings) {
    try {
      const table = await loader(filePath, encoding);
      return { table, encoding };
    } catch (error) {
      attempts.push({ encoding, error: formatError(error) });
    }
  }

  throw new UnrecodableFileError(filePath, attempts);
}

/**
 * Read the first sheet of an .xlsx/.xls workbook. Date-formatted cells come
 * back as Date objects.
 */
export async function loadSpreadsheetTable(filePath: string): Promise<RawTable> {
  const buffer = await readFile(filePath);
  const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (sheet === undefined) {
    throw new Error(`Workbook has no sheets: ${filePath}`);
  }

  const records = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: false,
  });
  return toRawTable(records);
}
