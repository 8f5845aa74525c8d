/**
 * CSV Exporter Module
 *
 * Writes a canonical transaction table as CSV for spreadsheets and
 * reconciliation tools.
 */

import type { Transaction } from '@stmt-ingest/types';

export type TableRow = Transaction & { sourceFile?: string };

export interface CsvExportOptions {
  /** Include header row (default: true) */
  includeHeader?: boolean;
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** 'iso' (YYYY-MM-DD) or 'dmy' (DD/MM/YYYY) (default: 'iso') */
  dateFormat?: 'iso' | 'dmy';
}

const BASE_COLUMNS = ['date', 'description', 'amount', 'type'] as const;
const SOURCE_COLUMN = 'source_file';

/**
 * Escape a value for CSV (handles quotes and delimiters)
 */
function escapeCsvValue(value: string, delimiter: string): string {
  const needsQuoting = value.includes(delimiter) ||
                       value.includes('"') ||
                       value.includes('\n') ||
                       value.includes('\r');

  if (needsQuoting) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatDate(isoDate: string | null, format: 'iso' | 'dmy'): string {
  if (isoDate === null) {
    return '';
  }

  if (format === 'dmy') {
    const [year, month, day] = isoDate.split('-');
    if (year !== undefined && month !== undefined && day !== undefined) {
      return `${day}/${month}/${year}`;
    }
  }

  return isoDate;
}

function rowToCsvLine(row: readonly string[], delimiter: string): string {
  return row.map(value => escapeCsvValue(value, delimiter)).join(delimiter);
}

/**
 * Export a transaction table to CSV text. A `source_file` column is added when
 * any row carries a source file. Rows are written in the order given.
 */
export function exportCsv(transactions: readonly TableRow[], options: CsvExportOptions = {}): string {
  const opts: Required<CsvExportOptions> = {
    includeHeader: options.includeHeader ?? true,
    delimiter: options.delimiter ?? ',',
    dateFormat: options.dateFormat ?? 'iso',
  };

  const withSource = transactions.some(txn => txn.sourceFile !== undefined);
  const lines: string[] = [];

  if (opts.includeHeader) {
    const headers: string[] = [...BASE_COLUMNS];
    if (withSource) headers.push(SOURCE_COLUMN);
    lines.push(rowToCsvLine(headers, opts.delimiter));
  }

  for (const txn of transactions) {
    const row = [
      formatDate(txn.date, opts.dateFormat),
      txn.description,
      txn.amount.toFixed(2),
      txn.type,
    ];
    if (withSource) row.push(txn.sourceFile ?? '');
    lines.push(rowToCsvLine(row, opts.delimiter));
  }

  return lines.join('\n');
}
