import {
  MissingColumnsError,
  coerceCellAmount,
  parseFlexibleDate,
  type Transaction,
} from '@stmt-ingest/types';
import { sortTransactionsByDate } from './normalizers.js';
import type { RawTable } from './table-loaders.js';

export type CanonicalField = 'date' | 'amount' | 'description';

/** Lowercase tokens a column name must contain to be taken for a field. */
export type ColumnSynonyms = Readonly<Record<CanonicalField, readonly string[]>>;

export const COLUMN_SYNONYMS: ColumnSynonyms = {
  date: ['date', 'data', 'dia'],
  amount: ['amount', 'valor', 'montante', 'quantia'],
  description: ['desc', 'texto', 'detalhe'],
};

const CANONICAL_FIELDS: readonly CanonicalField[] = ['date', 'amount', 'description'];

/** Column index chosen for each canonical field. */
export type ColumnResolution = Record<CanonicalField, number>;

/**
 * For each field pick the left-most column whose lowercased name contains one
 * of its tokens. Throws MissingColumnsError naming every unresolved field.
 */
export function resolveColumns(columns: readonly string[], synonyms: ColumnSynonyms = COLUMN_SYNONYMS): ColumnResolution {
  const lowered = columns.map(column => column.toLowerCase());
  const found: Partial<ColumnResolution> = {};
  const missing: CanonicalField[] = [];

  for (const field of CANONICAL_FIELDS) {
    const index = lowered.findIndex(name => synonyms[field].some(token => name.includes(token)));
    if (index === -1) {
      missing.push(field);
    } else {
      found[field] = index;
    }
  }

  if (found.date === undefined || found.amount === undefined || found.description === undefined) {
    throw new MissingColumnsError(missing, [...columns]);
  }
  return { date: found.date, amount: found.amount, description: found.description };
}

/** Tabular sources carry signed amounts, so the sign alone decides the type. */
export function typeFromSign(amount: number): 'DEBIT' | 'CREDIT' {
  return amount > 0 ? 'CREDIT' : 'DEBIT';
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return parseFlexibleDate(value) ?? '';
  return String(value).replace(/\s+/g, ' ').trim();
}

export interface StandardizeOptions {
  synonyms?: ColumnSynonyms;
}

/**
 * Map a table with arbitrary headers onto the canonical transaction shape.
 * Rows without a numeric amount are dropped; unreadable dates become null.
 */
export function standardizeTable(table: RawTable, options: StandardizeOptions = {}): Transaction[] {
  const columns = resolveColumns(table.columns, options.synonyms);
  const transactions: Transaction[] = [];

  for (const row of table.rows) {
    const amount = coerceCellAmount(row[columns.amount]);
    if (amount === null) continue;

    transactions.push({
      date: parseFlexibleDate(row[columns.date]),
      description: cellText(row[columns.description]),
      amount,
      type: typeFromSign(amount),
    });
  }

  return sortTransactionsByDate(transactions);
}
