import { compareDates } from '@stmt-ingest/types';

/**
 * Ascending by date with unparsed (null) dates last. Stable, so records with
 * equal dates keep their incoming order. Does not mutate the input.
 */
export function sortTransactionsByDate<T extends { date: string | null }>(transactions: readonly T[]): T[] {
  return [...transactions].sort((a, b) => compareDates(a.date, b.date));
}
