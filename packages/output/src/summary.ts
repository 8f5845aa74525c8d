import { sumAmounts, type Transaction } from '@stmt-ingest/types';

export interface TransactionSummary {
  transactionCount: number;
  /** Earliest and latest parsed dates; null when no row has a date */
  dateRange: { start: string; end: string } | null;
  totalCredits: number;
  totalDebits: number;
  unparsedDates: number;
}

export function summarizeTransactions(transactions: readonly Transaction[]): TransactionSummary {
  const dates = transactions
    .map(txn => txn.date)
    .filter((date): date is string => date !== null)
    .sort();

  const start = dates[0];
  const end = dates[dates.length - 1];

  return {
    transactionCount: transactions.length,
    dateRange: start !== undefined && end !== undefined ? { start, end } : null,
    totalCredits: sumAmounts(transactions.filter(t => t.type === 'CREDIT').map(t => t.amount)),
    totalDebits: sumAmounts(transactions.filter(t => t.type === 'DEBIT').map(t => t.amount)),
    unparsedDates: transactions.length - dates.length,
  };
}
