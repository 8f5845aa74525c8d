/**
 * Table Integrity Check Module
 *
 * Verifies a canonical table: each record against TransactionSchema (the
 * debit/credit sign rule included) and the table order (ascending dates,
 * unparsed dates last). Problems are reported, never fixed.
 */

import { TransactionSchema, compareDates, type Transaction } from '@stmt-ingest/types';

export interface IntegrityIssue {
  index: number;
  kind: 'record' | 'order';
  message: string;
}

export interface IntegrityCheckResult {
  valid: boolean;
  recordsChecked: number;
  issues: IntegrityIssue[];
}

export function checkTableIntegrity(transactions: readonly Transaction[]): IntegrityCheckResult {
  const issues: IntegrityIssue[] = [];

  transactions.forEach((txn, index) => {
    const parsed = TransactionSchema.safeParse(txn);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        issues.push({ index, kind: 'record', message: `${issue.path.join('.') || 'record'}: ${issue.message}` });
      }
    }

    const previous = index > 0 ? transactions[index - 1] : undefined;
    if (previous !== undefined && compareDates(previous.date, txn.date) > 0) {
      issues.push({
        index,
        kind: 'order',
        message: `Date ${txn.date ?? 'unparsed'} follows ${previous.date ?? 'unparsed'}`,
      });
    }
  });

  return {
    valid: issues.length === 0,
    recordsChecked: transactions.length,
    issues,
  };
}
