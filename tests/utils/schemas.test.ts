import { describe, it, expect } from 'vitest';
import { TransactionSchema, BatchTransactionSchema, LexiconSchema } from '@stmt-ingest/types';

describe('TransactionSchema', () => {
  it('should accept a canonical record', () => {
    const record = { date: '2024-03-01', description: 'COMPRA', amount: -45.67, type: 'DEBIT' };
    expect(TransactionSchema.parse(record)).toEqual(record);
  });

  it('should accept a null date', () => {
    expect(TransactionSchema.safeParse({ date: null, description: '', amount: 0, type: 'UNKNOWN' }).success).toBe(true);
  });

  it('should reject a positive debit and a negative credit', () => {
    expect(TransactionSchema.safeParse({ date: null, description: '', amount: 1, type: 'DEBIT' }).success).toBe(false);
    expect(TransactionSchema.safeParse({ date: null, description: '', amount: -1, type: 'CREDIT' }).success).toBe(false);
  });

  it('should reject unknown types and non-finite amounts', () => {
    expect(TransactionSchema.safeParse({ date: null, description: '', amount: 1, type: 'TRANSFER' }).success).toBe(false);
    expect(
      TransactionSchema.safeParse({ date: null, description: '', amount: Number.POSITIVE_INFINITY, type: 'UNKNOWN' })
        .success
    ).toBe(false);
  });
});

describe('BatchTransactionSchema', () => {
  it('should require a source file', () => {
    const record = { date: '2024-03-01', description: 'COMPRA', amount: -1, type: 'DEBIT' };
    expect(BatchTransactionSchema.safeParse(record).success).toBe(false);
    expect(BatchTransactionSchema.safeParse({ ...record, sourceFile: 'a.csv' }).success).toBe(true);
  });
});

describe('LexiconSchema', () => {
  it('should reject empty keywords', () => {
    expect(LexiconSchema.safeParse({ pt: { debit: [''], credit: [] } }).success).toBe(false);
  });
});
