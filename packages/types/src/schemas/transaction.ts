import { z } from 'zod';

export const TransactionTypeSchema = z.enum(['DEBIT', 'CREDIT', 'UNKNOWN']);
export type TransactionType = z.infer<typeof TransactionTypeSchema>;

const BaseTransactionSchema = z.object({
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format')
    .nullable(),
  description: z.string(),
  amount: z.number().finite(),
  type: TransactionTypeSchema,
});

/** Debits never carry a positive amount and credits never a negative one. */
function signMatchesType(txn: z.infer<typeof BaseTransactionSchema>): boolean {
  if (txn.type === 'DEBIT') return txn.amount <= 0;
  if (txn.type === 'CREDIT') return txn.amount >= 0;
  return true;
}

const SIGN_MESSAGE = { message: 'Amount sign does not match transaction type', path: ['amount'] };

export const TransactionSchema = BaseTransactionSchema.refine(signMatchesType, SIGN_MESSAGE);
export type Transaction = z.infer<typeof TransactionSchema>;

export const BatchTransactionSchema = BaseTransactionSchema.extend({
  sourceFile: z.string().min(1),
}).refine(signMatchesType, SIGN_MESSAGE);
export type BatchTransaction = z.infer<typeof BatchTransactionSchema>;

export const IndicatorSetSchema = z.object({
  debit: z.array(z.string().min(1)),
  credit: z.array(z.string().min(1)),
});
export type IndicatorSet = z.infer<typeof IndicatorSetSchema>;

/** Locale code to keyword sets, e.g. `{ "pt": { "debit": [...], "credit": [...] } }`. */
export const LexiconSchema = z.record(z.string().min(1), IndicatorSetSchema);
export type Lexicon = z.infer<typeof LexiconSchema>;
