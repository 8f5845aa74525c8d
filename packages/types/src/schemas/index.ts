export {
  TransactionTypeSchema,
  TransactionSchema,
  BatchTransactionSchema,
  IndicatorSetSchema,
  LexiconSchema,
} from './transaction.js';

export type {
  TransactionType,
  Transaction,
  BatchTransaction,
  IndicatorSet,
  Lexicon,
} from './transaction.js';
