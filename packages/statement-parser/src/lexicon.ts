import { readFile } from 'fs/promises';
import {
  LexiconSchema,
  DEFAULT_LOCALE,
  type IndicatorSet,
  type Lexicon,
  type TransactionType,
} from '@stmt-ingest/types';
import bundledLexicon from '../data/lexicon.json' with { type: 'json' };

/** Debit/credit keywords per locale, as shipped in data/lexicon.json. */
export const DEFAULT_LEXICON: Lexicon = LexiconSchema.parse(bundledLexicon);

/**
 * Load a lexicon file (same shape as data/lexicon.json). Without a path the
 * bundled lexicon is returned.
 */
export async function loadLexicon(filePath?: string): Promise<Lexicon> {
  if (filePath === undefined) return DEFAULT_LEXICON;

  const content = await readFile(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(content);
  const result = LexiconSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid lexicon file ${filePath}: ${issues}`);
  }
  return result.data;
}

export function getIndicators(lexicon: Lexicon, locale: string = DEFAULT_LOCALE): IndicatorSet {
  const indicators = lexicon[locale];
  if (indicators === undefined) {
    throw new Error(`Unknown lexicon locale: ${locale} (available: ${Object.keys(lexicon).join(', ')})`);
  }
  return indicators;
}

function containsAny(upperText: string, keywords: readonly string[]): boolean {
  return keywords.some(keyword => upperText.includes(keyword.toUpperCase()));
}

/**
 * Classify a description by keyword. The debit set is checked first, so a
 * description carrying both a debit and a credit keyword is a DEBIT.
 */
export function classifyDescription(description: string, indicators: IndicatorSet): TransactionType {
  const upper = description.toUpperCase();
  if (containsAny(upper, indicators.debit)) return 'DEBIT';
  if (containsAny(upper, indicators.credit)) return 'CREDIT';
  return 'UNKNOWN';
}

/**
 * Force the amount's sign to agree with its type: debits are never positive,
 * credits never negative, unknown keeps the extracted sign.
 */
export function applySignConvention(amount: number, type: TransactionType): number {
  if (type === 'DEBIT') return amount > 0 ? -amount : amount;
  if (type === 'CREDIT') return Math.abs(amount);
  return amount;
}
