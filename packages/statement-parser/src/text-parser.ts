import {
  parseDateWithFormat,
  tryParseAmount,
  type IndicatorSet,
  type Transaction,
  type TransactionType,
} from '@stmt-ingest/types';
import { DEFAULT_PATTERN_CATALOG, firstPatternMatch, stripPatterns, type PatternCatalog } from './patterns.js';
import { DEFAULT_LEXICON, getIndicators, classifyDescription, applySignConvention } from './lexicon.js';
import { NO_CARRIED_DATE, carryDate, carriedDateOf, type CarriedDate } from './carried-date.js';
import { sortTransactionsByDate } from './normalizers.js';

export interface TextParserOptions {
  /** Debit/credit keywords; defaults to the bundled Portuguese set */
  indicators?: IndicatorSet;
  catalog?: PatternCatalog;
}

/**
 * A transaction line before its date string is parsed.
 */
export interface RawTextTransaction {
  rawDate: string;
  description: string;
  amount: number;
  type: TransactionType;
  lineIndex: number;
  originalLine: string;
}

function acceptAnyMatch(raw: string): string {
  return raw;
}

/**
 * Walk the lines of a statement and keep those that resolve to a date (own or
 * carried) and an amount. Dates are left as found.
 */
export function extractTransactionLines(text: string, options: TextParserOptions = {}): RawTextTransaction[] {
  const catalog = options.catalog ?? DEFAULT_PATTERN_CATALOG;
  const indicators = options.indicators ?? getIndicators(DEFAULT_LEXICON);
  const descriptionPatterns = [...catalog.dates, ...catalog.amounts];

  const lines = text.split(/\r?\n/);
  const extracted: RawTextTransaction[] = [];
  let carried: CarriedDate = NO_CARRIED_DATE;

  lines.forEach((line, lineIndex) => {
    if (line.trim() === '') return;

    const dateMatch = firstPatternMatch(catalog.dates, line, acceptAnyMatch);
    carried = carryDate(carried, dateMatch?.value ?? null);

    const rawDate = carriedDateOf(carried);
    if (rawDate === null) return;

    const amountMatch = firstPatternMatch(catalog.amounts, line, tryParseAmount);
    if (amountMatch === null) return;

    const description = stripPatterns(line, descriptionPatterns).replace(/\s+/g, ' ').trim();
    const type = classifyDescription(description, indicators);

    extracted.push({
      rawDate,
      description,
      amount: applySignConvention(amountMatch.value, type),
      type,
      lineIndex,
      originalLine: line,
    });
  });

  return extracted;
}

/**
 * Parse flattened statement text into transactions sorted by date.
 *
 * Dates that do not conform to the catalog's date format become null and sort
 * after every dated record.
 */
export function parseStatementText(text: string, options: TextParserOptions = {}): Transaction[] {
  const catalog = options.catalog ?? DEFAULT_PATTERN_CATALOG;

  const transactions: Transaction[] = extractTransactionLines(text, options).map(raw => ({
    date: parseDateWithFormat(raw.rawDate, catalog.dateFormat),
    description: raw.description,
    amount: raw.amount,
    type: raw.type,
  }));

  return sortTransactionsByDate(transactions);
}
