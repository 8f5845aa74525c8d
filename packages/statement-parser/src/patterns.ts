import { TEXT_DATE_FORMAT } from '@stmt-ingest/types';

export interface TextPattern {
  name: string;
  pattern: RegExp;
}

/**
 * Date and amount patterns, each list in precedence order, plus the format
 * detected date strings are finally parsed with.
 */
export interface PatternCatalog {
  dates: readonly TextPattern[];
  amounts: readonly TextPattern[];
  dateFormat: string;
}

export const DEFAULT_PATTERN_CATALOG: PatternCatalog = {
  dates: [
    { name: 'day-month-year-slash', pattern: /\d{2}\/\d{2}\/\d{4}/ },
    { name: 'day-month-year-dash', pattern: /\d{2}-\d{2}-\d{4}/ },
    { name: 'iso', pattern: /\d{4}-\d{2}-\d{2}/ },
  ],
  amounts: [
    // 1.234,56 / € 1.234,56
    { name: 'grouped-decimal-comma', pattern: /-?(?:€\s*)?\d{1,3}(?:\.\d{3})+,\d{2}/ },
    // € 45,00
    { name: 'euro-prefixed', pattern: /-?€\s*\d+[.,]\d{2}/ },
    // 45,67 / -45.67
    { name: 'plain-decimal', pattern: /-?\d+[.,]\d{2}/ },
  ],
  dateFormat: TEXT_DATE_FORMAT,
};

export interface PatternMatch<T> {
  pattern: TextPattern;
  raw: string;
  value: T;
}

function globalOf(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);
}

/**
 * First successful match wins: patterns are tried in order and, within a
 * pattern, matches left to right. The first match `accept` turns into a value
 * is returned; later patterns are not evaluated.
 */
export function firstPatternMatch<T>(
  patterns: readonly TextPattern[],
  line: string,
  accept: (raw: string) => T | null
): PatternMatch<T> | null {
  for (const pattern of patterns) {
    for (const match of line.matchAll(globalOf(pattern.pattern))) {
      const raw = match[0];
      const value = accept(raw);
      if (value !== null) {
        return { pattern, raw, value };
      }
    }
  }
  return null;
}

/** Remove every match of every pattern, in list order. */
export function stripPatterns(line: string, patterns: readonly TextPattern[]): string {
  return patterns.reduce((text, p) => text.replace(globalOf(p.pattern), ''), line);
}
