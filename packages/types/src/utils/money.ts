const CURRENCY_SYMBOLS = /[€$£]/g;

/** Plain decimal text, optionally with an exponent; rejects hex, binary and octal literals. */
const DECIMAL_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Normalizes a statement amount written with a decimal comma.
 *
 * Currency symbols and spaces are stripped. When a comma is present every dot
 * is a thousands separator and the comma is the decimal mark. Without a comma a
 * dot followed by exactly two digits is kept as the decimal mark; any other dot
 * groups thousands.
 *
 * Returns null when the result is not a plain decimal number.
 */
export function tryParseAmount(amountStr: string): number | null {
  let cleaned = amountStr.replace(CURRENCY_SYMBOLS, '').replace(/\s+/g, '');

  if (cleaned.includes(',')) {
    cleaned = cleaned.replace(/\./g, '').replace(',', '.');
  } else if (!/^-?\d+\.\d{2}$/.test(cleaned)) {
    cleaned = cleaned.replace(/\./g, '');
  }

  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) {
    return null;
  }
  return Number(cleaned);
}

/**
 * Numeric coercion for table cells: numbers pass through, text has its decimal
 * comma turned into a point. Empty and non-numeric cells give null.
 */
export function coerceCellAmount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;

  const text = value.trim().replace(',', '.');
  if (!DECIMAL_TEXT.test(text)) return null;

  const num = Number(text);
  return Number.isFinite(num) ? num : null;
}

export function roundToTwoDecimals(num: number): number {
  return Math.round(num * 100) / 100;
}

export function formatCurrency(amount: number, currency = 'EUR', locale = 'pt-PT'): string {
  return amount.toLocaleString(locale, { style: 'currency', currency });
}

export function sumAmounts(amounts: number[]): number {
  return roundToTwoDecimals(amounts.reduce((sum, amt) => sum + amt, 0));
}
