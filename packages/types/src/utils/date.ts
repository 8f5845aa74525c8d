import { format, isValid, parse, parseISO } from 'date-fns';

/** Day-first formats are tried before month-first ones. */
const FLEXIBLE_DATE_FORMATS: ReadonlyArray<{ shape: RegExp; format: string }> = [
  { shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/, format: 'dd/MM/yyyy' },
  { shape: /^\d{1,2}-\d{1,2}-\d{4}$/, format: 'dd-MM-yyyy' },
  { shape: /^\d{1,2}\.\d{1,2}\.\d{4}$/, format: 'dd.MM.yyyy' },
  { shape: /^\d{4}\/\d{1,2}\/\d{1,2}$/, format: 'yyyy/MM/dd' },
  { shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/, format: 'MM/dd/yyyy' },
  { shape: /^\d{1,2}\/\d{1,2}\/\d{2}$/, format: 'dd/MM/yy' },
];

const REFERENCE_DATE = new Date(2000, 0, 1);

function toISODate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Parses a date string against one fixed date-fns format.
 * Returns null when the string does not conform or names an impossible day.
 */
export function parseDateWithFormat(dateStr: string, dateFormat: string): string | null {
  const parsed = parse(dateStr.trim(), dateFormat, REFERENCE_DATE);
  return isValid(parsed) ? toISODate(parsed) : null;
}

/**
 * Best-effort date inference for spreadsheet and CSV cells.
 * Accepts Date cells, ISO strings (with or without a time part), then the
 * day-first and month-first formats in FLEXIBLE_DATE_FORMATS.
 */
export function parseFlexibleDate(value: unknown): string | null {
  if (value instanceof Date) {
    return isValid(value) ? toISODate(value) : null;
  }
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  if (trimmed === '') return null;

  if (/^\d{4}-\d{2}-\d{2}/.test(trimmed)) {
    const iso = parseISO(trimmed);
    return isValid(iso) ? toISODate(iso) : null;
  }

  for (const candidate of FLEXIBLE_DATE_FORMATS) {
    if (!candidate.shape.test(trimmed)) continue;
    const parsed = parseDateWithFormat(trimmed, candidate.format);
    if (parsed !== null) return parsed;
  }
  return null;
}

/**
 * Orders ISO dates ascending with unparsed (null) dates after every parsed one.
 */
export function compareDates(a: string | null, b: string | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a.localeCompare(b);
}
