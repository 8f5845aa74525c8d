export const ENGINE_VERSION = '0.3.0';

export type StatementFormat = 'document' | 'delimited-text' | 'spreadsheet';

/** Supported file suffixes (lowercase) and the format each one routes to. */
export const SUPPORTED_EXTENSIONS: Readonly<Record<string, StatementFormat>> = {
  '.pdf': 'document',
  '.csv': 'delimited-text',
  '.xlsx': 'spreadsheet',
  '.xls': 'spreadsheet',
};

export const DEFAULT_CSV_ENCODINGS = ['utf-8', 'iso-8859-1', 'windows-1252'] as const;

export const DEFAULT_LOCALE = 'pt';

export const DEFAULT_OCR_LANGUAGE = 'por';

/** Day/month/year format used for dates found in statement text. */
export const TEXT_DATE_FORMAT = 'dd/MM/yyyy';
