export {
  ENGINE_VERSION,
  SUPPORTED_EXTENSIONS,
  DEFAULT_CSV_ENCODINGS,
  DEFAULT_LOCALE,
  DEFAULT_OCR_LANGUAGE,
  TEXT_DATE_FORMAT,
  type StatementFormat,
} from './constants.js';
export { parseDateWithFormat, parseFlexibleDate, compareDates } from './date.js';
export {
  tryParseAmount,
  coerceCellAmount,
  roundToTwoDecimals,
  formatCurrency,
  sumAmounts,
} from './money.js';
