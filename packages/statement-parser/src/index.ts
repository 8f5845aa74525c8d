// Indicator lexicon
export {
  DEFAULT_LEXICON,
  loadLexicon,
  getIndicators,
  classifyDescription,
  applySignConvention,
} from './lexicon.js';

// Pattern catalog
export { DEFAULT_PATTERN_CATALOG, firstPatternMatch, stripPatterns } from './patterns.js';
export type { TextPattern, PatternCatalog, PatternMatch } from './patterns.js';

// Carried date state
export { NO_CARRIED_DATE, carryDate, carriedDateOf, type CarriedDate } from './carried-date.js';

// Text parser
export { parseStatementText, extractTransactionLines } from './text-parser.js';
export type { TextParserOptions, RawTextTransaction } from './text-parser.js';

// Table loaders
export {
  loadDelimitedTable,
  loadDelimitedTableWithFallback,
  loadSpreadsheetTable,
  detectDelimiter,
} from './table-loaders.js';
export type {
  RawTable,
  DelimitedTableLoader,
  SpreadsheetTableLoader,
  EncodingFallbackOptions,
  DecodedTable,
} from './table-loaders.js';

// Tabular standardizer
export { COLUMN_SYNONYMS, resolveColumns, standardizeTable, typeFromSign } from './tabular-standardizer.js';
export type { CanonicalField, ColumnSynonyms, ColumnResolution, StandardizeOptions } from './tabular-standardizer.js';

// Normalizers
export { sortTransactionsByDate } from './normalizers.js';

// Format dispatcher
export { processStatement, detectStatementFormat } from './dispatcher.js';
export type { ProcessStatementOptions, ProcessedStatement } from './dispatcher.js';

// Directory scanner
export {
  scanDirectoryForStatements,
  validateDirectory,
  type StatementFileInfo,
  type ScanResult,
} from './directory-scanner.js';

// Batch processor
export {
  processBatch,
  processDirectory,
  type ParseError,
  type BatchProcessResult,
  type BatchProcessOptions,
} from './batch-processor.js';

// Configuration
export { loadConfig, buildProcessingOptions, type IngestConfig } from './config.js';
