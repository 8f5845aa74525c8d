// CSV export
export { exportCsv, type CsvExportOptions, type TableRow } from './csv-exporter.js';

// Summary
export { summarizeTransactions, type TransactionSummary } from './summary.js';

// Integrity checks
export {
  checkTableIntegrity,
  type IntegrityCheckResult,
  type IntegrityIssue,
} from './integrity.js';
