#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { writeFile, mkdir } from 'fs/promises';
import { resolve, dirname } from 'path';
import { ENGINE_VERSION, formatCurrency, formatError, type Transaction } from '@stmt-ingest/types';
import {
  loadConfig,
  buildProcessingOptions,
  processStatement,
  processDirectory,
  type BatchProcessOptions,
  type IngestConfig,
  type ParseError,
} from '@stmt-ingest/statement-parser';
import { exportCsv, summarizeTransactions, type TableRow } from '@stmt-ingest/output';

const AVAILABLE_FORMATS = ['json', 'csv'] as const;
type OutputFormat = typeof AVAILABLE_FORMATS[number];

interface CliOptions {
  out?: string;
  format: string;
  locale?: string;
  lexicon?: string;
  encodings?: string;
  summary: boolean;
  verbose: boolean;
}

function isOutputFormat(value: string): value is OutputFormat {
  return AVAILABLE_FORMATS.some(format => format === value);
}

/**
 * Layer command-line options over the environment config.
 */
function resolveConfig(options: CliOptions): IngestConfig {
  const config = loadConfig();
  return {
    ...config,
    locale: options.locale ?? config.locale,
    lexiconFile: options.lexicon ?? config.lexiconFile,
    csvEncodings: options.encodings !== undefined
      ? options.encodings.split(',').map(e => e.trim()).filter(e => e !== '')
      : config.csvEncodings,
  };
}

function render(transactions: readonly TableRow[], format: OutputFormat): string {
  if (format === 'csv') {
    return exportCsv(transactions);
  }
  return JSON.stringify(transactions, null, 2);
}

async function emit(content: string, out: string | undefined): Promise<void> {
  if (out === undefined) {
    console.log(content);
    return;
  }
  const outPath = resolve(out);
  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, content, 'utf-8');
  console.error(`[INFO] Output written to: ${outPath}`);
}

function printSummary(transactions: readonly Transaction[]): void {
  const summary = summarizeTransactions(transactions);
  console.error('');
  console.error('=== Transaction Summary ===');
  console.error(`Transactions:   ${summary.transactionCount}`);
  console.error(`Date range:     ${summary.dateRange === null ? 'n/a' : `${summary.dateRange.start} to ${summary.dateRange.end}`}`);
  console.error(`Unparsed dates: ${summary.unparsedDates}`);
  console.error(`Total credits:  ${formatCurrency(summary.totalCredits)}`);
  console.error(`Total debits:   ${formatCurrency(summary.totalDebits)}`);
  console.error('===========================');
}

function withSharedOptions(command: Command): Command {
  return command
    .option('-o, --out <file>', 'Output file path (default: stdout)')
    .option('-f, --format <format>', `Output format (${AVAILABLE_FORMATS.join(', ')})`, 'json')
    .option('--locale <locale>', 'Indicator lexicon locale (env: STATEMENT_LOCALE)')
    .option('--lexicon <file>', 'Custom lexicon JSON file (env: STATEMENT_LEXICON_FILE)')
    .option('--encodings <list>', 'Comma-separated CSV encodings to try (env: CSV_ENCODINGS)')
    .option('--summary', 'Print a summary to stderr', false)
    .option('-v, --verbose', 'Enable verbose output', false);
}

async function runParse(filePath: string, options: CliOptions): Promise<void> {
  if (!isOutputFormat(options.format)) {
    throw new Error(`Unknown format: ${options.format} (expected ${AVAILABLE_FORMATS.join(', ')})`);
  }
  const processing = await buildProcessingOptions(resolveConfig(options));

  if (options.verbose) {
    console.error(`[INFO] Processing: ${resolve(filePath)}`);
  }

  const result = await processStatement(resolve(filePath), processing);

  for (const warning of result.warnings) {
    console.error(`[WARN] ${warning}`);
  }
  if (options.verbose) {
    console.error(`[INFO] Format: ${result.format}`);
    console.error(`[INFO] Transactions: ${result.transactions.length}`);
  }

  await emit(render(result.transactions, options.format), options.out);
  if (options.summary) printSummary(result.transactions);
}

async function runBatch(directory: string | undefined, options: CliOptions): Promise<void> {
  if (!isOutputFormat(options.format)) {
    throw new Error(`Unknown format: ${options.format} (expected ${AVAILABLE_FORMATS.join(', ')})`);
  }
  const base = await buildProcessingOptions(resolveConfig(options));
  const processing: BatchProcessOptions = {
    ...base,
    onProgress: (current, total, filename) => {
      if (options.verbose) console.error(`[INFO] Processing ${current}/${total}: ${filename}`);
    },
    onWarning: (filename, warning) => {
      if (options.verbose) console.error(`[WARN] ${filename}: ${warning}`);
    },
    onError: (error: ParseError) => {
      console.error(`[ERROR] Failed to process ${error.filename}: [${error.code}] ${error.error}`);
    },
  };

  const result = await processDirectory(directory, processing);

  for (const warning of result.warnings) {
    console.error(`[WARN] ${warning}`);
  }
  if (options.verbose) {
    for (const skip of result.skipped) {
      console.error(`[INFO] Skipped ${skip.fileName}: ${skip.reason}`);
    }
  }

  console.error('');
  console.error('=== Batch Processing Summary ===');
  console.error(`Files found:        ${result.summary.filesFound}`);
  console.error(`Files succeeded:    ${result.summary.filesSucceeded}`);
  console.error(`Files failed:       ${result.summary.filesFailed}`);
  console.error(`Files without rows: ${result.summary.filesEmpty}`);
  console.error(`Transactions:       ${result.summary.totalTransactions}`);
  console.error('================================');

  await emit(render(result.transactions, options.format), options.out);
  if (options.summary) printSummary(result.transactions);
}

function fail(error: unknown, verbose: boolean): never {
  console.error(`[ERROR] ${formatError(error)}`);
  if (verbose && error instanceof Error && error.stack !== undefined) {
    console.error(error.stack);
  }
  process.exit(1);
}

const program = new Command();

program
  .name('statement-ingest')
  .description('Extract normalized transactions from bank statements (PDF, CSV, Excel)')
  .version(ENGINE_VERSION);

withSharedOptions(
  program
    .command('parse')
    .description('Process a single statement file')
    .argument('<file>', 'Statement file (.pdf, .csv, .xlsx, .xls)')
).action(async (file: string, options: CliOptions) => {
  try {
    await runParse(file, options);
  } catch (error) {
    fail(error, options.verbose);
  }
});

withSharedOptions(
  program
    .command('batch')
    .description('Process every statement in a directory (default: STATEMENTS_DIR)')
    .argument('[directory]', 'Directory containing statements')
).action(async (directory: string | undefined, options: CliOptions) => {
  try {
    await runBatch(directory, options);
  } catch (error) {
    fail(error, options.verbose);
  }
});

await program.parseAsync();
