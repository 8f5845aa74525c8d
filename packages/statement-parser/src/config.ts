import { z } from 'zod';
import { DEFAULT_CSV_ENCODINGS, DEFAULT_LOCALE } from '@stmt-ingest/types';
import { loadLexicon, getIndicators } from './lexicon.js';
import type { BatchProcessOptions } from './batch-processor.js';

/** Unset and empty variables are the same thing. */
const optionalString = z.preprocess(
  value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional()
);

const EnvSchema = z.object({
  STATEMENTS_DIR: optionalString,
  STATEMENT_LOCALE: optionalString,
  STATEMENT_LEXICON_FILE: optionalString,
  CSV_ENCODINGS: optionalString,
});

export interface IngestConfig {
  /** Default directory for batch processing */
  statementsDir: string | undefined;
  locale: string;
  lexiconFile: string | undefined;
  csvEncodings: string[];
}

function parseEncodingList(value: string): string[] {
  return value
    .split(',')
    .map(encoding => encoding.trim())
    .filter(encoding => encoding !== '');
}

/**
 * Read ingestion settings from the environment (see .env.example).
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): IngestConfig {
  const parsed = EnvSchema.parse(env);
  const encodings = parsed.CSV_ENCODINGS === undefined ? [] : parseEncodingList(parsed.CSV_ENCODINGS);

  return {
    statementsDir: parsed.STATEMENTS_DIR,
    locale: parsed.STATEMENT_LOCALE ?? DEFAULT_LOCALE,
    lexiconFile: parsed.STATEMENT_LEXICON_FILE,
    csvEncodings: encodings.length > 0 ? encodings : [...DEFAULT_CSV_ENCODINGS],
  };
}

/**
 * Turn a config into processing options: lexicon loaded and narrowed to the
 * configured locale, encodings set, default directory filled. An OCR engine
 * and its language are library options, added by the caller.
 */
export async function buildProcessingOptions(config: IngestConfig): Promise<BatchProcessOptions> {
  const lexicon = await loadLexicon(config.lexiconFile);

  return {
    defaultDirectory: config.statementsDir,
    indicators: getIndicators(lexicon, config.locale),
    encodings: config.csvEncodings,
  };
}
