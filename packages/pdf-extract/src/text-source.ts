import { ExtractionFailureError, DEFAULT_OCR_LANGUAGE, formatError } from '@stmt-ingest/types';
import { extractPdfText } from './pdf-extractor.js';
import type { OcrEngine, TextLayerExtractor } from './ocr.js';

export type ExtractionStrategy = 'text-layer' | 'ocr';

export interface StatementText {
  text: string;
  strategy: ExtractionStrategy;
  warnings: string[];
}

export interface TextSourceOptions {
  /** Defaults to the pdfjs-dist text layer */
  textExtractor?: TextLayerExtractor;
  ocr?: OcrEngine;
  ocrLanguage?: string;
}

function hasText(text: string): boolean {
  return text.trim().length > 0;
}

/**
 * Obtain flattened text for a document: the text layer first, OCR when the
 * text layer fails or yields nothing. Fails with ExtractionFailureError when
 * neither produces text.
 */
export async function extractStatementText(
  filePath: string,
  options: TextSourceOptions = {}
): Promise<StatementText> {
  const textExtractor = options.textExtractor ?? extractPdfText;
  const warnings: string[] = [];

  try {
    const text = await textExtractor(filePath);
    if (hasText(text)) {
      return { text, strategy: 'text-layer', warnings };
    }
    warnings.push('Text layer is empty; trying OCR.');
  } catch (error) {
    warnings.push(`Text layer extraction failed: ${formatError(error)}`);
  }

  if (options.ocr === undefined) {
    throw new ExtractionFailureError(filePath, [...warnings, 'No OCR engine configured.']);
  }

  const language = options.ocrLanguage ?? DEFAULT_OCR_LANGUAGE;
  let pages: string[];
  try {
    pages = await options.ocr.recognize(filePath, language);
  } catch (error) {
    throw new ExtractionFailureError(filePath, [...warnings, `OCR failed: ${formatError(error)}`], error);
  }

  const text = pages.join('\n');
  if (!hasText(text)) {
    throw new ExtractionFailureError(filePath, [...warnings, 'OCR produced no text.']);
  }

  warnings.push(`OCR used (${language}).`);
  return { text, strategy: 'ocr', warnings };
}
