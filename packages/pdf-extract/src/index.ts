// PDF text layer
export { extractPDF, extractPdfText } from './pdf-extractor.js';
export type { ExtractedPage, ExtractedPDF } from './pdf-extractor.js';

// Layout-aware line reconstruction using pdfjs-dist
export {
  extractTextItemsFromBuffer,
  buildLinesFromItems,
  buildLinesForPage,
} from './layout-pdfjs.js';
export type { TextItem, LayoutExtractedPDF } from './layout-pdfjs.js';

// Extraction chain (text layer, then OCR)
export { extractStatementText } from './text-source.js';
export type { StatementText, ExtractionStrategy, TextSourceOptions } from './text-source.js';
export type { OcrEngine, TextLayerExtractor } from './ocr.js';
