/**
 * Optical character recognition collaborator.
 *
 * Implementations render each page of the document and return the recognized
 * text per page, in page order. No engine ships with this package; callers
 * plug one in (a tesseract.js worker, a cloud OCR client) through this shape.
 */
export interface OcrEngine {
  recognize(filePath: string, language: string): Promise<string[]>;
}

/** Reads the text layer of a document; an empty string means "no text". */
export type TextLayerExtractor = (filePath: string) => Promise<string>;
