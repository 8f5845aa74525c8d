import { readFile } from 'fs/promises';
import { extractTextItemsFromBuffer, buildLinesForPage } from './layout-pdfjs.js';

export interface ExtractedPage {
  pageNumber: number;
  text: string;
  lines: string[];
}

export interface ExtractedPDF {
  pages: ExtractedPage[];
  fullText: string;
  totalPages: number;
}

/**
 * Extract the text layer of a PDF, one reconstructed line per visual row.
 */
export async function extractPDF(filePath: string): Promise<ExtractedPDF> {
  const dataBuffer = await readFile(filePath);
  const layoutResult = await extractTextItemsFromBuffer(new Uint8Array(dataBuffer));

  const pages: ExtractedPage[] = [];
  for (let pageNum = 1; pageNum <= layoutResult.totalPages; pageNum++) {
    const lines = buildLinesForPage(layoutResult.items, pageNum);
    pages.push({
      pageNumber: pageNum,
      text: lines.join('\n'),
      lines,
    });
  }

  return {
    pages,
    fullText: pages.map(p => p.text).join('\n'),
    totalPages: layoutResult.totalPages,
  };
}

/**
 * Flattened text of every page in page order. Default text-layer extractor.
 */
export async function extractPdfText(filePath: string): Promise<string> {
  const pdf = await extractPDF(filePath);
  return pdf.fullText;
}
