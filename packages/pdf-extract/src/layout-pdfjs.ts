/**
 * Layout-aware PDF text extraction using pdfjs-dist.
 *
 * Text items are read with their coordinates and regrouped into visual lines
 * so that a statement row comes out as one line of text.
 */

/**
 * A text item with positional information extracted from PDF.
 */
export interface TextItem {
  str: string;
  /** X coordinate (left edge) in PDF units */
  x: number;
  /** Y coordinate in PDF units (origin bottom-left) */
  y: number;
  width: number;
  height: number;
  /** 1-indexed */
  page: number;
}

export interface LayoutExtractedPDF {
  items: TextItem[];
  totalPages: number;
}

interface PdfjsTextItemLike {
  str: string;
  transform: number[];
  width?: number;
  height?: number;
}

/**
 * Extract text items from a PDF buffer. The pdfjs document is destroyed before
 * returning, also when a page fails to load.
 */
export async function extractTextItemsFromBuffer(buffer: Uint8Array): Promise<LayoutExtractedPDF> {
  // Dynamic import for pdfjs-dist (ESM only)
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

  const loadingTask = pdfjs.getDocument({
    data: buffer,
    useSystemFonts: true,
    isEvalSupported: false,
  });

  const pdfDocument = await loadingTask.promise;
  try {
    const items: TextItem[] = [];
    const numPages = pdfDocument.numPages;

    for (let pageNum = 1; pageNum <= numPages; pageNum++) {
      const page = await pdfDocument.getPage(pageNum);
      const textContent = await page.getTextContent();
      const contentItems: unknown[] = textContent.items;

      for (const item of contentItems) {
        // Skip marked-content entries
        if (!isTextItem(item)) continue;

        const str = item.str.trim();
        if (str.length === 0) continue;

        // transform = [scaleX, skewX, skewY, scaleY, translateX, translateY]
        const transform = item.transform;
        const x = Number(transform[4]) || 0;
        const y = Number(transform[5]) || 0;
        const width = Number(item.width) || Math.abs(Number(transform[0]) || 1) * str.length * 0.6;
        const height = Number(item.height) || Math.abs(Number(transform[3]) || 12);

        items.push({ str, x, y, width, height, page: pageNum });
      }
    }

    return { items, totalPages: numPages };
  } finally {
    await pdfDocument.destroy();
  }
}

function isTextItem(item: unknown): item is PdfjsTextItemLike {
  return (
    typeof item === 'object' &&
    item !== null &&
    'str' in item &&
    typeof item.str === 'string' &&
    'transform' in item &&
    Array.isArray(item.transform)
  );
}

/**
 * Build lines from text items using gap detection. Items on the same baseline
 * form one line; wide horizontal gaps become a tab so columns stay apart.
 */
export function buildLinesFromItems(items: TextItem[]): string[] {
  const Y_TOL = 2.0;        // items within this Y distance share a row
  const SPACE_GAP = 2.5;    // small gap -> space
  const COLUMN_GAP = 18;    // large gap -> tab

  if (items.length === 0) return [];

  // Top to bottom, then left to right
  const sorted = [...items].sort((a, b) => (b.y - a.y) || (a.x - b.x));

  const rows: TextItem[][] = [];
  let rowY = Number.NaN;
  for (const item of sorted) {
    const lastRow = rows[rows.length - 1];
    if (lastRow !== undefined && Math.abs(item.y - rowY) <= Y_TOL) {
      lastRow.push(item);
    } else {
      rows.push([item]);
      rowY = item.y;
    }
  }

  const lines: string[] = [];
  for (const row of rows) {
    row.sort((a, b) => a.x - b.x);

    let out = '';
    let prevEndX: number | null = null;

    for (const item of row) {
      if (prevEndX !== null) {
        const gap = item.x - prevEndX;
        if (gap > COLUMN_GAP) {
          out += '\t';
        } else if (gap > SPACE_GAP) {
          out += ' ';
        }
      }

      out += item.str;
      prevEndX = item.x + item.width;
    }

    const cleaned = out.replace(/[ \t]+$/g, '');
    if (cleaned) {
      lines.push(cleaned);
    }
  }

  return lines;
}

export function buildLinesForPage(items: TextItem[], pageNumber: number): string[] {
  return buildLinesFromItems(items.filter(item => item.page === pageNumber));
}
