import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { extractPDF, extractPdfText, extractStatementText } from '@stmt-ingest/pdf-extract';
import { buildTextPdf } from '../fixtures/minimal-pdf.js';

describe('pdf-extractor', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `stmt-pdf-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should read the text layer line by line', async () => {
    const filePath = join(testDir, 'statement.pdf');
    await writeFile(filePath, buildTextPdf(['EXTRATO', '01/03/2024 COMPRA SUPERMERCADO -45,67']));

    const pdf = await extractPDF(filePath);

    expect(pdf.totalPages).toBe(1);
    expect(pdf.pages[0]?.lines).toEqual(['EXTRATO', '01/03/2024 COMPRA SUPERMERCADO -45,67']);
    expect(await extractPdfText(filePath)).toBe('EXTRATO\n01/03/2024 COMPRA SUPERMERCADO -45,67');
  });

  it('should reject a file that is not a PDF', async () => {
    const filePath = join(testDir, 'garbage.pdf');
    await writeFile(filePath, 'this is not a pdf');

    await expect(extractPDF(filePath)).rejects.toThrow();
  });

  it('should fail extraction of a corrupt PDF when no OCR engine is set', async () => {
    const filePath = join(testDir, 'garbage.pdf');
    await writeFile(filePath, 'this is not a pdf');

    await expect(extractStatementText(filePath)).rejects.toMatchObject({ code: 'EXTRACTION_FAILURE' });
  });
});
