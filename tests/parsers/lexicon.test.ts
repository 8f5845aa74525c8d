import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  DEFAULT_LEXICON,
  loadLexicon,
  getIndicators,
  classifyDescription,
  applySignConvention,
} from '@stmt-ingest/statement-parser';

describe('lexicon', () => {
  describe('getIndicators', () => {
    it('should default to the Portuguese set', () => {
      const indicators = getIndicators(DEFAULT_LEXICON);
      expect(indicators.debit).toContain('COMPRA');
      expect(indicators.credit).toContain('TRANSFERÊNCIA RECEBIDA');
    });

    it('should return other bundled locales', () => {
      expect(getIndicators(DEFAULT_LEXICON, 'en').credit).toContain('SALARY');
      expect(getIndicators(DEFAULT_LEXICON, 'es').debit).toContain('CARGO');
    });

    it('should reject unknown locales', () => {
      expect(() => getIndicators(DEFAULT_LEXICON, 'fr')).toThrow(
        'Unknown lexicon locale: fr (available: pt, es, en)'
      );
    });
  });

  describe('classifyDescription', () => {
    const pt = getIndicators(DEFAULT_LEXICON, 'pt');

    it('should classify debit keywords', () => {
      expect(classifyDescription('COMPRA SUPERMERCADO', pt)).toBe('DEBIT');
      expect(classifyDescription('Levantamento ATM', pt)).toBe('DEBIT');
    });

    it('should classify credit keywords', () => {
      expect(classifyDescription('TRANSFERÊNCIA RECEBIDA', pt)).toBe('CREDIT');
      expect(classifyDescription('depósito numerário', pt)).toBe('CREDIT');
    });

    it('should let debit keywords win when both appear', () => {
      expect(classifyDescription('DEPÓSITO COMPRA', pt)).toBe('DEBIT');
    });

    it('should return UNKNOWN without keywords', () => {
      expect(classifyDescription('SALDO', pt)).toBe('UNKNOWN');
    });
  });

  describe('applySignConvention', () => {
    it('should make debits negative', () => {
      expect(applySignConvention(10, 'DEBIT')).toBe(-10);
      expect(applySignConvention(-10, 'DEBIT')).toBe(-10);
    });

    it('should make credits positive', () => {
      expect(applySignConvention(-10, 'CREDIT')).toBe(10);
      expect(applySignConvention(10, 'CREDIT')).toBe(10);
    });

    it('should keep the sign of unknown records', () => {
      expect(applySignConvention(-3, 'UNKNOWN')).toBe(-3);
      expect(applySignConvention(3, 'UNKNOWN')).toBe(3);
    });
  });

  describe('loadLexicon', () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = join(tmpdir(), `stmt-lexicon-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      await mkdir(testDir, { recursive: true });
    });

    afterEach(async () => {
      await rm(testDir, { recursive: true, force: true });
    });

    it('should return the bundled lexicon without a path', async () => {
      expect(await loadLexicon()).toBe(DEFAULT_LEXICON);
    });

    it('should load a custom lexicon file', async () => {
      const filePath = join(testDir, 'lexicon.json');
      await writeFile(filePath, JSON.stringify({ fr: { debit: ['ACHAT'], credit: ['VIREMENT REÇU'] } }));

      const lexicon = await loadLexicon(filePath);

      expect(getIndicators(lexicon, 'fr')).toEqual({ debit: ['ACHAT'], credit: ['VIREMENT REÇU'] });
    });

    it('should reject a malformed lexicon file', async () => {
      const filePath = join(testDir, 'bad.json');
      await writeFile(filePath, JSON.stringify({ pt: { debit: 'DB' } }));

      await expect(loadLexicon(filePath)).rejects.toThrow(`Invalid lexicon file ${filePath}`);
    });
  });
});
