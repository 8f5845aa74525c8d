import { describe, it, expect } from 'vitest';
import {
  DEFAULT_LEXICON,
  getIndicators,
  parseStatementText,
  extractTransactionLines,
} from '@stmt-ingest/statement-parser';

const STATEMENT = [
  'EXTRATO DE CONTA',
  'Saldo anterior 1.000,00',
  '01/03/2024 COMPRA SUPERMERCADO -45,67',
  '02/03/2024 TRANSFERÊNCIA RECEBIDA 100,00',
  '03/03/2024',
  'PAGAMENTO SERVIÇO 20,00',
].join('\n');

describe('parseStatementText', () => {
  it('should parse a debit line', () => {
    const transactions = parseStatementText('01/03/2024 COMPRA SUPERMERCADO -45,67');
    expect(transactions).toEqual([
      { date: '2024-03-01', description: 'COMPRA SUPERMERCADO', amount: -45.67, type: 'DEBIT' },
    ]);
  });

  it('should parse a credit line', () => {
    const transactions = parseStatementText('02/03/2024 TRANSFERÊNCIA RECEBIDA 100,00');
    expect(transactions).toEqual([
      { date: '2024-03-02', description: 'TRANSFERÊNCIA RECEBIDA', amount: 100, type: 'CREDIT' },
    ]);
  });

  it('should carry a date forward to the following lines', () => {
    const transactions = parseStatementText('03/03/2024\nPAGAMENTO SERVIÇO 20,00');
    expect(transactions).toEqual([
      { date: '2024-03-03', description: 'PAGAMENTO SERVIÇO', amount: -20, type: 'DEBIT' },
    ]);
  });

  it('should skip lines seen before any date', () => {
    const transactions = parseStatementText(STATEMENT);
    expect(transactions.map(t => t.description)).toEqual([
      'COMPRA SUPERMERCADO',
      'TRANSFERÊNCIA RECEBIDA',
      'PAGAMENTO SERVIÇO',
    ]);
  });

  it('should accept CRLF line endings and blank lines', () => {
    const transactions = parseStatementText('01/03/2024 COMPRA LOJA 5,00\r\n\r\n   \r\n02/03/2024 DEPÓSITO 7,50');
    expect(transactions.map(t => [t.date, t.amount])).toEqual([
      ['2024-03-01', -5],
      ['2024-03-02', 7.5],
    ]);
  });

  it('should read grouped and euro-prefixed amounts', () => {
    const transactions = parseStatementText('05/03/2024 LEVANTAMENTO € 1.234,56');
    expect(transactions).toEqual([
      { date: '2024-03-05', description: 'LEVANTAMENTO', amount: -1234.56, type: 'DEBIT' },
    ]);
  });

  it('should make credits positive whatever the printed sign', () => {
    const [transaction] = parseStatementText('04/03/2024 DEPÓSITO -50,00');
    expect(transaction?.type).toBe('CREDIT');
    expect(transaction?.amount).toBe(50);
  });

  it('should keep the printed sign for unknown records', () => {
    const transactions = parseStatementText('06/03/2024 REF 12345 -10,00\n07/03/2024 REF 67890 8,00');
    expect(transactions).toEqual([
      { date: '2024-03-06', description: 'REF 12345', amount: -10, type: 'UNKNOWN' },
      { date: '2024-03-07', description: 'REF 67890', amount: 8, type: 'UNKNOWN' },
    ]);
  });

  it('should use the first date on a line and strip every date from the description', () => {
    const [transaction] = parseStatementText('01/03/2024 COMPRA 02/03/2024 10,00');
    expect(transaction?.date).toBe('2024-03-01');
    expect(transaction?.description).toBe('COMPRA');
  });

  it('should keep records whose date does not parse, with a null date, after dated ones', () => {
    const transactions = parseStatementText('10-03-2024 COMPRA LOJA 5,00\n09/03/2024 COMPRA CAFÉ 1,20');
    expect(transactions).toEqual([
      { date: '2024-03-09', description: 'COMPRA CAFÉ', amount: -1.2, type: 'DEBIT' },
      { date: null, description: 'COMPRA LOJA', amount: -5, type: 'DEBIT' },
    ]);
  });

  it('should sort by date and keep document order for equal dates', () => {
    const text = [
      '05/03/2024 COMPRA A 1,00',
      '01/03/2024 COMPRA B 2,00',
      '05/03/2024 COMPRA C 3,00',
    ].join('\n');
    expect(parseStatementText(text).map(t => t.description)).toEqual(['COMPRA B', 'COMPRA A', 'COMPRA C']);
  });

  it('should use the given indicators', () => {
    const indicators = getIndicators(DEFAULT_LEXICON, 'en');
    const transactions = parseStatementText('01/03/2024 SALARY MARCH 2500,00\n02/03/2024 ATM 60,00', {
      indicators,
    });
    expect(transactions.map(t => [t.type, t.amount])).toEqual([
      ['CREDIT', 2500],
      ['DEBIT', -60],
    ]);
  });

  it('should return the same table for the same text', () => {
    expect(parseStatementText(STATEMENT)).toEqual(parseStatementText(STATEMENT));
  });

  it('should keep debits non-positive and credits non-negative', () => {
    for (const transaction of parseStatementText(STATEMENT)) {
      if (transaction.type === 'DEBIT') expect(transaction.amount).toBeLessThanOrEqual(0);
      if (transaction.type === 'CREDIT') expect(transaction.amount).toBeGreaterThanOrEqual(0);
    }
  });

  it('should return an empty table for text without transactions', () => {
    expect(parseStatementText('')).toEqual([]);
    expect(parseStatementText('EXTRATO\nSEM MOVIMENTOS')).toEqual([]);
  });
});

describe('extractTransactionLines', () => {
  it('should keep the raw date and source line', () => {
    const lines = extractTransactionLines(STATEMENT);
    expect(lines[2]).toEqual({
      rawDate: '03/03/2024',
      description: 'PAGAMENTO SERVIÇO',
      amount: -20,
      type: 'DEBIT',
      lineIndex: 5,
      originalLine: 'PAGAMENTO SERVIÇO 20,00',
    });
  });
});
