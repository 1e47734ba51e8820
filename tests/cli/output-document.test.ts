import { describe, it, expect } from 'vitest';
import { parseStatement, ICICI_DIALECT } from '@ledgerline/dialect-parser';
import { ENGINE_NAME, ENGINE_VERSION, validateOutput } from '@ledgerline/types';
import { buildOutputDocument, parseNumericOption } from '../../apps/cli/src/output.js';
import { loadFixture } from '../fixtures/load.js';

describe('buildOutputDocument', () => {
  it('wraps a parse result with engine, source and summary details', () => {
    const result = parseStatement(loadFixture('icici-statement.txt'), ICICI_DIALECT);
    if (!result.success) throw new Error(result.error);

    const generatedAt = new Date('2025-04-01T10:00:00.000Z');
    const doc = buildOutputDocument(result, ICICI_DIALECT, '/tmp/statements/icici.txt', 30, generatedAt);

    expect(doc.engine).toEqual({ name: ENGINE_NAME, version: ENGINE_VERSION });
    expect(doc.source).toEqual({ fileName: 'icici.txt', lineCount: 30 });
    expect(doc.dialect).toBe('icici');
    expect(doc.institution).toBe('ICICI Bank');
    expect(doc.generatedAt).toBe('2025-04-01T10:00:00.000Z');
    expect(doc.summary).toEqual({
      transactionCount: 3,
      openingBalance: 93498.86,
      closingBalance: 117498.86,
      totalDeposits: 25000,
      totalWithdrawals: 1000,
    });
    expect(doc.transactions).toBe(result.transactions);
  });

  it('produces a document that passes schema validation', () => {
    const result = parseStatement(loadFixture('icici-statement.txt'), ICICI_DIALECT);
    if (!result.success) throw new Error(result.error);

    const doc = buildOutputDocument(result, ICICI_DIALECT, 'icici.txt', 30);

    expect(validateOutput(doc).valid).toBe(true);
  });
});

describe('parseNumericOption', () => {
  it('parses plain and grouped numbers', () => {
    expect(parseNumericOption('tolerance', '0.5')).toBe(0.5);
    expect(parseNumericOption('opening-balance', '1,00,000.50')).toBe(100000.5);
  });

  it('treats missing or blank values as unset', () => {
    expect(parseNumericOption('opening-balance', undefined)).toBeUndefined();
    expect(parseNumericOption('opening-balance', '  ')).toBeUndefined();
  });

  it('rejects non-numeric values', () => {
    expect(() => parseNumericOption('tolerance', 'abc')).toThrow('Invalid value for --tolerance: abc');
  });
});
