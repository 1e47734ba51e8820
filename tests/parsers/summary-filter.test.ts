import { describe, it, expect } from 'vitest';
import { stripSummaryContent, filterSummaryContent, HDFC_DIALECT, ICICI_DIALECT } from '@ledgerline/dialect-parser';
import type { TransactionRecord } from '@ledgerline/types';

function createTransaction(particulars: string): TransactionRecord {
  return {
    date: '31/03/25',
    valueDate: '31/03/25',
    mode: '',
    particulars,
    deposits: 10,
    withdrawals: 0,
    balance: 1010,
    reference: null,
    page: 3,
    originalOrder: 7,
  };
}

describe('stripSummaryContent', () => {
  it('truncates at a summary marker', () => {
    expect(stripSummaryContent('UPI-XYZ STATEMENT SUMMARY Opening Balance 1000', HDFC_DIALECT)).toBe('UPI-XYZ');
  });

  it('cuts at the first footer word when a footer phrase is present', () => {
    expect(stripSummaryContent('NEFT-ACME Generated On: 05/04/25 Generated By: 123', HDFC_DIALECT)).toBe(
      'NEFT-ACME'
    );
  });

  it('keeps narration that starts with a footer word', () => {
    const text = 'This is a computer generated statement';
    expect(stripSummaryContent(text, HDFC_DIALECT)).toBe(text);
  });

  it('ignores footer words without a footer phrase', () => {
    expect(stripSummaryContent('This month rent', HDFC_DIALECT)).toBe('This month rent');
  });

  it('does nothing for dialects without summary markers', () => {
    const text = 'INTEREST STATEMENT SUMMARY';
    expect(stripSummaryContent(text, ICICI_DIALECT)).toBe(text);
  });
});

describe('filterSummaryContent', () => {
  it('counts trimmed rows and leaves the input alone', () => {
    const input = [createTransaction('UPI-XYZ STATEMENT SUMMARY'), createTransaction('SALARY')];
    const result = filterSummaryContent(input, HDFC_DIALECT);

    expect(result.trimmed).toBe(1);
    expect(result.transactions.map((tx) => tx.particulars)).toEqual(['UPI-XYZ', 'SALARY']);
    expect(input[0]?.particulars).toBe('UPI-XYZ STATEMENT SUMMARY');
  });
});
