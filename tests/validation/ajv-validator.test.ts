import { describe, it, expect } from 'vitest';
import { validateOutput, validateAndThrow } from '@ledgerline/types';
import type { StatementOutputDocument } from '@ledgerline/types';

function createValidOutput(): StatementOutputDocument {
  return {
    engine: { name: 'ledgerline', version: '1.0.0' },
    source: { fileName: 'statement.txt', lineCount: 12 },
    dialect: 'hdfc',
    institution: 'HDFC Bank',
    generatedAt: '2025-03-31T10:00:00.000Z',
    summary: {
      transactionCount: 1,
      openingBalance: 4000,
      closingBalance: 5000,
      totalDeposits: 1000,
      totalWithdrawals: 0,
    },
    transactions: [
      {
        date: '01/03/25',
        valueDate: '02/03/25',
        mode: 'UPI',
        particulars: 'UPI-TEST SHOP',
        deposits: 1000,
        withdrawals: 0,
        balance: 5000,
        reference: '1234567890',
        page: 1,
        originalOrder: 0,
      },
    ],
    mismatches: [],
    warnings: [],
  };
}

describe('validateOutput', () => {
  it('accepts a well-formed document', () => {
    const result = validateOutput(createValidOutput());
    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
  });

  it('accepts a null reference and null balances', () => {
    const output = createValidOutput();
    const tx = output.transactions[0];
    if (tx !== undefined) tx.reference = null;
    output.summary.openingBalance = null;
    output.summary.closingBalance = null;

    expect(validateOutput(output).valid).toBe(true);
  });

  it('rejects negative deposits', () => {
    const output = createValidOutput();
    const tx = output.transactions[0];
    if (tx !== undefined) tx.deposits = -1;

    const result = validateOutput(output);

    expect(result.valid).toBe(false);
    expect(result.errors.some((e) => e.path === '/transactions/0/deposits')).toBe(true);
  });

  it('rejects an invalid generatedAt timestamp', () => {
    const output = { ...createValidOutput(), generatedAt: 'yesterday' };

    const result = validateOutput(output);

    expect(result.valid).toBe(false);
    expect(result.errors.some((e) => e.path === '/generatedAt' && e.keyword === 'format')).toBe(true);
  });

  it('rejects unknown mismatch reasons', () => {
    const output = {
      ...createValidOutput(),
      mismatches: [
        {
          transactionIndex: 0,
          date: '01/03/25',
          expectedBalance: 1,
          actualBalance: 2,
          difference: 1,
          previousBalance: 0,
          deposits: 1,
          withdrawals: 0,
          reason: 'guess',
        },
      ],
    };

    expect(validateOutput(output).valid).toBe(false);
  });

  it('rejects additional properties', () => {
    const output = { ...createValidOutput(), extra: true };
    const result = validateOutput(output);
    expect(result.valid).toBe(false);
    expect(result.errors.some((e) => e.keyword === 'additionalProperties')).toBe(true);
  });
});

describe('validateAndThrow', () => {
  it('does not throw for valid output', () => {
    expect(() => validateAndThrow(createValidOutput())).not.toThrow();
  });

  it('throws with the failing path', () => {
    const output = { ...createValidOutput(), dialect: '' };
    expect(() => validateAndThrow(output)).toThrow('Schema validation failed:\n  /dialect:');
  });
});
