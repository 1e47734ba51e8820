/**
 * Tests for balance-equation validation.
 */
import { describe, it, expect } from 'vitest';
import {
  classifyOpeningRow,
  isOpeningBalanceRow,
  validateBalanceEquation,
  getBalanceSummary,
  formatBalanceValidationReport,
} from '@ledgerline/types';
import type { TransactionRecord } from '@ledgerline/types';

function createTransaction(overrides: Partial<TransactionRecord> = {}): TransactionRecord {
  return {
    date: '01/03/25',
    valueDate: '01/03/25',
    mode: '',
    particulars: 'TEST ROW',
    deposits: 0,
    withdrawals: 0,
    balance: 0,
    reference: null,
    page: 1,
    originalOrder: 0,
    ...overrides,
  };
}

describe('classifyOpeningRow', () => {
  it('treats the B/F mode as an opening row', () => {
    expect(classifyOpeningRow({ mode: 'B/F', particulars: '' })).toBe('opening');
  });

  it('treats an empty mode with B/F in the narration as an opening row', () => {
    expect(classifyOpeningRow({ mode: '', particulars: 'BAL B/F' })).toBe('opening');
  });

  it('flags a row with its own mode that mentions B/F as ambiguous', () => {
    expect(classifyOpeningRow({ mode: 'UPI', particulars: 'UPI-REFUND B/F ADJ' })).toBe('ambiguous');
  });

  it('treats everything else as regular', () => {
    expect(classifyOpeningRow({ mode: 'NEFT', particulars: 'NEFT-SALARY' })).toBe('regular');
    expect(isOpeningBalanceRow({ mode: 'NEFT', particulars: 'NEFT-SALARY' })).toBe(false);
  });

  it('honours custom opening modes', () => {
    expect(classifyOpeningRow({ mode: 'OPENING', particulars: '' }, ['OPENING'])).toBe('opening');
  });
});

describe('validateBalanceEquation', () => {
  it('passes a consistent sequence', () => {
    const rows = [
      createTransaction({ mode: 'B/F', particulars: 'B/F', balance: 1000 }),
      createTransaction({ deposits: 500, balance: 1500 }),
      createTransaction({ withdrawals: 200, balance: 1300 }),
    ];

    const result = validateBalanceEquation(rows);

    expect(result.passed).toBe(true);
    expect(result.checked).toBe(2);
    expect(result.mismatches).toEqual([]);
  });

  it('reports a row that breaks the equation', () => {
    const rows = [
      createTransaction({ mode: 'B/F', particulars: 'B/F', balance: 1000 }),
      createTransaction({ date: '02/03/25', deposits: 500, balance: 1400 }),
    ];

    const result = validateBalanceEquation(rows);

    expect(result.passed).toBe(false);
    expect(result.mismatches).toEqual([
      {
        transactionIndex: 1,
        date: '02/03/25',
        expectedBalance: 1500,
        actualBalance: 1400,
        difference: 100,
        previousBalance: 1000,
        deposits: 500,
        withdrawals: 0,
        reason: 'balance-equation',
      },
    ]);
  });

  it('accepts differences within tolerance', () => {
    const rows = [
      createTransaction({ mode: 'B/F', particulars: 'B/F', balance: 1000 }),
      createTransaction({ deposits: 500, balance: 1500.01 }),
    ];

    expect(validateBalanceEquation(rows).passed).toBe(true);
    expect(validateBalanceEquation(rows, { tolerance: 0 }).passed).toBe(false);
  });

  it('does not verify the first row without an opening balance', () => {
    const rows = [
      createTransaction({ deposits: 500, balance: 9999 }),
      createTransaction({ withdrawals: 999, balance: 9000 }),
    ];

    const result = validateBalanceEquation(rows);

    expect(result.passed).toBe(true);
    expect(result.checked).toBe(1);
  });

  it('verifies the first row against a supplied opening balance', () => {
    const rows = [createTransaction({ deposits: 1000, balance: 5000 })];

    expect(validateBalanceEquation(rows, { openingBalance: 4000 }).passed).toBe(true);
    expect(validateBalanceEquation(rows, { openingBalance: 6000 }).mismatches[0]?.difference).toBe(2000);
  });

  it('reseeds the running balance at every opening row', () => {
    const rows = [
      createTransaction({ mode: 'B/F', particulars: 'B/F', balance: 93498.86 }),
      createTransaction({ withdrawals: 498.86, balance: 93000 }),
      createTransaction({ mode: 'B/F', particulars: 'B/F', balance: 10 }),
      createTransaction({ deposits: 5, balance: 15 }),
    ];

    expect(validateBalanceEquation(rows).passed).toBe(true);
  });

  it('always reports rows with an ambiguous B/F mention', () => {
    const rows = [
      createTransaction({ mode: 'B/F', particulars: 'B/F', balance: 100 }),
      createTransaction({ mode: 'UPI', particulars: 'UPI B/F NOTE', deposits: 50, balance: 150 }),
    ];

    const result = validateBalanceEquation(rows);

    expect(result.passed).toBe(false);
    expect(result.mismatches).toHaveLength(1);
    expect(result.mismatches[0]?.reason).toBe('ambiguous-opening-marker');
    expect(result.mismatches[0]?.difference).toBe(0);
  });

  it('never mutates its input', () => {
    const rows = [
      createTransaction({ mode: 'B/F', particulars: 'B/F', balance: 1000 }),
      createTransaction({ deposits: 500, balance: 1400 }),
    ];
    const snapshot = JSON.stringify(rows);

    validateBalanceEquation(rows);
    validateBalanceEquation(rows);

    expect(JSON.stringify(rows)).toBe(snapshot);
  });
});

describe('getBalanceSummary', () => {
  it('derives the opening balance from a B/F row', () => {
    const summary = getBalanceSummary([
      createTransaction({ mode: 'B/F', particulars: 'B/F', balance: 1000 }),
      createTransaction({ deposits: 250.5, balance: 1250.5 }),
      createTransaction({ withdrawals: 50.25, balance: 1200.25 }),
    ]);

    expect(summary).toEqual({
      transactionCount: 3,
      openingBalance: 1000,
      closingBalance: 1200.25,
      totalDeposits: 250.5,
      totalWithdrawals: 50.25,
    });
  });

  it('backs the opening balance out of the first regular row', () => {
    const summary = getBalanceSummary([createTransaction({ withdrawals: 100, balance: 900 })]);
    expect(summary.openingBalance).toBe(1000);
  });

  it('returns nulls for an empty list', () => {
    const summary = getBalanceSummary([]);
    expect(summary.openingBalance).toBeNull();
    expect(summary.closingBalance).toBeNull();
    expect(summary.transactionCount).toBe(0);
  });
});

describe('formatBalanceValidationReport', () => {
  it('formats a passing result', () => {
    const report = formatBalanceValidationReport({
      passed: true,
      checked: 4,
      tolerance: 0.01,
      mismatches: [],
    });

    expect(report.split('\n')).toEqual([
      'Balance Equation Validation: PASSED',
      '  Rows checked:  4',
      '  Tolerance:     ₹0.01',
      '  Mismatches:    0',
    ]);
  });

  it('lists mismatches with their context', () => {
    const report = formatBalanceValidationReport({
      passed: false,
      checked: 1,
      tolerance: 0.01,
      mismatches: [
        {
          transactionIndex: 1,
          date: '02/03/25',
          expectedBalance: 1500,
          actualBalance: 1400,
          difference: 100,
          previousBalance: 1000,
          deposits: 500,
          withdrawals: 0,
          reason: 'balance-equation',
        },
      ],
    });

    const lines = report.split('\n');
    expect(lines[0]).toBe('Balance Equation Validation: FAILED');
    expect(lines[4]).toBe('  #1 02/03/25: expected ₹1500.00, actual ₹1400.00, difference ₹100.00');
    expect(lines[5]).toBe('      previous ₹1000.00 + ₹500.00 - ₹0.00');
  });

  it('truncates long mismatch lists', () => {
    const mismatch = {
      transactionIndex: 0,
      date: '01/03/25',
      expectedBalance: 1,
      actualBalance: 2,
      difference: 1,
      previousBalance: 0,
      deposits: 1,
      withdrawals: 0,
      reason: 'balance-equation' as const,
    };
    const report = formatBalanceValidationReport(
      { passed: false, checked: 3, tolerance: 0.01, mismatches: [mismatch, mismatch, mismatch] },
      1
    );

    expect(report.split('\n').at(-1)).toBe('  ... and 2 more');
  });
});
