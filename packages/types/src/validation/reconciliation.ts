/**
 * Balance-equation validation for reconciled transaction lists.
 * Verifies that: previous_balance + deposits - withdrawals ≈ balance
 */

import type { MismatchRecord, TransactionRecord } from '../schemas/transaction.js';
import {
  BALANCE_TOLERANCE,
  MAX_REPORTED_MISMATCHES,
  OPENING_BALANCE_MARKER,
} from '../utils/constants.js';
import { balanceError, roundToTwoDecimals, sumAmounts } from '../utils/money.js';

/**
 * - `opening`: brought-forward row, seeds the running balance
 * - `ambiguous`: carries a mode of its own yet mentions the opening marker in its narration
 * - `regular`: an ordinary movement
 */
export type OpeningRowClass = 'opening' | 'ambiguous' | 'regular';

export function classifyOpeningRow(
  transaction: Pick<TransactionRecord, 'mode' | 'particulars'>,
  openingModes: readonly string[] = [OPENING_BALANCE_MARKER]
): OpeningRowClass {
  const mode = transaction.mode.trim();
  if (mode !== '' && openingModes.includes(mode)) {
    return 'opening';
  }

  const mentionsMarker = openingModes.some(
    (marker) => marker !== '' && transaction.particulars.includes(marker)
  );
  if (!mentionsMarker) {
    return 'regular';
  }

  return mode === '' ? 'opening' : 'ambiguous';
}

export function isOpeningBalanceRow(
  transaction: Pick<TransactionRecord, 'mode' | 'particulars'>,
  openingModes?: readonly string[]
): boolean {
  return classifyOpeningRow(transaction, openingModes) === 'opening';
}

export interface BalanceValidationOptions {
  /** Tolerance for balance comparison (default: 0.01) */
  tolerance?: number | undefined;
  /** Balance before the first row; without it the first regular row is not verified */
  openingBalance?: number | undefined;
  openingModes?: readonly string[] | undefined;
}

export interface BalanceValidationResult {
  passed: boolean;
  /** Rows whose equation was actually evaluated */
  checked: number;
  tolerance: number;
  mismatches: MismatchRecord[];
}

/**
 * Re-walk a reconciled list and report every row that breaks the balance equation.
 * Never modifies the input.
 */
export function validateBalanceEquation(
  transactions: readonly TransactionRecord[],
  options: BalanceValidationOptions = {}
): BalanceValidationResult {
  const tolerance = options.tolerance ?? BALANCE_TOLERANCE;
  const openingModes = options.openingModes ?? [OPENING_BALANCE_MARKER];
  const mismatches: MismatchRecord[] = [];
  let previousBalance: number | null = options.openingBalance ?? null;
  let checked = 0;

  transactions.forEach((tx, index) => {
    const rowClass = classifyOpeningRow(tx, openingModes);

    if (rowClass === 'opening') {
      previousBalance = tx.balance;
      return;
    }

    const previous =
      previousBalance ?? roundToTwoDecimals(tx.balance - tx.deposits + tx.withdrawals);
    const expectedBalance = roundToTwoDecimals(previous + tx.deposits - tx.withdrawals);
    const difference = balanceError(expectedBalance, tx.balance);

    if (previousBalance !== null) {
      checked++;
    }

    const equationFailed = previousBalance !== null && difference > tolerance;
    if (equationFailed || rowClass === 'ambiguous') {
      mismatches.push({
        transactionIndex: index,
        date: tx.date,
        expectedBalance,
        actualBalance: tx.balance,
        difference,
        previousBalance: previous,
        deposits: tx.deposits,
        withdrawals: tx.withdrawals,
        reason: equationFailed ? 'balance-equation' : 'ambiguous-opening-marker',
      });
    }

    previousBalance = tx.balance;
  });

  return {
    passed: mismatches.length === 0,
    checked,
    tolerance,
    mismatches,
  };
}

export interface BalanceSummary {
  transactionCount: number;
  openingBalance: number | null;
  closingBalance: number | null;
  totalDeposits: number;
  totalWithdrawals: number;
}

export function getBalanceSummary(
  transactions: readonly TransactionRecord[],
  openingModes?: readonly string[]
): BalanceSummary {
  const first = transactions[0];
  const last = transactions[transactions.length - 1];

  let openingBalance: number | null = null;
  if (first !== undefined) {
    openingBalance = isOpeningBalanceRow(first, openingModes)
      ? first.balance
      : roundToTwoDecimals(first.balance - first.deposits + first.withdrawals);
  }

  return {
    transactionCount: transactions.length,
    openingBalance,
    closingBalance: last?.balance ?? null,
    totalDeposits: sumAmounts(transactions.map((tx) => tx.deposits)),
    totalWithdrawals: sumAmounts(transactions.map((tx) => tx.withdrawals)),
  };
}

/**
 * Format a validation result as a human-readable report.
 */
export function formatBalanceValidationReport(
  result: BalanceValidationResult,
  maxMismatches: number = MAX_REPORTED_MISMATCHES
): string {
  const lines = [
    `Balance Equation Validation: ${result.passed ? 'PASSED' : 'FAILED'}`,
    `  Rows checked:  ${result.checked}`,
    `  Tolerance:     ₹${result.tolerance.toFixed(2)}`,
    `  Mismatches:    ${result.mismatches.length}`,
  ];

  for (const mismatch of result.mismatches.slice(0, maxMismatches)) {
    const label =
      mismatch.reason === 'ambiguous-opening-marker' ? ' [ambiguous B/F marker]' : '';
    lines.push(
      `  #${mismatch.transactionIndex} ${mismatch.date}${label}: ` +
        `expected ₹${mismatch.expectedBalance.toFixed(2)}, ` +
        `actual ₹${mismatch.actualBalance.toFixed(2)}, ` +
        `difference ₹${mismatch.difference.toFixed(2)}`
    );
    lines.push(
      `      previous ₹${mismatch.previousBalance.toFixed(2)} ` +
        `+ ₹${mismatch.deposits.toFixed(2)} - ₹${mismatch.withdrawals.toFixed(2)}`
    );
  }

  const hidden = result.mismatches.length - maxMismatches;
  if (hidden > 0) {
    lines.push(`  ... and ${hidden} more`);
  }

  return lines.join('\n');
}
