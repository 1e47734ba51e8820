/**
 * Balance-equation reconciliation.
 *
 * Walks the sorted rows with a running balance and fixes the debit/credit split:
 * - corrective (`keyword-guess`): the guessed direction is flipped when the balance moved the other way
 * - classifying (`balance-delta`): the direction that reproduces the printed balance wins
 * - `columns`: the split is taken as printed; a row that lost one of its two movement
 *   columns was parked on deposits and is corrected like a keyword guess
 *
 * Opening (B/F) rows seed the running balance and carry no movement. Every row is
 * then re-validated and reported through `validateBalanceEquation`.
 */

import {
  BALANCE_TOLERANCE,
  balanceError,
  classifyOpeningRow,
  roundToTwoDecimals,
  validateBalanceEquation,
} from '@ledgerline/types';
import type { MismatchRecord, TransactionRecord } from '@ledgerline/types';
import type { DialectDescriptor } from './dialects/types.js';

export interface ReconcileOptions {
  tolerance?: number | undefined;
  /** Balance before the first row, when known from outside the text */
  openingBalance?: number | undefined;
}

export interface ReconcileResult {
  transactions: TransactionRecord[];
  mismatches: MismatchRecord[];
  /** Rows whose debit/credit split was changed */
  corrections: number;
}

type Split = Pick<TransactionRecord, 'deposits' | 'withdrawals'>;

/**
 * Corrective pass: keep the guessed amount, flip its direction when the
 * balance delta has the opposite sign.
 */
export function correctSplit(tx: TransactionRecord, previousBalance: number): Split {
  const delta = roundToTwoDecimals(tx.balance - previousBalance);

  if (delta > 0 && tx.withdrawals > 0 && tx.deposits === 0) {
    return { deposits: tx.withdrawals, withdrawals: 0 };
  }
  if (delta < 0 && tx.deposits > 0 && tx.withdrawals === 0) {
    return { deposits: 0, withdrawals: tx.deposits };
  }
  return { deposits: tx.deposits, withdrawals: tx.withdrawals };
}

/**
 * Classifying pass: try the undifferentiated amount as a credit and as a debit.
 * The hypothesis within tolerance wins; otherwise the smaller error, debit on a tie.
 */
export function classifySplit(
  tx: TransactionRecord,
  previousBalance: number,
  tolerance: number = BALANCE_TOLERANCE
): Split {
  const amount = tx.deposits > 0 ? tx.deposits : tx.withdrawals;
  if (amount === 0) {
    return { deposits: 0, withdrawals: 0 };
  }

  const creditError = balanceError(previousBalance + amount, tx.balance);
  const debitError = balanceError(previousBalance - amount, tx.balance);

  if (creditError <= tolerance && creditError < debitError) {
    return { deposits: amount, withdrawals: 0 };
  }
  if (debitError <= tolerance) {
    return { deposits: 0, withdrawals: amount };
  }
  return creditError < debitError
    ? { deposits: amount, withdrawals: 0 }
    : { deposits: 0, withdrawals: amount };
}

export function reconcileBalances(
  transactions: readonly TransactionRecord[],
  dialect: DialectDescriptor,
  options: ReconcileOptions = {}
): ReconcileResult {
  const tolerance = options.tolerance ?? BALANCE_TOLERANCE;
  const openingModes = dialect.openingBalanceModes;
  let previousBalance: number | null = options.openingBalance ?? null;
  let corrections = 0;

  const reconciled = transactions.map((tx) => {
    if (classifyOpeningRow(tx, openingModes) === 'opening') {
      previousBalance = tx.balance;
      return { ...tx, deposits: 0, withdrawals: 0 };
    }

    let split: Split = { deposits: tx.deposits, withdrawals: tx.withdrawals };
    if (previousBalance !== null) {
      if (dialect.splitStrategy === 'keyword-guess' || dialect.splitStrategy === 'columns') {
        split = correctSplit(tx, previousBalance);
      } else if (dialect.splitStrategy === 'balance-delta') {
        split = classifySplit(tx, previousBalance, tolerance);
      }
    }

    if (split.deposits !== tx.deposits || split.withdrawals !== tx.withdrawals) {
      corrections++;
    }

    previousBalance = tx.balance;
    return { ...tx, ...split };
  });

  const validation = validateBalanceEquation(reconciled, {
    tolerance,
    openingBalance: options.openingBalance,
    openingModes,
  });

  return { transactions: reconciled, mismatches: validation.mismatches, corrections };
}
