import { compareDateKeys, toDateSortKey } from '@ledgerline/types';
import type { TransactionRecord } from '@ledgerline/types';

/**
 * Chronological order by (year, month, day); rows sharing a date keep their
 * document order. Unparseable dates go last.
 */
export function sortChronologically(
  transactions: readonly TransactionRecord[]
): TransactionRecord[] {
  return transactions
    .map((tx) => ({ tx, key: toDateSortKey(tx.date) }))
    .sort((a, b) => compareDateKeys(a.key, b.key) || a.tx.originalOrder - b.tx.originalOrder)
    .map(({ tx }) => ({ ...tx }));
}
