import type { TransactionRecord } from '@ledgerline/types';
import type { DialectDescriptor } from './dialects/types.js';

/**
 * Cut statement-summary or footer boilerplate out of a narration.
 *
 * A summary marker truncates at its first occurrence. Otherwise, when a footer
 * phrase is present, the narration is cut at the first word that is a footer
 * word, provided something remains before it.
 */
export function stripSummaryContent(particulars: string, dialect: DialectDescriptor): string {
  for (const marker of dialect.summaryMarkers) {
    const index = particulars.indexOf(marker);
    if (index >= 0) {
      return particulars.slice(0, index).trim();
    }
  }

  const hasFooter = dialect.footerPhrases.some((phrase) => particulars.includes(phrase));
  if (!hasFooter) {
    return particulars;
  }

  const words = particulars.split(/\s+/).filter((word) => word !== '');
  const cut = words.findIndex((word) =>
    dialect.footerWords.some((footerWord) => word.includes(footerWord))
  );
  if (cut > 0) {
    return words.slice(0, cut).join(' ');
  }

  return particulars;
}

export interface SummaryFilterResult {
  transactions: TransactionRecord[];
  /** Transactions whose narration was shortened */
  trimmed: number;
}

export function filterSummaryContent(
  transactions: readonly TransactionRecord[],
  dialect: DialectDescriptor
): SummaryFilterResult {
  let trimmed = 0;

  const result = transactions.map((tx) => {
    const particulars = stripSummaryContent(tx.particulars, dialect);
    if (particulars === tx.particulars) {
      return { ...tx };
    }
    trimmed++;
    return { ...tx, particulars };
  });

  return { transactions: result, trimmed };
}
