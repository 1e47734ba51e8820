/**
 * Reattach narration that a page break cut off from its transaction.
 *
 * The tokenizer leaves the page-end marker inside a transaction's narration when
 * it stopped collecting at the break. For those transactions, the first short
 * prose lines of the following page are appended and the marker is removed.
 */

import type { TransactionRecord } from '@ledgerline/types';
import {
  classifyLine,
  containsPageBoundary,
  stripPageBoundaries,
} from './line-classifier.js';
import type { PageSection } from './page-segmenter.js';
import type { DialectDescriptor } from './dialects/types.js';

export interface ContinuationOptions {
  /** Maximum lines taken from the next page (default: 2) */
  maxLines?: number | undefined;
  /** Longest line still treated as continuation text (default: 30) */
  maxLength?: number | undefined;
}

export interface MergeResult {
  transactions: TransactionRecord[];
  /** Transactions that received continuation text */
  merged: number;
  /** Transactions whose page-boundary sentinel was removed */
  sentinelsStripped: number;
}

const DEFAULT_MAX_LINES = 2;
const DEFAULT_MAX_LENGTH = 30;

export function isContinuationLine(
  line: string,
  dialect: DialectDescriptor,
  maxLength: number = DEFAULT_MAX_LENGTH
): boolean {
  const text = line.trim();
  if (text === '' || text.length > maxLength) return false;
  if (text.includes('@')) return false;

  const upper = text.toUpperCase();
  if (dialect.modeKeywords.some((keyword) => upper.startsWith(keyword))) return false;

  return classifyLine(text, dialect).kind === 'narration';
}

/**
 * Continuation text at the top of a page: after the page's start marker and any
 * blank lines, up to `maxLines` consecutive qualifying lines.
 */
export function collectContinuationLines(
  page: PageSection,
  dialect: DialectDescriptor,
  options: ContinuationOptions = {}
): string[] {
  const maxLines = options.maxLines ?? DEFAULT_MAX_LINES;
  const maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;
  const collected: string[] = [];

  for (const line of page.lines) {
    if (collected.length >= maxLines) break;

    const text = line.trim();
    if (text === '') continue;

    const token = classifyLine(text, dialect);
    if (token.kind === 'page-boundary' && token.boundary === 'start' && collected.length === 0) {
      continue;
    }

    if (!isContinuationLine(text, dialect, maxLength)) break;
    collected.push(text);
  }

  return collected;
}

/**
 * Merge continuation text into every transaction carrying a page-boundary sentinel.
 * Returns new records; running it again on its own output changes nothing.
 */
export function mergeContinuations(
  transactions: readonly TransactionRecord[],
  pages: readonly PageSection[],
  dialect: DialectDescriptor,
  options: ContinuationOptions = {}
): MergeResult {
  let merged = 0;
  let sentinelsStripped = 0;

  const result = transactions.map((tx) => {
    if (!containsPageBoundary(tx.particulars, dialect)) {
      return { ...tx };
    }

    sentinelsStripped++;
    const narration = stripPageBoundaries(tx.particulars, dialect);

    const pageIndex = pages.findIndex((page) => page.pageNumber === tx.page);
    const nextPage = pageIndex >= 0 ? pages[pageIndex + 1] : undefined;
    const continuation =
      nextPage !== undefined ? collectContinuationLines(nextPage, dialect, options) : [];

    if (continuation.length > 0) {
      merged++;
    }

    const particulars = [narration, ...continuation].filter((part) => part !== '').join(' ');
    return { ...tx, particulars };
  });

  return { transactions: result, merged, sentinelsStripped };
}
