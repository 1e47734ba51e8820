/**
 * Statement engine: segment → tokenize → merge continuations → strip summaries
 * → sort → reconcile.
 *
 * Every call owns its data; nothing is shared between invocations.
 */

import { EngineOptionsSchema, TransactionRecordSchema } from '@ledgerline/types';
import type {
  EngineOptions,
  EngineOptionsInput,
  MismatchRecord,
  ParseErrorKind,
  TransactionRecord,
} from '@ledgerline/types';
import { mergeContinuations } from './continuation-merger.js';
import { detectDialect, validateStatementText } from './detection.js';
import { listDialectKeys } from './dialects/registry.js';
import type { DialectRegistry } from './dialects/registry.js';
import type { DialectDescriptor } from './dialects/types.js';
import { segmentPages } from './page-segmenter.js';
import { reconcileBalances } from './reconciler.js';
import { sortChronologically } from './sorter.js';
import { filterSummaryContent } from './summary-filter.js';
import { tokenizePage } from './tokenizer.js';

export interface PipelineStats {
  pages: number;
  transactions: number;
  /** Date lines that never reached an amount */
  skippedRuns: number;
  continuationsMerged: number;
  summariesTrimmed: number;
  corrections: number;
}

export interface PipelineOutput {
  transactions: TransactionRecord[];
  mismatches: MismatchRecord[];
  warnings: string[];
  stats: PipelineStats;
}

export interface ParseSuccess extends PipelineOutput {
  success: true;
  dialect: string;
  institution: string;
}

export interface ParseFailure {
  success: false;
  dialect: string | null;
  institution: string | null;
  errorKind: ParseErrorKind;
  error: string;
  transactions: TransactionRecord[];
  mismatches: MismatchRecord[];
  warnings: string[];
}

export type StatementParseResult = ParseSuccess | ParseFailure;

/**
 * One generic parser, driven entirely by the descriptor it is bound to.
 */
export interface StatementParser {
  readonly dialect: DialectDescriptor;
  validate(text: string): boolean;
  parse(text: string, options?: EngineOptionsInput): StatementParseResult;
}

function debug(options: EngineOptions, message: string): void {
  if (options.verbose) {
    console.error(`[DEBUG] ${message}`);
  }
}

function failure(
  errorKind: ParseErrorKind,
  error: string,
  dialect: DialectDescriptor | null,
  warnings: string[] = []
): ParseFailure {
  return {
    success: false,
    dialect: dialect?.key ?? null,
    institution: dialect?.institution ?? null,
    errorKind,
    error,
    transactions: [],
    mismatches: [],
    warnings,
  };
}

function strictChecks(
  transactions: readonly TransactionRecord[],
  mismatches: readonly MismatchRecord[],
  warnings: string[]
): void {
  transactions.forEach((tx, index) => {
    const parsed = TransactionRecordSchema.safeParse(tx);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue !== undefined ? `${issue.path.join('.')}: ${issue.message}` : 'invalid';
      warnings.push(`STRICT: Row ${index} (${tx.date}) failed schema check - ${where}`);
    }
    if (tx.deposits > 0 && tx.withdrawals > 0) {
      warnings.push(`STRICT: Row ${index} (${tx.date}) has both deposits and withdrawals`);
    }
  });

  for (const mismatch of mismatches) {
    warnings.push(
      `STRICT: Balance mismatch at row ${mismatch.transactionIndex} (${mismatch.date}) - ` +
        `expected ${mismatch.expectedBalance.toFixed(2)}, reported ${mismatch.actualBalance.toFixed(2)}`
    );
  }
}

/**
 * Run every stage on text already known to belong to the dialect.
 */
export function runPipeline(
  text: string,
  dialect: DialectDescriptor,
  options: EngineOptionsInput = {}
): PipelineOutput {
  const opts = EngineOptionsSchema.parse(options);
  const warnings: string[] = [];

  const pages = segmentPages(text, dialect);
  debug(opts, `${dialect.key}: ${pages.length} page section(s)`);

  const tokenized: TransactionRecord[] = [];
  let nextOrder = 0;
  let skippedRuns = 0;
  for (const page of pages) {
    const result = tokenizePage(page, dialect, {
      startOrder: nextOrder,
      lookahead: opts.lookahead,
    });
    tokenized.push(...result.transactions);
    warnings.push(...result.warnings);
    skippedRuns += result.skipped;
    nextOrder = result.nextOrder;
    debug(opts, `page ${page.pageNumber}: ${result.transactions.length} transaction(s)`);
  }

  const merged = mergeContinuations(tokenized, pages, dialect, {
    maxLines: opts.continuationMaxLines,
    maxLength: opts.continuationMaxLength,
  });
  debug(opts, `continuations merged: ${merged.merged}`);

  const filtered = filterSummaryContent(merged.transactions, dialect);
  const sorted = sortChronologically(filtered.transactions);

  const reconciled = reconcileBalances(sorted, dialect, {
    tolerance: opts.tolerance,
    openingBalance: opts.openingBalance,
  });
  debug(
    opts,
    `reconciled ${reconciled.transactions.length} row(s), ` +
      `${reconciled.corrections} correction(s), ${reconciled.mismatches.length} mismatch(es)`
  );

  if (opts.strict) {
    strictChecks(reconciled.transactions, reconciled.mismatches, warnings);
  }

  return {
    transactions: reconciled.transactions,
    mismatches: reconciled.mismatches,
    warnings,
    stats: {
      pages: pages.length,
      transactions: reconciled.transactions.length,
      skippedRuns,
      continuationsMerged: merged.merged,
      summariesTrimmed: filtered.trimmed,
      corrections: reconciled.corrections,
    },
  };
}

/**
 * Parse a whole statement. Never throws for bad input: a text that does not
 * belong to the dialect, or yields no transactions, comes back as a failure.
 */
export function parseStatement(
  text: string,
  dialect: DialectDescriptor,
  options: EngineOptionsInput = {}
): StatementParseResult {
  if (!validateStatementText(text, dialect)) {
    return failure(
      'dialect-mismatch',
      `Text does not match ${dialect.institution} statement format`,
      dialect
    );
  }

  const output = runPipeline(text, dialect, options);
  if (output.transactions.length === 0) {
    return failure(
      'no-transactions',
      `No ${dialect.institution} transactions found`,
      dialect,
      output.warnings
    );
  }

  return {
    success: true,
    dialect: dialect.key,
    institution: dialect.institution,
    ...output,
  };
}

export function parseWithAutoDetect(
  text: string,
  registry: DialectRegistry,
  options: EngineOptionsInput = {}
): StatementParseResult {
  const match = detectDialect(text, registry);
  if (match === null) {
    return failure(
      'unknown-dialect',
      `Could not detect a supported institution (supported: ${listDialectKeys(registry).join(', ')})`,
      null
    );
  }
  return parseStatement(text, match.dialect, options);
}

export function createStatementParser(
  dialect: DialectDescriptor,
  defaults: EngineOptionsInput = {}
): StatementParser {
  return {
    dialect,
    validate: (text) => validateStatementText(text, dialect),
    parse: (text, options = {}) => parseStatement(text, dialect, { ...defaults, ...options }),
  };
}
