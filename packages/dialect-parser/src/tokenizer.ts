/**
 * Transaction tokenizer: rebuilds transactions from one page of classified lines.
 *
 * Each transaction runs through
 *   expect-date → collect-narration → expect-reference-or-value-date
 *   → collect-amounts → collect-trailing → emit
 * and the machine restarts at the next confirmed date. Layouts without a reference
 * column skip straight from narration to amounts; layouts without trailing text
 * emit right after the amounts.
 */

import type { TransactionRecord } from '@ledgerline/types';
import { classifyLines, isReferenceId, locateColumnHeader } from './line-classifier.js';
import type { LineToken } from './line-classifier.js';
import type { PageSection } from './page-segmenter.js';
import type { DialectDescriptor } from './dialects/types.js';

export type TokenizerState =
  | 'expect-date'
  | 'collect-narration'
  | 'expect-reference-or-value-date'
  | 'collect-amounts'
  | 'collect-trailing'
  | 'emit';

type ActiveState = Exclude<TokenizerState, 'expect-date' | 'emit'>;

type DateToken = Extract<LineToken, { kind: 'date' }>;

export const DEFAULT_LOOKAHEAD = 4;

/** Narration lines longer than this confirm that a date starts a transaction. */
const LONG_NARRATION_LENGTH = 10;

export interface TokenizeOptions {
  /** `originalOrder` of the first transaction emitted from this page */
  startOrder?: number | undefined;
  lookahead?: number | undefined;
}

export interface TokenizeResult {
  transactions: TransactionRecord[];
  warnings: string[];
  /** Date lines that started a run but produced no amounts */
  skipped: number;
  /** `originalOrder` for the first transaction of the next page */
  nextOrder: number;
}

interface TransactionDraft {
  date: string;
  valueDate: string | null;
  narration: string[];
  trailing: string[];
  reference: string | null;
  amounts: number[];
}

interface Run {
  readonly tokens: readonly LineToken[];
  readonly dialect: DialectDescriptor;
  readonly draft: TransactionDraft;
  position: number;
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Next token that is not a blank line, advancing past blanks. */
function peek(run: Run): LineToken | undefined {
  let token = run.tokens[run.position];
  while (token !== undefined && token.kind === 'narration' && token.text === '') {
    run.position++;
    token = run.tokens[run.position];
  }
  return token;
}

function confirmsTransaction(tokens: readonly LineToken[], index: number, lookahead: number): boolean {
  for (let j = index + 1; j <= index + lookahead && j < tokens.length; j++) {
    const next = tokens[j];
    if (next === undefined) break;
    if (next.kind === 'reference' || next.kind === 'amount') return true;
    if (next.kind === 'narration' && next.text.length > LONG_NARRATION_LENGTH) return true;
  }
  return false;
}

/**
 * expect-date: find the next date that begins a transaction.
 * Nothing after a page-end marker belongs to the page's transactions.
 */
function findTransactionStart(
  tokens: readonly LineToken[],
  from: number,
  dialect: DialectDescriptor,
  lookahead: number
): { index: number; token: DateToken } | null {
  for (let i = from; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) break;
    if (token.kind === 'page-boundary' && token.boundary === 'end') return null;
    if (token.kind !== 'date') continue;
    if (!dialect.layout.confirmDateLookahead || confirmsTransaction(tokens, i, lookahead)) {
      return { index: i, token };
    }
  }
  return null;
}

function afterNarration(dialect: DialectDescriptor): ActiveState {
  return dialect.layout.referenceColumn ? 'expect-reference-or-value-date' : 'collect-amounts';
}

function collectNarration(run: Run): ActiveState | 'emit' {
  const { draft, dialect } = run;
  const next = afterNarration(dialect);

  for (;;) {
    const token = peek(run);
    if (token === undefined) return next;

    switch (token.kind) {
      case 'narration':
        draft.narration.push(token.text);
        run.position++;
        break;
      case 'header':
        run.position++;
        break;
      case 'page-boundary':
        if (token.boundary === 'end') return next;
        run.position++;
        break;
      case 'reference':
        if (dialect.layout.referenceColumn) return next;
        // transaction ids printed between mode lines
        if (draft.reference === null) draft.reference = token.reference;
        run.position++;
        break;
      case 'amount':
      case 'date':
        return next;
    }
  }
}

function expectReferenceOrValueDate(run: Run): ActiveState | 'emit' {
  const { draft, dialect } = run;

  let token = peek(run);
  if (
    token !== undefined &&
    token.kind === 'date' &&
    token.rest !== '' &&
    isReferenceId(token.rest, dialect)
  ) {
    // value date printed ahead of the reference on one line
    draft.valueDate = token.date;
    draft.reference = token.rest;
    run.position++;
    token = peek(run);
  } else if (token !== undefined && token.kind === 'reference') {
    draft.reference = token.reference;
    if (token.valueDate !== null) draft.valueDate = token.valueDate;
    run.position++;

    // a second reference line is a continuation of the column; keep the first
    token = peek(run);
    while (token !== undefined && token.kind === 'reference') {
      if (draft.valueDate === null && token.valueDate !== null) draft.valueDate = token.valueDate;
      run.position++;
      token = peek(run);
    }
  }

  if (draft.valueDate === null && token !== undefined && token.kind === 'date' && token.rest === '') {
    draft.valueDate = token.date;
    run.position++;
  }

  return 'collect-amounts';
}

function collectAmounts(run: Run): ActiveState | 'emit' {
  const { draft, dialect } = run;
  const expected = dialect.amountLayout === 'deposit-withdrawal-balance' ? 3 : 2;

  while (draft.amounts.length < expected) {
    const token = peek(run);
    if (token === undefined) break;

    if (token.kind === 'amount') {
      draft.amounts.push(token.value);
      run.position++;
    } else if (token.kind === 'header') {
      run.position++;
    } else if (token.kind === 'reference' && !dialect.layout.referenceColumn) {
      if (draft.reference === null) draft.reference = token.reference;
      run.position++;
    } else {
      break;
    }
  }

  return dialect.layout.collectTrailing ? 'collect-trailing' : 'emit';
}

/**
 * collect-trailing: free text up to the next date is additional narration.
 * A page-end marker is kept as a sentinel so the continuation merger can
 * find narration cut by the page break.
 */
function collectTrailing(run: Run): ActiveState | 'emit' {
  const { draft } = run;

  for (;;) {
    const token = peek(run);
    if (token === undefined) return 'emit';

    switch (token.kind) {
      case 'date':
        return 'emit';
      case 'page-boundary':
        if (token.boundary === 'end') {
          draft.trailing.push(token.text);
          run.position++;
        }
        return 'emit';
      case 'amount':
      case 'header':
        run.position++;
        break;
      case 'reference':
      case 'narration':
        draft.trailing.push(token.text);
        run.position++;
        break;
    }
  }
}

const STATE_HANDLERS: Record<ActiveState, (run: Run) => ActiveState | 'emit'> = {
  'collect-narration': collectNarration,
  'expect-reference-or-value-date': expectReferenceOrValueDate,
  'collect-amounts': collectAmounts,
  'collect-trailing': collectTrailing,
};

/**
 * Strip every date fragment from a reference: the value date wherever it appears,
 * then a trailing and a leading date token. References longer than the dialect's
 * printed column width are cut back to it, since the overflow is spill from the
 * neighbouring value-date column.
 */
export function normalizeReference(
  raw: string,
  valueDate: string | null,
  dialect: DialectDescriptor
): string | null {
  let reference = raw.trim();

  if (valueDate !== null && valueDate !== '' && reference.includes(valueDate)) {
    reference = reference.replace(valueDate, '').trim();
  }
  reference = reference.replace(dialect.patterns.trailingDate, '').trim();
  reference = reference.replace(dialect.patterns.leadingDate, '').trim();

  const width = dialect.referenceWidth;
  if (width !== null && reference.length > width && /^[A-Z0-9]+$/.test(reference)) {
    reference = reference.slice(0, width);
  }

  return reference === '' ? null : reference;
}

export function isOpeningParticulars(particulars: string, dialect: DialectDescriptor): boolean {
  const normalized = particulars.trim().toUpperCase();
  return dialect.openingBalanceModes.some((mode) => mode.toUpperCase() === normalized);
}

/**
 * Short category code for a row. Keyword dialects take the first keyword that
 * starts a word of the narration; label dialects take the first printed label
 * found anywhere in it.
 */
export function detectMode(particulars: string, dialect: DialectDescriptor): string {
  if (isOpeningParticulars(particulars, dialect)) {
    return dialect.openingBalanceModes[0] ?? '';
  }

  const upper = particulars.toUpperCase();

  if (dialect.modeSource === 'labels') {
    return dialect.modeLabels.find((label) => upper.includes(label)) ?? '';
  }

  const words = upper.split(/[^A-Z0-9]+/).filter((word) => word !== '');
  return dialect.modeKeywords.find((keyword) => words.some((word) => word.startsWith(keyword))) ?? '';
}

/**
 * Initial debit/credit split for one movement amount.
 */
export function guessSplit(
  amount: number,
  particulars: string,
  dialect: DialectDescriptor
): { deposits: number; withdrawals: number } {
  const magnitude = Math.abs(amount);

  switch (dialect.splitStrategy) {
    case 'keyword-guess': {
      // a negative movement is a reversed debit
      if (amount < 0) return { deposits: magnitude, withdrawals: 0 };
      const lower = particulars.toLowerCase();
      const looksLikeDebit = dialect.debitKeywords.some((keyword) => lower.includes(keyword));
      return looksLikeDebit
        ? { deposits: 0, withdrawals: magnitude }
        : { deposits: magnitude, withdrawals: 0 };
    }
    case 'balance-delta':
      return { deposits: magnitude, withdrawals: 0 };
    case 'columns':
      return amount < 0
        ? { deposits: 0, withdrawals: magnitude }
        : { deposits: magnitude, withdrawals: 0 };
  }
}

function buildRecord(
  draft: TransactionDraft,
  dialect: DialectDescriptor,
  page: number,
  originalOrder: number,
  warnings: string[]
): TransactionRecord {
  const particulars = collapseWhitespace([...draft.narration, ...draft.trailing].join(' '));
  const opening = isOpeningParticulars(particulars, dialect);
  const [first, second, third] = draft.amounts;

  let deposits = 0;
  let withdrawals = 0;
  let balance = 0;

  if (dialect.amountLayout === 'deposit-withdrawal-balance' && third !== undefined) {
    deposits = Math.abs(first ?? 0);
    withdrawals = Math.abs(second ?? 0);
    balance = third;
  } else if (first !== undefined && second !== undefined) {
    ({ deposits, withdrawals } = guessSplit(first, particulars, dialect));
    balance = second;
    if (dialect.amountLayout === 'deposit-withdrawal-balance' && !opening) {
      warnings.push(
        `Page ${page}: ${draft.date} row has two amounts for three columns; direction left to the balance`
      );
    }
  } else if (first !== undefined) {
    if (opening) {
      balance = first;
    } else {
      ({ deposits, withdrawals } = guessSplit(first, particulars, dialect));
      warnings.push(
        `Page ${page}: ${draft.date} row has a single amount and no balance; balance left at 0`
      );
    }
  }

  if (opening) {
    deposits = 0;
    withdrawals = 0;
  }

  const reference =
    draft.reference !== null ? normalizeReference(draft.reference, draft.valueDate, dialect) : null;

  return {
    date: draft.date,
    valueDate: draft.valueDate ?? draft.date,
    mode: detectMode(particulars, dialect),
    particulars,
    deposits,
    withdrawals,
    balance,
    reference,
    page,
    originalOrder,
  };
}

function emptyResult(startOrder: number, warnings: string[]): TokenizeResult {
  return { transactions: [], warnings, skipped: 0, nextOrder: startOrder };
}

/**
 * Tokenize one page section into transactions. Never throws on malformed rows:
 * a run that collects no amounts is dropped and scanning resumes one line later.
 */
export function tokenizePage(
  page: PageSection,
  dialect: DialectDescriptor,
  options: TokenizeOptions = {}
): TokenizeResult {
  const lookahead = options.lookahead ?? DEFAULT_LOOKAHEAD;
  const startOrder = options.startOrder ?? 0;
  const warnings: string[] = [];

  let firstLine = 0;
  if (dialect.requireHeaderPerPage) {
    const headerEnd = locateColumnHeader(page.lines, dialect);
    if (headerEnd < 0) {
      warnings.push(`No ${dialect.institution} column header found on page ${page.pageNumber}`);
      return emptyResult(startOrder, warnings);
    }
    firstLine = headerEnd;
  }

  const tokens = classifyLines(page.lines.slice(firstLine), dialect);
  const transactions: TransactionRecord[] = [];
  let order = startOrder;
  let skipped = 0;
  let position = 0;

  for (;;) {
    const start = findTransactionStart(tokens, position, dialect, lookahead);
    if (start === null) break;

    const run: Run = {
      tokens,
      dialect,
      position: start.index + 1,
      draft: {
        date: start.token.date,
        valueDate: null,
        narration: start.token.rest !== '' ? [start.token.rest] : [],
        trailing: [],
        reference: null,
        amounts: [],
      },
    };

    let state: ActiveState | 'emit' = 'collect-narration';
    while (state !== 'emit') {
      state = STATE_HANDLERS[state](run);
    }

    if (run.draft.amounts.length === 0) {
      skipped++;
      warnings.push(
        `Page ${page.pageNumber}, line ${firstLine + start.index + 1}: ` +
          `no amounts after ${start.token.date}, skipping`
      );
      position = start.index + 1;
      continue;
    }

    transactions.push(buildRecord(run.draft, dialect, page.pageNumber, order, warnings));
    order++;
    position = run.position;
  }

  return { transactions, warnings, skipped, nextOrder: order };
}
