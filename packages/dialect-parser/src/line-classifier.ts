/**
 * Single-line classification.
 *
 * `classifyLine` is a pure function of the line and the dialect: it looks at nothing
 * before or after the line and keeps no state between calls.
 */

import { parseAmount } from '@ledgerline/types';
import type { BareIntegerPolicy, DialectDescriptor, PageMarkerKind } from './dialects/types.js';

export type LineToken =
  | { kind: 'page-boundary'; text: string; boundary: PageMarkerKind; pageNumber: number | null }
  | { kind: 'date'; text: string; date: string; rest: string }
  | { kind: 'amount'; text: string; value: number }
  | { kind: 'reference'; text: string; reference: string; valueDate: string | null }
  | { kind: 'header'; text: string }
  | { kind: 'narration'; text: string };

export type LineTokenKind = LineToken['kind'];

/** Grouped amounts accept both 3-digit and 2-digit (lakh) grouping. */
const AMOUNT_PATTERN = /^-?\d+(?:,\d{2,3})*(?:\.\d{1,2})?$/;
const BARE_DIGITS = /^\d+$/;
const DIGIT_REFERENCE = /^\d{4,}$/;
const ALNUM_REFERENCE = /^(?=[A-Z0-9]*\d)[A-Z0-9]{10,}$/;

const TRANSACTION_ID_MIN = 4;
const TRANSACTION_ID_MAX = 12;

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Unformatted digit strings of length 5, 9 or 10+ collide with reference numbers
 * and are never read as amounts. Under the `transaction-id` policy every 4 to 12
 * digit string is an id as well.
 */
export function isAmountToken(text: string, policy: BareIntegerPolicy = 'length-rule'): boolean {
  const trimmed = text.trim();
  if (!AMOUNT_PATTERN.test(trimmed)) {
    return false;
  }

  const unsigned = trimmed.replace(/^-/, '');
  if (BARE_DIGITS.test(unsigned)) {
    const length = unsigned.length;
    if (
      policy === 'transaction-id' &&
      length >= TRANSACTION_ID_MIN &&
      length <= TRANSACTION_ID_MAX
    ) {
      return false;
    }
    if (length === 5 || length === 9 || length >= 10) {
      return false;
    }
  }

  return true;
}

/**
 * A bare reference or transaction id: a digit run the amount rules turned away.
 * Layouts with a reference column also take an upper-case alphanumeric run of
 * 10+ characters containing a digit; elsewhere such runs are narration.
 */
export function isReferenceId(text: string, dialect: DialectDescriptor): boolean {
  const trimmed = text.trim();
  if (dialect.patterns.dateFragment.test(trimmed)) {
    return false;
  }
  if (DIGIT_REFERENCE.test(trimmed)) {
    return !isAmountToken(trimmed, dialect.bareIntegerPolicy);
  }
  return dialect.layout.referenceColumn && ALNUM_REFERENCE.test(trimmed);
}

export function matchPageBoundary(
  text: string,
  dialect: DialectDescriptor
): Extract<LineToken, { kind: 'page-boundary' }> | null {
  const trimmed = text.trim();
  for (const marker of dialect.patterns.pageMarkers) {
    const match = marker.line.exec(trimmed);
    if (match !== null) {
      const pageStr = match[1];
      return {
        kind: 'page-boundary',
        text: trimmed,
        boundary: marker.rule.kind,
        pageNumber: pageStr !== undefined ? parseInt(pageStr, 10) : null,
      };
    }
  }
  return null;
}

/** True when the text carries a page-boundary marker anywhere inside it. */
export function containsPageBoundary(text: string, dialect: DialectDescriptor): boolean {
  return dialect.patterns.pageMarkers.some((marker) => marker.embedded.test(text));
}

export function stripPageBoundaries(text: string, dialect: DialectDescriptor): string {
  let result = text;
  for (const marker of dialect.patterns.pageMarkers) {
    result = result.replace(marker.embeddedAll, ' ');
  }
  return collapseWhitespace(result);
}

export function isHeaderLine(text: string, dialect: DialectDescriptor): boolean {
  const collapsed = collapseWhitespace(text);
  if (collapsed === '') return false;
  if (dialect.headerLabels.includes(collapsed)) return true;
  return collapsed === dialect.headerColumnOrder.join(' ');
}

function matchReference(
  text: string,
  dialect: DialectDescriptor
): Extract<LineToken, { kind: 'reference' }> | null {
  const fused = dialect.layout.referenceColumn ? dialect.patterns.referenceWithDate.exec(text) : null;
  if (fused !== null) {
    const [, reference, valueDate] = fused;
    if (reference !== undefined && valueDate !== undefined) {
      return { kind: 'reference', text, reference, valueDate };
    }
  }

  if (isReferenceId(text, dialect)) {
    return { kind: 'reference', text, reference: text, valueDate: null };
  }

  return null;
}

/**
 * Label one line. Precedence: page boundary, date, amount, reference, header, narration.
 * A date-prefixed line keeps whatever follows the date as `rest`.
 */
export function classifyLine(line: string, dialect: DialectDescriptor): LineToken {
  const text = line.trim();

  const boundary = matchPageBoundary(text, dialect);
  if (boundary !== null) {
    return boundary;
  }

  const dateMatch = dialect.patterns.datePrefix.exec(text);
  if (dateMatch !== null) {
    const date = dateMatch[1] ?? '';
    const rest = (dateMatch[2] ?? '').trim();
    return { kind: 'date', text, date, rest };
  }

  if (isAmountToken(text, dialect.bareIntegerPolicy)) {
    return { kind: 'amount', text, value: parseAmount(text) };
  }

  const reference = matchReference(text, dialect);
  if (reference !== null) {
    return reference;
  }

  if (isHeaderLine(text, dialect)) {
    return { kind: 'header', text };
  }

  return { kind: 'narration', text };
}

export function classifyLines(lines: readonly string[], dialect: DialectDescriptor): LineToken[] {
  return lines.map((line) => classifyLine(line, dialect));
}

/**
 * Index just past the column header, or -1 when the page carries none.
 * Accepts the header printed one column per line or on a single line.
 */
export function locateColumnHeader(lines: readonly string[], dialect: DialectDescriptor): number {
  const columns = dialect.headerColumnOrder;
  if (columns.length === 0) return -1;

  const singleLine = columns.join(' ');
  const trimmed = lines.map((line) => collapseWhitespace(line));

  for (let i = 0; i < trimmed.length; i++) {
    if (trimmed[i] === singleLine) {
      return i + 1;
    }

    if (trimmed[i] !== columns[0]) continue;

    let cursor = i;
    let matched = 0;
    while (cursor < trimmed.length && matched < columns.length) {
      const candidate = trimmed[cursor];
      cursor++;
      if (candidate === '') continue;
      if (candidate !== columns[matched]) break;
      matched++;
    }
    if (matched === columns.length) {
      return cursor;
    }
  }

  return -1;
}
