/**
 * Dialect descriptors: the per-institution constants that drive every parsing stage.
 */

export type PageMarkerKind = 'start' | 'end';

export interface PageMarkerRule {
  kind: PageMarkerKind;
  /** Regex source for the whole marker line; capture group 1 is the page number */
  source: string;
}

/**
 * How amounts are laid out after the narration:
 * - `amount-balance`: one movement amount followed by the running balance
 * - `deposit-withdrawal-balance`: separate deposit and withdrawal columns before the balance
 */
export type AmountLayout = 'amount-balance' | 'deposit-withdrawal-balance';

/**
 * How the debit/credit split is decided:
 * - `keyword-guess`: guessed from narration keywords, then corrected against the balance delta
 * - `balance-delta`: unknown at tokenization, classified purely from the balance delta
 * - `columns`: taken from explicit columns, corrected only where a column went missing
 */
export type SplitStrategy = 'keyword-guess' | 'balance-delta' | 'columns';

/**
 * Unformatted digit strings:
 * - `length-rule`: lengths 5, 9 and 10+ are reference ids, others amounts
 * - `transaction-id`: 4 to 12 digits are transaction ids as well
 */
export type BareIntegerPolicy = 'length-rule' | 'transaction-id';

export type ModeSource = 'keywords' | 'labels';

/**
 * Line layout of a single transaction. Each layout is one state table for the tokenizer.
 */
export interface TransactionLayout {
  /** A reference column sits between narration and the amounts */
  referenceColumn: boolean;
  /** Confirm a date starts a transaction by looking ahead for a reference, long text or amount */
  confirmDateLookahead: boolean;
  /** Free text after the amounts belongs to the transaction */
  collectTrailing: boolean;
}

export interface DialectDefinition {
  key: string;
  institution: string;
  /** Case-sensitive substrings that identify the institution in raw text */
  indicators: readonly string[];
  /** Regex source for one date token, without anchors or groups */
  dateSource: string;
  pageMarkers: readonly PageMarkerRule[];
  headerLabels: readonly string[];
  /** Column headings in printed order, one per line or on a single line */
  headerColumnOrder: readonly string[];
  requireHeaderPerPage: boolean;
  modeSource: ModeSource;
  modeKeywords: readonly string[];
  modeLabels: readonly string[];
  openingBalanceModes: readonly string[];
  amountLayout: AmountLayout;
  splitStrategy: SplitStrategy;
  /** Lower-case narration fragments that suggest a withdrawal */
  debitKeywords: readonly string[];
  bareIntegerPolicy: BareIntegerPolicy;
  layout: TransactionLayout;
  /** Printed width of the reference column; longer references are cut back to it */
  referenceWidth: number | null;
  summaryMarkers: readonly string[];
  footerPhrases: readonly string[];
  footerWords: readonly string[];
}

export interface CompiledPageMarker {
  rule: PageMarkerRule;
  /** Matches a whole marker line */
  line: RegExp;
  /** Finds the marker inside longer text */
  embedded: RegExp;
  /** Global form of `embedded` for replacement */
  embeddedAll: RegExp;
}

export interface DialectPatterns {
  /** Date token at the start of a line; group 1 = date, group 2 = rest of line */
  datePrefix: RegExp;
  /** A reference fused with a trailing value date; group 1 = reference, group 2 = date */
  referenceWithDate: RegExp;
  /** Date token anywhere in a string */
  dateFragment: RegExp;
  /** Date token at the end of a string */
  trailingDate: RegExp;
  /** Date token at the start of a string */
  leadingDate: RegExp;
  pageMarkers: ReadonlyArray<CompiledPageMarker>;
}

export interface DialectDescriptor extends DialectDefinition {
  patterns: DialectPatterns;
}
