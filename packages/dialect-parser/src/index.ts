// ─── Dialects ───────────────────────────────────────────────────────────────
export * from './dialects/index.js';

// ─── Pipeline stages ────────────────────────────────────────────────────────
export {
  classifyLine,
  classifyLines,
  isAmountToken,
  isReferenceId,
  isHeaderLine,
  matchPageBoundary,
  containsPageBoundary,
  stripPageBoundaries,
  locateColumnHeader,
  type LineToken,
  type LineTokenKind,
} from './line-classifier.js';
export { segmentPages, splitLines, type PageSection } from './page-segmenter.js';
export {
  tokenizePage,
  normalizeReference,
  detectMode,
  guessSplit,
  isOpeningParticulars,
  DEFAULT_LOOKAHEAD,
  type TokenizerState,
  type TokenizeOptions,
  type TokenizeResult,
} from './tokenizer.js';
export {
  mergeContinuations,
  collectContinuationLines,
  isContinuationLine,
  type ContinuationOptions,
  type MergeResult,
} from './continuation-merger.js';
export {
  stripSummaryContent,
  filterSummaryContent,
  type SummaryFilterResult,
} from './summary-filter.js';
export { sortChronologically } from './sorter.js';
export {
  reconcileBalances,
  correctSplit,
  classifySplit,
  type ReconcileOptions,
  type ReconcileResult,
} from './reconciler.js';

// ─── Detection & engine ─────────────────────────────────────────────────────
export { scoreDialect, validateStatementText, detectDialect, type DialectMatch } from './detection.js';
export {
  runPipeline,
  parseStatement,
  parseWithAutoDetect,
  createStatementParser,
  type PipelineStats,
  type PipelineOutput,
  type ParseSuccess,
  type ParseFailure,
  type StatementParseResult,
  type StatementParser,
} from './engine.js';
