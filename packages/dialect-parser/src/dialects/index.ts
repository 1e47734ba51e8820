export { defineDialect } from './define.js';
export { HDFC_DIALECT } from './hdfc.js';
export { ICICI_DIALECT } from './icici.js';
export {
  BUILT_IN_DIALECTS,
  createDialectRegistry,
  listDialectKeys,
  getDialect,
  type DialectRegistry,
} from './registry.js';
export type {
  AmountLayout,
  BareIntegerPolicy,
  CompiledPageMarker,
  DialectDefinition,
  DialectDescriptor,
  DialectPatterns,
  ModeSource,
  PageMarkerKind,
  PageMarkerRule,
  SplitStrategy,
  TransactionLayout,
} from './types.js';
