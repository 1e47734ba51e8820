export {
  TransactionRecordSchema,
  MismatchReasonSchema,
  MismatchRecordSchema,
  EngineOptionsSchema,
  ParseErrorKindSchema,
} from './transaction.js';

export type {
  TransactionRecord,
  MismatchReason,
  MismatchRecord,
  EngineOptions,
  EngineOptionsInput,
  ParseErrorKind,
} from './transaction.js';
