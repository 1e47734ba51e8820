import { z } from 'zod';
import { BALANCE_TOLERANCE } from '../utils/constants.js';

export const TransactionRecordSchema = z.object({
  /** Statement date as printed, e.g. `01/03/25` or `17-09-2024` */
  date: z.string().min(1),
  /** Value date as printed; the transaction date when the statement omits it */
  valueDate: z.string(),
  mode: z.string(),
  particulars: z.string(),
  deposits: z.number().nonnegative(),
  withdrawals: z.number().nonnegative(),
  balance: z.number(),
  reference: z.string().min(1).nullable(),
  page: z.number().int().positive(),
  originalOrder: z.number().int().nonnegative(),
});
export type TransactionRecord = z.infer<typeof TransactionRecordSchema>;

export const MismatchReasonSchema = z.enum(['balance-equation', 'ambiguous-opening-marker']);
export type MismatchReason = z.infer<typeof MismatchReasonSchema>;

export const MismatchRecordSchema = z.object({
  transactionIndex: z.number().int().nonnegative(),
  date: z.string(),
  expectedBalance: z.number(),
  actualBalance: z.number(),
  difference: z.number().nonnegative(),
  previousBalance: z.number(),
  deposits: z.number().nonnegative(),
  withdrawals: z.number().nonnegative(),
  reason: MismatchReasonSchema,
});
export type MismatchRecord = z.infer<typeof MismatchRecordSchema>;

export const EngineOptionsSchema = z.object({
  /** Maximum absolute balance-equation error before a row is reported */
  tolerance: z.number().nonnegative().default(BALANCE_TOLERANCE),
  /** Balance carried in from outside the document, used to verify the first row */
  openingBalance: z.number().optional(),
  /** Lines inspected after a date to confirm it starts a transaction */
  lookahead: z.number().int().min(1).max(10).default(4),
  /** Lines taken from the next page to finish a narration cut by a page break */
  continuationMaxLines: z.number().int().min(0).max(5).default(2),
  continuationMaxLength: z.number().int().positive().default(30),
  /** Validate every emitted record against TransactionRecordSchema */
  strict: z.boolean().default(false),
  verbose: z.boolean().default(false),
});
export type EngineOptions = z.infer<typeof EngineOptionsSchema>;
export type EngineOptionsInput = z.input<typeof EngineOptionsSchema>;

export const ParseErrorKindSchema = z.enum(['dialect-mismatch', 'no-transactions', 'unknown-dialect']);
export type ParseErrorKind = z.infer<typeof ParseErrorKindSchema>;
