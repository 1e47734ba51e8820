import type { MismatchRecord, TransactionRecord } from '../schemas/transaction.js';
import type { BalanceSummary } from '../validation/reconciliation.js';

/**
 * JSON document written by the command-line front end for one parsed statement.
 */
export interface StatementOutputDocument {
  engine: {
    name: string;
    version: string;
  };
  source: {
    fileName: string;
    lineCount: number;
  };
  dialect: string;
  institution: string;
  generatedAt: string;
  summary: BalanceSummary;
  transactions: TransactionRecord[];
  mismatches: MismatchRecord[];
  warnings: string[];
}
