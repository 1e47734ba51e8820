import { basename } from 'path';
import { ENGINE_NAME, ENGINE_VERSION, getBalanceSummary } from '@ledgerline/types';
import type { StatementOutputDocument } from '@ledgerline/types';
import type { DialectDescriptor, ParseSuccess } from '@ledgerline/dialect-parser';

/**
 * Wrap a successful parse into the JSON document the CLI writes.
 */
export function buildOutputDocument(
  result: ParseSuccess,
  dialect: DialectDescriptor,
  sourceFile: string,
  lineCount: number,
  generatedAt: Date = new Date()
): StatementOutputDocument {
  return {
    engine: {
      name: ENGINE_NAME,
      version: ENGINE_VERSION,
    },
    source: {
      fileName: basename(sourceFile),
      lineCount,
    },
    dialect: result.dialect,
    institution: result.institution,
    generatedAt: generatedAt.toISOString(),
    summary: getBalanceSummary(result.transactions, dialect.openingBalanceModes),
    transactions: result.transactions,
    mismatches: result.mismatches,
    warnings: result.warnings,
  };
}

export function parseNumericOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value.replace(/,/g, ''));
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid value for --${name}: ${value}`);
  }
  return parsed;
}
