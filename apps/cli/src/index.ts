#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { readFile, writeFile, mkdir } from 'fs/promises';
import { resolve, dirname } from 'path';
import {
  createDialectRegistry,
  detectDialect,
  getDialect,
  listDialectKeys,
  parseStatement,
  splitLines,
} from '@ledgerline/dialect-parser';
import type { DialectDescriptor } from '@ledgerline/dialect-parser';
import {
  ENGINE_VERSION,
  EngineOptionsSchema,
  formatBalanceValidationReport,
  validateBalanceEquation,
  validateAndThrow,
} from '@ledgerline/types';
import { buildOutputDocument, parseNumericOption } from './output.js';

const program = new Command();

// Helper to parse boolean env vars
const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

interface CliOptions {
  bank: string;
  out?: string;
  verbose: boolean;
  strict: boolean;
  pretty: boolean;
  report: boolean;
  tolerance: string;
  openingBalance?: string;
}

const registry = createDialectRegistry();

program
  .name('ledgerline')
  .description('Parse extracted bank statement text into reconciled transactions')
  .version(ENGINE_VERSION)
  .argument('<text-file>', 'Path to the statement text produced by the extraction step')
  .option(
    '-b, --bank <key>',
    `Statement dialect (${listDialectKeys(registry).join(', ')}, auto)`,
    process.env['LEDGERLINE_BANK'] ?? 'auto'
  )
  .option('-o, --out <file>', 'Output file path (default: stdout)', process.env['LEDGERLINE_OUTPUT_FILE'])
  .option('-v, --verbose', 'Enable verbose output', envBool('LEDGERLINE_VERBOSE', false))
  .option('-s, --strict', 'Enable strict validation mode', envBool('LEDGERLINE_STRICT', false))
  .option('--pretty', 'Pretty-print JSON output', envBool('LEDGERLINE_PRETTY', true))
  .option('--no-pretty', 'Disable pretty-printing')
  .option('--report', 'Print the balance validation report to stderr', envBool('LEDGERLINE_REPORT', true))
  .option('--no-report', 'Do not print the balance validation report')
  .option(
    '--tolerance <amount>',
    'Balance equation tolerance',
    process.env['LEDGERLINE_TOLERANCE'] ?? '0.01'
  )
  .option(
    '--opening-balance <amount>',
    'Balance before the first row, when the statement does not print one',
    process.env['LEDGERLINE_OPENING_BALANCE']
  )
  .action(async (textFile: string, options: CliOptions) => {
    try {
      await processTextFile(textFile, options);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] ${message}`);
      if (options.verbose && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

function resolveDialect(text: string, key: string, verbose: boolean): DialectDescriptor {
  if (key.trim().toLowerCase() !== 'auto') {
    return getDialect(registry, key);
  }

  const match = detectDialect(text, registry);
  if (match === null) {
    throw new Error(
      `Could not detect a supported institution (supported: ${listDialectKeys(registry).join(', ')})`
    );
  }
  if (verbose) {
    console.error(`[INFO] Detected dialect: ${match.dialect.key} (score ${match.score})`);
  }
  return match.dialect;
}

async function processTextFile(textFile: string, options: CliOptions): Promise<void> {
  const filePath = resolve(textFile);

  if (options.verbose) {
    console.error(`[INFO] Parsing: ${filePath}`);
    console.error(`[INFO] Engine version: ${ENGINE_VERSION}`);
    console.error(`[INFO] Strict mode: ${options.strict ? 'enabled' : 'disabled'}`);
  }

  const text = await readFile(filePath, 'utf-8');
  const lineCount = splitLines(text).length;

  if (options.verbose) {
    console.error(`[INFO] Read ${lineCount} lines`);
  }

  const dialect = resolveDialect(text, options.bank, options.verbose);
  const engineOptions = EngineOptionsSchema.parse({
    tolerance: parseNumericOption('tolerance', options.tolerance),
    openingBalance: parseNumericOption('opening-balance', options.openingBalance),
    strict: options.strict,
    verbose: options.verbose,
  });

  const result = parseStatement(text, dialect, engineOptions);

  if (!result.success) {
    for (const warning of result.warnings) {
      console.error(`[WARN] ${warning}`);
    }
    throw new Error(result.error);
  }

  if (options.verbose) {
    console.error(`[INFO] Pages: ${result.stats.pages}`);
    console.error(`[INFO] Transactions: ${result.stats.transactions}`);
    console.error(`[INFO] Skipped runs: ${result.stats.skippedRuns}`);
    console.error(`[INFO] Continuations merged: ${result.stats.continuationsMerged}`);
    console.error(`[INFO] Debit/credit corrections: ${result.stats.corrections}`);
    if (result.warnings.length > 0) {
      console.error(`[WARN] Warnings:`);
      for (const warning of result.warnings) {
        console.error(`  - ${warning}`);
      }
    }
  }

  if (options.report) {
    const validation = validateBalanceEquation(result.transactions, {
      tolerance: engineOptions.tolerance,
      openingBalance: engineOptions.openingBalance,
      openingModes: dialect.openingBalanceModes,
    });
    console.error(formatBalanceValidationReport(validation));
  }

  const output = buildOutputDocument(result, dialect, filePath, lineCount);

  // Validate output against schema (always validate in strict mode)
  if (options.strict) {
    validateAndThrow(output);
  }

  const json = options.pretty ? JSON.stringify(output, null, 2) : JSON.stringify(output);

  if (options.out !== undefined) {
    const outPath = resolve(options.out);
    await mkdir(dirname(outPath), { recursive: true });
    await writeFile(outPath, json + '\n', 'utf-8');
    if (options.verbose) {
      console.error(`[INFO] Output written to: ${outPath}`);
    }
  } else {
    console.log(json);
  }

  if (result.mismatches.length > 0) {
    console.error(`[WARN] ${result.mismatches.length} balance mismatch(es) found`);
  }
}

await program.parseAsync();
