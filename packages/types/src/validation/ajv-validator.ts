/**
 * AJV-based JSON Schema validation for the statement output document.
 */

import Ajv from 'ajv';
import ajvFormats from 'ajv-formats';
import type { StatementOutputDocument } from '../types/output.js';

type AddFormats = (ajv: object) => unknown;

// ajv-formats ships CommonJS; the default export sits one level down under ESM interop
const addFormats: AddFormats =
  (ajvFormats as unknown as { default?: AddFormats }).default ??
  (ajvFormats as unknown as AddFormats);

interface AjvErrorObject {
  instancePath: string;
  message?: string;
  keyword: string;
  params: Record<string, unknown>;
}

interface AjvValidateFunction {
  (data: unknown): boolean;
  errors?: AjvErrorObject[] | null;
}

type AjvConstructor = new (opts: object) => { compile: (schema: object) => AjvValidateFunction };

const AjvClass: AjvConstructor =
  (Ajv as unknown as { default?: AjvConstructor }).default ?? (Ajv as unknown as AjvConstructor);

const SCHEMA = {
  "$schema": "http://json-schema.org/draft-07/schema#",
  "$id": "https://example.local/schemas/statement-output.schema.json",
  "title": "Reconciled Bank Statement Output",
  "type": "object",
  "additionalProperties": false,
  "required": ["engine", "source", "dialect", "institution", "generatedAt", "summary", "transactions", "mismatches", "warnings"],
  "properties": {
    "engine": {
      "type": "object",
      "additionalProperties": false,
      "required": ["name", "version"],
      "properties": {
        "name": { "type": "string", "minLength": 1 },
        "version": { "type": "string", "minLength": 1 }
      }
    },
    "source": {
      "type": "object",
      "additionalProperties": false,
      "required": ["fileName", "lineCount"],
      "properties": {
        "fileName": { "type": "string", "minLength": 1 },
        "lineCount": { "type": "integer", "minimum": 0 }
      }
    },
    "dialect": { "type": "string", "minLength": 1 },
    "institution": { "type": "string", "minLength": 1 },
    "generatedAt": { "type": "string", "format": "date-time" },
    "summary": {
      "type": "object",
      "additionalProperties": false,
      "required": ["transactionCount", "openingBalance", "closingBalance", "totalDeposits", "totalWithdrawals"],
      "properties": {
        "transactionCount": { "type": "integer", "minimum": 0 },
        "openingBalance": { "anyOf": [{ "type": "number" }, { "type": "null" }] },
        "closingBalance": { "anyOf": [{ "type": "number" }, { "type": "null" }] },
        "totalDeposits": { "type": "number", "minimum": 0 },
        "totalWithdrawals": { "type": "number", "minimum": 0 }
      }
    },
    "transactions": {
      "type": "array",
      "items": { "$ref": "#/$defs/transaction" }
    },
    "mismatches": {
      "type": "array",
      "items": { "$ref": "#/$defs/mismatch" }
    },
    "warnings": { "type": "array", "items": { "type": "string" } }
  },
  "$defs": {
    "transaction": {
      "type": "object",
      "additionalProperties": false,
      "required": ["date", "valueDate", "mode", "particulars", "deposits", "withdrawals", "balance", "reference", "page", "originalOrder"],
      "properties": {
        "date": { "type": "string", "minLength": 1 },
        "valueDate": { "type": "string" },
        "mode": { "type": "string" },
        "particulars": { "type": "string" },
        "deposits": { "type": "number", "minimum": 0 },
        "withdrawals": { "type": "number", "minimum": 0 },
        "balance": { "type": "number" },
        "reference": { "anyOf": [{ "type": "string", "minLength": 1 }, { "type": "null" }] },
        "page": { "type": "integer", "minimum": 1 },
        "originalOrder": { "type": "integer", "minimum": 0 }
      }
    },
    "mismatch": {
      "type": "object",
      "additionalProperties": false,
      "required": ["transactionIndex", "date", "expectedBalance", "actualBalance", "difference", "previousBalance", "deposits", "withdrawals", "reason"],
      "properties": {
        "transactionIndex": { "type": "integer", "minimum": 0 },
        "date": { "type": "string" },
        "expectedBalance": { "type": "number" },
        "actualBalance": { "type": "number" },
        "difference": { "type": "number", "minimum": 0 },
        "previousBalance": { "type": "number" },
        "deposits": { "type": "number", "minimum": 0 },
        "withdrawals": { "type": "number", "minimum": 0 },
        "reason": { "enum": ["balance-equation", "ambiguous-opening-marker"] }
      }
    }
  }
};

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

let compiledValidator: AjvValidateFunction | null = null;

function getValidator(): AjvValidateFunction {
  if (compiledValidator === null) {
    const ajv = new AjvClass({
      allErrors: true,
      verbose: true,
    });
    addFormats(ajv);
    compiledValidator = ajv.compile(SCHEMA);
  }
  return compiledValidator;
}

export function validateOutput(output: unknown): ValidationResult {
  const validate = getValidator();
  const valid = validate(output);

  if (valid) {
    return { valid: true, errors: [] };
  }

  const rawErrors = validate.errors ?? [];
  const errors: ValidationError[] = rawErrors.map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
    params: err.params,
  }));

  return { valid: false, errors };
}

export function validateAndThrow(output: unknown): asserts output is StatementOutputDocument {
  const result = validateOutput(output);
  if (!result.valid) {
    const errorMessages = result.errors
      .slice(0, 10)
      .map((e) => `  ${e.path}: ${e.message}`)
      .join('\n');
    throw new Error(`Schema validation failed:\n${errorMessages}`);
  }
}
