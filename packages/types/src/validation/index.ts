export {
  classifyOpeningRow,
  isOpeningBalanceRow,
  validateBalanceEquation,
  getBalanceSummary,
  formatBalanceValidationReport,
  type OpeningRowClass,
  type BalanceValidationOptions,
  type BalanceValidationResult,
  type BalanceSummary,
} from './reconciliation.js';
export {
  validateOutput,
  validateAndThrow,
  type ValidationResult,
  type ValidationError,
} from './ajv-validator.js';
