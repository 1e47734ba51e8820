export {
  ENGINE_VERSION,
  ENGINE_NAME,
  BALANCE_TOLERANCE,
  OPENING_BALANCE_MARKER,
  TWO_DIGIT_YEAR_PIVOT,
  UNPARSEABLE_DATE_YEAR,
  MAX_REPORTED_MISMATCHES,
} from './constants.js';
export {
  expandTwoDigitYear,
  tryParseDayFirstDate,
  parseDayFirstDate,
  toDateSortKey,
  compareDateKeys,
  toISODate,
  isValidISODate,
  UNPARSEABLE_DATE_KEY,
  type DateKey,
} from './date.js';
export { parseAmount, roundToTwoDecimals, sumAmounts, balanceError } from './money.js';
