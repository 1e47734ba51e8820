export const ENGINE_VERSION = '1.0.0';

export const ENGINE_NAME = 'ledgerline';

/** Maximum absolute error accepted by the balance equation. */
export const BALANCE_TOLERANCE = 0.01;

export const OPENING_BALANCE_MARKER = 'B/F';

export const TWO_DIGIT_YEAR_PIVOT = 50;

export const UNPARSEABLE_DATE_YEAR = 9999;

export const MAX_REPORTED_MISMATCHES = 10;
