import { TWO_DIGIT_YEAR_PIVOT, UNPARSEABLE_DATE_YEAR } from './constants.js';

export interface DateKey {
  year: number;
  month: number;
  day: number;
}

export const UNPARSEABLE_DATE_KEY: Readonly<DateKey> = Object.freeze({
  year: UNPARSEABLE_DATE_YEAR,
  month: 12,
  day: 31,
});

const DAY_FIRST_PATTERN = /^(\d{1,2})[/\-.](\d{1,2})[/\-.](\d{4}|\d{2})$/;

/**
 * Two-digit years below the pivot land in the 2000s, the rest in the 1900s.
 */
export function expandTwoDigitYear(year: number): number {
  if (year >= 100) return year;
  return year < TWO_DIGIT_YEAR_PIVOT ? 2000 + year : 1900 + year;
}

export function tryParseDayFirstDate(dateStr: string): DateKey | null {
  const match = DAY_FIRST_PATTERN.exec(dateStr.trim());
  if (match === null) return null;

  const [, dayStr, monthStr, yearStr] = match;
  if (dayStr === undefined || monthStr === undefined || yearStr === undefined) {
    return null;
  }

  const day = parseInt(dayStr, 10);
  const month = parseInt(monthStr, 10);
  const rawYear = parseInt(yearStr, 10);
  const year = yearStr.length === 2 ? expandTwoDigitYear(rawYear) : rawYear;

  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }

  return { year, month, day };
}

export function parseDayFirstDate(dateStr: string): DateKey {
  const key = tryParseDayFirstDate(dateStr);
  if (key === null) {
    throw new Error(`Unable to parse date: ${dateStr}`);
  }
  return key;
}

/**
 * Sort key for a statement date. Empty or unparseable dates sort after every real date.
 */
export function toDateSortKey(dateStr: string): DateKey {
  return tryParseDayFirstDate(dateStr) ?? { ...UNPARSEABLE_DATE_KEY };
}

export function compareDateKeys(a: DateKey, b: DateKey): number {
  if (a.year !== b.year) return a.year - b.year;
  if (a.month !== b.month) return a.month - b.month;
  return a.day - b.day;
}

export function toISODate(key: DateKey): string {
  return `${key.year}-${String(key.month).padStart(2, '0')}-${String(key.day).padStart(2, '0')}`;
}

export function isValidISODate(dateStr: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(dateStr);
}
