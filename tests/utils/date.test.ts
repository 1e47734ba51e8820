import { describe, it, expect } from 'vitest';
import {
  expandTwoDigitYear,
  tryParseDayFirstDate,
  parseDayFirstDate,
  toDateSortKey,
  compareDateKeys,
  toISODate,
  isValidISODate,
} from '@ledgerline/types';

describe('expandTwoDigitYear', () => {
  it('maps 0-49 into the 2000s', () => {
    expect(expandTwoDigitYear(0)).toBe(2000);
    expect(expandTwoDigitYear(25)).toBe(2025);
    expect(expandTwoDigitYear(49)).toBe(2049);
  });

  it('maps 50-99 into the 1900s', () => {
    expect(expandTwoDigitYear(50)).toBe(1950);
    expect(expandTwoDigitYear(75)).toBe(1975);
    expect(expandTwoDigitYear(99)).toBe(1999);
  });

  it('leaves four-digit years alone', () => {
    expect(expandTwoDigitYear(2024)).toBe(2024);
  });
});

describe('parseDayFirstDate', () => {
  it('reads DD/MM/YY with the two-digit pivot', () => {
    expect(parseDayFirstDate('01/03/25')).toEqual({ year: 2025, month: 3, day: 1 });
    expect(parseDayFirstDate('01/03/75')).toEqual({ year: 1975, month: 3, day: 1 });
  });

  it('reads DD-MM-YYYY', () => {
    expect(parseDayFirstDate('17-09-2024')).toEqual({ year: 2024, month: 9, day: 17 });
  });

  it('trims surrounding whitespace', () => {
    expect(parseDayFirstDate('  05/11/24 ')).toEqual({ year: 2024, month: 11, day: 5 });
  });

  it('throws on malformed input', () => {
    expect(() => parseDayFirstDate('not a date')).toThrow('Unable to parse date: not a date');
  });

  it('rejects impossible months and days', () => {
    expect(tryParseDayFirstDate('01/13/25')).toBeNull();
    expect(tryParseDayFirstDate('32/01/25')).toBeNull();
    expect(tryParseDayFirstDate('00/01/25')).toBeNull();
  });
});

describe('toDateSortKey', () => {
  it('sorts empty and unparseable dates last', () => {
    expect(toDateSortKey('')).toEqual({ year: 9999, month: 12, day: 31 });
    expect(toDateSortKey('garbage')).toEqual({ year: 9999, month: 12, day: 31 });
  });

  it('returns a fresh key each time', () => {
    const a = toDateSortKey('');
    a.year = 1;
    expect(toDateSortKey('').year).toBe(9999);
  });
});

describe('compareDateKeys', () => {
  it('orders by year, then month, then day', () => {
    const keys = ['15/02/25', '01/03/24', '02/02/25', '01/01/99'].map(toDateSortKey);
    const sorted = [...keys].sort(compareDateKeys).map(toISODate);
    expect(sorted).toEqual(['1999-01-01', '2024-03-01', '2025-02-02', '2025-02-15']);
  });

  it('returns 0 for equal keys', () => {
    expect(compareDateKeys(toDateSortKey('01/03/25'), toDateSortKey('01-03-2025'))).toBe(0);
  });
});

describe('isValidISODate', () => {
  it('validates YYYY-MM-DD format', () => {
    expect(isValidISODate('2025-03-01')).toBe(true);
    expect(isValidISODate('01/03/25')).toBe(false);
  });
});
