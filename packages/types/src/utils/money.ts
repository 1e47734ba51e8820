export function parseAmount(amountStr: string): number {
  const cleaned = amountStr
    .replace(/^(?:INR|Rs\.?)/i, '')
    .replace(/[₹,\s]/g, '')
    .replace(/[()]/g, '-');

  const isNegative = cleaned.startsWith('-') || amountStr.includes('(');

  const numStr = cleaned.replace(/-/g, '');
  const num = parseFloat(numStr);

  if (isNaN(num)) {
    throw new Error(`Unable to parse amount: ${amountStr}`);
  }

  return isNegative ? -Math.abs(num) : Math.abs(num);
}

export function roundToTwoDecimals(num: number): number {
  return Math.round(num * 100) / 100;
}

export function sumAmounts(amounts: readonly number[]): number {
  return roundToTwoDecimals(amounts.reduce((sum, amt) => sum + amt, 0));
}

/** Absolute difference rounded to cents, so float noise never trips a tolerance check. */
export function balanceError(expected: number, actual: number): number {
  return roundToTwoDecimals(Math.abs(expected - actual));
}
