const AMOUNT_GRAMMAR = /^(-)?\$?(-)?(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d+))?$/;

/**
 * Parse a printed currency amount. Accepts `$`, thousands separators and a
 * leading `-` or surrounding parentheses for negatives. Anything else throws.
 */
export function parseAmount(amountStr: string): number {
  let cleaned = amountStr.replace(/\s+/g, '');
  let negative = false;

  if (cleaned.startsWith('(') && cleaned.endsWith(')')) {
    negative = true;
    cleaned = cleaned.slice(1, -1);
  }

  const match = AMOUNT_GRAMMAR.exec(cleaned);
  if (match === null) {
    throw new Error(`Unable to parse amount: ${amountStr}`);
  }

  const [, signBefore, signAfter, whole, fraction] = match;
  if (whole === undefined || (signBefore !== undefined && signAfter !== undefined)) {
    throw new Error(`Unable to parse amount: ${amountStr}`);
  }
  if (signBefore !== undefined || signAfter !== undefined) {
    negative = !negative;
  }

  const num = roundToTwoDecimals(Number(`${whole.replace(/,/g, '')}.${fraction ?? '0'}`));
  if (num === 0) return 0;
  return negative ? -num : num;
}

export function roundToTwoDecimals(num: number): number {
  return Math.round(num * 100) / 100;
}
