/**
 * Field extraction for single statement lines: the leading date token and
 * the trailing amount/balance columns.
 */

import { AMOUNT_PATTERN_SOURCE, DEFAULT_DATE_PATTERN } from '../utils/constants.js';

export interface DateMatch {
  /** The date token, e.g. `03/14` */
  date: string;
  /** Everything after the token, trimmed */
  rest: string;
}

export interface AmountMatch {
  value: string;
  index: number;
}

export interface AmountColumns {
  /** Text ahead of the trailing amount columns, trimmed */
  description: string;
  /** Second-to-last amount on the line; null when fewer than two amounts */
  amount: string | null;
  /** Last amount on the line; null when the line has none */
  balance: string | null;
}

/**
 * Compile a date pattern for line matching. Global and sticky flags are
 * dropped so repeated `exec` calls stay independent.
 */
export function compileDatePattern(pattern: string | RegExp = DEFAULT_DATE_PATTERN): RegExp {
  if (typeof pattern === 'string') {
    return new RegExp(pattern);
  }
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}

/**
 * Match a date token at the very start of a line. Capture group 1 is the
 * token when the pattern has one, otherwise the whole match.
 */
export function matchDateToken(text: string, datePattern: RegExp): DateMatch | null {
  const trimmed = text.trim();
  const match = datePattern.exec(trimmed);
  if (match === null || match.index !== 0) {
    return null;
  }

  const date = (match[1] ?? match[0]).trim();
  if (date === '') {
    return null;
  }

  return {
    date,
    rest: trimmed.slice(match[0].length).trim(),
  };
}

export function findAmounts(text: string): AmountMatch[] {
  const pattern = new RegExp(AMOUNT_PATTERN_SOURCE, 'g');
  const amounts: AmountMatch[] = [];
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    amounts.push({ value: match[0], index: match.index });
  }
  return amounts;
}

/**
 * Split a line into its description text and amount/balance columns.
 *
 * The last amount is the running balance and the one before it the
 * transaction amount. Description text stops at the first amount of the
 * trailing run of amount columns, so an extra column (an original-currency
 * amount, say) never leaks into the description.
 */
export function splitAmountColumns(text: string): AmountColumns {
  const trimmed = text.trim();
  const amounts = findAmounts(trimmed);

  const last = amounts[amounts.length - 1];
  if (last === undefined) {
    return { description: trimmed, amount: null, balance: null };
  }

  let runStart = amounts.length - 1;
  while (runStart > 0) {
    const previous = amounts[runStart - 1];
    const current = amounts[runStart];
    if (previous === undefined || current === undefined) break;
    const gap = trimmed.slice(previous.index + previous.value.length, current.index);
    if (gap.trim() !== '') break;
    runStart--;
  }

  const first = amounts[runStart] ?? last;
  const beforeLast = amounts[amounts.length - 2];

  return {
    description: trimmed.slice(0, first.index).trim(),
    amount: beforeLast?.value ?? null,
    balance: last.value,
  };
}
