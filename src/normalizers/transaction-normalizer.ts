import type { DropReason, RawTransaction, Transaction } from '../types/ledger.js';
import { inferStatementPeriod, monthOf, parseUSDate, weekdayOf } from '../utils/date.js';
import { parseAmount } from '../utils/money.js';
import { computeTransactionId } from '../utils/id-generator.js';

export interface StatementPeriod {
  year: number;
  /** Closing month (1-12), used to roll `MM/DD` rows back into the previous year */
  closingMonth: number | null;
  /** How the year was found */
  yearSource: 'filename' | 'default' | 'current';
}

export type NormalizeResult =
  | { ok: true; transaction: Transaction; balanceKnown: boolean }
  | { ok: false; reason: DropReason; message: string };

/**
 * Work out which year the statement's `MM/DD` dates fall in: from the file
 * name, then the configured default year, then the current year.
 */
export function resolveStatementPeriod(statementId: string, defaultYear?: number): StatementPeriod {
  const hint = inferStatementPeriod(statementId);
  if (hint !== null) {
    return { year: hint.year, closingMonth: hint.month, yearSource: 'filename' };
  }
  if (defaultYear !== undefined) {
    return { year: defaultYear, closingMonth: null, yearSource: 'default' };
  }
  return { year: new Date().getFullYear(), closingMonth: null, yearSource: 'current' };
}

/**
 * Coerce a raw transaction into a typed ledger entry. The category is left
 * empty for the categorizer to fill.
 *
 * An unreadable date or amount rejects the record; an unreadable balance
 * only becomes null.
 */
export function normalizeTransaction(raw: RawTransaction, period: StatementPeriod): NormalizeResult {
  let date: string;
  try {
    date = parseUSDate(raw.date, period.year, period.closingMonth);
  } catch (error) {
    return {
      ok: false,
      reason: 'MalformedDate',
      message: error instanceof Error ? error.message : String(error),
    };
  }

  if (raw.amount.trim() === '') {
    return { ok: false, reason: 'MalformedAmount', message: 'Missing amount' };
  }

  let amount: number;
  try {
    amount = parseAmount(raw.amount);
  } catch (error) {
    return {
      ok: false,
      reason: 'MalformedAmount',
      message: error instanceof Error ? error.message : String(error),
    };
  }

  const balance = parseBalance(raw.balance);
  const description = raw.description.trim();

  return {
    ok: true,
    balanceKnown: balance !== null,
    transaction: {
      date,
      description,
      amount,
      balance,
      category: '',
      month: monthOf(date),
      weekday: weekdayOf(date),
      sourceFile: raw.sourceFile,
      transactionId: computeTransactionId({ date, description, amount }),
    },
  };
}

function parseBalance(balance: string): number | null {
  if (balance.trim() === '') {
    return null;
  }
  try {
    return parseAmount(balance);
  } catch {
    return null;
  }
}
