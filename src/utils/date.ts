import { basename } from 'path';
import type { ISODate, Weekday, YearMonth } from '../types/ledger.js';

const WEEKDAYS = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
] as const satisfies readonly Weekday[];

export interface StatementPeriodHint {
  year: number;
  /** Closing month (1-12) when the file name carries one */
  month: number | null;
}

/**
 * Parse a statement date token into an ISO date.
 *
 * `MM/DD` tokens take `statementYear`. When the statement's closing month is
 * known and the token's month is later than it, the row belongs to the
 * previous year (a January statement opening with December rows).
 */
export function parseUSDate(dateStr: string, statementYear: number, closingMonth: number | null = null): ISODate {
  const trimmed = dateStr.trim();

  const fullMatch = trimmed.match(/^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/);
  if (fullMatch) {
    const [, month, day, year] = fullMatch;
    if (month === undefined || day === undefined || year === undefined) {
      throw new Error(`Invalid date format: ${dateStr}`);
    }
    const fullYear = year.length === 2 ? 2000 + parseInt(year, 10) : parseInt(year, 10);
    return toISODate(fullYear, parseInt(month, 10), parseInt(day, 10), dateStr);
  }

  const shortMatch = trimmed.match(/^(\d{1,2})\/(\d{1,2})$/);
  if (shortMatch) {
    const [, month, day] = shortMatch;
    if (month === undefined || day === undefined) {
      throw new Error(`Invalid date format: ${dateStr}`);
    }
    const monthNum = parseInt(month, 10);
    const year = closingMonth !== null && monthNum > closingMonth ? statementYear - 1 : statementYear;
    return toISODate(year, monthNum, parseInt(day, 10), dateStr);
  }

  throw new Error(`Unable to parse date: ${dateStr}`);
}

function toISODate(year: number, month: number, day: number, original: string): ISODate {
  if (!isValidCalendarDate(year, month, day)) {
    throw new Error(`Not a calendar date: ${original}`);
  }
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return false;
  }
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

/** `YYYY-MM-DD` naming a real calendar day */
export function isValidISODate(dateStr: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(dateStr);
  if (match === null) {
    return false;
  }
  const [, year, month, day] = match;
  return isValidCalendarDate(Number(year), Number(month), Number(day));
}

export function monthOf(date: ISODate): YearMonth {
  return date.slice(0, 7);
}

export function weekdayOf(date: ISODate): Weekday {
  const [year, month, day] = date.split('-').map((part) => parseInt(part, 10));
  if (year === undefined || month === undefined || day === undefined) {
    throw new Error(`Invalid ISO date: ${date}`);
  }
  const weekday = WEEKDAYS[new Date(Date.UTC(year, month - 1, day)).getUTCDay()];
  if (weekday === undefined) {
    throw new Error(`Invalid ISO date: ${date}`);
  }
  return weekday;
}

/**
 * Read the statement year (and closing month, if present) from the leading
 * digits of a statement file name: `YYYYMMDD`, `YYYY-MM-DD`, `YYYYMM`,
 * `YYYY-MM` or `YYYY`.
 */
export function inferStatementPeriod(statementId: string): StatementPeriodHint | null {
  const name = basename(statementId);

  const withMonth =
    /^(\d{4})[-_]?(\d{2})[-_]?(\d{2})(?!\d)/.exec(name) ?? /^(\d{4})[-_]?(\d{2})(?!\d)/.exec(name);
  if (withMonth) {
    const [, year, month] = withMonth;
    if (year !== undefined && month !== undefined) {
      const monthNum = parseInt(month, 10);
      return {
        year: parseInt(year, 10),
        month: monthNum >= 1 && monthNum <= 12 ? monthNum : null,
      };
    }
  }

  const yearOnly = /^(\d{4})(?!\d)/.exec(name);
  if (yearOnly?.[1] !== undefined) {
    return { year: parseInt(yearOnly[1], 10), month: null };
  }

  return null;
}
