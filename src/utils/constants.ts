export const PIPELINE_VERSION = '0.1.0';

export const UNCATEGORIZED = 'uncategorized';

/** `MM/DD` at the very start of a line, followed by whitespace or end of line */
export const DEFAULT_DATE_PATTERN = '^(\\d{2}/\\d{2})(?:\\s|$)';

/** Currency amounts as printed in the amount and balance columns */
export const AMOUNT_PATTERN_SOURCE = '(?<![\\d.,])-?(?:\\d{1,3}(?:,\\d{3})+|\\d+)\\.\\d{2}(?!\\d)';

/**
 * Line prefixes that never carry transaction data: column headers,
 * section titles, summary rows and page furniture.
 */
export const DEFAULT_EXCLUSIONS: readonly string[] = [
  'DATE',
  'DESCRIPTION',
  'AMOUNT',
  'BALANCE',
  'TRANSACTION DETAIL',
  'CHECKING SUMMARY',
  'SAVINGS SUMMARY',
  'Beginning Balance',
  'Ending Balance',
  'DEPOSITS AND ADDITIONS',
  'ATM & Debit Card Withdrawals',
  'Electronic Withdrawals',
  'Other Withdrawals',
  'Deposits and Additions',
  'Your account ending',
  'Page ',
];

export const STATEMENT_FILE_EXTENSIONS: readonly string[] = ['.pdf', '.txt'];
