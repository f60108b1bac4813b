export {
  PIPELINE_VERSION,
  UNCATEGORIZED,
  DEFAULT_DATE_PATTERN,
  DEFAULT_EXCLUSIONS,
  AMOUNT_PATTERN_SOURCE,
} from './constants.js';
export {
  parseUSDate,
  isValidCalendarDate,
  isValidISODate,
  monthOf,
  weekdayOf,
  inferStatementPeriod,
  type StatementPeriodHint,
} from './date.js';
export { parseAmount, roundToTwoDecimals } from './money.js';
export { computeTransactionId, isValidTransactionId, type TransactionIdInput } from './id-generator.js';
export { scanStatementDirectory, validateDirectory, classifyStatementName } from './directory-scanner.js';
export type { StatementFileInfo, ScanResult, SkippedFile } from './directory-scanner.js';
