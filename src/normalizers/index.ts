export { normalizeTransaction, resolveStatementPeriod } from './transaction-normalizer.js';
export type { NormalizeResult, StatementPeriod } from './transaction-normalizer.js';

export { deduplicateTransactions } from './deduplicator.js';
export type { DeduplicationResult, DuplicateRecord } from './deduplicator.js';

export { sortLedger } from './ledger-utils.js';
