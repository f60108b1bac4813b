import type { Transaction } from '../types/ledger.js';

/**
 * Canonical ledger order: date ascending. The sort is stable, so
 * transactions on the same day keep their ingestion order.
 */
export function sortLedger(transactions: readonly Transaction[]): Transaction[] {
  return [...transactions].sort((a, b) => a.date.localeCompare(b.date));
}
