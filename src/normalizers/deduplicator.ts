import type { Transaction } from '../types/ledger.js';

export interface DuplicateRecord {
  transactionId: string;
  keptFrom: string;
  droppedFrom: string;
  /** The dropped copy reported a different running balance */
  balanceMismatch: boolean;
}

export interface DeduplicationResult {
  transactions: Transaction[];
  duplicatesRemoved: number;
  duplicates: DuplicateRecord[];
}

/**
 * Collapse transactions that share a transaction id, keeping the first one
 * seen. Input order is ingestion order, so the earliest statement wins and
 * the output keeps that order.
 *
 * Only exact id matches merge; near-duplicates (a cent apart, reworded) stay.
 */
export function deduplicateTransactions(transactions: Iterable<Transaction>): DeduplicationResult {
  const seen = new Map<string, Transaction>();
  const kept: Transaction[] = [];
  const duplicates: DuplicateRecord[] = [];

  for (const txn of transactions) {
    const existing = seen.get(txn.transactionId);

    if (existing !== undefined) {
      duplicates.push({
        transactionId: txn.transactionId,
        keptFrom: existing.sourceFile,
        droppedFrom: txn.sourceFile,
        balanceMismatch: existing.balance !== txn.balance,
      });
      continue;
    }

    seen.set(txn.transactionId, txn);
    kept.push(txn);
  }

  return {
    transactions: kept,
    duplicatesRemoved: duplicates.length,
    duplicates,
  };
}
