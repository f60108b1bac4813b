/**
 * Deterministic transaction identifiers.
 *
 * The id doubles as the deduplication key, so it depends on nothing but
 * the transaction's date, description and amount.
 */

import { createHash } from 'crypto';

/**
 * Normalize a string for canonical hashing.
 * - Trim whitespace
 * - Collapse multiple spaces
 * - Convert to uppercase for consistency
 */
function normalizeForHash(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toUpperCase();
}

function normalizeAmount(amount: number): string {
  return amount.toFixed(2);
}

export interface TransactionIdInput {
  date: string;
  description: string;
  amount: number;
}

/**
 * Compute a transaction ID.
 *
 * SHA-256 over `date | description | amount`, returned as
 * `"tx_"` + the first 24 hex chars.
 */
export function computeTransactionId(transaction: TransactionIdInput): string {
  const canonicalString = [
    transaction.date,
    normalizeForHash(transaction.description),
    normalizeAmount(transaction.amount),
  ].join('|');

  const hash = createHash('sha256')
    .update(canonicalString, 'utf8')
    .digest('hex');

  return `tx_${hash.substring(0, 24)}`;
}

export function isValidTransactionId(id: string): boolean {
  return /^tx_[a-f0-9]{24}$/.test(id);
}
