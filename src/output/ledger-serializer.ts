import type { LedgerRecord, Transaction } from '../types/ledger.js';
import { LedgerSchema } from '../schemas/index.js';

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export function toLedgerRecord(transaction: Transaction): LedgerRecord {
  return {
    date: transaction.date,
    description: transaction.description,
    amount: transaction.amount,
    balance: transaction.balance,
    category: transaction.category,
    month: transaction.month,
    weekday: transaction.weekday,
    source_file: transaction.sourceFile,
    transaction_id: transaction.transactionId,
  };
}

export function toLedgerRecords(transactions: readonly Transaction[]): LedgerRecord[] {
  return transactions.map(toLedgerRecord);
}

/**
 * Check a serialized ledger against the record contract: field set, formats,
 * and one row per transaction_id.
 */
export function validateLedger(payload: unknown): ValidationResult {
  const result = LedgerSchema.safeParse(payload);
  if (result.success) {
    return { valid: true, errors: [] };
  }

  return {
    valid: false,
    errors: result.error.issues.map((issue) => ({
      path: issue.path.length > 0 ? `/${issue.path.join('/')}` : '/',
      message: issue.message,
      keyword: issue.code,
    })),
  };
}

export function formatValidationErrors(errors: readonly ValidationError[]): string {
  return errors.map((e) => `  ${e.path}: ${e.message} (${e.keyword})`).join('\n');
}

export function validateLedgerOrThrow(payload: unknown): void {
  const result = validateLedger(payload);
  if (!result.valid) {
    throw new Error(`Ledger validation failed:\n${formatValidationErrors(result.errors)}`);
  }
}
