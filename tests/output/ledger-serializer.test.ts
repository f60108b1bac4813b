import { describe, it, expect } from 'vitest';
import {
  toLedgerRecord,
  toLedgerRecords,
  validateLedger,
  validateLedgerOrThrow,
} from '../../src/output/ledger-serializer.js';
import { computeTransactionId } from '../../src/utils/id-generator.js';
import type { Transaction } from '../../src/types/ledger.js';

const transaction: Transaction = {
  date: '2025-01-03',
  description: 'STARBUCKS #4521',
  amount: -5.75,
  balance: null,
  category: 'Dining',
  month: '2025-01',
  weekday: 'Friday',
  sourceFile: '2025-01-statement.txt',
  transactionId: computeTransactionId({ date: '2025-01-03', description: 'STARBUCKS #4521', amount: -5.75 }),
};

describe('toLedgerRecord', () => {
  it('should emit exactly the contract field names', () => {
    const record = toLedgerRecord(transaction);

    expect(Object.keys(record)).toEqual([
      'date',
      'description',
      'amount',
      'balance',
      'category',
      'month',
      'weekday',
      'source_file',
      'transaction_id',
    ]);
    expect(record.source_file).toBe('2025-01-statement.txt');
    expect(record.transaction_id).toBe(transaction.transactionId);
    expect(record.balance).toBeNull();
  });
});

describe('validateLedger', () => {
  it('should accept a serialized ledger', () => {
    expect(validateLedger(toLedgerRecords([transaction]))).toEqual({ valid: true, errors: [] });
  });

  it('should reject repeated transaction ids', () => {
    const record = toLedgerRecord(transaction);
    const result = validateLedger([record, record]);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      {
        path: '/1/transaction_id',
        message: `Duplicate transaction_id ${transaction.transactionId}`,
        keyword: 'custom',
      },
    ]);
  });

  it('should reject a month that does not match the date', () => {
    const result = validateLedger([{ ...toLedgerRecord(transaction), month: '2024-12' }]);

    expect(result.errors).toEqual([{ path: '/0/month', message: 'Month must match date', keyword: 'custom' }]);
  });

  it('should reject a date that is not on the calendar', () => {
    const result = validateLedger([{ ...toLedgerRecord(transaction), date: '2025-01-32' }]);

    expect(result.errors).toEqual([
      { path: '/0/date', message: 'Date must be a YYYY-MM-DD calendar date', keyword: 'custom' },
    ]);
  });

  it('should reject extra fields', () => {
    const result = validateLedger([{ ...toLedgerRecord(transaction), merchant: 'Starbucks' }]);

    expect(result.valid).toBe(false);
    expect(result.errors[0]?.keyword).toBe('unrecognized_keys');
  });

  it('should throw with every problem listed', () => {
    expect(() => validateLedgerOrThrow([{ ...toLedgerRecord(transaction), amount: 'five' }])).toThrow(
      /^Ledger validation failed:\n {2}\/0\/amount: /
    );
  });
});
