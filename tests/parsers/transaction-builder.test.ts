import { describe, it, expect, beforeEach } from 'vitest';
import { TransactionBuilder } from '../../src/parsers/transaction-builder.js';
import type { RawLine } from '../../src/types/ledger.js';

const STATEMENT = '/data/statements/2024-03-statement.txt';

const line = (text: string, lineIndex = 0, page = 1): RawLine => ({
  text,
  page,
  lineIndex,
  statementId: STATEMENT,
});

describe('TransactionBuilder', () => {
  let builder: TransactionBuilder;

  beforeEach(() => {
    builder = new TransactionBuilder();
  });

  it('should start idle and close to null', () => {
    expect(builder.state).toBe('idle');
    expect(builder.close()).toBeNull();
  });

  it('should build a single-line transaction', () => {
    expect(builder.open(line('03/14 AMAZON.COM MKTPLACE PMTS -42.10 1,523.67', 7, 2))).toBeNull();
    expect(builder.state).toBe('open');

    expect(builder.close()).toEqual({
      date: '03/14',
      description: 'AMAZON.COM MKTPLACE PMTS',
      amount: '-42.10',
      balance: '1,523.67',
      sourceFile: '2024-03-statement.txt',
      raw: { page: 2, lineIndex: 7, originalText: '03/14 AMAZON.COM MKTPLACE PMTS -42.10 1,523.67' },
    });
    expect(builder.state).toBe('idle');
  });

  it('should reconstruct a description wrapped over continuation lines', () => {
    builder.open(line('03/14 AMAZON.COM', 0));
    builder.extend(line('  MKTPLACE PMTS', 1));
    builder.extend(line('  -42.10  -42.10  1523.67', 2));

    const txn = builder.close();
    expect(txn?.description).toBe('AMAZON.COM MKTPLACE PMTS -42.10 -42.10 1523.67');
    expect(txn?.amount).toBe('-42.10');
    expect(txn?.balance).toBe('1523.67');
    expect(txn?.raw.originalText).toBe('03/14 AMAZON.COM\nMKTPLACE PMTS\n-42.10  -42.10  1523.67');
  });

  it('should append text after the amount is known as description', () => {
    builder.open(line('03/15 ZELLE PAYMENT TO -250.00 1,273.67'));
    builder.extend(line('JANE ROE REF 8812'));

    expect(builder.close()?.description).toBe('ZELLE PAYMENT TO JANE ROE REF 8812');
  });

  it('should read a single amount on the start line as the balance', () => {
    builder.open(line('03/16 INTEREST PAID 1,273.67'));

    const txn = builder.close();
    expect(txn?.amount).toBe('0.00');
    expect(txn?.balance).toBe('1,273.67');
    expect(txn?.description).toBe('INTEREST PAID');
  });

  it('should set only the balance from a single amount on a continuation line', () => {
    builder.open(line('03/16 WIRE TRANSFER'));
    builder.extend(line('  REF 99 1,273.67'));

    const txn = builder.close();
    expect(txn?.description).toBe('WIRE TRANSFER REF 99 1,273.67');
    expect(txn?.amount).toBe('');
    expect(txn?.balance).toBe('1,273.67');
  });

  it('should fill the amount from a later continuation line after a balance-only one', () => {
    builder.open(line('03/16 WIRE TRANSFER'));
    builder.extend(line('REF 99 1,273.67'));
    builder.extend(line('-250.00 1,023.67'));

    const txn = builder.close();
    expect(txn?.description).toBe('WIRE TRANSFER REF 99 1,273.67 -250.00 1,023.67');
    expect(txn?.amount).toBe('-250.00');
    expect(txn?.balance).toBe('1,023.67');
  });

  it('should leave amount and balance empty when no line carries them', () => {
    builder.open(line('03/17 PENDING HOLD'));

    const txn = builder.close();
    expect(txn?.amount).toBe('');
    expect(txn?.balance).toBe('');
  });

  it('should return the previous draft when a new one opens', () => {
    builder.open(line('03/14 FIRST -1.00 99.00', 0));
    const first = builder.open(line('03/15 SECOND -2.00 97.00', 1));

    expect(first?.description).toBe('FIRST');
    expect(builder.close()?.description).toBe('SECOND');
  });

  it('should keep continuation lines with no open draft as orphans', () => {
    expect(builder.extend(line('STRAY TEXT', 3))).toBe(false);
    expect(builder.state).toBe('idle');
    expect(builder.orphans).toHaveLength(1);
    expect(builder.orphans[0]?.lineIndex).toBe(3);
    expect(builder.close()).toBeNull();
  });

  it('should refuse to open on a line without a date', () => {
    expect(() => builder.open(line('NO DATE HERE'))).toThrow(
      'Cannot open a transaction on a line without a leading date: "NO DATE HERE"'
    );
  });
});
