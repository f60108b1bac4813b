import { describe, it, expect } from 'vitest';
import {
  compileDatePattern,
  matchDateToken,
  findAmounts,
  splitAmountColumns,
} from '../../src/parsers/line-fields.js';

describe('line-fields', () => {
  describe('matchDateToken', () => {
    const pattern = compileDatePattern();

    it('should split the leading date token from the rest of the line', () => {
      expect(matchDateToken('03/14 AMAZON.COM -42.10 1,523.67', pattern)).toEqual({
        date: '03/14',
        rest: 'AMAZON.COM -42.10 1,523.67',
      });
    });

    it('should ignore leading whitespace', () => {
      expect(matchDateToken('   12/31 NETFLIX.COM', pattern)?.date).toBe('12/31');
    });

    it('should accept a date with nothing after it', () => {
      expect(matchDateToken('01/02', pattern)).toEqual({ date: '01/02', rest: '' });
    });

    it('should only match at the start of the line', () => {
      expect(matchDateToken('Beginning Balance 03/01', pattern)).toBeNull();
      expect(matchDateToken('3/14 SHORT DATE', pattern)).toBeNull();
      expect(matchDateToken('03/14/2024 FULL DATE', pattern)).toBeNull();
    });

    it('should use capture group 1 of a custom pattern', () => {
      const fullDate = compileDatePattern('^(\\d{2}/\\d{2}/\\d{4})\\s');
      expect(matchDateToken('03/14/2024 FULL DATE', fullDate)).toEqual({ date: '03/14/2024', rest: 'FULL DATE' });
    });

    it('should drop global flags from a RegExp pattern', () => {
      const compiled = compileDatePattern(/^(\d{2}\/\d{2})\s/g);
      expect(compiled.flags).toBe('');
      expect(matchDateToken('03/14 A', compiled)?.date).toBe('03/14');
      expect(matchDateToken('03/15 B', compiled)?.date).toBe('03/15');
    });
  });

  describe('findAmounts', () => {
    it('should find signed and comma-grouped amounts with their offsets', () => {
      expect(findAmounts('AMAZON -42.10 1,523.67')).toEqual([
        { value: '-42.10', index: 7 },
        { value: '1,523.67', index: 14 },
      ]);
    });

    it('should read ungrouped thousands as one amount', () => {
      expect(findAmounts('1523.67')).toEqual([{ value: '1523.67', index: 0 }]);
    });

    it('should ignore numbers without cents', () => {
      expect(findAmounts('REF 12345 ON 03/14')).toEqual([]);
      expect(findAmounts('PAYMENT 1.5')).toEqual([]);
    });
  });

  describe('splitAmountColumns', () => {
    it('should take the last two amounts as amount and balance', () => {
      expect(splitAmountColumns('AMAZON.COM MKTPLACE PMTS -42.10 1,523.67')).toEqual({
        description: 'AMAZON.COM MKTPLACE PMTS',
        amount: '-42.10',
        balance: '1,523.67',
      });
    });

    it('should treat a single amount as the balance', () => {
      expect(splitAmountColumns('INTEREST PAID 0.12')).toEqual({
        description: 'INTEREST PAID',
        amount: null,
        balance: '0.12',
      });
    });

    it('should return the whole text when there are no amounts', () => {
      expect(splitAmountColumns('  COFFEE SHOP  ')).toEqual({
        description: 'COFFEE SHOP',
        amount: null,
        balance: null,
      });
    });

    it('should keep extra amount columns out of the description', () => {
      expect(splitAmountColumns('FX 12.00 EUR 13.05 -13.05 900.00')).toEqual({
        description: 'FX 12.00 EUR',
        amount: '-13.05',
        balance: '900.00',
      });
    });
  });
});
