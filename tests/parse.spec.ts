import { describe, it, expect } from 'vitest';
import { parseBoolean, parseDecimal, parseInteger, parseString, pick } from '../src/adapters/parse';

describe('parseDecimal', () => {
  it('passes finite numbers through', () => {
    expect(parseDecimal(187.25)).toBe(187.25);
    expect(parseDecimal(-3)).toBe(-3);
  });

  it('strips currency prefixes and thousands separators', () => {
    expect(parseDecimal('C1,234.50')).toBe(1234.5);
    expect(parseDecimal('$99.10')).toBe(99.1);
    expect(parseDecimal('-0.42%')).toBe(-0.42);
  });

  it('unwraps amount and value wrappers', () => {
    expect(parseDecimal({ amount: 1000, currency: 'USD' })).toBe(1000);
    expect(parseDecimal({ value: '25.5' })).toBe(25.5);
    expect(parseDecimal({ currency: 'USD' })).toBeNull();
  });

  it('returns null for empty markers and missing values', () => {
    for (const v of ['', '  ', '-', 'N/A', 'na', null, undefined]) {
      expect(parseDecimal(v)).toBeNull();
    }
  });

  it('returns null for values that do not clean up into a number', () => {
    expect(parseDecimal('1-2')).toBeNull();
    expect(parseDecimal(true)).toBeNull();
    expect(parseDecimal([1])).toBeNull();
  });
});

describe('parseInteger', () => {
  it('accepts integers and integer strings only', () => {
    expect(parseInteger(265598)).toBe(265598);
    expect(parseInteger(' 42 ')).toBe(42);
    expect(parseInteger(4.5)).toBeNull();
    expect(parseInteger('4.5')).toBeNull();
    expect(parseInteger(null)).toBeNull();
  });
});

describe('parseString', () => {
  it('stringifies numbers and unwraps value wrappers', () => {
    expect(parseString('U1234567')).toBe('U1234567');
    expect(parseString(12)).toBe('12');
    expect(parseString({ value: 'INDIVIDUAL' })).toBe('INDIVIDUAL');
    expect(parseString(false)).toBeNull();
  });
});

describe('parseBoolean', () => {
  it('reads booleans, boolean strings and wrappers', () => {
    expect(parseBoolean(true)).toBe(true);
    expect(parseBoolean('FALSE')).toBe(false);
    expect(parseBoolean({ value: 'true' })).toBe(true);
    expect(parseBoolean('yes')).toBeNull();
  });
});

describe('pick', () => {
  it('returns the first present key', () => {
    expect(pick({ '31': '101.5', last: 99 }, '31', 'last')).toBe('101.5');
    expect(pick({ last: 99 }, '31', 'last')).toBe(99);
    expect(pick({}, '31', 'last')).toBeUndefined();
  });
});
