import { describe, it, expect } from 'vitest';
import { Decimal } from 'decimal.js';
import { parseCommaDecimal, formatDecimal } from '@rekening/types';

describe('parseCommaDecimal', () => {
  it('should parse "-25,00" to exactly -25.00', () => {
    const value = parseCommaDecimal('-25,00');
    expect(value.equals(new Decimal('-25'))).toBe(true);
    expect(formatDecimal(value)).toBe('-25.00');
  });

  it('should keep every decimal digit', () => {
    expect(parseCommaDecimal('9427,00').toString()).toBe('9427');
    expect(parseCommaDecimal('0,125').toString()).toBe('0.125');
    expect(parseCommaDecimal('+123,01').toString()).toBe('123.01');
  });

  it('should accept whole numbers', () => {
    expect(parseCommaDecimal('15').toString()).toBe('15');
  });

  it('should throw on invalid input', () => {
    expect(() => parseCommaDecimal('12.50')).toThrow('Unable to parse amount');
    expect(() => parseCommaDecimal('1.234,56')).toThrow('Unable to parse amount');
    expect(() => parseCommaDecimal('')).toThrow('Unable to parse amount');
    expect(() => parseCommaDecimal('abc')).toThrow('Unable to parse amount');
  });
});

describe('formatDecimal', () => {
  it('should write at least two decimals', () => {
    expect(formatDecimal(new Decimal('1234.5'))).toBe('1234.50');
    expect(formatDecimal(new Decimal('7'))).toBe('7.00');
  });

  it('should never round away precision', () => {
    expect(formatDecimal(new Decimal('0.125'))).toBe('0.125');
    expect(formatDecimal(new Decimal('1.07563'))).toBe('1.07563');
  });
});

