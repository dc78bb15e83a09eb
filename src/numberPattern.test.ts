import { describe, test, expect } from 'vitest';
import Decimal from 'decimal.js';
import { NumberPattern } from './numberPattern';
import { InvalidDescriptionError } from './errors';

describe('NumberPattern', () => {
  test('reads grouping and digit counts', () => {
    const pattern = new NumberPattern('#,##0.00');
    expect(pattern.primaryGroupingSize).toBe(3);
    expect(pattern.secondaryGroupingSize).toBe(3);
    expect(pattern.minDigitsBeforeDecimalPoint).toBe(1);
    expect(pattern.decimalDigits).toBe(2);
    expect(pattern.significantDecimalDigits).toBe(2);
    expect(pattern.exponentDigits).toBe(0);
  });

  test('secondary grouping may differ from primary', () => {
    const pattern = new NumberPattern('#,##,##0.###');
    expect(pattern.primaryGroupingSize).toBe(3);
    expect(pattern.secondaryGroupingSize).toBe(2);
  });

  test('rejects malformed patterns', () => {
    expect(() => new NumberPattern('#;#;#')).toThrow(InvalidDescriptionError);
    expect(() => new NumberPattern('abc')).toThrow('Invalid number pattern "abc": no digit placeholder');
  });
});

describe('NumberPattern.isValid', () => {
  const grouped = new NumberPattern('#,##0.00');

  test.each([
    ['1,234.50', true],
    ['0.00', true],
    ['1234.50', false],
    ['1,23.50', false],
    ['1,234.5', false],
    ['1,234.500', false],
  ])('#,##0.00 against %s', (text, expected) => {
    expect(grouped.isValid(text)).toBe(expected);
  });

  test('checks every secondary group', () => {
    const indian = new NumberPattern('#,##,##0.###');
    expect(indian.isValid('12,34,567.5')).toBe(true);
    expect(indian.isValid('1234,567')).toBe(false);
    expect(indian.isValid('1,234,567')).toBe(false);
  });

  test('limits exponent digits', () => {
    const scientific = new NumberPattern('0.###E0');
    expect(scientific.isValid('1.5E3')).toBe(true);
    expect(scientific.isValid('1.5E12')).toBe(false);
  });
});

describe('NumberPattern.format', () => {
  test('groups and pads', () => {
    const pattern = new NumberPattern('#,##0.00');
    expect(pattern.format(new Decimal('1234.5'))).toBe('1,234.50');
    expect(pattern.format(new Decimal('-1234.5'))).toBe('-1,234.50');
    expect(pattern.format(new Decimal('0'))).toBe('0.00');
  });

  test('rounds half to even', () => {
    const pattern = new NumberPattern('0.00');
    expect(pattern.format(new Decimal('2.345'))).toBe('2.34');
    expect(pattern.format(new Decimal('2.355'))).toBe('2.36');
  });

  test('drops optional trailing zeros', () => {
    expect(new NumberPattern('#.##').format(new Decimal('0.5'))).toBe('.5');
    expect(new NumberPattern('#,##,##0.###').format(new Decimal('1234567.5'))).toBe('12,34,567.5');
  });

  test('scales percentages', () => {
    expect(new NumberPattern('#0%').format(new Decimal('0.25'))).toBe('25%');
  });

  test('uses the explicit negative sub-pattern', () => {
    expect(new NumberPattern('#0.0;(#0.0)').format(new Decimal('-1.5'))).toBe('(1.5)');
  });

  test('writes scientific notation', () => {
    expect(new NumberPattern('0.###E0').format(new Decimal('12345'))).toBe('1.234E4');
  });
});
