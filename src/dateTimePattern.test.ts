import { describe, test, expect } from 'vitest';
import { compileDateTimePattern, formatOffset, formatWithPattern, parseWithPattern } from './dateTimePattern';
import { DateTimeValue } from './dateTimeValue';
import { InvalidDescriptionError } from './errors';

function parse(pattern: string, text: string, kind: 'date' | 'time' | 'datetime' = 'datetime'): DateTimeValue {
  const result = parseWithPattern(compileDateTimePattern(pattern), text, kind);
  if (!result.ok) {
    throw new Error(result.reason);
  }
  return result.value;
}

describe('compileDateTimePattern', () => {
  test('splits date, time and timezone', () => {
    const pattern = compileDateTimePattern('yyyy-MM-dd HH:mm XXX');
    expect(pattern.hasDate).toBe(true);
    expect(pattern.hasTime).toBe(true);
    expect(pattern.tzMarker).toBe('XXX');
  });

  test('a bare date pattern has no time', () => {
    const pattern = compileDateTimePattern('dd.MM.yyyy');
    expect(pattern.hasDate).toBe(true);
    expect(pattern.hasTime).toBe(false);
    expect(pattern.tzMarker).toBeUndefined();
  });

  test('a bare time pattern has no date', () => {
    const pattern = compileDateTimePattern('HHmm');
    expect(pattern.hasDate).toBe(false);
    expect(pattern.hasTime).toBe(true);
  });

  test('rejects unsupported shapes', () => {
    expect(() => compileDateTimePattern('yyyy/MM-dd')).toThrow(InvalidDescriptionError);
    expect(() => compileDateTimePattern('HH:mm:ss.ff')).toThrow(
      'Invalid date/time format pattern "HH:mm:ss.ff": fractional seconds must be written as S characters'
    );
    expect(() => compileDateTimePattern('HH:mm xX')).toThrow(InvalidDescriptionError);
    expect(() => compileDateTimePattern('yyyy-MM-dd HH:mm HH:mm')).toThrow(InvalidDescriptionError);
  });
});

describe('parseWithPattern', () => {
  test('reads every field', () => {
    const value = parse('yyyy-MM-dd HH:mm XXX', '2024-01-31 10:15 +05:30');
    expect(value.year).toBe(2024);
    expect(value.month).toBe(1);
    expect(value.day).toBe(31);
    expect(value.hour).toBe(10);
    expect(value.minute).toBe(15);
    expect(value.second).toBe(0);
    expect(value.offset).toBe(330);
  });

  test('non-padded tokens take one or two digits', () => {
    const value = parse('d-M-yyyy', '5-11-2020', 'date');
    expect(value.toString()).toBe('2020-11-05');
  });

  test('fractional seconds are optional but bounded', () => {
    const pattern = compileDateTimePattern('HH:mm:ss.SS');
    expect(parseWithPattern(pattern, '12:00:00', 'time').ok).toBe(true);
    expect(parseWithPattern(pattern, '12:00:00.123', 'time')).toEqual({
      ok: false,
      reason: 'more fractional digits than HH:mm:ss.SS allows',
    });
  });

  test('calendar dates are checked', () => {
    const result = parseWithPattern(compileDateTimePattern('yyyy-MM-dd'), '2024-02-30', 'date');
    expect(result).toEqual({ ok: false, reason: 'day 30 out of range' });
    expect(parseWithPattern(compileDateTimePattern('yyyy-MM-dd'), '2024-02-29', 'date').ok).toBe(true);
  });

  test('padded tokens need both digits', () => {
    const pattern = compileDateTimePattern('yyyy-MM-dd');
    expect(parseWithPattern(pattern, '2024-01-31', 'date').ok).toBe(true);
    expect(parseWithPattern(pattern, '2024-1-31', 'date').ok).toBe(false);
  });

  test('text that does not match the shape is rejected', () => {
    const result = parseWithPattern(compileDateTimePattern('dd.MM.yyyy'), '2024-01-31', 'date');
    expect(result).toEqual({ ok: false, reason: 'does not match dd.MM.yyyy' });
  });

  test('without a marker an ISO offset may still follow', () => {
    const value = parse("yyyy-MM-ddTHH:mm:ss", '2024-01-31T10:15:00+01:00');
    expect(value.offset).toBe(60);
  });
});

describe('formatWithPattern', () => {
  test('round-trips a zoned value', () => {
    const pattern = compileDateTimePattern('yyyy-MM-dd HH:mm XXX');
    expect(formatWithPattern(pattern, parse('yyyy-MM-dd HH:mm XXX', '2024-01-31 10:15 +05:30'))).toBe(
      '2024-01-31 10:15 +05:30'
    );
  });

  test('formatting what was parsed gives text that parses the same', () => {
    const pattern = compileDateTimePattern('d.M.yyyy HH:mm');
    const first = formatWithPattern(pattern, parse('d.M.yyyy HH:mm', '05.3.2024 07:09'));
    expect(first).toBe('5.3.2024 07:09');
    expect(formatWithPattern(pattern, parse('d.M.yyyy HH:mm', first))).toBe(first);
  });

  test('pads fractional seconds to the pattern width', () => {
    const pattern = compileDateTimePattern('HH:mm:ss.SS');
    expect(formatWithPattern(pattern, parse('HH:mm:ss.SS', '12:00:00.1', 'time'))).toBe('12:00:00.10');
  });

  test('writes the ISO offset when the pattern has no marker', () => {
    const pattern = compileDateTimePattern('yyyy-MM-ddTHH:mm:ss');
    expect(formatWithPattern(pattern, parse('yyyy-MM-ddTHH:mm:ss', '2024-01-31T10:15:00-02:30'))).toBe(
      '2024-01-31T10:15:00-02:30'
    );
  });
});

describe('formatOffset', () => {
  test.each([
    ['X', 0, 'Z'],
    ['x', 0, '+00'],
    ['X', 330, '+0530'],
    ['X', 120, '+02'],
    ['XX', -120, '-0200'],
    ['xxx', 0, '+00:00'],
    ['XXX', -570, '-09:30'],
  ] as const)('%s with %i minutes', (marker, offset, expected) => {
    expect(formatOffset(marker, offset)).toBe(expected);
  });
});

describe('DateTimeValue', () => {
  test('compares by instant across offsets', () => {
    const a = parse('yyyy-MM-ddTHH:mm:ss', '2024-01-01T10:00:00+01:00');
    const b = parse('yyyy-MM-ddTHH:mm:ss', '2024-01-01T09:00:00Z');
    expect(a.compareTo(b)).toBe(0);
    expect(a.equals(b)).toBe(true);
  });

  test('fractional digits break ties', () => {
    const a = parse('HH:mm:ss.SSS', '12:00:00.5', 'time');
    const b = parse('HH:mm:ss.SSS', '12:00:00.45', 'time');
    expect(a.compareTo(b)).toBe(1);
  });
});
