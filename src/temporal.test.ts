import { describe, test, expect } from 'vitest';
import { getBasetype } from './basetypes';
import { Duration } from './duration';
import { InvalidDescriptionError, InvalidLexicalValueError } from './errors';

describe('date and time basetypes', () => {
  test('date reads yyyy-MM-dd by default', () => {
    const codec = getBasetype('date').derive(undefined);
    expect(String(codec.parse('2012-12-01'))).toBe('2012-12-01');
    expect(() => codec.parse('2024-02-30')).toThrow('invalid lexical value for date: 2024-02-30 (day 30 out of range)');
  });

  test('date with a pattern renders with the same pattern', () => {
    const codec = getBasetype('date').derive('dd.MM.yyyy');
    const value = codec.parse('31.01.2024');
    expect(String(value)).toBe('2024-01-31');
    expect(codec.format(value)).toBe('31.01.2024');
  });

  test('patterns must fit the kind', () => {
    expect(() => getBasetype('date').derive('HH:mm')).toThrow('date format must be a date pattern: HH:mm');
    expect(() => getBasetype('time').derive('yyyy-MM-dd')).toThrow(InvalidDescriptionError);
    expect(() => getBasetype('datetime').derive('HH:mm')).toThrow(InvalidDescriptionError);
  });

  test('datetime without a pattern is ISO 8601', () => {
    const codec = getBasetype('datetime').derive(undefined);
    expect(codec.format(codec.parse('2024-01-31T10:15:00.250+01:00'))).toBe('2024-01-31T10:15:00.250+01:00');
    expect(() => codec.parse('2024-01-31 10:15:00')).toThrow(InvalidLexicalValueError);
  });

  test('dateTimeStamp needs a timezone', () => {
    const codec = getBasetype('dateTimeStamp').derive(undefined);
    expect(() => codec.parse('2012-12-01T12:30:00')).toThrow(
      'invalid lexical value for dateTimeStamp: 2012-12-01T12:30:00 (timezone required)'
    );
    expect(() => getBasetype('dateTimeStamp').derive('yyyy-MM-ddTHH:mm:ss')).toThrow(InvalidDescriptionError);
  });

  test('time with a zone marker', () => {
    const codec = getBasetype('time').derive('HH:mm X');
    expect(codec.format(codec.parse('09:30 +0200'))).toBe('09:30 +02');
    expect(codec.format(codec.parse('09:30 Z'))).toBe('09:30 Z');
  });

  test('values order by instant', () => {
    const codec = getBasetype('datetime').derive(undefined);
    const earlier = codec.parse('2024-01-01T10:00:00+02:00');
    const later = codec.parse('2024-01-01T09:00:00Z');
    expect(codec.compare?.(earlier, later)).toBe(-1);
  });
});

describe('durations', () => {
  test('keep the components they were written with', () => {
    const codec = getBasetype('duration').derive(undefined);
    expect(codec.format(codec.parse('PT60M'))).toBe('PT60M');
    expect(codec.format(codec.parse('-P1D'))).toBe('-P1D');
  });

  test('reject empty designators', () => {
    expect(Duration.parse('P')).toBeUndefined();
    expect(Duration.parse('P1DT')).toBeUndefined();
    expect(Duration.parse('P1D')?.components).toEqual(['days']);
  });

  test('restricted duration types reject other components', () => {
    expect(() => getBasetype('dayTimeDuration').derive(undefined).parse('P1Y')).toThrow(
      'invalid lexical value for dayTimeDuration: P1Y (years not allowed)'
    );
    expect(() => getBasetype('yearMonthDuration').derive(undefined).parse('P1Y2D')).toThrow(
      'invalid lexical value for yearMonthDuration: P1Y2D (days not allowed)'
    );
  });

  test('compare approximately', () => {
    const codec = getBasetype('duration').derive(undefined);
    expect(codec.compare?.(codec.parse('P1M'), codec.parse('P31D'))).toBe(-1);
    expect(codec.compare?.(codec.parse('P1D'), codec.parse('PT24H'))).toBe(0);
    expect(codec.compare?.(codec.parse('P1Y'), codec.parse('P365D'))).toBe(1);
  });

  test('a format regex is checked first', () => {
    const codec = getBasetype('duration').derive('P[0-9]+D');
    expect(String(codec.parse('P3D'))).toBe('P3D');
    expect(() => codec.parse('PT3H')).toThrow('invalid lexical value for duration: PT3H (does not match ^(?:P[0-9]+D)$)');
  });
});
