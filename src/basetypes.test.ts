import { describe, test, expect } from 'vitest';
import Decimal from 'decimal.js';
import { BASETYPES, canonicalUri, getBasetype } from './basetypes';
import { BASETYPE_NAMES } from './codec';
import { InvalidDescriptionError, InvalidLexicalValueError } from './errors';

describe('basetypes', () => {
  const roundTripping = BASETYPE_NAMES.filter((name) => name !== 'anyURI' && name !== 'hexBinary');

  test.each(roundTripping)('%s example survives parse then format', (name) => {
    const basetype = getBasetype(name);
    const codec = basetype.derive(undefined);
    expect(codec.format(codec.parse(basetype.example))).toBe(basetype.example);
  });

  test('every name has a registry entry of the same name', () => {
    for (const name of BASETYPE_NAMES) {
      expect(BASETYPES[name].name).toBe(name);
    }
  });

  test('only numeric, temporal and duration types are ordered', () => {
    const ordered = BASETYPE_NAMES.filter((name) => BASETYPES[name].ordered);
    for (const name of ordered) {
      expect(['numeric', 'temporal', 'duration']).toContain(BASETYPES[name].family);
    }
    expect(BASETYPES.string.ordered).toBe(false);
  });
});

describe('string family', () => {
  test('anyURI keeps the value as written and formats it canonically', () => {
    const codec = getBasetype('anyURI').derive(undefined);
    const value = codec.parse('HTTP://Example.COM/a%2fb');
    expect(value).toBe('HTTP://Example.COM/a%2fb');
    expect(codec.format(value)).toBe('http://example.com/a%2Fb');
  });

  test('canonicalUri leaves user info case alone', () => {
    expect(canonicalUri('http://User@Example.org/X')).toBe('http://User@example.org/X');
  });

  test('format is a regex anchored at both ends', () => {
    const codec = getBasetype('string').derive('[a-z]+');
    expect(codec.parse('abc')).toBe('abc');
    expect(() => codec.parse('abc1')).toThrow(InvalidLexicalValueError);
  });

  test('malformed regex fails when the codec is derived', () => {
    expect(() => getBasetype('string').derive('(')).toThrow(InvalidDescriptionError);
  });

  test('length counts code points', () => {
    const codec = getBasetype('string').derive(undefined);
    expect(codec.length?.('😀a')).toBe(2);
  });

  test('normalizedString and token normalize whitespace', () => {
    expect(getBasetype('normalizedString').derive(undefined).parse('a\tb\n')).toBe('a b');
    expect(getBasetype('token').derive(undefined).parse('  a   b ')).toBe('a b');
  });

  test('NMTOKEN and NCName check their lexical space', () => {
    expect(() => getBasetype('NMTOKEN').derive(undefined).parse('a b')).toThrow(InvalidLexicalValueError);
    expect(getBasetype('NCName').derive(undefined).parse('_x1')).toBe('_x1');
    expect(() => getBasetype('NCName').derive(undefined).parse('a:b')).toThrow(InvalidLexicalValueError);
    expect(getBasetype('Name').derive(undefined).parse('a:b')).toBe('a:b');
  });
});

describe('boolean', () => {
  test('defaults accept true/1 and false/0', () => {
    const codec = getBasetype('boolean').derive(undefined);
    expect(codec.parse('1')).toBe(true);
    expect(codec.parse('0')).toBe(false);
    expect(codec.format(true)).toBe('true');
  });

  test('format names the two tokens', () => {
    const codec = getBasetype('boolean').derive('yes|no');
    expect(codec.parse('yes')).toBe(true);
    expect(codec.format(false)).toBe('no');
    expect(() => codec.parse('true')).toThrow(InvalidLexicalValueError);
  });

  test('a format without two tokens is rejected', () => {
    expect(() => getBasetype('boolean').derive('yes')).toThrow(InvalidDescriptionError);
  });
});

describe('binary', () => {
  test('hexBinary renders uppercase', () => {
    const codec = getBasetype('hexBinary').derive(undefined);
    const value = codec.parse('ab0f');
    expect(value).toEqual(new Uint8Array([0xab, 0x0f]));
    expect(codec.format(value)).toBe('AB0F');
    expect(codec.length?.(value)).toBe(2);
  });

  test('base64 decoding is strict', () => {
    const codec = getBasetype('base64Binary').derive(undefined);
    expect(codec.parse('YWJj')).toEqual(new Uint8Array([0x61, 0x62, 0x63]));
    expect(() => codec.parse('YWJ')).toThrow(InvalidLexicalValueError);
  });
});

describe('numeric', () => {
  test('decimal keeps arbitrary precision', () => {
    const codec = getBasetype('decimal').derive(undefined);
    const value = codec.parse('0.1000000000000000000000001');
    expect(value).toBeInstanceOf(Decimal);
    expect(codec.format(value)).toBe('0.1000000000000000000000001');
  });

  test('scientific notation is not a decimal', () => {
    expect(() => getBasetype('decimal').derive(undefined).parse('1e5')).toThrow(InvalidLexicalValueError);
  });

  test('group and decimal characters are swapped in one pass', () => {
    const codec = getBasetype('decimal').derive({ groupChar: '.', decimalChar: ',' });
    const value = codec.parse('1.234,5');
    expect(String(value)).toBe('1234.5');
    expect(codec.format(value)).toBe('1.234,5');
  });

  test('percent and permille scale the value', () => {
    const codec = getBasetype('decimal').derive(undefined);
    expect(String(codec.parse('50%'))).toBe('0.5');
    expect(String(codec.parse('5‰'))).toBe('0.005');
  });

  test('a number pattern constrains and formats', () => {
    const codec = getBasetype('decimal').derive('#,##0.00');
    const value = codec.parse('1,234.50');
    expect(String(value)).toBe('1234.5');
    expect(codec.format(value)).toBe('1,234.50');
    expect(() => codec.parse('1234.50')).toThrow(InvalidLexicalValueError);
  });

  test('integers decode to bigint and check their range', () => {
    expect(getBasetype('integer').derive(undefined).parse('42')).toBe(42n);
    expect(getBasetype('unsignedByte').derive(undefined).parse('255')).toBe(255n);
    expect(() => getBasetype('unsignedByte').derive(undefined).parse('256')).toThrow(
      'invalid lexical value for unsignedByte: 256 (must be an integer between 0 and 255)'
    );
    expect(() => getBasetype('byte').derive(undefined).parse('-129')).toThrow(InvalidLexicalValueError);
    expect(() => getBasetype('positiveInteger').derive(undefined).parse('0')).toThrow(InvalidLexicalValueError);
  });

  test('integers reject fractions', () => {
    expect(() => getBasetype('integer').derive(undefined).parse('1.5')).toThrow(
      'invalid lexical value for integer: 1.5 (not an integer)'
    );
  });

  test('doubles accept exponents and the special values', () => {
    const codec = getBasetype('double').derive(undefined);
    expect(codec.parse('1.5E3')).toBe(1500);
    expect(codec.parse('-INF')).toBe(-Infinity);
    expect(Number.isNaN(codec.parse('NaN'))).toBe(true);
    expect(codec.format(Infinity)).toBe('INF');
  });

  test('numbers compare across representations', () => {
    const codec = getBasetype('integer').derive(undefined);
    expect(codec.compare?.(2n, new Decimal('1.5'))).toBe(1);
  });
});

describe('json', () => {
  test('parses and dumps', () => {
    const codec = getBasetype('json').derive(undefined);
    expect(codec.parse('{"a": [1, 2]}')).toEqual({ a: [1, 2] });
    expect(() => codec.parse('{')).toThrow(InvalidLexicalValueError);
  });

  test('an object format is a JSON Schema', () => {
    const codec = getBasetype('json').derive('{"type": "object", "required": ["a"]}');
    expect(codec.parse('{"a": 1}')).toEqual({ a: 1 });
    expect(() => codec.parse('{}')).toThrow(InvalidLexicalValueError);
  });

  test('any other format is a regex over the text', () => {
    const codec = getBasetype('json').derive('\\[.*\\]');
    expect(codec.parse('[1]')).toEqual([1]);
    expect(() => codec.parse('{}')).toThrow(InvalidLexicalValueError);
  });
});
