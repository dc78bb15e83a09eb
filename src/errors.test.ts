import { describe, test, expect } from 'vitest';
import {
  CellError,
  CsvwError,
  InvalidDescriptionError,
  InvalidLexicalValueError,
  MissingRequiredValueError,
  attempt,
  logOrRaise,
  unwrap,
} from './errors';
import { CollectingLog, silentLog } from './logger';

describe('errors', () => {
  test('carry their class name', () => {
    const error = new InvalidDescriptionError('bad');
    expect(error.name).toBe('InvalidDescriptionError');
    expect(error).toBeInstanceOf(CsvwError);
  });

  test('cell errors say where', () => {
    const error = new CellError('t.csv', 3, 2, 'price', new InvalidLexicalValueError('decimal', 'abc'));
    expect(error.message).toBe('t.csv:3:2 price: invalid lexical value for decimal: abc');
    expect(error.violation).toBeInstanceOf(InvalidLexicalValueError);
  });
});

describe('attempt', () => {
  test('turns cell-level failures into results', () => {
    const result = attempt(() => {
      throw new MissingRequiredValueError();
    });
    expect(result.ok).toBe(false);
    expect(() => unwrap(result)).toThrow('required column value is missing');
  });

  test('lets everything else through', () => {
    expect(() =>
      attempt(() => {
        throw new InvalidDescriptionError('bad');
      })
    ).toThrow(InvalidDescriptionError);
  });

  test('passes values on', () => {
    expect(unwrap(attempt(() => 42))).toBe(42);
  });
});

describe('logOrRaise', () => {
  test('logs when given a sink', () => {
    const log = new CollectingLog();
    logOrRaise(new CsvwError('first'), log);
    logOrRaise(new CsvwError('second'), silentLog);
    expect(log.messages).toEqual(['first']);
  });

  test('throws otherwise', () => {
    expect(() => logOrRaise(new CsvwError('boom'))).toThrow('boom');
  });
});
