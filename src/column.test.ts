import { describe, test, expect } from 'vitest';
import { Column } from './column';
import { InvalidDescriptionError, MissingRequiredValueError } from './errors';
import { Schema } from './schema';

describe('Column headers', () => {
  test('name wins over titles', () => {
    expect(Column.fromValue({ name: 'id', titles: 'Identifier' }, undefined, 1).header).toBe('id');
  });

  test('falls back to the first title, then to the position', () => {
    expect(Column.fromValue({ titles: 'Full Name' }, undefined, 2).header).toBe('Full Name');
    expect(Column.fromValue({ titles: { de: 'Name' } }, undefined, 2).header).toBe('Name');
    expect(Column.fromValue({}, undefined, 3).header).toBe('_col.3');
  });

  test('a plain string is a column name', () => {
    expect(Column.fromValue('price', undefined, 1).name).toBe('price');
  });

  test('names must be usable as template variables', () => {
    expect(() => Column.fromValue({ name: 'a b' }, undefined, 1)).toThrow('Invalid column name "a b"');
  });
});

describe('Column.read', () => {
  test('decodes through the datatype', () => {
    const column = Column.fromValue({ name: 'n', datatype: 'integer' }, undefined, 1);
    expect(column.read('42')).toBe(42n);
  });

  test('null tokens read as null', () => {
    const column = Column.fromValue({ name: 'n', datatype: 'integer', null: ['NA', '-'] }, undefined, 1);
    expect(column.read('NA')).toBeNull();
    expect(column.read('-')).toBeNull();
  });

  test('"null": null means nothing is null', () => {
    const column = Column.fromValue({ name: 'n', null: null }, undefined, 1);
    expect(column.read('')).toBe('');
  });

  test('empty cells take the default', () => {
    const column = Column.fromValue({ name: 'n', default: 'x' }, undefined, 1);
    expect(column.read('')).toBe('x');
  });

  test('required cells must not be null', () => {
    const column = Column.fromValue({ name: 'n', required: true }, undefined, 1);
    expect(() => column.read('')).toThrow(MissingRequiredValueError);
    const result = column.tryRead('');
    expect(result.ok).toBe(false);
  });

  test('invalid values come back as a failed result', () => {
    const column = Column.fromValue({ name: 'n', datatype: 'integer' }, undefined, 1);
    const result = column.tryRead('x');
    expect(result.ok ? undefined : result.error.message).toBe('invalid lexical value for integer: x');
  });

  test('a separator makes a list', () => {
    const column = Column.fromValue({ name: 'n', datatype: 'integer', separator: ';', null: 'nn' }, undefined, 1);
    expect(column.read('1;nn;3')).toEqual([1n, null, 3n]);
    expect(column.read('')).toEqual([]);
    expect(column.read('nn')).toBeNull();
  });

  test('an empty list is not a missing value', () => {
    const column = Column.fromValue({ name: 'x', separator: ';', required: true }, undefined, 1);
    expect(column.read('')).toEqual([]);
    expect(() => column.read('')).not.toThrow();
  });
});

describe('inheritance', () => {
  const schema = Schema.fromValue(
    { datatype: 'integer', null: 'NA', columns: ['a', { name: 'b', datatype: 'string' }] },
    undefined
  );

  test('columns take what they do not set from the schema', () => {
    const [a] = schema.columns;
    expect(a.read('5')).toBe(5n);
    expect(a.read('NA')).toBeNull();
  });

  test('a column setting a property overrides its schema', () => {
    const b = schema.columns[1];
    expect(b.read('5')).toBe('5');
    expect(b.read('NA')).toBeNull();
  });

  test('unset everywhere means the default', () => {
    expect(schema.columns[0].inherit('separator')).toBeUndefined();
    expect(schema.columns[0].inherit('lang')).toBe('und');
  });
});

describe('Column.write', () => {
  test('null renders as the first null token', () => {
    const column = Column.fromValue({ name: 'n', datatype: 'integer', null: ['NA', ''] }, undefined, 1);
    expect(column.write(null)).toBe('NA');
    expect(column.write(7n)).toBe('7');
  });

  test('lists are joined on the separator', () => {
    const column = Column.fromValue({ name: 'n', datatype: 'integer', separator: ';', null: 'nn' }, undefined, 1);
    expect(column.write([1n, null, 3n])).toBe('1;nn;3');
    expect(column.write([])).toBe('');
    expect(column.write(null)).toBe('nn');
  });

  test('json lists are values, not lists of cells', () => {
    const column = Column.fromValue({ name: 'j', datatype: 'json' }, undefined, 1);
    expect(column.write([1, 2])).toBe('[1,2]');
  });

  test('other lists need a separator', () => {
    const column = Column.fromValue({ name: 'n', datatype: 'integer' }, undefined, 1);
    expect(() => column.write([1n])).toThrow(InvalidDescriptionError);
  });
});

describe('Column.toJSON', () => {
  test('writes back what was set', () => {
    const column = Column.fromValue(
      { name: 'a', titles: 'A', datatype: 'integer', required: true, virtual: false },
      undefined,
      1
    );
    expect(column.toJSON()).toEqual({ name: 'a', titles: 'A', datatype: 'integer', required: true });
  });
});
