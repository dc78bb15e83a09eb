import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { type CliIo, createProgram } from './cli';

describe('CLI', () => {
  let tempDir: string;
  let lines: string[];
  let exitCodes: number[];
  let io: CliIo;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-test-'));
    lines = [];
    exitCodes = [];
    io = {
      write: (line) => lines.push(line),
      fail: (exitCode) => exitCodes.push(exitCode),
    };
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeGroup(a: string, b: string, resource = 'a.csv'): string {
    fs.writeFileSync(path.join(tempDir, 'a.csv'), a);
    fs.writeFileSync(path.join(tempDir, 'b.csv'), b);
    const metadata = {
      tables: [
        { url: 'a.csv', tableSchema: { columns: [{ name: 'id', datatype: 'integer' }], primaryKey: 'id' } },
        {
          url: 'b.csv',
          tableSchema: {
            columns: [{ name: 'ref', datatype: 'integer' }],
            foreignKeys: [{ columnReference: 'ref', reference: { resource, columnReference: 'id' } }],
          },
        },
      ],
    };
    const file = path.join(tempDir, 'metadata.json');
    fs.writeFileSync(file, JSON.stringify(metadata));
    return file;
  }

  function run(...args: string[]): void {
    createProgram(io).parse(args, { from: 'user' });
  }

  describe('validate', () => {
    test('reports a valid group', () => {
      const file = writeGroup('id\n1\n2\n', 'ref\n2\n');
      run('validate', file);
      expect(lines).toEqual([`${file}: valid`]);
      expect(exitCodes).toEqual([]);
    });

    test('counts violations and exits with 1', () => {
      const file = writeGroup('id\n1\n', 'ref\n1\n2\n');
      run('validate', file);
      expect(lines).toEqual([`${file}: 1 violation(s)`]);
      expect(exitCodes).toEqual([1]);
    });

    test('counts duplicate primary keys', () => {
      const file = writeGroup('id\n1\n1\n', 'ref\n1\n');
      run('validate', file);
      expect(lines).toEqual([`${file}: 1 violation(s)`]);
      expect(exitCodes).toEqual([1]);
    });

    test('a bad cell counts once however often its table is read', () => {
      const file = writeGroup('id\n1\nx\n', 'ref\n1\ny\n');
      run('validate', file);
      expect(lines).toEqual([`${file}: 2 violation(s)`]);
      expect(exitCodes).toEqual([1]);
    });

    test('exits with 2 when the description itself is broken', () => {
      const file = writeGroup('id\n1\n', 'ref\n1\n', 'c.csv');
      run('validate', file);
      expect(lines).toEqual([`${file}: b.csv references unknown table c.csv`]);
      expect(exitCodes).toEqual([2]);
    });
  });

  describe('rows', () => {
    test('prints every table as JSON lines', () => {
      const file = writeGroup('id\n1\n2\n', 'ref\n2\n');
      run('rows', file);
      expect(lines).toEqual(['{"id":"1"}', '{"id":"2"}', '{"ref":"2"}']);
    });

    test('prints one table', () => {
      const file = writeGroup('id\n1\n', 'ref\n1\n');
      run('rows', file, '--table', 'b.csv');
      expect(lines).toEqual(['{"ref":"1"}']);
    });

    test('rejects unknown tables', () => {
      const file = writeGroup('id\n1\n', 'ref\n1\n');
      expect(() => run('rows', file, '-t', 'c.csv')).toThrow('No table c.csv; known tables: a.csv, b.csv');
    });
  });
});
