import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import path from 'path';
import { describe, test } from 'node:test';
import { headerMatches, parseCSV, parseCSVRecords, toCsv, toCsvLine, writeFileAtomic } from '../src/data/csv';
import { makeTempDir, removeDir } from './helpers';

describe('parseCSV', () => {
  test('reads quoted commas, doubled quotes and embedded newlines', () => {
    const table = parseCSV('title,count\n"Hello, world","say ""hi""\nagain"\n');
    assert.deepEqual(table.header, ['title', 'count']);
    assert.deepEqual(table.rows, [{ title: 'Hello, world', count: 'say "hi"\nagain' }]);
  });

  test('strips a byte order mark and ignores blank lines', () => {
    const table = parseCSV('\uFEFFa,b\r\n1,2\r\n\r\n3,4\n');
    assert.deepEqual(table.header, ['a', 'b']);
    assert.deepEqual(table.rows, [
      { a: '1', b: '2' },
      { a: '3', b: '4' },
    ]);
  });

  test('fills short records with empty strings', () => {
    const table = parseCSV('a,b,c\n1\n');
    assert.deepEqual(table.rows, [{ a: '1', b: '', c: '' }]);
  });

  test('returns an empty table for empty input', () => {
    assert.deepEqual(parseCSV(''), { header: [], rows: [] });
  });

  test('keeps a final record without a trailing newline', () => {
    assert.deepEqual(parseCSVRecords('a,b\n1,2'), [
      ['a', 'b'],
      ['1', '2'],
    ]);
  });
});

describe('toCsv', () => {
  test('quotes fields that need it and blanks undefined values', () => {
    const csv = toCsv(['a', 'b', 'c'], [{ a: 'x,y', b: 'say "hi"', c: undefined }]);
    assert.equal(csv, 'a,b,c\n"x,y","say ""hi""",\n');
  });

  test('writes numbers as plain text', () => {
    assert.equal(toCsvLine([1, 2.5, 'z']), '1,2.5,z');
  });

  test('round-trips a title with commas and quotes', () => {
    const title = 'Notes, "drafts" and\nmore';
    const table = parseCSV(toCsv(['title'], [{ title }]));
    assert.equal(table.rows[0].title, title);
  });
});

describe('headerMatches', () => {
  test('ignores column order', () => {
    assert.equal(headerMatches(['b', 'a'], ['a', 'b']), true);
  });

  test('rejects missing or extra columns', () => {
    assert.equal(headerMatches(['a'], ['a', 'b']), false);
    assert.equal(headerMatches(['a', 'c'], ['a', 'b']), false);
  });
});

describe('writeFileAtomic', () => {
  test('replaces the file contents', async () => {
    const dir = await makeTempDir();
    try {
      const file = path.join(dir, 'nested', 'out.csv');
      await writeFileAtomic(file, 'a\n');
      await writeFileAtomic(file, 'b\n');

      assert.equal(await fs.readFile(file, 'utf-8'), 'b\n');
      assert.deepEqual(await fs.readdir(path.dirname(file)), ['out.csv']);
    } finally {
      await removeDir(dir);
    }
  });

  test('removes its temp file when the rename fails', async () => {
    const dir = await makeTempDir();
    try {
      const target = path.join(dir, 'out.csv');
      await fs.mkdir(target);
      await fs.writeFile(path.join(target, 'keep.txt'), 'x', 'utf-8');

      await assert.rejects(writeFileAtomic(target, 'a\n'));
      assert.deepEqual(await fs.readdir(dir), ['out.csv']);
    } finally {
      await removeDir(dir);
    }
  });
});
