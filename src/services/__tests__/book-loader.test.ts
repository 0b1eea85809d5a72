import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BookLoadError, loadBooks, parseBookLine, parseBooks } from '../book-loader.js';
import { captureLogger } from '../../__tests__/helpers.js';

describe('parseBookLine', () => {
  it('should read a plain book object', () => {
    const record = parseBookLine('{"name":"The Hobbit","author":"J.R.R. Tolkien","pages":"310"}');

    expect(record).toEqual({
      name: 'The Hobbit',
      author: 'J.R.R. Tolkien',
      language: null,
      genre: null,
      publisher: null,
      release_date: null,
      media_type: null,
      pages: '310',
      isbn: null,
    });
  });

  it('should take the book from a [key, book] pair', () => {
    const record = parseBookLine('["The_Hobbit", {"name":"The Hobbit","language":"English"}]');

    expect(record?.name).toBe('The Hobbit');
    expect(record?.language).toBe('English');
  });

  it('should store numeric pages as text', () => {
    expect(parseBookLine('{"pages": 412}')?.pages).toBe('412');
  });

  it('should null out values that are neither strings nor numbers', () => {
    const record = parseBookLine('{"name": ["a", "b"], "author": {"first": "x"}, "isbn": true, "genre": null}');

    expect(record?.name).toBeNull();
    expect(record?.author).toBeNull();
    expect(record?.isbn).toBeNull();
    expect(record?.genre).toBeNull();
  });

  it('should drop keys that are not book fields', () => {
    const record = parseBookLine('{"name": "X", "infobox": "book"}');
    expect(record).not.toBeNull();
    expect(Object.keys(record ?? {})).toEqual([
      'name', 'author', 'language', 'genre', 'publisher', 'release_date', 'media_type', 'pages', 'isbn',
    ]);
  });

  it('should return null for invalid JSON', () => {
    expect(parseBookLine('{"name": "unterminated')).toBeNull();
  });

  it('should return null for JSON that is not book-shaped', () => {
    expect(parseBookLine('42')).toBeNull();
    expect(parseBookLine('"just a string"')).toBeNull();
    expect(parseBookLine('["only-a-key"]')).toBeNull();
    expect(parseBookLine('["key", "not an object"]')).toBeNull();
  });

  it('should return a frozen record', () => {
    expect(Object.isFrozen(parseBookLine('{"name":"X"}'))).toBe(true);
  });
});

describe('parseBooks', () => {
  it('should keep valid lines in order and count malformed ones', () => {
    const text = [
      '{"name":"A"}',
      'not json',
      '["k", {"name":"B"}]',
      '',
      '{"name":',
      '{"name":"C"}',
    ].join('\n');

    const { records, skipped } = parseBooks(text);

    expect(records.map((r) => r.name)).toEqual(['A', 'B', 'C']);
    expect(skipped).toBe(2);
  });

  it('should handle CRLF line endings and a byte order mark', () => {
    const { records, skipped } = parseBooks('\uFEFF{"name":"A"}\r\n{"name":"B"}\r\n');

    expect(records.map((r) => r.name)).toEqual(['A', 'B']);
    expect(skipped).toBe(0);
  });

  it('should log the line number of each skipped line', () => {
    const { logger, lines } = captureLogger();

    parseBooks('{"name":"A"}\nbroken\n{"name":"B"}', logger);

    expect(lines).toEqual([
      { level: 'warn', line: '[WARN] Skipping malformed book line {"line":2}' },
    ]);
  });
});

describe('loadBooks', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'book-loader-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load records from an NDJSON file', async () => {
    const path = join(dir, 'books.ndjson');
    await writeFile(path, '["a", {"name":"A"}]\n["b", {"name":"B"}]\nbad line\n', 'utf-8');
    const { logger } = captureLogger();

    const result = await loadBooks(path, logger);

    expect(result.records.map((r) => r.name)).toEqual(['A', 'B']);
    expect(result.skipped).toBe(1);
    expect(result.missing).toBe(false);
  });

  it('should return an empty collection for a missing file', async () => {
    const { logger, lines } = captureLogger();

    const result = await loadBooks(join(dir, 'nope.ndjson'), logger);

    expect(result).toEqual({ records: [], skipped: 0, missing: true });
    expect(lines[0]?.level).toBe('warn');
  });

  it('should return an empty collection for an empty file', async () => {
    const path = join(dir, 'empty.ndjson');
    await writeFile(path, '', 'utf-8');
    const { logger } = captureLogger();

    const result = await loadBooks(path, logger);

    expect(result.records).toEqual([]);
    expect(result.skipped).toBe(0);
  });

  it('should throw BookLoadError when the path cannot be read', async () => {
    const path = join(dir, 'a-directory');
    await mkdir(path);
    const { logger } = captureLogger();

    await expect(loadBooks(path, logger)).rejects.toBeInstanceOf(BookLoadError);
  });
});
