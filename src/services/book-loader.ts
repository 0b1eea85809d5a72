/**
 * Book Loader
 *
 * Reads the NDJSON data source once and turns each line into a BookRecord.
 * A line is either a book object or a `[key, book]` pair as written by the
 * Wikipedia extraction job. Lines that do not parse are skipped and counted.
 *
 * @module services/book-loader
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Logger } from '../env.js';
import type { BookRecord } from './types.js';

// =================================================================================
// Source Line Schema
// =================================================================================

/**
 * Field values are kept as text. Numbers (typically `pages`) become their
 * decimal string; anything else becomes null.
 */
const SourceValue = z.unknown().transform((val): string | null => {
  if (typeof val === 'string') return val;
  if (typeof val === 'number' && Number.isFinite(val)) return String(val);
  return null;
});

const SourceBookSchema = z.object({
  name: SourceValue,
  author: SourceValue,
  language: SourceValue,
  genre: SourceValue,
  publisher: SourceValue,
  release_date: SourceValue,
  media_type: SourceValue,
  pages: SourceValue,
  isbn: SourceValue,
});

const SourceLineSchema = z.union([
  SourceBookSchema,
  z.tuple([z.unknown(), SourceBookSchema]).rest(z.unknown()).transform(([, book]) => book),
]);

// =================================================================================
// Errors
// =================================================================================

/**
 * The data source exists but could not be read. Fatal at startup.
 */
export class BookLoadError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to read book data from ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'BookLoadError';
    this.path = path;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// =================================================================================
// Parsing
// =================================================================================

/**
 * Parse one NDJSON line into a frozen BookRecord
 *
 * @returns null when the line is not JSON or not a book-shaped value
 */
export function parseBookLine(line: string): BookRecord | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }

  const parsed = SourceLineSchema.safeParse(raw);
  if (!parsed.success) return null;

  const book = parsed.data;
  return Object.freeze({
    name: book.name,
    author: book.author,
    language: book.language,
    genre: book.genre,
    publisher: book.publisher,
    release_date: book.release_date,
    media_type: book.media_type,
    pages: book.pages,
    isbn: book.isbn,
  });
}

export interface LoadResult {
  records: BookRecord[];
  /** Non-empty lines that failed to parse */
  skipped: number;
  /** True when the data file did not exist */
  missing: boolean;
}

/**
 * Parse NDJSON text. Blank lines are ignored, bad lines skipped.
 */
export function parseBooks(text: string, logger?: Logger): Omit<LoadResult, 'missing'> {
  const records: BookRecord[] = [];
  let skipped = 0;

  const lines = text.replace(/^\uFEFF/, '').split('\n');
  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line) return;

    const record = parseBookLine(line);
    if (record) {
      records.push(record);
    } else {
      skipped++;
      logger?.warn('Skipping malformed book line', { line: index + 1 });
    }
  });

  return { records, skipped };
}

/**
 * Read and parse the data source
 *
 * A missing file yields an empty collection so the API still starts.
 *
 * @throws BookLoadError when the file exists but cannot be read
 */
export async function loadBooks(path: string, logger: Logger): Promise<LoadResult> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      logger.warn('Book data file not found, serving an empty collection', { path });
      return { records: [], skipped: 0, missing: true };
    }
    throw new BookLoadError(path, error);
  }

  const start = Date.now();
  const { records, skipped } = parseBooks(text, logger);

  logger.info(`Successfully loaded ${records.length} books from ${path}`, {
    skipped,
    durationMs: Date.now() - start,
  });

  return { records, skipped, missing: false };
}
