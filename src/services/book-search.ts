/**
 * Fuzzy Book Search
 *
 * "Fuzzy" here is case-insensitive substring containment: a record matches
 * when every filtered field contains its needle. Numeric-looking values such
 * as `pages` are compared as text, so `10` matches `100` and `110`.
 *
 * @module services/book-search
 */

import { BOOK_FIELDS, isBookField } from './types.js';
import type { BookField, BookRecord, FilterSet } from './types.js';

/**
 * Field accessors, one per known field
 */
export const FIELD_ACCESSORS: Record<BookField, (book: BookRecord) => string | null> = {
  name: (book) => book.name,
  author: (book) => book.author,
  language: (book) => book.language,
  genre: (book) => book.genre,
  publisher: (book) => book.publisher,
  release_date: (book) => book.release_date,
  media_type: (book) => book.media_type,
  pages: (book) => book.pages,
  isbn: (book) => book.isbn,
};

interface CompiledFilter {
  read: (book: BookRecord) => string | null;
  needle: string;
}

function compileFilters(filters: FilterSet): CompiledFilter[] {
  const compiled: CompiledFilter[] = [];
  for (const field of BOOK_FIELDS) {
    const value = filters[field];
    if (value === undefined || value === '') continue;
    compiled.push({ read: FIELD_ACCESSORS[field], needle: value.toLowerCase() });
  }
  return compiled;
}

function matchesCompiled(book: BookRecord, compiled: readonly CompiledFilter[]): boolean {
  return compiled.every(({ read, needle }) => {
    const value = read(book);
    return value !== null && value.toLowerCase().includes(needle);
  });
}

/**
 * True when every (field, needle) pair matches the record (logical AND).
 * A null field never matches. An empty filter set matches everything.
 */
export function matchesFilters(book: BookRecord, filters: FilterSet): boolean {
  return matchesCompiled(book, compileFilters(filters));
}

/**
 * Lazily yield matching records in collection order
 *
 * Each record is examined once; needles are lowercased once per call.
 */
export function* searchBooks(books: Iterable<BookRecord>, filters: FilterSet): Generator<BookRecord> {
  const compiled = compileFilters(filters);
  for (const book of books) {
    if (matchesCompiled(book, compiled)) yield book;
  }
}

/**
 * Pick the known filter fields out of a raw query map
 *
 * Unknown keys and empty values are dropped.
 */
export function extractFilters(query: Record<string, string | undefined>): FilterSet {
  const filters: FilterSet = {};
  for (const [key, value] of Object.entries(query)) {
    if (isBookField(key) && value !== undefined && value !== '') {
      filters[key] = value;
    }
  }
  return filters;
}

/**
 * Number of active filters after empty values are dropped
 */
export function countFilters(filters: FilterSet): number {
  return compileFilters(filters).length;
}
