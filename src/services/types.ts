/**
 * Book domain types shared by the loader, store, search and query services
 */

/**
 * The nine fields a book record carries, in response key order.
 * Also the closed set of filter keys accepted by search.
 */
export const BOOK_FIELDS = [
  'name',
  'author',
  'language',
  'genre',
  'publisher',
  'release_date',
  'media_type',
  'pages',
  'isbn',
] as const;

export type BookField = typeof BOOK_FIELDS[number];

/**
 * One book extracted from a Wikipedia infobox.
 * Values are opaque text; absent source values are null.
 */
export type BookRecord = {
  readonly [K in BookField]: string | null;
};

/**
 * Field name -> case-insensitive substring to look for
 */
export type FilterSet = Partial<Record<BookField, string>>;

/**
 * Validated pagination input (both >= 1)
 */
export interface PageParams {
  page: number;
  limit: number;
}

/**
 * Response envelope for /all and /search
 */
export interface BookPage {
  data: BookRecord[];
  total: number;
  page: number;
  limit: number;
  total_pages: number;
}

const FIELD_NAMES: ReadonlySet<string> = new Set(BOOK_FIELDS);

export function isBookField(key: string): key is BookField {
  return FIELD_NAMES.has(key);
}
