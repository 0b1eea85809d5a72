/**
 * Book Store
 *
 * Holds one loaded collection for its whole lifetime. Nothing can be added,
 * removed or reordered after construction; a reload builds a new store.
 *
 * @module services/book-store
 */

import type { BookRecord } from './types.js';

export interface BookStoreInfo {
  /** Path the records were read from, if any */
  source?: string;
  /** Lines skipped while loading */
  skipped?: number;
}

export class BookStore {
  readonly records: readonly BookRecord[];
  readonly source: string | null;
  readonly skipped: number;
  readonly loadedAt: Date;

  private constructor(records: readonly BookRecord[], info: BookStoreInfo) {
    this.records = records;
    this.source = info.source ?? null;
    this.skipped = info.skipped ?? 0;
    this.loadedAt = new Date();
  }

  /**
   * Build a store from records in file order. The input array is copied.
   */
  static from(records: Iterable<BookRecord>, info: BookStoreInfo = {}): BookStore {
    return new BookStore(Object.freeze(Array.from(records, (record) => Object.freeze(record))), info);
  }

  static empty(): BookStore {
    return BookStore.from([]);
  }

  get size(): number {
    return this.records.length;
  }
}
