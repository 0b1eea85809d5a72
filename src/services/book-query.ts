/**
 * Book Query Service
 *
 * Binds request input to the current store: filter (optional), then paginate,
 * then wrap in the response envelope. Holds no state of its own.
 *
 * @module services/book-query
 */

import type { Logger } from '../env.js';
import type { BookStore } from './book-store.js';
import { countFilters, searchBooks } from './book-search.js';
import { paginate } from './pagination.js';
import type { BookPage, BookRecord, FilterSet, PageParams } from './types.js';

export interface BookStoreSource {
  readonly store: BookStore;
}

export class BookQueryService {
  constructor(
    private readonly source: BookStoreSource,
    private readonly logger?: Logger
  ) {}

  /**
   * Every record, one page at a time
   */
  listAll(params: PageParams): BookPage {
    const start = Date.now();
    const page = this.toPage(this.source.store.records, params);

    this.logger?.query('list_all', Date.now() - start, {
      page: params.page,
      limit: params.limit,
      result_count: page.data.length,
    });
    return page;
  }

  /**
   * Records matching every filter, one page at a time.
   * With no filters this is the same as listAll().
   */
  search(filters: FilterSet, params: PageParams): BookPage {
    const start = Date.now();
    const store = this.source.store;
    const page = countFilters(filters) === 0
      ? this.toPage(store.records, params)
      : this.toPage(searchBooks(store.records, filters), params);

    this.logger?.query('search', Date.now() - start, {
      filters,
      page: params.page,
      limit: params.limit,
      total: page.total,
      result_count: page.data.length,
    });
    return page;
  }

  private toPage(books: Iterable<BookRecord>, { page, limit }: PageParams): BookPage {
    const slice = paginate(books, page, limit);
    return {
      data: slice.items,
      total: slice.total,
      page,
      limit,
      total_pages: slice.totalPages,
    };
  }
}
