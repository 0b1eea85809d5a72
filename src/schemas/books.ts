import { z } from '@hono/zod-openapi';
import { DEFAULT_PAGE, DEFAULT_PAGE_LIMIT } from '../lib/constants.js';

// =================================================================================
// Book Record Schema
// =================================================================================

const BookText = (description: string, example: string) =>
  z.string().nullable().describe(description).openapi({ example });

export const BookRecordSchema = z.object({
  name: BookText('Book title', 'The Lantern Keeper'),
  author: BookText('Author as written in the infobox', 'Mara Ellison'),
  language: BookText('Language of the original text', 'English'),
  genre: BookText('Genre(s), free text', 'Fantasy'),
  publisher: BookText('Publisher name', 'Northgate Press'),
  release_date: BookText('Release date, free-form (not necessarily ISO-8601)', '12 March 1998'),
  media_type: BookText('Media type', 'Print (hardback)'),
  pages: BookText('Page count as text', '412'),
  isbn: BookText('ISBN as written in the source', '0-00-000001-1'),
}).openapi('Book');

// =================================================================================
// Query Schemas
// =================================================================================

/**
 * Pagination values stay strings here. Invalid values are not rejected;
 * the route falls back to the defaults (see resolvePageParams). A repeated
 * parameter arrives as an array and only its first value is used.
 */
const pageParam = (name: string, description: string, example: string) =>
  z.union([z.string(), z.array(z.string())]).optional().openapi({
    param: { name, in: 'query' },
    description,
    example,
  });

export const PageQuerySchema = z.object({
  limit: pageParam(
    'limit',
    `Number of books per page. Missing or non-positive values fall back to the default (${DEFAULT_PAGE_LIMIT}).`,
    '100'
  ),
  page: pageParam(
    'page',
    `Page number, starting at 1. Missing or non-positive values fall back to ${DEFAULT_PAGE}.`,
    '1'
  ),
});

const filterParam = (name: string, description: string) =>
  z.string().optional().openapi({
    param: { name, in: 'query' },
    description: `${description} (case-insensitive substring match)`,
  });

export const SearchQuerySchema = PageQuerySchema.extend({
  name: filterParam('name', 'Book title'),
  author: filterParam('author', 'Author name'),
  language: filterParam('language', 'Book language'),
  genre: filterParam('genre', 'Book genre'),
  publisher: filterParam('publisher', 'Publisher name'),
  release_date: filterParam('release_date', 'Release date'),
  media_type: filterParam('media_type', 'Media type'),
  pages: filterParam('pages', 'Number of pages, compared as text'),
  isbn: filterParam('isbn', 'ISBN'),
});

// =================================================================================
// Response Schemas
// =================================================================================

export const BookPageSchema = z.object({
  data: z.array(BookRecordSchema),
  total: z.number().int().nonnegative().describe('Matching books before pagination'),
  page: z.number().int().positive(),
  limit: z.number().int().positive(),
  total_pages: z.number().int().nonnegative().describe('ceil(total / limit); 0 when nothing matches'),
}).openapi('BookPage');

// =================================================================================
// Type Exports
// =================================================================================

export type PageQuery = z.infer<typeof PageQuerySchema>;
export type SearchQuery = z.infer<typeof SearchQuerySchema>;
