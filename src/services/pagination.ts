/**
 * Pagination
 *
 * Page numbers start at 1. Slice bounds are clamped to the sequence, so a page
 * past the end is an empty slice, never an error.
 *
 * @module services/pagination
 */

import type { PageParams } from './types.js';

export interface PageSlice<T> {
  items: T[];
  total: number;
  totalPages: number;
}

/**
 * Slice one page out of a sequence
 *
 * `page` and `limit` must already be positive integers (see resolvePageParams).
 */
export function paginate<T>(sequence: Iterable<T>, page: number, limit: number): PageSlice<T> {
  const items: readonly T[] = Array.isArray(sequence) ? sequence : Array.from(sequence);
  const total = items.length;
  const totalPages = total === 0 ? 0 : Math.ceil(total / limit);

  const start = Math.min(Math.max((page - 1) * limit, 0), total);
  const end = Math.min(Math.max(start + limit, 0), total);

  return {
    items: items.slice(start, end),
    total,
    totalPages,
  };
}

const POSITIVE_INT = /^\d+$/;

/**
 * Parse a query value as a positive integer, or undefined when it is not one
 */
export function parsePositiveInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!POSITIVE_INT.test(trimmed)) return undefined;

  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) && parsed >= 1 ? parsed : undefined;
}

export type RawPageValue = string | string[] | undefined;

function firstValue(value: RawPageValue): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Resolve raw page/limit query values, falling back to the defaults for
 * anything missing, non-integer or non-positive. Of a repeated parameter
 * only the first value counts.
 */
export function resolvePageParams(
  raw: { page?: RawPageValue; limit?: RawPageValue },
  defaults: PageParams
): PageParams {
  return {
    page: parsePositiveInt(firstValue(raw.page)) ?? defaults.page,
    limit: parsePositiveInt(firstValue(raw.limit)) ?? defaults.limit,
  };
}
