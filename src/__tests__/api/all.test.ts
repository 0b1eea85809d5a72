import { describe, it, expect } from 'vitest';
import { createTestApp, LIBRARY } from '../helpers.js';

describe('GET /all', () => {
  it('should return the first page with default pagination', async () => {
    const { app } = createTestApp();

    const res = await app.request('/all');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: LIBRARY,
      total: 5,
      page: 1,
      limit: 100,
      total_pages: 1,
    });
  });

  it('should serialize absent fields as null', async () => {
    const { app } = createTestApp();

    const res = await app.request('/all?page=5&limit=1');
    const body = await res.json();

    expect(body.data).toEqual([{
      name: 'Untitled manuscript',
      author: null,
      language: null,
      genre: null,
      publisher: null,
      release_date: null,
      media_type: null,
      pages: null,
      isbn: null,
    }]);
  });

  it('should honour page and limit', async () => {
    const { app } = createTestApp();

    const res = await app.request('/all?page=2&limit=2');
    const body = await res.json();

    expect(body.data.map((b: { name: string }) => b.name)).toEqual(['The Silmarillion', 'Der Hobbit']);
    expect(body.total).toBe(5);
    expect(body.page).toBe(2);
    expect(body.limit).toBe(2);
    expect(body.total_pages).toBe(3);
  });

  it('should return an empty page past the end', async () => {
    const { app } = createTestApp();

    const res = await app.request('/all?page=4&limit=2');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: [], total: 5, page: 4, limit: 2, total_pages: 3 });
  });

  it('should fall back to defaults for invalid pagination values', async () => {
    const { app } = createTestApp();

    const res = await app.request('/all?page=-2&limit=abc');
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.page).toBe(1);
    expect(body.limit).toBe(100);
  });

  it('should use the first value of a repeated page or limit', async () => {
    const { app } = createTestApp();

    const res = await app.request('/all?page=2&page=1&limit=2&limit=3');
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.page).toBe(2);
    expect(body.limit).toBe(2);
    expect(body.data.map((b: { name: string }) => b.name)).toEqual(['The Silmarillion', 'Der Hobbit']);
  });

  it('should use the configured default limit', async () => {
    const { app } = createTestApp(LIBRARY, { DEFAULT_PAGE_LIMIT: '2' });

    const body = await (await app.request('/all')).json();

    expect(body.limit).toBe(2);
    expect(body.data).toHaveLength(2);
    expect(body.total_pages).toBe(3);
  });

  it('should serve an empty collection without error', async () => {
    const { app } = createTestApp([]);

    const res = await app.request('/all');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: [], total: 0, page: 1, limit: 100, total_pages: 0 });
  });

  it('should return byte-identical bodies for repeated requests', async () => {
    const { app } = createTestApp(LIBRARY, { ENABLE_QUERY_CACHE: 'false' });

    const first = await (await app.request('/all?limit=3')).text();
    const second = await (await app.request('/all?limit=3')).text();

    expect(second).toBe(first);
  });
});
