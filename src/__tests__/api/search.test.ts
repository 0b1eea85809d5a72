import { describe, it, expect } from 'vitest';
import { book, createTestApp, LIBRARY } from '../helpers.js';

async function names(res: Response): Promise<string[]> {
  const body = await res.json();
  return body.data.map((b: { name: string }) => b.name);
}

describe('GET /search', () => {
  it('should find a record by a lowercase title fragment', async () => {
    const { app } = createTestApp();

    const res = await app.request('/search?name=harry');

    expect(res.status).toBe(200);
    expect(await names(res)).toEqual(["Harry Potter and the Sorcerer's Stone"]);
  });

  it('should AND multiple fields together', async () => {
    const { app } = createTestApp();

    const res = await app.request('/search?author=tolkien&language=english');
    const body = await res.json();

    expect(body.data.map((b: { name: string }) => b.name)).toEqual(['The Hobbit', 'The Silmarillion']);
    expect(body.total).toBe(2);
    expect(body.total_pages).toBe(1);
  });

  it('should return only The Hobbit for the two-book example', async () => {
    const { app } = createTestApp([
      book({ name: 'Harry Potter', author: 'J.K. Rowling' }),
      book({ name: 'The Hobbit', author: 'J.R.R. Tolkien' }),
    ]);

    const res = await app.request('/search?author=tolkien');
    const body = await res.json();

    expect(body.data).toEqual([book({ name: 'The Hobbit', author: 'J.R.R. Tolkien' })]);
    expect(body.total).toBe(1);
  });

  it('should match pages as a substring', async () => {
    const { app } = createTestApp();

    expect(await names(await app.request('/search?pages=10'))).toEqual(['The Hobbit', 'Der Hobbit']);
  });

  it('should paginate the matches', async () => {
    const { app } = createTestApp();

    const res = await app.request('/search?author=tolkien&limit=2&page=2');

    expect(await res.json()).toEqual({
      data: [LIBRARY[3]],
      total: 3,
      page: 2,
      limit: 2,
      total_pages: 2,
    });
  });

  it('should keep the matched total on a page past the end', async () => {
    const { app } = createTestApp();

    const res = await app.request('/search?author=tolkien&limit=2&page=7');

    expect(await res.json()).toEqual({ data: [], total: 3, page: 7, limit: 2, total_pages: 2 });
  });

  it('should return an empty result for no matches', async () => {
    const { app } = createTestApp();

    const res = await app.request('/search?genre=western');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: [], total: 0, page: 1, limit: 100, total_pages: 0 });
  });

  it('should ignore unknown parameters', async () => {
    const { app } = createTestApp();

    const res = await app.request('/search?author=rowling&format=epub');
    const body = await res.json();

    expect(body.total).toBe(1);
  });

  it('should behave like /all with no filters', async () => {
    const { app } = createTestApp(LIBRARY, { ENABLE_QUERY_CACHE: 'false' });

    const all = await (await app.request('/all?page=2&limit=2')).text();
    const search = await (await app.request('/search?page=2&limit=2')).text();
    const unknownOnly = await (await app.request('/search?page=2&limit=2&foo=bar')).text();

    expect(search).toBe(all);
    expect(unknownOnly).toBe(all);
  });

  it('should treat empty filter values as absent', async () => {
    const { app } = createTestApp();

    const body = await (await app.request('/search?isbn=&name=')).json();

    expect(body.total).toBe(5);
  });

  it('should fall back to defaults for invalid pagination values', async () => {
    const { app } = createTestApp();

    const body = await (await app.request('/search?author=tolkien&page=0&limit=1.5')).json();

    expect(body.page).toBe(1);
    expect(body.limit).toBe(100);
    expect(body.total).toBe(3);
  });

  it('should use the first value of a repeated limit', async () => {
    const { app } = createTestApp();

    const res = await app.request('/search?author=tolkien&limit=2&limit=3');
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.limit).toBe(2);
    expect(body.total).toBe(3);
    expect(body.total_pages).toBe(2);
  });

  it('should reject a repeated filter parameter', async () => {
    const { app } = createTestApp();

    const res = await app.request('/search?name=a&name=b');
    const body = await res.json();

    expect(res.status).toBe(400);
    expect(body.success).toBe(false);
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(body.error.message).toBe('Invalid request parameters');
  });
});
