import { parseConfig, type AppConfig } from '../config.js';
import { AppContext } from '../context.js';
import { createApp } from '../app.js';
import { Logger, type LogLevel } from '../../lib/logger.js';
import { BookStore } from '../services/book-store.js';
import type { BookRecord } from '../services/types.js';

const EMPTY_BOOK: BookRecord = {
  name: null,
  author: null,
  language: null,
  genre: null,
  publisher: null,
  release_date: null,
  media_type: null,
  pages: null,
  isbn: null,
};

/**
 * Build a record with every unspecified field null
 */
export function book(fields: Partial<BookRecord>): BookRecord {
  return { ...EMPTY_BOOK, ...fields };
}

/**
 * Fixture collection used across route tests
 */
export const LIBRARY: BookRecord[] = [
  book({ name: "Harry Potter and the Sorcerer's Stone", author: 'J.K. Rowling', language: 'English', genre: 'Fantasy', pages: '309', isbn: '0-0000-0001-1' }),
  book({ name: 'The Hobbit', author: 'J.R.R. Tolkien', language: 'English', genre: 'Fantasy', pages: '310', release_date: '21 September 1937' }),
  book({ name: 'The Silmarillion', author: 'J.R.R. Tolkien', language: 'english', genre: 'Mythopoeia', pages: '365' }),
  book({ name: 'Der Hobbit', author: 'J.R.R. Tolkien', language: 'German', pages: '100' }),
  book({ name: 'Untitled manuscript' }),
];

export interface CapturedLog {
  level: LogLevel;
  line: string;
}

/**
 * Logger that records lines instead of printing them
 */
export function captureLogger(level: LogLevel = 'debug'): { logger: Logger; lines: CapturedLog[] } {
  const lines: CapturedLog[] = [];
  const logger = new Logger({ level, queryLogging: true }, {}, (lvl, line) => {
    lines.push({ level: lvl, line });
  });
  return { logger, lines };
}

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return parseConfig(env);
}

export function createTestApp(records: BookRecord[] = LIBRARY, env: Record<string, string> = {}) {
  const { logger, lines } = captureLogger();
  const context = new AppContext({
    config: testConfig(env),
    logger,
    store: BookStore.from(records),
  });
  return { app: createApp(context), context, logs: lines };
}
