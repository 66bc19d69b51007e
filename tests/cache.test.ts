import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  clearCache,
  closeCache,
  getCacheLocation,
  getCacheStats,
  getCached,
  setCache,
  setCacheLocation,
} from '../src/core/cache.js';

describe('Cache', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'edgar-13f-cache-'));
    setCacheLocation(tempDir);
  });

  afterEach(() => {
    closeCache();
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  it('stores and retrieves a response body by URL', () => {
    setCache('https://www.sec.gov/a', 'body-a');
    expect(getCached('https://www.sec.gov/a')).toBe('body-a');
    expect(getCached('https://www.sec.gov/b')).toBeNull();
  });

  it('persists across a reopen', () => {
    setCache('https://www.sec.gov/a', 'body-a');
    setCacheLocation(tempDir);
    expect(getCached('https://www.sec.gov/a')).toBe('body-a');
    expect(existsSync(join(tempDir, 'cache.db'))).toBe(true);
  });

  it('ignores expired entries', () => {
    setCache('https://www.sec.gov/old', 'stale', -1);
    expect(getCached('https://www.sec.gov/old')).toBeNull();
  });

  it('replaces an entry for the same URL', () => {
    setCache('https://www.sec.gov/a', 'first');
    setCache('https://www.sec.gov/a', 'second');
    setCacheLocation(tempDir);
    expect(getCached('https://www.sec.gov/a')).toBe('second');
    expect(getCacheStats().entries).toBe(1);
  });

  it('reports entry count, size and location', () => {
    setCache('https://www.sec.gov/a', 'abc');
    setCache('https://www.sec.gov/b', 'defgh');
    expect(getCacheStats()).toEqual({ entries: 2, sizeBytes: 8, location: tempDir });
    expect(getCacheLocation()).toBe(tempDir);
  });

  it('clears everything', () => {
    setCache('https://www.sec.gov/a', 'abc');
    clearCache();
    expect(getCached('https://www.sec.gov/a')).toBeNull();
    expect(getCacheStats().entries).toBe(0);
  });

  it('keys rows by URL hash in the database', () => {
    setCache('https://www.sec.gov/a', 'abc');
    closeCache();
    const db = new Database(join(tempDir, 'cache.db'));
    const rows = db.prepare('SELECT url, response_body FROM http_cache').all();
    db.close();
    expect(rows).toEqual([{ url: 'https://www.sec.gov/a', response_body: 'abc' }]);
  });
});
