import Database from 'better-sqlite3';
import { createHash } from 'node:crypto';
import { join } from 'node:path';
import { mkdirSync, rmSync } from 'node:fs';
import { getConfig } from './config.js';

/**
 * SQLite cache for raw EDGAR payloads (submission text, index and
 * submissions JSON). Keyed by URL, so re-running an extraction over the
 * same filings issues no new requests.
 *
 * Resilient to corruption: if the DB can't be opened, it's deleted
 * and recreated. Losing the cache only means re-fetching from SEC.
 */

const CACHE_FILE = 'cache.db';

let cacheDir: string | null = null;
let db: Database.Database | null = null;

/** In-memory FIFO cache for hot-path cache hits within a session */
const memCache = new Map<string, { body: string; expiresAt: number }>();
const MEM_CACHE_MAX = 100;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS http_cache (
    url_hash TEXT PRIMARY KEY,
    url TEXT NOT NULL,
    response_body TEXT NOT NULL,
    fetched_at TEXT NOT NULL,
    expires_at TEXT NOT NULL
  )
`;

/** Point the cache at another directory (closes the current DB) */
export function setCacheLocation(dir: string): void {
  closeCache();
  memCache.clear();
  cacheDir = dir;
}

export function getCacheLocation(): string {
  return cacheDir ?? getConfig().EDGAR_HOLDINGS_CACHE_DIR;
}

function openDb(path: string): Database.Database {
  const opened = new Database(path);
  opened.pragma('journal_mode = WAL');
  opened.pragma('busy_timeout = 3000');
  opened.exec(SCHEMA);
  return opened;
}

function getDb(): Database.Database {
  if (db) return db;

  const dir = getCacheLocation();
  mkdirSync(dir, { recursive: true });
  const path = join(dir, CACHE_FILE);

  try {
    db = openDb(path);
  } catch {
    // DB corrupted: delete and recreate
    for (const suffix of ['', '-wal', '-shm']) {
      rmSync(path + suffix, { force: true });
    }
    db = openDb(path);
  }

  return db;
}

function hashUrl(url: string): string {
  return createHash('sha256').update(url).digest('hex');
}

/** Get cached response if still valid */
export function getCached(url: string): string | null {
  const hash = hashUrl(url);
  const now = Date.now();

  // Check in-memory cache first
  const mem = memCache.get(hash);
  if (mem && mem.expiresAt > now) return mem.body;

  const d = getDb();
  const row = d.prepare<[string, string], { response_body: string; expires_at: string }>(
    'SELECT response_body, expires_at FROM http_cache WHERE url_hash = ? AND expires_at > ?'
  ).get(hash, new Date(now).toISOString());

  if (row) {
    // Promote to in-memory cache
    setMemCache(hash, row.response_body, new Date(row.expires_at).getTime());
    return row.response_body;
  }

  return null;
}

/** Store response in cache */
export function setCache(url: string, body: string, ttlHours: number = 24): void {
  const hash = hashUrl(url);
  const now = new Date();
  const expiresAt = now.getTime() + ttlHours * 60 * 60 * 1000;

  setMemCache(hash, body, expiresAt);

  const d = getDb();
  d.prepare(`
    INSERT OR REPLACE INTO http_cache (url_hash, url, response_body, fetched_at, expires_at)
    VALUES (?, ?, ?, ?, ?)
  `).run(hash, url, body, now.toISOString(), new Date(expiresAt).toISOString());
}

function setMemCache(hash: string, body: string, expiresAt: number): void {
  if (memCache.size >= MEM_CACHE_MAX) {
    // Evict oldest entry
    const firstKey = memCache.keys().next().value;
    if (firstKey) memCache.delete(firstKey);
  }
  memCache.set(hash, { body, expiresAt });
}

/** Close the database connection */
export function closeCache(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/** Clear all cached data */
export function clearCache(): void {
  memCache.clear();
  const d = getDb();
  d.exec('DELETE FROM http_cache');
}

/** Get cache stats for diagnostics */
export function getCacheStats(): { entries: number; sizeBytes: number; location: string } {
  const d = getDb();
  const row = d.prepare<[], { count: number; size: number }>(
    'SELECT COUNT(*) as count, COALESCE(SUM(LENGTH(response_body)), 0) as size FROM http_cache'
  ).get();
  return { entries: row?.count ?? 0, sizeBytes: row?.size ?? 0, location: getCacheLocation() };
}
