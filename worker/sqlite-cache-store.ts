// SQLite-backed cache storage for the CLI, so lookups survive restarts.
// Each TtlCache gets its own namespace inside one cache_entries table.

import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import type { CacheEntry, CacheStore } from '../src/lib/ttl-cache';

export const CACHE_MIGRATIONS = [
  `CREATE TABLE IF NOT EXISTS cache_entries (
  namespace TEXT NOT NULL,
  key TEXT NOT NULL,
  value TEXT NOT NULL,
  expires_at INTEGER NOT NULL,
  PRIMARY KEY (namespace, key)
)`,
  'CREATE INDEX IF NOT EXISTS idx_cache_entries_expires_at ON cache_entries (expires_at)',
];

type CacheRow = {
  readonly value: string;
  readonly expires_at: number;
};

/** Owns the better-sqlite3 connection and its schema. */
export class CacheDatabase {
  private readonly db: BetterSqlite3.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    for (const sql of CACHE_MIGRATIONS) {
      this.db.exec(sql);
    }
  }

  /** Cache storage for one namespace, e.g. "metadata" or "corroboration". */
  store<T>(namespace: string): SqliteCacheStore<T> {
    return new SqliteCacheStore<T>(this.db, namespace);
  }

  /** Delete every expired entry. Returns the number removed. */
  pruneExpired(now: number = Date.now()): number {
    return this.db.prepare('DELETE FROM cache_entries WHERE expires_at <= ?').run(now).changes;
  }

  close(): void {
    this.db.close();
  }
}

export class SqliteCacheStore<T> implements CacheStore<T> {
  private readonly selectEntry: BetterSqlite3.Statement<[string, string], CacheRow>;
  private readonly upsertEntry: BetterSqlite3.Statement<[string, string, string, number]>;
  private readonly deleteEntry: BetterSqlite3.Statement<[string, string]>;
  private readonly clearNamespace: BetterSqlite3.Statement<[string]>;

  constructor(
    db: BetterSqlite3.Database,
    private readonly namespace: string
  ) {
    this.selectEntry = db.prepare<[string, string], CacheRow>(
      'SELECT value, expires_at FROM cache_entries WHERE namespace = ? AND key = ?'
    );
    this.upsertEntry = db.prepare<[string, string, string, number]>(
      'INSERT INTO cache_entries (namespace, key, value, expires_at) VALUES (?, ?, ?, ?) ON CONFLICT(namespace, key) DO UPDATE SET value = excluded.value, expires_at = excluded.expires_at'
    );
    this.deleteEntry = db.prepare<[string, string]>(
      'DELETE FROM cache_entries WHERE namespace = ? AND key = ?'
    );
    this.clearNamespace = db.prepare<[string]>('DELETE FROM cache_entries WHERE namespace = ?');
  }

  get(key: string): CacheEntry<T> | undefined {
    const row = this.selectEntry.get(this.namespace, key);
    if (!row) return undefined;
    const value: T = JSON.parse(row.value);
    return { value, expiresAt: row.expires_at };
  }

  set(key: string, entry: CacheEntry<T>): void {
    this.upsertEntry.run(this.namespace, key, JSON.stringify(entry.value), entry.expiresAt);
  }

  delete(key: string): void {
    this.deleteEntry.run(this.namespace, key);
  }

  clear(): void {
    this.clearNamespace.run(this.namespace);
  }
}
