import { createHash } from "node:crypto";
import Database from "better-sqlite3";
import { getConfig } from "../config.js";
import { log } from "./logger.js";
import { stableStringify } from "./stable-json.js";

export type CacheEntry = {
  readonly key: string;
  readonly value: string;
  readonly createdAt: number;
  readonly ttlMs: number;
};

export type CacheLookup = { found: true; value: string } | { found: false };

/** Backend for ResponseCache. Implementations may throw; the cache absorbs it. */
export interface CacheStore {
  read(key: string): CacheEntry | undefined;
  write(entry: CacheEntry): void;
  delete(key: string): void;
  /** Remove entries expired at `now`. Returns how many were removed. */
  prune(now: number): number;
  clear(): void;
  size(): number;
}

export function isExpired(entry: CacheEntry, now = Date.now()): boolean {
  return now > entry.createdAt + entry.ttlMs;
}

/**
 * In-memory LRU store bounded by `maxEntries`.
 */
export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, CacheEntry>();
  private maxEntries: number;
  evictions = 0;

  constructor(maxEntries = getConfig().cache.maxEntries) {
    this.maxEntries = maxEntries;
  }

  read(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (entry) {
      // Move to end (most recently used)
      this.entries.delete(key);
      this.entries.set(key, entry);
    }
    return entry;
  }

  write(entry: CacheEntry): void {
    this.entries.delete(entry.key);
    while (this.entries.size >= this.maxEntries) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey === undefined) break;
      this.entries.delete(oldestKey);
      this.evictions++;
      log.debug("Cache eviction (LRU)", { key: oldestKey.slice(0, 24) });
    }
    this.entries.set(entry.key, entry);
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  prune(now: number): number {
    let pruned = 0;
    for (const [key, entry] of this.entries) {
      if (isExpired(entry, now)) {
        this.entries.delete(key);
        pruned++;
      }
    }
    return pruned;
  }

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }
}

type EntryRow = {
  key: string;
  value: string;
  created_at: number;
  ttl_ms: number;
};

/**
 * SQLite-backed store so a later process can reuse earlier tool results.
 */
export class SqliteCacheStore implements CacheStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS cache_entries (
        key        TEXT PRIMARY KEY,
        value      TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        ttl_ms     INTEGER NOT NULL
      );
    `);
  }

  read(key: string): CacheEntry | undefined {
    const row = this.db
      .prepare<[string], EntryRow>("SELECT key, value, created_at, ttl_ms FROM cache_entries WHERE key = ?")
      .get(key);
    return row ? { key: row.key, value: row.value, createdAt: row.created_at, ttlMs: row.ttl_ms } : undefined;
  }

  write(entry: CacheEntry): void {
    this.db
      .prepare("INSERT OR REPLACE INTO cache_entries (key, value, created_at, ttl_ms) VALUES (?, ?, ?, ?)")
      .run(entry.key, entry.value, entry.createdAt, entry.ttlMs);
  }

  delete(key: string): void {
    this.db.prepare("DELETE FROM cache_entries WHERE key = ?").run(key);
  }

  prune(now: number): number {
    return this.db.prepare("DELETE FROM cache_entries WHERE created_at + ttl_ms < ?").run(now).changes;
  }

  clear(): void {
    this.db.prepare("DELETE FROM cache_entries").run();
  }

  size(): number {
    const row = this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM cache_entries").get();
    return row?.n ?? 0;
  }

  close(): void {
    this.db.close();
  }
}

export type CacheStats = {
  size: number;
  hits: number;
  misses: number;
  writes: number;
  errors: number;
  hitRate: number;
};

export type ResponseCacheOptions = {
  store?: CacheStore;
  /** Default time-to-live for new entries */
  ttlMs?: number;
};

export type KeyOptions = {
  /** Lower-case string parameters before hashing */
  foldCase?: boolean;
  /** Trim string parameters and collapse inner runs of whitespace */
  collapseWhitespace?: boolean;
};

function normalizeParams(value: unknown, opts: KeyOptions): unknown {
  if (typeof value === "string") {
    const text = opts.collapseWhitespace ? value.trim().replace(/\s+/g, " ") : value;
    return opts.foldCase ? text.toLowerCase() : text;
  }
  if (Array.isArray(value)) return value.map((v) => normalizeParams(v, opts));
  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .map(([k, v]) => [k, normalizeParams(v, opts)]),
    );
  }
  return value;
}

/**
 * Tool response cache. Lookups on expired entries behave as misses and remove
 * the entry. Store failures degrade to a miss; they never reach the caller.
 */
export class ResponseCache {
  private store: CacheStore;
  private ttlMs: number;
  private stats = { hits: 0, misses: 0, writes: 0, errors: 0 };

  constructor(opts: ResponseCacheOptions = {}) {
    const defaults = getConfig().cache;
    this.store = opts.store ?? new MemoryCacheStore(defaults.maxEntries);
    this.ttlMs = opts.ttlMs ?? defaults.ttlMs;
  }

  /**
   * Derive a key from a tool id and its parameters. Key order never changes
   * the key; whitespace and case only do when the options leave them alone.
   */
  static key(toolId: string, params: Record<string, unknown>, opts: KeyOptions = {}): string {
    const normalized = stableStringify(normalizeParams(params, opts));
    const digest = createHash("sha256").update(normalized).digest("hex").slice(0, 32);
    return `${toolId}:${digest}`;
  }

  get(key: string): CacheLookup {
    let entry: CacheEntry | undefined;
    try {
      entry = this.store.read(key);
      if (entry && isExpired(entry)) {
        this.store.delete(key);
        log.debug("Cache entry expired", { key });
        entry = undefined;
      }
    } catch (err) {
      this.stats.errors++;
      log.warn("Cache read failed, treating as miss", { key, error: String(err) });
      entry = undefined;
    }

    if (!entry) {
      this.stats.misses++;
      return { found: false };
    }
    this.stats.hits++;
    log.debug("Cache hit", { key });
    return { found: true, value: entry.value };
  }

  put(key: string, value: string, ttlMs = this.ttlMs): void {
    try {
      this.store.write({ key, value, createdAt: Date.now(), ttlMs });
      this.stats.writes++;
    } catch (err) {
      this.stats.errors++;
      log.warn("Cache write failed, result not cached", { key, error: String(err) });
    }
  }

  /**
   * Remove all expired entries.
   */
  prune(): number {
    try {
      const pruned = this.store.prune(Date.now());
      if (pruned > 0) log.debug("Cache pruned", { count: pruned });
      return pruned;
    } catch (err) {
      this.stats.errors++;
      log.warn("Cache prune failed", { error: String(err) });
      return 0;
    }
  }

  clear(): void {
    try {
      this.store.clear();
    } catch (err) {
      this.stats.errors++;
      log.warn("Cache clear failed", { error: String(err) });
    }
  }

  getStats(): CacheStats {
    const total = this.stats.hits + this.stats.misses;
    let size = 0;
    try {
      size = this.store.size();
    } catch (err) {
      log.debug("Cache size unavailable", { error: String(err) });
    }
    return {
      size,
      ...this.stats,
      hitRate: total > 0 ? this.stats.hits / total : 0,
    };
  }
}
