/**
 * Response cache: pluggable backend, lazy expiry.
 *
 * Key strategy:
 *   conduit:cache:{fingerprint}
 *
 * TTL is supplied per entry by the caller (per template); the store
 * enforces no global TTL. An expired entry reads as a miss and is evicted
 * on the spot. Bulk invalidation works on fingerprint prefixes
 * ("openai:" → a provider, "openai:product_search@1.0.0:" → a template version).
 */
import { z } from "zod";
import { systemClock } from "./clock.js";
import type { Clock } from "./clock.js";
import type { FingerprintId } from "./fingerprint.js";

// ─── Backend interface (Redis or in-memory) ──────────────────────────────────

export interface CacheBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<void>;
  /** Delete all keys starting with `prefix`; returns how many went */
  delByPrefix(prefix: string): Promise<number>;
  close?(): Promise<void>;
}

// ─── In-memory backend ───────────────────────────────────────────────────────

export interface MemoryCacheOptions {
  /** LRU bound; unbounded when omitted */
  maxEntries?: number;
  /** Run a background sweep of expired entries at this interval */
  sweepIntervalMs?: number;
  clock?: Clock;
}

/**
 * Map-backed store. Map iteration order doubles as recency order: reads move
 * an entry to the back, eviction takes from the front.
 */
export class MemoryCache implements CacheBackend {
  private readonly store = new Map<string, { value: string; expiresAt: number }>();
  private readonly maxEntries: number;
  private readonly clock: Clock;
  private sweeper: NodeJS.Timeout | null = null;

  constructor(options: MemoryCacheOptions = {}) {
    if (options.maxEntries !== undefined && (!Number.isInteger(options.maxEntries) || options.maxEntries < 1)) {
      throw new RangeError(`maxEntries must be a positive integer, got ${options.maxEntries}`);
    }
    this.maxEntries = options.maxEntries ?? Number.POSITIVE_INFINITY;
    this.clock = options.clock ?? systemClock;

    if (options.sweepIntervalMs !== undefined) {
      this.sweeper = setInterval(() => this.sweep(), options.sweepIntervalMs);
      this.sweeper.unref();
    }
  }

  async get(key: string): Promise<string | null> {
    const entry = this.store.get(key);
    if (!entry) return null;
    this.store.delete(key);
    if (this.clock.now() >= entry.expiresAt) return null;
    this.store.set(key, entry);
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.store.delete(key);
    this.store.set(key, { value, expiresAt: this.clock.now() + ttlSeconds * 1000 });
    while (this.store.size > this.maxEntries) {
      const oldest = this.store.keys().next();
      if (oldest.done) break;
      this.store.delete(oldest.value);
    }
  }

  async del(key: string): Promise<void> { this.store.delete(key); }

  async delByPrefix(prefix: string): Promise<number> {
    let count = 0;
    for (const key of [...this.store.keys()]) {
      if (key.startsWith(prefix)) { this.store.delete(key); count++; }
    }
    return count;
  }

  /** Drop every expired entry; returns how many were removed */
  sweep(): number {
    const now = this.clock.now();
    let count = 0;
    for (const [key, entry] of [...this.store.entries()]) {
      if (now >= entry.expiresAt) { this.store.delete(key); count++; }
    }
    return count;
  }

  async close(): Promise<void> {
    if (this.sweeper) clearInterval(this.sweeper);
    this.sweeper = null;
  }

  /** Test helper: peek at cache size */
  get size(): number { return this.store.size; }

  /** Test helper: keys from least to most recently used */
  keys(): string[] { return [...this.store.keys()]; }

  clear(): void { this.store.clear(); }
}

// ─── Redis backend ───────────────────────────────────────────────────────────

/** The slice of an ioredis client the cache needs */
export interface RedisClientLike {
  get(key: string): Promise<string | null>;
  psetex(key: string, milliseconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<unknown>;
  keys(pattern: string): Promise<string[]>;
}

export class RedisCache implements CacheBackend {
  constructor(private readonly redis: RedisClientLike) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.psetex(key, Math.max(1, Math.ceil(ttlSeconds * 1000)), value);
  }

  async del(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async delByPrefix(prefix: string): Promise<number> {
    const keys = await this.redis.keys(`${escapeGlob(prefix)}*`);
    if (keys.length === 0) return 0;
    for (const k of keys) await this.redis.del(k);
    return keys.length;
  }
}

function escapeGlob(s: string): string {
  return s.replace(/[*?[\]\\]/g, "\\$&");
}

// ─── Cache store ─────────────────────────────────────────────────────────────

export interface CacheEntry<T = unknown> {
  fingerprint: FingerprintId;
  response: T;
  createdAt: number;
  expiresAt: number;
  /** 1 on first store, +1 each time the fingerprint is overwritten */
  version: number;
}

const StoredEntrySchema = z.object({
  fingerprint: z.string(),
  response: z.unknown(),
  createdAt: z.number(),
  expiresAt: z.number(),
  version: z.number().int().positive(),
});

export interface CacheStoreOptions {
  keyPrefix?: string;
  clock?: Clock;
}

export class CacheStore {
  private readonly keyPrefix: string;
  private readonly clock: Clock;

  constructor(
    private readonly backend: CacheBackend,
    options: CacheStoreOptions = {}
  ) {
    this.keyPrefix = options.keyPrefix ?? "conduit:cache:";
    this.clock = options.clock ?? systemClock;
  }

  async get(fingerprint: FingerprintId): Promise<CacheEntry | null> {
    const key = this.key(fingerprint);
    const raw = await this.backend.get(key);
    if (raw === null) return null;

    const entry = parseEntry(raw);
    if (!entry || entry.fingerprint !== fingerprint) {
      await this.backend.del(key);
      return null;
    }
    if (this.clock.now() >= entry.expiresAt) {
      await this.backend.del(key);
      return null;
    }
    return entry;
  }

  async put(fingerprint: FingerprintId, response: unknown, ttlSeconds: number): Promise<CacheEntry> {
    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
      throw new RangeError(`ttlSeconds must be a positive number, got ${ttlSeconds}`);
    }
    const previous = await this.get(fingerprint);
    const createdAt = this.clock.now();
    const entry: CacheEntry = {
      fingerprint,
      response,
      createdAt,
      expiresAt: createdAt + ttlSeconds * 1000,
      version: (previous?.version ?? 0) + 1,
    };
    await this.backend.set(this.key(fingerprint), JSON.stringify(entry), ttlSeconds);
    return entry;
  }

  async invalidate(fingerprint: FingerprintId): Promise<void> {
    await this.backend.del(this.key(fingerprint));
  }

  /** Invalidate every entry whose fingerprint starts with `selector` */
  async invalidatePrefix(selector: string): Promise<number> {
    return this.backend.delByPrefix(this.key(selector));
  }

  async close(): Promise<void> {
    await this.backend.close?.();
  }

  private key(fingerprint: string): string {
    return `${this.keyPrefix}${fingerprint}`;
  }
}

function parseEntry(raw: string): CacheEntry | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = StoredEntrySchema.safeParse(json);
  if (!parsed.success) return null;
  const e = parsed.data;
  return {
    fingerprint: e.fingerprint,
    response: e.response,
    createdAt: e.createdAt,
    expiresAt: e.expiresAt,
    version: e.version,
  };
}
