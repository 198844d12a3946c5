import { Redis } from "@upstash/redis";
import { env } from "@/lib/env";

export interface KvStore {
  get<T>(key: string): Promise<T | null>;
  /** TTL <= 0 means "expire immediately". */
  set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;
}

const DEFAULT_TTL = 60 * 60; // 1h

export class UpstashKvStore implements KvStore {
  constructor(private readonly redis: Redis) {}

  async get<T>(key: string): Promise<T | null> {
    if (!key) return null;
    return (await this.redis.get<T>(key)) ?? null;
  }

  async set<T>(key: string, value: T, ttlSeconds = DEFAULT_TTL) {
    if (!key) return;
    if (ttlSeconds <= 0) {
      await this.redis.del(key);
      return;
    }
    await this.redis.set(key, value, { ex: ttlSeconds });
  }
}

/**
 * Fallback in-memory cache with TTL.
 * - Stores { value, expiresAt } in ms.
 * - Best-effort sweeping to avoid unbounded growth.
 */
type MemEntry = { value: unknown; expiresAt: number };

export type MemoryKvOptions = {
  maxEntries?: number;
  sweepEveryMs?: number;
  sweepBatch?: number;
  now?: () => number;
};

export class MemoryKvStore implements KvStore {
  private readonly mem = new Map<string, MemEntry>();
  private readonly maxEntries: number;
  private readonly sweepEveryMs: number;
  private readonly sweepBatch: number;
  private readonly now: () => number;
  private lastSweepAt = 0;

  constructor(opts: MemoryKvOptions = {}) {
    this.maxEntries = opts.maxEntries ?? 5000;
    this.sweepEveryMs = opts.sweepEveryMs ?? 30_000;
    this.sweepBatch = opts.sweepBatch ?? 600;
    this.now = opts.now ?? Date.now;
  }

  get size() {
    return this.mem.size;
  }

  async get<T>(key: string): Promise<T | null> {
    if (!key) return null;

    const now = this.now();
    const entry = this.mem.get(key);
    if (!entry) {
      this.sweep(now);
      return null;
    }

    if (entry.expiresAt <= now) {
      this.mem.delete(key);
      this.sweep(now);
      return null;
    }

    this.sweep(now);
    // Values only ever enter through set<T> under the same key.
    return (entry.value as T) ?? null;
  }

  async set<T>(key: string, value: T, ttlSeconds = DEFAULT_TTL) {
    if (!key) return;

    if (ttlSeconds <= 0) {
      this.mem.delete(key);
      return;
    }

    const now = this.now();
    this.mem.set(key, { value, expiresAt: now + ttlSeconds * 1000 });
    this.sweep(now);
  }

  private sweep(now: number) {
    if (this.mem.size === 0) return;
    if (now - this.lastSweepAt < this.sweepEveryMs) return;

    this.lastSweepAt = now;

    // 1) remove expired (best effort, bounded)
    let checked = 0;
    for (const [k, v] of this.mem) {
      if (v.expiresAt <= now) this.mem.delete(k);
      checked++;
      if (checked >= this.sweepBatch) break;
    }

    // 2) hard cap eviction (oldest first)
    if (this.mem.size > this.maxEntries) {
      const toDrop = this.mem.size - this.maxEntries;
      let dropped = 0;
      for (const k of this.mem.keys()) {
        this.mem.delete(k);
        dropped++;
        if (dropped >= toDrop) break;
      }
    }
  }
}

export function createKvStore(): KvStore {
  const url = env.UPSTASH_REDIS_REST_URL;
  const token = env.UPSTASH_REDIS_REST_TOKEN;
  if (url && token) return new UpstashKvStore(new Redis({ url, token }));
  return new MemoryKvStore();
}
