import { LRUCache } from "lru-cache";
import { SEP } from "../catalog/types";

export type SchemaCacheOptions = {
  /** Time-to-live in milliseconds */
  ttl: number;
  /** Maximum number of entries before the least recently used is evicted */
  maxSize: number;
  /** Clock in milliseconds (for testing) */
  now?: () => number;
};

export type SchemaCacheStats = {
  hits: number;
  misses: number;
  size: number;
  maxSize: number;
  hitRate: number;
};

type CacheEntry = {
  schema: Record<string, unknown>;
  writtenAt: number;
};

/**
 * Bounded, time-limited cache of tool input schemas keyed by namespaced name.
 *
 * Expiry is checked on read: an entry written at T is a hit while
 * now - T < ttl. At capacity, the least recently used entry is evicted.
 */
export class SchemaCache {
  private readonly entries: LRUCache<string, CacheEntry>;
  private readonly ttl: number;
  private readonly maxSize: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: SchemaCacheOptions) {
    this.ttl = options.ttl;
    this.maxSize = options.maxSize;
    this.now = options.now ?? Date.now;
    this.entries = new LRUCache<string, CacheEntry>({ max: options.maxSize });
  }

  get(key: string): Record<string, unknown> | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.now() - entry.writtenAt >= this.ttl) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    this.hits++;
    return entry.schema;
  }

  put(key: string, schema: Record<string, unknown>): void {
    this.entries.set(key, { schema, writtenAt: this.now() });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drop every entry belonging to a server; returns the number removed
   */
  removeServer(serverName: string): number {
    const prefix = `${serverName}${SEP}`;
    let removed = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Keys currently held, including expired entries not yet read */
  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): SchemaCacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.entries.size,
      maxSize: this.maxSize,
      hitRate: total > 0 ? Math.round((this.hits / total) * 100) : 0,
    };
  }
}
