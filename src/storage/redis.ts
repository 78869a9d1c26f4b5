import { createClient } from "redis";
import { errorMessage } from "../errors";
import type { Logger } from "../logger";
import { noopLogger } from "../logger";
import type { StorageBackend } from "./types";

/**
 * Subset of the node-redis client used by RedisStorage (DI seam for tests)
 */
export interface RedisClientLike {
  readonly isOpen: boolean;
  on(event: "error", listener: (error: Error) => void): unknown;
  connect(): Promise<unknown>;
  quit(): Promise<unknown>;
  get(key: string): Promise<unknown>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  scanIterator(options: { MATCH: string; COUNT?: number }): AsyncIterable<unknown>;
}

export interface RedisStorageOptions {
  /** Redis connection URL (e.g. redis://localhost:6379/0) */
  url?: string;
  /** Pre-configured client; the storage connects it on first use */
  client?: RedisClientLike;
  /** Reconnection attempts before a connect or command fails (default 5) */
  maxReconnects?: number;
  logger?: Logger;
}

/**
 * Reconnect strategy for node-redis: linear backoff, then give up so that
 * pending connects reject instead of waiting forever
 */
export function boundedReconnect(maxReconnects: number): (retries: number) => number | Error {
  return retries => {
    if (retries >= maxReconnects) {
      return new Error(`Redis unreachable after ${retries} reconnect attempt(s)`);
    }
    return Math.min((retries + 1) * 100, 1000);
  };
}

/**
 * Escape glob metacharacters so a literal prefix can be used with SCAN MATCH
 */
export function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, ch => `\\${ch}`);
}

/**
 * Persistent storage backed by a Redis server
 */
export class RedisStorage implements StorageBackend {
  private readonly client: RedisClientLike;
  private connecting: Promise<unknown> | null = null;

  constructor(options: RedisStorageOptions = {}) {
    const logger = options.logger ?? noopLogger;
    this.client =
      options.client ??
      createClient({
        url: options.url ?? "redis://localhost:6379/0",
        // Commands issued while disconnected reject instead of queueing
        disableOfflineQueue: true,
        socket: { reconnectStrategy: boundedReconnect(options.maxReconnects ?? 5) },
      });

    this.client.on("error", error => {
      logger.warn(`Redis client error: ${errorMessage(error)}`);
    });
  }

  private async ready(): Promise<RedisClientLike> {
    if (!this.client.isOpen) {
      this.connecting ??= this.client.connect().finally(() => {
        this.connecting = null;
      });
      await this.connecting;
    }
    return this.client;
  }

  async get(key: string): Promise<string | undefined> {
    const client = await this.ready();
    const value = await client.get(key);
    return value === null || value === undefined ? undefined : String(value);
  }

  async set(key: string, value: string): Promise<void> {
    const client = await this.ready();
    await client.set(key, value);
  }

  async delete(key: string): Promise<boolean> {
    const client = await this.ready();
    return (await client.del(key)) > 0;
  }

  async listKeys(prefix: string): Promise<string[]> {
    const client = await this.ready();
    const keys = new Set<string>();
    // SCAN may return a key more than once
    for await (const key of client.scanIterator({ MATCH: `${escapeGlob(prefix)}*`, COUNT: 100 })) {
      keys.add(String(key));
    }
    return Array.from(keys).sort();
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }
}
