import type { StorageConfig } from "../config/schema";
import type { Logger } from "../logger";
import { MemoryStorage } from "./memory";
import { RedisStorage } from "./redis";
import type { RedisClientLike } from "./redis";
import { RetryingStorage } from "./retrying";
import type { StorageBackend } from "./types";

export * from "./types";
export * from "./memory";
export * from "./redis";
export * from "./retrying";

/**
 * Create the configured storage backend, wrapped with bounded retries
 */
export function createStorage(
  config: StorageConfig,
  options?: { logger?: Logger; redisClient?: RedisClientLike }
): StorageBackend {
  const backend: StorageBackend =
    config.type === "redis"
      ? new RedisStorage({ url: config.url, client: options?.redisClient, logger: options?.logger })
      : new MemoryStorage();

  if (config.retryAttempts === 0) {
    return backend;
  }

  return new RetryingStorage(backend, {
    retryAttempts: config.retryAttempts,
    retryDelay: config.retryDelay,
    logger: options?.logger,
  });
}
