import { GatewayError, errorMessage } from "../errors";
import type { Logger } from "../logger";
import { backoffDelay, sleep } from "../util/async";
import type { StorageBackend } from "./types";

export type RetryingStorageOptions = {
  /** Extra attempts after the first failure */
  retryAttempts: number;
  /** Base backoff delay in milliseconds */
  retryDelay: number;
  logger?: Logger;
};

/**
 * Retries transient backend failures, then surfaces "unavailable"
 */
export class RetryingStorage implements StorageBackend {
  constructor(
    private readonly inner: StorageBackend,
    private readonly options: RetryingStorageOptions
  ) {}

  private async attempt<T>(operation: string, key: string, fn: () => Promise<T>): Promise<T> {
    const maxAttempts = this.options.retryAttempts + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error;
        if (attempt < maxAttempts) {
          this.options.logger?.warn(`Storage ${operation} failed, retrying`, {
            key,
            attempt,
            error: errorMessage(error),
          });
          await sleep(backoffDelay(this.options.retryDelay, attempt));
        }
      }
    }

    throw new GatewayError(
      "unavailable",
      `Storage ${operation} failed after ${maxAttempts} attempt(s): ${errorMessage(lastError)}`,
      { cause: lastError, details: { key } }
    );
  }

  get(key: string): Promise<string | undefined> {
    return this.attempt("get", key, () => this.inner.get(key));
  }

  set(key: string, value: string): Promise<void> {
    return this.attempt("set", key, () => this.inner.set(key, value));
  }

  delete(key: string): Promise<boolean> {
    return this.attempt("delete", key, () => this.inner.delete(key));
  }

  listKeys(prefix: string): Promise<string[]> {
    return this.attempt("listKeys", prefix, () => this.inner.listKeys(prefix));
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}
