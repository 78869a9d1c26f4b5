import { GatewayError } from "../errors";

/**
 * Sleep for specified milliseconds; aborting the signal rejects with "cancelled"
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new GatewayError("cancelled", "Operation cancelled"));
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new GatewayError("cancelled", "Operation cancelled"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Exponential backoff based on a base delay, capped to 30s
 */
export function backoffDelay(baseDelay: number, attempt: number): number {
  return Math.min(baseDelay * Math.pow(2, attempt - 1), 30000);
}

/**
 * Race a promise against a timeout and an optional abort signal.
 * The timer and abort listener are always released once the race settles;
 * the underlying operation is not aborted.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  errorMessage: string,
  signal?: AbortSignal
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new GatewayError("cancelled", "Operation cancelled"));
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      cleanup();
      reject(new GatewayError("timeout", errorMessage, { details: { timeoutMs: ms } }));
    }, ms);

    const onAbort = () => {
      cleanup();
      reject(new GatewayError("cancelled", "Operation cancelled"));
    };

    function cleanup() {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }

    signal?.addEventListener("abort", onAbort, { once: true });

    promise.then(
      value => {
        cleanup();
        resolve(value);
      },
      error => {
        cleanup();
        reject(error);
      }
    );
  });
}
