export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  retryAfterMs: number;
}

const WINDOW_MS = 60_000;

/**
 * Per-caller sliding one-minute window
 */
export class SlidingWindowRateLimiter {
  private readonly requests = new Map<string, number[]>();
  private lastSweep = 0;

  constructor(private readonly limitPerMinute: number) {}

  get enabled(): boolean {
    return this.limitPerMinute > 0;
  }

  check(key: string, nowMs: number = Date.now()): RateLimitResult {
    if (!this.enabled) {
      return { allowed: true, remaining: Number.POSITIVE_INFINITY, retryAfterMs: 0 };
    }

    const windowStart = nowMs - WINDOW_MS;
    if (nowMs - this.lastSweep >= WINDOW_MS) {
      this.sweep(windowStart);
      this.lastSweep = nowMs;
    }

    const history = this.requests.get(key) ?? [];

    while (history.length > 0 && (history[0] ?? 0) <= windowStart) {
      history.shift();
    }

    if (history.length >= this.limitPerMinute) {
      const oldest = history[0] ?? nowMs;
      this.requests.set(key, history);
      return {
        allowed: false,
        remaining: 0,
        retryAfterMs: Math.max(0, oldest + WINDOW_MS - nowMs),
      };
    }

    history.push(nowMs);
    this.requests.set(key, history);

    return {
      allowed: true,
      remaining: Math.max(0, this.limitPerMinute - history.length),
      retryAfterMs: 0,
    };
  }

  /** Number of callers with requests still inside the window */
  get trackedCallers(): number {
    return this.requests.size;
  }

  reset(): void {
    this.requests.clear();
    this.lastSweep = 0;
  }

  // Drop callers whose newest request has left the window
  private sweep(windowStart: number): void {
    for (const [key, history] of this.requests) {
      const newest = history[history.length - 1];
      if (newest === undefined || newest <= windowStart) {
        this.requests.delete(key);
      }
    }
  }
}
