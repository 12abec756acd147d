import type { RateLimiterConfig } from './types';

export interface RateLimiter {
  acquire(): Promise<void>;
  getStats(): { requestsInWindow: number; currentDelayMs: number };
}

const WINDOW_MS = 60_000;

/**
 * Sliding one-minute window limiter. Every request after the first waits at
 * least `minDelayMs` since the previous one, plus up to `jitterMs`; once the
 * window is full it waits for the oldest request in it to expire. Timestamps
 * are the scheduled start of each request, which may lie in the future.
 */
export function createRateLimiter(config: RateLimiterConfig): RateLimiter {
  const timestamps: number[] = [];

  function prune(now: number): void {
    const cutoff = now - WINDOW_MS;
    while (timestamps.length > 0 && timestamps[0] < cutoff) {
      timestamps.shift();
    }
  }

  function baseDelay(now: number): number {
    prune(now);
    if (timestamps.length === 0) {
      return 0;
    }

    const spacing = Math.max(0, timestamps[timestamps.length - 1] + config.minDelayMs - now);

    if (timestamps.length < config.requestsPerMinute) {
      return spacing;
    }

    const windowStart = timestamps[timestamps.length - config.requestsPerMinute];
    return Math.max(windowStart + WINDOW_MS - now, spacing);
  }

  // The slot is reserved before waiting so concurrent callers queue behind it
  async function acquire(): Promise<void> {
    const now = Date.now();
    const delay = baseDelay(now);
    const wait = delay > 0 ? delay + Math.random() * config.jitterMs : 0;

    timestamps.push(now + wait);
    if (wait > 0) {
      await new Promise((resolve) => setTimeout(resolve, wait));
    }
  }

  function getStats(): ReturnType<RateLimiter['getStats']> {
    const now = Date.now();
    return {
      currentDelayMs: baseDelay(now),
      requestsInWindow: timestamps.length,
    };
  }

  return { acquire, getStats };
}
