import { createLogger } from './logger';
import { createRateLimiter } from './rate-limiter';
import { retryWithBackoff } from './retry';
import { createCircuitBreaker } from './circuit-breaker';
import type { Logger } from './logger';
import type { ReliabilityConfig, ReliabilityWrapper } from './types';

// fbref.com asks scrapers to stay under 10 requests a minute
export const DEFAULT_RELIABILITY_CONFIG: ReliabilityConfig = {
  rateLimiter: {
    requestsPerMinute: 10,
    minDelayMs: 6000,
    jitterMs: 500,
  },
  retry: {
    maxRetries: 3,
    initialDelayMs: 2000,
    maxDelayMs: 30000,
    backoffMultiplier: 2,
  },
  circuitBreaker: {
    failureThreshold: 5,
    resetTimeoutMs: 60000,
    halfOpenRequests: 1,
  },
  requestTimeoutMs: 30000,
};

export interface ReliabilityOverrides {
  rateLimiter?: Partial<ReliabilityConfig['rateLimiter']>;
  retry?: Partial<ReliabilityConfig['retry']>;
  circuitBreaker?: Partial<ReliabilityConfig['circuitBreaker']>;
  requestTimeoutMs?: number;
}

export function resolveReliabilityConfig(overrides: ReliabilityOverrides = {}): ReliabilityConfig {
  return {
    rateLimiter: { ...DEFAULT_RELIABILITY_CONFIG.rateLimiter, ...overrides.rateLimiter },
    retry: { ...DEFAULT_RELIABILITY_CONFIG.retry, ...overrides.retry },
    circuitBreaker: { ...DEFAULT_RELIABILITY_CONFIG.circuitBreaker, ...overrides.circuitBreaker },
    requestTimeoutMs: overrides.requestTimeoutMs ?? DEFAULT_RELIABILITY_CONFIG.requestTimeoutMs,
  };
}

/**
 * Runs requests through the rate limiter, then retry with backoff around the circuit breaker.
 */
export function createReliabilityWrapper(
  overrides: ReliabilityOverrides = {},
  logger: Logger = createLogger('reliability')
): ReliabilityWrapper {
  const config = resolveReliabilityConfig(overrides);
  const rateLimiter = createRateLimiter(config.rateLimiter);
  const circuitBreaker = createCircuitBreaker(config.circuitBreaker);

  async function execute<T>(fn: () => Promise<T>, label?: string): Promise<T> {
    const timer = logger.startTimer();

    await rateLimiter.acquire();
    logger.debug('Rate limiter acquired', { label, ...rateLimiter.getStats() });

    const result = await retryWithBackoff(() => circuitBreaker.execute(fn), config.retry);
    const durationMs = timer.end();

    if (result.success) {
      logger.debug('Request succeeded', {
        label,
        attempts: result.attempts,
        durationMs,
      });
      return result.value;
    }

    logger.error('Request failed after retries', {
      label,
      attempts: result.attempts,
      durationMs,
      error: result.error.message,
      circuitState: circuitBreaker.getStats().state,
    });
    throw result.error;
  }

  return { execute };
}

export { createLogger, isLogLevel, isLogFormat } from './logger';
export type { Logger, LogLevel, LogFormat } from './logger';
export type { ReliabilityConfig, ReliabilityWrapper } from './types';
export { CircuitState, CircuitOpenError } from './circuit-breaker';
