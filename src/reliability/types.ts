export interface RateLimiterConfig {
  requestsPerMinute: number;
  minDelayMs: number;
  jitterMs: number;
}

export interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  resetTimeoutMs: number;
  halfOpenRequests: number; // concurrent probes allowed while half-open
}

/** Settings for everything between a page fetch and the network. */
export interface ReliabilityConfig {
  rateLimiter: RateLimiterConfig;
  retry: RetryConfig;
  circuitBreaker: CircuitBreakerConfig;
  requestTimeoutMs: number;
}

export interface ReliabilityWrapper {
  execute<T>(fn: () => Promise<T>, label?: string): Promise<T>;
}
