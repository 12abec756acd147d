import type { CircuitBreakerConfig } from './types';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export class CircuitOpenError extends Error {
  constructor(message: string = 'Circuit breaker is open') {
    super(message);
    this.name = 'CircuitOpenError';
  }
}

export interface CircuitBreaker {
  execute<T>(fn: () => Promise<T>): Promise<T>;
  getStats(): { state: CircuitState; consecutiveFailures: number };
}

export function createCircuitBreaker(config: CircuitBreakerConfig): CircuitBreaker {
  let state: CircuitState = CircuitState.CLOSED;
  let consecutiveFailures = 0;
  let lastFailureTime: number | undefined;
  let probesInFlight = 0;

  function refreshState(): void {
    if (state === CircuitState.OPEN && lastFailureTime !== undefined) {
      if (Date.now() - lastFailureTime >= config.resetTimeoutMs) {
        state = CircuitState.HALF_OPEN;
        probesInFlight = 0;
      }
    }
  }

  function getStats(): ReturnType<CircuitBreaker['getStats']> {
    refreshState();
    return { state, consecutiveFailures };
  }

  async function execute<T>(fn: () => Promise<T>): Promise<T> {
    refreshState();

    if (state === CircuitState.OPEN) {
      throw new CircuitOpenError();
    }

    const probing = state === CircuitState.HALF_OPEN;
    if (probing) {
      if (probesInFlight >= config.halfOpenRequests) {
        throw new CircuitOpenError('Circuit breaker is half-open and probe limit reached');
      }
      probesInFlight++;
    }

    try {
      const result = await fn();
      consecutiveFailures = 0;
      state = CircuitState.CLOSED;
      return result;
    } catch (error) {
      consecutiveFailures++;
      lastFailureTime = Date.now();
      // A failed probe reopens immediately
      if (probing || consecutiveFailures >= config.failureThreshold) {
        state = CircuitState.OPEN;
      }
      throw error;
    } finally {
      if (probing) {
        probesInFlight = Math.max(0, probesInFlight - 1);
      }
    }
  }

  return { execute, getStats };
}
