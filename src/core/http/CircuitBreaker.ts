// src/core/http/CircuitBreaker.ts

import type { Logger } from '../../observability/Logger';
import type { CircuitBreakerConfig } from './types';

export class CircuitBreaker {
  private failures: Map<string, number> = new Map();
  private lastFailureTime: Map<string, number> = new Map();
  private threshold: number;
  private resetTimeout: number;

  constructor(
    private logger: Logger,
    options: CircuitBreakerConfig = {}
  ) {
    this.threshold = options.threshold ?? 5;
    this.resetTimeout = options.resetTimeout ?? 60000; // 1 minute
  }

  canExecute(key: string): boolean {
    const failures = this.failures.get(key) ?? 0;
    const lastFailure = this.lastFailureTime.get(key) ?? 0;

    if (failures >= this.threshold) {
      const timeSinceLastFailure = Date.now() - lastFailure;

      if (timeSinceLastFailure < this.resetTimeout) {
        this.logger.warn('Circuit breaker open', { key, failures });
        return false;
      }

      // Half-open: let the next request through
      this.failures.set(key, 0);
    }

    return true;
  }

  /** Milliseconds until an open circuit goes half-open; 0 when closed */
  remainingOpenTime(key: string): number {
    if ((this.failures.get(key) ?? 0) < this.threshold) return 0;
    const lastFailure = this.lastFailureTime.get(key) ?? 0;
    return Math.max(0, this.resetTimeout - (Date.now() - lastFailure));
  }

  recordSuccess(key: string): void {
    this.failures.set(key, 0);
  }

  recordFailure(key: string): void {
    const current = this.failures.get(key) ?? 0;
    this.failures.set(key, current + 1);
    this.lastFailureTime.set(key, Date.now());
  }
}
