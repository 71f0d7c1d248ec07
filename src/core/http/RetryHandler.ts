// src/core/http/RetryHandler.ts

import axios from 'axios';
import type { RetryConfig } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { CircuitBreaker } from './CircuitBreaker';
import {
  ApiError,
  CircuitBreakerOpenError,
  NetworkError,
  RateLimitError,
} from '../../utils/errors';

export interface RetryDecision {
  retryable: boolean;
  status?: number;
  /** Server-provided delay (Retry-After), milliseconds */
  retryAfterMs?: number;
}

export type RetryClassifier = (error: unknown) => RetryDecision;

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | undefined): number | undefined {
  if (!value) return undefined;

  const seconds = parseInt(value, 10);
  if (!isNaN(seconds)) {
    return seconds * 1000;
  }

  const retryDate = new Date(value);
  if (isNaN(retryDate.getTime())) return undefined;
  return Math.max(0, retryDate.getTime() - Date.now());
}

/**
 * Classifies both raw axios errors (wire level) and transformed
 * TransferErrors (item level) against the configured status codes.
 */
export function classifyRetry(error: unknown, retryableStatusCodes: number[]): RetryDecision {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      // No response at all: connection reset, DNS, timeout
      return { retryable: true };
    }
    const header = error.response?.headers['retry-after'];
    return {
      retryable: retryableStatusCodes.includes(status),
      status,
      retryAfterMs: parseRetryAfter(typeof header === 'string' ? header : undefined),
    };
  }

  if (error instanceof RateLimitError) {
    return {
      retryable: retryableStatusCodes.includes(429),
      status: 429,
      retryAfterMs: error.retryAfter !== undefined ? error.retryAfter * 1000 : undefined,
    };
  }

  if (error instanceof ApiError) {
    return { retryable: retryableStatusCodes.includes(error.status), status: error.status };
  }

  if (error instanceof CircuitBreakerOpenError) {
    return { retryable: false };
  }

  if (error instanceof NetworkError) {
    return { retryable: true };
  }

  return { retryable: false };
}

export class RetryHandler {
  constructor(
    private config: RetryConfig,
    private logger: Logger,
    private circuitBreaker?: CircuitBreaker,
    private metrics?: MetricsCollector
  ) {}

  async execute<T>(
    task: () => Promise<T>,
    key: string,
    classify: RetryClassifier = (error) => classifyRetry(error, this.config.retryableStatusCodes)
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      // Check circuit breaker before each retry attempt (not just first attempt)
      if (attempt > 0 && this.circuitBreaker && !this.circuitBreaker.canExecute(key)) {
        this.logger.warn('Circuit breaker open, skipping retry', { key, attempt });
        throw lastError;
      }

      try {
        return await task();
      } catch (error: unknown) {
        lastError = error;

        const decision = classify(error);
        if (!decision.retryable || attempt === this.config.maxRetries) {
          throw error;
        }

        let delay: number;
        if (decision.retryAfterMs !== undefined) {
          delay = Math.min(decision.retryAfterMs, this.config.maxDelay);
          this.logger.warn('Retrying with Retry-After', {
            key,
            attempt: attempt + 1,
            delay,
            status: decision.status,
          });
        } else {
          // Exponential backoff with jitter
          delay = Math.min(
            this.config.baseDelay * Math.pow(2, attempt) + Math.random() * this.config.baseDelay,
            this.config.maxDelay
          );
          this.logger.warn('Retrying request', {
            key,
            attempt: attempt + 1,
            delay,
            status: decision.status,
          });
        }

        this.metrics?.incrementCounter('http_retries', { account: key });
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }

    throw lastError;
  }
}
