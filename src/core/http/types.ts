// src/core/http/types.ts

export interface HttpRequestConfig {
  url: string;
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  timeout?: number;
  skipRateLimit?: boolean;
  /** Send once; the caller owns retrying */
  skipRetry?: boolean;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export interface RateLimitConfig {
  qps: number; // Queries per second
  concurrency: number; // Max concurrent requests
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number; // milliseconds
  maxDelay: number;
  retryableStatusCodes: number[];
}

export interface CircuitBreakerConfig {
  /** Consecutive 5xx or network failures that open the circuit */
  threshold?: number;
  /** Milliseconds the circuit stays open */
  resetTimeout?: number;
}

export interface HttpCoreOptions {
  /** Account label used for metrics, logs and the circuit breaker */
  account: string;
  userAgent: string;
  rateLimit: RateLimitConfig;
  retry: RetryConfig;
  circuitBreaker?: CircuitBreakerConfig;
  timeout?: number;
}
