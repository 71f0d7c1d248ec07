// src/core/http/HttpCore.ts

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import type { HttpCoreOptions, HttpRequestConfig, HttpResponse } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { RetryHandler, parseRetryAfter } from './RetryHandler';
import { CircuitBreaker } from './CircuitBreaker';
import {
  ApiClientError,
  ApiServerError,
  NetworkTimeoutError,
  NetworkError,
  CircuitBreakerOpenError,
  RateLimitError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

/**
 * Rate-limited, retrying HTTP transport for a single account.
 *
 * Reddit budgets requests per OAuth client id, so each account gets its own
 * HttpCore and therefore its own queue and circuit.
 */
export class HttpCore {
  private axiosInstance: AxiosInstance;
  private rateLimiter: PQueue;
  private retryHandler: RetryHandler;
  private circuitBreaker: CircuitBreaker;
  private readonly account: string;

  constructor(
    private options: HttpCoreOptions,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {
    this.account = options.account;
    this.circuitBreaker = new CircuitBreaker(logger, options.circuitBreaker);
    this.retryHandler = new RetryHandler(options.retry, logger, this.circuitBreaker, metrics);

    this.axiosInstance = axios.create({
      timeout: options.timeout ?? 30000,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
    });

    this.rateLimiter = this.createRateLimiter();
  }

  async get<T = unknown>(
    url: string,
    config: Omit<HttpRequestConfig, 'url' | 'method'> = {}
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'GET' });
  }

  async post<T = unknown>(
    url: string,
    body: unknown,
    config: Omit<HttpRequestConfig, 'url' | 'method' | 'body'> = {}
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'POST', body });
  }

  async request<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const requestId = this.generateRequestId();
    const method = config.method ?? 'GET';

    this.metrics.incrementCounter('http_requests_total', {
      account: this.account,
      method,
      status: 'initiated',
    });

    this.logger.debug('HTTP request', {
      requestId,
      account: this.account,
      url: config.url,
      method,
      query: config.query,
      headerKeys: Object.keys(config.headers ?? {}),
    });

    if (!this.circuitBreaker.canExecute(this.account)) {
      throw new CircuitBreakerOpenError(
        `Circuit breaker open for ${this.account}`,
        this.circuitBreaker.remainingOpenTime(this.account),
        { account: this.account }
      );
    }

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': this.options.userAgent,
      'Accept-Encoding': 'gzip, deflate',
      ...config.headers,
    };

    const execute = async (): Promise<HttpResponse<T>> => {
      return withHttpSpan(method, config.url, async () => {
        const startTime = Date.now();

        try {
          const send = () =>
            this.axiosInstance.request<T>({
              url: config.url,
              method,
              headers,
              params: config.query,
              data: config.body,
              timeout: config.timeout,
            });
          const axiosResponse = config.skipRetry
            ? await send()
            : await this.retryHandler.execute(send, this.account);

          this.circuitBreaker.recordSuccess(this.account);

          this.metrics.incrementCounter('http_requests_total', {
            account: this.account,
            method,
            status: axiosResponse.status.toString(),
          });
          this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
            account: this.account,
            status: axiosResponse.status,
          });

          return {
            data: axiosResponse.data,
            status: axiosResponse.status,
            headers: this.toHeaderRecord(axiosResponse.headers),
          };
        } catch (error: unknown) {
          const status = axios.isAxiosError(error) ? error.response?.status : undefined;

          // Client errors are about the item, not the service
          if (status === undefined || status >= 500) {
            this.circuitBreaker.recordFailure(this.account);
          }

          this.metrics.incrementCounter('http_requests_total', {
            account: this.account,
            method,
            status: status?.toString() ?? 'error',
          });
          this.metrics.incrementCounter('http_errors', {
            account: this.account,
            status: status ?? 'error',
          });

          throw this.transformError(error);
        }
      });
    };

    return this.runThroughRateLimiter(config.skipRateLimit, execute);
  }

  private async runThroughRateLimiter<T>(
    skip: boolean | undefined,
    task: () => Promise<T>
  ): Promise<T> {
    if (skip) {
      return task();
    }

    const wrappedTask = async () => {
      try {
        return await task();
      } finally {
        this.metrics.recordGauge('rate_limit_queue_size', this.rateLimiter.size, {
          account: this.account,
        });
      }
    };

    this.metrics.recordGauge('rate_limit_queue_size', this.rateLimiter.size + 1, {
      account: this.account,
    });

    return this.rateLimiter.add(wrappedTask);
  }

  private createRateLimiter(): PQueue {
    const { qps, concurrency } = this.options.rateLimit;

    // Fractional QPS becomes one request per longer interval
    let intervalCap: number;
    let interval: number;
    if (qps >= 1) {
      intervalCap = Math.floor(qps);
      interval = 1000;
    } else {
      intervalCap = 1;
      interval = Math.floor(1000 / qps);
    }

    this.logger.debug('Rate limiter initialized', {
      account: this.account,
      originalQps: qps,
      intervalCap,
      interval,
      concurrency,
    });

    return new PQueue({ intervalCap, interval, concurrency });
  }

  private generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(7)}`;
  }

  private toHeaderRecord(headers: AxiosResponse['headers']): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown): Error {
    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new NetworkError('Network error', { cause: error });
    }

    if (error.response) {
      const status = error.response.status;

      this.logger.debug('HTTP error response', {
        account: this.account,
        status,
        statusText: error.response.statusText,
        data: error.response.data,
      });

      if (status === 429) {
        const header = error.response.headers['retry-after'];
        const retryAfterMs = parseRetryAfter(typeof header === 'string' ? header : undefined);
        return new RateLimitError(
          'Rate limit exceeded',
          retryAfterMs !== undefined ? Math.ceil(retryAfterMs / 1000) : undefined,
          { account: this.account }
        );
      }
      if (status >= 400 && status < 500) {
        return new ApiClientError(`Client error: ${status}`, status, {
          account: this.account,
          response: error.response.data,
        });
      }
      if (status >= 500) {
        return new ApiServerError(`Server error: ${status}`, status, { account: this.account });
      }
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { account: this.account });
    }
    return new NetworkError('Network error', { account: this.account, cause: error.message });
  }
}
