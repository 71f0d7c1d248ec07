// src/config/ConfigValidator.ts

import { z } from 'zod';
import * as dotenv from 'dotenv';

// Credential Store Configuration Schema
const CredentialStoreConfigSchema = z
  .object({
    backend: z.enum(['memory', 'redis', 'postgres'], {
      errorMap: () => ({ message: "Credential store backend must be 'memory', 'redis', or 'postgres'" }),
    }),
    url: z.string().url().optional(),
    namespace: z.string().min(1).optional(),
    encryption: z
      .object({
        key: z
          .string()
          .length(64, 'Encryption key must be exactly 64 characters')
          .regex(
            /^[0-9a-f]{64}$/i,
            'Encryption key must be a valid 32-byte hexadecimal string (0-9, a-f)'
          ),
        previousKeys: z.array(z.string().regex(/^[0-9a-f]{64}$/i)).optional(),
        algorithm: z.literal('aes-256-gcm'),
      })
      .optional(),
  })
  .refine((data) => data.backend === 'memory' || !!data.url, {
    message: "Redis and Postgres backends require 'url' configuration",
  });

// Retry Configuration Schema
const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10),
    baseDelay: z.number().positive(),
    maxDelay: z.number().positive(),
    retryableStatusCodes: z.array(z.number().int().min(100).max(599)),
  })
  .refine((data) => data.maxDelay >= data.baseDelay, {
    message: 'maxDelay must be greater than or equal to baseDelay',
  });

// Reddit allows 100 requests per minute per client id
const RateLimitConfigSchema = z.object({
  qps: z.number().positive(),
  concurrency: z.number().int().positive(),
});

const CircuitBreakerConfigSchema = z.object({
  threshold: z.number().int().positive().optional(),
  resetTimeout: z.number().int().positive().optional(),
});

const RedditConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
  tokenEndpoint: z.string().url().optional(),
  pageSize: z.number().int().min(1).max(100).optional(),
  scopes: z.array(z.string().min(1)).optional(),
});

const SyncConfigSchema = z.object({
  itemRetry: RetryConfigSchema.optional(),
});

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .optional();

export const TransferConfigSchema = z.object({
  credentials: CredentialStoreConfigSchema,
  http: z.object({
    userAgent: z.string().min(1, 'Reddit requires a descriptive User-Agent'),
    timeout: z.number().positive().optional(),
    retry: RetryConfigSchema,
    rateLimit: RateLimitConfigSchema.default({ qps: 1.5, concurrency: 1 }),
    circuitBreaker: CircuitBreakerConfigSchema.optional(),
  }),
  reddit: RedditConfigSchema.default({}),
  sync: SyncConfigSchema.default({}),
  metrics: MetricsConfigSchema,
  logging: LoggerConfigSchema,
});

/** Configuration as callers write it; defaults not yet applied */
export type TransferConfig = z.input<typeof TransferConfigSchema>;
export type ResolvedTransferConfig = z.output<typeof TransferConfigSchema>;

/**
 * Validate transfer configuration
 *
 * @returns Validated configuration with defaults applied
 * @throws {z.ZodError} If configuration is invalid
 */
export function validateConfig(config: unknown): ResolvedTransferConfig {
  return TransferConfigSchema.parse(config);
}

export type ConfigValidationResult =
  | { success: true; data: ResolvedTransferConfig }
  | { success: false; errors: string[] };

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(config: unknown): ConfigValidationResult {
  const result = TransferConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}

export const DEFAULT_USER_AGENT = 'node:reddit-account-transfer:v0.1.0';

function envNumber(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

function envList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Build and validate a configuration from environment variables, loading a
 * `.env` file first when one exists.
 *
 * | Variable | Default |
 * | --- | --- |
 * | CREDENTIAL_STORE_BACKEND | memory |
 * | CREDENTIAL_STORE_URL | |
 * | CREDENTIAL_ENCRYPTION_KEY / CREDENTIAL_PREVIOUS_KEYS | |
 * | REDDIT_USER_AGENT | node:reddit-account-transfer:v0.1.0 |
 * | HTTP_TIMEOUT_MS, HTTP_MAX_RETRIES | 30000, 3 |
 * | REDDIT_QPS | 1.5 |
 * | ITEM_MAX_RETRIES | 2 |
 * | LOG_LEVEL, LOG_FORMAT | info, json |
 * | METRICS_ENABLED | true |
 */
export function loadConfigFromEnv(
  options: { path?: string; env?: NodeJS.ProcessEnv } = {}
): ResolvedTransferConfig {
  const env = options.env ?? process.env;
  if (!options.env) {
    dotenv.config({ path: options.path });
  }

  const encryptionKey = env.CREDENTIAL_ENCRYPTION_KEY;
  const itemRetries = envNumber(env.ITEM_MAX_RETRIES);

  return validateConfig({
    credentials: {
      backend: env.CREDENTIAL_STORE_BACKEND ?? 'memory',
      url: env.CREDENTIAL_STORE_URL || undefined,
      encryption: encryptionKey
        ? {
            key: encryptionKey,
            previousKeys: envList(env.CREDENTIAL_PREVIOUS_KEYS),
            algorithm: 'aes-256-gcm',
          }
        : undefined,
    },
    http: {
      userAgent: env.REDDIT_USER_AGENT || DEFAULT_USER_AGENT,
      timeout: envNumber(env.HTTP_TIMEOUT_MS),
      retry: {
        maxRetries: envNumber(env.HTTP_MAX_RETRIES) ?? 3,
        baseDelay: 1000,
        maxDelay: 30000,
        retryableStatusCodes: [429, 500, 502, 503, 504],
      },
      rateLimit: {
        qps: envNumber(env.REDDIT_QPS) ?? 1.5,
        concurrency: 1,
      },
    },
    sync: {
      itemRetry:
        itemRetries === undefined
          ? undefined
          : {
              maxRetries: itemRetries,
              baseDelay: 1000,
              maxDelay: 30000,
              retryableStatusCodes: [429, 500, 502, 503, 504],
            },
    },
    metrics: { enabled: env.METRICS_ENABLED !== 'false' },
    logging: {
      level: env.LOG_LEVEL || undefined,
      format: env.LOG_FORMAT || undefined,
    },
  });
}
