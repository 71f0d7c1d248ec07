// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const REDACTED = '[REDACTED]';
const SENSITIVE_KEYS = ['password', 'clientSecret', 'accessToken', 'refreshToken'];

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.combine(winston.format.timestamp(), winston.format.json());

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      defaultMeta: { service: 'reddit-account-transfer' },
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(meta: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = { ...meta };

    for (const key of SENSITIVE_KEYS) {
      if (key in redacted) redacted[key] = REDACTED;
    }

    // Credentials nested under a login or credentials object
    for (const nestedKey of ['credentials', 'login']) {
      const nested = redacted[nestedKey];
      if (nested && typeof nested === 'object' && !Array.isArray(nested)) {
        redacted[nestedKey] = this.redactSensitive({ ...nested });
      }
    }

    if (redacted.error instanceof Error) {
      redacted.error = redacted.error.message;
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta ? this.redactSensitive(meta) : {});
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta ? this.redactSensitive(meta) : {});
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta ? this.redactSensitive(meta) : {});
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta ? this.redactSensitive(meta) : {});
  }
}
