// tests/unit/Logger.test.ts

import { describe, it, expect } from 'vitest';
import { Logger } from '../../src/observability/Logger';

describe('Logger', () => {
  const logger = new Logger({ level: 'error', format: 'json' });

  it('should redact passwords and client secrets', () => {
    const redacted = logger['redactSensitive']({
      username: 'alice',
      password: 'test-password',
      clientSecret: 'test-secret',
    });

    expect(redacted).toEqual({
      username: 'alice',
      password: '[REDACTED]',
      clientSecret: '[REDACTED]',
    });
  });

  it('should redact tokens', () => {
    const redacted = logger['redactSensitive']({
      accessToken: 'test-token',
      refreshToken: 'test-refresh',
    });

    expect(redacted).toEqual({ accessToken: '[REDACTED]', refreshToken: '[REDACTED]' });
  });

  it('should redact nested login and credentials fields', () => {
    const redacted = logger['redactSensitive']({
      login: { username: 'alice', password: 'test-password' },
      credentials: { clientId: 'app-id', clientSecret: 'test-secret' },
    });

    expect(redacted).toEqual({
      login: { username: 'alice', password: '[REDACTED]' },
      credentials: { clientId: 'app-id', clientSecret: '[REDACTED]' },
    });
  });

  it('should flatten errors to their message', () => {
    const redacted = logger['redactSensitive']({ error: new Error('boom'), itemId: 't3_abc' });

    expect(redacted).toEqual({ error: 'boom', itemId: 't3_abc' });
  });

  it('should preserve non-sensitive data', () => {
    const data = { category: 'savedSave', itemId: 't3_abc', outcome: 'applied' };

    expect(logger['redactSensitive'](data)).toEqual(data);
  });

  it('should not throw when logging', () => {
    const pretty = new Logger({ level: 'error', format: 'pretty' });
    expect(() => {
      logger.debug('Debug message', { key: 'value' });
      logger.info('Info message');
      logger.warn('Warn message', { key: 'value' });
      pretty.debug('Pretty debug', { password: 'test-password' });
    }).not.toThrow();
  });
});
