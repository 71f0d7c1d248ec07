/**
 * Contract test: Reddit password grant
 *
 * Reddit "script" apps authenticate with:
 * - client_secret_basic on https://www.reddit.com/api/v1/access_token
 * - grant_type=password with the account's username and password
 * - a descriptive User-Agent on every request
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import nock from 'nock';
import { RedditAuth } from '../../src/core/auth/RedditAuth';
import { AuthError } from '../../src/utils/errors';
import { asLogger, createMockLogger } from '../helpers/mocks';

const USER_AGENT = 'node:test-transfer:v1.0';

function tokenEndpoint() {
  return nock('https://www.reddit.com')
    .post(
      '/api/v1/access_token',
      (body) =>
        body.grant_type === 'password' &&
        body.username === 'alice' &&
        body.password === 'test-password' &&
        body.scope === '*'
    )
    .basicAuth({ user: 'alice-app', pass: 'test-secret' })
    .matchHeader('User-Agent', USER_AGENT);
}

describe('Reddit Password Grant Contract', () => {
  let auth: RedditAuth;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    nock.cleanAll();
    auth = new RedditAuth(
      {
        clientId: 'alice-app',
        clientSecret: 'test-secret',
        username: 'alice',
        password: 'test-password',
        userAgent: USER_AGENT,
      },
      asLogger(createMockLogger())
    );
  });

  it('should run the password grant and cache the token', async () => {
    const scope = tokenEndpoint().reply(200, {
      access_token: 'test-token',
      token_type: 'bearer',
      expires_in: 3600,
      scope: '*',
    });

    expect(await auth.getAccessToken()).toBe('test-token');
    expect(await auth.getAccessToken()).toBe('test-token');
    expect(scope.isDone()).toBe(true);
    expect(auth.username).toBe('alice');
  });

  it('should share one grant between concurrent callers', async () => {
    tokenEndpoint().reply(200, { access_token: 'test-token', token_type: 'bearer', expires_in: 3600 });

    const tokens = await Promise.all([auth.getAccessToken(), auth.getAccessToken()]);

    expect(tokens).toEqual(['test-token', 'test-token']);
  });

  it('should grant again when the token is about to expire', async () => {
    tokenEndpoint().reply(200, { access_token: 'short-lived', token_type: 'bearer', expires_in: 30 });
    tokenEndpoint().reply(200, { access_token: 'second-token', token_type: 'bearer', expires_in: 3600 });

    expect(await auth.getAccessToken()).toBe('short-lived');
    expect(await auth.getAccessToken()).toBe('second-token');
  });

  it('should grant again after invalidate', async () => {
    tokenEndpoint().reply(200, { access_token: 'test-token', token_type: 'bearer', expires_in: 3600 });
    tokenEndpoint().reply(200, { access_token: 'fresh-token', token_type: 'bearer', expires_in: 3600 });

    await auth.getAccessToken();
    auth.invalidate();

    expect(await auth.getAccessToken()).toBe('fresh-token');
  });

  it('should raise AuthError on a rejected login', async () => {
    tokenEndpoint().reply(400, { error: 'invalid_grant' });

    const error = await auth.getAccessToken().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AuthError);
    expect((error as AuthError).message).toBe('Authentication failed for /u/alice');
    expect((error as AuthError).code).toBe('AUTH_FAILED');
  });
});
