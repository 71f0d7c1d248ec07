// src/core/auth/RedditAuth.ts

import { Issuer, Client, custom } from 'openid-client';
import type { AccessToken, PasswordGrantConfig } from './types';
import type { Logger } from '../../observability/Logger';
import { AuthError, errorMessage } from '../../utils/errors';
import { withAuthSpan } from '../../observability/tracing';

export const REDDIT_TOKEN_ENDPOINT = 'https://www.reddit.com/api/v1/access_token';

/**
 * Password-grant authenticator for Reddit "script" apps.
 *
 * Script apps get no refresh token; an expiring token is replaced by
 * running the grant again with the same login.
 */
export class RedditAuth {
  private client: Client;
  private token?: AccessToken;
  private pendingGrant?: Promise<AccessToken>;
  protected preRefreshMarginMs: number = 60 * 1000;

  constructor(
    private config: PasswordGrantConfig,
    private logger: Logger
  ) {
    const issuer = new Issuer({
      issuer: 'https://www.reddit.com',
      token_endpoint: config.tokenEndpoint ?? REDDIT_TOKEN_ENDPOINT,
      // Reddit requires client_secret_basic authentication
      token_endpoint_auth_methods_supported: ['client_secret_basic'],
    });

    this.client = new issuer.Client({
      client_id: config.clientId,
      client_secret: config.clientSecret,
      token_endpoint_auth_method: 'client_secret_basic',
    });

    // Reddit rejects requests without a descriptive User-Agent
    this.client[custom.http_options] = (_url, options) => ({
      ...options,
      headers: { ...options.headers, 'User-Agent': config.userAgent },
    });
  }

  get username(): string {
    return this.config.username;
  }

  /**
   * Current access token, running the password grant when missing or about to expire.
   * Concurrent callers share one grant.
   */
  async getAccessToken(): Promise<string> {
    if (this.token && !this.isExpiring(this.token)) {
      return this.token.accessToken;
    }

    if (!this.pendingGrant) {
      this.pendingGrant = this.passwordGrant().finally(() => {
        this.pendingGrant = undefined;
      });
    }

    const token = await this.pendingGrant;
    return token.accessToken;
  }

  /**
   * Drop the cached token, e.g. after the API answered 401
   */
  invalidate(): void {
    this.token = undefined;
  }

  private isExpiring(token: AccessToken): boolean {
    return !!token.expiresAt && token.expiresAt.getTime() <= Date.now() + this.preRefreshMarginMs;
  }

  private async passwordGrant(): Promise<AccessToken> {
    return withAuthSpan(this.config.username, async () => {
      try {
        const tokenSet = await this.client.grant({
          grant_type: 'password',
          username: this.config.username,
          password: this.config.password,
          scope: (this.config.scopes ?? ['*']).join(' '),
        });

        if (!tokenSet.access_token) {
          throw new AuthError('Token response did not include an access token', {
            username: this.config.username,
          });
        }

        const token: AccessToken = {
          accessToken: tokenSet.access_token,
          expiresAt: tokenSet.expires_at ? new Date(tokenSet.expires_at * 1000) : undefined,
          scope: tokenSet.scope,
        };
        this.token = token;

        this.logger.info('Password grant succeeded', {
          username: this.config.username,
          expiresAt: token.expiresAt?.toISOString(),
          scope: token.scope,
        });

        return token;
      } catch (error: unknown) {
        if (error instanceof AuthError) throw error;

        this.logger.error('Password grant failed', {
          username: this.config.username,
          error: errorMessage(error),
        });
        throw new AuthError(`Authentication failed for /u/${this.config.username}`, {
          username: this.config.username,
          cause: errorMessage(error),
        });
      }
    });
  }
}
