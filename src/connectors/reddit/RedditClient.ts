import { z } from 'zod';
import type { Page, RemoteClient } from '../types';
import type { HttpCore } from '../../core/http/HttpCore';
import type { HttpRequestConfig } from '../../core/http/types';
import type { RedditAuth } from '../../core/auth/RedditAuth';
import type { SavedItemNormalizer } from '../../core/normalizer/SavedItemNormalizer';
import { toFullname, type SavedItem, type SavedItemKind } from '../../core/normalizer/types';
import type { Logger } from '../../observability/Logger';
import { ApiClientError } from '../../utils/errors';
import {
  RedditFriendsResponseSchema,
  RedditListingSchema,
  RedditMeSchema,
  RedditPreferencesSchema,
  RedditSubredditSchema,
  type RedditClientOptions,
  type RedditUserList,
} from './types';

export const REDDIT_API_BASE_URL = 'https://oauth.reddit.com';

export interface RedditClientDeps {
  http: HttpCore;
  auth: RedditAuth;
  normalizer: SavedItemNormalizer;
  logger: Logger;
}

type RedditRequest = Omit<HttpRequestConfig, 'url'> & { path: string };

/**
 * Reddit OAuth API client for one logged-in account
 *
 * Covers everything a transfer touches:
 * - Subscribed subreddits (subscribe / unsubscribe)
 * - Friends (friend / unfriend)
 * - Saved posts and comments (save / unsave)
 * - Account preferences
 *
 * Single-item mutations go out once; the sync engine retries them per item.
 *
 * @example
 * ```typescript
 * const client = new RedditClient({ http, auth, normalizer, logger });
 * const page = await client.listSavedItems();
 * await client.saveItem('submission', page.items[0].id);
 * ```
 */
export class RedditClient implements RemoteClient {
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private accountName?: string;

  constructor(
    private deps: RedditClientDeps,
    options: RedditClientOptions = {}
  ) {
    this.baseUrl = options.baseUrl ?? REDDIT_API_BASE_URL;
    this.pageSize = Math.min(options.pageSize ?? 100, 100); // Reddit max is 100
  }

  async listSubscriptions(cursor?: string): Promise<Page<string>> {
    const data = await this.call({
      path: '/subreddits/mine/subscriber',
      method: 'GET',
      query: this.listingQuery(cursor),
    });
    const listing = this.parse(RedditListingSchema, data, 'subreddits/mine/subscriber');

    return {
      items: listing.data.children.map(
        (child) => this.parse(RedditSubredditSchema, child.data, 'subreddit').display_name
      ),
      nextCursor: listing.data.after,
    };
  }

  /**
   * The friends endpoint is not paginated; the whole list arrives as one page.
   */
  async listFriends(_cursor?: string): Promise<Page<string>> {
    const data = await this.call({ path: '/api/v1/me/friends', method: 'GET' });
    const response = this.parse(RedditFriendsResponseSchema, data, 'me/friends');
    const userList: RedditUserList = Array.isArray(response) ? response[0] : response;

    return {
      items: userList.data.children.map((friend) => friend.name),
      nextCursor: null,
    };
  }

  async listSavedItems(cursor?: string): Promise<Page<SavedItem>> {
    // /user/me/saved is not supported; the listing needs the real account name
    const name = await this.resolveAccountName();
    const data = await this.call({
      path: `/user/${encodeURIComponent(name)}/saved`,
      method: 'GET',
      query: this.listingQuery(cursor),
    });
    const listing = this.parse(RedditListingSchema, data, 'user/saved');

    const items = this.deps.normalizer.normalize(listing.data.children);

    this.deps.logger.debug('Saved page fetched', {
      account: name,
      itemCount: items.length,
      hasMore: !!listing.data.after,
    });

    return { items, nextCursor: listing.data.after };
  }

  async subscribe(subreddit: string): Promise<void> {
    await this.call({
      skipRetry: true,
      path: '/api/subscribe',
      method: 'POST',
      body: new URLSearchParams({
        action: 'sub',
        sr_name: subreddit,
        skip_initial_defaults: 'true',
      }),
    });
  }

  async unsubscribe(subreddit: string): Promise<void> {
    await this.call({
      skipRetry: true,
      path: '/api/subscribe',
      method: 'POST',
      body: new URLSearchParams({ action: 'unsub', sr_name: subreddit }),
    });
  }

  async friend(username: string): Promise<void> {
    await this.call({
      skipRetry: true,
      path: `/api/v1/me/friends/${encodeURIComponent(username)}`,
      method: 'PUT',
      body: { name: username },
    });
  }

  async unfriend(username: string): Promise<void> {
    await this.call({
      skipRetry: true,
      path: `/api/v1/me/friends/${encodeURIComponent(username)}`,
      method: 'DELETE',
    });
  }

  async saveItem(kind: SavedItemKind, id: string): Promise<void> {
    await this.call({
      skipRetry: true,
      path: '/api/save',
      method: 'POST',
      body: new URLSearchParams({ id: toFullname(kind, id) }),
    });
  }

  async unsaveItem(kind: SavedItemKind, id: string): Promise<void> {
    await this.call({
      skipRetry: true,
      path: '/api/unsave',
      method: 'POST',
      body: new URLSearchParams({ id: toFullname(kind, id) }),
    });
  }

  async getPreferences(): Promise<Record<string, unknown>> {
    const data = await this.call({ path: '/api/v1/me/prefs', method: 'GET' });
    return this.parse(RedditPreferencesSchema, data, 'me/prefs');
  }

  async setPreferences(preferences: Record<string, unknown>): Promise<void> {
    await this.call({ path: '/api/v1/me/prefs', method: 'PATCH', body: preferences });
  }

  private async resolveAccountName(): Promise<string> {
    if (!this.accountName) {
      const data = await this.call({ path: '/api/v1/me', method: 'GET' });
      this.accountName = this.parse(RedditMeSchema, data, 'me').name;
      this.deps.logger.debug('Reddit username retrieved', {
        login: this.deps.auth.username,
        account: this.accountName,
      });
    }
    return this.accountName;
  }

  private listingQuery(cursor?: string): Record<string, string | number | undefined> {
    return {
      limit: this.pageSize,
      raw_json: 1, // Avoid HTML entity encoding
      after: cursor,
    };
  }

  /**
   * Authenticated request; a 401 drops the cached token and retries once with a fresh grant.
   */
  private async call(request: RedditRequest): Promise<unknown> {
    const { path, ...config } = request;

    const send = async (): Promise<unknown> => {
      const accessToken = await this.deps.auth.getAccessToken();
      const response = await this.deps.http.request({
        ...config,
        url: `${this.baseUrl}${path}`,
        headers: { ...config.headers, Authorization: `Bearer ${accessToken}` },
      });
      return response.data;
    };

    try {
      return await send();
    } catch (error: unknown) {
      if (error instanceof ApiClientError && error.status === 401) {
        this.deps.logger.warn('Access token rejected, re-authenticating', {
          login: this.deps.auth.username,
          path,
        });
        this.deps.auth.invalidate();
        return send();
      }
      throw error;
    }
  }

  private parse<T extends z.ZodTypeAny>(schema: T, data: unknown, endpoint: string): z.infer<T> {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new Error(
        `Unexpected response from ${endpoint}: ${result.error.errors
          .map((err) => `${err.path.join('.')}: ${err.message}`)
          .join(', ')}`
      );
    }
    return result.data;
  }
}
