// src/sync/AccountStateFetcher.ts

import type { AccountHandle, Page } from '../connectors/types';
import { savedItemKey, type SavedItem } from '../core/normalizer/types';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import type { AccountSnapshot } from './types';
import { FetchError, UnexpectedTypeError, errorMessage } from '../utils/errors';

export interface FetcherDeps {
  logger: Logger;
  metrics: MetricsCollector;
}

type FetchCategory = 'subscriptions' | 'friends' | 'saved' | 'preferences';

/**
 * Builds read-only snapshots of one account. Any failure is fatal for the
 * snapshot: no partially fetched state ever leaves this class.
 */
export class AccountStateFetcher {
  constructor(private deps: FetcherDeps) {}

  async fetchSnapshot(account: AccountHandle): Promise<AccountSnapshot> {
    const subscriptions = await this.fetchSubscriptions(account);
    const friends = await this.fetchFriends(account);
    const saved = await this.fetchSaved(account);
    const preferences = await this.fetchPreferences(account);

    return Object.freeze({
      username: account.username,
      identity: account.identity,
      subscriptions,
      friends,
      saved: Object.freeze(saved),
      preferences: Object.freeze(preferences),
    });
  }

  async fetchSubscriptions(account: AccountHandle): Promise<Set<string>> {
    this.deps.logger.info('Fetching subreddits', { account: account.username });

    return this.guard(account, 'subscriptions', async () => {
      const names = await this.collectPages(account, 'subscriptions', (cursor) =>
        account.client.listSubscriptions(cursor)
      );
      const subscriptions = new Set(names);
      return this.record(account, 'subscriptions', subscriptions, subscriptions.size);
    });
  }

  async fetchFriends(account: AccountHandle): Promise<Set<string>> {
    this.deps.logger.info('Fetching friends', { account: account.username });

    return this.guard(account, 'friends', async () => {
      const names = await this.collectPages(account, 'friends', (cursor) =>
        account.client.listFriends(cursor)
      );
      const friends = new Set(names);
      return this.record(account, 'friends', friends, friends.size);
    });
  }

  /**
   * All saved items, oldest-first and unique by `(kind, id)`
   */
  async fetchSaved(account: AccountHandle): Promise<SavedItem[]> {
    this.deps.logger.info('Fetching saved comments/submissions', { account: account.username });

    return this.guard(account, 'saved', async () => {
      const newestFirst = await this.collectPages(account, 'saved', (cursor) =>
        account.client.listSavedItems(cursor)
      );

      const seen = new Set<string>();
      const unique: SavedItem[] = [];
      for (const item of newestFirst) {
        const key = savedItemKey(item);
        if (seen.has(key)) continue;
        seen.add(key);
        unique.push(item);
      }

      return this.record(account, 'saved', unique.reverse(), unique.length);
    });
  }

  async fetchPreferences(account: AccountHandle): Promise<Record<string, unknown>> {
    this.deps.logger.info('Fetching preferences', { account: account.username });

    return this.guard(account, 'preferences', async () => {
      const preferences = await account.client.getPreferences();
      this.deps.metrics.recordGauge('snapshot_items', Object.keys(preferences).length, {
        account: account.username,
        category: 'preferences',
      });
      return { ...preferences };
    });
  }

  private async collectPages<T>(
    account: AccountHandle,
    category: FetchCategory,
    listPage: (cursor?: string) => Promise<Page<T>>
  ): Promise<T[]> {
    const items: T[] = [];
    const seenCursors = new Set<string>();
    let cursor: string | undefined;
    let pages = 0;

    do {
      const page = await listPage(cursor);
      items.push(...page.items);
      pages++;

      if (page.nextCursor === null) break;
      if (seenCursors.has(page.nextCursor)) {
        throw new FetchError(
          `Listing of ${category} for /u/${account.username} repeated cursor ${page.nextCursor}`,
          { username: account.username, category, cursor: page.nextCursor }
        );
      }
      seenCursors.add(page.nextCursor);
      cursor = page.nextCursor;
    } while (cursor !== undefined);

    this.deps.logger.debug('Listing exhausted', {
      account: account.username,
      category,
      pages,
      itemCount: items.length,
    });

    return items;
  }

  private record<T>(account: AccountHandle, category: FetchCategory, value: T, count: number): T {
    this.deps.metrics.recordGauge('snapshot_items', count, {
      account: account.username,
      category,
    });
    this.deps.logger.info('Fetched', { account: account.username, category, count });
    return value;
  }

  private async guard<T>(
    account: AccountHandle,
    category: FetchCategory,
    task: () => Promise<T>
  ): Promise<T> {
    try {
      return await task();
    } catch (error: unknown) {
      if (error instanceof UnexpectedTypeError) throw error;

      this.deps.logger.error('Snapshot fetch failed', {
        account: account.username,
        category,
        error: errorMessage(error),
      });
      if (error instanceof FetchError) throw error;

      throw new FetchError(`Failed to fetch ${category} for /u/${account.username}`, {
        username: account.username,
        category,
        cause: errorMessage(error),
      });
    }
  }
}
