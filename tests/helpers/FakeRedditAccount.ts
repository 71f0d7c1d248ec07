// tests/helpers/FakeRedditAccount.ts

import type { Page, RemoteClient } from '../../src/connectors/types';
import { savedItemKey, toFullname, type SavedItem, type SavedItemKind } from '../../src/core/normalizer/types';

export interface FakeAccountState {
  subscriptions?: string[];
  friends?: string[];
  /** Oldest-first */
  saved?: SavedItem[];
  preferences?: Record<string, unknown>;
}

export function submission(id: string, createdAt: number, metadata: Record<string, unknown> = {}): SavedItem {
  return { kind: 'submission', id, createdAt: new Date(createdAt * 1000), metadata };
}

export function comment(id: string, createdAt: number, metadata: Record<string, unknown> = {}): SavedItem {
  return { kind: 'comment', id, createdAt: new Date(createdAt * 1000), metadata };
}

/**
 * In-process Reddit account. Saving prepends, like the real listing, and every
 * call is recorded in `calls` as `method` or `method:arg`.
 */
export class FakeRedditAccount implements RemoteClient {
  subscriptions: Set<string>;
  friends: Set<string>;
  /** Newest-first, as the listing returns it */
  savedNewestFirst: SavedItem[];
  preferences: Record<string, unknown>;

  calls: string[] = [];
  private failures = new Map<string, Error[]>();
  private catalog = new Map<string, SavedItem>();

  constructor(
    state: FakeAccountState = {},
    public pageSize: number = 2
  ) {
    this.subscriptions = new Set(state.subscriptions ?? []);
    this.friends = new Set(state.friends ?? []);
    this.savedNewestFirst = [...(state.saved ?? [])].reverse();
    this.preferences = { ...(state.preferences ?? {}) };
  }

  /** Items `saveItem` should materialise with their metadata */
  knows(...items: SavedItem[]): this {
    for (const item of items) this.catalog.set(savedItemKey(item), item);
    return this;
  }

  /** Queue errors for a call key such as `subscribe:pics` or `listSavedItems` */
  failNext(call: string, ...errors: Error[]): this {
    this.failures.set(call, [...(this.failures.get(call) ?? []), ...errors]);
    return this;
  }

  get mutations(): string[] {
    return this.calls.filter((call) => !call.startsWith('list') && !call.startsWith('getPreferences'));
  }

  /** Saved fullnames, oldest-first */
  get savedKeys(): string[] {
    return [...this.savedNewestFirst].reverse().map(savedItemKey);
  }

  async listSubscriptions(cursor?: string): Promise<Page<string>> {
    this.enter('listSubscriptions');
    return this.page([...this.subscriptions], cursor);
  }

  async listFriends(cursor?: string): Promise<Page<string>> {
    this.enter('listFriends');
    return this.page([...this.friends], cursor);
  }

  async listSavedItems(cursor?: string): Promise<Page<SavedItem>> {
    this.enter('listSavedItems');
    return this.page(this.savedNewestFirst, cursor);
  }

  async subscribe(subreddit: string): Promise<void> {
    this.enter('subscribe', subreddit);
    this.subscriptions.add(subreddit);
  }

  async unsubscribe(subreddit: string): Promise<void> {
    this.enter('unsubscribe', subreddit);
    this.subscriptions.delete(subreddit);
  }

  async friend(username: string): Promise<void> {
    this.enter('friend', username);
    this.friends.add(username);
  }

  async unfriend(username: string): Promise<void> {
    this.enter('unfriend', username);
    this.friends.delete(username);
  }

  async saveItem(kind: SavedItemKind, id: string): Promise<void> {
    const key = toFullname(kind, id);
    this.enter('save', key);
    if (this.savedNewestFirst.some((item) => savedItemKey(item) === key)) return;
    this.savedNewestFirst.unshift(
      this.catalog.get(key) ?? { kind, id, createdAt: new Date(0), metadata: {} }
    );
  }

  async unsaveItem(kind: SavedItemKind, id: string): Promise<void> {
    const key = toFullname(kind, id);
    this.enter('unsave', key);
    this.savedNewestFirst = this.savedNewestFirst.filter((item) => savedItemKey(item) !== key);
  }

  async getPreferences(): Promise<Record<string, unknown>> {
    this.enter('getPreferences');
    return { ...this.preferences };
  }

  async setPreferences(preferences: Record<string, unknown>): Promise<void> {
    this.enter('setPreferences');
    this.preferences = { ...this.preferences, ...preferences };
  }

  private enter(method: string, arg?: string): void {
    const call = arg === undefined ? method : `${method}:${arg}`;
    this.calls.push(call);

    const queued = this.failures.get(call);
    const error = queued?.shift();
    if (error) throw error;
  }

  private page<T>(items: T[], cursor?: string): Page<T> {
    const start = cursor === undefined ? 0 : Number(cursor);
    const end = start + this.pageSize;
    return {
      items: items.slice(start, end),
      nextCursor: end < items.length ? String(end) : null,
    };
  }
}
