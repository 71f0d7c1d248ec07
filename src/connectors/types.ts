// src/connectors/types.ts

import type { SavedItem, SavedItemKind } from '../core/normalizer/types';
import type { AccountLogin, AppCredentials } from '../core/auth/types';

export interface Page<T> {
  items: T[];
  /** Cursor for the next page, `null` once the listing is exhausted */
  nextCursor: string | null;
}

/**
 * Remote operations the sync engine needs from one authenticated account.
 */
export interface RemoteClient {
  listSubscriptions(cursor?: string): Promise<Page<string>>;
  listFriends(cursor?: string): Promise<Page<string>>;
  /** Newest-first, as the service returns it */
  listSavedItems(cursor?: string): Promise<Page<SavedItem>>;

  subscribe(subreddit: string): Promise<void>;
  unsubscribe(subreddit: string): Promise<void>;
  friend(username: string): Promise<void>;
  unfriend(username: string): Promise<void>;
  saveItem(kind: SavedItemKind, id: string): Promise<void>;
  unsaveItem(kind: SavedItemKind, id: string): Promise<void>;

  getPreferences(): Promise<Record<string, unknown>>;
  setPreferences(preferences: Record<string, unknown>): Promise<void>;
}

/**
 * Opaque identity distinguishing accounts at the API-client level (the app client id)
 */
export type CredentialId = string;

export interface AccountHandle {
  username: string;
  identity: CredentialId;
  client: RemoteClient;
}

export type RemoteClientFactory = (login: AccountLogin, credentials: AppCredentials) => RemoteClient;
