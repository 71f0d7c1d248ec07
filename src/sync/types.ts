// src/sync/types.ts

import type { SavedItem } from '../core/normalizer/types';
import type { CredentialId } from '../connectors/types';

/**
 * Immutable point-in-time capture of one account
 */
export interface AccountSnapshot {
  readonly username: string;
  readonly identity: CredentialId;
  readonly subscriptions: ReadonlySet<string>;
  readonly friends: ReadonlySet<string>;
  /** Oldest-first */
  readonly saved: readonly SavedItem[];
  readonly preferences: Readonly<Record<string, unknown>>;
}

export interface SetDiff<T> {
  toAdd: Set<T>;
  toRemove: Set<T>;
}

export interface SavedDiff {
  /** Saved at the destination but absent at the source; order carries no meaning */
  toUnsave: SavedItem[];
  /** Source order, oldest-first */
  toSave: SavedItem[];
}

export interface SnapshotDiff {
  subscriptions: SetDiff<string>;
  friends: SetDiff<string>;
  saved: SavedDiff;
}

export type SyncCategory = 'subscriptions' | 'friends' | 'savedUnsave' | 'savedSave' | 'preferences';

export type ApplyAction =
  | 'subscribe'
  | 'friend'
  | 'unfriend'
  | 'save'
  | 'unsave'
  | 'setPreferences';

export interface FailedItem {
  id: string;
  action: ApplyAction;
  error: string;
  code?: string;
}

export interface CategoryResult {
  applied: number;
  skipped: number;
  failed: FailedItem[];
}

export type SyncOutcome = 'success' | 'partial' | 'failed' | 'cancelled';

export interface SyncReport {
  runId: string;
  operation: 'syncAll' | 'syncSubscriptionsOnly' | 'unsaveAll';
  source?: string;
  destination: string;
  outcome: SyncOutcome;
  cancelled: boolean;
  startedAt: Date;
  finishedAt?: Date;
  categories: Record<SyncCategory, CategoryResult>;
}

export type ItemOutcome = 'applied' | 'failed' | 'skipped';

export interface ProgressEvent {
  category: SyncCategory;
  completed: number;
  total: number;
  itemId: string;
  outcome: ItemOutcome;
}
