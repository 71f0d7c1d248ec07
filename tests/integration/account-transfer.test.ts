/**
 * Integration: AccountTransfer against in-process Reddit accounts
 *
 * Runs every entry point end to end with the real fetcher, diff, executor,
 * guard and credential store; only the remote side is faked.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AccountTransfer } from '../../src/transfer';
import type { TransferConfig } from '../../src/config/ConfigValidator';
import { KeyvCredentialStore } from '../../src/core/credentials/KeyvCredentialStore';
import { Logger } from '../../src/observability/Logger';
import { savedItemKey } from '../../src/core/normalizer/types';
import { summarizeReport } from '../../src/sync/SyncReport';
import type { ProgressEvent } from '../../src/sync/types';
import { ApiClientError, ApiServerError, ConfigurationError, FetchError, NetworkError } from '../../src/utils/errors';
import { FakeRedditAccount, comment, submission } from '../helpers/FakeRedditAccount';
import { FAST_RETRY } from '../helpers/mocks';
import type { Page } from '../../src/connectors/types';
import type { SavedItem } from '../../src/core/normalizer/types';

/** Saved listing that hands out the same cursor twice, so its oldest page is never reached */
class RepeatingSavedListing extends FakeRedditAccount {
  async listSavedItems(cursor?: string): Promise<Page<SavedItem>> {
    this.calls.push(`listSavedItems:${cursor ?? ''}`);
    return cursor === undefined
      ? { items: [submission('s3', 300)], nextCursor: 'x' }
      : { items: [submission('s2', 200)], nextCursor: 'x' };
  }
}

const config: TransferConfig = {
  credentials: { backend: 'memory' },
  http: {
    userAgent: 'node:test-transfer:v1.0',
    retry: FAST_RETRY,
  },
  sync: { itemRetry: FAST_RETRY },
  logging: { level: 'error' },
};

const SRC = { username: 'old_account', password: 'test-password' };
const DST = { username: 'new_account', password: 'test-password-2' };

describe('AccountTransfer', () => {
  let store: KeyvCredentialStore;
  let accounts: Map<string, FakeRedditAccount>;
  let src: FakeRedditAccount;
  let dst: FakeRedditAccount;
  let transfer: AccountTransfer;

  const s1 = submission('s1', 100, { title: 'First post' });
  const c2 = comment('c2', 200, { title: 'Thread' });
  const stale = comment('stale', 50);

  beforeEach(async () => {
    store = new KeyvCredentialStore({ backend: 'memory' }, new Logger({ level: 'error' }));
    await store.setCredentials(SRC.username, { clientId: 'old-app', clientSecret: 'test-secret' });
    await store.setCredentials(DST.username, { clientId: 'new-app', clientSecret: 'test-secret-2' });

    src = new FakeRedditAccount(
      {
        subscriptions: ['A', 'B', 'C'],
        friends: ['carol'],
        saved: [s1, c2],
        preferences: { nightmode: true, lang: 'en' },
      },
      100
    ).knows(s1, c2);
    dst = new FakeRedditAccount(
      {
        subscriptions: ['B', 'Z'],
        friends: ['bob'],
        saved: [stale, s1],
        preferences: { lang: 'de' },
      },
      100
    ).knows(s1, c2);
    accounts = new Map([
      [SRC.username, src],
      [DST.username, dst],
    ]);

    transfer = await AccountTransfer.init(config, {
      credentialStore: store,
      clientFactory: (login) => {
        const account = accounts.get(login.username);
        if (!account) throw new Error(`no fake account for ${login.username}`);
        return account;
      },
    });
  });

  describe('syncAll', () => {
    it('should converge the destination onto the source', async () => {
      const report = await transfer.syncAll(SRC, DST);

      expect(report.outcome).toBe('success');
      expect(report.source).toBe('old_account');
      expect(report.destination).toBe('new_account');
      expect(dst.mutations).toEqual([
        'subscribe:A',
        'subscribe:C',
        'friend:carol',
        'unfriend:bob',
        'unsave:t1_stale',
        'save:t1_c2',
        'setPreferences',
      ]);
      expect(dst.subscriptions).toEqual(new Set(['A', 'B', 'C', 'Z']));
      expect(dst.friends).toEqual(new Set(['carol']));
      expect(dst.savedKeys).toEqual(['t3_s1', 't1_c2']);
      expect(dst.preferences).toEqual({ nightmode: true, lang: 'en' });
      expect(src.mutations).toEqual([]);
      expect(summarizeReport(report)).toEqual({
        subscriptions: { applied: 2, failed: 0, skipped: 0 },
        friends: { applied: 2, failed: 0, skipped: 0 },
        savedUnsave: { applied: 1, failed: 0, skipped: 0 },
        savedSave: { applied: 1, failed: 0, skipped: 0 },
        preferences: { applied: 1, failed: 0, skipped: 0 },
      });
    });

    it('should only copy preferences on a second run', async () => {
      await transfer.syncAll(SRC, DST);
      const before = dst.mutations.length;

      const second = await transfer.syncAll(SRC, DST);

      expect(dst.mutations.slice(before)).toEqual(['setPreferences']);
      expect(second.outcome).toBe('success');
      expect(second.categories.savedSave.applied).toBe(0);
      expect(second.categories.subscriptions.applied).toBe(0);
    });

    it('should save into an empty destination in source order', async () => {
      dst.savedNewestFirst = [];

      await transfer.syncAll(SRC, DST);

      expect(dst.savedKeys).toEqual(['t3_s1', 't1_c2']);
      expect(dst.savedNewestFirst[0].metadata).toEqual({ title: 'Thread' });
    });

    it('should refuse shared app credentials before any remote call', async () => {
      await store.setCredentials(DST.username, { clientId: 'old-app', clientSecret: 'test-secret' });

      await expect(transfer.syncAll(SRC, DST)).rejects.toThrow(
        'You must generate one set of app credentials per account'
      );
      expect(src.calls).toEqual([]);
      expect(dst.calls).toEqual([]);
    });

    it('should refuse a user without stored credentials', async () => {
      const error = await transfer
        .syncAll(SRC, { username: 'ghost', password: 'test-password' })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect((error as ConfigurationError).message).toBe('No app credentials stored for /u/ghost');
    });

    it('should abort without mutations when a snapshot cannot be read', async () => {
      dst.failNext('listSavedItems', new NetworkError('socket hang up'));

      await expect(transfer.syncAll(SRC, DST)).rejects.toBeInstanceOf(FetchError);
      expect(dst.mutations).toEqual([]);
    });

    it('should abort without mutations when a source listing repeats its cursor', async () => {
      accounts.set(SRC.username, new RepeatingSavedListing({ subscriptions: ['A'] }, 100));

      await expect(transfer.syncAll(SRC, DST)).rejects.toThrow(
        'Listing of saved for /u/old_account repeated cursor x'
      );
      expect(dst.calls).toEqual([]);
    });

    it('should report per-item failures as partial', async () => {
      dst.failNext('subscribe:A', new ApiClientError('Client error: 403', 403));

      const report = await transfer.syncAll(SRC, DST);

      expect(report.outcome).toBe('partial');
      expect(report.categories.subscriptions.failed).toEqual([
        {
          id: 'A',
          action: 'subscribe',
          error: 'Failed to subscribe A: Client error: 403',
          code: 'API_CLIENT_ERROR',
        },
      ]);
      expect(dst.subscriptions.has('C')).toBe(true);
      expect(dst.savedKeys).toEqual(['t3_s1', 't1_c2']);
    });

    it('should mark the run failed when preferences cannot be copied', async () => {
      dst.failNext('setPreferences', new ApiServerError('Server error: 500', 500));

      const report = await transfer.syncAll(SRC, DST);

      expect(report.outcome).toBe('failed');
      expect(report.categories.preferences.failed).toEqual([
        {
          id: 'preferences',
          action: 'setPreferences',
          error: 'Failed to copy preferences to /u/new_account',
          code: 'PREFERENCE_COPY_FAILED',
        },
      ]);
      expect(report.categories.savedSave.applied).toBe(1);
    });

    it('should stop between items when cancelled', async () => {
      const controller = new AbortController();
      const events: ProgressEvent[] = [];

      const report = await transfer.syncAll(SRC, DST, {
        signal: controller.signal,
        onProgress: (event) => {
          events.push(event);
          if (events.length === 1) controller.abort();
        },
      });

      expect(report.outcome).toBe('cancelled');
      expect(dst.mutations).toEqual(['subscribe:A']);
      expect(summarizeReport(report)).toEqual({
        subscriptions: { applied: 1, failed: 0, skipped: 1 },
        friends: { applied: 0, failed: 0, skipped: 2 },
        savedUnsave: { applied: 0, failed: 0, skipped: 1 },
        savedSave: { applied: 0, failed: 0, skipped: 1 },
        preferences: { applied: 0, failed: 0, skipped: 1 },
      });
    });

    it('should count finished runs in the metrics', async () => {
      await transfer.syncAll(SRC, DST);

      const metrics = await transfer.getMetrics();

      expect(metrics).toContain('sync_runs_total{operation="syncAll",outcome="success"} 1');
      expect(metrics).toContain('sync_items_total{category="subscriptions",outcome="applied"} 2');
    });
  });

  describe('syncSubscriptionsOnly', () => {
    it('should add subscriptions and touch nothing else', async () => {
      const report = await transfer.syncSubscriptionsOnly(SRC, DST);

      expect(report.operation).toBe('syncSubscriptionsOnly');
      expect(report.outcome).toBe('success');
      expect(dst.calls).toEqual(['listSubscriptions', 'subscribe:A', 'subscribe:C']);
      expect(src.calls).toEqual(['listSubscriptions']);
    });

    it('should run the identity check first', async () => {
      await expect(transfer.syncSubscriptionsOnly(SRC, { ...SRC })).rejects.toBeInstanceOf(
        ConfigurationError
      );
      expect(src.calls).toEqual([]);
    });
  });

  describe('listSaved', () => {
    beforeEach(() => {
      src.savedNewestFirst = [submission('s3', 300), c2, s1];
    });

    it('should list saved items oldest-first', async () => {
      const saved = await transfer.listSaved(SRC);

      expect(saved.map(savedItemKey)).toEqual(['t3_s1', 't1_c2', 't3_s3']);
      expect(src.mutations).toEqual([]);
    });

    it('should keep only the newest items under a limit', async () => {
      expect((await transfer.listSaved(SRC, { limit: 2 })).map(savedItemKey)).toEqual(['t1_c2', 't3_s3']);
      expect(await transfer.listSaved(SRC, { limit: 0 })).toEqual([]);
    });

    it('should reject a negative limit', async () => {
      await expect(transfer.listSaved(SRC, { limit: -1 })).rejects.toThrow(
        'limit must be a non-negative integer'
      );
    });
  });

  describe('unsaveAll', () => {
    beforeEach(() => {
      src.savedNewestFirst = [submission('s3', 300), c2, s1];
    });

    it('should unsave the most recent items first', async () => {
      const report = await transfer.unsaveAll(SRC, 2);

      expect(report.operation).toBe('unsaveAll');
      expect(report.source).toBeUndefined();
      expect(report.destination).toBe('old_account');
      expect(src.mutations).toEqual(['unsave:t3_s3', 'unsave:t1_c2']);
      expect(src.savedKeys).toEqual(['t3_s1']);
      expect(report.categories.savedUnsave.applied).toBe(2);
    });

    it('should unsave everything without a count', async () => {
      const report = await transfer.unsaveAll(SRC);

      expect(src.savedKeys).toEqual([]);
      expect(report.categories.savedUnsave.applied).toBe(3);
      expect(report.outcome).toBe('success');
    });
  });

  describe('init', () => {
    it('should reject an invalid configuration', async () => {
      const error = await AccountTransfer.init({
        ...config,
        credentials: { backend: 'postgres' },
      }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect((error as ConfigurationError).message).toBe(
        "Invalid configuration: credentials: Redis and Postgres backends require 'url' configuration"
      );
    });
  });
});
