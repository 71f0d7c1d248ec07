// src/transfer.ts

import type { AccountHandle, RemoteClient, RemoteClientFactory } from './connectors/types';
import type { AccountLogin, AppCredentials } from './core/auth/types';
import type { CredentialStore } from './core/credentials/types';
import type { SavedItem } from './core/normalizer/types';
import { HttpCore } from './core/http/HttpCore';
import { RedditAuth } from './core/auth/RedditAuth';
import { KeyvCredentialStore } from './core/credentials/KeyvCredentialStore';
import { SavedItemNormalizer } from './core/normalizer/SavedItemNormalizer';
import { RedditClient } from './connectors/reddit/RedditClient';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { withPhaseSpan } from './observability/tracing';
import {
  validateConfigSafe,
  type ResolvedTransferConfig,
  type TransferConfig,
} from './config/ConfigValidator';
import { AccountStateFetcher } from './sync/AccountStateFetcher';
import { computeSetDiff, computeSnapshotDiff, isEmptySnapshotDiff } from './sync/DiffEngine';
import { PreferenceCopier } from './sync/PreferenceCopier';
import { ReconciliationExecutor } from './sync/ReconciliationExecutor';
import { SafetyGuard } from './sync/SafetyGuard';
import {
  createSyncReport,
  finalizeReport,
  recordApplied,
  recordFailure,
  summarizeReport,
} from './sync/SyncReport';
import type { AccountSnapshot, ProgressEvent, SyncReport } from './sync/types';
import { ConfigurationError, PreferenceCopyError, errorMessage } from './utils/errors';

export interface TransferOptions {
  /** Defaults to a KeyvCredentialStore built from `config.credentials` */
  credentialStore?: CredentialStore;
  /** Defaults to a RedditClient per account */
  clientFactory?: RemoteClientFactory;
}

export interface SyncOptions {
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
}

export interface ListSavedOptions {
  /** Keep only the newest `limit` items */
  limit?: number;
}

interface TransferCore {
  config: ResolvedTransferConfig;
  logger: Logger;
  metrics: MetricsCollector;
  credentials: CredentialStore;
  clientFactory: RemoteClientFactory;
  fetcher: AccountStateFetcher;
  guard: SafetyGuard;
  preferences: PreferenceCopier;
}

/**
 * Moves subreddit subscriptions, friends, saved items and preferences from
 * one Reddit account to another.
 *
 * @example
 * ```typescript
 * const transfer = await AccountTransfer.init({
 *   credentials: { backend: 'memory' },
 *   http: {
 *     userAgent: 'node:my-transfer:v1.0 (by /u/example)',
 *     retry: { maxRetries: 3, baseDelay: 1000, maxDelay: 30000, retryableStatusCodes: [429, 500, 502, 503, 504] },
 *   },
 * });
 *
 * const report = await transfer.syncAll(
 *   { username: 'old_account', password },
 *   { username: 'new_account', password: newPassword }
 * );
 * console.log(report.outcome, report.categories.savedSave.applied);
 * ```
 */
export class AccountTransfer {
  private constructor(private core: TransferCore) {}

  /**
   * Validate the configuration and build the engine.
   *
   * @throws {ConfigurationError} If the configuration is invalid
   */
  static async init(config: TransferConfig, options: TransferOptions = {}): Promise<AccountTransfer> {
    const validation = validateConfigSafe(config);
    if (!validation.success) {
      throw new ConfigurationError(`Invalid configuration: ${validation.errors.join('; ')}`, {
        errors: validation.errors,
      });
    }
    const resolved = validation.data;

    const logger = new Logger(resolved.logging);
    const metrics = new MetricsCollector(resolved.metrics, logger);
    const credentials = options.credentialStore ?? new KeyvCredentialStore(resolved.credentials, logger);

    const transfer = new AccountTransfer({
      config: resolved,
      logger,
      metrics,
      credentials,
      clientFactory:
        options.clientFactory ??
        ((login, appCredentials) =>
          AccountTransfer.createRedditClient(resolved, login, appCredentials, logger, metrics)),
      fetcher: new AccountStateFetcher({ logger, metrics }),
      guard: new SafetyGuard(logger),
      preferences: new PreferenceCopier(logger),
    });

    logger.info('Transfer engine initialized', {
      credentialBackend: options.credentialStore ? 'custom' : resolved.credentials.backend,
      customClient: !!options.clientFactory,
    });

    return transfer;
  }

  /**
   * Full transfer: subscriptions (additions only), friends, saved items in
   * order, then preferences.
   *
   * @throws {ConfigurationError} Missing credentials or source and destination sharing an identity
   * @throws {FetchError} A snapshot could not be read; nothing has been changed
   * @throws {UnexpectedTypeError} A saved item of unknown kind reached the apply phase
   */
  async syncAll(src: AccountLogin, dst: AccountLogin, opts: SyncOptions = {}): Promise<SyncReport> {
    const source = await this.openAccount(src);
    const destination = await this.openAccount(dst);
    this.core.guard.assertDistinctIdentity(source, destination);

    const report = createSyncReport('syncAll', destination.username, source.username);
    const executor = this.createExecutor(report, opts);

    return this.run(report, async () => {
      const srcSnapshot = await this.phase('fetch-source', report, () =>
        this.core.fetcher.fetchSnapshot(source)
      );
      const dstSnapshot = await this.phase('fetch-destination', report, () =>
        this.core.fetcher.fetchSnapshot(destination)
      );

      const diff = computeSnapshotDiff(srcSnapshot, dstSnapshot);
      this.core.logger.info('Diff computed', {
        runId: report.runId,
        subscriptionsToAdd: diff.subscriptions.toAdd.size,
        subscriptionsIgnored: diff.subscriptions.toRemove.size,
        friendsToAdd: diff.friends.toAdd.size,
        friendsToRemove: diff.friends.toRemove.size,
        savedToUnsave: diff.saved.toUnsave.length,
        savedToSave: diff.saved.toSave.length,
        inSync: isEmptySnapshotDiff(diff),
      });

      await this.phase('subscriptions', report, () =>
        executor.applySubscriptionDiff(destination, diff.subscriptions)
      );
      await this.phase('friends', report, () => executor.applyFriendDiff(destination, diff.friends));
      await this.phase('saved', report, () => executor.applySavedDiff(destination, diff.saved));
      await this.phase('preferences', report, () =>
        this.copyPreferences(srcSnapshot, destination, report, executor)
      );
    });
  }

  /**
   * Add the source's subreddits to the destination and touch nothing else.
   */
  async syncSubscriptionsOnly(
    src: AccountLogin,
    dst: AccountLogin,
    opts: SyncOptions = {}
  ): Promise<SyncReport> {
    const source = await this.openAccount(src);
    const destination = await this.openAccount(dst);
    this.core.guard.assertDistinctIdentity(source, destination);

    const report = createSyncReport('syncSubscriptionsOnly', destination.username, source.username);
    const executor = this.createExecutor(report, opts);

    return this.run(report, async () => {
      const srcSubscriptions = await this.phase('fetch-source', report, () =>
        this.core.fetcher.fetchSubscriptions(source)
      );
      const dstSubscriptions = await this.phase('fetch-destination', report, () =>
        this.core.fetcher.fetchSubscriptions(destination)
      );

      const diff = computeSetDiff(srcSubscriptions, dstSubscriptions);
      await this.phase('subscriptions', report, () =>
        executor.applySubscriptionDiff(destination, diff)
      );
    });
  }

  /**
   * Saved items of one account, oldest-first.
   */
  async listSaved(user: AccountLogin, opts: ListSavedOptions = {}): Promise<SavedItem[]> {
    if (opts.limit !== undefined) this.assertCount('limit', opts.limit);

    const account = await this.openAccount(user);
    const saved = await this.core.fetcher.fetchSaved(account);

    if (opts.limit === undefined) return saved;
    return saved.slice(Math.max(0, saved.length - opts.limit));
  }

  /**
   * Unsave the `count` most recently saved items, newest first, or every item
   * when `count` is omitted.
   */
  async unsaveAll(user: AccountLogin, count?: number, opts: SyncOptions = {}): Promise<SyncReport> {
    if (count !== undefined) this.assertCount('count', count);

    const account = await this.openAccount(user);
    const report = createSyncReport('unsaveAll', account.username);
    const executor = this.createExecutor(report, opts);

    return this.run(report, async () => {
      const saved = await this.phase('fetch-destination', report, () =>
        this.core.fetcher.fetchSaved(account)
      );

      const newestFirst = [...saved].reverse();
      const targets = count === undefined ? newestFirst : newestFirst.slice(0, count);

      this.core.logger.info('Unsaving items', {
        runId: report.runId,
        account: account.username,
        saved: saved.length,
        targets: targets.length,
      });

      await this.phase('saved', report, () =>
        executor.applySavedItems(account, 'savedUnsave', targets, 'unsave')
      );
    });
  }

  /**
   * Prometheus exposition text
   */
  async getMetrics(): Promise<string> {
    return this.core.metrics.getMetrics();
  }

  private async openAccount(login: AccountLogin): Promise<AccountHandle> {
    const credentials = await this.core.credentials.getCredentials(login.username);
    if (!credentials) {
      throw new ConfigurationError(`No app credentials stored for /u/${login.username}`, {
        username: login.username,
      });
    }

    return {
      username: login.username,
      identity: credentials.clientId,
      client: this.core.clientFactory(login, credentials),
    };
  }

  private createExecutor(report: SyncReport, opts: SyncOptions): ReconciliationExecutor {
    const executor = new ReconciliationExecutor(
      { logger: this.core.logger, metrics: this.core.metrics },
      { report, retry: this.core.config.sync.itemRetry, signal: opts.signal }
    );
    if (opts.onProgress) {
      executor.on('progress', opts.onProgress);
    }
    return executor;
  }

  private async copyPreferences(
    source: AccountSnapshot,
    destination: AccountHandle,
    report: SyncReport,
    executor: ReconciliationExecutor
  ): Promise<void> {
    if (executor.aborted) {
      report.cancelled = true;
      executor.skipCategory('preferences', ['preferences']);
      return;
    }

    try {
      await this.core.preferences.copyPreferences(source, destination);
      recordApplied(report, 'preferences');
      this.core.metrics.incrementCounter('sync_items_total', {
        category: 'preferences',
        outcome: 'applied',
      });
    } catch (error: unknown) {
      if (!(error instanceof PreferenceCopyError)) throw error;

      this.core.logger.error('Preference copy failed', {
        runId: report.runId,
        destination: destination.username,
        error: error.message,
        details: error.details,
      });
      recordFailure(report, 'preferences', {
        id: 'preferences',
        action: 'setPreferences',
        error: error.message,
        code: error.code,
      });
      this.core.metrics.incrementCounter('sync_items_total', {
        category: 'preferences',
        outcome: 'failed',
      });
    }
  }

  private async phase<T>(name: string, report: SyncReport, task: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    try {
      return await withPhaseSpan(name, report.runId, () => task());
    } finally {
      this.core.metrics.recordLatency('sync_phase_duration', Date.now() - startTime, { phase: name });
    }
  }

  private async run(report: SyncReport, body: () => Promise<void>): Promise<SyncReport> {
    this.core.logger.info('Run started', {
      runId: report.runId,
      operation: report.operation,
      source: report.source,
      destination: report.destination,
    });

    try {
      await body();
    } catch (error: unknown) {
      this.core.metrics.incrementCounter('sync_runs_total', {
        operation: report.operation,
        outcome: 'error',
      });
      this.core.logger.error('Run aborted', {
        runId: report.runId,
        operation: report.operation,
        error: errorMessage(error),
      });
      throw error;
    }

    finalizeReport(report);
    this.core.metrics.incrementCounter('sync_runs_total', {
      operation: report.operation,
      outcome: report.outcome,
    });
    this.core.logger.info('Run finished', {
      runId: report.runId,
      operation: report.operation,
      outcome: report.outcome,
      summary: summarizeReport(report),
    });

    return report;
  }

  private assertCount(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigurationError(`${name} must be a non-negative integer`, { [name]: value });
    }
  }

  private static createRedditClient(
    config: ResolvedTransferConfig,
    login: AccountLogin,
    credentials: AppCredentials,
    logger: Logger,
    metrics: MetricsCollector
  ): RemoteClient {
    const http = new HttpCore(
      {
        account: login.username,
        userAgent: config.http.userAgent,
        rateLimit: config.http.rateLimit,
        retry: config.http.retry,
        circuitBreaker: config.http.circuitBreaker,
        timeout: config.http.timeout,
      },
      metrics,
      logger
    );

    const auth = new RedditAuth(
      {
        ...credentials,
        ...login,
        userAgent: config.http.userAgent,
        tokenEndpoint: config.reddit.tokenEndpoint,
        scopes: config.reddit.scopes,
      },
      logger
    );

    return new RedditClient(
      { http, auth, normalizer: new SavedItemNormalizer(), logger },
      { baseUrl: config.reddit.baseUrl, pageSize: config.reddit.pageSize }
    );
  }
}
