// src/sync/ReconciliationExecutor.ts

import { EventEmitter } from 'events';
import type { AccountHandle } from '../connectors/types';
import { savedItemKey, type SavedItem } from '../core/normalizer/types';
import type { RetryConfig } from '../core/http/types';
import { RetryHandler, classifyRetry } from '../core/http/RetryHandler';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import {
  CircuitBreakerOpenError,
  PerItemApplyError,
  TransferError,
  UnexpectedTypeError,
  errorMessage,
} from '../utils/errors';
import { recordApplied, recordFailure, recordSkipped } from './SyncReport';
import type {
  ApplyAction,
  CategoryResult,
  ItemOutcome,
  ProgressEvent,
  SavedDiff,
  SetDiff,
  SyncCategory,
  SyncReport,
} from './types';

/**
 * Item-level retry: two further attempts on server errors, rate limits and
 * network faults. Client errors (banned subreddit, deleted user) fail at once.
 */
export const DEFAULT_ITEM_RETRY: RetryConfig = {
  maxRetries: 2,
  baseDelay: 1000,
  maxDelay: 30000,
  retryableStatusCodes: [429, 500, 502, 503, 504],
};

/** Times one attempt may wait out an open circuit before it counts as failed */
const MAX_CIRCUIT_WAITS = 3;

export interface ExecutorDeps {
  logger: Logger;
  metrics: MetricsCollector;
}

export interface ExecutorOptions {
  report: SyncReport;
  retry?: RetryConfig;
  signal?: AbortSignal;
}

interface PlannedItem<T> {
  item: T;
  id: string;
  action: ApplyAction;
}

/**
 * Applies computed diffs against a destination account, one item at a time.
 *
 * Per-item failures land in the report and never stop a category. Emits
 * `progress` with a {@link ProgressEvent} after every item.
 */
export class ReconciliationExecutor extends EventEmitter {
  private retryHandler: RetryHandler;
  private retryConfig: RetryConfig;

  constructor(
    private deps: ExecutorDeps,
    private options: ExecutorOptions
  ) {
    super();
    this.retryConfig = options.retry ?? DEFAULT_ITEM_RETRY;
    this.retryHandler = new RetryHandler(this.retryConfig, deps.logger, undefined, deps.metrics);
  }

  get report(): SyncReport {
    return this.options.report;
  }

  get aborted(): boolean {
    return this.options.signal?.aborted === true;
  }

  /**
   * Subscribe to every subreddit in `toAdd`. Removals are never applied.
   */
  async applySubscriptionDiff(dst: AccountHandle, diff: SetDiff<string>): Promise<CategoryResult> {
    const planned = [...diff.toAdd].map(
      (name): PlannedItem<string> => ({ item: name, id: name, action: 'subscribe' })
    );

    await this.applyEach(dst, 'subscriptions', planned, (name) => () => dst.client.subscribe(name));

    return this.report.categories.subscriptions;
  }

  async applyFriendDiff(dst: AccountHandle, diff: SetDiff<string>): Promise<CategoryResult> {
    const planned: PlannedItem<string>[] = [
      ...[...diff.toAdd].map((name): PlannedItem<string> => ({ item: name, id: name, action: 'friend' })),
      ...[...diff.toRemove].map(
        (name): PlannedItem<string> => ({ item: name, id: name, action: 'unfriend' })
      ),
    ];

    await this.applyEach(dst, 'friends', planned, (name, action) =>
      action === 'friend' ? () => dst.client.friend(name) : () => dst.client.unfriend(name)
    );

    return this.report.categories.friends;
  }

  /**
   * Unsave first, then save in source order so the destination ends up with
   * the same relative ordering.
   */
  async applySavedDiff(
    dst: AccountHandle,
    diff: SavedDiff
  ): Promise<{ unsave: CategoryResult; save: CategoryResult }> {
    await this.applySavedItems(dst, 'savedUnsave', diff.toUnsave, 'unsave');
    await this.applySavedItems(dst, 'savedSave', diff.toSave, 'save');

    return {
      unsave: this.report.categories.savedUnsave,
      save: this.report.categories.savedSave,
    };
  }

  async applySavedItems(
    dst: AccountHandle,
    category: 'savedUnsave' | 'savedSave',
    items: readonly SavedItem[],
    action: 'save' | 'unsave'
  ): Promise<CategoryResult> {
    const planned = items.map(
      (item): PlannedItem<SavedItem> => ({ item, id: savedItemKey(item), action })
    );

    await this.applyEach(dst, category, planned, (item) => this.savedCall(dst, item, action));

    return this.report.categories[category];
  }

  /**
   * Count every item of a category as skipped, for a run cancelled before it started.
   */
  skipCategory(category: SyncCategory, ids: readonly string[]): void {
    ids.forEach((id, index) => this.settle(category, id, 'skipped', index + 1, ids.length));
  }

  private savedCall(
    dst: AccountHandle,
    item: SavedItem,
    action: 'save' | 'unsave'
  ): () => Promise<void> {
    switch (item.kind) {
      case 'submission':
      case 'comment': {
        const { kind, id } = item;
        return action === 'save'
          ? () => dst.client.saveItem(kind, id)
          : () => dst.client.unsaveItem(kind, id);
      }
      default: {
        const unexpected: never = item;
        throw new UnexpectedTypeError(`Unexpected saved item type: ${describeKind(unexpected)}`, {
          account: dst.username,
          action,
        });
      }
    }
  }

  private async applyEach<T>(
    dst: AccountHandle,
    category: SyncCategory,
    planned: PlannedItem<T>[],
    plan: (item: T, action: ApplyAction) => () => Promise<void>
  ): Promise<void> {
    const total = planned.length;

    this.deps.logger.info('Applying category', {
      account: dst.username,
      category,
      total,
    });

    for (let index = 0; index < total; index++) {
      const { item, id, action } = planned[index];

      if (this.aborted) {
        this.report.cancelled = true;
        this.deps.logger.warn('Run cancelled, skipping remaining items', {
          account: dst.username,
          category,
          remaining: total - index,
        });
        for (let rest = index; rest < total; rest++) {
          this.settle(category, planned[rest].id, 'skipped', rest + 1, total);
        }
        return;
      }

      // Outside the try: an unknown kind halts the category
      const call = this.waitOutOpenCircuit(dst, category, id, plan(item, action));

      let failure: PerItemApplyError | undefined;
      try {
        await this.retryHandler.execute(call, dst.username, (error) =>
          classifyRetry(error, this.retryConfig.retryableStatusCodes)
        );
      } catch (error: unknown) {
        failure = new PerItemApplyError(`Failed to ${action} ${id}: ${errorMessage(error)}`, {
          account: dst.username,
          category,
          itemId: id,
          action,
        });
        recordFailure(this.report, category, {
          id,
          action,
          error: failure.message,
          code: error instanceof TransferError ? error.code : failure.code,
        });
      }

      if (failure) {
        this.settle(category, id, 'failed', index + 1, total, failure);
      } else {
        recordApplied(this.report, category);
        this.settle(category, id, 'applied', index + 1, total);
      }
    }
  }

  /**
   * An open circuit says nothing about this item: sleep until the circuit
   * goes half-open and send the item then, within the same attempt.
   */
  private waitOutOpenCircuit(
    dst: AccountHandle,
    category: SyncCategory,
    itemId: string,
    call: () => Promise<void>
  ): () => Promise<void> {
    return async () => {
      for (let waits = 0; ; waits++) {
        try {
          return await call();
        } catch (error: unknown) {
          if (!(error instanceof CircuitBreakerOpenError) || waits >= MAX_CIRCUIT_WAITS || this.aborted) {
            throw error;
          }
          const delay = error.reopensIn ?? this.retryConfig.maxDelay;
          this.deps.logger.warn('Circuit open, waiting before sending item', {
            account: dst.username,
            category,
            itemId,
            delay,
          });
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
      }
    };
  }

  private settle(
    category: SyncCategory,
    itemId: string,
    outcome: ItemOutcome,
    completed: number,
    total: number,
    failure?: PerItemApplyError
  ): void {
    if (outcome === 'skipped') {
      recordSkipped(this.report, category);
    }

    this.deps.metrics.incrementCounter('sync_items_total', { category, outcome });

    if (failure) {
      this.deps.logger.warn('Item failed', { category, itemId, outcome, error: failure });
    } else if (outcome === 'applied') {
      this.deps.logger.info('Item applied', { category, itemId, outcome });
    } else {
      this.deps.logger.debug('Item skipped', { category, itemId, outcome });
    }

    const event: ProgressEvent = { category, completed, total, itemId, outcome };
    try {
      this.emit('progress', event);
    } catch (error: unknown) {
      this.deps.logger.warn('Progress listener failed', {
        category,
        itemId,
        error: errorMessage(error),
      });
    }
  }
}

function describeKind(value: unknown): string {
  if (value && typeof value === 'object' && 'kind' in value) {
    return String(value.kind);
  }
  return typeof value;
}
