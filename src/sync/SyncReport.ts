// src/sync/SyncReport.ts

import type { CategoryResult, FailedItem, SyncCategory, SyncReport } from './types';
import { generateCorrelationId } from '../observability/tracing';

export const SYNC_CATEGORIES: readonly SyncCategory[] = [
  'subscriptions',
  'friends',
  'savedUnsave',
  'savedSave',
  'preferences',
];

function emptyCategory(): CategoryResult {
  return { applied: 0, skipped: 0, failed: [] };
}

export function createSyncReport(
  operation: SyncReport['operation'],
  destination: string,
  source?: string
): SyncReport {
  return {
    runId: generateCorrelationId(),
    operation,
    source,
    destination,
    outcome: 'success',
    cancelled: false,
    startedAt: new Date(),
    categories: {
      subscriptions: emptyCategory(),
      friends: emptyCategory(),
      savedUnsave: emptyCategory(),
      savedSave: emptyCategory(),
      preferences: emptyCategory(),
    },
  };
}

export function recordApplied(report: SyncReport, category: SyncCategory, count: number = 1): void {
  report.categories[category].applied += count;
}

export function recordSkipped(report: SyncReport, category: SyncCategory, count: number = 1): void {
  report.categories[category].skipped += count;
}

export function recordFailure(report: SyncReport, category: SyncCategory, failure: FailedItem): void {
  report.categories[category].failed.push(failure);
}

/**
 * Stamp the finish time and derive the outcome.
 *
 * A failed preference copy is the only step failure that marks the whole run
 * `failed`; per-item failures make it `partial`.
 */
export function finalizeReport(report: SyncReport): SyncReport {
  report.finishedAt = new Date();

  if (report.cancelled) {
    report.outcome = 'cancelled';
  } else if (report.categories.preferences.failed.length > 0) {
    report.outcome = 'failed';
  } else if (SYNC_CATEGORIES.some((category) => report.categories[category].failed.length > 0)) {
    report.outcome = 'partial';
  } else {
    report.outcome = 'success';
  }

  return report;
}

export interface CategorySummary {
  applied: number;
  failed: number;
  skipped: number;
}

/**
 * Flat counts per category, for log lines and the CLI's final table
 */
export function summarizeReport(report: SyncReport): Record<SyncCategory, CategorySummary> {
  const count = (category: SyncCategory): CategorySummary => {
    const result = report.categories[category];
    return { applied: result.applied, failed: result.failed.length, skipped: result.skipped };
  };

  return {
    subscriptions: count('subscriptions'),
    friends: count('friends'),
    savedUnsave: count('savedUnsave'),
    savedSave: count('savedSave'),
    preferences: count('preferences'),
  };
}
