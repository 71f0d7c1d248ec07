// src/sync/DiffEngine.ts

import { savedItemKey, type SavedItem } from '../core/normalizer/types';
import type { AccountSnapshot, SavedDiff, SetDiff, SnapshotDiff } from './types';

/**
 * `toAdd = src − dst`, `toRemove = dst − src`
 */
export function computeSetDiff<T>(src: ReadonlySet<T>, dst: ReadonlySet<T>): SetDiff<T> {
  const toAdd = new Set<T>();
  const toRemove = new Set<T>();

  for (const value of src) {
    if (!dst.has(value)) toAdd.add(value);
  }
  for (const value of dst) {
    if (!src.has(value)) toRemove.add(value);
  }

  return { toAdd, toRemove };
}

/**
 * Order-aware diff of two oldest-first saved sequences.
 *
 * `toUnsave` is strictly destination-minus-source. `toSave` keeps the
 * source's relative order: Reddit prepends every newly saved item, so saving
 * oldest to newest reproduces the source's chronology on the destination.
 * Items are compared by `(kind, id)` only and each identity appears at most once.
 */
export function computeSavedDiff(
  srcSeq: readonly SavedItem[],
  dstSeq: readonly SavedItem[]
): SavedDiff {
  const srcKeys = new Set(srcSeq.map(savedItemKey));
  const dstKeys = new Set(dstSeq.map(savedItemKey));

  const toUnsave: SavedItem[] = [];
  const unsaveSeen = new Set<string>();
  for (const item of dstSeq) {
    const key = savedItemKey(item);
    if (srcKeys.has(key) || unsaveSeen.has(key)) continue;
    unsaveSeen.add(key);
    toUnsave.push(item);
  }

  const toSave: SavedItem[] = [];
  const saveSeen = new Set<string>();
  for (const item of srcSeq) {
    const key = savedItemKey(item);
    if (dstKeys.has(key) || saveSeen.has(key)) continue;
    saveSeen.add(key);
    toSave.push(item);
  }

  return { toUnsave, toSave };
}

export function computeSnapshotDiff(src: AccountSnapshot, dst: AccountSnapshot): SnapshotDiff {
  return {
    subscriptions: computeSetDiff(src.subscriptions, dst.subscriptions),
    friends: computeSetDiff(src.friends, dst.friends),
    saved: computeSavedDiff(src.saved, dst.saved),
  };
}

export function isEmptySetDiff<T>(diff: SetDiff<T>): boolean {
  return diff.toAdd.size === 0 && diff.toRemove.size === 0;
}

export function isEmptySavedDiff(diff: SavedDiff): boolean {
  return diff.toSave.length === 0 && diff.toUnsave.length === 0;
}

export function isEmptySnapshotDiff(diff: SnapshotDiff): boolean {
  return (
    isEmptySetDiff(diff.subscriptions) && isEmptySetDiff(diff.friends) && isEmptySavedDiff(diff.saved)
  );
}
