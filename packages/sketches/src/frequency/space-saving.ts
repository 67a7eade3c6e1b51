// ---------------------------------------------------------------------------
// Frequency: Space-Saving heavy hitters
// ---------------------------------------------------------------------------
// Tracks at most `capacity` counters. An untracked item arriving at a full
// table takes over the smallest counter and inherits its count as error, so
// for every tracked item: count - error <= true count <= count.
// ---------------------------------------------------------------------------

import { incompatibleSketches, ok } from '../errors.js';
import { saturatingAdd, saturatingSub } from '../hashing/index.js';
import { createLogger } from '../logger.js';
import { parseParams, positiveInteger } from '../schemas.js';
import type { HeavyHitter, KeyItem, Result, SpaceSavingEntry, SpaceSavingState } from '../types.js';
import { normalizeAmount } from './table.js';

const log = createLogger('space-saving');

const capacitySchema = positiveInteger('capacity');

export function createSpaceSaving<T extends KeyItem>(capacity: number): Result<SpaceSavingState<T>> {
  const parsed = parseParams(capacitySchema, capacity);
  if (!parsed.ok) return parsed;
  return ok({ capacity: parsed.value, entries: new Map(), totalCount: 0 });
}

// ---------------------------------------------------------------------------
// Update
// ---------------------------------------------------------------------------

function minimumEntry<T extends KeyItem>(state: SpaceSavingState<T>): SpaceSavingEntry<T> | undefined {
  let min: SpaceSavingEntry<T> | undefined;
  for (const entry of state.entries.values()) {
    if (min === undefined || entry.count < min.count) min = entry;
  }
  return min;
}

/**
 * Record `n` occurrences of `item`. Mutates state in-place.
 *
 * - Tracked: the count grows by `n`.
 * - Untracked with a free slot: tracked with error 0.
 * - Otherwise the smallest counter is evicted; the item takes
 *   `count = min + n` and `error = min`.
 *
 * Non-positive amounts are ignored.
 */
export function spaceSavingAdd<T extends KeyItem>(state: SpaceSavingState<T>, item: T, n: number): void {
  const amount = normalizeAmount(n);
  if (amount <= 0) return;
  state.totalCount = saturatingAdd(state.totalCount, amount);

  const tracked = state.entries.get(item);
  if (tracked) {
    tracked.count = saturatingAdd(tracked.count, amount);
    return;
  }

  if (state.entries.size < state.capacity) {
    state.entries.set(item, { item, count: amount, error: 0 });
    return;
  }

  const evicted = minimumEntry(state);
  if (!evicted) return;
  state.entries.delete(evicted.item);
  state.entries.set(item, { item, count: saturatingAdd(evicted.count, amount), error: evicted.count });
}

export function spaceSavingInsert<T extends KeyItem>(state: SpaceSavingState<T>, item: T): void {
  spaceSavingAdd(state, item, 1);
}

// ---------------------------------------------------------------------------
// Query
// ---------------------------------------------------------------------------

/** Upper bound on the item's count; `undefined` when untracked. */
export function spaceSavingEstimate<T extends KeyItem>(state: SpaceSavingState<T>, item: T): number | undefined {
  return state.entries.get(item)?.count;
}

export function spaceSavingEstimateWithError<T extends KeyItem>(
  state: SpaceSavingState<T>,
  item: T,
): { count: number; error: number } | undefined {
  const entry = state.entries.get(item);
  return entry ? { count: entry.count, error: entry.error } : undefined;
}

/** Guaranteed lower bound `count - error`; `undefined` when untracked. */
export function spaceSavingLowerBound<T extends KeyItem>(state: SpaceSavingState<T>, item: T): number | undefined {
  const entry = state.entries.get(item);
  return entry ? saturatingSub(entry.count, entry.error) : undefined;
}

/**
 * Up to `k` tracked items by descending count. Equal counts keep tracking
 * order. `k` is floored; anything below 1 yields an empty list.
 */
export function spaceSavingTopK<T extends KeyItem>(state: SpaceSavingState<T>, k: number): HeavyHitter<T>[] {
  const limit = Number.isNaN(k) ? 0 : Math.floor(k);
  if (limit <= 0) return [];

  const rows: HeavyHitter<T>[] = [];
  for (const entry of state.entries.values()) {
    rows.push({ item: entry.item, count: entry.count, error: entry.error });
  }
  rows.sort((a, b) => b.count - a.count);
  return rows.slice(0, limit);
}

export function spaceSavingIsEmpty<T extends KeyItem>(state: SpaceSavingState<T>): boolean {
  return state.totalCount === 0;
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * Copy of `a` with `b`'s tracked counts replayed through `spaceSavingAdd`.
 * An approximation: the result depends on argument order.
 */
export function spaceSavingMerge<T extends KeyItem>(
  a: SpaceSavingState<T>,
  b: SpaceSavingState<T>,
): Result<SpaceSavingState<T>> {
  if (a.capacity !== b.capacity) {
    return incompatibleSketches('capacity must match for merge');
  }

  const merged: SpaceSavingState<T> = {
    capacity: a.capacity,
    entries: new Map(),
    totalCount: a.totalCount,
  };
  for (const [item, entry] of a.entries) {
    merged.entries.set(item, { item, count: entry.count, error: entry.error });
  }

  for (const [item, entry] of b.entries) {
    spaceSavingAdd(merged, item, entry.count);
  }

  log.debug('replayed counters into copy', { replayed: b.entries.size, capacity: a.capacity });
  return ok(merged);
}

export function spaceSavingClear<T extends KeyItem>(state: SpaceSavingState<T>): void {
  state.entries.clear();
  state.totalCount = 0;
}
