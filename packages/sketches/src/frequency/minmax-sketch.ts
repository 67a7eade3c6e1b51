// ---------------------------------------------------------------------------
// Frequency: MinMax Sketch (Count-Min with conservative update)
// ---------------------------------------------------------------------------
// Unsigned frequency estimator. Overestimates are possible, never
// underestimates: the minimum over all rows is the tightest upper bound, the
// maximum the loosest. Conservative update raises counters only as far as
// the new minimum requires.
// ---------------------------------------------------------------------------

import { incompatibleSketches, ok, tryAllocate } from '../errors.js';
import { deriveSeeds, digestItem, hashDigest, modU64, saturatingAdd, u64 } from '../hashing/index.js';
import type { ErrorBounds, Hashable, MinMaxSketchState, Result, SketchDimensions, U64 } from '../types.js';
import { dimensionsFromBounds, normalizeAmount, sameSeeds, validateDimensions } from './table.js';

const SEED_BASE: U64 = u64(0xa0761d64, 0x78bd642f);

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

/**
 * Create a MinMax sketch from error bounds.
 *
 * - width = ceil(e / epsilon): error bound is totalCount / width.
 * - depth = ceil(ln(1 / delta)): the bound fails with probability delta.
 */
export function createMinMaxSketch(bounds: ErrorBounds): Result<MinMaxSketchState> {
  const dimensions = dimensionsFromBounds(bounds, (epsilon) => Math.E / epsilon);
  if (!dimensions.ok) return dimensions;
  return createMinMaxSketchWithDimensions(dimensions.value);
}

/**
 * Create a MinMax sketch with `depth` rows of `width` counters, stored as a
 * flat row-major table.
 */
export function createMinMaxSketchWithDimensions(dimensions: SketchDimensions): Result<MinMaxSketchState> {
  const parsed = validateDimensions(dimensions);
  if (!parsed.ok) return parsed;

  const { width, depth } = parsed.value;
  const counters = tryAllocate('width', () => new Float64Array(width * depth));
  if (!counters.ok) return counters;

  return ok({
    counters: counters.value,
    width,
    depth,
    seeds: deriveSeeds(depth, SEED_BASE),
    totalCount: 0,
  });
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

/** Flat counter index for `item` in each row. */
function cellsOf(state: MinMaxSketchState, item: Hashable): number[] {
  const digest = digestItem(item);
  const cells: number[] = [];
  for (let row = 0; row < state.depth; row++) {
    cells.push(row * state.width + modU64(hashDigest(digest, state.seeds[row]!), state.width));
  }
  return cells;
}

// ---------------------------------------------------------------------------
// Add
// ---------------------------------------------------------------------------

/**
 * Record `count` occurrences of `item`. Every row's counter is raised to
 * `max(current, min + count)`. Negative or zero counts are ignored.
 * Mutates state in-place.
 */
export function minMaxAdd(state: MinMaxSketchState, item: Hashable, count: number): void {
  const amount = normalizeAmount(count);
  if (amount <= 0) return;

  const { counters } = state;
  const cells = cellsOf(state, item);

  let min = Infinity;
  for (const cell of cells) min = Math.min(min, counters[cell]!);

  const target = saturatingAdd(min, amount);
  for (const cell of cells) {
    if (counters[cell]! < target) counters[cell] = target;
  }
  state.totalCount = saturatingAdd(state.totalCount, amount);
}

export function minMaxIncrement(state: MinMaxSketchState, item: Hashable): void {
  minMaxAdd(state, item, 1);
}

// ---------------------------------------------------------------------------
// Query
// ---------------------------------------------------------------------------

/** Minimum counter across rows; never below the true count. */
export function minMaxEstimate(state: MinMaxSketchState, item: Hashable): number {
  let min = Infinity;
  for (const cell of cellsOf(state, item)) min = Math.min(min, state.counters[cell]!);
  return min;
}

/** Maximum counter across rows; the loosest upper bound. */
export function minMaxMaxEstimate(state: MinMaxSketchState, item: Hashable): number {
  let max = 0;
  for (const cell of cellsOf(state, item)) max = Math.max(max, state.counters[cell]!);
  return max;
}

/** `[min, max]` over the item's counters. */
export function minMaxEstimateInterval(state: MinMaxSketchState, item: Hashable): [number, number] {
  return [minMaxEstimate(state, item), minMaxMaxEstimate(state, item)];
}

/** Additive error bound of `minMaxEstimate`: totalCount / width. */
export function minMaxErrorBound(state: MinMaxSketchState): number {
  return state.totalCount / state.width;
}

export function minMaxIsEmpty(state: MinMaxSketchState): boolean {
  return state.totalCount === 0;
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * Element-wise saturating sum of two sketches with identical width, depth and
 * seeds.
 */
export function minMaxMerge(a: MinMaxSketchState, b: MinMaxSketchState): Result<MinMaxSketchState> {
  if (a.width !== b.width || a.depth !== b.depth) {
    return incompatibleSketches('width/depth must match for merge');
  }
  if (!sameSeeds(a.seeds, b.seeds)) {
    return incompatibleSketches('hash seeds must match for merge');
  }

  const counters = new Float64Array(a.counters.length);
  for (let i = 0; i < counters.length; i++) {
    counters[i] = saturatingAdd(a.counters[i]!, b.counters[i]!);
  }

  return ok({
    counters,
    width: a.width,
    depth: a.depth,
    seeds: a.seeds,
    totalCount: saturatingAdd(a.totalCount, b.totalCount),
  });
}

// ---------------------------------------------------------------------------
// Reset
// ---------------------------------------------------------------------------

/** Clear all counters and reset the total count to zero. */
export function minMaxClear(state: MinMaxSketchState): void {
  state.counters.fill(0);
  state.totalCount = 0;
}
