// ---------------------------------------------------------------------------
// Frequency: Count Sketch
// ---------------------------------------------------------------------------
// Signed frequency estimator. Each row hashes an item to one counter and to
// a sign in {+1, -1}; collisions cancel in expectation, and the median across
// rows gives the estimate. Supports decrements and negative totals.
// ---------------------------------------------------------------------------

import { incompatibleSketches, ok, tryAllocate } from '../errors.js';
import {
  deriveSeeds,
  digestItem,
  hashDigest,
  modU64,
  saturatingAdd,
  saturatingAddSigned,
  u64,
} from '../hashing/index.js';
import type { CountSketchState, ErrorBounds, Hashable, Result, SketchDimensions, U64 } from '../types.js';
import { dimensionsFromBounds, normalizeAmount, sameSeeds, validateDimensions } from './table.js';

const INDEX_SEED_BASE: U64 = u64(0x0d6e8fd9, 0x3a5e4c31);
const SIGN_SEED_BASE: U64 = u64(0xa0761d64, 0x78bd642f);

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

/**
 * Create a Count Sketch from error bounds.
 *
 * - width = ceil(3 / epsilon^2)
 * - depth = ceil(ln(1 / delta))
 */
export function createCountSketch(bounds: ErrorBounds): Result<CountSketchState> {
  const dimensions = dimensionsFromBounds(bounds, (epsilon) => 3 / (epsilon * epsilon));
  if (!dimensions.ok) return dimensions;
  return createCountSketchWithDimensions(dimensions.value);
}

export function createCountSketchWithDimensions(dimensions: SketchDimensions): Result<CountSketchState> {
  const parsed = validateDimensions(dimensions);
  if (!parsed.ok) return parsed;

  const { width, depth } = parsed.value;
  const counters = tryAllocate('width', () => new Float64Array(width * depth));
  if (!counters.ok) return counters;

  return ok({
    counters: counters.value,
    width,
    depth,
    indexSeeds: deriveSeeds(depth, INDEX_SEED_BASE),
    signSeeds: deriveSeeds(depth, SIGN_SEED_BASE),
    totalUpdateMagnitude: 0,
  });
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

/** Calls `visit(cell, sign)` for each row's counter. */
function forEachCell(
  state: CountSketchState,
  item: Hashable,
  visit: (cell: number, sign: 1 | -1) => void,
): void {
  const digest = digestItem(item);
  for (let row = 0; row < state.depth; row++) {
    const column = modU64(hashDigest(digest, state.indexSeeds[row]!), state.width);
    const sign = (hashDigest(digest, state.signSeeds[row]!).lo & 1) === 0 ? 1 : -1;
    visit(row * state.width + column, sign);
  }
}

// ---------------------------------------------------------------------------
// Update
// ---------------------------------------------------------------------------

/**
 * Add `delta` occurrences of `item` (negative to remove). Counters saturate at
 * ±MAX_SAFE_INTEGER. A zero delta is ignored. Mutates state in-place.
 */
export function countSketchAdd(state: CountSketchState, item: Hashable, delta: number): void {
  const amount = normalizeAmount(delta);
  if (amount === 0) return;

  const { counters } = state;
  forEachCell(state, item, (cell, sign) => {
    counters[cell] = saturatingAddSigned(counters[cell]!, sign * amount);
  });
  state.totalUpdateMagnitude = saturatingAdd(state.totalUpdateMagnitude, Math.abs(amount));
}

export function countSketchIncrement(state: CountSketchState, item: Hashable): void {
  countSketchAdd(state, item, 1);
}

export function countSketchDecrement(state: CountSketchState, item: Hashable): void {
  countSketchAdd(state, item, -1);
}

// ---------------------------------------------------------------------------
// Query
// ---------------------------------------------------------------------------

/**
 * Median of the sign-corrected counters. With an even depth, the mean of the
 * two middle values truncated toward zero.
 */
export function countSketchEstimate(state: CountSketchState, item: Hashable): number {
  const estimates: number[] = [];
  forEachCell(state, item, (cell, sign) => {
    estimates.push(sign * state.counters[cell]!);
  });
  estimates.sort((a, b) => a - b);

  const mid = estimates.length >> 1;
  const median =
    estimates.length % 2 === 1
      ? estimates[mid]!
      : Math.trunc(estimates[mid - 1]! / 2 + estimates[mid]! / 2);
  return median === 0 ? 0 : median;
}

export function countSketchIsEmpty(state: CountSketchState): boolean {
  return state.totalUpdateMagnitude === 0;
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * Element-wise saturating sum of two sketches with identical width, depth and
 * seeds.
 */
export function countSketchMerge(a: CountSketchState, b: CountSketchState): Result<CountSketchState> {
  if (a.width !== b.width || a.depth !== b.depth) {
    return incompatibleSketches('width/depth must match for merge');
  }
  if (!sameSeeds(a.indexSeeds, b.indexSeeds) || !sameSeeds(a.signSeeds, b.signSeeds)) {
    return incompatibleSketches('hash seeds must match for merge');
  }

  const counters = new Float64Array(a.counters.length);
  for (let i = 0; i < counters.length; i++) {
    counters[i] = saturatingAddSigned(a.counters[i]!, b.counters[i]!);
  }

  return ok({
    counters,
    width: a.width,
    depth: a.depth,
    indexSeeds: a.indexSeeds,
    signSeeds: a.signSeeds,
    totalUpdateMagnitude: saturatingAdd(a.totalUpdateMagnitude, b.totalUpdateMagnitude),
  });
}

// ---------------------------------------------------------------------------
// Reset
// ---------------------------------------------------------------------------

export function countSketchClear(state: CountSketchState): void {
  state.counters.fill(0);
  state.totalUpdateMagnitude = 0;
}
