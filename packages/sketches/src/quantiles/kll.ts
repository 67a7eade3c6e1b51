// ---------------------------------------------------------------------------
// Quantiles: KLL sketch
// ---------------------------------------------------------------------------
// Mergeable quantile sketch built from levels of values. A value at level l
// stands for 2^l inputs. A level over capacity is compacted: sorted, then
// every other value (random offset) is promoted to the next level.
// ---------------------------------------------------------------------------

import { sketchConfig } from '../config.js';
import { incompatibleSketches, invalidParameter, ok } from '../errors.js';
import { copyRandomStream, createRandomStream, nextBit, reseedRandomStream, saturatingAdd, u64 } from '../hashing/index.js';
import { createLogger } from '../logger.js';
import { integerInRange, parseParams, probability, quantileSchema } from '../schemas.js';
import type { KllState, Result, U64 } from '../types.js';

const log = createLogger('kll');

const RNG_SEED: U64 = u64(0xd1b54a32, 0xc192ed03);
const CAPACITY_DECAY = 0.75;

const kSchema = integerInRange('k', 2, Number.MAX_SAFE_INTEGER);
const rankErrorSchema = probability('rankError');

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

/** Create a KLL sketch; larger `k` retains more values and is more accurate. */
export function createKll(k: number = sketchConfig.kllK): Result<KllState> {
  const parsed = parseParams(kSchema, k);
  if (!parsed.ok) return parsed;
  return ok({ k: parsed.value, levels: [[]], count: 0, rng: createRandomStream(RNG_SEED) });
}

/** k = ceil(2 / rankError), at least 2. */
export function createKllWithError(rankError: number): Result<KllState> {
  const parsed = parseParams(rankErrorSchema, rankError);
  if (!parsed.ok) return parsed;
  return createKll(Math.max(2, Math.ceil(2 / parsed.value)));
}

// ---------------------------------------------------------------------------
// Compaction
// ---------------------------------------------------------------------------

/** Capacity of level l: max(2, ceil(k * 0.75^l)). */
export function kllLevelCapacity(k: number, level: number): number {
  return Math.max(2, Math.ceil(k * CAPACITY_DECAY ** level));
}

function compactLevel(state: KllState, level: number): void {
  if (level + 1 === state.levels.length) {
    state.levels.push([]);
    log.debug('added level', { levels: state.levels.length, count: state.count });
  }

  const values = state.levels[level]!.sort((a, b) => a - b);
  // An odd level keeps its largest value behind.
  const carry = values.length % 2 === 1 ? values.pop() : undefined;

  const next = state.levels[level + 1]!;
  for (let i: number = nextBit(state.rng); i < values.length; i += 2) {
    next.push(values[i]!);
  }

  state.levels[level] = carry === undefined ? [] : [carry];
}

function compactAllLevels(state: KllState): void {
  for (let level = 0; level < state.levels.length; level++) {
    if (state.levels[level]!.length > kllLevelCapacity(state.k, level)) {
      compactLevel(state, level);
    }
  }
}

// ---------------------------------------------------------------------------
// Add
// ---------------------------------------------------------------------------

/** Add a value. Non-finite values are ignored. Mutates state in-place. */
export function kllAdd(state: KllState, value: number): void {
  if (!Number.isFinite(value)) return;
  state.levels[0]!.push(value);
  state.count = saturatingAdd(state.count, 1);
  compactAllLevels(state);
}

// ---------------------------------------------------------------------------
// Query
// ---------------------------------------------------------------------------

interface WeightedValue {
  readonly value: number;
  readonly weight: number;
}

function weightedValues(state: KllState): WeightedValue[] {
  const out: WeightedValue[] = [];
  state.levels.forEach((values, level) => {
    const weight = 2 ** level;
    for (const value of values) out.push({ value, weight });
  });
  return out.sort((a, b) => a.value - b.value);
}

/**
 * Value at weighted rank round(q * (W - 1)), W being the total retained
 * weight.
 */
export function kllQuantile(state: KllState, q: number): Result<number> {
  const parsed = parseParams(quantileSchema, q);
  if (!parsed.ok) return parsed;
  if (state.count === 0) return invalidParameter('quantile is undefined for an empty sketch');

  const entries = weightedValues(state);
  const totalWeight = entries.reduce((sum, e) => sum + e.weight, 0);
  const target = Math.round(Math.max(0, totalWeight - 1) * parsed.value);

  let cumulative = 0;
  for (const entry of entries) {
    cumulative += entry.weight;
    if (cumulative > target) return ok(entry.value);
  }
  return ok(entries[entries.length - 1]!.value);
}

/** Weighted fraction of retained values less than or equal to `value`. */
export function kllRank(state: KllState, value: number): Result<number> {
  if (Number.isNaN(value)) return invalidParameter('value must not be NaN', 'value');
  if (state.count === 0) return invalidParameter('rank is undefined for an empty sketch');

  let below = 0;
  let total = 0;
  for (const entry of weightedValues(state)) {
    total += entry.weight;
    if (entry.value <= value) below += entry.weight;
  }
  return ok(below / total);
}

/** Number of values currently stored across all levels. */
export function kllRetained(state: KllState): number {
  return state.levels.reduce((sum, values) => sum + values.length, 0);
}

export function kllIsEmpty(state: KllState): boolean {
  return state.count === 0;
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/** Concatenate corresponding levels of two same-`k` sketches and recompact. */
export function kllMerge(a: KllState, b: KllState): Result<KllState> {
  if (a.k !== b.k) {
    return incompatibleSketches('k must match for merge');
  }

  const depth = Math.max(a.levels.length, b.levels.length);
  const levels: number[][] = [];
  for (let level = 0; level < depth; level++) {
    levels.push([...(a.levels[level] ?? []), ...(b.levels[level] ?? [])]);
  }

  const merged: KllState = {
    k: a.k,
    levels,
    count: saturatingAdd(a.count, b.count),
    rng: copyRandomStream(a.rng),
  };
  compactAllLevels(merged);
  return ok(merged);
}

// ---------------------------------------------------------------------------
// Reset
// ---------------------------------------------------------------------------

export function kllClear(state: KllState): void {
  state.levels.length = 0;
  state.levels.push([]);
  state.count = 0;
  reseedRandomStream(state.rng, RNG_SEED);
}
