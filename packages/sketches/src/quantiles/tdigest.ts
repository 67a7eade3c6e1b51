// ---------------------------------------------------------------------------
// Quantiles: t-Digest
// ---------------------------------------------------------------------------
// Streaming quantile estimation over a sorted list of weighted centroids.
// Centroid weight is capped by 4·W/δ·q(1-q), so centroids stay small in the
// tails and grow toward the median.
// ---------------------------------------------------------------------------

import { z } from 'zod';

import { sketchConfig } from '../config.js';
import { incompatibleSketches, invalidParameter, ok } from '../errors.js';
import { createLogger } from '../logger.js';
import { parseParams, probability, quantileSchema } from '../schemas.js';
import type { Result, TDigestCentroid, TDigestConfig, TDigestState } from '../types.js';

const log = createLogger('tdigest');

/** Centroid count, in multiples of the compression, that triggers compression. */
const COMPRESS_FACTOR = 8;

const compressionSchema = z
  .number({ invalid_type_error: 'compression must be finite and at least 10' })
  .finite({ message: 'compression must be finite and at least 10' })
  .min(10, { message: 'compression must be finite and at least 10' });

const configSchema = z.object({ compression: compressionSchema });

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

/**
 * Create an empty t-digest.
 *
 * @param config.compression  Delta parameter controlling accuracy vs. memory
 *                            (at least 10). Higher = more centroids = better
 *                            accuracy. Defaults to the configured value.
 */
export function createTDigest(config?: TDigestConfig): Result<TDigestState> {
  const parsed = parseParams(configSchema, {
    compression: config?.compression ?? sketchConfig.tdigestCompression,
  });
  if (!parsed.ok) return parsed;

  return ok({
    compression: parsed.value.compression,
    centroids: [],
    totalWeight: 0,
    min: Infinity,
    max: -Infinity,
  });
}

/** compression = ceil(10 / quantileError), at least 10. */
export function createTDigestWithError(quantileError: number): Result<TDigestState> {
  const parsed = parseParams(probability('quantileError'), quantileError);
  if (!parsed.ok) return parsed;
  return createTDigest({ compression: Math.max(10, Math.ceil(10 / parsed.value)) });
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

function maxCentroidWeight(state: TDigestState, q: number): number {
  return Math.max(((4 * state.totalWeight) / state.compression) * q * (1 - q), 1);
}

/** Quantile of a centroid's midpoint, clamped to [0, 1]. */
function centroidQuantile(state: TDigestState, index: number): number {
  let before = 0;
  for (let i = 0; i < index; i++) before += state.centroids[i]!.weight;
  const centered = before + state.centroids[index]!.weight / 2;
  return Math.min(1, Math.max(0, centered / Math.max(state.totalWeight, 1)));
}

/** First index whose mean is >= value. */
function lowerBound(centroids: readonly TDigestCentroid[], value: number): number {
  let lo = 0;
  let hi = centroids.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (centroids[mid]!.mean < value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

function nearestCentroid(centroids: readonly TDigestCentroid[], value: number): number {
  const insertAt = lowerBound(centroids, value);
  if (insertAt === 0) return 0;
  if (insertAt === centroids.length) return insertAt - 1;
  const below = value - centroids[insertAt - 1]!.mean;
  const above = centroids[insertAt]!.mean - value;
  return below <= above ? insertAt - 1 : insertAt;
}

// ---------------------------------------------------------------------------
// Add
// ---------------------------------------------------------------------------

/**
 * Add `value` with `weight`. Mutates state in-place.
 *
 * 1. Find the nearest centroid by mean.
 * 2. Absorb the value there if the centroid stays under the weight cap for
 *    its quantile; otherwise insert a new centroid in sorted position.
 * 3. Compress once centroids exceed 8 * compression.
 *
 * Non-finite values and non-finite or non-positive weights are ignored.
 */
export function tdigestAdd(state: TDigestState, value: number, weight = 1): void {
  if (!Number.isFinite(value) || !Number.isFinite(weight) || weight <= 0) return;

  if (value < state.min) state.min = value;
  if (value > state.max) state.max = value;

  const centroids = state.centroids;
  if (centroids.length === 0) {
    centroids.push({ mean: value, weight });
    state.totalWeight += weight;
    return;
  }

  const nearest = nearestCentroid(centroids, value);
  const cap = maxCentroidWeight(state, centroidQuantile(state, nearest));
  const target = centroids[nearest]!;

  if (target.weight + weight <= cap) {
    const updated = target.weight + weight;
    target.mean += (value - target.mean) * (weight / updated);
    target.weight = updated;
  } else {
    centroids.splice(lowerBound(centroids, value), 0, { mean: value, weight });
  }

  state.totalWeight += weight;
  if (centroids.length > COMPRESS_FACTOR * state.compression) {
    tdigestCompress(state);
  }
}

// ---------------------------------------------------------------------------
// Compress
// ---------------------------------------------------------------------------

/**
 * Greedily merge adjacent centroids while the merged weight stays under the
 * cap for its quantile. Centroids stay sorted by mean.
 */
export function tdigestCompress(state: TDigestState): void {
  if (state.centroids.length <= 1) return;

  const before = state.centroids.length;
  const sorted = [...state.centroids].sort((a, b) => a.mean - b.mean);
  const merged: TDigestCentroid[] = [];
  let cumulative = 0;

  for (const centroid of sorted) {
    const last = merged[merged.length - 1];
    if (last) {
      const q = Math.min(1, Math.max(0, (cumulative + last.weight / 2) / Math.max(state.totalWeight, 1)));
      if (last.weight + centroid.weight <= maxCentroidWeight(state, q)) {
        const updated = last.weight + centroid.weight;
        last.mean += (centroid.mean - last.mean) * (centroid.weight / updated);
        last.weight = updated;
        continue;
      }
      cumulative += last.weight;
    }
    merged.push({ mean: centroid.mean, weight: centroid.weight });
  }

  state.centroids = merged;
  log.debug('compressed centroids', { before, after: merged.length });
}

// ---------------------------------------------------------------------------
// Quantile estimation
// ---------------------------------------------------------------------------

/**
 * Estimate the value at quantile q.
 *
 * Interpolates linearly between the two centroids straddling q·W. q = 0 and
 * q = 1 return the first and last centroid means.
 */
export function tdigestQuantile(state: TDigestState, q: number): Result<number> {
  const parsed = parseParams(quantileSchema, q);
  if (!parsed.ok) return parsed;

  const centroids = state.centroids;
  if (centroids.length === 0) return invalidParameter('quantile is undefined for an empty digest');

  const first = centroids[0]!;
  const last = centroids[centroids.length - 1]!;
  if (parsed.value <= 0) return ok(first.mean);
  if (parsed.value >= 1) return ok(last.mean);

  const target = parsed.value * state.totalWeight;
  let cumulative = 0;
  for (let i = 0; i < centroids.length; i++) {
    const current = centroids[i]!;
    const nextCumulative = cumulative + current.weight;
    if (target <= nextCumulative) {
      if (i === 0) return ok(current.mean);

      const previous = centroids[i - 1]!;
      const leftRank = cumulative - previous.weight / 2;
      const rightRank = cumulative + current.weight / 2;
      if (rightRank <= leftRank + Number.EPSILON) return ok(current.mean);

      const t = Math.min(1, Math.max(0, (target - leftRank) / (rightRank - leftRank)));
      return ok(previous.mean + t * (current.mean - previous.mean));
    }
    cumulative = nextCumulative;
  }

  return ok(last.mean);
}

// ---------------------------------------------------------------------------
// CDF estimation
// ---------------------------------------------------------------------------

/**
 * Estimated fraction of the weight at or below `value`, interpolating between
 * centroid midpoints and the observed min/max.
 */
export function tdigestCDF(state: TDigestState, value: number): Result<number> {
  if (Number.isNaN(value)) return invalidParameter('value must not be NaN', 'value');

  const centroids = state.centroids;
  if (centroids.length === 0) return invalidParameter('cdf is undefined for an empty digest');
  if (value < state.min) return ok(0);
  if (value >= state.max) return ok(1);

  const total = state.totalWeight;
  let cumulative = 0;

  for (let i = 0; i < centroids.length; i++) {
    const centroid = centroids[i]!;
    if (value < centroid.mean) {
      if (i === 0) {
        const span = centroid.mean - state.min;
        if (span <= 0) return ok(0);
        return ok((((value - state.min) / span) * centroid.weight) / 2 / total);
      }

      const prev = centroids[i - 1]!;
      const prevMid = cumulative - prev.weight / 2;
      const span = centroid.mean - prev.mean;
      if (span <= 0) return ok(cumulative / total);
      const t = (value - prev.mean) / span;
      const weight = prevMid + t * (cumulative + centroid.weight / 2 - prevMid);
      return ok(Math.min(1, Math.max(0, weight / total)));
    }
    cumulative += centroid.weight;
  }

  const last = centroids[centroids.length - 1]!;
  const span = state.max - last.mean;
  const lastMid = cumulative - last.weight / 2;
  const weight = span <= 0 ? cumulative : lastMid + ((value - last.mean) / span) * (last.weight / 2);
  return ok(Math.min(1, Math.max(0, weight / total)));
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * New digest holding both inputs: `b`'s centroids are added to a copy of `a`
 * as weighted values, then the result is compressed.
 */
export function tdigestMerge(a: TDigestState, b: TDigestState): Result<TDigestState> {
  if (Math.abs(a.compression - b.compression) > Number.EPSILON) {
    return incompatibleSketches('compression must match for merge');
  }

  const merged: TDigestState = {
    compression: a.compression,
    centroids: a.centroids.map((c) => ({ mean: c.mean, weight: c.weight })),
    totalWeight: a.totalWeight,
    min: a.min,
    max: a.max,
  };

  for (const centroid of b.centroids) {
    tdigestAdd(merged, centroid.mean, centroid.weight);
  }
  merged.min = Math.min(merged.min, b.min);
  merged.max = Math.max(merged.max, b.max);

  tdigestCompress(merged);
  return ok(merged);
}

// ---------------------------------------------------------------------------
// Statistics
// ---------------------------------------------------------------------------

/** Weighted mean of all values; `undefined` when empty. */
export function tdigestMean(state: TDigestState): number | undefined {
  if (state.totalWeight === 0) return undefined;

  let weightedSum = 0;
  for (const c of state.centroids) weightedSum += c.mean * c.weight;
  return weightedSum / state.totalWeight;
}

/** Smallest value seen; `undefined` when empty. */
export function tdigestMin(state: TDigestState): number | undefined {
  return state.totalWeight === 0 ? undefined : state.min;
}

/** Largest value seen; `undefined` when empty. */
export function tdigestMax(state: TDigestState): number | undefined {
  return state.totalWeight === 0 ? undefined : state.max;
}

/** Total weight added, rounded. */
export function tdigestCount(state: TDigestState): number {
  return Math.round(state.totalWeight);
}

export function tdigestIsEmpty(state: TDigestState): boolean {
  return state.totalWeight === 0;
}

// ---------------------------------------------------------------------------
// Reset
// ---------------------------------------------------------------------------

export function tdigestClear(state: TDigestState): void {
  state.centroids = [];
  state.totalWeight = 0;
  state.min = Infinity;
  state.max = -Infinity;
}
