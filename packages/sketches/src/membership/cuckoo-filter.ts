// ---------------------------------------------------------------------------
// Membership: Cuckoo Filter
// ---------------------------------------------------------------------------
// Approximate membership with deletion. Each item owns a small fingerprint
// and two candidate buckets; a full pair of buckets triggers a bounded random
// walk of relocations ("kicks").
// ---------------------------------------------------------------------------

import { z } from 'zod';

import { sketchConfig } from '../config.js';
import { incompatibleSketches, ok, tryAllocate } from '../errors.js';
import {
  copyRandomStream,
  createRandomStream,
  digestItem,
  hashDigest,
  hashItem,
  nextBit,
  nextU64,
  saturatingAdd,
  saturatingSub,
  u64,
} from '../hashing/index.js';
import { createLogger } from '../logger.js';
import { integerInRange, membershipConfigSchema, parseParams, positiveInteger } from '../schemas.js';
import type {
  CuckooFilterConfig,
  CuckooFilterParameters,
  CuckooFilterState,
  Hashable,
  Result,
  U64,
} from '../types.js';

const log = createLogger('cuckoo-filter');

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const CUCKOO_BUCKET_SIZE = 4;
export const CUCKOO_MAX_BUCKETS = 2 ** 29;

const INDEX_SEED: U64 = u64(0x243f6a88, 0x85a308d3);
const FINGERPRINT_SEED: U64 = u64(0x13198a2e, 0x03707344);
const ALT_INDEX_SEED: U64 = u64(0xa4093822, 0x299f31d0);
const RNG_SEED: U64 = u64(0xd6e8fd93, 0x5e7a4a6d);

/** Target occupancy used when sizing from an expected item count. */
const TARGET_LOAD = 0.9;

const parametersSchema = z.object({
  bucketCount: integerInRange('bucketCount', 1, CUCKOO_MAX_BUCKETS).refine(
    (n) => (n & (n - 1)) === 0,
    { message: 'bucketCount must be a non-zero power of two' },
  ),
  fingerprintBits: integerInRange('fingerprintBits', 1, 16),
  maxKicks: positiveInteger('maxKicks'),
});

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

function nextPowerOfTwo(n: number): number {
  let p = 1;
  while (p < n) p *= 2;
  return p;
}

/**
 * Create a cuckoo filter for `expectedItems` at the target false positive
 * rate.
 *
 * Fingerprint width: f = clamp(ceil(log2(1/p)) + 1, 4, 16)
 * Buckets:           B = nextPow2(max(2, ceil(n / 4 / 0.9)))
 */
export function createCuckooFilter(config: CuckooFilterConfig): Result<CuckooFilterState> {
  const parsed = parseParams(membershipConfigSchema, config);
  if (!parsed.ok) return parsed;

  const { expectedItems, falsePositiveRate } = parsed.value;
  const fingerprintBits = Math.min(16, Math.max(4, Math.ceil(Math.log2(1 / falsePositiveRate)) + 1));
  const bucketCount = nextPowerOfTwo(
    Math.max(2, Math.ceil(expectedItems / CUCKOO_BUCKET_SIZE / TARGET_LOAD)),
  );

  return createCuckooFilterWithParameters({
    bucketCount,
    fingerprintBits,
    maxKicks: sketchConfig.cuckooMaxKicks,
  });
}

/** Create a cuckoo filter with explicit geometry. */
export function createCuckooFilterWithParameters(
  params: CuckooFilterParameters,
): Result<CuckooFilterState> {
  const parsed = parseParams(parametersSchema, params);
  if (!parsed.ok) return parsed;

  const { bucketCount, fingerprintBits, maxKicks } = parsed.value;
  const slots = tryAllocate('bucketCount', () => new Uint16Array(bucketCount * CUCKOO_BUCKET_SIZE));
  if (!slots.ok) return slots;

  return ok({
    slots: slots.value,
    bucketCount,
    fingerprintBits,
    maxKicks,
    count: 0,
    rng: createRandomStream(RNG_SEED),
  });
}

// ---------------------------------------------------------------------------
// Internal: fingerprints and buckets
// ---------------------------------------------------------------------------

interface Placement {
  readonly fingerprint: number;
  readonly primary: number;
  readonly alternate: number;
}

/** Non-zero `f`-bit fingerprint; zero marks an empty slot. */
function fingerprintOf(state: CuckooFilterState, digest: U64): number {
  const mask = state.fingerprintBits === 16 ? 0xffff : (1 << state.fingerprintBits) - 1;
  return Math.max(1, hashDigest(digest, FINGERPRINT_SEED).lo & mask);
}

function alternateIndex(state: CuckooFilterState, bucket: number, fingerprint: number): number {
  return (bucket ^ hashItem(fingerprint, ALT_INDEX_SEED).lo) & (state.bucketCount - 1);
}

function placementOf(state: CuckooFilterState, item: Hashable): Placement {
  const digest = digestItem(item);
  const fingerprint = fingerprintOf(state, digest);
  const primary = hashDigest(digest, INDEX_SEED).lo & (state.bucketCount - 1);
  return { fingerprint, primary, alternate: alternateIndex(state, primary, fingerprint) };
}

function placeInBucket(slots: Uint16Array, bucket: number, fingerprint: number): boolean {
  const start = bucket * CUCKOO_BUCKET_SIZE;
  for (let s = start; s < start + CUCKOO_BUCKET_SIZE; s++) {
    if (slots[s] === 0) {
      slots[s] = fingerprint;
      return true;
    }
  }
  return false;
}

function removeFromBucket(slots: Uint16Array, bucket: number, fingerprint: number): boolean {
  const start = bucket * CUCKOO_BUCKET_SIZE;
  for (let s = start; s < start + CUCKOO_BUCKET_SIZE; s++) {
    if (slots[s] === fingerprint) {
      slots[s] = 0;
      return true;
    }
  }
  return false;
}

function bucketHas(slots: Uint16Array, bucket: number, fingerprint: number): boolean {
  const start = bucket * CUCKOO_BUCKET_SIZE;
  for (let s = start; s < start + CUCKOO_BUCKET_SIZE; s++) {
    if (slots[s] === fingerprint) return true;
  }
  return false;
}

/**
 * Store `fingerprint` in one of its two buckets, relocating residents when
 * both are full. On failure every displaced fingerprint is put back, so the
 * table is exactly as it was before the call.
 */
function placeFingerprint(state: CuckooFilterState, placement: Placement): boolean {
  const slots = state.slots;
  if (placeInBucket(slots, placement.primary, placement.fingerprint)) return true;
  if (placeInBucket(slots, placement.alternate, placement.fingerprint)) return true;

  const swappedSlots: number[] = [];
  const displaced: number[] = [];
  let carried = placement.fingerprint;
  let bucket = nextBit(state.rng) === 0 ? placement.primary : placement.alternate;

  for (let kick = 0; kick < state.maxKicks; kick++) {
    const slot = bucket * CUCKOO_BUCKET_SIZE + (nextU64(state.rng).lo & (CUCKOO_BUCKET_SIZE - 1));
    const victim = slots[slot]!;
    slots[slot] = carried;
    swappedSlots.push(slot);
    displaced.push(victim);

    carried = victim;
    bucket = alternateIndex(state, bucket, carried);
    if (placeInBucket(slots, bucket, carried)) return true;
  }

  for (let i = swappedSlots.length - 1; i >= 0; i--) {
    slots[swappedSlots[i]!] = displaced[i]!;
  }
  return false;
}

// ---------------------------------------------------------------------------
// Insert / test / delete
// ---------------------------------------------------------------------------

/**
 * Insert an item. Returns `false` when no slot could be freed within
 * `maxKicks` relocations; the item is then absent and the table unchanged.
 */
export function cuckooInsert(state: CuckooFilterState, item: Hashable): boolean {
  const placement = placementOf(state, item);
  if (!placeFingerprint(state, placement)) {
    log.warn('insert refused after relocation', {
      maxKicks: state.maxKicks,
      loadFactor: cuckooLoadFactor(state),
    });
    return false;
  }
  state.count = saturatingAdd(state.count, 1);
  return true;
}

export function cuckooContains(state: CuckooFilterState, item: Hashable): boolean {
  const { fingerprint, primary, alternate } = placementOf(state, item);
  return bucketHas(state.slots, primary, fingerprint) || bucketHas(state.slots, alternate, fingerprint);
}

/** Remove one stored instance of the item's fingerprint. */
export function cuckooDelete(state: CuckooFilterState, item: Hashable): boolean {
  const { fingerprint, primary, alternate } = placementOf(state, item);
  if (removeFromBucket(state.slots, primary, fingerprint) || removeFromBucket(state.slots, alternate, fingerprint)) {
    state.count = saturatingSub(state.count, 1);
    return true;
  }
  return false;
}

export function cuckooClear(state: CuckooFilterState): void {
  state.slots.fill(0);
  state.count = 0;
}

// ---------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------

/** Stored fingerprints over total slots. */
export function cuckooLoadFactor(state: CuckooFilterState): number {
  return state.count / state.slots.length;
}

/** Upper bound 2 * bucketSize / 2^f, clamped to 1. */
export function cuckooExpectedFalsePositiveRate(state: CuckooFilterState): number {
  return Math.min((2 * CUCKOO_BUCKET_SIZE) / 2 ** state.fingerprintBits, 1);
}

export function cuckooIsEmpty(state: CuckooFilterState): boolean {
  return state.count === 0;
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * Copy of `a` with every fingerprint of `b` re-inserted. Fails when shapes
 * differ or when `b`'s fingerprints do not all fit.
 */
export function cuckooMerge(a: CuckooFilterState, b: CuckooFilterState): Result<CuckooFilterState> {
  if (a.bucketCount !== b.bucketCount || a.fingerprintBits !== b.fingerprintBits) {
    return incompatibleSketches('cuckoo filters must have identical bucketCount and fingerprintBits');
  }

  const merged: CuckooFilterState = {
    slots: a.slots.slice(),
    bucketCount: a.bucketCount,
    fingerprintBits: a.fingerprintBits,
    maxKicks: a.maxKicks,
    count: a.count,
    rng: copyRandomStream(a.rng),
  };

  for (let slot = 0; slot < b.slots.length; slot++) {
    const fingerprint = b.slots[slot]!;
    if (fingerprint === 0) continue;

    const primary = Math.floor(slot / CUCKOO_BUCKET_SIZE);
    const placement = { fingerprint, primary, alternate: alternateIndex(merged, primary, fingerprint) };
    if (!placeFingerprint(merged, placement)) {
      return incompatibleSketches('combined cuckoo filter load does not fit');
    }
    merged.count = saturatingAdd(merged.count, 1);
  }

  return ok(merged);
}
