// ---------------------------------------------------------------------------
// Membership: Bloom Filter
// ---------------------------------------------------------------------------
// Probabilistic set membership test. False positives possible, false negatives
// are not. No deletion.
// ---------------------------------------------------------------------------

import { z } from 'zod';

import { incompatibleSketches, ok, tryAllocate } from '../errors.js';
import { add64, digestItem, hashDigest, modU64, saturatingAdd, u64 } from '../hashing/index.js';
import { membershipConfigSchema, parseParams, positiveInteger } from '../schemas.js';
import type {
  BloomFilterConfig,
  BloomFilterSize,
  BloomFilterState,
  Hashable,
  Result,
  U64,
} from '../types.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LN2 = Math.LN2;
const LN2_SQ = LN2 * LN2;

/** Largest addressable bit array. */
export const BLOOM_MAX_BIT_LENGTH = 2 ** 32;

const SEED_A: U64 = u64(0x243f6a88, 0x85a308d3);
const SEED_B: U64 = u64(0x13198a2e, 0x03707344);

const sizeSchema = z.object({
  bitLength: positiveInteger('bitLength', BLOOM_MAX_BIT_LENGTH),
  numHashes: positiveInteger('numHashes', 0xffffffff),
});

// ---------------------------------------------------------------------------
// Sizing
// ---------------------------------------------------------------------------

/** Optimal bit count: m = ceil(-n * ln(p) / (ln2)^2), at least 1. */
export function bloomOptimalBitLength(expectedItems: number, falsePositiveRate: number): Result<number> {
  const parsed = parseParams(membershipConfigSchema, { expectedItems, falsePositiveRate });
  if (!parsed.ok) return parsed;

  const n = parsed.value.expectedItems;
  const bits = Math.ceil((-n * Math.log(parsed.value.falsePositiveRate)) / LN2_SQ);
  return ok(Math.max(1, bits));
}

/** Optimal hash count: k = round(m / n * ln2), at least 1. */
export function bloomOptimalNumHashes(bitLength: number, expectedItems: number): Result<number> {
  const parsed = parseParams(
    z.object({ bitLength: positiveInteger('bitLength'), expectedItems: positiveInteger('expectedItems') }),
    { bitLength, expectedItems },
  );
  if (!parsed.ok) return parsed;

  return ok(Math.max(1, Math.round((parsed.value.bitLength / parsed.value.expectedItems) * LN2)));
}

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

/**
 * Create a Bloom filter sized for `expectedItems` at the target false
 * positive rate.
 */
export function createBloomFilter(config: BloomFilterConfig): Result<BloomFilterState> {
  const bitLength = bloomOptimalBitLength(config.expectedItems, config.falsePositiveRate);
  if (!bitLength.ok) return bitLength;
  const numHashes = bloomOptimalNumHashes(bitLength.value, config.expectedItems);
  if (!numHashes.ok) return numHashes;
  return createBloomFilterWithSize({ bitLength: bitLength.value, numHashes: numHashes.value });
}

/** Create a Bloom filter with an explicit bit length and probe count. */
export function createBloomFilterWithSize(size: BloomFilterSize): Result<BloomFilterState> {
  const parsed = parseParams(sizeSchema, size);
  if (!parsed.ok) return parsed;

  const { bitLength, numHashes } = parsed.value;
  const bits = tryAllocate('bitLength', () => new Uint32Array(Math.ceil(bitLength / 32)));
  if (!bits.ok) return bits;

  return ok({
    bits: bits.value,
    bitLength,
    numHashes,
    count: 0,
  });
}

// ---------------------------------------------------------------------------
// Internal: double hashing
// ---------------------------------------------------------------------------

/**
 * Probe i lands on (h1 + i * h2) mod 2^64 mod m. h2 is forced odd so the
 * probe sequence never stalls.
 */
function forEachProbe(state: BloomFilterState, item: Hashable, visit: (bit: number) => boolean): boolean {
  const digest = digestItem(item);
  let probe = hashDigest(digest, SEED_A);
  const h2raw = hashDigest(digest, SEED_B);
  const h2: U64 = { hi: h2raw.hi, lo: (h2raw.lo | 1) >>> 0 };

  for (let i = 0; i < state.numHashes; i++) {
    if (!visit(modU64(probe, state.bitLength))) return false;
    probe = add64(probe, h2);
  }
  return true;
}

function setBit(bits: Uint32Array, pos: number): void {
  const word = Math.floor(pos / 32);
  bits[word] = (bits[word]! | (1 << (pos % 32))) >>> 0;
}

function testBit(bits: Uint32Array, pos: number): boolean {
  return (bits[Math.floor(pos / 32)]! & (1 << (pos % 32))) !== 0;
}

// ---------------------------------------------------------------------------
// Insert / test
// ---------------------------------------------------------------------------

/** Add an item. Mutates state in-place. */
export function bloomInsert(state: BloomFilterState, item: Hashable): void {
  forEachProbe(state, item, (bit) => {
    setBit(state.bits, bit);
    return true;
  });
  state.count = saturatingAdd(state.count, 1);
}

/**
 * - `true`: the item is *probably* in the set.
 * - `false`: the item is *definitely not* in the set.
 */
export function bloomContains(state: BloomFilterState, item: Hashable): boolean {
  return forEachProbe(state, item, (bit) => testBit(state.bits, bit));
}

// ---------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------

/**
 * Expected false positive rate for the current insert count:
 * (1 - e^(-k * n / m))^k. Zero for an empty filter.
 */
export function bloomFalsePositiveRate(state: BloomFilterState): number {
  if (state.count === 0) return 0;
  const k = state.numHashes;
  return Math.pow(1 - Math.exp((-k * state.count) / state.bitLength), k);
}

export function bloomIsEmpty(state: BloomFilterState): boolean {
  return state.count === 0;
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * Union of two filters with identical bit length and probe count, by OR-ing
 * their bit arrays. Insert counts add (saturating).
 */
export function bloomMerge(a: BloomFilterState, b: BloomFilterState): Result<BloomFilterState> {
  if (a.bitLength !== b.bitLength || a.numHashes !== b.numHashes) {
    return incompatibleSketches('bloom filters must have identical bitLength and numHashes');
  }

  const merged = new Uint32Array(a.bits.length);
  for (let i = 0; i < merged.length; i++) {
    merged[i] = (a.bits[i]! | b.bits[i]!) >>> 0;
  }

  return ok({
    bits: merged,
    bitLength: a.bitLength,
    numHashes: a.numHashes,
    count: saturatingAdd(a.count, b.count),
  });
}

// ---------------------------------------------------------------------------
// Reset
// ---------------------------------------------------------------------------

/** Clear all bits and reset the count to zero. */
export function bloomClear(state: BloomFilterState): void {
  state.bits.fill(0);
  state.count = 0;
}
