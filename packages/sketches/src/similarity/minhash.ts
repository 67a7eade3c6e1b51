// ---------------------------------------------------------------------------
// Similarity: MinHash
// ---------------------------------------------------------------------------
// Jaccard similarity estimator. Keeps, for each of `numHashes` independent
// seeds, the smallest seeded hash observed. Two sets agree on a component
// with probability equal to their Jaccard index.
// ---------------------------------------------------------------------------

import { sketchConfig } from '../config.js';
import { incompatibleSketches, ok } from '../errors.js';
import { deriveSeeds, digestItem, equals64, hashDigest, u64, u64ToBigInt } from '../hashing/index.js';
import { parseParams, positiveInteger, probability } from '../schemas.js';
import type { Hashable, MinHashState, Result, U64 } from '../types.js';

/** Largest supported signature length. */
export const MINHASH_MAX_HASHES = 2 ** 24;

const SEED_BASE: U64 = u64(0xbf58476d, 0x1ce4e5b9);

const numHashesSchema = positiveInteger('numHashes', MINHASH_MAX_HASHES);
const stdErrorSchema = probability('stdError');

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

export function createMinHash(numHashes: number = sketchConfig.minHashPermutations): Result<MinHashState> {
  const parsed = parseParams(numHashesSchema, numHashes);
  if (!parsed.ok) return parsed;

  const n = parsed.value;
  return ok({
    numHashes: n,
    seeds: minHashSeeds(n),
    sigHi: new Uint32Array(n).fill(0xffffffff),
    sigLo: new Uint32Array(n).fill(0xffffffff),
    observedAny: false,
  });
}

/** The seed family every `createMinHash(numHashes)` state is built from. */
export function minHashSeeds(numHashes: number): U64[] {
  return deriveSeeds(numHashes, SEED_BASE);
}

/** Signature length n = ceil(1 / stdError^2). */
export function createMinHashWithError(stdError: number): Result<MinHashState> {
  const parsed = parseParams(stdErrorSchema, stdError);
  if (!parsed.ok) return parsed;
  return createMinHash(Math.max(1, Math.ceil(1 / (parsed.value * parsed.value))));
}

/** Owned copy of a MinHash state. */
export function cloneMinHash(state: MinHashState): MinHashState {
  return {
    numHashes: state.numHashes,
    seeds: state.seeds,
    sigHi: state.sigHi.slice(),
    sigLo: state.sigLo.slice(),
    observedAny: state.observedAny,
  };
}

// ---------------------------------------------------------------------------
// Add
// ---------------------------------------------------------------------------

/** Fold an item into the signature. Mutates state in-place. */
export function minHashAdd(state: MinHashState, item: Hashable): void {
  const digest = digestItem(item);
  const { sigHi, sigLo } = state;

  for (let i = 0; i < state.numHashes; i++) {
    const h = hashDigest(digest, state.seeds[i]!);
    const hi = sigHi[i]!;
    if (h.hi < hi || (h.hi === hi && h.lo < sigLo[i]!)) {
      sigHi[i] = h.hi;
      sigLo[i] = h.lo;
    }
  }
  state.observedAny = true;
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/** True when `state` was built from exactly `seeds`. */
export function minHashHasSeeds(state: MinHashState, seeds: readonly U64[]): boolean {
  if (state.numHashes !== seeds.length || state.seeds.length !== seeds.length) return false;
  for (let i = 0; i < seeds.length; i++) {
    if (!equals64(state.seeds[i]!, seeds[i]!)) return false;
  }
  return true;
}

/** True when both states were built from the same seed family. */
export function minHashCompatible(a: MinHashState, b: MinHashState): boolean {
  return a.numHashes === b.numHashes && minHashHasSeeds(a, b.seeds);
}

function countMatchingComponents(a: MinHashState, b: MinHashState): number {
  let matches = 0;
  for (let i = 0; i < a.numHashes; i++) {
    if (a.sigHi[i] === b.sigHi[i] && a.sigLo[i] === b.sigLo[i]) matches++;
  }
  return matches;
}

/**
 * Fraction of equal signature components.
 *
 * - Both never updated: 1.
 * - Exactly one never updated: 0.
 */
export function minHashJaccard(a: MinHashState, b: MinHashState): Result<number> {
  if (!minHashCompatible(a, b)) {
    return incompatibleSketches('numHashes and hash seeds must match');
  }

  if (!a.observedAny && !b.observedAny) return ok(1);
  if (!a.observedAny || !b.observedAny) return ok(0);

  return ok(countMatchingComponents(a, b) / a.numHashes);
}

/** Signature as 64-bit values; untouched components read 2^64 - 1. */
export function minHashSignature(state: MinHashState): bigint[] {
  const signature: bigint[] = [];
  for (let i = 0; i < state.numHashes; i++) {
    signature.push(u64ToBigInt({ hi: state.sigHi[i]!, lo: state.sigLo[i]! }));
  }
  return signature;
}

/** Expected standard error: 1 / sqrt(n). */
export function minHashError(state: MinHashState): number {
  return 1 / Math.sqrt(state.numHashes);
}

export function minHashIsEmpty(state: MinHashState): boolean {
  return !state.observedAny;
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/** Element-wise minimum: the signature of the union of both sets. */
export function minHashMerge(a: MinHashState, b: MinHashState): Result<MinHashState> {
  if (!minHashCompatible(a, b)) {
    return incompatibleSketches('numHashes and hash seeds must match for merge');
  }

  const merged = cloneMinHash(a);
  for (let i = 0; i < a.numHashes; i++) {
    const hi = b.sigHi[i]!;
    const lo = b.sigLo[i]!;
    if (hi < merged.sigHi[i]! || (hi === merged.sigHi[i]! && lo < merged.sigLo[i]!)) {
      merged.sigHi[i] = hi;
      merged.sigLo[i] = lo;
    }
  }
  merged.observedAny = a.observedAny || b.observedAny;
  return ok(merged);
}

// ---------------------------------------------------------------------------
// Reset
// ---------------------------------------------------------------------------

export function minHashClear(state: MinHashState): void {
  state.sigHi.fill(0xffffffff);
  state.sigLo.fill(0xffffffff);
  state.observedAny = false;
}
