// ---------------------------------------------------------------------------
// Seeded hashing and seed expansion
// ---------------------------------------------------------------------------
// Items are projected to a tagged sequence of 32-bit words, folded into a
// 64-bit digest, and the digest is mixed with a seed. Sketches that probe
// several seeds per item digest once and call `hashDigest` per seed.
//
// Distribution quality only; not a cryptographic hash.
// ---------------------------------------------------------------------------

import type { Hashable, U64 } from '../types.js';
import {
  add64,
  mul64,
  shr64,
  u64,
  u64FromBigInt,
  u64FromNumber,
  u64ToBigInt,
  xor64,
} from './u64.js';

// ---------------------------------------------------------------------------
// SplitMix64
// ---------------------------------------------------------------------------

export const GOLDEN_GAMMA: U64 = u64(0x9e3779b9, 0x7f4a7c15);
const MIX_C1: U64 = u64(0xbf58476d, 0x1ce4e5b9);
const MIX_C2: U64 = u64(0x94d049bb, 0x133111eb);

/** SplitMix64 step: add the golden gamma, then apply the avalanche finalizer. */
export function mix64(seed: U64): U64 {
  let z = add64(seed, GOLDEN_GAMMA);
  z = mul64(xor64(z, shr64(z, 30)), MIX_C1);
  z = mul64(xor64(z, shr64(z, 27)), MIX_C2);
  return xor64(z, shr64(z, 31));
}

/** `mix64` on bigints; the input is taken modulo 2^64. */
export function mix(seed: bigint): bigint {
  return u64ToBigInt(mix64(u64FromBigInt(seed)));
}

/** `count` seeds, the i-th being `mix(base + i)`. */
export function deriveSeeds(count: number, base: U64): U64[] {
  const seeds: U64[] = [];
  for (let i = 0; i < count; i++) {
    seeds.push(mix64(add64(base, u64FromNumber(i))));
  }
  return seeds;
}

// ---------------------------------------------------------------------------
// Item encoding
// ---------------------------------------------------------------------------

const TAG_STRING = 1;
const TAG_NUMBER = 2;
const TAG_BIGINT = 3;
const TAG_BOOLEAN = 4;
const TAG_BYTES = 5;
const TAG_ARRAY = 6;

const floatView = new DataView(new ArrayBuffer(8));

/**
 * Append the word encoding of `item` to `out`.
 *
 * Every variable-length part is length-prefixed so distinct items never share
 * an encoding. `-0` encodes as `0` and every NaN as the same quiet NaN.
 */
export function encodeItem(item: Hashable, out: number[]): void {
  if (typeof item === 'string') {
    out.push(TAG_STRING, item.length);
    for (let i = 0; i < item.length; i += 2) {
      const high = item.charCodeAt(i);
      const low = i + 1 < item.length ? item.charCodeAt(i + 1) : 0;
      out.push(((high << 16) | low) >>> 0);
    }
  } else if (typeof item === 'number') {
    out.push(TAG_NUMBER);
    if (Number.isNaN(item)) {
      out.push(0x7ff80000, 0);
    } else {
      floatView.setFloat64(0, item === 0 ? 0 : item);
      out.push(floatView.getUint32(0), floatView.getUint32(4));
    }
  } else if (typeof item === 'bigint') {
    const negative = item < 0n;
    let magnitude = negative ? -item : item;
    const limbs: number[] = [];
    while (magnitude > 0n) {
      limbs.push(Number(magnitude & 0xffffffffn));
      magnitude >>= 32n;
    }
    out.push(TAG_BIGINT, negative ? 1 : 0, limbs.length, ...limbs);
  } else if (typeof item === 'boolean') {
    out.push(TAG_BOOLEAN, item ? 1 : 0);
  } else if (item instanceof Uint8Array) {
    out.push(TAG_BYTES, item.length);
    for (let i = 0; i < item.length; i += 4) {
      let word = 0;
      for (let j = 0; j < 4; j++) {
        word = (word << 8) | (i + j < item.length ? item[i + j]! : 0);
      }
      out.push(word >>> 0);
    }
  } else {
    out.push(TAG_ARRAY, item.length);
    for (const element of item) encodeItem(element, out);
  }
}

// ---------------------------------------------------------------------------
// Digests
// ---------------------------------------------------------------------------

const DIGEST_IV: U64 = u64(0x6a09e667, 0xf3bcc908);

/** Fold a word sequence into a 64-bit digest. */
export function digestWords(words: ArrayLike<number>): U64 {
  let state = DIGEST_IV;
  for (let i = 0; i < words.length; i++) {
    state = mix64({ hi: state.hi, lo: (state.lo ^ words[i]!) >>> 0 });
  }
  return mix64(xor64(state, u64FromNumber(words.length)));
}

const scratch: number[] = [];

/** Seed-independent digest of an item. */
export function digestItem(item: Hashable): U64 {
  scratch.length = 0;
  encodeItem(item, scratch);
  return digestWords(scratch);
}

/** Hash of a digest under `seed`. */
export function hashDigest(digest: U64, seed: U64): U64 {
  return mix64(xor64(digest, seed));
}

export function hashItem(item: Hashable, seed: U64): U64 {
  return hashDigest(digestItem(item), seed);
}

/**
 * Deterministic 64-bit hash of `item` under `seed`. Equal items hash equally
 * for the lifetime of the process.
 */
export function seededHash(item: Hashable, seed: bigint): bigint {
  return u64ToBigInt(hashItem(item, u64FromBigInt(seed)));
}
