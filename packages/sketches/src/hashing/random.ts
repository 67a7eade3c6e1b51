// ---------------------------------------------------------------------------
// Embedded deterministic random stream
// ---------------------------------------------------------------------------
// Each sketch that needs randomness owns one of these, seeded from a fixed
// constant, so sketches stay independent values and runs are reproducible.
// Each draw replaces the state with mix(state + gamma).
// ---------------------------------------------------------------------------

import type { RandomStream, U64 } from '../types.js';
import { GOLDEN_GAMMA, mix64 } from './hash.js';
import { add64, toUnitFloat } from './u64.js';

export function createRandomStream(seed: U64): RandomStream {
  return { hi: seed.hi, lo: seed.lo };
}

export function copyRandomStream(stream: RandomStream): RandomStream {
  return { hi: stream.hi, lo: stream.lo };
}

export function reseedRandomStream(stream: RandomStream, seed: U64): void {
  stream.hi = seed.hi;
  stream.lo = seed.lo;
}

/** Advance the stream and return the new 64-bit state. */
export function nextU64(stream: RandomStream): U64 {
  const next = mix64(add64(stream, GOLDEN_GAMMA));
  stream.hi = next.hi;
  stream.lo = next.lo;
  return next;
}

/** A fair coin: the lowest bit of the next draw. */
export function nextBit(stream: RandomStream): 0 | 1 {
  return (nextU64(stream).lo & 1) === 0 ? 0 : 1;
}

/** Uniform float in [0, 1) from the top 53 bits of the next draw. */
export function nextFloat(stream: RandomStream): number {
  return toUnitFloat(nextU64(stream));
}

/** Uniform integer in [0, n) for a positive safe integer `n`. */
export function nextIndex(stream: RandomStream, n: number): number {
  return Math.min(n - 1, Math.floor(nextFloat(stream) * n));
}
