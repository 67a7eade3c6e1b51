// ---------------------------------------------------------------------------
// Sampling: Reservoir (Algorithm R)
// ---------------------------------------------------------------------------
// Uniform sample of at most `capacity` items from a stream of unknown length.
// After n offers every item has been kept with probability capacity / n.
// ---------------------------------------------------------------------------

import { ok } from '../errors.js';
import { createRandomStream, nextIndex, reseedRandomStream, saturatingAdd, u64 } from '../hashing/index.js';
import { parseParams, positiveInteger } from '../schemas.js';
import type { ReservoirState, Result, U64 } from '../types.js';

const RNG_SEED: U64 = u64(0x94d049bb, 0x133111eb);

const capacitySchema = positiveInteger('capacity');

export function createReservoir<T>(capacity: number): Result<ReservoirState<T>> {
  const parsed = parseParams(capacitySchema, capacity);
  if (!parsed.ok) return parsed;
  return ok({ capacity: parsed.value, samples: [], seen: 0, rng: createRandomStream(RNG_SEED) });
}

/**
 * Offer one item. The first `capacity` items are kept; after that the n-th
 * item replaces a uniformly chosen slot with probability capacity / n.
 */
export function reservoirAdd<T>(state: ReservoirState<T>, item: T): void {
  state.seen = saturatingAdd(state.seen, 1);

  if (state.samples.length < state.capacity) {
    state.samples.push(item);
    return;
  }

  const slot = nextIndex(state.rng, state.seen);
  if (slot < state.capacity) state.samples[slot] = item;
}

export function reservoirExtend<T>(state: ReservoirState<T>, items: Iterable<T>): void {
  for (const item of items) reservoirAdd(state, item);
}

/** Copy of the current sample. */
export function reservoirSamples<T>(state: ReservoirState<T>): T[] {
  return [...state.samples];
}

export function reservoirSeen<T>(state: ReservoirState<T>): number {
  return state.seen;
}

export function reservoirIsEmpty<T>(state: ReservoirState<T>): boolean {
  return state.seen === 0;
}

/** Drop the sample and restart the random stream from its seed. */
export function reservoirClear<T>(state: ReservoirState<T>): void {
  state.samples.length = 0;
  state.seen = 0;
  reseedRandomStream(state.rng, RNG_SEED);
}
