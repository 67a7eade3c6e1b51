import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import {
  createHyperLogLog,
  createHyperLogLogWithError,
  hllAdd,
  hllClear,
  hllCount,
  hllError,
  hllEstimate,
  hllIntersectionEstimate,
  hllIsEmpty,
  hllJaccard,
  hllMerge,
  hllUnionEstimate,
} from '../cardinality/index.js';
import { unwrap } from '../errors.js';

function sketchOf(items: Iterable<string | number>, precision = 14) {
  const hll = unwrap(createHyperLogLog(precision));
  for (const item of items) hllAdd(hll, item);
  return hll;
}

function range(from: number, to: number): number[] {
  const out: number[] = [];
  for (let i = from; i < to; i++) out.push(i);
  return out;
}

// ===================================================================
// HyperLogLog
// ===================================================================

describe('HyperLogLog', () => {
  it('defaults to precision 14', () => {
    const hll = unwrap(createHyperLogLog());
    expect(hll.precision).toBe(14);
    expect(hll.numRegisters).toBe(16384);
    expect(hllError(hll)).toBeCloseTo(0.008125, 6);
  });

  it('rejects precision outside [4, 18]', () => {
    for (const precision of [3, 19, 4.5, NaN]) {
      const result = createHyperLogLog(precision);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.field).toBe('precision');
    }
  });

  it('picks the smallest precision meeting a relative error', () => {
    expect(unwrap(createHyperLogLogWithError(0.01)).precision).toBe(14);
    expect(unwrap(createHyperLogLogWithError(0.5)).precision).toBe(4);
    expect(unwrap(createHyperLogLogWithError(0.0001)).precision).toBe(18);
    expect(createHyperLogLogWithError(0).ok).toBe(false);
  });

  it('estimates zero for an empty sketch', () => {
    const hll = unwrap(createHyperLogLog(10));
    expect(hllEstimate(hll)).toBe(0);
    expect(hllCount(hll)).toBe(0);
    expect(hllIsEmpty(hll)).toBe(true);
  });

  it('counts duplicates once', () => {
    const hll = sketchOf(['same', 'same', 'same']);
    expect(hllCount(hll)).toBe(1);
    expect(hllIsEmpty(hll)).toBe(false);
  });

  it('estimates 10,000 distinct items within 5%', () => {
    const hll = sketchOf(range(0, 10_000).map((i) => `user-${i}`));
    const estimate = hllEstimate(hll);
    expect(Math.abs(estimate - 10_000) / 10_000).toBeLessThan(0.05);
  });

  it('merge equals the sketch of the concatenated streams', () => {
    fc.assert(fc.property(fc.array(fc.string()), fc.array(fc.string()), (left, right) => {
      const a = sketchOf(left, 8);
      const b = sketchOf(right, 8);
      const merged = unwrap(hllMerge(a, b));
      expect(merged.registers).toEqual(sketchOf([...left, ...right], 8).registers);
    }), { numRuns: 50 });
  });

  it('merge leaves its inputs untouched', () => {
    const a = sketchOf(['a', 'b']);
    const b = sketchOf(['c']);
    const registersA = a.registers.slice();
    unwrap(hllMerge(a, b));
    expect(a.registers).toEqual(registersA);
    expect(hllCount(a)).toBe(2);
  });

  it('estimates union, intersection and Jaccard of overlapping sets', () => {
    const a = sketchOf(range(0, 5000));
    const b = sketchOf(range(2500, 7500));

    const union = unwrap(hllUnionEstimate(a, b));
    expect(Math.abs(union - 7500) / 7500).toBeLessThan(0.05);

    const intersection = unwrap(hllIntersectionEstimate(a, b));
    expect(intersection).toBeGreaterThan(2000);
    expect(intersection).toBeLessThan(3000);

    const jaccard = unwrap(hllJaccard(a, b));
    expect(jaccard).toBeGreaterThan(0.25);
    expect(jaccard).toBeLessThan(0.42);
  });

  it('clamps the intersection of disjoint sets into [0, min]', () => {
    const a = sketchOf(range(0, 1000).map((i) => `left-${i}`));
    const b = sketchOf(range(0, 10).map((i) => `right-${i}`));
    const intersection = unwrap(hllIntersectionEstimate(a, b));
    expect(intersection).toBeGreaterThanOrEqual(0);
    expect(intersection).toBeLessThanOrEqual(hllEstimate(b));
  });

  it('reports Jaccard 1 for two empty sketches', () => {
    expect(hllJaccard(sketchOf([]), sketchOf([]))).toEqual({ ok: true, value: 1 });
  });

  it('rejects set operations across precisions', () => {
    const a = sketchOf(['x'], 10);
    const b = sketchOf(['x'], 12);
    for (const result of [hllMerge(a, b), hllUnionEstimate(a, b), hllIntersectionEstimate(a, b), hllJaccard(a, b)]) {
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('INCOMPATIBLE_SKETCHES');
    }
  });

  it('clear resets every register', () => {
    const hll = sketchOf(['a', 'b', 'c']);
    hllClear(hll);
    expect(hllIsEmpty(hll)).toBe(true);
    expect(hllEstimate(hll)).toBe(0);
  });
});
