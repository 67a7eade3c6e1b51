import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import {
  U64_MAX,
  U64_ZERO,
  add64,
  clz64,
  compareU64,
  copyRandomStream,
  createRandomStream,
  deriveSeeds,
  digestItem,
  equals64,
  hashDigest,
  mix,
  mix64,
  modU64,
  mul64,
  nextFloat,
  nextIndex,
  nextU64,
  reseedRandomStream,
  saturatingAdd,
  saturatingAddSigned,
  saturatingSub,
  seededHash,
  shl64,
  shr64,
  toUnitFloat,
  u64,
  u64FromBigInt,
  u64ToBigInt,
} from '../hashing/index.js';

const MASK = (1n << 64n) - 1n;

function referenceMix(seed: bigint): bigint {
  let z = (seed + 0x9e3779b97f4a7c15n) & MASK;
  z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK;
  z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK;
  return z ^ (z >> 31n);
}

const arbU64 = fc.bigUintN(64);

// ===================================================================
// 64-bit arithmetic
// ===================================================================

describe('u64 arithmetic', () => {
  it('round-trips through bigint', () => {
    fc.assert(fc.property(arbU64, (a) => {
      expect(u64ToBigInt(u64FromBigInt(a))).toBe(a);
    }));
  });

  it('add64 and mul64 wrap modulo 2^64', () => {
    fc.assert(fc.property(arbU64, arbU64, (a, b) => {
      const x = u64FromBigInt(a);
      const y = u64FromBigInt(b);
      expect(u64ToBigInt(add64(x, y))).toBe((a + b) & MASK);
      expect(u64ToBigInt(mul64(x, y))).toBe((a * b) & MASK);
    }));
  });

  it('shifts match bigint shifts', () => {
    fc.assert(fc.property(arbU64, fc.integer({ min: 0, max: 31 }), (a, n) => {
      const x = u64FromBigInt(a);
      expect(u64ToBigInt(shr64(x, n))).toBe(a >> BigInt(n));
      expect(u64ToBigInt(shl64(x, n))).toBe((a << BigInt(n)) & MASK);
    }));
  });

  it('clz64 counts leading zeros', () => {
    fc.assert(fc.property(arbU64, (a) => {
      const expected = a === 0n ? 64 : 64 - a.toString(2).length;
      expect(clz64(u64FromBigInt(a))).toBe(expected);
    }));
  });

  it('modU64 matches bigint remainder for moduli up to 2^32', () => {
    fc.assert(fc.property(arbU64, fc.bigInt(1n, 1n << 32n), (a, m) => {
      expect(modU64(u64FromBigInt(a), Number(m))).toBe(Number(a % m));
    }));
  });

  it('compareU64 orders like bigint', () => {
    fc.assert(fc.property(arbU64, arbU64, (a, b) => {
      const expected = a < b ? -1 : a > b ? 1 : 0;
      expect(compareU64(u64FromBigInt(a), u64FromBigInt(b))).toBe(expected);
    }));
  });

  it('toUnitFloat stays in [0, 1)', () => {
    expect(toUnitFloat(U64_ZERO)).toBe(0);
    expect(toUnitFloat(U64_MAX)).toBeLessThan(1);
    expect(toUnitFloat(u64(0x80000000, 0))).toBe(0.5);
  });
});

// ===================================================================
// SplitMix64
// ===================================================================

describe('mix', () => {
  it('matches the published SplitMix64 outputs for seed 0', () => {
    expect(mix(0n)).toBe(0xe220a8397b1dcdafn);
    expect(mix(0x9e3779b97f4a7c15n)).toBe(0x6e789e6aa1b965f4n);
  });

  it('matches a bigint reference implementation', () => {
    fc.assert(fc.property(arbU64, (seed) => {
      expect(mix(seed)).toBe(referenceMix(seed));
      expect(u64ToBigInt(mix64(u64FromBigInt(seed)))).toBe(referenceMix(seed));
    }));
  });

  it('deriveSeeds returns mix(base + i)', () => {
    const seeds = deriveSeeds(3, U64_ZERO).map(u64ToBigInt);
    expect(seeds).toEqual([mix(0n), mix(1n), mix(2n)]);
  });
});

// ===================================================================
// Item hashing
// ===================================================================

describe('item hashing', () => {
  it('hashes 0 and -0 identically', () => {
    expect(equals64(digestItem(0), digestItem(-0))).toBe(true);
    expect(seededHash(-0, 7n)).toBe(seededHash(0, 7n));
  });

  it('hashes every NaN identically', () => {
    expect(equals64(digestItem(NaN), digestItem(0 / 0))).toBe(true);
    expect(equals64(digestItem(NaN), digestItem(Number('not a number')))).toBe(true);
  });

  it('keeps differently typed or shaped items apart', () => {
    expect(equals64(digestItem(1), digestItem('1'))).toBe(false);
    expect(equals64(digestItem(1), digestItem(1n))).toBe(false);
    expect(equals64(digestItem(true), digestItem(1))).toBe(false);
    expect(equals64(digestItem('ab'), digestItem(['a', 'b']))).toBe(false);
    expect(equals64(digestItem('a'), digestItem('a\u0000'))).toBe(false);
    expect(equals64(digestItem(new Uint8Array([1, 2])), digestItem([1, 2]))).toBe(false);
  });

  it('hashes arrays by content', () => {
    expect(equals64(digestItem(['x', 1, [2n]]), digestItem(['x', 1, [2n]]))).toBe(true);
  });

  it('seededHash is deterministic and seed dependent', () => {
    fc.assert(fc.property(fc.string(), arbU64, (item, seed) => {
      const expected = u64ToBigInt(hashDigest(digestItem(item), u64FromBigInt(seed)));
      expect(seededHash(item, seed)).toBe(expected);
    }));
    expect(seededHash('x', 1n)).not.toBe(seededHash('x', 2n));
  });
});

// ===================================================================
// Random stream
// ===================================================================

describe('random stream', () => {
  it('advances as mix(state + gamma)', () => {
    const rng = createRandomStream(U64_ZERO);
    expect(u64ToBigInt(nextU64(rng))).toBe(0x6e789e6aa1b965f4n);
  });

  it('copies replay the same sequence and reseeding restarts it', () => {
    const rng = createRandomStream(u64(1, 2));
    nextU64(rng);
    const copy = copyRandomStream(rng);
    const first = [nextU64(rng), nextU64(rng)].map(u64ToBigInt);
    expect([nextU64(copy), nextU64(copy)].map(u64ToBigInt)).toEqual(first);

    reseedRandomStream(rng, u64(1, 2));
    nextU64(rng);
    expect(u64ToBigInt(nextU64(rng))).toBe(first[0]);
  });

  it('nextIndex and nextFloat stay in range', () => {
    const rng = createRandomStream(u64(0, 42));
    fc.assert(fc.property(fc.integer({ min: 1, max: 1_000_000 }), (n) => {
      const i = nextIndex(rng, n);
      expect(Number.isInteger(i)).toBe(true);
      expect(i).toBeGreaterThanOrEqual(0);
      expect(i).toBeLessThan(n);
      const f = nextFloat(rng);
      expect(f).toBeGreaterThanOrEqual(0);
      expect(f).toBeLessThan(1);
    }));
  });
});

// ===================================================================
// Saturating counters
// ===================================================================

describe('saturating arithmetic', () => {
  const MAX = Number.MAX_SAFE_INTEGER;

  it('clamps at the bounds', () => {
    expect(saturatingAdd(MAX, 1)).toBe(MAX);
    expect(saturatingAdd(MAX - 1, 1)).toBe(MAX);
    expect(saturatingSub(3, 5)).toBe(0);
    expect(saturatingSub(5, 3)).toBe(2);
    expect(saturatingAddSigned(-MAX, -5)).toBe(-MAX);
    expect(saturatingAddSigned(MAX, 5)).toBe(MAX);
    expect(saturatingAddSigned(-3, 5)).toBe(2);
  });

  it('never leaves its bounds', () => {
    const safe = fc.integer({ min: -MAX, max: MAX });
    const unsigned = fc.integer({ min: 0, max: MAX });
    fc.assert(fc.property(unsigned, unsigned, safe, safe, (a, b, c, d) => {
      for (const v of [saturatingAdd(a, b), saturatingSub(a, b)]) {
        expect(v).toBeGreaterThanOrEqual(0);
        expect(v).toBeLessThanOrEqual(MAX);
      }
      const signed = saturatingAddSigned(c, d);
      expect(signed).toBeGreaterThanOrEqual(-MAX);
      expect(signed).toBeLessThanOrEqual(MAX);
    }));
  });
});
