import { afterEach, describe, it, expect } from 'vitest';
import fc from 'fast-check';

import {
  bloomClear,
  bloomContains,
  bloomFalsePositiveRate,
  bloomInsert,
  bloomIsEmpty,
  bloomMerge,
  bloomOptimalBitLength,
  bloomOptimalNumHashes,
  createBloomFilter,
  createBloomFilterWithSize,
  createCuckooFilter,
  createCuckooFilterWithParameters,
  cuckooClear,
  cuckooContains,
  cuckooDelete,
  cuckooExpectedFalsePositiveRate,
  cuckooInsert,
  cuckooIsEmpty,
  cuckooLoadFactor,
  cuckooMerge,
  BLOOM_MAX_BIT_LENGTH,
  CUCKOO_MAX_BUCKETS,
} from '../membership/index.js';
import { unwrap } from '../errors.js';
import { setLogLevel, setLogSink, getLogLevel, type LogEntry } from '../logger.js';

// ===================================================================
// Bloom filter
// ===================================================================

describe('Bloom filter', () => {
  const config = { expectedItems: 1000, falsePositiveRate: 0.01 };

  it('sizes the bit array and probe count from n and p', () => {
    expect(bloomOptimalBitLength(1000, 0.01)).toEqual({ ok: true, value: 9586 });
    expect(bloomOptimalNumHashes(9586, 1000)).toEqual({ ok: true, value: 7 });

    const bf = unwrap(createBloomFilter(config));
    expect(bf.bitLength).toBe(9586);
    expect(bf.numHashes).toBe(7);
    expect(bf.bits.length).toBe(300);
    expect(bloomIsEmpty(bf)).toBe(true);
  });

  it('rejects invalid parameters', () => {
    const zeroItems = createBloomFilter({ expectedItems: 0, falsePositiveRate: 0.01 });
    expect(zeroItems.ok).toBe(false);
    if (!zeroItems.ok) expect(zeroItems.error.field).toBe('expectedItems');

    const badRate = createBloomFilter({ expectedItems: 10, falsePositiveRate: 1 });
    expect(badRate.ok).toBe(false);
    if (!badRate.ok) expect(badRate.error.field).toBe('falsePositiveRate');

    const tooLong = createBloomFilterWithSize({ bitLength: BLOOM_MAX_BIT_LENGTH + 1, numHashes: 3 });
    expect(tooLong.ok).toBe(false);
    if (!tooLong.ok) {
      expect(tooLong.error.code).toBe('INVALID_PARAMETER');
      expect(tooLong.error.field).toBe('bitLength');
    }

    expect(createBloomFilterWithSize({ bitLength: 64, numHashes: 0 }).ok).toBe(false);
  });

  it('never reports a false negative', () => {
    fc.assert(fc.property(fc.array(fc.oneof(fc.string(), fc.integer(), fc.boolean()), { maxLength: 200 }), (items) => {
      const bf = unwrap(createBloomFilterWithSize({ bitLength: 512, numHashes: 4 }));
      for (const item of items) bloomInsert(bf, item);
      for (const item of items) expect(bloomContains(bf, item)).toBe(true);
      expect(bf.count).toBe(items.length);
    }), { numRuns: 50 });
  });

  it('keeps the empirical false positive rate near the target', () => {
    const bf = unwrap(createBloomFilter(config));
    for (let i = 0; i < 1000; i++) bloomInsert(bf, `member-${i}`);

    let falsePositives = 0;
    for (let i = 0; i < 10_000; i++) {
      if (bloomContains(bf, `outsider-${i}`)) falsePositives++;
    }
    // Target is 1%; allow three times that.
    expect(falsePositives).toBeLessThan(300);
  });

  it('reports a zero rate when empty and a growing rate as items arrive', () => {
    const bf = unwrap(createBloomFilter(config));
    expect(bloomFalsePositiveRate(bf)).toBe(0);

    for (let i = 0; i < 500; i++) bloomInsert(bf, i);
    const half = bloomFalsePositiveRate(bf);
    for (let i = 500; i < 1000; i++) bloomInsert(bf, i);
    const full = bloomFalsePositiveRate(bf);

    expect(half).toBeGreaterThan(0);
    expect(full).toBeGreaterThan(half);
    expect(full).toBeCloseTo(0.01, 2);
  });

  it('merge is a union and leaves its inputs untouched', () => {
    const a = unwrap(createBloomFilter(config));
    const b = unwrap(createBloomFilter(config));
    bloomInsert(a, 'alpha');
    bloomInsert(b, 'beta');
    const bitsA = a.bits.slice();
    const bitsB = b.bits.slice();

    const merged = unwrap(bloomMerge(a, b));
    expect(bloomContains(merged, 'alpha')).toBe(true);
    expect(bloomContains(merged, 'beta')).toBe(true);
    expect(merged.count).toBe(2);

    expect(a.bits).toEqual(bitsA);
    expect(b.bits).toEqual(bitsB);
    expect(a.count).toBe(1);
  });

  it('merge rejects filters of different shape', () => {
    const a = unwrap(createBloomFilterWithSize({ bitLength: 128, numHashes: 3 }));
    const b = unwrap(createBloomFilterWithSize({ bitLength: 128, numHashes: 4 }));
    const merged = bloomMerge(a, b);
    expect(merged.ok).toBe(false);
    if (!merged.ok) expect(merged.error.code).toBe('INCOMPATIBLE_SKETCHES');
  });

  it('clear empties the filter', () => {
    const bf = unwrap(createBloomFilter(config));
    bloomInsert(bf, 'test');
    bloomClear(bf);
    expect(bloomContains(bf, 'test')).toBe(false);
    expect(bf.count).toBe(0);
    expect(bloomIsEmpty(bf)).toBe(true);
  });
});

// ===================================================================
// Cuckoo filter
// ===================================================================

describe('Cuckoo filter', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogSink();
    setLogLevel(initialLevel);
  });

  function tinyFilter() {
    return unwrap(createCuckooFilterWithParameters({ bucketCount: 1, fingerprintBits: 8, maxKicks: 4 }));
  }

  it('derives geometry from n and p', () => {
    const cf = unwrap(createCuckooFilter({ expectedItems: 1000, falsePositiveRate: 0.01 }));
    expect(cf.fingerprintBits).toBe(8);
    expect(cf.bucketCount).toBe(512);
    expect(cf.slots.length).toBe(2048);
    expect(cuckooExpectedFalsePositiveRate(cf)).toBe(0.03125);
    expect(cuckooIsEmpty(cf)).toBe(true);
  });

  it('rejects invalid geometry', () => {
    const notPow2 = createCuckooFilterWithParameters({ bucketCount: 3, fingerprintBits: 8, maxKicks: 10 });
    expect(notPow2).toEqual({
      ok: false,
      error: {
        code: 'INVALID_PARAMETER',
        message: 'bucketCount must be a non-zero power of two',
        field: 'bucketCount',
      },
    });

    const wide = createCuckooFilterWithParameters({ bucketCount: 4, fingerprintBits: 17, maxKicks: 10 });
    expect(wide.ok).toBe(false);
    if (!wide.ok) expect(wide.error.field).toBe('fingerprintBits');

    expect(createCuckooFilterWithParameters({ bucketCount: 4, fingerprintBits: 8, maxKicks: 0 }).ok).toBe(false);
    expect(createCuckooFilter({ expectedItems: 10, falsePositiveRate: 0 }).ok).toBe(false);
  });

  it('returns an error for bucket counts too large to address', () => {
    expect(CUCKOO_MAX_BUCKETS).toBe(2 ** 29);
    expect(createCuckooFilterWithParameters({ bucketCount: 2 ** 30, fingerprintBits: 8, maxKicks: 10 })).toEqual({
      ok: false,
      error: {
        code: 'INVALID_PARAMETER',
        message: 'bucketCount must be an integer in the inclusive range [1, 536870912]',
        field: 'bucketCount',
      },
    });
  });

  it('clamps the expected false positive rate at 1', () => {
    const cf = unwrap(createCuckooFilterWithParameters({ bucketCount: 2, fingerprintBits: 1, maxKicks: 1 }));
    expect(cuckooExpectedFalsePositiveRate(cf)).toBe(1);
  });

  it('inserts, finds and deletes items', () => {
    const cf = unwrap(createCuckooFilter({ expectedItems: 100, falsePositiveRate: 0.01 }));
    expect(cuckooInsert(cf, 'apple')).toBe(true);
    expect(cuckooInsert(cf, 'banana')).toBe(true);
    expect(cuckooContains(cf, 'apple')).toBe(true);
    expect(cf.count).toBe(2);
    expect(cuckooLoadFactor(cf)).toBe(2 / cf.slots.length);

    expect(cuckooDelete(cf, 'apple')).toBe(true);
    expect(cuckooContains(cf, 'banana')).toBe(true);
    expect(cf.count).toBe(1);
  });

  it('keeps one copy per insert of a duplicate', () => {
    const cf = unwrap(createCuckooFilter({ expectedItems: 100, falsePositiveRate: 0.01 }));
    cuckooInsert(cf, 'dup');
    cuckooInsert(cf, 'dup');
    expect(cuckooDelete(cf, 'dup')).toBe(true);
    expect(cuckooContains(cf, 'dup')).toBe(true);
    expect(cuckooDelete(cf, 'dup')).toBe(true);
    expect(cuckooContains(cf, 'dup')).toBe(false);
    expect(cuckooDelete(cf, 'dup')).toBe(false);
  });

  it('refuses an insert into a full filter and leaves the table unchanged', () => {
    const entries: LogEntry[] = [];
    setLogSink((entry) => entries.push(entry));
    setLogLevel('warn');

    const cf = tinyFilter();
    for (const item of ['a', 'b', 'c', 'd']) expect(cuckooInsert(cf, item)).toBe(true);
    const before = Array.from(cf.slots);

    expect(cuckooInsert(cf, 'e')).toBe(false);
    expect(Array.from(cf.slots)).toEqual(before);
    expect(cf.count).toBe(4);
    for (const item of ['a', 'b', 'c', 'd']) expect(cuckooContains(cf, item)).toBe(true);

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'warn',
      scope: 'cuckoo-filter',
      msg: 'insert refused after relocation',
      maxKicks: 4,
      loadFactor: 1,
    });
  });

  it('never loses an accepted item when later inserts fail', () => {
    fc.assert(fc.property(fc.uniqueArray(fc.string({ minLength: 1 }), { minLength: 1, maxLength: 40 }), (items) => {
      const cf = unwrap(createCuckooFilterWithParameters({ bucketCount: 4, fingerprintBits: 16, maxKicks: 20 }));
      const accepted: string[] = [];
      for (const item of items) {
        if (cuckooInsert(cf, item)) accepted.push(item);
      }
      expect(cf.count).toBe(accepted.length);
      expect(cf.count).toBeLessThanOrEqual(16);
      for (const item of accepted) expect(cuckooContains(cf, item)).toBe(true);
    }), { numRuns: 100 });
  });

  it('load factor never drops across successful inserts', () => {
    fc.assert(fc.property(fc.array(fc.string(), { maxLength: 60 }), (items) => {
      const cf = unwrap(createCuckooFilterWithParameters({ bucketCount: 4, fingerprintBits: 16, maxKicks: 20 }));
      let previous = cuckooLoadFactor(cf);
      for (const item of items) {
        const inserted = cuckooInsert(cf, item);
        const current = cuckooLoadFactor(cf);
        if (inserted) expect(current).toBeGreaterThan(previous);
        else expect(current).toBe(previous);
        previous = current;
      }
    }), { numRuns: 100 });
  });

  it('merge holds both inputs and leaves them untouched', () => {
    const params = { bucketCount: 64, fingerprintBits: 12, maxKicks: 100 };
    const a = unwrap(createCuckooFilterWithParameters(params));
    const b = unwrap(createCuckooFilterWithParameters(params));
    for (let i = 0; i < 20; i++) cuckooInsert(a, `a-${i}`);
    for (let i = 0; i < 20; i++) cuckooInsert(b, `b-${i}`);
    const slotsA = Array.from(a.slots);
    const slotsB = Array.from(b.slots);

    const merged = unwrap(cuckooMerge(a, b));
    expect(merged.count).toBe(40);
    for (let i = 0; i < 20; i++) {
      expect(cuckooContains(merged, `a-${i}`)).toBe(true);
      expect(cuckooContains(merged, `b-${i}`)).toBe(true);
    }
    expect(Array.from(a.slots)).toEqual(slotsA);
    expect(Array.from(b.slots)).toEqual(slotsB);
    expect(a.count).toBe(20);
  });

  it('merge fails when shapes differ or the combined load does not fit', () => {
    const a = tinyFilter();
    const b = tinyFilter();
    for (const item of ['a', 'b', 'c', 'd']) cuckooInsert(a, item);
    for (const item of ['w', 'x', 'y', 'z']) cuckooInsert(b, item);
    const slotsA = Array.from(a.slots);

    expect(cuckooMerge(a, b)).toEqual({
      ok: false,
      error: { code: 'INCOMPATIBLE_SKETCHES', message: 'combined cuckoo filter load does not fit' },
    });
    expect(Array.from(a.slots)).toEqual(slotsA);

    const other = unwrap(createCuckooFilterWithParameters({ bucketCount: 2, fingerprintBits: 8, maxKicks: 4 }));
    const mismatch = cuckooMerge(a, other);
    expect(mismatch.ok).toBe(false);
    if (!mismatch.ok) expect(mismatch.error.code).toBe('INCOMPATIBLE_SKETCHES');
  });

  it('clear empties the filter', () => {
    const cf = tinyFilter();
    cuckooInsert(cf, 'a');
    cuckooClear(cf);
    expect(cuckooContains(cf, 'a')).toBe(false);
    expect(cuckooIsEmpty(cf)).toBe(true);
  });
});
