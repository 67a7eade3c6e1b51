// ---------------------------------------------------------------------------
// Membership: Barrel export
// ---------------------------------------------------------------------------

export {
  BLOOM_MAX_BIT_LENGTH,
  createBloomFilter,
  createBloomFilterWithSize,
  bloomOptimalBitLength,
  bloomOptimalNumHashes,
  bloomInsert,
  bloomContains,
  bloomFalsePositiveRate,
  bloomIsEmpty,
  bloomMerge,
  bloomClear,
} from './bloom-filter.js';

export {
  CUCKOO_BUCKET_SIZE,
  CUCKOO_MAX_BUCKETS,
  createCuckooFilter,
  createCuckooFilterWithParameters,
  cuckooInsert,
  cuckooContains,
  cuckooDelete,
  cuckooClear,
  cuckooLoadFactor,
  cuckooExpectedFalsePositiveRate,
  cuckooIsEmpty,
  cuckooMerge,
} from './cuckoo-filter.js';
