// ---------------------------------------------------------------------------
// @sketchkit/sketches: Mergeable approximate data structures
// ---------------------------------------------------------------------------
// Barrel re-export for the shared infrastructure and every sketch family.
// ---------------------------------------------------------------------------

// Infrastructure: types, errors, validation, configuration, logging
export * from './types.js';
export * from './errors.js';
export * from './schemas.js';
export * from './config.js';
export * from './logger.js';

// Hashing, seed expansion, embedded random streams
export * from './hashing/index.js';

// Membership: Bloom, Cuckoo
export * from './membership/index.js';

// Cardinality: HyperLogLog
export * from './cardinality/index.js';

// Frequency: Count Sketch, MinMax, Space-Saving
export * from './frequency/index.js';

// Quantiles: KLL, t-Digest
export * from './quantiles/index.js';

// Similarity: MinHash, LSH index, Jaccard capability
export * from './similarity/index.js';

// Sampling: reservoir
export * from './sampling/index.js';
