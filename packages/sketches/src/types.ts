// ---------------------------------------------------------------------------
// @sketchkit/sketches: Shared types
// ---------------------------------------------------------------------------
// Result/error types, the hashable item model, 64-bit words, and the state
// shape of every sketch. Sketch states are plain values: typed arrays, arrays
// and maps plus a few scalars. Nothing here is shared between instances.
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Result & errors
// ---------------------------------------------------------------------------

/** Error kinds reported by constructors, queries and merges. */
export type SketchErrorCode = 'INVALID_PARAMETER' | 'INCOMPATIBLE_SKETCHES';

/** Error returned from a fallible sketch operation. */
export interface SketchError {
  readonly code: SketchErrorCode;
  readonly message: string;
  /** Name of the offending parameter, when a single one is at fault. */
  readonly field?: string;
}

/** Result of a fallible sketch operation. */
export type Result<T, E = SketchError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

// ---------------------------------------------------------------------------
// Items & hashing
// ---------------------------------------------------------------------------

/**
 * Anything a sketch can hash. Equal values (by `===`, with every NaN equal to
 * every other NaN) always hash identically; arrays hash by content.
 */
export type Hashable =
  | string
  | number
  | bigint
  | boolean
  | Uint8Array
  | readonly Hashable[];

/** Item types usable as map keys (Space-Saving items, LSH ids). */
export type KeyItem = string | number | bigint | boolean;

/** Unsigned 64-bit value split into two unsigned 32-bit halves. */
export interface U64 {
  readonly hi: number;
  readonly lo: number;
}

/** State of an embedded SplitMix64 generator. Advanced in place. */
export interface RandomStream {
  hi: number;
  lo: number;
}

// ---------------------------------------------------------------------------
// Membership
// ---------------------------------------------------------------------------

export interface BloomFilterConfig {
  readonly expectedItems: number;
  readonly falsePositiveRate: number;
}

export interface BloomFilterSize {
  readonly bitLength: number;
  readonly numHashes: number;
}

/** Bloom filter state. `bits` packs `bitLength` bits into 32-bit words. */
export interface BloomFilterState {
  readonly bits: Uint32Array;
  readonly bitLength: number;
  readonly numHashes: number;
  /** Insert operations applied (saturating). */
  count: number;
}

export interface CuckooFilterConfig {
  readonly expectedItems: number;
  readonly falsePositiveRate: number;
}

export interface CuckooFilterParameters {
  readonly bucketCount: number;
  readonly fingerprintBits: number;
  readonly maxKicks: number;
}

/**
 * Cuckoo filter state. `slots` holds `bucketCount * 4` fingerprints, bucket
 * `b` owning slots `[4b, 4b + 4)`. A zero slot is empty.
 */
export interface CuckooFilterState {
  readonly slots: Uint16Array;
  readonly bucketCount: number;
  readonly fingerprintBits: number;
  readonly maxKicks: number;
  /** Successful inserts minus successful deletes. */
  count: number;
  readonly rng: RandomStream;
}

// ---------------------------------------------------------------------------
// Cardinality
// ---------------------------------------------------------------------------

/**
 * HyperLogLog state: `2^precision` one-byte registers, each holding the
 * largest rank observed for its address range.
 */
export interface HyperLogLogState {
  readonly registers: Uint8Array;
  readonly precision: number;
  readonly numRegisters: number;
}

// ---------------------------------------------------------------------------
// Frequency
// ---------------------------------------------------------------------------

export interface ErrorBounds {
  readonly epsilon: number;
  readonly delta: number;
}

export interface SketchDimensions {
  readonly width: number;
  readonly depth: number;
}

/**
 * Count Sketch state. `counters` is a row-major `depth x width` table of
 * signed safe integers.
 */
export interface CountSketchState {
  readonly counters: Float64Array;
  readonly width: number;
  readonly depth: number;
  readonly indexSeeds: readonly U64[];
  readonly signSeeds: readonly U64[];
  /** Sum of `|delta|` over all updates (saturating). */
  totalUpdateMagnitude: number;
}

/**
 * MinMax sketch state: a Count-Min table of unsigned safe integers updated
 * conservatively.
 */
export interface MinMaxSketchState {
  readonly counters: Float64Array;
  readonly width: number;
  readonly depth: number;
  readonly seeds: readonly U64[];
  totalCount: number;
}

/** One tracked Space-Saving counter. */
export interface SpaceSavingEntry<T extends KeyItem> {
  readonly item: T;
  count: number;
  /** Overestimation bound inherited from the evicted counter. */
  error: number;
}

export interface SpaceSavingState<T extends KeyItem> {
  readonly capacity: number;
  readonly entries: Map<T, SpaceSavingEntry<T>>;
  totalCount: number;
}

/** Row returned by `spaceSavingTopK`. */
export interface HeavyHitter<T extends KeyItem> {
  readonly item: T;
  readonly count: number;
  readonly error: number;
}

// ---------------------------------------------------------------------------
// Quantiles
// ---------------------------------------------------------------------------

/**
 * KLL state. `levels[l]` holds values that each stand for `2^l` inputs.
 */
export interface KllState {
  readonly k: number;
  readonly levels: number[][];
  count: number;
  readonly rng: RandomStream;
}

/** A centroid in a t-digest, representing a cluster of data points. */
export interface TDigestCentroid {
  mean: number;
  weight: number;
}

/** Configuration for a t-digest quantile estimator. */
export interface TDigestConfig {
  /** Compression parameter (delta). Higher = more centroids = better accuracy. */
  readonly compression?: number;
}

/** Internal state of a t-digest. Centroids are kept sorted by mean. */
export interface TDigestState {
  readonly compression: number;
  centroids: TDigestCentroid[];
  totalWeight: number;
  min: number;
  max: number;
}

// ---------------------------------------------------------------------------
// Similarity
// ---------------------------------------------------------------------------

/**
 * MinHash state. Component `i` of the signature is `(sigHi[i], sigLo[i])`,
 * the smallest hash seen under `seeds[i]`.
 */
export interface MinHashState {
  readonly numHashes: number;
  readonly seeds: readonly U64[];
  readonly sigHi: Uint32Array;
  readonly sigLo: Uint32Array;
  observedAny: boolean;
}

/** Identifier of an entry in an LSH index. */
export type LshId = string | number;

export interface LshIndexConfig {
  readonly numHashes: number;
  readonly bands: number;
}

export interface LshIndexState<Id extends LshId> {
  readonly numHashes: number;
  readonly bands: number;
  readonly rowsPerBand: number;
  readonly bandSeeds: readonly U64[];
  /** Seed family accepted signatures must share. */
  readonly minHashSeeds: readonly U64[];
  /** Per band: band hash (as `hi:lo`) → ids stored under it. */
  readonly tables: Map<string, Set<Id>>[];
  readonly signatures: Map<Id, MinHashState>;
}

/** Row returned by `lshQueryTopK`. */
export interface ScoredCandidate<Id extends LshId> {
  readonly id: Id;
  readonly similarity: number;
}

// ---------------------------------------------------------------------------
// Sampling
// ---------------------------------------------------------------------------

export interface ReservoirState<T> {
  readonly capacity: number;
  readonly samples: T[];
  /** Items offered so far (saturating). */
  seen: number;
  readonly rng: RandomStream;
}
