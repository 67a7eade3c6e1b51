// ---------------------------------------------------------------------------
// Quantiles: Barrel export
// ---------------------------------------------------------------------------

export {
  createKll,
  createKllWithError,
  kllLevelCapacity,
  kllAdd,
  kllQuantile,
  kllRank,
  kllRetained,
  kllIsEmpty,
  kllMerge,
  kllClear,
} from './kll.js';

export {
  createTDigest,
  createTDigestWithError,
  tdigestAdd,
  tdigestCompress,
  tdigestQuantile,
  tdigestCDF,
  tdigestMerge,
  tdigestMean,
  tdigestMin,
  tdigestMax,
  tdigestCount,
  tdigestIsEmpty,
  tdigestClear,
} from './tdigest.js';
