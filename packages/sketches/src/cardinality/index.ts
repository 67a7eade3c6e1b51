// ---------------------------------------------------------------------------
// Cardinality: Barrel export
// ---------------------------------------------------------------------------

export {
  HLL_MIN_PRECISION,
  HLL_MAX_PRECISION,
  createHyperLogLog,
  createHyperLogLogWithError,
  hllAdd,
  hllEstimate,
  hllCount,
  hllIsEmpty,
  hllError,
  hllMerge,
  hllUnionEstimate,
  hllIntersectionEstimate,
  hllJaccard,
  hllClear,
} from './hyperloglog.js';
