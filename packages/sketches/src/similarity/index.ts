// ---------------------------------------------------------------------------
// Similarity: Barrel export
// ---------------------------------------------------------------------------

export {
  MINHASH_MAX_HASHES,
  createMinHash,
  createMinHashWithError,
  cloneMinHash,
  minHashAdd,
  minHashCompatible,
  minHashHasSeeds,
  minHashSeeds,
  minHashJaccard,
  minHashSignature,
  minHashError,
  minHashIsEmpty,
  minHashMerge,
  minHashClear,
} from './minhash.js';

export {
  createLshIndex,
  lshInsert,
  lshRemove,
  lshContains,
  lshSize,
  lshClear,
  lshQueryCandidates,
  lshQueryTopK,
} from './lsh-index.js';

export type { JaccardEstimator, SimilarityRanking } from './jaccard.js';
export { hyperLogLogJaccard, minHashJaccardEstimator, compareSimilarity } from './jaccard.js';
