// ---------------------------------------------------------------------------
// Similarity: Jaccard capability
// ---------------------------------------------------------------------------
// HyperLogLog and MinHash estimate Jaccard similarity from unrelated
// representations. Code that only needs "similarity against a same-shape
// peer" takes a JaccardEstimator and stays agnostic of the sketch.
// ---------------------------------------------------------------------------

import { hllJaccard } from '../cardinality/hyperloglog.js';
import { ok } from '../errors.js';
import type { HyperLogLogState, MinHashState, Result } from '../types.js';
import { minHashJaccard } from './minhash.js';

export interface JaccardEstimator<S> {
  readonly name: string;
  /** Estimated |A ∩ B| / |A ∪ B| in [0, 1]. */
  jaccard(a: S, b: S): Result<number>;
}

export const hyperLogLogJaccard: JaccardEstimator<HyperLogLogState> = {
  name: 'hyperloglog',
  jaccard: hllJaccard,
};

export const minHashJaccardEstimator: JaccardEstimator<MinHashState> = {
  name: 'minhash',
  jaccard: minHashJaccard,
};

export interface SimilarityRanking {
  /** Position of the candidate in the input list. */
  readonly index: number;
  readonly similarity: number;
}

/**
 * Score every candidate against `query`, most similar first. Equal scores
 * keep input order. Fails on the first incompatible candidate.
 */
export function compareSimilarity<S>(
  estimator: JaccardEstimator<S>,
  query: S,
  candidates: readonly S[],
): Result<SimilarityRanking[]> {
  const ranking: SimilarityRanking[] = [];
  for (let index = 0; index < candidates.length; index++) {
    const similarity = estimator.jaccard(query, candidates[index]!);
    if (!similarity.ok) return similarity;
    ranking.push({ index, similarity: similarity.value });
  }

  ranking.sort((a, b) => b.similarity - a.similarity || a.index - b.index);
  return ok(ranking);
}
