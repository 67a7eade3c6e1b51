// ---------------------------------------------------------------------------
// Similarity: MinHash LSH index
// ---------------------------------------------------------------------------
// Splits each signature into `bands` groups of `rowsPerBand` components and
// hashes every group into a per-band bucket table. Sets that agree on all
// rows of at least one band become candidates for each other.
// ---------------------------------------------------------------------------

import { z } from 'zod';

import { incompatibleSketches, invalidParameter, ok } from '../errors.js';
import { deriveSeeds, digestWords, hashDigest, u64 } from '../hashing/index.js';
import { createLogger } from '../logger.js';
import { parseParams, positiveInteger } from '../schemas.js';
import type {
  LshId,
  LshIndexConfig,
  LshIndexState,
  MinHashState,
  Result,
  ScoredCandidate,
  U64,
} from '../types.js';
import { cloneMinHash, MINHASH_MAX_HASHES, minHashHasSeeds, minHashJaccard, minHashSeeds } from './minhash.js';

const log = createLogger('lsh-index');

const BAND_SEED_BASE: U64 = u64(0xa0761d64, 0x78bd642f);

const configSchema = z
  .object({
    numHashes: positiveInteger('numHashes', MINHASH_MAX_HASHES),
    bands: positiveInteger('bands', MINHASH_MAX_HASHES),
  })
  .refine((c) => c.numHashes % c.bands === 0, {
    message: 'numHashes must be divisible by bands',
    path: ['bands'],
  });

const topKSchema = z
  .number({ invalid_type_error: 'k must be a non-negative integer' })
  .int({ message: 'k must be a non-negative integer' })
  .min(0, { message: 'k must be a non-negative integer' })
  .describe('k');

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

export function createLshIndex<Id extends LshId>(config: LshIndexConfig): Result<LshIndexState<Id>> {
  const parsed = parseParams(configSchema, config);
  if (!parsed.ok) return parsed;

  const { numHashes, bands } = parsed.value;
  const tables: Map<string, Set<Id>>[] = [];
  for (let band = 0; band < bands; band++) tables.push(new Map());

  return ok({
    numHashes,
    bands,
    rowsPerBand: numHashes / bands,
    bandSeeds: deriveSeeds(bands, BAND_SEED_BASE),
    minHashSeeds: minHashSeeds(numHashes),
    tables,
    signatures: new Map(),
  });
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

function checkSignature<Id extends LshId>(index: LshIndexState<Id>, signature: MinHashState): Result<null> {
  if (signature.numHashes !== index.numHashes) {
    return incompatibleSketches(
      `signature numHashes ${signature.numHashes} does not match index numHashes ${index.numHashes}`,
    );
  }
  if (!minHashHasSeeds(signature, index.minHashSeeds)) {
    return incompatibleSketches('signature hash seeds do not match the index');
  }
  return ok(null);
}

/** Bucket key of one band of a signature. */
function bandKey<Id extends LshId>(index: LshIndexState<Id>, signature: MinHashState, band: number): string {
  const start = band * index.rowsPerBand;
  const words: number[] = [];
  for (let i = start; i < start + index.rowsPerBand; i++) {
    words.push(signature.sigHi[i]!, signature.sigLo[i]!);
  }
  const h = hashDigest(digestWords(words), index.bandSeeds[band]!);
  return `${h.hi}:${h.lo}`;
}

function compareIds(a: LshId, b: LshId): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

// ---------------------------------------------------------------------------
// Insert / remove
// ---------------------------------------------------------------------------

/**
 * Index `signature` under `id`, replacing any signature previously stored for
 * that id. The index keeps its own copy. A NaN id is rejected.
 */
export function lshInsert<Id extends LshId>(
  index: LshIndexState<Id>,
  id: Id,
  signature: MinHashState,
): Result<null> {
  if (typeof id === 'number' && Number.isNaN(id)) {
    return invalidParameter('id must not be NaN', 'id');
  }
  const compatible = checkSignature(index, signature);
  if (!compatible.ok) return compatible;

  if (lshRemove(index, id)) {
    log.debug('replaced indexed signature', { id });
  }

  for (let band = 0; band < index.bands; band++) {
    const key = bandKey(index, signature, band);
    const table = index.tables[band]!;
    const bucket = table.get(key);
    if (bucket) bucket.add(id);
    else table.set(key, new Set([id]));
  }

  index.signatures.set(id, cloneMinHash(signature));
  return ok(null);
}

/** Remove `id`. Buckets left empty are dropped. */
export function lshRemove<Id extends LshId>(index: LshIndexState<Id>, id: Id): boolean {
  const stored = index.signatures.get(id);
  if (!stored) return false;
  index.signatures.delete(id);

  for (let band = 0; band < index.bands; band++) {
    const key = bandKey(index, stored, band);
    const table = index.tables[band]!;
    const bucket = table.get(key);
    if (!bucket) continue;
    bucket.delete(id);
    if (bucket.size === 0) table.delete(key);
  }
  return true;
}

export function lshContains<Id extends LshId>(index: LshIndexState<Id>, id: Id): boolean {
  return index.signatures.has(id);
}

export function lshSize<Id extends LshId>(index: LshIndexState<Id>): number {
  return index.signatures.size;
}

export function lshClear<Id extends LshId>(index: LshIndexState<Id>): void {
  index.signatures.clear();
  for (const table of index.tables) table.clear();
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/**
 * Ids sharing at least one band bucket with `query`, in order of first
 * discovery (band, then bucket insertion order). Each id appears once.
 */
export function lshQueryCandidates<Id extends LshId>(
  index: LshIndexState<Id>,
  query: MinHashState,
): Result<Id[]> {
  const compatible = checkSignature(index, query);
  if (!compatible.ok) return compatible;

  const candidates = new Set<Id>();
  for (let band = 0; band < index.bands; band++) {
    const bucket = index.tables[band]!.get(bandKey(index, query, band));
    if (!bucket) continue;
    for (const id of bucket) candidates.add(id);
  }
  return ok([...candidates]);
}

/**
 * The `k` candidates most similar to `query` by MinHash Jaccard estimate,
 * descending. Equal scores are ordered by id (numbers ascending, then
 * strings).
 */
export function lshQueryTopK<Id extends LshId>(
  index: LshIndexState<Id>,
  query: MinHashState,
  k: number,
): Result<ScoredCandidate<Id>[]> {
  const parsedK = parseParams(topKSchema, k);
  if (!parsedK.ok) return parsedK;

  const candidates = lshQueryCandidates(index, query);
  if (!candidates.ok) return candidates;
  if (parsedK.value === 0) return ok([]);

  const scored: ScoredCandidate<Id>[] = [];
  for (const id of candidates.value) {
    const stored = index.signatures.get(id);
    if (!stored) continue;
    const similarity = minHashJaccard(stored, query);
    if (!similarity.ok) return similarity;
    scored.push({ id, similarity: similarity.value });
  }

  scored.sort((a, b) => b.similarity - a.similarity || compareIds(a.id, b.id));
  return ok(scored.slice(0, parsedK.value));
}
