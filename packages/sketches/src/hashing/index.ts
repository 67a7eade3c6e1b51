// ---------------------------------------------------------------------------
// Hashing & seeding: Barrel export
// ---------------------------------------------------------------------------

export {
  U64_ZERO,
  U64_MAX,
  u64,
  u64FromBigInt,
  u64ToBigInt,
  u64FromNumber,
  add64,
  xor64,
  mul64,
  shr64,
  shl64,
  clz64,
  equals64,
  compareU64,
  modU64,
  toUnitFloat,
  toNumber,
} from './u64.js';

export {
  GOLDEN_GAMMA,
  mix64,
  mix,
  deriveSeeds,
  encodeItem,
  digestWords,
  digestItem,
  hashDigest,
  hashItem,
  seededHash,
} from './hash.js';

export {
  createRandomStream,
  copyRandomStream,
  reseedRandomStream,
  nextU64,
  nextBit,
  nextFloat,
  nextIndex,
} from './random.js';

export {
  COUNTER_MAX,
  COUNTER_MIN,
  saturatingAdd,
  saturatingSub,
  saturatingAddSigned,
} from './saturating.js';
