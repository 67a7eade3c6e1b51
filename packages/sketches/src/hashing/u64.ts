// ---------------------------------------------------------------------------
// 64-bit unsigned arithmetic on {hi, lo} word pairs
// ---------------------------------------------------------------------------
// All operations wrap modulo 2^64. Halves are always normalized to unsigned
// 32-bit integers (`>>> 0`). BigInt is only used at the API boundary.
// ---------------------------------------------------------------------------

import type { U64 } from '../types.js';

const TWO_32 = 0x1_0000_0000;
const MASK_64 = (1n << 64n) - 1n;

export const U64_ZERO: U64 = { hi: 0, lo: 0 };
export const U64_MAX: U64 = { hi: 0xffffffff, lo: 0xffffffff };

export function u64(hi: number, lo: number): U64 {
  return { hi: hi >>> 0, lo: lo >>> 0 };
}

export function u64FromBigInt(value: bigint): U64 {
  const v = value & MASK_64;
  return { hi: Number(v >> 32n), lo: Number(v & 0xffffffffn) };
}

export function u64ToBigInt(value: U64): bigint {
  return (BigInt(value.hi) << 32n) | BigInt(value.lo);
}

/** Non-negative safe integer to U64 (the integer part, mod 2^53). */
export function u64FromNumber(value: number): U64 {
  const lo = value % TWO_32;
  return { hi: Math.floor(value / TWO_32) >>> 0, lo: lo >>> 0 };
}

export function add64(a: U64, b: U64): U64 {
  const lo = a.lo + b.lo;
  const carry = lo >= TWO_32 ? 1 : 0;
  return { hi: (a.hi + b.hi + carry) >>> 0, lo: lo >>> 0 };
}

export function xor64(a: U64, b: U64): U64 {
  return { hi: (a.hi ^ b.hi) >>> 0, lo: (a.lo ^ b.lo) >>> 0 };
}

export function equals64(a: U64, b: U64): boolean {
  return a.hi === b.hi && a.lo === b.lo;
}

export function compareU64(a: U64, b: U64): number {
  if (a.hi !== b.hi) return a.hi < b.hi ? -1 : 1;
  if (a.lo !== b.lo) return a.lo < b.lo ? -1 : 1;
  return 0;
}

/** Logical right shift, 0 <= n < 32. */
export function shr64(a: U64, n: number): U64 {
  if (n === 0) return a;
  return { hi: a.hi >>> n, lo: ((a.lo >>> n) | (a.hi << (32 - n))) >>> 0 };
}

/** Left shift, 0 <= n < 32. */
export function shl64(a: U64, n: number): U64 {
  if (n === 0) return a;
  return { hi: ((a.hi << n) | (a.lo >>> (32 - n))) >>> 0, lo: (a.lo << n) >>> 0 };
}

/** Leading zero count; 64 for zero. */
export function clz64(a: U64): number {
  return a.hi !== 0 ? Math.clz32(a.hi) : 32 + Math.clz32(a.lo);
}

/** Full 64-bit product of two unsigned 32-bit integers, via 16-bit limbs. */
function mulWide32(a: number, b: number): U64 {
  const a0 = a & 0xffff;
  const a1 = a >>> 16;
  const b0 = b & 0xffff;
  const b1 = b >>> 16;

  const p00 = a0 * b0;
  const p01 = a0 * b1;
  const p10 = a1 * b0;
  const p11 = a1 * b1;

  const mid = (p00 >>> 16) + (p01 & 0xffff) + (p10 & 0xffff);
  const lo = (((mid & 0xffff) << 16) | (p00 & 0xffff)) >>> 0;
  const hi = (p11 + (p01 >>> 16) + (p10 >>> 16) + (mid >>> 16)) >>> 0;
  return { hi, lo };
}

/** Low 64 bits of `a * b`. */
export function mul64(a: U64, b: U64): U64 {
  const low = mulWide32(a.lo, b.lo);
  const cross = Math.imul(a.hi, b.lo) + Math.imul(a.lo, b.hi);
  return { hi: (low.hi + cross) >>> 0, lo: low.lo };
}

/**
 * `a mod m` for 1 <= m <= 2^32, as a number.
 *
 * Reduces sixteen bits at a time so every intermediate stays below 2^53.
 */
export function modU64(a: U64, m: number): number {
  let r = a.hi % m;
  r = (r * 0x10000 + (a.lo >>> 16)) % m;
  r = (r * 0x10000 + (a.lo & 0xffff)) % m;
  return r;
}

/** Top 53 bits as a float in [0, 1). */
export function toUnitFloat(a: U64): number {
  return ((a.hi >>> 0) * 0x200000 + (a.lo >>> 11)) / 2 ** 53;
}

/** Value as a float (rounded to the nearest double). */
export function toNumber(a: U64): number {
  return a.hi * TWO_32 + a.lo;
}
