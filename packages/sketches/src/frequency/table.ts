// ---------------------------------------------------------------------------
// Frequency: shared counter-table helpers
// ---------------------------------------------------------------------------

import { ok } from '../errors.js';
import { equals64 } from '../hashing/index.js';
import { dimensionsSchema, errorBoundsSchema, parseParams } from '../schemas.js';
import type { ErrorBounds, Result, SketchDimensions, U64 } from '../types.js';

/** Largest counter table (width * depth): 2^29 Float64 cells, 4 GiB. */
export const MAX_TABLE_CELLS = 2 ** 29;

const tableSchema = dimensionsSchema.refine((d) => d.width * d.depth <= MAX_TABLE_CELLS, {
  message: `width * depth must not exceed ${MAX_TABLE_CELLS} counters`,
  path: ['width'],
});

export function validateDimensions(dimensions: SketchDimensions): Result<SketchDimensions> {
  return parseParams(tableSchema, dimensions);
}

/**
 * Dimensions from error bounds: `width = ceil(widthFactor(epsilon))`,
 * `depth = ceil(ln(1 / delta))`, each at least 1.
 */
export function dimensionsFromBounds(
  bounds: ErrorBounds,
  widthFactor: (epsilon: number) => number,
): Result<SketchDimensions> {
  const parsed = parseParams(errorBoundsSchema, bounds);
  if (!parsed.ok) return parsed;

  const { epsilon, delta } = parsed.value;
  return ok({
    width: Math.max(1, Math.ceil(widthFactor(epsilon))),
    depth: Math.max(1, Math.ceil(Math.log(1 / delta))),
  });
}

export function sameSeeds(a: readonly U64[], b: readonly U64[]): boolean {
  return a.length === b.length && a.every((seed, i) => equals64(seed, b[i]!));
}

/**
 * Update amount as a safe integer: fractions truncate toward zero, magnitudes
 * clamp to MAX_SAFE_INTEGER, non-finite amounts count as zero.
 */
export function normalizeAmount(amount: number): number {
  if (!Number.isFinite(amount)) return 0;
  const whole = Math.trunc(amount);
  const clamped = Math.min(Number.MAX_SAFE_INTEGER, Math.max(-Number.MAX_SAFE_INTEGER, whole));
  return clamped === 0 ? 0 : clamped;
}
