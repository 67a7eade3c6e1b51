// ---------------------------------------------------------------------------
// Saturating counter arithmetic
// ---------------------------------------------------------------------------
// Counters are doubles holding safe integers. Updates clamp at the safe
// integer bounds instead of losing precision.
// ---------------------------------------------------------------------------

export const COUNTER_MAX = Number.MAX_SAFE_INTEGER;
export const COUNTER_MIN = -Number.MAX_SAFE_INTEGER;

function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

/** `a + b` clamped to `[0, MAX_SAFE_INTEGER]`. */
export function saturatingAdd(a: number, b: number): number {
  return clamp(a + b, 0, COUNTER_MAX);
}

/** `a - b` clamped to `[0, MAX_SAFE_INTEGER]`. */
export function saturatingSub(a: number, b: number): number {
  return clamp(a - b, 0, COUNTER_MAX);
}

/** `a + b` clamped to `[-MAX_SAFE_INTEGER, MAX_SAFE_INTEGER]`. */
export function saturatingAddSigned(a: number, b: number): number {
  return clamp(a + b, COUNTER_MIN, COUNTER_MAX);
}
