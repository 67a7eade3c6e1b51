// ---------------------------------------------------------------------------
// Parameter schemas
// ---------------------------------------------------------------------------
// Zod schemas for constructor and query inputs. `parseParams` turns the first
// zod issue into an INVALID_PARAMETER error naming the field at fault.
// ---------------------------------------------------------------------------

import { z } from 'zod';

import { invalidParameter, ok } from './errors.js';
import type { Result } from './types.js';

/** A finite rate strictly inside (0, 1). */
export function probability(name: string) {
  const message = `${name} must be finite and strictly between 0 and 1`;
  return z
    .number({ required_error: message, invalid_type_error: message })
    .finite({ message })
    .gt(0, { message })
    .lt(1, { message })
    .describe(name);
}

/** A positive safe integer. */
export function positiveInteger(name: string, max: number = Number.MAX_SAFE_INTEGER) {
  const message = `${name} must be an integer in [1, ${max}]`;
  return z
    .number({ required_error: message, invalid_type_error: message })
    .int({ message })
    .min(1, { message })
    .max(max, { message })
    .describe(name);
}

/** An integer in an inclusive range. */
export function integerInRange(name: string, min: number, max: number) {
  const message = `${name} must be an integer in the inclusive range [${min}, ${max}]`;
  return z
    .number({ required_error: message, invalid_type_error: message })
    .int({ message })
    .min(min, { message })
    .max(max, { message })
    .describe(name);
}

/** A quantile request in [0, 1]. */
export const quantileSchema = z
  .number({ invalid_type_error: 'q must be finite and in [0, 1]' })
  .min(0, { message: 'q must be finite and in [0, 1]' })
  .max(1, { message: 'q must be finite and in [0, 1]' })
  .describe('q');

export const membershipConfigSchema = z.object({
  expectedItems: positiveInteger('expectedItems'),
  falsePositiveRate: probability('falsePositiveRate'),
});

export const errorBoundsSchema = z.object({
  epsilon: probability('epsilon'),
  delta: probability('delta'),
});

export const dimensionsSchema = z.object({
  width: positiveInteger('width'),
  depth: positiveInteger('depth'),
});

/**
 * Validate `input` against `schema`.
 *
 * The first issue becomes the error. Its path is reported as the error's
 * `field`; a bare schema reports its description instead.
 */
export function parseParams<S extends z.ZodTypeAny>(schema: S, input: unknown): Result<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) return ok(parsed.data);

  const issue = parsed.error.issues[0];
  if (!issue) return invalidParameter('invalid parameters');
  const field = issue.path.length > 0 ? issue.path.join('.') : schema.description;
  return invalidParameter(issue.message, field);
}
