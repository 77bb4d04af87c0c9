import { z } from 'zod';
import { MIN_SIDE_LENGTH } from '../engine/geometry';

export const DEFAULT_SIDE_LENGTH = 16;
export const DEFAULT_ITERATIONS = 1000;

/** Unsigned 32-bit seed, the state width of SeededRNG. */
export const SeedSchema = z.number().int().min(0).max(0xffffffff);

export const SideLengthSchema = z.number().int().min(MIN_SIDE_LENGTH);

// Generator construction options. The random source itself is an object
// and is checked structurally by TypeScript rather than here.
export const SBoxOptionsSchema = z.object({
  sideLength: SideLengthSchema.default(DEFAULT_SIDE_LENGTH),
  seed: SeedSchema.optional(),
});

export type SBoxOptionsInput = z.input<typeof SBoxOptionsSchema>;

/**
 * Flatten zod issues into `path: message` strings for error context.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
}
