/**
 * Environment Variable Schema and Validation
 *
 * Defines the Zod schema for every environment variable the CLI reads,
 * validates it at startup, and exports the typed result.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';
import { MIN_SIDE_LENGTH } from '../../shared/engine/geometry';
import { DEFAULT_ITERATIONS, DEFAULT_SIDE_LENGTH } from '../../shared/validation/schemas';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Application log level */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Log output format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Log file path (optional) */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // S-BOX GENERATION
  // ===================================================================

  /** Board side length; the table holds side² values */
  SBOX_SIDE_LENGTH: z.coerce.number().int().min(MIN_SIDE_LENGTH).default(DEFAULT_SIDE_LENGTH),

  /** Walk iterations (each moves all three pieces once) */
  SBOX_ITERATIONS: z.coerce.number().int().min(0).default(DEFAULT_ITERATIONS),

  /** Fixed RNG seed; a fresh one is drawn when unset */
  SBOX_SEED: z.coerce.number().int().min(0).max(0xffffffff).optional(),

  /** Input used for the example substitution */
  SBOX_EXAMPLE_INPUT: z.coerce.number().int().min(0).default(123),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * Empty strings are treated as unset so `SBOX_SEED=` in a .env file does
 * not coerce to 0.
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return { success: true, data: result.data };
}

/**
 * Jest always defines JEST_WORKER_ID; treat that as the test environment
 * even if a .env file set NODE_ENV to something else.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
