/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object for the CLI and logger.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import {
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  getEffectiveNodeEnv,
  isProduction,
  isTest,
  parseEnv,
} from './env';
import { SeedSchema } from '../../shared/validation/schemas';

// Skip .env in test mode so it cannot override test-specific variables.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isTest: z.boolean(),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  sbox: z.object({
    sideLength: z.number().int(),
    iterations: z.number().int().min(0),
    seed: SeedSchema.optional(),
    exampleInput: z.number().int().min(0),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Build a validated, frozen config from an environment map. Throws with
 * every offending variable listed when validation fails.
 */
export function loadConfig(
  rawEnv: Record<string, string | undefined> = process.env
): Readonly<AppConfig> {
  const envResult = parseEnv(rawEnv);
  if (!envResult.success || !envResult.data) {
    const details = (envResult.errors ?? [])
      .map((error) => `${error.path || 'root'}: ${error.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const env = envResult.data;
  const nodeEnv = getEffectiveNodeEnv(env);

  const preliminaryConfig = {
    nodeEnv,
    isProduction: isProduction(nodeEnv),
    isTest: isTest(nodeEnv),
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      file: env.LOG_FILE?.trim() || undefined,
    },
    sbox: {
      sideLength: env.SBOX_SIDE_LENGTH,
      iterations: env.SBOX_ITERATIONS,
      seed: env.SBOX_SEED,
      exampleInput: env.SBOX_EXAMPLE_INPUT,
    },
  };

  return Object.freeze(ConfigSchema.parse(preliminaryConfig));
}

export const config: Readonly<AppConfig> = (() => {
  try {
    return loadConfig();
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
})();
