#!/usr/bin/env node
/**
 * Chess-walk S-box demo
 *
 * Builds an S-box from configuration (overridable by flags), prints its
 * diagnostics and one example substitution.
 *
 * Usage:
 *   npx ts-node src/cli/main.ts [options]
 *
 * Options:
 *   --side <n>          Board side length (default: SBOX_SIDE_LENGTH or 16)
 *   --iterations <k>    Walk iterations (default: SBOX_ITERATIONS or 1000)
 *   --seed <s>          Unsigned 32-bit RNG seed (default: SBOX_SEED or random)
 *   --input <v>         Example substitution input (default: SBOX_EXAMPLE_INPUT or 123)
 *   --help              Show help message
 *
 * Exit Codes:
 *   0 - Success
 *   1 - Engine error (invalid parameters, out-of-range input, invariant failure)
 *   2 - Usage error
 */

import { config, AppConfig } from './config';
import { logger } from './utils/logger';
import { SBoxReport, renderConsoleReport } from './format';
import { SBoxGenerator, wrapEngineError } from '../shared/engine';

export interface CLIArgs {
  sideLength?: number;
  iterations?: number;
  seed?: number;
  input?: number;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

function parseIntegerFlag(flag: string, raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new UsageError(`${flag} expects a non-negative integer, received ${raw ?? 'nothing'}`);
  }
  return Number(raw);
}

export function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = { help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--side':
        result.sideLength = parseIntegerFlag(arg, args[++i]);
        break;
      case '--iterations':
        result.iterations = parseIntegerFlag(arg, args[++i]);
        break;
      case '--seed':
        result.seed = parseIntegerFlag(arg, args[++i]);
        break;
      case '--input':
        result.input = parseIntegerFlag(arg, args[++i]);
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  return result;
}

function showHelp(): void {
  console.log(`
Chess-walk S-box demo

Usage: chesswalk-sbox [options]

Options:
  --side <n>          Board side length (table holds n*n values)
  --iterations <k>    Walk iterations
  --seed <s>          Unsigned 32-bit RNG seed
  --input <v>         Example substitution input
  --help              Show this message
`);
}

/**
 * Generate an S-box for the merged settings and collect the report.
 */
export function buildReport(args: CLIArgs, settings: AppConfig['sbox']): SBoxReport {
  const sideLength = args.sideLength ?? settings.sideLength;
  const iterations = args.iterations ?? settings.iterations;
  const input = args.input ?? settings.exampleInput;

  const generator = new SBoxGenerator({ sideLength, seed: args.seed ?? settings.seed });
  logger.info('Generating S-box', { sideLength, iterations, seed: generator.seed });

  generator.generate(iterations);
  const diagnostics = generator.diagnostics();
  logger.debug('Walk finished', { cursors: generator.cursors, diagnostics });

  return {
    sideLength,
    iterations,
    seed: generator.seed,
    diagnostics,
    example: { input, output: generator.substitute(input) },
  };
}

export function main(argv: string[] = process.argv.slice(2)): number {
  let args: CLIArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    showHelp();
    return 2;
  }

  if (args.help) {
    showHelp();
    return 0;
  }

  try {
    const report = buildReport(args, config.sbox);
    console.log(renderConsoleReport(report));
    return 0;
  } catch (error) {
    const engineError = wrapEngineError(error, 'CLI');
    logger.error('S-box generation failed', { error: engineError });
    console.error(`Error [${engineError.code}]: ${engineError.message}`);
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = main();
}
