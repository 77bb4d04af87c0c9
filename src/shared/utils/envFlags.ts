// Shared helpers for reading environment flags in both Node/Jest and
// browser bundles. The shared engine never imports Node-only modules, so
// its diagnostics go through these helpers instead of the CLI logger.

type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * was set to something else (for example by a .env file).
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function flagEnabled(name: string): boolean {
  const raw = readEnv(name);
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}

/**
 * Per-move tracing for the walk engine. Prints one line per piece move,
 * so keep it off for anything larger than a toy board.
 */
export function isWalkTraceEnabled(): boolean {
  return flagEnabled('SBOX_TRACE_WALK');
}

/**
 * Debug logging wrapper gated by a condition.
 *
 * @example
 * debugLog(isWalkTraceEnabled(), '[WalkEngine] knight', from, '->', to);
 */
export function debugLog(condition: boolean, ...args: unknown[]): void {
  if (condition) {
    // eslint-disable-next-line no-console
    console.log(...args);
  }
}
