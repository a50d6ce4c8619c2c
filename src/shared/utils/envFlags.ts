// Shared helpers for reading environment flags. The engine itself never
// depends on configuration; these flags only switch optional diagnostics on,
// so they are read directly from process.env rather than through the host
// config layer.

// Type-safe process.env access that also works where `process` is absent
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
 * Returns true if running in a test environment (NODE_ENV === 'test').
 */
export function isTestEnvironment(): boolean {
  return readEnv('NODE_ENV') === 'test';
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * has been set to something else (e.g. through a .env file).
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
 * Engine diagnostics (catalog build statistics and similar). Off by default.
 */
export function isEngineDebugEnabled(): boolean {
  return flagEnabled('POLYBLOCK_ENGINE_DEBUG');
}

/**
 * Debug logging gated by a flag. The engine has no logger of its own, so
 * this writes straight to the console when the condition holds.
 *
 * @example
 * debugLog(isEngineDebugEnabled(), '[MoveCatalog] built', { totalMoves });
 */
export function debugLog(condition: boolean, ...args: unknown[]): void {
  if (condition) {
    // eslint-disable-next-line no-console
    console.log(...args);
  }
}
