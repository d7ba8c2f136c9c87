/**
 * Environment Variable Utilities
 *
 * Typed access to BENCH_* variables. Every reader takes the environment as a
 * parameter so settings can be resolved against a fixture in tests.
 */

type Env = NodeJS.ProcessEnv;

/**
 * Get an environment variable with a default value
 *
 * @param key - Environment variable name
 * @param defaultValue - Default value if not set or empty
 * @param env - Environment to read, `process.env` when omitted
 *
 * @example
 * const make = getEnvWithDefault('BENCH_MAKE', 'make');
 * const workDir = getEnvWithDefault('BENCH_WORK_DIR', process.cwd());
 */
export function getEnvWithDefault(key: string, defaultValue: string, env: Env = process.env): string {
  const value = env[key];
  return value || defaultValue;
}

/**
 * Get an optional environment variable (undefined if not set or empty)
 *
 * @param key - Environment variable name
 * @param env - Environment to read, `process.env` when omitted
 *
 * @example
 * const sourceRoot = getEnvOptional('BENCH_SOURCE_ROOT');
 * if (sourceRoot) {
 *   // Build directories can be configured
 * }
 */
export function getEnvOptional(key: string, env: Env = process.env): string | undefined {
  return env[key] || undefined;
}

/**
 * Get an environment variable as a boolean
 *
 * Treats 'true', '1', 'yes' (case-insensitive) as true, everything else as false
 *
 * @param key - Environment variable name
 * @param defaultValue - Default value if not set
 * @param env - Environment to read, `process.env` when omitted
 *
 * @example
 * const separateStderr = getEnvBoolean('BENCH_SEPARATE_STDERR', false);
 */
export function getEnvBoolean(key: string, defaultValue: boolean = false, env: Env = process.env): boolean {
  const value = env[key];
  if (!value) {
    return defaultValue;
  }
  return ['true', '1', 'yes'].includes(value.toLowerCase());
}

/**
 * Get an environment variable as an integer
 *
 * @param key - Environment variable name
 * @param defaultValue - Default value if not set or invalid
 * @param env - Environment to read, `process.env` when omitted
 *
 * @example
 * const concurrency = getEnvNumber('BENCH_CONCURRENCY', 1);
 */
export function getEnvNumber(key: string, defaultValue: number, env: Env = process.env): number {
  const value = env[key];
  if (!value) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}
