/**
 * Runtime Settings
 *
 * Resolves directories and external tool names from BENCH_* environment
 * variables. Every path is made absolute against the work directory so no
 * external call depends on the process working directory.
 *
 * Environment variables:
 * - BENCH_WORK_DIR: parent of build___* directories (default: cwd)
 * - BENCH_CONFIG_DIR: directory holding the catalog JSON files (default: work dir)
 * - BENCH_RESULTS_DIR: result files (default: <work dir>/results)
 * - BENCH_SOURCE_ROOT: CMake project root, required to configure builds
 * - BENCH_CMAKE / BENCH_MAKE: build tool executables (default: cmake / make)
 * - BENCH_CONCURRENCY: configurations built at once (default: 1)
 * - BENCH_TIMEOUT_MS: per-process timeout, 0 disables it (default: 0)
 * - BENCH_SEPARATE_STDERR: write benchmark stderr beside the result file
 */

import { isAbsolute, resolve } from 'node:path';
import { ConfigurationError } from '../errors/index.js';
import { SettingsSchema, formatZodIssues, type Settings } from '../types/schemas.js';
import {
  getEnvBoolean,
  getEnvNumber,
  getEnvOptional,
  getEnvWithDefault,
} from '../utils/env.js';

export type { Settings };

export const RESULTS_DIR_NAME = 'results';

function absoluteFrom(base: string, path: string): string {
  return isAbsolute(path) ? path : resolve(base, path);
}

/**
 * Load settings from the environment, with explicit overrides taking precedence
 *
 * @throws ConfigurationError if the resolved values are invalid
 */
export function loadSettings(
  overrides: Partial<Settings> = {},
  env: NodeJS.ProcessEnv = process.env
): Settings {
  const workDir = resolve(overrides.workDir ?? getEnvWithDefault('BENCH_WORK_DIR', process.cwd(), env));

  const sourceRoot = overrides.sourceRoot ?? getEnvOptional('BENCH_SOURCE_ROOT', env);

  const candidate: Settings = {
    workDir,
    configDir: absoluteFrom(workDir, overrides.configDir ?? getEnvWithDefault('BENCH_CONFIG_DIR', workDir, env)),
    resultsDir: absoluteFrom(
      workDir,
      overrides.resultsDir ?? getEnvWithDefault('BENCH_RESULTS_DIR', RESULTS_DIR_NAME, env)
    ),
    sourceRoot: sourceRoot ? absoluteFrom(workDir, sourceRoot) : undefined,
    cmakeCommand: overrides.cmakeCommand ?? getEnvWithDefault('BENCH_CMAKE', 'cmake', env),
    makeCommand: overrides.makeCommand ?? getEnvWithDefault('BENCH_MAKE', 'make', env),
    concurrency: overrides.concurrency ?? getEnvNumber('BENCH_CONCURRENCY', 1, env),
    timeoutMs: overrides.timeoutMs ?? getEnvNumber('BENCH_TIMEOUT_MS', 0, env),
    separateStderr: overrides.separateStderr ?? getEnvBoolean('BENCH_SEPARATE_STDERR', false, env),
  };

  const parsed = SettingsSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid settings: ${formatZodIssues(parsed.error)}`, {
      code: 'INVALID_SETTINGS',
    });
  }
  return parsed.data;
}

/**
 * The CMake project root is only needed once a build directory must be configured
 */
export function requireSourceRoot(settings: Settings): string {
  if (!settings.sourceRoot) {
    throw new ConfigurationError(
      'No CMake source root configured. Set BENCH_SOURCE_ROOT or pass --source-root',
      { code: 'MISSING_SOURCE_ROOT' }
    );
  }
  return settings.sourceRoot;
}
