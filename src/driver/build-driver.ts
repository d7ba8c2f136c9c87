/**
 * Build/Run Driver
 *
 * Configures and compiles one build configuration, then runs the benchmark
 * binary once per argument spec, writing each run's output to its result file.
 */

import { existsSync } from 'node:fs';
import { mkdir, rename, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { resolveArgSpec } from '../config/catalog.js';
import { requireSourceRoot, type Settings } from '../config/settings.js';
import { BenchmarkRunError, BuildError, type ProcessErrorOptions } from '../errors/index.js';
import type { BuildConfiguration } from '../matrix/build-configuration.js';
import type { AxisCatalog, BuildState } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import {
  formatCommand,
  runCommand,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
} from './process.js';

const logger = createLogger('BuildDriver');

/** Make target that produces the benchmark binary */
export const BENCHMARK_TARGET = 'universal_benchmark';

/** Location of the binary inside a build directory */
export const BENCHMARK_BINARY_PATH = ['tests', 'universal-benchmark', 'universal_benchmark'] as const;

export interface BuildDriverOptions {
  catalog: AxisCatalog;
  settings: Settings;
  /** Process runner, replaceable in tests */
  runner?: CommandRunner;
}

type ErrorFactory = (message: string, options: ProcessErrorOptions) => Error;

/**
 * Split a stored command line into argv entries
 */
export function splitCommandLine(commandLine: string): string[] {
  return commandLine.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Where the output of a failed run is kept. Not a `*.json` name, so the
 * result gatherer never reads it.
 */
export function failedResultFileFor(resultFile: string): string {
  return `${resultFile}.failed.log`;
}

export class BuildDriver {
  private readonly catalog: AxisCatalog;
  private readonly settings: Settings;
  private readonly runner: CommandRunner;

  constructor(options: BuildDriverOptions) {
    this.catalog = options.catalog;
    this.settings = options.settings;
    this.runner = options.runner ?? runCommand;
  }

  buildDirPath(config: BuildConfiguration): string {
    return join(this.settings.workDir, config.buildDir());
  }

  resultPath(config: BuildConfiguration, argSpec: string): string {
    return join(this.settings.resultsDir, config.resultFile(argSpec));
  }

  benchmarkBinary(config: BuildConfiguration): string {
    return join(this.buildDirPath(config), ...BENCHMARK_BINARY_PATH);
  }

  /**
   * Create and configure the build directory.
   *
   * An existing directory is reused as-is unless `forceRebuild` is set, in
   * which case it is deleted and configured from scratch. A directory whose
   * configure step fails is removed so the next campaign configures it again.
   *
   * @throws BuildError if the configure step fails
   */
  async ensureBuilt(config: BuildConfiguration, forceRebuild = false): Promise<BuildState> {
    const buildDir = this.buildDirPath(config);

    if (existsSync(buildDir)) {
      if (!forceRebuild) {
        logger.debug({ buildDir }, 'Build directory exists, reusing');
        return 'reused';
      }
      logger.info({ buildDir }, 'Removing build directory for rebuild');
      await rm(buildDir, { recursive: true, force: true });
    }

    const sourceRoot = requireSourceRoot(this.settings);

    logger.info({ buildDir }, 'Creating build directory');
    await mkdir(buildDir, { recursive: true });

    try {
      await this.exec(
        this.settings.cmakeCommand,
        [...config.buildToolParams(), sourceRoot],
        { cwd: buildDir },
        (message, options) => new BuildError(message, { ...options, code: 'CONFIGURE_FAILED' })
      );
    } catch (error) {
      await rm(buildDir, { recursive: true, force: true });
      throw error;
    }

    return 'configured';
  }

  /**
   * Compile the benchmark, then run it once per argument spec in order.
   * The first failing run stops the remaining specs.
   *
   * @returns Absolute paths of the result files written
   * @throws ConfigurationError for an unknown spec name (before compiling)
   * @throws BuildError if compilation fails
   * @throws BenchmarkRunError if a benchmark run fails. Whatever that run wrote
   * is kept as `{resultFile}.failed.log` instead of the result file.
   */
  async runArgSpecs(config: BuildConfiguration, argSpecNames: readonly string[]): Promise<string[]> {
    const runs = argSpecNames.map((name) => ({
      name,
      argv: splitCommandLine(resolveArgSpec(this.catalog.argSpecs, name)),
      outputFile: this.resultPath(config, name),
    }));

    const buildDir = this.buildDirPath(config);
    logger.info({ buildDir }, `Building ${BENCHMARK_TARGET}`);
    await this.exec(
      this.settings.makeCommand,
      [BENCHMARK_TARGET],
      { cwd: buildDir },
      (message, options) => new BuildError(message, { ...options, code: 'COMPILE_FAILED' })
    );

    if (!existsSync(this.settings.resultsDir)) {
      logger.info({ resultsDir: this.settings.resultsDir }, 'Creating results directory');
    }
    await mkdir(this.settings.resultsDir, { recursive: true });

    const binary = this.benchmarkBinary(config);
    const written: string[] = [];

    for (const run of runs) {
      try {
        await this.exec(
          binary,
          run.argv,
          {
            cwd: this.settings.workDir,
            outputFile: run.outputFile,
            separateStderr: this.settings.separateStderr,
          },
          (message, options) => new BenchmarkRunError(message, { ...options, code: 'BENCHMARK_FAILED' })
        );
      } catch (error) {
        await this.setAsideFailedOutput(run.outputFile);
        throw error;
      }
      await rm(failedResultFileFor(run.outputFile), { force: true });
      written.push(run.outputFile);
    }

    return written;
  }

  /**
   * Move a failed run's output off its `*.json` name so later gathers only
   * see complete results. The run's own error is what the caller reports.
   */
  private async setAsideFailedOutput(resultFile: string): Promise<void> {
    if (!existsSync(resultFile)) return;

    const failedFile = failedResultFileFor(resultFile);
    try {
      await rename(resultFile, failedFile);
      logger.warn({ resultFile: failedFile }, 'Kept output of failed run');
    } catch (error) {
      logger.error({ resultFile, err: error }, 'Could not move output of failed run');
    }
  }

  private async exec(
    command: string,
    args: readonly string[],
    options: CommandOptions,
    fail: ErrorFactory
  ): Promise<void> {
    const commandLine = formatCommand(command, args);
    logger.info({ cwd: options.cwd }, `Running: ${commandLine}`);
    if (options.outputFile) {
      logger.info(`Piping output to: ${options.outputFile}`);
    }

    let result: CommandResult;
    try {
      result = await this.runner(command, args, { ...options, timeoutMs: this.settings.timeoutMs });
    } catch (error) {
      throw fail(`Could not start command: ${commandLine}`, {
        command: commandLine,
        exitCode: null,
        cause: error instanceof Error ? error : undefined,
      });
    }

    if (result.code !== 0) {
      const reason = result.timedOut
        ? `timed out after ${this.settings.timeoutMs}ms`
        : result.code === null
          ? `killed by ${result.signal ?? 'signal'}`
          : `exited with code ${result.code}`;
      throw fail(`Command ${reason}: ${commandLine}`, {
        command: commandLine,
        exitCode: result.code,
      });
    }

    logger.debug({ durationMs: result.durationMs }, `Finished: ${commandLine}`);
  }
}
