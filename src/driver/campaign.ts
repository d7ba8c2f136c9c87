/**
 * Campaign
 *
 * One task per build configuration. Tasks run under a sequential or
 * bounded-parallel strategy and each reports a structured outcome; a failing
 * configuration does not stop the others unless `failFast` is set.
 */

import { selectAxes } from '../config/catalog.js';
import { BenchmarkRunError, ConfigurationError, describeError } from '../errors/index.js';
import type { BuildConfiguration } from '../matrix/build-configuration.js';
import { generateMatrix } from '../matrix/generator.js';
import type { AxisCatalog, AxisSelection, BuildState, ExecutionStrategy, TaskStatus } from '../types/index.js';
import { ConcurrencyLimiter } from '../utils/concurrency.js';
import { createLogger } from '../utils/logger.js';
import type { BuildDriver } from './build-driver.js';

const logger = createLogger('Campaign');

export interface CampaignTask {
  /** Position in matrix order */
  index: number;
  config: BuildConfiguration;
  argSpecs: readonly string[];
}

export interface TaskOutcome {
  config: BuildConfiguration;
  status: TaskStatus;
  /** Set when the configure step ran */
  buildState?: BuildState;
  resultFiles: string[];
  error?: Error;
  durationMs: number;
}

export interface CampaignOptions {
  strategy?: ExecutionStrategy;
  forceRebuild?: boolean;
  /** Start no further tasks once one has failed */
  failFast?: boolean;
}

export interface CampaignReport {
  outcomes: TaskOutcome[];
  durationMs: number;
}

export type CampaignSummary = Record<TaskStatus, number> & { total: number };

export const SEQUENTIAL: ExecutionStrategy = { kind: 'sequential' };

/**
 * Plan one task per configuration of the (optionally narrowed) matrix.
 * Every task runs the selected argument specs, all of them by default.
 *
 * @throws ConfigurationError if the selection names unknown axis values
 */
export function planCampaign(catalog: AxisCatalog, selection: AxisSelection = {}): CampaignTask[] {
  const narrowed = selectAxes(catalog, selection);
  const argSpecs = Object.keys(narrowed.argSpecs);

  const tasks: CampaignTask[] = [];
  for (const config of generateMatrix(narrowed)) {
    tasks.push({ index: tasks.length, config, argSpecs });
  }
  return tasks;
}

function classifyFailure(error: unknown): Extract<TaskStatus, 'build-error' | 'run-error'> {
  return error instanceof BenchmarkRunError ? 'run-error' : 'build-error';
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run every task and collect one outcome per task, in task order
 */
export async function runCampaign(
  tasks: readonly CampaignTask[],
  driver: BuildDriver,
  options: CampaignOptions = {}
): Promise<CampaignReport> {
  const strategy = options.strategy ?? SEQUENTIAL;
  const forceRebuild = options.forceRebuild ?? false;
  const failFast = options.failFast ?? false;

  if (strategy.kind === 'parallel' && (!Number.isInteger(strategy.concurrency) || strategy.concurrency < 1)) {
    throw new ConfigurationError(`Concurrency must be a positive integer, got ${strategy.concurrency}`, {
      code: 'INVALID_CONCURRENCY',
    });
  }

  const startTime = Date.now();
  let aborted = false;

  const execute = async (task: CampaignTask): Promise<TaskOutcome> => {
    const { config } = task;
    if (aborted) {
      return { config, status: 'skipped', resultFiles: [], durationMs: 0 };
    }

    const taskStart = Date.now();
    let buildState: BuildState | undefined;
    logger.info({ configuration: config.id }, `Starting ${task.index + 1}/${tasks.length}`);

    try {
      buildState = await driver.ensureBuilt(config, forceRebuild);
      const resultFiles = await driver.runArgSpecs(config, task.argSpecs);
      const durationMs = Date.now() - taskStart;
      logger.info({ configuration: config.id, durationMs }, 'Configuration completed');
      return { config, status: 'success', buildState, resultFiles, durationMs };
    } catch (err) {
      const error = toError(err);
      if (failFast) aborted = true;
      logger.error({ configuration: config.id, err: error }, `Configuration failed: ${describeError(error)}`);
      return {
        config,
        status: classifyFailure(error),
        buildState,
        resultFiles: [],
        error,
        durationMs: Date.now() - taskStart,
      };
    }
  };

  let outcomes: TaskOutcome[];
  if (strategy.kind === 'sequential') {
    outcomes = [];
    for (const task of tasks) {
      outcomes.push(await execute(task));
    }
  } else {
    const limiter = new ConcurrencyLimiter({ maxConcurrency: strategy.concurrency });
    outcomes = await Promise.all(tasks.map((task) => limiter.run(() => execute(task))));
  }

  return { outcomes, durationMs: Date.now() - startTime };
}

export function summarizeCampaign(report: CampaignReport): CampaignSummary {
  const summary: CampaignSummary = {
    total: report.outcomes.length,
    success: 0,
    'build-error': 0,
    'run-error': 0,
    skipped: 0,
  };
  for (const outcome of report.outcomes) {
    summary[outcome.status]++;
  }
  return summary;
}

export function campaignSucceeded(report: CampaignReport): boolean {
  return report.outcomes.every((outcome) => outcome.status === 'success');
}
