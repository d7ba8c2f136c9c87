/**
 * CLI command implementations
 *
 * Each command resolves settings, loads what it needs and writes its output
 * through `print`, so commands can be exercised without a terminal.
 */

import { relative } from 'node:path';
import { campaignSelection, CampaignFileLoader, type CampaignFile } from '../config/campaign-file.js';
import { loadCatalog, selectAxes } from '../config/catalog.js';
import { loadSettings, type Settings } from '../config/settings.js';
import { ConfigurationError, describeError } from '../errors/index.js';
import { BuildDriver } from '../driver/build-driver.js';
import {
  planCampaign,
  runCampaign,
  summarizeCampaign,
  SEQUENTIAL,
  type CampaignReport,
} from '../driver/campaign.js';
import type { CommandRunner } from '../driver/process.js';
import { generateMatrix } from '../matrix/generator.js';
import { gatherAll, listResultFiles } from '../results/gatherer.js';
import { tableSeries } from '../results/matcher.js';
import { formatSeriesTable } from '../results/report.js';
import type { AxisSelection, ExecutionStrategy, StatSeries } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('CLI');

export type Printer = (line: string) => void;

export interface CommandContext {
  print?: Printer;
  /** Process runner handed to the build driver */
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
}

export interface CommonOptions {
  workDir?: string;
  configDir?: string;
  resultsDir?: string;
}

export interface SelectionOptions {
  argSpecs?: string;
  keys?: string;
  values?: string;
  tables?: string;
}

export interface MatrixCommandOptions extends CommonOptions, SelectionOptions {}

export interface RunCommandOptions extends CommonOptions, SelectionOptions {
  sourceRoot?: string;
  campaign?: string;
  forceRebuild?: boolean;
  failFast?: boolean;
  separateStderr?: boolean;
  concurrency?: string;
  timeout?: string;
}

export interface QueryCommandOptions extends CommonOptions {
  stat: string;
  exact?: boolean;
  table?: boolean;
}

/**
 * Split a comma-separated option value; undefined when not given
 */
export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

export function parsePositiveInt(value: string, option: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`${option} must be a positive integer, got "${value}"`, {
      code: 'INVALID_OPTION',
    });
  }
  return parsed;
}

function parseTimeout(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigurationError(`--timeout must be a non-negative integer, got "${value}"`, {
      code: 'INVALID_OPTION',
    });
  }
  return parsed;
}

function selectionFrom(options: SelectionOptions, campaign?: CampaignFile): AxisSelection {
  const fromFile = campaign ? campaignSelection(campaign) : {};
  return {
    argSpecs: parseList(options.argSpecs) ?? fromFile.argSpecs,
    keys: parseList(options.keys) ?? fromFile.keys,
    values: parseList(options.values) ?? fromFile.values,
    tables: parseList(options.tables) ?? fromFile.tables,
  };
}

function settingsFrom(options: CommonOptions, env?: NodeJS.ProcessEnv, extra: Partial<Settings> = {}): Settings {
  return loadSettings(
    {
      workDir: options.workDir,
      configDir: options.configDir,
      resultsDir: options.resultsDir,
      ...extra,
    },
    env
  );
}

/**
 * `matrix`: list configurations with their build directories and result files
 */
export async function cmdMatrix(options: MatrixCommandOptions, ctx: CommandContext = {}): Promise<void> {
  const print = ctx.print ?? console.log;
  const settings = settingsFrom(options, ctx.env);
  const catalog = selectAxes(await loadCatalog(settings.configDir), selectionFrom(options));
  const matrix = generateMatrix(catalog);
  const argSpecs = Object.keys(catalog.argSpecs);

  print(`Configurations: ${matrix.size}`);
  print(`Argument specs: ${argSpecs.join(', ') || '(none)'}`);
  for (const config of matrix) {
    print(`  - ${config.toString()} -> ${config.buildDir()}`);
    for (const spec of argSpecs) {
      print(`      ${config.resultFile(spec)}`);
    }
  }
}

/**
 * `run`: build every selected configuration and run its argument specs
 */
export async function cmdRun(options: RunCommandOptions, ctx: CommandContext = {}): Promise<CampaignReport> {
  const print = ctx.print ?? console.log;

  const campaign = options.campaign
    ? new CampaignFileLoader().load(options.campaign, options.workDir ?? process.cwd())
    : undefined;

  const extra: Partial<Settings> = {};
  if (options.sourceRoot !== undefined) extra.sourceRoot = options.sourceRoot;
  if (options.timeout !== undefined) extra.timeoutMs = parseTimeout(options.timeout);
  const separateStderr = options.separateStderr ?? campaign?.separateStderr;
  if (separateStderr !== undefined) extra.separateStderr = separateStderr;

  const settings = settingsFrom(options, ctx.env, extra);
  const catalog = await loadCatalog(settings.configDir);
  const tasks = planCampaign(catalog, selectionFrom(options, campaign));

  const concurrency =
    options.concurrency !== undefined
      ? parsePositiveInt(options.concurrency, '--concurrency')
      : (campaign?.concurrency ?? settings.concurrency);
  const strategy: ExecutionStrategy =
    concurrency > 1 ? { kind: 'parallel', concurrency } : SEQUENTIAL;

  logger.info(
    { campaign: campaign?.name, tasks: tasks.length, strategy },
    'Starting campaign'
  );

  const driver = new BuildDriver({ catalog, settings, runner: ctx.runner });
  const report = await runCampaign(tasks, driver, {
    strategy,
    forceRebuild: options.forceRebuild ?? campaign?.forceRebuild ?? false,
    failFast: options.failFast ?? campaign?.failFast ?? false,
  });

  const summary = summarizeCampaign(report);
  print('');
  print('=== Campaign Complete ===');
  print(`Succeeded: ${summary.success}/${summary.total}`);
  if (summary['build-error'] > 0) print(`Build errors: ${summary['build-error']}`);
  if (summary['run-error'] > 0) print(`Run errors: ${summary['run-error']}`);
  if (summary.skipped > 0) print(`Skipped: ${summary.skipped}`);
  for (const outcome of report.outcomes) {
    if (outcome.error) {
      print(`  ${outcome.config.id}: ${describeError(outcome.error)}`);
    }
  }

  return report;
}

/**
 * `query`: series of one or more statistics across table types
 */
export async function cmdQuery(
  argSpec: string,
  key: string,
  value: string,
  options: QueryCommandOptions,
  ctx: CommandContext = {}
): Promise<Record<string, StatSeries>> {
  const print = ctx.print ?? console.log;
  const statNames = parseList(options.stat);
  if (!statNames) {
    throw new ConfigurationError('--stat must name at least one statistic', { code: 'INVALID_OPTION' });
  }

  const settings = settingsFrom(options, ctx.env);
  const catalog = await loadCatalog(settings.configDir);
  const records = await gatherAll(settings.resultsDir);

  const series = tableSeries(
    records,
    catalog.argSpecs,
    { argSpecName: argSpec, key, value },
    statNames,
    { strategy: options.exact ? 'EXACT' : 'SUBSET' }
  );

  if (options.table) {
    print(formatSeriesTable(series));
  } else if (statNames.length === 1) {
    print(JSON.stringify(series[statNames[0]], null, 2));
  } else {
    print(JSON.stringify(series, null, 2));
  }
  return series;
}

/**
 * `list-results`: result files currently in the results directory
 */
export async function cmdListResults(options: CommonOptions, ctx: CommandContext = {}): Promise<string[]> {
  const print = ctx.print ?? console.log;
  const settings = settingsFrom(options, ctx.env);
  const files = await listResultFiles(settings.resultsDir);

  if (files.length === 0) {
    print('No results found.');
    return files;
  }
  for (const file of files) {
    print(`  ${relative(settings.resultsDir, file)}`);
  }
  print(`Total: ${files.length} results`);
  return files;
}
