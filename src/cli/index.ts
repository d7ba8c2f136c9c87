#!/usr/bin/env node
/**
 * bench-matrix CLI
 *
 * Builds every (key, value, table) configuration of the universal benchmark,
 * runs it against named argument specs and queries the collected results.
 */

import { Command } from 'commander';
import { describeError } from '../errors/index.js';
import { campaignSucceeded } from '../driver/campaign.js';
import { cmdListResults, cmdMatrix, cmdQuery, cmdRun } from './commands.js';

function fail(error: unknown): never {
  console.error('Error:', describeError(error));
  process.exit(1);
}

const program = new Command();

program
  .name('bench-matrix')
  .description('Build, run and compare the universal hash table benchmark across configurations')
  .version('0.1.0');

const withCommonOptions = (command: Command): Command =>
  command
    .option('--work-dir <dir>', 'Directory holding build___* directories (BENCH_WORK_DIR)')
    .option('--config-dir <dir>', 'Directory holding the catalog JSON files (BENCH_CONFIG_DIR)')
    .option('--results-dir <dir>', 'Directory holding result files (BENCH_RESULTS_DIR)');

const withSelectionOptions = (command: Command): Command =>
  command
    .option('--arg-specs <names>', 'Comma-separated argument specs to include')
    .option('--keys <names>', 'Comma-separated key types to include')
    .option('--values <names>', 'Comma-separated value types to include')
    .option('--tables <names>', 'Comma-separated table types to include');

withSelectionOptions(
  withCommonOptions(
    program.command('matrix').description('Show the configuration matrix without building anything')
  )
).action(async (options) => {
  try {
    await cmdMatrix(options);
  } catch (error) {
    fail(error);
  }
});

withSelectionOptions(
  withCommonOptions(
    program.command('run').description('Build every configuration and run its argument specs')
  )
)
  .option('--source-root <dir>', 'CMake project root (BENCH_SOURCE_ROOT)')
  .option('--campaign <file>', 'YAML campaign file selecting axes and options')
  .option('--force-rebuild', 'Delete and reconfigure existing build directories')
  .option('--fail-fast', 'Stop starting configurations after the first failure')
  .option('--separate-stderr', 'Write benchmark stderr beside each result file')
  .option('-j, --concurrency <n>', 'Configurations to build at once (BENCH_CONCURRENCY)')
  .option('--timeout <ms>', 'Kill any external command running longer than this (BENCH_TIMEOUT_MS)')
  .action(async (options) => {
    try {
      const report = await cmdRun(options);
      if (!campaignSucceeded(report)) {
        process.exit(1);
      }
    } catch (error) {
      fail(error);
    }
  });

withCommonOptions(
  program
    .command('query <argSpec> <key> <value>')
    .description('Show statistics across table types for one argument spec, key and value')
)
  .requiredOption('-s, --stat <names>', 'Comma-separated statistic names, e.g. throughput')
  .option('--exact', 'Match recorded arguments exactly instead of as a superset')
  .option('--table', 'Print a text table instead of JSON')
  .action(async (argSpec: string, key: string, value: string, options) => {
    try {
      await cmdQuery(argSpec, key, value, options);
    } catch (error) {
      fail(error);
    }
  });

withCommonOptions(
  program.command('list-results').description('List result files in the results directory')
).action(async (options) => {
  try {
    await cmdListResults(options);
  } catch (error) {
    fail(error);
  }
});

program.parseAsync().catch(fail);
