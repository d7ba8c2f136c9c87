import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { BuildDriver } from '../../../src/driver/build-driver.js';
import {
  campaignSucceeded,
  planCampaign,
  runCampaign,
  summarizeCampaign,
} from '../../../src/driver/campaign.js';
import { createCatalog } from '../../../src/config/catalog.js';
import { loadSettings } from '../../../src/config/settings.js';
import { gatherAll } from '../../../src/results/gatherer.js';
import { BenchmarkRunError, BuildError, ConfigurationError } from '../../../src/errors/index.js';
import {
  benchmarkOutputFor,
  createFakeRunner,
  createTempDir,
  removeTempDir,
  type FakeRunnerBehavior,
} from '../../utils/mocks.js';

const catalog = createCatalog({
  argSpecs: { basic: '--reps 10', heavy: '--reps 100' },
  keys: ['int'],
  values: ['int'],
  tables: ['flat', 'btree'],
});

describe('planCampaign', () => {
  it('should plan one task per configuration with every argument spec', () => {
    const tasks = planCampaign(catalog);

    expect(tasks.map((task) => [task.index, task.config.id, task.argSpecs])).toEqual([
      [0, 'int___int___flat', ['basic', 'heavy']],
      [1, 'int___int___btree', ['basic', 'heavy']],
    ]);
  });

  it('should honour an axis selection', () => {
    const tasks = planCampaign(catalog, { tables: ['btree'], argSpecs: ['heavy'] });

    expect(tasks).toHaveLength(1);
    expect(tasks[0].config.table).toBe('btree');
    expect(tasks[0].argSpecs).toEqual(['heavy']);
  });

  it('should reject unknown selections', () => {
    expect(() => planCampaign(catalog, { tables: ['hash'] })).toThrow(ConfigurationError);
  });
});

describe('runCampaign', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(workDir);
  });

  function driverWith(behavior: FakeRunnerBehavior = {}) {
    const fake = createFakeRunner({ output: benchmarkOutputFor, ...behavior });
    const driver = new BuildDriver({
      catalog,
      settings: loadSettings({ workDir, sourceRoot: '/src/libcuckoo' }, {}),
      runner: fake.runner,
    });
    return { driver, calls: fake.calls };
  }

  it('should build and run every configuration in order', async () => {
    const { driver, calls } = driverWith();

    const report = await runCampaign(planCampaign(catalog), driver);

    expect(report.outcomes.map((o) => [o.config.table, o.status, o.buildState])).toEqual([
      ['flat', 'success', 'configured'],
      ['btree', 'success', 'configured'],
    ]);
    expect(report.outcomes[1].resultFiles).toEqual([
      join(workDir, 'results', 'results___int___int___btree___basic.json'),
      join(workDir, 'results', 'results___int___int___btree___heavy.json'),
    ]);
    expect(calls.map((call) => call.command.split('/').pop())).toEqual([
      'cmake',
      'make',
      'universal_benchmark',
      'universal_benchmark',
      'cmake',
      'make',
      'universal_benchmark',
      'universal_benchmark',
    ]);
    expect(campaignSucceeded(report)).toBe(true);
  });

  it('should reuse existing build directories', async () => {
    await mkdir(join(workDir, 'build___int___int___flat'));
    const { driver } = driverWith();

    const report = await runCampaign(planCampaign(catalog), driver);

    expect(report.outcomes.map((o) => o.buildState)).toEqual(['reused', 'configured']);
  });

  it('should keep going after a failing configuration', async () => {
    const { driver } = driverWith({
      exitCode: (call) => (call.command === 'make' && call.options.cwd.endsWith('flat') ? 2 : 0),
    });

    const report = await runCampaign(planCampaign(catalog), driver);

    expect(report.outcomes.map((o) => o.status)).toEqual(['build-error', 'success']);
    expect(report.outcomes[0].error).toBeInstanceOf(BuildError);
    expect(report.outcomes[0].buildState).toBe('configured');
    expect(report.outcomes[0].resultFiles).toEqual([]);
    expect(campaignSucceeded(report)).toBe(false);
  });

  it('should classify benchmark failures as run errors', async () => {
    const { driver } = driverWith({
      exitCode: (call) => (call.command.includes('___btree') && call.args.includes('100') ? 1 : 0),
    });

    const report = await runCampaign(planCampaign(catalog), driver);

    expect(report.outcomes.map((o) => o.status)).toEqual(['success', 'run-error']);
    expect(report.outcomes[1].error).toBeInstanceOf(BenchmarkRunError);
  });

  it('should leave the results of other configurations readable after a crashed run', async () => {
    const crashes = (call: { command: string }): boolean =>
      call.command.endsWith('universal_benchmark') && call.command.includes('___btree');
    const { driver } = driverWith({
      output: (call) => (crashes(call) ? 'Segmentation fault' : benchmarkOutputFor(call)),
      exitCode: (call) => (crashes(call) ? 139 : 0),
    });

    const report = await runCampaign(planCampaign(catalog, { argSpecs: ['basic'] }), driver);
    const records = await gatherAll(join(workDir, 'results'));

    expect(report.outcomes.map((o) => o.status)).toEqual(['success', 'run-error']);
    expect(records.map((record) => record.table)).toEqual(['flat']);
  });

  it('should skip remaining tasks after a failure when failing fast', async () => {
    const { driver, calls } = driverWith({ exitCode: (call) => (call.command === 'cmake' ? 1 : 0) });

    const report = await runCampaign(planCampaign(catalog), driver, { failFast: true });

    expect(report.outcomes.map((o) => o.status)).toEqual(['build-error', 'skipped']);
    expect(report.outcomes[1].durationMs).toBe(0);
    expect(calls).toHaveLength(1);
  });

  it('should force a rebuild of existing directories', async () => {
    await mkdir(join(workDir, 'build___int___int___flat'));
    const { driver } = driverWith();

    const report = await runCampaign(planCampaign(catalog), driver, { forceRebuild: true });

    expect(report.outcomes.map((o) => o.buildState)).toEqual(['configured', 'configured']);
  });

  it('should run in parallel and still report in task order', async () => {
    const { driver } = driverWith();

    const report = await runCampaign(planCampaign(catalog), driver, {
      strategy: { kind: 'parallel', concurrency: 2 },
    });

    expect(report.outcomes.map((o) => [o.config.table, o.status])).toEqual([
      ['flat', 'success'],
      ['btree', 'success'],
    ]);
  });

  it('should reject an invalid parallel concurrency', async () => {
    const { driver } = driverWith();

    await expect(
      runCampaign(planCampaign(catalog), driver, { strategy: { kind: 'parallel', concurrency: 0 } })
    ).rejects.toMatchObject({ code: 'INVALID_CONCURRENCY' });
  });

  it('should report nothing for an empty plan', async () => {
    const { driver } = driverWith();

    const report = await runCampaign([], driver);

    expect(report.outcomes).toEqual([]);
    expect(campaignSucceeded(report)).toBe(true);
  });
});

describe('summarizeCampaign', () => {
  it('should count outcomes by status', async () => {
    const workDir = await createTempDir();
    try {
      const { runner } = createFakeRunner({
        exitCode: (call) => (call.command === 'cmake' && call.options.cwd.endsWith('btree') ? 1 : 0),
      });
      const driver = new BuildDriver({
        catalog,
        settings: loadSettings({ workDir, sourceRoot: '/src/libcuckoo' }, {}),
        runner,
      });

      const report = await runCampaign(planCampaign(catalog), driver);

      expect(summarizeCampaign(report)).toEqual({
        total: 2,
        success: 1,
        'build-error': 1,
        'run-error': 0,
        skipped: 0,
      });
    } finally {
      await removeTempDir(workDir);
    }
  });
});
