/**
 * Build/run orchestration over external processes
 */

export {
  BuildDriver,
  BENCHMARK_TARGET,
  BENCHMARK_BINARY_PATH,
  splitCommandLine,
  failedResultFileFor,
  type BuildDriverOptions,
} from './build-driver.js';
export {
  planCampaign,
  runCampaign,
  summarizeCampaign,
  campaignSucceeded,
  SEQUENTIAL,
  type CampaignTask,
  type TaskOutcome,
  type CampaignOptions,
  type CampaignReport,
  type CampaignSummary,
} from './campaign.js';
export {
  runCommand,
  formatCommand,
  stderrFileFor,
  type CommandRunner,
  type CommandOptions,
  type CommandResult,
} from './process.js';
