/**
 * Result gathering and matching
 */

export { gatherAll, listResultFiles, loadResultFile, parseResultRecord } from './gatherer.js';
export {
  MATCH_STRATEGIES,
  X_AXIS_LABEL,
  buildFlagSet,
  compileArgsMatcher,
  isSubsetOf,
  matchRecords,
  matchStat,
  tableSeries,
  tokenizeArgs,
  type FlagSet,
  type MatchOptions,
} from './matcher.js';
export { formatSeriesTable } from './report.js';
