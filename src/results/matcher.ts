/**
 * Result Matcher
 *
 * Answers "for argument spec A, key K and value V, what is statistic S for
 * each table type?" against a pool of gathered result records.
 *
 * A record's recorded command line is compared with the query's argument spec
 * under one of two strategies:
 * - SUBSET: every `flag value` pair of the query appears in the record. The
 *   record may carry extra flags, so one broad run answers narrower queries.
 * - EXACT: both command lines hold the same tokens in the same order.
 */

import { resolveArgSpec } from '../config/catalog.js';
import { ArgSpecError, StatLookupError } from '../errors/index.js';
import type {
  ArgSpecMap,
  MatchStrategy,
  ResultRecord,
  StatQuery,
  StatSeries,
} from '../types/index.js';

export const MATCH_STRATEGIES: readonly MatchStrategy[] = ['SUBSET', 'EXACT'];

export const X_AXIS_LABEL = 'Table Type';

/** Joins flag and value into one set member; cannot occur inside a token */
const PAIR_SEPARATOR = ' ';

export type FlagSet = ReadonlySet<string>;

export interface MatchOptions {
  strategy?: MatchStrategy;
}

export function tokenizeArgs(argsLine: string): string[] {
  return argsLine.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Pair consecutive tokens into `flag value` pairs
 *
 * @throws ArgSpecError if a flag has no value (odd token count)
 */
export function buildFlagSet(argsLine: string): FlagSet {
  const tokens = tokenizeArgs(argsLine);
  if (tokens.length % 2 !== 0) {
    throw new ArgSpecError(
      `Argument line has an unpaired trailing token "${tokens[tokens.length - 1]}": "${argsLine}"`,
      { code: 'UNPAIRED_FLAG' }
    );
  }

  const pairs = new Set<string>();
  for (let i = 0; i < tokens.length; i += 2) {
    pairs.add(`${tokens[i]}${PAIR_SEPARATOR}${tokens[i + 1]}`);
  }
  return pairs;
}

export function isSubsetOf(subset: FlagSet, superset: FlagSet): boolean {
  for (const pair of subset) {
    if (!superset.has(pair)) return false;
  }
  return true;
}

type ArgsPredicate = (recordArgs: string) => boolean;

/**
 * Build the predicate that tests a record's args against a query command line
 */
export function compileArgsMatcher(queryArgs: string, strategy: MatchStrategy = 'SUBSET'): ArgsPredicate {
  switch (strategy) {
    case 'SUBSET': {
      const queryFlags = buildFlagSet(queryArgs);
      return (recordArgs) => isSubsetOf(queryFlags, buildFlagSet(recordArgs));
    }
    case 'EXACT': {
      const normalized = tokenizeArgs(queryArgs).join(' ');
      return (recordArgs) => tokenizeArgs(recordArgs).join(' ') === normalized;
    }
  }
}

function compareTables(a: ResultRecord, b: ResultRecord): number {
  if (a.table < b.table) return -1;
  if (a.table > b.table) return 1;
  return 0;
}

/**
 * Records relevant to a query, sorted by table name (ties keep load order)
 *
 * @throws ConfigurationError if the argument spec is unknown
 * @throws ArgSpecError if a command line cannot be paired
 */
export function matchRecords(
  records: readonly ResultRecord[],
  argSpecs: ArgSpecMap,
  query: StatQuery,
  options: MatchOptions = {}
): ResultRecord[] {
  const matchesArgs = compileArgsMatcher(resolveArgSpec(argSpecs, query.argSpecName), options.strategy);

  return records
    .filter((record) => record.key === query.key && record.value === query.value && matchesArgs(record.args))
    .sort(compareTables);
}

function emptySeries(): StatSeries {
  return { x_axis: X_AXIS_LABEL, xs: [], ys: [], y_axis: '' };
}

function appendStat(series: StatSeries, record: ResultRecord, statName: string): void {
  if (!Object.prototype.hasOwnProperty.call(record.output, statName)) {
    const available = Object.keys(record.output).join(', ') || '(none)';
    throw new StatLookupError(
      `Statistic "${statName}" not found in result for table "${record.table}" ` +
        `(key=${record.key}, value=${record.value}, args="${record.args}"). Available: ${available}`,
      { code: 'STAT_NOT_FOUND', statName }
    );
  }

  const stat = record.output[statName];
  series.xs.push(record.table);
  series.ys.push(stat.value);
  series.y_axis = `${stat.name} (${stat.units})`;
}

/**
 * One statistic across all table types for (argSpec, key, value)
 *
 * @throws StatLookupError if a matched record lacks `statName`
 */
export function matchStat(
  records: readonly ResultRecord[],
  argSpecs: ArgSpecMap,
  argSpecName: string,
  key: string,
  value: string,
  statName: string,
  options: MatchOptions = {}
): StatSeries {
  const series = emptySeries();
  for (const record of matchRecords(records, argSpecs, { argSpecName, key, value }, options)) {
    appendStat(series, record, statName);
  }
  return series;
}

/**
 * Several statistics for the same query, matching once
 */
export function tableSeries(
  records: readonly ResultRecord[],
  argSpecs: ArgSpecMap,
  query: StatQuery,
  statNames: readonly string[],
  options: MatchOptions = {}
): Record<string, StatSeries> {
  const matches = matchRecords(records, argSpecs, query, options);
  const result: Record<string, StatSeries> = {};

  for (const statName of statNames) {
    const series = emptySeries();
    for (const record of matches) {
      appendStat(series, record, statName);
    }
    result[statName] = series;
  }
  return result;
}
