/**
 * Core type definitions for bench-matrix
 */

// ============================================
// Catalog Types
// ============================================

/**
 * Named command lines passed to the benchmark binary, e.g.
 * `{ "read-heavy": "--reads 90 --inserts 10" }`
 */
export type ArgSpecMap = Readonly<Record<string, string>>;

/**
 * The four independent axes of the benchmark matrix.
 * Loaded once and frozen; axis order is the order stored on disk.
 */
export interface AxisCatalog {
  readonly argSpecs: ArgSpecMap;
  readonly keys: readonly string[];
  readonly values: readonly string[];
  readonly tables: readonly string[];
}

/**
 * Subset of each axis to keep. An omitted axis is kept whole.
 */
export interface AxisSelection {
  argSpecs?: readonly string[];
  keys?: readonly string[];
  values?: readonly string[];
  tables?: readonly string[];
}

/**
 * File names of the four catalog documents inside the catalog directory
 */
export interface CatalogFiles {
  argSpecs: string;
  keys: string;
  values: string;
  tables: string;
}

// ============================================
// Result Types
// ============================================

export interface StatOutput {
  name: string;
  units: string;
  value: number;
}

/**
 * One benchmark run as written by the benchmark binary
 */
export interface ResultRecord {
  /** Command line the benchmark was invoked with, as it reports it */
  args: string;
  key: string;
  value: string;
  table: string;
  output: Record<string, StatOutput>;
}

/**
 * Statistic across table types for one (argSpec, key, value) query.
 * `xs[i]` and `ys[i]` come from the same result.
 */
export interface StatSeries {
  x_axis: 'Table Type';
  xs: string[];
  ys: number[];
  y_axis: string;
}

/**
 * How a query's argument spec is compared against a result's recorded args
 * - SUBSET: every flag/value pair of the query appears in the result
 * - EXACT: the whitespace-normalized command lines are identical
 */
export type MatchStrategy = 'SUBSET' | 'EXACT';

export interface StatQuery {
  argSpecName: string;
  key: string;
  value: string;
}

// ============================================
// Campaign Types
// ============================================

export type ExecutionStrategy =
  | { kind: 'sequential' }
  | { kind: 'parallel'; concurrency: number };

export type TaskStatus = 'success' | 'build-error' | 'run-error' | 'skipped';

/**
 * Outcome of the configure step for one configuration
 */
export type BuildState = 'reused' | 'configured';
