/**
 * Build Configuration
 *
 * A (key, value, table) triple that identifies one build of the universal
 * benchmark, plus the names derived from it. Names are pure functions of the
 * triple so repeated campaigns reuse or overwrite the same artifacts.
 */

import { ConfigurationError } from '../errors/index.js';

/** Delimiter between name components in directory and file names */
export const NAME_DELIMITER = '___';

export const BUILD_DIR_PREFIX = 'build';
export const RESULT_FILE_PREFIX = 'results';
export const RESULT_FILE_EXTENSION = '.json';

export const UNIVERSAL_BENCHMARK_FLAG = '-DBUILD_UNIVERSAL_BENCHMARK=1';

/**
 * Why `content` cannot be one component of a derived name, or undefined if it can.
 *
 * Components never contain the delimiter and never start or end with its
 * character, so every delimiter in a joined name is a run of exactly three
 * underscores and distinct inputs never produce the same directory or file name.
 *
 * @param content - Candidate name component
 */
export function nameComponentProblem(content: string): string | undefined {
  if (content.length === 0) return 'must be non-empty';
  if (content.includes(NAME_DELIMITER)) return `must not contain "${NAME_DELIMITER}"`;
  if (content.startsWith('_') || content.endsWith('_')) return 'must not start or end with "_"';
  if (/[/\\]/.test(content)) return 'must not contain a path separator';
  return undefined;
}

/**
 * @param field - What the value is, for the error message
 * @param content - Candidate name component
 * @throws ConfigurationError if `content` cannot be a name component
 */
function assertNameComponent(field: string, content: string): void {
  const problem = nameComponentProblem(content);
  if (problem) {
    throw new ConfigurationError(`BuildConfiguration ${field} ${problem}: "${content}"`, {
      code: 'INVALID_CONFIGURATION',
    });
  }
}

export class BuildConfiguration {
  readonly key: string;
  readonly value: string;
  readonly table: string;

  constructor(key: string, value: string, table: string) {
    assertNameComponent('key', key);
    assertNameComponent('value', value);
    assertNameComponent('table', table);

    this.key = key;
    this.value = value;
    this.table = table;
    Object.freeze(this);
  }

  /** `{key}___{value}___{table}`; identical for structurally equal configurations */
  get id(): string {
    return [this.key, this.value, this.table].join(NAME_DELIMITER);
  }

  /**
   * Build directory unique to this configuration, relative to the work directory
   */
  buildDir(): string {
    return [BUILD_DIR_PREFIX, this.key, this.value, this.table].join(NAME_DELIMITER);
  }

  /**
   * Result file name for one argument spec, relative to the results directory
   */
  resultFile(argSpec: string): string {
    assertNameComponent('argument spec', argSpec);
    return (
      [RESULT_FILE_PREFIX, this.key, this.value, this.table, argSpec].join(NAME_DELIMITER) +
      RESULT_FILE_EXTENSION
    );
  }

  /**
   * CMake defines selecting the universal benchmark and this triple
   */
  buildToolParams(): string[] {
    return [
      UNIVERSAL_BENCHMARK_FLAG,
      `-DUNIVERSAL_KEY=${this.key}`,
      `-DUNIVERSAL_VALUE=${this.value}`,
      `-DUNIVERSAL_TABLE=${this.table}`,
    ];
  }

  equals(other: BuildConfiguration): boolean {
    return this.key === other.key && this.value === other.value && this.table === other.table;
  }

  toString(): string {
    return `BuildConfiguration("${this.key}", "${this.value}", "${this.table}")`;
  }

  toJSON(): { key: string; value: string; table: string } {
    return { key: this.key, value: this.value, table: this.table };
  }
}
