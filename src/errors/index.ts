/**
 * Custom Error classes for bench-matrix
 */

export interface ErrorOptions {
  code: string;
  retryable?: boolean;
  cause?: Error;
}

/**
 * Base error class for all bench-matrix errors
 *
 * @param message - Human-readable description
 * @param options - Machine-readable `code`, optional `retryable` flag and underlying `cause`
 *
 * @example
 * throw new BenchMatrixError('Catalog directory is empty', { code: 'EMPTY_CATALOG' });
 */
export class BenchMatrixError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;
  public override readonly cause?: Error;

  constructor(message: string, options: ErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.cause = options.cause;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retryable: this.retryable,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

type DefaultedOptions = Omit<ErrorOptions, 'code'> & Partial<Pick<ErrorOptions, 'code'>>;

/**
 * Catalog, settings or campaign file could not be loaded or is inconsistent
 *
 * @param message - Human-readable description
 * @param options - `code` defaults to CONFIGURATION_ERROR
 *
 * @example
 * throw new ConfigurationError('Unknown key: "float"', { code: 'UNKNOWN_AXIS_VALUE' });
 */
export class ConfigurationError extends BenchMatrixError {
  constructor(message: string, options: DefaultedOptions = {}) {
    super(message, {
      code: options.code ?? 'CONFIGURATION_ERROR',
      retryable: options.retryable ?? false,
      cause: options.cause,
    });
  }
}

export interface ProcessErrorOptions extends DefaultedOptions {
  /** Full command line that failed */
  command: string;
  /** Exit code, or null when the process was killed by a signal */
  exitCode: number | null;
}

/**
 * Base for failures of an external process (cmake, make, the benchmark binary)
 */
export abstract class ProcessError extends BenchMatrixError {
  public readonly command: string;
  public readonly exitCode: number | null;

  protected constructor(message: string, defaultCode: string, options: ProcessErrorOptions) {
    super(message, {
      code: options.code ?? defaultCode,
      retryable: options.retryable ?? false,
      cause: options.cause,
    });
    this.command = options.command;
    this.exitCode = options.exitCode;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      command: this.command,
      exitCode: this.exitCode,
    };
  }
}

/**
 * Configure or compile step exited non-zero
 *
 * @param message - Human-readable description naming the command
 * @param options - Failed `command` line and its `exitCode`; `code` defaults to BUILD_ERROR
 *
 * @example
 * throw new BuildError('Command exited with code 2: make universal_benchmark', {
 *   code: 'COMPILE_FAILED',
 *   command: 'make universal_benchmark',
 *   exitCode: 2,
 * });
 */
export class BuildError extends ProcessError {
  constructor(message: string, options: ProcessErrorOptions) {
    super(message, 'BUILD_ERROR', options);
  }
}

/**
 * Benchmark binary exited non-zero
 *
 * @param message - Human-readable description naming the command
 * @param options - Failed `command` line and its `exitCode`; `code` defaults to BENCHMARK_RUN_ERROR
 */
export class BenchmarkRunError extends ProcessError {
  constructor(message: string, options: ProcessErrorOptions) {
    super(message, 'BENCHMARK_RUN_ERROR', options);
  }
}

/**
 * Result file is unreadable, not JSON, or not shaped like a result record
 *
 * @param message - Human-readable description
 * @param options - Offending `file`; `code` defaults to RESULT_PARSE_ERROR
 */
export class ResultParseError extends BenchMatrixError {
  public readonly file: string;

  constructor(message: string, options: DefaultedOptions & { file: string }) {
    super(message, {
      code: options.code ?? 'RESULT_PARSE_ERROR',
      retryable: options.retryable ?? false,
      cause: options.cause,
    });
    this.file = options.file;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), file: this.file };
  }
}

/**
 * A matched result does not carry the requested statistic
 *
 * @param message - Human-readable description
 * @param options - Missing `statName`; `code` defaults to STAT_LOOKUP_ERROR
 */
export class StatLookupError extends BenchMatrixError {
  public readonly statName: string;

  constructor(message: string, options: DefaultedOptions & { statName: string }) {
    super(message, {
      code: options.code ?? 'STAT_LOOKUP_ERROR',
      retryable: options.retryable ?? false,
      cause: options.cause,
    });
    this.statName = options.statName;
  }
}

/**
 * Argument line cannot be split into flag/value pairs
 *
 * @param message - Human-readable description
 * @param options - `code` defaults to ARG_SPEC_ERROR
 */
export class ArgSpecError extends BenchMatrixError {
  constructor(message: string, options: DefaultedOptions = {}) {
    super(message, {
      code: options.code ?? 'ARG_SPEC_ERROR',
      retryable: options.retryable ?? false,
      cause: options.cause,
    });
  }
}

/**
 * Render any thrown value as a one-line message
 */
export function describeError(error: unknown): string {
  if (error instanceof BenchMatrixError) {
    return `[${error.code}] ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
