/**
 * Structured logging using Pino
 *
 * Logs go to stderr so that command output on stdout (series JSON, tables)
 * stays machine-readable.
 */

import pino from 'pino';
import { createRequire } from 'module';

const require = createRequire(import.meta.url);

const STDERR_FD = 2;

/**
 * Pretty output only for interactive use
 */
function shouldUsePrettyPrint(): boolean {
  const env = process.env.NODE_ENV || '';
  return env !== 'production' && env !== 'test' && !process.env.CI && process.stderr.isTTY === true;
}

/**
 * pino-pretty is a dev dependency and may be absent from an installed package
 */
function isPinoPrettyAvailable(): boolean {
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  return env.NODE_ENV === 'test' ? 'silent' : 'info';
}

function createRootLogger(): pino.Logger {
  const options: pino.LoggerOptions = {
    level: resolveLogLevel(),
    base: { service: 'bench-matrix' },
  };

  if (shouldUsePrettyPrint() && isPinoPrettyAvailable()) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: STDERR_FD,
        },
      },
    });
  }

  return pino(options, pino.destination(STDERR_FD));
}

/**
 * Main logger instance
 */
export const logger = createRootLogger();

/**
 * Create a child logger with specific context
 *
 * @example
 * const log = createLogger('BuildDriver');
 * log.info({ buildDir }, 'Configuring build directory');
 */
export function createLogger(context: string): pino.Logger {
  return logger.child({ context });
}
