/**
 * Utility functions and helpers
 */

export { logger, createLogger, resolveLogLevel } from './logger.js';

export { ConcurrencyLimiter, type ConcurrencyLimiterOptions } from './concurrency.js';

export {
  getEnvWithDefault,
  getEnvOptional,
  getEnvBoolean,
  getEnvNumber,
} from './env.js';
