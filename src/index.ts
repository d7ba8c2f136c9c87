/**
 * bench-matrix
 *
 * Build-configuration matrix and result matching for the universal hash
 * table benchmark. The CLI lives in ./cli/index.ts; this module is the
 * programmatic entry point.
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './config/index.js';
export * from './matrix/index.js';
export * from './driver/index.js';
export * from './results/index.js';
export { ResultRecordSchema, CampaignFileSchema, SettingsSchema } from './types/schemas.js';
export { logger, createLogger, ConcurrencyLimiter } from './utils/index.js';
