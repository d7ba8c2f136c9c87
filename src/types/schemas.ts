/**
 * Zod schemas for runtime validation of catalog, result and campaign documents
 */

import { z } from 'zod';
import { nameComponentProblem } from '../matrix/build-configuration.js';

// ============================================
// Catalog Schemas
// ============================================

// Identifiers become components of build directory and result file names
const IdentifierSchema = z
  .string()
  .min(1, 'must be a non-empty string')
  .refine((s) => !/\s/.test(s), 'must not contain whitespace')
  .superRefine((s, ctx) => {
    const problem = s.length > 0 ? nameComponentProblem(s) : undefined;
    if (problem) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
    }
  });

export const ArgSpecMapSchema = z.record(IdentifierSchema, z.string());

export const AxisValuesSchema = z
  .array(IdentifierSchema)
  .refine((items) => new Set(items).size === items.length, 'must not contain duplicates');

// ============================================
// Result Schemas
// ============================================

export const StatOutputSchema = z.object({
  name: z.string(),
  units: z.string(),
  value: z.number(),
});

export const ResultRecordSchema = z.object({
  args: z.string(),
  key: z.string().min(1),
  value: z.string().min(1),
  table: z.string().min(1),
  output: z.record(z.string(), StatOutputSchema),
});

// ============================================
// Campaign File Schema
// ============================================

const NameListSchema = z.array(z.string().min(1)).min(1);

export const CampaignFileSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  argSpecs: NameListSchema.optional(),
  keys: NameListSchema.optional(),
  values: NameListSchema.optional(),
  tables: NameListSchema.optional(),
  forceRebuild: z.boolean().optional(),
  failFast: z.boolean().optional(),
  separateStderr: z.boolean().optional(),
  concurrency: z.number().int().positive().optional(),
});

export type CampaignFile = z.infer<typeof CampaignFileSchema>;

// ============================================
// Settings Schema
// ============================================

export const SettingsSchema = z.object({
  workDir: z.string().min(1),
  configDir: z.string().min(1),
  resultsDir: z.string().min(1),
  sourceRoot: z.string().min(1).optional(),
  cmakeCommand: z.string().min(1),
  makeCommand: z.string().min(1),
  concurrency: z.number().int().positive(),
  timeoutMs: z.number().int().nonnegative(),
  separateStderr: z.boolean(),
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Flatten a zod error into "path: message" lines
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}
