/**
 * Result Gatherer
 *
 * Loads every result file from the results directory. Files are read in
 * file-name order so repeated gathers see records in the same order.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ResultParseError } from '../errors/index.js';
import { RESULT_FILE_EXTENSION } from '../matrix/build-configuration.js';
import { ResultRecordSchema, formatZodIssues } from '../types/schemas.js';
import type { ResultRecord } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ResultGatherer');

function isMissingDirectory(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Absolute paths of the `*.json` files in `resultsDir`, sorted by name.
 * A missing directory has no result files.
 */
export async function listResultFiles(resultsDir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(resultsDir);
  } catch (error) {
    if (isMissingDirectory(error)) {
      logger.debug({ resultsDir }, 'Results directory does not exist');
      return [];
    }
    throw error;
  }

  return names
    .filter((name) => name.endsWith(RESULT_FILE_EXTENSION))
    .sort()
    .map((name) => join(resultsDir, name));
}

/**
 * Parse one result document
 *
 * @throws ResultParseError if the text is not JSON or not a result record
 */
export function parseResultRecord(content: string, file: string): ResultRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ResultParseError(`Result file is not valid JSON: ${file}`, {
      file,
      code: 'RESULT_INVALID_JSON',
      cause: error instanceof Error ? error : undefined,
    });
  }

  const parsed = ResultRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ResultParseError(`Malformed result file ${file}: ${formatZodIssues(parsed.error)}`, {
      file,
      code: 'RESULT_INVALID_SHAPE',
    });
  }
  return parsed.data;
}

export async function loadResultFile(file: string): Promise<ResultRecord> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (error) {
    throw new ResultParseError(`Result file not readable: ${file}`, {
      file,
      code: 'RESULT_UNREADABLE',
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseResultRecord(content, file);
}

/**
 * Load every result in the directory. One bad file fails the whole gather.
 */
export async function gatherAll(resultsDir: string): Promise<ResultRecord[]> {
  const files = await listResultFiles(resultsDir);
  const records: ResultRecord[] = [];

  for (const file of files) {
    records.push(await loadResultFile(file));
  }

  logger.info({ resultsDir, count: records.length }, 'Results gathered');
  return records;
}
