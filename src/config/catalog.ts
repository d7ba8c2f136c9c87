/**
 * Axis Catalog Loader
 *
 * Loads the four catalog documents (argument specs, keys, values, tables)
 * from a directory and exposes them as one frozen lookup.
 */

import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { ArgSpecMapSchema, AxisValuesSchema, formatZodIssues } from '../types/schemas.js';
import type { ArgSpecMap, AxisCatalog, AxisSelection, CatalogFiles } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Catalog');

export const DEFAULT_CATALOG_FILES: CatalogFiles = {
  argSpecs: 'arguments.json',
  keys: 'keys.json',
  values: 'values.json',
  tables: 'tables.json',
};

async function readDocument<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.infer<S>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Catalog file not readable: ${path}`, {
      code: 'CATALOG_NOT_FOUND',
      cause: error instanceof Error ? error : undefined,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Catalog file is not valid JSON: ${path}`, {
      code: 'CATALOG_INVALID',
      cause: error instanceof Error ? error : undefined,
    });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid catalog file ${path}: ${formatZodIssues(parsed.error)}`, {
      code: 'CATALOG_INVALID',
    });
  }
  return parsed.data;
}

/**
 * Freeze the axes so the catalog cannot change for the process lifetime
 */
export function createCatalog(parts: {
  argSpecs: Record<string, string>;
  keys: readonly string[];
  values: readonly string[];
  tables: readonly string[];
}): AxisCatalog {
  return Object.freeze({
    argSpecs: Object.freeze({ ...parts.argSpecs }),
    keys: Object.freeze([...parts.keys]),
    values: Object.freeze([...parts.values]),
    tables: Object.freeze([...parts.tables]),
  });
}

/**
 * Load all four catalog documents from `dir`
 *
 * @throws ConfigurationError if any file is missing, not JSON, or malformed
 */
export async function loadCatalog(
  dir: string,
  files: Partial<CatalogFiles> = {}
): Promise<AxisCatalog> {
  const names: CatalogFiles = { ...DEFAULT_CATALOG_FILES, ...files };
  const root = resolve(dir);

  const [argSpecs, keys, values, tables] = await Promise.all([
    readDocument(join(root, names.argSpecs), ArgSpecMapSchema),
    readDocument(join(root, names.keys), AxisValuesSchema),
    readDocument(join(root, names.values), AxisValuesSchema),
    readDocument(join(root, names.tables), AxisValuesSchema),
  ]);

  logger.debug(
    {
      dir: root,
      argSpecs: Object.keys(argSpecs).length,
      keys: keys.length,
      values: values.length,
      tables: tables.length,
    },
    'Catalog loaded'
  );

  return createCatalog({ argSpecs, keys, values, tables });
}

/**
 * Look up the command line stored for an argument spec name
 *
 * @throws ConfigurationError if the name is not in the catalog
 */
export function resolveArgSpec(argSpecs: ArgSpecMap, name: string): string {
  if (!Object.prototype.hasOwnProperty.call(argSpecs, name)) {
    const known = Object.keys(argSpecs).join(', ') || '(none)';
    throw new ConfigurationError(`Unknown argument spec: "${name}". Known specs: ${known}`, {
      code: 'UNKNOWN_ARG_SPEC',
    });
  }
  return argSpecs[name];
}

function selectFrom(axis: string, available: readonly string[], wanted?: readonly string[]): string[] {
  if (!wanted) return [...available];

  for (const name of wanted) {
    if (!available.includes(name)) {
      throw new ConfigurationError(
        `Unknown ${axis}: "${name}". Valid ${axis}s: ${available.join(', ')}`,
        { code: 'UNKNOWN_AXIS_VALUE' }
      );
    }
  }
  return available.filter((name) => wanted.includes(name));
}

/**
 * Narrow the catalog to a subset of each axis, keeping stored order
 */
export function selectAxes(catalog: AxisCatalog, selection: AxisSelection): AxisCatalog {
  const argSpecNames = selectFrom('argument spec', Object.keys(catalog.argSpecs), selection.argSpecs);
  const argSpecs: Record<string, string> = {};
  for (const name of argSpecNames) {
    argSpecs[name] = catalog.argSpecs[name];
  }

  return createCatalog({
    argSpecs,
    keys: selectFrom('key', catalog.keys, selection.keys),
    values: selectFrom('value', catalog.values, selection.values),
    tables: selectFrom('table', catalog.tables, selection.tables),
  });
}
