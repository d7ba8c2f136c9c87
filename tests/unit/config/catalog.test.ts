import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  createCatalog,
  loadCatalog,
  resolveArgSpec,
  selectAxes,
} from '../../../src/config/catalog.js';
import { ConfigurationError } from '../../../src/errors/index.js';
import { createTempDir, removeTempDir, writeCatalog } from '../../utils/mocks.js';

describe('Axis Catalog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('loadCatalog', () => {
    it('should load all four axes in stored order', async () => {
      await writeCatalog(dir, {
        argSpecs: { basic: '--reps 10', heavy: '--reps 100 --warm 5' },
        keys: ['int', 'string'],
        values: ['int'],
        tables: ['flat', 'btree', 'cuckoo'],
      });

      const catalog = await loadCatalog(dir);

      expect(catalog.argSpecs).toEqual({ basic: '--reps 10', heavy: '--reps 100 --warm 5' });
      expect(catalog.keys).toEqual(['int', 'string']);
      expect(catalog.values).toEqual(['int']);
      expect(catalog.tables).toEqual(['flat', 'btree', 'cuckoo']);
    });

    it('should return a frozen catalog', async () => {
      await writeCatalog(dir);
      const catalog = await loadCatalog(dir);

      expect(Object.isFrozen(catalog)).toBe(true);
      expect(Object.isFrozen(catalog.argSpecs)).toBe(true);
      expect(Object.isFrozen(catalog.tables)).toBe(true);
    });

    it('should honour custom file names', async () => {
      await writeCatalog(dir);
      await writeFile(join(dir, 'small-tables.json'), JSON.stringify(['flat']));

      const catalog = await loadCatalog(dir, { tables: 'small-tables.json' });

      expect(catalog.tables).toEqual(['flat']);
    });

    it('should fail with CATALOG_NOT_FOUND when a file is missing', async () => {
      await writeCatalog(dir);
      const missing = join(dir, 'nested');

      await expect(loadCatalog(missing)).rejects.toMatchObject({
        name: 'ConfigurationError',
        code: 'CATALOG_NOT_FOUND',
      });
    });

    it('should reject invalid JSON', async () => {
      await writeCatalog(dir);
      await writeFile(join(dir, 'keys.json'), '["int",');

      await expect(loadCatalog(dir)).rejects.toMatchObject({ code: 'CATALOG_INVALID' });
    });

    it('should reject a non-array axis', async () => {
      await writeCatalog(dir);
      await writeFile(join(dir, 'values.json'), JSON.stringify({ int: true }));

      await expect(loadCatalog(dir)).rejects.toThrow(ConfigurationError);
    });

    it('should reject duplicate axis entries', async () => {
      await writeCatalog(dir, { tables: ['flat', 'flat'] });

      await expect(loadCatalog(dir)).rejects.toThrow('must not contain duplicates');
    });

    it('should reject empty type names', async () => {
      await writeCatalog(dir, { keys: [''] });

      await expect(loadCatalog(dir)).rejects.toThrow('must be a non-empty string');
    });

    it('should reject axis values containing the name delimiter', async () => {
      await writeCatalog(dir, { values: ['a___b', 'a'] });

      await expect(loadCatalog(dir)).rejects.toThrow(
        `Invalid catalog file ${join(dir, 'values.json')}: 0: must not contain "___"`
      );
    });

    it('should reject axis values that could merge with the delimiter', async () => {
      await writeCatalog(dir, { keys: ['int_'] });

      await expect(loadCatalog(dir)).rejects.toThrow('0: must not start or end with "_"');
    });

    it('should reject path separators in type names', async () => {
      await writeCatalog(dir, { tables: ['flat', '../btree'] });

      await expect(loadCatalog(dir)).rejects.toThrow('1: must not contain a path separator');
    });

    it('should reject argument spec names containing the name delimiter', async () => {
      await writeCatalog(dir, { argSpecs: { 'basic___x': '--reps 10' } });

      await expect(loadCatalog(dir)).rejects.toMatchObject({
        code: 'CATALOG_INVALID',
        message: `Invalid catalog file ${join(dir, 'arguments.json')}: basic___x: must not contain "___"`,
      });
    });

    it('should reject non-string command lines', async () => {
      await writeCatalog(dir);
      await writeFile(join(dir, 'arguments.json'), JSON.stringify({ basic: 10 }));

      await expect(loadCatalog(dir)).rejects.toMatchObject({ code: 'CATALOG_INVALID' });
    });
  });

  describe('resolveArgSpec', () => {
    const argSpecs = { basic: '--reps 10' };

    it('should return the stored command line', () => {
      expect(resolveArgSpec(argSpecs, 'basic')).toBe('--reps 10');
    });

    it('should reject unknown names', () => {
      expect(() => resolveArgSpec(argSpecs, 'missing')).toThrow(
        'Unknown argument spec: "missing". Known specs: basic'
      );
    });

    it('should not resolve inherited object properties', () => {
      expect(() => resolveArgSpec(argSpecs, 'toString')).toThrow(ConfigurationError);
    });
  });

  describe('selectAxes', () => {
    const catalog = createCatalog({
      argSpecs: { a: '--a 1', b: '--b 2', c: '--c 3' },
      keys: ['int', 'string'],
      values: ['int', 'big'],
      tables: ['flat', 'btree', 'cuckoo'],
    });

    it('should keep whole axes that are not selected', () => {
      expect(selectAxes(catalog, {})).toEqual(catalog);
    });

    it('should keep stored order regardless of selection order', () => {
      const narrowed = selectAxes(catalog, { tables: ['cuckoo', 'flat'], argSpecs: ['c', 'a'] });

      expect(narrowed.tables).toEqual(['flat', 'cuckoo']);
      expect(Object.keys(narrowed.argSpecs)).toEqual(['a', 'c']);
      expect(narrowed.keys).toEqual(['int', 'string']);
    });

    it('should reject unknown axis values', () => {
      expect(() => selectAxes(catalog, { keys: ['float'] })).toThrow(
        'Unknown key: "float". Valid keys: int, string'
      );
    });
  });
});
