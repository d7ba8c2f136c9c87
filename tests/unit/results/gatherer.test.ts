import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  gatherAll,
  listResultFiles,
  loadResultFile,
  parseResultRecord,
} from '../../../src/results/gatherer.js';
import { ResultParseError } from '../../../src/errors/index.js';
import {
  createResultRecord,
  createTempDir,
  removeTempDir,
  writeResultFile,
} from '../../utils/mocks.js';

describe('Result Gatherer', () => {
  let dir: string;
  let resultsDir: string;

  beforeEach(async () => {
    dir = await createTempDir();
    resultsDir = join(dir, 'results');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('listResultFiles', () => {
    it('should list json files sorted by name', async () => {
      await writeResultFile(resultsDir, 'results___int___int___flat___basic.json', createResultRecord());
      await writeResultFile(resultsDir, 'results___int___int___btree___basic.json', createResultRecord());
      await writeFile(join(resultsDir, 'results___int___int___flat___basic.json.stderr.log'), 'warning');
      await mkdir(join(resultsDir, 'archive'));

      expect(await listResultFiles(resultsDir)).toEqual([
        join(resultsDir, 'results___int___int___btree___basic.json'),
        join(resultsDir, 'results___int___int___flat___basic.json'),
      ]);
    });

    it('should treat a missing directory as empty', async () => {
      expect(await listResultFiles(join(dir, 'nowhere'))).toEqual([]);
    });
  });

  describe('parseResultRecord', () => {
    it('should parse a well-formed record', () => {
      const record = createResultRecord({ table: 'btree' });

      expect(parseResultRecord(JSON.stringify(record), 'r.json')).toEqual(record);
    });

    it('should reject text that is not JSON', () => {
      try {
        parseResultRecord('Segmentation fault (core dumped)', '/results/r.json');
        expect.unreachable('parseResultRecord should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ResultParseError);
        expect(error).toMatchObject({
          code: 'RESULT_INVALID_JSON',
          file: '/results/r.json',
          message: 'Result file is not valid JSON: /results/r.json',
        });
      }
    });

    it('should reject records missing required fields', () => {
      expect(() => parseResultRecord(JSON.stringify({ args: '', key: 'int', value: 'int', output: {} }), 'r.json')).toThrow(
        'Malformed result file r.json: table: Required'
      );
    });

    it('should reject statistics without a numeric value', () => {
      const bad = { ...createResultRecord(), output: { time: { name: 'Time', units: 'ns', value: '5' } } };

      expect(() => parseResultRecord(JSON.stringify(bad), 'r.json')).toThrow(
        expect.objectContaining({ code: 'RESULT_INVALID_SHAPE' })
      );
    });
  });

  describe('loadResultFile', () => {
    it('should report unreadable files', async () => {
      const file = join(resultsDir, 'missing.json');

      await expect(loadResultFile(file)).rejects.toMatchObject({
        code: 'RESULT_UNREADABLE',
        file,
      });
    });
  });

  describe('gatherAll', () => {
    it('should load every record in file-name order', async () => {
      const flat = createResultRecord({ table: 'flat' });
      const btree = createResultRecord({ table: 'btree' });
      await writeResultFile(resultsDir, 'b.json', flat);
      await writeResultFile(resultsDir, 'a.json', btree);

      expect(await gatherAll(resultsDir)).toEqual([btree, flat]);
    });

    it('should return no records for a missing directory', async () => {
      expect(await gatherAll(resultsDir)).toEqual([]);
    });

    it('should fail on the first malformed file', async () => {
      await writeResultFile(resultsDir, 'a.json', createResultRecord());
      await writeFile(join(resultsDir, 'b.json'), '{"args": ');

      await expect(gatherAll(resultsDir)).rejects.toMatchObject({
        code: 'RESULT_INVALID_JSON',
        file: join(resultsDir, 'b.json'),
      });
    });
  });
});
