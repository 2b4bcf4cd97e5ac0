/**
 * Stats Storage Unit Tests
 *
 * JSON and LevelDB stores run against a fresh temporary directory per test
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  JsonFileStatsStorage,
  LevelStatsStorage,
  MemoryStatsStorage,
  STATS_FILE_VERSION,
  isSnrRecord,
  parseSnrRecords,
} from '../../src/stats-storage.js';
import { PersistenceError } from '../../src/errors.js';
import type { SnrRecord } from '../../src/types.js';

const yangRecord: SnrRecord = {
  minSnr: -3,
  maxSnr: 9.5,
  sum: 13.5,
  count: 3,
  firstSeen: 1000,
  lastSeen: 5000,
  recent: [7, -3, 9.5],
};

describe('isSnrRecord', () => {
  test('should accept a well-formed record', () => {
    expect(isSnrRecord(yangRecord)).toBe(true);
  });

  test.each([
    ['a zero count', { ...yangRecord, count: 0 }],
    ['a fractional count', { ...yangRecord, count: 1.5 }],
    ['min above max', { ...yangRecord, minSnr: 10 }],
    ['a non-numeric recent value', { ...yangRecord, recent: [1, '2'] }],
    ['a missing field', { ...yangRecord, lastSeen: undefined }],
    ['an array', [yangRecord]],
  ])('should reject %s', (_label, value) => {
    expect(isSnrRecord(value)).toBe(false);
  });
});

describe('parseSnrRecords', () => {
  test('should keep valid records and skip the rest', () => {
    const records = parseSnrRecords(
      { yang: yangRecord, ying: { count: 'many' } },
      'test'
    );

    expect(Object.keys(records)).toEqual(['yang']);
  });

  test('should trim the recent window to its capacity', () => {
    const records = parseSnrRecords(
      {
        yang: {
          ...yangRecord,
          recent: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12],
        },
      },
      'test'
    );

    expect(records.yang.recent).toEqual([3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
  });

  test('should fail on a non-object payload', () => {
    expect(() => parseSnrRecords([1, 2], 'test')).toThrow(PersistenceError);
  });
});

describe('JsonFileStatsStorage', () => {
  let directory: string;
  let filePath: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(join(tmpdir(), 'meshack-stats-'));
    filePath = join(directory, 'nested', 'snr_stats.json');
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  test('should load a missing file as empty', async () => {
    const storage = new JsonFileStatsStorage(filePath);

    await expect(storage.load()).resolves.toEqual({});
    expect(storage.description).toBe(filePath);
  });

  test('should round-trip records', async () => {
    const storage = new JsonFileStatsStorage(filePath);

    await storage.save({ yang: yangRecord });

    await expect(storage.load()).resolves.toEqual({ yang: yangRecord });
  });

  test('should write a versioned document and no temporary file', async () => {
    const storage = new JsonFileStatsStorage(filePath);

    await storage.save({ yang: yangRecord });

    const document: unknown = JSON.parse(await fs.readFile(filePath, 'utf8'));
    expect(document).toMatchObject({
      version: STATS_FILE_VERSION,
      nodes: { yang: yangRecord },
    });
    await expect(fs.readdir(join(directory, 'nested'))).resolves.toEqual([
      'snr_stats.json',
    ]);
  });

  test('should reject a file that is not JSON', async () => {
    await fs.mkdir(join(directory, 'nested'));
    await fs.writeFile(filePath, '{not json', 'utf8');
    const storage = new JsonFileStatsStorage(filePath);

    await expect(storage.load()).rejects.toThrow(PersistenceError);
  });

  test('should reject a document without nodes', async () => {
    await fs.mkdir(join(directory, 'nested'));
    await fs.writeFile(filePath, JSON.stringify({ version: 1 }), 'utf8');
    const storage = new JsonFileStatsStorage(filePath);

    await expect(storage.load()).rejects.toThrow(
      'Stats payload is not an object'
    );
  });

  test('should report an unreadable location', async () => {
    const storage = new JsonFileStatsStorage(directory);

    await expect(storage.load()).rejects.toThrow('Cannot read stats file');
  });
});

describe('LevelStatsStorage', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(join(tmpdir(), 'meshack-level-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  test('should round-trip records and drop removed nodes', async () => {
    const storage = new LevelStatsStorage(join(directory, 'db'));
    const yingRecord: SnrRecord = { ...yangRecord, recent: [-3] };

    await storage.save({ yang: yangRecord, ying: yingRecord });
    await storage.save({ ying: yingRecord });
    const loaded = await storage.load();
    await storage.close();

    expect(loaded).toEqual({ ying: yingRecord });
  });

  test('should load an empty database as empty', async () => {
    const storage = new LevelStatsStorage(join(directory, 'db'));

    const loaded = await storage.load();
    await storage.close();

    expect(loaded).toEqual({});
  });
});

describe('MemoryStatsStorage', () => {
  test('should copy records on save and load', async () => {
    const storage = new MemoryStatsStorage();
    const record: SnrRecord = { ...yangRecord, recent: [...yangRecord.recent] };

    await storage.save({ yang: record });
    record.recent.push(1);
    const loaded = await storage.load();
    loaded.yang.count = 99;

    expect(storage.peek()).toEqual({ yang: yangRecord });
    expect(storage.saveCount).toBe(1);
  });

  test('should start from the initial records', async () => {
    const storage = new MemoryStatsStorage({ yang: yangRecord });

    await expect(storage.load()).resolves.toEqual({ yang: yangRecord });
    expect(new MemoryStatsStorage().peek()).toBeUndefined();
  });
});
