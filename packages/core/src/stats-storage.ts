/**
 * Durable storage for per-node SNR statistics
 *
 * - JsonFileStatsStorage: a single JSON file keyed by node name, written to a
 *   temporary file and renamed into place
 * - LevelStatsStorage: LevelDB, one msgpack-encoded record per node
 * - MemoryStatsStorage: in-process, for tests and hosts without a disk
 *
 * A store that does not exist yet loads as empty.
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import { Level } from 'level';
import { encode, decode } from '@msgpack/msgpack';
import {
  Logger,
  errorMessage,
  isFiniteNumber,
  isRecord,
} from '@meshack/shared';
import type { SnrRecord, SnrRecordMap, SnrStatsStorage } from './types.js';
import { PersistenceError } from './errors.js';

export const RECENT_SAMPLE_CAPACITY = 10;
export const STATS_FILE_VERSION = 1;

const SNR_SUBLEVEL = 'snr_stats';

export function isSnrRecord(value: unknown): value is SnrRecord {
  if (!isRecord(value)) {
    return false;
  }
  const { minSnr, maxSnr, sum, count, firstSeen, lastSeen, recent } = value;
  return (
    isFiniteNumber(minSnr) &&
    isFiniteNumber(maxSnr) &&
    isFiniteNumber(sum) &&
    isFiniteNumber(count) &&
    Number.isInteger(count) &&
    count > 0 &&
    minSnr <= maxSnr &&
    isFiniteNumber(firstSeen) &&
    isFiniteNumber(lastSeen) &&
    Array.isArray(recent) &&
    recent.every(isFiniteNumber)
  );
}

export function cloneSnrRecord(record: SnrRecord): SnrRecord {
  return {
    minSnr: record.minSnr,
    maxSnr: record.maxSnr,
    sum: record.sum,
    count: record.count,
    firstSeen: record.firstSeen,
    lastSeen: record.lastSeen,
    recent: record.recent.slice(-RECENT_SAMPLE_CAPACITY),
  };
}

/**
 * Keeps the well-formed records of a decoded payload and logs the rest.
 */
export function parseSnrRecords(raw: unknown, location: string): SnrRecordMap {
  if (!isRecord(raw)) {
    throw new PersistenceError('Stats payload is not an object', location);
  }

  const logger = Logger.getInstance();
  const records: SnrRecordMap = {};
  for (const [nodeName, value] of Object.entries(raw)) {
    if (isSnrRecord(value)) {
      records[nodeName] = cloneSnrRecord(value);
    } else {
      logger.warn('Skipping invalid SNR record', { nodeName, location });
    }
  }
  return records;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return isRecord(error) && error.code === code;
}

export class JsonFileStatsStorage implements SnrStatsStorage {
  constructor(private readonly filePath: string) {}

  get description(): string {
    return this.filePath;
  }

  async load(): Promise<SnrRecordMap> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return {};
      }
      throw new PersistenceError(
        `Cannot read stats file: ${errorMessage(error)}`,
        this.filePath
      );
    }

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw new PersistenceError(
        `Stats file is not valid JSON: ${errorMessage(error)}`,
        this.filePath
      );
    }

    if (!isRecord(document)) {
      throw new PersistenceError('Stats file has no nodes', this.filePath);
    }
    return parseSnrRecords(document.nodes, this.filePath);
  }

  async save(records: SnrRecordMap): Promise<void> {
    const document = {
      version: STATS_FILE_VERSION,
      savedAt: Date.now(),
      nodes: records,
    };
    const tempPath = `${this.filePath}.tmp`;
    try {
      await fs.mkdir(dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(document, null, 2), 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      throw new PersistenceError(
        `Cannot write stats file: ${errorMessage(error)}`,
        this.filePath
      );
    }
  }

  async close(): Promise<void> {
    // Nothing held open between writes
  }
}

export class LevelStatsStorage implements SnrStatsStorage {
  private db: Level<string, Buffer>;

  constructor(private readonly dbPath: string) {
    this.db = new Level<string, Buffer>(dbPath, {
      keyEncoding: 'utf8',
      valueEncoding: 'buffer',
    });
  }

  get description(): string {
    return this.dbPath;
  }

  private records() {
    return this.db.sublevel<string, Buffer>(SNR_SUBLEVEL, {
      keyEncoding: 'utf8',
      valueEncoding: 'buffer',
    });
  }

  async load(): Promise<SnrRecordMap> {
    const decoded: Record<string, unknown> = {};
    try {
      for await (const [nodeName, value] of this.records().iterator()) {
        decoded[nodeName] = decode(value);
      }
    } catch (error) {
      throw new PersistenceError(
        `Cannot read stats database: ${errorMessage(error)}`,
        this.dbPath
      );
    }
    return parseSnrRecords(decoded, this.dbPath);
  }

  async save(records: SnrRecordMap): Promise<void> {
    try {
      const sublevel = this.records();
      const stale: string[] = [];
      for await (const nodeName of sublevel.keys()) {
        if (!(nodeName in records)) {
          stale.push(nodeName);
        }
      }

      await sublevel.batch([
        ...stale.map(key => ({ type: 'del' as const, key })),
        ...Object.entries(records).map(([key, record]) => ({
          type: 'put' as const,
          key,
          value: Buffer.from(encode(record)),
        })),
      ]);
    } catch (error) {
      throw new PersistenceError(
        `Cannot write stats database: ${errorMessage(error)}`,
        this.dbPath
      );
    }
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}

export class MemoryStatsStorage implements SnrStatsStorage {
  private stored: SnrRecordMap | undefined;
  saveCount = 0;

  constructor(initial?: SnrRecordMap) {
    this.stored = initial ? copyRecords(initial) : undefined;
  }

  get description(): string {
    return 'memory';
  }

  async load(): Promise<SnrRecordMap> {
    return this.stored ? copyRecords(this.stored) : {};
  }

  async save(records: SnrRecordMap): Promise<void> {
    this.stored = copyRecords(records);
    this.saveCount++;
  }

  async close(): Promise<void> {
    // Data stays available for the next load
  }

  peek(): SnrRecordMap | undefined {
    return this.stored ? copyRecords(this.stored) : undefined;
  }
}

function copyRecords(records: SnrRecordMap): SnrRecordMap {
  const copy: SnrRecordMap = {};
  for (const [nodeName, record] of Object.entries(records)) {
    copy[nodeName] = cloneSnrRecord(record);
  }
  return copy;
}
