/**
 * SNR Statistics Store
 *
 * Running per-node aggregates of the SNR observed on real acknowledgments.
 * Samples are recorded synchronously; persistence happens on a queue so two
 * writes never interleave and a write always sees the state at the moment it
 * was requested.
 */

import { Logger, errorMessage, isFiniteNumber } from '@meshack/shared';
import type {
  ResetConfirmation,
  SnrRecord,
  SnrRecordMap,
  SnrStatsStorage,
  SnrSummary,
} from './types.js';
import { PersistenceError } from './errors.js';
import { RingBuffer } from './ring-buffer.js';
import { RECENT_SAMPLE_CAPACITY } from './stats-storage.js';
import type { SnrSampleSink } from './ack-event-handler.js';

export interface SnrStatsStoreOptions {
  /** Flush after this many new samples; 0 disables autosave. */
  autosaveEvery?: number;
}

interface NodeAggregate {
  minSnr: number;
  maxSnr: number;
  sum: number;
  count: number;
  firstSeen: number;
  lastSeen: number;
  recent: RingBuffer<number>;
}

export class SnrStatsStore implements SnrSampleSink {
  private aggregates: Map<string, NodeAggregate> = new Map();
  private storage: SnrStatsStorage;
  private autosaveEvery: number;
  private samplesSinceFlush = 0;
  private writeQueue: Promise<void> = Promise.resolve();
  private logger = Logger.getInstance();

  constructor(storage: SnrStatsStorage, options: SnrStatsStoreOptions = {}) {
    this.storage = storage;
    this.autosaveEvery = Math.max(0, options.autosaveEvery ?? 10);
  }

  /**
   * Replaces in-memory statistics with the stored ones. A storage failure is
   * logged and leaves the current statistics untouched.
   */
  async load(): Promise<number> {
    let records: SnrRecordMap;
    try {
      records = await this.storage.load();
    } catch (error) {
      this.logger.error('Failed to load SNR statistics', {
        location: this.storage.description,
        error: errorMessage(error),
      });
      return 0;
    }

    this.aggregates.clear();
    for (const [nodeName, record] of Object.entries(records)) {
      this.aggregates.set(nodeName, {
        minSnr: record.minSnr,
        maxSnr: record.maxSnr,
        sum: record.sum,
        count: record.count,
        firstSeen: record.firstSeen,
        lastSeen: record.lastSeen,
        recent: RingBuffer.from(record.recent, RECENT_SAMPLE_CAPACITY),
      });
    }

    this.logger.info('SNR statistics loaded', {
      location: this.storage.description,
      nodes: this.aggregates.size,
    });
    return this.aggregates.size;
  }

  recordSample(
    nodeName: string,
    snr: number,
    observedAt: number = Date.now()
  ): void {
    if (!isFiniteNumber(snr)) {
      this.logger.warn('Rejected non-finite SNR sample', {
        nodeName,
        snr: String(snr),
      });
      return;
    }

    const aggregate = this.aggregates.get(nodeName);
    if (aggregate) {
      aggregate.minSnr = Math.min(aggregate.minSnr, snr);
      aggregate.maxSnr = Math.max(aggregate.maxSnr, snr);
      aggregate.sum += snr;
      aggregate.count++;
      aggregate.lastSeen = observedAt;
      aggregate.recent.push(snr);
    } else {
      const recent = new RingBuffer<number>(RECENT_SAMPLE_CAPACITY);
      recent.push(snr);
      this.aggregates.set(nodeName, {
        minSnr: snr,
        maxSnr: snr,
        sum: snr,
        count: 1,
        firstSeen: observedAt,
        lastSeen: observedAt,
        recent,
      });
    }

    this.samplesSinceFlush++;
    if (this.autosaveEvery > 0 && this.samplesSinceFlush >= this.autosaveEvery) {
      void this.flush();
    }
  }

  /**
   * Raw persisted record. `sum / count` can drift past `minSnr` or `maxSnr`
   * by rounding; read the mean from `summary(nodeName).average`.
   */
  snapshot(nodeName: string): SnrRecord | undefined {
    const aggregate = this.aggregates.get(nodeName);
    return aggregate ? toRecord(aggregate) : undefined;
  }

  /**
   * Record plus its mean, clamped into [minSnr, maxSnr] against rounding.
   */
  summary(nodeName: string): SnrSummary | undefined {
    const record = this.snapshot(nodeName);
    if (!record) {
      return undefined;
    }
    const mean = record.sum / record.count;
    return {
      ...record,
      nodeName,
      average: Math.min(record.maxSnr, Math.max(record.minSnr, mean)),
    };
  }

  summaries(): SnrSummary[] {
    const summaries: SnrSummary[] = [];
    for (const nodeName of this.nodeNames()) {
      const summary = this.summary(nodeName);
      if (summary) {
        summaries.push(summary);
      }
    }
    return summaries;
  }

  nodeNames(): string[] {
    return Array.from(this.aggregates.keys()).sort();
  }

  get size(): number {
    return this.aggregates.size;
  }

  /**
   * Clears every record. Both flags must be set; anything less is a no-op.
   */
  async resetAll(confirmation: ResetConfirmation): Promise<boolean> {
    if (!confirmation.confirmed || !confirmation.reconfirmed) {
      this.logger.info('SNR statistics reset not confirmed');
      return false;
    }

    const cleared = this.aggregates.size;
    this.aggregates.clear();
    this.logger.warn('SNR statistics reset', { nodes: cleared });
    await this.flush();
    return true;
  }

  /**
   * Queues a write of the current statistics. Resolves false when the write
   * failed; the in-memory statistics stay as they are.
   */
  flush(): Promise<boolean> {
    const records = this.toRecordMap();
    this.samplesSinceFlush = 0;

    const write = this.writeQueue.then(() => this.write(records));
    this.writeQueue = write.then(() => undefined);
    return write;
  }

  /** Resolves once every queued write has finished. */
  whenIdle(): Promise<void> {
    return this.writeQueue;
  }

  async close(): Promise<boolean> {
    const saved = await this.flush();
    try {
      await this.storage.close();
    } catch (error) {
      this.logger.error('Failed to close SNR statistics storage', {
        location: this.storage.description,
        error: errorMessage(error),
      });
    }
    return saved;
  }

  toRecordMap(): SnrRecordMap {
    const records: SnrRecordMap = {};
    for (const [nodeName, aggregate] of this.aggregates) {
      records[nodeName] = toRecord(aggregate);
    }
    return records;
  }

  private async write(records: SnrRecordMap): Promise<boolean> {
    try {
      await this.storage.save(records);
      this.logger.debug('SNR statistics saved', {
        location: this.storage.description,
        nodes: Object.keys(records).length,
      });
      return true;
    } catch (error) {
      const failure =
        error instanceof PersistenceError
          ? error
          : new PersistenceError(errorMessage(error), this.storage.description);
      this.logger.error('Failed to save SNR statistics', {
        location: failure.location,
        error: failure.message,
      });
      return false;
    }
  }
}

function toRecord(aggregate: NodeAggregate): SnrRecord {
  return {
    minSnr: aggregate.minSnr,
    maxSnr: aggregate.maxSnr,
    sum: aggregate.sum,
    count: aggregate.count,
    firstSeen: aggregate.firstSeen,
    lastSeen: aggregate.lastSeen,
    recent: aggregate.recent.toArray(),
  };
}
