/**
 * Delivery Engine
 *
 * Orchestrates sends, acknowledgment resolution, retries and confirmations for
 * the host loop. Transport callbacks go straight to the AckEventHandler; the
 * host calls `onTick` once per loop iteration to act on whatever resolved.
 *
 * Events:
 * - `message_sent` (DeliveryStatus)
 * - `retry` (RetryNotice)
 * - `delivered` (DeliveryStatus), on a real ack
 * - `failed` (DeliveryStatus), on a nak or when retries are exhausted
 * - `confirmation_sent` (DeliveryStatus)
 */

import { EventEmitter } from 'events';
import { Logger, errorMessage } from '@meshack/shared';
import type {
  DeliveryConfig,
  DeliveryMetrics,
  DeliveryOutcome,
  DeliveryStatus,
  EncryptionMode,
  MeshNode,
  MeshTransport,
  PendingMessage,
  ResolveResult,
  SnrStatsStorage,
} from './types.js';
import { TransportError } from './errors.js';
import { NodeDirectory } from './node-directory.js';
import { PendingMessageRegistry } from './pending-message-registry.js';
import { AckEventHandler } from './ack-event-handler.js';
import { RetrySweeper } from './retry-sweeper.js';
import { SnrStatsStore } from './snr-stats-store.js';
import { ConfirmationScheduler } from './confirmation-scheduler.js';
import { JsonFileStatsStorage, LevelStatsStorage } from './stats-storage.js';
import { logDeliveryEvent } from './event-log.js';

export interface DeliveryEngineComponents {
  transport: MeshTransport;
  directory: NodeDirectory;
  registry: PendingMessageRegistry;
  handler: AckEventHandler;
  sweeper: RetrySweeper;
  snrStats: SnrStatsStore;
  confirmations: ConfirmationScheduler;
  config: DeliveryConfig;
  clock?: () => number;
}

export type RetryReason = 'timeout' | 'transport_error';

export interface RetryNotice {
  nodeName: string;
  previousMessageId?: number;
  retryCount: number;
  reason: RetryReason;
}

export interface TickSummary {
  retried: number;
  failed: number;
  confirmationsSent: number;
  evicted: number;
}

interface QueuedRetry {
  node: MeshNode;
  payload: string;
  retryCount: number;
  previousMessageId?: number;
  reason: RetryReason;
}

const ACK_INDICATORS: Readonly<Record<DeliveryOutcome, string>> = {
  pending: '?',
  implicit_ack: '~',
  delivered: '✓',
  confirmed: '✓',
  failed: '✗',
  timed_out: '✗',
  send_failed: '✗',
};

export class DeliveryEngine extends EventEmitter {
  private transport: MeshTransport;
  private directory: NodeDirectory;
  private registry: PendingMessageRegistry;
  private handler: AckEventHandler;
  private sweeper: RetrySweeper;
  private snrStats: SnrStatsStore;
  private confirmations: ConfirmationScheduler;
  private config: DeliveryConfig;
  private clock: () => number;
  private logger = Logger.getInstance();

  private statuses: Map<string, DeliveryStatus> = new Map();
  private lastNodeName: string | undefined;
  private retryQueue: QueuedRetry[] = [];
  private unsubscribe: (() => void) | undefined;
  private metrics: DeliveryMetrics = {
    messagesSent: 0,
    messagesDelivered: 0,
    implicitAcks: 0,
    messagesRetried: 0,
    messagesFailed: 0,
    naks: 0,
    timeouts: 0,
    confirmationsSent: 0,
    confirmationFailures: 0,
    currentPendingCount: 0,
  };

  constructor(components: DeliveryEngineComponents) {
    super();
    this.transport = components.transport;
    this.directory = components.directory;
    this.registry = components.registry;
    this.handler = components.handler;
    this.sweeper = components.sweeper;
    this.snrStats = components.snrStats;
    this.confirmations = components.confirmations;
    this.config = components.config;
    this.clock = components.clock ?? Date.now;

    this.handler.on('resolved', (result: ResolveResult) => {
      this.onResolved(result);
    });
    this.unsubscribe = this.transport.onDeliveryEvent(raw => {
      this.handler.handleRawEvent(raw);
    });
  }

  /**
   * Loads persisted SNR statistics. Call before the first send.
   */
  async initialize(): Promise<void> {
    await this.snrStats.load();
    this.logger.info('Delivery engine initialized', {
      nodes: this.directory.size,
      channelIndex: this.config.channelIndex,
      maxRetries: this.config.maxRetries,
    });
  }

  /**
   * Sends `payload` to a configured node and starts tracking it. Rejects with
   * NotFoundError for an unknown node and TransportError when the radio refuses
   * the packet; in the latter case a retry is already queued for the next tick
   * unless retries are exhausted.
   */
  async send(nodeName: string, payload: string): Promise<number> {
    const node = this.directory.resolve(nodeName);
    return this.transmit(node, payload, 0);
  }

  async onTick(now: number = this.clock()): Promise<TickSummary> {
    const summary: TickSummary = {
      retried: 0,
      failed: 0,
      confirmationsSent: 0,
      evicted: 0,
    };

    const queued = this.retryQueue.splice(0);
    for (const retry of queued) {
      summary.retried++;
      await this.resend(retry);
    }

    for (const decision of this.sweeper.tick(now)) {
      const { entry } = decision;
      this.metrics.timeouts++;
      this.updateStatus(entry, 'timed_out');

      if (decision.action === 'retry') {
        summary.retried++;
        await this.resend({
          node: this.directory.resolve(entry.nodeName),
          payload: entry.payload,
          retryCount: entry.retryCount + 1,
          previousMessageId: entry.messageId,
          reason: 'timeout',
        });
      } else {
        summary.failed++;
        this.metrics.messagesFailed++;
        this.updateStatus(entry, 'failed');
        this.logger.warn('Message not acknowledged, giving up', {
          messageId: entry.messageId,
          nodeName: entry.nodeName,
          retryCount: entry.retryCount,
        });
        this.emitStatus('failed', entry.nodeName, entry.messageId);
      }
    }

    for (const due of this.confirmations.pollDue(now)) {
      if (await this.sendConfirmation(due.messageId, due.nodeName, due.payload, now)) {
        summary.confirmationsSent++;
      }
    }

    this.registry.takeResolved(['nak'], now);
    if (!this.config.confirmationsEnabled) {
      this.registry.takeResolved(['real_ack'], now);
    }
    // a real ack waiting on its confirmation stays until the confirmation goes out
    summary.evicted = this.registry.evictExpired(
      now,
      this.config.retentionSeconds * 1000,
      entry =>
        entry.state === 'real_ack' && this.confirmations.has(entry.messageId)
    ).length;

    return summary;
  }

  getLastStatus(nodeName: string): DeliveryStatus | undefined {
    const status = this.statuses.get(nodeName);
    return status ? { ...status } : undefined;
  }

  getMostRecentStatus(): DeliveryStatus | undefined {
    return this.lastNodeName === undefined
      ? undefined
      : this.getLastStatus(this.lastNodeName);
  }

  /** Single-character delivery marker for message templates. */
  ackIndicator(nodeName?: string): string {
    const status =
      nodeName === undefined
        ? this.getMostRecentStatus()
        : this.getLastStatus(nodeName);
    return status ? ACK_INDICATORS[status.outcome] : '?';
  }

  getMetrics(): DeliveryMetrics {
    return { ...this.metrics, currentPendingCount: this.registry.size };
  }

  getDirectory(): NodeDirectory {
    return this.directory;
  }

  getSnrStats(): SnrStatsStore {
    return this.snrStats;
  }

  async shutdown(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    this.handler.shutdown();
    this.confirmations.clear();
    this.retryQueue = [];
    await this.snrStats.close();
    this.logger.info('Delivery engine stopped', {
      pending: this.registry.size,
    });
    this.removeAllListeners();
  }

  private async transmit(
    node: MeshNode,
    payload: string,
    retryCount: number,
    previousMessageId?: number
  ): Promise<number> {
    const sentAt = this.clock();
    const snrAtSend = this.transport.getNodeSignal?.(node.id)?.snr;

    let messageId: number;
    try {
      messageId = await this.transport.sendMessage(
        node.id,
        payload,
        this.config.channelIndex,
        encryptionFor(node)
      );
    } catch (error) {
      const failure =
        error instanceof TransportError
          ? error
          : new TransportError(
              `Send to ${node.name} failed: ${errorMessage(error)}`,
              node.name,
              error
            );
      this.onSendFailure(node, payload, retryCount, sentAt, failure, previousMessageId);
      throw failure;
    }

    const entry = this.registry.register({
      messageId,
      nodeName: node.name,
      nodeId: node.id,
      payload,
      sentAt,
      snrAtSend,
      retryCount,
    });
    this.metrics.messagesSent++;
    this.lastNodeName = node.name;
    this.updateStatus(entry, 'pending');

    this.logger.info('Message sent', {
      messageId,
      nodeName: node.name,
      retryCount,
      encryption: encryptionFor(node),
    });
    this.emitStatus('message_sent', node.name, messageId);

    this.handler.replayOrphans(messageId, this.clock());
    return messageId;
  }

  private async resend(retry: QueuedRetry): Promise<void> {
    this.metrics.messagesRetried++;
    const notice: RetryNotice = {
      nodeName: retry.node.name,
      previousMessageId: retry.previousMessageId,
      retryCount: retry.retryCount,
      reason: retry.reason,
    };
    this.emit('retry', notice);

    try {
      await this.transmit(
        retry.node,
        retry.payload,
        retry.retryCount,
        retry.previousMessageId
      );
    } catch (error) {
      // onSendFailure already queued the next attempt or reported the failure
      this.logger.debug('Retry send failed', {
        nodeName: retry.node.name,
        error: errorMessage(error),
      });
    }
  }

  private onSendFailure(
    node: MeshNode,
    payload: string,
    retryCount: number,
    sentAt: number,
    failure: TransportError,
    previousMessageId?: number
  ): void {
    this.logger.error('Transport rejected message', {
      nodeName: node.name,
      retryCount,
      error: failure.message,
    });

    this.lastNodeName = node.name;
    this.statuses.set(node.name, {
      nodeName: node.name,
      sentAt,
      outcome: 'send_failed',
      retryCount,
      reason: failure.message,
    });

    const action = this.sweeper.decide(
      { nodeName: node.name, retryCount, state: 'sent' },
      sentAt
    );
    if (action === 'retry') {
      this.retryQueue.push({
        node,
        payload,
        retryCount: retryCount + 1,
        previousMessageId,
        reason: 'transport_error',
      });
    } else {
      this.metrics.messagesFailed++;
      this.emitStatus('failed', node.name);
    }
  }

  private async sendConfirmation(
    messageId: number,
    nodeName: string,
    payload: string,
    now: number
  ): Promise<boolean> {
    try {
      const node = this.directory.resolve(nodeName);
      await this.transport.sendMessage(
        node.id,
        payload,
        this.config.channelIndex,
        encryptionFor(node)
      );
    } catch (error) {
      this.metrics.confirmationFailures++;
      this.logger.error('Failed to send confirmation', {
        messageId,
        nodeName,
        error: errorMessage(error),
      });
      this.registry.take(messageId, now);
      return false;
    }

    this.registry.markConfirmationSent(messageId, now);
    const entry = this.registry.take(messageId, now);
    this.metrics.confirmationsSent++;
    logDeliveryEvent(this.logger, {
      event: 'confirmation_sent',
      messageId,
      nodeName,
      at: now,
    });

    if (entry) {
      this.updateStatus(entry, 'confirmed');
    }
    this.emitStatus('confirmation_sent', nodeName, messageId);
    return true;
  }

  private onResolved(result: ResolveResult): void {
    if (result.status !== 'applied') {
      return;
    }

    const { entry } = result;
    switch (entry.state) {
      case 'implicit_ack':
        this.metrics.implicitAcks++;
        this.updateStatus(entry, 'implicit_ack');
        break;
      case 'real_ack':
        this.metrics.messagesDelivered++;
        this.updateStatus(entry, 'delivered');
        this.emitStatus('delivered', entry.nodeName, entry.messageId);
        break;
      case 'nak':
        this.metrics.naks++;
        this.metrics.messagesFailed++;
        this.updateStatus(entry, 'failed');
        this.emitStatus('failed', entry.nodeName, entry.messageId);
        break;
      default:
        break;
    }
  }

  /**
   * Records the outcome for the node, unless a newer message to the same node
   * has replaced the one this entry describes.
   */
  private updateStatus(entry: PendingMessage, outcome: DeliveryOutcome): void {
    const current = this.statuses.get(entry.nodeName);
    if (
      outcome !== 'pending' &&
      current !== undefined &&
      current.messageId !== entry.messageId
    ) {
      return;
    }

    this.statuses.set(entry.nodeName, {
      messageId: entry.messageId,
      nodeName: entry.nodeName,
      sentAt: entry.sentAt,
      ackedAt: entry.ackedAt,
      snr: entry.ackSnr ?? entry.snrAtSend,
      outcome,
      retryCount: entry.retryCount,
      reason: entry.nakReason,
    });
  }

  private emitStatus(
    event: 'message_sent' | 'delivered' | 'failed' | 'confirmation_sent',
    nodeName: string,
    messageId?: number
  ): void {
    const status = this.statuses.get(nodeName);
    if (status && (messageId === undefined || status.messageId === messageId)) {
      this.emit(event, { ...status });
    }
  }
}

function encryptionFor(node: MeshNode): EncryptionMode {
  return node.publicKey ? 'pki' : 'channel';
}

export interface CreateDeliveryEngineOptions {
  storage?: SnrStatsStorage;
  clock?: () => number;
}

/**
 * Wires a DeliveryEngine and its collaborators from configuration.
 */
export function createDeliveryEngine(
  config: DeliveryConfig,
  transport: MeshTransport,
  options: CreateDeliveryEngineOptions = {}
): DeliveryEngine {
  const clock = options.clock ?? Date.now;
  const storage =
    options.storage ??
    (config.statsStorage === 'leveldb'
      ? new LevelStatsStorage(config.statsPath)
      : new JsonFileStatsStorage(config.statsPath));

  const registry = new PendingMessageRegistry();
  const snrStats = new SnrStatsStore(storage, {
    autosaveEvery: config.statsAutosaveEvery,
  });
  const confirmations = new ConfirmationScheduler(config.confirmationTemplate);
  const handler = new AckEventHandler({
    registry,
    snrStats,
    confirmations,
    localNodeId: () => transport.getLocalNodeId(),
    confirmationsEnabled: config.confirmationsEnabled,
    confirmationDelaySeconds: config.confirmationDelaySeconds,
    orphanEventWindowSeconds: config.orphanEventWindowSeconds,
    clock,
  });
  const sweeper = new RetrySweeper(registry, {
    ackRetryTimeoutSeconds: config.ackRetryTimeoutSeconds,
    maxRetries: config.maxRetries,
  });

  return new DeliveryEngine({
    transport,
    directory: NodeDirectory.fromConfig(config.nodes),
    registry,
    handler,
    sweeper,
    snrStats,
    confirmations,
    config,
    clock,
  });
}
