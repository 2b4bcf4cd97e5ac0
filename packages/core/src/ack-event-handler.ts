/**
 * Acknowledgment Event Handler
 *
 * Consumes delivery-status events raised by the transport and resolves the
 * matching registry entries. The transport reports "my own radio queued the
 * packet" and "the destination received it" with the same event shape, so the
 * reporting node decides which one it is:
 *
 * - a failure code resolves the message as `nak`
 * - an event from the local node is only an implicit ack: no SNR sample, no
 *   confirmation
 * - an event from any other node is a real ack: the SNR is recorded for the
 *   destination and one confirmation is scheduled
 *
 * Invoked from the transport's callback context, so nothing thrown here ever
 * reaches the caller.
 */

import { EventEmitter } from 'events';
import { Logger, errorMessage, isFiniteNumber, isRecord } from '@meshack/shared';
import type {
  DeliveryEvent,
  ResolveResult,
  RoutingErrorCode,
} from './types.js';
import type { PendingMessageRegistry } from './pending-message-registry.js';
import { CallbackParseError } from './errors.js';
import { isRoutingFailure, routingErrorName } from './routing-errors.js';
import { logDeliveryEvent } from './event-log.js';
import { parseNodeId } from './node-directory.js';

export interface SnrSampleSink {
  recordSample(nodeName: string, snr: number, observedAt: number): void;
}

export interface ConfirmationSink {
  schedule(
    messageId: number,
    nodeName: string,
    ackedAt: number,
    snr: number | undefined,
    delaySeconds: number
  ): void;
}

export interface AckEventHandlerOptions {
  registry: PendingMessageRegistry;
  snrStats: SnrSampleSink;
  confirmations: ConfirmationSink;
  localNodeId: () => number | undefined;
  confirmationsEnabled: boolean;
  confirmationDelaySeconds: number;
  orphanEventWindowSeconds: number;
  maxOrphanEvents?: number;
  clock?: () => number;
}

interface OrphanEvent {
  event: DeliveryEvent;
  bufferedAt: number;
}

/**
 * Parses a transport payload into a delivery event.
 *
 * Accepts flat events (`requestId`, `fromNodeId`, `errorCode`, `snr`) as well
 * as Meshtastic-style packets (`from`, `rxSnr`, `decoded.requestId`,
 * `decoded.routing.errorReason`). A missing error code means success.
 */
export function parseDeliveryEvent(raw: unknown): DeliveryEvent {
  if (!isRecord(raw)) {
    throw new CallbackParseError('Delivery event is not an object', raw);
  }
  const decoded = isRecord(raw.decoded) ? raw.decoded : {};
  const routing = isRecord(decoded.routing) ? decoded.routing : {};

  const requestId = raw.requestId ?? decoded.requestId;
  if (
    typeof requestId !== 'number' ||
    !Number.isInteger(requestId) ||
    requestId <= 0
  ) {
    throw new CallbackParseError('Delivery event has no valid requestId', raw);
  }

  const from = raw.fromNodeId ?? raw.from;
  if (typeof from !== 'number' && typeof from !== 'string') {
    throw new CallbackParseError('Delivery event has no sender', raw);
  }
  let fromNodeId: number;
  try {
    fromNodeId = parseNodeId(from);
  } catch (error) {
    throw new CallbackParseError(
      `Delivery event sender is invalid: ${errorMessage(error)}`,
      raw
    );
  }

  const code =
    raw.errorCode ??
    raw.errorReason ??
    raw.error_reason ??
    routing.errorReason ??
    routing.error_reason ??
    0;
  if (typeof code !== 'number' && typeof code !== 'string') {
    throw new CallbackParseError('Delivery event error code is invalid', raw);
  }

  const snr = raw.snr ?? raw.rxSnr;
  const receivedAt = raw.receivedAt;

  return {
    requestId,
    fromNodeId,
    errorCode: code,
    snr: isFiniteNumber(snr) ? snr : undefined,
    receivedAt: isFiniteNumber(receivedAt) ? receivedAt : undefined,
  };
}

export class AckEventHandler extends EventEmitter {
  private registry: PendingMessageRegistry;
  private snrStats: SnrSampleSink;
  private confirmations: ConfirmationSink;
  private localNodeId: () => number | undefined;
  private clock: () => number;
  private logger: Logger;

  private confirmationsEnabled: boolean;
  private confirmationDelaySeconds: number;
  private orphanWindowMs: number;
  private maxOrphanEvents: number;
  private orphans: Map<number, OrphanEvent[]> = new Map();

  private stats = {
    eventsReceived: 0,
    parseErrors: 0,
    notTracked: 0,
    implicitAcks: 0,
    realAcks: 0,
    naks: 0,
    ignored: 0,
    orphansReplayed: 0,
  };

  constructor(options: AckEventHandlerOptions) {
    super();
    this.registry = options.registry;
    this.snrStats = options.snrStats;
    this.confirmations = options.confirmations;
    this.localNodeId = options.localNodeId;
    this.confirmationsEnabled = options.confirmationsEnabled;
    this.confirmationDelaySeconds = options.confirmationDelaySeconds;
    this.orphanWindowMs = Math.max(0, options.orphanEventWindowSeconds * 1000);
    this.maxOrphanEvents = options.maxOrphanEvents ?? 256;
    this.clock = options.clock ?? Date.now;
    this.logger = Logger.getInstance();
  }

  /**
   * Entry point for raw transport payloads. Malformed input is logged with the
   * payload and dropped.
   */
  handleRawEvent(raw: unknown): void {
    let event: DeliveryEvent;
    try {
      event = parseDeliveryEvent(raw);
    } catch (error) {
      this.stats.parseErrors++;
      this.logger.error('Malformed delivery event dropped', {
        error: errorMessage(error),
        code: error instanceof CallbackParseError ? error.code : undefined,
        raw: safeStringify(raw),
      });
      return;
    }

    this.onDeliveryEvent(
      event.requestId,
      event.fromNodeId,
      event.errorCode,
      event.snr,
      event.receivedAt
    );
  }

  onDeliveryEvent(
    requestId: number,
    fromNodeId: number,
    errorCode: RoutingErrorCode,
    snr?: number,
    at: number = this.clock()
  ): void {
    try {
      this.processEvent({ requestId, fromNodeId, errorCode, snr }, at, true);
    } catch (error) {
      this.logger.error('Failed to process delivery event', {
        requestId,
        fromNodeId,
        error: errorMessage(error),
      });
    }
  }

  /**
   * Applies events that arrived before `messageId` was registered.
   */
  replayOrphans(messageId: number, now: number = this.clock()): number {
    const buffered = this.orphans.get(messageId);
    if (!buffered) {
      return 0;
    }
    this.orphans.delete(messageId);

    let replayed = 0;
    for (const orphan of buffered) {
      if (now - orphan.bufferedAt > this.orphanWindowMs) {
        continue;
      }
      try {
        this.processEvent(orphan.event, orphan.bufferedAt, false);
        replayed++;
      } catch (error) {
        this.logger.error('Failed to replay buffered delivery event', {
          requestId: messageId,
          error: errorMessage(error),
        });
      }
    }
    this.stats.orphansReplayed += replayed;
    return replayed;
  }

  private processEvent(
    event: DeliveryEvent,
    at: number,
    bufferIfUnknown: boolean
  ): void {
    const { requestId, fromNodeId, errorCode, snr } = event;
    this.stats.eventsReceived++;

    const entry = this.registry.get(requestId);
    logDeliveryEvent(this.logger, {
      event: 'callback',
      messageId: requestId,
      nodeName: entry?.nodeName,
      at,
      outcome: routingErrorName(errorCode),
      detail: `from ${fromNodeId}${snr === undefined ? '' : ` snr ${snr}`}`,
    });

    if (!entry) {
      this.stats.notTracked++;
      logDeliveryEvent(this.logger, {
        event: 'not_tracked',
        messageId: requestId,
        at,
        detail: 'NOT_TRACKED',
      });
      if (bufferIfUnknown) {
        this.bufferOrphan(event, at);
      }
      return;
    }

    let result: ResolveResult;
    if (isRoutingFailure(errorCode)) {
      result = this.registry.resolve(
        requestId,
        'nak',
        undefined,
        routingErrorName(errorCode),
        at
      );
      if (result.status === 'applied') {
        this.stats.naks++;
        this.logger.warn('Delivery failed', {
          messageId: requestId,
          nodeName: entry.nodeName,
          reason: result.entry.nakReason,
        });
      }
    } else if (this.isLocalAck(fromNodeId)) {
      result = this.registry.resolve(
        requestId,
        'implicit_ack',
        undefined,
        undefined,
        at
      );
      if (result.status === 'applied') {
        this.stats.implicitAcks++;
      }
    } else {
      result = this.registry.resolve(requestId, 'real_ack', snr, undefined, at);
      if (result.status === 'applied') {
        this.stats.realAcks++;
        this.onRealAck(result, at);
      }
    }

    if (result.status !== 'applied') {
      this.stats.ignored++;
    }
    this.emit('resolved', result);
  }

  private isLocalAck(fromNodeId: number): boolean {
    const localNodeId = this.localNodeId();
    if (localNodeId === undefined) {
      // Without the local id a remote receipt cannot be told apart from a
      // local enqueue; only the weaker outcome is safe.
      this.logger.warn('Local node id unknown; treating ack as implicit', {
        fromNodeId,
      });
      return true;
    }
    return fromNodeId === localNodeId;
  }

  private onRealAck(result: ResolveResult, at: number): void {
    const { entry } = result;
    const ackSnr = entry.ackSnr;

    this.logger.info('Delivery confirmed by peer', {
      messageId: entry.messageId,
      nodeName: entry.nodeName,
      snr: ackSnr,
      retryCount: entry.retryCount,
    });

    if (ackSnr !== undefined) {
      this.snrStats.recordSample(entry.nodeName, ackSnr, at);
    }

    if (this.confirmationsEnabled) {
      this.confirmations.schedule(
        entry.messageId,
        entry.nodeName,
        at,
        ackSnr,
        this.confirmationDelaySeconds
      );
    }
  }

  private bufferOrphan(event: DeliveryEvent, at: number): void {
    if (this.orphanWindowMs === 0) {
      return;
    }

    for (const [requestId, buffered] of this.orphans) {
      const fresh = buffered.filter(
        orphan => at - orphan.bufferedAt <= this.orphanWindowMs
      );
      if (fresh.length === 0) {
        this.orphans.delete(requestId);
      } else if (fresh.length !== buffered.length) {
        this.orphans.set(requestId, fresh);
      }
    }

    if (
      !this.orphans.has(event.requestId) &&
      this.orphans.size >= this.maxOrphanEvents
    ) {
      const oldest = this.orphans.keys().next();
      if (!oldest.done) {
        this.orphans.delete(oldest.value);
      }
    }

    const buffered = this.orphans.get(event.requestId) ?? [];
    buffered.push({ event, bufferedAt: at });
    this.orphans.set(event.requestId, buffered);
  }

  getStats() {
    return {
      ...this.stats,
      bufferedOrphans: this.orphans.size,
    };
  }

  shutdown(): void {
    this.orphans.clear();
    this.removeAllListeners();
  }
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
