/**
 * Pending Message Registry
 *
 * Store of in-flight messages and their resolution state. Every method runs to
 * completion without awaiting, so each call is a single critical section with
 * respect to transport callbacks and the host loop that share the event loop.
 *
 * Transitions:
 *   sent         -> implicit_ack | real_ack | nak | timed_out
 *   implicit_ack -> real_ack | nak | timed_out
 *   real_ack     -> confirmation_sent
 * Terminal outcomes are never re-resolved; late or repeated events come back
 * as `already_resolved` (or `duplicate`) with the entry unchanged.
 */

import { Logger } from '@meshack/shared';
import type {
  AckOutcome,
  MessageState,
  PendingMessage,
  RegisterRequest,
  ResolveResult,
} from './types.js';
import { DuplicateIdError, NotFoundError } from './errors.js';
import { logDeliveryEvent } from './event-log.js';

const OPEN_STATES: ReadonlySet<MessageState> = new Set(['sent', 'implicit_ack']);

export function isOpenState(state: MessageState): boolean {
  return OPEN_STATES.has(state);
}

export class PendingMessageRegistry {
  private entries: Map<number, PendingMessage> = new Map();
  private logger = Logger.getInstance();

  register(request: RegisterRequest): PendingMessage {
    if (this.entries.has(request.messageId)) {
      throw new DuplicateIdError(request.messageId);
    }

    const entry: PendingMessage = {
      messageId: request.messageId,
      nodeName: request.nodeName,
      nodeId: request.nodeId,
      payload: request.payload,
      sentAt: request.sentAt,
      snrAtSend: request.snrAtSend,
      state: 'sent',
      retryCount: request.retryCount ?? 0,
    };
    this.entries.set(entry.messageId, entry);

    logDeliveryEvent(this.logger, {
      event: 'registered',
      messageId: entry.messageId,
      nodeName: entry.nodeName,
      at: entry.sentAt,
      outcome: entry.state,
      detail: `retry ${entry.retryCount}`,
    });

    return { ...entry };
  }

  /**
   * Applies an acknowledgment outcome if the entry is still open.
   */
  resolve(
    messageId: number,
    outcome: AckOutcome,
    snr?: number,
    reason?: string,
    at: number = Date.now()
  ): ResolveResult {
    const entry = this.entries.get(messageId);
    if (!entry) {
      throw new NotFoundError('Pending message', messageId);
    }

    const previousState = entry.state;

    if (outcome === 'implicit_ack' && previousState === 'implicit_ack') {
      this.logIgnored(entry, outcome, at, 'repeated local acknowledgment');
      return { status: 'duplicate', previousState, entry: { ...entry } };
    }

    if (!isOpenState(previousState)) {
      this.logIgnored(entry, outcome, at, `already ${previousState}`);
      return { status: 'already_resolved', previousState, entry: { ...entry } };
    }

    entry.state = outcome;
    if (outcome === 'real_ack') {
      entry.ackedAt = at;
      entry.ackSnr = snr ?? entry.snrAtSend;
    } else if (outcome === 'nak') {
      entry.nakReason = reason;
    }

    logDeliveryEvent(this.logger, {
      event: 'transition',
      messageId,
      nodeName: entry.nodeName,
      at,
      outcome: entry.state,
      from: previousState,
      detail: reason,
    });

    return { status: 'applied', previousState, entry: { ...entry } };
  }

  /**
   * Moves every open entry whose age reached `timeoutMs` to `timed_out`.
   */
  sweepExpired(now: number, timeoutMs: number): PendingMessage[] {
    const expired: PendingMessage[] = [];

    for (const entry of this.entries.values()) {
      if (!isOpenState(entry.state) || now - entry.sentAt < timeoutMs) {
        continue;
      }
      const previousState = entry.state;
      entry.state = 'timed_out';
      expired.push({ ...entry });

      logDeliveryEvent(this.logger, {
        event: 'swept',
        messageId: entry.messageId,
        nodeName: entry.nodeName,
        at: now,
        outcome: entry.state,
        from: previousState,
      });
    }

    return expired;
  }

  markConfirmationSent(messageId: number, at: number = Date.now()): boolean {
    const entry = this.entries.get(messageId);
    if (!entry || entry.state !== 'real_ack') {
      return false;
    }

    entry.state = 'confirmation_sent';
    logDeliveryEvent(this.logger, {
      event: 'transition',
      messageId,
      nodeName: entry.nodeName,
      at,
      outcome: entry.state,
      from: 'real_ack',
    });
    return true;
  }

  /**
   * Removes and returns an entry. A second take of the same id yields undefined.
   */
  take(messageId: number, at: number = Date.now()): PendingMessage | undefined {
    const entry = this.entries.get(messageId);
    if (!entry) {
      return undefined;
    }
    this.entries.delete(messageId);

    logDeliveryEvent(this.logger, {
      event: 'taken',
      messageId,
      nodeName: entry.nodeName,
      at,
      outcome: entry.state,
    });
    return entry;
  }

  /**
   * Takes every entry currently in one of `states`.
   */
  takeResolved(
    states: readonly MessageState[],
    at: number = Date.now()
  ): PendingMessage[] {
    const taken: PendingMessage[] = [];
    for (const entry of Array.from(this.entries.values())) {
      if (states.includes(entry.state)) {
        const removed = this.take(entry.messageId, at);
        if (removed) {
          taken.push(removed);
        }
      }
    }
    return taken;
  }

  /**
   * Drops entries older than `retentionMs`, whatever their state, unless
   * `isHeld` claims them.
   */
  evictExpired(
    now: number,
    retentionMs: number,
    isHeld: (entry: PendingMessage) => boolean = () => false
  ): PendingMessage[] {
    const evicted: PendingMessage[] = [];
    for (const entry of Array.from(this.entries.values())) {
      if (now - entry.sentAt < retentionMs || isHeld(entry)) {
        continue;
      }
      this.entries.delete(entry.messageId);
      evicted.push(entry);

      logDeliveryEvent(this.logger, {
        event: 'evicted',
        messageId: entry.messageId,
        nodeName: entry.nodeName,
        at: now,
        outcome: entry.state,
      });
    }
    return evicted;
  }

  get(messageId: number): PendingMessage | undefined {
    const entry = this.entries.get(messageId);
    return entry ? { ...entry } : undefined;
  }

  has(messageId: number): boolean {
    return this.entries.has(messageId);
  }

  list(): PendingMessage[] {
    return Array.from(this.entries.values(), entry => ({ ...entry }));
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private logIgnored(
    entry: PendingMessage,
    outcome: AckOutcome,
    at: number,
    detail: string
  ): void {
    logDeliveryEvent(this.logger, {
      event: 'ignored',
      messageId: entry.messageId,
      nodeName: entry.nodeName,
      at,
      outcome,
      from: entry.state,
      detail,
    });
  }
}
