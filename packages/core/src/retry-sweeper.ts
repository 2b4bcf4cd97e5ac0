import { Logger } from '@meshack/shared';
import type {
  MessageState,
  PendingMessage,
  SweepAction,
  SweepDecision,
} from './types.js';
import type { PendingMessageRegistry } from './pending-message-registry.js';
import { logDeliveryEvent } from './event-log.js';

/** A message that timed out, or a send the transport rejected before assigning an id. */
export interface RetryCandidate {
  messageId?: number;
  nodeName: string;
  retryCount: number;
  state: MessageState;
}

export interface RetrySweeperOptions {
  ackRetryTimeoutSeconds: number;
  /** Retries allowed per message. `Infinity` retries until acknowledged. */
  maxRetries: number;
}

/**
 * Polled once per host loop iteration. Timeouts therefore fire within one tick
 * interval of their deadline, not exactly at it.
 */
export class RetrySweeper {
  private registry: PendingMessageRegistry;
  private timeoutMs: number;
  private maxRetries: number;
  private logger = Logger.getInstance();

  constructor(registry: PendingMessageRegistry, options: RetrySweeperOptions) {
    this.registry = registry;
    this.timeoutMs = options.ackRetryTimeoutSeconds * 1000;
    this.maxRetries = Math.max(0, options.maxRetries);
  }

  /**
   * Times out expired entries, removes them from the registry and decides
   * whether each one is resent or reported as a delivery failure.
   */
  tick(now: number): SweepDecision[] {
    const expired = this.registry.sweepExpired(now, this.timeoutMs);
    const decisions: SweepDecision[] = [];

    for (const swept of expired) {
      const entry: PendingMessage =
        this.registry.take(swept.messageId, now) ?? swept;
      decisions.push({ action: this.decide(entry, now), entry });
    }

    if (decisions.length > 0) {
      this.logger.info('Unacknowledged messages swept', {
        retries: decisions.filter(d => d.action === 'retry').length,
        failures: decisions.filter(d => d.action === 'give_up').length,
      });
    }

    return decisions;
  }

  decide(candidate: RetryCandidate, now: number = Date.now()): SweepAction {
    const action: SweepAction =
      candidate.retryCount < this.maxRetries ? 'retry' : 'give_up';

    logDeliveryEvent(this.logger, {
      event: action,
      messageId: candidate.messageId,
      nodeName: candidate.nodeName,
      at: now,
      outcome: candidate.state,
      detail: `retry ${candidate.retryCount} of ${this.maxRetries}`,
    });

    return action;
  }

  getTimeoutMs(): number {
    return this.timeoutMs;
  }
}
