import { Logger } from '@meshack/shared';
import type { ConfirmationDue, ScheduledConfirmation } from './types.js';
import type { ConfirmationSink } from './ack-event-handler.js';
import { logDeliveryEvent } from './event-log.js';
import {
  DEFAULT_CONFIRMATION_TEMPLATE,
  formatSnr,
  renderTemplate,
} from './message-template.js';

/**
 * Holds the follow-up message owed to a peer after its real ack. At most one
 * confirmation is pending per message id; sending it is the engine's job.
 */
export class ConfirmationScheduler implements ConfirmationSink {
  private scheduled: Map<number, ScheduledConfirmation> = new Map();
  private logger = Logger.getInstance();

  constructor(private template: string = DEFAULT_CONFIRMATION_TEMPLATE) {}

  schedule(
    messageId: number,
    nodeName: string,
    ackedAt: number,
    snr: number | undefined,
    delaySeconds: number
  ): boolean {
    if (this.scheduled.has(messageId)) {
      return false;
    }

    const confirmation: ScheduledConfirmation = {
      messageId,
      nodeName,
      ackedAt,
      snr,
      dueAt: ackedAt + Math.max(0, delaySeconds) * 1000,
    };
    this.scheduled.set(messageId, confirmation);

    logDeliveryEvent(this.logger, {
      event: 'confirmation_scheduled',
      messageId,
      nodeName,
      at: ackedAt,
      detail: `due ${confirmation.dueAt}`,
    });
    return true;
  }

  /**
   * Removes and returns every confirmation whose delay has elapsed, oldest
   * acknowledgment first.
   */
  pollDue(now: number): ConfirmationDue[] {
    const due = Array.from(this.scheduled.values())
      .filter(confirmation => confirmation.dueAt <= now)
      .sort((a, b) => a.dueAt - b.dueAt);

    return due.map(confirmation => {
      this.scheduled.delete(confirmation.messageId);
      return {
        messageId: confirmation.messageId,
        nodeName: confirmation.nodeName,
        payload: renderTemplate(this.template, {
          messageId: confirmation.messageId,
          node: confirmation.nodeName,
          snr: formatSnr(confirmation.snr),
        }),
      };
    });
  }

  cancel(messageId: number): boolean {
    return this.scheduled.delete(messageId);
  }

  has(messageId: number): boolean {
    return this.scheduled.has(messageId);
  }

  get size(): number {
    return this.scheduled.size;
  }

  clear(): void {
    this.scheduled.clear();
  }
}
