import { Logger, type LogEntry } from '@meshack/shared';

const EVENT_TYPES = [
  'registered',
  'transition',
  'ignored',
  'callback',
  'not_tracked',
  'swept',
  'taken',
  'evicted',
  'retry',
  'give_up',
  'confirmation_scheduled',
  'confirmation_sent',
] as const;

export type DeliveryLogEventType = (typeof EVENT_TYPES)[number];

export interface DeliveryLogEvent {
  event: DeliveryLogEventType;
  /** Absent when the transport never assigned an id. */
  messageId?: number;
  nodeName?: string;
  at: number;
  outcome?: string;
  from?: string;
  detail?: string;
}

const TRACE_PREFIX = 'delivery.';

/**
 * Writes one DEBUG line per registry transition or callback invocation.
 */
export function logDeliveryEvent(
  logger: Pick<Logger, 'debug'>,
  event: DeliveryLogEvent
): void {
  logger.debug(`${TRACE_PREFIX}${event.event}`, {
    event: event.event,
    messageId: event.messageId,
    nodeName: event.nodeName,
    at: event.at,
    outcome: event.outcome,
    from: event.from,
    detail: event.detail,
  });
}

/**
 * Reconstructs the state-machine trace of one message from the logger history.
 */
export function traceFor(
  messageId: number,
  logs: LogEntry[] = Logger.getInstance().getLogs()
): DeliveryLogEvent[] {
  const trace: DeliveryLogEvent[] = [];
  for (const entry of logs) {
    if (!entry.message.startsWith(TRACE_PREFIX) || !entry.context) {
      continue;
    }
    const { context } = entry;
    if (context.messageId !== messageId) {
      continue;
    }
    const event = toEventType(context.event);
    const at = context.at;
    if (!event || typeof at !== 'number') {
      continue;
    }
    trace.push({
      event,
      messageId,
      at,
      nodeName: optionalString(context.nodeName),
      outcome: optionalString(context.outcome),
      from: optionalString(context.from),
      detail: optionalString(context.detail),
    });
  }
  return trace;
}

function toEventType(value: unknown): DeliveryLogEventType | undefined {
  return EVENT_TYPES.find(type => type === value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}
