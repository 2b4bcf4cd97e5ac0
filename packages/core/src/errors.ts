import { AppError } from '@meshack/shared';

/**
 * Base class for delivery engine failures. Every subclass is operational:
 * nothing in the engine terminates the host process.
 */
export class DeliveryError extends AppError {
  constructor(message: string, code: string) {
    super(message, code);
  }
}

/** A messageId was registered while an entry with the same id is still live. */
export class DuplicateIdError extends DeliveryError {
  constructor(public readonly messageId: number) {
    super(`Message ${messageId} is already tracked`, 'DUPLICATE_ID');
  }
}

export class NotFoundError extends DeliveryError {
  constructor(
    public readonly resource: string,
    public readonly key: string | number
  ) {
    super(`${resource} not found: ${key}`, 'NOT_FOUND');
  }
}

export class TransportError extends DeliveryError {
  constructor(
    message: string,
    public readonly nodeName?: string,
    public readonly underlying?: unknown
  ) {
    super(message, 'TRANSPORT_ERROR');
  }
}

/** Stats save/load failure. In-memory statistics stay authoritative. */
export class PersistenceError extends DeliveryError {
  constructor(
    message: string,
    public readonly location: string
  ) {
    super(message, 'PERSISTENCE_ERROR');
  }
}

export class CallbackParseError extends DeliveryError {
  constructor(
    message: string,
    public readonly raw: unknown
  ) {
    super(message, 'CALLBACK_PARSE_ERROR');
  }
}
