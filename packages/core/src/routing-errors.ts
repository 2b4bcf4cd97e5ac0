import type { RoutingErrorCode } from './types.js';

// Meshtastic Routing.Error values
export const ROUTING_ERROR_NAMES: Readonly<Record<number, string>> = {
  0: 'NONE',
  1: 'NO_ROUTE',
  2: 'GOT_NAK',
  3: 'TIMEOUT',
  4: 'NO_INTERFACE',
  5: 'MAX_RETRANSMIT',
  6: 'NO_CHANNEL',
  7: 'TOO_LARGE',
  8: 'NO_RESPONSE',
  9: 'DUTY_CYCLE_LIMIT',
  32: 'BAD_REQUEST',
  33: 'NOT_AUTHORIZED',
  34: 'PKI_FAILED',
  35: 'PKI_UNKNOWN_PUBKEY',
};

export function routingErrorName(code: RoutingErrorCode): string {
  if (typeof code === 'string') {
    const text = code.trim().toUpperCase();
    if (/^\d+$/.test(text)) {
      return routingErrorName(Number(text));
    }
    return text || 'NONE';
  }
  return ROUTING_ERROR_NAMES[code] ?? `UNKNOWN(${code})`;
}

export function isRoutingFailure(code: RoutingErrorCode): boolean {
  return routingErrorName(code) !== 'NONE';
}
