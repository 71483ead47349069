import type { ServerMessage } from '../protocol/messages.js';

export type TransportKind = 'websocket' | 'sse';

/**
 * The one seam between a Connection and the network. `send` resolves once
 * the frame has been handed to the socket and rejects on a write failure.
 */
export interface Transport {
  readonly kind: TransportKind;
  send(message: ServerMessage): Promise<void>;
  close(code: number, reason: string): void;
}

export type CloseReason = 'client_closed' | 'heartbeat_timeout' | 'overflow' | 'transport_error' | 'shutdown';

/** WebSocket close codes per reason (4xxx are application-defined) */
export const CLOSE_CODES: Record<CloseReason, number> = {
  client_closed: 1000,
  shutdown: 1001,
  transport_error: 1011,
  heartbeat_timeout: 4001,
  overflow: 4002,
};
