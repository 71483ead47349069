import type { RawData } from 'ws';
import { logger } from '../utils/logger.js';
import { encodeServerMessage, frameToString, type ServerMessage } from '../protocol/messages.js';
import type { ConnectionManager } from './connection-manager.js';
import type { Transport } from './transport.js';

const OPEN = 1;
const CONNECTING = 0;

/** The slice of a `ws` WebSocket the relay uses */
export interface RelaySocket {
  readonly readyState: number;
  send(data: string, cb: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  on(event: 'message', listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export class WebSocketTransport implements Transport {
  readonly kind = 'websocket';

  constructor(private readonly socket: RelaySocket) {}

  send(message: ServerMessage): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== OPEN) {
        reject(new Error(`WebSocket not open (readyState ${this.socket.readyState})`));
        return;
      }
      this.socket.send(encodeServerMessage(message), (err) => (err ? reject(err) : resolve()));
    });
  }

  close(code: number, reason: string): void {
    if (this.socket.readyState === OPEN || this.socket.readyState === CONNECTING) {
      this.socket.close(code, reason);
    }
  }
}

/**
 * Bind an accepted WebSocket to the manager: open a connection, route
 * frames to it, and close it when the socket goes away.
 */
export function attachWebSocket(manager: ConnectionManager, socket: RelaySocket): string {
  const connection = manager.open(new WebSocketTransport(socket));

  socket.on('message', (data, isBinary) => {
    if (isBinary) {
      connection.send({ type: 'error', message: 'Binary frames are not supported' });
      return;
    }
    manager.handleMessage(connection.id, frameToString(data));
  });

  socket.on('close', () => {
    manager.close(connection.id, 'client_closed');
  });

  socket.on('error', (err) => {
    logger.warn('WebSocket error', { connectionId: connection.id, error: err });
    manager.close(connection.id, 'transport_error');
  });

  return connection.id;
}
