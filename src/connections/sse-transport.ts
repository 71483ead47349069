import type { Writable } from 'node:stream';
import { formatSseFrame, type ServerMessage } from '../protocol/messages.js';
import type { Transport } from './transport.js';

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  'Connection': 'keep-alive',
  'X-Accel-Buffering': 'no', // Disable nginx buffering
} as const;

/**
 * Server-Sent Events transport over a hijacked HTTP response. One-way:
 * the client cannot ping, so SSE connections are not heartbeat-supervised
 * and rely on the socket closing instead.
 */
export class SseTransport implements Transport {
  readonly kind = 'sse';

  constructor(private readonly stream: Writable) {}

  send(message: ServerMessage): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.stream.writableEnded || this.stream.destroyed) {
        reject(new Error('SSE stream closed'));
        return;
      }
      this.stream.write(formatSseFrame(message), (err) => (err ? reject(err) : resolve()));
    });
  }

  close(): void {
    if (!this.stream.writableEnded) {
      this.stream.end();
    }
  }
}
