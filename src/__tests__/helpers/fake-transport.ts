/**
 * In-memory Transport that records frames. `hold()` stalls every write
 * until `release()`, which is how tests model a slow client.
 */
import type { ServerMessage } from '../../protocol/messages.js';
import type { Transport, TransportKind } from '../../connections/transport.js';

export class FakeTransport implements Transport {
  sent: ServerMessage[] = [];
  closed: { code: number; reason: string }[] = [];
  failWith: Error | null = null;
  private gate: Promise<void> | null = null;
  private openGate: () => void = () => undefined;

  constructor(readonly kind: TransportKind = 'websocket') {}

  hold(): void {
    this.gate = new Promise(resolve => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.gate = null;
    this.openGate();
  }

  async send(message: ServerMessage): Promise<void> {
    this.sent.push(message);
    if (this.failWith) throw this.failWith;
    if (this.gate) await this.gate;
  }

  close(code: number, reason: string): void {
    this.closed.push({ code, reason });
  }

  /** Frames of one type, narrowed */
  ofType<T extends ServerMessage['type']>(type: T): Extract<ServerMessage, { type: T }>[] {
    return this.sent.filter((m): m is Extract<ServerMessage, { type: T }> => m.type === type);
  }
}

/** Let pending drain loops run */
export const flush = () => new Promise<void>(resolve => setTimeout(resolve, 0));
