/**
 * Reconnect decisions with exponential backoff.
 * Kept free of sockets and timers so it can be tested on its own.
 */
export interface ReconnectConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RECONNECT_CONFIG: ReconnectConfig = {
  maxAttempts: 5,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
};

export type ReconnectDecision =
  | { action: 'retry'; delay: number; attempt: number }
  | { action: 'give-up'; attempt: number };

export class ReconnectPolicy {
  private attempts = 0;

  constructor(private readonly config: ReconnectConfig = DEFAULT_RECONNECT_CONFIG) {
    if (config.maxAttempts < 0 || config.initialDelayMs < 0 || config.maxDelayMs < config.initialDelayMs) {
      throw new Error('Invalid reconnect config');
    }
  }

  /** Call when the connection drops. Returns what to do next. */
  onDisconnect(): ReconnectDecision {
    if (this.attempts >= this.config.maxAttempts) {
      return { action: 'give-up', attempt: this.attempts };
    }

    const delay = Math.min(this.config.initialDelayMs * 2 ** this.attempts, this.config.maxDelayMs);
    this.attempts++;
    return { action: 'retry', delay, attempt: this.attempts };
  }

  /** Call once the server has confirmed a subscription. */
  reset(): void {
    this.attempts = 0;
  }

  getState(): { attempts: number; nextDelay: number } {
    return {
      attempts: this.attempts,
      nextDelay: Math.min(this.config.initialDelayMs * 2 ** this.attempts, this.config.maxDelayMs),
    };
  }
}
