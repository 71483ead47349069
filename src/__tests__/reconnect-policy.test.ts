import { describe, it, expect, beforeEach } from 'vitest';
import { ReconnectPolicy, type ReconnectConfig } from '../client/reconnect-policy.js';

describe('ReconnectPolicy', () => {
  const config: ReconnectConfig = {
    maxAttempts: 3,
    initialDelayMs: 100,
    maxDelayMs: 1000,
  };

  let policy: ReconnectPolicy;

  beforeEach(() => {
    policy = new ReconnectPolicy(config);
  });

  describe('onDisconnect', () => {
    it('should retry after the initial delay first', () => {
      expect(policy.onDisconnect()).toEqual({ action: 'retry', delay: 100, attempt: 1 });
    });

    it('should apply exponential backoff', () => {
      expect(policy.onDisconnect()).toMatchObject({ delay: 100 });
      expect(policy.onDisconnect()).toMatchObject({ delay: 200 });
      expect(policy.onDisconnect()).toMatchObject({ delay: 400 });
    });

    it('should cap delay at maxDelayMs', () => {
      const uncapped = new ReconnectPolicy({ ...config, maxAttempts: 10 });
      const delays: number[] = [];
      for (let i = 0; i < 6; i++) {
        const decision = uncapped.onDisconnect();
        if (decision.action === 'retry') delays.push(decision.delay);
      }
      expect(delays).toEqual([100, 200, 400, 800, 1000, 1000]);
    });

    it('should give up after maxAttempts', () => {
      policy.onDisconnect();
      policy.onDisconnect();
      policy.onDisconnect();

      expect(policy.onDisconnect()).toEqual({ action: 'give-up', attempt: 3 });
    });
  });

  describe('reset', () => {
    it('should start over from the initial delay', () => {
      policy.onDisconnect();
      policy.onDisconnect();
      policy.reset();

      expect(policy.onDisconnect()).toEqual({ action: 'retry', delay: 100, attempt: 1 });
    });
  });

  describe('getState', () => {
    it('should return current state', () => {
      expect(policy.getState()).toEqual({ attempts: 0, nextDelay: 100 });
      policy.onDisconnect();
      expect(policy.getState()).toEqual({ attempts: 1, nextDelay: 200 });
    });
  });

  it('should reject a max delay below the initial delay', () => {
    expect(() => new ReconnectPolicy({ maxAttempts: 1, initialDelayMs: 500, maxDelayMs: 100 })).toThrow(
      'Invalid reconnect config',
    );
  });
});
