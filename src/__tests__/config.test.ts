import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { ConfigError, DEFAULT_CONFIG, loadConfig } from '../config.js';
import { paths } from '../utils/paths.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3030,
      host: '0.0.0.0',
      replayCapacity: 500,
      bufferRetentionMs: 3_600_000,
      heartbeatTimeoutMs: 30_000,
      sweepIntervalMs: 10_000,
      serverHeartbeatMs: 30_000,
      outboundQueueSize: 1024,
      overflowCloseThreshold: 1000,
      apiKey: undefined,
      dataDir: join(paths.projectRoot, 'data'),
      logLevel: 'info',
    });
    expect(DEFAULT_CONFIG.port).toBe(3030);
  });

  it('should coerce numeric variables', () => {
    const config = loadConfig({ RELAY_PORT: '8080', RELAY_REPLAY_CAPACITY: '50', RELAY_API_KEY: 'test-secret' });
    expect(config.port).toBe(8080);
    expect(config.replayCapacity).toBe(50);
    expect(config.apiKey).toBe('test-secret');
  });

  it('should treat empty strings as unset', () => {
    expect(loadConfig({ RELAY_PORT: '', RELAY_API_KEY: '' })).toMatchObject({ port: 3030, apiKey: undefined });
  });

  it('should list every invalid key', () => {
    let error: unknown;
    try {
      loadConfig({ RELAY_PORT: 'http', RELAY_REPLAY_CAPACITY: '0' });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigError);
    const issues = error instanceof ConfigError ? error.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^RELAY_PORT: /);
    expect(issues[1]).toMatch(/^RELAY_REPLAY_CAPACITY: /);
  });

  it('should require the sweep to run at least once per heartbeat timeout', () => {
    expect(() => loadConfig({ RELAY_HEARTBEAT_TIMEOUT_MS: '5000', RELAY_SWEEP_INTERVAL_MS: '10000' })).toThrow(
      /RELAY_SWEEP_INTERVAL_MS must not exceed RELAY_HEARTBEAT_TIMEOUT_MS/,
    );
  });

  it('should resolve the data directory against the package root', () => {
    expect(loadConfig({ RELAY_DATA_DIR: 'var/relay' }).dataDir).toBe(join(paths.projectRoot, 'var/relay'));
    expect(loadConfig({ RELAY_DATA_DIR: '/srv/relay' }).dataDir).toBe('/srv/relay');
  });

  it('should accept a log level in any case', () => {
    expect(loadConfig({ LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/^Invalid configuration:\n  LOG_LEVEL: /);
  });
});
