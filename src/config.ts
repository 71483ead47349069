import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './utils/logger.js';
import { paths } from './utils/paths.js';

/**
 * Runtime configuration, read from the environment (a `.env` file is
 * loaded by the server entry point before this runs).
 *
 * Heartbeat invariant: clients must ping more often than
 * `heartbeatTimeoutMs`; the bundled client defaults to 25s against the
 * 30s default here.
 */

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

export const ConfigSchema = z
  .object({
    RELAY_PORT: z.coerce.number().int().min(0).max(65535).default(3030),
    RELAY_HOST: z.string().min(1).default('0.0.0.0'),
    RELAY_REPLAY_CAPACITY: intFromEnv(500),
    RELAY_BUFFER_RETENTION_MS: intFromEnv(60 * 60 * 1000),
    RELAY_HEARTBEAT_TIMEOUT_MS: intFromEnv(30_000),
    RELAY_SWEEP_INTERVAL_MS: intFromEnv(10_000),
    RELAY_SERVER_HEARTBEAT_MS: intFromEnv(30_000),
    RELAY_OUTBOUND_QUEUE_SIZE: intFromEnv(1024),
    RELAY_OVERFLOW_CLOSE_THRESHOLD: intFromEnv(1000),
    RELAY_API_KEY: z.string().min(1).optional(),
    RELAY_DATA_DIR: z.string().min(1).default('data'),
    LOG_LEVEL: z.string().toLowerCase().pipe(z.enum(LOG_LEVELS)).default('info'),
  })
  .refine(env => env.RELAY_SWEEP_INTERVAL_MS <= env.RELAY_HEARTBEAT_TIMEOUT_MS, {
    message: 'RELAY_SWEEP_INTERVAL_MS must not exceed RELAY_HEARTBEAT_TIMEOUT_MS',
    path: ['RELAY_SWEEP_INTERVAL_MS'],
  });

export interface RelayConfig {
  port: number;
  host: string;
  replayCapacity: number;
  bufferRetentionMs: number;
  heartbeatTimeoutMs: number;
  sweepIntervalMs: number;
  serverHeartbeatMs: number;
  outboundQueueSize: number;
  overflowCloseThreshold: number;
  apiKey?: string;
  /** Absolute; logs are written below it */
  dataDir: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse and validate configuration. Throws ConfigError listing every bad key.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): RelayConfig {
  // Empty strings mean "unset" so `RELAY_PORT=` in a .env file falls back to the default
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
  const result = ConfigSchema.safeParse(cleaned);

  if (!result.success) {
    throw new ConfigError(result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }

  const parsed = result.data;
  return {
    port: parsed.RELAY_PORT,
    host: parsed.RELAY_HOST,
    replayCapacity: parsed.RELAY_REPLAY_CAPACITY,
    bufferRetentionMs: parsed.RELAY_BUFFER_RETENTION_MS,
    heartbeatTimeoutMs: parsed.RELAY_HEARTBEAT_TIMEOUT_MS,
    sweepIntervalMs: parsed.RELAY_SWEEP_INTERVAL_MS,
    serverHeartbeatMs: parsed.RELAY_SERVER_HEARTBEAT_MS,
    outboundQueueSize: parsed.RELAY_OUTBOUND_QUEUE_SIZE,
    overflowCloseThreshold: parsed.RELAY_OVERFLOW_CLOSE_THRESHOLD,
    apiKey: parsed.RELAY_API_KEY,
    dataDir: paths.resolveDataDir(parsed.RELAY_DATA_DIR),
    logLevel: parsed.LOG_LEVEL,
  };
}

export const DEFAULT_CONFIG: RelayConfig = loadConfig({});
