#!/usr/bin/env node

import 'dotenv/config';
import { paths } from '../utils/paths.js';
import { ConfigError, loadConfig, type RelayConfig } from '../config.js';
import { isServerRunning, getServerVersion, shutdownServer } from './server-manager.js';

const args = process.argv.slice(2);
const command = args[0];

function readConfig(): RelayConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

if (command === 'serve') {
  const { startHttpServer } = await import('../server/fastify-server.js');
  await startHttpServer(readConfig());
} else if (command === 'version') {
  console.log(paths.getVersion());
  process.exit(0);
} else if (command === 'status') {
  const { port } = readConfig();
  const running = await isServerRunning(port);

  if (!running) {
    console.log('Server is not running');
    process.exit(1);
  }

  const version = await getServerVersion(port);
  console.log(`Server is running on port ${port}`);
  console.log(`Version: ${version || 'unknown'}`);
  console.log(`WebSocket: ws://localhost:${port}/ws`);
  process.exit(0);
} else if (command === 'stop') {
  const { port, apiKey } = readConfig();
  const running = await isServerRunning(port);

  if (!running) {
    console.log('Server is not running');
    process.exit(0);
  }

  console.log(`Stopping server on port ${port}...`);
  const stopped = await shutdownServer(port, apiKey);
  console.log(stopped ? 'Server stopped' : 'Server refused the shutdown request');
  process.exit(stopped ? 0 : 1);
} else {
  console.log(`
dashboard-relay - Real-time event relay for project dashboards

Usage:
  dashboard-relay serve        Run the relay (WebSocket /ws, SSE /events, POST /publish)
  dashboard-relay version      Show version
  dashboard-relay status       Check if the relay is running
  dashboard-relay stop         Stop the relay
  dashboard-relay --help       Show this help

Environment variables (a .env file is read too):
  RELAY_PORT                       HTTP port (default: 3030)
  RELAY_HOST                       Bind address (default: 0.0.0.0)
  RELAY_REPLAY_CAPACITY            Events kept per project for replay (default: 500)
  RELAY_BUFFER_RETENTION_MS        Idle time before a project's buffer is dropped (default: 3600000)
  RELAY_HEARTBEAT_TIMEOUT_MS       Close clients silent for longer than this (default: 30000)
  RELAY_SWEEP_INTERVAL_MS          Heartbeat sweep period (default: 10000)
  RELAY_SERVER_HEARTBEAT_MS        Server heartbeat push period (default: 30000)
  RELAY_OUTBOUND_QUEUE_SIZE        Per-connection outbound queue (default: 1024)
  RELAY_OVERFLOW_CLOSE_THRESHOLD   Consecutive drops before a forced close (default: 1000)
  RELAY_API_KEY                    Bearer token for /publish, /shutdown, /api/*
  RELAY_DATA_DIR                   Data directory for logs (default: ./data)
  LOG_LEVEL                        debug | info | warn | error (default: info)
  `);
  process.exit(command === undefined || command === '--help' || command === '-h' ? 0 : 1);
}
