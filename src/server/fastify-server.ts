import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import websocket from '@fastify/websocket';
import { registerRealtimeRoutes } from './realtime-routes.js';
import { createAuthMiddleware } from '../middleware/auth.js';
import { LocalEventBus } from '../events/local-event-bus.js';
import type { EventBus } from '../events/event-bus.js';
import { ConnectionManager } from '../connections/connection-manager.js';
import { DEFAULT_CONFIG, type RelayConfig } from '../config.js';
import { configureLogger, logger } from '../utils/logger.js';
import { paths } from '../utils/paths.js';

export interface RelayServer {
  app: FastifyInstance;
  bus: EventBus;
  manager: ConnectionManager;
}

export interface BuildServerOptions {
  bus?: EventBus;
  /** Registers POST /shutdown when provided */
  onShutdownRequest?: () => void;
}

/**
 * Assemble the relay: one bus, one connection manager, the Fastify app
 * that exposes them. Timers are not started here; see startHttpServer.
 */
export async function buildServer(config: RelayConfig = DEFAULT_CONFIG, options: BuildServerOptions = {}): Promise<RelayServer> {
  const bus = options.bus ?? new LocalEventBus({
    replayCapacity: config.replayCapacity,
    retentionMs: config.bufferRetentionMs,
  });
  const manager = new ConnectionManager(bus, {
    heartbeatTimeoutMs: config.heartbeatTimeoutMs,
    sweepIntervalMs: config.sweepIntervalMs,
    serverHeartbeatMs: config.serverHeartbeatMs,
    outboundQueueSize: config.outboundQueueSize,
    overflowCloseThreshold: config.overflowCloseThreshold,
  });

  const app = Fastify({ logger: false, bodyLimit: 1024 * 1024 });

  // CORS
  await app.register(cors, { origin: '*' });
  await app.register(websocket);

  // Auth middleware
  app.addHook('preHandler', createAuthMiddleware(config.apiKey));

  // Close client connections before the HTTP server waits on them
  app.addHook('preClose', async () => {
    manager.shutdown();
  });

  registerRealtimeRoutes(app, bus, manager);

  // Health check
  app.get('/health', async () => ({ status: 'ok', connections: manager.size }));

  // Version endpoint
  app.get('/version', async () => paths.getVersion());

  const { onShutdownRequest } = options;
  if (onShutdownRequest) {
    app.post('/shutdown', async (request, reply) => {
      setTimeout(onShutdownRequest, 500);
      return reply.send('Shutting down...');
    });
  }

  return { app, bus, manager };
}

export async function startHttpServer(config: RelayConfig = DEFAULT_CONFIG): Promise<RelayServer> {
  configureLogger({ level: config.logLevel, dataDir: config.dataDir });

  let server: RelayServer | undefined;

  const shutdown = async () => {
    logger.info('Shutting down gracefully...');
    try {
      await server?.app.close();
    } catch (err) {
      logger.error('Error during shutdown', { error: err });
    }
    process.exit(0);
  };

  server = await buildServer(config, { onShutdownRequest: () => void shutdown() });
  await server.app.listen({ port: config.port, host: config.host });
  server.manager.start();

  process.once('SIGTERM', () => void shutdown());
  process.once('SIGINT', () => void shutdown());

  logger.info('Relay listening', { port: config.port, host: config.host });
  console.log(`dashboard-relay running on http://localhost:${config.port}`);
  console.log(`- WebSocket: ws://localhost:${config.port}/ws`);
  console.log(`- SSE: http://localhost:${config.port}/events?project_id=<id>`);
  console.log(`- Publish: POST http://localhost:${config.port}/publish`);

  return server;
}
