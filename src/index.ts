// Events
export * from './events/index.js';

// Subscriptions
export { Subscription, selectKinds, type KindSelection } from './subscriptions/subscription.js';

// Protocol
export * from './protocol/messages.js';

// Connections
export { OutboundQueue, DEFAULT_OUTBOUND_QUEUE_SIZE, type PushResult } from './connections/outbound-queue.js';
export {
  Connection,
  DEFAULT_OVERFLOW_CLOSE_THRESHOLD,
  type ConnectionState,
  type ConnectionOptions,
  type ConnectionInfo,
} from './connections/connection.js';
export {
  ConnectionManager,
  DEFAULT_MANAGER_OPTIONS,
  type ConnectionManagerOptions,
  type ConnectionStats,
  type OpenOptions,
  type SubscribeOutcome,
} from './connections/connection-manager.js';
export { CLOSE_CODES, type CloseReason, type Transport, type TransportKind } from './connections/transport.js';
export { WebSocketTransport, attachWebSocket, type RelaySocket } from './connections/websocket-transport.js';
export { SseTransport, SSE_HEADERS } from './connections/sse-transport.js';

// Client
export { Emitter } from './client/emitter.js';
export { ReconnectPolicy, DEFAULT_RECONNECT_CONFIG, type ReconnectConfig, type ReconnectDecision } from './client/reconnect-policy.js';
export {
  MemorySequenceStore,
  StorageSequenceStore,
  type SequenceStore,
  type KeyValueStorage,
} from './client/sequence-store.js';
export {
  ClientSession,
  DEFAULT_PING_INTERVAL_MS,
  DEFAULT_SERVER_HEARTBEAT_TIMEOUT_MS,
  type ClientSessionOptions,
  type ClientSessionEvents,
  type ClientSocket,
  type ReceivedEvent,
  type SessionState,
  type SocketFactory,
} from './client/client-session.js';

// Server
export { buildServer, startHttpServer, type RelayServer, type BuildServerOptions } from './server/fastify-server.js';
export { loadConfig, ConfigSchema, ConfigError, DEFAULT_CONFIG, type RelayConfig } from './config.js';
