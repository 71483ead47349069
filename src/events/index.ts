export type { EventBus, EventBusStats, ProjectBufferStats } from './event-bus.js';
export { LocalEventBus, DEFAULT_RETENTION_MS, type LocalEventBusOptions } from './local-event-bus.js';
export { ReplayBuffer, DEFAULT_REPLAY_CAPACITY, type ReplayResult } from './replay-buffer.js';
export { InvalidEventError } from './errors.js';
export {
  EVENT_KINDS,
  PAYLOAD_SCHEMAS,
  EventInputSchema,
  isEventKind,
  type EventKind,
  type EventInput,
  type EventMeta,
  type DeepReadonly,
  type EventPayload,
  type ProjectEvent,
  type ProjectEventOf,
  type ProjectEventCallback,
} from './types.js';
export * from './publishers.js';
