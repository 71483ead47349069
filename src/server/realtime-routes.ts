import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { EventBus } from '../events/event-bus.js';
import { EventInputSchema } from '../events/types.js';
import type { ConnectionManager } from '../connections/connection-manager.js';
import { attachWebSocket } from '../connections/websocket-transport.js';
import { SSE_HEADERS, SseTransport } from '../connections/sse-transport.js';
import { LastEventIdSchema } from '../protocol/messages.js';
import { selectKinds } from '../subscriptions/subscription.js';

const SseQuerySchema = z.object({
  project_id: z.string().min(1),
  event_types: z.string().optional(),
  last_event_id: LastEventIdSchema.optional(),
});

const PublishBodySchema = z.object({
  project_id: z.string().min(1),
  kind: z.string(),
  payload: z.unknown(),
});

export function registerRealtimeRoutes(app: FastifyInstance, bus: EventBus, manager: ConnectionManager) {
  // Bidirectional channel: subscribe / ping from the client, events back
  app.get('/ws', { websocket: true }, (socket) => {
    attachWebSocket(manager, socket);
  });

  // One-way fallback for browsers behind proxies that break WebSockets
  app.get('/events', (request, reply) => {
    const query = SseQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send({ error: 'Invalid query', issues: query.error.issues });
    }

    // EventSource resends the last `id:` it saw on reconnect
    const header = request.headers['last-event-id'];
    let lastEventId = query.data.last_event_id;
    if (typeof header === 'string' && header.length > 0) {
      const parsed = LastEventIdSchema.safeParse(header);
      if (!parsed.success) {
        return reply.code(400).send({ error: 'Invalid Last-Event-ID header' });
      }
      lastEventId = parsed.data;
    }

    const eventTypes = (query.data.event_types ?? '').split(',').map(t => t.trim()).filter(Boolean);
    if (eventTypes.length > 0 && selectKinds(eventTypes).kinds.length === 0) {
      return reply.code(400).send({ error: `No known event types: ${eventTypes.join(', ')}` });
    }

    // Headers set by hooks (CORS) are not sent for a hijacked reply
    const hookHeaders = reply.getHeaders();
    reply.hijack();
    reply.raw.writeHead(200, { ...hookHeaders, ...SSE_HEADERS });

    const connection = manager.open(new SseTransport(reply.raw), { supervised: false });
    manager.subscribe(connection.id, {
      type: 'subscribe',
      project_id: query.data.project_id,
      event_types: eventTypes,
      last_event_id: lastEventId,
    });

    // The response closes when the client goes away or the stream is ended
    reply.raw.on('close', () => {
      manager.close(connection.id, 'client_closed');
    });
  });

  // Entry point for producers running out of process
  app.post('/publish', async (request, reply) => {
    const body = PublishBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({ error: 'Invalid publish request', issues: body.error.issues });
    }

    const input = EventInputSchema.safeParse({ kind: body.data.kind, payload: body.data.payload });
    if (!input.success) {
      return reply.code(400).send({ error: `Invalid ${body.data.kind} event`, issues: input.error.issues });
    }

    const event = bus.publish(body.data.project_id, input.data.kind, input.data.payload);
    return { event_id: event.sequence, project_id: event.projectId, timestamp: event.emittedAt };
  });

  app.get('/api/connections', async () => ({
    ...manager.stats(),
    buffers: bus.stats(),
  }));
}
