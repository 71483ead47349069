import type { FastifyRequest, FastifyReply, preHandlerAsyncHookHandler } from 'fastify';

const PROTECTED_PREFIXES = ['/publish', '/shutdown', '/api/'];

/**
 * Bearer-token check for producer and admin routes. Subscriber routes
 * (/ws, /events) and health checks stay open. No key configured → no auth.
 */
export function createAuthMiddleware(apiKey: string | undefined): preHandlerAsyncHookHandler {
  return async function authMiddleware(request: FastifyRequest, reply: FastifyReply) {
    if (!apiKey) return;

    const path = request.url.split('?')[0] ?? request.url;
    if (!PROTECTED_PREFIXES.some(prefix => path.startsWith(prefix))) {
      return;
    }

    if (request.headers.authorization !== `Bearer ${apiKey}`) {
      return reply.code(401).send({ error: 'Unauthorized' });
    }
  };
}
