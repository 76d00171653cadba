import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import type { IntentStrategy } from '../core/types';

export function createServer(
  strategy: IntentStrategy,
  options: FastifyServerOptions = { logger: true },
): FastifyInstance {
  const server = Fastify(options);

  server.get('/health', async () => ({ ok: true, strategy }));

  return server;
}
