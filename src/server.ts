import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { registerRoutes } from './routes/index.js';
import type { TaskManager } from './tasks/task-manager.js';

export async function buildServer(manager: TaskManager): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false,
  });

  // Health check endpoint
  fastify.get('/health', async (_request, reply) => {
    return reply.send({ status: 'ok' });
  });

  await registerRoutes(fastify, manager);

  fastify.setNotFoundHandler(async (_request, reply) => {
    return reply.status(404).send({ error: 'NotFound', message: 'Not found' });
  });

  return fastify;
}
