import type { FastifyError, FastifyInstance, FastifyReply } from 'fastify';
import type { TaskManager } from '../tasks/task-manager.js';
import {
  EngineSpawnError,
  InvalidTransitionError,
  UnknownTaskError,
  ValidationError,
} from '../utils/errors.js';
import { taskRoutes } from './tasks.js';

function statusFor(error: FastifyError): number {
  if (error instanceof UnknownTaskError) return 404;
  if (error instanceof InvalidTransitionError) return 409;
  if (error instanceof ValidationError) return 400;
  if (error instanceof EngineSpawnError) return 502;
  // Fastify schema validation failures
  if (error.validation) return 400;
  return 500;
}

function sendError(error: FastifyError, reply: FastifyReply): FastifyReply {
  const status = statusFor(error);
  if (status >= 500 && !(error instanceof EngineSpawnError)) {
    console.error('[HTTP] Unhandled error:', error);
  }
  const name = error.validation ? 'ValidationError' : error.name;
  return reply.status(status).send({ error: name, message: error.message });
}

export async function registerRoutes(fastify: FastifyInstance, manager: TaskManager): Promise<void> {
  fastify.setErrorHandler((error, _request, reply) => sendError(error, reply));

  await fastify.register(taskRoutes, { manager });
}
