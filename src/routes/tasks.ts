import type { FastifyInstance } from 'fastify';
import type { TaskManager } from '../tasks/task-manager.js';
import type { TaskStatus } from '../types/task.js';
import { EngineSpawnError } from '../utils/errors.js';

export interface TaskRoutesOptions {
  manager: TaskManager;
}

interface TaskParams {
  id: string;
}

const TASK_STATUSES: TaskStatus[] = ['queued', 'running', 'paused', 'stopped', 'completed', 'failed'];

const taskParamsSchema = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'string', minLength: 1 },
  },
} as const;

// Task config fields are checked by zod in the manager; only the envelope is checked here
const taskBodySchema = {
  type: 'object',
  properties: {
    start: { type: 'boolean' },
  },
} as const;

export async function taskRoutes(fastify: FastifyInstance, options: TaskRoutesOptions): Promise<void> {
  const { manager } = options;

  // List tasks
  fastify.get<{ Querystring: { status?: TaskStatus } }>('/api/tasks', {
    schema: {
      querystring: {
        type: 'object',
        properties: {
          status: { type: 'string', enum: TASK_STATUSES },
        },
      },
    },
  }, async (request, reply) => {
    return reply.send(manager.listSnapshot(request.query.status));
  });

  // Add a task, optionally starting it
  fastify.post<{ Body: Record<string, unknown> }>('/api/tasks', {
    schema: { body: taskBodySchema },
  }, async (request, reply) => {
    const { start, ...input } = request.body;
    const id = await manager.addTask(input);
    if (start === true) {
      try {
        await manager.start(id);
      } catch (error) {
        // The task stays listed as failed; the caller needs its id to inspect or retry it
        if (error instanceof EngineSpawnError) {
          return reply.status(502).send({ error: error.name, message: error.message, id });
        }
        throw error;
      }
    }
    return reply.status(201).send({ id });
  });

  fastify.get<{ Params: TaskParams }>('/api/tasks/:id', {
    schema: { params: taskParamsSchema },
  }, async (request, reply) => {
    return reply.send(manager.getTask(request.params.id));
  });

  // Edit the config of a task that is not running
  fastify.patch<{ Params: TaskParams; Body: Record<string, unknown> }>('/api/tasks/:id', {
    schema: { params: taskParamsSchema, body: { type: 'object' } },
  }, async (request, reply) => {
    return reply.send(await manager.updateTask(request.params.id, request.body));
  });

  for (const command of ['start', 'pause', 'resume', 'stop'] as const) {
    fastify.post<{ Params: TaskParams }>(`/api/tasks/:id/${command}`, {
      schema: { params: taskParamsSchema },
    }, async (request, reply) => {
      return reply.send(await manager.command(request.params.id, command));
    });
  }

  fastify.delete<{ Params: TaskParams; Querystring: { deleteFiles?: boolean } }>('/api/tasks/:id', {
    schema: {
      params: taskParamsSchema,
      querystring: {
        type: 'object',
        properties: {
          deleteFiles: { type: 'boolean' },
        },
      },
    },
  }, async (request, reply) => {
    await manager.remove(request.params.id, { deleteFiles: request.query.deleteFiles === true });
    return reply.status(204).send();
  });

  // Task history, oldest first
  fastify.get<{ Params: TaskParams; Querystring: { tail?: number } }>('/api/tasks/:id/log', {
    schema: {
      params: taskParamsSchema,
      querystring: {
        type: 'object',
        properties: {
          tail: { type: 'integer', minimum: 1, maximum: 10000 },
        },
      },
    },
  }, async (request, reply) => {
    return reply.send(manager.readLog(request.params.id, request.query.tail));
  });
}
