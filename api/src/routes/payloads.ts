import type { FastifyPluginAsync } from 'fastify';
import type { PayloadStore } from '../adapters/index.js';
import { transaction } from '../db/index.js';
import { callerOf } from './helpers.js';

interface PayloadBody {
  bytes: string;
}

export interface PayloadRoutesOptions {
  payloads: PayloadStore;
}

export const payloadsRoutes: FastifyPluginAsync<PayloadRoutesOptions> = async (fastify, { payloads }) => {
  fastify.post<{ Body: PayloadBody }>('/', async (request, reply) => {
    if (!request.body?.bytes) {
      return reply.status(400).send({ error: 'bytes is required' });
    }

    const ref = transaction(() => payloads.register(callerOf(request), request.body.bytes));
    return reply.status(201).send({ ref });
  });

  fastify.put<{ Params: { ref: string }; Body: PayloadBody }>('/:ref', async (request, reply) => {
    if (!request.body?.bytes) {
      return reply.status(400).send({ error: 'bytes is required' });
    }

    transaction(() => payloads.replace(callerOf(request), request.params.ref, request.body.bytes));
    return { ref: request.params.ref };
  });
};
