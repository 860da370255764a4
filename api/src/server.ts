import 'dotenv/config';
import Fastify, { type FastifyError } from 'fastify';
import cors from '@fastify/cors';
import { logger } from './logger.js';
import { isBoardError } from './board/index.js';
import type { BoardNode } from './node.js';
import { amount } from './routes/helpers.js';
import { requestsRoutes } from './routes/requests.js';
import { claimsRoutes } from './routes/claims.js';
import { blocksRoutes } from './routes/blocks.js';
import { payloadsRoutes } from './routes/payloads.js';

export interface ServerOptions {
  /**
   * Advance the host clock by one block after every successful write
   */
  automine?: boolean;
}

export function buildServer(node: BoardNode, options: ServerOptions = {}) {
  const { board, relay, payloads, clock } = node;

  const app = Fastify({ logger });

  // CORS - allow all origins for API access
  app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Caller-Address'],
  });

  if (options.automine) {
    app.addHook('onSend', async (request, reply, payload) => {
      if (request.method !== 'GET' && reply.statusCode < 400) {
        clock.mine();
      }
      return payload;
    });
  }

  // Health check
  app.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      blockNumber: clock.blockNumber(),
      epoch: relay.currentEpoch(),
      requests: board.requestCount(),
    };
  });

  app.get<{ Querystring: { gasPrice?: string } }>('/estimate', async (request) => {
    const estimate = board.estimateGasCost(amount(request.query.gasPrice, 'gasPrice'));
    return {
      inclusion: estimate.inclusion.toString(),
      tally: estimate.tally.toString(),
      block: estimate.block.toString(),
    };
  });

  // Register routes
  app.register(payloadsRoutes, { prefix: '/payloads', payloads });
  app.register(blocksRoutes, { prefix: '/blocks', relay });
  app.register(requestsRoutes, { prefix: '/requests', board });
  app.register(claimsRoutes, { prefix: '/claims', board });

  // Error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (isBoardError(error)) {
      request.log.warn({ reason: error.reason }, error.message);
      return reply.status(error.statusCode).send({
        error: error.name,
        reason: error.reason,
        message: error.message,
        statusCode: error.statusCode,
      });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      app.log.error(error);
    }
    return reply.status(statusCode).send({
      error: error.name,
      message: error.message,
      statusCode,
    });
  });

  return app;
}
