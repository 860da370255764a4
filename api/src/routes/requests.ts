import type { FastifyPluginAsync } from 'fastify';
import { serializeRequest, type InclusionReport, type ResultReport } from '@oracle-bridge/sdk';
import type { RequestBoard } from '../board/index.js';
import { amount, callContext, callerOf, handleParam, type ValueBody } from './helpers.js';

interface CreateRequestBody extends ValueBody {
  payloadRef: string;
  inclusionReward: string;
  tallyReward: string;
}

interface UpgradeRequestBody extends ValueBody {
  addInclusion?: string;
  addTally?: string;
}

interface ClaimabilityBody {
  ids: number[];
}

export interface RequestRoutesOptions {
  board: RequestBoard;
}

export const requestsRoutes: FastifyPluginAsync<RequestRoutesOptions> = async (fastify, { board }) => {
  // Post data request
  fastify.post<{ Body: CreateRequestBody }>('/', async (request, reply) => {
    const body = request.body;
    if (!body || !body.payloadRef) {
      return reply.status(400).send({ error: 'Missing required fields' });
    }

    const id = board.create(callContext(request, body), {
      payloadRef: body.payloadRef,
      inclusionReward: amount(body.inclusionReward, 'inclusionReward'),
      tallyReward: amount(body.tallyReward, 'tallyReward'),
    });

    return reply.status(201).send({ id, status: board.requestStatus(id) });
  });

  // Claimability of a batch
  fastify.post<{ Body: ClaimabilityBody }>('/claimability', async (request, reply) => {
    const ids = request.body?.ids;
    if (!Array.isArray(ids)) {
      return reply.status(400).send({ error: 'ids must be an array' });
    }
    return { ids, claimable: board.checkClaimability(ids) };
  });

  // Read data request
  fastify.get<{ Params: { id: string } }>('/:id', async (request) => {
    const id = handleParam(request.params.id);
    return {
      ...serializeRequest(board.readRequest(id)),
      status: board.requestStatus(id),
    };
  });

  fastify.get<{ Params: { id: string } }>('/:id/payload', async (request) => {
    const id = handleParam(request.params.id);
    return { id, payload: board.readPayload(id) };
  });

  fastify.get<{ Params: { id: string } }>('/:id/result', async (request) => {
    const id = handleParam(request.params.id);
    return { id, result: board.readResult(id) };
  });

  // Upgrade reward
  fastify.post<{ Params: { id: string }; Body: UpgradeRequestBody }>('/:id/upgrade', async (request) => {
    const id = handleParam(request.params.id);
    board.upgradeReward(callContext(request, request.body), id, {
      addInclusion: amount(request.body?.addInclusion, 'addInclusion'),
      addTally: amount(request.body?.addTally, 'addTally'),
    });

    const rewards = board.readRewards(id);
    return {
      id,
      inclusionReward: rewards.inclusionReward.toString(),
      tallyReward: rewards.tallyReward.toString(),
      blockReward: rewards.blockReward.toString(),
    };
  });

  // Report inclusion
  fastify.post<{ Params: { id: string }; Body: InclusionReport }>('/:id/inclusion', async (request, reply) => {
    const id = handleParam(request.params.id);
    if (!request.body) {
      return reply.status(400).send({ error: 'Missing report' });
    }
    board.reportInclusion({ from: callerOf(request) }, id, request.body);

    fastify.log.info(`Inclusion of request ${id} reported`);
    return {
      id,
      status: board.requestStatus(id),
      inclusionProofHash: board.readInclusionProofHash(id),
    };
  });

  // Report result
  fastify.post<{ Params: { id: string }; Body: ResultReport }>('/:id/result', async (request, reply) => {
    const id = handleParam(request.params.id);
    if (!request.body) {
      return reply.status(400).send({ error: 'Missing report' });
    }
    board.reportResult({ from: callerOf(request) }, id, request.body);

    fastify.log.info(`Result of request ${id} reported`);
    return { id, status: board.requestStatus(id), result: board.readResult(id) };
  });
};
