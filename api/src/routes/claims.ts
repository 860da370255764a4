import type { FastifyPluginAsync } from 'fastify';
import type { ClaimSubmission } from '@oracle-bridge/sdk';
import type { RequestBoard } from '../board/index.js';
import { callerOf } from './helpers.js';

export interface ClaimRoutesOptions {
  board: RequestBoard;
}

export const claimsRoutes: FastifyPluginAsync<ClaimRoutesOptions> = async (fastify, { board }) => {
  fastify.post<{ Body: ClaimSubmission }>('/', async (request, reply) => {
    const body = request.body;
    if (!body || !Array.isArray(body.ids) || !body.proof || !body.publicKey || !body.signature) {
      return reply.status(400).send({ error: 'Missing required fields' });
    }

    const ids = board.claim({ from: callerOf(request) }, {
      ids: body.ids,
      proof: body.proof,
      publicKey: body.publicKey,
      uPoint: body.uPoint ?? '0x',
      vComponents: Array.isArray(body.vComponents) ? body.vComponents : [],
      signature: body.signature,
    });

    fastify.log.info(`Claimed ${ids.length} request(s)`);
    return reply.status(201).send({ claimed: ids });
  });
};
