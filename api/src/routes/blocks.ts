import type { FastifyPluginAsync } from 'fastify';
import type { LocalBlockRelay, NewBlock } from '../adapters/index.js';
import { transaction } from '../db/index.js';
import { callerOf } from './helpers.js';

export interface BlockRoutesOptions {
  relay: LocalBlockRelay;
}

export const blocksRoutes: FastifyPluginAsync<BlockRoutesOptions> = async (fastify, { relay }) => {
  // Relay a new external block
  fastify.post<{ Body: NewBlock }>('/', async (request, reply) => {
    const body = request.body;
    if (!body || !body.blockHash || body.epoch === undefined) {
      return reply.status(400).send({ error: 'Missing required fields' });
    }

    const block = transaction(() => relay.postNewBlock(callerOf(request), body));

    fastify.log.info(`Block ${block.blockHash} relayed at epoch ${block.epoch}`);
    return reply.status(201).send(block);
  });

  fastify.get('/latest', async (request, reply) => {
    const block = relay.getLastBlock();
    if (!block) {
      return reply.status(404).send({ error: 'No block relayed yet' });
    }
    return { ...block, beacon: relay.currentBeacon() };
  });

  fastify.get<{ Params: { hash: string } }>('/:hash', async (request, reply) => {
    const block = relay.getBlock(request.params.hash);
    if (!block) {
      return reply.status(404).send({ error: 'Block not found' });
    }
    return block;
  });
};
