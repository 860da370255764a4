/**
 * Request Registry
 *
 * Owns the handle-indexed collection of data requests and their reward
 * pools. Handles are sqlite rowids: dense, starting at 1, never reused.
 * Callers are expected to run mutations inside a transaction.
 */

import { hashPayload, ZERO_HASH } from '@oracle-bridge/proof';
import {
  CONSTANTS,
  type CallContext,
  type CreateRequestParams,
  type DataRequest,
  type RewardPools,
  type UpgradeRewardParams,
} from '@oracle-bridge/sdk';
import { execute, query, queryOne } from '../db/index.js';
import { logger } from '../logger.js';
import type { BlockClock, BlockRelay, PayloadSource } from '../adapters/types.js';
import { ValidationError } from './errors.js';
import type { EventLog } from './events.js';
import {
  isClaimable,
  isIncluded,
  requireAmount,
  requireHandle,
  requireIdentity,
  requireNoResult,
  requireResult,
  requireRewardsCoverGas,
  requireSufficientValue,
} from './guards.js';

const log = logger.child({ component: 'registry' });

// ============================================================================
// Row mapping
// ============================================================================

interface RequestRow {
  [key: string]: unknown;
  id: number;
  payload_ref: string;
  payload_hash: string;
  inclusion_reward: string;
  tally_reward: string;
  block_reward: string;
  gas_price_at_post: string;
  epoch: number;
  inclusion_proof_hash: string;
  result: string;
  claimant: string;
  claim_block: number;
  requestor: string;
  deposited: string;
  paid_out: string;
}

function fromRow(row: RequestRow): DataRequest {
  return {
    id: row.id,
    payloadRef: row.payload_ref,
    payloadHash: row.payload_hash,
    inclusionReward: BigInt(row.inclusion_reward),
    tallyReward: BigInt(row.tally_reward),
    blockReward: BigInt(row.block_reward),
    gasPriceAtPost: BigInt(row.gas_price_at_post),
    epoch: row.epoch,
    inclusionProofHash: row.inclusion_proof_hash,
    result: row.result,
    claimant: row.claimant,
    claimBlock: row.claim_block,
    requestor: row.requestor,
    deposited: BigInt(row.deposited),
    paidOut: BigInt(row.paid_out),
  };
}

// ============================================================================
// Registry
// ============================================================================

export interface RegistryDependencies {
  payloads: PayloadSource;
  relay: BlockRelay;
  clock: BlockClock;
  events: EventLog;
  claimExpiryBlocks: number;
}

export class RequestRegistry {
  constructor(private readonly deps: RegistryDependencies) {}

  /**
   * Post a new data request. `call.value` funds the three pools: whatever
   * exceeds inclusion plus tally becomes the block reward.
   */
  create(call: CallContext, params: CreateRequestParams): number {
    const requestor = requireIdentity(call.from);
    const payloadRef = requireIdentity(params.payloadRef, 'payloadRef');
    const value = requireAmount(call.value ?? 0n, 'value');
    const gasPrice = requireAmount(call.gasPrice ?? 0n, 'gasPrice');
    const inclusionReward = requireAmount(params.inclusionReward, 'inclusionReward');
    const tallyReward = requireAmount(params.tallyReward, 'tallyReward');

    requireSufficientValue(value, inclusionReward + tallyReward);

    const pools: RewardPools = {
      inclusionReward,
      tallyReward,
      blockReward: value - inclusionReward - tallyReward,
    };
    requireRewardsCoverGas(pools, gasPrice, false);

    const payload = this.deps.payloads.payloadBytes(payloadRef);
    if (payload === undefined) {
      throw new ValidationError('unknown_payload', `Unknown payload reference: ${payloadRef}`);
    }

    const now = Date.now();
    const result = execute(
      `INSERT INTO data_requests
       (payload_ref, payload_hash, inclusion_reward, tally_reward, block_reward,
        gas_price_at_post, epoch, inclusion_proof_hash, result, claimant, claim_block,
        requestor, deposited, paid_out, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 0, ?, ?, '0', ?, ?)`,
      [
        payloadRef,
        hashPayload(payload),
        pools.inclusionReward.toString(),
        pools.tallyReward.toString(),
        pools.blockReward.toString(),
        gasPrice.toString(),
        this.deps.relay.currentEpoch(),
        ZERO_HASH,
        CONSTANTS.EMPTY_RESULT,
        CONSTANTS.ZERO_ADDRESS,
        requestor,
        value.toString(),
        now,
        now,
      ]
    );

    const id = Number(result.lastInsertRowid);
    this.deps.events.record({ name: 'PostedRequest', id, from: requestor }, this.deps.clock.blockNumber());
    log.info({ id, requestor, value: value.toString() }, 'posted data request');

    return id;
  }

  /**
   * Add value to an unresolved request. A higher gas price than the one
   * recorded re-validates the pools at that price.
   */
  upgradeReward(call: CallContext, id: number, params: UpgradeRewardParams): void {
    const from = requireIdentity(call.from);
    const request = this.get(id);
    requireNoResult(request);

    const value = requireAmount(call.value ?? 0n, 'value');
    const gasPrice = requireAmount(call.gasPrice ?? 0n, 'gasPrice');
    const addInclusion = requireAmount(params.addInclusion, 'addInclusion');
    const addTally = requireAmount(params.addTally, 'addTally');

    requireSufficientValue(value, addInclusion + addTally);

    const included = isIncluded(request);
    if (included && addInclusion !== 0n) {
      throw new ValidationError(
        'inclusion_already_paid',
        'Inclusion reward was already paid and cannot be increased'
      );
    }

    request.inclusionReward += addInclusion;
    request.tallyReward += addTally;
    request.blockReward += value - addInclusion - addTally;
    request.deposited += value;

    if (gasPrice > request.gasPriceAtPost) {
      requireRewardsCoverGas(request, gasPrice, included);
      request.gasPriceAtPost = gasPrice;
    }

    this.save(request);
    this.deps.events.record(
      { name: 'UpgradedRequest', id: request.id, from, added: value },
      this.deps.clock.blockNumber()
    );
    log.info({ id: request.id, added: value.toString() }, 'upgraded reward');
  }

  checkClaimability(ids: readonly number[]): boolean[] {
    const blockNumber = this.deps.clock.blockNumber();
    return ids.map((id) => isClaimable(this.get(id), blockNumber, this.deps.claimExpiryBlocks));
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * @throws ValidationError if no request has this handle
   */
  get(id: number): DataRequest {
    const row = queryOne<RequestRow>('SELECT * FROM data_requests WHERE id = ?', [requireHandle(id)]);
    if (!row) {
      throw new ValidationError('bad_handle', `Data request ${id} does not exist`);
    }
    return fromRow(row);
  }

  /**
   * Current payload bytes, provided they still hash to what was recorded
   */
  readPayload(id: number): string {
    const request = this.get(id);
    const payload = this.deps.payloads.payloadBytes(request.payloadRef);

    if (payload === undefined || hashPayload(payload) !== request.payloadHash) {
      log.warn({ id, payloadRef: request.payloadRef }, 'payload hash mismatch');
      throw new ValidationError('payload_tampered', 'The payload has been tampered with');
    }

    return payload;
  }

  readResult(id: number): string {
    const request = this.get(id);
    requireResult(request);
    return request.result;
  }

  readRewards(id: number): RewardPools {
    const { inclusionReward, tallyReward, blockReward } = this.get(id);
    return { inclusionReward, tallyReward, blockReward };
  }

  readInclusionProofHash(id: number): string {
    return this.get(id).inclusionProofHash;
  }

  count(): number {
    return queryOne<{ count: number }>('SELECT COUNT(*) as count FROM data_requests')?.count ?? 0;
  }

  /**
   * Sum of every pool still held for pending requests
   */
  escrowBalance(): bigint {
    return query<{ inclusion_reward: string; tally_reward: string; block_reward: string }>(
      'SELECT inclusion_reward, tally_reward, block_reward FROM data_requests'
    ).reduce(
      (total, row) =>
        total + BigInt(row.inclusion_reward) + BigInt(row.tally_reward) + BigInt(row.block_reward),
      0n
    );
  }

  // ==========================================================================
  // Writes used by the gate and settlement
  // ==========================================================================

  recordClaim(id: number, claimant: string, blockNumber: number): void {
    execute(
      'UPDATE data_requests SET claimant = ?, claim_block = ?, updated_at = ? WHERE id = ?',
      [claimant, blockNumber, Date.now(), id]
    );
  }

  save(request: DataRequest): void {
    const paidOut = request.deposited - request.inclusionReward - request.tallyReward - request.blockReward;
    if (paidOut !== request.paidOut) {
      throw new Error(
        `Ledger mismatch on request ${request.id}: pools leave ${paidOut} paid out, recorded ${request.paidOut}`
      );
    }

    execute(
      `UPDATE data_requests
       SET inclusion_reward = ?, tally_reward = ?, block_reward = ?, gas_price_at_post = ?,
           epoch = ?, inclusion_proof_hash = ?, result = ?, claimant = ?, claim_block = ?,
           deposited = ?, paid_out = ?, updated_at = ?
       WHERE id = ?`,
      [
        request.inclusionReward.toString(),
        request.tallyReward.toString(),
        request.blockReward.toString(),
        request.gasPriceAtPost.toString(),
        request.epoch,
        request.inclusionProofHash,
        request.result,
        request.claimant,
        request.claimBlock,
        request.deposited.toString(),
        request.paidOut.toString(),
        Date.now(),
        request.id,
      ]
    );
  }
}
