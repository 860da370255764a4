/**
 * Inclusion/Result Settlement
 *
 * Both reports follow the same order: guards, then the write that records
 * the new fact, then the relay's proof check, then payouts. A rejected proof
 * throws, and the surrounding transaction undoes the recorded fact.
 */

import { hashInclusion, hashResult } from '@oracle-bridge/proof';
import type { CallContext, DataRequest, InclusionReport, ResultReport } from '@oracle-bridge/sdk';
import { logger } from '../logger.js';
import type { BlockClock, BlockRelay, ReporterPopulation } from '../adapters/types.js';
import { AuthorizationError, ProofError, ValidationError } from './errors.js';
import type { EventLog } from './events.js';
import {
  requireActiveClaim,
  requireEpochAfter,
  requireEpochNotBefore,
  requireHexBytes,
  requireIdentity,
  requireIncluded,
  requireNoResult,
  requireNotIncluded,
  requireReport,
} from './guards.js';
import type { PaidBlockSet, ValueLedger } from './ledger.js';
import type { RequestRegistry } from './registry.js';

const log = logger.child({ component: 'settlement' });

export interface SettlementDependencies {
  registry: RequestRegistry;
  relay: BlockRelay;
  reporters: ReporterPopulation;
  ledger: ValueLedger;
  paidBlocks: PaidBlockSet;
  clock: BlockClock;
  events: EventLog;
  claimExpiryBlocks: number;
}

export class Settlement {
  constructor(private readonly deps: SettlementDependencies) {}

  /**
   * Prove a claimed request made it into an external block.
   * Pays the claimant the inclusion reward and the block's relayer half of
   * the block reward.
   */
  reportInclusion(call: CallContext, id: number, input: InclusionReport): void {
    const reporter = requireIdentity(call.from);
    const report = requireReport(input, 1);
    const request = this.deps.registry.get(id);
    const blockNumber = this.deps.clock.blockNumber();

    requireNotIncluded(request);
    requireActiveClaim(request, blockNumber, this.deps.claimExpiryBlocks);
    requireEpochAfter(request, report.epoch);

    request.epoch = report.epoch;
    request.inclusionProofHash = hashInclusion(request.payloadHash, report.proof[0]);
    this.deps.registry.save(request);

    const verified = this.deps.relay.verifyInclusionProof(
      report.proof,
      report.blockHash,
      report.epoch,
      report.index,
      request.payloadHash
    );
    if (!verified) {
      throw new ProofError('invalid_inclusion_proof', 'Invalid PoI');
    }

    const blockShare = request.blockReward / 2n;
    const inclusionReward = request.inclusionReward;
    request.blockReward -= blockShare;
    request.inclusionReward = 0n;
    request.paidOut += blockShare + inclusionReward;
    this.deps.registry.save(request);

    this.payBlockReward(request, report, blockShare);
    this.deps.ledger.credit(request.claimant, inclusionReward);
    this.deps.reporters.pushActivity(request.claimant, blockNumber);

    this.deps.events.record(
      { name: 'IncludedRequest', id: request.id, from: reporter, blockHash: report.blockHash },
      blockNumber
    );
    log.info({ id: request.id, blockHash: report.blockHash, epoch: report.epoch }, 'inclusion reported');
  }

  /**
   * Prove the external network's result for an included request.
   * Pays the caller the tally reward and the block's relayer what is left of
   * the block reward. Terminal.
   */
  reportResult(call: CallContext, id: number, input: ResultReport): void {
    const reporter = requireIdentity(call.from);
    const report = requireReport(input, 0);
    const result = requireHexBytes(report.result, 'result');
    const request = this.deps.registry.get(id);
    const blockNumber = this.deps.clock.blockNumber();

    requireIncluded(request);
    requireNoResult(request);
    if (!this.deps.reporters.isActive(reporter)) {
      throw new AuthorizationError('unauthorized_reporter', 'Unauthorized reporter');
    }
    requireEpochNotBefore(request, report.epoch);
    if (result === '0x') {
      throw new ValidationError('empty_result', 'Result must not be empty');
    }

    request.epoch = report.epoch;
    request.result = result;
    this.deps.registry.save(request);

    const verified = this.deps.relay.verifyResultProof(
      report.proof,
      report.blockHash,
      report.epoch,
      report.index,
      hashResult(request.inclusionProofHash, result)
    );
    if (!verified) {
      throw new ProofError('invalid_result_proof', 'Invalid PoI');
    }

    const blockShare = request.blockReward;
    const tallyReward = request.tallyReward;
    request.blockReward = 0n;
    request.tallyReward = 0n;
    request.paidOut += blockShare + tallyReward;
    this.deps.registry.save(request);

    this.payBlockReward(request, report, blockShare);
    this.deps.ledger.credit(reporter, tallyReward);

    this.deps.events.record(
      { name: 'PostedResult', id: request.id, from: reporter, blockHash: report.blockHash },
      blockNumber
    );
    log.info({ id: request.id, blockHash: report.blockHash, epoch: report.epoch }, 'result reported');
  }

  /**
   * The first request settled against a block pays that block's relayer;
   * later requests in the same block refund their requestor instead.
   */
  private payBlockReward(request: DataRequest, report: InclusionReport, amount: bigint): void {
    if (amount === 0n) return;

    if (this.deps.paidBlocks.has(report.blockHash)) {
      this.deps.ledger.credit(request.requestor, amount);
      log.debug({ id: request.id, blockHash: report.blockHash }, 'block already paid, refunded requestor');
      return;
    }

    const relayer = this.deps.relay.relayerOfRecord(report.blockHash, report.epoch);
    this.deps.paidBlocks.add(report.blockHash, relayer, request.id);
    this.deps.ledger.credit(relayer, amount);
  }
}
