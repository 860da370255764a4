/**
 * Request Board
 *
 * Public face of the data-request lifecycle. Every mutating call runs as
 * one database transaction: it applies in full or not at all, and its
 * events reach subscribers only after commit.
 */

import type {
  CallContext,
  ClaimSubmission,
  CreateRequestParams,
  DataRequest,
  GasCostEstimate,
  InclusionReport,
  RequestStatus,
  ResultReport,
  RewardPools,
  UpgradeRewardParams,
} from '@oracle-bridge/sdk';
import { config } from '../config.js';
import { transaction } from '../db/index.js';
import type {
  BlockClock,
  BlockRelay,
  PayloadSource,
  ReporterPopulation,
  SignatureVerifier,
  VrfVerifier,
} from '../adapters/types.js';
import { estimateGasCost } from './estimator.js';
import { EventLog } from './events.js';
import { ClaimGate } from './gate.js';
import { hasResult, requestStatus } from './guards.js';
import { PaidBlockSet, ValueLedger } from './ledger.js';
import { RequestRegistry } from './registry.js';
import { Settlement } from './settlement.js';

/**
 * Operations a data-request board offers to requestors and reporters
 */
export interface DataRequestBoard {
  create(call: CallContext, params: CreateRequestParams): number;
  upgradeReward(call: CallContext, id: number, params: UpgradeRewardParams): void;
  checkClaimability(ids: readonly number[]): boolean[];
  claim(call: CallContext, submission: ClaimSubmission): number[];
  reportInclusion(call: CallContext, id: number, report: InclusionReport): void;
  reportResult(call: CallContext, id: number, report: ResultReport): void;

  readPayload(id: number): string;
  readResult(id: number): string;
  readRewards(id: number): RewardPools;
  readInclusionProofHash(id: number): string;
  readRequest(id: number): DataRequest;
  requestStatus(id: number): RequestStatus;
  isResolved(id: number): boolean;
  requestCount(): number;
  estimateGasCost(gasPrice: bigint): GasCostEstimate;
}

export interface BoardSettings {
  claimExpiryBlocks: number;
  replicationFactor: number;
}

export interface BoardDependencies {
  payloads: PayloadSource;
  relay: BlockRelay;
  vrf: VrfVerifier;
  signatures: SignatureVerifier;
  reporters: ReporterPopulation;
  clock: BlockClock;
  settings?: Partial<BoardSettings>;
}

export class RequestBoard implements DataRequestBoard {
  readonly events = new EventLog();
  readonly ledger = new ValueLedger();
  readonly paidBlocks = new PaidBlockSet();
  readonly settings: BoardSettings;

  private readonly clock: BlockClock;
  private readonly registry: RequestRegistry;
  private readonly gate: ClaimGate;
  private readonly settlement: Settlement;
  private depth = 0;

  constructor(deps: BoardDependencies) {
    this.settings = {
      claimExpiryBlocks: deps.settings?.claimExpiryBlocks ?? config.CLAIM_EXPIRY_BLOCKS,
      replicationFactor: deps.settings?.replicationFactor ?? config.REPLICATION_FACTOR,
    };
    this.clock = deps.clock;

    for (const [key, value] of Object.entries(this.settings)) {
      if (!Number.isInteger(value) || value <= 0) {
        throw new RangeError(`${key} must be a positive integer, got ${value}`);
      }
    }

    const { claimExpiryBlocks, replicationFactor } = this.settings;

    this.registry = new RequestRegistry({
      payloads: deps.payloads,
      relay: deps.relay,
      clock: deps.clock,
      events: this.events,
      claimExpiryBlocks,
    });
    this.gate = new ClaimGate({
      registry: this.registry,
      relay: deps.relay,
      vrf: deps.vrf,
      signatures: deps.signatures,
      reporters: deps.reporters,
      clock: deps.clock,
      events: this.events,
      claimExpiryBlocks,
      replicationFactor,
    });
    this.settlement = new Settlement({
      registry: this.registry,
      relay: deps.relay,
      reporters: deps.reporters,
      ledger: this.ledger,
      paidBlocks: this.paidBlocks,
      clock: deps.clock,
      events: this.events,
      claimExpiryBlocks,
    });
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  create(call: CallContext, params: CreateRequestParams): number {
    return this.atomically(() => this.registry.create(call, params));
  }

  upgradeReward(call: CallContext, id: number, params: UpgradeRewardParams): void {
    this.atomically(() => this.registry.upgradeReward(call, id, params));
  }

  claim(call: CallContext, submission: ClaimSubmission): number[] {
    return this.atomically(() => this.gate.claim(call, submission));
  }

  reportInclusion(call: CallContext, id: number, report: InclusionReport): void {
    this.atomically(() => this.settlement.reportInclusion(call, id, report));
  }

  reportResult(call: CallContext, id: number, report: ResultReport): void {
    this.atomically(() => this.settlement.reportResult(call, id, report));
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  checkClaimability(ids: readonly number[]): boolean[] {
    return this.registry.checkClaimability(ids);
  }

  readPayload(id: number): string {
    return this.registry.readPayload(id);
  }

  readResult(id: number): string {
    return this.registry.readResult(id);
  }

  readRewards(id: number): RewardPools {
    return this.registry.readRewards(id);
  }

  readInclusionProofHash(id: number): string {
    return this.registry.readInclusionProofHash(id);
  }

  readRequest(id: number): DataRequest {
    return this.registry.get(id);
  }

  requestStatus(id: number): RequestStatus {
    return requestStatus(this.registry.get(id), this.clock.blockNumber(), this.settings.claimExpiryBlocks);
  }

  isResolved(id: number): boolean {
    return hasResult(this.registry.get(id));
  }

  requestCount(): number {
    return this.registry.count();
  }

  estimateGasCost(gasPrice: bigint): GasCostEstimate {
    return estimateGasCost(gasPrice);
  }

  escrowBalance(): bigint {
    return this.registry.escrowBalance();
  }

  balanceOf(account: string): bigint {
    return this.ledger.balanceOf(account);
  }

  /**
   * A collaborator may call back into the board mid-operation; the nested
   * call joins the outer transaction and only the outermost call publishes
   * or drops pending events.
   */
  private atomically<T>(fn: () => T): T {
    const outermost = this.depth === 0;
    this.depth++;

    let result: T;
    try {
      result = transaction(fn);
    } catch (error) {
      if (outermost) this.events.discard();
      throw error;
    } finally {
      this.depth--;
    }

    if (outermost) this.events.flush();
    return result;
  }
}

export function createBoard(deps: BoardDependencies): RequestBoard {
  return new RequestBoard(deps);
}
