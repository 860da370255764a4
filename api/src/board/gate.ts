/**
 * Claim Eligibility Gate
 *
 * A reporter claims a batch of requests with a VRF proof over the relay's
 * current beacon. The proof must come from the key that signed the caller's
 * own address, and its output must fall under the sortition threshold for
 * the current reporter population.
 */

import { isHexString, toBigInt } from 'ethers';
import { CONSTANTS, claimDigest, type CallContext, type ClaimSubmission } from '@oracle-bridge/sdk';
import { logger } from '../logger.js';
import type {
  BlockClock,
  BlockRelay,
  ReporterPopulation,
  SignatureVerifier,
  VrfVerifier,
} from '../adapters/types.js';
import { AuthorizationError, StateError, ValidationError } from './errors.js';
import type { EventLog } from './events.js';
import { isClaimable, requireHandle, requireIdentity } from './guards.js';
import type { RequestRegistry } from './registry.js';

const log = logger.child({ component: 'gate' });

/**
 * Sortition threshold test.
 *
 * Everyone is eligible while the population is smaller than the replication
 * factor. Otherwise roughly `replicationFactor / activeCount` of the output
 * space is accepted; dividing first keeps the threshold within 256 bits.
 */
export function isSelectedBySortition(
  output: bigint,
  activeCount: number,
  replicationFactor: number
): boolean {
  if (activeCount < replicationFactor) {
    return true;
  }
  return output <= (CONSTANTS.MAX_UINT256 / BigInt(activeCount)) * BigInt(replicationFactor);
}

export interface GateDependencies {
  registry: RequestRegistry;
  relay: BlockRelay;
  vrf: VrfVerifier;
  signatures: SignatureVerifier;
  reporters: ReporterPopulation;
  clock: BlockClock;
  events: EventLog;
  claimExpiryBlocks: number;
  replicationFactor: number;
}

export class ClaimGate {
  constructor(private readonly deps: GateDependencies) {}

  /**
   * Claim every request in `submission.ids` for the caller, or none of them
   */
  claim(call: CallContext, submission: ClaimSubmission): number[] {
    const claimer = requireIdentity(call.from);
    const ids = this.requireBatch(submission.ids);

    this.requireKeyBinding(claimer, submission);
    this.requireValidVrf(submission);
    this.requireSelected(submission.proof);

    const blockNumber = this.deps.clock.blockNumber();
    const requests = ids.map((id) => this.deps.registry.get(id));
    const taken = requests.some(
      (request) => !isClaimable(request, blockNumber, this.deps.claimExpiryBlocks)
    );
    if (taken) {
      throw new StateError('already_claimed', 'One of the listed data requests was already claimed');
    }

    for (const request of requests) {
      this.deps.registry.recordClaim(request.id, claimer, blockNumber);
    }
    this.deps.reporters.pushActivity(claimer, blockNumber);
    this.deps.events.record({ name: 'ClaimedRequests', ids, claimant: claimer, blockNumber }, blockNumber);

    log.info({ claimer, ids, blockNumber }, 'claimed data requests');
    return ids;
  }

  private requireBatch(ids: readonly number[]): number[] {
    if (!Array.isArray(ids) || ids.length === 0) {
      throw new ValidationError('empty_claim', 'At least one data request must be listed');
    }
    const handles = ids.map(requireHandle);
    if (new Set(handles).size !== handles.length) {
      throw new ValidationError('duplicate_ids', 'A data request is listed more than once');
    }
    return handles;
  }

  private requireKeyBinding(claimer: string, submission: ClaimSubmission): void {
    let keyAddress: string;
    try {
      keyAddress = this.deps.signatures.addressOf(submission.publicKey);
    } catch (error) {
      throw new ValidationError('invalid_public_key', `Invalid public key: ${describe(error)}`);
    }

    let signer: string;
    try {
      signer = this.deps.signatures.recover(claimDigest(claimer), submission.signature);
    } catch (error) {
      throw new AuthorizationError('invalid_signature', `Invalid signature: ${describe(error)}`);
    }

    if (signer !== keyAddress) {
      throw new AuthorizationError('signature_mismatch', 'Not a valid signature');
    }
  }

  private requireValidVrf(submission: ClaimSubmission): void {
    const valid = this.deps.vrf.fastVerify(
      submission.publicKey,
      submission.proof,
      this.deps.relay.currentBeacon(),
      submission.uPoint,
      submission.vComponents
    );
    if (!valid) {
      throw new AuthorizationError('invalid_vrf', 'Not a valid VRF');
    }
  }

  private requireSelected(proof: string): void {
    const hash = this.deps.vrf.gammaToHash(proof);
    if (!isHexString(hash, 32)) {
      throw new AuthorizationError('invalid_vrf', 'VRF output is not a 32-byte hash');
    }

    const activeCount = this.deps.reporters.activeCount();
    if (!isSelectedBySortition(toBigInt(hash), activeCount, this.deps.replicationFactor)) {
      throw new AuthorizationError('not_eligible', 'Not eligible to claim data requests');
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
