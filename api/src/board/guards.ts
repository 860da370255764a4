/**
 * Precondition guards
 *
 * Each guard either returns (possibly a normalized value) or throws the
 * BoardError the operation must fail with. Operations call them in order,
 * before any state is written.
 */

import { getAddress, hexlify, isHexString } from 'ethers';
import { ZERO_HASH } from '@oracle-bridge/proof';
import { CONSTANTS, RequestStatus, type DataRequest, type InclusionReport, type RewardPools } from '@oracle-bridge/sdk';
import { estimateGasCost } from './estimator.js';
import { StateError, ValidationError } from './errors.js';

// ============================================================================
// Input shape
// ============================================================================

export function requireIdentity(value: string, field = 'caller'): string {
  try {
    return getAddress(value);
  } catch {
    throw new ValidationError('invalid_address', `${field} is not a valid address: ${value}`);
  }
}

export function requireHandle(id: number): number {
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError('bad_handle', `Invalid data request id: ${id}`);
  }
  return id;
}

export function requireAmount(value: bigint, field: string): bigint {
  if (value < 0n) {
    throw new ValidationError('negative_amount', `${field} must not be negative`);
  }
  return value;
}

export function requireBytes32(value: string, field: string): string {
  if (!isHexString(value, 32)) {
    throw new ValidationError('invalid_bytes32', `${field} must be a 32-byte hex string`);
  }
  return hexlify(value);
}

export function requireHexBytes(value: string, field: string): string {
  if (!isHexString(value) || value.length % 2 !== 0) {
    throw new ValidationError('invalid_bytes', `${field} must be an even-length 0x hex string`);
  }
  return hexlify(value);
}

export function requireEpochValue(epoch: number): number {
  if (!Number.isSafeInteger(epoch) || epoch < 0) {
    throw new ValidationError('invalid_epoch', `Invalid epoch: ${epoch}`);
  }
  return epoch;
}

/**
 * Normalize the shared part of inclusion and result reports
 */
export function requireReport<T extends InclusionReport>(report: T, minProofLength: number): T {
  if (!Array.isArray(report.proof) || report.proof.length < minProofLength) {
    throw new ValidationError(
      'invalid_proof',
      `Proof must contain at least ${minProofLength} element(s)`
    );
  }
  if (!Number.isSafeInteger(report.index) || report.index < 0) {
    throw new ValidationError('invalid_index', `Invalid proof index: ${report.index}`);
  }

  return {
    ...report,
    proof: report.proof.map((element, i) => requireBytes32(element, `proof[${i}]`)),
    blockHash: requireBytes32(report.blockHash, 'blockHash'),
    epoch: requireEpochValue(report.epoch),
  };
}

// ============================================================================
// Funding
// ============================================================================

export function requireSufficientValue(value: bigint, committed: bigint): void {
  if (value < committed) {
    throw new ValidationError(
      'insufficient_value',
      'Transaction value needs to be equal or greater than inclusion plus tally reward'
    );
  }
}

/**
 * Every pool must cover the gas its reporters spend at `gasPrice`.
 * Once inclusion is paid only the tally and the second block report remain.
 */
export function requireRewardsCoverGas(
  pools: RewardPools,
  gasPrice: bigint,
  included: boolean
): void {
  const minimum = estimateGasCost(gasPrice);

  if (!included && pools.inclusionReward < minimum.inclusion) {
    throw new ValidationError(
      'inclusion_reward_too_low',
      `Inclusion reward ${pools.inclusionReward} below minimum ${minimum.inclusion}`
    );
  }
  if (pools.tallyReward < minimum.tally) {
    throw new ValidationError(
      'tally_reward_too_low',
      `Tally reward ${pools.tallyReward} below minimum ${minimum.tally}`
    );
  }

  const blockMinimum = included ? minimum.block / 2n : minimum.block;
  if (pools.blockReward < blockMinimum) {
    throw new ValidationError(
      'block_reward_too_low',
      `Block reward ${pools.blockReward} below minimum ${blockMinimum}`
    );
  }
}

// ============================================================================
// Lifecycle
// ============================================================================

export function isIncluded(request: DataRequest): boolean {
  return request.inclusionProofHash !== ZERO_HASH;
}

export function hasResult(request: DataRequest): boolean {
  return request.result !== CONSTANTS.EMPTY_RESULT;
}

/**
 * Never included nor resulted, and either never claimed or the claim lapsed
 */
export function isClaimable(
  request: DataRequest,
  blockNumber: number,
  claimExpiryBlocks: number
): boolean {
  if (isIncluded(request) || hasResult(request)) {
    return false;
  }
  return request.claimant === CONSTANTS.ZERO_ADDRESS
    || blockNumber - request.claimBlock > claimExpiryBlocks;
}

export function requestStatus(
  request: DataRequest,
  blockNumber: number,
  claimExpiryBlocks: number
): RequestStatus {
  if (hasResult(request)) return RequestStatus.RESULTED;
  if (isIncluded(request)) return RequestStatus.INCLUDED;
  if (isClaimable(request, blockNumber, claimExpiryBlocks)) return RequestStatus.POSTED;
  return RequestStatus.CLAIMED;
}

export function requireNotIncluded(request: DataRequest): void {
  if (isIncluded(request)) {
    throw new StateError('already_included', 'DR already included');
  }
}

export function requireIncluded(request: DataRequest): void {
  if (!isIncluded(request)) {
    throw new StateError('not_included', 'DR not yet included');
  }
}

export function requireNoResult(request: DataRequest): void {
  if (hasResult(request)) {
    throw new StateError('already_resulted', 'Result already included');
  }
}

export function requireResult(request: DataRequest): void {
  if (!hasResult(request)) {
    throw new StateError('no_result', 'Result not yet reported');
  }
}

export function requireActiveClaim(
  request: DataRequest,
  blockNumber: number,
  claimExpiryBlocks: number
): void {
  if (isClaimable(request, blockNumber, claimExpiryBlocks)) {
    throw new StateError('not_claimed', 'DR has not yet been claimed');
  }
}

export function requireEpochAfter(request: DataRequest, epoch: number): void {
  if (epoch <= request.epoch) {
    throw new StateError(
      'stale_epoch',
      `Epoch ${epoch} must be greater than the request's epoch ${request.epoch}`
    );
  }
}

export function requireEpochNotBefore(request: DataRequest, epoch: number): void {
  if (epoch < request.epoch) {
    throw new StateError(
      'stale_epoch',
      `Epoch ${epoch} precedes the request's epoch ${request.epoch}`
    );
  }
}
