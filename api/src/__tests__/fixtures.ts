/**
 * Shared test fixtures: wallets, a scriptable VRF and proof builders
 */

import { Wallet, parseEther, parseUnits } from 'ethers';
import { computeMerkleRoot, hashInclusion, hashResult } from '@oracle-bridge/proof';
import {
  signClaimIdentity,
  type ClaimSubmission,
  type InclusionReport,
  type ResultReport,
} from '@oracle-bridge/sdk';
import type { VrfVerifier } from '../adapters/index.js';
import { isBoardError, type BoardError, type BoardSettings } from '../board/index.js';
import { initDatabase } from '../db/index.js';
import { createNode, type BoardNode } from '../node.js';

export const GAS_PRICE = parseUnits('1', 'gwei');

export const requestor = new Wallet('0x' + '11'.repeat(32));
export const reporter = new Wallet('0x' + '22'.repeat(32));
export const relayer = new Wallet('0x' + '33'.repeat(32));
export const outsider = new Wallet('0x' + '44'.repeat(32));

export const PAYLOAD = '0x0102';
export const SIBLING = '0x' + 'ab'.repeat(32);
export const UNUSED_ROOT = '0x' + 'ee'.repeat(32);

export function blockHashAt(n: number): string {
  return '0x' + n.toString(16).padStart(64, '0');
}

/**
 * Accepts whatever it is told to and records the beacons it was asked about
 */
export class FakeVrf implements VrfVerifier {
  valid = true;
  output = '0x' + '00'.repeat(32);
  readonly messages: string[] = [];

  fastVerify(
    _publicKey: string,
    _proof: string,
    message: string,
    _uPoint: string,
    _vComponents: readonly string[]
  ): boolean {
    this.messages.push(message);
    return this.valid;
  }

  gammaToHash(_proof: string): string {
    return this.output;
  }
}

export interface Harness extends BoardNode {
  vrf: FakeVrf;
}

export function setupNode(settings?: Partial<BoardSettings>): Harness {
  initDatabase(':memory:');
  const vrf = new FakeVrf();
  return { ...createNode({ vrf, settings }), vrf };
}

export function registerPayload(h: Harness, bytes: string = PAYLOAD): string {
  return h.payloads.register(requestor.address, bytes);
}

export interface PostOptions {
  payloadRef?: string;
  value?: bigint;
  inclusionReward?: bigint;
  tallyReward?: bigint;
  gasPrice?: bigint;
}

/**
 * Post a request worth 1.0 with 0.3 inclusion and 0.3 tally rewards
 */
export function postRequest(h: Harness, options: PostOptions = {}): number {
  return h.board.create(
    {
      from: requestor.address,
      value: options.value ?? parseEther('1'),
      gasPrice: options.gasPrice ?? GAS_PRICE,
    },
    {
      payloadRef: options.payloadRef ?? registerPayload(h),
      inclusionReward: options.inclusionReward ?? parseEther('0.3'),
      tallyReward: options.tallyReward ?? parseEther('0.3'),
    }
  );
}

export function claimSubmission(signer: Wallet, ids: number[], claimer: string = signer.address): ClaimSubmission {
  return {
    ids,
    proof: '0x01',
    publicKey: signer.signingKey.publicKey,
    uPoint: '0x',
    vComponents: [],
    signature: signClaimIdentity(signer, claimer),
  };
}

export function claim(h: Harness, signer: Wallet, ids: number[]): number[] {
  return h.board.claim({ from: signer.address }, claimSubmission(signer, ids));
}

export interface BlockOptions {
  epoch: number;
  by?: Wallet;
}

/**
 * Relay a block whose request tree holds `id`'s payload at index 0
 */
export function relayInclusionBlock(h: Harness, id: number, { epoch, by = reporter }: BlockOptions): InclusionReport {
  const { payloadHash } = h.board.readRequest(id);
  const proof = [SIBLING];
  const blockHash = blockHashAt(epoch);

  h.relay.postNewBlock(by.address, {
    blockHash,
    epoch,
    drMerkleRoot: computeMerkleRoot(payloadHash, proof, 0),
    tallyMerkleRoot: UNUSED_ROOT,
  });

  return { proof, index: 0, blockHash, epoch };
}

/**
 * Relay a block whose tally tree holds `id`'s result at index 1
 */
export function relayResultBlock(
  h: Harness,
  id: number,
  result: string,
  { epoch, by = reporter }: BlockOptions
): ResultReport {
  const resultHash = hashResult(h.board.readInclusionProofHash(id), result);
  const proof = [SIBLING];
  const blockHash = blockHashAt(epoch);

  h.relay.postNewBlock(by.address, {
    blockHash,
    epoch,
    drMerkleRoot: UNUSED_ROOT,
    tallyMerkleRoot: computeMerkleRoot(resultHash, proof, 1),
  });

  return { proof, index: 1, blockHash, epoch, result };
}

/**
 * Relay one block carrying both the inclusion and the result of `id`
 */
export function relayCombinedBlock(
  h: Harness,
  id: number,
  result: string,
  { epoch, by = reporter }: BlockOptions
): { inclusion: InclusionReport; result: ResultReport } {
  const { payloadHash } = h.board.readRequest(id);
  const proof = [SIBLING];
  const blockHash = blockHashAt(epoch);
  const resultHash = hashResult(hashInclusion(payloadHash, SIBLING), result);

  h.relay.postNewBlock(by.address, {
    blockHash,
    epoch,
    drMerkleRoot: computeMerkleRoot(payloadHash, proof, 0),
    tallyMerkleRoot: computeMerkleRoot(resultHash, proof, 0),
  });

  return {
    inclusion: { proof, index: 0, blockHash, epoch },
    result: { proof, index: 0, blockHash, epoch, result },
  };
}

export function catchBoardError(fn: () => unknown): BoardError {
  try {
    fn();
  } catch (error) {
    if (isBoardError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a board error');
}
