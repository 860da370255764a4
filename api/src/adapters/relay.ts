/**
 * Local Block Relay
 *
 * Stores the external network's block headers as relayers post them and
 * checks inclusion/result proofs against their Merkle roots. The latest
 * block doubles as the random beacon for claim sortition.
 */

import { concat, hexlify, isHexString, toBeHex, zeroPadValue } from 'ethers';
import { verifyMerklePath } from '@oracle-bridge/proof';
import { execute, queryOne } from '../db/index.js';
import { ProofError, StateError, ValidationError } from '../board/errors.js';
import { requireIdentity } from '../board/guards.js';
import type { BlockRelay } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface RelayedBlock {
  blockHash: string;
  epoch: number;
  drMerkleRoot: string;
  tallyMerkleRoot: string;
  relayer: string;
}

export type NewBlock = Omit<RelayedBlock, 'relayer'>;

interface RelayedBlockRow {
  [key: string]: unknown;
  block_hash: string;
  epoch: number;
  dr_merkle_root: string;
  tally_merkle_root: string;
  relayer: string;
}

const EMPTY_BEACON = zeroPadValue('0x', 64);

function toBytes32(value: string, field: string): string {
  if (!isHexString(value, 32)) {
    throw new ValidationError('invalid_bytes32', `${field} must be a 32-byte hex string`);
  }
  return hexlify(value);
}

function fromRow(row: RelayedBlockRow): RelayedBlock {
  return {
    blockHash: row.block_hash,
    epoch: row.epoch,
    drMerkleRoot: row.dr_merkle_root,
    tallyMerkleRoot: row.tally_merkle_root,
    relayer: row.relayer,
  };
}

// ============================================================================
// Relay
// ============================================================================

export class LocalBlockRelay implements BlockRelay {
  /**
   * Record a new block. Epochs must strictly increase.
   */
  postNewBlock(relayer: string, block: NewBlock): RelayedBlock {
    const blockHash = toBytes32(block.blockHash, 'blockHash');

    if (!Number.isSafeInteger(block.epoch) || block.epoch <= this.currentEpoch()) {
      throw new ValidationError(
        'stale_epoch',
        `Block epoch ${block.epoch} must be greater than ${this.currentEpoch()}`
      );
    }

    if (this.getBlock(blockHash)) {
      throw new StateError('block_exists', `Block ${blockHash} was already relayed`);
    }

    const relayed: RelayedBlock = {
      blockHash,
      epoch: block.epoch,
      drMerkleRoot: toBytes32(block.drMerkleRoot, 'drMerkleRoot'),
      tallyMerkleRoot: toBytes32(block.tallyMerkleRoot, 'tallyMerkleRoot'),
      relayer: requireIdentity(relayer, 'relayer'),
    };

    execute(
      `INSERT INTO relayed_blocks
       (block_hash, epoch, dr_merkle_root, tally_merkle_root, relayer, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        relayed.blockHash,
        relayed.epoch,
        relayed.drMerkleRoot,
        relayed.tallyMerkleRoot,
        relayed.relayer,
        Date.now(),
      ]
    );

    return relayed;
  }

  getBlock(blockHash: string): RelayedBlock | undefined {
    if (!isHexString(blockHash, 32)) return undefined;
    const row = queryOne<RelayedBlockRow>(
      'SELECT * FROM relayed_blocks WHERE block_hash = ?',
      [hexlify(blockHash)]
    );
    return row ? fromRow(row) : undefined;
  }

  getLastBlock(): RelayedBlock | undefined {
    const row = queryOne<RelayedBlockRow>(
      'SELECT * FROM relayed_blocks ORDER BY epoch DESC LIMIT 1'
    );
    return row ? fromRow(row) : undefined;
  }

  currentEpoch(): number {
    return this.getLastBlock()?.epoch ?? 0;
  }

  /**
   * Last block hash followed by its epoch as a uint256
   */
  currentBeacon(): string {
    const last = this.getLastBlock();
    if (!last) {
      return EMPTY_BEACON;
    }
    return concat([last.blockHash, zeroPadValue(toBeHex(last.epoch), 32)]);
  }

  verifyInclusionProof(
    proof: readonly string[],
    blockHash: string,
    epoch: number,
    index: number,
    payloadHash: string
  ): boolean {
    const block = this.requireBlock(blockHash, epoch);
    return verifyMerklePath(payloadHash, proof, index, block.drMerkleRoot);
  }

  verifyResultProof(
    proof: readonly string[],
    blockHash: string,
    epoch: number,
    index: number,
    resultHash: string
  ): boolean {
    const block = this.requireBlock(blockHash, epoch);
    return verifyMerklePath(resultHash, proof, index, block.tallyMerkleRoot);
  }

  relayerOfRecord(blockHash: string, epoch: number): string {
    return this.requireBlock(blockHash, epoch).relayer;
  }

  private requireBlock(blockHash: string, epoch: number): RelayedBlock {
    const block = this.getBlock(blockHash);
    if (!block || block.epoch !== epoch) {
      throw new ProofError('non_existing_block', 'Non-existing block');
    }
    return block;
  }
}
