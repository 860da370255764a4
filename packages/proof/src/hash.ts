/**
 * Hashing utilities for data requests
 *
 * Uses sha256 so hashes line up with the external network's Merkle roots.
 */

import { concat, sha256, type BytesLike } from 'ethers';

export const ZERO_HASH = '0x0000000000000000000000000000000000000000000000000000000000000000';

/**
 * Hash the raw bytes of a request payload
 *
 * @returns sha256 hash as hex string with 0x prefix
 */
export function hashPayload(payload: BytesLike): string {
  return sha256(payload);
}

/**
 * Link a payload hash to the first element of its inclusion proof
 *
 * The result is stored on the request once inclusion is proven and is the
 * prefix of every result hash for that request.
 */
export function hashInclusion(payloadHash: BytesLike, firstProofElement: BytesLike): string {
  return sha256(concat([payloadHash, firstProofElement]));
}

/**
 * Hash a reported result against the request's inclusion proof hash
 */
export function hashResult(inclusionProofHash: BytesLike, result: BytesLike): string {
  return sha256(concat([inclusionProofHash, result]));
}
