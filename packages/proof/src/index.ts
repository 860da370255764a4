/**
 * @oracle-bridge/proof - hashing and proof helpers
 *
 * Provides:
 * - Payload, inclusion and result hashing
 * - Merkle path folding and verification
 */

export { ZERO_HASH, hashPayload, hashInclusion, hashResult } from './hash.js';
export { computeMerkleRoot, verifyMerklePath } from './merkle.js';
