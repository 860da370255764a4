/**
 * Golden Hash Tests
 *
 * Request, inclusion and result hashes must match the external network's
 * sha256 roots byte for byte.
 */

import { describe, it, expect } from 'vitest';
import { concat, sha256, toUtf8Bytes } from 'ethers';
import {
  ZERO_HASH,
  computeMerkleRoot,
  hashInclusion,
  hashPayload,
  hashResult,
  verifyMerklePath,
} from '../index.js';

// ============================================================================
// Golden Test Fixtures
// ============================================================================

const SHA256_ABC = '0xba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';
const SHA256_EMPTY = '0xe3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

const LEAF_A = '0x1111111111111111111111111111111111111111111111111111111111111111';
const LEAF_B = '0x2222222222222222222222222222222222222222222222222222222222222222';
const LEAF_C = '0x3333333333333333333333333333333333333333333333333333333333333333';

// ============================================================================
// Tests
// ============================================================================

describe('Request Hashing', () => {
  it('should hash payload bytes with sha256', () => {
    expect(hashPayload(toUtf8Bytes('abc'))).toBe(SHA256_ABC);
    expect(hashPayload('0x')).toBe(SHA256_EMPTY);
  });

  it('should link the payload hash to the first proof element', () => {
    const payloadHash = hashPayload(toUtf8Bytes('This is a DR'));
    expect(hashInclusion(payloadHash, LEAF_A)).toBe(sha256(concat([payloadHash, LEAF_A])));
  });

  it('should chain the result hash onto the inclusion hash', () => {
    const result = '0x1a002fefd8';
    expect(hashResult(LEAF_A, result)).toBe(sha256(concat([LEAF_A, result])));
    expect(hashResult(LEAF_A, result)).not.toBe(hashResult(LEAF_B, result));
  });

  it('should keep the zero hash at 32 bytes', () => {
    expect(ZERO_HASH).toMatch(/^0x0{64}$/);
  });
});

describe('Merkle Paths', () => {
  it('should return the element itself for an empty path', () => {
    expect(computeMerkleRoot(LEAF_A, [], 0)).toBe(LEAF_A);
  });

  it('should place the sibling on the right for even positions', () => {
    expect(computeMerkleRoot(LEAF_A, [LEAF_B], 0)).toBe(sha256(concat([LEAF_A, LEAF_B])));
  });

  it('should place the sibling on the left for odd positions', () => {
    expect(computeMerkleRoot(LEAF_A, [LEAF_B], 1)).toBe(sha256(concat([LEAF_B, LEAF_A])));
  });

  it('should fold a two level path', () => {
    const level1 = sha256(concat([LEAF_B, LEAF_A]));
    const root = sha256(concat([level1, LEAF_C]));

    expect(computeMerkleRoot(LEAF_A, [LEAF_B, LEAF_C], 1)).toBe(root);
    expect(verifyMerklePath(LEAF_A, [LEAF_B, LEAF_C], 1, root)).toBe(true);
    expect(verifyMerklePath(LEAF_A, [LEAF_B, LEAF_C], 0, root)).toBe(false);
  });

  it('should reject negative indexes', () => {
    expect(() => computeMerkleRoot(LEAF_A, [LEAF_B], -1)).toThrow('Invalid leaf index: -1');
    expect(verifyMerklePath(LEAF_A, [LEAF_B], -1, LEAF_A)).toBe(false);
  });
});
