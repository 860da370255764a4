import { concat, hexlify, sha256, type BytesLike } from 'ethers';

/**
 * Fold a Merkle path from a leaf up to its root.
 *
 * Bit `i` of `index` tells on which side the running hash sits at level `i`:
 * 0 means the sibling goes on the right.
 */
export function computeMerkleRoot(
  element: BytesLike,
  siblings: readonly BytesLike[],
  index: number
): string {
  if (!Number.isSafeInteger(index) || index < 0) {
    throw new Error(`Invalid leaf index: ${index}`);
  }

  let node = hexlify(element);
  let position = index;

  for (const sibling of siblings) {
    node = position % 2 === 0
      ? sha256(concat([node, sibling]))
      : sha256(concat([sibling, node]));
    position = Math.floor(position / 2);
  }

  return node;
}

/**
 * Check that `element` sits at `index` under `root`
 */
export function verifyMerklePath(
  element: BytesLike,
  siblings: readonly BytesLike[],
  index: number,
  root: BytesLike
): boolean {
  try {
    return computeMerkleRoot(element, siblings, index) === hexlify(root);
  } catch {
    return false;
  }
}
