import { SigningKey, getAddress, getBytes, keccak256, recoverAddress, type Wallet } from 'ethers';

/**
 * Digest a reporter signs to bind its claiming identity to its VRF key
 *
 * keccak256 over the 20 address bytes, the same preimage as
 * abi.encodePacked(address).
 */
export function claimDigest(claimer: string): string {
  return keccak256(getBytes(getAddress(claimer)));
}

/**
 * Sign the claim digest for `claimer` with the reporter's key.
 * The raw digest is signed, without the personal message prefix.
 */
export function signClaimIdentity(signer: Wallet | SigningKey, claimer: string): string {
  const key = signer instanceof SigningKey ? signer : signer.signingKey;
  return key.sign(claimDigest(claimer)).serialized;
}

export function recoverClaimSigner(claimer: string, signature: string): string {
  return recoverAddress(claimDigest(claimer), signature);
}
