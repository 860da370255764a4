import { computeAddress, getAddress, recoverAddress } from 'ethers';
import type { SignatureVerifier } from './types.js';

/**
 * secp256k1 signature recovery backed by ethers
 */
export class EthersSignatureVerifier implements SignatureVerifier {
  recover(digest: string, signature: string): string {
    return getAddress(recoverAddress(digest, signature));
  }

  addressOf(publicKey: string): string {
    return getAddress(computeAddress(publicKey));
  }
}
