/**
 * Collaborator interfaces the board depends on.
 *
 * The board never reaches the host chain, the external network or any
 * cryptographic primitive directly; the deployment layer injects these.
 * All of them are synchronous: a board call runs start to finish inside one
 * database transaction.
 */

/**
 * Content addressing for request payloads
 */
export interface PayloadSource {
  /**
   * Current bytes behind `ref`, as 0x hex; undefined if nothing is registered
   */
  payloadBytes(ref: string): string | undefined;
}

/**
 * Relay of the external network's blocks.
 * Proof checks may throw a ProofError for a block that was never relayed.
 */
export interface BlockRelay {
  currentEpoch(): number;
  currentBeacon(): string;
  verifyInclusionProof(
    proof: readonly string[],
    blockHash: string,
    epoch: number,
    index: number,
    payloadHash: string
  ): boolean;
  verifyResultProof(
    proof: readonly string[],
    blockHash: string,
    epoch: number,
    index: number,
    resultHash: string
  ): boolean;
  /**
   * Identity that relayed `blockHash`
   * @throws ProofError if the block was never relayed
   */
  relayerOfRecord(blockHash: string, epoch: number): string;
}

/**
 * VRF fast verification (proof and point encodings are opaque hex)
 */
export interface VrfVerifier {
  fastVerify(
    publicKey: string,
    proof: string,
    message: string,
    uPoint: string,
    vComponents: readonly string[]
  ): boolean;
  /**
   * Uniformly distributed 32-byte output of a verified proof
   */
  gammaToHash(proof: string): string;
}

export interface SignatureVerifier {
  /**
   * @throws if the signature is malformed
   */
  recover(digest: string, signature: string): string;
  addressOf(publicKey: string): string;
}

/**
 * The dynamically sized set of reporters eligible for sortition
 */
export interface ReporterPopulation {
  activeCount(): number;
  isActive(identity: string): boolean;
  pushActivity(identity: string, blockNumber: number): void;
}

/**
 * Host-chain block height
 */
export interface BlockClock {
  blockNumber(): number;
}
