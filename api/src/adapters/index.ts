export type {
  BlockClock,
  BlockRelay,
  PayloadSource,
  ReporterPopulation,
  SignatureVerifier,
  VrfVerifier,
} from './types.js';
export { ManualBlockClock } from './clock.js';
export { PayloadStore } from './payloads.js';
export { LocalBlockRelay } from './relay.js';
export type { NewBlock, RelayedBlock } from './relay.js';
export { ActiveReporterSet } from './reporters.js';
export { EthersSignatureVerifier } from './signatures.js';
