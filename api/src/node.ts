/**
 * Board node wiring
 *
 * Builds a board over the local sqlite-backed adapters. The VRF verifier has
 * no bundled implementation and must be supplied by the deployment.
 */

import { config } from './config.js';
import {
  ActiveReporterSet,
  EthersSignatureVerifier,
  LocalBlockRelay,
  ManualBlockClock,
  PayloadStore,
  type SignatureVerifier,
  type VrfVerifier,
} from './adapters/index.js';
import { createBoard, type BoardSettings, type RequestBoard } from './board/index.js';

export interface NodeOptions {
  vrf: VrfVerifier;
  signatures?: SignatureVerifier;
  clock?: ManualBlockClock;
  activityPeriodBlocks?: number;
  settings?: Partial<BoardSettings>;
}

export interface BoardNode {
  board: RequestBoard;
  relay: LocalBlockRelay;
  payloads: PayloadStore;
  reporters: ActiveReporterSet;
  clock: ManualBlockClock;
}

export function createNode(options: NodeOptions): BoardNode {
  const clock = options.clock ?? new ManualBlockClock();
  const relay = new LocalBlockRelay();
  const payloads = new PayloadStore();
  const reporters = new ActiveReporterSet(
    clock,
    options.activityPeriodBlocks ?? config.ACTIVITY_PERIOD_BLOCKS
  );

  const board = createBoard({
    payloads,
    relay,
    vrf: options.vrf,
    signatures: options.signatures ?? new EthersSignatureVerifier(),
    reporters,
    clock,
    settings: options.settings,
  });

  return { board, relay, payloads, reporters, clock };
}
