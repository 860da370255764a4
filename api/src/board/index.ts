export { RequestBoard, createBoard } from './board.js';
export type { BoardDependencies, BoardSettings, DataRequestBoard } from './board.js';
export {
  AuthorizationError,
  BoardError,
  ProofError,
  StateError,
  ValidationError,
  isBoardError,
} from './errors.js';
export { GAS_COSTS, estimateGasCost } from './estimator.js';
export { EventLog } from './events.js';
export type { EventOf, StoredEvent } from './events.js';
export { isSelectedBySortition } from './gate.js';
export { isClaimable, requestStatus } from './guards.js';
export { PaidBlockSet, ValueLedger } from './ledger.js';
export type { PaidBlock } from './ledger.js';
