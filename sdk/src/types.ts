// Lifecycle position of a data request
export enum RequestStatus {
  POSTED = 'POSTED',
  CLAIMED = 'CLAIMED',
  INCLUDED = 'INCLUDED',
  RESULTED = 'RESULTED',
}

export interface RewardPools {
  inclusionReward: bigint;
  tallyReward: bigint;
  blockReward: bigint;
}

export interface DataRequest extends RewardPools {
  id: number;
  payloadRef: string;
  payloadHash: string;
  gasPriceAtPost: bigint;
  epoch: number;
  inclusionProofHash: string;
  result: string;
  claimant: string;
  claimBlock: number;
  requestor: string;
  // Cumulative accounting: pools always sum to deposited - paidOut
  deposited: bigint;
  paidOut: bigint;
}

export interface GasCostEstimate {
  inclusion: bigint;
  tally: bigint;
  block: bigint;
}

// Who is calling, with how much value and at which unit price
export interface CallContext {
  from: string;
  value?: bigint;
  gasPrice?: bigint;
}

export interface CreateRequestParams {
  payloadRef: string;
  inclusionReward: bigint;
  tallyReward: bigint;
}

export interface UpgradeRewardParams {
  addInclusion: bigint;
  addTally: bigint;
}

export interface ClaimSubmission {
  ids: number[];
  proof: string;
  publicKey: string;
  uPoint: string;
  vComponents: string[];
  signature: string;
}

export interface InclusionReport {
  proof: string[];
  index: number;
  blockHash: string;
  epoch: number;
}

export interface ResultReport extends InclusionReport {
  result: string;
}

// ============================================================================
// Events
// ============================================================================

export interface PostedRequestEvent {
  name: 'PostedRequest';
  id: number;
  from: string;
}

export interface UpgradedRequestEvent {
  name: 'UpgradedRequest';
  id: number;
  from: string;
  added: bigint;
}

export interface ClaimedRequestsEvent {
  name: 'ClaimedRequests';
  ids: number[];
  claimant: string;
  blockNumber: number;
}

export interface IncludedRequestEvent {
  name: 'IncludedRequest';
  id: number;
  from: string;
  blockHash: string;
}

export interface PostedResultEvent {
  name: 'PostedResult';
  id: number;
  from: string;
  blockHash: string;
}

export type BoardEvent =
  | PostedRequestEvent
  | UpgradedRequestEvent
  | ClaimedRequestsEvent
  | IncludedRequestEvent
  | PostedResultEvent;

export type BoardEventName = BoardEvent['name'];

// ============================================================================
// Wire shapes (bigints as decimal strings)
// ============================================================================

export interface DataRequestJson {
  id: number;
  payloadRef: string;
  payloadHash: string;
  inclusionReward: string;
  tallyReward: string;
  blockReward: string;
  gasPriceAtPost: string;
  epoch: number;
  inclusionProofHash: string;
  result: string;
  claimant: string;
  claimBlock: number;
  requestor: string;
  deposited: string;
  paidOut: string;
}
