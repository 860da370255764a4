import type { GasCostEstimate } from '@oracle-bridge/sdk';

/**
 * Worst-case gas of each reporter operation on the host chain
 */
export const GAS_COSTS = {
  CLAIM: 534_805n,
  REPORT_INCLUSION: 139_210n,
  REPORT_RESULT: 106_521n,
  REPORT_BLOCK: 135_635n,
} as const;

/**
 * Minimum rewards that let reporters recoup gas at `gasPrice`.
 *
 * The block pool pays two block reports: one for the block carrying the
 * inclusion and one for the block carrying the result.
 */
export function estimateGasCost(gasPrice: bigint): GasCostEstimate {
  if (gasPrice < 0n) {
    throw new RangeError(`gasPrice must be non-negative, got ${gasPrice}`);
  }

  return {
    inclusion: gasPrice * (GAS_COSTS.CLAIM + GAS_COSTS.REPORT_INCLUSION),
    tally: gasPrice * GAS_COSTS.REPORT_RESULT,
    block: gasPrice * 2n * GAS_COSTS.REPORT_BLOCK,
  };
}
