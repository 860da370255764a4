import type { DataRequest, DataRequestJson } from './types.js';

export * from './types.js';
export * from './signing.js';

/**
 * Constants shared by the board and its clients
 */
export const CONSTANTS = {
  ZERO_ADDRESS: '0x0000000000000000000000000000000000000000',
  EMPTY_RESULT: '0x',
  MAX_UINT256: 2n ** 256n - 1n,
} as const;

/**
 * Convert a request to its JSON wire shape
 */
export function serializeRequest(request: DataRequest): DataRequestJson {
  return {
    ...request,
    inclusionReward: request.inclusionReward.toString(),
    tallyReward: request.tallyReward.toString(),
    blockReward: request.blockReward.toString(),
    gasPriceAtPost: request.gasPriceAtPost.toString(),
    deposited: request.deposited.toString(),
    paidOut: request.paidOut.toString(),
  };
}

/**
 * Parse a decimal or 0x amount string into wei
 *
 * @throws Error if the amount is not a non-negative integer
 */
export function parseAmount(value: string | number | undefined, field: string): bigint {
  if (value === undefined || value === '') {
    return 0n;
  }
  const text = String(value).trim();
  if (!/^(0x[0-9a-fA-F]+|\d+)$/.test(text)) {
    throw new Error(`Invalid amount for ${field}: ${text}`);
  }
  return BigInt(text);
}
