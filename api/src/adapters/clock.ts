import type { BlockClock } from './types.js';

/**
 * Block height advanced by hand (tests, local development)
 */
export class ManualBlockClock implements BlockClock {
  private height: number;

  constructor(start = 1) {
    this.height = start;
  }

  blockNumber(): number {
    return this.height;
  }

  mine(blocks = 1): number {
    if (!Number.isInteger(blocks) || blocks < 0) {
      throw new RangeError(`Cannot mine ${blocks} blocks`);
    }
    this.height += blocks;
    return this.height;
  }
}
