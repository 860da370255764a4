/**
 * Gas-cost estimator and configuration
 */

import { describe, it, expect } from 'vitest';
import { GAS_COSTS, estimateGasCost } from '../board/estimator.js';
import { config, validateConfig } from '../config.js';

describe('estimateGasCost', () => {
  it('should scale each reporter cost by the gas price', () => {
    const estimate = estimateGasCost(1_000_000_000n);

    expect(estimate).toEqual({
      inclusion: 674_015_000_000_000n,
      tally: 106_521_000_000_000n,
      block: 271_270_000_000_000n,
    });
  });

  it('should price the block pool as two block reports', () => {
    expect(estimateGasCost(1n).block).toBe(GAS_COSTS.REPORT_BLOCK * 2n);
  });

  it('should return zero minimums at zero gas price', () => {
    expect(estimateGasCost(0n)).toEqual({ inclusion: 0n, tally: 0n, block: 0n });
  });

  it('should reject a negative gas price', () => {
    expect(() => estimateGasCost(-1n)).toThrow(RangeError);
  });
});

describe('validateConfig', () => {
  it('should accept the defaults', () => {
    expect(() => validateConfig()).not.toThrow();
  });

  it('should reject a non-positive replication factor', () => {
    expect(() => validateConfig({ ...config, REPLICATION_FACTOR: 0 })).toThrow(
      '[CONFIG] REPLICATION_FACTOR must be a positive integer, got 0'
    );
  });

  it('should reject an unparsable expiry window', () => {
    expect(() => validateConfig({ ...config, CLAIM_EXPIRY_BLOCKS: NaN })).toThrow(
      '[CONFIG] CLAIM_EXPIRY_BLOCKS must be a positive integer, got NaN'
    );
  });
});
