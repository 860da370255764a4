import { describe, it, expect } from 'vitest';
import { Wallet, getAddress, keccak256 } from 'ethers';
import {
  CONSTANTS,
  claimDigest,
  parseAmount,
  recoverClaimSigner,
  serializeRequest,
  signClaimIdentity,
  type DataRequest,
} from '../index.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const REPORTER = new Wallet('0x' + '11'.repeat(32));
const OTHER = new Wallet('0x' + '22'.repeat(32));
const CLAIMER = '0xabcdef0123456789abcdef0123456789abcdef01';

describe('Claim identity signing', () => {
  it('should hash the 20 address bytes', () => {
    expect(claimDigest(CLAIMER)).toBe(keccak256(CLAIMER));
  });

  it('should not depend on address casing', () => {
    expect(claimDigest(CLAIMER.toUpperCase().replace('0X', '0x'))).toBe(claimDigest(CLAIMER));
  });

  it('should recover the signing key address', () => {
    const signature = signClaimIdentity(REPORTER, CLAIMER);
    expect(recoverClaimSigner(CLAIMER, signature)).toBe(REPORTER.address);
  });

  it('should accept a bare signing key', () => {
    const signature = signClaimIdentity(REPORTER.signingKey, CLAIMER);
    expect(recoverClaimSigner(CLAIMER, signature)).toBe(REPORTER.address);
  });

  it('should recover a different address for a different claimer', () => {
    const signature = signClaimIdentity(REPORTER, CLAIMER);
    expect(recoverClaimSigner(OTHER.address, signature)).not.toBe(REPORTER.address);
  });
});

describe('Wire helpers', () => {
  it('should serialize bigints as decimal strings', () => {
    const request: DataRequest = {
      id: 1,
      payloadRef: getAddress('0x00000000000000000000000000000000000000aa'),
      payloadHash: '0x' + 'ab'.repeat(32),
      inclusionReward: 300n,
      tallyReward: 300n,
      blockReward: 400n,
      gasPriceAtPost: 1n,
      epoch: 7,
      inclusionProofHash: '0x' + '00'.repeat(32),
      result: CONSTANTS.EMPTY_RESULT,
      claimant: CONSTANTS.ZERO_ADDRESS,
      claimBlock: 0,
      requestor: CLAIMER,
      deposited: 1000n,
      paidOut: 0n,
    };

    const json = serializeRequest(request);

    expect(json.inclusionReward).toBe('300');
    expect(json.blockReward).toBe('400');
    expect(json.deposited).toBe('1000');
    expect(json.epoch).toBe(7);
  });

  it('should parse decimal and hex amounts', () => {
    expect(parseAmount('1000', 'value')).toBe(1000n);
    expect(parseAmount('0x10', 'value')).toBe(16n);
    expect(parseAmount(undefined, 'value')).toBe(0n);
    expect(parseAmount(5, 'value')).toBe(5n);
  });

  it('should reject negative or fractional amounts', () => {
    expect(() => parseAmount('-1', 'value')).toThrow('Invalid amount for value: -1');
    expect(() => parseAmount('1.5', 'tallyReward')).toThrow('Invalid amount for tallyReward: 1.5');
  });
});
