/**
 * Claim Eligibility Gate Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { randomBytes, toBigInt } from 'ethers';
import { CONSTANTS, RequestStatus, type ClaimedRequestsEvent } from '@oracle-bridge/sdk';
import { closeDatabase } from '../db/index.js';
import { AuthorizationError, StateError, ValidationError, isSelectedBySortition } from '../board/index.js';
import {
  blockHashAt,
  catchBoardError,
  claim,
  claimSubmission,
  outsider,
  postRequest,
  relayer,
  reporter,
  setupNode,
  UNUSED_ROOT,
  type Harness,
} from './fixtures.js';

// ============================================================================
// Sortition
// ============================================================================

describe('isSelectedBySortition', () => {
  it('should select everyone while the population is below the replication factor', () => {
    expect(isSelectedBySortition(CONSTANTS.MAX_UINT256, 1, 2)).toBe(true);
  });

  it('should accept outputs up to the threshold and nothing above', () => {
    const threshold = (CONSTANTS.MAX_UINT256 / 4n) * 2n;

    expect(isSelectedBySortition(threshold, 4, 2)).toBe(true);
    expect(isSelectedBySortition(threshold + 1n, 4, 2)).toBe(false);
  });

  it('should accept about replicationFactor / activeCount of random outputs', () => {
    const samples = 10_000;
    let accepted = 0;
    for (let i = 0; i < samples; i++) {
      if (isSelectedBySortition(toBigInt(randomBytes(32)), 100, 10)) {
        accepted++;
      }
    }

    expect(Math.abs(accepted / samples - 0.1)).toBeLessThan(0.02);
  });
});

// ============================================================================
// claim
// ============================================================================

describe('Claim Gate', () => {
  let h: Harness;

  beforeEach(() => {
    h = setupNode();
  });

  afterEach(() => {
    closeDatabase();
  });

  describe('claim', () => {
    it('should record the claimant and block for every listed request', () => {
      const first = postRequest(h);
      const second = postRequest(h);

      expect(claim(h, reporter, [first, second])).toEqual([first, second]);

      for (const id of [first, second]) {
        const request = h.board.readRequest(id);
        expect(request.claimant).toBe(reporter.address);
        expect(request.claimBlock).toBe(1);
        expect(h.board.requestStatus(id)).toBe(RequestStatus.CLAIMED);
      }
      expect(h.board.checkClaimability([first, second])).toEqual([false, false]);
      expect(h.reporters.isActive(reporter.address)).toBe(true);
    });

    it('should publish one ClaimedRequests event for the batch', () => {
      const id = postRequest(h);
      const received: ClaimedRequestsEvent[] = [];
      h.board.events.on('ClaimedRequests', (event) => received.push(event));

      claim(h, reporter, [id]);

      expect(received).toEqual([
        { name: 'ClaimedRequests', ids: [id], claimant: reporter.address, blockNumber: 1 },
      ]);
    });

    it('should verify the VRF over the current beacon', () => {
      const id = postRequest(h);
      claim(h, reporter, [id]);

      h.relay.postNewBlock(relayer.address, {
        blockHash: blockHashAt(7),
        epoch: 7,
        drMerkleRoot: UNUSED_ROOT,
        tallyMerkleRoot: UNUSED_ROOT,
      });
      claim(h, reporter, [postRequest(h)]);

      expect(h.vrf.messages).toEqual([
        '0x' + '00'.repeat(64),
        blockHashAt(7) + '00'.repeat(31) + '07',
      ]);
    });

    it('should reject a signature made by another key', () => {
      const id = postRequest(h);
      const submission = {
        ...claimSubmission(reporter, [id]),
        signature: claimSubmission(outsider, [id], reporter.address).signature,
      };

      const error = catchBoardError(() => h.board.claim({ from: reporter.address }, submission));
      expect(error).toBeInstanceOf(AuthorizationError);
      expect(error.message).toBe('Not a valid signature');
    });

    it('should reject a signature over another identity', () => {
      const id = postRequest(h);
      const submission = claimSubmission(reporter, [id], outsider.address);

      const error = catchBoardError(() => h.board.claim({ from: reporter.address }, submission));
      expect(error.reason).toBe('signature_mismatch');
    });

    it('should reject a malformed public key', () => {
      const id = postRequest(h);
      const submission = { ...claimSubmission(reporter, [id]), publicKey: '0x1234' };

      const error = catchBoardError(() => h.board.claim({ from: reporter.address }, submission));
      expect(error).toBeInstanceOf(ValidationError);
      expect(error.reason).toBe('invalid_public_key');
    });

    it('should reject an invalid VRF proof', () => {
      const id = postRequest(h);
      h.vrf.valid = false;

      const error = catchBoardError(() => claim(h, reporter, [id]));
      expect(error.message).toBe('Not a valid VRF');
    });

    it('should reject an output that is not 32 bytes', () => {
      const id = postRequest(h);
      h.vrf.output = '0x01';

      expect(catchBoardError(() => claim(h, reporter, [id])).reason).toBe('invalid_vrf');
    });

    it('should reject outputs above the threshold once the population is large enough', () => {
      const id = postRequest(h);
      h.reporters.pushActivity(relayer.address, 1);
      h.reporters.pushActivity(outsider.address, 1);
      h.vrf.output = '0x' + 'ff'.repeat(32);

      const error = catchBoardError(() => claim(h, reporter, [id]));
      expect(error.reason).toBe('not_eligible');
      expect(h.board.readRequest(id).claimant).toBe(CONSTANTS.ZERO_ADDRESS);
    });

    it('should reject empty and repeated batches', () => {
      const id = postRequest(h);

      expect(catchBoardError(() => claim(h, reporter, [])).reason).toBe('empty_claim');
      expect(catchBoardError(() => claim(h, reporter, [id, id])).reason).toBe('duplicate_ids');
      expect(catchBoardError(() => claim(h, reporter, [id, 42])).reason).toBe('bad_handle');
    });

    it('should claim none of the batch when one request is taken', () => {
      const free = postRequest(h);
      const taken = postRequest(h);
      claim(h, outsider, [taken]);

      const error = catchBoardError(() => claim(h, reporter, [free, taken]));

      expect(error).toBeInstanceOf(StateError);
      expect(error.message).toBe('One of the listed data requests was already claimed');
      expect(h.board.readRequest(free).claimant).toBe(CONSTANTS.ZERO_ADDRESS);
      expect(h.board.readRequest(taken).claimant).toBe(outsider.address);
    });
  });

  // ============================================================================
  // Expiry
  // ============================================================================

  describe('claim expiry', () => {
    it('should keep the claim for the whole expiry window', () => {
      const id = postRequest(h);
      claim(h, reporter, [id]);

      h.clock.mine(13);

      expect(h.board.checkClaimability([id])).toEqual([false]);
      expect(catchBoardError(() => claim(h, outsider, [id])).reason).toBe('already_claimed');
    });

    it('should reopen the request once the window is exceeded', () => {
      const id = postRequest(h);
      claim(h, reporter, [id]);

      h.clock.mine(14);

      expect(h.board.checkClaimability([id])).toEqual([true]);
      expect(h.board.requestStatus(id)).toBe(RequestStatus.POSTED);

      claim(h, outsider, [id]);
      const request = h.board.readRequest(id);
      expect(request.claimant).toBe(outsider.address);
      expect(request.claimBlock).toBe(15);
    });

    it('should honour a configured expiry window', () => {
      closeDatabase();
      h = setupNode({ claimExpiryBlocks: 2 });
      const id = postRequest(h);
      claim(h, reporter, [id]);

      h.clock.mine(3);

      expect(h.board.checkClaimability([id])).toEqual([true]);
    });
  });
});
