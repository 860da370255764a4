/**
 * Payload Store
 *
 * Holds request payload bytes under an address-like reference, the way a
 * request contract is deployed once and referenced afterwards. Owners may
 * replace their bytes; the board detects this through the payload hash it
 * recorded at creation.
 */

import { getAddress, getCreateAddress, hexlify, isAddress, isHexString } from 'ethers';
import { execute, queryOne } from '../db/index.js';
import { AuthorizationError, ValidationError } from '../board/errors.js';
import { requireIdentity } from '../board/guards.js';
import type { PayloadSource } from './types.js';

interface PayloadRow {
  [key: string]: unknown;
  ref: string;
  bytes: string;
  owner: string;
  updated_at: number;
}

function normalizeBytes(bytes: string): string {
  if (!isHexString(bytes) || bytes.length % 2 !== 0) {
    throw new ValidationError('invalid_payload', 'Payload must be an even-length 0x hex string');
  }
  if (bytes === '0x') {
    throw new ValidationError('empty_payload', 'Payload must not be empty');
  }
  return hexlify(bytes);
}

export class PayloadStore implements PayloadSource {
  /**
   * Store `bytes` for `owner` and return the new reference
   */
  register(owner: string, bytes: string): string {
    const from = requireIdentity(owner, 'owner');
    const normalized = normalizeBytes(bytes);

    const nonce = queryOne<{ count: number }>(
      'SELECT COUNT(*) as count FROM payloads WHERE owner = ?',
      [from]
    )?.count ?? 0;

    const ref = getCreateAddress({ from, nonce });

    execute(
      'INSERT INTO payloads (ref, bytes, owner, updated_at) VALUES (?, ?, ?, ?)',
      [ref, normalized, from, Date.now()]
    );

    return ref;
  }

  /**
   * Overwrite the bytes behind `ref`. Only the registering owner may do so.
   */
  replace(owner: string, ref: string, bytes: string): void {
    const row = this.getRow(ref);
    if (!row) {
      throw new ValidationError('unknown_payload', `Unknown payload reference: ${ref}`);
    }
    if (row.owner !== requireIdentity(owner, 'owner')) {
      throw new AuthorizationError('not_payload_owner', 'Only the payload owner can replace it');
    }

    execute(
      'UPDATE payloads SET bytes = ?, updated_at = ? WHERE ref = ?',
      [normalizeBytes(bytes), Date.now(), row.ref]
    );
  }

  payloadBytes(ref: string): string | undefined {
    return this.getRow(ref)?.bytes;
  }

  private getRow(ref: string): PayloadRow | undefined {
    if (!isAddress(ref)) return undefined;
    return queryOne<PayloadRow>('SELECT * FROM payloads WHERE ref = ?', [getAddress(ref)]);
  }
}
