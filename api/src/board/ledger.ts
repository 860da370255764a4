/**
 * Value Ledger and Paid-Block Set
 *
 * Balances stand in for host-chain value transfers: a payout credits the
 * recipient's balance. Both tables are written inside the caller's
 * transaction, so a failed call credits nothing.
 */

import { getAddress, hexlify } from 'ethers';
import { execute, queryOne } from '../db/index.js';

export class ValueLedger {
  credit(account: string, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError(`Cannot credit a negative amount: ${amount}`);
    }
    if (amount === 0n) return;

    const holder = getAddress(account);
    const balance = this.balanceOf(holder) + amount;

    execute(
      `INSERT INTO balances (account, amount) VALUES (?, ?)
       ON CONFLICT(account) DO UPDATE SET amount = excluded.amount`,
      [holder, balance.toString()]
    );
  }

  balanceOf(account: string): bigint {
    const row = queryOne<{ amount: string }>(
      'SELECT amount FROM balances WHERE account = ?',
      [getAddress(account)]
    );
    return row ? BigInt(row.amount) : 0n;
  }
}

export interface PaidBlock {
  blockHash: string;
  relayer: string;
  requestId: number;
}

/**
 * External blocks whose relayer has already been credited
 */
export class PaidBlockSet {
  has(blockHash: string): boolean {
    return this.get(blockHash) !== undefined;
  }

  get(blockHash: string): PaidBlock | undefined {
    const row = queryOne<{ block_hash: string; relayer: string; request_id: number }>(
      'SELECT block_hash, relayer, request_id FROM paid_blocks WHERE block_hash = ?',
      [hexlify(blockHash)]
    );
    return row
      ? { blockHash: row.block_hash, relayer: row.relayer, requestId: row.request_id }
      : undefined;
  }

  add(blockHash: string, relayer: string, requestId: number): void {
    execute(
      'INSERT INTO paid_blocks (block_hash, relayer, request_id, paid_at) VALUES (?, ?, ?, ?)',
      [hexlify(blockHash), getAddress(relayer), requestId, Date.now()]
    );
  }
}
