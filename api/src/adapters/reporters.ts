import { getAddress } from 'ethers';
import { execute, queryOne } from '../db/index.js';
import type { BlockClock, ReporterPopulation } from './types.js';

/**
 * Reporter population tracked by last activity.
 *
 * An identity counts as active while the host height is at most
 * `activityPeriod` blocks past its last claim or inclusion.
 */
export class ActiveReporterSet implements ReporterPopulation {
  constructor(
    private readonly clock: BlockClock,
    private readonly activityPeriod: number
  ) {
    if (!Number.isInteger(activityPeriod) || activityPeriod <= 0) {
      throw new RangeError(`activityPeriod must be a positive integer, got ${activityPeriod}`);
    }
  }

  activeCount(): number {
    return queryOne<{ count: number }>(
      'SELECT COUNT(*) as count FROM reporter_activity WHERE last_active_block >= ?',
      [this.oldestActiveBlock()]
    )?.count ?? 0;
  }

  isActive(identity: string): boolean {
    const row = queryOne<{ last_active_block: number }>(
      'SELECT last_active_block FROM reporter_activity WHERE identity = ?',
      [getAddress(identity)]
    );
    return row !== undefined && row.last_active_block >= this.oldestActiveBlock();
  }

  pushActivity(identity: string, blockNumber: number): void {
    execute(
      `INSERT INTO reporter_activity (identity, last_active_block) VALUES (?, ?)
       ON CONFLICT(identity) DO UPDATE
       SET last_active_block = MAX(last_active_block, excluded.last_active_block)`,
      [getAddress(identity), blockNumber]
    );
  }

  lastActiveBlock(identity: string): number | undefined {
    return queryOne<{ last_active_block: number }>(
      'SELECT last_active_block FROM reporter_activity WHERE identity = ?',
      [getAddress(identity)]
    )?.last_active_block;
  }

  private oldestActiveBlock(): number {
    return this.clock.blockNumber() - this.activityPeriod;
  }
}
