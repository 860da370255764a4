/**
 * Board API Configuration
 * Centralized environment variables with sensible defaults
 */

export const config = {
  // Server
  PORT: parseInt(process.env.PORT || '3000'),
  NODE_ENV: process.env.NODE_ENV || 'development',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',

  // Database (':memory:' for tests)
  DATABASE_PATH: process.env.DATABASE_PATH || './data/board.db',

  // Claims lapse after this many host blocks without an inclusion report
  CLAIM_EXPIRY_BLOCKS: parseInt(process.env.CLAIM_EXPIRY_BLOCKS || '13'),

  // Expected number of reporters eligible for each request
  REPLICATION_FACTOR: parseInt(process.env.REPLICATION_FACTOR || '2'),

  // A reporter stays in the active population this many blocks after its last claim or inclusion
  ACTIVITY_PERIOD_BLOCKS: parseInt(process.env.ACTIVITY_PERIOD_BLOCKS || '100'),
} as const;

export type BoardConfig = typeof config;

// Validate critical config on startup
export function validateConfig(settings: BoardConfig = config): void {
  const positive: Array<keyof BoardConfig> = [
    'PORT',
    'CLAIM_EXPIRY_BLOCKS',
    'REPLICATION_FACTOR',
    'ACTIVITY_PERIOD_BLOCKS',
  ];

  for (const key of positive) {
    const value = settings[key];
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
      throw new Error(`[CONFIG] ${key} must be a positive integer, got ${String(value)}`);
    }
  }
}
