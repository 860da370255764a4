/**
 * Board Database Module
 * Uses better-sqlite3 with WAL mode for production reliability
 *
 * Features:
 * - WAL mode for concurrent reads
 * - busy_timeout for lock handling
 * - Auto-migration on startup
 * - Transaction support: every board call runs inside one
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { config } from '../config.js';
import { logger } from '../logger.js';

const log = logger.child({ component: 'db' });

// Database instance (singleton)
let db: Database.Database | null = null;

/**
 * Initialize the database connection
 */
export function initDatabase(databasePath: string = config.DATABASE_PATH): Database.Database {
  if (db) return db;

  const inMemory = databasePath === ':memory:';

  // Ensure data directory exists
  if (!inMemory) {
    const dbDir = path.dirname(databasePath);
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
    }
  }

  db = new Database(databasePath);

  if (!inMemory) {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
  }
  db.pragma('busy_timeout = 5000');
  db.pragma('foreign_keys = ON');

  log.info({ path: databasePath }, 'connected');

  runMigrations(db);

  return db;
}

/**
 * Get the database instance
 */
export function getDb(): Database.Database {
  if (!db) {
    return initDatabase();
  }
  return db;
}

/**
 * Close the database connection
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    log.info('connection closed');
  }
}

/**
 * Run all pending migrations
 */
function runMigrations(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at INTEGER NOT NULL
    )
  `);

  const applied = new Set(
    database
      .prepare('SELECT name FROM _migrations')
      .all()
      .map((row) => (row as { name: string }).name)
  );

  const migrationsDir = fileURLToPath(new URL('./migrations', import.meta.url));

  if (!fs.existsSync(migrationsDir)) {
    throw new Error(`[DB] Migrations directory not found: ${migrationsDir}`);
  }

  const migrationFiles = fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  let migrationsApplied = 0;
  for (const file of migrationFiles) {
    if (applied.has(file)) continue;

    const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');

    database.transaction(() => {
      database.exec(sql);
      database
        .prepare('INSERT INTO _migrations (name, applied_at) VALUES (?, ?)')
        .run(file, Date.now());
    })();

    log.debug({ file }, 'applied migration');
    migrationsApplied++;
  }

  log.info({ applied: migrationsApplied }, 'migrations up to date');
}

// ============================================================================
// Database Abstraction Layer
// ============================================================================

export interface DbRow {
  [key: string]: unknown;
}

/**
 * Execute a query and return all rows
 */
export function query<T extends DbRow>(sql: string, params: unknown[] = []): T[] {
  return getDb().prepare(sql).all(...params) as T[];
}

/**
 * Execute a query and return first row
 */
export function queryOne<T extends DbRow>(
  sql: string,
  params: unknown[] = []
): T | undefined {
  return getDb().prepare(sql).get(...params) as T | undefined;
}

/**
 * Execute an insert/update/delete and return changes info
 */
export function execute(
  sql: string,
  params: unknown[] = []
): Database.RunResult {
  return getDb().prepare(sql).run(...params);
}

/**
 * Run multiple statements in a transaction.
 * Anything thrown inside rolls back every write made by `fn`.
 */
export function transaction<T>(fn: () => T): T {
  return getDb().transaction(fn)();
}
