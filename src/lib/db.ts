import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { logger } from './logger';
import { getEnv } from './config/env';
import { migrate } from './database/schema';

export type SettlementDatabase = Database.Database;

export interface OpenDatabaseOptions {
  /** File path, or `:memory:` */
  path?: string;
  busyTimeoutMs?: number;
}

/**
 * Open a settlement store and bring its schema up to date.
 *
 * File-backed stores run in WAL mode so report reads never block payment
 * writes; every connection enforces foreign keys and waits `busy_timeout`
 * on a held write lock before failing with SQLITE_BUSY.
 */
export function openDatabase(options: OpenDatabaseOptions = {}): SettlementDatabase {
  const env = getEnv();
  const dbPath = options.path ?? env.DATABASE_PATH;
  const inMemory = dbPath === ':memory:';

  if (!inMemory) {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const db = new Database(dbPath, {
    timeout: options.busyTimeoutMs ?? env.DATABASE_BUSY_TIMEOUT_MS,
  });

  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  const version = migrate(db);
  logger.db('open', inMemory ? 'memory' : dbPath, { schemaVersion: version });

  return db;
}

let sharedDb: SettlementDatabase | undefined;

/**
 * Process-wide store used by the route handlers.
 */
export function getDb(): SettlementDatabase {
  if (!sharedDb) {
    sharedDb = openDatabase();
  }
  return sharedDb;
}

export function closeDb(): void {
  if (sharedDb) {
    sharedDb.close();
    sharedDb = undefined;
  }
}

/**
 * Run `fn` in a `BEGIN IMMEDIATE` transaction: the write lock is taken up
 * front, so two writers never both read a row and then race to upgrade.
 * Called from inside another transaction it becomes a savepoint.
 * `fn` must be synchronous; a thrown error rolls everything back.
 */
export function runInTransaction<T>(db: SettlementDatabase, fn: () => T): T {
  return db.transaction(fn).immediate();
}
