import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { dirname } from 'node:path';
import { existsSync, mkdirSync } from 'node:fs';
import { StoreReadError, StoreWriteError } from '../utils/errors.js';

const logger = createLogger({ component: 'database' });

export interface OpenDatabaseOptions {
  readonly?: boolean;
}

/**
 * Opens (and migrates) the journal database. ':memory:' is accepted for tests.
 * A writable open that fails means nothing can be appended: StoreWriteError.
 * A read-only open never creates or migrates anything; a journal that does not
 * exist yet reads as an empty in-memory one.
 */
export function openDatabase(dbPath: string, options: OpenDatabaseOptions = {}): Database.Database {
  logger.info({ dbPath, readonly: options.readonly === true }, 'Opening journal database');

  if (options.readonly && (dbPath === ':memory:' || !existsSync(dbPath))) {
    logger.info({ dbPath }, 'No journal database yet; reading an empty journal');
    return openDatabase(':memory:');
  }

  let db: Database.Database;
  try {
    if (dbPath !== ':memory:' && !options.readonly) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    db = new Database(dbPath, { readonly: options.readonly === true, fileMustExist: options.readonly === true });
  } catch (error) {
    const message = `Could not open journal database at ${dbPath}`;
    throw options.readonly
      ? new StoreReadError(message, { cause: error })
      : new StoreWriteError(message, { cause: error });
  }

  if (!options.readonly) {
    try {
      db.pragma('journal_mode = WAL');
      runMigrations(db);
    } catch (error) {
      db.close();
      throw new StoreWriteError(`Could not prepare journal database at ${dbPath}`, { cause: error });
    }
  }

  return db;
}

export function runMigrations(db: Database.Database): void {
  logger.debug('Running database migrations');

  // Append-only: rows are never updated or deleted. Several rows may share
  // (date, kind); readers take the last one by (written_at, id).
  db.exec(`
    CREATE TABLE IF NOT EXISTS journal_entries (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      date TEXT NOT NULL,
      kind TEXT NOT NULL CHECK (kind IN ('DAILY', 'START_OF_WEEK', 'END_OF_WEEK')),
      answers TEXT NOT NULL,
      written_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_journal_entries_date_kind
      ON journal_entries(date, kind, written_at);
  `);

  logger.debug('Database migrations completed');
}

export function closeDatabase(db: Database.Database): void {
  if (db.open) {
    logger.debug('Closing journal database');
    db.close();
  }
}
