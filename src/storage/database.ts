import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { MIGRATIONS, type Migration } from './schema.js';
import { StorageError } from '../errors.js';
import type { Logger } from '../logger.js';

export function getSchemaVersion(db: Database.Database): number {
  const version = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

/**
 * Apply every migration newer than the database's `user_version` in a single
 * transaction. Returns the versions that were applied.
 */
export function migrate(
  db: Database.Database,
  migrations: readonly Migration[] = MIGRATIONS,
  log?: Logger
): number[] {
  const current = getSchemaVersion(db);
  const pending = migrations
    .filter((m) => m.version > current)
    .sort((a, b) => a.version - b.version);

  if (pending.length === 0) {
    return [];
  }

  const apply = db.transaction(() => {
    for (const migration of pending) {
      migration.up(db);
      // PRAGMA does not take bound parameters
      db.pragma(`user_version = ${Math.trunc(migration.version)}`);
    }
  });

  try {
    apply();
  } catch (error) {
    throw new StorageError(
      `Schema migration from version ${current} failed: ${error instanceof Error ? error.message : error}`,
      { cause: error }
    );
  }

  const applied = pending.map((m) => m.version);
  log?.info({ from: current, applied }, 'database schema migrated');
  return applied;
}

export function openDatabase(path: string, log?: Logger): Database.Database {
  let db: Database.Database;
  try {
    if (path !== ':memory:') {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
    db = new Database(path);
    if (path !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
  } catch (error) {
    throw new StorageError(
      `Cannot open database ${path}: ${error instanceof Error ? error.message : error}`,
      { cause: error }
    );
  }

  try {
    migrate(db, MIGRATIONS, log);
  } catch (error) {
    db.close();
    throw error;
  }
  return db;
}
