import Database from 'better-sqlite3';
import { afterEach, describe, expect, it } from 'vitest';
import { StorageError } from '../errors.js';
import { getSchemaVersion, migrate, openDatabase } from './database.js';
import { MIGRATIONS, SCHEMA_VERSION, type Migration } from './schema.js';

describe('migrate', () => {
  let db: Database.Database;

  afterEach(() => {
    db.close();
  });

  it('brings a fresh database to the latest version', () => {
    db = new Database(':memory:');
    const applied = migrate(db);

    expect(applied).toEqual(MIGRATIONS.map((m) => m.version));
    expect(getSchemaVersion(db)).toBe(SCHEMA_VERSION);

    const columns = db.prepare('PRAGMA table_info(messages)').all() as Array<{ name: string }>;
    expect(columns.map((c) => c.name)).toEqual(
      expect.arrayContaining(['media_ref', 'media_type', 'thread_id', 'thread_label'])
    );
  });

  it('is a no-op on an up-to-date database', () => {
    db = openDatabase(':memory:');
    expect(migrate(db)).toEqual([]);
  });

  it('upgrades a database left at an older version', () => {
    db = new Database(':memory:');
    migrate(db, MIGRATIONS.slice(0, 2));
    db.prepare(
      `INSERT INTO messages (chat_id, message_id, sender_id, sender_name, text, timestamp)
       VALUES (1, 10, 5, 'alice', 'kept', 100)`
    ).run();

    expect(migrate(db)).toEqual([3, 4]);
    const row = db.prepare('SELECT text, thread_id FROM messages WHERE message_id = 10').get();
    expect(row).toEqual({ text: 'kept', thread_id: null });
  });

  it('rolls back every pending step when one fails', () => {
    db = new Database(':memory:');
    const broken: Migration[] = [
      MIGRATIONS[0],
      { version: 2, description: 'broken', up: (d) => d.exec('ALTER TABLE missing ADD COLUMN x TEXT') },
    ];

    expect(() => migrate(db, broken)).toThrow(StorageError);
    expect(getSchemaVersion(db)).toBe(0);
    const tables = db.prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'messages'").all();
    expect(tables).toEqual([]);
  });
});
