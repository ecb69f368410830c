import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  description: string;
  up: (db: Database.Database) => void;
}

// Append only. Every step after the first adds columns or tables with a
// defined default so existing rows stay valid.
export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: 'messages and checkpoints',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS messages (
          chat_id INTEGER NOT NULL,
          message_id INTEGER NOT NULL,
          sender_id INTEGER,
          sender_name TEXT NOT NULL,
          text TEXT NOT NULL DEFAULT '',
          timestamp INTEGER NOT NULL,
          reply_to_message_id INTEGER,
          media_ref TEXT,
          PRIMARY KEY (chat_id, message_id)
        );

        CREATE TABLE IF NOT EXISTS checkpoints (
          chat_id INTEGER PRIMARY KEY,
          last_message_id INTEGER
        );

        CREATE INDEX IF NOT EXISTS idx_messages_timestamp ON messages(timestamp);
        CREATE INDEX IF NOT EXISTS idx_messages_reply_to ON messages(chat_id, reply_to_message_id);
      `);
    },
  },
  {
    version: 2,
    description: 'media type column',
    up: (db) => {
      db.exec(`ALTER TABLE messages ADD COLUMN media_type TEXT DEFAULT NULL;`);
    },
  },
  {
    version: 3,
    description: 'thread annotations',
    up: (db) => {
      db.exec(`
        ALTER TABLE messages ADD COLUMN thread_id INTEGER DEFAULT NULL;
        ALTER TABLE messages ADD COLUMN thread_label TEXT DEFAULT NULL;
        CREATE INDEX IF NOT EXISTS idx_messages_thread ON messages(chat_id, thread_id);
      `);
    },
  },
  {
    version: 4,
    description: 'chat link cache and summary cache',
    up: (db) => {
      db.exec(`
        ALTER TABLE checkpoints ADD COLUMN chat_link TEXT DEFAULT NULL;
        ALTER TABLE checkpoints ADD COLUMN title TEXT DEFAULT NULL;
        ALTER TABLE checkpoints ADD COLUMN updated_at TEXT NOT NULL DEFAULT '';

        CREATE UNIQUE INDEX IF NOT EXISTS idx_checkpoints_link ON checkpoints(chat_link);

        CREATE TABLE IF NOT EXISTS thread_summaries (
          chat_id INTEGER NOT NULL,
          day TEXT NOT NULL,
          thread_id INTEGER NOT NULL,
          digest TEXT NOT NULL,
          summary TEXT NOT NULL,
          created_at TEXT NOT NULL,
          PRIMARY KEY (chat_id, day, thread_id)
        );
      `);
    },
  },
];

export const SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1].version;
