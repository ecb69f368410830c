import type Database from 'better-sqlite3';
import { StorageError } from '../errors.js';
import type { Logger } from '../logger.js';
import { nowIso } from '../utils/time.js';
import type { Checkpoint } from './types.js';

interface CheckpointRow {
  chat_id: number;
  last_message_id: number | null;
  chat_link: string | null;
  title: string | null;
  updated_at: string;
}

/**
 * Per-chat watermark: the highest message id whose page has been committed to
 * the message store. Moves forward only.
 */
export class CheckpointStore {
  constructor(
    private readonly db: Database.Database,
    private readonly log?: Logger
  ) {}

  getWatermark(chatId: number): number | null {
    const row = this.db
      .prepare('SELECT last_message_id FROM checkpoints WHERE chat_id = ?')
      .get(chatId) as { last_message_id: number | null } | undefined;
    return row?.last_message_id ?? null;
  }

  /**
   * Advance the watermark. A value not above the stored one is rejected and
   * leaves the row untouched.
   */
  setWatermark(chatId: number, messageId: number): boolean {
    const current = this.getWatermark(chatId);
    if (current !== null && messageId <= current) {
      if (messageId < current) {
        this.log?.warn({ chatId, current, requested: messageId }, 'refusing to move watermark backward');
      }
      return false;
    }

    try {
      this.db
        .prepare(
          `INSERT INTO checkpoints (chat_id, last_message_id, updated_at) VALUES (?, ?, ?)
           ON CONFLICT(chat_id) DO UPDATE SET
             last_message_id = excluded.last_message_id,
             updated_at = excluded.updated_at
           WHERE checkpoints.last_message_id IS NULL OR checkpoints.last_message_id < excluded.last_message_id`
        )
        .run(chatId, messageId, nowIso());
    } catch (error) {
      throw new StorageError(
        `Watermark update for chat ${chatId} failed: ${error instanceof Error ? error.message : error}`,
        { cause: error }
      );
    }
    return true;
  }

  /** Record how a configured link resolved, for runs without a platform connection. */
  rememberChat(chatId: number, chatLink: string | null, title: string | null): void {
    try {
      const remember = this.db.transaction(() => {
        if (chatLink) {
          // A link can move to another chat; keep it unique
          this.db
            .prepare('UPDATE checkpoints SET chat_link = NULL WHERE chat_link = ? AND chat_id != ?')
            .run(chatLink, chatId);
        }
        this.db
          .prepare(
            `INSERT INTO checkpoints (chat_id, last_message_id, chat_link, title, updated_at)
             VALUES (?, NULL, ?, ?, ?)
             ON CONFLICT(chat_id) DO UPDATE SET
               chat_link = COALESCE(excluded.chat_link, checkpoints.chat_link),
               title = COALESCE(excluded.title, checkpoints.title),
               updated_at = excluded.updated_at`
          )
          .run(chatId, chatLink, title, nowIso());
      });
      remember();
    } catch (error) {
      throw new StorageError(
        `Saving chat ${chatId} failed: ${error instanceof Error ? error.message : error}`,
        { cause: error }
      );
    }
  }

  findChatByLink(chatLink: string): number | null {
    const row = this.db
      .prepare('SELECT chat_id FROM checkpoints WHERE chat_link = ?')
      .get(chatLink) as { chat_id: number } | undefined;
    return row?.chat_id ?? null;
  }

  listCheckpoints(): Checkpoint[] {
    const rows = this.db
      .prepare('SELECT chat_id, last_message_id, chat_link, title, updated_at FROM checkpoints ORDER BY chat_id')
      .all() as CheckpointRow[];
    return rows.map((row) => ({
      chatId: row.chat_id,
      lastMessageId: row.last_message_id,
      chatLink: row.chat_link,
      title: row.title,
      updatedAt: row.updated_at,
    }));
  }
}
