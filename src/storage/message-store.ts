import type Database from 'better-sqlite3';
import { StorageError } from '../errors.js';
import { zonedDayRange } from '../utils/time.js';
import { GENERAL_THREAD_ID, type MessageRow, type NewMessage, type StoredMessage } from './types.js';

function toMessage(row: MessageRow): StoredMessage {
  return {
    chatId: row.chat_id,
    messageId: row.message_id,
    senderId: row.sender_id,
    senderName: row.sender_name,
    text: row.text,
    timestamp: row.timestamp,
    replyToMessageId: row.reply_to_message_id,
    mediaType: row.media_type,
    mediaRef: row.media_ref,
    threadId: row.thread_id,
    threadLabel: row.thread_label,
  };
}

function wrapStorage<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof StorageError) {
      throw error;
    }
    throw new StorageError(`${action} failed: ${error instanceof Error ? error.message : error}`, { cause: error });
  }
}

const MESSAGE_COLUMNS = `chat_id, message_id, sender_id, sender_name, text, timestamp,
  reply_to_message_id, media_type, media_ref, thread_id, thread_label`;

export class MessageStore {
  constructor(private readonly db: Database.Database) {}

  /**
   * Insert a batch in one transaction. Rows whose (chat_id, message_id) is
   * already stored are skipped and keep their original content.
   */
  upsertMessages(messages: readonly NewMessage[]): number {
    if (messages.length === 0) {
      return 0;
    }

    return wrapStorage('Message insert', () => {
      const stmt = this.db.prepare(`
        INSERT OR IGNORE INTO messages
        (chat_id, message_id, sender_id, sender_name, text, timestamp, reply_to_message_id, media_type, media_ref)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);

      const insertMany = this.db.transaction((msgs: readonly NewMessage[]) => {
        let inserted = 0;
        for (const msg of msgs) {
          const result = stmt.run(
            msg.chatId,
            msg.messageId,
            msg.senderId,
            msg.senderName,
            msg.text,
            msg.timestamp,
            msg.replyToMessageId,
            msg.mediaType,
            msg.mediaRef
          );
          if (result.changes > 0) {
            inserted++;
          }
        }
        return inserted;
      });

      return insertMany(messages);
    });
  }

  getMessage(chatId: number, messageId: number): StoredMessage | undefined {
    const row = this.db
      .prepare(`SELECT ${MESSAGE_COLUMNS} FROM messages WHERE chat_id = ? AND message_id = ?`)
      .get(chatId, messageId) as MessageRow | undefined;
    return row ? toMessage(row) : undefined;
  }

  private selectIn(chatId: number, column: 'message_id' | 'reply_to_message_id', ids: readonly number[]): StoredMessage[] {
    const found: StoredMessage[] = [];
    // Stay well below SQLite's bound parameter limit
    for (let i = 0; i < ids.length; i += 500) {
      const chunk = ids.slice(i, i + 500);
      const rows = this.db
        .prepare(
          `SELECT ${MESSAGE_COLUMNS} FROM messages
           WHERE chat_id = ? AND ${column} IN (${chunk.map(() => '?').join(',')})
           ORDER BY message_id ASC`
        )
        .all(chatId, ...chunk) as MessageRow[];
      found.push(...rows.map(toMessage));
    }
    return found;
  }

  getMessages(chatId: number, messageIds: readonly number[]): StoredMessage[] {
    return this.selectIn(chatId, 'message_id', messageIds);
  }

  /** Stored direct replies to any of `messageIds`. */
  getReplies(chatId: number, messageIds: readonly number[]): StoredMessage[] {
    return this.selectIn(chatId, 'reply_to_message_id', messageIds);
  }

  /**
   * Messages whose timestamp lies in `[start, end)` (Unix seconds), oldest
   * first. `chatIds` of null means every chat.
   */
  queryRange(chatIds: readonly number[] | null, start: number, end: number): StoredMessage[] {
    if (chatIds && chatIds.length === 0) {
      return [];
    }
    const chatFilter = chatIds ? `AND chat_id IN (${chatIds.map(() => '?').join(',')})` : '';
    const rows = this.db
      .prepare(
        `SELECT ${MESSAGE_COLUMNS} FROM messages
         WHERE timestamp >= ? AND timestamp < ? ${chatFilter}
         ORDER BY timestamp ASC, chat_id ASC, message_id ASC`
      )
      .all(start, end, ...(chatIds ?? [])) as MessageRow[];
    return rows.map(toMessage);
  }

  queryByDay(chatId: number | null, date: string, timeZone: string): StoredMessage[] {
    const { start, end } = zonedDayRange(date, timeZone);
    return this.queryRange(chatId === null ? null : [chatId], start, end);
  }

  listUnthreaded(chatId: number): StoredMessage[] {
    const rows = this.db
      .prepare(
        `SELECT ${MESSAGE_COLUMNS} FROM messages
         WHERE chat_id = ? AND thread_id IS NULL
         ORDER BY message_id ASC`
      )
      .all(chatId) as MessageRow[];
    return rows.map(toMessage);
  }

  /**
   * Set the thread of a message. A real thread is final; a message in the
   * general bucket may still be promoted to a real thread. Returns false when
   * nothing changed.
   */
  annotateThread(chatId: number, messageId: number, threadId: number, label: string | null = null): boolean {
    return wrapStorage('Thread annotation', () => {
      const result = this.db
        .prepare(
          `UPDATE messages SET thread_id = ?, thread_label = ?
           WHERE chat_id = ? AND message_id = ?
             AND (thread_id IS NULL OR (thread_id = ? AND ? != ?))`
        )
        .run(threadId, label, chatId, messageId, GENERAL_THREAD_ID, threadId, GENERAL_THREAD_ID);
      return result.changes > 0;
    });
  }

  annotateThreads(
    chatId: number,
    assignments: ReadonlyArray<{ messageId: number; threadId: number; label: string | null }>
  ): number {
    const apply = this.db.transaction(() => {
      let written = 0;
      for (const a of assignments) {
        if (this.annotateThread(chatId, a.messageId, a.threadId, a.label)) {
          written++;
        }
      }
      return written;
    });
    return wrapStorage('Thread annotation', () => apply());
  }

  /** Existing thread carrying a classifier label, matched case-insensitively. */
  findThreadByLabel(chatId: number, label: string): number | null {
    const row = this.db
      .prepare(
        `SELECT MIN(thread_id) as threadId FROM messages
         WHERE chat_id = ? AND thread_label = ? COLLATE NOCASE AND thread_id != ?`
      )
      .get(chatId, label, GENERAL_THREAD_ID) as { threadId: number | null };
    return row.threadId;
  }

  /** Drop thread annotations of a chat ahead of a reclassification pass. */
  clearThreads(chatId: number): number {
    return wrapStorage('Thread reset', () => {
      const result = this.db
        .prepare('UPDATE messages SET thread_id = NULL, thread_label = NULL WHERE chat_id = ?')
        .run(chatId);
      return result.changes;
    });
  }

  countByChat(chatId: number): number {
    const result = this.db
      .prepare('SELECT COUNT(*) as count FROM messages WHERE chat_id = ?')
      .get(chatId) as { count: number };
    return result.count;
  }

  maxMessageId(chatId: number): number | null {
    const result = this.db
      .prepare('SELECT MAX(message_id) as maxId FROM messages WHERE chat_id = ?')
      .get(chatId) as { maxId: number | null };
    return result.maxId;
  }
}
