import type Database from 'better-sqlite3';
import { StorageError } from '../errors.js';
import { nowIso } from '../utils/time.js';

export interface SummaryKey {
  chatId: number;
  day: string;
  threadId: number;
}

/**
 * Thread summaries from earlier report runs, keyed by a digest of the thread
 * content so an unchanged thread is not summarized twice.
 */
export class SummaryCache {
  constructor(private readonly db: Database.Database) {}

  get(key: SummaryKey, digest: string): string | null {
    const row = this.db
      .prepare(
        `SELECT summary FROM thread_summaries
         WHERE chat_id = ? AND day = ? AND thread_id = ? AND digest = ?`
      )
      .get(key.chatId, key.day, key.threadId, digest) as { summary: string } | undefined;
    return row?.summary ?? null;
  }

  put(key: SummaryKey, digest: string, summary: string): void {
    try {
      this.db
        .prepare(
          `INSERT INTO thread_summaries (chat_id, day, thread_id, digest, summary, created_at)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT(chat_id, day, thread_id) DO UPDATE SET
             digest = excluded.digest,
             summary = excluded.summary,
             created_at = excluded.created_at`
        )
        .run(key.chatId, key.day, key.threadId, digest, summary, nowIso());
    } catch (error) {
      throw new StorageError(
        `Saving summary for chat ${key.chatId} thread ${key.threadId} failed: ${error instanceof Error ? error.message : error}`,
        { cause: error }
      );
    }
  }
}
