import { mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { PlatformClient, PlatformMessage } from '../api/types.js';
import { chatDisplayName, type AppConfig, type ChatConfig } from '../config/config.js';
import { PlatformError, StorageError, errorMessage, type PlatformErrorKind } from '../errors.js';
import type { Logger } from '../logger.js';
import type { CheckpointStore } from '../storage/checkpoint-store.js';
import type { MessageStore } from '../storage/message-store.js';
import type { NewMessage } from '../storage/types.js';
import { mediaPath, mediaPolicyFor, shouldDownloadMedia, type MediaPolicy } from './media-policy.js';
import { asPlatformError, withRetry, withTimeout } from './retry.js';

export type ChatIngestStatus = 'ok' | 'failed';

export interface ChatIngestResult {
  chatName: string;
  chatId: number | null;
  status: ChatIngestStatus;
  pages: number;
  fetched: number;
  inserted: number;
  skippedByTime: number;
  mediaDownloaded: number;
  mediaFailed: number;
  watermarkBefore: number | null;
  watermarkAfter: number | null;
  error: string | null;
  errorKind: PlatformErrorKind | null;
}

export interface IngestRunResult {
  chats: ChatIngestResult[];
  inserted: number;
  failed: number;
}

export interface IngestionEngineOptions {
  client: PlatformClient;
  messages: MessageStore;
  checkpoints: CheckpointStore;
  config: AppConfig;
  log: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  /** Persists a downloaded payload under `relativePath`; defaults to `config.mediaDir` on disk. */
  writeMedia?: (relativePath: string, data: Buffer) => Promise<void>;
}

export class IngestionEngine {
  private readonly client: PlatformClient;
  private readonly messages: MessageStore;
  private readonly checkpoints: CheckpointStore;
  private readonly config: AppConfig;
  private readonly log: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly writeMedia: (relativePath: string, data: Buffer) => Promise<void>;
  private readonly mediaPolicy: MediaPolicy;

  constructor(options: IngestionEngineOptions) {
    this.client = options.client;
    this.messages = options.messages;
    this.checkpoints = options.checkpoints;
    this.config = options.config;
    this.log = options.log;
    this.sleep = options.sleep;
    this.now = options.now ?? (() => new Date());
    this.mediaPolicy = mediaPolicyFor(options.config.downloadMedia, options.config.maxMediaMb);
    this.writeMedia =
      options.writeMedia ??
      (async (relativePath, data) => {
        const target = join(this.config.mediaDir, relativePath);
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, data);
      });
  }

  private platformCall<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const { attempts, baseDelayMs, maxDelayMs, timeoutMs } = this.config.retry;
    return withRetry(() => withTimeout(fn(), timeoutMs, label), {
      attempts,
      baseDelayMs,
      maxDelayMs,
      sleep: this.sleep,
      onRetry: (error, attempt, delayMs) => {
        this.log.warn({ label, attempt, delayMs, kind: error.kind, err: error.message }, 'platform call failed, retrying');
      },
    });
  }

  /**
   * Chat id for a config entry: the configured id, a link resolved on an
   * earlier run, or a fresh lookup on the platform.
   */
  async resolveChatId(chat: ChatConfig): Promise<number> {
    if (chat.chatId) {
      if (chat.chatLink) {
        this.checkpoints.rememberChat(chat.chatId, chat.chatLink, chat.name);
      }
      return chat.chatId;
    }
    if (!chat.chatLink) {
      throw new PlatformError('permanent', 'Chat has neither chat_id nor chat_link');
    }

    const cached = this.checkpoints.findChatByLink(chat.chatLink);
    if (cached !== null) {
      return cached;
    }

    const link = chat.chatLink;
    const resolved = await this.platformCall(`resolve ${link}`, () => this.client.resolveChat(link));
    this.checkpoints.rememberChat(resolved.chatId, link, chat.name ?? resolved.title);
    return resolved.chatId;
  }

  private normalize(message: PlatformMessage, chatId: number): NewMessage {
    return {
      chatId,
      messageId: message.id,
      senderId: message.senderId,
      senderName: message.senderName,
      text: message.text,
      timestamp: message.date,
      replyToMessageId: message.replyToMessageId,
      mediaType: message.media?.type ?? null,
      mediaRef: null,
    };
  }

  private async fetchMedia(message: PlatformMessage): Promise<string | null> {
    const relativePath = mediaPath(message);
    try {
      const data = await withTimeout(
        this.client.downloadMedia(message),
        this.config.retry.timeoutMs,
        `download media ${message.id}`
      );
      await this.writeMedia(relativePath, data);
      return relativePath;
    } catch (error) {
      this.log.warn({ chatId: message.chatId, messageId: message.id, err: errorMessage(error) }, 'media download failed');
      return null;
    }
  }

  async ingestChat(chat: ChatConfig): Promise<ChatIngestResult> {
    const result: ChatIngestResult = {
      chatName: chatDisplayName(chat),
      chatId: chat.chatId,
      status: 'ok',
      pages: 0,
      fetched: 0,
      inserted: 0,
      skippedByTime: 0,
      mediaDownloaded: 0,
      mediaFailed: 0,
      watermarkBefore: null,
      watermarkAfter: null,
      error: null,
      errorKind: null,
    };

    try {
      const chatId = await this.resolveChatId(chat);
      result.chatId = chatId;
      result.chatName = chatDisplayName(chat, chatId);

      const watermark = this.checkpoints.getWatermark(chatId);
      result.watermarkBefore = watermark;
      result.watermarkAfter = watermark;

      // Without a watermark only the lookback window is pulled
      const since =
        watermark === null ? Math.floor(this.now().getTime() / 1000) - this.config.pullDays * 24 * 60 * 60 : null;
      let cursor = watermark ?? 0;

      this.log.info({ chatId, chat: result.chatName, watermark, since }, 'ingesting chat');

      for (;;) {
        const afterId = cursor;
        const page = await this.platformCall(`fetch ${chatId} after ${afterId}`, () =>
          this.client.fetchMessages(chatId, { afterId, limit: this.config.pageSize, since })
        );
        if (page.length === 0) {
          break;
        }
        result.pages++;
        result.fetched += page.length;

        const rows: NewMessage[] = [];
        for (const message of page) {
          if (message.id <= afterId || message.isService) {
            continue;
          }
          if (since !== null && message.date < since) {
            result.skippedByTime++;
            continue;
          }
          const row = this.normalize(message, chatId);
          if (shouldDownloadMedia(message.media, this.mediaPolicy)) {
            row.mediaRef = await this.fetchMedia(message);
            if (row.mediaRef) {
              result.mediaDownloaded++;
            } else {
              result.mediaFailed++;
            }
          }
          rows.push(row);
        }

        // Messages first, watermark second: a crash in between only causes a
        // re-fetch that the primary key absorbs.
        result.inserted += this.messages.upsertMessages(rows);
        if (rows.length > 0) {
          const highest = Math.max(...rows.map((r) => r.messageId));
          if (this.checkpoints.setWatermark(chatId, highest)) {
            result.watermarkAfter = highest;
          }
        }

        const pageMax = Math.max(...page.map((m) => m.id));
        if (pageMax <= cursor) {
          this.log.warn({ chatId, cursor, pageMax }, 'platform returned no newer messages, stopping');
          break;
        }
        cursor = pageMax;

        if (page.length < this.config.pageSize) {
          break;
        }
      }

      this.log.info(
        {
          chatId,
          chat: result.chatName,
          fetched: result.fetched,
          inserted: result.inserted,
          skippedByTime: result.skippedByTime,
          media: result.mediaDownloaded,
          watermark: `${result.watermarkBefore} -> ${result.watermarkAfter}`,
        },
        'chat ingested'
      );
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      const failure = asPlatformError(error);
      result.status = 'failed';
      result.error = failure.message;
      result.errorKind = failure.kind;
      this.log.error(
        { chatId: result.chatId, chat: result.chatName, kind: failure.kind, err: failure.message },
        'chat ingestion aborted'
      );
    }

    return result;
  }

  /** Ingest every configured chat in order. Only storage failures end the run early. */
  async ingestAll(): Promise<IngestRunResult> {
    const chats: ChatIngestResult[] = [];
    for (const chat of this.config.chats) {
      chats.push(await this.ingestChat(chat));
    }
    return {
      chats,
      inserted: chats.reduce((sum, c) => sum + c.inserted, 0),
      failed: chats.filter((c) => c.status === 'failed').length,
    };
  }
}
