import { createHash } from 'crypto';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { AdvisorMessage, SummaryReply, ThreadAdvisor } from '../api/advisor.js';
import { chatDisplayName, type AppConfig } from '../config/config.js';
import { StorageError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { KnownChat } from '../storage/known-chats.js';
import type { MessageStore } from '../storage/message-store.js';
import type { SummaryCache } from '../storage/summary-cache.js';
import type { StoredMessage } from '../storage/types.js';
import { todayIn, zonedDayRange } from '../utils/time.js';
import { chatLinkBase, messageUrl } from './links.js';
import { renderReport, reportFilename, summaryKey, type ThreadSummary } from './markdown.js';
import { summarizeChatDay, type ChatDay, type ThreadDay } from './stats.js';
import { formatSummary, mergeSummaries } from './summary.js';

export interface ReportOptions {
  /** Chats in configured order. */
  chats: readonly KnownChat[];
  /** `YYYY-MM-DD`; today in the configured timezone when omitted. */
  date?: string;
  /** Single-chat scope; the report covers every entry of `chats` when absent. */
  only?: KnownChat;
  refreshSummaries?: boolean;
}

export interface SummaryStats {
  requested: number;
  cached: number;
  failed: number;
}

export interface ReportResult {
  date: string;
  path: string;
  markdown: string;
  messageCount: number;
  summaries: SummaryStats;
}

export interface ReportGeneratorOptions {
  messages: MessageStore;
  summaryCache: SummaryCache;
  advisor: ThreadAdvisor;
  config: AppConfig;
  log: Logger;
  now?: () => Date;
}

/** Fingerprint of what a summary was computed from. */
export function threadDigest(messages: readonly StoredMessage[]): string {
  const hash = createHash('sha256');
  for (const m of messages) {
    hash.update(`${m.messageId}\u0000${m.senderName}\u0000${m.text}\n`);
  }
  return hash.digest('hex');
}

export class ReportGenerator {
  private readonly messages: MessageStore;
  private readonly summaryCache: SummaryCache;
  private readonly advisor: ThreadAdvisor;
  private readonly config: AppConfig;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: ReportGeneratorOptions) {
    this.messages = options.messages;
    this.summaryCache = options.summaryCache;
    this.advisor = options.advisor;
    this.config = options.config;
    this.log = options.log;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Messages as sent to the advisor. A reply carries the message it answers;
   * a reply whose target is not stored is left out.
   */
  private advisorMessages(chatId: number, thread: ThreadDay): AdvisorMessage[] {
    const targets = new Set<number>();
    for (const m of thread.messages) {
      if (m.replyToMessageId !== null) {
        targets.add(m.replyToMessageId);
      }
    }
    const stored = new Map(
      this.messages.getMessages(chatId, [...targets]).map((m): [number, StoredMessage] => [m.messageId, m])
    );

    const result: AdvisorMessage[] = [];
    let skipped = 0;
    for (const m of thread.messages) {
      const message: AdvisorMessage = {
        id: m.messageId,
        sender: m.senderName,
        text: m.text,
        timestamp: m.timestamp,
        replyTo: m.replyToMessageId,
      };
      if (m.replyToMessageId !== null) {
        const target = stored.get(m.replyToMessageId);
        if (!target) {
          skipped++;
          continue;
        }
        message.repliedMessage = {
          id: target.messageId,
          sender: target.senderName,
          text: target.text,
          timestamp: target.timestamp,
        };
      }
      result.push(message);
    }
    if (skipped > 0) {
      this.log.debug({ chatId, threadId: thread.threadId, skipped }, 'left out replies to messages that are not stored');
    }
    return result;
  }

  private async summarizeThread(known: KnownChat, thread: ThreadDay, date: string): Promise<string | null> {
    const messages = this.advisorMessages(known.chatId, thread);
    if (messages.length === 0) {
      return null;
    }

    const { maxMessagesPerBatch } = this.config.ai;
    const total = Math.ceil(messages.length / maxMessagesPerBatch);
    const replies: SummaryReply[] = [];
    for (let i = 0; i < total; i++) {
      const reply = await this.advisor.summarize({
        chatId: known.chatId,
        chatName: chatDisplayName(known.chat, known.chatId),
        chatType: known.chat.chatType,
        date,
        timezone: this.config.timezone,
        threadId: thread.threadId,
        threadLabel: thread.label,
        messages: messages.slice(i * maxMessagesPerBatch, (i + 1) * maxMessagesPerBatch),
        batch: total > 1 ? { index: i + 1, total } : undefined,
      });
      if (reply === null) {
        return null;
      }
      replies.push(reply);
    }

    const base = chatLinkBase(known.chat.chatLink, known.chatId);
    return formatSummary(mergeSummaries(replies), (id) => messageUrl(base, id));
  }

  private async collectSummaries(
    days: ReadonlyArray<{ known: KnownChat; day: ChatDay }>,
    date: string,
    refresh: boolean,
    stats: SummaryStats
  ): Promise<Map<string, ThreadSummary>> {
    const summaries = new Map<string, ThreadSummary>();
    if (!this.config.ai.summaryEnabled) {
      return summaries;
    }

    for (const { known, day } of days) {
      for (const thread of day.threads) {
        if (thread.messages.length < known.chat.minThreadMessages) {
          continue;
        }
        const key = { chatId: known.chatId, day: date, threadId: thread.threadId };
        const digest = threadDigest(thread.messages);

        if (!refresh) {
          const cached = this.summaryCache.get(key, digest);
          if (cached !== null) {
            stats.cached++;
            summaries.set(summaryKey(known.chatId, thread.threadId), { status: 'ok', text: cached });
            continue;
          }
        }

        stats.requested++;
        let text: string | null;
        try {
          text = await this.summarizeThread(known, thread, date);
        } catch (error) {
          if (error instanceof StorageError) {
            throw error;
          }
          stats.failed++;
          summaries.set(summaryKey(known.chatId, thread.threadId), { status: 'unavailable' });
          this.log.warn(
            { chatId: known.chatId, threadId: thread.threadId, err: errorMessage(error) },
            'thread summary unavailable'
          );
          continue;
        }
        if (text !== null) {
          this.summaryCache.put(key, digest, text);
          summaries.set(summaryKey(known.chatId, thread.threadId), { status: 'ok', text });
        }
      }
    }
    return summaries;
  }

  async generate(options: ReportOptions): Promise<ReportResult> {
    const timezone = this.config.timezone;
    const date = options.date ?? todayIn(timezone, this.now());
    const { start, end } = zonedDayRange(date, timezone);
    const scope = options.only ? [options.only] : options.chats;

    const days = scope.map((known) => {
      const messages = this.messages.queryRange([known.chatId], start, end);
      const name = chatDisplayName(known.chat, known.chatId);
      const linkBase = chatLinkBase(known.chat.chatLink, known.chatId);
      return { known, day: summarizeChatDay(known.chatId, name, messages, linkBase) };
    });

    const stats: SummaryStats = { requested: 0, cached: 0, failed: 0 };
    const summaries = await this.collectSummaries(days, date, options.refreshSummaries ?? false, stats);

    const markdown = renderReport({
      date,
      timezone,
      start,
      end,
      scope: options.only ? chatDisplayName(options.only.chat, options.only.chatId) : null,
      chats: days.map((d) => d.day),
      summaries,
    });

    const filename = reportFilename(
      date,
      options.only ? { name: chatDisplayName(options.only.chat, options.only.chatId), chatId: options.only.chatId } : null
    );
    await mkdir(this.config.reportDir, { recursive: true });
    const path = join(this.config.reportDir, filename);
    await writeFile(path, markdown, 'utf-8');

    const messageCount = days.reduce((sum, d) => sum + d.day.messageCount, 0);
    this.log.info({ date, timezone, path, messages: messageCount, ...stats }, 'report written');
    return { date, path, markdown, messageCount, summaries: stats };
  }
}
