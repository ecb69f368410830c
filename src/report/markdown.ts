import { GENERAL_THREAD_ID } from '../storage/types.js';
import { localTime, toZonedIso } from '../utils/time.js';
import { escapeMarkdown, messageUrl } from './links.js';
import { excerptOf, rankSenders, type ChatDay, type SenderCount, type ThreadDay } from './stats.js';

const TOP_SENDERS = 10;
const CHAT_TOP_SENDERS = 5;

export const SUMMARY_UNAVAILABLE = '_Summary unavailable._';

export type ThreadSummary = { status: 'ok'; text: string } | { status: 'unavailable' };

export function summaryKey(chatId: number, threadId: number): string {
  return `${chatId}:${threadId}`;
}

export interface ReportDocument {
  date: string;
  timezone: string;
  /** Unix seconds, `[start, end)`. */
  start: number;
  end: number;
  /** Chat name for a single-chat report, null for all chats. */
  scope: string | null;
  chats: ChatDay[];
  summaries: ReadonlyMap<string, ThreadSummary>;
}

export function sanitizeFilename(name: string): string {
  const safe = name
    .replace(/[<>:"/\\|?*]/g, '-')
    .replace(/\s+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '')
    .toLowerCase();
  return safe || 'chat';
}

export function reportFilename(date: string, chat: { name: string; chatId: number } | null): string {
  return chat ? `${date}_${sanitizeFilename(chat.name)}_${chat.chatId}.md` : `${date}_all.md`;
}

function senderList(senders: readonly SenderCount[], limit: number): string {
  return senders
    .slice(0, limit)
    .map((s) => `${escapeMarkdown(s.name)} (${s.count})`)
    .join(', ');
}

function linked(text: string, url: string | null): string {
  return url ? `[${text}](${url})` : text;
}

function renderThread(lines: string[], chat: ChatDay, thread: ThreadDay, doc: ReportDocument): void {
  const count = thread.messages.length;
  const heading =
    thread.threadId === GENERAL_THREAD_ID ? 'General' : `Thread ${thread.threadId}: ${escapeMarkdown(thread.title)}`;
  lines.push(`### ${heading}`, '');
  lines.push(`_${count} message${count === 1 ? '' : 's'}, ${thread.participants} participant${thread.participants === 1 ? '' : 's'}_`, '');

  const summary = doc.summaries.get(summaryKey(chat.chatId, thread.threadId));
  if (summary) {
    lines.push(summary.status === 'ok' ? summary.text : SUMMARY_UNAVAILABLE, '');
  }

  if (thread.excerpts.length > 0) {
    for (const message of thread.excerpts) {
      const time = linked(localTime(message.timestamp, doc.timezone), messageUrl(chat.linkBase, message.messageId));
      lines.push(`- ${time} **${escapeMarkdown(message.senderName)}**: ${escapeMarkdown(excerptOf(message))}`);
    }
    lines.push('');
  }
}

function renderChat(lines: string[], chat: ChatDay, doc: ReportDocument): void {
  lines.push(`## ${escapeMarkdown(chat.name)} (${chat.chatId})`, '');
  if (chat.messageCount === 0) {
    lines.push('No messages.', '');
    return;
  }

  lines.push(`- Messages: ${chat.messageCount}`);
  lines.push(`- Active senders: ${chat.senders.length}`);
  lines.push(`- Top senders: ${senderList(chat.senders, CHAT_TOP_SENDERS)}`);
  if (chat.media.length > 0) {
    lines.push(`- Media: ${chat.media.map((m) => `${m.type} ${m.count}`).join(', ')}`);
  }
  lines.push('');

  for (const thread of chat.threads) {
    renderThread(lines, chat, thread, doc);
  }
}

/**
 * Render a day report. Output depends only on the document, so the same
 * stored data and summaries always give the same text.
 */
export function renderReport(doc: ReportDocument): string {
  const allMessages = doc.chats.flatMap((c) => c.threads.flatMap((t) => t.messages));
  const senders = rankSenders(allMessages);
  const threadCount = doc.chats.reduce(
    (sum, c) => sum + c.threads.filter((t) => t.threadId !== GENERAL_THREAD_ID).length,
    0
  );

  const lines: string[] = [
    `# Chat digest ${doc.date}${doc.scope ? `: ${escapeMarkdown(doc.scope)}` : ''}`,
    '',
    `Window: ${toZonedIso(doc.start, doc.timezone)} to ${toZonedIso(doc.end, doc.timezone)} (${doc.timezone})`,
    '',
    '## Overview',
    '',
    `- Chats: ${doc.chats.length}`,
    `- Messages: ${allMessages.length}`,
    `- Active senders: ${senders.length}`,
    `- Threads: ${threadCount}`,
    '',
  ];

  if (senders.length > 0) {
    lines.push('## Top senders', '');
    senders.slice(0, TOP_SENDERS).forEach((s, i) => {
      lines.push(`${i + 1}. ${escapeMarkdown(s.name)}: ${s.count}`);
    });
    lines.push('');
  }

  for (const chat of doc.chats) {
    renderChat(lines, chat, doc);
  }

  const media = doc.chats.flatMap((c) => c.mediaMessages.map((m) => ({ chat: c, message: m })));
  if (media.length > 0) {
    lines.push('## Media index', '');
    for (const { chat, message } of media) {
      const where = message.mediaRef ? escapeMarkdown(message.mediaRef) : 'not downloaded';
      const ref = linked(`#${message.messageId}`, messageUrl(chat.linkBase, message.messageId));
      lines.push(
        `- ${localTime(message.timestamp, doc.timezone)} ${escapeMarkdown(chat.name)} ${ref} ${message.mediaType} from ${escapeMarkdown(message.senderName)}: ${where}`
      );
    }
    lines.push('');
  }

  return lines.join('\n').trimEnd() + '\n';
}
