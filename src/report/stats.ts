import { GENERAL_THREAD_ID, type MediaType, type StoredMessage } from '../storage/types.js';

const EXCERPTS_PER_THREAD = 3;
const EXCERPT_LENGTH = 160;
const TITLE_LENGTH = 60;

export interface SenderCount {
  name: string;
  count: number;
}

export interface MediaCount {
  type: MediaType;
  count: number;
}

export interface ThreadDay {
  /** GENERAL_THREAD_ID for the general bucket. */
  threadId: number;
  label: string | null;
  title: string;
  messages: StoredMessage[];
  participants: number;
  excerpts: StoredMessage[];
}

export interface ChatDay {
  chatId: number;
  name: string;
  messageCount: number;
  senders: SenderCount[];
  media: MediaCount[];
  /** Real threads by size desc then id, general bucket last. */
  threads: ThreadDay[];
  mediaMessages: StoredMessage[];
  /** Prefix of message URLs, null when the chat's messages cannot be linked. */
  linkBase: string | null;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length <= max ? text : `${chars.slice(0, max - 1).join('').trimEnd()}…`;
}

export function excerptOf(message: StoredMessage, max = EXCERPT_LENGTH): string {
  const text = collapseWhitespace(message.text);
  if (text) {
    return truncate(text, max);
  }
  return message.mediaType ? `[${message.mediaType}]` : '[empty]';
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function senderName(message: StoredMessage): string {
  return message.senderName || 'unknown';
}

/** Identity of a sender: the user id, or the display name when the id is unknown. */
export function senderKey(message: StoredMessage): string {
  return message.senderId !== null ? `id:${message.senderId}` : `name:${senderName(message)}`;
}

/** Senders by message count, ties broken by name. */
export function rankSenders(messages: readonly StoredMessage[]): SenderCount[] {
  const counts = new Map<string, SenderCount>();
  for (const message of messages) {
    const key = senderKey(message);
    const entry = counts.get(key);
    if (entry) {
      entry.count++;
    } else {
      counts.set(key, { name: senderName(message), count: 1 });
    }
  }
  return [...counts]
    .sort(([keyA, a], [keyB, b]) => b.count - a.count || byName(a.name, b.name) || byName(keyA, keyB))
    .map(([, sender]) => sender);
}

export function mediaDistribution(messages: readonly StoredMessage[]): MediaCount[] {
  const counts = new Map<MediaType, number>();
  for (const message of messages) {
    if (message.mediaType) {
      counts.set(message.mediaType, (counts.get(message.mediaType) ?? 0) + 1);
    }
  }
  return [...counts]
    .map(([type, count]) => ({ type, count }))
    .sort((a, b) => b.count - a.count || byName(a.type, b.type));
}

function threadOf(message: StoredMessage): number {
  return message.threadId === null ? GENERAL_THREAD_ID : message.threadId;
}

function threadTitle(threadId: number, label: string | null, messages: readonly StoredMessage[]): string {
  if (threadId === GENERAL_THREAD_ID) {
    return 'General';
  }
  if (label) {
    return label;
  }
  // The root may be from an earlier day; fall back to the first message seen
  const root = messages.find((m) => m.messageId === threadId) ?? messages[0];
  return truncate(collapseWhitespace(root.text), TITLE_LENGTH) || `Thread ${threadId}`;
}

export function groupThreads(messages: readonly StoredMessage[]): ThreadDay[] {
  const groups = new Map<number, StoredMessage[]>();
  for (const message of messages) {
    const threadId = threadOf(message);
    const members = groups.get(threadId);
    if (members) {
      members.push(message);
    } else {
      groups.set(threadId, [message]);
    }
  }

  const threads: ThreadDay[] = [];
  for (const [threadId, members] of groups) {
    const label = members.find((m) => m.threadLabel)?.threadLabel ?? null;
    threads.push({
      threadId,
      label,
      title: threadTitle(threadId, label, members),
      messages: members,
      participants: new Set(members.map(senderKey)).size,
      excerpts: members.filter((m) => collapseWhitespace(m.text)).slice(0, EXCERPTS_PER_THREAD),
    });
  }

  return threads.sort((a, b) => {
    if (a.threadId === GENERAL_THREAD_ID || b.threadId === GENERAL_THREAD_ID) {
      return a.threadId === GENERAL_THREAD_ID ? 1 : -1;
    }
    return b.messages.length - a.messages.length || a.threadId - b.threadId;
  });
}

/** Aggregate one chat's messages for a day; `messages` must be oldest first. */
export function summarizeChatDay(
  chatId: number,
  name: string,
  messages: readonly StoredMessage[],
  linkBase: string | null = null
): ChatDay {
  return {
    chatId,
    name,
    messageCount: messages.length,
    senders: rankSenders(messages),
    media: mediaDistribution(messages),
    threads: groupThreads(messages),
    mediaMessages: messages.filter((m) => m.mediaType !== null),
    linkBase,
  };
}
