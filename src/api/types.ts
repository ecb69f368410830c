// Messaging platform contract used by ingestion and delivery

import type { MediaType } from '../storage/types.js';

export interface PlatformMedia {
  type: MediaType;
  /** Null when the platform does not report a size. */
  sizeBytes: number | null;
  fileName: string | null;
  /** Including the leading dot, e.g. `.jpg`. */
  extension: string | null;
}

export interface PlatformMessage {
  id: number;
  chatId: number;
  senderId: number | null;
  senderName: string;
  text: string;
  /** Unix seconds. */
  date: number;
  replyToMessageId: number | null;
  media: PlatformMedia | null;
  /** Joins, pins, title changes and other non-content events. */
  isService: boolean;
}

export interface FetchOptions {
  /** Only messages with an id strictly greater than this. */
  afterId: number;
  limit: number;
  /** Lower bound on the message date (Unix seconds) for a first backfill. */
  since?: number | null;
}

export interface ResolvedChat {
  chatId: number;
  title: string | null;
}

/**
 * Every method may reject with a PlatformError; other rejections are treated
 * as transient network failures.
 */
export interface PlatformClient {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  resolveChat(chatLink: string): Promise<ResolvedChat>;
  /** Oldest first, at most `limit` messages. */
  fetchMessages(chatId: number, options: FetchOptions): Promise<PlatformMessage[]>;
  downloadMedia(message: PlatformMessage): Promise<Buffer>;
  sendText(target: string, text: string): Promise<void>;
}
