// Row shapes shared by the stores

export const GENERAL_THREAD_ID = -1;

export type MediaType = 'photo' | 'video' | 'voice' | 'video_note' | 'audio' | 'document' | 'sticker' | 'other';

export interface NewMessage {
  chatId: number;
  messageId: number;
  senderId: number | null;
  senderName: string;
  text: string;
  /** Unix seconds, UTC. */
  timestamp: number;
  replyToMessageId: number | null;
  mediaType: MediaType | null;
  mediaRef: string | null;
}

export interface StoredMessage extends NewMessage {
  threadId: number | null;
  threadLabel: string | null;
}

export interface MessageRow {
  chat_id: number;
  message_id: number;
  sender_id: number | null;
  sender_name: string;
  text: string;
  timestamp: number;
  reply_to_message_id: number | null;
  media_type: MediaType | null;
  media_ref: string | null;
  thread_id: number | null;
  thread_label: string | null;
}

export interface Checkpoint {
  chatId: number;
  lastMessageId: number | null;
  chatLink: string | null;
  title: string | null;
  updatedAt: string;
}
