import type { ChatConfig } from '../config/config.js';
import type { CheckpointStore } from './checkpoint-store.js';

export interface KnownChat {
  chat: ChatConfig;
  chatId: number;
}

export interface KnownChats {
  known: KnownChat[];
  /** Link-only entries that have never been resolved by an ingestion run. */
  unresolved: ChatConfig[];
}

/** Pair config entries with chat ids without contacting the platform. */
export function resolveKnownChats(chats: readonly ChatConfig[], checkpoints: CheckpointStore): KnownChats {
  const known: KnownChat[] = [];
  const unresolved: ChatConfig[] = [];
  for (const chat of chats) {
    const chatId = chat.chatId || (chat.chatLink ? checkpoints.findChatByLink(chat.chatLink) : null);
    if (chatId) {
      known.push({ chat, chatId });
    } else {
      unresolved.push(chat);
    }
  }
  return { known, unresolved };
}
