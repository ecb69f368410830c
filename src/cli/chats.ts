import { chatDisplayName, type ChatConfig } from '../config/config.js';
import { resolveKnownChats } from '../storage/known-chats.js';
import { closeContext, openContext, type AppContext, type GlobalOptions } from './context.js';

export interface ChatStatus {
  name: string;
  chatId: number | null;
  chatLink: string | null;
  watermark: number | null;
  stored: number;
  threads: boolean;
}

export function listChatStatus(ctx: AppContext): ChatStatus[] {
  const { known, unresolved } = resolveKnownChats(ctx.config.chats, ctx.checkpoints);
  const byConfig = new Map(known.map((k): [ChatConfig, number] => [k.chat, k.chatId]));

  return ctx.config.chats.map((chat) => {
    const chatId = byConfig.get(chat) ?? null;
    return {
      name: chatDisplayName(chat, chatId),
      chatId,
      chatLink: chat.chatLink,
      watermark: chatId === null ? null : ctx.checkpoints.getWatermark(chatId),
      stored: chatId === null ? 0 : ctx.messages.countByChat(chatId),
      threads: chat.threadClassification && !unresolved.includes(chat),
    };
  });
}

export async function chatsCommand(global: GlobalOptions): Promise<void> {
  let ctx: AppContext | null = null;
  try {
    ctx = openContext(global);
    console.log('Configured chats:');
    for (const status of listChatStatus(ctx)) {
      const id = status.chatId ?? 'unresolved';
      const watermark = status.watermark ?? 'none';
      console.log(
        `  - ${status.name} [${id}] stored ${status.stored}, watermark ${watermark}${status.threads ? ', threads on' : ''}`
      );
    }
  } finally {
    closeContext(ctx);
  }
}
