// Marked ids of supergroups and channels carry this prefix
const CHANNEL_ID_OFFSET = 1_000_000_000_000;

/**
 * Base URL for links to single messages of a chat: the public username link
 * when one is configured, otherwise the private `t.me/c/<id>` form for
 * supergroups. Null when neither applies.
 */
export function chatLinkBase(chatLink: string | null, chatId: number): string | null {
  if (chatLink) {
    const match = /^(?:https?:\/\/)?(?:t\.me|telegram\.me)\/([A-Za-z][A-Za-z0-9_]{3,})\/?$/.exec(chatLink.trim());
    if (match) {
      return `https://t.me/${match[1]}`;
    }
  }
  if (chatId <= -CHANNEL_ID_OFFSET) {
    return `https://t.me/c/${-chatId - CHANNEL_ID_OFFSET}`;
  }
  return null;
}

export function messageUrl(base: string | null, messageId: number): string | null {
  return base === null ? null : `${base}/${messageId}`;
}

/** Backslash-escape characters that Markdown would read as formatting. */
export function escapeMarkdown(text: string): string {
  return text.replace(/[\\`*_[\]~]/g, '\\$&');
}
