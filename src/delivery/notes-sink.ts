import type { PlatformClient } from '../api/types.js';
import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';

/** Largest text a single platform message may carry. */
export const MAX_MESSAGE_LENGTH = 4096;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Split text into chunks of at most `limit` characters, breaking on line
 * boundaries. A line longer than `limit` is cut into pieces
 * without splitting a surrogate pair.
 */
export function chunkText(text: string, limit: number = MAX_MESSAGE_LENGTH): string[] {
  const chunks: string[] = [];
  let current = '';

  const flush = () => {
    if (current) {
      chunks.push(current);
      current = '';
    }
  };

  for (const line of text.split('\n')) {
    const pieces: string[] = [];
    for (let i = 0; i < line.length; ) {
      let end = Math.min(i + limit, line.length);
      // Keep surrogate pairs together
      if (end < line.length && end - 1 > i && isHighSurrogate(line.charCodeAt(end - 1))) {
        end--;
      }
      pieces.push(line.slice(i, end));
      i = end;
    }
    if (pieces.length === 0) {
      pieces.push('');
    }

    for (const piece of pieces) {
      const candidate = current ? `${current}\n${piece}` : piece;
      if (candidate.length <= limit) {
        current = candidate;
      } else {
        flush();
        current = piece;
      }
    }
  }
  flush();
  return chunks;
}

export interface DeliveryResult {
  sent: number;
  total: number;
  error: string | null;
}

/** Sends reports to the operator's own Saved Messages. */
export class NotesSink {
  constructor(
    private readonly client: PlatformClient,
    private readonly log: Logger,
    private readonly target: string = 'me'
  ) {}

  async deliver(markdown: string): Promise<DeliveryResult> {
    const chunks = chunkText(markdown.trim());
    let sent = 0;
    try {
      for (const chunk of chunks) {
        await this.client.sendText(this.target, chunk);
        sent++;
      }
    } catch (error) {
      const message = errorMessage(error);
      this.log.error({ target: this.target, sent, total: chunks.length, err: message }, 'report delivery failed');
      return { sent, total: chunks.length, error: message };
    }
    this.log.info({ target: this.target, chunks: sent }, 'report delivered');
    return { sent, total: chunks.length, error: null };
  }
}
