import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import bigInt from 'big-integer';
import { Api, TelegramClient, errors, sessions, utils } from 'telegram';
import { LogLevel } from 'telegram/extensions/Logger.js';
import { PlatformError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { MediaType } from '../storage/types.js';
import type { FetchOptions, PlatformClient, PlatformMedia, PlatformMessage, ResolvedChat } from './types.js';

export interface TelegramClientOptions {
  apiId: number;
  apiHash: string;
  sessionPath: string;
  log: Logger;
}

/** Map a GramJS failure onto the platform error categories. */
export function toPlatformError(error: unknown): PlatformError {
  if (error instanceof PlatformError) {
    return error;
  }
  if (error instanceof errors.FloodWaitError) {
    return new PlatformError('rate_limited', error.message, { retryAfterMs: error.seconds * 1000, cause: error });
  }
  if (error instanceof errors.RPCError) {
    const code = error.code ?? 0;
    if (code === 420) {
      return new PlatformError('rate_limited', error.errorMessage, { cause: error });
    }
    if (code >= 500 || code < 0) {
      return new PlatformError('transient', error.errorMessage, { cause: error });
    }
    return new PlatformError('permanent', error.errorMessage, { cause: error });
  }
  return new PlatformError('transient', errorMessage(error), { cause: error });
}

function readSession(path: string): string {
  return existsSync(path) ? readFileSync(path, 'utf-8').trim() : '';
}

function displayName(sender: unknown, senderId: number | null): string {
  if (sender instanceof Api.User) {
    const fullName = [sender.firstName, sender.lastName].filter(Boolean).join(' ').trim();
    if (fullName) {
      return fullName;
    }
    if (sender.username) {
      return `@${sender.username}`;
    }
  }
  if (sender instanceof Api.Channel || sender instanceof Api.Chat) {
    return sender.title;
  }
  return senderId !== null ? `user_${senderId}` : 'unknown';
}

function mediaTypeOf(message: Api.Message): MediaType {
  if (message.videoNote) return 'video_note';
  if (message.voice) return 'voice';
  if (message.video || message.gif) return 'video';
  if (message.audio) return 'audio';
  if (message.sticker) return 'sticker';
  if (message.photo) return 'photo';
  if (message.document) return 'document';
  return 'other';
}

function mediaOf(message: Api.Message): PlatformMedia | null {
  if (!message.media) {
    return null;
  }
  const file = message.file;
  const size: unknown = file?.size;
  const name: unknown = file?.name;
  const ext: unknown = file?.ext;
  return {
    type: mediaTypeOf(message),
    sizeBytes: size === undefined || size === null ? null : Number(String(size)),
    fileName: typeof name === 'string' && name ? name : null,
    extension: typeof ext === 'string' && ext ? ext : null,
  };
}

function replyTarget(message: Api.Message): number | null {
  const header = message.replyTo;
  if (header instanceof Api.MessageReplyHeader && header.replyToMsgId) {
    return header.replyToMsgId;
  }
  return null;
}

export class TelegramPlatformClient implements PlatformClient {
  private readonly session: sessions.StringSession;
  private readonly client: TelegramClient;
  private readonly sessionPath: string;
  private readonly log: Logger;
  // Raw messages of the last fetched page, needed for media downloads
  private readonly lastPage = new Map<string, Api.Message>();

  constructor(options: TelegramClientOptions) {
    this.sessionPath = options.sessionPath;
    this.log = options.log;
    this.session = new sessions.StringSession(readSession(options.sessionPath));
    this.client = new TelegramClient(this.session, options.apiId, options.apiHash, {
      connectionRetries: 5,
    });
    this.client.setLogLevel(LogLevel.ERROR);
  }

  private async call<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toPlatformError(error);
    }
  }

  private saveSession(): void {
    const dir = dirname(this.sessionPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(this.sessionPath, this.session.save(), { mode: 0o600 });
  }

  /**
   * Interactive login. Returns false when the stored session was already
   * authorized.
   */
  async authorize(phone: string, ask: (question: string) => Promise<string>): Promise<boolean> {
    await this.client.connect();
    if (await this.client.checkAuthorization()) {
      return false;
    }

    await this.client.start({
      phoneNumber: async () => phone,
      phoneCode: async () => ask('Enter the code you received: '),
      password: async () => ask('Two-step verification password: '),
      onError: (err) => {
        this.log.error({ err: err.message }, 'authorization step failed');
      },
    });
    this.saveSession();
    return true;
  }

  async connect(): Promise<void> {
    await this.call(async () => {
      await this.client.connect();
      if (!(await this.client.checkAuthorization())) {
        throw new PlatformError('permanent', 'Session not authorized. Run init-session first.');
      }
      // Fills the entity cache so bare chat ids resolve
      await this.client.getDialogs({});
    });
  }

  async disconnect(): Promise<void> {
    this.lastPage.clear();
    await this.client.destroy();
  }

  async resolveChat(chatLink: string): Promise<ResolvedChat> {
    return this.call(async () => {
      const entity = await this.client.getEntity(chatLink);
      const chatId = Number(utils.getPeerId(entity));
      let title: string | null = null;
      if (entity instanceof Api.Channel || entity instanceof Api.Chat) {
        title = entity.title;
      } else if (entity instanceof Api.User) {
        title = displayName(entity, chatId);
      }
      this.log.info({ chatLink, chatId }, 'resolved chat link');
      return { chatId, title };
    });
  }

  async fetchMessages(chatId: number, options: FetchOptions): Promise<PlatformMessage[]> {
    return this.call(async () => {
      const raw = await this.client.getMessages(bigInt(chatId), {
        minId: options.afterId,
        limit: options.limit,
        reverse: true,
        offsetDate: options.since ?? undefined,
      });

      this.lastPage.clear();
      const page: PlatformMessage[] = [];
      for (const message of raw) {
        if (message.id <= options.afterId) {
          continue;
        }
        this.lastPage.set(`${chatId}:${message.id}`, message);

        const senderId = message.senderId ? Number(message.senderId.toString()) : null;
        let sender: unknown = message.sender;
        if (!sender && senderId !== null) {
          try {
            sender = await message.getSender();
          } catch (error) {
            this.log.debug({ chatId, messageId: message.id, err: errorMessage(error) }, 'sender lookup failed');
          }
        }

        page.push({
          id: message.id,
          chatId,
          senderId,
          senderName: displayName(sender, senderId),
          text: message.message ?? '',
          date: message.date,
          replyToMessageId: replyTarget(message),
          media: mediaOf(message),
          isService: Boolean(message.action),
        });
      }
      return page;
    });
  }

  async downloadMedia(message: PlatformMessage): Promise<Buffer> {
    const raw = this.lastPage.get(`${message.chatId}:${message.id}`);
    if (!raw) {
      throw new PlatformError('permanent', `Message ${message.id} is not part of the current page`);
    }
    return this.call(async () => {
      const data = await this.client.downloadMedia(raw, {});
      if (!Buffer.isBuffer(data)) {
        throw new PlatformError('transient', `No media returned for message ${message.id}`);
      }
      return data;
    });
  }

  async sendText(target: string, text: string): Promise<void> {
    await this.call(async () => {
      await this.client.sendMessage(target, { message: text, parseMode: 'md' });
    });
  }
}
