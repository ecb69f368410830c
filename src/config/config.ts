import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from '../errors.js';

export const DEFAULT_CONFIG_PATH = 'config/config.json';
export const DEFAULT_MIN_THREAD_MESSAGES = 3;

export type ChatType = 'crypto' | 'tech' | 'news';

export interface ChatConfig {
  /** Marked chat id (supergroups start with -100), when known up front. */
  chatId: number | null;
  chatLink: string | null;
  name: string | null;
  chatType: ChatType | null;
  threadClassification: boolean;
  minThreadMessages: number;
}

export interface RetryConfig {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
}

export interface AiConfig {
  summaryEnabled: boolean;
  classifyEnabled: boolean;
  apiBase: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxMessagesPerBatch: number;
  maxCategories: number;
  style: string | null;
}

export interface AppConfig {
  apiId: number;
  apiHash: string;
  phone: string;
  sessionPath: string;
  dbPath: string;
  reportDir: string;
  mediaDir: string;
  lockPath: string;
  timezone: string;
  pullDays: number;
  pageSize: number;
  retry: RetryConfig;
  downloadMedia: boolean;
  maxMediaMb: number;
  sendReportToMe: boolean;
  chats: readonly ChatConfig[];
  ai: AiConfig;
}

function isValidTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const optionalLink = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim() ? value.trim() : null));

const chatSchema = z
  .object({
    chat_id: z.number().int().nullish(),
    chat_link: optionalLink,
    name: z.string().nullish(),
    chat_type: z
      .string()
      .nullish()
      .transform((value) => {
        const normalized = value?.trim().toLowerCase();
        return normalized === 'crypto' || normalized === 'tech' || normalized === 'news' ? normalized : null;
      }),
    enable_thread_classification: z.boolean().default(false),
    min_thread_messages: z.number().int().min(1).optional(),
  })
  .refine((chat) => Boolean(chat.chat_id) || Boolean(chat.chat_link), {
    message: 'Either chat_id or chat_link must be configured',
  });

const configSchema = z.object({
  api_id: z.coerce.number().int(),
  api_hash: z.string().min(1),
  phone: z.string().min(1),
  session_path: z.string().default('config/session.txt'),
  db_path: z.string().default('data/messages.db'),
  report_dir: z.string().default('reports'),
  media_dir: z.string().default('data/media'),
  lock_path: z.string().default('data/ingest.lock'),
  timezone: z.string().default('UTC').refine(isValidTimezone, { message: 'Unknown IANA timezone' }),
  pull_days: z.number().int().min(1).default(2),
  page_size: z.number().int().min(1).max(100).default(100),
  retry: z
    .object({
      attempts: z.number().int().min(1).default(4),
      base_delay_ms: z.number().int().min(0).default(1000),
      max_delay_ms: z.number().int().min(0).default(60_000),
      timeout_ms: z.number().int().min(1).default(60_000),
    })
    .default({}),
  download_media: z.boolean().default(true),
  max_media_mb: z.number().positive().default(10),
  send_report_to_me: z.boolean().default(true),
  min_thread_messages: z.number().int().min(1).default(DEFAULT_MIN_THREAD_MESSAGES),
  // Single-chat layout from older config files.
  chat_id: z.number().int().optional(),
  chat_link: optionalLink,
  chats: z.array(chatSchema).optional(),
  ai: z
    .object({
      summary_enabled: z.boolean().default(false),
      classify_enabled: z.boolean().default(false),
      api_base: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('grok-beta'),
      timeout_ms: z.number().int().min(1).default(120_000),
      max_messages_per_batch: z.number().int().min(1).default(200),
      max_categories: z.number().int().min(1).default(5),
      style: z.string().nullish(),
    })
    .default({}),
});

type RawConfig = z.infer<typeof configSchema>;

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function toChats(raw: RawConfig): ChatConfig[] {
  if (raw.chats) {
    return raw.chats.map((chat) => ({
      chatId: chat.chat_id ?? null,
      chatLink: chat.chat_link,
      name: chat.name ?? null,
      chatType: chat.chat_type,
      threadClassification: chat.enable_thread_classification,
      minThreadMessages: chat.min_thread_messages ?? raw.min_thread_messages,
    }));
  }

  if (raw.chat_id || raw.chat_link) {
    return [
      {
        chatId: raw.chat_id ?? null,
        chatLink: raw.chat_link,
        name: null,
        chatType: null,
        threadClassification: false,
        minThreadMessages: raw.min_thread_messages,
      },
    ];
  }

  return [];
}

/**
 * Validate a parsed config document and turn it into the frozen structure the
 * rest of the program receives.
 */
export function parseConfig(input: unknown): AppConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const raw = result.data;
  const chats = toChats(raw);
  if (chats.length === 0) {
    throw new ConfigError('No chats configured. Add at least one entry under "chats".');
  }

  if ((raw.ai.summary_enabled || raw.ai.classify_enabled) && (!raw.ai.api_base || !raw.ai.api_key)) {
    throw new ConfigError('AI features are enabled but ai.api_base or ai.api_key is missing');
  }

  return deepFreeze<AppConfig>({
    apiId: raw.api_id,
    apiHash: raw.api_hash,
    phone: raw.phone,
    sessionPath: raw.session_path,
    dbPath: raw.db_path,
    reportDir: raw.report_dir,
    mediaDir: raw.media_dir,
    lockPath: raw.lock_path,
    timezone: raw.timezone,
    pullDays: raw.pull_days,
    pageSize: raw.page_size,
    retry: {
      attempts: raw.retry.attempts,
      baseDelayMs: raw.retry.base_delay_ms,
      maxDelayMs: raw.retry.max_delay_ms,
      timeoutMs: raw.retry.timeout_ms,
    },
    downloadMedia: raw.download_media,
    maxMediaMb: raw.max_media_mb,
    sendReportToMe: raw.send_report_to_me,
    chats,
    ai: {
      summaryEnabled: raw.ai.summary_enabled,
      classifyEnabled: raw.ai.classify_enabled,
      apiBase: raw.ai.api_base.trim(),
      apiKey: raw.ai.api_key.trim(),
      model: raw.ai.model.trim(),
      timeoutMs: raw.ai.timeout_ms,
      maxMessagesPerBatch: raw.ai.max_messages_per_batch,
      maxCategories: raw.ai.max_categories,
      style: raw.ai.style?.trim() || null,
    },
  });
}

export function loadConfig(path: string = DEFAULT_CONFIG_PATH): AppConfig {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new ConfigError(`Config file not found at ${fullPath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Config file ${fullPath} is not valid JSON: ${error instanceof Error ? error.message : error}`);
  }
  return parseConfig(parsed);
}

export function chatDisplayName(chat: ChatConfig, chatId: number | null = chat.chatId): string {
  return chat.name || (chatId !== null ? `chat_${chatId}` : chat.chatLink || 'unnamed chat');
}
