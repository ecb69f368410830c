import type Database from 'better-sqlite3';
import { createAdvisor, type ThreadAdvisor } from '../api/advisor.js';
import { TelegramPlatformClient } from '../api/telegram-client.js';
import { loadConfig, type AppConfig } from '../config/config.js';
import { createLogger, type Logger } from '../logger.js';
import { CheckpointStore } from '../storage/checkpoint-store.js';
import { openDatabase } from '../storage/database.js';
import { MessageStore } from '../storage/message-store.js';
import { SummaryCache } from '../storage/summary-cache.js';
import { acquireRunLock } from './lock.js';

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

/** Everything a command needs besides the platform connection. */
export interface AppContext {
  config: AppConfig;
  log: Logger;
  db: Database.Database;
  messages: MessageStore;
  checkpoints: CheckpointStore;
  summaryCache: SummaryCache;
  advisor: ThreadAdvisor;
}

export function createContext(config: AppConfig, db: Database.Database, log: Logger, advisor?: ThreadAdvisor): AppContext {
  return {
    config,
    log,
    db,
    messages: new MessageStore(db),
    checkpoints: new CheckpointStore(db, log),
    summaryCache: new SummaryCache(db),
    advisor: advisor ?? createAdvisor(config.ai, log),
  };
}

export function openContext(options: GlobalOptions): AppContext {
  const log = createLogger(options.verbose ? 'debug' : undefined);
  const config = loadConfig(options.config);
  const db = openDatabase(config.dbPath, log);
  return createContext(config, db, log);
}

export function closeContext(ctx: AppContext | null): void {
  ctx?.db.close();
}

export function createTelegramClient(config: AppConfig, log: Logger): TelegramPlatformClient {
  return new TelegramPlatformClient({
    apiId: config.apiId,
    apiHash: config.apiHash,
    sessionPath: config.sessionPath,
    log,
  });
}

/** Run `fn` while holding the run lock. */
export async function withRunLock<T>(ctx: AppContext, fn: () => Promise<T>): Promise<T> {
  const release = acquireRunLock(ctx.config.lockPath);
  try {
    return await fn();
  } finally {
    release();
  }
}
