import type { PlatformClient } from '../api/types.js';
import { chatDisplayName } from '../config/config.js';
import { NotesSink, type DeliveryResult } from '../delivery/notes-sink.js';
import { ConfigError, errorMessage } from '../errors.js';
import { ReportGenerator, type ReportResult } from '../report/generator.js';
import { resolveKnownChats, type KnownChat } from '../storage/known-chats.js';
import { parseIsoDate } from '../utils/time.js';
import { closeContext, createTelegramClient, openContext, withRunLock, type AppContext, type GlobalOptions } from './context.js';

export interface ReportCommandOptions {
  date?: string;
  chat?: string;
  refreshSummaries?: boolean;
  /** commander sets this to false for `--no-send`. */
  send?: boolean;
}

export interface ReportOutcome {
  report: ReportResult;
  delivery: DeliveryResult | null;
}

/** Match a `--chat` value against configured names, ids and links. */
export function selectChat(known: readonly KnownChat[], selector: string): KnownChat {
  const wanted = selector.trim().toLowerCase();
  const match = known.find(
    ({ chat, chatId }) =>
      String(chatId) === wanted ||
      chat.chatLink?.toLowerCase() === wanted ||
      chatDisplayName(chat, chatId).toLowerCase() === wanted
  );
  if (!match) {
    throw new ConfigError(`No configured chat matches "${selector}"`);
  }
  return match;
}

export function validateDate(date: string | undefined): string | undefined {
  if (date === undefined) {
    return undefined;
  }
  try {
    parseIsoDate(date);
  } catch {
    throw new ConfigError(`Invalid --date "${date}": expected YYYY-MM-DD`);
  }
  return date;
}

export function shouldSend(ctx: AppContext, options: ReportCommandOptions): boolean {
  return ctx.config.sendReportToMe && options.send !== false;
}

/**
 * Render and write the report; deliver it through `client` when one is
 * given. A delivery failure is reported in the outcome, never thrown.
 */
export async function runReport(
  ctx: AppContext,
  client: PlatformClient | null,
  options: ReportCommandOptions = {}
): Promise<ReportOutcome> {
  const date = validateDate(options.date);
  const { known, unresolved } = resolveKnownChats(ctx.config.chats, ctx.checkpoints);
  for (const chat of unresolved) {
    ctx.log.warn({ chatLink: chat.chatLink }, 'chat link never resolved, run pull first; left out of the report');
  }

  const generator = new ReportGenerator({
    messages: ctx.messages,
    summaryCache: ctx.summaryCache,
    advisor: ctx.advisor,
    config: ctx.config,
    log: ctx.log,
  });
  const report = await generator.generate({
    chats: known,
    date,
    only: options.chat ? selectChat(known, options.chat) : undefined,
    refreshSummaries: options.refreshSummaries,
  });
  console.log(`Report for ${report.date}: ${report.messageCount} messages -> ${report.path}`);
  if (report.summaries.failed > 0) {
    console.log(`  ${report.summaries.failed} thread summary(ies) unavailable`);
  }

  let delivery: DeliveryResult | null = null;
  if (client) {
    delivery = await new NotesSink(client, ctx.log).deliver(report.markdown);
    console.log(
      delivery.error
        ? `  Delivery failed after ${delivery.sent}/${delivery.total} part(s): ${delivery.error}`
        : `  Sent to Saved Messages in ${delivery.sent} part(s)`
    );
  }
  return { report, delivery };
}

/** Connect only when the report is to be sent. */
export async function withOptionalClient<T>(
  ctx: AppContext,
  wanted: boolean,
  fn: (client: PlatformClient | null) => Promise<T>
): Promise<T> {
  if (!wanted) {
    return fn(null);
  }
  const client = createTelegramClient(ctx.config, ctx.log);
  try {
    await client.connect();
  } catch (error) {
    ctx.log.error({ err: errorMessage(error) }, 'cannot connect for delivery, writing the report only');
    await client.disconnect();
    return fn(null);
  }
  try {
    return await fn(client);
  } finally {
    await client.disconnect();
  }
}

export async function reportCommand(global: GlobalOptions, options: ReportCommandOptions): Promise<void> {
  let ctx: AppContext | null = null;
  try {
    ctx = openContext(global);
    const app = ctx;
    await withRunLock(app, () =>
      withOptionalClient(app, shouldSend(app, options), (client) => runReport(app, client, options))
    );
  } finally {
    closeContext(ctx);
  }
}
