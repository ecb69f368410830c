import type { PlatformClient } from '../api/types.js';
import { IngestionEngine, type IngestRunResult } from '../ingest/engine.js';
import { resolveKnownChats } from '../storage/known-chats.js';
import { ThreadClassifier, type ClassifyResult } from '../threads/classifier.js';
import { closeContext, createTelegramClient, openContext, withRunLock, type AppContext, type GlobalOptions } from './context.js';

export interface PullOptions {
  reclassify?: boolean;
}

export interface PullSummary {
  ingest: IngestRunResult;
  threads: ClassifyResult[];
}

/** Ingest every configured chat, then classify the new messages. */
export async function runPull(ctx: AppContext, client: PlatformClient, options: PullOptions = {}): Promise<PullSummary> {
  const engine = new IngestionEngine({
    client,
    messages: ctx.messages,
    checkpoints: ctx.checkpoints,
    config: ctx.config,
    log: ctx.log,
  });

  const ingest = await engine.ingestAll();
  for (const chat of ingest.chats) {
    if (chat.status === 'ok') {
      console.log(`  ${chat.chatName}: ${chat.inserted} new (${chat.fetched} fetched, ${chat.mediaDownloaded} media)`);
    } else {
      console.log(`  ${chat.chatName}: failed (${chat.error})`);
    }
  }

  const classifier = new ThreadClassifier({ messages: ctx.messages, advisor: ctx.advisor, log: ctx.log });
  const { known, unresolved } = resolveKnownChats(ctx.config.chats, ctx.checkpoints);
  for (const chat of unresolved) {
    ctx.log.warn({ chatLink: chat.chatLink }, 'chat link not resolved yet, skipping classification');
  }

  const threads: ClassifyResult[] = [];
  for (const chat of known) {
    threads.push(await classifier.classifyChat(chat, { reclassify: options.reclassify }));
  }

  console.log(`Stored ${ingest.inserted} new messages${ingest.failed ? `, ${ingest.failed} chat(s) failed` : ''}.`);
  return { ingest, threads };
}

export async function pullCommand(global: GlobalOptions, options: PullOptions): Promise<void> {
  let ctx: AppContext | null = null;
  try {
    ctx = openContext(global);
    const app = ctx;
    await withRunLock(app, async () => {
      const client = createTelegramClient(app.config, app.log);
      await client.connect();
      try {
        console.log(`Pulling ${app.config.chats.length} chat(s)...`);
        await runPull(app, client, options);
      } finally {
        await client.disconnect();
      }
    });
  } finally {
    closeContext(ctx);
  }
}
