import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PlatformError } from '../errors.js';
import { GENERAL_THREAD_ID } from '../storage/types.js';
import { CHAT_A, CHAT_B, FakePlatformClient, platformMessage, testConfig, testContext } from '../testing/fakes.js';
import { listChatStatus } from './chats.js';
import type { AppContext } from './context.js';
import { runPull } from './pull.js';

const CHAT_C = -1003;

describe('runPull', () => {
  let ctx: AppContext;
  let client: FakePlatformClient;
  let output: string[];

  beforeEach(() => {
    output = [];
    vi.spyOn(console, 'log').mockImplementation((line: string) => {
      output.push(line);
    });
    ctx = testContext(
      testConfig({
        chats: [
          { chat_id: CHAT_A, name: 'Alpha', enable_thread_classification: true },
          { chat_id: CHAT_B, name: 'Beta' },
          { chat_link: 'https://t.me/gamma' },
        ],
      })
    );
    client = new FakePlatformClient();

    // Inside the default lookback window
    const recent = Math.floor(Date.now() / 1000) - 600;
    client.addMessages(
      platformMessage(CHAT_A, 1, { date: recent + 1 }),
      platformMessage(CHAT_A, 2, { date: recent + 2, replyToMessageId: 1 }),
      platformMessage(CHAT_A, 3, { date: recent + 3, replyToMessageId: 2 }),
      platformMessage(CHAT_A, 4, { date: recent + 4 }),
      platformMessage(CHAT_C, 7, { date: recent + 5 }),
      platformMessage(CHAT_C, 8, { date: recent + 6 })
    );
    client.links.set('https://t.me/gamma', { chatId: CHAT_C, title: 'Gamma' });
    client.fetchFailures.set(CHAT_B, [new PlatformError('permanent', 'chat is private')]);
  });

  afterEach(() => {
    ctx.db.close();
    vi.restoreAllMocks();
  });

  it('ingests every chat and classifies what arrived', async () => {
    const { ingest, threads } = await runPull(ctx, client);

    expect(ingest.inserted).toBe(6);
    expect(ingest.failed).toBe(1);
    expect(output).toEqual([
      '  Alpha: 4 new (4 fetched, 0 media)',
      '  Beta: failed (chat is private)',
      '  chat_-1003: 2 new (2 fetched, 0 media)',
      'Stored 6 new messages, 1 chat(s) failed.',
    ]);

    expect(threads).toEqual([
      { chatId: CHAT_A, threads: 1, threaded: 3, general: 1, labelled: 0, advisorFailed: false },
      { chatId: CHAT_B, threads: 0, threaded: 0, general: 0, labelled: 0, advisorFailed: false },
      { chatId: CHAT_C, threads: 0, threaded: 0, general: 2, labelled: 0, advisorFailed: false },
    ]);
    expect(ctx.messages.getMessages(CHAT_A, [1, 2, 3, 4]).map((m) => m.threadId)).toEqual([1, 1, 1, GENERAL_THREAD_ID]);
  });

  it('picks up where the last run stopped', async () => {
    await runPull(ctx, client);
    const recent = Math.floor(Date.now() / 1000);
    client.addMessages(platformMessage(CHAT_A, 5, { date: recent, replyToMessageId: 3 }));

    const { ingest, threads } = await runPull(ctx, client);

    expect(ingest.inserted).toBe(1);
    expect(threads[0]).toMatchObject({ threads: 1, threaded: 1 });
    expect(ctx.messages.getMessages(CHAT_A, [5])[0].threadId).toBe(1);
    expect(client.fetchCalls.filter((c) => c.chatId === CHAT_A).at(-1)?.options.afterId).toBe(4);
  });

  it('lists watermarks and counts per chat', async () => {
    await runPull(ctx, client);

    expect(listChatStatus(ctx)).toEqual([
      { name: 'Alpha', chatId: CHAT_A, chatLink: null, watermark: 4, stored: 4, threads: true },
      { name: 'Beta', chatId: CHAT_B, chatLink: null, watermark: null, stored: 0, threads: false },
      { name: 'chat_-1003', chatId: CHAT_C, chatLink: 'https://t.me/gamma', watermark: 8, stored: 2, threads: false },
    ]);
  });
});
