import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { AppContext } from '../cli/context.js';
import { AdvisorError, StorageError } from '../errors.js';
import type { KnownChat } from '../storage/known-chats.js';
import { GENERAL_THREAD_ID } from '../storage/types.js';
import { BASE_TIME, CHAT_A, CHAT_B, ScriptedAdvisor, newMessage, testConfig, testContext } from '../testing/fakes.js';
import { ReportGenerator, threadDigest } from './generator.js';
import { SUMMARY_UNAVAILABLE } from './markdown.js';

const AI = { summary_enabled: true, api_base: 'http://localhost:9', api_key: 'test-key' };

describe('ReportGenerator', () => {
  let dir: string;
  let ctx: AppContext;

  function setup(overrides: Record<string, unknown>, advisor = new ScriptedAdvisor()): KnownChat[] {
    ctx = testContext(testConfig({ report_dir: dir, ...overrides }), advisor);
    return ctx.config.chats.flatMap((chat) => (chat.chatId === null ? [] : [{ chat, chatId: chat.chatId }]));
  }

  function generator(): ReportGenerator {
    return new ReportGenerator({
      messages: ctx.messages,
      summaryCache: ctx.summaryCache,
      advisor: ctx.advisor,
      config: ctx.config,
      log: ctx.log,
    });
  }

  /** Thread 1 with three messages and a general bucket with three, all on 2024-03-10 UTC. */
  function seedThreads(): void {
    ctx.messages.upsertMessages([1, 2, 3, 10, 11, 12].map((id) => newMessage(CHAT_A, id)));
    ctx.messages.annotateThreads(CHAT_A, [
      ...[1, 2, 3].map((messageId) => ({ messageId, threadId: 1, label: null })),
      ...[10, 11, 12].map((messageId) => ({ messageId, threadId: GENERAL_THREAD_ID, label: null })),
    ]);
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'digest-report-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    ctx.db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('buckets messages by the local calendar day', async () => {
    for (const [timezone, endOfDay] of [
      ['America/New_York', 1705381200],
      ['Asia/Shanghai', 1705334400],
    ] as const) {
      const chats = setup({ timezone });
      ctx.messages.upsertMessages([
        newMessage(CHAT_A, 1, { timestamp: endOfDay - 1 }),
        newMessage(CHAT_A, 2, { timestamp: endOfDay + 1 }),
      ]);

      const first = await generator().generate({ chats, date: '2024-01-15' });
      const second = await generator().generate({ chats, date: '2024-01-16' });

      expect(first.messageCount).toBe(1);
      expect(first.markdown).toContain('- 23:59 **alice**: message 1');
      expect(second.messageCount).toBe(1);
      expect(second.markdown).toContain('- 00:00 **alice**: message 2');
      ctx.db.close();
    }
    ctx = testContext();
  });

  it('writes the report file for all chats', async () => {
    const chats = setup({});
    ctx.messages.upsertMessages([newMessage(CHAT_A, 1), newMessage(CHAT_B, 2)]);

    const result = await generator().generate({ chats, date: '2024-03-10' });

    expect(result.path).toBe(join(dir, '2024-03-10_all.md'));
    expect(readFileSync(result.path, 'utf-8')).toBe(result.markdown);
    expect(result.messageCount).toBe(2);
    expect(result.markdown).toContain('## Alpha (-1001)');
    expect(result.markdown).toContain('## Beta (-1002)');
  });

  it('limits a single-chat report to that chat', async () => {
    const chats = setup({});
    ctx.messages.upsertMessages([newMessage(CHAT_A, 1), newMessage(CHAT_B, 2)]);

    const result = await generator().generate({ chats, date: '2024-03-10', only: chats[1] });

    expect(result.path).toBe(join(dir, `2024-03-10_beta_${CHAT_B}.md`));
    expect(result.messageCount).toBe(1);
    expect(result.markdown).not.toContain('## Alpha');
  });

  it('still renders when a thread summary fails', async () => {
    const advisor = new ScriptedAdvisor({
      summarize: (req) => {
        if (req.threadId === 1) {
          throw new AdvisorError('Request timed out after 120000ms');
        }
        return 'Small talk about the weather.';
      },
    });
    const chats = setup({ ai: AI }, advisor);
    seedThreads();

    const result = await generator().generate({ chats, date: '2024-03-10' });

    expect(result.summaries).toEqual({ requested: 2, cached: 0, failed: 1 });
    expect(result.markdown.split('\n').filter((line) => line === SUMMARY_UNAVAILABLE)).toHaveLength(1);
    expect(result.markdown).toContain('Small talk about the weather.');
    expect(result.markdown).toContain('### General');
    expect(result.markdown).toContain('## Beta (-1002)');
  });

  it('reuses cached summaries until the thread changes', async () => {
    const advisor = new ScriptedAdvisor({ summarize: (req) => `Summary of ${req.threadId}` });
    const chats = setup({ ai: AI }, advisor);
    seedThreads();

    await generator().generate({ chats, date: '2024-03-10' });
    const cached = await generator().generate({ chats, date: '2024-03-10' });
    expect(cached.summaries).toEqual({ requested: 0, cached: 2, failed: 0 });
    expect(cached.markdown).toContain('Summary of 1');
    expect(advisor.summarizeCalls).toHaveLength(2);

    const refreshed = await generator().generate({ chats, date: '2024-03-10', refreshSummaries: true });
    expect(refreshed.summaries).toEqual({ requested: 2, cached: 0, failed: 0 });

    ctx.messages.upsertMessages([newMessage(CHAT_A, 4)]);
    ctx.messages.annotateThread(CHAT_A, 4, 1);
    const changed = await generator().generate({ chats, date: '2024-03-10' });
    expect(changed.summaries).toEqual({ requested: 1, cached: 1, failed: 0 });
  });

  it('does not cache failed summaries', async () => {
    let fail = true;
    const advisor = new ScriptedAdvisor({
      summarize: () => {
        if (fail) {
          throw new AdvisorError('AI API error 503');
        }
        return 'ok';
      },
    });
    const chats = setup({ ai: AI }, advisor);
    seedThreads();

    await generator().generate({ chats, date: '2024-03-10' });
    fail = false;
    const retry = await generator().generate({ chats, date: '2024-03-10' });

    expect(retry.summaries).toEqual({ requested: 2, cached: 0, failed: 0 });
  });

  it('summarizes long threads in batches and skips small ones', async () => {
    const advisor = new ScriptedAdvisor({ summarize: (req) => `part ${req.batch?.index ?? 0}` });
    const chats = setup({ ai: { ...AI, max_messages_per_batch: 2 } }, advisor);
    seedThreads();
    ctx.messages.upsertMessages([newMessage(CHAT_A, 20), newMessage(CHAT_A, 21)]);
    ctx.messages.annotateThreads(CHAT_A, [
      { messageId: 20, threadId: 20, label: 'Small' },
      { messageId: 21, threadId: 20, label: 'Small' },
    ]);

    const result = await generator().generate({ chats, date: '2024-03-10' });

    const thread1 = advisor.summarizeCalls.filter((c) => c.threadId === 1);
    expect(thread1.map((c) => [c.batch, c.messages.map((m) => m.id)])).toEqual([
      [{ index: 1, total: 2 }, [1, 2]],
      [{ index: 2, total: 2 }, [3]],
    ]);
    expect(advisor.summarizeCalls.some((c) => c.threadId === 20)).toBe(false);
    expect(result.markdown).toContain('part 1 | part 2');
  });

  it('fails the run when a summary cannot be stored', async () => {
    const chats = setup({ ai: AI }, new ScriptedAdvisor({ summarize: () => 'ok' }));
    seedThreads();
    vi.spyOn(ctx.summaryCache, 'put').mockImplementation(() => {
      throw new StorageError('Saving summary failed: disk I/O error');
    });

    await expect(generator().generate({ chats, date: '2024-03-10' })).rejects.toBeInstanceOf(StorageError);
  });

  it('merges categories across batches and links the messages', async () => {
    const advisor = new ScriptedAdvisor({
      summarize: (req) => {
        if (req.threadId !== 1) {
          return 'General chatter.';
        }
        return req.batch?.index === 1
          ? { overall: 'Launch plans.', categories: [{ name: 'Release', summary: 'Date set', messages: [1, 2] }] }
          : {
              overall: null,
              categories: [
                { name: 'Release', summary: 'Notes drafted', messages: [2, 3] },
                { name: 'Misc', summary: null, messages: [3] },
              ],
            };
      },
    });
    const chats = setup(
      {
        ai: { ...AI, max_messages_per_batch: 2 },
        chats: [{ chat_id: CHAT_A, name: 'Alpha', chat_link: 'https://t.me/alphachat' }],
      },
      advisor
    );
    seedThreads();

    const result = await generator().generate({ chats, date: '2024-03-10' });

    const link = (id: number) => `[#${id}](https://t.me/alphachat/${id})`;
    expect(result.markdown).toContain(
      [
        'Launch plans.',
        `- **Release**: Date set | Notes drafted (${link(1)}, ${link(2)}, ${link(3)})`,
        `- **Misc** (${link(3)})`,
      ].join('\n')
    );
    expect(result.markdown).toContain('- [00:01](https://t.me/alphachat/1) **alice**: message 1');
  });

  it('sends replies with the message they answer', async () => {
    const advisor = new ScriptedAdvisor({ summarize: () => 'ok' });
    const chats = setup({ ai: AI }, advisor);
    ctx.messages.upsertMessages([
      newMessage(CHAT_A, 1),
      newMessage(CHAT_A, 2, { replyToMessageId: 1 }),
      newMessage(CHAT_A, 3, { replyToMessageId: 99 }),
    ]);
    ctx.messages.annotateThreads(
      CHAT_A,
      [1, 2, 3].map((messageId) => ({ messageId, threadId: 1, label: null }))
    );

    await generator().generate({ chats, date: '2024-03-10' });

    expect(advisor.summarizeCalls).toHaveLength(1);
    expect(advisor.summarizeCalls[0].messages).toEqual([
      { id: 1, sender: 'alice', text: 'message 1', timestamp: BASE_TIME + 60, replyTo: null },
      {
        id: 2,
        sender: 'alice',
        text: 'message 2',
        timestamp: BASE_TIME + 120,
        replyTo: 1,
        repliedMessage: { id: 1, sender: 'alice', text: 'message 1', timestamp: BASE_TIME + 60 },
      },
    ]);
  });

  it('makes no summary calls when summaries are off', async () => {
    const advisor = new ScriptedAdvisor({ summarize: () => 'unused' });
    const chats = setup({}, advisor);
    seedThreads();

    const result = await generator().generate({ chats, date: '2024-03-10' });

    expect(advisor.summarizeCalls).toEqual([]);
    expect(result.markdown).not.toContain(SUMMARY_UNAVAILABLE);
  });
});

describe('threadDigest', () => {
  it('changes when text changes', () => {
    const base = [{ ...newMessage(CHAT_A, 1), threadId: 1, threadLabel: null }];
    const edited = [{ ...base[0], text: 'different' }];
    expect(threadDigest(base)).toBe(threadDigest([...base]));
    expect(threadDigest(base)).not.toBe(threadDigest(edited));
  });
});
