import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError } from '../errors.js';
import { resolveKnownChats } from '../storage/known-chats.js';
import { CHAT_A, CHAT_B, FakePlatformClient, newMessage, testConfig, testContext } from '../testing/fakes.js';
import type { AppContext } from './context.js';
import { runReport, selectChat, shouldSend, validateDate } from './report.js';

describe('report command', () => {
  let dir: string;
  let ctx: AppContext;
  let output: string[];

  function setup(overrides: Record<string, unknown> = {}): void {
    ctx = testContext(testConfig({ report_dir: dir, ...overrides }));
    ctx.messages.upsertMessages([newMessage(CHAT_A, 1), newMessage(CHAT_B, 2)]);
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'digest-cli-'));
    output = [];
    vi.spyOn(console, 'log').mockImplementation((line: string) => {
      output.push(line);
    });
  });

  afterEach(() => {
    ctx.db.close();
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('matches --chat by id, name or link', () => {
    setup({
      chats: [
        { chat_id: CHAT_A, name: 'Alpha' },
        { chat_id: CHAT_B, chat_link: 'https://t.me/beta' },
      ],
    });
    const { known } = resolveKnownChats(ctx.config.chats, ctx.checkpoints);

    expect(selectChat(known, '-1001').chatId).toBe(CHAT_A);
    expect(selectChat(known, ' ALPHA ').chatId).toBe(CHAT_A);
    expect(selectChat(known, 'https://t.me/Beta').chatId).toBe(CHAT_B);
    expect(selectChat(known, 'chat_-1002').chatId).toBe(CHAT_B);
    expect(() => selectChat(known, 'gamma')).toThrow(ConfigError);
  });

  it('rejects malformed dates', () => {
    setup();
    expect(validateDate(undefined)).toBeUndefined();
    expect(validateDate('2024-03-10')).toBe('2024-03-10');
    expect(() => validateDate('yesterday')).toThrow('Invalid --date "yesterday": expected YYYY-MM-DD');
  });

  it('sends only when configured and not turned off', () => {
    setup({ send_report_to_me: true });
    expect(shouldSend(ctx, {})).toBe(true);
    expect(shouldSend(ctx, { send: false })).toBe(false);
    ctx.db.close();

    setup();
    expect(shouldSend(ctx, { send: true })).toBe(false);
  });

  it('writes the report and delivers it to Saved Messages', async () => {
    setup();
    const client = new FakePlatformClient();

    const { report, delivery } = await runReport(ctx, client, { date: '2024-03-10' });

    expect(existsSync(report.path)).toBe(true);
    expect(delivery).toEqual({ sent: 1, total: 1, error: null });
    expect(client.sent).toEqual([{ target: 'me', text: report.markdown }]);
    expect(output).toEqual([
      `Report for 2024-03-10: 2 messages -> ${join(dir, '2024-03-10_all.md')}`,
      '  Sent to Saved Messages in 1 part(s)',
    ]);
  });

  it('keeps the written report when delivery fails', async () => {
    setup();
    const client = new FakePlatformClient();
    client.failSendAfter = 0;

    const { report, delivery } = await runReport(ctx, client, { date: '2024-03-10' });

    expect(existsSync(report.path)).toBe(true);
    expect(delivery).toEqual({ sent: 0, total: 1, error: 'connection reset' });
    expect(output[1]).toBe('  Delivery failed after 0/1 part(s): connection reset');
  });

  it('leaves out chats whose link was never resolved', async () => {
    setup({
      chats: [
        { chat_id: CHAT_A, name: 'Alpha' },
        { chat_link: 'https://t.me/unseen', name: 'Unseen' },
      ],
    });

    const { report, delivery } = await runReport(ctx, null, { date: '2024-03-10' });

    expect(delivery).toBeNull();
    expect(report.messageCount).toBe(1);
    expect(report.markdown).toContain('## Alpha (-1001)');
    expect(report.markdown).not.toContain('Unseen');
  });
});
