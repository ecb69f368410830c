import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { testDb } from '../testing/fakes.js';
import { CheckpointStore } from './checkpoint-store.js';
import { resolveKnownChats } from './known-chats.js';
import type { ChatConfig } from '../config/config.js';

function chat(overrides: Partial<ChatConfig>): ChatConfig {
  return {
    chatId: null,
    chatLink: null,
    name: null,
    chatType: null,
    threadClassification: false,
    minThreadMessages: 3,
    ...overrides,
  };
}

describe('CheckpointStore', () => {
  let db: Database.Database;
  let store: CheckpointStore;

  beforeEach(() => {
    db = testDb();
    store = new CheckpointStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it('has no watermark for a new chat', () => {
    expect(store.getWatermark(-100)).toBeNull();
  });

  it('only moves the watermark forward', () => {
    expect(store.setWatermark(-100, 50)).toBe(true);
    expect(store.setWatermark(-100, 40)).toBe(false);
    expect(store.setWatermark(-100, 50)).toBe(false);
    expect(store.getWatermark(-100)).toBe(50);

    expect(store.setWatermark(-100, 51)).toBe(true);
    expect(store.getWatermark(-100)).toBe(51);
  });

  it('keeps the watermark when a chat link is remembered', () => {
    store.setWatermark(-100, 50);
    store.rememberChat(-100, 'https://t.me/alpha', 'Alpha');

    expect(store.getWatermark(-100)).toBe(50);
    expect(store.findChatByLink('https://t.me/alpha')).toBe(-100);
    expect(store.listCheckpoints()).toMatchObject([
      { chatId: -100, lastMessageId: 50, chatLink: 'https://t.me/alpha', title: 'Alpha' },
    ]);
  });

  it('moves a link to the chat it now resolves to', () => {
    store.rememberChat(-100, 'https://t.me/alpha', 'Old');
    store.rememberChat(-200, 'https://t.me/alpha', 'New');

    expect(store.findChatByLink('https://t.me/alpha')).toBe(-200);
    expect(store.listCheckpoints().map((c) => c.chatLink)).toEqual(['https://t.me/alpha', null]);
  });
});

describe('resolveKnownChats', () => {
  it('pairs chats with configured or remembered ids', () => {
    const db = testDb();
    const checkpoints = new CheckpointStore(db);
    checkpoints.rememberChat(-300, 'https://t.me/gamma', null);

    const byId = chat({ chatId: -100, name: 'Alpha' });
    const byLink = chat({ chatLink: 'https://t.me/gamma' });
    const unknown = chat({ chatLink: 'https://t.me/delta' });

    const { known, unresolved } = resolveKnownChats([byId, byLink, unknown], checkpoints);
    expect(known).toEqual([
      { chat: byId, chatId: -100 },
      { chat: byLink, chatId: -300 },
    ]);
    expect(unresolved).toEqual([unknown]);
    db.close();
  });
});
