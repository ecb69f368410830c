import type { AdvisorMessage, ThreadAdvisor } from '../api/advisor.js';
import { chatDisplayName } from '../config/config.js';
import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { KnownChat } from '../storage/known-chats.js';
import type { MessageStore } from '../storage/message-store.js';
import { GENERAL_THREAD_ID, type StoredMessage } from '../storage/types.js';
import { ReplyForest } from './reply-forest.js';

// Context lookups stop after this many reply hops
const MAX_CONTEXT_HOPS = 50;
const DEFAULT_ADVISOR_BATCH = 100;

export interface ThreadClassifierOptions {
  messages: MessageStore;
  advisor: ThreadAdvisor;
  log: Logger;
  advisorBatchSize?: number;
}

export interface ClassifyOptions {
  /** Clear the chat's existing annotations first. */
  reclassify?: boolean;
}

export interface ClassifyResult {
  chatId: number;
  /** Distinct threads messages were assigned to in this pass. */
  threads: number;
  threaded: number;
  general: number;
  labelled: number;
  advisorFailed: boolean;
}

interface Assignment {
  messageId: number;
  threadId: number;
  label: string | null;
}

function isRealThread(threadId: number | null): threadId is number {
  return threadId !== null && threadId !== GENERAL_THREAD_ID;
}

function toAdvisorMessage(message: StoredMessage): AdvisorMessage {
  return {
    id: message.messageId,
    sender: message.senderName,
    text: message.text,
    timestamp: message.timestamp,
    replyTo: message.replyToMessageId,
  };
}

export class ThreadClassifier {
  private readonly messages: MessageStore;
  private readonly advisor: ThreadAdvisor;
  private readonly log: Logger;
  private readonly advisorBatchSize: number;

  constructor(options: ThreadClassifierOptions) {
    this.messages = options.messages;
    this.advisor = options.advisor;
    this.log = options.log;
    this.advisorBatchSize = options.advisorBatchSize ?? DEFAULT_ADVISOR_BATCH;
  }

  /**
   * Grow `arena` with every stored message linked to it by replies, in both
   * directions, so late replies see the whole conversation they belong to.
   */
  private loadContext(chatId: number, arena: Map<number, StoredMessage>): void {
    let parents = new Set<number>();
    let children = new Set<number>();
    const expand = (message: StoredMessage) => {
      children.add(message.messageId);
      const target = message.replyToMessageId;
      if (target !== null && !arena.has(target)) {
        parents.add(target);
      }
    };
    arena.forEach(expand);

    for (let hop = 0; hop < MAX_CONTEXT_HOPS && (parents.size > 0 || children.size > 0); hop++) {
      const found = [
        ...this.messages.getMessages(chatId, [...parents]),
        ...this.messages.getReplies(chatId, [...children]),
      ];
      parents = new Set<number>();
      children = new Set<number>();
      for (const message of found) {
        if (!arena.has(message.messageId)) {
          arena.set(message.messageId, message);
          expand(message);
        }
      }
    }
  }

  private async labelGeneral(
    known: KnownChat,
    candidates: StoredMessage[]
  ): Promise<{ labels: Map<number, string>; failed: boolean }> {
    const labels = new Map<number, string>();
    let failed = false;
    for (let i = 0; i < candidates.length; i += this.advisorBatchSize) {
      const batch = candidates.slice(i, i + this.advisorBatchSize);
      try {
        const result = await this.advisor.classify({
          chatId: known.chatId,
          chatName: chatDisplayName(known.chat, known.chatId),
          chatType: known.chat.chatType,
          messages: batch.map(toAdvisorMessage),
        });
        for (const [messageId, label] of result) {
          labels.set(messageId, label);
        }
      } catch (error) {
        failed = true;
        this.log.warn(
          { chatId: known.chatId, batch: batch.length, err: errorMessage(error) },
          'topic classification failed, messages stay in the general bucket'
        );
      }
    }
    return { labels, failed };
  }

  async classifyChat(known: KnownChat, options: ClassifyOptions = {}): Promise<ClassifyResult> {
    const { chat, chatId } = known;
    const minSize = chat.minThreadMessages;
    const result: ClassifyResult = { chatId, threads: 0, threaded: 0, general: 0, labelled: 0, advisorFailed: false };

    if (options.reclassify) {
      const cleared = this.messages.clearThreads(chatId);
      this.log.info({ chatId, cleared }, 'cleared thread annotations');
    }

    const pending = this.messages.listUnthreaded(chatId);
    if (pending.length === 0) {
      return result;
    }

    const assignments: Assignment[] = [];

    if (!chat.threadClassification) {
      for (const message of pending) {
        assignments.push({ messageId: message.messageId, threadId: GENERAL_THREAD_ID, label: null });
      }
    } else {
      const pendingIds = new Set(pending.map((m) => m.messageId));
      const arena = new Map(pending.map((m): [number, StoredMessage] => [m.messageId, m]));
      this.loadContext(chatId, arena);

      const forest = new ReplyForest(arena.values());
      const general: StoredMessage[] = [];

      const components = forest.components();
      for (const [root, members] of components) {
        if (!members.some((id) => pendingIds.has(id))) {
          continue;
        }

        // A real thread in the component wins
        let existing: { threadId: number; label: string | null } | null = null;
        for (const id of members) {
          const message = arena.get(id);
          if (message && isRealThread(message.threadId) && (!existing || message.threadId < existing.threadId)) {
            existing = { threadId: message.threadId, label: message.threadLabel };
          }
        }
        // Pending messages plus general-bucket context that can be promoted
        const open = members.filter((id) => !isRealThread(arena.get(id)?.threadId ?? null));

        if (existing) {
          for (const id of open) {
            assignments.push({ messageId: id, threadId: existing.threadId, label: existing.label });
          }
        } else if (members.length >= minSize) {
          for (const id of open) {
            assignments.push({ messageId: id, threadId: root, label: null });
          }
        } else {
          for (const id of members) {
            const message = arena.get(id);
            if (message && pendingIds.has(id)) {
              general.push(message);
            }
          }
        }
      }

      // Only messages outside any reply chain are offered for topic labels
      const replyFree = general.filter(
        (m) => m.replyToMessageId === null && components.get(m.messageId)?.length === 1
      );
      const labelled =
        replyFree.length > 0
          ? await this.labelGeneral(known, replyFree)
          : { labels: new Map<number, string>(), failed: false };
      result.advisorFailed = labelled.failed;

      const groups = new Map<string, { label: string; ids: number[] }>();
      for (const [messageId, label] of labelled.labels) {
        const key = label.toLowerCase();
        const group = groups.get(key);
        if (group) {
          group.ids.push(messageId);
        } else {
          groups.set(key, { label, ids: [messageId] });
        }
      }

      const labelledIds = new Set<number>();
      for (const { label, ids } of groups.values()) {
        const existingThread = this.messages.findThreadByLabel(chatId, label);
        if (existingThread === null && ids.length < minSize) {
          continue;
        }
        const threadId = existingThread ?? Math.min(...ids);
        for (const id of ids) {
          assignments.push({ messageId: id, threadId, label });
          labelledIds.add(id);
        }
        result.labelled += ids.length;
      }

      for (const message of general) {
        if (!labelledIds.has(message.messageId)) {
          assignments.push({ messageId: message.messageId, threadId: GENERAL_THREAD_ID, label: null });
        }
      }
    }

    this.messages.annotateThreads(chatId, assignments);

    const threadIds = new Set<number>();
    for (const a of assignments) {
      if (a.threadId === GENERAL_THREAD_ID) {
        result.general++;
      } else {
        result.threaded++;
        threadIds.add(a.threadId);
      }
    }
    result.threads = threadIds.size;

    this.log.info(
      { chatId, threads: result.threads, threaded: result.threaded, general: result.general, labelled: result.labelled },
      'thread classification done'
    );
    return result;
  }
}
