import { z } from 'zod';
import type { AiConfig, ChatType } from '../config/config.js';
import { AdvisorError } from '../errors.js';
import type { Logger } from '../logger.js';

export interface AdvisorMessage {
  id: number;
  sender: string;
  text: string;
  /** Unix seconds. */
  timestamp: number;
  replyTo: number | null;
  /** The stored message `replyTo` points at. */
  repliedMessage?: { id: number; sender: string; text: string; timestamp: number };
}

export interface ChatContext {
  chatId: number;
  chatName: string;
  chatType: ChatType | null;
}

export interface ClassifyRequest extends ChatContext {
  messages: AdvisorMessage[];
}

export interface SummaryRequest extends ChatContext {
  date: string;
  timezone: string;
  threadId: number;
  threadLabel: string | null;
  messages: AdvisorMessage[];
  batch?: { index: number; total: number };
}

/**
 * Optional external judgement on grouping and summarizing messages. Nothing
 * it returns is needed for correctness; callers treat a rejection as "no
 * answer".
 */
export interface ThreadAdvisor {
  /** Topic label per message id; ids left out stay unlabelled. */
  classify(request: ClassifyRequest): Promise<Map<number, string>>;
  /** Structured summary, or null when summarizing is switched off. */
  summarize(request: SummaryRequest): Promise<SummaryReply | null>;
}

export class NullAdvisor implements ThreadAdvisor {
  async classify(): Promise<Map<number, string>> {
    return new Map();
  }

  async summarize(): Promise<SummaryReply | null> {
    return null;
  }
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }),
      })
    )
    .min(1),
});

const summarySchema = z.object({
  overall: z.string().nullish(),
  categories: z
    .array(
      z.object({
        name: z.string().nullish(),
        summary: z.string().nullish(),
        messages: z.array(z.number().int()).nullish(),
      })
    )
    .nullish(),
});

const labelSchema = z.object({
  labels: z.array(
    z.object({
      id: z.number().int(),
      label: z.string().nullish(),
    })
  ),
});

export type SummaryReply = z.infer<typeof summarySchema>;

function stripCodeFence(content: string): string {
  const match = /^```(?:json)?\s*([\s\S]*?)\s*```$/.exec(content.trim());
  return match ? match[1] : content;
}

export interface ChatCompletionsAdvisorOptions {
  config: AiConfig;
  log: Logger;
  fetchImpl?: typeof fetch;
}

/** Advisor backed by an OpenAI-compatible `/chat/completions` endpoint. */
export class ChatCompletionsAdvisor implements ThreadAdvisor {
  private readonly config: AiConfig;
  private readonly log: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ChatCompletionsAdvisorOptions) {
    this.config = options.config;
    this.log = options.log;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private async request<T>(system: string, user: string, schema: z.ZodType<T>): Promise<T> {
    const url = `${this.config.apiBase.replace(/\/+$/, '')}/chat/completions`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.config.model,
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: user },
          ],
          temperature: 0.2,
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new AdvisorError(`Request timed out after ${this.config.timeoutMs}ms`, { cause: error });
      }
      throw new AdvisorError(`Request failed: ${error instanceof Error ? error.message : error}`, { cause: error });
    }

    if (!response.ok) {
      const text = await response.text();
      throw new AdvisorError(`AI API error ${response.status}: ${text.slice(0, 200)}`);
    }

    const completion = completionSchema.safeParse(await response.json());
    if (!completion.success) {
      throw new AdvisorError('Unexpected completion response shape');
    }
    const content = completion.data.choices[0].message.content;
    if (!content) {
      throw new AdvisorError('No content returned from model');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(stripCodeFence(content));
    } catch {
      throw new AdvisorError(`Model returned non-JSON content: ${content.slice(0, 200)}`);
    }
    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new AdvisorError('Model reply does not match the expected JSON shape');
    }
    return result.data;
  }

  async classify(request: ClassifyRequest): Promise<Map<number, string>> {
    if (!this.config.classifyEnabled || request.messages.length === 0) {
      return new Map();
    }

    const system =
      'You group chat messages by topic. Return a JSON object {"labels": [{"id": number, "label": string | null}]} ' +
      'with one entry per message id. Use short topic labels, reuse the same label for messages on the same topic, ' +
      'and null for messages with no clear topic.';
    const user = 'Input JSON:\n' + JSON.stringify({
      chat_name: request.chatName,
      chat_type: request.chatType,
      messages: request.messages,
    });

    this.log.debug({ chatId: request.chatId, messages: request.messages.length }, 'requesting topic labels');
    const reply = await this.request(system, user, labelSchema);

    const known = new Set(request.messages.map((m) => m.id));
    const labels = new Map<number, string>();
    for (const entry of reply.labels) {
      const label = entry.label?.trim();
      if (label && known.has(entry.id)) {
        labels.set(entry.id, label);
      }
    }
    return labels;
  }

  async summarize(request: SummaryRequest): Promise<SummaryReply | null> {
    if (!this.config.summaryEnabled) {
      return null;
    }

    const system =
      'You summarize group chat messages. Return a JSON object with keys "overall" (string) and "categories" ' +
      '(list of {"name", "summary", "messages"}), where "messages" holds only message ids. Be concise' +
      (this.config.maxCategories ? `; use at most ${this.config.maxCategories} categories.` : '.');
    const payload: Record<string, unknown> = {
      chat_id: request.chatId,
      chat_name: request.chatName,
      chat_type: request.chatType,
      date: request.date,
      timezone: request.timezone,
      thread_id: request.threadId,
      thread_label: request.threadLabel,
      messages: request.messages,
    };
    if (request.batch) {
      payload.batch_info = `batch ${request.batch.index}/${request.batch.total}`;
    }
    if (this.config.style) {
      payload.style = this.config.style;
    }

    this.log.info(
      { chatId: request.chatId, threadId: request.threadId, messages: request.messages.length, model: this.config.model },
      'requesting thread summary'
    );
    return this.request(system, 'Input JSON:\n' + JSON.stringify(payload), summarySchema);
  }
}

export function createAdvisor(config: AiConfig, log: Logger): ThreadAdvisor {
  if (!config.summaryEnabled && !config.classifyEnabled) {
    return new NullAdvisor();
  }
  return new ChatCompletionsAdvisor({ config, log });
}
