import type { SummaryReply } from '../api/advisor.js';
import { escapeMarkdown } from './links.js';

const UNNAMED_CATEGORY = 'Other';

export interface SummaryCategory {
  name: string;
  summaries: string[];
  messageIds: number[];
}

export interface MergedSummary {
  overall: string[];
  categories: SummaryCategory[];
}

/**
 * Combine the replies for the batches of one thread. Categories with the same
 * name become one, keeping the order they first appeared in; message ids are
 * de-duplicated.
 */
export function mergeSummaries(replies: readonly SummaryReply[]): MergedSummary {
  const overall: string[] = [];
  const categories = new Map<string, SummaryCategory>();

  for (const reply of replies) {
    const text = reply.overall?.trim();
    if (text) {
      overall.push(text);
    }
    for (const category of reply.categories ?? []) {
      const name = category.name?.trim() || UNNAMED_CATEGORY;
      let merged = categories.get(name);
      if (!merged) {
        merged = { name, summaries: [], messageIds: [] };
        categories.set(name, merged);
      }
      const summary = category.summary?.trim().replace(/\s*\n\s*/g, ' ');
      if (summary) {
        merged.summaries.push(summary);
      }
      for (const id of category.messages ?? []) {
        if (!merged.messageIds.includes(id)) {
          merged.messageIds.push(id);
        }
      }
    }
  }

  return { overall, categories: [...categories.values()] };
}

/**
 * Render a merged summary as Markdown: the overview, then one bullet per
 * category with references to its messages, linked where `linkFor` knows a
 * URL.
 */
export function formatSummary(summary: MergedSummary, linkFor: (messageId: number) => string | null = () => null): string {
  const lines: string[] = [];
  if (summary.overall.length > 0) {
    lines.push(summary.overall.join(' | '));
  }
  for (const category of summary.categories) {
    const text = category.summaries.join(' | ');
    const refs = category.messageIds
      .map((id) => {
        const url = linkFor(id);
        return url ? `[#${id}](${url})` : `#${id}`;
      })
      .join(', ');
    lines.push(`- **${escapeMarkdown(category.name)}**${text ? `: ${text}` : ''}${refs ? ` (${refs})` : ''}`);
  }
  return lines.join('\n');
}
