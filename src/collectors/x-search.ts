import { z } from 'zod';
import type { CollectContext } from '../types/collectors';
import { type SocialItem, generateContentId, generateItemId } from '../types/items';
import { parseTimestamp } from '../utils/dates';
import { AbstractCollector, type CollectorInit, type ResultBatch } from './base';

export const XAI_KEY = 'XAI_API_KEY';

const XAI_RESPONSES_URL = 'https://api.x.ai/v1/responses';
const XAI_MODEL = 'grok-4-1-fast';
const MAX_HANDLES = 10;

const ContentPartSchema = z.object({
  type: z.string().optional(),
  text: z.string().optional()
});

const ResponsesSchema = z.object({
  output: z
    .array(
      z.object({
        type: z.string().optional(),
        content: z.union([z.string(), z.array(ContentPartSchema)]).optional()
      })
    )
    .default([])
});

const metric = z.coerce.number().nonnegative().catch(0);

const PostSchema = z.object({
  text: z.string().min(1),
  url: z.string().optional(),
  author_handle: z.string().default(''),
  date: z.string().nullish(),
  likes: metric.optional(),
  reposts: metric.optional(),
  replies: metric.optional(),
  quotes: metric.optional()
});

type Post = z.infer<typeof PostSchema>;

/**
 * Weighted interaction count; likes dominate
 */
export function socialEngagement(post: Pick<Post, 'likes' | 'reposts' | 'replies' | 'quotes'>): number | undefined {
  if (post.likes === undefined && post.reposts === undefined) {
    return undefined;
  }
  return (
    0.55 * (post.likes ?? 0) + 0.25 * (post.reposts ?? 0) + 0.15 * (post.replies ?? 0) + 0.05 * (post.quotes ?? 0)
  );
}

/**
 * Pull the first JSON array out of free text
 */
export function extractJsonArray(text: string): unknown[] {
  const start = text.indexOf('[');
  const end = text.lastIndexOf(']');
  if (start < 0 || end <= start) return [];
  try {
    const parsed: unknown = JSON.parse(text.slice(start, end + 1));
    return Array.isArray(parsed) ? parsed : [];
  } catch {
    return [];
  }
}

function outputTexts(payload: z.infer<typeof ResponsesSchema>): string[] {
  const texts: string[] = [];
  for (const entry of payload.output) {
    if (typeof entry.content === 'string') {
      texts.push(entry.content);
    } else if (entry.content) {
      for (const part of entry.content) {
        if (part.text) texts.push(part.text);
      }
    }
  }
  return texts;
}

function postsIn(payload: z.infer<typeof ResponsesSchema>): unknown[] {
  return outputTexts(payload).flatMap(extractJsonArray);
}

/**
 * Recent posts by the profile's thought leaders, via the xAI x_search tool
 */
export class XSearchCollector extends AbstractCollector {
  readonly type = 'social' as const;

  constructor(init: Partial<CollectorInit> = {}) {
    super({ name: 'x_search', ...init });
  }

  requiredCredentials(): ReadonlySet<string> {
    return new Set([XAI_KEY]);
  }

  protected async gather(context: CollectContext, batch: ResultBatch): Promise<void> {
    const leaders = [...context.profile.thoughtLeaders].sort((a, b) => a.priority - b.priority);
    const handles = [...new Set(leaders.map((l) => l.handle.replace(/^@/, '').toLowerCase()))]
      .filter(Boolean)
      .slice(0, MAX_HANDLES);

    if (handles.length === 0) {
      batch.warnings.push('No thought leader handles in profile');
      return;
    }

    const names = new Map(leaders.map((l): [string, string] => [l.handle.replace(/^@/, '').toLowerCase(), l.name]));
    const payload = await this.fetchJson(
      context,
      ResponsesSchema,
      {
        url: XAI_RESPONSES_URL,
        method: 'POST',
        headers: { Authorization: `Bearer ${this.credential(context)}`, 'Content-Type': 'application/json' },
        body: {
          model: XAI_MODEL,
          tools: [{ type: 'x_search' }],
          input: [{ role: 'user', content: this.buildPrompt(handles, context) }]
        }
      },
      // an answer without posts may be a transient model failure
      (data) => postsIn(data).length > 0
    );

    let rejected = 0;
    for (const raw of postsIn(payload)) {
      const parsed = PostSchema.safeParse(raw);
      if (!parsed.success) {
        rejected++;
        continue;
      }
      const item = this.toItem(parsed.data, names);
      if (!batch.add(item)) break;
      if (parsed.data.url) {
        batch.addSource({ name: item.sourceName, url: item.url });
      }
    }

    if (rejected > 0) {
      context.logger.debug('Skipped malformed posts', { collector: this.name, rejected });
    }
  }

  private buildPrompt(handles: string[], context: CollectContext): string {
    return [
      `Search X for posts from these accounts: ${handles.map((h) => `@${h}`).join(', ')}.`,
      `Only include posts from ${context.fromDate} to ${context.toDate}.`,
      `Return up to ${context.depth.maxItems} posts as a JSON array of objects with fields:`,
      'id, text, url, author_handle, date (YYYY-MM-DD), likes, reposts, replies, quotes.',
      'Prefer posts about industry trends and posts with high engagement.'
    ].join('\n');
  }

  private toItem(post: Post, names: Map<string, string>): SocialItem {
    const handle = post.author_handle.replace(/^@/, '').toLowerCase();
    const url = post.url ? this.sanitizeUrl(post.url) : '';
    const text = this.normalizeWhitespace(post.text);
    return {
      kind: 'social',
      id: url ? generateItemId(url) : generateContentId(this.name, handle, text),
      title: this.truncate(`${names.get(handle) ?? `@${handle}`}: ${text}`, 120),
      url: url || `https://x.com/${handle}`,
      sourceName: `X - @${handle}`,
      collector: this.name,
      publishedAt: parseTimestamp(post.date),
      snippet: text,
      engagement: socialEngagement(post),
      payload: {
        handle: handle || 'unknown',
        likes: post.likes ?? 0,
        reposts: post.reposts ?? 0,
        replies: post.replies ?? 0,
        quotes: post.quotes ?? 0
      }
    };
  }
}
