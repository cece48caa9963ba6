/**
 * Shortwire — Hacker News Source
 *
 * Fetches top stories from the official HN Firebase API, plus the
 * first few top-level comments of each story for script context.
 */

import { z } from 'zod';
import { StorySource } from '../base';
import { buildStory, stripHtml } from '../normalizer';
import type { HttpConfig } from '../../lib/config';
import { errorMessage } from '../../lib/logger';
import type { SourceName, Story } from '../../types';

export const HN_API_BASE = 'https://hacker-news.firebaseio.com/v0';
export const HN_ITEM_URL = 'https://news.ycombinator.com/item?id=';

const TopStoriesSchema = z.array(z.number().int());

const HNItemSchema = z.object({
  id: z.number().int(),
  type: z.string().optional(),
  title: z.string().optional(),
  url: z.string().optional(),
  text: z.string().optional(),
  score: z.number().optional(),
  by: z.string().optional(),
  time: z.number().optional(),
  descendants: z.number().optional(),
  kids: z.array(z.number().int()).optional(),
  deleted: z.boolean().optional(),
  dead: z.boolean().optional(),
});
type HNItem = z.infer<typeof HNItemSchema>;

export interface HNComment {
  author: string;
  text: string;
}

export class HackerNewsSource extends StorySource {
  readonly name: SourceName = 'hackernews';

  private readonly maxItems: number;
  private readonly maxComments: number;

  constructor(http: HttpConfig, options: { maxItems?: number; maxComments?: number } = {}) {
    super(http);
    this.maxItems = options.maxItems ?? 30;
    this.maxComments = options.maxComments ?? 5;
  }

  async fetch(signal?: AbortSignal): Promise<Story[]> {
    let topIds: number[];
    try {
      const body = await this.getJson(`${HN_API_BASE}/topstories.json`, signal);
      topIds = TopStoriesSchema.parse(body).slice(0, this.maxItems);
    } catch (error) {
      this.logger.error('Failed to fetch top stories', { error: errorMessage(error) });
      return [];
    }

    const stories = await this.mapBounded(topIds, id => this.fetchStory(id, signal));
    return stories.filter((s): s is Story => s !== null);
  }

  private async fetchStory(id: number, signal?: AbortSignal): Promise<Story | null> {
    const item = await this.fetchItem(id, signal);
    if (!item || item.deleted || item.dead) return null;

    const comments = await this.fetchComments(item.kids ?? [], signal);

    return buildStory({
      title: item.title,
      url: item.url || `${HN_ITEM_URL}${item.id}`,
      source: this.name,
      score: item.score ?? 0,
      publishedAt: item.time,
      context: {
        hnId: item.id,
        by: item.by ?? null,
        descendants: item.descendants ?? 0,
        text: stripHtml(item.text),
        comments,
      },
    });
  }

  private async fetchComments(kids: number[], signal?: AbortSignal): Promise<HNComment[]> {
    const comments: HNComment[] = [];

    // Comments are fetched one at a time; the story-level pool already bounds fan-out
    for (const kid of kids.slice(0, this.maxComments)) {
      const item = await this.fetchItem(kid, signal);
      if (!item || item.deleted || item.dead) continue;

      const text = stripHtml(item.text).trim();
      if (text) {
        comments.push({ author: item.by ?? 'anon', text });
      }
    }

    return comments;
  }

  private async fetchItem(id: number, signal?: AbortSignal): Promise<HNItem | null> {
    try {
      const body = await this.getJson(`${HN_API_BASE}/item/${id}.json`, signal);
      if (body === null) return null;
      return HNItemSchema.parse(body);
    } catch (error) {
      this.logger.warn('Failed to fetch item', { id, error: errorMessage(error) });
      return null;
    }
  }
}
