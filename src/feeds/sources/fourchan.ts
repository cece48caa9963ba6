/**
 * Shortwire — 4chan /g/ Source
 *
 * Reads the board catalog, keeps keyword-matching threads, and pulls the
 * first replies of the busiest ones. The keyword filter and top-N cut run
 * on catalog data only; thread requests happen afterwards.
 */

import { z } from 'zod';
import { StorySource } from '../base';
import { buildStory, matchesKeywords, stripHtml, truncate } from '../normalizer';
import type { HttpConfig } from '../../lib/config';
import { errorMessage } from '../../lib/logger';
import type { SourceName, Story } from '../../types';

export const FOURCHAN_CATALOG_URL = 'https://a.4cdn.org/g/catalog.json';
export const fourchanThreadApiUrl = (no: number): string => `https://a.4cdn.org/g/thread/${no}.json`;
export const fourchanThreadUrl = (no: number): string => `https://boards.4chan.org/g/thread/${no}`;

const CatalogThreadSchema = z.object({
  no: z.number().int(),
  sub: z.string().optional(),
  com: z.string().optional(),
  time: z.number().optional(),
  replies: z.number().optional(),
});
type CatalogThread = z.infer<typeof CatalogThreadSchema>;

const CatalogSchema = z.array(
  z.object({
    threads: z.array(z.unknown()).default([]),
  })
);

const ThreadSchema = z.object({
  posts: z.array(z.object({ com: z.string().optional() }).passthrough()).default([]),
});

/**
 * Subject if present, else the comment cut to 100 characters.
 */
export function threadTitle(thread: Pick<CatalogThread, 'sub' | 'com'>): string {
  const subject = stripHtml(thread.sub).trim();
  if (subject) return subject;

  const comment = stripHtml(thread.com).trim();
  return comment ? truncate(comment, 100) : '(no subject)';
}

export class FourChanSource extends StorySource {
  readonly name: SourceName = '4chan';

  private readonly keywords: string[];
  private readonly maxThreads: number;
  private readonly maxReplies: number;

  constructor(
    http: HttpConfig,
    options: { keywords: string[]; maxThreads?: number; maxReplies?: number }
  ) {
    super(http);
    this.keywords = options.keywords;
    this.maxThreads = options.maxThreads ?? 20;
    this.maxReplies = options.maxReplies ?? 5;
  }

  async fetch(signal?: AbortSignal): Promise<Story[]> {
    if (this.keywords.length === 0) {
      this.logger.warn('No 4chan keywords configured; skipping source');
      return [];
    }

    let threads: CatalogThread[];
    try {
      const body = await this.getJson(FOURCHAN_CATALOG_URL, signal);
      threads = this.parseCatalog(body);
    } catch (error) {
      this.logger.error('Catalog fetch failed', { error: errorMessage(error) });
      return [];
    }

    const matching = threads
      .filter(thread =>
        matchesKeywords(`${stripHtml(thread.sub)} ${stripHtml(thread.com)}`, this.keywords)
      )
      .sort((a, b) => (b.replies ?? 0) - (a.replies ?? 0))
      .slice(0, this.maxThreads);

    this.logger.debug('Catalog filtered', { threads: threads.length, matching: matching.length });

    const stories = await this.mapBounded(matching, async thread => {
      const replies = await this.fetchReplies(thread.no, signal);
      return buildStory({
        title: threadTitle(thread),
        url: fourchanThreadUrl(thread.no),
        source: this.name,
        score: thread.replies ?? 0,
        publishedAt: thread.time,
        context: {
          threadNo: thread.no,
          subject: thread.sub ?? '',
          comment: stripHtml(thread.com),
          repliesCount: thread.replies ?? 0,
          comments: replies,
        },
      });
    });

    return stories.filter((s): s is Story => s !== null);
  }

  // Malformed threads are dropped one by one; the rest of the catalog is kept
  private parseCatalog(body: unknown): CatalogThread[] {
    const pages = CatalogSchema.parse(body);
    const threads: CatalogThread[] = [];

    for (const page of pages) {
      for (const raw of page.threads) {
        const parsed = CatalogThreadSchema.safeParse(raw);
        if (parsed.success) threads.push(parsed.data);
      }
    }

    return threads;
  }

  private async fetchReplies(threadNo: number, signal?: AbortSignal): Promise<string[]> {
    try {
      const body = await this.getJson(fourchanThreadApiUrl(threadNo), signal);
      const { posts } = ThreadSchema.parse(body);

      // posts[0] is the OP
      return posts
        .slice(1, this.maxReplies + 1)
        .map(post => stripHtml(post.com).trim())
        .filter(text => text.length > 0);
    } catch (error) {
      this.logger.warn('Thread fetch failed', { threadNo, error: errorMessage(error) });
      return [];
    }
  }
}
