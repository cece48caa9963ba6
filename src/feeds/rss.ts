/**
 * Shortwire — RSS/Atom parsing
 *
 * Sources download the feed themselves (so timeouts and aborts apply)
 * and hand the body to rss-parser here.
 */

import Parser from 'rss-parser';
import type { SourceName, Story } from '../types';
import { buildStory, positionScore, stripHtml } from './normalizer';

export interface FeedEntry {
  title?: string;
  link?: string;
  publishedAt?: string;
  author?: string;
  summary: string;
  categories: string[];
}

type ExtraItemFields = { author?: unknown };

const parser = new Parser<Record<string, unknown>, ExtraItemFields>();

/**
 * Parse an RSS 2.0 or Atom document into entries, in feed order.
 */
export async function parseFeed(xml: string): Promise<FeedEntry[]> {
  const feed = await parser.parseString(xml);

  return feed.items.map(item => ({
    title: item.title,
    link: item.link,
    publishedAt: item.isoDate ?? item.pubDate,
    author: item.creator ?? (typeof item.author === 'string' ? item.author : undefined),
    summary: (item.contentSnippet ?? stripHtml(item.content ?? item.summary)).trim(),
    categories: item.categories ?? [],
  }));
}

/**
 * Turn feed entries into stories with position-based scores.
 * Entries without a title or link are skipped but still count toward ranks.
 */
export function entriesToStories(
  entries: readonly FeedEntry[],
  source: SourceName,
  buildContext: (entry: FeedEntry) => Record<string, unknown>,
  now: Date = new Date()
): Story[] {
  const stories: Story[] = [];

  entries.forEach((entry, rank) => {
    const story = buildStory(
      {
        title: entry.title,
        url: entry.link,
        source,
        score: positionScore(rank, entries.length),
        publishedAt: entry.publishedAt,
        context: buildContext(entry),
      },
      now
    );
    if (story) stories.push(story);
  });

  return stories;
}
