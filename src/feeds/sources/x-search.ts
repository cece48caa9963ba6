/**
 * Shortwire — X (Twitter) Search Source
 *
 * One Nitter search-RSS request per configured keyword. A failing keyword
 * is skipped; the others still contribute.
 */

import { StorySource } from '../base';
import { entriesToStories, parseFeed, type FeedEntry } from '../rss';
import { truncate } from '../normalizer';
import type { HttpConfig } from '../../lib/config';
import { errorMessage } from '../../lib/logger';
import type { SourceName, Story } from '../../types';

export const nitterSearchUrl = (baseUrl: string, keyword: string): string =>
  `${baseUrl}/search/rss?f=tweets&q=${encodeURIComponent(keyword).replace(/%20/g, '+')}`;

export class XSearchSource extends StorySource {
  readonly name: SourceName = 'x';

  private readonly keywords: string[];
  private readonly baseUrl: string;
  private readonly maxItemsPerKeyword: number;

  constructor(
    http: HttpConfig,
    options: { keywords: string[]; baseUrl: string; maxItemsPerKeyword?: number }
  ) {
    super(http);
    this.keywords = options.keywords;
    this.baseUrl = options.baseUrl;
    this.maxItemsPerKeyword = options.maxItemsPerKeyword ?? 20;
  }

  async fetch(signal?: AbortSignal): Promise<Story[]> {
    if (this.keywords.length === 0) {
      this.logger.warn('No X keywords configured; skipping source');
      return [];
    }

    const perKeyword = await this.mapBounded(this.keywords, keyword =>
      this.searchKeyword(keyword, signal)
    );

    // Same tweet can surface for several keywords; keep the first
    const seen = new Set<string>();
    const stories: Story[] = [];
    for (const story of perKeyword.flat()) {
      if (seen.has(story.id)) continue;
      seen.add(story.id);
      stories.push(story);
    }

    return stories;
  }

  private async searchKeyword(keyword: string, signal?: AbortSignal): Promise<Story[]> {
    try {
      const xml = await this.getText(nitterSearchUrl(this.baseUrl, keyword), signal);
      const entries = (await parseFeed(xml))
        .slice(0, this.maxItemsPerKeyword)
        .map(toTweetEntry);

      const stories = entriesToStories(entries, this.name, entry => ({
        keyword,
        author: entry.author ?? null,
        tweetText: entry.summary || entry.title || '',
      }));

      this.logger.debug('Keyword searched', { keyword, stories: stories.length });
      return stories;
    } catch (error) {
      this.logger.warn('Keyword search failed', { keyword, error: errorMessage(error) });
      return [];
    }
  }
}

// Tweets often have no separate title; the link stands in for it
function toTweetEntry(entry: FeedEntry): FeedEntry {
  const title = entry.title?.trim();
  return {
    ...entry,
    title: title ? truncate(title, 200) : entry.link,
  };
}
