/**
 * Shortwire — TechCrunch Source
 *
 * Single RSS feed, ordered by recency and editorial prominence.
 */

import { StorySource } from '../base';
import { entriesToStories, parseFeed } from '../rss';
import type { HttpConfig } from '../../lib/config';
import { errorMessage } from '../../lib/logger';
import type { SourceName, Story } from '../../types';

export const TECHCRUNCH_FEED_URL = 'https://techcrunch.com/feed/';

export class TechCrunchSource extends StorySource {
  readonly name: SourceName = 'techcrunch';

  private readonly maxItems: number;

  constructor(http: HttpConfig, options: { maxItems?: number } = {}) {
    super(http);
    this.maxItems = options.maxItems ?? 30;
  }

  async fetch(signal?: AbortSignal): Promise<Story[]> {
    try {
      const xml = await this.getText(TECHCRUNCH_FEED_URL, signal);
      const entries = (await parseFeed(xml)).slice(0, this.maxItems);

      return entriesToStories(entries, this.name, entry => ({
        author: entry.author ?? null,
        summary: entry.summary,
        categories: entry.categories,
      }));
    } catch (error) {
      this.logger.error('Feed fetch failed', { error: errorMessage(error) });
      return [];
    }
  }
}
