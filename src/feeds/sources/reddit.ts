/**
 * Shortwire — Reddit Source
 *
 * Polls the public RSS (Atom) feed of each configured subreddit.
 * Reddit's feed is already in "hot" order, so stories are scored by position.
 */

import { StorySource } from '../base';
import { entriesToStories, parseFeed } from '../rss';
import type { HttpConfig } from '../../lib/config';
import { errorMessage } from '../../lib/logger';
import type { SourceName, Story } from '../../types';

export const redditFeedUrl = (subreddit: string): string =>
  `https://www.reddit.com/r/${encodeURIComponent(subreddit)}/.rss`;

export class RedditSource extends StorySource {
  readonly name: SourceName = 'reddit';

  private readonly subreddits: string[];
  private readonly maxItemsPerFeed: number;

  constructor(http: HttpConfig, options: { subreddits: string[]; maxItemsPerFeed?: number }) {
    super(http);
    this.subreddits = options.subreddits;
    this.maxItemsPerFeed = options.maxItemsPerFeed ?? 25;
  }

  async fetch(signal?: AbortSignal): Promise<Story[]> {
    if (this.subreddits.length === 0) {
      this.logger.warn('No subreddits configured; skipping source');
      return [];
    }

    const perSubreddit = await this.mapBounded(this.subreddits, subreddit =>
      this.fetchSubreddit(subreddit, signal)
    );

    return perSubreddit.flat();
  }

  private async fetchSubreddit(subreddit: string, signal?: AbortSignal): Promise<Story[]> {
    try {
      const xml = await this.getText(redditFeedUrl(subreddit), signal);
      const entries = (await parseFeed(xml)).slice(0, this.maxItemsPerFeed);

      const stories = entriesToStories(entries, this.name, entry => ({
        subreddit,
        author: entry.author ?? null,
        summary: entry.summary,
      }));

      this.logger.debug('Subreddit fetched', { subreddit, stories: stories.length });
      return stories;
    } catch (error) {
      this.logger.warn('Subreddit fetch failed', { subreddit, error: errorMessage(error) });
      return [];
    }
  }
}
