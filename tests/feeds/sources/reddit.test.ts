/**
 * Reddit Source Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RedditSource, redditFeedUrl } from '../../../src/feeds/sources/reddit';
import { TEST_HTTP, atomFeed, requestUrl, routeFetch, textResponse } from '../../helpers';

const mockFetch = vi.fn<typeof fetch>();

const TECHNOLOGY_FEED = atomFeed([
  {
    title: 'Chip shortage ends',
    link: 'https://www.reddit.com/r/technology/comments/abc/chip_shortage_ends/',
    updated: '2024-01-01T00:00:00+00:00',
    author: '/u/alice',
  },
  { title: 'Entry without a link' },
  {
    title: 'New laptop review',
    link: 'https://www.reddit.com/r/technology/comments/def/new_laptop_review/',
    updated: '2024-01-02T06:30:00+00:00',
  },
]);

describe('RedditSource', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should build the subreddit feed URL', () => {
    expect(redditFeedUrl('technology')).toBe('https://www.reddit.com/r/technology/.rss');
  });

  it('should score entries by feed position', async () => {
    mockFetch.mockImplementation(
      routeFetch({ [redditFeedUrl('technology')]: () => textResponse(TECHNOLOGY_FEED) })
    );

    const stories = await new RedditSource(TEST_HTTP, { subreddits: ['technology'] }).fetch();

    expect(stories.map(s => [s.title, s.score])).toEqual([
      ['Chip shortage ends', 3],
      ['New laptop review', 1],
    ]);
    expect(stories[0].source).toBe('reddit');
    expect(stories[0].publishedAt).toBe('2024-01-01T00:00:00.000Z');
    expect(stories[0].context.subreddit).toBe('technology');
    expect(stories[0].context.author).toBe('/u/alice');
    expect(stories[1].context.author).toBeNull();
  });

  it('should keep results from healthy subreddits when one fails', async () => {
    mockFetch.mockImplementation(
      routeFetch({
        [redditFeedUrl('technology')]: () => textResponse(TECHNOLOGY_FEED),
        [redditFeedUrl('programming')]: () => textResponse('Too Many Requests', 429),
      })
    );

    const stories = await new RedditSource(TEST_HTTP, {
      subreddits: ['programming', 'technology'],
    }).fetch();

    expect(stories).toHaveLength(2);
    expect(stories.every(s => s.context.subreddit === 'technology')).toBe(true);
  });

  it('should skip a subreddit whose feed is not XML', async () => {
    mockFetch.mockImplementation(
      routeFetch({ [redditFeedUrl('technology')]: () => textResponse('not xml at all') })
    );

    const stories = await new RedditSource(TEST_HTTP, { subreddits: ['technology'] }).fetch();

    expect(stories).toEqual([]);
  });

  it('should cap entries per subreddit', async () => {
    mockFetch.mockImplementation(
      routeFetch({ [redditFeedUrl('technology')]: () => textResponse(TECHNOLOGY_FEED) })
    );

    const stories = await new RedditSource(TEST_HTTP, {
      subreddits: ['technology'],
      maxItemsPerFeed: 1,
    }).fetch();

    expect(stories.map(s => [s.title, s.score])).toEqual([['Chip shortage ends', 1]]);
  });

  it('should skip the network entirely without subreddits', async () => {
    const stories = await new RedditSource(TEST_HTTP, { subreddits: [] }).fetch();

    expect(stories).toEqual([]);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should request each configured subreddit once', async () => {
    mockFetch.mockImplementation(routeFetch({}));

    await new RedditSource(TEST_HTTP, { subreddits: ['a', 'b'] }).fetch();

    expect(mockFetch.mock.calls.map(([input]) => requestUrl(input)).sort()).toEqual([
      'https://www.reddit.com/r/a/.rss',
      'https://www.reddit.com/r/b/.rss',
    ]);
  });
});
