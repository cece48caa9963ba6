/**
 * Shared test fixtures
 */

import { StorySource } from '../src/feeds/base';
import type { HttpConfig } from '../src/lib/config';
import type { SourceName, Story } from '../src/types';

export const TEST_HTTP: HttpConfig = { timeoutMs: 1000, subfetchConcurrency: 3 };

/** Fixed clock for scoring tests */
export const NOW = new Date('2024-06-01T12:00:00.000Z');
export const DAY_AGO = '2024-05-31T12:00:00.000Z';

export function hoursBefore(date: Date, hours: number): string {
  return new Date(date.getTime() - hours * 60 * 60 * 1000).toISOString();
}

export function makeStory(id: string, overrides: Partial<Story> = {}): Story {
  return {
    id,
    title: `Story ${id}`,
    url: `https://example.com/${id}`,
    source: 'hackernews',
    score: 10,
    publishedAt: DAY_AGO,
    context: {},
    status: 'new',
    createdAt: DAY_AGO,
    ...overrides,
  };
}

// ============================================================
// FETCH STUBS
// ============================================================

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'application/xml' } });
}

export function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/**
 * fetch implementation answering from a URL → response table; anything else is a 404.
 */
export function routeFetch(
  routes: Record<string, () => Response>
): (input: string | URL | Request, init?: RequestInit) => Promise<Response> {
  return async input => {
    const route = routes[requestUrl(input)];
    return route ? route() : new Response('not found', { status: 404 });
  };
}

// ============================================================
// FEED FIXTURES
// ============================================================

export interface RssItemFixture {
  title?: string;
  link?: string;
  pubDate?: string;
  creator?: string;
  description?: string;
}

export function rssFeed(items: RssItemFixture[]): string {
  const body = items
    .map(item =>
      [
        '<item>',
        item.title !== undefined ? `<title>${item.title}</title>` : '',
        item.link ? `<link>${item.link}</link>` : '',
        item.pubDate ? `<pubDate>${item.pubDate}</pubDate>` : '',
        item.creator ? `<dc:creator>${item.creator}</dc:creator>` : '',
        item.description ? `<description>${item.description}</description>` : '',
        '</item>',
      ].join('')
    )
    .join('\n');

  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:dc="http://purl.org/dc/elements/1.1/">
<channel>
<title>Test feed</title>
<link>https://feed.example.com</link>
<description>Fixture</description>
${body}
</channel>
</rss>`;
}

export interface AtomEntryFixture {
  title: string;
  link?: string;
  updated?: string;
  author?: string;
}

export function atomFeed(entries: AtomEntryFixture[]): string {
  const body = entries
    .map(entry =>
      [
        '<entry>',
        `<title>${entry.title}</title>`,
        entry.link ? `<link href="${entry.link}" />` : '',
        entry.updated ? `<updated>${entry.updated}</updated>` : '',
        entry.author ? `<author><name>${entry.author}</name></author>` : '',
        '</entry>',
      ].join('')
    )
    .join('\n');

  return `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
<title>Test atom feed</title>
<updated>2024-01-01T00:00:00+00:00</updated>
${body}
</feed>`;
}

// ============================================================
// SOURCES
// ============================================================

export class StaticSource extends StorySource {
  constructor(
    readonly name: SourceName,
    private readonly stories: Story[]
  ) {
    super(TEST_HTTP);
  }

  async fetch(): Promise<Story[]> {
    return this.stories.map(story => ({ ...story }));
  }
}

export class FailingSource extends StorySource {
  constructor(readonly name: SourceName) {
    super(TEST_HTTP);
  }

  async fetch(): Promise<Story[]> {
    throw new Error(`${this.name} exploded`);
  }
}
