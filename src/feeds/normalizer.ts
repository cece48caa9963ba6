/**
 * Shortwire — Story Normalizer
 *
 * Helpers every source uses to turn raw upstream data into Story records.
 */

import { createHash } from 'crypto';
import type { SourceName, Story } from '../types';

/**
 * Content identity of a story: SHA-256 of its canonical URL.
 */
export function storyId(url: string): string {
  return createHash('sha256').update(url).digest('hex');
}

const HTML_TAG = /<[^>]+>/g;
const HTML_ENTITY = /&(?:#(\d+)|#x([0-9a-f]+)|(amp|lt|gt|quot|apos|nbsp));/gi;
const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

function decodeCodePoint(codePoint: number, entity: string): string {
  return Number.isInteger(codePoint) && codePoint > 0 && codePoint <= 0x10ffff
    ? String.fromCodePoint(codePoint)
    : entity;
}

function decodeEntity(entity: string, decimal?: string, hex?: string, name?: string): string {
  if (decimal !== undefined) return decodeCodePoint(Number.parseInt(decimal, 10), entity);
  if (hex !== undefined) return decodeCodePoint(Number.parseInt(hex, 16), entity);
  return (name && NAMED_ENTITIES[name.toLowerCase()]) ?? entity;
}

/**
 * Remove HTML tags. `<br>` and `<p>` become newlines; named entities in
 * common use and every numeric entity are decoded.
 */
export function stripHtml(text: string | undefined | null): string {
  if (!text) return '';
  return text
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<p\s*\/?>/gi, '\n')
    .replace(HTML_TAG, '')
    .replace(HTML_ENTITY, decodeEntity);
}

/**
 * Case-insensitive substring match of any keyword against the text.
 */
export function matchesKeywords(text: string, keywords: readonly string[]): boolean {
  const haystack = text.toLowerCase();
  return keywords.some(keyword => {
    const needle = keyword.trim().toLowerCase();
    return needle.length > 0 && haystack.includes(needle);
  });
}

/**
 * Score for feeds without a native one: first of `total` gets `total`, last gets 1.
 */
export function positionScore(rank: number, total: number): number {
  return total - rank;
}

/**
 * Cut to `maxLength` code points, so a surrogate pair is never split.
 */
export function truncate(text: string, maxLength: number): string {
  const codePoints = Array.from(text);
  return codePoints.length > maxLength ? codePoints.slice(0, maxLength).join('') : text;
}

/**
 * Parse a timestamp from source metadata. Numbers are epoch seconds.
 * Falls back to `now` when absent or unparsable.
 */
export function toPublishedAt(value: string | number | undefined | null, now: Date = new Date()): string {
  if (value === undefined || value === null || value === '') {
    return now.toISOString();
  }

  const date = typeof value === 'number' ? new Date(value * 1000) : new Date(value);
  return Number.isNaN(date.getTime()) ? now.toISOString() : date.toISOString();
}

function isAbsoluteUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

export interface StoryFields {
  title: string | undefined | null;
  url: string | undefined | null;
  source: SourceName;
  score: number;
  publishedAt?: string | number | null;
  context?: Record<string, unknown>;
}

/**
 * Build a new Story, or null when the title or URL is missing or the URL
 * is not absolute. Never emits a partially populated record.
 */
export function buildStory(fields: StoryFields, now: Date = new Date()): Story | null {
  const title = fields.title?.trim();
  const url = fields.url?.trim();

  if (!title || !url || !isAbsoluteUrl(url)) return null;

  return {
    id: storyId(url),
    title,
    url,
    source: fields.source,
    score: Number.isFinite(fields.score) ? fields.score : 0,
    publishedAt: toPublishedAt(fields.publishedAt, now),
    context: fields.context ?? {},
    status: 'new',
    createdAt: now.toISOString(),
  };
}
