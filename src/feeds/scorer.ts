/**
 * Shortwire — Story Scorer
 *
 * Pure ranking pipeline over the fetched stories, in fixed order:
 * normalize per source → source weight → recency boost → dedup → sort.
 */

import type { Story } from '../types';
import { logger } from '../lib/logger';

/** Editorial trust per source, applied after normalization. */
export const SOURCE_WEIGHTS: Readonly<Record<string, number>> = {
  hackernews: 1.0,
  techcrunch: 0.9,
  x: 0.85,
  reddit: 0.8,
  '4chan': 0.7,
};

export const DEFAULT_SOURCE_WEIGHT = 0.5;

export const RECENCY_WINDOW_HOURS = 6;
export const RECENCY_BOOST = 0.15;

const HOUR_MS = 60 * 60 * 1000;

export interface ScoreOptions {
  now?: Date;
  weights?: Readonly<Record<string, number>>;
}

export interface DedupResult {
  stories: Story[];
  removed: number;
}

/**
 * Rescale raw scores to [0, 1] within each source, in place.
 * A source whose stories all share one score maps every story to 1.0.
 */
export function normalizeScores(stories: Story[]): void {
  const bySource = new Map<string, Story[]>();
  for (const story of stories) {
    const group = bySource.get(story.source);
    if (group) {
      group.push(story);
    } else {
      bySource.set(story.source, [story]);
    }
  }

  for (const group of bySource.values()) {
    const scores = group.map(s => s.score);
    const min = Math.min(...scores);
    const span = Math.max(...scores) - min;

    for (const story of group) {
      story.score = span === 0 ? 1.0 : (story.score - min) / span;
    }
  }
}

export function sourceWeight(
  source: string,
  weights: Readonly<Record<string, number>> = SOURCE_WEIGHTS
): number {
  return Object.prototype.hasOwnProperty.call(weights, source)
    ? weights[source]
    : DEFAULT_SOURCE_WEIGHT;
}

/**
 * Multiply each normalized score by its source weight, in place.
 */
export function applySourceWeights(
  stories: Story[],
  weights: Readonly<Record<string, number>> = SOURCE_WEIGHTS
): void {
  for (const story of stories) {
    story.score *= sourceWeight(story.source, weights);
  }
}

/**
 * Add RECENCY_BOOST to stories published less than RECENCY_WINDOW_HOURS ago, in place.
 */
export function applyRecencyBoost(stories: Story[], now: Date = new Date()): void {
  const windowMs = RECENCY_WINDOW_HOURS * HOUR_MS;

  for (const story of stories) {
    const ageMs = now.getTime() - Date.parse(story.publishedAt);
    if (ageMs < windowMs) {
      story.score += RECENCY_BOOST;
    }
  }
}

/**
 * Keep the highest-scoring story per id. On equal scores the first one wins.
 * Output keeps first-seen order of ids.
 */
export function deduplicate(stories: readonly Story[]): DedupResult {
  const best = new Map<string, Story>();

  for (const story of stories) {
    const existing = best.get(story.id);
    if (!existing || story.score > existing.score) {
      best.set(story.id, story);
    }
  }

  const unique = [...best.values()];
  const removed = stories.length - unique.length;

  if (removed > 0) {
    logger.info('Removed duplicate stories', { removed });
  }

  return { stories: unique, removed };
}

/**
 * Full scoring pipeline. Works on copies; only `score` differs from the input.
 * Sorting is stable, so ties keep their incoming order.
 */
export function scoreAndRankDetailed(stories: readonly Story[], options: ScoreOptions = {}): DedupResult {
  if (stories.length === 0) return { stories: [], removed: 0 };

  const working = stories.map(story => ({ ...story }));

  normalizeScores(working);
  applySourceWeights(working, options.weights);
  applyRecencyBoost(working, options.now);

  const { stories: unique, removed } = deduplicate(working);
  unique.sort((a, b) => b.score - a.score);

  logger.info('Scored and ranked stories', {
    stories: unique.length,
    topScore: Number(unique[0].score.toFixed(3)),
  });

  return { stories: unique, removed };
}

export function scoreAndRank(stories: readonly Story[], options: ScoreOptions = {}): Story[] {
  return scoreAndRankDetailed(stories, options).stories;
}
