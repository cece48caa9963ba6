/**
 * Shortwire — Feeds Module
 *
 * Fetch, score and rank stories from every configured source.
 */

export { StorySource, type SourceOutcome } from './base';
export { SOURCE_FACTORIES, createSourceRegistry, type SourceRegistry } from './registry';
export {
  storyId,
  stripHtml,
  matchesKeywords,
  positionScore,
  toPublishedAt,
  buildStory,
} from './normalizer';
export { parseFeed, entriesToStories, type FeedEntry } from './rss';
export {
  SOURCE_WEIGHTS,
  DEFAULT_SOURCE_WEIGHT,
  RECENCY_WINDOW_HOURS,
  RECENCY_BOOST,
  normalizeScores,
  applySourceWeights,
  applyRecencyBoost,
  deduplicate,
  scoreAndRank,
  scoreAndRankDetailed,
  sourceWeight,
  type DedupResult,
  type ScoreOptions,
} from './scorer';
export {
  runIngestion,
  ingestAll,
  DEADLINE_EXCEEDED,
  type IngestionOptions,
  type IngestionReport,
} from './aggregator';
export * from './sources';
