/**
 * Shortwire — Source Registry
 *
 * Closed mapping from source name to implementation. Resolved once at
 * startup from AppConfig; unknown names never get this far because
 * loadConfig rejects them.
 */

import type { AppConfig } from '../lib/config';
import { logger } from '../lib/logger';
import type { SourceName } from '../types';
import type { StorySource } from './base';
import {
  FourChanSource,
  HackerNewsSource,
  RedditSource,
  TechCrunchSource,
  XSearchSource,
} from './sources';

type SourceFactory = (config: AppConfig) => StorySource;

export const SOURCE_FACTORIES: Record<SourceName, SourceFactory> = {
  hackernews: config => new HackerNewsSource(config.http),
  reddit: config =>
    new RedditSource(config.http, { subreddits: config.sources.redditSubreddits }),
  techcrunch: config => new TechCrunchSource(config.http),
  '4chan': config =>
    new FourChanSource(config.http, { keywords: config.sources.fourchanKeywords }),
  x: config =>
    new XSearchSource(config.http, {
      keywords: config.sources.xKeywords,
      baseUrl: config.sources.nitterBaseUrl,
    }),
};

export type SourceRegistry = ReadonlyMap<SourceName, StorySource>;

/**
 * Build the enabled sources, in the order they are configured.
 */
export function createSourceRegistry(config: AppConfig): SourceRegistry {
  const registry = new Map<SourceName, StorySource>();

  for (const name of config.sources.enabled) {
    registry.set(name, SOURCE_FACTORIES[name](config));
  }

  logger.debug('Sources registered', { sources: [...registry.keys()] });
  return registry;
}
