/**
 * Shortwire — Story Source Base
 *
 * Abstract base class for all story sources.
 * Each source implements fetch(); callers go through safeFetch(), which
 * never throws and reports a structured outcome instead.
 */

import type { SourceName, Story } from '../types';
import type { HttpConfig } from '../lib/config';
import { fetchJson, fetchText } from '../lib/http';
import { mapWithConcurrency } from '../lib/concurrency';
import { logger, errorMessage, type Logger } from '../lib/logger';

export type SourceOutcome =
  | { source: SourceName; ok: true; stories: Story[]; durationMs: number }
  | { source: SourceName; ok: false; stories: []; error: string; durationMs: number };

export abstract class StorySource {
  abstract readonly name: SourceName;

  protected readonly http: HttpConfig;
  private cachedLogger?: Logger;

  constructor(http: HttpConfig) {
    this.http = http;
  }

  // `name` is an abstract field, so it is not set yet while the base constructor runs
  protected get logger(): Logger {
    this.cachedLogger ??= logger.child({ source: this.name });
    return this.cachedLogger;
  }

  /**
   * Fetch stories from the source. Implementations catch their own
   * sub-request failures and return whatever parsed successfully.
   */
  abstract fetch(signal?: AbortSignal): Promise<Story[]>;

  /**
   * Execute fetch with error handling and logging.
   */
  async safeFetch(signal?: AbortSignal): Promise<SourceOutcome> {
    const startTime = Date.now();
    this.logger.debug('Starting fetch');

    try {
      const stories = await this.fetch(signal);
      const durationMs = Date.now() - startTime;

      this.logger.info('Fetch completed', { stories: stories.length, durationMs });

      return { source: this.name, ok: true, stories, durationMs };
    } catch (error) {
      const durationMs = Date.now() - startTime;
      const message = errorMessage(error);

      this.logger.error('Fetch failed', { error: message, durationMs });

      return { source: this.name, ok: false, stories: [], error: message, durationMs };
    }
  }

  protected getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    return fetchJson(url, { timeoutMs: this.http.timeoutMs, signal });
  }

  protected getText(url: string, signal?: AbortSignal): Promise<string> {
    return fetchText(url, { timeoutMs: this.http.timeoutMs, signal });
  }

  /**
   * Run per-item sub-requests with the configured concurrency cap.
   */
  protected mapBounded<T, R>(items: readonly T[], fn: (item: T) => Promise<R>): Promise<R[]> {
    return mapWithConcurrency(items, this.http.subfetchConcurrency, item => fn(item));
  }
}
