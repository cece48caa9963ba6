/**
 * Shortwire — Ingestion Orchestrator
 *
 * Fans out to every registered source at once, waits for all of them
 * (or the overall deadline), then scores and ranks the combined stories.
 * A failing source only ever shows up as a failed outcome and a log line.
 */

import type { SourceName, Story } from '../types';
import { logger, errorMessage } from '../lib/logger';
import type { SourceOutcome, StorySource } from './base';
import type { SourceRegistry } from './registry';
import { scoreAndRankDetailed, type ScoreOptions } from './scorer';

// ============================================================
// TYPES
// ============================================================

export interface IngestionOptions extends ScoreOptions {
  /** Overall time limit in ms; 0 or undefined means no deadline */
  deadlineMs?: number;
}

export interface IngestionReport {
  /** Ranked stories, best first */
  stories: Story[];
  /** One outcome per source, in registry order */
  outcomes: SourceOutcome[];
  /** Stories collected before dedup */
  rawCount: number;
  duplicatesRemoved: number;
  failedSources: SourceName[];
  durationMs: number;
}

export const DEADLINE_EXCEEDED = 'deadline exceeded';

// ============================================================
// FAN-OUT
// ============================================================

/**
 * safeFetch does not throw; this catch covers subclasses that override it.
 */
async function runSource(source: StorySource, signal: AbortSignal): Promise<SourceOutcome> {
  const startTime = Date.now();
  try {
    return await source.safeFetch(signal);
  } catch (error) {
    const message = errorMessage(error);
    logger.error('Source failed outside its own error handling', {
      source: source.name,
      error: message,
    });
    return {
      source: source.name,
      ok: false,
      stories: [],
      error: message,
      durationMs: Date.now() - startTime,
    };
  }
}

function withDeadline(
  source: StorySource,
  run: Promise<SourceOutcome>,
  deadline: Promise<void> | null,
  startTime: number
): Promise<SourceOutcome> {
  if (!deadline) return run;

  const expired = deadline.then(
    (): SourceOutcome => ({
      source: source.name,
      ok: false,
      stories: [],
      error: DEADLINE_EXCEEDED,
      durationMs: Date.now() - startTime,
    })
  );

  return Promise.race([run, expired]);
}

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Fetch from every source concurrently, then score and rank.
 * Never rejects because of a source failure.
 */
export async function runIngestion(
  sources: SourceRegistry | readonly StorySource[],
  options: IngestionOptions = {}
): Promise<IngestionReport> {
  const startTime = Date.now();
  const list = [...sources.values()];

  if (list.length === 0) {
    logger.warn('No sources to fetch from');
    return {
      stories: [],
      outcomes: [],
      rawCount: 0,
      duplicatesRemoved: 0,
      failedSources: [],
      durationMs: Date.now() - startTime,
    };
  }

  logger.info('Starting ingestion', {
    sources: list.map(s => s.name),
    deadlineMs: options.deadlineMs || null,
  });

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline =
    options.deadlineMs && options.deadlineMs > 0
      ? new Promise<void>(resolve => {
          timer = setTimeout(() => {
            logger.warn('Ingestion deadline reached; abandoning pending sources', {
              deadlineMs: options.deadlineMs,
            });
            controller.abort(new Error(DEADLINE_EXCEEDED));
            resolve();
          }, options.deadlineMs);
        })
      : null;

  let outcomes: SourceOutcome[];
  try {
    outcomes = await Promise.all(
      list.map(source =>
        withDeadline(source, runSource(source, controller.signal), deadline, startTime)
      )
    );
  } finally {
    clearTimeout(timer);
  }

  const collected = outcomes.flatMap((outcome): Story[] => outcome.stories);
  const failedSources = outcomes.filter(o => !o.ok).map(o => o.source);

  logger.info('Collected stories', {
    stories: collected.length,
    sources: list.length,
    failed: failedSources.length,
  });

  const { stories, removed } = scoreAndRankDetailed(collected, options);
  const durationMs = Date.now() - startTime;

  logger.info('Ingestion completed', {
    stories: stories.length,
    duplicatesRemoved: removed,
    failedSources,
    durationMs,
  });

  return {
    stories,
    outcomes,
    rawCount: collected.length,
    duplicatesRemoved: removed,
    failedSources,
    durationMs,
  };
}

/**
 * Ranked stories from every source, best first.
 */
export async function ingestAll(
  sources: SourceRegistry | readonly StorySource[],
  options: IngestionOptions = {}
): Promise<Story[]> {
  const report = await runIngestion(sources, options);
  return report.stories;
}
