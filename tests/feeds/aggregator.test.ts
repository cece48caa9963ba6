/**
 * Ingestion Orchestrator Tests
 */

import { describe, it, expect } from 'vitest';
import { DEADLINE_EXCEEDED, ingestAll, runIngestion } from '../../src/feeds/aggregator';
import { StorySource, type SourceOutcome } from '../../src/feeds/base';
import type { SourceName, Story } from '../../src/types';
import { FailingSource, NOW, StaticSource, TEST_HTTP, makeStory } from '../helpers';

class HangingSource extends StorySource {
  receivedSignal?: AbortSignal;

  constructor(readonly name: SourceName) {
    super(TEST_HTTP);
  }

  fetch(signal?: AbortSignal): Promise<Story[]> {
    this.receivedSignal = signal;
    return new Promise<Story[]>(() => undefined);
  }
}

class BrokenSafeFetchSource extends StaticSource {
  async safeFetch(): Promise<SourceOutcome> {
    throw new Error('handler bug');
  }
}

class GatedSource extends StorySource {
  constructor(
    readonly name: SourceName,
    private readonly onStart: () => void,
    private readonly gate: Promise<void>,
    private readonly stories: Story[]
  ) {
    super(TEST_HTTP);
  }

  async fetch(): Promise<Story[]> {
    this.onStart();
    await this.gate;
    return this.stories;
  }
}

describe('Ingestion Orchestrator', () => {
  describe('runIngestion', () => {
    it('should combine, score and rank stories from every source', async () => {
      const report = await runIngestion(
        [
          new StaticSource('hackernews', [
            makeStory('A', { source: 'hackernews', score: 100 }),
            makeStory('B', { source: 'hackernews', score: 50 }),
          ]),
          new StaticSource('4chan', [makeStory('C', { source: '4chan', score: 100 })]),
        ],
        { now: NOW }
      );

      expect(report.stories.map(s => s.id)).toEqual(['A', 'C', 'B']);
      expect(report.rawCount).toBe(3);
      expect(report.duplicatesRemoved).toBe(0);
      expect(report.failedSources).toEqual([]);
      expect(report.outcomes.map(o => [o.source, o.ok])).toEqual([
        ['hackernews', true],
        ['4chan', true],
      ]);
    });

    it('should isolate a failing source', async () => {
      const report = await runIngestion(
        [
          new StaticSource('hackernews', [makeStory('A', { source: 'hackernews' })]),
          new FailingSource('reddit'),
        ],
        { now: NOW }
      );

      expect(report.stories.map(s => s.id)).toEqual(['A']);
      expect(report.failedSources).toEqual(['reddit']);

      const failed = report.outcomes[1];
      expect(failed.ok).toBe(false);
      if (!failed.ok) {
        expect(failed.error).toBe('reddit exploded');
      }
    });

    it('should survive a source whose safeFetch throws', async () => {
      const report = await runIngestion(
        [
          new BrokenSafeFetchSource('x', [makeStory('X1', { source: 'x' })]),
          new StaticSource('techcrunch', [makeStory('T1', { source: 'techcrunch' })]),
        ],
        { now: NOW }
      );

      expect(report.stories.map(s => s.id)).toEqual(['T1']);
      expect(report.failedSources).toEqual(['x']);
    });

    it('should return an empty list when every source fails', async () => {
      const report = await runIngestion([new FailingSource('reddit'), new FailingSource('x')]);

      expect(report.stories).toEqual([]);
      expect(report.failedSources).toEqual(['reddit', 'x']);
    });

    it('should return an empty report without sources', async () => {
      const report = await runIngestion(new Map());

      expect(report.stories).toEqual([]);
      expect(report.outcomes).toEqual([]);
    });

    it('should count duplicates collapsed across sources', async () => {
      const report = await runIngestion(
        [
          new StaticSource('hackernews', [makeStory('same', { source: 'hackernews' })]),
          new StaticSource('reddit', [makeStory('same', { source: 'reddit' })]),
        ],
        { now: NOW }
      );

      expect(report.rawCount).toBe(2);
      expect(report.duplicatesRemoved).toBe(1);
      expect(report.stories).toHaveLength(1);
      expect(report.stories[0].source).toBe('hackernews');
    });

    it('should start every source before any finishes', async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>(resolve => {
        release = resolve;
      });
      const started: string[] = [];

      const report = await runIngestion(
        [
          new GatedSource('hackernews', () => started.push('hackernews'), gate, [
            makeStory('H', { source: 'hackernews' }),
          ]),
          new GatedSource(
            'reddit',
            () => {
              started.push('reddit');
              release();
            },
            gate,
            [makeStory('R', { source: 'reddit' })]
          ),
        ],
        { now: NOW }
      );

      expect(started).toEqual(['hackernews', 'reddit']);
      expect(report.stories.map(s => s.id)).toEqual(['H', 'R']);
    });

    it('should abandon sources still pending at the deadline', async () => {
      const hanging = new HangingSource('x');

      const report = await runIngestion(
        [new StaticSource('hackernews', [makeStory('A', { source: 'hackernews' })]), hanging],
        { now: NOW, deadlineMs: 20 }
      );

      expect(report.stories.map(s => s.id)).toEqual(['A']);
      expect(report.failedSources).toEqual(['x']);

      const outcome = report.outcomes[1];
      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error).toBe(DEADLINE_EXCEEDED);
      }
      expect(hanging.receivedSignal?.aborted).toBe(true);
    });
  });

  describe('ingestAll', () => {
    it('should return only the ranked stories', async () => {
      const stories = await ingestAll(
        new Map<SourceName, StorySource>([
          ['reddit', new StaticSource('reddit', [makeStory('R', { source: 'reddit' })])],
        ]),
        { now: NOW }
      );

      expect(stories.map(s => [s.id, s.score])).toEqual([['R', 0.8]]);
    });
  });
});
