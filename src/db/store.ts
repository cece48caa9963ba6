/**
 * Shortwire — Story Store contract
 */

import type {
  CreateVideoJobInput,
  Story,
  StoryStatus,
  VideoJob,
  VideoJobPatch,
} from '../types';
import { AmbiguousIdError } from '../lib/errors';
import { logger, errorMessage } from '../lib/logger';

export interface UpsertSummary {
  stored: number;
  failed: number;
}

export interface StoryStore {
  /**
   * Insert, or on an existing id update only score and context.
   * Status and createdAt of an existing row are never touched.
   */
  upsert(story: Story): Promise<void>;
  /** Up to `limit` stories with status 'new', highest score first */
  queryTopNew(limit: number): Promise<Story[]>;
  /** Every story, most recently created first */
  queryAll(): Promise<Story[]>;
  getById(id: string): Promise<Story | null>;
  /** Ids starting with `prefix`, at most `limit` of them */
  findIdsByPrefix(prefix: string, limit: number): Promise<string[]>;
  /** Unconditional overwrite; transition legality is the caller's concern */
  setStatus(id: string, status: StoryStatus): Promise<void>;

  createVideoJob(input: CreateVideoJobInput): Promise<VideoJob>;
  updateVideoJob(id: number, patch: VideoJobPatch): Promise<VideoJob>;
  getVideoJob(id: number): Promise<VideoJob | null>;
  listVideoJobs(storyId: string): Promise<VideoJob[]>;
}

/**
 * Upsert each story; one failing row does not stop the rest.
 */
export async function upsertMany(store: StoryStore, stories: readonly Story[]): Promise<UpsertSummary> {
  let stored = 0;
  let failed = 0;

  for (const story of stories) {
    try {
      await store.upsert(story);
      stored++;
    } catch (error) {
      logger.warn('Failed to store story', { id: story.id, title: story.title, error: errorMessage(error) });
      failed++;
    }
  }

  logger.info('Stories stored', { stored, failed });
  return { stored, failed };
}

/**
 * Resolve a (possibly shortened) id to one story.
 * Null when nothing matches; AmbiguousIdError when several do.
 */
export async function findByIdPrefix(store: StoryStore, prefix: string): Promise<Story | null> {
  const exact = await store.getById(prefix);
  if (exact) return exact;

  const ids = await store.findIdsByPrefix(prefix, 2);
  if (ids.length > 1) throw new AmbiguousIdError(prefix, ids);
  if (ids.length === 0) return null;

  return store.getById(ids[0]);
}
