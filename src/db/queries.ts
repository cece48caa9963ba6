/**
 * Shortwire — Supabase Story Store
 *
 * StoryStore over the `stories` and `video_jobs` tables
 * (see supabase/migrations/001_initial.sql). Rows coming back from
 * PostgREST are validated before they become domain objects.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  VideoJobStatusSchema,
  parseStory,
  type CreateVideoJobInput,
  type Story,
  type StoryStatus,
  type VideoJob,
  type VideoJobPatch,
} from '../types';
import { StoreError, StoryNotFoundError } from '../lib/errors';
import type { StoryStore } from './store';

// ============================================================
// ROW MAPPING
// ============================================================

const StoryRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  url: z.string(),
  source: z.string(),
  score: z.number().nullable(),
  published_at: z.string().nullable(),
  context: z.record(z.unknown()).nullable(),
  status: z.string(),
  created_at: z.string(),
});
type StoryRow = z.infer<typeof StoryRowSchema>;

const VideoJobRowSchema = z.object({
  id: z.number().int(),
  story_id: z.string(),
  script: z.record(z.unknown()).nullable(),
  audio_path: z.string().nullable(),
  timestamps_path: z.string().nullable(),
  video_path: z.string().nullable(),
  platform_ids: z.record(z.string()).nullable(),
  status: VideoJobStatusSchema,
  created_at: z.string(),
  published_at: z.string().nullable(),
});
type VideoJobRow = z.infer<typeof VideoJobRowSchema>;

const toIso = (value: string): string => new Date(value).toISOString();

export function storyToRow(story: Story): StoryRow {
  return {
    id: story.id,
    title: story.title,
    url: story.url,
    source: story.source,
    score: story.score,
    published_at: story.publishedAt,
    context: story.context,
    status: story.status,
    created_at: story.createdAt,
  };
}

export function rowToStory(value: unknown): Story {
  const row = StoryRowSchema.parse(value);
  return parseStory({
    id: row.id,
    title: row.title,
    url: row.url,
    source: row.source,
    score: row.score ?? 0,
    publishedAt: toIso(row.published_at ?? row.created_at),
    context: row.context ?? {},
    status: row.status,
    createdAt: toIso(row.created_at),
  });
}

function rowToVideoJob(value: unknown): VideoJob {
  const row = VideoJobRowSchema.parse(value);
  return {
    id: row.id,
    storyId: row.story_id,
    script: row.script,
    audioPath: row.audio_path,
    timestampsPath: row.timestamps_path,
    videoPath: row.video_path,
    platformIds: row.platform_ids ?? {},
    status: row.status,
    createdAt: toIso(row.created_at),
    publishedAt: row.published_at ? toIso(row.published_at) : null,
  };
}

function videoJobPatchToRow(patch: VideoJobPatch): Record<string, unknown> {
  const row: Record<string, unknown> = {};
  if (patch.script !== undefined) row.script = patch.script;
  if (patch.audioPath !== undefined) row.audio_path = patch.audioPath;
  if (patch.timestampsPath !== undefined) row.timestamps_path = patch.timestampsPath;
  if (patch.videoPath !== undefined) row.video_path = patch.videoPath;
  if (patch.platformIds !== undefined) row.platform_ids = patch.platformIds;
  if (patch.status !== undefined) row.status = patch.status;
  if (patch.publishedAt !== undefined) row.published_at = patch.publishedAt;
  return row;
}

function rows(data: unknown): unknown[] {
  return Array.isArray(data) ? data : [];
}

// ============================================================
// STORE
// ============================================================

export class SupabaseStoryStore implements StoryStore {
  constructor(private readonly client: SupabaseClient) {}

  async upsert(story: Story): Promise<void> {
    const row = storyToRow(story);

    // Insert only if the id is new; existing rows are left alone here
    const { data: inserted, error: insertError } = await this.client
      .from('stories')
      .upsert(row, { onConflict: 'id', ignoreDuplicates: true })
      .select('id');

    if (insertError) throw new StoreError('upsert story', insertError);
    if (rows(inserted).length > 0) return;

    const { error: updateError } = await this.client
      .from('stories')
      .update({ score: row.score, context: row.context })
      .eq('id', story.id);

    if (updateError) throw new StoreError('update story', updateError);
  }

  async queryTopNew(limit: number): Promise<Story[]> {
    const { data, error } = await this.client
      .from('stories')
      .select('*')
      .eq('status', 'new')
      .order('score', { ascending: false })
      .limit(limit);

    if (error) throw new StoreError('query top new stories', error);
    return rows(data).map(rowToStory);
  }

  async queryAll(): Promise<Story[]> {
    const { data, error } = await this.client
      .from('stories')
      .select('*')
      .order('created_at', { ascending: false });

    if (error) throw new StoreError('query stories', error);
    return rows(data).map(rowToStory);
  }

  async getById(id: string): Promise<Story | null> {
    const { data, error } = await this.client
      .from('stories')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new StoreError('get story', error);
    return data ? rowToStory(data) : null;
  }

  async findIdsByPrefix(prefix: string, limit: number): Promise<string[]> {
    const { data, error } = await this.client
      .from('stories')
      .select('id')
      .like('id', `${prefix.replace(/[%_]/g, '')}%`)
      .limit(limit);

    if (error) throw new StoreError('find story by prefix', error);
    return rows(data).map(row => z.object({ id: z.string() }).parse(row).id);
  }

  async setStatus(id: string, status: StoryStatus): Promise<void> {
    const { data, error } = await this.client
      .from('stories')
      .update({ status })
      .eq('id', id)
      .select('id');

    if (error) throw new StoreError('set story status', error);
    if (rows(data).length === 0) throw new StoryNotFoundError(id);
  }

  async createVideoJob(input: CreateVideoJobInput): Promise<VideoJob> {
    const { data, error } = await this.client
      .from('video_jobs')
      .insert({ story_id: input.storyId, status: 'pending', ...videoJobPatchToRow(input) })
      .select()
      .single();

    if (error) throw new StoreError('create video job', error);
    return rowToVideoJob(data);
  }

  async updateVideoJob(id: number, patch: VideoJobPatch): Promise<VideoJob> {
    const { data, error } = await this.client
      .from('video_jobs')
      .update(videoJobPatchToRow(patch))
      .eq('id', id)
      .select()
      .single();

    if (error) throw new StoreError('update video job', error);
    return rowToVideoJob(data);
  }

  async getVideoJob(id: number): Promise<VideoJob | null> {
    const { data, error } = await this.client
      .from('video_jobs')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new StoreError('get video job', error);
    return data ? rowToVideoJob(data) : null;
  }

  async listVideoJobs(storyId: string): Promise<VideoJob[]> {
    const { data, error } = await this.client
      .from('video_jobs')
      .select('*')
      .eq('story_id', storyId)
      .order('created_at', { ascending: false });

    if (error) throw new StoreError('list video jobs', error);
    return rows(data).map(rowToVideoJob);
  }
}
