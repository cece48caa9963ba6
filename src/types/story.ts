/**
 * Shortwire — Story Types
 *
 * Canonical record produced by every source, plus the video job
 * record the store tracks for downstream stages.
 */

import { z } from 'zod';
import { StoryValidationError } from '../lib/errors';

// ============================================================
// SOURCES
// ============================================================

export const SourceNameSchema = z.enum(['hackernews', 'reddit', 'techcrunch', '4chan', 'x']);
export type SourceName = z.infer<typeof SourceNameSchema>;

export const SOURCE_NAMES: readonly SourceName[] = SourceNameSchema.options;

// ============================================================
// STORY
// ============================================================

export const StoryStatusSchema = z.enum(['new', 'scripted', 'voiced', 'rendered', 'published']);
export type StoryStatus = z.infer<typeof StoryStatusSchema>;

const absoluteUrl = z
  .string()
  .url()
  .refine(value => /^https?:\/\//i.test(value), 'url must be absolute http(s)');

export const StorySchema = z.object({
  /** SHA-256 hex of the canonical URL */
  id: z.string().min(1),
  title: z.string().min(1),
  url: absoluteUrl,
  // Rows written by older builds may carry sources no longer registered
  source: z.string().min(1),
  score: z.number().finite(),
  publishedAt: z.string().datetime({ offset: true }),
  /** Opaque to scoring; read by script generation */
  context: z.record(z.unknown()),
  status: StoryStatusSchema,
  createdAt: z.string().datetime({ offset: true }),
});
export type Story = z.infer<typeof StorySchema>;

/**
 * Validate an unknown value as a Story.
 */
export function parseStory(value: unknown): Story {
  const result = StorySchema.safeParse(value);
  if (!result.success) {
    throw new StoryValidationError(
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

export function serializeStory(story: Story): string {
  return JSON.stringify(story);
}

export function deserializeStory(json: string): Story {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    throw new StoryValidationError([`(root): ${error instanceof Error ? error.message : String(error)}`]);
  }
  return parseStory(value);
}

// ============================================================
// VIDEO JOB
// ============================================================

export const VideoJobStatusSchema = z.enum([
  'pending',
  'scripted',
  'voiced',
  'rendered',
  'published',
  'failed',
]);
export type VideoJobStatus = z.infer<typeof VideoJobStatusSchema>;

export interface VideoJob {
  id: number;
  storyId: string;
  script: Record<string, unknown> | null;
  audioPath: string | null;
  timestampsPath: string | null;
  videoPath: string | null;
  /** Upload id per platform, e.g. { youtube: 'abc123' } */
  platformIds: Record<string, string>;
  status: VideoJobStatus;
  createdAt: string;
  publishedAt: string | null;
}

export type CreateVideoJobInput = Pick<VideoJob, 'storyId'> &
  Partial<Omit<VideoJob, 'id' | 'storyId' | 'createdAt'>>;

export type VideoJobPatch = Partial<Omit<VideoJob, 'id' | 'storyId' | 'createdAt'>>;
