/**
 * Shortwire — In-memory Story Store
 *
 * Same contract as the Supabase store, held in process. Used for
 * `ingest --dry-run` and by tests. Everything handed out is a copy.
 */

import type {
  CreateVideoJobInput,
  Story,
  StoryStatus,
  VideoJob,
  VideoJobPatch,
} from '../types';
import { StoreError, StoryNotFoundError, VideoJobNotFoundError } from '../lib/errors';
import type { StoryStore } from './store';

const copyStory = (story: Story): Story => structuredClone(story);
const copyJob = (job: VideoJob): VideoJob => structuredClone(job);

export class MemoryStoryStore implements StoryStore {
  private readonly stories = new Map<string, Story>();
  private readonly urls = new Map<string, string>();
  private readonly jobs = new Map<number, VideoJob>();
  private nextJobId = 1;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async upsert(story: Story): Promise<void> {
    const existing = this.stories.get(story.id);

    if (existing) {
      existing.score = story.score;
      existing.context = structuredClone(story.context);
      return;
    }

    const owner = this.urls.get(story.url);
    if (owner !== undefined && owner !== story.id) {
      throw new StoreError('upsert story', {
        message: 'duplicate key value violates unique constraint "stories_url_key"',
        code: '23505',
      });
    }

    this.stories.set(story.id, copyStory(story));
    this.urls.set(story.url, story.id);
  }

  async queryTopNew(limit: number): Promise<Story[]> {
    return [...this.stories.values()]
      .filter(story => story.status === 'new')
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, limit))
      .map(copyStory);
  }

  async queryAll(): Promise<Story[]> {
    return [...this.stories.values()]
      .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt))
      .map(copyStory);
  }

  async getById(id: string): Promise<Story | null> {
    const story = this.stories.get(id);
    return story ? copyStory(story) : null;
  }

  async findIdsByPrefix(prefix: string, limit: number): Promise<string[]> {
    return [...this.stories.keys()].filter(id => id.startsWith(prefix)).slice(0, limit);
  }

  async setStatus(id: string, status: StoryStatus): Promise<void> {
    const story = this.stories.get(id);
    if (!story) throw new StoryNotFoundError(id);
    story.status = status;
  }

  async createVideoJob(input: CreateVideoJobInput): Promise<VideoJob> {
    if (!this.stories.has(input.storyId)) throw new StoryNotFoundError(input.storyId);

    const job: VideoJob = {
      id: this.nextJobId++,
      storyId: input.storyId,
      script: input.script ?? null,
      audioPath: input.audioPath ?? null,
      timestampsPath: input.timestampsPath ?? null,
      videoPath: input.videoPath ?? null,
      platformIds: input.platformIds ?? {},
      status: input.status ?? 'pending',
      createdAt: this.clock().toISOString(),
      publishedAt: input.publishedAt ?? null,
    };

    this.jobs.set(job.id, job);
    return copyJob(job);
  }

  async updateVideoJob(id: number, patch: VideoJobPatch): Promise<VideoJob> {
    const job = this.jobs.get(id);
    if (!job) throw new VideoJobNotFoundError(id);

    const updated: VideoJob = {
      ...job,
      script: patch.script !== undefined ? structuredClone(patch.script) : job.script,
      audioPath: patch.audioPath !== undefined ? patch.audioPath : job.audioPath,
      timestampsPath: patch.timestampsPath !== undefined ? patch.timestampsPath : job.timestampsPath,
      videoPath: patch.videoPath !== undefined ? patch.videoPath : job.videoPath,
      platformIds: patch.platformIds !== undefined ? { ...patch.platformIds } : job.platformIds,
      status: patch.status ?? job.status,
      publishedAt: patch.publishedAt !== undefined ? patch.publishedAt : job.publishedAt,
    };
    this.jobs.set(id, updated);
    return copyJob(updated);
  }

  async getVideoJob(id: number): Promise<VideoJob | null> {
    const job = this.jobs.get(id);
    return job ? copyJob(job) : null;
  }

  async listVideoJobs(storyId: string): Promise<VideoJob[]> {
    return [...this.jobs.values()]
      .filter(job => job.storyId === storyId)
      .sort((a, b) => b.id - a.id)
      .map(copyJob);
  }
}
