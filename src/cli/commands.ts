/**
 * Shortwire — CLI commands
 *
 * Each command takes its collaborators explicitly and writes lines through
 * `out`, returning the process exit code. scripts/cli.ts does the wiring.
 */

import { StoryStatusSchema, type Story } from '../types';
import { runIngestion, type SourceRegistry } from '../feeds';
import { findByIdPrefix, upsertMany, type StoryStore } from '../db';
import { AmbiguousIdError } from '../lib/errors';

export type Output = (line: string) => void;

export interface IngestDeps {
  store: StoryStore;
  sources: SourceRegistry;
  deadlineMs?: number;
  now?: Date;
}

export interface ListOptions {
  status?: string;
  source?: string;
  limit: number;
}

const SUMMARY_SIZE = 5;

export function formatRankedLine(story: Story): string {
  return `  ${story.score.toFixed(2)}  [${story.source.padEnd(12)}] ${story.title.slice(0, 65)}`;
}

export function formatListEntry(story: Story): string[] {
  const comments = story.context.comments;
  const commentCount = Array.isArray(comments) ? comments.length : 0;
  const ctx = commentCount > 0 ? ` +${commentCount}c` : '';

  return [
    `  [${story.status.padStart(10)}] ${story.score.toFixed(2)}  ${story.source.padEnd(12)} ${story.title.slice(0, 55)}${ctx}`,
    `             ID: ${story.id.slice(0, 12)}  URL: ${story.url.slice(0, 60)}`,
  ];
}

function describeComment(comment: unknown): string {
  if (comment && typeof comment === 'object') {
    const author = 'author' in comment ? String(comment.author) : 'anon';
    const text = 'text' in comment ? String(comment.text) : '';
    return `  [${author}]: ${text.slice(0, 150)}`;
  }
  return `  ${String(comment).slice(0, 150)}`;
}

/**
 * Resolve an id prefix, printing the reason when it does not resolve.
 */
async function resolveStory(store: StoryStore, idPrefix: string, out: Output): Promise<Story | null> {
  try {
    const story = await findByIdPrefix(store, idPrefix);
    if (!story) out(`No story matches "${idPrefix}".`);
    return story;
  } catch (error) {
    if (error instanceof AmbiguousIdError) {
      out(`"${idPrefix}" is ambiguous; use more characters.`);
      return null;
    }
    throw error;
  }
}

// ============================================================
// COMMANDS
// ============================================================

export async function ingestCommand(deps: IngestDeps, out: Output): Promise<number> {
  const report = await runIngestion(deps.sources, { deadlineMs: deps.deadlineMs, now: deps.now });
  const { failed } = await upsertMany(deps.store, report.stories);

  out(`Ingested ${report.stories.length} stories.`);
  if (failed > 0) {
    out(`Failed to store ${failed} stories.`);
  }
  if (report.failedSources.length > 0) {
    out(`Degraded sources: ${report.failedSources.join(', ')}`);
  }

  if (report.stories.length > 0) {
    out('');
    out(`Top ${Math.min(SUMMARY_SIZE, report.stories.length)}:`);
    for (const story of report.stories.slice(0, SUMMARY_SIZE)) {
      out(formatRankedLine(story));
    }
  }

  // Partial results are still a successful run
  return 0;
}

export async function listCommand(store: StoryStore, options: ListOptions, out: Output): Promise<number> {
  let stories = await store.queryAll();

  if (stories.length === 0) {
    out("No stories found. Run 'ingest' first.");
    return 0;
  }

  if (options.status) stories = stories.filter(s => s.status === options.status);
  if (options.source) stories = stories.filter(s => s.source === options.source);

  for (const story of stories.slice(0, options.limit)) {
    formatListEntry(story).forEach(line => out(line));
  }

  if (stories.length > options.limit) {
    out('');
    out(`  ... and ${stories.length - options.limit} more. Use --limit to show more.`);
  }

  return 0;
}

export async function topCommand(store: StoryStore, limit: number, out: Output): Promise<number> {
  const stories = await store.queryTopNew(limit);

  if (stories.length === 0) {
    out('No new stories.');
    return 0;
  }

  stories.forEach((story, index) => {
    out(`${index + 1}. ${formatRankedLine(story).trimStart()}`);
    out(`   ID: ${story.id.slice(0, 12)}`);
  });
  return 0;
}

export async function showCommand(store: StoryStore, idPrefix: string, out: Output): Promise<number> {
  const story = await resolveStory(store, idPrefix, out);
  if (!story) return 1;

  out(`Title:     ${story.title}`);
  out(`Source:    ${story.source}`);
  out(`URL:       ${story.url}`);
  out(`Score:     ${story.score.toFixed(3)}`);
  out(`Status:    ${story.status}`);
  out(`Published: ${story.publishedAt}`);
  out(`ID:        ${story.id}`);

  const comments = story.context.comments;
  if (Array.isArray(comments) && comments.length > 0) {
    out('');
    out(`Comments (${comments.length}):`);
    comments.forEach(comment => out(describeComment(comment)));
  }

  const tweetText = story.context.tweetText;
  if (typeof tweetText === 'string' && tweetText) {
    out('');
    out(`Tweet: ${tweetText.slice(0, 300)}`);
  }

  const jobs = await store.listVideoJobs(story.id);
  if (jobs.length > 0) {
    out('');
    out(`Video jobs (${jobs.length}):`);
    jobs.forEach(job => out(`  #${job.id} ${job.status}`));
  }

  return 0;
}

export async function statusCommand(
  store: StoryStore,
  idPrefix: string,
  status: string,
  out: Output
): Promise<number> {
  const parsed = StoryStatusSchema.safeParse(status);
  if (!parsed.success) {
    out(`Unknown status "${status}". Expected one of: ${StoryStatusSchema.options.join(', ')}`);
    return 1;
  }

  const story = await resolveStory(store, idPrefix, out);
  if (!story) return 1;

  await store.setStatus(story.id, parsed.data);
  out(`${story.id.slice(0, 12)}: ${story.status} -> ${parsed.data}`);
  return 0;
}

export async function jobCommand(store: StoryStore, idPrefix: string, out: Output): Promise<number> {
  const story = await resolveStory(store, idPrefix, out);
  if (!story) return 1;

  const job = await store.createVideoJob({ storyId: story.id });
  out(`Created video job #${job.id} (${job.status}) for ${story.id.slice(0, 12)}: ${story.title.slice(0, 60)}`);
  return 0;
}
