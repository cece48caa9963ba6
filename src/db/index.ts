/**
 * Shortwire — Persistence
 */

export { upsertMany, findByIdPrefix, type StoryStore, type UpsertSummary } from './store';
export { MemoryStoryStore } from './memory-store';
export { SupabaseStoryStore, storyToRow, rowToStory } from './queries';
export { createSupabaseClient, checkDatabaseHealth } from './client';
