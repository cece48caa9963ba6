/**
 * Shortwire — Type Exports
 */

export type {
  SourceName,
  StoryStatus,
  Story,
  VideoJobStatus,
  VideoJob,
  CreateVideoJobInput,
  VideoJobPatch,
} from './story';
export {
  SourceNameSchema,
  StoryStatusSchema,
  StorySchema,
  VideoJobStatusSchema,
  SOURCE_NAMES,
  parseStory,
  serializeStory,
  deserializeStory,
} from './story';
