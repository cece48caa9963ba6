/**
 * Shortwire — Public API
 */

export * from './types';
export * from './feeds';
export * from './db';
export { loadConfig, parseList, type AppConfig, type HttpConfig } from './lib/config';
export { logger, errorMessage, type Logger, type LogLevel } from './lib/logger';
export {
  ShortwireError,
  ConfigError,
  HttpStatusError,
  StoryValidationError,
  StoryNotFoundError,
  VideoJobNotFoundError,
  AmbiguousIdError,
  StoreError,
  type ErrorCode,
} from './lib/errors';
