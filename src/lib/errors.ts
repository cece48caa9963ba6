/**
 * Shortwire — Error Types
 */

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'HTTP_STATUS'
  | 'STORY_INVALID'
  | 'STORY_NOT_FOUND'
  | 'JOB_NOT_FOUND'
  | 'ID_AMBIGUOUS'
  | 'STORE_FAILED';

export class ShortwireError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends ShortwireError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

/**
 * Non-2xx response from an upstream source.
 */
export class HttpStatusError extends ShortwireError {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string) {
    super('HTTP_STATUS', `HTTP ${status} from ${url}`);
    this.status = status;
    this.url = url;
  }
}

export class StoryValidationError extends ShortwireError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('STORY_INVALID', `Invalid story: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class StoryNotFoundError extends ShortwireError {
  constructor(id: string) {
    super('STORY_NOT_FOUND', `No story with id ${id}`);
  }
}

export class VideoJobNotFoundError extends ShortwireError {
  constructor(id: number) {
    super('JOB_NOT_FOUND', `No video job with id ${id}`);
  }
}

export class AmbiguousIdError extends ShortwireError {
  readonly matches: string[];

  constructor(prefix: string, matches: string[]) {
    super('ID_AMBIGUOUS', `Id prefix "${prefix}" matches ${matches.length} stories`);
    this.matches = matches;
  }
}

/**
 * Wraps an error returned by the persistence client.
 */
export class StoreError extends ShortwireError {
  constructor(operation: string, error: unknown) {
    super('STORE_FAILED', `${operation} failed: ${describeStoreError(error)}`, { cause: error });
  }
}

function describeStoreError(error: unknown): string {
  if (error && typeof error === 'object' && 'message' in error) {
    const { message } = error;
    const code = 'code' in error ? error.code : undefined;
    return `${String(message)}${code ? ` (code: ${String(code)})` : ''}`;
  }
  return String(error);
}
