/**
 * Shortwire — Configuration
 *
 * Validates the environment once and produces an explicit AppConfig
 * that is handed to the registry, each source and the store.
 */

import { z } from 'zod';
import { SourceNameSchema, SOURCE_NAMES, type SourceName } from '../types';
import { ConfigError } from './errors';

/**
 * Split a comma-separated list, trimming and dropping empty entries.
 */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

const commaList = (fallback: string) =>
  z
    .string()
    .optional()
    .transform(value => parseList(value ?? fallback));

// Empty strings in .env files mean "unset" for scalar settings. Lists keep
// them: an empty keyword list is how a keyword-gated source is switched off.
const scalar = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(value => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema);

const EnvSchema = z.object({
  SOURCES: commaList(SOURCE_NAMES.join(',')).pipe(z.array(SourceNameSchema)),
  REDDIT_SUBREDDITS: commaList('technology,programming,machinelearning,artificial,LocalLLaMA'),
  FOURCHAN_KEYWORDS: commaList(
    'AI,LLM,GPU,linux,rust,python,open source,self-hosted,homelab,programming'
  ),
  X_KEYWORDS: commaList(
    'AI breakthrough,new programming language,open source release,tech layoffs,GPU,LLM'
  ),
  NITTER_BASE_URL: scalar(z.string().url().default('https://nitter.net')),
  HTTP_TIMEOUT_MS: scalar(z.coerce.number().int().positive().default(20000)),
  SUBFETCH_CONCURRENCY: scalar(z.coerce.number().int().min(1).max(10).default(5)),
  INGEST_DEADLINE_MS: scalar(z.coerce.number().int().min(0).default(120000)),
  SUPABASE_URL: scalar(z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: scalar(z.string().min(1).optional()),
});

export interface HttpConfig {
  timeoutMs: number;
  subfetchConcurrency: number;
}

export interface AppConfig {
  sources: {
    enabled: SourceName[];
    redditSubreddits: string[];
    fourchanKeywords: string[];
    xKeywords: string[];
    nitterBaseUrl: string;
  };
  http: HttpConfig;
  ingest: {
    /** 0 disables the overall deadline */
    deadlineMs: number;
  };
  supabase: {
    url?: string;
    serviceRoleKey?: string;
  };
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const parsed = result.data;

  return {
    sources: {
      enabled: [...new Set(parsed.SOURCES)],
      redditSubreddits: parsed.REDDIT_SUBREDDITS,
      fourchanKeywords: parsed.FOURCHAN_KEYWORDS,
      xKeywords: parsed.X_KEYWORDS,
      nitterBaseUrl: parsed.NITTER_BASE_URL.replace(/\/+$/, ''),
    },
    http: {
      timeoutMs: parsed.HTTP_TIMEOUT_MS,
      subfetchConcurrency: parsed.SUBFETCH_CONCURRENCY,
    },
    ingest: {
      deadlineMs: parsed.INGEST_DEADLINE_MS,
    },
    supabase: {
      url: parsed.SUPABASE_URL,
      serviceRoleKey: parsed.SUPABASE_SERVICE_ROLE_KEY,
    },
  };
}
