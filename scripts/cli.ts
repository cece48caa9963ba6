#!/usr/bin/env node
/**
 * Shortwire — CLI
 *
 * Usage:
 *   npm run cli -- ingest [--dry-run]
 *   npm run cli -- list [--status new] [--source reddit] [--limit 20]
 *   npm run cli -- top [--limit 5]
 *   npm run cli -- show <id>
 *   npm run cli -- status <id> <new|scripted|voiced|rendered|published>
 *   npm run cli -- job <id>
 */

import 'dotenv/config';
import { loadConfig, type AppConfig } from '../src/lib/config';
import { logger, errorMessage } from '../src/lib/logger';
import { createSourceRegistry } from '../src/feeds';
import {
  MemoryStoryStore,
  SupabaseStoryStore,
  checkDatabaseHealth,
  createSupabaseClient,
  type StoryStore,
} from '../src/db';
import {
  ingestCommand,
  jobCommand,
  listCommand,
  showCommand,
  statusCommand,
  topCommand,
  type Output,
} from '../src/cli/commands';

// ============================================================
// ARGUMENTS
// ============================================================

interface CliArgs {
  command?: string;
  positional: string[];
  dryRun: boolean;
  status?: string;
  source?: string;
  limit?: number;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { positional: [], dryRun: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--dry-run') {
      args.dryRun = true;
    } else if (arg === '--status' && argv[i + 1]) {
      args.status = argv[++i];
    } else if (arg === '--source' && argv[i + 1]) {
      args.source = argv[++i];
    } else if (arg === '--limit' && argv[i + 1]) {
      args.limit = parseInt(argv[++i], 10);
    } else if (!args.command) {
      args.command = arg;
    } else {
      args.positional.push(arg);
    }
  }

  return args;
}

const USAGE = 'Usage: shortwire <ingest|list|top|show|status|job> [options]';

async function openStore(config: AppConfig, dryRun: boolean): Promise<StoryStore> {
  if (dryRun) return new MemoryStoryStore();

  const client = createSupabaseClient(config);
  const health = await checkDatabaseHealth(client);
  if (!health.healthy) {
    throw new Error(`Database unreachable: ${health.error ?? 'unknown error'}`);
  }
  return new SupabaseStoryStore(client);
}

// ============================================================
// MAIN
// ============================================================

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  const out: Output = line => console.log(line);

  if (!args.command) {
    out(USAGE);
    return 1;
  }

  const config = loadConfig();
  const limit = args.limit !== undefined && Number.isFinite(args.limit) ? args.limit : undefined;
  const [target, value] = args.positional;

  switch (args.command) {
    case 'ingest': {
      const store = await openStore(config, args.dryRun);
      return ingestCommand(
        { store, sources: createSourceRegistry(config), deadlineMs: config.ingest.deadlineMs },
        out
      );
    }
    case 'list':
      return listCommand(
        await openStore(config, false),
        { status: args.status, source: args.source, limit: limit ?? 20 },
        out
      );
    case 'top':
      return topCommand(await openStore(config, false), limit ?? 5, out);
    case 'show':
    case 'status':
    case 'job': {
      if (!target || (args.command === 'status' && !value)) {
        out(USAGE);
        return 1;
      }
      const store = await openStore(config, false);
      if (args.command === 'show') return showCommand(store, target, out);
      if (args.command === 'job') return jobCommand(store, target, out);
      return statusCommand(store, target, value, out);
    }
    default:
      out(`Unknown command "${args.command}".`);
      out(USAGE);
      return 1;
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Command failed', { error: errorMessage(error) });
    process.exitCode = 1;
  });
