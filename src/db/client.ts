/**
 * Shortwire — Supabase Client
 *
 * Built from AppConfig at startup. Uses the service role key: the
 * pipeline runs as a trusted background job, not as an end user.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from '../lib/config';
import { ConfigError } from '../lib/errors';

export function createSupabaseClient(config: AppConfig): SupabaseClient {
  const { url, serviceRoleKey } = config.supabase;

  if (!url) {
    throw new ConfigError('Missing SUPABASE_URL environment variable');
  }
  if (!serviceRoleKey) {
    throw new ConfigError('Missing SUPABASE_SERVICE_ROLE_KEY environment variable');
  }

  return createClient(url, serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

/**
 * Check if the database connection is healthy
 */
export async function checkDatabaseHealth(client: SupabaseClient): Promise<{
  healthy: boolean;
  latencyMs: number;
  error?: string;
}> {
  const start = Date.now();
  try {
    const { error } = await client.from('stories').select('id').limit(1);
    const latencyMs = Date.now() - start;

    if (error) {
      return { healthy: false, latencyMs, error: error.message };
    }

    return { healthy: true, latencyMs };
  } catch (err) {
    return {
      healthy: false,
      latencyMs: Date.now() - start,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}
