/**
 * Service-role Supabase access for the outfit gateway.
 *
 * Credentials come from SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY
 * (SUPABASE_SERVICE_ROLE is read as a fallback). Without them the client is
 * null and callers answer "Database not configured" instead of throwing.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';

const LOG_PREFIX = '[supabase]';

export interface SupabaseCredentials {
  url: string;
  serviceKey: string;
}

let client: SupabaseClient | null = null;

export function readSupabaseCredentials(env: NodeJS.ProcessEnv = process.env): SupabaseCredentials | null {
  const url = env.SUPABASE_URL;
  const serviceKey = env.SUPABASE_SERVICE_ROLE_KEY || env.SUPABASE_SERVICE_ROLE;
  if (!url || !serviceKey) return null;
  return { url, serviceKey };
}

/**
 * Shared client, created on first use. The gateway acts for many users with
 * the service key, so no auth session is kept.
 */
export function getSupabase(): SupabaseClient | null {
  if (client) return client;

  const credentials = readSupabaseCredentials();
  if (!credentials) {
    console.error(`${LOG_PREFIX} SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY not set; wardrobe reads unavailable`);
    return null;
  }

  client = createClient(credentials.url, credentials.serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false }
  });
  return client;
}

/**
 * Drop the cached client so the next call re-reads the environment.
 */
export function resetSupabaseClient(): void {
  client = null;
}
