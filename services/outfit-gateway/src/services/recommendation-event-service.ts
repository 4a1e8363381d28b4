/**
 * Recommendation Event Service
 *
 * Best-effort audit trail of served recommendations, written to the
 * recommendation_events table over the Supabase REST API. Emission failures
 * are logged and returned, never thrown into the request.
 */

import { randomUUID } from 'crypto';
import { readSupabaseCredentials } from '../lib/supabase';

const LOG_PREFIX = '[recommendation-event]';

export type RecommendationEventType =
  | 'outfit.recommendation.served'
  | 'outfit.recommendation.empty'
  | 'outfit.recommendation.invalid_context';

export interface RecommendationEvent {
  type: RecommendationEventType;
  user_id: string | null;
  status: 'info' | 'success' | 'warning' | 'error';
  message: string;
  payload?: Record<string, unknown>;
}

export interface EmitResult {
  ok: boolean;
  event_id?: string;
  error?: string;
}

export async function emitRecommendationEvent(event: RecommendationEvent): Promise<EmitResult> {
  const credentials = readSupabaseCredentials();
  if (!credentials) {
    console.warn(`${LOG_PREFIX} Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY, event not recorded`);
    return { ok: false, error: 'Gateway misconfigured: missing Supabase credentials' };
  }
  const { url: supabaseUrl, serviceKey: supabaseKey } = credentials;

  const eventId = randomUUID();
  const payload = {
    id: eventId,
    created_at: new Date().toISOString(),
    topic: event.type,
    service: 'outfit-gateway',
    user_id: event.user_id,
    status: event.status,
    message: event.message,
    metadata: event.payload || {},
  };

  try {
    const response = await fetch(`${supabaseUrl}/rest/v1/recommendation_events`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'apikey': supabaseKey,
        'Authorization': `Bearer ${supabaseKey}`,
        'Prefer': 'return=minimal',
      },
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      const errorText = await response.text();
      console.error(`${LOG_PREFIX} Failed to emit event: ${response.status} - ${errorText}`);
      return { ok: false, error: `Failed to emit event: ${response.status}` };
    }

    console.log(`${LOG_PREFIX} Emitted: ${event.type} (${eventId})`);
    return { ok: true, event_id: eventId };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    console.error(`${LOG_PREFIX} Error emitting event: ${errorMessage}`);
    return { ok: false, error: errorMessage };
  }
}
