/**
 * Wardrobe Source
 *
 * Read access to a user's wardrobe for the recommendation routes. The engine
 * never talks to storage; routes fetch a snapshot through a WardrobeSource
 * and hand it over.
 *
 * Rows are validated against the item schema on the way out. A row that does
 * not validate is dropped with a warning rather than failing the read.
 */

import { getSupabase } from '../lib/supabase';
import {
  WardrobeFilters,
  WardrobeItem,
  WardrobeItemSchema
} from '../types/wardrobe';

const LOG_PREFIX = '[wardrobe-source]';

export const WARDROBE_TABLE = 'wardrobe_items';
const DEFAULT_LIMIT = 500;

export interface WardrobeQueryResult {
  ok: boolean;
  items: WardrobeItem[];
  /** Rows that failed validation */
  dropped: number;
  error?: string;
}

export interface WardrobeItemResult {
  ok: boolean;
  item: WardrobeItem | null;
  error?: string;
}

export interface WardrobeSource {
  queryByFilters(userId: string, filters?: WardrobeFilters): Promise<WardrobeQueryResult>;
  queryById(userId: string, itemId: string): Promise<WardrobeItemResult>;
}

function parseRows(rows: readonly unknown[]): { items: WardrobeItem[]; dropped: number } {
  const items: WardrobeItem[] = [];
  let dropped = 0;

  for (const row of rows) {
    const parsed = WardrobeItemSchema.safeParse(row);
    if (parsed.success) {
      items.push(parsed.data);
    } else {
      dropped++;
      console.warn(
        `${LOG_PREFIX} Dropping malformed row: ` +
        parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')
      );
    }
  }

  return { items, dropped };
}

/**
 * WardrobeSource backed by the wardrobe_items table.
 */
export class SupabaseWardrobeSource implements WardrobeSource {
  async queryByFilters(userId: string, filters: WardrobeFilters = {}): Promise<WardrobeQueryResult> {
    const supabase = getSupabase();
    if (!supabase) {
      return { ok: false, items: [], dropped: 0, error: 'Database not configured' };
    }

    let query = supabase
      .from(WARDROBE_TABLE)
      .select('*')
      .eq('user_id', userId);

    if (filters.categories && filters.categories.length > 0) {
      query = query.in('category', filters.categories);
    }
    if (filters.season_tags && filters.season_tags.length > 0) {
      query = query.overlaps('season_tags', filters.season_tags);
    }
    if (filters.style_tags && filters.style_tags.length > 0) {
      query = query.overlaps('style_tags', filters.style_tags);
    }

    const { data, error } = await query
      .order('id', { ascending: true })
      .limit(filters.limit ?? DEFAULT_LIMIT);

    if (error) {
      console.error(`${LOG_PREFIX} Query failed for user ${userId}: ${error.message}`);
      return { ok: false, items: [], dropped: 0, error: error.message };
    }

    const rows: unknown[] = data ?? [];
    const { items, dropped } = parseRows(rows);
    console.log(`${LOG_PREFIX} Loaded ${items.length} items for user ${userId} (dropped=${dropped})`);
    return { ok: true, items, dropped };
  }

  async queryById(userId: string, itemId: string): Promise<WardrobeItemResult> {
    const supabase = getSupabase();
    if (!supabase) {
      return { ok: false, item: null, error: 'Database not configured' };
    }

    const { data, error } = await supabase
      .from(WARDROBE_TABLE)
      .select('*')
      .eq('user_id', userId)
      .eq('id', itemId)
      .limit(1);

    if (error) {
      console.error(`${LOG_PREFIX} Lookup failed for ${itemId}: ${error.message}`);
      return { ok: false, item: null, error: error.message };
    }

    const rows: unknown[] = data ?? [];
    const { items } = parseRows(rows);
    return { ok: true, item: items[0] ?? null };
  }
}
