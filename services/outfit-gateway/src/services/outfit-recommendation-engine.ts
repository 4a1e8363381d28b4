/**
 * Outfit Recommendation Engine
 *
 * Pure pipeline from (context signals, wardrobe snapshot) to a ranked list of
 * outfits:
 *
 *   sanitize -> synthesize -> retrieve + filter -> compose -> build -> score
 *
 * No I/O and no state between calls. The wardrobe arrives as raw records;
 * malformed ones are excluded and reported in diagnostics, never thrown.
 * Only an invalid context (weather, mood, events, date) throws.
 */

import { createHash } from 'crypto';
import { DEFAULT_ENGINE_CONFIG, EngineConfig } from '../config/engine-config';
import {
  CandidatePool,
  ExcludedItem,
  Movement,
  RecommendationResult,
  ScoredOutfit,
  WardrobeExclusionsInput
} from '../types/outfit-recommendation';
import { CATEGORIES, Category, WardrobeItem, WardrobeItemSchema } from '../types/wardrobe';
import { synthesize } from './context-synthesizer';
import { filterWithDiagnostics } from './contextual-filter';
import { buildOutfits } from './outfit-builder';
import { scoreOutfits } from './outfit-scorer';
import { emptyPool, retrieve } from './similarity-retriever';

const LOG_PREFIX = '[outfit-engine]';

export interface RecommendationRequest {
  events?: unknown;
  forecast: unknown;
  mood: unknown;
  wardrobe: readonly unknown[];
  /** YYYY-MM-DD */
  date?: string;
  location?: string | null;
  /** Overrides the movement level derived from the day's occasions */
  movement?: Movement;
  /** Items, colours and categories ruled out for this request */
  exclusions?: WardrobeExclusionsInput;
  config?: EngineConfig;
  /** Millisecond clock; drives the build timeout and the "today" fallback */
  now?: () => number;
}

export interface SanitizedWardrobe {
  items: WardrobeItem[];
  excluded: ExcludedItem[];
}

// =============================================================================
// Wardrobe Sanitization
// =============================================================================

function recordId(record: unknown): string | null {
  if (typeof record === 'object' && record !== null && 'id' in record && typeof record.id === 'string') {
    return record.id;
  }
  return null;
}

/**
 * Validate raw wardrobe records. Excluded: schema failures (including
 * non-finite numbers), embeddings of the wrong dimension, and repeated ids
 * (the first occurrence wins).
 */
export function sanitizeWardrobe(
  records: readonly unknown[],
  embeddingDimension: number = DEFAULT_ENGINE_CONFIG.embedding_dimension
): SanitizedWardrobe {
  const items: WardrobeItem[] = [];
  const excluded: ExcludedItem[] = [];
  const seen = new Set<string>();

  records.forEach((record, index) => {
    const parsed = WardrobeItemSchema.safeParse(record);
    if (!parsed.success) {
      excluded.push({
        item_id: recordId(record),
        index,
        reason: parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')
      });
      return;
    }

    const item = parsed.data;
    if (item.embedding.length !== embeddingDimension) {
      excluded.push({
        item_id: item.id,
        index,
        reason: `embedding has ${item.embedding.length} dimensions, expected ${embeddingDimension}`
      });
      return;
    }
    if (seen.has(item.id)) {
      excluded.push({ item_id: item.id, index, reason: 'duplicate id' });
      return;
    }

    seen.add(item.id);
    items.push(item);
  });

  if (excluded.length > 0) {
    console.warn(`${LOG_PREFIX} Excluded ${excluded.length}/${records.length} malformed wardrobe items`);
  }

  return { items, excluded };
}

// =============================================================================
// Pool Composition
// =============================================================================

/**
 * Per category: retrieved items that are also eligible, in retrieval order,
 * then the remaining eligible items in their original order. Nothing outside
 * the eligible pool gets through.
 */
export function composeCandidatePool(
  retrieved: CandidatePool,
  eligible: CandidatePool
): CandidatePool {
  const pool = emptyPool();
  for (const category of CATEGORIES) {
    const eligibleIds = new Set(eligible[category].map(item => item.id));
    const head = retrieved[category].filter(item => eligibleIds.has(item.id));
    const headIds = new Set(head.map(item => item.id));
    const tail = eligible[category].filter(item => !headIds.has(item.id));
    pool[category] = [...head, ...tail];
  }
  return pool;
}

function countPool(pool: CandidatePool): Record<Category, number> {
  return {
    top: pool.top.length,
    bottom: pool.bottom.length,
    one_piece: pool.one_piece.length,
    outerwear: pool.outerwear.length,
    footwear: pool.footwear.length,
    accessory: pool.accessory.length
  };
}

export function determinismHash(outfits: readonly ScoredOutfit[]): string {
  const content = outfits.map(o => `${o.id}:${o.scores.combined.toFixed(6)}`).join('|');
  return createHash('sha256').update(content).digest('hex').substring(0, 16);
}

// =============================================================================
// Pipeline
// =============================================================================

/**
 * Run the full pipeline for one request.
 *
 * @throws InvalidContextError when the context signals are missing or malformed
 */
export function recommendOutfits(request: RecommendationRequest): RecommendationResult {
  const config = request.config ?? DEFAULT_ENGINE_CONFIG;
  const now = request.now ?? Date.now;

  const { items, excluded } = sanitizeWardrobe(request.wardrobe, config.embedding_dimension);

  const directive = synthesize(request.events, request.forecast, request.mood, {
    date: request.date,
    location: request.location,
    movement: request.movement,
    config,
    now: () => new Date(now())
  });

  const retrieved = retrieve(directive, items, config.retrieval_k);
  const { pool: eligible, removed } = filterWithDiagnostics(directive, items, request.exclusions);
  const pool = composeCandidatePool(retrieved, eligible);

  const build = buildOutfits(directive, pool, config.max_outfits, { config, now });
  const outfits = scoreOutfits(directive, build.outfits, config.weights);

  console.log(
    `${LOG_PREFIX} ${outfits.length} outfits from ${items.length} items ` +
    `(warnings=${build.warnings.length}, truncated=${build.truncated})`
  );

  return {
    directive,
    outfits,
    warnings: build.warnings,
    truncated: build.truncated,
    diagnostics: {
      input_count: request.wardrobe.length,
      usable_count: items.length,
      excluded_items: excluded,
      filter_removed: removed,
      retrieved_counts: countPool(retrieved),
      pool_counts: countPool(pool),
      explored: build.explored,
      determinism_hash: determinismHash(outfits)
    }
  };
}
