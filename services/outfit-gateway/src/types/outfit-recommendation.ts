/**
 * Outfit Recommendation Types
 *
 * Records flowing through the recommendation pipeline:
 *
 *   CalendarEvent[] + WeatherForecast + mood
 *        -> ContextDirective
 *        -> CandidatePool (retrieval, filtering)
 *        -> OutfitCandidate[] (builder)
 *        -> ScoredOutfit[] (scorer)
 *
 * Everything the engine returns is fully resolved (concrete items, no ids
 * needing a second lookup) and JSON-serialisable.
 */

import { z } from 'zod';
import {
  Category,
  Mood,
  OccasionTag,
  Season,
  StyleTag,
  WardrobeFiltersSchema,
  WardrobeItem
} from './wardrobe';
import { EngineConfigOverridesSchema } from '../config/engine-config';

// =============================================================================
// Context Inputs
// =============================================================================

/**
 * A calendar event already classified into an occasion.
 */
export const CalendarEventSchema = z.object({
  occasion_tag: OccasionTag,
  start_time: z.string().datetime({ offset: true }),
  end_time: z.string().datetime({ offset: true }),
  title: z.string().optional()
});
export type CalendarEvent = z.infer<typeof CalendarEventSchema>;

/**
 * Normalised daily forecast. Temperatures in degrees Celsius, wind in km/h.
 */
export const WeatherForecastSchema = z.object({
  temp_min: z.number().finite(),
  temp_max: z.number().finite(),
  precipitation_probability: z.number().min(0).max(1),
  wind_speed: z.number().min(0)
}).refine(f => f.temp_min <= f.temp_max, {
  message: 'temp_min must not exceed temp_max',
  path: ['temp_min']
});
export type WeatherForecast = z.infer<typeof WeatherForecastSchema>;

// =============================================================================
// Context Directive
// =============================================================================

export type WarmthRequirement = 'low' | 'medium' | 'high';

/**
 * How much walking or activity the day involves. High movement rules out
 * footwear you cannot move in.
 */
export const Movement = z.enum(['low', 'high']);
export type Movement = z.infer<typeof Movement>;

export interface WeatherSummary {
  readonly temp_min: number;
  readonly temp_max: number;
  readonly precipitation_probability: number;
  readonly wind_speed: number;
  readonly precipitation: boolean;
  readonly windy: boolean;
}

export interface RequiredLayers {
  readonly outerwear: boolean;
  readonly rain_footwear: boolean;
}

/**
 * The single normalised input to retrieval, filtering, building and scoring.
 * Built once per request and frozen.
 */
export interface ContextDirective {
  readonly effective_date: string;
  readonly location: string | null;
  readonly mood: Mood;
  readonly season: Season;
  readonly weather: WeatherSummary;
  readonly warmth_requirement: WarmthRequirement;
  readonly required_layers: RequiredLayers;
  readonly occasion_tags: readonly OccasionTag[];
  readonly governing_occasion: OccasionTag;
  readonly movement: Movement;
  readonly palette_bias: readonly string[];
  readonly mood_style_tags: readonly StyleTag[];
}

// =============================================================================
// Request Exclusions
// =============================================================================

/**
 * Per-request hard exclusions, applied by the contextual filter alongside
 * the directive's rules.
 */
export const WardrobeExclusionsSchema = z.object({
  item_ids: z.array(z.string().min(1)).max(500).default([]),
  disliked_colors: z.array(z.string().min(1)).max(50).default([]),
  avoid_categories: z.array(Category).default([])
});
export type WardrobeExclusions = z.infer<typeof WardrobeExclusionsSchema>;
export type WardrobeExclusionsInput = z.input<typeof WardrobeExclusionsSchema>;

// =============================================================================
// Candidate Pool & Outfits
// =============================================================================

/**
 * Per-category candidate lists. Order within a category is meaningful:
 * relevance order from retrieval, input order from filtering.
 */
export type CandidatePool = Record<Category, WardrobeItem[]>;

export type OutfitShape = 'separates' | 'one_piece';

/**
 * Single-item slots. Accessories are handled separately (zero or more).
 */
export type CoreSlot = 'top' | 'bottom' | 'one_piece' | 'footwear' | 'outerwear';

export interface OutfitSlots {
  top?: WardrobeItem;
  bottom?: WardrobeItem;
  one_piece?: WardrobeItem;
  footwear?: WardrobeItem;
  outerwear?: WardrobeItem;
  accessories: WardrobeItem[];
}

export interface OutfitCandidate {
  /** Deterministic: derived from the item ids */
  id: string;
  /** Position in which the builder produced the outfit (0-based) */
  construction_order: number;
  shape: OutfitShape;
  slots: OutfitSlots;
  /** All items in slot order, accessories last */
  items: WardrobeItem[];
  /** Sum of per-slot candidate positions; lower is more relevant */
  relevance_rank: number;
}

export type HarmonyScheme =
  | 'monochrome'
  | 'complementary'
  | 'analogous'
  | 'neutral'
  | 'fallback_few'
  | 'fallback_many'
  | 'none';

export interface OutfitScores {
  color_harmony: number;
  harmony_scheme: HarmonyScheme;
  context_fit: number;
  diversity: number;
  combined: number;
}

export interface ScoredOutfit extends OutfitCandidate {
  scores: OutfitScores;
}

// =============================================================================
// Warnings
// =============================================================================

/**
 * A mandated slot had no eligible items. Non-fatal: the caller may relax
 * constraints or ask the user to add inventory.
 */
export interface EmptyCandidatePoolWarning {
  kind: 'empty_candidate_pool';
  slot: CoreSlot;
  shape: OutfitShape;
  message: string;
}

/**
 * The builder hit its expansion or wall-clock bound. Results are partial.
 */
export interface ConstructionTimeout {
  kind: 'construction_timeout';
  explored: number;
  elapsed_ms: number;
  message: string;
}

export type RecommendationWarning = EmptyCandidatePoolWarning | ConstructionTimeout;

export interface BuildResult {
  outfits: OutfitCandidate[];
  warnings: RecommendationWarning[];
  truncated: boolean;
  /** Nodes popped from the search frontier */
  explored: number;
}

// =============================================================================
// Pipeline Result
// =============================================================================

export interface ExcludedItem {
  item_id: string | null;
  index: number;
  reason: string;
}

export interface RecommendationDiagnostics {
  input_count: number;
  usable_count: number;
  excluded_items: ExcludedItem[];
  /** item id -> reason the contextual filter removed it */
  filter_removed: Record<string, string>;
  retrieved_counts: Record<Category, number>;
  pool_counts: Record<Category, number>;
  explored: number;
  /** sha256 over outfit ids and combined scores, 16 hex chars */
  determinism_hash: string;
}

export interface RecommendationResult {
  directive: ContextDirective;
  outfits: ScoredOutfit[];
  warnings: RecommendationWarning[];
  truncated: boolean;
  diagnostics: RecommendationDiagnostics;
}

// =============================================================================
// API Requests
// =============================================================================

const RequestContextShape = {
  date: z.string().max(32).optional(),
  location: z.string().min(1).max(200).optional(),
  // date, mood, events and forecast are validated by the synthesizer so that
  // a bad context surfaces as INVALID_CONTEXT with its specific code
  mood: z.unknown(),
  events: z.unknown(),
  forecast: z.unknown(),
  movement: Movement.optional(),
  exclusions: WardrobeExclusionsSchema.optional(),
  config: EngineConfigOverridesSchema.optional(),
  avoid_repeat_days: z.number().int().min(1).max(60).optional()
};

/**
 * POST /api/v1/outfits/recommend
 */
export const RecommendRequestSchema = z.object({
  user_id: z.string().min(1),
  filters: WardrobeFiltersSchema.optional(),
  ...RequestContextShape
});
export type RecommendRequest = z.infer<typeof RecommendRequestSchema>;

/**
 * POST /api/v1/outfits/preview
 *
 * Wardrobe records are passed through unvalidated; the engine validates each
 * one and reports the malformed ones instead of rejecting the request.
 */
export const PreviewRequestSchema = z.object({
  wardrobe: z.array(z.unknown()).max(2000),
  ...RequestContextShape
});
export type PreviewRequest = z.infer<typeof PreviewRequestSchema>;
