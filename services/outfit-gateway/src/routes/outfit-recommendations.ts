/**
 * Outfit Recommendation Routes
 *
 * Endpoints:
 * - GET    /api/v1/outfits                  - Service info
 * - GET    /api/v1/outfits/health           - Health check
 * - GET    /api/v1/outfits/taxonomy         - Controlled vocabularies
 * - POST   /api/v1/outfits/recommend        - Recommend from the stored wardrobe
 * - POST   /api/v1/outfits/preview          - Recommend from an inline wardrobe
 * - GET    /api/v1/outfits/items/:id        - Single wardrobe item
 *
 * The engine is pure; this layer owns auth, wardrobe reads, config merging,
 * the critic pass and event emission.
 */

import { Router, Request, Response } from 'express';
import {
  EngineConfig,
  EngineConfigOverrides,
  loadEngineConfig,
  mergeEngineConfig
} from '../config/engine-config';
import { InvalidContextError } from '../lib/errors';
import { applyCritic, createRecentlyWornCritic, passthroughCritic } from '../services/outfit-critic';
import { recommendOutfits } from '../services/outfit-recommendation-engine';
import { emitRecommendationEvent } from '../services/recommendation-event-service';
import { SupabaseWardrobeSource, WardrobeSource } from '../services/wardrobe-source';
import {
  Movement,
  PreviewRequestSchema,
  RecommendationResult,
  RecommendRequestSchema,
  WardrobeExclusions
} from '../types/outfit-recommendation';
import {
  Category,
  Mood,
  OccasionTag,
  Season,
  SeasonTag,
  StyleTag,
  WeatherTag
} from '../types/wardrobe';

const LOG_PREFIX = '[outfit-routes]';

export interface OutfitRouterDeps {
  wardrobeSource?: WardrobeSource;
  config?: EngineConfig;
}

interface RecommendationInput {
  user_id: string | null;
  date?: string;
  location?: string;
  mood?: unknown;
  events?: unknown;
  forecast?: unknown;
  movement?: Movement;
  exclusions?: WardrobeExclusions;
  config?: EngineConfigOverrides;
  avoid_repeat_days?: number;
  wardrobe: readonly unknown[];
}

interface HandlerResult {
  status: number;
  body: Record<string, unknown>;
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Extract Bearer token from Authorization header.
 */
function getBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }
  return authHeader.slice(7);
}

/**
 * Check if running in dev sandbox mode
 */
function isDevSandbox(): boolean {
  const env = (process.env.ENVIRONMENT || '').toLowerCase();
  return env.includes('dev') || env.includes('sandbox');
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

async function runRecommendation(
  input: RecommendationInput,
  baseConfig: EngineConfig
): Promise<HandlerResult> {
  const config = mergeEngineConfig(baseConfig, input.config);

  let result: RecommendationResult;
  try {
    result = recommendOutfits({
      events: input.events,
      forecast: input.forecast,
      mood: input.mood,
      wardrobe: input.wardrobe,
      date: input.date,
      movement: input.movement,
      exclusions: input.exclusions,
      location: input.location,
      config
    });
  } catch (err) {
    if (err instanceof InvalidContextError) {
      await emitRecommendationEvent({
        type: 'outfit.recommendation.invalid_context',
        user_id: input.user_id,
        status: 'warning',
        message: `Invalid context: ${err.code}`,
        payload: { code: err.code, details: err.details }
      });
      return {
        status: 400,
        body: { ok: false, error: 'INVALID_CONTEXT', code: err.code, message: err.message, details: err.details }
      };
    }
    throw err;
  }

  const critic = input.avoid_repeat_days
    ? createRecentlyWornCritic(input.avoid_repeat_days)
    : passthroughCritic;
  const review = await applyCritic(critic, result.directive, result.outfits);

  await emitRecommendationEvent({
    type: review.outfits.length > 0 ? 'outfit.recommendation.served' : 'outfit.recommendation.empty',
    user_id: input.user_id,
    status: review.outfits.length > 0 ? 'success' : 'warning',
    message: `${review.outfits.length} outfits for ${result.directive.effective_date}`,
    payload: {
      outfit_ids: review.outfits.map(o => o.id),
      warnings: result.warnings.map(w => w.kind),
      truncated: result.truncated,
      determinism_hash: result.diagnostics.determinism_hash
    }
  });

  return {
    status: 200,
    body: {
      ok: true,
      directive: result.directive,
      outfits: review.outfits,
      warnings: result.warnings,
      truncated: result.truncated,
      critic: { name: review.critic, rejected: review.rejected },
      diagnostics: result.diagnostics
    }
  };
}

// =============================================================================
// Router
// =============================================================================

export function createOutfitRecommendationsRouter(deps: OutfitRouterDeps = {}): Router {
  const router = Router();
  const wardrobeSource = deps.wardrobeSource ?? new SupabaseWardrobeSource();
  const baseConfig = deps.config ?? loadEngineConfig();

  /**
   * GET / -> GET /api/v1/outfits
   */
  router.get('/', (_req: Request, res: Response) => {
    return res.status(200).json({
      ok: true,
      service: 'outfit-recommendations',
      endpoints: [
        'GET /health',
        'GET /taxonomy',
        'POST /recommend',
        'POST /preview',
        'GET /items/:id'
      ]
    });
  });

  router.get('/health', (_req: Request, res: Response) => {
    return res.status(200).json({
      ok: true,
      status: 'healthy',
      service: 'outfit-recommendations',
      timestamp: new Date().toISOString()
    });
  });

  router.get('/taxonomy', (_req: Request, res: Response) => {
    return res.status(200).json({
      ok: true,
      categories: Category.options,
      seasons: Season.options,
      season_tags: SeasonTag.options,
      style_tags: StyleTag.options,
      occasion_tags: OccasionTag.options,
      weather_tags: WeatherTag.options,
      moods: Mood.options
    });
  });

  /**
   * POST /recommend -> POST /api/v1/outfits/recommend
   *
   * Reads the user's wardrobe and returns ranked outfits for the given context.
   */
  router.post('/recommend', async (req: Request, res: Response) => {
    console.log(`${LOG_PREFIX} POST /recommend`);

    const token = getBearerToken(req);
    if (!token && !isDevSandbox()) {
      return res.status(401).json({ ok: false, error: 'UNAUTHENTICATED' });
    }

    const validation = RecommendRequestSchema.safeParse(req.body);
    if (!validation.success) {
      console.warn(`${LOG_PREFIX} Validation failed:`, validation.error.errors);
      return res.status(400).json({
        ok: false,
        error: 'Validation failed',
        details: validation.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')
      });
    }

    try {
      const body = validation.data;
      const wardrobe = await wardrobeSource.queryByFilters(body.user_id, body.filters);
      if (!wardrobe.ok) {
        return res.status(502).json({
          ok: false,
          error: 'WARDROBE_UNAVAILABLE',
          message: wardrobe.error
        });
      }

      const result = await runRecommendation(
        { ...body, wardrobe: wardrobe.items },
        baseConfig
      );
      return res.status(result.status).json(result.body);
    } catch (err) {
      console.error(`${LOG_PREFIX} recommend error:`, errorMessage(err));
      return res.status(502).json({
        ok: false,
        error: 'INTERNAL_ERROR',
        message: errorMessage(err)
      });
    }
  });

  /**
   * POST /preview -> POST /api/v1/outfits/preview
   *
   * Same pipeline against an inline wardrobe. Nothing is read from storage.
   */
  router.post('/preview', async (req: Request, res: Response) => {
    console.log(`${LOG_PREFIX} POST /preview`);

    const token = getBearerToken(req);
    if (!token && !isDevSandbox()) {
      return res.status(401).json({ ok: false, error: 'UNAUTHENTICATED' });
    }

    const validation = PreviewRequestSchema.safeParse(req.body);
    if (!validation.success) {
      console.warn(`${LOG_PREFIX} Validation failed:`, validation.error.errors);
      return res.status(400).json({
        ok: false,
        error: 'Validation failed',
        details: validation.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')
      });
    }

    try {
      const result = await runRecommendation(
        { ...validation.data, user_id: null },
        baseConfig
      );
      return res.status(result.status).json(result.body);
    } catch (err) {
      console.error(`${LOG_PREFIX} preview error:`, errorMessage(err));
      return res.status(502).json({
        ok: false,
        error: 'INTERNAL_ERROR',
        message: errorMessage(err)
      });
    }
  });

  /**
   * GET /items/:id?user_id= -> GET /api/v1/outfits/items/:id
   */
  router.get('/items/:id', async (req: Request, res: Response) => {
    const token = getBearerToken(req);
    if (!token && !isDevSandbox()) {
      return res.status(401).json({ ok: false, error: 'UNAUTHENTICATED' });
    }

    const userId = typeof req.query.user_id === 'string' ? req.query.user_id : '';
    if (!userId) {
      return res.status(400).json({ ok: false, error: 'Validation failed', details: 'user_id: Required' });
    }

    try {
      const result = await wardrobeSource.queryById(userId, req.params.id);
      if (!result.ok) {
        return res.status(502).json({ ok: false, error: 'WARDROBE_UNAVAILABLE', message: result.error });
      }
      if (!result.item) {
        return res.status(404).json({ ok: false, error: 'NOT_FOUND' });
      }
      return res.status(200).json({ ok: true, item: result.item });
    } catch (err) {
      console.error(`${LOG_PREFIX} item lookup error:`, errorMessage(err));
      return res.status(502).json({ ok: false, error: 'INTERNAL_ERROR', message: errorMessage(err) });
    }
  });

  return router;
}
