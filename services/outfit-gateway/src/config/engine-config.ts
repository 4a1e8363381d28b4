/**
 * Recommendation Engine Configuration
 *
 * Resolution order (later wins):
 *   1. DEFAULT_ENGINE_CONFIG
 *   2. Deployment tier overrides (development / staging / production)
 *   3. OUTFIT_* environment variables
 *   4. Per-request overrides (mergeEngineConfig)
 *
 * Every stage is validated against EngineConfigSchema.
 */

import { z } from 'zod';

const LOG_PREFIX = '[engine-config]';

// =============================================================================
// Schema
// =============================================================================

export const ScoringWeightsSchema = z.object({
  color_harmony: z.number().min(0).max(1),
  context_fit: z.number().min(0).max(1),
  diversity: z.number().min(0).max(1)
});
export type ScoringWeights = z.infer<typeof ScoringWeightsSchema>;

export const EngineConfigSchema = z.object({
  /** Retrieval breadth: top-k items per category */
  retrieval_k: z.number().int().min(1).max(100),
  max_outfits: z.number().int().min(1).max(20),
  max_accessories: z.number().int().min(0).max(5),
  /** Candidates considered per slot; search budget is max_outfits x branching_factor */
  branching_factor: z.number().int().min(1).max(20),
  build_timeout_ms: z.number().int().min(1).max(10000),
  embedding_dimension: z.number().int().min(8).max(4096),
  weights: ScoringWeightsSchema,
  /** Outerwear required when temp_max is below this */
  outerwear_temp_threshold_c: z.number().finite(),
  /** High warmth requirement when temp_max is below this */
  cold_temp_threshold_c: z.number().finite(),
  /** Outerwear and rain footwear required when precipitation probability exceeds this */
  precipitation_threshold: z.number().min(0).max(1),
  wind_threshold_kmh: z.number().min(0),
  hemisphere: z.enum(['north', 'south'])
});
export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const EngineConfigOverridesSchema = EngineConfigSchema
  .extend({ weights: ScoringWeightsSchema.partial() })
  .partial()
  .strict();
export type EngineConfigOverrides = z.infer<typeof EngineConfigOverridesSchema>;

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  retrieval_k: 8,
  max_outfits: 3,
  max_accessories: 2,
  branching_factor: 4,
  build_timeout_ms: 250,
  embedding_dimension: 128,
  weights: {
    color_harmony: 0.4,
    context_fit: 0.4,
    diversity: 0.2
  },
  outerwear_temp_threshold_c: 12,
  cold_temp_threshold_c: 5,
  precipitation_threshold: 0.5,
  wind_threshold_kmh: 30,
  hemisphere: 'north'
};

export type DeploymentTier = 'development' | 'staging' | 'production';

const TIER_OVERRIDES: Record<DeploymentTier, EngineConfigOverrides> = {
  development: {
    build_timeout_ms: 1000
  },
  staging: {},
  production: {
    build_timeout_ms: 150,
    retrieval_k: 6
  }
};

type NumericConfigKey = Exclude<keyof EngineConfig, 'weights' | 'hemisphere'>;

const NUMERIC_ENV_KEYS: ReadonlyArray<[string, NumericConfigKey]> = [
  ['OUTFIT_RETRIEVAL_K', 'retrieval_k'],
  ['OUTFIT_MAX_OUTFITS', 'max_outfits'],
  ['OUTFIT_MAX_ACCESSORIES', 'max_accessories'],
  ['OUTFIT_BRANCHING_FACTOR', 'branching_factor'],
  ['OUTFIT_BUILD_TIMEOUT_MS', 'build_timeout_ms'],
  ['OUTFIT_EMBEDDING_DIMENSION', 'embedding_dimension'],
  ['OUTFIT_OUTERWEAR_TEMP_C', 'outerwear_temp_threshold_c'],
  ['OUTFIT_COLD_TEMP_C', 'cold_temp_threshold_c'],
  ['OUTFIT_PRECIPITATION_THRESHOLD', 'precipitation_threshold'],
  ['OUTFIT_WIND_THRESHOLD_KMH', 'wind_threshold_kmh']
];

const WEIGHT_ENV_KEYS: ReadonlyArray<[string, keyof ScoringWeights]> = [
  ['OUTFIT_WEIGHT_COLOR_HARMONY', 'color_harmony'],
  ['OUTFIT_WEIGHT_CONTEXT_FIT', 'context_fit'],
  ['OUTFIT_WEIGHT_DIVERSITY', 'diversity']
];

// =============================================================================
// Resolution
// =============================================================================

export function resolveDeploymentTier(env: NodeJS.ProcessEnv = process.env): DeploymentTier {
  const raw = (env.ENVIRONMENT || env.NODE_ENV || '').toLowerCase();
  if (raw.includes('prod')) return 'production';
  if (raw.includes('staging')) return 'staging';
  return 'development';
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    console.warn(`${LOG_PREFIX} Ignoring ${name}: "${raw}" is not a number`);
    return undefined;
  }
  return value;
}

/**
 * Read OUTFIT_* environment variables into an overrides object.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): EngineConfigOverrides {
  const overrides: EngineConfigOverrides = {};

  for (const [name, key] of NUMERIC_ENV_KEYS) {
    const value = readNumber(env, name);
    if (value !== undefined) {
      overrides[key] = value;
    }
  }

  const weights: Partial<ScoringWeights> = {};
  for (const [name, key] of WEIGHT_ENV_KEYS) {
    const value = readNumber(env, name);
    if (value !== undefined) {
      weights[key] = value;
    }
  }
  if (Object.keys(weights).length > 0) {
    overrides.weights = weights;
  }

  const hemisphere = env.OUTFIT_HEMISPHERE?.toLowerCase();
  if (hemisphere === 'north' || hemisphere === 'south') {
    overrides.hemisphere = hemisphere;
  } else if (hemisphere) {
    console.warn(`${LOG_PREFIX} Ignoring OUTFIT_HEMISPHERE: "${hemisphere}"`);
  }

  return overrides;
}

function withoutUndefined(value: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(value).filter(([, v]) => v !== undefined)
  );
}

/**
 * Merge overrides onto a base config. Throws a ZodError when the result is
 * out of range.
 */
export function mergeEngineConfig(
  base: EngineConfig,
  overrides: EngineConfigOverrides = {}
): EngineConfig {
  const { weights, ...rest } = overrides;
  return EngineConfigSchema.parse({
    ...base,
    ...withoutUndefined(rest),
    weights: { ...base.weights, ...withoutUndefined(weights ?? {}) }
  });
}

/**
 * Full configuration for the current process.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const tier = resolveDeploymentTier(env);
  const tiered = mergeEngineConfig(DEFAULT_ENGINE_CONFIG, TIER_OVERRIDES[tier]);
  const config = mergeEngineConfig(tiered, readEnvOverrides(env));

  console.log(
    `${LOG_PREFIX} Loaded config for tier=${tier} (k=${config.retrieval_k}, ` +
    `max_outfits=${config.max_outfits}, timeout=${config.build_timeout_ms}ms)`
  );
  return config;
}
