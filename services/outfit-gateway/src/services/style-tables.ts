/**
 * Taxonomy & Style Tables
 *
 * Immutable lookup data for the recommendation engine: colour vocabulary and
 * harmony rules, mood -> style mapping, occasion formality rules and warmth
 * floors. Loaded from style-tables.json once at module load, validated, and
 * deep-frozen so concurrent requests can read it without coordination.
 */

import { z } from 'zod';
import rawStyleTables from '../config/style-tables.json';
import {
  Mood,
  OccasionTag,
  Season,
  StyleTag
} from '../types/wardrobe';
import { WarmthRequirement } from '../types/outfit-recommendation';

const LOG_PREFIX = '[style-tables]';

// =============================================================================
// Schema
// =============================================================================

const ColorName = z.string().min(1);

const MoodStyleSchema = z.object({
  style_tags: z.array(StyleTag).min(1),
  palette: z.array(ColorName).min(1)
});

const OccasionRuleSchema = z.object({
  occasion: OccasionTag,
  min_formality: z.number().int().min(1).max(5),
  max_formality: z.number().int().min(1).max(5),
  target_formality: z.number().int().min(1).max(5),
  excluded_style_tags: z.array(StyleTag)
});
export type OccasionRule = z.infer<typeof OccasionRuleSchema>;

const WarmthFloorSchema = z.object({
  outerwear: z.number().int().min(1).max(5),
  base: z.number().int().min(1).max(5)
});
export type WarmthFloor = z.infer<typeof WarmthFloorSchema>;

const StyleTablesSchema = z.object({
  canonical_colors: z.array(ColorName).min(1),
  neutral_colors: z.array(ColorName),
  color_aliases: z.record(ColorName),
  complementary_pairs: z.array(z.tuple([ColorName, ColorName])),
  analogous_chains: z.array(z.array(ColorName).min(2)),
  harmony_scores: z.object({
    monochrome: z.number().min(0).max(1),
    complementary: z.number().min(0).max(1),
    analogous: z.number().min(0).max(1),
    neutral: z.number().min(0).max(1),
    fallback_few: z.number().min(0).max(1),
    fallback_many: z.number().min(0).max(1),
    fallback_few_max_colors: z.number().int().min(1)
  }),
  mood_styles: z.record(MoodStyleSchema),
  occasion_rules: z.array(OccasionRuleSchema),
  movement_restricted_subcategories: z.array(z.string().min(1)),
  warmth_floors: z.object({
    low: WarmthFloorSchema,
    medium: WarmthFloorSchema,
    high: WarmthFloorSchema
  })
}).superRefine((tables, ctx) => {
  for (const mood of Mood.options) {
    if (!tables.mood_styles[mood]) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `missing mood style: ${mood}` });
    }
  }
  for (const occasion of OccasionTag.options) {
    if (!tables.occasion_rules.some(rule => rule.occasion === occasion)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `missing occasion rule: ${occasion}` });
    }
  }
  for (const rule of tables.occasion_rules) {
    if (rule.min_formality > rule.max_formality) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `inverted formality range: ${rule.occasion}` });
    }
  }
});
export type StyleTables = z.infer<typeof StyleTablesSchema>;

export interface MoodStyleProfile {
  name: Mood;
  style_tags: readonly StyleTag[];
  palette: readonly string[];
}

// =============================================================================
// Loading
// =============================================================================

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

const STYLE_TABLES: StyleTables = deepFreeze(StyleTablesSchema.parse(rawStyleTables));

const NEUTRALS = new Set(STYLE_TABLES.neutral_colors);

const MOVEMENT_RESTRICTED = new Set(
  STYLE_TABLES.movement_restricted_subcategories.map(normalizeSubcategory)
);

const COMPLEMENTARY_KEYS = new Set(
  STYLE_TABLES.complementary_pairs.map(([a, b]) => pairKey(a, b))
);

export function getStyleTables(): StyleTables {
  return STYLE_TABLES;
}

// =============================================================================
// Colour Vocabulary
// =============================================================================

function pairKey(a: string, b: string): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

/**
 * Map a free-form colour string onto the canonical vocabulary.
 * Unknown colours come back trimmed and lower-cased.
 */
export function normalizeColorName(raw: string): string {
  const key = raw.trim().toLowerCase().replace(/[\s_-]+/g, ' ');
  return STYLE_TABLES.color_aliases[key] ?? key;
}

export function isNeutralColor(color: string): boolean {
  return NEUTRALS.has(normalizeColorName(color));
}

export function isComplementaryPair(a: string, b: string): boolean {
  const first = normalizeColorName(a);
  const second = normalizeColorName(b);
  if (first === second) return false;
  return COMPLEMENTARY_KEYS.has(pairKey(first, second));
}

/**
 * True when at least two distinct colours all sit on one analogous chain.
 */
export function isAnalogousSet(colors: readonly string[]): boolean {
  const unique = new Set(colors.map(normalizeColorName));
  if (unique.size < 2) return false;
  return STYLE_TABLES.analogous_chains.some(chain =>
    [...unique].every(color => chain.includes(color))
  );
}

// =============================================================================
// Mood -> Style
// =============================================================================

/**
 * Style profile for a mood. Unknown moods get the neutral profile, so the
 * palette is never empty.
 */
export function getMoodStyle(mood: string): MoodStyleProfile {
  const normalized = mood.trim().toLowerCase();
  const parsed = Mood.safeParse(normalized);
  const name: Mood = parsed.success ? parsed.data : 'neutral';
  if (!parsed.success) {
    console.log(`${LOG_PREFIX} Unknown mood "${mood}", using neutral profile`);
  }

  const profile = STYLE_TABLES.mood_styles[name] ?? STYLE_TABLES.mood_styles.neutral;
  const palette: string[] = [];
  for (const color of profile.palette) {
    const canonical = normalizeColorName(color);
    if (!palette.includes(canonical)) palette.push(canonical);
  }

  return {
    name,
    style_tags: profile.style_tags,
    palette
  };
}

// =============================================================================
// Occasions, Warmth, Seasons
// =============================================================================

export function getOccasionRule(occasion: OccasionTag): OccasionRule {
  const rule = STYLE_TABLES.occasion_rules.find(r => r.occasion === occasion);
  if (!rule) {
    // Unreachable: the schema refinement guarantees every occasion has a rule
    throw new Error(`No occasion rule for ${occasion}`);
  }
  return rule;
}

/**
 * The most formal occasion of the day (highest minimum formality).
 * Ties resolve to the occasion listed first in the rule table.
 */
export function resolveGoverningOccasion(occasions: readonly OccasionTag[]): OccasionTag {
  let governing: OccasionRule | null = null;
  for (const rule of STYLE_TABLES.occasion_rules) {
    if (!occasions.includes(rule.occasion)) continue;
    if (!governing || rule.min_formality > governing.min_formality) {
      governing = rule;
    }
  }
  return governing ? governing.occasion : 'casual';
}

function normalizeSubcategory(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s_-]+/g, ' ');
}

/**
 * Footwear subcategories (heels and the like) that are out on a high-movement day.
 */
export function isMovementRestricted(subcategory: string): boolean {
  return MOVEMENT_RESTRICTED.has(normalizeSubcategory(subcategory));
}

export function getWarmthFloor(requirement: WarmthRequirement): WarmthFloor {
  return STYLE_TABLES.warmth_floors[requirement];
}

const NORTHERN_SEASONS: readonly Season[] = [
  'winter', 'winter', 'spring', 'spring', 'spring', 'summer',
  'summer', 'summer', 'autumn', 'autumn', 'autumn', 'winter'
];

const OPPOSITE_SEASON: Record<Season, Season> = {
  winter: 'summer',
  spring: 'autumn',
  summer: 'winter',
  autumn: 'spring'
};

/**
 * Meteorological season for a YYYY-MM-DD date.
 */
export function seasonForDate(isoDate: string, hemisphere: 'north' | 'south' = 'north'): Season {
  const month = Number(isoDate.slice(5, 7));
  const northern = NORTHERN_SEASONS[(month - 1 + 12) % 12] ?? 'winter';
  return hemisphere === 'north' ? northern : OPPOSITE_SEASON[northern];
}
