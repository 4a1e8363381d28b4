/**
 * Wardrobe Taxonomy & Item Types
 *
 * Controlled vocabularies shared by ingestion, the wardrobe store and the
 * recommendation engine, plus the wardrobe item record itself.
 *
 * Ratings are ordinal 1-5:
 *   - warmth_rating:    1 = breezy summer piece, 5 = heavy winter insulation
 *   - formality_rating: 1 = gym / lounge,        5 = black tie
 */

import { z } from 'zod';

// =============================================================================
// Vocabularies
// =============================================================================

/**
 * Garment categories. `one_piece` (dresses, jumpsuits) stands in for the
 * top + bottom pair.
 */
export const Category = z.enum([
  'top',
  'bottom',
  'one_piece',
  'outerwear',
  'footwear',
  'accessory'
]);
export type Category = z.infer<typeof Category>;

export const CATEGORIES: readonly Category[] = Category.options;

export const Season = z.enum(['spring', 'summer', 'autumn', 'winter']);
export type Season = z.infer<typeof Season>;

/**
 * Season tags an item may carry. `all_season` matches every season.
 */
export const SeasonTag = z.enum(['spring', 'summer', 'autumn', 'winter', 'all_season']);
export type SeasonTag = z.infer<typeof SeasonTag>;

export const ALL_SEASON_TAG: SeasonTag = 'all_season';

export const StyleTag = z.enum([
  'casual',
  'business',
  'formal',
  'athletic',
  'party',
  'street',
  'cozy',
  'minimal',
  'bold',
  'romantic',
  'classic',
  'outdoor'
]);
export type StyleTag = z.infer<typeof StyleTag>;

/**
 * Occasion tags produced by calendar event classification.
 * Every occasion tag is also a style tag so outfits can be matched against it.
 */
export const OccasionTag = z.enum([
  'casual',
  'business',
  'formal',
  'athletic',
  'party',
  'outdoor'
]);
export type OccasionTag = z.infer<typeof OccasionTag>;

/**
 * Functional weather attributes, independent of style.
 */
export const WeatherTag = z.enum([
  'rain_appropriate',  // Waterproof or water resistant
  'windproof',
  'insulated',
  'breathable'
]);
export type WeatherTag = z.infer<typeof WeatherTag>;

export const Mood = z.enum([
  'happy',
  'calm',
  'cozy',
  'confident',
  'energetic',
  'romantic',
  'festive',
  'focused',
  'neutral'
]);
export type Mood = z.infer<typeof Mood>;

const Rating = z.number().int().min(1).max(5);

// =============================================================================
// Wardrobe Item
// =============================================================================

/**
 * A single wardrobe item as ingested.
 *
 * Immutable from the engine's point of view. `last_worn_at` is owned by the
 * wardrobe store and only read here.
 */
export const WardrobeItemSchema = z.object({
  id: z.string().min(1),
  user_id: z.string().min(1).optional(),
  category: Category,
  subcategory: z.string().min(1),
  primary_color: z.string().min(1),
  secondary_colors: z.array(z.string().min(1)).default([]),
  style_tags: z.array(StyleTag).default([]),
  season_tags: z.array(SeasonTag).min(1),
  weather_tags: z.array(WeatherTag).default([]),
  warmth_rating: Rating,
  formality_rating: Rating,
  embedding: z.array(z.number().finite()).min(1),
  source_metadata: z.record(z.unknown()).default({}),
  last_worn_at: z.string().datetime({ offset: true }).nullable().optional()
});
export type WardrobeItem = z.infer<typeof WardrobeItemSchema>;
export type WardrobeItemInput = z.input<typeof WardrobeItemSchema>;

// =============================================================================
// Wardrobe Source Filters
// =============================================================================

/**
 * Filters accepted by a wardrobe source. All present filters must match;
 * array filters match when the item carries at least one listed value.
 */
export const WardrobeFiltersSchema = z.object({
  categories: z.array(Category).optional(),
  season_tags: z.array(SeasonTag).optional(),
  style_tags: z.array(StyleTag).optional(),
  limit: z.number().int().min(1).max(1000).optional()
});
export type WardrobeFilters = z.infer<typeof WardrobeFiltersSchema>;
