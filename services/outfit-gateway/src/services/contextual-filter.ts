/**
 * Contextual Filter
 *
 * Hard eligibility rules. An item that fails any rule cannot appear in an
 * outfit for this directive, however similar it is to the query.
 *
 * Rules, checked in order (first failure is the reported reason):
 *   1. exclusions   - not excluded by id, category or colour for this request
 *   2. season       - season tags include the directive season or all_season
 *   3. formality    - within the governing occasion's [min, max]
 *   4. style        - not exclusively tagged with styles the occasion excludes
 *   5. movement     - on a high-movement day, no heels
 *   6. warmth       - when outerwear is required, at or above the warmth floor
 *   7. rain         - when rain footwear is required, footwear is rain_appropriate
 */

import {
  CandidatePool,
  ContextDirective,
  WardrobeExclusionsInput
} from '../types/outfit-recommendation';
import { Category, WardrobeItem } from '../types/wardrobe';
import { emptyPool, isInSeason } from './similarity-retriever';
import {
  getOccasionRule,
  getWarmthFloor,
  isMovementRestricted,
  normalizeColorName
} from './style-tables';

const LOG_PREFIX = '[contextual-filter]';

export type FilterReason =
  | 'excluded_item'
  | 'avoided_category'
  | 'disliked_color'
  | 'season_mismatch'
  | 'formality_out_of_range'
  | 'excluded_style'
  | 'high_movement'
  | 'insufficient_warmth'
  | 'not_rain_appropriate';

export interface FilterResult {
  pool: CandidatePool;
  /** item id -> first rule the item failed */
  removed: Record<string, FilterReason>;
}

const BASE_LAYER_CATEGORIES = new Set(['top', 'bottom', 'one_piece']);

/**
 * Request exclusions in lookup form. Colours are normalised once here.
 */
interface ExclusionSets {
  itemIds: Set<string>;
  colors: Set<string>;
  categories: Set<Category>;
}

const NO_EXCLUSIONS: ExclusionSets = {
  itemIds: new Set<string>(),
  colors: new Set<string>(),
  categories: new Set<Category>()
};

function toExclusionSets(exclusions: WardrobeExclusionsInput | undefined): ExclusionSets {
  if (!exclusions) return NO_EXCLUSIONS;
  return {
    itemIds: new Set(exclusions.item_ids ?? []),
    colors: new Set((exclusions.disliked_colors ?? []).map(normalizeColorName)),
    categories: new Set(exclusions.avoid_categories ?? [])
  };
}

function exclusionReason(item: WardrobeItem, sets: ExclusionSets): FilterReason | null {
  if (sets.itemIds.has(item.id)) return 'excluded_item';
  if (sets.categories.has(item.category)) return 'avoided_category';
  if (sets.colors.size > 0) {
    const colors = [item.primary_color, ...item.secondary_colors].map(normalizeColorName);
    if (colors.some(color => sets.colors.has(color))) return 'disliked_color';
  }
  return null;
}

function ruleReason(directive: ContextDirective, item: WardrobeItem): FilterReason | null {
  if (!isInSeason(item, directive)) return 'season_mismatch';

  const rule = getOccasionRule(directive.governing_occasion);
  if (item.formality_rating < rule.min_formality || item.formality_rating > rule.max_formality) {
    return 'formality_out_of_range';
  }

  if (
    item.style_tags.length > 0 &&
    item.style_tags.every(tag => rule.excluded_style_tags.includes(tag))
  ) {
    return 'excluded_style';
  }

  if (
    directive.movement === 'high' &&
    item.category === 'footwear' &&
    isMovementRestricted(item.subcategory)
  ) {
    return 'high_movement';
  }

  if (directive.required_layers.outerwear) {
    const floor = getWarmthFloor(directive.warmth_requirement);
    if (item.category === 'outerwear' && item.warmth_rating < floor.outerwear) {
      return 'insufficient_warmth';
    }
    if (BASE_LAYER_CATEGORIES.has(item.category) && item.warmth_rating < floor.base) {
      return 'insufficient_warmth';
    }
  }

  if (
    directive.required_layers.rain_footwear &&
    item.category === 'footwear' &&
    !item.weather_tags.includes('rain_appropriate')
  ) {
    return 'not_rain_appropriate';
  }

  return null;
}

/**
 * The first rule an item fails, or null when it is eligible.
 */
export function checkEligibility(
  directive: ContextDirective,
  item: WardrobeItem,
  exclusions?: WardrobeExclusionsInput
): FilterReason | null {
  return exclusionReason(item, toExclusionSets(exclusions)) ?? ruleReason(directive, item);
}

/**
 * Eligible items per category in input order, plus the removal reasons.
 */
export function filterWithDiagnostics(
  directive: ContextDirective,
  wardrobe: readonly WardrobeItem[],
  exclusions?: WardrobeExclusionsInput
): FilterResult {
  const pool = emptyPool();
  const removed: Record<string, FilterReason> = {};
  const sets = toExclusionSets(exclusions);

  for (const item of wardrobe) {
    const reason = exclusionReason(item, sets) ?? ruleReason(directive, item);
    if (reason) {
      removed[item.id] = reason;
    } else {
      pool[item.category].push(item);
    }
  }

  const removedCount = Object.keys(removed).length;
  if (removedCount > 0) {
    console.log(`${LOG_PREFIX} Removed ${removedCount}/${wardrobe.length} items`);
  }

  return { pool, removed };
}

export function filterWardrobe(
  directive: ContextDirective,
  wardrobe: readonly WardrobeItem[],
  exclusions?: WardrobeExclusionsInput
): CandidatePool {
  return filterWithDiagnostics(directive, wardrobe, exclusions).pool;
}
