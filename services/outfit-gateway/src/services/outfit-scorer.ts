/**
 * Outfit Scorer
 *
 * Three signals per outfit, each in [0, 1]:
 *   - color_harmony: best matching scheme from the colour tables
 *   - context_fit:   share of the outfit's style/season tags the day asks for
 *   - diversity:     share of the outfit's items not already used by a
 *                    higher-ranked outfit
 *
 * Diversity depends on what has been ranked above, so ranking is greedy:
 * at each step the highest combined score is placed next (ties to the lower
 * construction order). Placing an outfit can only lower the diversity of the
 * rest, so the resulting list is non-increasing in combined score.
 */

import { DEFAULT_ENGINE_CONFIG, ScoringWeights } from '../config/engine-config';
import {
  ContextDirective,
  HarmonyScheme,
  OutfitCandidate,
  ScoredOutfit
} from '../types/outfit-recommendation';
import { ALL_SEASON_TAG, WardrobeItem } from '../types/wardrobe';
import { itemColors } from './outfit-builder';
import {
  getStyleTables,
  isAnalogousSet,
  isComplementaryPair,
  isNeutralColor
} from './style-tables';

export interface HarmonyResult {
  score: number;
  scheme: HarmonyScheme;
}

// =============================================================================
// Colour Harmony
// =============================================================================

function hasComplementaryPair(colors: readonly string[]): boolean {
  for (let i = 0; i < colors.length; i++) {
    for (let j = i + 1; j < colors.length; j++) {
      const a = colors[i];
      const b = colors[j];
      if (a && b && isComplementaryPair(a, b)) return true;
    }
  }
  return false;
}

export function colorHarmonyScore(items: readonly WardrobeItem[]): HarmonyResult {
  const scores = getStyleTables().harmony_scores;
  const unique = [...new Set(items.flatMap(itemColors))];
  if (unique.length === 0) return { score: 0, scheme: 'none' };

  const chromatic = unique.filter(color => !isNeutralColor(color));
  const matches: HarmonyResult[] = [];

  if (unique.length === 1) {
    matches.push({ score: scores.monochrome, scheme: 'monochrome' });
  }
  if (hasComplementaryPair(unique)) {
    matches.push({ score: scores.complementary, scheme: 'complementary' });
  }
  if (chromatic.length >= 2 && isAnalogousSet(chromatic)) {
    matches.push({ score: scores.analogous, scheme: 'analogous' });
  }
  if (unique.length >= 2 && chromatic.length <= 1) {
    matches.push({ score: scores.neutral, scheme: 'neutral' });
  }

  let best: HarmonyResult | null = null;
  for (const match of matches) {
    if (!best || match.score > best.score) best = match;
  }
  if (best) return best;

  return unique.length <= scores.fallback_few_max_colors
    ? { score: scores.fallback_few, scheme: 'fallback_few' }
    : { score: scores.fallback_many, scheme: 'fallback_many' };
}

// =============================================================================
// Context Fit
// =============================================================================

export function contextFitScore(
  directive: ContextDirective,
  items: readonly WardrobeItem[]
): number {
  const tags = new Set<string>();
  for (const item of items) {
    item.style_tags.forEach(tag => tags.add(tag));
    item.season_tags.forEach(tag => tags.add(tag));
  }
  if (tags.size === 0) return 0;

  const wanted = new Set<string>([...directive.occasion_tags, directive.season, ALL_SEASON_TAG]);
  let matched = 0;
  tags.forEach(tag => {
    if (wanted.has(tag)) matched++;
  });
  return matched / tags.size;
}

// =============================================================================
// Diversity
// =============================================================================

/**
 * 1 - (items already used by placed outfits) / (items in this outfit).
 */
export function diversityScore(
  items: readonly WardrobeItem[],
  usedItemIds: ReadonlySet<string>
): number {
  if (items.length === 0) return 1;
  const shared = items.filter(item => usedItemIds.has(item.id)).length;
  return 1 - shared / items.length;
}

// =============================================================================
// Ranking
// =============================================================================

interface PendingOutfit {
  outfit: OutfitCandidate;
  harmony: HarmonyResult;
  contextFit: number;
}

/**
 * Score and rank outfits, best first.
 */
export function scoreOutfits(
  directive: ContextDirective,
  outfits: readonly OutfitCandidate[],
  weights: ScoringWeights = DEFAULT_ENGINE_CONFIG.weights
): ScoredOutfit[] {
  const pending: PendingOutfit[] = outfits.map(outfit => ({
    outfit,
    harmony: colorHarmonyScore(outfit.items),
    contextFit: contextFitScore(directive, outfit.items)
  }));

  const ranked: ScoredOutfit[] = [];
  const usedItemIds = new Set<string>();

  while (pending.length > 0) {
    let bestIndex = -1;
    let best: ScoredOutfit | null = null;

    for (let index = 0; index < pending.length; index++) {
      const entry = pending[index];
      if (!entry) continue;

      const diversity = diversityScore(entry.outfit.items, usedItemIds);
      const combined =
        weights.color_harmony * entry.harmony.score +
        weights.context_fit * entry.contextFit +
        weights.diversity * diversity;

      const better =
        best === null ||
        combined > best.scores.combined ||
        (combined === best.scores.combined &&
          entry.outfit.construction_order < best.construction_order);

      if (better) {
        bestIndex = index;
        best = {
          ...entry.outfit,
          scores: {
            color_harmony: entry.harmony.score,
            harmony_scheme: entry.harmony.scheme,
            context_fit: entry.contextFit,
            diversity,
            combined
          }
        };
      }
    }

    if (best === null) break;
    ranked.push(best);
    pending.splice(bestIndex, 1);
    for (const item of best.items) {
      usedItemIds.add(item.id);
    }
  }

  return ranked;
}
