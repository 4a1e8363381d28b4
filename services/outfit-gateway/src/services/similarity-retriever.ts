/**
 * Similarity Retriever
 *
 * Ranks each category of the wardrobe by cosine similarity between the item
 * embeddings and a query embedding built from the directive. Items out of
 * season are not considered. Returns at most k items per category.
 */

import {
  CandidatePool,
  ContextDirective
} from '../types/outfit-recommendation';
import {
  ALL_SEASON_TAG,
  CATEGORIES,
  Category,
  WardrobeItem
} from '../types/wardrobe';
import { cosineSimilarity, textEmbedding } from './embedding-service';
import { getOccasionRule } from './style-tables';

export function emptyPool(): CandidatePool {
  return {
    top: [],
    bottom: [],
    one_piece: [],
    outerwear: [],
    footwear: [],
    accessory: []
  };
}

export function isInSeason(item: WardrobeItem, directive: ContextDirective): boolean {
  return item.season_tags.includes(directive.season) || item.season_tags.includes(ALL_SEASON_TAG);
}

export function queryText(directive: ContextDirective): string {
  return [
    ...directive.palette_bias,
    ...directive.occasion_tags,
    ...directive.mood_style_tags,
    directive.season
  ].join(' ');
}

/**
 * Query vector in the same space as item embeddings.
 */
export function buildQueryEmbedding(directive: ContextDirective, dimension: number): number[] {
  return textEmbedding(queryText(directive), dimension);
}

interface RankedItem {
  item: WardrobeItem;
  similarity: number;
  formalityDistance: number;
}

function compareRanked(a: RankedItem, b: RankedItem): number {
  if (b.similarity !== a.similarity) return b.similarity - a.similarity;
  if (a.formalityDistance !== b.formalityDistance) return a.formalityDistance - b.formalityDistance;
  // Code-unit order; independent of the host locale
  if (a.item.id === b.item.id) return 0;
  return a.item.id < b.item.id ? -1 : 1;
}

/**
 * Top-k per category, most similar first. Ties go to the item closer to the
 * governing occasion's target formality, then to the smaller id.
 *
 * The query dimension follows the wardrobe's embeddings; an empty wardrobe
 * returns an empty pool.
 */
export function retrieve(
  directive: ContextDirective,
  wardrobe: readonly WardrobeItem[],
  k: number
): CandidatePool {
  const pool = emptyPool();
  if (k <= 0 || wardrobe.length === 0) return pool;

  const target = getOccasionRule(directive.governing_occasion).target_formality;
  const queries = new Map<number, number[]>();
  const ranked = new Map<Category, RankedItem[]>();

  for (const item of wardrobe) {
    if (!isInSeason(item, directive)) continue;

    const dimension = item.embedding.length;
    let query = queries.get(dimension);
    if (!query) {
      query = buildQueryEmbedding(directive, dimension);
      queries.set(dimension, query);
    }

    const entries = ranked.get(item.category) ?? [];
    entries.push({
      item,
      similarity: cosineSimilarity(item.embedding, query),
      formalityDistance: Math.abs(item.formality_rating - target)
    });
    ranked.set(item.category, entries);
  }

  for (const category of CATEGORIES) {
    const entries = ranked.get(category) ?? [];
    pool[category] = entries
      .sort(compareRanked)
      .slice(0, k)
      .map(entry => entry.item);
  }

  return pool;
}
