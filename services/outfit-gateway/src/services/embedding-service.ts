/**
 * Embedding Service
 *
 * Deterministic hashed bag-of-words embeddings. Items are embedded at
 * ingestion and context queries at recommendation time with the same
 * function, so cosine similarity between them is meaningful without a model
 * call. Stateless; nothing is cached or stored here.
 */

import { createHash } from 'crypto';
import { WardrobeItemInput } from '../types/wardrobe';
import { normalizeColorName } from './style-tables';

// =============================================================================
// Text Embedding
// =============================================================================

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(token => token.length > 0);
}

function bucketFor(token: string, dimension: number): number {
  const digest = createHash('sha256').update(token).digest();
  return digest.readUInt32BE(0) % dimension;
}

/**
 * Each token adds 1.0 to the bucket selected by its sha256 digest.
 * Text without tokens yields the zero vector.
 */
export function textEmbedding(text: string, dimension: number): number[] {
  if (!Number.isInteger(dimension) || dimension < 1) {
    throw new RangeError(`Embedding dimension must be a positive integer, got ${dimension}`);
  }

  const vector = new Array<number>(dimension).fill(0);
  for (const token of tokenize(text)) {
    vector[bucketFor(token, dimension)] += 1;
  }
  return vector;
}

// =============================================================================
// Item Embedding
// =============================================================================

type EmbeddableFields = Pick<
  WardrobeItemInput,
  'category' | 'subcategory' | 'primary_color' | 'secondary_colors' | 'style_tags' | 'season_tags' | 'weather_tags'
>;

/**
 * The descriptive text an item is embedded from. Colours are normalised so
 * "navy blue" and "navy" land in the same bucket.
 */
export function itemEmbeddingText(item: EmbeddableFields): string {
  const colors = [item.primary_color, ...(item.secondary_colors ?? [])].map(normalizeColorName);
  return [
    item.category,
    item.subcategory,
    ...colors,
    ...(item.style_tags ?? []),
    ...item.season_tags,
    ...(item.weather_tags ?? [])
  ].join(' ');
}

/**
 * Ingestion helper: fill in `embedding` for a record that does not have one.
 */
export function embedItem<T extends EmbeddableFields>(
  item: T,
  dimension: number
): T & { embedding: number[] } {
  return { ...item, embedding: textEmbedding(itemEmbeddingText(item), dimension) };
}

// =============================================================================
// Similarity
// =============================================================================

/**
 * Cosine similarity in [-1, 1]. Returns 0 for vectors of different length
 * or when either vector has zero norm.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
