/**
 * Outfit Builder
 *
 * Assembles complete outfits from the candidate pool. An outfit is one of two
 * shapes:
 *
 *   separates:  top + bottom + footwear [+ outerwear]
 *   one_piece:  one_piece + footwear   [+ outerwear]
 *
 * Outerwear is a slot only when the directive requires it. Accessories are
 * attached after the core outfit is fixed.
 *
 * Search is best-first over per-slot candidate positions, so the most
 * relevant combinations come out first. The search is bounded by
 * max_outfits x branching_factor expansions and by build_timeout_ms; hitting
 * either bound returns what was found so far with a ConstructionTimeout
 * warning. The builder never throws.
 */

import { createHash } from 'crypto';
import { DEFAULT_ENGINE_CONFIG, EngineConfig } from '../config/engine-config';
import {
  BuildResult,
  CandidatePool,
  ContextDirective,
  CoreSlot,
  EmptyCandidatePoolWarning,
  OutfitCandidate,
  OutfitShape,
  OutfitSlots,
  RecommendationWarning
} from '../types/outfit-recommendation';
import { WardrobeItem } from '../types/wardrobe';
import { isNeutralColor, normalizeColorName } from './style-tables';

const LOG_PREFIX = '[outfit-builder]';

export interface BuildOptions {
  config?: EngineConfig;
  /** Millisecond clock for the wall-clock bound */
  now?: () => number;
}

export interface ShapeTemplate {
  shape: OutfitShape;
  slots: CoreSlot[];
}

export interface OutfitValidation {
  valid: boolean;
  reason?: string;
}

// =============================================================================
// Shapes
// =============================================================================

const SHAPE_ORDER: readonly OutfitShape[] = ['separates', 'one_piece'];

export function shapeTemplates(directive: ContextDirective): ShapeTemplate[] {
  const outer: CoreSlot[] = directive.required_layers.outerwear ? ['outerwear'] : [];
  return [
    { shape: 'separates', slots: ['top', 'bottom', 'footwear', ...outer] },
    { shape: 'one_piece', slots: ['one_piece', 'footwear', ...outer] }
  ];
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Coverage and uniqueness: every mandated slot filled with an item of the
 * slot's category, no item used twice, accessories within the limit.
 */
export function validateOutfit(
  template: ShapeTemplate,
  slots: OutfitSlots,
  maxAccessories: number
): OutfitValidation {
  const seen = new Set<string>();

  for (const slot of template.slots) {
    const item = slots[slot];
    if (!item) return { valid: false, reason: `missing ${slot}` };
    if (item.category !== slot) {
      return { valid: false, reason: `${item.id} is ${item.category}, not ${slot}` };
    }
    if (seen.has(item.id)) return { valid: false, reason: `duplicate item ${item.id}` };
    seen.add(item.id);
  }

  if (slots.accessories.length > maxAccessories) {
    return { valid: false, reason: `more than ${maxAccessories} accessories` };
  }
  for (const accessory of slots.accessories) {
    if (accessory.category !== 'accessory') {
      return { valid: false, reason: `${accessory.id} is not an accessory` };
    }
    if (seen.has(accessory.id)) return { valid: false, reason: `duplicate item ${accessory.id}` };
    seen.add(accessory.id);
  }

  return { valid: true };
}

// =============================================================================
// Accessories
// =============================================================================

export function itemColors(item: WardrobeItem): string[] {
  return [item.primary_color, ...item.secondary_colors].map(normalizeColorName);
}

/**
 * Accessories in relevance order that either share a colour with the core
 * outfit or are neutral.
 */
export function selectAccessories(
  core: readonly WardrobeItem[],
  accessories: readonly WardrobeItem[],
  maxAccessories: number
): WardrobeItem[] {
  if (maxAccessories <= 0) return [];

  const outfitColors = new Set(core.flatMap(itemColors));
  const used = new Set(core.map(item => item.id));
  const selected: WardrobeItem[] = [];

  for (const accessory of accessories) {
    if (selected.length >= maxAccessories) break;
    if (used.has(accessory.id)) continue;

    const colors = itemColors(accessory);
    const harmonises =
      isNeutralColor(accessory.primary_color) || colors.some(color => outfitColors.has(color));
    if (!harmonises) continue;

    selected.push(accessory);
    used.add(accessory.id);
  }

  return selected;
}

// =============================================================================
// Search
// =============================================================================

interface SearchNode {
  shapeIndex: number;
  indices: number[];
  rank: number;
}

interface FeasibleShape {
  template: ShapeTemplate;
  candidates: WardrobeItem[][];
}

function compareNodes(a: SearchNode, b: SearchNode): number {
  if (a.rank !== b.rank) return a.rank - b.rank;
  if (a.shapeIndex !== b.shapeIndex) return a.shapeIndex - b.shapeIndex;
  for (let i = 0; i < Math.min(a.indices.length, b.indices.length); i++) {
    const diff = (a.indices[i] ?? 0) - (b.indices[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return a.indices.length - b.indices.length;
}

function insertSorted(frontier: SearchNode[], node: SearchNode): void {
  let lo = 0;
  let hi = frontier.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    const current = frontier[mid];
    if (current && compareNodes(current, node) <= 0) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  frontier.splice(lo, 0, node);
}

function nodeKey(node: SearchNode): string {
  return `${node.shapeIndex}:${node.indices.join(',')}`;
}

export function outfitId(items: readonly WardrobeItem[]): string {
  const digest = createHash('sha256')
    .update(items.map(item => item.id).join('|'))
    .digest('hex');
  return `outfit_${digest.substring(0, 16)}`;
}

/**
 * Enumerate up to maxOutfits valid outfits, most relevant first.
 */
export function buildOutfits(
  directive: ContextDirective,
  candidatePool: CandidatePool,
  maxOutfits: number,
  options: BuildOptions = {}
): BuildResult {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const now = options.now ?? Date.now;
  const startedAt = now();

  const outfits: OutfitCandidate[] = [];
  const warnings: RecommendationWarning[] = [];

  // Per-slot candidates, capped at the branching factor
  const feasible: FeasibleShape[] = [];
  const missing: EmptyCandidatePoolWarning[] = [];
  for (const template of shapeTemplates(directive)) {
    const candidates = template.slots.map(slot =>
      candidatePool[slot].slice(0, config.branching_factor)
    );
    const emptySlots = template.slots.filter((_, i) => (candidates[i] ?? []).length === 0);
    if (emptySlots.length === 0) {
      feasible.push({ template, candidates });
      continue;
    }
    for (const slot of emptySlots) {
      missing.push({
        kind: 'empty_candidate_pool',
        slot,
        shape: template.shape,
        message: `No eligible ${slot} for a ${template.shape} outfit`
      });
    }
  }

  if (feasible.length === 0) {
    console.warn(`${LOG_PREFIX} No feasible outfit shape: ${missing.map(w => `${w.shape}.${w.slot}`).join(', ')}`);
    return { outfits, warnings: missing, truncated: false, explored: 0 };
  }

  if (maxOutfits <= 0) {
    return { outfits, warnings, truncated: false, explored: 0 };
  }

  const budget = maxOutfits * config.branching_factor;
  const frontier: SearchNode[] = [];
  const visited = new Set<string>();

  for (const { template, candidates } of feasible) {
    const root: SearchNode = {
      shapeIndex: SHAPE_ORDER.indexOf(template.shape),
      indices: candidates.map(() => 0),
      rank: 0
    };
    visited.add(nodeKey(root));
    insertSorted(frontier, root);
  }

  let explored = 0;
  let truncated = false;

  while (frontier.length > 0 && outfits.length < maxOutfits) {
    const elapsed = now() - startedAt;
    if (explored >= budget || elapsed >= config.build_timeout_ms) {
      truncated = true;
      warnings.push({
        kind: 'construction_timeout',
        explored,
        elapsed_ms: elapsed,
        message: explored >= budget
          ? `Search budget of ${budget} expansions exhausted`
          : `Build timeout of ${config.build_timeout_ms}ms reached`
      });
      break;
    }

    const node = frontier.shift();
    if (!node) break;
    explored++;

    const shape = feasible.find(f => SHAPE_ORDER.indexOf(f.template.shape) === node.shapeIndex);
    if (!shape) continue;

    const slots: OutfitSlots = { accessories: [] };
    const core: WardrobeItem[] = [];
    shape.template.slots.forEach((slot, i) => {
      const item = shape.candidates[i]?.[node.indices[i] ?? 0];
      if (item) {
        slots[slot] = item;
        core.push(item);
      }
    });

    if (validateOutfit(shape.template, slots, config.max_accessories).valid) {
      slots.accessories = selectAccessories(core, candidatePool.accessory, config.max_accessories);
      const items = [...core, ...slots.accessories];
      outfits.push({
        id: outfitId(items),
        construction_order: outfits.length,
        shape: shape.template.shape,
        slots,
        items,
        relevance_rank: node.rank
      });
    }

    // Successors: advance one slot position at a time
    node.indices.forEach((index, i) => {
      const size = shape.candidates[i]?.length ?? 0;
      if (index + 1 >= size) return;
      const indices = [...node.indices];
      indices[i] = index + 1;
      const next: SearchNode = { shapeIndex: node.shapeIndex, indices, rank: node.rank + 1 };
      const key = nodeKey(next);
      if (visited.has(key)) return;
      visited.add(key);
      insertSorted(frontier, next);
    });
  }

  console.log(
    `${LOG_PREFIX} Built ${outfits.length}/${maxOutfits} outfits ` +
    `(explored=${explored}, truncated=${truncated})`
  );

  return { outfits, warnings, truncated, explored };
}
