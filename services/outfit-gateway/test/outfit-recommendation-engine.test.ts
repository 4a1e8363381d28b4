import { InvalidContextError } from '../src/lib/errors';
import {
  composeCandidatePool,
  recommendOutfits,
  sanitizeWardrobe
} from '../src/services/outfit-recommendation-engine';
import { ScoredOutfit } from '../src/types/outfit-recommendation';
import { WardrobeItem } from '../src/types/wardrobe';
import {
  MILD_FORECAST,
  RAINY_FORECAST,
  WINTER_FORECAST,
  itemIds,
  makeItem,
  makePool
} from './fixtures/wardrobe';

// =============================================================================
// Wardrobes
// =============================================================================

const sweater = makeItem({
  id: 'top-sweater',
  category: 'top',
  subcategory: 'sweater',
  primary_color: 'beige',
  style_tags: ['cozy', 'casual'],
  season_tags: ['winter'],
  warmth_rating: 3
});
const jeans = makeItem({
  id: 'bottom-jeans',
  category: 'bottom',
  subcategory: 'jeans',
  primary_color: 'navy',
  warmth_rating: 2
});
const boots = makeItem({
  id: 'shoe-boots',
  category: 'footwear',
  subcategory: 'boots',
  primary_color: 'brown'
});
const parka = makeItem({
  id: 'outer-parka',
  category: 'outerwear',
  subcategory: 'parka',
  primary_color: 'gray',
  season_tags: ['winter'],
  warmth_rating: 5
});

const WINTER_WARDROBE: WardrobeItem[] = [sweater, jeans, boots, parka];

const SPRING_WARDROBE: WardrobeItem[] = [
  makeItem({ id: 'top-linen', category: 'top', primary_color: 'white', style_tags: ['casual', 'minimal'] }),
  makeItem({ id: 'top-oxford', category: 'top', primary_color: 'blue', style_tags: ['classic'] }),
  makeItem({ id: 'top-tee', category: 'top', primary_color: 'gray' }),
  makeItem({ id: 'bottom-chinos', category: 'bottom', primary_color: 'beige' }),
  makeItem({ id: 'bottom-jeans', category: 'bottom', primary_color: 'navy' }),
  makeItem({ id: 'dress-sun', category: 'one_piece', primary_color: 'yellow', season_tags: ['spring', 'summer'] }),
  makeItem({ id: 'shoe-loafers', category: 'footwear', primary_color: 'brown', formality_rating: 3 }),
  makeItem({ id: 'shoe-sneakers', category: 'footwear', primary_color: 'white' }),
  makeItem({ id: 'acc-belt', category: 'accessory', primary_color: 'brown' }),
  makeItem({ id: 'acc-scarf', category: 'accessory', primary_color: 'blue' })
];

const winterRequest = (wardrobe: readonly unknown[]) => ({
  events: [],
  forecast: WINTER_FORECAST,
  mood: 'cozy',
  date: '2026-01-15',
  wardrobe
});

function assertWellFormed(outfits: ScoredOutfit[]): void {
  for (const outfit of outfits) {
    const ids = itemIds(outfit);
    expect(new Set(ids).size).toBe(ids.length);
    expect(outfit.slots.footwear).toBeDefined();
    if (outfit.shape === 'separates') {
      expect(outfit.slots.top).toBeDefined();
      expect(outfit.slots.bottom).toBeDefined();
    } else {
      expect(outfit.slots.one_piece).toBeDefined();
    }
  }
  for (let i = 1; i < outfits.length; i++) {
    expect(outfits[i]?.scores.combined).toBeLessThanOrEqual(outfits[i - 1]?.scores.combined ?? 0);
  }
}

// =============================================================================
// Tests
// =============================================================================

describe('outfit recommendation engine', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  describe('winter day', () => {
    it('builds the single four-piece outfit', () => {
      const result = recommendOutfits(winterRequest(WINTER_WARDROBE));

      expect(result.directive.required_layers.outerwear).toBe(true);
      expect(result.outfits).toHaveLength(1);
      expect(result.warnings).toEqual([]);
      expect(result.truncated).toBe(false);

      const [outfit] = result.outfits;
      expect(outfit?.slots.top?.id).toBe('top-sweater');
      expect(outfit?.slots.bottom?.id).toBe('bottom-jeans');
      expect(outfit?.slots.footwear?.id).toBe('shoe-boots');
      expect(outfit?.slots.outerwear?.id).toBe('outer-parka');
      expect(outfit?.items).toHaveLength(4);
    });

    it('scores the outfit from its colours and tags', () => {
      const [outfit] = recommendOutfits(winterRequest(WINTER_WARDROBE)).outfits;

      expect(outfit?.scores.harmony_scheme).toBe('neutral');
      expect(outfit?.scores.color_harmony).toBe(0.7);
      expect(outfit?.scores.context_fit).toBe(0.75);
      expect(outfit?.scores.diversity).toBe(1);
      expect(outfit?.scores.combined).toBeCloseTo(0.78);
    });

    it('returns no outfits and a warning when no footwear is in season', () => {
      const sandals = makeItem({ id: 'shoe-sandals', category: 'footwear', season_tags: ['summer'] });
      const result = recommendOutfits(winterRequest([sweater, jeans, parka, sandals]));

      expect(result.outfits).toEqual([]);
      expect(result.warnings).toContainEqual(expect.objectContaining({
        kind: 'empty_candidate_pool',
        slot: 'footwear',
        shape: 'separates'
      }));
      expect(result.diagnostics.filter_removed).toEqual({ 'shoe-sandals': 'season_mismatch' });
    });

    it('returns exactly one outfit when three are requested but one exists', () => {
      const result = recommendOutfits(winterRequest(WINTER_WARDROBE));
      expect(result.outfits).toHaveLength(1);
      expect(result.diagnostics.explored).toBe(1);
    });
  });

  describe('rainy day', () => {
    const rainRequest = (wardrobe: readonly unknown[]) => ({
      forecast: RAINY_FORECAST,
      mood: 'calm',
      date: '2026-04-10',
      wardrobe
    });
    const tee = makeItem({ id: 'top-tee', category: 'top' });
    const chinos = makeItem({ id: 'bottom-chinos', category: 'bottom' });
    const sneakers = makeItem({ id: 'shoe-sneakers', category: 'footwear' });
    const rainBoots = makeItem({ id: 'shoe-rain', category: 'footwear', weather_tags: ['rain_appropriate'] });
    const shell = makeItem({ id: 'outer-shell', category: 'outerwear', warmth_rating: 2 });

    it('only uses rain-appropriate footwear', () => {
      const result = recommendOutfits(rainRequest([tee, chinos, sneakers, rainBoots, shell]));

      expect(result.outfits.length).toBeGreaterThan(0);
      for (const outfit of result.outfits) {
        expect(outfit.slots.footwear?.weather_tags).toContain('rain_appropriate');
        expect(outfit.slots.outerwear?.id).toBe('outer-shell');
      }
      expect(result.diagnostics.filter_removed).toEqual({ 'shoe-sneakers': 'not_rain_appropriate' });
    });

    it('warns instead of suggesting unsuitable shoes', () => {
      const result = recommendOutfits(rainRequest([tee, chinos, sneakers, shell]));

      expect(result.outfits).toEqual([]);
      expect(result.warnings).toContainEqual(expect.objectContaining({
        kind: 'empty_candidate_pool',
        slot: 'footwear'
      }));
    });
  });

  describe('larger wardrobe', () => {
    const request = {
      forecast: MILD_FORECAST,
      mood: 'calm',
      date: '2026-05-20',
      wardrobe: SPRING_WARDROBE
    };

    it('returns complete, ranked outfits', () => {
      const result = recommendOutfits(request);

      expect(result.outfits).toHaveLength(3);
      expect(result.outfits[0]?.scores.diversity).toBe(1);
      assertWellFormed(result.outfits);
    });

    it('is deterministic', () => {
      const first = recommendOutfits(request);
      const second = recommendOutfits(request);

      expect(second.outfits.map(o => o.id)).toEqual(first.outfits.map(o => o.id));
      expect(second).toEqual(first);
      expect(first.diagnostics.determinism_hash).toMatch(/^[0-9a-f]{16}$/);
      expect(second.diagnostics.determinism_hash).toBe(first.diagnostics.determinism_hash);
    });

    it('reports pool sizes', () => {
      const { diagnostics } = recommendOutfits(request);
      expect(diagnostics.pool_counts).toEqual({
        top: 3,
        bottom: 2,
        one_piece: 1,
        outerwear: 0,
        footwear: 2,
        accessory: 2
      });
      expect(diagnostics.input_count).toBe(10);
      expect(diagnostics.usable_count).toBe(10);
    });
  });

  describe('request constraints', () => {
    it('removes disliked colours, aliases included', () => {
      const result = recommendOutfits({
        ...winterRequest(WINTER_WARDROBE),
        exclusions: { disliked_colors: ['Tan'] }
      });

      expect(result.outfits).toEqual([]);
      expect(result.diagnostics.filter_removed).toEqual({ 'top-sweater': 'disliked_color' });
    });

    it('keeps heels out on a high-movement day', () => {
      const heels = makeItem({ id: 'shoe-heels', category: 'footwear', subcategory: 'heels' });
      const result = recommendOutfits({
        ...winterRequest([...WINTER_WARDROBE, heels]),
        movement: 'high'
      });

      expect(result.directive.movement).toBe('high');
      expect(result.diagnostics.filter_removed).toEqual({ 'shoe-heels': 'high_movement' });
      expect(result.outfits.map(o => o.slots.footwear?.id)).toEqual(['shoe-boots']);
    });
  });

  describe('malformed input', () => {
    it('excludes malformed wardrobe items without failing', () => {
      const shortEmbedding = makeItem({ id: 'short-embedding', category: 'top', embedding: [1, 2, 3] });
      const wardrobe: unknown[] = [
        ...WINTER_WARDROBE,
        { id: 'broken', category: 'top' },
        42,
        shortEmbedding,
        { ...sweater }
      ];

      const result = recommendOutfits(winterRequest(wardrobe));

      expect(result.outfits).toHaveLength(1);
      expect(result.diagnostics.input_count).toBe(8);
      expect(result.diagnostics.usable_count).toBe(4);
      expect(result.diagnostics.excluded_items.map(e => [e.item_id, e.index])).toEqual([
        ['broken', 4],
        [null, 5],
        ['short-embedding', 6],
        ['top-sweater', 7]
      ]);
      expect(result.diagnostics.excluded_items[2]?.reason).toBe('embedding has 3 dimensions, expected 128');
      expect(result.diagnostics.excluded_items[3]?.reason).toBe('duplicate id');
    });

    it('rejects a missing forecast', () => {
      expect(() => recommendOutfits({ forecast: undefined, mood: 'calm', wardrobe: [] }))
        .toThrow(InvalidContextError);
    });

    it('handles an empty wardrobe', () => {
      const result = recommendOutfits(winterRequest([]));
      expect(result.outfits).toEqual([]);
      expect(result.warnings.length).toBeGreaterThan(0);
      expect(result.diagnostics.determinism_hash).toMatch(/^[0-9a-f]{16}$/);
    });
  });

  describe('sanitizeWardrobe', () => {
    it('applies schema defaults', () => {
      const { items, excluded } = sanitizeWardrobe([{
        id: 'bare',
        category: 'accessory',
        subcategory: 'cap',
        primary_color: 'red',
        season_tags: ['all_season'],
        warmth_rating: 1,
        formality_rating: 1,
        embedding: [0.5, 0.5]
      }], 2);

      expect(excluded).toEqual([]);
      expect(items[0]).toMatchObject({
        secondary_colors: [],
        style_tags: [],
        weather_tags: [],
        source_metadata: {}
      });
    });

    it('keeps last-worn timestamps with a numeric offset', () => {
      const worn = makeItem({ id: 'top-1', category: 'top', last_worn_at: '2026-01-10T08:00:00.123456+00:00' });
      const { items, excluded } = sanitizeWardrobe([worn]);

      expect(excluded).toEqual([]);
      expect(items.map(i => i.id)).toEqual(['top-1']);
      expect(items[0]?.last_worn_at).toBe('2026-01-10T08:00:00.123456+00:00');
    });

    it('rejects non-finite embeddings', () => {
      const { excluded } = sanitizeWardrobe([{ ...sweater, embedding: [Infinity, 1] }], 2);
      expect(excluded).toHaveLength(1);
      expect(excluded[0]?.item_id).toBe('top-sweater');
    });
  });

  describe('composeCandidatePool', () => {
    it('puts eligible retrieved items first and never admits ineligible ones', () => {
      const a = makeItem({ id: 'top-a', category: 'top' });
      const b = makeItem({ id: 'top-b', category: 'top' });
      const c = makeItem({ id: 'top-c', category: 'top' });
      const x = makeItem({ id: 'top-x', category: 'top' });

      const pool = composeCandidatePool(makePool([c, x, a]), makePool([a, b, c]));
      expect(pool.top.map(i => i.id)).toEqual(['top-c', 'top-a', 'top-b']);
    });

    it('falls back to the eligible pool when retrieval found nothing', () => {
      const shoe = makeItem({ id: 'shoe-1', category: 'footwear' });
      const pool = composeCandidatePool(makePool([]), makePool([shoe]));
      expect(pool.footwear.map(i => i.id)).toEqual(['shoe-1']);
    });
  });
});
