import {
  checkEligibility,
  filterWardrobe,
  filterWithDiagnostics
} from '../src/services/contextual-filter';
import { synthesize } from '../src/services/context-synthesizer';
import {
  MILD_FORECAST,
  makeEvent,
  makeItem,
  mildDirective,
  rainyDirective,
  winterDirective
} from './fixtures/wardrobe';

describe('contextual filter', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  const winter = winterDirective();
  const rainy = rainyDirective();
  const mild = mildDirective();
  const formal = synthesize([makeEvent('formal', '2026-05-20')], MILD_FORECAST, 'confident');

  describe('season', () => {
    it('removes items out of season', () => {
      expect(checkEligibility(winter, makeItem({ id: 'top-1', category: 'top', season_tags: ['summer'] })))
        .toBe('season_mismatch');
    });

    it('keeps all-season and in-season items', () => {
      expect(checkEligibility(winter, makeItem({ id: 'top-1', category: 'top', season_tags: ['all_season'] }))).toBeNull();
      expect(checkEligibility(winter, makeItem({ id: 'top-2', category: 'top', season_tags: ['autumn', 'winter'] }))).toBeNull();
    });
  });

  describe('formality', () => {
    it('enforces the governing occasion range', () => {
      expect(formal.governing_occasion).toBe('formal');
      const tooCasual = makeItem({ id: 'top-1', category: 'top', formality_rating: 3, style_tags: ['classic'] });
      const dressy = makeItem({ id: 'top-2', category: 'top', formality_rating: 5, style_tags: ['classic'] });

      expect(checkEligibility(formal, tooCasual)).toBe('formality_out_of_range');
      expect(checkEligibility(formal, dressy)).toBeNull();
    });

    it('rejects overly formal items on a casual day', () => {
      const gown = makeItem({ id: 'dress-1', category: 'one_piece', formality_rating: 5 });
      expect(checkEligibility(mild, gown)).toBe('formality_out_of_range');
    });
  });

  describe('style exclusions', () => {
    it('removes items tagged only with excluded styles', () => {
      const gymTop = makeItem({ id: 'top-1', category: 'top', formality_rating: 4, style_tags: ['athletic', 'street'] });
      expect(checkEligibility(formal, gymTop)).toBe('excluded_style');
    });

    it('keeps items with at least one allowed style, or none at all', () => {
      const mixed = makeItem({ id: 'top-1', category: 'top', formality_rating: 4, style_tags: ['athletic', 'classic'] });
      const untagged = makeItem({ id: 'top-2', category: 'top', formality_rating: 4, style_tags: [] });
      expect(checkEligibility(formal, mixed)).toBeNull();
      expect(checkEligibility(formal, untagged)).toBeNull();
    });
  });

  describe('warmth', () => {
    it('requires warm outerwear and base layers on a cold day', () => {
      expect(winter.warmth_requirement).toBe('high');
      expect(checkEligibility(winter, makeItem({ id: 'coat-1', category: 'outerwear', warmth_rating: 3 })))
        .toBe('insufficient_warmth');
      expect(checkEligibility(winter, makeItem({ id: 'coat-2', category: 'outerwear', warmth_rating: 4 }))).toBeNull();
      expect(checkEligibility(winter, makeItem({ id: 'top-1', category: 'top', warmth_rating: 1 })))
        .toBe('insufficient_warmth');
      expect(checkEligibility(winter, makeItem({ id: 'top-2', category: 'top', warmth_rating: 2 }))).toBeNull();
    });

    it('does not apply warmth floors to footwear or accessories', () => {
      expect(checkEligibility(winter, makeItem({ id: 'shoe-1', category: 'footwear', warmth_rating: 1 }))).toBeNull();
      expect(checkEligibility(winter, makeItem({ id: 'acc-1', category: 'accessory', warmth_rating: 1 }))).toBeNull();
    });

    it('ignores warmth when outerwear is not required', () => {
      expect(mild.required_layers.outerwear).toBe(false);
      expect(checkEligibility(mild, makeItem({ id: 'coat-1', category: 'outerwear', warmth_rating: 1 }))).toBeNull();
    });
  });

  describe('rain', () => {
    it('requires rain-appropriate footwear when rain is likely', () => {
      const sneakers = makeItem({ id: 'shoe-1', category: 'footwear' });
      const boots = makeItem({ id: 'shoe-2', category: 'footwear', weather_tags: ['rain_appropriate'] });

      expect(checkEligibility(rainy, sneakers)).toBe('not_rain_appropriate');
      expect(checkEligibility(rainy, boots)).toBeNull();
      expect(checkEligibility(rainy, makeItem({ id: 'top-1', category: 'top' }))).toBeNull();
    });
  });

  describe('movement', () => {
    const outdoor = synthesize([makeEvent('outdoor', '2026-05-20')], MILD_FORECAST, 'calm');

    it('removes heels on an outdoor day', () => {
      expect(outdoor.movement).toBe('high');
      expect(checkEligibility(outdoor, makeItem({ id: 'shoe-1', category: 'footwear', subcategory: 'heels' })))
        .toBe('high_movement');
      expect(checkEligibility(outdoor, makeItem({ id: 'shoe-2', category: 'footwear', subcategory: ' Platform_Heels ' })))
        .toBe('high_movement');
      expect(checkEligibility(outdoor, makeItem({ id: 'shoe-3', category: 'footwear', subcategory: 'sneakers' })))
        .toBeNull();
    });

    it('allows heels on a low-movement day', () => {
      expect(mild.movement).toBe('low');
      expect(checkEligibility(mild, makeItem({ id: 'shoe-1', category: 'footwear', subcategory: 'heels' })))
        .toBeNull();
    });
  });

  describe('request exclusions', () => {
    const top = makeItem({ id: 'top-1', category: 'top', primary_color: 'white', secondary_colors: ['charcoal'] });

    it('removes excluded ids and avoided categories', () => {
      expect(checkEligibility(mild, top, { item_ids: ['top-1'] })).toBe('excluded_item');
      expect(checkEligibility(mild, top, { avoid_categories: ['top'] })).toBe('avoided_category');
      expect(checkEligibility(mild, top, { avoid_categories: ['accessory'] })).toBeNull();
    });

    it('compares disliked colours after alias normalisation', () => {
      expect(checkEligibility(mild, top, { disliked_colors: ['Grey'] })).toBe('disliked_color');
      expect(checkEligibility(mild, top, { disliked_colors: ['red'] })).toBeNull();
    });

    it('reports an exclusion ahead of the directive rules', () => {
      const summerTop = makeItem({ id: 'top-2', category: 'top', season_tags: ['summer'] });
      expect(checkEligibility(winter, summerTop, { item_ids: ['top-2'] })).toBe('excluded_item');
    });

    it('applies exclusions across the wardrobe', () => {
      const wardrobe = [
        top,
        makeItem({ id: 'top-2', category: 'top' }),
        makeItem({ id: 'acc-1', category: 'accessory' })
      ];

      const { pool, removed } = filterWithDiagnostics(mild, wardrobe, {
        item_ids: ['top-1'],
        avoid_categories: ['accessory']
      });

      expect(pool.top.map(i => i.id)).toEqual(['top-2']);
      expect(pool.accessory).toEqual([]);
      expect(removed).toEqual({ 'top-1': 'excluded_item', 'acc-1': 'avoided_category' });
    });
  });

  it('keeps input order and reports removals', () => {
    const wardrobe = [
      makeItem({ id: 'top-b', category: 'top' }),
      makeItem({ id: 'top-summer', category: 'top', season_tags: ['summer'] }),
      makeItem({ id: 'top-a', category: 'top' }),
      makeItem({ id: 'shoe-1', category: 'footwear' }),
      makeItem({ id: 'coat-thin', category: 'outerwear', warmth_rating: 2 })
    ];

    const { pool, removed } = filterWithDiagnostics(winter, wardrobe);

    expect(pool.top.map(i => i.id)).toEqual(['top-b', 'top-a']);
    expect(pool.footwear.map(i => i.id)).toEqual(['shoe-1']);
    expect(pool.outerwear).toEqual([]);
    expect(removed).toEqual({
      'top-summer': 'season_mismatch',
      'coat-thin': 'insufficient_warmth'
    });
    expect(filterWardrobe(winter, wardrobe)).toEqual(pool);
  });
});
