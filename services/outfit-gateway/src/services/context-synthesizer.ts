/**
 * Context Synthesizer
 *
 * Folds the day's classified calendar events, the weather forecast and the
 * user's mood into a single frozen ContextDirective. Every downstream stage
 * reads the directive only; none of them sees the raw signals.
 *
 * Determinism: same inputs + same options -> identical directive. The only
 * clock read is the "today" fallback when neither a date nor events are
 * given, and that clock is injectable.
 */

import { z } from 'zod';
import { DEFAULT_ENGINE_CONFIG, EngineConfig } from '../config/engine-config';
import { InvalidContextError } from '../lib/errors';
import {
  CalendarEvent,
  CalendarEventSchema,
  ContextDirective,
  Movement,
  WarmthRequirement,
  WeatherForecast,
  WeatherForecastSchema
} from '../types/outfit-recommendation';
import { OccasionTag } from '../types/wardrobe';
import { getMoodStyle, resolveGoverningOccasion, seasonForDate } from './style-tables';

const LOG_PREFIX = '[context-synthesizer]';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export interface SynthesizeOptions {
  /** YYYY-MM-DD; overrides the date derived from events */
  date?: string;
  location?: string | null;
  /** Overrides the movement level derived from the day's occasions */
  movement?: Movement;
  config?: EngineConfig;
  now?: () => Date;
}

/** Occasions that mean a day on the move */
const HIGH_MOVEMENT_OCCASIONS: readonly OccasionTag[] = ['athletic', 'outdoor'];

/**
 * True for a real YYYY-MM-DD calendar day. Date.parse rolls 2026-02-31 over
 * to March, so the parsed date has to print back unchanged.
 */
export function isCalendarDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map(e => `${e.path.join('.')}: ${e.message}`);
}

// =============================================================================
// Input Validation
// =============================================================================

function parseForecast(forecast: unknown): WeatherForecast {
  if (forecast === null || forecast === undefined) {
    throw new InvalidContextError('MISSING_WEATHER', 'Weather forecast is required');
  }
  const parsed = WeatherForecastSchema.safeParse(forecast);
  if (!parsed.success) {
    throw new InvalidContextError(
      'MALFORMED_WEATHER',
      'Weather forecast is malformed',
      formatIssues(parsed.error)
    );
  }
  return parsed.data;
}

function parseMood(mood: unknown): string {
  if (mood === null || mood === undefined) {
    throw new InvalidContextError('MISSING_MOOD', 'Mood is required');
  }
  if (typeof mood !== 'string') {
    throw new InvalidContextError('MALFORMED_MOOD', `Mood must be a string, got ${typeof mood}`);
  }
  if (mood.trim() === '') {
    throw new InvalidContextError('MISSING_MOOD', 'Mood is required');
  }
  return mood;
}

function parseEvents(events: unknown): CalendarEvent[] {
  if (events === null || events === undefined) return [];
  const parsed = z.array(CalendarEventSchema).safeParse(events);
  if (!parsed.success) {
    throw new InvalidContextError(
      'MALFORMED_EVENT',
      'Calendar events are malformed',
      formatIssues(parsed.error)
    );
  }
  return parsed.data;
}

// =============================================================================
// Derivations
// =============================================================================

function resolveEffectiveDate(
  events: CalendarEvent[],
  options: SynthesizeOptions
): string {
  if (options.date !== undefined) {
    if (!isCalendarDate(options.date)) {
      throw new InvalidContextError('MALFORMED_DATE', `Invalid date: ${options.date}`);
    }
    return options.date;
  }

  let earliest: CalendarEvent | null = null;
  for (const event of events) {
    if (!earliest || Date.parse(event.start_time) < Date.parse(earliest.start_time)) {
      earliest = event;
    }
  }
  if (earliest) {
    // Calendar date as written in the event, in its own offset
    return earliest.start_time.slice(0, 10);
  }

  const now = options.now ? options.now() : new Date();
  return now.toISOString().slice(0, 10);
}

export function resolveWarmthRequirement(
  tempMax: number,
  config: EngineConfig
): WarmthRequirement {
  if (tempMax < config.cold_temp_threshold_c) return 'high';
  if (tempMax < config.outerwear_temp_threshold_c) return 'medium';
  return 'low';
}

export function resolveMovement(occasions: readonly OccasionTag[]): Movement {
  return occasions.some(tag => HIGH_MOVEMENT_OCCASIONS.includes(tag)) ? 'high' : 'low';
}

function collectOccasions(events: CalendarEvent[]): OccasionTag[] {
  const tags = new Set<OccasionTag>(events.map(e => e.occasion_tag));
  if (tags.size === 0) return ['casual'];
  return [...tags].sort();
}

// =============================================================================
// Synthesis
// =============================================================================

/**
 * Build the ContextDirective for one recommendation request.
 *
 * @throws InvalidContextError when weather or mood is missing or malformed,
 *         or an event does not validate
 */
export function synthesize(
  calendarEvents: unknown,
  weatherForecast: unknown,
  mood: unknown,
  options: SynthesizeOptions = {}
): ContextDirective {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;

  const forecast = parseForecast(weatherForecast);
  const moodText = parseMood(mood);
  const events = parseEvents(calendarEvents);

  const effectiveDate = resolveEffectiveDate(events, options);
  const season = seasonForDate(effectiveDate, config.hemisphere);

  const precipitation = forecast.precipitation_probability > config.precipitation_threshold;
  const cold = forecast.temp_max < config.outerwear_temp_threshold_c;

  const occasionTags = collectOccasions(events);
  const moodStyle = getMoodStyle(moodText);

  const directive: ContextDirective = {
    effective_date: effectiveDate,
    location: options.location ?? null,
    mood: moodStyle.name,
    season,
    weather: Object.freeze({
      temp_min: forecast.temp_min,
      temp_max: forecast.temp_max,
      precipitation_probability: forecast.precipitation_probability,
      wind_speed: forecast.wind_speed,
      precipitation,
      windy: forecast.wind_speed >= config.wind_threshold_kmh
    }),
    warmth_requirement: resolveWarmthRequirement(forecast.temp_max, config),
    required_layers: Object.freeze({
      outerwear: cold || precipitation,
      rain_footwear: precipitation
    }),
    occasion_tags: Object.freeze(occasionTags),
    governing_occasion: resolveGoverningOccasion(occasionTags),
    movement: options.movement ?? resolveMovement(occasionTags),
    palette_bias: Object.freeze([...moodStyle.palette]),
    mood_style_tags: Object.freeze([...moodStyle.style_tags])
  };

  console.log(
    `${LOG_PREFIX} ${effectiveDate} season=${season} occasion=${directive.governing_occasion} ` +
    `warmth=${directive.warmth_requirement} outerwear=${directive.required_layers.outerwear} ` +
    `rain_footwear=${directive.required_layers.rain_footwear} movement=${directive.movement}`
  );

  return Object.freeze(directive);
}
