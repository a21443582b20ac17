import {
  coerceOccurredAt,
  createClassifier,
  detectRuns,
  longestRuns,
  normalizeEvents,
  roundHalfAwayFromZero,
  toNumberOrNull,
  type EventSchemaDescriptor,
  type OccurredAt,
} from '@seqlens/core';
import { describeWeatherCode, SEASON_TABLE, WEATHER_CATEGORY_TABLE } from './labels';

/** A raw daily observation from the weather archive API. */
export interface WeatherRow {
  time: string | null;
  weather_code?: number | null;
  temperature_2m_max?: number | null;
  temperature_2m_min?: number | null;
  temperature_2m_mean?: number | null;
  precipitation_sum?: number | null;
  rain_sum?: number | null;
  snowfall_sum?: number | null;
  precipitation_hours?: number | null;
  wind_speed_10m_max?: number | null;
  /** Seconds of sunshine */
  sunshine_duration?: number | null;
}

export interface WeatherDay {
  date: string;
  year: number;
  month: number;
  /** 0 = Sunday, 6 = Saturday */
  dayOfWeek: number;
  season: string | null;
  weatherCode: number | null;
  weatherDescription: string;
  weatherCategory: string;
  tempMaxC: number | null;
  tempMinC: number | null;
  tempMeanC: number | null;
  precipitationMm: number;
  rainMm: number;
  snowfallCm: number;
  precipitationHours: number;
  windMaxKmh: number | null;
  sunshineHours: number;
  hasRain: boolean;
  hasSnow: boolean;
  hasPrecipitation: boolean;
  isOvercast: boolean;
}

const season = createClassifier(SEASON_TABLE);
const weatherCategory = createClassifier(WEATHER_CATEGORY_TABLE);

function orZero(value: number | null | undefined): number {
  return toNumberOrNull(value) ?? 0;
}

function orNull(value: number | null | undefined): number | null {
  return toNumberOrNull(value);
}

/**
 * Shape one observation into an analysis-ready day.
 * Returns `null` for rows without a usable date.
 */
export function classifyWeatherDay(row: WeatherRow): WeatherDay | null {
  const date = row.time === null ? null : coerceOccurredAt(row.time, 'iso-date');
  if (typeof date !== 'string') return null;

  const [year, month, day] = date.split('-').map(Number);
  const rainMm = orZero(row.rain_sum);
  const snowfallCm = orZero(row.snowfall_sum);
  const precipitationMm = orZero(row.precipitation_sum);
  const sunshineSeconds = orZero(row.sunshine_duration);
  const weatherCode = orNull(row.weather_code);

  return {
    date,
    year,
    month,
    dayOfWeek: new Date(Date.UTC(year, month - 1, day)).getUTCDay(),
    season: season({ month }),
    weatherCode,
    weatherDescription: describeWeatherCode(weatherCode),
    weatherCategory: weatherCategory({ rainMm, snowfallCm, sunshineSeconds }) ?? 'Clear',
    tempMaxC: orNull(row.temperature_2m_max),
    tempMinC: orNull(row.temperature_2m_min),
    tempMeanC: orNull(row.temperature_2m_mean),
    precipitationMm,
    rainMm,
    snowfallCm,
    precipitationHours: orZero(row.precipitation_hours),
    windMaxKmh: orNull(row.wind_speed_10m_max),
    sunshineHours: roundHalfAwayFromZero(sunshineSeconds / 3600, 2),
    hasRain: rainMm > 0,
    hasSnow: snowfallCm > 0,
    hasPrecipitation: precipitationMm > 0,
    isOvercast: sunshineSeconds === 0,
  };
}

/** Classify every dated row, in date order. */
export function weatherDaily(rows: readonly WeatherRow[]): WeatherDay[] {
  return rows
    .map(classifyWeatherDay)
    .filter((day): day is WeatherDay => day !== null)
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

export interface GloomyStreakOptions {
  /** Days with less sunshine than this are gloomy (default 1 hour) */
  sunshineThresholdHours?: number;
  /** Number of streaks to return (default 15) */
  limit?: number;
  /** Entity the days belong to (default 'global') */
  location?: string;
}

export interface GloomyStreakRow {
  streakLength: number;
  streakStart: OccurredAt;
  streakEnd: OccurredAt;
}

function gloomDescriptor(threshold: number): EventSchemaDescriptor {
  return {
    domain: ['gloomy', 'clear'],
    entityId: { from: 'location' },
    occurredAt: { from: 'date', coerce: 'iso-date' },
    category: {
      kind: 'rules',
      table: {
        rules: [{ label: 'gloomy', when: { sunshineHours: { lt: threshold } } }],
        otherwise: 'clear',
      },
    },
    value: { from: 'sunshineHours' },
  };
}

/** Longest runs of consecutive gloomy days, longest first. */
export function gloomyStreaks(
  days: readonly WeatherDay[],
  options: GloomyStreakOptions = {}
): GloomyStreakRow[] {
  const location = options.location ?? 'global';
  const records = days.map((day) => ({ location, date: day.date, sunshineHours: day.sunshineHours }));
  const events = normalizeEvents(records, gloomDescriptor(options.sunshineThresholdHours ?? 1));
  const runs = detectRuns(events, { domain: ['gloomy', 'clear'] });
  return longestRuns(runs, { category: 'gloomy', limit: options.limit ?? 15 }).map((run) => ({
    streakLength: run.length,
    streakStart: run.start,
    streakEnd: run.end,
  }));
}
