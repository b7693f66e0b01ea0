/**
 * Weather reading domain model.
 *
 * A reading is produced per resolution call and never persisted.
 */

export const WEATHER_CONDITIONS = ['clear', 'clouds', 'rain', 'snow', 'storm', 'mist', 'unknown'] as const;

export type WeatherCondition = (typeof WEATHER_CONDITIONS)[number];

export type ReadingSource = 'live' | 'mock';

export interface WeatherReading {
  /**
   * Canonical-cased city name, never empty.
   */
  city: string;

  temperatureCelsius: number;

  condition: WeatherCondition;

  /**
   * Integer in 0..100.
   */
  humidityPercent: number;

  /**
   * Callers use this to decide whether to disclose degraded data downstream.
   */
  source: ReadingSource;

  /**
   * ISO-8601 instant the reading refers to.
   */
  timestamp: string;
}

export function isWeatherCondition(value: unknown): value is WeatherCondition {
  return WEATHER_CONDITIONS.some((condition) => condition === value);
}

/**
 * Canonical form of a city name: trimmed, inner whitespace collapsed, and each
 * space- or hyphen-separated word title-cased ("  new  york " -> "New York",
 * "WINSTON-SALEM" -> "Winston-Salem"). Blank input yields an empty string.
 */
export function canonicalizeCity(raw: string): string {
  return raw
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.split('-').map(titleCase).join('-'))
    .join(' ');
}

function titleCase(word: string): string {
  if (word.length === 0) return word;
  const lower = word.toLowerCase();
  return lower.charAt(0).toUpperCase() + lower.slice(1);
}

/**
 * Clamp and round a humidity value into the 0..100 integer range.
 */
export function normalizeHumidity(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, Math.round(value)));
}

/**
 * Wire representation returned by the get_weather tool.
 */
export type WeatherPayload = {
  city: string;
  temperature_celsius: number;
  condition: WeatherCondition;
  humidity_percent: number;
  source: ReadingSource;
  timestamp: string;
};

export function toWeatherPayload(reading: WeatherReading): WeatherPayload {
  return {
    city: reading.city,
    temperature_celsius: reading.temperatureCelsius,
    condition: reading.condition,
    humidity_percent: reading.humidityPercent,
    source: reading.source,
    timestamp: reading.timestamp,
  };
}
