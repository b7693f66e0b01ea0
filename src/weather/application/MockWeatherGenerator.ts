// src/weather/application/MockWeatherGenerator.ts

/**
 * Deterministic synthetic weather.
 *
 * generate(city, day) is a pure function of the canonical city name and the
 * UTC calendar day: the same pair always produces the same reading, so
 * repeated questions on one day get consistent answers and tests can rely on
 * exact values. No wall-clock randomness is involved.
 */

import type { WeatherCondition, WeatherReading } from '../domain/WeatherReading';
import { canonicalizeCity } from '../domain/WeatherReading';

type ClimateBand = {
  minCelsius: number;
  maxCelsius: number;
  conditions: readonly WeatherCondition[];
};

const CLIMATE_BANDS: readonly ClimateBand[] = [
  { minCelsius: -8, maxCelsius: 6, conditions: ['snow', 'clouds', 'clear', 'mist'] },
  { minCelsius: 7, maxCelsius: 18, conditions: ['clouds', 'rain', 'clear', 'mist'] },
  { minCelsius: 19, maxCelsius: 28, conditions: ['clear', 'clouds', 'rain', 'storm'] },
  { minCelsius: 29, maxCelsius: 38, conditions: ['clear', 'clear', 'clouds', 'storm'] },
];

const HUMIDITY_RANGES: Readonly<Record<WeatherCondition, readonly [number, number]>> = {
  clear: [25, 55],
  clouds: [45, 75],
  rain: [75, 98],
  snow: [70, 95],
  storm: [70, 95],
  mist: [80, 100],
  unknown: [40, 60],
};

const UNKNOWN_CITY = 'Unknown';

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * 32-bit FNV-1a over UTF-16 code units. Stable across processes and platforms.
 */
export function fnv1a32(input: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

const EPOCH_DAY = '1970-01-01';

/**
 * UTC calendar day as YYYY-MM-DD. An invalid date maps to the epoch day.
 */
export function isoDay(day: Date): string {
  if (Number.isNaN(day.getTime())) return EPOCH_DAY;
  return day.toISOString().slice(0, 10);
}

export class MockWeatherGenerator {
  public generate(city: string, day: Date): WeatherReading {
    const canonical = canonicalizeCity(city) || UNKNOWN_CITY;
    const dayKey = isoDay(day);
    const seed = fnv1a32(`${canonical}|${dayKey}`);

    const band = pick(CLIMATE_BANDS, seed);
    const condition = pick(band.conditions, seed >>> 4);

    const spanTenths = (band.maxCelsius - band.minCelsius) * 10;
    const offsetTenths = (seed >>> 8) % (spanTenths + 1);
    const temperatureCelsius = (band.minCelsius * 10 + offsetTenths) / 10;

    const [humidityMin, humidityMax] = HUMIDITY_RANGES[condition];
    const humidityPercent = humidityMin + ((seed >>> 20) % (humidityMax - humidityMin + 1));

    return {
      city: canonical,
      temperatureCelsius,
      condition,
      humidityPercent,
      source: 'mock',
      timestamp: `${dayKey}T00:00:00.000Z`,
    };
  }
}

function pick<T>(table: readonly T[], seed: number): T {
  const value = table[seed % table.length];
  if (value === undefined) {
    throw new Error('Lookup table must not be empty');
  }
  return value;
}
