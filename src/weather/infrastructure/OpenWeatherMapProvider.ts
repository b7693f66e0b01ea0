// src/weather/infrastructure/OpenWeatherMapProvider.ts

/**
 * OpenWeatherMapProvider
 *
 * Live WeatherDataProvider backed by the OpenWeatherMap "current weather"
 * endpoint. The response is untrusted: anything that does not match the
 * expected shape is a terminal failure rather than a partially filled reading.
 */

import axios from 'axios';

import type {
  FetchOptions,
  ProviderOutcome,
  WeatherDataProvider,
  WeatherObservation,
} from '../domain/WeatherDataProvider';
import { ProviderTerminalError, ProviderTransientError } from '../domain/WeatherDataProvider';
import type { WeatherCondition } from '../domain/WeatherReading';
import { normalizeHumidity } from '../domain/WeatherReading';
import type { HttpClient } from './HttpClient';

export type OpenWeatherMapProviderDeps = {
  http: HttpClient;
  apiKey: string;
  now?: () => Date;
};

const CONDITION_BY_GROUP: ReadonlyMap<string, WeatherCondition> = new Map<string, WeatherCondition>([
  ['Clear', 'clear'],
  ['Clouds', 'clouds'],
  ['Rain', 'rain'],
  ['Drizzle', 'rain'],
  ['Snow', 'snow'],
  ['Thunderstorm', 'storm'],
  ['Squall', 'storm'],
  ['Tornado', 'storm'],
  ['Mist', 'mist'],
  ['Fog', 'mist'],
  ['Haze', 'mist'],
  ['Smoke', 'mist'],
  ['Dust', 'mist'],
  ['Sand', 'mist'],
  ['Ash', 'mist'],
]);

// Network-level failures that a second attempt can plausibly get past.
const TRANSIENT_CODES = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'EAI_AGAIN',
  'ERR_NETWORK',
]);

export function mapConditionGroup(group: unknown): WeatherCondition {
  if (typeof group !== 'string') return 'unknown';
  return CONDITION_BY_GROUP.get(group) ?? 'unknown';
}

export class OpenWeatherMapProvider implements WeatherDataProvider {
  public readonly name = 'openweathermap';

  private readonly now: () => Date;

  public constructor(private readonly deps: OpenWeatherMapProviderDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  public async fetchCurrent(city: string, options: FetchOptions = {}): Promise<ProviderOutcome> {
    let data: unknown;

    try {
      const response = await this.deps.http.axios.get<unknown>('/weather', {
        params: { q: city, appid: this.deps.apiKey, units: 'metric' },
        ...(options.signal ? { signal: options.signal } : {}),
      });
      data = response.data;
    } catch (err) {
      return classifyFailure(err, options.signal);
    }

    const observation = parseObservation(data, city, this.now);
    if (!observation) {
      return {
        kind: 'terminal',
        error: new ProviderTerminalError('Malformed response from weather provider'),
      };
    }

    return { kind: 'ok', observation };
  }
}

function classifyFailure(err: unknown, signal: AbortSignal | undefined): ProviderOutcome {
  if (axios.isCancel(err) || signal?.aborted) {
    return { kind: 'cancelled' };
  }

  if (!axios.isAxiosError(err)) {
    const message = err instanceof Error ? err.message : String(err);
    return { kind: 'terminal', error: new ProviderTerminalError(message) };
  }

  const status = err.response?.status;
  if (status !== undefined) {
    if (status >= 500) {
      return {
        kind: 'transient',
        error: new ProviderTransientError(`Weather provider returned ${status}`, status),
      };
    }
    return {
      kind: 'terminal',
      error: new ProviderTerminalError(`Weather provider returned ${status}`, status),
    };
  }

  if (err.code === undefined || TRANSIENT_CODES.has(err.code)) {
    return {
      kind: 'transient',
      error: new ProviderTransientError(`Weather provider unreachable (${err.code ?? 'no response'})`),
    };
  }

  return { kind: 'terminal', error: new ProviderTerminalError(err.message) };
}

/**
 * Narrow the provider body to an observation. Returns null if required fields are missing.
 */
function parseObservation(data: unknown, requestedCity: string, now: () => Date): WeatherObservation | null {
  if (!isRecord(data)) return null;

  const main = data.main;
  if (!isRecord(main)) return null;

  const temp = main.temp;
  const humidity = main.humidity;
  if (typeof temp !== 'number' || !Number.isFinite(temp)) return null;
  if (typeof humidity !== 'number' || !Number.isFinite(humidity)) return null;

  const weather = data.weather;
  const first: unknown = Array.isArray(weather) ? weather[0] : undefined;
  const condition = mapConditionGroup(isRecord(first) ? first.main : undefined);

  const name = typeof data.name === 'string' && data.name.trim().length > 0 ? data.name : requestedCity;
  const observedAt =
    typeof data.dt === 'number' && Number.isFinite(data.dt)
      ? new Date(data.dt * 1000).toISOString()
      : now().toISOString();

  return {
    city: name,
    temperatureCelsius: Math.round(temp * 10) / 10,
    condition,
    humidityPercent: normalizeHumidity(humidity),
    observedAt,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
