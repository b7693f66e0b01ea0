/**
 * Live weather data provider port.
 *
 * Providers report failures as a tagged outcome instead of throwing, so the
 * resolver's retry/fallback decision is explicit:
 *
 * - transient: worth retrying (timeout, 5xx, connection reset/refused)
 * - terminal:  retrying cannot help (4xx such as unknown city or bad key, malformed body)
 * - cancelled: the caller aborted; stop immediately
 */

import type { WeatherCondition } from './WeatherReading';

/**
 * Raw observation returned by a live provider, before the resolver tags it.
 */
export interface WeatherObservation {
  city: string;
  temperatureCelsius: number;
  condition: WeatherCondition;
  humidityPercent: number;
  observedAt: string;
}

export class ProviderTransientError extends Error {
  public readonly status?: number;

  public constructor(message: string, status?: number) {
    super(message);
    this.name = 'ProviderTransientError';
    if (status !== undefined) this.status = status;
  }
}

export class ProviderTerminalError extends Error {
  public readonly status?: number;

  public constructor(message: string, status?: number) {
    super(message);
    this.name = 'ProviderTerminalError';
    if (status !== undefined) this.status = status;
  }
}

export type ProviderOutcome =
  | { kind: 'ok'; observation: WeatherObservation }
  | { kind: 'transient'; error: ProviderTransientError }
  | { kind: 'terminal'; error: ProviderTerminalError }
  | { kind: 'cancelled' };

export interface FetchOptions {
  signal?: AbortSignal;
}

export interface WeatherDataProvider {
  /**
   * Provider name used in logs (e.g. "openweathermap").
   */
  readonly name: string;

  /**
   * Fetch current conditions for one city. Must not reject.
   */
  fetchCurrent(city: string, options?: FetchOptions): Promise<ProviderOutcome>;
}
