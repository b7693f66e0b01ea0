// src/weather/application/WeatherResolver.ts

/**
 * WeatherResolver
 * ---------------
 * Turns a (possibly missing) city name into a WeatherReading.
 *
 * Policy:
 * 1) Blank/absent city -> configured default city.
 * 2) No live provider configured -> mock reading.
 * 3) Live provider: 1 attempt + `maxRetries` retries on transient failures,
 *    with a fixed backoff between attempts. Terminal failures stop at once.
 * 4) Exhausted retries, terminal failure or cancellation -> mock reading.
 *
 * resolve() never rejects; callers learn about degraded data only through
 * `reading.source`.
 */

import type { ProviderOutcome, WeatherDataProvider } from '../domain/WeatherDataProvider';
import { ProviderTerminalError } from '../domain/WeatherDataProvider';
import type { WeatherReading } from '../domain/WeatherReading';
import { canonicalizeCity, normalizeHumidity } from '../domain/WeatherReading';
import { MockWeatherGenerator } from './MockWeatherGenerator';
import { delay } from '../../shared/async/abort';
import { logger as rootLogger, type AppLogger } from '../../shared/logging/Logger';

export type WeatherResolverDeps = {
  /**
   * Live provider, or null when no credential is configured.
   */
  provider: WeatherDataProvider | null;

  defaultCity: string;

  /**
   * Retries after the first attempt, for transient failures only.
   */
  maxRetries: number;

  /**
   * Fixed wait between attempts.
   */
  backoffMs: number;

  mock?: MockWeatherGenerator;
  now?: () => Date;
  logger?: AppLogger;
};

export interface ResolveOptions {
  signal?: AbortSignal;
}

/**
 * Port consumed by the get_weather tool.
 */
export interface WeatherResolverPort {
  resolve(city?: string, options?: ResolveOptions): Promise<WeatherReading>;
}

type FallbackReason = 'no_provider' | 'retries_exhausted' | 'terminal' | 'cancelled';

export class WeatherResolver implements WeatherResolverPort {
  private readonly mock: MockWeatherGenerator;
  private readonly now: () => Date;
  private readonly logger: AppLogger;
  private readonly maxRetries: number;
  private readonly backoffMs: number;

  public constructor(private readonly deps: WeatherResolverDeps) {
    this.mock = deps.mock ?? new MockWeatherGenerator();
    this.now = deps.now ?? (() => new Date());
    this.logger = (deps.logger ?? rootLogger).child({ component: 'WeatherResolver' });
    this.maxRetries = Math.max(0, Math.floor(deps.maxRetries));
    this.backoffMs = Math.max(0, deps.backoffMs);
  }

  public async resolve(city?: string, options: ResolveOptions = {}): Promise<WeatherReading> {
    const target = canonicalizeCity(city ?? '') || canonicalizeCity(this.deps.defaultCity);
    const { provider } = this.deps;

    if (!provider) {
      return this.fallback(target, 'no_provider');
    }

    const totalAttempts = 1 + this.maxRetries;

    for (let attempt = 1; attempt <= totalAttempts; attempt++) {
      if (options.signal?.aborted) {
        return this.fallback(target, 'cancelled');
      }

      const outcome = await this.fetchSafely(provider, target, options.signal);

      switch (outcome.kind) {
        case 'ok': {
          const { observation } = outcome;
          return {
            city: canonicalizeCity(observation.city) || target,
            temperatureCelsius: observation.temperatureCelsius,
            condition: observation.condition,
            humidityPercent: normalizeHumidity(observation.humidityPercent),
            source: 'live',
            timestamp: observation.observedAt,
          };
        }

        case 'cancelled':
          return this.fallback(target, 'cancelled');

        case 'terminal':
          this.logger.info(
            { city: target, provider: provider.name, status: outcome.error.status, attempt },
            `Live provider failed terminally: ${outcome.error.message}`,
          );
          return this.fallback(target, 'terminal');

        case 'transient': {
          this.logger.warn(
            { city: target, provider: provider.name, status: outcome.error.status, attempt, totalAttempts },
            `Live provider transient failure: ${outcome.error.message}`,
          );
          if (attempt < totalAttempts) {
            const waited = await delay(this.backoffMs, options.signal);
            if (!waited) return this.fallback(target, 'cancelled');
          }
          break;
        }
      }
    }

    return this.fallback(target, 'retries_exhausted');
  }

  /**
   * The provider contract says fetchCurrent never rejects; a provider that does
   * anyway is treated as terminal so the mock still answers.
   */
  private async fetchSafely(
    provider: WeatherDataProvider,
    city: string,
    signal: AbortSignal | undefined,
  ): Promise<ProviderOutcome> {
    try {
      return await provider.fetchCurrent(city, signal ? { signal } : {});
    } catch (err) {
      if (signal?.aborted) return { kind: 'cancelled' };
      this.logger.error({ city, provider: provider.name, err }, 'Live provider rejected unexpectedly');
      return {
        kind: 'terminal',
        error: new ProviderTerminalError(err instanceof Error ? err.message : String(err)),
      };
    }
  }

  private fallback(city: string, reason: FallbackReason): WeatherReading {
    this.logger.debug({ city, reason }, 'Serving mock weather reading');
    return this.mock.generate(city, this.now());
  }
}
