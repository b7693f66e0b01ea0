// src/bootstrap/buildDeps.ts

/**
 * Composition Root
 * ----------------
 * The only place that reads configuration and wires infrastructure into
 * application services. Everything below receives its collaborators by
 * constructor injection.
 *
 * The tool registry is filled and frozen here, before the server starts
 * accepting requests.
 */

import type { AppConfig } from '../shared/config/Config';
import { logger } from '../shared/logging/Logger';

import { ToolRegistry } from '../tools/application/ToolRegistry';
import { ToolServer } from '../tools/application/ToolServer';

import { createHttpClient, type HttpClient, type HttpClientOptions } from '../weather/infrastructure/HttpClient';
import { OpenWeatherMapProvider } from '../weather/infrastructure/OpenWeatherMapProvider';
import { WeatherResolver } from '../weather/application/WeatherResolver';
import { createGetWeatherHandler, getWeatherDefinition } from '../weather/tools/getWeatherTool';

import { Gazetteer } from '../query/infrastructure/Gazetteer';
import { RuleBasedQueryInterpreter } from '../query/application/RuleBasedQueryInterpreter';
import { WeatherQueryService } from '../query/application/WeatherQueryService';

export type RuntimeDeps = {
  toolServer: ToolServer;
  queryService: WeatherQueryService;

  /**
   * Whether readings can come from the live provider at all.
   */
  liveProviderEnabled: boolean;

  /**
   * Called during graceful shutdown to release pooled connections.
   */
  shutdown: () => Promise<void>;
};

export type BuildOverrides = {
  /**
   * Pre-built gazetteer (skips reading config.gazetteerPath).
   */
  gazetteer?: Gazetteer;

  /**
   * Transport override for the live provider's HTTP client.
   */
  httpAdapter?: HttpClientOptions['adapter'];

  now?: () => Date;
};

/**
 * Builds runtime dependencies for the weather tools service.
 */
export function buildRuntimeDeps(config: AppConfig, overrides: BuildOverrides = {}): RuntimeDeps {
  const providerConfig = config.provider;
  const liveProviderEnabled = providerConfig.apiKey.length > 0;

  let http: HttpClient | null = null;
  let provider: OpenWeatherMapProvider | null = null;

  if (liveProviderEnabled) {
    http = createHttpClient({
      baseURL: providerConfig.baseUrl,
      timeoutMs: providerConfig.timeoutMs,
      maxSockets: providerConfig.maxSockets,
      ...(overrides.httpAdapter ? { adapter: overrides.httpAdapter } : {}),
    });
    provider = new OpenWeatherMapProvider({
      http,
      apiKey: providerConfig.apiKey,
      ...(overrides.now ? { now: overrides.now } : {}),
    });
  }

  const resolver = new WeatherResolver({
    provider,
    defaultCity: config.defaultCity,
    maxRetries: providerConfig.maxRetries,
    backoffMs: providerConfig.backoffMs,
    ...(overrides.now ? { now: overrides.now } : {}),
  });

  const registry = new ToolRegistry()
    .register(getWeatherDefinition, createGetWeatherHandler(resolver))
    .freeze();

  const toolServer = new ToolServer({
    registry,
    invocationTimeoutMs: config.invocationTimeoutMs,
  });

  const gazetteer = overrides.gazetteer ?? Gazetteer.fromFile(config.gazetteerPath);
  const queryService = new WeatherQueryService({
    interpreter: new RuleBasedQueryInterpreter(gazetteer),
    toolServer,
  });

  logger.info(
    {
      mode: liveProviderEnabled ? 'live' : 'mock',
      defaultCity: config.defaultCity,
      tools: registry.list().map((t) => t.name),
      gazetteerSize: gazetteer.size,
    },
    'Runtime dependencies built',
  );

  return {
    toolServer,
    queryService,
    liveProviderEnabled,
    shutdown: async () => {
      http?.destroy();
    },
  };
}
