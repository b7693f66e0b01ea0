/**
 * Runtime configuration for the weather tools service.
 *
 * Environment variables are read once, here, and turned into a typed
 * structure. Core components receive the slice they need through their
 * constructors; nothing below the composition root reads process.env.
 */
import dotenv from 'dotenv';

dotenv.config();

export type AppEnv = 'development' | 'test' | 'production';

export interface WeatherProviderConfig {
  /**
   * OpenWeatherMap credential. Empty string means "no live provider":
   * every reading is served by the mock generator.
   */
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  backoffMs: number;
  /** Upper bound on pooled sockets per host for the shared HTTP client. */
  maxSockets: number;
}

export interface AppConfig {
  env: AppEnv;
  port: number;
  serviceName: string;
  serviceVersion: string;
  logLevel?: string;
  defaultCity: string;
  invocationTimeoutMs: number;
  gazetteerPath: string;
  provider: WeatherProviderConfig;
}

const DEFAULT_PORT = 8000;
const DEFAULT_CITY = 'Hyderabad';

export const DEFAULT_PROVIDER_CONFIG: WeatherProviderConfig = {
  apiKey: '',
  baseUrl: 'https://api.openweathermap.org/data/2.5',
  timeoutMs: 5000,
  maxRetries: 2,
  backoffMs: 250,
  maxSockets: 10,
};

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const value = raw ? Number(raw) : fallback;
  if (!Number.isInteger(value) || value <= 0) {
    return fallback;
  }
  return value;
}

function parseNonNegativeInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim().length === 0) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    return fallback;
  }
  return value;
}

function parseEnv(raw: string | undefined): AppEnv {
  if (raw === 'production' || raw === 'test') return raw;
  return 'development';
}

function nonEmpty(raw: string | undefined, fallback: string): string {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : fallback;
}

/**
 * Build the configuration from an environment map with sane defaults.
 * Invalid numeric values fall back to their defaults instead of failing startup.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = env.LOG_LEVEL?.trim();

  return Object.freeze({
    env: parseEnv(env.NODE_ENV),
    port: parsePositiveInt(env.PORT, DEFAULT_PORT),
    serviceName: nonEmpty(env.SERVICE_NAME, 'weather-tools-service'),
    serviceVersion: nonEmpty(env.SERVICE_VERSION, '0.1.0'),
    ...(logLevel ? { logLevel } : {}),
    defaultCity: nonEmpty(env.DEFAULT_CITY, DEFAULT_CITY),
    invocationTimeoutMs: parseNonNegativeInt(env.TOOL_INVOCATION_TIMEOUT_MS, 15000),
    gazetteerPath: nonEmpty(env.GAZETTEER_PATH, 'data/gazetteer.json'),
    provider: Object.freeze({
      apiKey: env.OPENWEATHER_API_KEY?.trim() ?? '',
      baseUrl: nonEmpty(env.OPENWEATHER_BASE_URL, DEFAULT_PROVIDER_CONFIG.baseUrl),
      timeoutMs: parseNonNegativeInt(env.PROVIDER_TIMEOUT_MS, DEFAULT_PROVIDER_CONFIG.timeoutMs),
      maxRetries: parseNonNegativeInt(env.PROVIDER_MAX_RETRIES, DEFAULT_PROVIDER_CONFIG.maxRetries),
      backoffMs: parseNonNegativeInt(env.PROVIDER_BACKOFF_MS, DEFAULT_PROVIDER_CONFIG.backoffMs),
      maxSockets: parsePositiveInt(env.PROVIDER_MAX_SOCKETS, DEFAULT_PROVIDER_CONFIG.maxSockets),
    }),
  });
}

/**
 * Process-wide configuration, constructed once at startup.
 */
export const config: AppConfig = loadConfig();
