/**
 * Application logger based on pino.
 * This provides structured, JSON logs suitable for production.
 */
import pino, { Logger as PinoLogger } from 'pino';
import { config } from '../config/Config';

export interface AppLogger extends PinoLogger {}

function defaultLevel(): string {
  if (config.env === 'production') return 'info';
  if (config.env === 'test') return 'silent';
  return 'debug';
}

export const logger: AppLogger = pino({
  level: config.logLevel ?? defaultLevel(),
  base: {
    service: config.serviceName,
    version: config.serviceVersion,
    env: config.env,
  },
  transport:
    config.env === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});
