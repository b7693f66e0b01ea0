/**
 * HTTP server entrypoint for the weather tools service.
 *
 * This file:
 * - Loads configuration
 * - Builds runtime dependencies (composition root)
 * - Creates the Express app
 * - Starts listening on the configured port
 */
import { createServer } from 'http';
import { createApp } from './app';
import { buildRuntimeDeps } from './bootstrap/buildDeps';
import { config } from './shared/config/Config';
import { logger } from './shared/logging/Logger';

const deps = buildRuntimeDeps(config);
const app = createApp({
  toolServer: deps.toolServer,
  queryService: deps.queryService,
  serviceName: config.serviceName,
});
const server = createServer(app);

server.listen(config.port, () => {
  logger.info(
    {
      port: config.port,
      env: config.env,
      mode: deps.liveProviderEnabled ? 'live' : 'mock',
    },
    'Weather tools service started',
  );
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  server.close(() => {
    deps
      .shutdown()
      .then(() => {
        logger.info('HTTP server closed');
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({ err }, 'Error while releasing resources');
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
