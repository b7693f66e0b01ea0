/**
 * Express application setup for the weather tools service.
 *
 * This module:
 * - Creates and configures the Express 5 app instance.
 * - Registers global middleware (correlation id, JSON parsing, request logging).
 * - Mounts the tool protocol and query routes for the dependencies it is given.
 * - Exposes a healthcheck endpoint for monitoring.
 */
import express, { Application, NextFunction, Request, Response } from 'express';

import type { ToolServerPort } from './tools/application/ToolServer';
import type { WeatherQueryPort } from './http/routes/queryRoutes';
import { createToolRoutes } from './http/routes/toolRoutes';
import { createQueryRoutes } from './http/routes/queryRoutes';
import { correlationIdMiddleware } from './http/middleware/correlationId';
import { errorHandler } from './http/middleware/errorHandler';
import { notFound } from './http/middleware/notFound';
import { logger } from './shared/logging/Logger';
import './http/requestContext';

export type AppDeps = {
  toolServer?: ToolServerPort;
  queryService?: WeatherQueryPort;
  serviceName?: string;
};

export function createApp(deps: AppDeps = {}): Application {
  const app = express();

  app.use(correlationIdMiddleware);

  // Parse JSON bodies
  app.use(express.json({ limit: '16kb' }));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(
      { method: req.method, path: req.path, correlationId: req.correlationId },
      'Incoming request',
    );
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      service: deps.serviceName ?? 'weather-tools-service',
      timestamp: new Date().toISOString(),
    });
  });

  if (deps.toolServer) {
    app.use(createToolRoutes(deps.toolServer));
  }

  if (deps.queryService) {
    app.use(createQueryRoutes(deps.queryService));
  }

  app.use(notFound);

  // Global error handler (keeps errors in one place)
  app.use(errorHandler);

  return app;
}
