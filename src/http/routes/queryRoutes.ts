// src/http/routes/queryRoutes.ts

/**
 * /v1/query route
 *
 * Free text in, extracted query + structured weather reading out.
 * Prose generation happens downstream, outside this service.
 */

import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';

import type { WeatherQueryAnswer } from '../../query/application/WeatherQueryService';
import type { InvokeOptions } from '../../tools/application/ToolServer';
import { parseQueryRequestDto, toExtractedQueryDto } from '../../query/dto/QueryDto';
import { statusForToolFailure, toolFailureEnvelope } from '../errors/errorEnvelope';
import { abortOnClientDisconnect } from '../clientAbort';
import '../requestContext';

export interface WeatherQueryPort {
  answer(text: string, options?: InvokeOptions): Promise<WeatherQueryAnswer>;
}

export function createQueryRoutes(queryService: WeatherQueryPort): Router {
  const router = Router();

  router.post('/v1/query', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { text } = parseQueryRequestDto(req.body);
      const { query, result } = await queryService.answer(text, {
        signal: abortOnClientDisconnect(res),
        ...(req.correlationId ? { correlationId: req.correlationId } : {}),
      });

      if (!result.ok) {
        res
          .status(statusForToolFailure(result.error))
          .json(toolFailureEnvelope(result.error, req.correlationId));
        return;
      }

      res.status(200).json({
        query: toExtractedQueryDto(query),
        reading: result.payload,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
