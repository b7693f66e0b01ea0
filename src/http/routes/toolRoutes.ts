// src/http/routes/toolRoutes.ts

/**
 * Tool protocol routes
 *
 * - GET  /tools/list -> discovery listing
 * - POST /tools/call -> invoke one tool
 *
 * The HTTP layer stays thin: parse the envelope, delegate to ToolServer,
 * map the tagged result onto a status code. Tool failures are regular
 * results here, not thrown errors.
 */

import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';

import type { ToolServerPort } from '../../tools/application/ToolServer';
import { parseToolCallDto, toToolDefinitionDto } from '../../tools/dto/ToolDto';
import { statusForToolFailure, toolFailureEnvelope } from '../errors/errorEnvelope';
import { abortOnClientDisconnect } from '../clientAbort';
import '../requestContext';

export function createToolRoutes(toolServer: ToolServerPort): Router {
  const router = Router();

  router.get('/tools/list', (_req: Request, res: Response) => {
    res.status(200).json({ tools: toolServer.listTools().map(toToolDefinitionDto) });
  });

  router.post('/tools/call', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parseToolCallDto(req.body);
      const result = await toolServer.invoke(request, {
        signal: abortOnClientDisconnect(res),
        ...(req.correlationId ? { correlationId: req.correlationId } : {}),
      });

      if (result.ok) {
        res.status(200).json(result.payload);
      } else {
        res
          .status(statusForToolFailure(result.error))
          .json(toolFailureEnvelope(result.error, req.correlationId));
      }
    } catch (err) {
      next(err);
    }
  });

  return router;
}
