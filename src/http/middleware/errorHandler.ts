// src/http/middleware/errorHandler.ts

/**
 * Global error handler
 *
 * - Converts request DTO validation errors and malformed JSON into HTTP 400
 * - Converts unknown errors into HTTP 500
 * - Always returns the standard error envelope
 * - Includes correlationId so callers can trace failures
 */

import type { NextFunction, Request, Response } from 'express';
import { buildErrorEnvelope } from '../errors/errorEnvelope';
import '../requestContext';

import { ToolCallDtoValidationError } from '../../tools/dto/ToolDto';
import { QueryDtoValidationError } from '../../query/dto/QueryDto';
import { logger } from '../../shared/logging/Logger';

/**
 * express.json() reports unparsable bodies with type "entity.parse.failed".
 */
function isBodyParseError(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'type' in err &&
    err.type === 'entity.parse.failed'
  );
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const correlation = req.correlationId ? { correlationId: req.correlationId } : {};

  // 400: request payload validation failures (boundary protection)
  if (err instanceof ToolCallDtoValidationError || err instanceof QueryDtoValidationError) {
    logger.debug(
      { correlationId: req.correlationId, issues: err.issues },
      `${err.name}: request validation failed`,
    );

    res.status(400).json(
      buildErrorEnvelope({
        kind: 'ValidationError',
        message: err.message,
        issues: err.issues,
        ...correlation,
      }),
    );
    return;
  }

  if (isBodyParseError(err)) {
    logger.debug({ correlationId: req.correlationId }, 'Malformed JSON body');

    res.status(400).json(
      buildErrorEnvelope({
        kind: 'ValidationError',
        message: 'Request body is not valid JSON.',
        ...correlation,
      }),
    );
    return;
  }

  // 500: unknown/unexpected failures
  logger.error({ correlationId: req.correlationId, err }, 'Unhandled error in request pipeline');

  res.status(500).json(
    buildErrorEnvelope({
      kind: 'InternalError',
      message: 'An unexpected error occurred.',
      ...correlation,
    }),
  );
}
