// src/http/middleware/correlationId.ts

/**
 * Correlation ID middleware
 *
 * Rules:
 * 1) Prefer header: x-correlation-id
 * 2) Otherwise generate a UUID
 *
 * Outputs:
 * - req.correlationId (typed via module augmentation in requestContext.ts)
 * - response header x-correlation-id
 */

import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';
import '../requestContext';

const MAX_CORRELATION_ID_LENGTH = 128;

function readCorrelationIdHeader(req: Request): string | undefined {
  const headerId = req.header('x-correlation-id');
  if (typeof headerId !== 'string') return undefined;

  const trimmed = headerId.trim();
  return trimmed.length > 0 && trimmed.length <= MAX_CORRELATION_ID_LENGTH ? trimmed : undefined;
}

export function correlationIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const correlationId = readCorrelationIdHeader(req) ?? randomUUID();

  req.correlationId = correlationId;
  res.setHeader('x-correlation-id', correlationId);

  next();
}
