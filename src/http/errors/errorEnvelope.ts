// src/http/errors/errorEnvelope.ts

/**
 * Standard error envelope
 *
 * Every error response, tool failures included, follows this structure so
 * remote callers can parse failures without special cases.
 */

import type { ToolFailure, ToolFailureKind } from '../../tools/domain/Tool';

export type ErrorKind = ToolFailureKind | 'NotFound' | 'InternalError';

export type ErrorEnvelope = {
  error: {
    kind: ErrorKind;
    message: string;
    correlationId?: string;
    field?: string;
    issues?: string[];
  };
};

export function buildErrorEnvelope(params: {
  kind: ErrorKind;
  message: string;
  correlationId?: string;
  field?: string;
  issues?: string[];
}): ErrorEnvelope {
  return {
    error: {
      kind: params.kind,
      message: params.message,
      ...(params.correlationId ? { correlationId: params.correlationId } : {}),
      ...(params.field ? { field: params.field } : {}),
      ...(params.issues ? { issues: params.issues } : {}),
    },
  };
}

const STATUS_BY_FAILURE: Record<ToolFailureKind, number> = {
  UnknownTool: 404,
  ValidationError: 400,
  HandlerError: 500,
};

export function statusForToolFailure(failure: ToolFailure): number {
  return STATUS_BY_FAILURE[failure.kind];
}

export function toolFailureEnvelope(failure: ToolFailure, correlationId?: string): ErrorEnvelope {
  return buildErrorEnvelope({
    kind: failure.kind,
    message: failure.message,
    ...(correlationId ? { correlationId } : {}),
    ...(failure.field ? { field: failure.field } : {}),
  });
}
