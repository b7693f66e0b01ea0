// src/query/dto/QueryDto.ts

/**
 * /v1/query boundary: request validation and response shaping.
 */

import type { ExtractedQuery } from '../domain/ExtractedQuery';

export class QueryDtoValidationError extends Error {
  public readonly issues: string[];

  public constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'QueryDtoValidationError';
    this.issues = issues;
  }
}

export const MAX_QUERY_LENGTH = 2000;

export type QueryRequestDto = {
  text: string;
};

export type ExtractedQueryDto = {
  raw_text: string;
  candidate_city: string | null;
  intent: ExtractedQuery['intent'];
  confidence: ExtractedQuery['confidence'];
  matched_by: ExtractedQuery['matchedBy'];
};

export function parseQueryRequestDto(payload: unknown): QueryRequestDto {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new QueryDtoValidationError('Invalid query payload', ['Payload must be a JSON object.']);
  }

  const text: unknown = 'text' in payload ? payload.text : undefined;

  if (typeof text !== 'string' || text.trim().length === 0) {
    throw new QueryDtoValidationError('Invalid query payload', ['"text" must be a non-empty string.']);
  }
  if (text.length > MAX_QUERY_LENGTH) {
    throw new QueryDtoValidationError('Invalid query payload', [
      `"text" must be at most ${MAX_QUERY_LENGTH} characters.`,
    ]);
  }

  return { text };
}

export function toExtractedQueryDto(query: ExtractedQuery): ExtractedQueryDto {
  return {
    raw_text: query.rawText,
    candidate_city: query.candidateCity ?? null,
    intent: query.intent,
    confidence: query.confidence,
    matched_by: query.matchedBy,
  };
}
