// src/tools/dto/ToolDto.ts

/**
 * Wire format for the tool protocol (HTTP + JSON binding).
 *
 * - parseToolCallDto(): validates a POST /tools/call body into a ToolInvocationRequest.
 *   Only the tool name is checked here; arguments are validated by ToolServer
 *   once the tool is known, so they are reported as a tool failure.
 * - toToolDefinitionDto(): snake_case discovery entry for GET /tools/list.
 */

import type { ToolDefinition, ToolInvocationRequest, ToolParameter } from '../domain/Tool';

export class ToolCallDtoValidationError extends Error {
  public readonly issues: string[];

  public constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'ToolCallDtoValidationError';
    this.issues = issues;
  }
}

export type ToolDefinitionDto = {
  name: string;
  description: string;
  input_schema: Record<string, ToolParameter>;
};

export function toToolDefinitionDto(definition: ToolDefinition): ToolDefinitionDto {
  return {
    name: definition.name,
    description: definition.description,
    input_schema: { ...definition.inputSchema },
  };
}

/**
 * Accepts `{ "tool_name": ..., "arguments": {...} }`, and `name` as an alias of
 * `tool_name` for clients speaking the `{ "name", "arguments" }` dialect.
 */
export function parseToolCallDto(payload: unknown): ToolInvocationRequest {
  if (!isRecord(payload)) {
    throw new ToolCallDtoValidationError('Invalid tool call payload', [
      'Payload must be a JSON object.',
    ]);
  }

  const rawName = payload.tool_name ?? payload.name;

  if (typeof rawName !== 'string' || rawName.trim().length === 0) {
    throw new ToolCallDtoValidationError('Invalid tool call payload', [
      '"tool_name" must be a non-empty string.',
    ]);
  }

  // The arguments' shape is checked by ToolServer after the tool lookup.
  return {
    toolName: rawName.trim(),
    ...(payload.arguments !== undefined ? { arguments: payload.arguments } : {}),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
