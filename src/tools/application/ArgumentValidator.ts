// src/tools/application/ArgumentValidator.ts

/**
 * Checks invocation arguments against a tool's declared input schema.
 *
 * Parameters are checked in declaration order and the first offending one
 * is reported. Arguments that the schema does not declare are dropped, so
 * handlers only ever see validated input.
 */

import type { ToolArguments, ToolDefinition, ToolParameter } from '../domain/Tool';
import { ToolValidationError } from '../domain/ToolErrors';

export function validateToolArguments(definition: ToolDefinition, raw: unknown): ToolArguments {
  if (raw === undefined || raw === null) {
    raw = {};
  }

  if (!isRecord(raw)) {
    throw new ToolValidationError('arguments', '"arguments" must be a JSON object.');
  }

  const validated: ToolArguments = {};

  for (const [param, spec] of Object.entries(definition.inputSchema)) {
    const value = raw[param];

    // null is treated as "not provided" for JSON callers.
    if (value === undefined || value === null) {
      if (spec.required) {
        throw new ToolValidationError(param, `"${param}" is required.`);
      }
      continue;
    }

    if (!matchesType(value, spec)) {
      throw new ToolValidationError(param, `"${param}" must be of type ${spec.type}.`);
    }

    validated[param] = value;
  }

  return validated;
}

function matchesType(value: unknown, spec: ToolParameter): boolean {
  switch (spec.type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
