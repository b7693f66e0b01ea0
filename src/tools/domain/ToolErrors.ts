/**
 * Errors raised by the tool registry and server.
 *
 * ToolServer converts each of these into a ToolInvocationResult failure,
 * so none of them ever reaches a remote caller as a raw exception.
 */

import type { ToolFailureKind } from './Tool';

export class DuplicateToolError extends Error {
  public readonly toolName: string;

  public constructor(toolName: string) {
    super(`Tool already registered: ${toolName}`);
    this.name = 'DuplicateToolError';
    this.toolName = toolName;
  }
}

export class RegistryFrozenError extends Error {
  public constructor(toolName: string) {
    super(`Tool registry is frozen; cannot register ${toolName}`);
    this.name = 'RegistryFrozenError';
  }
}

export class UnknownToolError extends Error {
  public readonly kind: ToolFailureKind = 'UnknownTool';
  public readonly toolName: string;

  public constructor(toolName: string) {
    super(`Tool not available: ${toolName}`);
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

export class ToolValidationError extends Error {
  public readonly kind: ToolFailureKind = 'ValidationError';
  public readonly field: string;

  public constructor(field: string, message: string) {
    super(message);
    this.name = 'ToolValidationError';
    this.field = field;
  }
}

/**
 * Wraps a failure thrown by a tool's own handler.
 */
export class HandlerError extends Error {
  public readonly kind: ToolFailureKind = 'HandlerError';
  public readonly toolName: string;
  public override readonly cause: unknown;

  public constructor(toolName: string, cause: unknown) {
    super(`Tool "${toolName}" failed: ${describeCause(cause)}`);
    this.name = 'HandlerError';
    this.toolName = toolName;
    this.cause = cause;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
