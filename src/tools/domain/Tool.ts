/**
 * Tool domain models.
 *
 * A tool is a named, schema-described operation the server can invoke
 * on behalf of a caller (e.g. "get_weather").
 */

export type ToolParameterType = 'string' | 'number' | 'integer' | 'boolean';

/**
 * Declared shape of a single tool argument.
 */
export interface ToolParameter {
  type: ToolParameterType;
  required: boolean;
  description?: string;
}

/**
 * Parameter name -> declaration. Declaration order is the validation order.
 */
export type ToolInputSchema = Readonly<Record<string, ToolParameter>>;

export interface ToolDefinition {
  /**
   * Unique tool name in the registry, e.g. "get_weather".
   */
  name: string;

  /**
   * Human-readable description used in discovery listings.
   */
  description: string;

  inputSchema: ToolInputSchema;
}

export type ToolArguments = Record<string, unknown>;

export type ToolPayload = Record<string, unknown>;

/**
 * Per-invocation context handed to a handler.
 */
export interface ToolInvocationContext {
  /**
   * Aborted when the caller gives up or the server's invocation timeout fires.
   * Handlers that do I/O must forward it.
   */
  signal: AbortSignal;
  correlationId?: string;
}

export type ToolHandler = (args: ToolArguments, context: ToolInvocationContext) => Promise<ToolPayload>;

export interface ToolInvocationRequest {
  toolName: string;

  /**
   * Raw caller input; validated against the tool's schema during invocation.
   */
  arguments?: unknown;
}

export type ToolFailureKind = 'UnknownTool' | 'ValidationError' | 'HandlerError';

export interface ToolFailure {
  kind: ToolFailureKind;
  message: string;
  /**
   * First offending argument, for validation failures.
   */
  field?: string;
}

export type ToolInvocationResult =
  | { ok: true; toolName: string; payload: ToolPayload }
  | { ok: false; toolName: string; error: ToolFailure };
