// src/client/ToolServerClient.ts

/**
 * ToolServerClient
 *
 * Remote caller of the HTTP tool protocol. Mirrors ToolServerPort's shape
 * so callers can switch between in-process and remote invocation.
 *
 * callTool() never rejects: failure envelopes from the server are decoded
 * into `{ ok: false }` results, and transport problems (server down,
 * timeout, unreadable body) become HandlerError failures.
 */

import axios, { type AxiosInstance } from 'axios';

import type {
  ToolArguments,
  ToolDefinition,
  ToolFailure,
  ToolFailureKind,
  ToolInputSchema,
  ToolInvocationResult,
  ToolParameter,
} from '../tools/domain/Tool';

export type ToolServerClientDeps = {
  /**
   * axios instance whose baseURL points at the tool server.
   */
  http: AxiosInstance;
};

export interface CallOptions {
  signal?: AbortSignal;
  correlationId?: string;
}

const FAILURE_KINDS: readonly ToolFailureKind[] = ['UnknownTool', 'ValidationError', 'HandlerError'];
const PARAMETER_TYPES: readonly ToolParameter['type'][] = ['string', 'number', 'integer', 'boolean'];

export class ToolServerClient {
  public constructor(private readonly deps: ToolServerClientDeps) {}

  /**
   * Convenience factory for a client talking to `baseURL`.
   */
  public static forUrl(baseURL: string, timeoutMs = 15000): ToolServerClient {
    return new ToolServerClient({ http: axios.create({ baseURL, timeout: timeoutMs }) });
  }

  public async listTools(): Promise<ToolDefinition[]> {
    const response = await this.deps.http.get<unknown>('/tools/list');
    return parseToolListing(response.data);
  }

  /**
   * True when the server answers the discovery endpoint with HTTP 200.
   */
  public async isAvailable(): Promise<boolean> {
    try {
      const response = await this.deps.http.get<unknown>('/tools/list', {
        validateStatus: () => true,
      });
      return response.status === 200;
    } catch {
      return false;
    }
  }

  public async callTool(
    toolName: string,
    args: ToolArguments = {},
    options: CallOptions = {},
  ): Promise<ToolInvocationResult> {
    try {
      const response = await this.deps.http.post<unknown>(
        '/tools/call',
        { tool_name: toolName, arguments: args },
        {
          // Failures arrive as envelopes with 4xx/5xx; decode them instead of throwing.
          validateStatus: () => true,
          ...(options.signal ? { signal: options.signal } : {}),
          ...(options.correlationId ? { headers: { 'x-correlation-id': options.correlationId } } : {}),
        },
      );

      if (response.status >= 200 && response.status < 300 && isRecord(response.data)) {
        return { ok: true, toolName, payload: response.data };
      }

      const failure = parseFailureEnvelope(response.data);
      if (failure) {
        return { ok: false, toolName, error: failure };
      }

      return {
        ok: false,
        toolName,
        error: {
          kind: 'HandlerError',
          message: `Tool server returned ${response.status} with an unreadable body`,
        },
      };
    } catch (err) {
      return { ok: false, toolName, error: { kind: 'HandlerError', message: describeTransportError(err) } };
    }
  }
}

function describeTransportError(err: unknown): string {
  if (axios.isCancel(err)) {
    return 'Tool call was cancelled';
  }
  if (axios.isAxiosError(err)) {
    if (err.code === 'ECONNREFUSED') return 'Cannot connect to tool server';
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') return 'Tool server timed out';
    return `Tool server request failed: ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}

function parseFailureEnvelope(data: unknown): ToolFailure | null {
  if (!isRecord(data) || !isRecord(data.error)) return null;

  const { kind, message, field } = data.error;
  if (!isFailureKind(kind) || typeof message !== 'string') return null;

  return {
    kind,
    message,
    ...(typeof field === 'string' ? { field } : {}),
  };
}

function parseToolListing(data: unknown): ToolDefinition[] {
  if (!isRecord(data) || !Array.isArray(data.tools)) {
    throw new Error('Malformed tool listing: expected { "tools": [...] }');
  }

  const tools: ToolDefinition[] = [];
  for (const item of data.tools) {
    if (!isRecord(item) || typeof item.name !== 'string') continue;

    tools.push({
      name: item.name,
      description: typeof item.description === 'string' ? item.description : '',
      inputSchema: parseInputSchema(item.input_schema),
    });
  }
  return tools;
}

function parseInputSchema(raw: unknown): ToolInputSchema {
  if (!isRecord(raw)) return {};

  const schema: Record<string, ToolParameter> = {};
  for (const [param, spec] of Object.entries(raw)) {
    if (!isRecord(spec) || !isParameterType(spec.type)) continue;
    schema[param] = {
      type: spec.type,
      required: spec.required === true,
      ...(typeof spec.description === 'string' ? { description: spec.description } : {}),
    };
  }
  return schema;
}

function isFailureKind(value: unknown): value is ToolFailureKind {
  return FAILURE_KINDS.some((kind) => kind === value);
}

function isParameterType(value: unknown): value is ToolParameter['type'] {
  return PARAMETER_TYPES.some((type) => type === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
