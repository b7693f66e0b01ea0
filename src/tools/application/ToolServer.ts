// src/tools/application/ToolServer.ts

/**
 * ToolServer
 * ----------
 * Transport-agnostic request/response facade over the tool registry.
 *
 * - listTools(): discovery, no side effects.
 * - invoke(): resolve tool -> validate arguments -> run handler -> tagged result.
 *
 * invoke() never rejects. Unknown tools, invalid arguments and handler
 * failures all come back as `{ ok: false, error }` so every caller (HTTP or
 * in-process) receives a well-formed response.
 */

import type {
  ToolDefinition,
  ToolFailure,
  ToolInvocationRequest,
  ToolInvocationResult,
} from '../domain/Tool';
import { HandlerError, ToolValidationError, UnknownToolError } from '../domain/ToolErrors';
import type { IToolRegistry } from './ToolRegistry';
import { validateToolArguments } from './ArgumentValidator';
import { createAbortScope } from '../../shared/async/abort';
import { logger as rootLogger, type AppLogger } from '../../shared/logging/Logger';

export type ToolServerDeps = {
  registry: IToolRegistry;

  /**
   * Upper bound on a single invocation. When it fires, the handler's signal
   * aborts; 0 disables it.
   */
  invocationTimeoutMs?: number;

  logger?: AppLogger;
};

export interface InvokeOptions {
  /**
   * Caller-side cancellation (e.g. client disconnected, caller timeout).
   */
  signal?: AbortSignal;
  correlationId?: string;
}

/**
 * Port used by routes and the query pipeline.
 */
export interface ToolServerPort {
  listTools(): ToolDefinition[];
  invoke(request: ToolInvocationRequest, options?: InvokeOptions): Promise<ToolInvocationResult>;
}

export class ToolServer implements ToolServerPort {
  private readonly invocationTimeoutMs: number;
  private readonly logger: AppLogger;

  public constructor(private readonly deps: ToolServerDeps) {
    this.invocationTimeoutMs = deps.invocationTimeoutMs ?? 0;
    this.logger = (deps.logger ?? rootLogger).child({ component: 'ToolServer' });
  }

  public listTools(): ToolDefinition[] {
    return this.deps.registry.list();
  }

  public async invoke(
    request: ToolInvocationRequest,
    options: InvokeOptions = {},
  ): Promise<ToolInvocationResult> {
    const { toolName } = request;
    const { correlationId } = options;

    try {
      const { definition, handler } = this.deps.registry.get(toolName);
      const args = validateToolArguments(definition, request.arguments);

      const scope = createAbortScope(options.signal, this.invocationTimeoutMs);
      try {
        const payload = await handler(args, {
          signal: scope.signal,
          ...(correlationId ? { correlationId } : {}),
        });
        this.logger.debug({ correlationId, toolName }, 'Tool invocation succeeded');
        return { ok: true, toolName, payload };
      } catch (cause) {
        throw new HandlerError(toolName, cause);
      } finally {
        scope.dispose();
      }
    } catch (err) {
      const failure = toFailure(toolName, err);
      const level = failure.kind === 'HandlerError' ? 'error' : 'debug';
      this.logger[level]({ correlationId, toolName, err }, `Tool invocation failed: ${failure.kind}`);
      return { ok: false, toolName, error: failure };
    }
  }
}

function toFailure(toolName: string, err: unknown): ToolFailure {
  if (err instanceof UnknownToolError) {
    return { kind: err.kind, message: err.message };
  }
  if (err instanceof ToolValidationError) {
    return { kind: err.kind, message: err.message, field: err.field };
  }
  if (err instanceof HandlerError) {
    return { kind: err.kind, message: err.message };
  }

  // Anything else (e.g. a faulty registry implementation) is reported as a handler failure.
  const wrapped = new HandlerError(toolName, err);
  return { kind: wrapped.kind, message: wrapped.message };
}
