import { z } from 'zod';
import { errorMessage, isAbortError, ToolInvocationError, ToolInvocationTimeout } from '../errors';
import { log } from '../log';
import type { FunctionDeclaration } from '../model/sessionConfig';
import type { ToolCall, ToolResult } from '../model/types';

export const TOOL_APOLOGY =
  "Sorry, I wasn't able to complete that just now. Is there anything else I can help with?";
export const TOOL_TIMEOUT_APOLOGY =
  'Sorry, that is taking longer than expected. Please try again in a moment.';

export type ToolResponse = Record<string, unknown>;

export interface ToolDefinition<S extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  /** JSON schema advertised to the model. */
  parameters: Record<string, unknown>;
  schema: S;
  handler: (args: z.infer<S>, signal: AbortSignal) => Promise<ToolResponse>;
}

type RegisteredTool = {
  declaration: FunctionDeclaration;
  run: (args: Record<string, unknown>, signal: AbortSignal) => Promise<ToolResponse>;
};

export type ToolRegistryOptions = {
  timeoutMs: number;
};

export type InvokeOptions = {
  /** Session cancellation; aborting rejects the invocation with an AbortError. */
  signal?: AbortSignal;
  logContext?: Record<string, unknown>;
};

function abortError(): Error {
  const error = new Error('tool invocation cancelled');
  error.name = 'AbortError';
  return error;
}

function failure(error: string, message: string): ToolResponse {
  return { success: false, error, message };
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly timeoutMs: number;

  constructor(options: ToolRegistryOptions) {
    this.timeoutMs = options.timeoutMs;
  }

  public register<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): this {
    if (this.tools.has(definition.name)) {
      throw new Error(`tool already registered: ${definition.name}`);
    }

    this.tools.set(definition.name, {
      declaration: {
        name: definition.name,
        description: definition.description,
        parameters: definition.parameters,
      },
      run: async (args, signal) => {
        const parsed = definition.schema.safeParse(args);
        if (!parsed.success) {
          const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join(', ');
          throw new ToolInvocationError(`invalid arguments: ${issues}`);
        }
        return definition.handler(parsed.data, signal);
      },
    });
    return this;
  }

  public has(name: string): boolean {
    return this.tools.has(name);
  }

  public declarations(): FunctionDeclaration[] {
    return Array.from(this.tools.values(), (tool) => tool.declaration);
  }

  /**
   * Runs one call under the registry timeout. Failures and timeouts come back as a result;
   * only cancellation through `options.signal` rejects.
   */
  public async invoke(call: ToolCall, options: InvokeOptions = {}): Promise<ToolResult> {
    const logContext = options.logContext ?? {};
    const base = { id: call.id, name: call.name };
    const tool = this.tools.get(call.name);
    if (!tool) {
      log.warn({ event: 'tool_unknown', tool: call.name, ...logContext }, 'unknown tool requested');
      return { ...base, response: failure('unknown_tool', TOOL_APOLOGY) };
    }
    if (options.signal?.aborted) {
      throw abortError();
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;
    const bounded = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ToolInvocationTimeout(call.name, this.timeoutMs));
      }, this.timeoutMs);
      onAbort = () => {
        controller.abort();
        reject(abortError());
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });
    });

    const startedAt = Date.now();
    try {
      const response = await Promise.race([tool.run(call.args, controller.signal), bounded]);
      log.info(
        { event: 'tool_completed', tool: call.name, duration_ms: Date.now() - startedAt, ...logContext },
        'tool completed',
      );
      return { ...base, response };
    } catch (error) {
      if (options.signal?.aborted && isAbortError(error)) {
        throw error;
      }
      if (error instanceof ToolInvocationTimeout) {
        log.warn(
          { event: 'tool_timeout', tool: call.name, timeout_ms: this.timeoutMs, ...logContext },
          'tool timed out',
        );
        return { ...base, response: failure('timeout', TOOL_TIMEOUT_APOLOGY) };
      }
      log.error(
        { err: error, event: 'tool_failed', tool: call.name, ...logContext },
        'tool failed',
      );
      return { ...base, response: failure(errorMessage(error), TOOL_APOLOGY) };
    } finally {
      clearTimeout(timer);
      if (onAbort) {
        options.signal?.removeEventListener('abort', onAbort);
      }
    }
  }
}
