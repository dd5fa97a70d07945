// Error taxonomy for the relay. Frame and tool errors are turned into data by their
// callers; transport and model errors end the session.

export class DecodeError extends Error {
  public readonly code = 'decode_error';

  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

export class TransportDisconnect extends Error {
  public readonly code = 'transport_disconnect';
  public readonly closeCode?: number;

  constructor(message: string, closeCode?: number) {
    super(message);
    this.name = 'TransportDisconnect';
    this.closeCode = closeCode;
  }
}

export class ModelSessionError extends Error {
  public readonly code = 'model_session_error';
  public readonly closeCode?: number;

  constructor(message: string, options: { closeCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ModelSessionError';
    this.closeCode = options.closeCode;
  }
}

export class ToolInvocationTimeout extends Error {
  public readonly code = 'tool_timeout';

  constructor(toolName: string, timeoutMs: number) {
    super(`tool ${toolName} timed out after ${timeoutMs}ms`);
    this.name = 'ToolInvocationTimeout';
  }
}

export class ToolInvocationError extends Error {
  public readonly code = 'tool_error';

  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ToolInvocationError';
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
