/**
 * Error taxonomy. Every error raised by the registry, the dispatcher or the
 * completion adapters carries a stable `code` so callers can branch without
 * string matching on messages.
 */

export type ErrorCode =
  | 'BACKEND_UNAVAILABLE'
  | 'TOOL_NOT_FOUND'
  | 'TOOL_EXECUTION'
  | 'ARGUMENT_PARSE'
  | 'TOOL_TIMEOUT'
  | 'COMPLETION_SERVICE'
  | 'CIRCUIT_OPEN'
  | 'CONFIG_ERROR';

export class ToolweaveError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ToolweaveError';
    this.code = code;
  }
}

/** A backend could not be connected or listed, or is no longer alive. */
export class BackendUnavailableError extends ToolweaveError {
  readonly backendId: string;

  constructor(backendId: string, message: string, options?: { cause?: unknown }) {
    super('BACKEND_UNAVAILABLE', message, options);
    this.name = 'BackendUnavailableError';
    this.backendId = backendId;
  }
}

export class ToolNotFoundError extends ToolweaveError {
  readonly toolName: string;
  readonly available: string[];

  constructor(toolName: string, available: string[]) {
    super('TOOL_NOT_FOUND', `Tool '${toolName}' not found. Available tools: [${available.join(', ')}]`);
    this.name = 'ToolNotFoundError';
    this.toolName = toolName;
    this.available = available;
  }
}

export class ToolExecutionError extends ToolweaveError {
  readonly toolName: string;

  constructor(
    toolName: string,
    message: string,
    options?: { cause?: unknown; code?: 'TOOL_EXECUTION' | 'ARGUMENT_PARSE' | 'TOOL_TIMEOUT' },
  ) {
    super(options?.code ?? 'TOOL_EXECUTION', message, options);
    this.name = 'ToolExecutionError';
    this.toolName = toolName;
  }
}

/** The model's argument text for a tool call was not one complete JSON object. */
export class ArgumentParseError extends ToolExecutionError {
  readonly rawArguments: string;

  constructor(toolName: string, rawArguments: string, reason: string) {
    super(toolName, `Invalid arguments for tool '${toolName}': ${reason}`, { code: 'ARGUMENT_PARSE' });
    this.name = 'ArgumentParseError';
    this.rawArguments = rawArguments;
  }
}

export class ToolTimeoutError extends ToolExecutionError {
  readonly timeoutMs: number;

  constructor(toolName: string, timeoutMs: number) {
    super(toolName, `Tool '${toolName}' timed out after ${timeoutMs}ms`, { code: 'TOOL_TIMEOUT' });
    this.name = 'ToolTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class CompletionServiceError extends ToolweaveError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super('COMPLETION_SERVICE', message, options);
    this.name = 'CompletionServiceError';
    this.provider = provider;
  }
}

export class CircuitOpenError extends ToolweaveError {
  constructor(name: string) {
    super('CIRCUIT_OPEN', `Circuit breaker '${name}' is open`);
    this.name = 'CircuitOpenError';
  }
}

export class ConfigError extends ToolweaveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, options);
    this.name = 'ConfigError';
  }
}

export function isToolweaveError(err: unknown): err is ToolweaveError {
  return err instanceof ToolweaveError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
