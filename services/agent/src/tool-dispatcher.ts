/**
 * Tool dispatcher: runs one ToolCall against the backend that owns it and
 * normalises whatever comes back into a ToolResult. Never throws: every
 * failure becomes a ToolResult with `success: false`.
 */

import {
  logger,
  withSpan,
  isRecord,
  errorMessage,
  isToolweaveError,
  ArgumentParseError,
  BackendUnavailableError,
  ToolTimeoutError,
  type ErrorCode,
  type ToolCall,
  type ToolErrorKind,
  type ToolResult,
} from '@toolweave/shared';
import { truncateOutput } from './backends/output.js';
import type { ToolBackend } from './backends/types.js';

const log = logger.child({ module: 'tool-dispatcher' });

const NO_OUTPUT = '(no output)';

const SENSITIVE_PATTERNS: Array<[RegExp, string]> = [
  [/sk-ant-[a-zA-Z0-9_-]{20,}/g, '[REDACTED]'], // Anthropic API keys
  [/sk-[a-zA-Z0-9]{32,}/g, '[REDACTED]'], // OpenAI API keys
  [/\bgh[pousr]_[A-Za-z0-9]{36,}\b/g, '[REDACTED]'], // GitHub tokens
  [/\bAKIA[0-9A-Z]{16}\b/g, '[REDACTED]'], // AWS access key ids
  // 64-char hex only after a key-like label; bare digests and hashes stay
  [/((?:api[_-]?key|token|secret|bearer)["']?\s*[:=]?\s*["']?)[a-f0-9]{64}\b/gi, '$1[REDACTED]'],
];

/** Strip API keys and tokens from text before it reaches the model */
export function redactSecrets(text: string): string {
  let redacted = text;
  for (const [pattern, replacement] of SENSITIVE_PATTERNS) {
    redacted = redacted.replace(pattern, replacement);
  }
  return redacted;
}

// ---------------------------------------------------------------------------
// Normalisation
// ---------------------------------------------------------------------------

export interface NormalizedOutput {
  content: string;
  found: boolean;
}

function stringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // cyclic or BigInt-bearing values
    return String(value);
  }
}

/**
 * Map a backend's return value to model-facing text plus the explicit
 * `found` signal.
 */
export function normalizeToolOutput(payload: unknown): NormalizedOutput {
  if (payload === null || payload === undefined) {
    return { content: NO_OUTPUT, found: false };
  }
  if (typeof payload === 'string') {
    return payload.trim() === '' ? { content: NO_OUTPUT, found: false } : { content: payload, found: true };
  }
  if (Array.isArray(payload)) {
    return { content: stringify(payload), found: payload.length > 0 };
  }
  if (!isRecord(payload)) {
    return { content: stringify(payload), found: true };
  }

  const message = typeof payload.message === 'string' ? payload.message : undefined;

  if (typeof payload.text === 'string') {
    return payload.text.trim() === ''
      ? { content: NO_OUTPUT, found: false }
      : { content: payload.text, found: true };
  }
  if (payload.found === false || payload.answer === null) {
    return { content: message ?? 'No matching result was found.', found: false };
  }
  if (Array.isArray(payload.results) && payload.results.length === 0) {
    return { content: message ?? 'No results were found.', found: false };
  }
  return { content: stringify(payload), found: true };
}

// ---------------------------------------------------------------------------
// Errors → ToolResult
// ---------------------------------------------------------------------------

const ERROR_KINDS: Partial<Record<ErrorCode, ToolErrorKind>> = {
  TOOL_NOT_FOUND: 'not_found',
  BACKEND_UNAVAILABLE: 'backend_unavailable',
  ARGUMENT_PARSE: 'argument_parse',
  TOOL_TIMEOUT: 'timeout',
};

export function errorKindOf(err: unknown): ToolErrorKind {
  if (isToolweaveError(err)) return ERROR_KINDS[err.code] ?? 'execution';
  return 'execution';
}

function abortError(): Error {
  const err = new Error('Tool call aborted');
  err.name = 'AbortError';
  return err;
}

/** Race `work` against a deadline and an optional abort signal. */
export function withDeadline<T>(
  work: Promise<T>,
  opts: { timeoutMs: number; signal?: AbortSignal; onTimeout: () => Error },
): Promise<T> {
  const { timeoutMs, signal, onTimeout } = opts;
  if (signal?.aborted) return Promise.reject(abortError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      cleanup();
      reject(abortError());
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(onTimeout());
    }, timeoutMs);
    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });
}

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

export interface DispatchOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface ToolDispatcherOptions {
  /** Model-facing content is truncated beyond this many characters */
  maxOutputChars: number;
}

export class ToolDispatcher {
  constructor(private readonly options: ToolDispatcherOptions) {}

  async dispatch(call: ToolCall, backend: ToolBackend, opts: DispatchOptions): Promise<ToolResult> {
    if (call.argumentError !== undefined) {
      return this.failure(call, new ArgumentParseError(call.name, call.rawArguments ?? '', call.argumentError));
    }
    if (!backend.isAlive()) {
      return this.failure(
        call,
        new BackendUnavailableError(backend.id, `Backend '${backend.id}' is not available (state: ${backend.state})`),
      );
    }

    const started = Date.now();
    try {
      const payload = await withSpan(
        `tool.${call.name}`,
        { 'tool.name': call.name, 'tool.backend': backend.id, 'tool.transport': backend.transport },
        () =>
          withDeadline(backend.call(call.name, call.arguments, opts), {
            timeoutMs: opts.timeoutMs,
            signal: opts.signal,
            onTimeout: () => new ToolTimeoutError(call.name, opts.timeoutMs),
          }),
      );
      log.info({ tool: call.name, backend: backend.id, durationMs: Date.now() - started }, 'tool call succeeded');
      return this.success(call, payload);
    } catch (err) {
      log.warn({ err, tool: call.name, backend: backend.id, durationMs: Date.now() - started }, 'tool call failed');
      return this.failure(call, err);
    }
  }

  success(call: ToolCall, payload: unknown): ToolResult {
    const { content, found } = normalizeToolOutput(payload);
    return {
      toolName: call.name,
      callId: call.id,
      success: true,
      payload,
      error: null,
      found,
      content: redactSecrets(truncateOutput(content, this.options.maxOutputChars)),
    };
  }

  failure(call: ToolCall, err: unknown): ToolResult {
    const message = redactSecrets(errorMessage(err));
    return {
      toolName: call.name,
      callId: call.id,
      success: false,
      payload: null,
      error: message,
      errorKind: errorKindOf(err),
      found: false,
      content: `Error: ${truncateOutput(message, this.options.maxOutputChars)}`,
    };
  }
}

/**
 * Run every call concurrently and return results in call order. A `run` that
 * rejects still yields a failed result for its call.
 */
export async function dispatchAll(
  calls: ToolCall[],
  run: (call: ToolCall) => Promise<ToolResult>,
  dispatcher: ToolDispatcher,
): Promise<ToolResult[]> {
  return Promise.all(calls.map((call) => run(call).catch((err: unknown) => dispatcher.failure(call, err))));
}
