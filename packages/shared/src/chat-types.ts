import type { FunctionDefinition, ToolCall, ToolErrorKind } from './tool-types.js';

export type ChatRole = 'user' | 'assistant' | 'tool';

export interface ChatMessage {
  role: ChatRole;
  content: string;
  /** Calls requested by the assistant in this turn */
  toolCalls?: ToolCall[];
  /** For role 'tool': the call this message answers */
  toolCallId?: string;
  toolName?: string;
  /** For role 'tool': the call failed */
  isError?: boolean;
}

/** Result of a non-streaming tool-selection call. */
export interface Detection {
  content: string;
  toolCalls: ToolCall[];
}

export interface DetectOptions {
  signal?: AbortSignal;
}

export interface StreamOptions {
  toolsDisabled: boolean;
  /** Offered to the model when tools are not disabled */
  tools?: FunctionDefinition[];
  signal?: AbortSignal;
}

/**
 * Language-model collaborator. `detect` decides whether tools are needed;
 * `stream` produces the user-facing answer as text deltas.
 */
export interface CompletionService {
  readonly provider: string;
  detect(
    messages: ChatMessage[],
    systemPrompt: string,
    tools: FunctionDefinition[],
    opts?: DetectOptions,
  ): Promise<Detection>;
  stream(messages: ChatMessage[], systemPrompt: string, opts: StreamOptions): AsyncIterable<string>;
}

// ---------------------------------------------------------------------------
// Events emitted to the caller of the orchestrator
// ---------------------------------------------------------------------------

export type ChatEvent =
  | { type: 'chunk'; content: string }
  | { type: 'tool_call_start'; callId: string; toolName: string; arguments: Record<string, unknown> }
  | { type: 'tool_call_end'; callId: string; toolName: string; found: boolean; content: string }
  | { type: 'tool_call_error'; callId: string; toolName: string; error: string; errorKind?: ToolErrorKind }
  | { type: 'done'; iterations: number; toolCallCount: number };

export type FallbackKind = 'nothing_found' | 'processing_error';
