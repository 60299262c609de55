/**
 * Conversation orchestrator: the bounded tool-calling loop.
 *
 *   DETECT ──tool calls──▶ EXECUTE_TOOLS ──▶ DETECT ...
 *     │ no calls / no tools              │ iteration limit
 *     ▼                                  ▼
 *   STREAM_FINAL (tools disabled) ──▶ DONE ◀── fallback
 *
 * Every request ends with exactly one `done` event unless the caller aborts.
 * At most `maxIterations` detection calls are made per request.
 */

import {
  CompletionServiceError,
  errorMessage,
  logger,
  type ChatEvent,
  type ChatMessage,
  type CompletionService,
  type FallbackKind,
  type ToolCall,
  type ToolResult,
} from '@toolweave/shared';
import { isAbortError } from './completion/index.js';
import { buildSystemPrompt, prepareMessages, type ChatInput } from './prompt.js';
import type { ToolRegistry } from './tool-registry.js';

const log = logger.child({ module: 'orchestrator' });

export const FALLBACK_MESSAGES: Record<FallbackKind, string> = {
  nothing_found:
    'Sorry, I tried several ways to look this up but could not find an answer to your question.',
  processing_error: 'Sorry, something went wrong while preparing a response. Please try again.',
};

export const ERROR_MESSAGE =
  'Sorry, I ran into a problem talking to the language model. Please try again in a moment.';

/** The provider's own message is passed through; anything else gets the generic text. */
export function errorChunk(err: unknown): string {
  if (err instanceof CompletionServiceError) {
    return `Sorry, the language model request failed: ${errorMessage(err)}`;
  }
  return ERROR_MESSAGE;
}

export interface OrchestratorConfig {
  systemPrompt: string;
  maxIterations: number;
  maxConversationTurns: number;
  escalationHint?: string;
  greeting: string;
}

export type ToolSource = Pick<ToolRegistry, 'listTools' | 'getFunctionDefinitions' | 'callTools'>;

export interface OrchestratorDeps {
  registry: ToolSource;
  completion: CompletionService;
  config: OrchestratorConfig;
}

export interface ChatStreamOptions {
  signal?: AbortSignal;
}

export interface Orchestrator {
  chatStream(input: ChatInput, opts?: ChatStreamOptions): AsyncGenerator<ChatEvent>;
}

/** Give every call a non-empty id that is unique within the request. */
function assignCallIds(calls: ToolCall[], round: number, seen: Set<string>): ToolCall[] {
  return calls.map((call, i) => {
    const id = call.id && !seen.has(call.id) ? call.id : `call_${round}_${i}`;
    seen.add(id);
    return id === call.id ? call : { ...call, id };
  });
}

function toolEvent(result: ToolResult): ChatEvent {
  if (result.success) {
    return {
      type: 'tool_call_end',
      callId: result.callId,
      toolName: result.toolName,
      found: result.found,
      content: result.content,
    };
  }
  return {
    type: 'tool_call_error',
    callId: result.callId,
    toolName: result.toolName,
    error: result.error ?? 'tool call failed',
    errorKind: result.errorKind,
  };
}

function suggestsHint(answer: string, hint: string): boolean {
  return answer.toLowerCase().includes(hint.toLowerCase());
}

export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { registry, completion, config } = deps;

  async function* chatStream(input: ChatInput, opts: ChatStreamOptions = {}): AsyncGenerator<ChatEvent> {
    const { signal } = opts;
    const messages: ChatMessage[] = prepareMessages(input, config.maxConversationTurns);
    const results: ToolResult[] = [];
    const seenIds = new Set<string>();
    let iteration = 0;

    const done = (): ChatEvent => ({ type: 'done', iterations: iteration, toolCallCount: results.length });

    if (messages.length === 0) {
      yield { type: 'chunk', content: config.greeting };
      yield done();
      return;
    }

    try {
      const tools = registry.listTools();
      const definitions = registry.getFunctionDefinitions();
      const systemPrompt = buildSystemPrompt(config.systemPrompt, tools, config.escalationHint);

      // DETECT / EXECUTE_TOOLS
      while (definitions.length > 0 && iteration < config.maxIterations) {
        const detection = await completion.detect(messages, systemPrompt, definitions, { signal });
        if (signal?.aborted) return;
        if (detection.toolCalls.length === 0) break;

        const calls = assignCallIds(detection.toolCalls, iteration, seenIds);
        log.info({ iteration, tools: calls.map((c) => c.name) }, 'executing tool calls');
        for (const call of calls) {
          yield { type: 'tool_call_start', callId: call.id, toolName: call.name, arguments: call.arguments };
        }

        const batch = await registry.callTools(calls, { signal });
        if (signal?.aborted) return;

        messages.push({ role: 'assistant', content: detection.content, toolCalls: calls });
        for (const result of batch) {
          results.push(result);
          yield toolEvent(result);
          messages.push({
            role: 'tool',
            content: result.content,
            toolCallId: result.callId,
            toolName: result.toolName,
            isError: !result.success,
          });
        }
        iteration++;
      }

      let answer = '';
      if (definitions.length > 0 && iteration >= config.maxIterations) {
        // The model still wanted tools after the last allowed round.
        log.warn({ iteration, maxIterations: config.maxIterations }, 'tool iteration limit reached');
      } else {
        // STREAM_FINAL
        for await (const delta of completion.stream(messages, systemPrompt, { toolsDisabled: true, signal })) {
          if (signal?.aborted) return;
          answer += delta;
          yield { type: 'chunk', content: delta };
        }
      }

      if (answer === '') {
        const kind: FallbackKind = results.length > 0 ? 'nothing_found' : 'processing_error';
        log.warn({ kind, iteration, toolCallCount: results.length }, 'no answer produced, sending fallback');
        answer = FALLBACK_MESSAGES[kind];
        yield { type: 'chunk', content: answer };
      }

      const hint = config.escalationHint;
      if (hint && results.length > 0 && results.every((r) => !r.found) && !suggestsHint(answer, hint)) {
        yield { type: 'chunk', content: `\n\n${hint}` };
      }
    } catch (err) {
      if (signal?.aborted || isAbortError(err)) {
        log.info('chat stream aborted');
        return;
      }
      log.error({ err, iteration }, 'chat stream failed');
      yield { type: 'chunk', content: errorChunk(err) };
    }

    yield done();
  }

  return { chatStream };
}
