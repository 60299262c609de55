/**
 * OpenAI-compatible adapter (OpenAI, Ollama, vLLM, ...).
 *
 * Detection streams with `tools` and assembles tool calls from the argument
 * fragments each chunk carries, keyed by the call's index.
 */

import type OpenAI from 'openai';
import { logger, type ChatMessage, type FunctionDefinition, type LlmConfig, type ToolCall } from '@toolweave/shared';
import { toolCallFromText } from './arguments.js';
import type { ProviderAdapter } from './types.js';

const log = logger.child({ module: 'openai-adapter' });

type MessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ToolParam = OpenAI.Chat.Completions.ChatCompletionTool;
type ToolCallParam = OpenAI.Chat.Completions.ChatCompletionMessageToolCall;
type ToolCallDelta = OpenAI.Chat.Completions.ChatCompletionChunk.Choice.Delta.ToolCall;

export function toOpenAITools(tools: FunctionDefinition[]): ToolParam[] {
  return tools.map((t): ToolParam => ({
    type: 'function',
    function: { name: t.name, description: t.description, parameters: t.parameters },
  }));
}

export function toOpenAIMessages(messages: ChatMessage[], systemPrompt: string): MessageParam[] {
  const out: MessageParam[] = [{ role: 'system', content: systemPrompt }];
  for (const message of messages) {
    switch (message.role) {
      case 'user':
        out.push({ role: 'user', content: message.content });
        break;
      case 'assistant':
        if (message.toolCalls && message.toolCalls.length > 0) {
          out.push({
            role: 'assistant',
            content: message.content || null,
            tool_calls: message.toolCalls.map((c): ToolCallParam => ({
              id: c.id,
              type: 'function',
              function: { name: c.name, arguments: JSON.stringify(c.arguments) },
            })),
          });
        } else {
          out.push({ role: 'assistant', content: message.content });
        }
        break;
      case 'tool':
        out.push({ role: 'tool', tool_call_id: message.toolCallId ?? '', content: message.content });
        break;
    }
  }
  return out;
}

interface PartialCall {
  id: string;
  name: string;
  args: string;
}

/** Collects streamed tool-call fragments; one entry per call index. */
export class ToolCallAccumulator {
  private calls = new Map<number, PartialCall>();

  add(delta: ToolCallDelta): void {
    const entry = this.calls.get(delta.index) ?? { id: '', name: '', args: '' };
    if (delta.id) entry.id = delta.id;
    if (delta.function?.name) entry.name += delta.function.name;
    if (delta.function?.arguments) entry.args += delta.function.arguments;
    this.calls.set(delta.index, entry);
  }

  finish(): ToolCall[] {
    const out: ToolCall[] = [];
    const indices = [...this.calls.keys()].sort((a, b) => a - b);
    for (const index of indices) {
      const entry = this.calls.get(index);
      if (!entry) continue;
      if (!entry.name) {
        log.warn({ index, id: entry.id }, 'dropping streamed tool call without a name');
        continue;
      }
      out.push(toolCallFromText(entry.id || `call_${index}`, entry.name, entry.args));
    }
    return out;
  }
}

export async function createOpenAICompatibleAdapter(config: LlmConfig): Promise<ProviderAdapter> {
  // Dynamic import: only loaded if this provider is actually used
  const { default: OpenAIClient } = await import('openai');
  const client = new OpenAIClient({ baseURL: config.baseURL, apiKey: config.apiKey ?? 'not-needed' });

  log.info({ model: config.model, baseURL: config.baseURL }, 'openai-compatible adapter: initialized');

  return {
    provider: 'openai-compatible',

    async detect(messages, systemPrompt, tools, signal) {
      const stream = await client.chat.completions.create(
        {
          model: config.model,
          max_tokens: config.maxTokens,
          messages: toOpenAIMessages(messages, systemPrompt),
          tools: tools.length > 0 ? toOpenAITools(tools) : undefined,
          stream: true,
        },
        { signal },
      );

      let content = '';
      const accumulator = new ToolCallAccumulator();
      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta;
        if (!delta) continue;
        if (delta.content) content += delta.content;
        for (const fragment of delta.tool_calls ?? []) {
          accumulator.add(fragment);
        }
      }

      const toolCalls = accumulator.finish();
      log.debug({ toolCalls: toolCalls.length }, 'openai-compatible detect complete');
      return { content, toolCalls };
    },

    async *stream(messages, systemPrompt, opts) {
      const stream = await client.chat.completions.create(
        {
          model: config.model,
          max_tokens: config.maxTokens,
          messages: toOpenAIMessages(messages, systemPrompt),
          tools: opts.tools && opts.tools.length > 0 ? toOpenAITools(opts.tools) : undefined,
          stream: true,
        },
        { signal: opts.signal },
      );

      for await (const chunk of stream) {
        const text = chunk.choices[0]?.delta?.content;
        if (text) yield text;
      }
    },
  };
}
