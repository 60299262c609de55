/**
 * Anthropic adapter: `messages.create` with tools for detection,
 * `messages.stream` for the answer.
 */

import Anthropic from '@anthropic-ai/sdk';
import { logger, isRecord, type ChatMessage, type FunctionDefinition, type LlmConfig, type ToolCall } from '@toolweave/shared';
import type { ProviderAdapter } from './types.js';

const log = logger.child({ module: 'anthropic-adapter' });

type MessageParam = Anthropic.Messages.MessageParam;
type ContentBlockParam = Anthropic.Messages.ContentBlockParam;
type ToolResultBlockParam = Anthropic.Messages.ToolResultBlockParam;

export function toAnthropicTools(tools: FunctionDefinition[]): Anthropic.Messages.Tool[] {
  return tools.map((t) => ({
    name: t.name,
    description: t.description,
    input_schema: t.parameters,
  }));
}

/**
 * Convert history to Anthropic messages. Consecutive tool results are grouped
 * into one user turn, as the API requires.
 */
export function toAnthropicMessages(messages: ChatMessage[]): MessageParam[] {
  const out: MessageParam[] = [];
  let results: ToolResultBlockParam[] = [];

  const flushResults = () => {
    if (results.length === 0) return;
    out.push({ role: 'user', content: results });
    results = [];
  };

  for (const message of messages) {
    if (message.role === 'tool') {
      results.push({
        type: 'tool_result',
        tool_use_id: message.toolCallId ?? '',
        content: message.content,
        ...(message.isError ? { is_error: true } : {}),
      });
      continue;
    }

    flushResults();
    if (message.role === 'assistant' && message.toolCalls && message.toolCalls.length > 0) {
      const content: ContentBlockParam[] = [];
      if (message.content) content.push({ type: 'text', text: message.content });
      for (const call of message.toolCalls) {
        content.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
      }
      out.push({ role: 'assistant', content });
    } else {
      out.push({ role: message.role, content: message.content });
    }
  }
  flushResults();
  return out;
}

export function createAnthropicAdapter(config: LlmConfig): ProviderAdapter {
  const sdk = new Anthropic({ apiKey: config.apiKey, baseURL: config.baseURL });
  log.info({ model: config.model, baseURL: config.baseURL }, 'anthropic adapter: initialized');

  return {
    provider: 'anthropic',

    async detect(messages, systemPrompt, tools, signal) {
      const response = await sdk.messages.create(
        {
          model: config.model,
          max_tokens: config.maxTokens,
          system: systemPrompt,
          tools: toAnthropicTools(tools),
          messages: toAnthropicMessages(messages),
        },
        { signal },
      );

      const texts: string[] = [];
      const toolCalls: ToolCall[] = [];
      for (const block of response.content) {
        if (block.type === 'text') {
          texts.push(block.text);
        } else if (block.type === 'tool_use') {
          const call: ToolCall = {
            id: block.id,
            name: block.name,
            arguments: isRecord(block.input) ? block.input : {},
          };
          if (!isRecord(block.input)) call.argumentError = 'arguments must be a JSON object';
          toolCalls.push(call);
        }
      }
      log.debug({ stopReason: response.stop_reason, toolCalls: toolCalls.length }, 'anthropic detect complete');
      return { content: texts.join(''), toolCalls };
    },

    async *stream(messages, systemPrompt, opts) {
      const tools = opts.tools && opts.tools.length > 0 ? toAnthropicTools(opts.tools) : undefined;
      const stream = sdk.messages.stream(
        {
          model: config.model,
          max_tokens: config.maxTokens,
          system: systemPrompt,
          tools,
          messages: toAnthropicMessages(messages),
        },
        { signal: opts.signal },
      );

      for await (const event of stream) {
        if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
          yield event.delta.text;
        }
      }
    },
  };
}
