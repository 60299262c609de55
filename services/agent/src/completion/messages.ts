import type { ChatMessage } from '@toolweave/shared';

export interface PlainMessage {
  role: 'user' | 'assistant';
  content: string;
}

function describeCalls(message: ChatMessage): string {
  const calls = (message.toolCalls ?? []).map((c) => `${c.name}(${JSON.stringify(c.arguments)})`);
  return [message.content, `Called tools: ${calls.join(', ')}`].filter((part) => part !== '').join('\n');
}

/**
 * Rewrite tool requests and tool results as ordinary text turns, for calls
 * made without tool definitions. Adjacent turns of the same role are merged
 * so the result alternates user/assistant.
 */
export function flattenToolTurns(messages: ChatMessage[]): PlainMessage[] {
  const out: PlainMessage[] = [];
  for (const message of messages) {
    let next: PlainMessage;
    if (message.role === 'tool') {
      const label = message.isError ? 'Error from' : 'Result of';
      next = { role: 'user', content: `${label} ${message.toolName ?? 'tool'}: ${message.content}` };
    } else if (message.role === 'assistant' && message.toolCalls && message.toolCalls.length > 0) {
      next = { role: 'assistant', content: describeCalls(message) };
    } else {
      next = { role: message.role, content: message.content };
    }

    const last = out.at(-1);
    if (last && last.role === next.role) {
      last.content = `${last.content}\n\n${next.content}`;
    } else {
      out.push(next);
    }
  }
  return out;
}
