/**
 * System prompt and message preparation.
 *
 * The tool section is generated from whatever the registry currently exposes,
 * so no tool names appear here.
 */

import { isRecord, type ChatMessage, type ToolDescriptor } from '@toolweave/shared';

/** Parameter descriptions at least this long usually carry usage hints */
const PARAM_HINT_MIN_LENGTH = 50;

const TOOL_USAGE =
  "Use the available tools when you need specific information to answer the user's question. " +
  "Each tool's description and parameters explain how to use it.";

function parameterHints(tool: ToolDescriptor): string[] {
  const properties = tool.inputSchema.properties ?? {};
  const hints: string[] = [];
  for (const [param, info] of Object.entries(properties)) {
    if (!isRecord(info) || typeof info.description !== 'string') continue;
    if (info.description.length > PARAM_HINT_MIN_LENGTH) {
      hints.push(`  - ${param}: ${info.description}`);
    }
  }
  return hints;
}

export function buildSystemPrompt(basePrompt: string, tools: ToolDescriptor[], escalationHint?: string): string {
  if (tools.length === 0) return basePrompt;

  const toolList = tools
    .map((tool) => [`- ${tool.name}: ${tool.description}`, ...parameterHints(tool)].join('\n'))
    .join('\n');

  const sections = [basePrompt, `Available Tools:\n${toolList}`, TOOL_USAGE];
  if (escalationHint) {
    sections.push(
      'Important: if you have tried the available tools and still cannot answer, say that you could not find ' +
        `the information and suggest the following: ${escalationHint}`,
    );
  }
  return sections.join('\n\n');
}

export interface HistoryMessage {
  role: string;
  content: string;
}

export interface ChatInput {
  message: string;
  history?: HistoryMessage[];
}

/**
 * Build the request history: prior user/assistant turns plus the new message,
 * trimmed to the last `maxTurns` messages and starting with a user turn.
 */
export function prepareMessages(input: ChatInput, maxTurns: number): ChatMessage[] {
  const messages: ChatMessage[] = [];
  for (const m of input.history ?? []) {
    if ((m.role === 'user' || m.role === 'assistant') && m.content.trim() !== '') {
      messages.push({ role: m.role, content: m.content });
    }
  }
  if (input.message.trim() !== '') {
    messages.push({ role: 'user', content: input.message });
  }

  const trimmed = messages.slice(-maxTurns);
  const firstUser = trimmed.findIndex((m) => m.role === 'user');
  return firstUser === -1 ? [] : trimmed.slice(firstUser);
}
