import { errorMessage, isRecord, type ToolCall } from '@toolweave/shared';

export interface ParsedArguments {
  arguments: Record<string, unknown>;
  argumentError?: string;
}

/**
 * Parse a model's tool-call argument text. The text must be exactly one JSON
 * object; an empty string means "no arguments".
 */
export function parseToolArguments(raw: string): ParsedArguments {
  const text = raw.trim();
  if (text === '') return { arguments: {} };

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return { arguments: {}, argumentError: errorMessage(err) };
  }
  if (!isRecord(parsed)) {
    return { arguments: {}, argumentError: 'arguments must be a JSON object' };
  }
  return { arguments: parsed };
}

export function toolCallFromText(id: string, name: string, raw: string): ToolCall {
  const { arguments: args, argumentError } = parseToolArguments(raw);
  const call: ToolCall = { id, name, arguments: args, rawArguments: raw };
  if (argumentError !== undefined) call.argumentError = argumentError;
  return call;
}
