/**
 * Tool types shared by the registry, the backends and the completion adapters.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

/** JSON Schema of a tool's arguments. Always an object schema. */
export interface ToolInputSchema {
  type: 'object';
  properties?: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  /** Id of the backend that owns this tool */
  backendId: string;
}

/** Provider-agnostic function definition handed to the completion service. */
export interface FunctionDefinition {
  name: string;
  description: string;
  parameters: ToolInputSchema;
}

// ---------------------------------------------------------------------------
// Calls and results
// ---------------------------------------------------------------------------

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  /** Argument text as produced by the model, when it arrived as text */
  rawArguments?: string;
  /** Set when rawArguments did not parse to a single JSON object */
  argumentError?: string;
}

export type ToolErrorKind =
  | 'not_found'
  | 'backend_unavailable'
  | 'execution'
  | 'argument_parse'
  | 'timeout';

export interface ToolResult {
  toolName: string;
  callId: string;
  success: boolean;
  /** Raw value returned by the backend (null on failure) */
  payload: unknown;
  error: string | null;
  errorKind?: ToolErrorKind;
  /** False when the tool ran but reported that it found nothing */
  found: boolean;
  /** Model-facing text */
  content: string;
}

// ---------------------------------------------------------------------------
// Local toolkits
// ---------------------------------------------------------------------------

export interface ToolContext {
  signal?: AbortSignal;
}

export interface LocalTool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  handler: (args: Record<string, unknown>, ctx: ToolContext) => unknown;
}

/** What a `local` backend module default-exports. */
export interface LocalToolkit {
  name: string;
  tools: LocalTool[];
}

const ToolInputSchemaSchema = z
  .object({
    type: z.literal('object'),
    properties: z.record(z.unknown()).optional(),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

/** Validates a toolkit loaded from a module before its tools are registered. */
export const LocalToolkitSchema = z.object({
  name: z.string().min(1),
  tools: z.array(
    z.object({
      name: z.string().min(1),
      description: z.string(),
      inputSchema: ToolInputSchemaSchema,
      handler: z.custom<LocalTool['handler']>((v) => typeof v === 'function', 'Expected a function'),
    }),
  ),
});
