/**
 * Configuration loader.
 *
 * Builds the AppConfig from environment variables, and the backend list from
 * the JSON tools file at TOOLS_CONFIG_PATH:
 *
 *   { "backends": [ { "name": "math", "transport": "subprocess", "command": "node", ... } ] }
 *
 * A missing tools file is not an error (the agent runs without tools); a file
 * that fails to parse or validate is.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { logger } from './logger.js';
import { ConfigError, errorMessage } from './errors.js';

const log = logger.child({ module: 'config' });

// ---------------------------------------------------------------------------
// Backend definitions
// ---------------------------------------------------------------------------

const commonFields = {
  name: z.string().min(1),
  enabled: z.boolean().default(true),
  /** Per-call timeout override for every tool on this backend */
  timeoutMs: z.number().int().positive().optional(),
};

export const LocalBackendSchema = z.object({
  ...commonFields,
  transport: z.literal('local'),
  /** `builtin:<toolkit>` or an importable module whose default export is a LocalToolkit */
  module: z.string().min(1),
  options: z.record(z.unknown()).optional(),
});

export const SubprocessBackendSchema = z.object({
  ...commonFields,
  transport: z.literal('subprocess'),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).optional(),
  cwd: z.string().optional(),
});

export const SocketProtocolSchema = z.enum(['websocket', 'streamable-http', 'sse']);

export const SocketBackendSchema = z.object({
  ...commonFields,
  transport: z.literal('socket'),
  url: z.string().url(),
  /** Inferred from the URL scheme when omitted (ws/wss → websocket, otherwise streamable-http) */
  protocol: SocketProtocolSchema.optional(),
  headers: z.record(z.string()).optional(),
});

export const BackendDefinitionSchema = z.discriminatedUnion('transport', [
  LocalBackendSchema,
  SubprocessBackendSchema,
  SocketBackendSchema,
]);

export const ToolsFileSchema = z
  .object({
    backends: z.array(BackendDefinitionSchema).default([]),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.backends.forEach((b, i) => {
      if (seen.has(b.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['backends', i, 'name'],
          message: `duplicate backend name '${b.name}'`,
        });
      }
      seen.add(b.name);
    });
  });

export type LocalBackendDefinition = z.infer<typeof LocalBackendSchema>;
export type SubprocessBackendDefinition = z.infer<typeof SubprocessBackendSchema>;
export type SocketBackendDefinition = z.infer<typeof SocketBackendSchema>;
export type SocketProtocol = z.infer<typeof SocketProtocolSchema>;
export type BackendDefinition = z.infer<typeof BackendDefinitionSchema>;
export type BackendTransport = BackendDefinition['transport'];

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * Validate an already-parsed tools file and return the enabled backends in
 * file order.
 */
export function parseToolsConfig(raw: unknown): BackendDefinition[] {
  const parsed = ToolsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid tools config: ${formatIssues(parsed.error)}`);
  }
  return parsed.data.backends.filter((b) => {
    if (!b.enabled) {
      log.info({ backend: b.name, transport: b.transport }, 'backend disabled, skipping');
    }
    return b.enabled;
  });
}

export async function loadToolsConfig(path: string): Promise<BackendDefinition[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      log.warn({ path }, 'tools config not found, starting without tool backends');
      return [];
    }
    throw new ConfigError(`Failed to read tools config at ${path}: ${errorMessage(err)}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Tools config at ${path} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const backends = parseToolsConfig(raw);
  log.info({ path, backends: backends.map((b) => b.name) }, 'tools config loaded');
  return backends;
}

// ---------------------------------------------------------------------------
// Application config (environment)
// ---------------------------------------------------------------------------

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful assistant. Answer the user clearly and concisely.';

export const DEFAULT_GREETING = 'Hello! How can I help you today?';

const DEFAULT_MODELS = {
  anthropic: 'claude-sonnet-4-20250514',
  'openai-compatible': 'gpt-4o-mini',
} as const;

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== '' ? v : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  TOOLS_CONFIG_PATH: z.string().default('./config/tools.json'),
  LLM_PROVIDER: z.enum(['anthropic', 'openai-compatible']).default('anthropic'),
  LLM_MODEL: optionalString,
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  LLM_BASE_URL: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  MAX_TOOL_ITERATIONS: z.coerce.number().int().positive().default(4),
  TOOL_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_TOOL_OUTPUT_CHARS: z.coerce.number().int().positive().default(16_000),
  MAX_CONVERSATION_TURNS: z.coerce.number().int().positive().default(20),
  SYSTEM_PROMPT: optionalString,
  SYSTEM_PROMPT_PATH: optionalString,
  ESCALATION_HINT: optionalString,
  GREETING: optionalString,
});

export type LlmProvider = 'anthropic' | 'openai-compatible';

export interface LlmConfig {
  provider: LlmProvider;
  model: string;
  maxTokens: number;
  baseURL?: string;
  apiKey?: string;
}

export interface AppConfig {
  port: number;
  toolsConfigPath: string;
  llm: LlmConfig;
  maxIterations: number;
  toolCallTimeoutMs: number;
  maxToolOutputChars: number;
  maxConversationTurns: number;
  systemPrompt: string;
  /** Appended to answers when every tool in a request came back empty */
  escalationHint?: string;
  greeting: string;
}

export async function loadAppConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  const e = parsed.data;

  let systemPrompt = e.SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT;
  if (e.SYSTEM_PROMPT_PATH) {
    try {
      systemPrompt = (await readFile(e.SYSTEM_PROMPT_PATH, 'utf-8')).trim();
    } catch (err) {
      throw new ConfigError(`Failed to read SYSTEM_PROMPT_PATH ${e.SYSTEM_PROMPT_PATH}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  const apiKey = e.LLM_PROVIDER === 'anthropic' ? e.ANTHROPIC_API_KEY : e.OPENAI_API_KEY;
  if (e.LLM_PROVIDER === 'openai-compatible' && !e.LLM_BASE_URL && !apiKey) {
    throw new ConfigError('LLM_PROVIDER=openai-compatible requires OPENAI_API_KEY or LLM_BASE_URL');
  }

  return {
    port: e.PORT,
    toolsConfigPath: e.TOOLS_CONFIG_PATH,
    llm: {
      provider: e.LLM_PROVIDER,
      model: e.LLM_MODEL ?? DEFAULT_MODELS[e.LLM_PROVIDER],
      maxTokens: e.LLM_MAX_TOKENS,
      baseURL: e.LLM_BASE_URL,
      apiKey,
    },
    maxIterations: e.MAX_TOOL_ITERATIONS,
    toolCallTimeoutMs: e.TOOL_CALL_TIMEOUT_MS,
    maxToolOutputChars: e.MAX_TOOL_OUTPUT_CHARS,
    maxConversationTurns: e.MAX_CONVERSATION_TURNS,
    systemPrompt,
    escalationHint: e.ESCALATION_HINT,
    greeting: e.GREETING ?? DEFAULT_GREETING,
  };
}
