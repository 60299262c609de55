/**
 * MCP backend: a tool server reached over the Model Context Protocol.
 *
 * Used for both `subprocess` (stdio) and `socket` (websocket, streamable-http,
 * sse) backends; only the transport factory differs. The connection is lazy:
 * nothing is spawned or dialled until connect() or listTools() is called.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import {
  logger,
  BackendUnavailableError,
  ToolExecutionError,
  ToolTimeoutError,
  errorMessage,
  isRecord,
  type ToolDescriptor,
  type ToolInputSchema,
} from '@toolweave/shared';
import { LineBuffer, truncateOutput } from './output.js';
import type { BackendState, CallOptions, ToolBackend } from './types.js';

const log = logger.child({ module: 'mcp-backend' });

const CLIENT_VERSION = '0.1.0';
const DEFAULT_CONNECT_TIMEOUT_MS = 30_000;
const MAX_ERROR_CHARS = 2_000;

export type TransportFactory = () => Transport | Promise<Transport>;

export interface McpBackendOptions {
  id: string;
  transport: 'subprocess' | 'socket';
  createTransport: TransportFactory;
  timeoutMs?: number;
  connectTimeoutMs?: number;
  /** Receives the child's stderr, when there is one */
  diagnostics?: LineBuffer;
}

export class McpBackend implements ToolBackend {
  readonly id: string;
  readonly transport: 'subprocess' | 'socket';
  readonly timeoutMs: number | undefined;
  private _state: BackendState = 'uninitialized';
  private _lastError: string | undefined;
  private client: Client | null = null;
  private connecting: Promise<void> | null = null;

  constructor(private readonly options: McpBackendOptions) {
    this.id = options.id;
    this.transport = options.transport;
    this.timeoutMs = options.timeoutMs;
  }

  get state(): BackendState {
    return this._state;
  }

  get lastError(): string | undefined {
    return this._lastError;
  }

  /** Last lines the server wrote to stderr (subprocess backends only). */
  stderrTail(lines = 20): string[] {
    return this.options.diagnostics?.tail(lines) ?? [];
  }

  async connect(): Promise<void> {
    if (this._state === 'ready') return;
    if (this._state === 'closed') {
      throw new BackendUnavailableError(this.id, `Backend '${this.id}' is closed`);
    }
    if (!this.connecting) {
      this.connecting = this.open().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async open(): Promise<void> {
    this._state = 'connecting';
    const stale = this.client;
    this.client = null;
    if (stale) await closeQuietly(stale, this.id);
    log.info({ backend: this.id, transport: this.transport }, 'connecting MCP client');

    const client = new Client({ name: `toolweave-${this.id}`, version: CLIENT_VERSION }, { capabilities: {} });

    // Transport errors must not crash the process; they end the connection.
    client.onerror = (err) => {
      log.error({ err, backend: this.id }, 'MCP client error');
      this.markFailed(errorMessage(err));
    };
    client.onclose = () => {
      if (this.client === client) {
        log.warn({ backend: this.id, stderr: this.stderrTail(5) }, 'MCP connection closed unexpectedly');
        this.markFailed('connection closed');
      }
    };

    try {
      const transport = await this.options.createTransport();
      await client.connect(transport, {
        timeout: this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
      });
    } catch (err) {
      this._lastError = errorMessage(err);
      this._state = 'failed';
      log.error({ err, backend: this.id, stderr: this.stderrTail() }, 'failed to connect MCP client');
      await closeQuietly(client, this.id);
      throw new BackendUnavailableError(this.id, `Failed to connect to '${this.id}': ${this._lastError}`, {
        cause: err,
      });
    }

    if (this.wasClosed()) {
      await closeQuietly(client, this.id);
      throw new BackendUnavailableError(this.id, `Backend '${this.id}' was closed while connecting`);
    }

    this.client = client;
    this._state = 'ready';
    log.info({ backend: this.id, server: client.getServerVersion()?.name }, 'MCP client connected');
  }

  async listTools(): Promise<ToolDescriptor[]> {
    await this.connect();
    const client = this.requireClient();

    const descriptors: ToolDescriptor[] = [];
    let cursor: string | undefined;
    try {
      do {
        const page = await client.listTools(cursor ? { cursor } : undefined);
        for (const tool of page.tools) {
          descriptors.push({
            name: tool.name,
            description: tool.description ?? '',
            inputSchema: toInputSchema(tool.inputSchema),
            backendId: this.id,
          });
        }
        cursor = page.nextCursor;
      } while (cursor);
    } catch (err) {
      this.markFailed(errorMessage(err));
      throw new BackendUnavailableError(this.id, `Failed to list tools on '${this.id}': ${errorMessage(err)}`, {
        cause: err,
      });
    }
    return descriptors;
  }

  async call(name: string, args: Record<string, unknown>, opts: CallOptions): Promise<unknown> {
    const client = this.requireClient();
    log.debug({ backend: this.id, tool: name }, 'calling MCP tool');

    let result: unknown;
    try {
      result = await client.callTool({ name, arguments: args }, undefined, {
        timeout: opts.timeoutMs,
        signal: opts.signal,
      });
    } catch (err) {
      if (err instanceof McpError && err.code === ErrorCode.RequestTimeout) {
        throw new ToolTimeoutError(name, opts.timeoutMs);
      }
      throw new ToolExecutionError(name, errorMessage(err), { cause: err });
    }
    return unwrapCallResult(name, result);
  }

  isAlive(): boolean {
    return this._state === 'ready';
  }

  async close(): Promise<void> {
    if (this._state === 'closed') return;
    this._state = 'closed';
    const client = this.client;
    this.client = null;
    if (client) {
      await closeQuietly(client, this.id);
    }
    log.info({ backend: this.id }, 'MCP backend closed');
  }

  private wasClosed(): boolean {
    return this._state === 'closed';
  }

  private markFailed(reason: string): void {
    if (this._state === 'closed') return;
    this._state = 'failed';
    this._lastError = reason;
  }

  private requireClient(): Client {
    if (this._state !== 'ready' || !this.client) {
      throw new BackendUnavailableError(this.id, `Backend '${this.id}' is not ready (state: ${this._state})`);
    }
    return this.client;
  }
}

async function closeQuietly(client: Client, backendId: string): Promise<void> {
  try {
    await client.close();
  } catch (err) {
    log.warn({ err, backend: backendId }, 'error closing MCP client');
  }
}

function toInputSchema(schema: { properties?: Record<string, unknown>; required?: string[] }): ToolInputSchema {
  return { ...schema, type: 'object' };
}

// ---------------------------------------------------------------------------
// Result unwrapping
// ---------------------------------------------------------------------------

function blockText(block: unknown): string | null {
  if (!isRecord(block)) return null;
  if (block.type === 'text' && typeof block.text === 'string') return block.text;
  if (typeof block.type === 'string') return `[${block.type} content]`;
  return null;
}

function parseJsonObject(text: string): Record<string, unknown> | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{')) return null;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return isRecord(parsed) ? parsed : null;
  } catch {
    // plain text that happens to start with a brace
    return null;
  }
}

/**
 * Turn an MCP tools/call result into a plain value:
 * - `isError` results throw ToolExecutionError with the text content
 * - `structuredContent` is returned as is
 * - a single text block holding a JSON object is parsed
 * - otherwise the text blocks are joined into `{ text }`
 */
export function unwrapCallResult(toolName: string, result: unknown): unknown {
  if (!isRecord(result)) return result;
  // Pre-2024-11 servers answer with a bare toolResult
  if ('toolResult' in result && !('content' in result)) return result.toolResult;

  const blocks = Array.isArray(result.content) ? result.content : [];
  const texts = blocks.map(blockText).filter((t): t is string => t !== null);
  const text = texts.join('\n');

  if (result.isError === true) {
    throw new ToolExecutionError(toolName, truncateOutput(text || 'tool reported an error', MAX_ERROR_CHARS));
  }
  if (isRecord(result.structuredContent)) return result.structuredContent;
  if (texts.length === 1) {
    const parsed = parseJsonObject(texts[0]);
    if (parsed) return parsed;
  }
  return { text };
}
