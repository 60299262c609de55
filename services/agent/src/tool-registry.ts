/**
 * Tool Registry: discovers tools across every configured backend and routes
 * calls by tool name to the backend that owns it.
 *
 * Backends are visited in configuration order; when two backends expose the
 * same tool name the first one keeps it. Tool calls hold the RegistryGate
 * shared; reload() and closeAll() hold it exclusively, so an in-flight call
 * always sees one consistent generation of the backend map.
 */

import {
  logger,
  ToolNotFoundError,
  BackendUnavailableError,
  type BackendDefinition,
  type BackendTransport,
  type FunctionDefinition,
  type ToolCall,
  type ToolDescriptor,
  type ToolResult,
} from '@toolweave/shared';
import type { BackendState, ToolBackend } from './backends/types.js';
import { RegistryGate } from './registry-gate.js';
import { ToolDispatcher, dispatchAll } from './tool-dispatcher.js';

const log = logger.child({ module: 'tool-registry' });

/** Provider tool names must match ^[a-zA-Z0-9_-]{1,64}$ */
export function sanitizeToolName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 64);
}

export interface BackendStatus {
  id: string;
  transport: BackendTransport;
  state: BackendState;
  toolCount: number;
  lastError?: string;
}

export interface ToolRegistryOptions {
  createBackend: (definition: BackendDefinition) => ToolBackend;
  dispatcher: ToolDispatcher;
  /** Applies to backends without their own timeoutMs */
  defaultTimeoutMs: number;
}

export interface CallToolOptions {
  signal?: AbortSignal;
}

interface Route {
  descriptor: ToolDescriptor;
  backend: ToolBackend;
  /** Name as the backend knows it, when it differs from the exposed one */
  remoteName: string;
}

export class ToolRegistry {
  private backends: ToolBackend[] = [];
  /** Exposed tool name -> owning backend, in discovery order */
  private routes = new Map<string, Route>();
  private fullyInitialized = false;
  private closed = false;
  private _generation = 0;
  private readonly gate = new RegistryGate();

  constructor(
    private definitions: BackendDefinition[],
    private readonly options: ToolRegistryOptions,
  ) {
    this.backends = definitions.map((d) => options.createBackend(d));
  }

  /** Incremented every time the tool map is rebuilt. */
  get generation(): number {
    return this._generation;
  }

  get isInitialized(): boolean {
    return this.fullyInitialized;
  }

  /**
   * Connect every backend and build the tool map. Backends that fail are
   * logged and contribute nothing. Calling it again is a no-op.
   */
  async initializeAll(): Promise<void> {
    await this.gate.exclusive(async () => {
      if (this.fullyInitialized) return;
      if (this.closed) {
        log.warn('initializeAll called on a closed registry, ignoring');
        return;
      }
      await this.initialize();
    });
  }

  private async initialize(): Promise<void> {
    const routes = await this.discover(this.backends);
    this.commit(this.backends, routes);
  }

  /** Connect `backends` concurrently and merge their tools in configuration order. */
  private async discover(backends: ToolBackend[]): Promise<Map<string, Route>> {
    const listings = await Promise.allSettled(backends.map((b) => b.listTools()));

    const routes = new Map<string, Route>();
    listings.forEach((listing, i) => {
      const backend = backends[i];
      if (listing.status === 'rejected') {
        log.error(
          { err: listing.reason, backend: backend.id, transport: backend.transport },
          'failed to load tools from backend, continuing without it',
        );
        return;
      }
      for (const tool of listing.value) {
        const name = sanitizeToolName(tool.name);
        const existing = routes.get(name);
        if (existing) {
          log.warn(
            { tool: tool.name, backend: backend.id, existingBackend: existing.backend.id },
            'tool name conflict across backends, skipping duplicate',
          );
          continue;
        }
        routes.set(name, { descriptor: { ...tool, name }, backend, remoteName: tool.name });
      }
    });
    return routes;
  }

  /** Publish a fully built backend list and tool map together. */
  private commit(backends: ToolBackend[], routes: Map<string, Route>): void {
    this.backends = backends;
    this.routes = routes;
    this.fullyInitialized = true;
    this.closed = false;
    this._generation++;

    log.info(
      {
        generation: this._generation,
        backends: backends.length,
        ready: backends.filter((b) => b.isAlive()).length,
        tools: [...routes.keys()],
      },
      'tool registry initialized',
    );
  }

  listTools(): ToolDescriptor[] {
    return [...this.routes.values()].map((r) => r.descriptor);
  }

  getFunctionDefinitions(): FunctionDefinition[] {
    return this.listTools().map((t) => ({
      name: t.name,
      description: t.description,
      parameters: t.inputSchema,
    }));
  }

  /** Route a call to its backend. Never throws. Never connects anything. */
  async callTool(call: ToolCall, opts: CallToolOptions = {}): Promise<ToolResult> {
    const { dispatcher } = this.options;
    return this.gate.shared(async () => {
      if (this.closed) {
        return dispatcher.failure(call, new BackendUnavailableError('registry', 'Tool registry is closed'));
      }

      const route = this.routes.get(call.name);
      if (!route) {
        log.warn({ tool: call.name }, 'tool not found');
        return dispatcher.failure(call, new ToolNotFoundError(call.name, [...this.routes.keys()]));
      }

      log.info({ tool: call.name, backend: route.backend.id, generation: this._generation }, 'calling tool');
      const result = await dispatcher.dispatch({ ...call, name: route.remoteName }, route.backend, {
        timeoutMs: route.backend.timeoutMs ?? this.options.defaultTimeoutMs,
        signal: opts.signal,
      });
      return { ...result, toolName: call.name };
    });
  }

  /** Run several calls concurrently; results come back in call order. */
  async callTools(calls: ToolCall[], opts: CallToolOptions = {}): Promise<ToolResult[]> {
    return dispatchAll(calls, (call) => this.callTool(call, opts), this.options.dispatcher);
  }

  /**
   * Rebuild from `definitions`. Waits for in-flight calls to finish first;
   * calls arriving meanwhile wait for the new map. Until the new backends
   * have been listed, lookups keep answering from the previous map, which is
   * then swapped out in one step and its backends closed.
   */
  async reload(definitions: BackendDefinition[] = this.definitions): Promise<void> {
    await this.gate.exclusive(async () => {
      log.info({ backends: definitions.map((d) => d.name) }, 'reloading tool registry');
      const previous = this.backends;
      const wasClosed = this.closed;
      const next = definitions.map((d) => this.options.createBackend(d));
      const routes = await this.discover(next);

      this.definitions = definitions;
      this.commit(next, routes);
      if (!wasClosed) await this.closeBackends(previous);
    });
  }

  /** Close every backend. Safe to call more than once. */
  async closeAll(): Promise<void> {
    await this.gate.exclusive(async () => {
      if (this.closed) return;
      this.closed = true;
      await this.closeBackends(this.backends);
      this.routes = new Map();
      this.fullyInitialized = false;
      log.info('tool registry closed');
    });
  }

  status(): BackendStatus[] {
    return this.backends.map((b) => {
      let toolCount = 0;
      for (const route of this.routes.values()) {
        if (route.backend === b) toolCount++;
      }
      return {
        id: b.id,
        transport: b.transport,
        state: b.state,
        toolCount,
        ...(b.lastError ? { lastError: b.lastError } : {}),
      };
    });
  }

  private async closeBackends(backends: ToolBackend[]): Promise<void> {
    const results = await Promise.allSettled(backends.map((b) => b.close()));
    results.forEach((r, i) => {
      if (r.status === 'rejected') {
        log.warn({ err: r.reason, backend: backends[i].id }, 'error closing backend');
      }
    });
  }
}
