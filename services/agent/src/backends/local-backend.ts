/**
 * In-process backend: a table of handler functions from a LocalToolkit.
 */

import {
  logger,
  BackendUnavailableError,
  ToolNotFoundError,
  errorMessage,
  type LocalBackendDefinition,
  type LocalToolkit,
  type ToolDescriptor,
} from '@toolweave/shared';
import type { BackendState, CallOptions, ToolBackend } from './types.js';

const log = logger.child({ module: 'local-backend' });

export type ToolkitResolver = (definition: LocalBackendDefinition) => Promise<LocalToolkit>;

export class LocalBackend implements ToolBackend {
  readonly transport = 'local' as const;
  private _state: BackendState = 'uninitialized';
  private _lastError: string | undefined;
  private toolkit: LocalToolkit | null = null;

  constructor(
    private readonly definition: LocalBackendDefinition,
    private readonly resolveToolkit: ToolkitResolver,
  ) {}

  get id(): string {
    return this.definition.name;
  }

  get state(): BackendState {
    return this._state;
  }

  get timeoutMs(): number | undefined {
    return this.definition.timeoutMs;
  }

  get lastError(): string | undefined {
    return this._lastError;
  }

  async connect(): Promise<void> {
    if (this._state === 'ready') return;
    if (this._state === 'closed') {
      throw new BackendUnavailableError(this.id, `Backend '${this.id}' is closed`);
    }

    this._state = 'connecting';
    try {
      const toolkit = await this.resolveToolkit(this.definition);
      this.toolkit = toolkit;
      this._state = 'ready';
      log.info({ backend: this.id, module: this.definition.module, tools: toolkit.tools.length }, 'local toolkit loaded');
    } catch (err) {
      this._state = 'failed';
      this._lastError = errorMessage(err);
      throw new BackendUnavailableError(
        this.id,
        `Failed to load toolkit '${this.definition.module}': ${this._lastError}`,
        { cause: err },
      );
    }
  }

  async listTools(): Promise<ToolDescriptor[]> {
    await this.connect();
    return this.requireToolkit().tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
      backendId: this.id,
    }));
  }

  async call(name: string, args: Record<string, unknown>, opts: CallOptions): Promise<unknown> {
    const toolkit = this.requireToolkit();
    const tool = toolkit.tools.find((t) => t.name === name);
    if (!tool) {
      throw new ToolNotFoundError(name, toolkit.tools.map((t) => t.name));
    }
    return await tool.handler(args, { signal: opts.signal });
  }

  isAlive(): boolean {
    return this._state === 'ready';
  }

  async close(): Promise<void> {
    if (this._state === 'closed') return;
    this._state = 'closed';
    this.toolkit = null;
    log.debug({ backend: this.id }, 'local backend closed');
  }

  private requireToolkit(): LocalToolkit {
    if (this._state !== 'ready' || !this.toolkit) {
      throw new BackendUnavailableError(this.id, `Backend '${this.id}' is not ready (state: ${this._state})`);
    }
    return this.toolkit;
  }
}
