import type { BackendTransport, ToolDescriptor } from '@toolweave/shared';

export type BackendState = 'uninitialized' | 'connecting' | 'ready' | 'failed' | 'closed';

export interface CallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * One connection to one tool-serving endpoint. Owned by the registry.
 *
 * `listTools()` connects first when needed; `call()` never does, it fails
 * with BackendUnavailableError unless the backend is ready.
 */
export interface ToolBackend {
  readonly id: string;
  readonly transport: BackendTransport;
  readonly state: BackendState;
  /** Per-backend timeout override; the registry default applies when unset */
  readonly timeoutMs?: number;
  /** Last connection or transport error, for status reporting */
  readonly lastError?: string;
  connect(): Promise<void>;
  listTools(): Promise<ToolDescriptor[]>;
  call(name: string, args: Record<string, unknown>, opts: CallOptions): Promise<unknown>;
  isAlive(): boolean;
  close(): Promise<void>;
}
