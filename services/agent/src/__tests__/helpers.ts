import {
  BackendUnavailableError,
  type ChatEvent,
  type ChatMessage,
  type CompletionService,
  type Detection,
  type FunctionDefinition,
  type StreamOptions,
  type ToolCall,
  type ToolDescriptor,
} from '@toolweave/shared';
import type { BackendState, CallOptions, ToolBackend } from '../backends/types.js';

// ---------------------------------------------------------------------------
// Fake backend
// ---------------------------------------------------------------------------

export interface FakeBackendOptions {
  id: string;
  tools: string[];
  /** Result for every call; a function receives the tool name and arguments */
  handler?: (name: string, args: Record<string, unknown>) => unknown;
  failList?: boolean;
  /** listTools waits for this before answering */
  holdList?: Promise<void>;
  delayMs?: number;
  timeoutMs?: number;
}

export class FakeBackend implements ToolBackend {
  readonly transport = 'local' as const;
  readonly timeoutMs: number | undefined;
  state: BackendState = 'uninitialized';
  readonly calls: Array<{ name: string; args: Record<string, unknown> }> = [];
  closeCount = 0;

  constructor(private readonly options: FakeBackendOptions) {
    this.timeoutMs = options.timeoutMs;
  }

  get id(): string {
    return this.options.id;
  }

  async connect(): Promise<void> {
    if (this.options.failList) {
      this.state = 'failed';
      throw new BackendUnavailableError(this.id, 'connection refused');
    }
    this.state = 'ready';
  }

  async listTools(): Promise<ToolDescriptor[]> {
    await this.connect();
    if (this.options.holdList) await this.options.holdList;
    return this.options.tools.map((name) => ({
      name,
      description: `${name} from ${this.id}`,
      inputSchema: { type: 'object', properties: {} },
      backendId: this.id,
    }));
  }

  async call(name: string, args: Record<string, unknown>, _opts: CallOptions): Promise<unknown> {
    this.calls.push({ name, args });
    if (this.options.delayMs) {
      await new Promise((resolve) => setTimeout(resolve, this.options.delayMs));
    }
    return this.options.handler ? this.options.handler(name, args) : { text: `${name} ok` };
  }

  isAlive(): boolean {
    return this.state === 'ready';
  }

  async close(): Promise<void> {
    this.closeCount++;
    this.state = 'closed';
  }
}

// ---------------------------------------------------------------------------
// Scripted completion service
// ---------------------------------------------------------------------------

export type StreamScript = string[] | Error;

export interface ScriptedCompletionOptions {
  /** Detection results, consumed in order; the last one repeats */
  detections: Array<Detection | Error>;
  /** Final stream deltas, or an error to throw */
  stream?: StreamScript;
}

export interface DetectCall {
  messages: ChatMessage[];
  systemPrompt: string;
  tools: FunctionDefinition[];
}

export class ScriptedCompletion implements CompletionService {
  readonly provider = 'scripted';
  readonly detectCalls: DetectCall[] = [];
  readonly streamCalls: Array<{ messages: ChatMessage[]; opts: StreamOptions }> = [];

  constructor(private readonly options: ScriptedCompletionOptions) {}

  async detect(messages: ChatMessage[], systemPrompt: string, tools: FunctionDefinition[]): Promise<Detection> {
    this.detectCalls.push({ messages: [...messages], systemPrompt, tools });
    const { detections } = this.options;
    const next = detections[Math.min(this.detectCalls.length - 1, detections.length - 1)];
    if (next instanceof Error) throw next;
    return next;
  }

  async *stream(messages: ChatMessage[], _systemPrompt: string, opts: StreamOptions): AsyncGenerator<string> {
    this.streamCalls.push({ messages: [...messages], opts });
    const script = this.options.stream ?? ['Done.'];
    if (script instanceof Error) throw script;
    for (const delta of script) {
      yield delta;
    }
  }
}

export function toolCall(id: string, name: string, args: Record<string, unknown> = {}): ToolCall {
  return { id, name, arguments: args };
}

export function detection(...calls: ToolCall[]): Detection {
  return { content: '', toolCalls: calls };
}

export async function collect(stream: AsyncIterable<ChatEvent>): Promise<ChatEvent[]> {
  const events: ChatEvent[] = [];
  for await (const event of stream) events.push(event);
  return events;
}

export function chunkText(events: ChatEvent[]): string {
  return events.map((e) => (e.type === 'chunk' ? e.content : '')).join('');
}
