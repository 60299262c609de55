import type { ChatMessage, Detection, FunctionDefinition, LlmProvider } from '@toolweave/shared';

export interface AdapterStreamOptions {
  tools?: FunctionDefinition[];
  signal?: AbortSignal;
}

/** One provider SDK behind the CompletionService contract. */
export interface ProviderAdapter {
  readonly provider: LlmProvider;
  detect(
    messages: ChatMessage[],
    systemPrompt: string,
    tools: FunctionDefinition[],
    signal?: AbortSignal,
  ): Promise<Detection>;
  stream(messages: ChatMessage[], systemPrompt: string, opts: AdapterStreamOptions): AsyncIterable<string>;
}
