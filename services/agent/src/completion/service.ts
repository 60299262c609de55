/**
 * CompletionService over a provider adapter: circuit breaker, tracing, and a
 * single error type (CompletionServiceError) for everything the provider
 * throws. Aborts pass through untouched.
 */

import { SpanStatusCode } from '@opentelemetry/api';
import {
  logger,
  withSpan,
  getTracer,
  errorMessage,
  CircuitBreaker,
  CompletionServiceError,
  type CompletionService,
  type LlmConfig,
} from '@toolweave/shared';
import { createAnthropicAdapter } from './anthropic.js';
import { flattenToolTurns } from './messages.js';
import { createOpenAICompatibleAdapter } from './openai-compatible.js';
import type { ProviderAdapter } from './types.js';

const log = logger.child({ module: 'completion' });

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'APIUserAbortError');
}

function toCompletionError(provider: string, err: unknown): unknown {
  if (err instanceof CompletionServiceError || isAbortError(err)) return err;
  return new CompletionServiceError(provider, `${provider} completion failed: ${errorMessage(err)}`, { cause: err });
}

export interface CompletionServiceOptions {
  breaker?: CircuitBreaker;
}

export function createCompletionService(
  adapter: ProviderAdapter,
  opts: CompletionServiceOptions = {},
): CompletionService {
  const { provider } = adapter;
  const breaker =
    opts.breaker ??
    new CircuitBreaker({
      name: `llm-${provider}`,
      failureThreshold: 5,
      resetTimeoutMs: 30_000,
      isFailure: (err) => !isAbortError(err),
    });

  return {
    provider,

    async detect(messages, systemPrompt, tools, detectOpts) {
      try {
        return await withSpan('llm.detect', { 'llm.provider': provider, 'llm.tools': tools.length }, () =>
          breaker.execute(() => adapter.detect(messages, systemPrompt, tools, detectOpts?.signal)),
        );
      } catch (err) {
        log.warn({ err, provider }, 'detect failed');
        throw toCompletionError(provider, err);
      }
    },

    async *stream(messages, systemPrompt, streamOpts) {
      const history = streamOpts.toolsDisabled ? flattenToolTurns(messages) : messages;
      const tools = streamOpts.toolsDisabled ? undefined : streamOpts.tools;
      const span = getTracer().startSpan('llm.stream', {
        attributes: { 'llm.provider': provider, 'llm.tools_disabled': streamOpts.toolsDisabled },
      });

      let chunks = 0;
      try {
        const source = breaker.executeStream(() =>
          adapter.stream(history, systemPrompt, { tools, signal: streamOpts.signal }),
        );
        for await (const delta of source) {
          if (delta === '') continue;
          chunks++;
          yield delta;
        }
        span.setStatus({ code: SpanStatusCode.OK });
      } catch (err) {
        span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(err) });
        log.warn({ err, provider, chunks }, 'stream failed');
        throw toCompletionError(provider, err);
      } finally {
        span.setAttribute('llm.chunks', chunks);
        span.end();
      }
    },
  };
}

export async function createCompletionServiceFromConfig(config: LlmConfig): Promise<CompletionService> {
  switch (config.provider) {
    case 'anthropic':
      return createCompletionService(createAnthropicAdapter(config));
    case 'openai-compatible':
      return createCompletionService(await createOpenAICompatibleAdapter(config));
  }
}
