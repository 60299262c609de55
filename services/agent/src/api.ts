import express from 'express';
import { trace } from '@opentelemetry/api';
import { z } from 'zod';
import { logger, errorMessage, ConfigError, type BackendDefinition, type ChatEvent } from '@toolweave/shared';
import type { Orchestrator } from './orchestrator.js';
import type { ToolRegistry } from './tool-registry.js';

const log = logger.child({ module: 'api' });

const ChatRequestSchema = z.object({
  message: z.string(),
  history: z
    .array(
      z.object({
        role: z.enum(['user', 'assistant', 'system', 'tool']),
        content: z.string(),
      }),
    )
    .default([]),
});

export interface ApiDeps {
  orchestrator: Orchestrator;
  registry: ToolRegistry;
  /** Re-reads the backend list for POST /admin/reload */
  loadDefinitions: () => Promise<BackendDefinition[]>;
  startTime?: number;
}

function sseFrame(event: ChatEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

export function createApi(deps: ApiDeps) {
  const { orchestrator, registry, loadDefinitions } = deps;
  const startTime = deps.startTime ?? Date.now();
  const app = express();
  app.use(express.json());

  // CORS: restrict origins when CORS_ORIGINS is set, permissive otherwise
  const allowedOrigins = process.env.CORS_ORIGINS
    ? process.env.CORS_ORIGINS.split(',').map((o) => o.trim())
    : null;

  app.use((req, res, next) => {
    const origin = req.headers.origin;
    if (!allowedOrigins || (origin && allowedOrigins.includes(origin))) {
      res.setHeader('Access-Control-Allow-Origin', origin ?? '*');
    }
    res.setHeader('Vary', 'Origin');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }
    next();
  });

  // Trace ID header middleware
  app.use((_req, res, next) => {
    const span = trace.getActiveSpan();
    if (span) {
      res.setHeader('X-Trace-Id', span.spanContext().traceId);
    }
    next();
  });

  app.get('/ping', (_req, res) => {
    res.json({ status: 'ok', service: 'agent', timestamp: new Date().toISOString() });
  });

  app.get('/health', (_req, res) => {
    const backends = registry.status();
    const degraded = backends.some((b) => b.state !== 'ready');
    res.json({
      status: degraded ? 'degraded' : 'ok',
      generation: registry.generation,
      toolCount: registry.listTools().length,
      uptime: Date.now() - startTime,
      backends,
    });
  });

  app.get('/tools', (_req, res) => {
    res.json(registry.listTools());
  });

  app.post('/chat/stream', async (req, res) => {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'invalid request', issues: parsed.error.issues.map((i) => i.message) });
      return;
    }
    const { message, history } = parsed.data;

    log.info({ message: message.slice(0, 200), historyLength: history.length }, 'chat stream request');

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        log.info('client disconnected, aborting chat stream');
        controller.abort();
      }
    });

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    try {
      for await (const event of orchestrator.chatStream({ message, history }, { signal: controller.signal })) {
        if (controller.signal.aborted) break;
        res.write(sseFrame(event));
      }
    } catch (err) {
      log.error({ err }, 'chat stream error');
      res.write(sseFrame({ type: 'chunk', content: 'internal server error' }));
      res.write(sseFrame({ type: 'done', iterations: 0, toolCallCount: 0 }));
    }
    res.end();
  });

  app.post('/admin/reload', async (_req, res) => {
    try {
      const definitions = await loadDefinitions();
      await registry.reload(definitions);
      res.json({
        status: 'reloaded',
        generation: registry.generation,
        tools: registry.listTools().map((t) => t.name),
        backends: registry.status(),
      });
    } catch (err) {
      log.error({ err }, 'registry reload failed');
      res.status(err instanceof ConfigError ? 400 : 500).json({ error: errorMessage(err) });
    }
  });

  return app;
}
