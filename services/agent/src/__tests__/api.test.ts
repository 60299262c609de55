import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { ConfigError, type BackendDefinition } from '@toolweave/shared';
import { createApi } from '../api.js';
import { createOrchestrator } from '../orchestrator.js';
import { LocalBackend } from '../backends/local-backend.js';
import { resolveToolkit } from '../toolkits/index.js';
import { ToolDispatcher } from '../tool-dispatcher.js';
import { ToolRegistry } from '../tool-registry.js';
import type { ToolBackend } from '../backends/types.js';
import { ScriptedCompletion, detection, toolCall } from './helpers.js';

const CALCULATOR: BackendDefinition = { name: 'math', transport: 'local', module: 'builtin:calculator', enabled: true };
const ECHO: BackendDefinition = { name: 'echo', transport: 'local', module: 'builtin:echo', enabled: true };

function localOnly(definition: BackendDefinition): ToolBackend {
  if (definition.transport !== 'local') throw new Error('local backends only');
  return new LocalBackend(definition, resolveToolkit);
}

function parseSse(text: string): unknown[] {
  return text
    .split('\n\n')
    .filter((frame) => frame.startsWith('data: '))
    .map((frame): unknown => JSON.parse(frame.slice('data: '.length)));
}

let registry: ToolRegistry;
let completion: ScriptedCompletion;
let nextDefinitions: () => Promise<BackendDefinition[]>;

function app() {
  const orchestrator = createOrchestrator({
    registry,
    completion,
    config: { systemPrompt: 'sys', maxIterations: 4, maxConversationTurns: 20, greeting: 'Hello!' },
  });
  return createApi({ orchestrator, registry, loadDefinitions: () => nextDefinitions(), startTime: Date.now() });
}

beforeEach(async () => {
  registry = new ToolRegistry([CALCULATOR], {
    createBackend: localOnly,
    dispatcher: new ToolDispatcher({ maxOutputChars: 1_000 }),
    defaultTimeoutMs: 1_000,
  });
  await registry.initializeAll();
  completion = new ScriptedCompletion({
    detections: [detection(toolCall('c1', 'calculator', { operation: 'add', a: 10, b: 5 })), { content: '', toolCalls: [] }],
    stream: ['10 + 5 ', '= 15'],
  });
  nextDefinitions = async () => [ECHO];
});

afterEach(async () => {
  await registry.closeAll();
});

// ---------------------------------------------------------------------------
// Status routes
// ---------------------------------------------------------------------------

describe('status routes', () => {
  it('GET /ping', async () => {
    const res = await request(app()).get('/ping');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', service: 'agent' });
  });

  it('GET /tools lists the registry', async () => {
    const res = await request(app()).get('/tools');
    expect(res.status).toBe(200);
    expect(res.body.map((t: { name: string }) => t.name)).toEqual(['calculator']);
  });

  it('GET /health reports backends', async () => {
    const res = await request(app()).get('/health');
    expect(res.body).toMatchObject({
      status: 'ok',
      generation: 1,
      toolCount: 1,
      backends: [{ id: 'math', transport: 'local', state: 'ready', toolCount: 1 }],
    });
  });

  it('answers CORS preflight', async () => {
    const res = await request(app()).options('/chat/stream').set('Origin', 'http://localhost:5173');
    expect(res.status).toBe(204);
    expect(res.headers['access-control-allow-origin']).toBe('http://localhost:5173');
  });
});

// ---------------------------------------------------------------------------
// Chat
// ---------------------------------------------------------------------------

describe('POST /chat/stream', () => {
  it('streams orchestrator events as SSE', async () => {
    const res = await request(app()).post('/chat/stream').send({ message: 'What is 10 + 5?' });

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toContain('text/event-stream');
    expect(parseSse(res.text)).toEqual([
      { type: 'tool_call_start', callId: 'c1', toolName: 'calculator', arguments: { operation: 'add', a: 10, b: 5 } },
      { type: 'tool_call_end', callId: 'c1', toolName: 'calculator', found: true, content: '{"result":15}' },
      { type: 'chunk', content: '10 + 5 ' },
      { type: 'chunk', content: '= 15' },
      { type: 'done', iterations: 1, toolCallCount: 1 },
    ]);
  });

  it('passes history through', async () => {
    await request(app())
      .post('/chat/stream')
      .send({ message: 'And times two?', history: [{ role: 'user', content: 'What is 10 + 5?' }, { role: 'assistant', content: '15' }] });

    expect(completion.detectCalls[0].messages).toEqual([
      { role: 'user', content: 'What is 10 + 5?' },
      { role: 'assistant', content: '15' },
      { role: 'user', content: 'And times two?' },
    ]);
  });

  it('rejects a body without a message', async () => {
    const res = await request(app()).post('/chat/stream').send({ history: [] });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('invalid request');
  });
});

// ---------------------------------------------------------------------------
// Admin
// ---------------------------------------------------------------------------

describe('POST /admin/reload', () => {
  it('reloads from the tools file', async () => {
    const res = await request(app()).post('/admin/reload');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'reloaded', generation: 2, tools: ['echo'] });
    expect(registry.listTools().map((t) => t.name)).toEqual(['echo']);
  });

  it('returns 400 for an invalid tools file and keeps the current tools', async () => {
    nextDefinitions = async () => {
      throw new ConfigError('Invalid tools config: backends.0.transport: Invalid discriminator value');
    };

    const res = await request(app()).post('/admin/reload');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Invalid tools config: backends.0.transport: Invalid discriminator value' });
    expect(registry.listTools().map((t) => t.name)).toEqual(['calculator']);
  });
});
