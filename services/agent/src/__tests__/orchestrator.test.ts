import { describe, it, expect } from 'vitest';
import { CompletionServiceError, type BackendDefinition, type ChatEvent, type Detection } from '@toolweave/shared';
import { ERROR_MESSAGE, FALLBACK_MESSAGES, createOrchestrator, type OrchestratorConfig } from '../orchestrator.js';
import { ToolDispatcher } from '../tool-dispatcher.js';
import { ToolRegistry } from '../tool-registry.js';
import {
  FakeBackend,
  ScriptedCompletion,
  chunkText,
  collect,
  detection,
  toolCall,
  type FakeBackendOptions,
  type ScriptedCompletionOptions,
} from './helpers.js';

const BASE_CONFIG: OrchestratorConfig = {
  systemPrompt: 'You are a helpful travel assistant.',
  maxIterations: 4,
  maxConversationTurns: 20,
  greeting: 'Hello! How can I help you today?',
};

const NO_CALLS: Detection = { content: '', toolCalls: [] };

async function makeRegistry(backends: FakeBackendOptions[]): Promise<ToolRegistry> {
  const registry = new ToolRegistry(
    backends.map((b): BackendDefinition => ({ name: b.id, transport: 'local', module: `./${b.id}.js`, enabled: true })),
    {
      createBackend: (d) => {
        const options = backends.find((b) => b.id === d.name);
        if (!options) throw new Error(`no fake for ${d.name}`);
        return new FakeBackend(options);
      },
      dispatcher: new ToolDispatcher({ maxOutputChars: 1_000 }),
      defaultTimeoutMs: 1_000,
    },
  );
  await registry.initializeAll();
  return registry;
}

async function run(
  backends: FakeBackendOptions[],
  script: ScriptedCompletionOptions,
  message = 'What is 10 + 5?',
  config: Partial<OrchestratorConfig> = {},
): Promise<{ events: ChatEvent[]; completion: ScriptedCompletion }> {
  const registry = await makeRegistry(backends);
  const completion = new ScriptedCompletion(script);
  const orchestrator = createOrchestrator({ registry, completion, config: { ...BASE_CONFIG, ...config } });
  const events = await collect(orchestrator.chatStream({ message }));
  return { events, completion };
}

const calculator: FakeBackendOptions = { id: 'math', tools: ['calculator'], handler: () => ({ result: 15 }) };
const emptySearch: FakeBackendOptions = { id: 'kb', tools: ['search'], handler: () => ({ query: 'x', results: [] }) };

// ---------------------------------------------------------------------------
// Happy paths
// ---------------------------------------------------------------------------

describe('orchestrator', () => {
  it('streams straight away when no tools are registered', async () => {
    const { events, completion } = await run([], { detections: [NO_CALLS], stream: ['Hi ', 'there'] }, 'Hello');

    expect(events).toEqual([
      { type: 'chunk', content: 'Hi ' },
      { type: 'chunk', content: 'there' },
      { type: 'done', iterations: 0, toolCallCount: 0 },
    ]);
    expect(completion.detectCalls).toHaveLength(0);
    expect(completion.streamCalls[0].opts.toolsDisabled).toBe(true);
  });

  it('runs one tool round and streams the answer', async () => {
    const call = toolCall('c1', 'calculator', { operation: 'add', a: 10, b: 5 });
    const { events, completion } = await run([calculator], {
      detections: [detection(call), NO_CALLS],
      stream: ['10 + 5 = 15'],
    });

    expect(events).toEqual([
      { type: 'tool_call_start', callId: 'c1', toolName: 'calculator', arguments: { operation: 'add', a: 10, b: 5 } },
      { type: 'tool_call_end', callId: 'c1', toolName: 'calculator', found: true, content: '{"result":15}' },
      { type: 'chunk', content: '10 + 5 = 15' },
      { type: 'done', iterations: 1, toolCallCount: 1 },
    ]);
    expect(completion.detectCalls[1].messages).toEqual([
      { role: 'user', content: 'What is 10 + 5?' },
      { role: 'assistant', content: '', toolCalls: [call] },
      { role: 'tool', content: '{"result":15}', toolCallId: 'c1', toolName: 'calculator', isError: false },
    ]);
    expect(completion.detectCalls[0].tools.map((t) => t.name)).toEqual(['calculator']);
    expect(completion.detectCalls[0].systemPrompt).toContain('- calculator: calculator from math');
  });

  it('reports each call of a round in order, failures included', async () => {
    const { events } = await run([calculator], {
      detections: [detection(toolCall('c1', 'calculator'), toolCall('c2', 'weather')), NO_CALLS],
      stream: ['Partly.'],
    });

    expect(events.map((e) => e.type)).toEqual([
      'tool_call_start',
      'tool_call_start',
      'tool_call_end',
      'tool_call_error',
      'chunk',
      'done',
    ]);
    expect(events[3]).toEqual({
      type: 'tool_call_error',
      callId: 'c2',
      toolName: 'weather',
      error: "Tool 'weather' not found. Available tools: [calculator]",
      errorKind: 'not_found',
    });
    expect(events[5]).toEqual({ type: 'done', iterations: 1, toolCallCount: 2 });
  });

  // -------------------------------------------------------------------------
  // Bounds and fallbacks
  // -------------------------------------------------------------------------

  it('stops after maxIterations rounds with the nothing-found fallback', async () => {
    const { events, completion } = await run([emptySearch], {
      detections: [detection(toolCall('c1', 'search', { q: 'visa' }))],
      stream: ['never streamed'],
    });

    expect(completion.detectCalls).toHaveLength(4);
    expect(completion.streamCalls).toHaveLength(0);
    const callIds = events.flatMap((e) => (e.type === 'tool_call_start' ? [e.callId] : []));
    expect(callIds).toEqual(['c1', 'call_1_0', 'call_2_0', 'call_3_0']);
    expect(events.slice(-2)).toEqual([
      { type: 'chunk', content: FALLBACK_MESSAGES.nothing_found },
      { type: 'done', iterations: 4, toolCallCount: 4 },
    ]);
  });

  it('honours a smaller iteration bound', async () => {
    const { events, completion } = await run(
      [emptySearch],
      { detections: [detection(toolCall('c1', 'search'))] },
      'Find it',
      { maxIterations: 2 },
    );

    expect(completion.detectCalls).toHaveLength(2);
    expect(events.at(-1)).toEqual({ type: 'done', iterations: 2, toolCallCount: 2 });
  });

  it('feeds malformed arguments back as a tool error and carries on', async () => {
    const malformed = {
      id: 'c1',
      name: 'calculator',
      arguments: {},
      rawArguments: '{"operation": "add", "a": 10',
      argumentError: 'Unexpected end of JSON input',
    };
    const { events, completion } = await run([calculator], {
      detections: [{ content: '', toolCalls: [malformed] }, NO_CALLS],
      stream: ['Could you give me both numbers?'],
    });

    expect(events).toEqual([
      { type: 'tool_call_start', callId: 'c1', toolName: 'calculator', arguments: {} },
      {
        type: 'tool_call_error',
        callId: 'c1',
        toolName: 'calculator',
        error: "Invalid arguments for tool 'calculator': Unexpected end of JSON input",
        errorKind: 'argument_parse',
      },
      { type: 'chunk', content: 'Could you give me both numbers?' },
      { type: 'done', iterations: 1, toolCallCount: 1 },
    ]);
    expect(completion.detectCalls).toHaveLength(2);
    expect(completion.detectCalls[1].messages.at(-1)).toMatchObject({ role: 'tool', isError: true });
  });

  it('falls back to nothing-found when the answer is empty after tools', async () => {
    const { events } = await run([emptySearch], {
      detections: [detection(toolCall('c1', 'search')), NO_CALLS],
      stream: [],
    });
    expect(events.slice(-2)).toEqual([
      { type: 'chunk', content: FALLBACK_MESSAGES.nothing_found },
      { type: 'done', iterations: 1, toolCallCount: 1 },
    ]);
  });

  it('falls back to a processing error when the answer is empty without tools', async () => {
    const { events } = await run([calculator], { detections: [NO_CALLS], stream: [] });
    expect(events).toEqual([
      { type: 'chunk', content: FALLBACK_MESSAGES.processing_error },
      { type: 'done', iterations: 0, toolCallCount: 0 },
    ]);
  });

  // -------------------------------------------------------------------------
  // Escalation hint
  // -------------------------------------------------------------------------

  it('appends the escalation hint when every tool came back empty', async () => {
    const hint = 'You can also email the help desk.';
    const { events } = await run(
      [emptySearch],
      { detections: [detection(toolCall('c1', 'search')), NO_CALLS], stream: ['I could not find that.'] },
      'Where is my luggage?',
      { escalationHint: hint },
    );

    expect(chunkText(events)).toBe(`I could not find that.\n\n${hint}`);
  });

  it('skips the hint when the answer already mentions it', async () => {
    const hint = 'email the help desk';
    const { events } = await run(
      [emptySearch],
      {
        detections: [detection(toolCall('c1', 'search')), NO_CALLS],
        stream: ['Nothing found. Please Email the Help Desk.'],
      },
      'Where is my luggage?',
      { escalationHint: hint },
    );

    expect(chunkText(events)).toBe('Nothing found. Please Email the Help Desk.');
  });

  it('skips the hint when a tool found something', async () => {
    const { events } = await run(
      [calculator],
      { detections: [detection(toolCall('c1', 'calculator')), NO_CALLS], stream: ['15'] },
      'What is 10 + 5?',
      { escalationHint: 'Ask a human.' },
    );

    expect(chunkText(events)).toBe('15');
  });

  // -------------------------------------------------------------------------
  // Errors, greeting, cancellation
  // -------------------------------------------------------------------------

  it('passes the completion failure to the caller and still finishes', async () => {
    const { events } = await run([calculator], {
      detections: [new CompletionServiceError('scripted', 'scripted completion failed: 529 overloaded')],
    });

    expect(events).toEqual([
      { type: 'chunk', content: 'Sorry, the language model request failed: scripted completion failed: 529 overloaded' },
      { type: 'done', iterations: 0, toolCallCount: 0 },
    ]);
  });

  it('reports a failed final stream', async () => {
    const { events } = await run([], {
      detections: [NO_CALLS],
      stream: new CompletionServiceError('scripted', 'connection reset'),
    });

    expect(events).toEqual([
      { type: 'chunk', content: 'Sorry, the language model request failed: connection reset' },
      { type: 'done', iterations: 0, toolCallCount: 0 },
    ]);
  });

  it('keeps the generic message for errors outside the taxonomy', async () => {
    const { events } = await run([calculator], { detections: [new TypeError('boom')] });

    expect(events).toEqual([
      { type: 'chunk', content: ERROR_MESSAGE },
      { type: 'done', iterations: 0, toolCallCount: 0 },
    ]);
  });

  it('greets an empty conversation without calling the model', async () => {
    const { events, completion } = await run([calculator], { detections: [NO_CALLS] }, '   ');

    expect(events).toEqual([
      { type: 'chunk', content: 'Hello! How can I help you today?' },
      { type: 'done', iterations: 0, toolCallCount: 0 },
    ]);
    expect(completion.detectCalls).toHaveLength(0);
    expect(completion.streamCalls).toHaveLength(0);
  });

  it('emits nothing further once the caller aborts', async () => {
    const registry = await makeRegistry([calculator]);
    const completion = new ScriptedCompletion({ detections: [detection(toolCall('c1', 'calculator'))] });
    const orchestrator = createOrchestrator({ registry, completion, config: BASE_CONFIG });
    const controller = new AbortController();
    controller.abort();

    const events = await collect(orchestrator.chatStream({ message: 'What is 10 + 5?' }, { signal: controller.signal }));

    expect(events).toEqual([]);
    expect(completion.detectCalls).toHaveLength(1);
  });

  it('keeps prior turns in the history it sends', async () => {
    const registry = await makeRegistry([]);
    const completion = new ScriptedCompletion({ detections: [NO_CALLS], stream: ['Sure.'] });
    const orchestrator = createOrchestrator({ registry, completion, config: BASE_CONFIG });

    await collect(
      orchestrator.chatStream({
        message: 'And in winter?',
        history: [
          { role: 'system', content: 'ignored' },
          { role: 'user', content: 'Is Kyoto nice in autumn?' },
          { role: 'assistant', content: 'Yes, very.' },
        ],
      }),
    );

    expect(completion.streamCalls[0].messages).toEqual([
      { role: 'user', content: 'Is Kyoto nice in autumn?' },
      { role: 'assistant', content: 'Yes, very.' },
      { role: 'user', content: 'And in winter?' },
    ]);
  });
});
