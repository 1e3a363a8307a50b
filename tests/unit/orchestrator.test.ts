/**
 * Unit tests for the orchestration loop over a scripted provider
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenAIAdapter } from '../../src/adapters/openaiAdapter.js';
import type { CompletionRequest, ProviderAdapter } from '../../src/adapters/providerAdapter.js';
import { ConversationHelper } from '../../src/services/conversationHelper.js';
import { parseToolArguments, type RunOutcome } from '../../src/services/orchestrator.js';
import type { ExecutionContext } from '../../src/services/toolExecutor.js';
import type { Message } from '../../src/types/conversation.js';
import type { ChatEvent, StreamEvent } from '../../src/types/events.js';
import { EntityIndex } from '../../src/services/entityIndex.js';
import { createTestEngine, type TestEngine } from '../helpers/engine.js';
import { adapterOptions, errorResponse, sseResponse } from '../helpers/http.js';
import { ScriptedAdapter, textRound, toolRound } from '../helpers/scriptedAdapter.js';

interface RunResult {
  events: ChatEvent[];
  outcome: RunOutcome;
  history: Message[];
}

describe('parseToolArguments', () => {
  it('should treat empty text as no arguments', () => {
    expect(parseToolArguments('  ')).toEqual({ arguments: {} });
  });

  it('should parse a JSON object', () => {
    expect(parseToolArguments('{"entity_id":"light.kitchen"}')).toEqual({ arguments: { entity_id: 'light.kitchen' } });
  });

  it('should reject JSON that is not an object', () => {
    expect(parseToolArguments('[1,2]')).toEqual({ arguments: {}, parseError: 'arguments must be a JSON object' });
  });

  it('should keep the parser message for broken JSON', () => {
    const parsed = parseToolArguments('{"entity_id": ');
    expect(parsed.arguments).toEqual({});
    expect(parsed.parseError).toBeDefined();
  });
});

describe('Orchestrator', () => {
  let engine: TestEngine;

  beforeEach(async () => {
    engine = await createTestEngine();
  });

  afterEach(async () => {
    await engine.cleanup();
  });

  async function run(
    message: string,
    adapter: ProviderAdapter,
    options: { signal?: AbortSignal; execution?: Partial<ExecutionContext>; target?: TestEngine } = {},
  ): Promise<RunResult> {
    const target = options.target ?? engine;
    const decision = target.classifier.classify({
      message,
      continuity: { lastIntent: null, awaitingConfirmation: false },
      language: 'en',
      entities: EntityIndex.fromStates(target.ha.states),
    });
    const history: Message[] = [{ role: 'user', content: message }];
    const generator = target.orchestrator.run({
      history,
      decision,
      systemPrompt: 'You are a home assistant.',
      adapter,
      model: 'test-model',
      signal: options.signal ?? new AbortController().signal,
      execution: target.context(options.execution),
    });

    const events: ChatEvent[] = [];
    for (;;) {
      const step = await generator.next();
      if (step.done) {
        return { events, outcome: step.value, history };
      }
      events.push(step.value);
    }
  }

  const porchAutomation = {
    alias: 'Porch at sunset',
    trigger: [{ platform: 'sun', event: 'sunset' }],
    action: [{ service: 'light.turn_on', target: { entity_id: 'light.kitchen' } }],
  };

  it('should answer directly when the model calls no tool', async () => {
    const adapter = new ScriptedAdapter([textRound('The kitchen light is on.')]);

    const { events, outcome } = await run('what is the kitchen light state', adapter);

    expect(events).toEqual([
      { type: 'text_delta', text: 'The kitchen light is on.' },
      { type: 'final', text: 'The kitchen light is on.', intent: 'query_state', rounds: 1, autoStopped: false },
    ]);
    expect(outcome).toEqual({ status: 'completed', text: 'The kitchen light is on.', rounds: 1 });
  });

  it('should send only the focused tool set of the intent', async () => {
    const adapter = new ScriptedAdapter([textRound('ok')]);

    await run('what is the kitchen light state', adapter);

    expect(adapter.requests[0]?.tools.map((tool) => tool.name)).toEqual([
      'get_entities',
      'get_entity_state',
      'search_entities',
    ]);
  });

  it('should stop with one narration round after a successful write', async () => {
    const adapter = new ScriptedAdapter([
      toolRound([{ id: 'c1', name: 'create_automation', args: porchAutomation }], 'Creating it.'),
      textRound('Created the automation "Porch at sunset".'),
      textRound('must not be requested'),
    ]);

    const { events, outcome, history } = await run('create an automation for the porch light', adapter);

    expect(events).toEqual([
      { type: 'text_delta', text: 'Creating it.' },
      {
        type: 'tool_badge',
        name: 'create_automation',
        description: 'Create a new Home Assistant automation with triggers, conditions, and actions.',
      },
      { type: 'status', code: 'executing_tool', message: 'Running create_automation...' },
      { type: 'text_delta', text: 'Created the automation "Porch at sunset".' },
      { type: 'status', code: 'auto_stop', message: 'Done, summarizing the result...' },
      {
        type: 'final',
        text: 'Created the automation "Porch at sunset".',
        intent: 'create_automation',
        rounds: 2,
        autoStopped: true,
      },
    ]);
    expect(outcome.status).toBe('auto_stopped');
    expect(adapter.requests).toHaveLength(2);
    expect(adapter.requests[0]?.toolChoice).toBeUndefined();
    expect(adapter.requests[1]?.toolChoice).toBe('none');
    expect(adapter.requests[1]?.tools).toEqual(adapter.requests[0]?.tools);
    expect(adapter.requests[1]?.systemPrompt.startsWith('You are a home assistant.\n\n')).toBe(true);
    expect(engine.ha.requests.filter((r) => r.method === 'POST')).toHaveLength(1);
    expect(history.map((m) => m.role)).toEqual(['user', 'assistant', 'tool', 'assistant']);
  });

  it('should keep going after a write that produced an empty dashboard', async () => {
    engine.ha.wsHandlers.set('lovelace/dashboards/list', () => []);
    const adapter = new ScriptedAdapter([
      toolRound([
        {
          id: 'c1',
          name: 'create_dashboard',
          args: { title: 'Kitchen', url_path: 'kitchen-overview', views: [{ title: 'Main', cards: [] }] },
        },
      ]),
      textRound('The dashboard has no cards yet. Which entities should it show?'),
    ]);

    const { events, outcome } = await run('create a dashboard for the kitchen', adapter);

    expect(outcome).toEqual({
      status: 'completed',
      text: 'The dashboard has no cards yet. Which entities should it show?',
      rounds: 2,
    });
    expect(events.some((e) => e.type === 'status' && e.code === 'auto_stop')).toBe(false);
    expect(adapter.requests[1]?.tools.length).toBeGreaterThan(0);
    expect(adapter.requests[1]?.toolChoice).toBeUndefined();
  });

  it('should not auto-stop when read-only mode blocked the write', async () => {
    const adapter = new ScriptedAdapter([
      toolRound([{ id: 'c1', name: 'create_automation', args: porchAutomation }]),
      textRound('Read-only mode is on, here is the YAML instead.'),
    ]);

    const { outcome } = await run('create an automation for the porch light', adapter, {
      execution: { readOnly: true },
    });

    expect(outcome.status).toBe('completed');
    expect(engine.ha.requests).toHaveLength(0);
    const toolTurn = adapter.requests[1]?.messages.find((m) => m.role === 'tool');
    expect(toolTurn?.role === 'tool' ? JSON.parse(toolTurn.content) : null).toMatchObject({ status: 'read_only' });
  });

  it('should reuse the result of an identical read in the same run', async () => {
    const adapter = new ScriptedAdapter([
      toolRound([{ id: 'c1', name: 'get_entity_state', args: { entity_id: 'light.kitchen' } }]),
      toolRound([{ id: 'c2', name: 'get_entity_state', args: { entity_id: 'light.kitchen' } }]),
      textRound('It is on.'),
    ]);

    const { outcome, history } = await run('what is the kitchen light state', adapter);

    expect(outcome).toEqual({ status: 'completed', text: 'It is on.', rounds: 3 });
    expect(engine.ha.getStateCalls).toBe(1);
    const toolTurns = history.filter((m) => m.role === 'tool');
    expect(toolTurns.map((m) => (m.role === 'tool' ? m.toolCallId : ''))).toEqual(['c1', 'c2']);
    expect(toolTurns[0]?.content).toBe(toolTurns[1]?.content);
  });

  it('should read a file again after writing it in the same run', async () => {
    await engine.deps.configFiles.write('configuration.yaml', 'old: 1\n');
    const adapter = new ScriptedAdapter([
      toolRound([{ id: 'c1', name: 'read_config_file', args: { filename: 'configuration.yaml' } }]),
      toolRound([
        { id: 'c2', name: 'write_config_file', args: { filename: 'configuration.yaml', content: 'new: 2\n' } },
      ]),
      toolRound([{ id: 'c3', name: 'read_config_file', args: { filename: 'configuration.yaml' } }]),
      textRound('The file now sets new to 2.'),
    ]);

    const { outcome, history } = await run('edit the configuration file', adapter);

    expect(outcome).toEqual({ status: 'completed', text: 'The file now sets new to 2.', rounds: 4 });
    const reads = history.flatMap((m) => (m.role === 'tool' && m.toolName === 'read_config_file' ? [m.content] : []));
    expect(reads.map((content) => JSON.parse(content).content)).toEqual(['old: 1\n', 'new: 2\n']);
  });

  it('should answer every tool call in the history sent to the provider', async () => {
    const adapter = new ScriptedAdapter([
      toolRound([
        { id: 'c1', name: 'get_entity_state', args: { entity_id: 'light.kitchen' } },
        { id: 'c2', name: 'get_entity_state', args: '{"entity_id": ' },
      ]),
      textRound('The kitchen light is on.'),
    ]);

    const { history } = await run('what is the kitchen light state', adapter);

    for (const request of adapter.requests) {
      expect(ConversationHelper.findUnpairedToolCalls(request.messages)).toEqual([]);
    }
    const broken = history.find((m) => m.role === 'tool' && m.toolCallId === 'c2');
    expect(broken?.content).toContain('Arguments are not valid JSON');
  });

  it('should stop at the round limit with the best text so far', async () => {
    const limited = await createTestEngine({ maxRounds: 2 });
    try {
      const adapter = new ScriptedAdapter([
        toolRound([{ id: 'c1', name: 'get_entity_state', args: { entity_id: 'light.kitchen' } }], 'Looking.'),
        toolRound([{ id: 'c2', name: 'get_entity_state', args: { entity_id: 'light.living_room' } }]),
        textRound('must not be requested'),
      ]);

      const { events, outcome } = await run('what is the kitchen light state', adapter, { target: limited });

      expect(outcome).toEqual({ status: 'round_limit', text: 'Looking.', rounds: 2 });
      expect(events.slice(-2)).toEqual([
        { type: 'status', code: 'round_limit', message: 'Stopped after 2 rounds.' },
        { type: 'final', text: 'Looking.', intent: 'query_state', rounds: 2, autoStopped: false },
      ]);
      expect(adapter.requests).toHaveLength(2);
    } finally {
      await limited.cleanup();
    }
  });

  it('should use the fallback text when the round limit is hit without any text', async () => {
    const limited = await createTestEngine({ maxRounds: 1 });
    try {
      const adapter = new ScriptedAdapter([
        toolRound([{ id: 'c1', name: 'get_entity_state', args: { entity_id: 'light.kitchen' } }]),
      ]);

      const { outcome } = await run('what is the kitchen light state', adapter, { target: limited });

      expect(outcome.text).toBe('I could not finish this request within the allowed number of steps.');
    } finally {
      await limited.cleanup();
    }
  });

  it('should discard a reset round and report the retry status', async () => {
    const adapter = new ScriptedAdapter([
      [
        { type: 'text_delta', text: 'Hel' },
        { type: 'round_reset' },
        { type: 'status', code: 'rate_limited', waitMs: 1500, attempt: 1 },
        { type: 'text_delta', text: 'Hello' },
        { type: 'round_complete', finishReason: 'stop' },
      ],
    ]);

    const { events, outcome } = await run('hello', adapter);

    expect(events).toEqual([
      { type: 'text_delta', text: 'Hel' },
      { type: 'clear' },
      { type: 'status', code: 'rate_limited', message: 'Rate limited by scripted, retrying in 2s (attempt 1)...' },
      { type: 'text_delta', text: 'Hello' },
      { type: 'final', text: 'Hello', intent: 'chat', rounds: 1, autoStopped: false },
    ]);
    expect(outcome.text).toBe('Hello');
  });

  it('should relay rate limit retries of a real provider as one status line each', async () => {
    const fetchMock = vi.fn<typeof fetch>();
    fetchMock
      .mockResolvedValueOnce(errorResponse(429, { error: { message: 'Rate limit reached' } }))
      .mockResolvedValueOnce(errorResponse(429, { error: { message: 'Rate limit reached' } }, { 'Retry-After': '5' }))
      .mockResolvedValueOnce(sseResponse(['{"choices":[{"delta":{"content":"Done"},"finish_reason":"stop"}]}']));
    vi.stubGlobal('fetch', fetchMock);
    try {
      const adapter = new OpenAIAdapter('openai', {
        ...adapterOptions(),
        baseUrl: 'https://api.openai.com/v1',
        apiKey: 'test-secret',
        language: 'en',
      });

      const { events } = await run('hello', adapter);

      expect(events).toEqual([
        { type: 'status', code: 'rate_limited', message: 'Rate limited by openai, retrying in 1s (attempt 1)...' },
        { type: 'status', code: 'rate_limited', message: 'Rate limited by openai, retrying in 5s (attempt 2)...' },
        { type: 'text_delta', text: 'Done' },
        { type: 'final', text: 'Done', intent: 'chat', rounds: 1, autoStopped: false },
      ]);
    } finally {
      vi.unstubAllGlobals();
    }
  });

  it('should turn a provider failure into a readable error and keep partial text', async () => {
    const adapter = new ScriptedAdapter([
      [
        { type: 'text_delta', text: 'Partial' },
        { type: 'error', error: { kind: 'rate_limited', message: '429', provider: 'groq' } },
      ],
    ]);

    const { events, outcome, history } = await run('hello', adapter);

    expect(events.at(-1)).toEqual({
      type: 'error',
      kind: 'rate_limited',
      message: 'groq is rate limiting requests. Please wait a minute and try again.',
    });
    expect(outcome).toEqual({ status: 'failed', text: 'Partial', rounds: 1 });
    expect(history.at(-1)).toEqual({ role: 'assistant', content: 'Partial' });
  });

  it('should do nothing when cancelled before the first round', async () => {
    const controller = new AbortController();
    controller.abort();
    const adapter = new ScriptedAdapter([textRound('must not be requested')]);

    const { events, outcome } = await run('hello', adapter, { signal: controller.signal });

    expect(events).toEqual([{ type: 'status', code: 'cancelled', message: 'Cancelled.' }]);
    expect(outcome).toEqual({ status: 'cancelled', text: '', rounds: 0 });
    expect(adapter.requests).toHaveLength(0);
  });

  it('should not record tool calls from a round that finished after a cancellation', async () => {
    const controller = new AbortController();
    const adapter: ProviderAdapter = {
      name: 'late',
      supportsNativeToolCalls: () => true,
      async *streamCompletion(_request: CompletionRequest): AsyncGenerator<StreamEvent> {
        yield { type: 'text_delta', text: 'partial' };
        controller.abort();
        yield { type: 'tool_call_start', index: 0, id: 'c1', name: 'call_service' };
        yield {
          type: 'tool_call_delta',
          index: 0,
          argumentsDelta: '{"domain":"light","service":"turn_on","entity_id":"light.kitchen"}',
        };
        yield { type: 'tool_call_end', index: 0 };
        yield { type: 'round_complete', finishReason: 'tool_calls' };
      },
    };

    const { events, outcome, history } = await run('turn on the kitchen light', adapter, {
      signal: controller.signal,
    });

    expect(outcome).toEqual({ status: 'cancelled', text: 'partial', rounds: 1 });
    expect(events).toEqual([
      { type: 'text_delta', text: 'partial' },
      { type: 'status', code: 'cancelled', message: 'Cancelled.' },
    ]);
    expect(history).toEqual([
      { role: 'user', content: 'turn on the kitchen light' },
      { role: 'assistant', content: 'partial' },
    ]);
    expect(engine.ha.requests).toHaveLength(0);
  });

  it('should skip the remaining tool calls after a cancellation and still answer them', async () => {
    const controller = new AbortController();
    const getState = engine.ha.getState.bind(engine.ha);
    engine.ha.getState = async (entityId: string) => {
      controller.abort();
      return getState(entityId);
    };
    const adapter = new ScriptedAdapter([
      toolRound([
        { id: 'c1', name: 'get_entity_state', args: { entity_id: 'light.kitchen' } },
        { id: 'c2', name: 'get_entity_state', args: { entity_id: 'light.living_room' } },
      ]),
      textRound('must not be requested'),
    ]);

    const { events, outcome, history } = await run('what is the kitchen light state', adapter, {
      signal: controller.signal,
    });

    expect(outcome.status).toBe('cancelled');
    expect(events.at(-1)).toEqual({ type: 'status', code: 'cancelled', message: 'Cancelled.' });
    expect(engine.ha.getStateCalls).toBe(1);
    expect(adapter.requests).toHaveLength(1);
    expect(ConversationHelper.findUnpairedToolCalls(history)).toEqual([]);
    const skipped = history.find((m) => m.role === 'tool' && m.toolCallId === 'c2');
    expect(skipped?.content).toBe(
      JSON.stringify({ status: 'cancelled', error: 'Not executed: the request was cancelled' }),
    );
  });
});
