// Provider adapter that replays scripted rounds and records every request

import type { CompletionRequest, ProviderAdapter } from '../../src/adapters/providerAdapter.js';
import type { StreamEvent } from '../../src/types/events.js';

export interface ScriptedCall {
  id: string;
  name: string;
  args: Record<string, unknown> | string;
}

export function textRound(text: string): StreamEvent[] {
  return [
    { type: 'text_delta', text },
    { type: 'round_complete', finishReason: 'stop' },
  ];
}

export function toolRound(calls: ScriptedCall[], text = ''): StreamEvent[] {
  const events: StreamEvent[] = text ? [{ type: 'text_delta', text }] : [];
  calls.forEach((call, index) => {
    events.push(
      { type: 'tool_call_start', index, id: call.id, name: call.name },
      {
        type: 'tool_call_delta',
        index,
        argumentsDelta: typeof call.args === 'string' ? call.args : JSON.stringify(call.args),
      },
      { type: 'tool_call_end', index },
    );
  });
  events.push({ type: 'round_complete', finishReason: 'tool_calls' });
  return events;
}

export class ScriptedAdapter implements ProviderAdapter {
  readonly name = 'scripted';
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly rounds: StreamEvent[][]) {}

  supportsNativeToolCalls(): boolean {
    return true;
  }

  async *streamCompletion(request: CompletionRequest): AsyncGenerator<StreamEvent> {
    // copy: the orchestrator keeps appending to the same history array
    this.requests.push({ ...request, messages: [...request.messages] });
    const round = this.rounds.shift() ?? textRound('(script exhausted)');
    for (const event of round) {
      yield event;
    }
  }
}
