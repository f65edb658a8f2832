import { AnthropicAgent } from '../src/agents/anthropicAgent';
import { ChannelActivityListener } from '../src/core/activityListener';
import { EventChannel } from '../src/core/eventChannel';
import { AgentInvocation, StreamEvent } from '../src/core/types';
import { buildRetrievalFunctions } from '../src/tools/retrievalFunctions';
import { drainEvents, fakeSearch, silenceLogs } from './fakes';

const agent = new AnthropicAgent({
  apiKey: 'test-secret',
  model: 'claude-test',
  maxTokens: 256,
  partialDelayMs: 0,
  maxToolTurns: 2,
});

function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), { status });
}

function invocation(channel: EventChannel): AgentInvocation {
  return {
    history: [{ role: 'user', content: 'How do I open at Panda Health?' }],
    instructions: 'You are SalesAssistant.',
    functions: buildRetrievalFunctions({
      sales: fakeSearch('sales', ''),
      accounts: fakeSearch('accounts', 'Panda Health docs.'),
      user: fakeSearch('user', ''),
    }),
    listener: new ChannelActivityListener(channel),
    signal: new AbortController().signal,
  };
}

function requestBody(call: unknown[]): Record<string, unknown> {
  const init = call[1];
  if (typeof init !== 'object' || init === null || !('body' in init) || typeof init.body !== 'string') {
    throw new Error('request had no JSON body');
  }
  return JSON.parse(init.body);
}

beforeEach(() => {
  jest.restoreAllMocks();
  silenceLogs();
});

describe('AnthropicAgent', () => {
  test('runs requested tools, then streams the final text in chunks', async () => {
    const finalText = 'Open with their telehealth expansion and offer a short briefing to the clinical operations team.';
    const fetchMock = jest
      .spyOn(global, 'fetch')
      .mockResolvedValueOnce(
        jsonResponse({
          stop_reason: 'tool_use',
          content: [
            { type: 'text', text: 'Checking the account documents.' },
            { type: 'tool_use', id: 'tu-1', name: 'get_customer_docs', input: { query: 'Panda Health' } },
          ],
        }),
      )
      .mockResolvedValueOnce(jsonResponse({ stop_reason: 'end_turn', content: [{ type: 'text', text: finalText }] }));
    const channel = new EventChannel('t-1');

    const answer = await agent.invoke(invocation(channel));
    channel.close();
    const events = await drainEvents(channel);

    expect(answer).toBe(finalText);
    expect(events.slice(0, 3)).toEqual([
      { type: 'intermediate', content: 'Checking the account documents.' },
      { type: 'function_call', function_name: 'get_customer_docs', arguments: { query: 'Panda Health' } },
      { type: 'function_result', function_name: 'get_customer_docs', result: 'Panda Health docs.' },
    ]);
    const streamed = events.slice(3).map((event: StreamEvent) => (event.type === 'content' ? event.content : ''));
    expect(streamed.join('')).toBe(finalText);

    const first = requestBody(fetchMock.mock.calls[0]);
    expect(first.model).toBe('claude-test');
    expect(first.system).toBe('You are SalesAssistant.');
    expect(first.messages).toEqual([{ role: 'user', content: 'How do I open at Panda Health?' }]);

    const second = requestBody(fetchMock.mock.calls[1]);
    expect(second.messages).toEqual([
      { role: 'user', content: 'How do I open at Panda Health?' },
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'Checking the account documents.' },
          { type: 'tool_use', id: 'tu-1', name: 'get_customer_docs', input: { query: 'Panda Health' } },
        ],
      },
      { role: 'user', content: [{ type: 'tool_result', tool_use_id: 'tu-1', content: 'Panda Health docs.' }] },
    ]);
  });

  test('fails on a non-ok response', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValueOnce(new Response('overloaded', { status: 529 }));

    await expect(agent.invoke(invocation(new EventChannel('t-1')))).rejects.toThrow('anthropic_http_529:overloaded');
  });

  test('gives up when the model keeps asking for tools', async () => {
    jest.spyOn(global, 'fetch').mockImplementation(async () =>
      jsonResponse({
        stop_reason: 'tool_use',
        content: [{ type: 'tool_use', id: 'tu-x', name: 'get_sales_docs', input: { query: 'again' } }],
      }),
    );

    await expect(agent.invoke(invocation(new EventChannel('t-1')))).rejects.toThrow(
      'Model kept requesting tools after 2 rounds.',
    );
  });
});
