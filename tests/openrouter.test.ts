import { describe, expect, it, vi } from 'vitest';
import { OpenRouterModel } from '../src/llm/openrouter.js';
import { ModelProviderError } from '../src/llm/types.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function createModel(fetchImpl: typeof fetch) {
  return new OpenRouterModel({
    apiKey: 'test-key',
    baseUrl: 'https://models.example.test/api/v1/',
    model: 'test/model',
    timeoutMs: 1000,
    fetchImpl
  });
}

const REQUEST = { messages: [{ role: 'user' as const, content: 'hello' }], tools: [] };

describe('OpenRouterModel', () => {
  it('posts the conversation and reads tool calls', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        choices: [
          {
            message: {
              content: null,
              tool_calls: [
                { id: 'c1', type: 'function', function: { name: 'add_numbers', arguments: '{"a":1}' } },
                { id: 'c2', type: 'function', function: { name: 'get_unreimbursed_balance' } }
              ]
            }
          }
        ]
      })
    );

    const reply = await createModel(fetchImpl).complete(REQUEST);

    expect(reply).toEqual({
      content: null,
      toolCalls: [
        { id: 'c1', name: 'add_numbers', arguments: '{"a":1}' },
        { id: 'c2', name: 'get_unreimbursed_balance', arguments: {} }
      ]
    });

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://models.example.test/api/v1/chat/completions');
    expect(new Headers(init?.headers).get('authorization')).toBe('Bearer test-key');
    expect(JSON.parse(String(init?.body))).toEqual({ model: 'test/model', messages: REQUEST.messages });
  });

  it('returns plain answers', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ choices: [{ message: { content: 'Hello!' } }] }));
    await expect(createModel(fetchImpl).complete(REQUEST)).resolves.toEqual({ content: 'Hello!', toolCalls: [] });
  });

  it.each([
    [402, 'insufficient_credits'],
    [404, 'model_not_found'],
    [429, 'rate_limited'],
    [500, 'upstream']
  ])('maps HTTP %i to %s', async (status, kind) => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ error: { message: 'nope' } }, status));
    const error = await createModel(fetchImpl)
      .complete(REQUEST)
      .catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ModelProviderError);
    expect(error).toMatchObject({ kind, status });
  });

  it('rejects responses without choices', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ choices: [] }));
    await expect(createModel(fetchImpl).complete(REQUEST)).rejects.toMatchObject({ kind: 'upstream' });
  });

  it('reports network failures as upstream errors', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });
    await expect(createModel(fetchImpl).complete(REQUEST)).rejects.toMatchObject({
      kind: 'upstream',
      message: 'Model request failed: fetch failed'
    });
  });
});
