import { describe, it, expect, vi } from 'vitest';

import { silentLogger } from '../logging/logger.js';
import { HeuristicRouter } from './heuristicRouter.js';
import { LlmRouter } from './llmRouter.js';

function completion(toolCalls: Array<{ name: string; arguments: string }>, content = '') {
  return new Response(
    JSON.stringify({
      id: 'cmpl-1',
      model: 'test-model',
      choices: [
        {
          message: {
            content,
            tool_calls: toolCalls.map((call, index) => ({
              id: `call-${index}`,
              type: 'function',
              function: call,
            })),
          },
        },
      ],
    }),
    { status: 200, headers: { 'content-type': 'application/json' } },
  );
}

function routerWith(respond: () => Response) {
  const fetchImpl = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => respond());
  const router = new LlmRouter({
    apiKey: 'test-key',
    model: 'test-model',
    baseUrl: 'https://router.test/api/v1',
    fallback: new HeuristicRouter(silentLogger),
    logger: silentLogger,
    fetchImpl,
  });
  return { router, fetchImpl };
}

describe('LlmRouter', () => {
  it('returns the tool call chosen by the model', async () => {
    const { router, fetchImpl } = routerWith(() =>
      completion([{ name: 'get_price', arguments: '{"symbol":"NVDA"}' }]),
    );

    await expect(router.route('how is nvidia doing?')).resolves.toEqual({
      tool: 'get_price',
      arguments: { symbol: 'NVDA' },
      source: 'llm',
    });

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://router.test/api/v1/chat/completions');
    expect(init).toMatchObject({
      method: 'POST',
      headers: { Authorization: 'Bearer test-key' },
    });
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      model: 'test-model',
      tool_choice: 'auto',
      tools: [
        { type: 'function', function: { name: 'get_price' } },
        { type: 'function', function: { name: 'compare' } },
      ],
    });
  });

  it('maps compare calls onto both symbol arguments', async () => {
    const { router } = routerWith(() =>
      completion([{ name: 'compare', arguments: '{"symbol_a":"AMZN","symbol_b":"ORCL"}' }]),
    );
    await expect(router.route('amazon against oracle')).resolves.toEqual({
      tool: 'compare',
      arguments: { symbol_a: 'AMZN', symbol_b: 'ORCL' },
      source: 'llm',
    });
  });

  it('skips tool calls it does not know', async () => {
    const { router } = routerWith(() =>
      completion([
        { name: 'get_news', arguments: '{}' },
        { name: 'get_price', arguments: '{"symbol":"IBM"}' },
      ]),
    );
    await expect(router.route('ibm news and price')).resolves.toMatchObject({
      tool: 'get_price',
      arguments: { symbol: 'IBM' },
    });
  });

  it.each([
    ['an HTTP failure', () => new Response('upstream down', { status: 502, statusText: 'Bad Gateway' })],
    ['no tool call', () => completion([], 'AAPL is a fine company.')],
    ['unparseable arguments', () => completion([{ name: 'get_price', arguments: '{symbol' }])],
    ['arguments of the wrong shape', () => completion([{ name: 'compare', arguments: '{"symbol_a":"AAPL"}' }])],
  ])('falls back to heuristics after %s', async (_label, respond) => {
    const { router } = routerWith(respond);
    await expect(router.route('price of AAPL')).resolves.toEqual({
      tool: 'get_price',
      arguments: { symbol: 'AAPL' },
      source: 'heuristic',
    });
  });

  it('rejects an empty prompt without calling the model', async () => {
    const { router, fetchImpl } = routerWith(() => completion([]));
    await expect(router.route('  ')).rejects.toThrow('Query cannot be empty.');
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
