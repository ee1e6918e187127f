import { describe, it, expect } from 'vitest';

import { RoutingError } from '../errors.js';
import { silentLogger } from '../logging/logger.js';
import { HeuristicRouter, extractSymbols } from './heuristicRouter.js';

const router = new HeuristicRouter(silentLogger);

describe('extractSymbols', () => {
  it('finds known tickers in order of appearance', () => {
    expect(extractSymbols('Is msft above aapl today?')).toEqual(['MSFT', 'AAPL']);
  });

  it('maps company names to tickers in prompt order without duplicates', () => {
    expect(extractSymbols('Netflix or Google, or Alphabet again?')).toEqual(['NFLX', 'GOOGL']);
  });

  it('accepts $-prefixed symbols as a last resort', () => {
    expect(extractSymbols('what about $shop and $ZZZZ')).toEqual(['SHOP', 'ZZZZ']);
  });

  it('returns nothing for a prompt without symbols', () => {
    expect(extractSymbols('how is the market doing')).toEqual([]);
  });
});

describe('HeuristicRouter', () => {
  it('routes a single symbol to get_price', async () => {
    await expect(router.route('What is the price of AAPL?')).resolves.toEqual({
      tool: 'get_price',
      arguments: { symbol: 'AAPL' },
      source: 'heuristic',
    });
  });

  it('routes comparisons to compare', async () => {
    await expect(router.route('Tesla vs Microsoft')).resolves.toEqual({
      tool: 'compare',
      arguments: { symbol_a: 'TSLA', symbol_b: 'MSFT' },
      source: 'heuristic',
    });
    await expect(router.route('compare NVDA and META')).resolves.toEqual({
      tool: 'compare',
      arguments: { symbol_a: 'NVDA', symbol_b: 'META' },
      source: 'heuristic',
    });
  });

  it('rejects an empty prompt', async () => {
    await expect(router.route('   ')).rejects.toThrow('Query cannot be empty.');
  });

  it('rejects a comparison with fewer than two symbols', async () => {
    const failure = router.route('compare AAPL');
    await expect(failure).rejects.toBeInstanceOf(RoutingError);
    await expect(failure).rejects.toThrow('Could not determine two symbols to compare.');
  });

  it('rejects a prompt without any symbol', async () => {
    await expect(router.route('tell me a joke')).rejects.toThrow(
      'Could not determine a stock symbol from the query.',
    );
  });
});
