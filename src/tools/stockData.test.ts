import { describe, it, expect, vi } from 'vitest';

import { NotFoundError } from '../errors.js';
import { silentLogger } from '../logging/logger.js';
import { neverLive, sampleResolver } from '../testing/inProcessWorker.js';
import { parseFallbackCsv } from './fallbackTable.js';
import { DataResolver, summarizeComparison, toWireQuote, type PriceQuote } from './stockData.js';

describe('DataResolver.getPrice', () => {
  it('falls back to the table when the live source fails', async () => {
    const resolver = sampleResolver();
    await expect(resolver.getPrice('AAPL')).resolves.toEqual({
      symbol: 'AAPL',
      price: 150.25,
      source: 'fallback',
    });
  });

  it.each(['aapl', 'AAPL', ' aapl ', '\tAaPl\n'])('normalises %j to AAPL', async (input) => {
    const quote = await sampleResolver().getPrice(input);
    expect(quote.symbol).toBe('AAPL');
  });

  it('uses the live price and passes the normalised symbol', async () => {
    const fetchPrice = vi.fn(async () => 151);
    const resolver = sampleResolver({ fetchPrice });
    await expect(resolver.getPrice(' msft ')).resolves.toEqual({
      symbol: 'MSFT',
      price: 151,
      source: 'live',
    });
    expect(fetchPrice).toHaveBeenCalledWith('MSFT');
  });

  it.each([
    ['null', null],
    ['NaN', Number.NaN],
    ['negative', -1],
  ])('ignores a %s live price', async (_label, value) => {
    const resolver = sampleResolver({ fetchPrice: async () => value });
    const quote = await resolver.getPrice('MSFT');
    expect(quote).toEqual({ symbol: 'MSFT', price: 380.5, source: 'fallback' });
  });

  it('resolves from the table alone when no live source is configured', async () => {
    const resolver = new DataResolver({
      fallback: parseFallbackCsv('symbol,price\nIBM,162.80\n'),
      logger: silentLogger,
    });
    await expect(resolver.getPrice('ibm')).resolves.toEqual({
      symbol: 'IBM',
      price: 162.8,
      source: 'fallback',
    });
  });

  it('fails with NotFoundError for an unknown symbol', async () => {
    const failure = sampleResolver().getPrice('zzzz');
    await expect(failure).rejects.toBeInstanceOf(NotFoundError);
    await expect(failure).rejects.toThrow('Price not available for symbol ZZZZ.');
  });

  it('fails with NotFoundError for a blank symbol without asking the live source', async () => {
    const fetchPrice = vi.fn(async () => 1);
    await expect(sampleResolver({ fetchPrice }).getPrice('   ')).rejects.toThrow(
      'Symbol must be a non-empty string.',
    );
    expect(fetchPrice).not.toHaveBeenCalled();
  });

  it('returns frozen quotes', async () => {
    const quote = await sampleResolver().getPrice('AAPL');
    expect(Object.isFrozen(quote)).toBe(true);
  });
});

describe('DataResolver.compare', () => {
  it('summarises AAPL against MSFT', async () => {
    const result = await sampleResolver().compare('aapl', 'msft');
    expect(result.summary).toBe('AAPL is trading lower than MSFT (150.25 vs 380.50).');
    expect(result.quote_a.symbol).toBe('AAPL');
    expect(result.quote_b.symbol).toBe('MSFT');
  });

  it('produces opposite wording when the arguments are swapped', async () => {
    const resolver = sampleResolver();
    const forward = await resolver.compare('AAPL', 'MSFT');
    const backward = await resolver.compare('MSFT', 'AAPL');
    expect(forward.summary).toContain('lower');
    expect(backward.summary).toBe('MSFT is trading higher than AAPL (380.50 vs 150.25).');
  });

  it('reports the same price when both quotes are equal', async () => {
    const resolver = new DataResolver({
      fallback: parseFallbackCsv('symbol,price\nAAA,10.50\nBBB,10.5\n'),
      live: neverLive,
      logger: silentLogger,
    });
    await expect(resolver.compare('AAA', 'BBB')).resolves.toMatchObject({
      summary: 'AAA and BBB have the same price at 10.50.',
    });
    await expect(resolver.compare('BBB', 'AAA')).resolves.toMatchObject({
      summary: 'BBB and AAA have the same price at 10.50.',
    });
  });

  it('stops at the first symbol that cannot be resolved', async () => {
    const fetchPrice = vi.fn(async () => null);
    const resolver = sampleResolver({ fetchPrice });
    await expect(resolver.compare('NOPE', 'AAPL')).rejects.toThrow(
      'Price not available for symbol NOPE.',
    );
    expect(fetchPrice.mock.calls).toEqual([['NOPE']]);
  });

  it('reports the second symbol when only it is missing', async () => {
    await expect(sampleResolver().compare('AAPL', 'NOPE')).rejects.toThrow(
      'Price not available for symbol NOPE.',
    );
  });
});

describe('wire helpers', () => {
  const quote: PriceQuote = { symbol: 'MSFT', price: 380.5, source: 'fallback' };

  it('formats prices to two decimals', () => {
    expect(toWireQuote(quote)).toEqual({ symbol: 'MSFT', price: '380.50', source: 'fallback' });
  });

  it('names both symbols in every summary', () => {
    const other: PriceQuote = { symbol: 'AAPL', price: 150.25, source: 'live' };
    expect(summarizeComparison(quote, other)).toBe(
      'MSFT is trading higher than AAPL (380.50 vs 150.25).',
    );
  });
});
