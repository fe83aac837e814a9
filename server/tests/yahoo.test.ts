import request from 'supertest';
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createApp } from '../src/app.js';
import { parseMarketUniverse } from '../src/config/markets.js';
import { YahooProvider, toProviderQuote } from '../src/providers/yahoo.js';
import { NOW, testConfig, universe } from './helpers.js';

const US_SYMBOLS = Array.from({ length: 44 }, (_, i) => `S${String(i + 1).padStart(2, '0')}`);

const wideUniverse = parseMarketUniverse({
  ...universe,
  sections: {
    ...universe.sections,
    us_stocks: {
      title: 'US Stocks',
      symbols: [...US_SYMBOLS.map(symbol => ({ symbol, name: `Stock ${symbol}` })), { symbol: 'BAD', name: 'Broken' }],
    },
  },
});

/** Rejects any request that includes BAD, the way Yahoo rejects a whole batch over one ticker. */
function quoteBatch(calls: string[][]) {
  return async (symbols: string[]): Promise<object[]> => {
    calls.push(symbols);
    if (symbols.includes('BAD')) throw new Error('Failed Yahoo Schema validation');
    return symbols.map(symbol => ({ symbol, regularMarketPrice: 100, regularMarketPreviousClose: 99 }));
  };
}

describe('toProviderQuote', () => {
  it('falls back through the price fields', () => {
    assert.strictEqual(toProviderQuote({ symbol: 'x', postMarketPrice: 12 })?.symbol, 'X');
    assert.strictEqual(toProviderQuote({ symbol: 'x', postMarketPrice: 12 })?.price, 12);
    assert.strictEqual(toProviderQuote({ symbol: 'X' }), null);
    assert.strictEqual(toProviderQuote({ regularMarketPrice: 1 }), null);
  });
});

describe('YahooProvider.quotes', () => {
  it('retries a failed batch one symbol at a time', async () => {
    const calls: string[][] = [];
    const provider = new YahooProvider({ quoteBatch: quoteBatch(calls), batchIntervalMs: 0 });
    const quotes = await provider.quotes(['A', 'BAD', 'C']);
    assert.deepStrictEqual(quotes.map(q => q.symbol), ['A', 'C']);
    assert.deepStrictEqual(calls, [['A', 'BAD', 'C'], ['A'], ['BAD'], ['C']]);
  });

  it('keeps earlier batches when a later one fails', async () => {
    const calls: string[][] = [];
    const provider = new YahooProvider({ quoteBatch: quoteBatch(calls), batchIntervalMs: 0 });
    const app = createApp({ config: testConfig(), provider, universe: wideUniverse, now: () => NOW, bfi82u: null });

    const res = await request(app).get('/api/market-data?sections=us_stocks,tw_markets');
    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.body.success, true);
    assert.strictEqual(Object.keys(res.body.data.us_stocks).length, 44);
    assert.deepStrictEqual(Object.keys(res.body.data.tw_markets), ['^TWII', '2330.TW']);
    assert.deepStrictEqual(res.body.data.skipped_symbols, [{ symbol: 'BAD', name: 'Broken', section: 'us_stocks' }]);
    assert.deepStrictEqual(calls.map(c => c.length), [40, 7, 1, 1, 1, 1, 1, 1, 1]);
  });
});
