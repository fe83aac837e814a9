import fs from 'fs';
import os from 'os';
import path from 'path';
import type { ServerConfig } from '../src/config/env.js';
import { parseMarketUniverse } from '../src/config/markets.js';
import type { HistoryBar, HistoryInterval, MarketProvider, NewsArticle, ProviderQuote } from '../src/providers/provider.interface.js';

process.env.LOG_LEVEL = 'silent';

/** 2026-03-10 11:00 New York (EDT), 23:00 Taipei */
export const NOW = new Date('2026-03-10T15:00:00Z');

export const universe = parseMarketUniverse({
  sections: {
    us_indices: { title: 'US Indices', symbols: [{ symbol: '^GSPC', name: 'S&P 500' }, { symbol: 'QQQ', name: 'NASDAQ 100' }] },
    us_stocks: { title: 'US Stocks', earnings: true, symbols: [{ symbol: 'AAPL', name: 'Apple' }, { symbol: 'MSFT', name: 'Microsoft' }] },
    tw_markets: { title: 'Taiwan', symbols: [{ symbol: '^TWII', name: 'TAIEX' }, { symbol: '2330.TW', name: 'TSMC' }] },
    international_markets: { title: 'International', symbols: [{ symbol: '^N225', name: 'Nikkei 225' }] },
    metals_futures: { title: 'Metals', symbols: [{ symbol: 'GC=F', name: 'Gold' }] },
    crypto: { title: 'Crypto', symbols: [{ symbol: 'BTC-USD', name: 'Bitcoin' }] },
  },
  ratios: [
    { id: 'gold_silver', name: 'Gold/Silver', numerator: 'GC=F', denominator: 'SI=F', period: '20y' },
  ],
  premarket: {
    taiwan: { label: 'Taiwan', timeZone: 'Asia/Taipei', open: '08:30', symbols: ['2330.TW'] },
    us: { label: 'United States', timeZone: 'America/New_York', open: '09:30', symbols: ['SPY'] },
  },
});

export function quote(symbol: string, price: number, extra: Partial<ProviderQuote> = {}): ProviderQuote {
  return { symbol, price, ...extra };
}

export function bar(day: string, close: number): HistoryBar {
  return { date: new Date(`${day}T05:00:00Z`), close };
}

export function article(title: string, publishedAt: string, link = `https://news.test/${encodeURIComponent(title)}`): NewsArticle {
  return { title, publisher: 'Test Wire', link, publishedAt: new Date(publishedAt), relatedTickers: [] };
}

/** In-process provider: canned quotes, bars and articles, with call counters. */
export class FakeProvider implements MarketProvider {
  readonly name = 'fake';
  quoteCalls: string[][] = [];
  historyCalls: string[] = [];
  newsCalls: string[] = [];
  failQuotes: Error | null = null;
  failNews: Error | null = null;

  constructor(
    public quotesBySymbol: Record<string, ProviderQuote> = {},
    public bars: Record<string, HistoryBar[]> = {},
    public articles: Record<string, NewsArticle[]> = {},
  ) {}

  async quotes(symbols: string[]): Promise<ProviderQuote[]> {
    this.quoteCalls.push(symbols);
    if (this.failQuotes) throw this.failQuotes;
    return symbols.map(s => this.quotesBySymbol[s]).filter((q): q is ProviderQuote => q !== undefined);
  }

  async history(symbol: string, _opts: { period1: Date; interval: HistoryInterval }): Promise<HistoryBar[]> {
    this.historyCalls.push(symbol);
    return this.bars[symbol] ?? [];
  }

  async news(query: string, _count: number): Promise<NewsArticle[]> {
    this.newsCalls.push(query);
    if (this.failNews) throw this.failNews;
    return this.articles[query] ?? [];
  }
}

export function tempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `market-desk-${prefix}-`));
}

export function testConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    port: 0,
    cacheTtlMs: 60_000,
    irCsvDir: tempDir('ir'),
    institutionalCsvDir: tempDir('inst'),
    institutionalRemoteFetch: false,
    econCalendarSource: 'estimate',
    logLevel: 'silent',
    ...overrides,
  };
}
