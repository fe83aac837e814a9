// Yahoo Finance provider backed by yahoo-finance2

import yahooFinance from 'yahoo-finance2';
import { logger } from '../utils/logger.js';
import type { HistoryBar, HistoryInterval, MarketProvider, NewsArticle, ProviderQuote } from './provider.interface.js';

// soft throttle between multi-symbol quote batches
const MIN_BATCH_INTERVAL_MS = 750;
const BATCH_SIZE = 40;

function field(obj: object, key: string): unknown {
  return Reflect.get(obj, key);
}

function num(v: unknown): number | undefined {
  const n = typeof v === 'number' ? v : typeof v === 'string' ? Number(v) : NaN;
  return Number.isFinite(n) ? n : undefined;
}

function str(v: unknown): string | undefined {
  return typeof v === 'string' && v.trim() ? v : undefined;
}

function date(v: unknown): Date | undefined {
  if (v instanceof Date && !Number.isNaN(v.getTime())) return v;
  const n = num(v);
  if (n === undefined) return undefined;
  return new Date(n > 1_000_000_000_000 ? n : n * 1000);
}

export function toProviderQuote(q: object): ProviderQuote | null {
  const symbol = str(field(q, 'symbol'));
  if (!symbol) return null;
  const price = [field(q, 'regularMarketPrice'), field(q, 'postMarketPrice'), field(q, 'preMarketPrice'), field(q, 'regularMarketPreviousClose')]
    .map(num)
    .find((v): v is number => v !== undefined);
  if (price === undefined) return null;
  return {
    symbol: symbol.toUpperCase(),
    name: str(field(q, 'shortName')) ?? str(field(q, 'longName')),
    price,
    previousClose: num(field(q, 'regularMarketPreviousClose')),
    open: num(field(q, 'regularMarketOpen')),
    high: num(field(q, 'regularMarketDayHigh')),
    low: num(field(q, 'regularMarketDayLow')),
    volume: num(field(q, 'regularMarketVolume')),
    change: num(field(q, 'regularMarketChange')),
    changePercent: num(field(q, 'regularMarketChangePercent')),
    marketTime: date(field(q, 'regularMarketTime')),
    marketState: str(field(q, 'marketState')),
    earningsDate: date(field(q, 'earningsTimestamp')) ?? date(field(q, 'earningsTimestampStart')),
  };
}

export type QuoteBatchFn = (symbols: string[]) => Promise<object[]>;

export interface YahooProviderOptions {
  quoteBatch?: QuoteBatchFn;
  batchIntervalMs?: number;
}

export class YahooProvider implements MarketProvider {
  readonly name = 'yahoo';
  private lastBatchAt = 0;
  private readonly quoteBatch: QuoteBatchFn;
  private readonly batchIntervalMs: number;

  constructor(opts: YahooProviderOptions = {}) {
    this.quoteBatch = opts.quoteBatch ?? (batch => yahooFinance.quote(batch));
    this.batchIntervalMs = opts.batchIntervalMs ?? MIN_BATCH_INTERVAL_MS;
  }

  private async throttle() {
    const wait = this.lastBatchAt + this.batchIntervalMs - Date.now();
    if (wait > 0) await new Promise(r => setTimeout(r, wait));
    this.lastBatchAt = Date.now();
  }

  private collect(rows: object[], out: ProviderQuote[]) {
    for (const row of rows) {
      const q = toProviderQuote(row);
      if (q) out.push(q);
    }
  }

  /**
   * Symbols Yahoo cannot answer are left out of the result. A failed batch is
   * retried one symbol at a time so a single bad ticker costs only itself.
   */
  async quotes(symbols: string[]): Promise<ProviderQuote[]> {
    const uniq = Array.from(new Set(symbols.filter(s => !!s)));
    const out: ProviderQuote[] = [];
    for (let i = 0; i < uniq.length; i += BATCH_SIZE) {
      const batch = uniq.slice(i, i + BATCH_SIZE);
      await this.throttle();
      try {
        this.collect(await this.quoteBatch(batch), out);
        continue;
      } catch (err) {
        logger.warn({ err, symbols: batch.join(',') }, 'yahoo_quote_batch_failed');
      }
      for (const symbol of batch) {
        try {
          this.collect(await this.quoteBatch([symbol]), out);
        } catch (err) {
          logger.warn({ err, symbol }, 'yahoo_quote_symbol_failed');
        }
      }
    }
    return out;
  }

  async history(symbol: string, opts: { period1: Date; interval: HistoryInterval }): Promise<HistoryBar[]> {
    try {
      const result = await yahooFinance.chart(symbol, { period1: opts.period1, interval: opts.interval });
      const bars: HistoryBar[] = [];
      for (const row of result.quotes) {
        const close = num(row.close);
        if (close === undefined) continue;
        bars.push({ date: row.date, close });
      }
      return bars;
    } catch (err) {
      logger.error({ err, symbol, interval: opts.interval }, 'yahoo_chart_failed');
      throw err;
    }
  }

  async news(query: string, count: number): Promise<NewsArticle[]> {
    try {
      const result = await yahooFinance.search(query, { newsCount: count, quotesCount: 0 });
      const out: NewsArticle[] = [];
      for (const item of result.news) {
        const publishedAt = date(field(item, 'providerPublishTime'));
        const title = str(field(item, 'title'));
        if (!publishedAt || !title) continue;
        const related = field(item, 'relatedTickers');
        out.push({
          title,
          publisher: str(field(item, 'publisher')) ?? '',
          link: str(field(item, 'link')) ?? '',
          publishedAt,
          relatedTickers: Array.isArray(related) ? related.filter((t): t is string => typeof t === 'string') : [],
        });
      }
      return out;
    } catch (err) {
      logger.warn({ err, query }, 'yahoo_search_failed');
      throw err;
    }
  }
}
