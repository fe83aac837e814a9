import type { MarketUniverse, PremarketMarketConfig } from '../config/markets.js';
import type { MarketProvider } from '../providers/provider.interface.js';
import { TtlCache } from '../shared/services/ttl-cache.js';
import { addDays, isWeekend, zonedParts, zonedTimeToUtc, type CalendarDate } from '../utils/time.js';
import { dedupeByLink, searchEach, toNewsItem, type NewsItem } from './newsSearch.js';

export const PREMARKET_MARKETS = ['taiwan', 'us'] as const;
export type PremarketMarket = typeof PREMARKET_MARKETS[number];

export function isPremarketMarket(v: string): v is PremarketMarket {
  return (PREMARKET_MARKETS as readonly string[]).includes(v);
}

/** `premarket` before today's reference, `premarket_today` after it, `premarket_friday` on weekends. */
export type PremarketWindowType = 'premarket' | 'premarket_today' | 'premarket_friday';

export interface PremarketWindow {
  type: PremarketWindowType;
  start: Date;
  end: Date;
}

export interface PremarketNews {
  market: PremarketMarket;
  label: string;
  type: PremarketWindowType;
  window_start: string;
  window_end: string;
  news_count: number;
  news: NewsItem[];
  timestamp: string;
}

export type PremarketSummary = Record<PremarketMarket, PremarketNews>;

export const WINDOW_HOURS = 12;
const ARTICLES_PER_QUERY = 25;

/** The news window ending at the market's reference time (weekends use Friday's). */
export function premarketWindow(cfg: PremarketMarketConfig, now: Date): PremarketWindow {
  const local = zonedParts(now, cfg.timeZone);
  let day: CalendarDate = { year: local.year, month: local.month, day: local.day };
  let weekend = false;
  while (isWeekend(day.year, day.month, day.day)) {
    weekend = true;
    day = addDays(day, -1);
  }
  const [hour, minute] = cfg.open.split(':').map(Number);
  const end = zonedTimeToUtc(day.year, day.month, day.day, hour, minute, cfg.timeZone);
  const start = new Date(end.getTime() - WINDOW_HOURS * 3600_000);
  const type: PremarketWindowType = weekend ? 'premarket_friday' : now < end ? 'premarket' : 'premarket_today';
  return { type, start, end };
}

export class PremarketService {
  private readonly cache: TtlCache<PremarketNews>;

  constructor(
    private readonly provider: MarketProvider,
    private readonly markets: MarketUniverse['premarket'],
    ttlMs: number,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.cache = new TtlCache<PremarketNews>(ttlMs, PREMARKET_MARKETS.length);
  }

  forMarket(market: PremarketMarket, force = false): Promise<PremarketNews> {
    return this.cache.wrap(market, force, () => this.build(market));
  }

  async all(force = false): Promise<PremarketSummary> {
    const taiwan = await this.forMarket('taiwan', force);
    const us = await this.forMarket('us', force);
    return { taiwan, us };
  }

  private async build(market: PremarketMarket): Promise<PremarketNews> {
    const cfg = this.markets[market];
    const now = this.now();
    const window = premarketWindow(cfg, now);
    const results = await searchEach(this.provider, cfg.symbols, ARTICLES_PER_QUERY);
    const news = dedupeByLink(Array.from(results.values()).flat())
      .filter(a => a.publishedAt >= window.start && a.publishedAt <= window.end)
      .sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime())
      .map(toNewsItem);
    return {
      market,
      label: cfg.label,
      type: window.type,
      window_start: window.start.toISOString(),
      window_end: window.end.toISOString(),
      news_count: news.length,
      news,
      timestamp: now.toISOString(),
    };
  }
}
