import type { MarketUniverse } from '../config/markets.js';
import type { MarketProvider } from '../providers/provider.interface.js';
import { TtlCache } from '../shared/services/ttl-cache.js';
import { dedupeByLink, searchEach, toNewsItem, type NewsItem } from './newsSearch.js';

export interface CompanyVolume {
  symbol: string;
  name: string;
  count: number;
  rank: number;
  news: NewsItem[];
}

export interface NewsVolume {
  top_companies: CompanyVolume[];
  period: string;
  total_companies: number;
  timestamp: string;
}

export const VOLUME_WINDOW_HOURS = 24;
export const VOLUME_TOP_N = 20;
const ARTICLES_PER_QUERY = 20;

export function emptyNewsVolume(now: Date): NewsVolume {
  return { top_companies: [], period: `${VOLUME_WINDOW_HOURS}h`, total_companies: 0, timestamp: now.toISOString() };
}

export class NewsVolumeService {
  private readonly cache: TtlCache<NewsVolume>;
  private readonly companies: Array<{ symbol: string; name: string }>;

  constructor(
    private readonly provider: MarketProvider,
    universe: MarketUniverse,
    ttlMs: number,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.cache = new TtlCache<NewsVolume>(ttlMs, 1);
    // indices carry no company news
    this.companies = [...universe.sections.us_stocks.symbols, ...universe.sections.tw_markets.symbols]
      .filter(s => !s.symbol.startsWith('^'));
  }

  get(force = false): Promise<NewsVolume> {
    return this.cache.wrap('volume', force, () => this.build());
  }

  private async build(): Promise<NewsVolume> {
    const now = this.now();
    const since = now.getTime() - VOLUME_WINDOW_HOURS * 3600_000;
    const results = await searchEach(this.provider, this.companies.map(c => c.symbol), ARTICLES_PER_QUERY);
    const ranked = this.companies
      .map(c => {
        const recent = dedupeByLink(results.get(c.symbol) ?? [])
          .filter(a => a.publishedAt.getTime() >= since && a.publishedAt.getTime() <= now.getTime())
          .sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime());
        return { symbol: c.symbol, name: c.name, count: recent.length, news: recent.map(toNewsItem) };
      })
      .filter(c => c.count > 0)
      .sort((a, b) => b.count - a.count || a.symbol.localeCompare(b.symbol))
      .slice(0, VOLUME_TOP_N)
      .map((c, i) => ({ ...c, rank: i + 1 }));
    return { ...emptyNewsVolume(now), top_companies: ranked, total_companies: ranked.length };
  }
}
