import type { MarketUniverse } from '../config/markets.js';
import type { HistoryBar, MarketProvider } from '../providers/provider.interface.js';
import { TtlCache } from '../shared/services/ttl-cache.js';
import type { StockHistory } from '../types/market.types.js';
import { addMonths } from '../utils/time.js';

const PERIOD_MONTHS = {
  '1mo': 1,
  '3mo': 3,
  '6mo': 6,
  '1y': 12,
  '2y': 24,
  '5y': 60,
} as const;

export type HistoryPeriod = keyof typeof PERIOD_MONTHS;

export function isHistoryPeriod(v: string): v is HistoryPeriod {
  return Object.prototype.hasOwnProperty.call(PERIOD_MONTHS, v);
}

export class StockHistoryService {
  private readonly cache: TtlCache<HistoryBar[]>;
  private readonly names = new Map<string, string>();

  constructor(
    private readonly provider: MarketProvider,
    universe: MarketUniverse,
    ttlMs: number,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.cache = new TtlCache<HistoryBar[]>(ttlMs, 128);
    for (const section of Object.values(universe.sections)) {
      for (const s of section.symbols) this.names.set(s.symbol.toUpperCase(), s.name);
    }
  }

  /** Daily closes over `period`; null when the provider has nothing for the symbol. */
  async get(symbol: string, period: HistoryPeriod): Promise<StockHistory | null> {
    const sym = symbol.trim().toUpperCase();
    const now = this.now();
    const start = addMonths(now.getUTCFullYear(), now.getUTCMonth() + 1, -PERIOD_MONTHS[period]);
    const period1 = new Date(Date.UTC(start.year, start.month - 1, Math.min(now.getUTCDate(), 28)));
    const bars = await this.cache.wrap(`${sym}:${period}`, false, () =>
      this.provider.history(sym, { period1, interval: '1d' }));
    if (!bars.length) return null;
    return {
      symbol: sym,
      name: this.names.get(sym) ?? sym,
      period,
      dates: bars.map(b => b.date.toISOString().slice(0, 10)),
      values: bars.map(b => Math.round(b.close * 100) / 100),
    };
  }
}
