import { SECTION_KEYS, type MarketUniverse, type SectionKey } from '../config/markets.js';
import type { MarketProvider, ProviderQuote } from '../providers/provider.interface.js';
import { TtlCache } from '../shared/services/ttl-cache.js';
import type {
  EarningsEntry,
  MarketSummary,
  QuoteRecord,
  QuoteSession,
  SectionPayload,
  SkippedSymbol,
} from '../types/market.types.js';
import { HttpError } from '../utils/httpError.js';
import { logger } from '../utils/logger.js';
import { daysBetween, ymd, zonedParts } from '../utils/time.js';
import type { RatioService } from './ratios.js';
import { NEW_YORK, comexSession } from './sessions.js';

export const EARNINGS_WINDOW_DAYS = 60;
const TAIPEI = 'Asia/Taipei';

type EarningsField = 'earnings_upcoming' | 'earnings_upcoming_tw';

/** Sections that carry an earnings strip, with the zone their calendar days are counted in. */
const EARNINGS_STRIPS: Partial<Record<SectionKey, { field: EarningsField; timeZone: string }>> = {
  us_stocks: { field: 'earnings_upcoming', timeZone: NEW_YORK },
  tw_markets: { field: 'earnings_upcoming_tw', timeZone: TAIPEI },
};

export interface SectionRequest {
  sections: SectionKey[];
  ratios: boolean;
}

/** `undefined`/empty means everything; unknown names are dropped. */
export function parseSections(raw: unknown): SectionRequest {
  const text = typeof raw === 'string' ? raw.trim() : '';
  if (!text) return { sections: [...SECTION_KEYS], ratios: true };
  const names = new Set(text.split(',').map(s => s.trim()).filter(Boolean));
  return {
    sections: SECTION_KEYS.filter(k => names.has(k)),
    ratios: names.has('ratios'),
  };
}

function round2(n: number) {
  return Math.round(n * 100) / 100;
}

function sessionOf(state: string | undefined): QuoteSession | undefined {
  switch ((state || '').toUpperCase()) {
    case 'REGULAR': return 'regular';
    case 'PRE':
    case 'PREPRE': return 'pre';
    case 'POST':
    case 'POSTPOST': return 'post';
    case 'CLOSED': return 'closed';
    default: return undefined;
  }
}

export function toQuoteRecord(q: ProviderQuote, displayName: string, now: Date): QuoteRecord {
  const prev = q.previousClose ?? null;
  const change = q.change ?? (prev !== null ? q.price - prev : 0);
  const pct = q.changePercent ?? (prev ? (change / prev) * 100 : 0);
  const record: QuoteRecord = {
    symbol: q.symbol,
    name: q.name || displayName,
    display_name: displayName,
    current_price: round2(q.price),
    previous_close: prev === null ? null : round2(prev),
    change: round2(change),
    change_percent: round2(pct),
    volume: Math.round(q.volume ?? 0),
    high: q.high === undefined ? null : round2(q.high),
    low: q.low === undefined ? null : round2(q.low),
    open: q.open === undefined ? null : round2(q.open),
    timestamp: (q.marketTime ?? now).toISOString(),
  };
  const session = sessionOf(q.marketState);
  if (session) record.session = session;
  return record;
}

export class MarketSummaryService {
  private readonly quotes: TtlCache<ProviderQuote>;

  constructor(
    private readonly provider: MarketProvider,
    private readonly universe: MarketUniverse,
    private readonly ratios: RatioService,
    ttlMs: number,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.quotes = new TtlCache<ProviderQuote>(ttlMs, 512);
  }

  private async loadQuotes(symbols: string[], force: boolean): Promise<Map<string, ProviderQuote>> {
    const out = new Map<string, ProviderQuote>();
    const missing: string[] = [];
    for (const s of new Set(symbols)) {
      const hit = force ? undefined : this.quotes.get(s.toUpperCase());
      if (hit) out.set(s.toUpperCase(), hit);
      else missing.push(s);
    }
    if (!missing.length) return out;
    let fetched: ProviderQuote[];
    try {
      fetched = await this.provider.quotes(missing);
    } catch (err) {
      logger.error({ err, provider: this.provider.name, count: missing.length }, 'market_quotes_failed');
      throw new HttpError(502, `Quote provider unavailable: ${err instanceof Error ? err.message : String(err)}`);
    }
    for (const q of fetched) {
      const key = q.symbol.toUpperCase();
      this.quotes.set(key, q);
      out.set(key, q);
    }
    return out;
  }

  private earningsFor(q: ProviderQuote, now: Date, timeZone: string): { date: string; days: number } | null {
    if (!q.earningsDate || q.symbol.startsWith('^')) return null;
    const p = zonedParts(q.earningsDate, timeZone);
    const days = daysBetween(zonedParts(now, timeZone), p);
    if (days < 0 || days > EARNINGS_WINDOW_DAYS) return null;
    return { date: ymd(p), days };
  }

  async summary(request: SectionRequest, force = false): Promise<MarketSummary> {
    const now = this.now();
    const symbols = request.sections.flatMap(k => this.universe.sections[k].symbols.map(s => s.symbol));
    const quotes = await this.loadQuotes(symbols, force);
    const comex = comexSession(now);

    const out: MarketSummary = { timestamp: now.toISOString(), skipped_symbols: [] };
    const skipped: SkippedSymbol[] = [];

    for (const key of request.sections) {
      const section = this.universe.sections[key];
      const strip = EARNINGS_STRIPS[key];
      const earnings: EarningsEntry[] = [];
      const payload: SectionPayload = {};
      for (const entry of section.symbols) {
        const q = quotes.get(entry.symbol.toUpperCase());
        if (!q) {
          skipped.push({ symbol: entry.symbol, name: entry.name, section: key });
          continue;
        }
        const record = toQuoteRecord(q, entry.name, now);
        if (key === 'metals_futures') record.session = comex.session;
        if (section.earnings && strip) {
          const e = this.earningsFor(q, now, strip.timeZone);
          if (e) {
            record.earnings_date = e.date;
            record.earnings_days_until = e.days;
            earnings.push({ symbol: entry.symbol, name: entry.name, date: e.date, days_until: e.days });
          }
        }
        payload[entry.symbol] = record;
      }
      out[key] = payload;
      if (strip) {
        out[strip.field] = earnings.sort((a, b) => a.date.localeCompare(b.date) || a.symbol.localeCompare(b.symbol));
      }
    }

    if (request.sections.includes('metals_futures')) {
      out.metals_session = comex.session;
      out.metals_session_et = comex.et;
    }
    if (request.ratios) {
      out.ratios = await this.ratios.summary(force);
    }
    out.skipped_symbols = skipped;
    if (skipped.length) logger.debug({ count: skipped.length }, 'market_symbols_skipped');
    return out;
  }
}
