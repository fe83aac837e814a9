import type {
  CompanyVolume, EconomicCalendar, InstitutionalNet, IrTimeline, MarketData, NewsVolume, PremarketData,
} from '../src/types/market.types.js';
import { quote } from './helpers.js';

export const calendar: EconomicCalendar = {
  upcoming: [
    {
      indicator: 'CPI', name: 'CPI', source: 'BLS', date: '2026-03-16', time: '08:30', release_date: '2026-03-16T12:30:00.000Z', importance: 'high', days_until: 6,
      prev_month_value: '0.25%', prev_year_value: '2.80%', forecast_hint: 'See the consensus calendar',
    },
    { indicator: 'FOMC', name: 'FOMC rate decision', date: '2026-03-18', time: '14:00', release_date: '2026-03-18T18:00:00.000Z', importance: 'high', days_until: 8 },
  ],
  past: [
    { indicator: 'NFP', name: 'Nonfarm payrolls', source: 'BLS', date: '2026-03-06', time: '08:30', release_date: '2026-03-06T13:30:00.000Z', importance: 'medium', days_until: -4 },
  ],
  timestamp: '2026-03-10T15:00:00.000Z',
};

export const institutional: InstitutionalNet = {
  year: 2026,
  labels: ['2026-01-05', '2026-01-06'],
  daily: [
    { date: '20260105', date_display: '01/05', foreign_net: 6_000_000, trust_net: 2_000_000, dealer_net: 100_000, total_net: 8_100_000 },
    { date: '20260106', date_display: '01/06', foreign_net: 6_000_000, trust_net: 2_000_000, dealer_net: 100_000, total_net: 8_100_000 },
  ],
  cumulative_foreign_millions: [6, 12],
  cumulative_trust_millions: [2, 4],
  cumulative_dealer_millions: [0.1, 0.2],
  cumulative_total_millions: [8.1, 16.2],
  uploaded_dates: ['20251231', '20260105'],
  timestamp: '2026-01-09T04:00:00.000Z',
};

export const irTimeline: IrTimeline = {
  timeline: [
    { date: '2026-03-12', count: 1, meetings: [{ company_code: '2882', company_name: 'Cathay FHC', meeting_date: '2026-03-12', meeting_time: '14:00', location: 'Taipei' }] },
    { date: '2026-03-16', count: 1, meetings: [{ company_code: '2317', company_name: 'Hon Hai', meeting_date: '2026-03-16', meeting_time: '10:00', location: '' }] },
  ],
  total_meetings: 2,
  date_range: { start: '2026-03-12', end: '2026-03-16' },
  timestamp: '2026-03-14T12:00:00.000Z',
};

export const premarket: PremarketData = {
  taiwan: {
    market: 'taiwan',
    label: 'Taiwan',
    type: 'premarket_today',
    window_start: '2026-03-09T05:30:00.000Z',
    window_end: '2026-03-10T00:30:00.000Z',
    news_count: 1,
    news: [{ title: 'TSMC guidance', publisher: 'Wire', link: 'https://news.test/tsmc', published_at: '2026-03-09T22:00:00.000Z' }],
    timestamp: '2026-03-10T00:30:00.000Z',
  },
};

export function company(symbol: string, count: number, rank: number): CompanyVolume {
  return {
    symbol,
    name: `${symbol} Corp`,
    count,
    rank,
    news: [{ title: `${symbol} headline`, publisher: 'Wire', link: `https://news.test/${symbol}`, published_at: '2026-03-10T12:00:00.000Z' }],
  };
}

export const newsVolume: NewsVolume = {
  top_companies: ['A', 'B', 'C', 'D', 'E', 'F', 'G'].map((s, i) => company(s, 10 - i, i + 1)),
  period: 'last 24h',
  total_companies: 7,
  timestamp: '2026-03-10T15:00:00.000Z',
};

export const marketStages: Record<string, MarketData> = {
  us_indices: { us_indices: { '^GSPC': quote('^GSPC', 5000, 0.5) }, timestamp: '2026-03-10T15:00:00.000Z' },
  'us_stocks,tw_markets': { us_stocks: { AAPL: quote('AAPL', 200, 1) }, tw_markets: {}, timestamp: '2026-03-10T15:00:30.000Z' },
  'international_markets,metals_futures,crypto,ratios': {
    international_markets: {},
    metals_futures: {},
    crypto: {},
    ratios: { ratios: [], timestamp: '2026-03-10T15:01:00.000Z' },
    timestamp: '2026-03-10T15:01:00.000Z',
  },
};
