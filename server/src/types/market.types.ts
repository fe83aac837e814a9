import type { SectionKey } from '../config/markets.js';

export type QuoteSession = 'regular' | 'pre' | 'post' | 'closed' | 'day' | 'night';

export interface QuoteRecord {
  symbol: string;
  name: string;
  display_name: string;
  current_price: number;
  previous_close: number | null;
  change: number;
  change_percent: number;
  volume: number;
  high: number | null;
  low: number | null;
  open: number | null;
  timestamp: string;
  session?: QuoteSession;
  earnings_date?: string;
  earnings_days_until?: number;
}

/** Quotes of one section keyed by symbol, in configured order. */
export type SectionPayload = Record<string, QuoteRecord>;

export interface SkippedSymbol {
  symbol: string;
  name: string;
  section: SectionKey;
}

export interface EarningsEntry {
  symbol: string;
  name: string;
  date: string;
  days_until: number;
}

export type MetalsSession = 'day' | 'night';

export interface RatioRecord {
  id: string;
  name: string;
  description: string;
  unit: string;
  current: number | null;
  range_high: number | null;
  range_low: number | null;
  high_date: string | null;
  low_date: string | null;
  period_label: string;
  error: string | null;
}

export interface RatiosSummary {
  ratios: RatioRecord[];
  timestamp: string;
}

export interface RatioHistory {
  id: string;
  name: string;
  period_label: string;
  dates: string[];
  values: number[];
}

export interface StockHistory {
  symbol: string;
  name: string;
  period: string;
  dates: string[];
  values: number[];
}

export type MarketSummary = Partial<Record<SectionKey, SectionPayload>> & {
  timestamp: string;
  earnings_upcoming?: EarningsEntry[];
  earnings_upcoming_tw?: EarningsEntry[];
  metals_session?: MetalsSession;
  metals_session_et?: string;
  ratios?: RatiosSummary;
  skipped_symbols: SkippedSymbol[];
};
