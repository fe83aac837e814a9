// Payload shapes served under /api; every response is checked against these at the fetch boundary.
import { z } from 'zod';

export const MARKET_SECTIONS = [
  'us_indices',
  'us_stocks',
  'tw_markets',
  'international_markets',
  'metals_futures',
  'crypto',
] as const;
export type MarketSection = typeof MARKET_SECTIONS[number];

/** Snapshot keys that own a board container. */
export type BoardSection = MarketSection | 'ratios';
export const BOARD_SECTIONS: readonly BoardSection[] = [...MARKET_SECTIONS, 'ratios'];

export const QuoteRecordSchema = z.object({
  symbol: z.string(),
  name: z.string(),
  display_name: z.string().optional(),
  current_price: z.number(),
  previous_close: z.number().nullable().optional(),
  change: z.number(),
  change_percent: z.number(),
  volume: z.number().optional(),
  high: z.number().nullable().optional(),
  low: z.number().nullable().optional(),
  open: z.number().nullable().optional(),
  timestamp: z.string().optional(),
  session: z.enum(['regular', 'pre', 'post', 'closed', 'day', 'night']).optional(),
  earnings_date: z.string().optional(),
  earnings_days_until: z.number().optional(),
});
export type QuoteRecord = z.infer<typeof QuoteRecordSchema>;

export const SectionPayloadSchema = z.record(QuoteRecordSchema);
export type SectionPayload = z.infer<typeof SectionPayloadSchema>;

export const EarningsEntrySchema = z.object({
  symbol: z.string(),
  name: z.string(),
  date: z.string(),
  days_until: z.number(),
});
export type EarningsEntry = z.infer<typeof EarningsEntrySchema>;

export const SkippedSymbolSchema = z.object({
  symbol: z.string(),
  name: z.string(),
  section: z.string(),
});
export type SkippedSymbol = z.infer<typeof SkippedSymbolSchema>;

export const RatioRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().optional(),
  unit: z.string().optional(),
  current: z.number().nullable(),
  range_high: z.number().nullable(),
  range_low: z.number().nullable(),
  high_date: z.string().nullable().optional(),
  low_date: z.string().nullable().optional(),
  period_label: z.string(),
  error: z.string().nullable().optional(),
});
export type RatioRecord = z.infer<typeof RatioRecordSchema>;

export const RatiosSummarySchema = z.object({
  ratios: z.array(RatioRecordSchema),
  timestamp: z.string(),
});
export type RatiosSummary = z.infer<typeof RatiosSummarySchema>;

export const MarketDataSchema = z.object({
  us_indices: SectionPayloadSchema.optional(),
  us_stocks: SectionPayloadSchema.optional(),
  tw_markets: SectionPayloadSchema.optional(),
  international_markets: SectionPayloadSchema.optional(),
  metals_futures: SectionPayloadSchema.optional(),
  crypto: SectionPayloadSchema.optional(),
  ratios: RatiosSummarySchema.optional(),
  timestamp: z.string().optional(),
  earnings_upcoming: z.array(EarningsEntrySchema).optional(),
  earnings_upcoming_tw: z.array(EarningsEntrySchema).optional(),
  metals_session: z.enum(['day', 'night']).optional(),
  metals_session_et: z.string().optional(),
  skipped_symbols: z.array(SkippedSymbolSchema).optional(),
});
export type MarketData = z.infer<typeof MarketDataSchema>;

export const StockHistorySchema = z.object({
  symbol: z.string(),
  name: z.string(),
  period: z.string().optional(),
  dates: z.array(z.string()),
  values: z.array(z.number()),
});
export type StockHistory = z.infer<typeof StockHistorySchema>;

export const RatioHistorySchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  period_label: z.string(),
  dates: z.array(z.string()),
  values: z.array(z.number()),
});
export type RatioHistory = z.infer<typeof RatioHistorySchema>;

export const EconEventSchema = z.object({
  indicator: z.string(),
  name: z.string(),
  source: z.string().optional(),
  date: z.string(),
  time: z.string(),
  release_date: z.string(),
  importance: z.enum(['high', 'medium']),
  days_until: z.number(),
  prev_month_value: z.string().optional(),
  prev_year_value: z.string().optional(),
  forecast_value: z.string().optional(),
  forecast_hint: z.string().optional(),
});
export type EconEvent = z.infer<typeof EconEventSchema>;

export const EconomicCalendarSchema = z.object({
  upcoming: z.array(EconEventSchema),
  past: z.array(EconEventSchema),
  source: z.enum(['BLS', 'estimate', 'none']).optional(),
  timestamp: z.string(),
});
export type EconomicCalendar = z.infer<typeof EconomicCalendarSchema>;

export const NewsItemSchema = z.object({
  title: z.string(),
  publisher: z.string(),
  link: z.string(),
  published_at: z.string(),
});
export type NewsItem = z.infer<typeof NewsItemSchema>;

export const CompanyVolumeSchema = z.object({
  symbol: z.string(),
  name: z.string(),
  count: z.number(),
  rank: z.number(),
  news: z.array(NewsItemSchema),
});
export type CompanyVolume = z.infer<typeof CompanyVolumeSchema>;

export const NewsVolumeSchema = z.object({
  top_companies: z.array(CompanyVolumeSchema),
  period: z.string(),
  total_companies: z.number(),
  timestamp: z.string(),
});
export type NewsVolume = z.infer<typeof NewsVolumeSchema>;

export const PremarketNewsSchema = z.object({
  market: z.enum(['taiwan', 'us']),
  label: z.string(),
  type: z.enum(['premarket', 'premarket_today', 'premarket_friday']),
  window_start: z.string(),
  window_end: z.string(),
  news_count: z.number(),
  news: z.array(NewsItemSchema),
  timestamp: z.string(),
});
export type PremarketNews = z.infer<typeof PremarketNewsSchema>;

export const PremarketDataSchema = z.object({
  taiwan: PremarketNewsSchema.optional(),
  us: PremarketNewsSchema.optional(),
});
export type PremarketData = z.infer<typeof PremarketDataSchema>;

export const IrMeetingSchema = z.object({
  company_code: z.string(),
  company_name: z.string(),
  meeting_date: z.string(),
  meeting_time: z.string(),
  location: z.string(),
  source: z.string().optional(),
});
export type IrMeeting = z.infer<typeof IrMeetingSchema>;

export const IrTimelineSchema = z.object({
  timeline: z.array(z.object({
    date: z.string(),
    meetings: z.array(IrMeetingSchema),
    count: z.number(),
  })),
  total_meetings: z.number(),
  date_range: z.object({ start: z.string().nullable(), end: z.string().nullable() }),
  timestamp: z.string(),
});
export type IrTimeline = z.infer<typeof IrTimelineSchema>;
export type IrTimelineDay = IrTimeline['timeline'][number];

export const InstitutionalNetSchema = z.object({
  year: z.number(),
  labels: z.array(z.string()),
  daily: z.array(z.object({
    date: z.string(),
    date_display: z.string(),
    foreign_net: z.number(),
    trust_net: z.number(),
    dealer_net: z.number(),
    total_net: z.number(),
  })),
  cumulative_foreign_millions: z.array(z.number()),
  cumulative_trust_millions: z.array(z.number()),
  cumulative_dealer_millions: z.array(z.number()),
  cumulative_total_millions: z.array(z.number()),
  uploaded_dates: z.array(z.string()),
  timestamp: z.string(),
  fetch_error: z.string().optional(),
  csv_help: z.string().optional(),
});
export type InstitutionalNet = z.infer<typeof InstitutionalNetSchema>;

export const UploadResultSchema = z.object({
  saved_date: z.string(),
  uploaded_dates: z.array(z.string()),
});
export type UploadResult = z.infer<typeof UploadResultSchema>;
