import { fetchJson, withRefresh } from '../../modules/fetch.js';
import type { FetchLike } from '../../modules/fetch.js';
import {
  EconomicCalendarSchema, InstitutionalNetSchema, IrTimelineSchema, MarketDataSchema, NewsVolumeSchema,
  PremarketDataSchema, RatioHistorySchema, RatiosSummarySchema, StockHistorySchema, UploadResultSchema,
} from '../../types/market.types.js';
import type { BoardSection } from '../../types/market.types.js';

const SECTION_TIMEOUT_MS = 60_000;

export class Api {
  // Empty base keeps requests relative so the Vite proxy can forward /api
  constructor(private base = '', private fetchImpl?: FetchLike) {}

  private url(path: string) {
    return `${this.base}/api${path}`;
  }

  marketData(sections: readonly BoardSection[], force: boolean, timeoutMs: number) {
    const url = withRefresh(this.url(`/market-data?sections=${sections.join(',')}`), force);
    return fetchJson(url, { schema: MarketDataSchema, timeoutMs, fetchImpl: this.fetchImpl });
  }

  ratios(force = false) {
    return fetchJson(withRefresh(this.url('/ratios'), force), { schema: RatiosSummarySchema, timeoutMs: SECTION_TIMEOUT_MS, fetchImpl: this.fetchImpl });
  }

  ratioHistory(id: string, resample: '1D' | '1W' | '1M' = '1M') {
    const url = this.url(`/ratios/${encodeURIComponent(id)}/history?resample=${resample}`);
    return fetchJson(url, { schema: RatioHistorySchema, timeoutMs: SECTION_TIMEOUT_MS, fetchImpl: this.fetchImpl });
  }

  stockHistory(symbol: string, period = '1y') {
    const url = this.url(`/stock-history/${encodeURIComponent(symbol)}?period=${encodeURIComponent(period)}`);
    return fetchJson(url, { schema: StockHistorySchema, timeoutMs: SECTION_TIMEOUT_MS, fetchImpl: this.fetchImpl });
  }

  economicCalendar(force = false) {
    return fetchJson(withRefresh(this.url('/economic-calendar'), force), { schema: EconomicCalendarSchema, timeoutMs: SECTION_TIMEOUT_MS, fetchImpl: this.fetchImpl });
  }

  institutionalNet(force = false) {
    return fetchJson(withRefresh(this.url('/institutional-net'), force), { schema: InstitutionalNetSchema, timeoutMs: SECTION_TIMEOUT_MS, fetchImpl: this.fetchImpl });
  }

  /** One BFI82U CSV per request; `date` (YYYYMMDD) overrides the filename. */
  uploadInstitutional(file: Blob, filename: string, date?: string) {
    const form = new FormData();
    form.append('file', file, filename);
    if (date) form.append('date', date);
    return fetchJson(this.url('/institutional-net/upload'), {
      schema: UploadResultSchema, method: 'POST', body: form, timeoutMs: SECTION_TIMEOUT_MS, fetchImpl: this.fetchImpl,
    });
  }

  irMeetings(force = false) {
    return fetchJson(withRefresh(this.url('/ir-meetings'), force), { schema: IrTimelineSchema, timeoutMs: SECTION_TIMEOUT_MS, fetchImpl: this.fetchImpl });
  }

  premarket(force = false) {
    return fetchJson(withRefresh(this.url('/premarket-data'), force), { schema: PremarketDataSchema, timeoutMs: SECTION_TIMEOUT_MS, fetchImpl: this.fetchImpl });
  }

  newsVolume(force = false) {
    return fetchJson(withRefresh(this.url('/news-volume'), force), { schema: NewsVolumeSchema, timeoutMs: SECTION_TIMEOUT_MS, fetchImpl: this.fetchImpl });
  }
}
