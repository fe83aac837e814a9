// FRED observations for CPI context (month-over-month and year-over-year change)
import { z } from 'zod';
import { fetchWithRetry } from '../utils/fetchRetry.js';

export const FRED_OBSERVATIONS_URL = 'https://api.stlouisfed.org/fred/series/observations';
export const CPI_SERIES = 'CPIAUCSL';
export const FORECAST_HINT = 'Consensus forecast: see the Investing.com or Trading Economics calendar';

export interface CpiContext {
  prev_month_value: string | null;
  prev_year_value: string | null;
  forecast_value: string | null;
  forecast_hint?: string;
  error?: string;
}

export interface CpiContextSource {
  fetch(): Promise<CpiContext>;
}

const ObservationsSchema = z.object({
  observations: z.array(z.object({ value: z.string() })).default([]),
});

/** First published value (FRED writes "." for missing) as `0.25%`. */
export function latestPercent(json: unknown): string | null {
  const r = ObservationsSchema.safeParse(json);
  if (!r.success) return null;
  for (const o of r.data.observations) {
    const v = Number(o.value);
    if (o.value !== '.' && o.value.trim() && Number.isFinite(v)) return `${v.toFixed(2)}%`;
  }
  return null;
}

export class FredCpiSource implements CpiContextSource {
  constructor(private readonly apiKey: string | undefined) {}

  private async change(units: 'pch' | 'pc1'): Promise<string | null> {
    const params = new URLSearchParams({
      series_id: CPI_SERIES,
      api_key: this.apiKey ?? '',
      file_type: 'json',
      sort_order: 'desc',
      limit: '2',
      units,
    });
    const res = await fetchWithRetry(`${FRED_OBSERVATIONS_URL}?${params}`, {}, { retries: 2, timeoutMs: 15_000, label: 'fred' });
    if (!res.ok) throw new Error(`FRED responded ${res.status}`);
    return latestPercent(await res.json());
  }

  async fetch(): Promise<CpiContext> {
    const base = { forecast_value: null, forecast_hint: FORECAST_HINT };
    if (!this.apiKey) {
      return { ...base, prev_month_value: null, prev_year_value: null, error: 'FRED_API_KEY is not set' };
    }
    const [prevMonth, prevYear] = await Promise.all([this.change('pch'), this.change('pc1')]);
    return { ...base, prev_month_value: prevMonth, prev_year_value: prevYear };
  }
}
