import type { RatioDefinition } from '../config/markets.js';
import type { HistoryBar, MarketProvider } from '../providers/provider.interface.js';
import { TtlCache } from '../shared/services/ttl-cache.js';
import type { RatioHistory, RatioRecord, RatiosSummary } from '../types/market.types.js';
import { logger } from '../utils/logger.js';
import { daysInMonth, ymd, addDays } from '../utils/time.js';

export interface RatioPoint {
  date: string;
  value: number;
}

export type Resample = '1D' | '1W' | '1M';

export function parseResample(raw: unknown): Resample | null {
  const v = typeof raw === 'string' && raw ? raw.toUpperCase() : '1M';
  return v === '1D' || v === '1W' || v === '1M' ? v : null;
}

function round4(n: number) {
  return Math.round(n * 10_000) / 10_000;
}

function dayKey(d: Date) {
  return d.toISOString().slice(0, 10);
}

function periodStart(period: RatioDefinition['period'], now: Date): Date {
  if (period === 'max') return new Date(Date.UTC(2000, 0, 1));
  return new Date(Date.UTC(now.getUTCFullYear() - 20, now.getUTCMonth(), now.getUTCDate()));
}

export function periodLabel(period: RatioDefinition['period']) {
  return period === '20y' ? '20y' : 'max';
}

/**
 * Pairs two daily close series on calendar date. Only dates present in both
 * series with positive prices on each side produce a point.
 */
export function alignRatio(numerator: HistoryBar[], denominator: HistoryBar[]): RatioPoint[] {
  const den = new Map<string, number>();
  for (const bar of denominator) den.set(dayKey(bar.date), bar.close);
  const byDate = new Map<string, number>();
  for (const bar of numerator) {
    const key = dayKey(bar.date);
    const d = den.get(key);
    if (d === undefined || !(d > 0) || !(bar.close > 0)) continue;
    byDate.set(key, bar.close / d);
  }
  return Array.from(byDate, ([date, value]) => ({ date, value }))
    .sort((a, b) => a.date.localeCompare(b.date));
}

function bucketEnd(date: string, resample: Resample): string {
  const [y, m, d] = date.split('-').map(Number);
  if (resample === '1M') return ymd({ year: y, month: m, day: daysInMonth(y, m) });
  // weeks end on Sunday
  const weekday = new Date(Date.UTC(y, m - 1, d)).getUTCDay();
  return ymd(addDays({ year: y, month: m, day: d }, (7 - weekday) % 7));
}

/** Last value per bucket, labelled with the bucket's end date. */
export function resampleLast(points: RatioPoint[], resample: Resample): RatioPoint[] {
  if (resample === '1D') return points;
  const buckets = new Map<string, number>();
  for (const p of points) buckets.set(bucketEnd(p.date, resample), p.value);
  return Array.from(buckets, ([date, value]) => ({ date, value }));
}

export function computeRatio(def: RatioDefinition, numerator: HistoryBar[], denominator: HistoryBar[]): RatioRecord {
  const base: RatioRecord = {
    id: def.id,
    name: def.name,
    description: def.description,
    unit: def.unit,
    current: null,
    range_high: null,
    range_low: null,
    high_date: null,
    low_date: null,
    period_label: periodLabel(def.period),
    error: null,
  };
  if (!numerator.length || !denominator.length) return { ...base, error: 'missing price data' };
  const points = alignRatio(numerator, denominator);
  if (!points.length) return { ...base, error: 'no overlapping trading days' };
  let high = points[0];
  let low = points[0];
  for (const p of points) {
    if (p.value > high.value) high = p;
    if (p.value < low.value) low = p;
  }
  return {
    ...base,
    current: round4(points[points.length - 1].value),
    range_high: round4(high.value),
    range_low: round4(low.value),
    high_date: high.date,
    low_date: low.date,
  };
}

export class RatioService {
  private readonly series: TtlCache<HistoryBar[]>;
  private readonly summaries: TtlCache<RatiosSummary>;

  constructor(
    private readonly provider: MarketProvider,
    private readonly definitions: RatioDefinition[],
    ttlMs: number,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.series = new TtlCache<HistoryBar[]>(ttlMs, 64);
    this.summaries = new TtlCache<RatiosSummary>(ttlMs, 1);
  }

  find(id: string): RatioDefinition | undefined {
    return this.definitions.find(d => d.id === id);
  }

  private history(symbol: string, period: RatioDefinition['period'], force: boolean): Promise<HistoryBar[]> {
    return this.series.wrap(`${symbol}:${period}`, force, () =>
      this.provider.history(symbol, { period1: periodStart(period, this.now()), interval: '1d' }));
  }

  private async pair(def: RatioDefinition, force: boolean): Promise<[HistoryBar[], HistoryBar[]]> {
    // sequential: the upstream rate-limits bursts of chart requests
    const num = await this.history(def.numerator, def.period, force);
    const den = await this.history(def.denominator, def.period, force);
    return [num, den];
  }

  async one(def: RatioDefinition, force = false): Promise<RatioRecord> {
    try {
      const [num, den] = await this.pair(def, force);
      return computeRatio(def, num, den);
    } catch (err) {
      logger.warn({ err, ratio: def.id }, 'ratio_history_failed');
      return computeRatio(def, [], []);
    }
  }

  summary(force = false): Promise<RatiosSummary> {
    return this.summaries.wrap('all', force, async () => {
      const ratios: RatioRecord[] = [];
      for (const def of this.definitions) ratios.push(await this.one(def, force));
      return { ratios, timestamp: this.now().toISOString() };
    });
  }

  /** Resampled ratio series; null when the id is unknown or no points exist. */
  async historyFor(id: string, resample: Resample, force = false): Promise<RatioHistory | null> {
    const def = this.find(id);
    if (!def) return null;
    const [num, den] = await this.pair(def, force);
    const points = resampleLast(alignRatio(num, den), resample);
    if (!points.length) return null;
    return {
      id: def.id,
      name: def.name,
      period_label: periodLabel(def.period),
      dates: points.map(p => p.date),
      values: points.map(p => round4(p.value)),
    };
  }
}
