import fs from 'fs';
import { z } from 'zod';
import { fromServerRoot } from '../config/paths.js';
import { parseBlsSchedule, type ReleaseScheduleSource, type ScheduledRelease } from '../providers/bls.js';
import type { CpiContext, CpiContextSource } from '../providers/fred.js';
import { TtlCache } from '../shared/services/ttl-cache.js';
import { logger } from '../utils/logger.js';
import {
  addDays,
  addMonths,
  daysBetween,
  daysInMonth,
  hhmm,
  isWeekend,
  parseYmd,
  weekdayOf,
  ymd,
  zonedParts,
  zonedTimeToUtc,
  type CalendarDate,
} from '../utils/time.js';
import { NEW_YORK } from './sessions.js';

const RULES = ['first_friday', 'mid_month', 'end_month', 'first_business_day', 'fixed'] as const;
export type ReleaseRule = typeof RULES[number];

const IndicatorSchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  source: z.string().default(''),
  rule: z.enum(RULES),
  time: z.string().regex(/^\d{2}:\d{2}$/),
  months: z.array(z.number().int().min(1).max(12)).optional(),
});

const CalendarConfigSchema = z.object({
  indicators: z.array(IndicatorSchema),
  highImportance: z.array(z.string()).default([]),
  fixedDates: z.record(z.array(z.string().regex(/^\d{4}-\d{2}-\d{2}$/))).default({}),
});

export type IndicatorDefinition = z.infer<typeof IndicatorSchema>;
export type CalendarConfig = z.infer<typeof CalendarConfigSchema>;

export interface EconEvent {
  indicator: string;
  name: string;
  source: string;
  date: string;
  time: string;
  release_date: string;
  importance: 'high' | 'medium';
  days_until: number;
  prev_month_value?: string;
  prev_year_value?: string;
  forecast_value?: string;
  forecast_hint?: string;
}

/** `BLS`: published schedule; `estimate`: release rules; `none`: schedule had nothing. */
export type CalendarSource = 'BLS' | 'estimate' | 'none';

export interface EconomicCalendar {
  upcoming: EconEvent[];
  past: EconEvent[];
  source: CalendarSource;
  timestamp: string;
}

export interface CalendarSources {
  schedule?: ReleaseScheduleSource | null;
  cpi?: CpiContextSource | null;
}

type TimedEvent = EconEvent & { at: number };

const PAST_WINDOW_DAYS = 30;

export function loadCalendarConfig(file = fromServerRoot('config/economic-indicators.json')): CalendarConfig {
  const r = CalendarConfigSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf8')));
  if (!r.success) {
    logger.error({ issues: r.error.issues, file }, 'calendar_config_invalid');
    throw new Error('economic indicator config invalid');
  }
  return r.data;
}

function rollForward(d: CalendarDate): CalendarDate {
  let out = d;
  while (isWeekend(out.year, out.month, out.day)) out = addDays(out, 1);
  return out;
}

function rollBack(d: CalendarDate): CalendarDate {
  let out = d;
  while (isWeekend(out.year, out.month, out.day)) out = addDays(out, -1);
  return out;
}

/** Estimated release date of a rule-based indicator; null for `fixed`. */
export function releaseDate(rule: ReleaseRule, year: number, month: number): CalendarDate | null {
  switch (rule) {
    case 'first_friday': {
      const offset = (5 - weekdayOf(year, month, 1) + 7) % 7;
      return { year, month, day: 1 + offset };
    }
    case 'mid_month':
      return rollForward({ year, month, day: 15 });
    case 'end_month':
      return rollBack({ year, month, day: daysInMonth(year, month) });
    case 'first_business_day':
      return rollForward({ year, month, day: 1 });
    case 'fixed':
      return null;
  }
}

function candidateDates(ind: IndicatorDefinition, config: CalendarConfig, months: Array<{ year: number; month: number }>): CalendarDate[] {
  if (ind.rule === 'fixed') {
    const inRange = new Set(months.map(m => `${m.year}-${m.month}`));
    return (config.fixedDates[ind.key] ?? [])
      .map(parseYmd)
      .filter((d): d is CalendarDate => d !== null && inRange.has(`${d.year}-${d.month}`));
  }
  const out: CalendarDate[] = [];
  for (const m of months) {
    if (ind.months && !ind.months.includes(m.month)) continue;
    const d = releaseDate(ind.rule, m.year, m.month);
    if (d) out.push(d);
  }
  return out;
}

function makeEvent(
  ind: IndicatorDefinition,
  high: ReadonlySet<string>,
  todayEt: CalendarDate,
  d: CalendarDate,
  hour: number,
  minute: number,
): TimedEvent {
  const at = zonedTimeToUtc(d.year, d.month, d.day, hour, minute, NEW_YORK);
  return {
    indicator: ind.key,
    name: ind.name,
    source: ind.source,
    date: ymd(d),
    time: hhmm(hour, minute),
    release_date: at.toISOString(),
    importance: high.has(ind.key) ? 'high' : 'medium',
    days_until: daysBetween(todayEt, d),
    at: at.getTime(),
  };
}

function finish(events: TimedEvent[], now: Date, source: CalendarSource): EconomicCalendar {
  const seen = new Set<string>();
  const unique = events.filter(e => {
    const key = `${e.indicator}|${e.date}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
  unique.sort((a, b) => a.at - b.at || a.indicator.localeCompare(b.indicator));

  const strip = ({ at: _at, ...e }: TimedEvent): EconEvent => e;
  const nowMs = now.getTime();
  const upcoming = unique.filter(e => e.at >= nowMs).map(strip);
  const past = unique
    .filter(e => e.at < nowMs && e.days_until >= -PAST_WINDOW_DAYS)
    .reverse()
    .map(strip);
  return { upcoming, past, source, timestamp: now.toISOString() };
}

/** Rule-based estimates for the previous, current and next two months. */
export function buildCalendar(config: CalendarConfig, now: Date): EconomicCalendar {
  const todayEt = zonedParts(now, NEW_YORK);
  const months = [-1, 0, 1, 2].map(n => addMonths(todayEt.year, todayEt.month, n));
  const high = new Set(config.highImportance);

  const events: TimedEvent[] = [];
  for (const ind of config.indicators) {
    const [hour, minute] = ind.time.split(':').map(Number);
    for (const d of candidateDates(ind, config, months)) {
      events.push(makeEvent(ind, high, todayEt, d, hour, minute));
    }
  }
  return finish(events, now, 'estimate');
}

export interface ScheduleMonth {
  year: number;
  month: number;
  releases: ScheduledRelease[];
}

/** Calendar from published release dates only; indicators missing from the config are dropped. */
export function buildScheduleCalendar(config: CalendarConfig, months: readonly ScheduleMonth[], now: Date): EconomicCalendar {
  const todayEt = zonedParts(now, NEW_YORK);
  const high = new Set(config.highImportance);
  const byKey = new Map(config.indicators.map(i => [i.key, i]));

  const events: TimedEvent[] = [];
  for (const m of months) {
    for (const r of m.releases) {
      const ind = byKey.get(r.indicator);
      if (!ind || r.day > daysInMonth(m.year, m.month)) continue;
      events.push(makeEvent(ind, high, todayEt, { year: m.year, month: m.month, day: r.day }, r.hour, r.minute));
    }
  }
  return finish(events, now, events.length ? 'BLS' : 'none');
}

/** Adds previous-month, previous-year and forecast context to CPI events. */
export function withCpiContext(calendar: EconomicCalendar, ctx: CpiContext | null): EconomicCalendar {
  if (!ctx) return calendar;
  const enrich = (e: EconEvent): EconEvent => {
    if (e.indicator !== 'CPI') return e;
    const out: EconEvent = { ...e };
    if (ctx.prev_month_value !== null) out.prev_month_value = ctx.prev_month_value;
    if (ctx.prev_year_value !== null) out.prev_year_value = ctx.prev_year_value;
    if (ctx.forecast_value !== null) out.forecast_value = ctx.forecast_value;
    else if (ctx.forecast_hint) out.forecast_hint = ctx.forecast_hint;
    return out;
  };
  return { ...calendar, upcoming: calendar.upcoming.map(enrich), past: calendar.past.map(enrich) };
}

export class EconomicCalendarService {
  private readonly cache: TtlCache<EconomicCalendar>;
  private readonly cpiCache: TtlCache<CpiContext>;
  private lastCpi: CpiContext | null = null;
  private readonly schedule: ReleaseScheduleSource | null;
  private readonly cpi: CpiContextSource | null;

  constructor(
    private readonly config: CalendarConfig,
    ttlMs: number,
    private readonly now: () => Date = () => new Date(),
    sources: CalendarSources = {},
  ) {
    this.cache = new TtlCache<EconomicCalendar>(ttlMs, 1);
    this.cpiCache = new TtlCache<CpiContext>(ttlMs, 1);
    this.schedule = sources.schedule ?? null;
    this.cpi = sources.cpi ?? null;
  }

  get(force = false): Promise<EconomicCalendar> {
    return this.cache.wrap('calendar', force, async () => {
      const now = this.now();
      const base = this.schedule ? await this.fromSchedule(this.schedule, now) : buildCalendar(this.config, now);
      return withCpiContext(base, await this.cpiContext(force));
    });
  }

  /** Current and next month; a month that fails to load is left out. */
  private async fromSchedule(source: ReleaseScheduleSource, now: Date): Promise<EconomicCalendar> {
    const todayEt = zonedParts(now, NEW_YORK);
    const months: ScheduleMonth[] = [];
    for (const { year, month } of [0, 1].map(n => addMonths(todayEt.year, todayEt.month, n))) {
      try {
        const html = await source.fetchMonth(year, month);
        if (html) months.push({ year, month, releases: parseBlsSchedule(html) });
      } catch (err) {
        logger.warn({ err, year, month }, 'release_schedule_fetch_failed');
      }
    }
    return buildScheduleCalendar(this.config, months, now);
  }

  private async cpiContext(force: boolean): Promise<CpiContext | null> {
    const source = this.cpi;
    if (!source) return null;
    try {
      this.lastCpi = await this.cpiCache.wrap('cpi', force, () => source.fetch());
    } catch (err) {
      logger.warn({ err }, 'cpi_context_failed');
    }
    return this.lastCpi;
  }
}
