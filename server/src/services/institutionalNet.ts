import fs from 'fs/promises';
import path from 'path';
import type { Bfi82uSource } from '../providers/twse.js';
import { parseCsv } from '../utils/csv.js';
import { decodeCsvBytes } from '../utils/decode.js';
import { logger } from '../utils/logger.js';
import { addDays, isWeekend, zonedParts, type CalendarDate } from '../utils/time.js';

export const TAIPEI = 'Asia/Taipei';

/** Net buy/sell of one trading day, in NT dollars. */
export interface InstitutionalDay {
  date: string;
  foreign_net: number;
  trust_net: number;
  dealer_net: number;
  total_net: number;
}

export interface InstitutionalDailyRow extends InstitutionalDay {
  date_display: string;
  cumulative_foreign: number;
  cumulative_trust: number;
  cumulative_dealer: number;
  cumulative_total: number;
}

export interface InstitutionalNet {
  year: number;
  labels: string[];
  daily: InstitutionalDailyRow[];
  cumulative_foreign_millions: number[];
  cumulative_trust_millions: number[];
  cumulative_dealer_millions: number[];
  cumulative_total_millions: number[];
  uploaded_dates: string[];
  timestamp: string;
  fetch_error?: string;
  csv_help?: string;
}

export const CSV_HELP =
  'Download the "BFI82U" report as CSV from the TWSE website for each trading day and upload it here, ' +
  'or save it as YYYYMMDD.csv in the institutional CSV directory, then press Refresh.';

const FILE_RE = /^(?:BFI82U_)?(\d{8})\.csv$/i;

export function parseAmount(s: string | undefined): number {
  if (!s) return 0;
  const n = Number(s.trim().replace(/[,"=\s]/g, ''));
  return Number.isFinite(n) ? Math.trunc(n) : 0;
}

/** A real calendar day between 1990 and 2030. */
export function isValidYmd(y: number, m: number, d: number): boolean {
  if (!Number.isInteger(y) || y < 1990 || y > 2030 || m < 1 || m > 12 || d < 1) return false;
  return d <= new Date(Date.UTC(y, m, 0)).getUTCDate();
}

function validCompact(s: string): string | null {
  if (!/^\d{8}$/.test(s)) return null;
  return isValidYmd(Number(s.slice(0, 4)), Number(s.slice(4, 6)), Number(s.slice(6, 8))) ? s : null;
}

/** Parses one BFI82U CSV; null when no header or value column can be found. */
export function parseBfi82u(text: string, date: string): InstitutionalDay | null {
  if (!text || text.slice(0, 200).toLowerCase().includes('html')) return null;
  const rows = parseCsv(text.replace(/^﻿/, ''));
  const headerIdx = rows.findIndex(r => {
    const line = r.join(',');
    return line.includes('單位名稱') || line.includes('類別') || line.includes('買賣超') || line.includes('買賣差額');
  });
  if (headerIdx < 0) return null;
  const header = rows[headerIdx].map(h => h.trim());
  let col = header.findIndex(h => h.includes('買賣超') || h.includes('買賣差額'));
  if (col < 0) col = header.findIndex((h, j) => j >= 2 && h.includes('買') && h.includes('賣'));
  if (col < 0) return null;

  let foreign: number | null = null;
  let trust: number | null = null;
  let dealer = 0;
  let total: number | null = null;
  const components: number[] = [];
  for (const row of rows.slice(headerIdx + 1)) {
    if (row.length <= col) continue;
    const label = row[0].replace(/\s/g, '');
    const value = parseAmount(row[col]);
    if (label.includes('外資') && /陸資|及|與/.test(label)) {
      foreign = value;
      components.push(value);
    } else if (label.includes('投信') && !label.includes('自營')) {
      trust = value;
      components.push(value);
    } else if (label.includes('自營')) {
      dealer += value;
      components.push(value);
    } else if (label.includes('合計') || label.includes('總計')) {
      total = value;
    }
  }
  if (foreign === null && trust === null && !components.length && total === null) return null;
  return {
    date,
    foreign_net: foreign ?? 0,
    trust_net: trust ?? 0,
    dealer_net: dealer,
    total_net: total ?? components.reduce((a, b) => a + b, 0),
  };
}

export function dateFromFilename(filename: string): string | null {
  const m = /(\d{8})/.exec(path.parse(filename).name);
  return m ? validCompact(m[1]) : null;
}

/** Looks for `YYYYMMDD`, `YYYY/MM/DD` or ROC `yyy/m/d` in the first lines of a CSV. */
export function dateFromCsv(text: string): string | null {
  for (const line of text.split('\n').slice(0, 10)) {
    const g = /(\d{4})[/-]?(\d{2})[/-]?(\d{2})/.exec(line);
    if (g && isValidYmd(Number(g[1]), Number(g[2]), Number(g[3]))) return `${g[1]}${g[2]}${g[3]}`;
    const roc = /(\d{3})\/(\d{1,2})\/(\d{1,2})/.exec(line);
    if (roc) {
      const y = Number(roc[1]) + 1911;
      const m = Number(roc[2]);
      const d = Number(roc[3]);
      if (isValidYmd(y, m, d)) return `${y}${String(m).padStart(2, '0')}${String(d).padStart(2, '0')}`;
    }
  }
  return null;
}

/** Form field first, then the file name, then the CSV content. An impossible field date is ignored. */
export function resolveUploadDate(field: unknown, filename: string, text: string): string | null {
  const cleaned = typeof field === 'string' ? field.trim().replace(/[-/]/g, '') : '';
  return validCompact(cleaned) ?? dateFromFilename(filename) ?? dateFromCsv(text);
}

function compact(d: CalendarDate) {
  return `${d.year}${String(d.month).padStart(2, '0')}${String(d.day).padStart(2, '0')}`;
}

/** Weekdays from January 1 through `today`; exchange holidays are not excluded. */
export function tradingDays(today: CalendarDate): string[] {
  const out: string[] = [];
  for (let d: CalendarDate = { year: today.year, month: 1, day: 1 }; compact(d) <= compact(today); d = addDays(d, 1)) {
    if (!isWeekend(d.year, d.month, d.day)) out.push(compact(d));
  }
  return out;
}

const millions = (n: number) => Math.round((n / 1e6) * 100) / 100;

export function accumulate(days: InstitutionalDay[]): InstitutionalDailyRow[] {
  let f = 0, t = 0, d = 0, all = 0;
  return days.map(day => {
    f += day.foreign_net;
    t += day.trust_net;
    d += day.dealer_net;
    all += day.total_net;
    return {
      ...day,
      date_display: `${day.date.slice(0, 4)}-${day.date.slice(4, 6)}-${day.date.slice(6, 8)}`,
      cumulative_foreign: f,
      cumulative_trust: t,
      cumulative_dealer: d,
      cumulative_total: all,
    };
  });
}

export class InstitutionalNetService {
  private cached: { day: string; data: InstitutionalNet } | null = null;
  private lastFetchError: string | null = null;

  constructor(
    private readonly dir: string,
    private readonly remote: Bfi82uSource | null,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async listDates(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }
    const dates = names.map(n => FILE_RE.exec(n)?.[1]).filter((d): d is string => !!d);
    return Array.from(new Set(dates)).sort();
  }

  async save(date: string, content: Buffer): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(path.join(this.dir, `${date}.csv`), content);
    this.cached = null;
    logger.info({ date, bytes: content.length }, 'institutional_csv_saved');
  }

  private async fromFile(date: string): Promise<InstitutionalDay | null> {
    for (const name of [`${date}.csv`, `BFI82U_${date}.csv`]) {
      let buf: Buffer;
      try {
        buf = await fs.readFile(path.join(this.dir, name));
      } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') continue;
        throw err;
      }
      const parsed = parseBfi82u(decodeCsvBytes(buf), date);
      if (parsed) return parsed;
      logger.warn({ date, file: name }, 'institutional_csv_unparseable');
    }
    return null;
  }

  private async fromRemote(date: string): Promise<InstitutionalDay | null> {
    if (!this.remote) return null;
    try {
      const parsed = parseBfi82u(await this.remote.fetchDay(date), date);
      this.lastFetchError = parsed ? null : 'TWSE response could not be parsed';
      return parsed;
    } catch (err) {
      this.lastFetchError = err instanceof Error ? err.message : String(err);
      return null;
    }
  }

  async get(force = false): Promise<InstitutionalNet> {
    const now = this.now();
    const local = zonedParts(now, TAIPEI);
    const dayKey = compact(local);
    if (!force && this.cached?.day === dayKey) return this.cached.data;

    const days: InstitutionalDay[] = [];
    for (const date of tradingDays(local)) {
      const row = (await this.fromFile(date)) ?? (await this.fromRemote(date));
      if (row) days.push(row);
    }
    const daily = accumulate(days);
    const data: InstitutionalNet = {
      year: local.year,
      labels: daily.map(r => r.date_display),
      daily,
      cumulative_foreign_millions: daily.map(r => millions(r.cumulative_foreign)),
      cumulative_trust_millions: daily.map(r => millions(r.cumulative_trust)),
      cumulative_dealer_millions: daily.map(r => millions(r.cumulative_dealer)),
      cumulative_total_millions: daily.map(r => millions(r.cumulative_total)),
      uploaded_dates: await this.listDates(),
      timestamp: now.toISOString(),
    };
    if (!daily.length) {
      data.fetch_error = this.lastFetchError ?? 'no data available';
      data.csv_help = CSV_HELP;
    }
    this.cached = { day: dayKey, data };
    return data;
  }
}
