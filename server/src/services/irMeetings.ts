import fs from 'fs/promises';
import path from 'path';
import { TtlCache } from '../shared/services/ttl-cache.js';
import { parseCsv } from '../utils/csv.js';
import { decodeCsvBytes } from '../utils/decode.js';
import { logger } from '../utils/logger.js';
import { addMonths, ymd, zonedParts } from '../utils/time.js';
import { TAIPEI } from './institutionalNet.js';

export interface IrMeeting {
  company_code: string;
  company_name: string;
  meeting_date: string;
  meeting_time: string;
  location: string;
  source: string;
}

export interface IrTimelineDay {
  date: string;
  meetings: IrMeeting[];
  count: number;
}

export interface IrTimeline {
  timeline: IrTimelineDay[];
  total_meetings: number;
  date_range: { start: string | null; end: string | null };
  timestamp: string;
}

export const MONTHS_AHEAD = 3;
const HEADER_HINTS = ['公司代號', '公司名稱', '召開', 'company_code'];

/**
 * Meeting dates come as ROC (`115/01/28`, year + 1911) or Gregorian dates.
 * Ranges such as `115/01/13 至 115/01/20` keep the first date.
 */
export function parseMeetingDate(raw: string): string | null {
  const first = raw.trim().split(/至|~|\s/)[0];
  const m = /^(\d{2,4})[/-](\d{1,2})[/-](\d{1,2})$/.exec(first);
  if (!m) return null;
  let year = Number(m[1]);
  if (year <= 200) year += 1911;
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  return ymd({ year, month, day });
}

export function parseIrCsv(text: string, source: string): IrMeeting[] {
  const rows = parseCsv(text);
  const headerIdx = rows.findIndex(r => HEADER_HINTS.some(h => r.join(' ').includes(h)));
  const out: IrMeeting[] = [];
  for (const row of rows.slice(headerIdx + 1)) {
    if (row.length < 3) continue;
    const [code = '', name = '', date = '', time = '', location = ''] = row.map(c => c.trim());
    if (!code || !name || code.includes('公司代號')) continue;
    const meetingDate = parseMeetingDate(date);
    if (!meetingDate) continue;
    out.push({ company_code: code, company_name: name, meeting_date: meetingDate, meeting_time: time, location, source });
  }
  return out;
}

export function buildTimeline(meetings: IrMeeting[], from: string, until: string, now: Date): IrTimeline {
  const seen = new Set<string>();
  const byDate = new Map<string, IrMeeting[]>();
  for (const m of meetings) {
    if (m.meeting_date < from || m.meeting_date >= until) continue;
    const key = `${m.company_code}|${m.meeting_date}`;
    if (seen.has(key)) continue;
    seen.add(key);
    const list = byDate.get(m.meeting_date) ?? [];
    list.push(m);
    byDate.set(m.meeting_date, list);
  }
  const timeline = Array.from(byDate.keys())
    .sort()
    .map(date => {
      const list = (byDate.get(date) ?? []).sort((a, b) => a.meeting_time.localeCompare(b.meeting_time) || a.company_code.localeCompare(b.company_code));
      return { date, meetings: list, count: list.length };
    });
  return {
    timeline,
    total_meetings: seen.size,
    date_range: {
      start: timeline.length ? timeline[0].date : null,
      end: timeline.length ? timeline[timeline.length - 1].date : null,
    },
    timestamp: now.toISOString(),
  };
}

export class IrMeetingsService {
  private readonly cache: TtlCache<IrTimeline>;

  constructor(
    private readonly dir: string,
    ttlMs: number,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.cache = new TtlCache<IrTimeline>(ttlMs, 1);
  }

  get(force = false): Promise<IrTimeline> {
    return this.cache.wrap('timeline', force, () => this.build());
  }

  private async readAll(): Promise<IrMeeting[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        logger.warn({ dir: this.dir }, 'ir_csv_dir_missing');
        return [];
      }
      throw err;
    }
    const out: IrMeeting[] = [];
    for (const name of names.filter(n => n.toLowerCase().endsWith('.csv')).sort()) {
      const buf = await fs.readFile(path.join(this.dir, name));
      out.push(...parseIrCsv(decodeCsvBytes(buf), name));
    }
    return out;
  }

  private async build(): Promise<IrTimeline> {
    const now = this.now();
    const local = zonedParts(now, TAIPEI);
    const from = ymd({ year: local.year, month: local.month, day: 1 });
    const end = addMonths(local.year, local.month, MONTHS_AHEAD);
    const until = ymd({ year: end.year, month: end.month, day: 1 });
    const meetings = await this.readAll();
    logger.debug({ count: meetings.length, from, until }, 'ir_meetings_loaded');
    return buildTimeline(meetings, from, until, now);
  }
}
