// BLS monthly release schedule (https://www.bls.gov/schedule/)
import * as cheerio from 'cheerio';
import { fetchWithRetry } from '../utils/fetchRetry.js';

export const BLS_SCHEDULE_URL = 'https://www.bls.gov/schedule';

export interface ScheduledRelease {
  indicator: string;
  day: number;
  hour: number;
  minute: number;
  title: string;
}

export interface ReleaseScheduleSource {
  /** HTML of the schedule page for one month; null when the page is not published. */
  fetchMonth(year: number, month: number): Promise<string | null>;
}

export class BlsScheduleSource implements ReleaseScheduleSource {
  async fetchMonth(year: number, month: number): Promise<string | null> {
    const url = `${BLS_SCHEDULE_URL}/${year}/${String(month).padStart(2, '0')}_sched.htm`;
    const res = await fetchWithRetry(url, {
      headers: { 'User-Agent': 'Mozilla/5.0 (compatible; market-desk)' },
    }, { retries: 2, timeoutMs: 15_000, label: 'bls' });
    if (res.status === 404) return null;
    if (!res.ok) throw new Error(`BLS responded ${res.status}`);
    return res.text();
  }
}

export function mapBlsIndicator(title: string): string | null {
  const t = title.toLowerCase();
  if (t.includes('consumer price index') || /\bcpi\b/.test(t)) return 'CPI';
  if (t.includes('producer price index') || /\bppi\b/.test(t)) return 'PPI';
  if (t.includes('employment situation')) return 'NFP';
  if (t.includes('unemployment') && t.includes('rate')) return 'UNEMPLOYMENT';
  if (t.includes('retail sales')) return 'RETAIL_SALES';
  return null;
}

/** `8:30 AM` → [8, 30]; anything unreadable is the usual 08:30 release. */
export function parseBlsTime(text: string): [number, number] {
  const m = /^(\d{1,2}):(\d{2})\s*(AM|PM)$/i.exec(text.trim());
  if (!m) return [8, 30];
  let hour = Number(m[1]) % 12;
  if (m[3].toUpperCase() === 'PM') hour += 12;
  return [hour, Number(m[2])];
}

const TIME_LINE = /^\d{1,2}:\d{2}\s*(AM|PM)$/i;
const MONTH_HEADING = /^[A-Za-z]+\s+\d{4}$/;

/**
 * Releases in the calendar grid of a schedule page. Each day cell holds the
 * day number followed by release titles, each optionally followed by its time.
 */
export function parseBlsSchedule(html: string): ScheduledRelease[] {
  const $ = cheerio.load(html);
  $('br').replaceWith('\n');
  $('td *, th *').after('\n');

  const out: ScheduledRelease[] = [];
  const seen = new Set<string>();
  $('td, th').each((_, cell) => {
    const lines = $(cell).text().split('\n').map(l => l.trim()).filter(Boolean);
    const dayLine = lines.find(l => /^\d{1,2}$/.test(l) && Number(l) >= 1 && Number(l) <= 31);
    if (!dayLine) return;
    const day = Number(dayLine);
    lines.forEach((line, i) => {
      if (/^\d+$/.test(line) || TIME_LINE.test(line) || MONTH_HEADING.test(line)) return;
      const indicator = mapBlsIndicator(line);
      if (!indicator) return;
      const key = `${indicator}|${day}`;
      if (seen.has(key)) return;
      seen.add(key);
      const next = lines[i + 1];
      const [hour, minute] = next && TIME_LINE.test(next) ? parseBlsTime(next) : [8, 30];
      out.push({ indicator, day, hour, minute, title: line });
    });
  });
  return out;
}
