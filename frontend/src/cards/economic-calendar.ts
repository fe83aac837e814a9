import { dayLabel, escapeHtml } from '../lib/format.js';
import { emptyHtml } from '../shared/utils/dom-utils.js';
import type { EconEvent, EconomicCalendar } from '../types/market.types.js';
import { registerCard } from './registry.js';
import { renderSection } from './section-card.js';

export const CONTAINER = 'economic-calendar';

export function countdown(days: number): string {
  if (days === 0) return 'today';
  if (days === 1) return 'tomorrow';
  if (days > 1) return `in ${days}d`;
  return `${-days}d ago`;
}

function groupByDate(events: readonly EconEvent[]): Map<string, EconEvent[]> {
  const out = new Map<string, EconEvent[]>();
  for (const e of events) {
    const list = out.get(e.date);
    if (list) list.push(e);
    else out.set(e.date, [e]);
  }
  return out;
}

function contextHtml(e: EconEvent): string {
  if (e.prev_month_value === undefined && e.prev_year_value === undefined) return '';
  const forecast = e.forecast_value !== undefined
    ? ` · Forecast ${escapeHtml(e.forecast_value)}`
    : e.forecast_hint ? ` <span class="muted" title="${escapeHtml(e.forecast_hint)}">(forecast?)</span>` : '';
  return `<div class="econ-context">Prev month ${escapeHtml(e.prev_month_value ?? '—')}`
    + ` · Prev year ${escapeHtml(e.prev_year_value ?? '—')}${forecast}</div>`;
}

function eventHtml(e: EconEvent): string {
  const source = e.source ? ` · ${escapeHtml(e.source)}` : '';
  return `<div class="econ-event importance-${e.importance}">`
    + `<span class="badge">${e.importance === 'high' ? 'High' : 'Medium'}</span> `
    + `<span class="name">${escapeHtml(e.name)}</span> `
    + `<span class="muted">${escapeHtml(e.time)} ET${source}</span>${contextHtml(e)}</div>`;
}

function daysHtml(events: readonly EconEvent[]): string {
  return Array.from(groupByDate(events), ([date, list]) =>
    `<div class="econ-day"><div class="econ-date">${escapeHtml(dayLabel(date))} <small>${countdown(list[0].days_until)}</small></div>`
    + list.map(eventHtml).join('') + '</div>').join('');
}

export function economicCalendarHtml(data: EconomicCalendar): string {
  if (data.source === 'none' && !data.upcoming.length && !data.past.length) {
    return emptyHtml('No published release dates yet. Press Refresh to read the BLS schedule again.');
  }
  const upcoming = data.upcoming.length ? daysHtml(data.upcoming) : emptyHtml('No scheduled releases');
  const past = data.past.length
    ? `<details class="econ-past"><summary>Past releases (${data.past.length})</summary>${daysHtml(data.past)}</details>`
    : '';
  return upcoming + past;
}

registerCard({
  id: CONTAINER,
  title: 'Economic calendar',
  order: 10,
  create: (deps) => (force) => renderSection(deps, CONTAINER, 'Economic calendar',
    () => deps.api.economicCalendar(force), economicCalendarHtml),
});
