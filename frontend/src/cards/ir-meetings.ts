import { dayLabel, escapeHtml } from '../lib/format.js';
import type { IrTimeline, IrTimelineDay } from '../types/market.types.js';
import { registerCard } from './registry.js';
import { localIsoDate, renderSection } from './section-card.js';

export const CONTAINER = 'ir-meetings';

const EMPTY_HELP = 'No investor conferences found. Export the conference schedule as CSV into the server IR directory (IR_CSV_DIR), then refresh.';

export function splitTimeline(days: readonly IrTimelineDay[], today: string): { past: IrTimelineDay[]; upcoming: IrTimelineDay[] } {
  return {
    past: days.filter(d => d.date < today),
    upcoming: days.filter(d => d.date >= today),
  };
}

function dayHtml(d: IrTimelineDay, today: string): string {
  const cls = d.date === today ? 'ir-day today' : 'ir-day';
  return `<div class="${cls}"><div class="ir-date">${escapeHtml(dayLabel(d.date))} <small>${d.count}</small></div><ul>`
    + d.meetings.map(m =>
      `<li><b>${escapeHtml(m.company_code)} ${escapeHtml(m.company_name)}</b>`
      + ` <span class="muted">${escapeHtml(m.meeting_time)}${m.location ? ` · ${escapeHtml(m.location)}` : ''}</span></li>`).join('')
    + '</ul></div>';
}

export function irMeetingsHtml(data: IrTimeline, today: string): string {
  if (!data.total_meetings) return `<div class="hint">${escapeHtml(EMPTY_HELP)}</div>`;
  const { past, upcoming } = splitTimeline(data.timeline, today);
  const head = data.date_range.start && data.date_range.end
    ? `<div class="muted">${data.total_meetings} meetings, ${escapeHtml(data.date_range.start)} to ${escapeHtml(data.date_range.end)}</div>`
    : '';
  const next = upcoming.length
    ? upcoming.map(d => dayHtml(d, today)).join('')
    : '<div class="muted">No upcoming meetings.</div>';
  const done = past.length
    ? `<details class="ir-past"><summary>Past (${past.length} days)</summary>${past.map(d => dayHtml(d, today)).join('')}</details>`
    : '';
  return head + next + done;
}

registerCard({
  id: CONTAINER,
  title: 'IR meetings',
  order: 30,
  create: (deps) => (force) => renderSection(deps, CONTAINER, 'IR meetings',
    () => deps.api.irMeetings(force), (data) => irMeetingsHtml(data, localIsoDate(deps.now()))),
});
