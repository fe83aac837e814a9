import { escapeHtml } from '../lib/format.js';
import { describeLoadError } from '../modules/fetch.js';
import type { InstitutionalNet } from '../types/market.types.js';
import { registerCard } from './registry.js';
import type { CardDeps } from './registry.js';
import { renderSection } from './section-card.js';

export const CONTAINER = 'institutional-net';
export const DAILY_CANVAS = 'institutional-daily-chart';
export const CUMULATIVE_CANVAS = 'institutional-cumulative-chart';
export const UPLOAD_STATUS = 'institutional-upload-status';

/** `20260105` → `0105` inside `year`, unchanged otherwise. */
export function dateChip(yyyymmdd: string, year: number): string {
  return yyyymmdd.startsWith(String(year)) ? yyyymmdd.slice(4) : yyyymmdd;
}

function millions(n: number): number {
  return Math.round(n / 10_000) / 100;
}

export function institutionalHtml(data: InstitutionalNet): string {
  const parts: string[] = [];
  if (data.fetch_error) parts.push(`<div class="hint">Exchange download failed: ${escapeHtml(data.fetch_error)}</div>`);
  if (!data.labels.length) {
    parts.push(`<div class="hint">${escapeHtml(data.csv_help || 'No institutional data yet. Upload BFI82U CSV reports below.')}</div>`);
  } else {
    parts.push(
      `<div class="chart-box"><canvas id="${DAILY_CANVAS}"></canvas></div>`,
      `<div class="chart-box"><canvas id="${CUMULATIVE_CANVAS}"></canvas></div>`,
    );
  }
  if (data.uploaded_dates.length) {
    parts.push('<div class="date-chips">' + data.uploaded_dates
      .map(d => `<span class="chip" title="${escapeHtml(d)}">${escapeHtml(dateChip(d, data.year))}</span>`).join('') + '</div>');
  }
  parts.push(
    '<form class="upload-form" data-upload="institutional">'
    + '<input type="file" name="file" accept=".csv,text/csv" multiple>'
    + '<input type="text" name="date" placeholder="YYYYMMDD (optional)" inputmode="numeric" maxlength="8">'
    + '<button type="submit">Upload</button>'
    + `<span class="upload-status" id="${UPLOAD_STATUS}"></span></form>`,
  );
  return parts.join('');
}

function drawCharts(deps: CardDeps, data: InstitutionalNet) {
  if (!data.labels.length) return;
  deps.charts.bar(DAILY_CANVAS, data.labels, [
    { label: 'Daily total net (M)', values: data.daily.map(d => millions(d.total_net)) },
  ]);
  deps.charts.line(CUMULATIVE_CANVAS, data.labels, [
    { label: 'Foreign', values: data.cumulative_foreign_millions },
    { label: 'Investment trust', values: data.cumulative_trust_millions },
    { label: 'Dealer', values: data.cumulative_dealer_millions },
    { label: 'Total', values: data.cumulative_total_millions },
  ]);
}

export function loadInstitutional(deps: CardDeps, force: boolean): Promise<void> {
  return renderSection(deps, CONTAINER, 'Institutional net flow',
    () => deps.api.institutionalNet(force), institutionalHtml, (data) => drawCharts(deps, data));
}

export interface UploadFile {
  blob: Blob;
  name: string;
}

export interface UploadSummary {
  saved: string[];
  errors: string[];
}

/** One request per file, in order; the card reloads once something was saved. */
export async function uploadFiles(deps: CardDeps, files: readonly UploadFile[], date?: string): Promise<UploadSummary> {
  const summary: UploadSummary = { saved: [], errors: [] };
  if (!files.length) {
    summary.errors.push('Choose a CSV file to upload');
  }
  for (const f of files) {
    try {
      const res = await deps.api.uploadInstitutional(f.blob, f.name, date || undefined);
      summary.saved.push(res.saved_date);
    } catch (err) {
      summary.errors.push(`${f.name}: ${describeLoadError(err)}`);
    }
  }
  if (summary.saved.length) {
    try {
      await loadInstitutional(deps, true);
    } catch (err) {
      summary.errors.push(describeLoadError(err));
    }
  }
  const status = [
    summary.saved.length ? `Saved ${summary.saved.join(', ')}` : '',
    ...summary.errors,
  ].filter(Boolean).join('; ');
  deps.surface.setText(UPLOAD_STATUS, status);
  return summary;
}

registerCard({
  id: CONTAINER,
  title: 'Institutional net flow',
  order: 20,
  create: (deps) => (force) => loadInstitutional(deps, force),
});
