import { escapeHtml } from '../lib/format.js';
import { emptyHtml } from '../shared/utils/dom-utils.js';
import type { CompanyVolume, NewsVolume } from '../types/market.types.js';
import { registerCard } from './registry.js';
import { renderSection } from './section-card.js';

export const CONTAINER = 'news-volume';
export const VISIBLE_ROWS = 5;

function rowHtml(c: CompanyVolume): string {
  return `<tr data-news-symbol="${escapeHtml(c.symbol)}"><td>${c.rank}</td>`
    + `<td>${escapeHtml(c.name)} <span class="muted">${escapeHtml(c.symbol)}</span></td><td>${c.count}</td></tr>`;
}

function tableHtml(rows: readonly CompanyVolume[]): string {
  return `<table class="news-volume"><tbody>${rows.map(rowHtml).join('')}</tbody></table>`;
}

export function newsVolumeHtml(data: NewsVolume): string {
  if (!data.top_companies.length) return emptyHtml('No news found');
  const top = data.top_companies.slice(0, VISIBLE_ROWS);
  const rest = data.top_companies.slice(VISIBLE_ROWS);
  const more = rest.length
    ? `<details class="news-more"><summary>Show ${rest.length} more</summary>${tableHtml(rest)}</details>`
    : '';
  return tableHtml(top) + more
    + `<div class="muted">${escapeHtml(data.period)}, ${data.total_companies} companies with news</div>`;
}

registerCard({
  id: CONTAINER,
  title: 'News volume',
  order: 50,
  create: (deps) => (force) => renderSection(deps, CONTAINER, 'News volume',
    () => deps.api.newsVolume(force), newsVolumeHtml, (data) => deps.onNewsVolume?.(data.top_companies)),
});
