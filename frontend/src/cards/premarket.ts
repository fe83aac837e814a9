import { newsListHtml } from '../components/chart-modal.js';
import { escapeHtml, isoMinute } from '../lib/format.js';
import { emptyHtml } from '../shared/utils/dom-utils.js';
import type { PremarketData, PremarketNews } from '../types/market.types.js';
import { registerCard } from './registry.js';
import { renderSection } from './section-card.js';

export const CONTAINER = 'premarket-news';

const TYPE_LABELS: Record<PremarketNews['type'], string> = {
  premarket: 'Pre-market',
  premarket_today: "Today's pre-market",
  premarket_friday: 'Since Friday close',
};

function panelHtml(p: PremarketNews): string {
  return `<div class="premarket-panel market-${p.market}">`
    + `<div class="card-head"><span class="name">${escapeHtml(p.label)}</span>`
    + `<span class="badge type-${p.type}">${TYPE_LABELS[p.type]}</span>`
    + `<span class="muted">${p.news_count} articles</span></div>`
    + `<div class="muted">${escapeHtml(isoMinute(p.window_start))} to ${escapeHtml(isoMinute(p.window_end))} UTC</div>`
    + newsListHtml(p.news) + '</div>';
}

export function premarketHtml(data: PremarketData): string {
  const panels = [data.taiwan, data.us].filter((p): p is PremarketNews => p !== undefined);
  return panels.length ? panels.map(panelHtml).join('') : emptyHtml('No premarket news');
}

registerCard({
  id: CONTAINER,
  title: 'Premarket news',
  order: 40,
  create: (deps) => (force) => renderSection(deps, CONTAINER, 'Premarket news',
    () => deps.api.premarket(force), premarketHtml),
});
