import type { Api } from '../app/services/api.service.js';
import { escapeHtml, isoMinute } from '../lib/format.js';
import { describeLoadError, HttpStatusError } from '../modules/fetch.js';
import type { ChartRenderer } from '../services/ChartManager.js';
import { errorHtml, loadingHtml } from '../shared/utils/dom-utils.js';
import type { DomSurface } from '../shared/utils/dom-utils.js';
import { ModalStore } from '../state/modal.store.js';
import type { ModalState } from '../state/modal.store.js';
import type { CompanyVolume, NewsItem } from '../types/market.types.js';

export type ModalContent =
  | { kind: 'series'; subtitle: string; label: string; dates: string[]; values: number[] }
  | { kind: 'news'; items: NewsItem[] };

export const MODAL_CONTAINER = 'chart-modal';
export const MODAL_CANVAS = 'modal-chart';

const NO_HISTORY = 'No history available';

function failureText(err: unknown): string {
  if (err instanceof HttpStatusError && err.status === 404) return NO_HISTORY;
  return describeLoadError(err);
}

export function newsListHtml(items: readonly NewsItem[]): string {
  if (!items.length) return '<div class="muted">No articles in this window.</div>';
  return '<ul class="news-list">' + items.map(n =>
    `<li><a href="${escapeHtml(n.link)}" target="_blank" rel="noopener">${escapeHtml(n.title)}</a>`
    + ` <span class="muted">${escapeHtml(n.publisher)} · ${escapeHtml(isoMinute(n.published_at))}</span></li>`).join('') + '</ul>';
}

/** Stock history, ratio history and article lists in one dialog. */
export class ChartModal {
  readonly store = new ModalStore<ModalContent>();

  constructor(
    private api: Pick<Api, 'stockHistory' | 'ratioHistory'>,
    private charts: ChartRenderer,
    private surface: DomSurface,
  ) {
    this.store.subscribe(s => this.render(s));
  }

  async openStock(symbol: string, name: string): Promise<void> {
    const token = this.store.open(name && name !== symbol ? `${name} (${symbol})` : symbol);
    try {
      const h = await this.api.stockHistory(symbol, '1y');
      if (!h.dates.length) {
        this.store.reject(token, NO_HISTORY);
        return;
      }
      this.store.resolve(token, { kind: 'series', subtitle: 'Close, past year', label: symbol, dates: h.dates, values: h.values });
    } catch (err) {
      console.error(`[modal] history for ${symbol} failed`, err);
      this.store.reject(token, failureText(err));
    }
  }

  async openRatio(id: string, name: string): Promise<void> {
    const token = this.store.open(name);
    try {
      const h = await this.api.ratioHistory(id, '1M');
      if (!h.dates.length) {
        this.store.reject(token, NO_HISTORY);
        return;
      }
      this.store.resolve(token, { kind: 'series', subtitle: `Monthly, ${h.period_label}`, label: h.name, dates: h.dates, values: h.values });
    } catch (err) {
      console.error(`[modal] ratio ${id} failed`, err);
      this.store.reject(token, failureText(err));
    }
  }

  openNews(company: CompanyVolume) {
    const token = this.store.open(`${company.name} (${company.symbol}): ${company.count} articles`);
    this.store.resolve(token, { kind: 'news', items: company.news });
  }

  close() {
    this.store.close();
  }

  private render(state: ModalState<ModalContent>) {
    this.charts.destroy(MODAL_CANVAS);
    if (state.kind === 'closed') {
      this.surface.setHtml(MODAL_CONTAINER, '');
      return;
    }
    let body = '';
    let chart: { label: string; dates: string[]; values: number[] } | null = null;
    switch (state.kind) {
      case 'loading':
        body = loadingHtml();
        break;
      case 'error':
        body = errorHtml(state.message);
        break;
      case 'showing':
        if (state.data.kind === 'news') {
          body = newsListHtml(state.data.items);
        } else {
          body = `<div class="muted">${escapeHtml(state.data.subtitle)}</div><div class="chart-box"><canvas id="${MODAL_CANVAS}"></canvas></div>`;
          chart = state.data;
        }
        break;
    }
    this.surface.setHtml(MODAL_CONTAINER,
      '<div class="modal-backdrop" data-modal-close><div class="modal" role="dialog" aria-modal="true">'
      + `<header><h3>${escapeHtml(state.title)}</h3><button class="modal-close" data-modal-close aria-label="Close">×</button></header>`
      + `<div class="modal-body">${body}</div></div></div>`);
    if (chart) this.charts.line(MODAL_CANVAS, chart.dates, [{ label: chart.label, values: chart.values }]);
  }
}
