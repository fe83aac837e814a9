// Full idempotent re-render of the snapshot into the board containers.

import { SECTION_CONTAINERS } from '../config.js';
import { escapeHtml, fmtNum, fmtPrice, fmtSigned, shortDate } from '../lib/format.js';
import { emptyHtml, errorHtml, loadingHtml } from '../shared/utils/dom-utils.js';
import type { DomSurface } from '../shared/utils/dom-utils.js';
import type { SnapshotStore } from '../state/snapshot.store.js';
import type {
  EarningsEntry, MarketData, MarketSection, QuoteRecord, RatioRecord, SkippedSymbol,
} from '../types/market.types.js';
import { sortQuotes } from '../utils/sort.js';
import type { SortMode } from '../utils/sort.js';

export interface SectionView {
  section: MarketSection;
  title: string;
  /** Unset keeps the server's order. */
  defaultSort?: SortMode;
}

export const SECTION_VIEWS: readonly SectionView[] = [
  { section: 'us_indices', title: 'US indices' },
  { section: 'us_stocks', title: 'US stocks', defaultSort: 'price' },
  { section: 'tw_markets', title: 'Taiwan', defaultSort: 'percentDesc' },
  { section: 'international_markets', title: 'International' },
  { section: 'metals_futures', title: 'Metals futures', defaultSort: 'percentDesc' },
  { section: 'crypto', title: 'Crypto', defaultSort: 'percentDesc' },
];

export const EXTRA_CONTAINERS = {
  earnings: 'earnings-upcoming',
  earningsTw: 'earnings-upcoming-tw',
  metalsHint: 'metals-session-hint',
  skipped: 'skipped-symbols',
} as const;

const SKIPPED_LIST_LIMIT = 20;

const SESSION_LABELS: Record<NonNullable<QuoteRecord['session']>, string> = {
  regular: 'Open',
  pre: 'Pre-market',
  post: 'After hours',
  closed: 'Closed',
  day: 'Day session',
  night: 'Night session',
};

function changeClass(change: number): 'up' | 'down' | 'flat' {
  if (change > 0) return 'up';
  if (change < 0) return 'down';
  return 'flat';
}

const ARROWS = { up: '↑', down: '↓', flat: '→' } as const;

export function quoteCardHtml(q: QuoteRecord): string {
  const name = q.display_name || q.name;
  const cls = changeClass(q.change);
  const badges: string[] = [];
  if (q.session && q.session !== 'regular') {
    badges.push(`<span class="badge session-${q.session}">${SESSION_LABELS[q.session]}</span>`);
  }
  if (q.earnings_date) {
    const days = q.earnings_days_until === undefined ? '' : ` (${q.earnings_days_until}d)`;
    badges.push(`<span class="badge earnings">Earnings ${escapeHtml(shortDate(q.earnings_date))}${days}</span>`);
  }
  const ohlc = [
    `O ${fmtPrice(q.open)}`,
    `H ${fmtPrice(q.high)}`,
    `L ${fmtPrice(q.low)}`,
  ];
  if (q.volume) ohlc.push(`Vol ${fmtPrice(q.volume, 0)}`);
  return `<div class="market-card ${cls}" data-symbol="${escapeHtml(q.symbol)}" data-display-name="${escapeHtml(name)}">`
    + `<div class="card-head"><span class="name">${escapeHtml(name)}</span><span class="symbol">${escapeHtml(q.symbol)}</span>${badges.join('')}</div>`
    + `<div class="price">${fmtPrice(q.current_price)}</div>`
    + `<div class="change ${cls}">${ARROWS[cls]} ${fmtSigned(q.change)} (${fmtSigned(q.change_percent)}%)</div>`
    + `<div class="ohlc">${ohlc.join(' · ')}</div>`
    + '</div>';
}

/** Marker position of `current` between low and high, 0 to 100. */
export function rangePosition(r: Pick<RatioRecord, 'current' | 'range_high' | 'range_low'>): number | null {
  const { current, range_high: hi, range_low: lo } = r;
  if (current === null || hi === null || lo === null) return null;
  if (hi === lo) return 50;
  return Math.min(100, Math.max(0, ((current - lo) / (hi - lo)) * 100));
}

export function ratioCardHtml(r: RatioRecord): string {
  const head = `<div class="card-head"><span class="name">${escapeHtml(r.name)}</span><span class="period">${escapeHtml(r.period_label)}</span></div>`;
  if (r.error || r.current === null) {
    return `<div class="ratio-card" data-ratio="${escapeHtml(r.id)}">${head}<div class="error-line">${escapeHtml(r.error || 'No data')}</div></div>`;
  }
  const unit = r.unit ? ` ${escapeHtml(r.unit)}` : '';
  const pos = rangePosition(r);
  const bar = pos === null ? '' : `<div class="range-bar"><span class="marker" style="left:${pos.toFixed(1)}%"></span></div>`;
  const hi = `High ${fmtNum(r.range_high)}${r.high_date ? ` (${escapeHtml(r.high_date)})` : ''}`;
  const lo = `Low ${fmtNum(r.range_low)}${r.low_date ? ` (${escapeHtml(r.low_date)})` : ''}`;
  const desc = r.description ? `<div class="muted">${escapeHtml(r.description)}</div>` : '';
  return `<div class="ratio-card" data-ratio="${escapeHtml(r.id)}" data-display-name="${escapeHtml(r.name)}">${head}`
    + `<div class="price">${fmtNum(r.current)}${unit}</div>${bar}`
    + `<div class="range"><span>${lo}</span><span>${hi}</span></div>${desc}</div>`;
}

export function earningsHtml(entries: readonly EarningsEntry[]): string {
  if (!entries.length) return emptyHtml('No upcoming earnings');
  return '<div class="earnings-strip">' + entries.map(e =>
    `<span class="earnings-chip" data-symbol="${escapeHtml(e.symbol)}" data-display-name="${escapeHtml(e.name)}" title="${escapeHtml(e.name)}">`
    + `${escapeHtml(e.symbol)} ${escapeHtml(shortDate(e.date))} <small>${e.days_until}d</small></span>`).join('') + '</div>';
}

export function metalsHintHtml(data: Pick<MarketData, 'metals_session' | 'metals_session_et'>): string {
  if (!data.metals_session) return '';
  const label = data.metals_session === 'day' ? 'day session' : 'night session';
  const at = data.metals_session_et ? ` (ET ${escapeHtml(data.metals_session_et)})` : '';
  return `<div class="hint">COMEX ${label}${at}. Day session 08:20–13:30 ET; other hours trade electronically.</div>`;
}

export function skippedHtml(skipped: readonly SkippedSymbol[]): string {
  if (!skipped.length) return '';
  if (skipped.length > SKIPPED_LIST_LIMIT) {
    return `<div class="hint">${skipped.length} symbols are temporarily unavailable from the quote provider.</div>`;
  }
  const list = skipped.map(s => `${escapeHtml(s.symbol)} (${escapeHtml(s.name)})`).join(', ');
  return `<div class="hint">Temporarily unavailable: ${list}</div>`;
}

export class MarketBoard {
  private sorts = new Map<MarketSection, SortMode>();

  constructor(private store: SnapshotStore, private surface: DomSurface) {
    for (const v of SECTION_VIEWS) if (v.defaultSort) this.sorts.set(v.section, v.defaultSort);
  }

  sortFor(section: MarketSection): SortMode | undefined {
    return this.sorts.get(section);
  }

  setSort(section: MarketSection, mode: SortMode) {
    this.sorts.set(section, mode);
    this.renderSection(section);
  }

  render() {
    for (const v of SECTION_VIEWS) this.renderSection(v.section);
    this.renderRatios();
    this.renderExtras();
  }

  private paint(containerId: string, build: () => string) {
    if (!this.surface.has(containerId)) return;
    let html: string;
    try {
      html = build();
    } catch (err) {
      console.error(`[board] render failed for #${containerId}`, err);
      html = errorHtml(err instanceof Error ? err.message : String(err));
    }
    this.surface.setHtml(containerId, html);
  }

  private renderSection(section: MarketSection) {
    this.paint(SECTION_CONTAINERS[section], () => {
      const payload = this.store.get(section);
      const error = this.store.errorFor(section);
      if (!payload) return error ? errorHtml(error) : loadingHtml();
      const records = Object.values(payload);
      const mode = this.sorts.get(section);
      const ordered = mode ? sortQuotes(records, mode) : records;
      const body = ordered.length
        ? `<div class="card-grid">${ordered.map(quoteCardHtml).join('')}</div>`
        : emptyHtml('No data');
      return (error ? errorHtml(error) : '') + body;
    });
  }

  private renderRatios() {
    this.paint(SECTION_CONTAINERS.ratios, () => {
      const summary = this.store.get('ratios');
      const error = this.store.errorFor('ratios');
      if (!summary) return error ? errorHtml(error) : loadingHtml();
      const body = summary.ratios.length
        ? `<div class="card-grid">${summary.ratios.map(ratioCardHtml).join('')}</div>`
        : emptyHtml('No ratios configured');
      return (error ? errorHtml(error) : '') + body;
    });
  }

  private renderExtras() {
    const snap = this.store.snapshot();
    this.paint(EXTRA_CONTAINERS.earnings, () =>
      snap.earnings_upcoming ? earningsHtml(snap.earnings_upcoming) : (this.store.errorFor('us_stocks') ? '' : loadingHtml()));
    this.paint(EXTRA_CONTAINERS.earningsTw, () =>
      snap.earnings_upcoming_tw ? earningsHtml(snap.earnings_upcoming_tw) : (this.store.errorFor('tw_markets') ? '' : loadingHtml()));
    this.paint(EXTRA_CONTAINERS.metalsHint, () => metalsHintHtml(snap));
    this.paint(EXTRA_CONTAINERS.skipped, () => skippedHtml(snap.skipped_symbols ?? []));
  }
}
