import { Api } from './app/services/api.service.js';
import './cards/economic-calendar.js';
import { uploadFiles } from './cards/institutional-net.js';
import './cards/ir-meetings.js';
import './cards/news-volume.js';
import './cards/premarket.js';
import { sectionTasks } from './cards/registry.js';
import type { CardDeps } from './cards/registry.js';
import { ChartModal } from './components/chart-modal.js';
import { MarketBoard } from './components/market-board.js';
import { Notifier } from './components/notifier.js';
import type { DashboardConfig } from './config.js';
import { isoMinute } from './lib/format.js';
import type { ChartRenderer } from './services/ChartManager.js';
import { SectionSequencer } from './services/section-sequencer.js';
import type { SequenceResult } from './services/section-sequencer.js';
import { StagedLoader } from './services/staged-loader.js';
import type { LoadReport } from './services/staged-loader.js';
import { realTimers, sleep } from './shared/utils/dom-utils.js';
import type { DomSurface, Timers } from './shared/utils/dom-utils.js';
import { SnapshotStore } from './state/snapshot.store.js';
import { MARKET_SECTIONS } from './types/market.types.js';
import type { CompanyVolume, MarketSection } from './types/market.types.js';
import { isSortMode } from './utils/sort.js';

export interface DashboardDeps {
  config: DashboardConfig;
  surface: DomSurface;
  charts: ChartRenderer;
  api?: Api;
  timers?: Timers;
  now?: () => Date;
}

function isMarketSection(v: string): v is MarketSection {
  return (MARKET_SECTIONS as readonly string[]).includes(v);
}

/** Page controller: owns the snapshot and every long-lived component. */
export class Dashboard {
  readonly store = new SnapshotStore();
  readonly board: MarketBoard;
  readonly loader: StagedLoader;
  readonly sequencer: SectionSequencer;
  readonly modal: ChartModal;
  readonly notifier: Notifier;
  private readonly cardDeps: CardDeps;
  private readonly timers: Timers;
  private news = new Map<string, CompanyVolume>();

  constructor(private deps: DashboardDeps) {
    const { config, surface, charts } = deps;
    const api = deps.api ?? new Api(config.apiBase);
    this.timers = deps.timers ?? realTimers;
    this.notifier = new Notifier(surface, config.bannerMs, this.timers);
    this.board = new MarketBoard(this.store, surface);
    this.loader = new StagedLoader({ api, store: this.store, board: this.board, notifier: this.notifier, stages: config.stages });
    this.modal = new ChartModal(api, charts, surface);
    this.cardDeps = {
      api,
      surface,
      charts,
      notifier: this.notifier,
      now: deps.now ?? (() => new Date()),
      onNewsVolume: (companies) => {
        this.news = new Map(companies.map(c => [c.symbol, c]));
      },
    };
    this.sequencer = new SectionSequencer(sectionTasks(this.cardDeps), config.sequencerGapMs, (ms) => sleep(ms, this.timers));
    this.store.subscribe(snap => {
      if (snap.timestamp) surface.setText('last-updated', `Updated ${isoMinute(snap.timestamp)} UTC`);
    });
  }

  /** First paint, the staged load, then the background sections after the start delay. */
  start() {
    this.board.render();
    this.loader.load(false).catch(err => console.error('[dashboard] load failed', err));
    this.timers.set(() => {
      this.sequencer.run(false).catch(err => console.error('[dashboard] sections failed', err));
    }, this.deps.config.sequencerStartDelayMs);
  }

  refreshMarket(): Promise<LoadReport> {
    return this.loader.load(true);
  }

  async refreshAll(): Promise<{ load: LoadReport; sections: SequenceResult }> {
    const load = await this.loader.load(true);
    const sections = await this.sequencer.run(true);
    return { load, sections };
  }

  setSort(section: string, mode: string) {
    if (isMarketSection(section) && isSortMode(mode)) this.board.setSort(section, mode);
  }

  openNews(symbol: string) {
    const company = this.news.get(symbol);
    if (company) this.modal.openNews(company);
  }

  upload(files: readonly { blob: Blob; name: string }[], date?: string) {
    return uploadFiles(this.cardDeps, files, date);
  }

  /** Event delegation on the page root. */
  bind(doc: Document) {
    doc.addEventListener('click', (e) => {
      const target = e.target;
      if (!(target instanceof Element)) return;
      if (target.classList.contains('modal-backdrop') || target.closest('.modal-close')) {
        this.modal.close();
        return;
      }
      if (target.closest('#refresh-market')) {
        this.refreshMarket().catch(err => console.error('[dashboard] refresh failed', err));
        return;
      }
      if (target.closest('#refresh-all')) {
        this.refreshAll().catch(err => console.error('[dashboard] refresh all failed', err));
        return;
      }
      const ratio = target.closest<HTMLElement>('[data-ratio]');
      if (ratio?.dataset.ratio) {
        this.modal.openRatio(ratio.dataset.ratio, ratio.dataset.displayName ?? ratio.dataset.ratio)
          .catch(err => console.error('[dashboard] ratio modal failed', err));
        return;
      }
      const stock = target.closest<HTMLElement>('[data-symbol]');
      if (stock?.dataset.symbol) {
        this.modal.openStock(stock.dataset.symbol, stock.dataset.displayName ?? stock.dataset.symbol)
          .catch(err => console.error('[dashboard] stock modal failed', err));
        return;
      }
      const news = target.closest<HTMLElement>('[data-news-symbol]');
      if (news?.dataset.newsSymbol) this.openNews(news.dataset.newsSymbol);
    });

    doc.addEventListener('change', (e) => {
      const target = e.target;
      if (target instanceof HTMLSelectElement && target.dataset.sortSection) {
        this.setSort(target.dataset.sortSection, target.value);
      }
    });

    doc.addEventListener('submit', (e) => {
      const form = e.target;
      if (!(form instanceof HTMLFormElement) || form.dataset.upload !== 'institutional') return;
      e.preventDefault();
      const input = form.querySelector<HTMLInputElement>('input[type=file]');
      const dateInput = form.querySelector<HTMLInputElement>('input[name=date]');
      const files = Array.from(input?.files ?? [], f => ({ blob: f, name: f.name }));
      this.upload(files, dateInput?.value.trim()).catch(err => console.error('[dashboard] upload failed', err));
    });

    doc.addEventListener('keydown', (e) => {
      if (e.key === 'Escape') this.modal.close();
    });
  }
}
