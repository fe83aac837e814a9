import type { Api } from '../app/services/api.service.js';
import type { SectionTask } from '../services/section-sequencer.js';
import type { ChartRenderer } from '../services/ChartManager.js';
import type { DomSurface } from '../shared/utils/dom-utils.js';
import type { CompanyVolume } from '../types/market.types.js';

export interface CardDeps {
  api: Api;
  surface: DomSurface;
  notifier: { show(message: string): void };
  charts: ChartRenderer;
  now: () => Date;
  /** Latest news-volume ranking, for the article modal. */
  onNewsVolume?: (companies: CompanyVolume[]) => void;
}

export type SectionCard = {
  id: string;              // DOM id of the card container
  title: string;
  order: number;           // position in the background sequence
  create: (deps: CardDeps) => (force: boolean) => Promise<void>;
};

const cards: SectionCard[] = [];

export function registerCard(c: SectionCard) {
  if (cards.some(x => x.id === c.id)) throw new Error(`card ${c.id} registered twice`);
  cards.push(c);
}

export function registeredCards(): SectionCard[] {
  return [...cards].sort((a, b) => a.order - b.order);
}

/** Sequencer tasks in background order. */
export function sectionTasks(deps: CardDeps): SectionTask[] {
  return registeredCards().map(c => ({ name: c.id, run: c.create(deps) }));
}
