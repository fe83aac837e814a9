import { BOARD_SECTIONS, MARKET_SECTIONS } from '../types/market.types.js';
import type { BoardSection, MarketData, MarketSection } from '../types/market.types.js';

export type SnapshotListener = (snapshot: Readonly<MarketData>) => void;

const EXTRA_KEYS = ['timestamp', 'earnings_upcoming', 'earnings_upcoming_tw', 'metals_session', 'metals_session_et'] as const;

function copyKey<K extends keyof MarketData>(target: MarketData, source: MarketData, key: K): boolean {
  const value = source[key];
  if (value === undefined) return false;
  target[key] = value;
  return true;
}

/**
 * Session-lifetime snapshot of the market board.
 * Keys absent from a merge are left alone; a failed stage only marks its sections.
 */
export class SnapshotStore {
  private data: MarketData = {};
  private errors = new Map<BoardSection, string>();
  private listeners = new Set<SnapshotListener>();

  /** Returns the board sections the partial carried. */
  merge(partial: MarketData): BoardSection[] {
    const merged: BoardSection[] = [];
    for (const key of MARKET_SECTIONS) {
      if (copyKey(this.data, partial, key)) merged.push(key);
    }
    if (copyKey(this.data, partial, 'ratios')) merged.push('ratios');
    for (const key of EXTRA_KEYS) copyKey(this.data, partial, key);

    if (partial.skipped_symbols !== undefined) {
      const replaced = new Set<string>(merged);
      const kept = (this.data.skipped_symbols ?? []).filter(s => !replaced.has(s.section));
      this.data.skipped_symbols = [...kept, ...partial.skipped_symbols];
    }
    for (const key of merged) this.errors.delete(key);
    this.notify();
    return merged;
  }

  markFailed(sections: readonly BoardSection[], message: string) {
    for (const s of sections) this.errors.set(s, message);
    this.notify();
  }

  get<K extends MarketSection | 'ratios'>(section: K): MarketData[K] {
    return this.data[section];
  }

  has(section: BoardSection): boolean {
    return this.data[section] !== undefined;
  }

  errorFor(section: BoardSection): string | undefined {
    return this.errors.get(section);
  }

  failedSections(): BoardSection[] {
    return BOARD_SECTIONS.filter(s => this.errors.has(s));
  }

  snapshot(): Readonly<MarketData> {
    return this.data;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  private notify() {
    for (const l of Array.from(this.listeners)) {
      try {
        l(this.data);
      } catch (err) {
        console.error('[snapshot] listener failed', err);
      }
    }
  }
}
