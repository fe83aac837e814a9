import type { QuoteRecord } from '../types/market.types.js';

export const SORT_MODES = ['price', 'priceDesc', 'percent', 'percentDesc'] as const;
export type SortMode = typeof SORT_MODES[number];

export function isSortMode(v: string): v is SortMode {
  return (SORT_MODES as readonly string[]).includes(v);
}

function num(v: number | null | undefined): number {
  return typeof v === 'number' && Number.isFinite(v) ? v : 0;
}

type Sortable = Pick<QuoteRecord, 'current_price' | 'change_percent'>;

/** Stable; returns a new array. */
export function sortQuotes<T extends Sortable>(records: readonly T[], mode: SortMode): T[] {
  const key = mode === 'price' || mode === 'priceDesc'
    ? (r: T) => num(r.current_price)
    : (r: T) => num(r.change_percent);
  const dir = mode === 'priceDesc' || mode === 'percentDesc' ? -1 : 1;
  return records
    .map((r, i) => ({ r, i }))
    .sort((a, b) => (key(a.r) - key(b.r)) * dir || a.i - b.i)
    .map(x => x.r);
}
