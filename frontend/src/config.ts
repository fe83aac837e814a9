import { z } from 'zod';
import type { BoardSection } from './types/market.types.js';

export type StageId = '1' | '2a' | '2b';

export interface StageDefinition {
  id: StageId;
  label: string;
  sections: BoardSection[];
  timeoutMs: number;
}

export interface DashboardConfig {
  apiBase: string;
  stages: StageDefinition[];
  /** Pause between two background sections */
  sequencerGapMs: number;
  /** Delay after page load before the background sections start */
  sequencerStartDelayMs: number;
  bannerMs: number;
}

export const SECTION_CONTAINERS: Record<BoardSection, string> = {
  us_indices: 'us-indices',
  us_stocks: 'us-stocks',
  tw_markets: 'tw-markets',
  international_markets: 'international-markets',
  metals_futures: 'metals-futures',
  crypto: 'crypto-markets',
  ratios: 'ratios-container',
};

export function containersFor(sections: readonly BoardSection[]): string[] {
  return sections.map(s => SECTION_CONTAINERS[s]);
}

export const DEFAULTS = {
  apiBase: '',
  stage1TimeoutMs: 90_000,
  stage2TimeoutMs: 120_000,
  sequencerGapMs: 400,
  sequencerStartDelayMs: 2_000,
  bannerMs: 3_000,
} as const;

const OverridesSchema = z.object({
  apiBase: z.string(),
  stage1TimeoutMs: z.number().int().positive(),
  stage2TimeoutMs: z.number().int().positive(),
  sequencerGapMs: z.number().int().nonnegative(),
  sequencerStartDelayMs: z.number().int().nonnegative(),
  bannerMs: z.number().int().positive(),
}).partial().strict();

export type ConfigOverrides = z.infer<typeof OverridesSchema>;

/** Indices first (small, fast), then the heavy equity lists, then everything else. */
export function buildStages(stage1TimeoutMs: number, stage2TimeoutMs: number): StageDefinition[] {
  return [
    { id: '1', label: 'US indices', sections: ['us_indices'], timeoutMs: stage1TimeoutMs },
    { id: '2a', label: 'US stocks and Taiwan', sections: ['us_stocks', 'tw_markets'], timeoutMs: stage2TimeoutMs },
    {
      id: '2b',
      label: 'international, metals, crypto and ratios',
      sections: ['international_markets', 'metals_futures', 'crypto', 'ratios'],
      timeoutMs: stage2TimeoutMs,
    },
  ];
}

export function resolveConfig(raw: unknown, warn: (msg: string, detail?: unknown) => void = console.warn): DashboardConfig {
  let o: ConfigOverrides = {};
  if (raw !== undefined && raw !== null) {
    const parsed = OverridesSchema.safeParse(raw);
    if (parsed.success) o = parsed.data;
    else warn('[config] ignoring invalid MARKET_DESK_CONFIG', parsed.error.issues);
  }
  return {
    apiBase: (o.apiBase ?? DEFAULTS.apiBase).replace(/\/+$/, ''),
    stages: buildStages(o.stage1TimeoutMs ?? DEFAULTS.stage1TimeoutMs, o.stage2TimeoutMs ?? DEFAULTS.stage2TimeoutMs),
    sequencerGapMs: o.sequencerGapMs ?? DEFAULTS.sequencerGapMs,
    sequencerStartDelayMs: o.sequencerStartDelayMs ?? DEFAULTS.sequencerStartDelayMs,
    bannerMs: o.bannerMs ?? DEFAULTS.bannerMs,
  };
}

declare global {
  interface Window {
    MARKET_DESK_CONFIG?: unknown;
  }
}

export function loadConfig(): DashboardConfig {
  return resolveConfig(typeof window === 'undefined' ? undefined : window.MARKET_DESK_CONFIG);
}
