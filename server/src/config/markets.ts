import fs from 'fs';
import { z } from 'zod';
import { fromServerRoot } from './paths.js';
import { logger } from '../utils/logger.js';

export const SECTION_KEYS = [
  'us_indices',
  'us_stocks',
  'tw_markets',
  'international_markets',
  'metals_futures',
  'crypto',
] as const;

export type SectionKey = typeof SECTION_KEYS[number];

const SymbolEntrySchema = z.object({
  symbol: z.string().min(1),
  name: z.string().min(1),
});

const SectionSchema = z.object({
  title: z.string().min(1),
  earnings: z.boolean().default(false),
  symbols: z.array(SymbolEntrySchema).min(1),
});

const RatioSchema = z.object({
  id: z.string().regex(/^[a-z0-9_]+$/),
  name: z.string().min(1),
  numerator: z.string().min(1),
  denominator: z.string().min(1),
  period: z.enum(['20y', 'max']),
  unit: z.string().default('x'),
  description: z.string().default(''),
});

const PremarketSchema = z.object({
  label: z.string().min(1),
  timeZone: z.string().min(1),
  open: z.string().regex(/^\d{2}:\d{2}$/),
  symbols: z.array(z.string().min(1)).min(1),
});

const UniverseSchema = z.object({
  sections: z.object({
    us_indices: SectionSchema,
    us_stocks: SectionSchema,
    tw_markets: SectionSchema,
    international_markets: SectionSchema,
    metals_futures: SectionSchema,
    crypto: SectionSchema,
  }),
  ratios: z.array(RatioSchema),
  premarket: z.object({
    taiwan: PremarketSchema,
    us: PremarketSchema,
  }),
});

export type SymbolEntry = z.infer<typeof SymbolEntrySchema>;
export type SectionConfig = z.infer<typeof SectionSchema>;
export type RatioDefinition = z.infer<typeof RatioSchema>;
export type PremarketMarketConfig = z.infer<typeof PremarketSchema>;
export type MarketUniverse = z.infer<typeof UniverseSchema>;

export const DEFAULT_MARKETS_FILE = fromServerRoot('config/markets.json');

export function parseMarketUniverse(json: unknown): MarketUniverse {
  const r = UniverseSchema.safeParse(json);
  if (!r.success) {
    logger.error({ issues: r.error.issues }, 'markets_config_invalid');
    throw new Error('markets config invalid');
  }
  return r.data;
}

let cached: MarketUniverse | null = null;

export function loadMarketUniverse(file = DEFAULT_MARKETS_FILE): MarketUniverse {
  if (cached && file === DEFAULT_MARKETS_FILE) return cached;
  const universe = parseMarketUniverse(JSON.parse(fs.readFileSync(file, 'utf8')));
  logger.debug({ file, ratios: universe.ratios.length }, 'markets_config_loaded');
  if (file === DEFAULT_MARKETS_FILE) cached = universe;
  return universe;
}
