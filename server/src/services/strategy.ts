import type { MarketUniverse } from '../config/markets.js';
import type { MarketProvider, ProviderQuote } from '../providers/provider.interface.js';
import type { QuoteRecord } from '../types/market.types.js';
import { HttpError } from '../utils/httpError.js';
import { logger } from '../utils/logger.js';
import { toQuoteRecord } from './marketSummary.js';

export type TimingSignal = 'BULLISH' | 'BEARISH' | 'NEUTRAL';
export type StrategyId = 'momentum' | 'mean_reversion' | 'breakout' | 'trend_following';

export interface StrategyInfo {
  name: string;
  description: string;
  conditions: string[];
}

export const STRATEGIES: Readonly<Record<StrategyId, StrategyInfo>> = {
  momentum: {
    name: 'Momentum',
    description: 'Suits markets with a clear, strong trend',
    conditions: ['high_volatility', 'strong_trend'],
  },
  mean_reversion: {
    name: 'Mean reversion',
    description: 'Suits choppy markets with wide swings',
    conditions: ['high_volatility', 'sideways_market'],
  },
  breakout: {
    name: 'Breakout',
    description: 'Suits a break through a key price level',
    conditions: ['low_volatility', 'consolidation'],
  },
  trend_following: {
    name: 'Trend following',
    description: 'Suits a clear trend direction',
    conditions: ['clear_trend', 'moderate_volatility'],
  },
};

export interface TimingAnalysis {
  signal: TimingSignal;
  confidence: number;
  reason: string;
  timestamp: string;
}

export interface StrategyMatch {
  recommended_strategy: StrategyId;
  strategy_name: string;
  strategy_description: string;
  confidence: number;
  reason: string;
  timestamp: string;
}

export interface StrategyRecommendation {
  market_data: QuoteRecord;
  timing: TimingAnalysis;
  strategy: StrategyMatch;
}

/** A move beyond one percent either way is a signal; volume has to be there for a bullish one. */
export function analyzeTiming(q: Pick<QuoteRecord, 'change_percent' | 'volume'>, now: Date): TimingAnalysis {
  const pct = q.change_percent;
  const strength = Math.round(Math.min(80, 50 + Math.abs(pct) * 5) * 100) / 100;
  const timestamp = now.toISOString();
  if (pct > 1 && q.volume > 0) {
    return { signal: 'BULLISH', confidence: strength, reason: `Up ${pct.toFixed(2)}% on active volume`, timestamp };
  }
  if (pct < -1) {
    return { signal: 'BEARISH', confidence: strength, reason: `Down ${pct.toFixed(2)}%, stay cautious`, timestamp };
  }
  return { signal: 'NEUTRAL', confidence: 50, reason: `Small move (${pct.toFixed(2)}%)`, timestamp };
}

export function matchStrategy(q: Pick<QuoteRecord, 'change_percent'>, timing: TimingAnalysis, now: Date): StrategyMatch {
  const move = Math.abs(q.change_percent);
  let id: StrategyId;
  let confidence: number;
  let reason: string;
  if (timing.signal === 'BULLISH' && move > 2) {
    [id, confidence, reason] = ['momentum', 75, 'Strong advance; momentum fits'];
  } else if (timing.signal === 'BEARISH' && move > 2) {
    [id, confidence, reason] = ['mean_reversion', 70, 'Sharp drop may rebound; mean reversion fits'];
  } else if (timing.signal === 'NEUTRAL' && move < 0.5) {
    [id, confidence, reason] = ['breakout', 60, 'Consolidating; wait for a breakout'];
  } else if (timing.signal === 'BULLISH') {
    [id, confidence, reason] = ['trend_following', 65, 'Moderate advance; follow the trend'];
  } else {
    [id, confidence, reason] = ['mean_reversion', 55, 'Range-bound; mean reversion fits'];
  }
  const info = STRATEGIES[id];
  return {
    recommended_strategy: id,
    strategy_name: info.name,
    strategy_description: info.description,
    confidence,
    reason,
    timestamp: now.toISOString(),
  };
}

export class StrategyService {
  constructor(
    private readonly provider: MarketProvider,
    private readonly universe: MarketUniverse,
    private readonly now: () => Date = () => new Date(),
  ) {}

  catalogue(): Readonly<Record<StrategyId, StrategyInfo>> {
    return STRATEGIES;
  }

  private displayName(symbol: string): string {
    for (const section of Object.values(this.universe.sections)) {
      const hit = section.symbols.find(s => s.symbol.toUpperCase() === symbol);
      if (hit) return hit.name;
    }
    return symbol;
  }

  async recommend(rawSymbol: string): Promise<StrategyRecommendation> {
    const symbol = rawSymbol.trim().toUpperCase();
    if (!symbol) throw HttpError.badRequest('symbol is required');
    let quotes: ProviderQuote[];
    try {
      quotes = await this.provider.quotes([symbol]);
    } catch (err) {
      logger.warn({ err, symbol }, 'strategy_quote_failed');
      throw new HttpError(502, `Quote provider unavailable: ${err instanceof Error ? err.message : String(err)}`);
    }
    const q = quotes.find(x => x.symbol.toUpperCase() === symbol);
    if (!q) throw HttpError.notFound(`market data for ${symbol}`);
    const now = this.now();
    const market = toQuoteRecord(q, this.displayName(symbol), now);
    const timing = analyzeTiming(market, now);
    return { market_data: market, timing, strategy: matchStrategy(market, timing, now) };
  }
}
