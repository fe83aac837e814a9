import { loadConfig, type ServerConfig } from './config/env.js';
import { loadMarketUniverse, type MarketUniverse } from './config/markets.js';
import { BlsScheduleSource, type ReleaseScheduleSource } from './providers/bls.js';
import { FredCpiSource, type CpiContextSource } from './providers/fred.js';
import type { MarketProvider } from './providers/provider.interface.js';
import { TwseBfi82uSource, type Bfi82uSource } from './providers/twse.js';
import { YahooProvider } from './providers/yahoo.js';
import { EconomicCalendarService, loadCalendarConfig, type CalendarConfig } from './services/economicCalendar.js';
import { InstitutionalNetService } from './services/institutionalNet.js';
import { IrMeetingsService } from './services/irMeetings.js';
import { MarketSummaryService } from './services/marketSummary.js';
import { NewsVolumeService } from './services/newsVolume.js';
import { PremarketService } from './services/premarket.js';
import { RatioService } from './services/ratios.js';
import { StockHistoryService } from './services/stockHistory.js';
import { StrategyService } from './services/strategy.js';

export interface AppServices {
  market: MarketSummaryService;
  ratios: RatioService;
  history: StockHistoryService;
  calendar: EconomicCalendarService;
  newsVolume: NewsVolumeService;
  premarket: PremarketService;
  ir: IrMeetingsService;
  institutional: InstitutionalNetService;
  strategy: StrategyService;
}

/** Everything optional; tests replace the provider, clock and directories. */
export interface AppDeps {
  config?: ServerConfig;
  provider?: MarketProvider;
  universe?: MarketUniverse;
  calendar?: CalendarConfig;
  bfi82u?: Bfi82uSource | null;
  schedule?: ReleaseScheduleSource | null;
  cpi?: CpiContextSource | null;
  now?: () => Date;
}

export function buildServices(deps: AppDeps = {}): AppServices {
  const config = deps.config ?? loadConfig();
  const provider = deps.provider ?? new YahooProvider();
  const universe = deps.universe ?? loadMarketUniverse();
  const now = deps.now ?? (() => new Date());
  const ttl = config.cacheTtlMs;
  const remote = deps.bfi82u !== undefined
    ? deps.bfi82u
    : config.institutionalRemoteFetch ? new TwseBfi82uSource() : null;
  const schedule = deps.schedule !== undefined
    ? deps.schedule
    : config.econCalendarSource === 'bls' ? new BlsScheduleSource() : null;
  const cpi = deps.cpi !== undefined
    ? deps.cpi
    : config.fredApiKey ? new FredCpiSource(config.fredApiKey) : null;

  const ratios = new RatioService(provider, universe.ratios, ttl, now);
  return {
    market: new MarketSummaryService(provider, universe, ratios, ttl, now),
    ratios,
    history: new StockHistoryService(provider, universe, ttl, now),
    calendar: new EconomicCalendarService(deps.calendar ?? loadCalendarConfig(), ttl, now, { schedule, cpi }),
    newsVolume: new NewsVolumeService(provider, universe, ttl, now),
    premarket: new PremarketService(provider, universe.premarket, ttl, now),
    ir: new IrMeetingsService(config.irCsvDir, ttl, now),
    institutional: new InstitutionalNetService(config.institutionalCsvDir, remote, now),
    strategy: new StrategyService(provider, universe, now),
  };
}
