export type HistoryInterval = '1d' | '1wk' | '1mo';

export interface ProviderQuote {
  symbol: string;
  name?: string;
  price: number;
  previousClose?: number;
  open?: number;
  high?: number;
  low?: number;
  volume?: number;
  change?: number;
  changePercent?: number;
  marketTime?: Date;
  /** Upstream market state, e.g. REGULAR, PRE, POST, CLOSED */
  marketState?: string;
  earningsDate?: Date;
}

export interface HistoryBar {
  date: Date;
  close: number;
}

export interface NewsArticle {
  title: string;
  publisher: string;
  link: string;
  publishedAt: Date;
  relatedTickers: string[];
}

export interface MarketProvider {
  readonly name: string;
  quotes(symbols: string[]): Promise<ProviderQuote[]>;
  history(symbol: string, opts: { period1: Date; interval: HistoryInterval }): Promise<HistoryBar[]>;
  news(query: string, count: number): Promise<NewsArticle[]>;
}
