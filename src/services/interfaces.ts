import { FeatureRow, Market, MarketOption, NotificationStatus, Tick } from '../types';

export interface Notifier {
  send(text: string, dedupeKey: string, cooldownSecs: number): Promise<NotificationStatus>;
  close(): Promise<void>;
}

/** Batch probability inference; output order matches input order. */
export interface MLPredictor {
  predictProbabilities(rows: FeatureRow[]): number[];
}

export interface SourceMarket {
  market: Market;
  options: MarketOption[];
}

export interface MarketDataSource {
  readonly name: string;
  listMarkets(limit: number): Promise<SourceMarket[]>;
  /** One normalized tick per option of every requested market that has a book. */
  pollTicks(marketIds: string[]): Promise<Tick[]>;
  close(): Promise<void>;
}

export type CryptoSymbol = 'BTC' | 'ETH' | 'SOL';

export interface CryptoQuote {
  price: number;
  /** Fractional return over the trailing second. */
  return1s: number;
  /** Milliseconds since epoch of the latest trade. */
  ts: number;
}

export interface CryptoFeed {
  getReturn(symbol: CryptoSymbol): CryptoQuote | null;
}
