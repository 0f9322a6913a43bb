import { ActiveRule, MarketSnapshot, SignalDraft, SynonymGroup } from '../types';
import { CryptoFeed, MLPredictor } from '../services/interfaces';

export interface DetectorContext {
  /** Evaluation time for the whole cycle; detectors never read the clock. */
  now: Date;
  slippageBps: number;
  detailBaseUrl: string;
  /** Every snapshot built this cycle, by market id. */
  snapshots: ReadonlyMap<string, MarketSnapshot>;
  ml: MLPredictor | null;
  cryptoFeed: CryptoFeed | null;
}

export type MarketDetector = (
  rule: ActiveRule,
  snapshot: MarketSnapshot,
  context: DetectorContext
) => SignalDraft | null;

export interface GroupSignal {
  marketId: string;
  draft: SignalDraft;
}

export type GroupDetector = (
  rule: ActiveRule,
  groups: SynonymGroup[],
  context: DetectorContext
) => GroupSignal[];
