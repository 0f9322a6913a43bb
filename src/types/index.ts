import type { RuleDocument } from '../config/ruleSchema';

export type { RuleDocument } from '../config/ruleSchema';

export type MarketStatus = 'active' | 'closed';

export interface Market {
  id: string;
  title: string;
  status: MarketStatus;
  platform: string;
  tags: string[];
  startsAt: Date | null;
  endsAt: Date | null;
  embedding?: number[];
}

export interface MarketOption {
  id: string;
  marketId: string;
  label: string;
}

/**
 * Immutable point observation of one option's book.
 * Unique on (ts, marketId, optionId).
 */
export interface Tick {
  ts: Date;
  marketId: string;
  optionId: string;
  price: number;
  volume: number;
  bestBid: number;
  bestAsk: number;
  liquidity: number;
}

export type LatestTicks = Map<string, Tick>;

export type SignalLevel = 'P1' | 'P2' | 'P3';
export const SIGNAL_LEVELS: readonly SignalLevel[] = ['P1', 'P2', 'P3'];

export type SignalSource = 'rule' | 'ml' | 'hybrid';
export type TradeSide = 'buy' | 'sell';

export const DETECTOR_KINDS = [
  'DUTCH_BOOK_DETECT',
  'SPIKE_DETECT',
  'TREND_BREAKOUT',
  'ENDGAME_SWEEP',
  'ORDER_BOOK_IMBALANCE',
  'CRYPTO_LEAD_LAG',
  'TEMPORAL_ARBITRAGE',
  'CROSS_MARKET_MISPRICE',
  'VOLATILITY_HARVEST',
  'ZOMBIE_HUNTER',
] as const;

export type DetectorKind = (typeof DETECTOR_KINDS)[number];
export type PerMarketDetectorKind = Exclude<DetectorKind, 'CROSS_MARKET_MISPRICE'>;

export interface TradeLeg {
  marketId: string;
  optionId: string;
  side: TradeSide;
  qty: number;
  referencePrice: number;
  limitPrice: number;
  label: string;
}

export interface TradePlan {
  action: string;
  rationale: string;
  legs: TradeLeg[];
  estimatedEdgeBps: number | null;
  confidence: number | null;
}

export interface BookEntry {
  optionId: string;
  label: string;
  price: number;
  bestBid: number;
  bestAsk: number;
  liquidity: number;
  ts: string | null;
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Detector output payload. Known fields are typed; rule-specific
 * supporting metrics go in `details`.
 */
export interface SignalPayload {
  suggestedTrade?: TradePlan;
  bookSnapshot?: BookEntry[];
  estimatedEdgeBps?: number;
  gap?: number;
  edgeScore?: number;
  marketTitle?: string;
  ruleName?: string;
  ruleId?: number | null;
  ruleType?: string;
  details: Record<string, JsonValue>;
}

export interface SignalDraft {
  score: number;
  message: string;
  optionId?: string;
  payload: SignalPayload;
  edgeScore: number;
}

export interface ActiveRule {
  id: number;
  name: string;
  type: DetectorKind;
  document: RuleDocument;
}

export interface MarketSnapshot {
  market: Market;
  latest: LatestTicks;
  /** Newest first. */
  recent: Tick[];
  options: MarketOption[];
  synonymIds: string[];
  /** Top price of each synonym peer's latest book. */
  peerPrices: number[];
}

export interface FeatureRow {
  midPrice: number;
  spread: number;
  volume: number;
  bestBidSize: number;
  bestAskSize: number;
  sizeImbalance: number;
  zscoreSpread5m: number;
  priceVelocity10s: number;
  timeToExpiryMinutes: number;
  daysToExpiry: number;
  synonymPriceDeltaZscore: number;
  volatility5m: number;
}

export const FEATURE_NAMES: readonly (keyof FeatureRow)[] = [
  'midPrice',
  'spread',
  'volume',
  'bestBidSize',
  'bestAskSize',
  'sizeImbalance',
  'zscoreSpread5m',
  'priceVelocity10s',
  'timeToExpiryMinutes',
  'daysToExpiry',
  'synonymPriceDeltaZscore',
  'volatility5m',
];

export interface RuleCandidate {
  rule: ActiveRule;
  marketId: string;
  draft: SignalDraft;
}

export interface MlCandidate {
  marketId: string;
  confidence: number;
  features: FeatureRow;
  reason: string;
}

/** One alert candidate per market per cycle. */
export interface FusedSignal {
  marketId: string;
  rule: ActiveRule | null;
  optionId?: string;
  message: string;
  score: number;
  edgeScore: number;
  level: SignalLevel | null;
  payload: SignalPayload;
  source: SignalSource;
  confidence: number | null;
  features: FeatureRow | null;
  reason: string | null;
}

export interface NewSignal {
  marketId: string;
  optionId: string | null;
  ruleId: number | null;
  level: SignalLevel;
  score: number;
  edgeScore: number;
  payload: SignalPayload;
  source: SignalSource;
  confidence: number | null;
  features: FeatureRow | null;
  reason: string | null;
  message: string;
}

export interface SignalRecord extends NewSignal {
  id: number;
  createdAt: Date;
}

export type SynonymMethod = 'keyword' | 'embedding' | 'manual';

export interface SynonymGroup {
  name: string;
  method: SynonymMethod;
  members: string[];
}

export interface KpiRow {
  day: string;
  ruleType: string;
  signals: number;
  p1Signals: number;
  avgGap: number | null;
  estEdgeBps: number | null;
}

export type IntentStatus = 'suggested' | 'confirmed' | 'sent' | 'rejected' | 'filled';
export const OPEN_INTENT_STATUSES: readonly IntentStatus[] = ['suggested', 'confirmed', 'sent'];
export const EXECUTED_INTENT_STATUSES: readonly IntentStatus[] = ['sent', 'filled'];

export interface NewOrderIntent {
  signalId: number | null;
  marketId: string;
  optionId: string | null;
  side: TradeSide;
  qty: number;
  limitPrice: number;
  ttlSecs: number;
  policyId: number | null;
  status: IntentStatus;
  detail: Record<string, unknown>;
}

export interface OrderIntent extends NewOrderIntent {
  id: number;
  createdAt: Date;
}

export interface ExecutionPolicy {
  id: number;
  name: string;
  maxNotionalPerOrder: number;
  maxConcurrentOrders: number;
  maxDailyNotional: number;
  slippageBps: number;
}

export type NotificationStatus = 'sent' | 'cooldown' | 'dry-run' | 'error';

export interface CheckResult {
  ok: boolean;
  reasons: string[];
}

export interface AuditEntry {
  actor: string;
  action: string;
  targetId?: string | null;
  meta?: Record<string, JsonValue>;
}
