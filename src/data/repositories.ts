import {
  AuditEntry,
  ExecutionPolicy,
  IntentStatus,
  KpiRow,
  LatestTicks,
  Market,
  MarketOption,
  MarketStatus,
  NewOrderIntent,
  NewSignal,
  OrderIntent,
  RuleDocument,
  SignalLevel,
  SignalRecord,
  SynonymGroup,
  SynonymMethod,
  Tick,
} from '../types';

export interface TickRepository {
  /** Returns the number of rows actually inserted; duplicates are skipped. */
  insertTicks(ticks: Tick[]): Promise<number>;
  latestPerOption(marketId: string): Promise<LatestTicks>;
  /** Ticks at or after `since`, newest first. */
  recentWindow(marketId: string, since: Date, limit: number): Promise<Tick[]>;
  latestTickTs(): Promise<Date | null>;
}

export interface StoredSynonymGroup {
  id: number;
  title: string;
  method: SynonymMethod;
}

export interface MarketRepository {
  upsertMarket(market: Market): Promise<void>;
  upsertOptions(options: MarketOption[]): Promise<void>;
  listMarkets(filter?: { status?: MarketStatus; limit?: number }): Promise<Market[]>;
  getMarket(marketId: string): Promise<Market | null>;
  listOptions(marketId: string): Promise<MarketOption[]>;
  /** Other members of every synonym group containing the market. */
  synonymPeers(marketId: string): Promise<string[]>;
  findGroupByTitle(title: string): Promise<StoredSynonymGroup | null>;
  upsertGroup(title: string, method: SynonymMethod): Promise<number>;
  replaceMembers(groupId: number, marketIds: string[]): Promise<void>;
  listGroups(): Promise<SynonymGroup[]>;
}

export interface StoredRuleDef {
  id: number;
  name: string;
  type: string;
  enabled: boolean;
  version: number;
  document: RuleDocument;
  updatedAt: Date;
}

export interface SignalQuery {
  level?: SignalLevel;
  marketId?: string;
  limit?: number;
}

export interface SignalRepository {
  /** Inserts or replaces by name; the version increments when the source text changes. */
  upsertRuleDef(document: RuleDocument, rawSource: string): Promise<{ id: number; version: number }>;
  listRuleDefs(): Promise<StoredRuleDef[]>;
  insertSignal(signal: NewSignal, createdAt: Date): Promise<number>;
  getSignal(id: number): Promise<SignalRecord | null>;
  fetchSignals(query?: SignalQuery): Promise<SignalRecord[]>;
  insertAudit(entry: AuditEntry): Promise<void>;
}

export interface KpiSample {
  day: string;
  ruleType: string;
  level: SignalLevel;
  gap: number | null;
  estEdgeBps: number | null;
}

export interface KpiRepository {
  recordKpi(sample: KpiSample): Promise<void>;
  dailyKpis(limit?: number): Promise<KpiRow[]>;
}

/**
 * Reads and writes that must see a consistent view while the execution
 * lock is held.
 */
export interface ExecutionLedger {
  openIntentsCount(excludeIntentId?: number): Promise<number>;
  /** Notional of sent or filled intents created at or after `dayStart`. */
  dailyNotional(dayStart: Date): Promise<number>;
  getIntent(id: number): Promise<OrderIntent | null>;
  updateIntentStatus(id: number, status: IntentStatus, detail: Record<string, unknown>, now: Date): Promise<OrderIntent>;
}

export interface ExecutionRepository extends ExecutionLedger {
  getOrCreatePolicy(name: string, defaults: Omit<ExecutionPolicy, 'id' | 'name'>): Promise<ExecutionPolicy>;
  createIntent(intent: NewOrderIntent, now: Date): Promise<OrderIntent>;
  listIntents(filter?: { status?: IntentStatus; limit?: number }): Promise<OrderIntent[]>;
  withLedgerLock<T>(callback: (ledger: ExecutionLedger) => Promise<T>): Promise<T>;
}
