import {
  ActiveRule,
  Market,
  MarketSnapshot,
  MlCandidate,
  RuleCandidate,
  SynonymGroup,
} from '../types';
import { MarketRepository, TickRepository } from '../data/repositories';
import { CryptoFeed, MLPredictor } from '../services/interfaces';
import { extractFeatures } from '../services/FeatureExtractor';
import { SynonymMatcher } from '../services/SynonymMatcher';
import { DetectorContext } from '../detectors/types';
import { MARKET_DETECTORS, detectCrossMarket } from '../detectors/DetectorRegistry';
import { MetricsCollector } from '../monitoring/MetricsCollector';
import { advancedLogger } from '../utils/AdvancedLogger';
import { errorMessage } from '../utils/ErrorHandler';
import { logger } from '../utils/logger';
import { SnapshotBuilder } from './SnapshotBuilder';
import { fuseSignals } from './SignalFusion';
import { SignalEmitter } from './SignalEmitter';
import { RuleLoader } from './RuleLoader';

export interface RulesEngineSettings {
  intervalSecs: number;
  marketLimit: number;
  recentWindowMinutes: number;
  recentWindowLimit: number;
  enabledPlatforms: string[];
  mockMode: boolean;
  detailBaseUrl: string;
  slippageBps: number;
  shutdownTimeoutMs: number;
  ml: {
    confidenceThreshold: number;
    inferenceIntervalSecs: number;
    confidenceWeight: number;
    ruleBonus: number;
  };
}

export interface RulesEngineDeps {
  markets: MarketRepository;
  ticks: TickRepository;
  ruleLoader: RuleLoader;
  emitter: SignalEmitter;
  synonymMatcher: SynonymMatcher;
  metrics: MetricsCollector;
  ml?: MLPredictor | null;
  cryptoFeed?: CryptoFeed | null;
  clock?: () => Date;
}

export interface CycleSummary {
  markets: number;
  ruleSignals: number;
  mlSignals: number;
  fused: number;
  emitted: number;
  durationMs: number;
}

export interface EngineStatus {
  running: boolean;
  rules: Array<{ id: number; name: string; type: string }>;
  cycles: number;
  lastRunAt: string | null;
  lastCycle: CycleSummary | null;
  lastError: string | null;
  mlEnabled: boolean;
}

export function marketInScope(rule: ActiveRule, market: Market): boolean {
  const { platforms, tags } = rule.document.scope;
  if (platforms && platforms.length > 0 && !platforms.includes(market.platform)) {
    return false;
  }
  if (tags && tags.length > 0) {
    const marketTags = new Set(market.tags);
    if (!tags.some(tag => marketTags.has(tag))) return false;
  }
  return true;
}

/**
 * Periodic evaluation loop: snapshot the active markets, run every rule
 * detector plus the optional ML model, fuse to one candidate per market and
 * hand each candidate to the emitter. Cycles never overlap; the next one is
 * scheduled only after the current one settles.
 */
export class RulesEngine {
  private rules: ActiveRule[] = [];
  private readonly snapshotBuilder: SnapshotBuilder;
  private readonly clock: () => Date;
  private readonly ml: MLPredictor | null;
  private readonly cryptoFeed: CryptoFeed | null;
  private latestSnapshots: Map<string, MarketSnapshot> = new Map();

  private running = false;
  private timer?: NodeJS.Timeout;
  private inFlight: Promise<CycleSummary> | null = null;
  private lastMlRunMs: number | null = null;
  private cycles = 0;
  private lastRunAt: Date | null = null;
  private lastCycle: CycleSummary | null = null;
  private lastError: string | null = null;

  constructor(
    private readonly deps: RulesEngineDeps,
    private readonly settings: RulesEngineSettings
  ) {
    this.clock = deps.clock ?? (() => new Date());
    this.ml = deps.ml ?? null;
    this.cryptoFeed = deps.cryptoFeed ?? null;
    this.snapshotBuilder = new SnapshotBuilder(deps.markets, deps.ticks, {
      marketLimit: settings.marketLimit,
      recentWindowMinutes: settings.recentWindowMinutes,
      recentWindowLimit: settings.recentWindowLimit,
      enabledPlatforms: settings.enabledPlatforms,
      mockMode: settings.mockMode,
    });
  }

  getRules(): ActiveRule[] {
    return [...this.rules];
  }

  /** Snapshots from the most recent cycle, by market id. */
  getLatestSnapshots(): ReadonlyMap<string, MarketSnapshot> {
    return this.latestSnapshots;
  }

  async loadRules(): Promise<ActiveRule[]> {
    const loaded = await this.deps.ruleLoader.load();
    this.rules = loaded.active;
    return this.getRules();
  }

  /** Reload rule documents; the previous set stays active if the new one is invalid. */
  async reloadRules(): Promise<ActiveRule[]> {
    try {
      return await this.loadRules();
    } catch (error) {
      advancedLogger.error('Rule reload failed, keeping previous rules', error, {
        component: 'rules_engine',
        operation: 'reload_rules',
      });
      throw error;
    }
  }

  async start(): Promise<void> {
    if (this.running) {
      logger.warn('Rules engine is already running');
      return;
    }
    if (this.rules.length === 0) {
      await this.loadRules();
    }
    await this.refreshGroups();

    this.running = true;
    logger.info(`Rules engine started (${this.rules.length} rules, every ${this.settings.intervalSecs}s)`);
    this.runLoop();
  }

  /** Stop scheduling and wait for the in-flight cycle, bounded by the shutdown timeout. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }

    const pending = this.inFlight;
    if (pending) {
      let timeout: NodeJS.Timeout | undefined;
      const bound = new Promise<'timeout'>(resolve => {
        timeout = setTimeout(() => resolve('timeout'), this.settings.shutdownTimeoutMs);
      });
      const outcome = await Promise.race([pending.then(() => 'done' as const, () => 'done' as const), bound]);
      if (timeout) clearTimeout(timeout);
      if (outcome === 'timeout') {
        logger.warn(`Rules engine cycle did not finish within ${this.settings.shutdownTimeoutMs}ms`);
      }
    }
    logger.info('Rules engine stopped');
  }

  getStatus(): EngineStatus {
    return {
      running: this.running,
      rules: this.rules.map(rule => ({ id: rule.id, name: rule.name, type: rule.type })),
      cycles: this.cycles,
      lastRunAt: this.lastRunAt ? this.lastRunAt.toISOString() : null,
      lastCycle: this.lastCycle,
      lastError: this.lastError,
      mlEnabled: this.ml !== null,
    };
  }

  /** Run one full cycle. Concurrent callers share the cycle already running. */
  evaluateOnce(): Promise<CycleSummary> {
    if (this.inFlight) return this.inFlight;
    const cycle = this.runCycle().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private runLoop(): void {
    if (!this.running) return;
    void this.evaluateOnce()
      .then(() => {
        this.lastError = null;
      })
      .catch(error => {
        this.lastError = errorMessage(error);
        advancedLogger.error('Rules engine cycle failed', error, {
          component: 'rules_engine',
          operation: 'evaluate_once',
        });
      })
      .finally(() => {
        if (!this.running) return;
        this.timer = setTimeout(() => this.runLoop(), this.settings.intervalSecs * 1000);
      });
  }

  private async runCycle(): Promise<CycleSummary> {
    const started = Date.now();
    const now = this.clock();

    const snapshots = await this.snapshotBuilder.build(now);
    const context: DetectorContext = {
      now,
      slippageBps: this.settings.slippageBps,
      detailBaseUrl: this.settings.detailBaseUrl,
      snapshots,
      ml: this.ml,
      cryptoFeed: this.cryptoFeed,
    };

    const ruleCandidates = this.evaluatePerMarket(snapshots, context);
    ruleCandidates.push(...(await this.evaluateCrossMarket(context)));
    this.latestSnapshots = snapshots;

    const mlCandidates = this.evaluateMl(snapshots, now);
    const fused = fuseSignals(ruleCandidates, mlCandidates, {
      confidenceWeight: this.settings.ml.confidenceWeight,
      ruleBonus: this.settings.ml.ruleBonus,
    });

    let emitted = 0;
    for (const candidate of fused) {
      const outcome = await this.deps.emitter.emit(candidate, snapshots.get(candidate.marketId));
      if (outcome.status === 'emitted') emitted++;
    }

    const summary: CycleSummary = {
      markets: snapshots.size,
      ruleSignals: ruleCandidates.length,
      mlSignals: mlCandidates.length,
      fused: fused.length,
      emitted,
      durationMs: Date.now() - started,
    };

    this.cycles++;
    this.lastRunAt = now;
    this.lastCycle = summary;
    this.deps.metrics.recordHistogram('rule_eval_ms', summary.durationMs);
    this.deps.metrics.setGauge('markets_evaluated', summary.markets);
    logger.debug('Rules cycle complete', summary);
    return summary;
  }

  private evaluatePerMarket(snapshots: Map<string, MarketSnapshot>, context: DetectorContext): RuleCandidate[] {
    const candidates: RuleCandidate[] = [];
    for (const snapshot of snapshots.values()) {
      for (const rule of this.rules) {
        const kind = rule.type;
        if (kind === 'CROSS_MARKET_MISPRICE') continue;
        if (!marketInScope(rule, snapshot.market)) continue;

        try {
          const draft = MARKET_DETECTORS[kind](rule, snapshot, context);
          if (draft) candidates.push({ rule, marketId: snapshot.market.id, draft });
        } catch (error) {
          advancedLogger.error(`Detector ${kind} failed`, error, {
            component: 'rules_engine',
            operation: 'evaluate_rule',
            marketId: snapshot.market.id,
            ruleName: rule.name,
          });
        }
      }
    }
    return candidates;
  }

  private async evaluateCrossMarket(context: DetectorContext): Promise<RuleCandidate[]> {
    const groupRules = this.rules.filter(rule => rule.type === 'CROSS_MARKET_MISPRICE');
    if (groupRules.length === 0) return [];

    const groups = await this.refreshGroups();
    const candidates: RuleCandidate[] = [];
    for (const rule of groupRules) {
      const inScope = groups.map(group => ({
        ...group,
        members: group.members.filter(marketId => {
          const snapshot = context.snapshots.get(marketId);
          return snapshot !== undefined && marketInScope(rule, snapshot.market);
        }),
      }));
      for (const signal of detectCrossMarket(rule, inScope, context)) {
        candidates.push({ rule, marketId: signal.marketId, draft: signal.draft });
      }
    }
    return candidates;
  }

  private async refreshGroups(): Promise<SynonymGroup[]> {
    try {
      return await this.deps.synonymMatcher.buildGroups();
    } catch (error) {
      advancedLogger.error('Synonym group rebuild failed', error, {
        component: 'rules_engine',
        operation: 'build_groups',
      });
      return [];
    }
  }

  private evaluateMl(snapshots: Map<string, MarketSnapshot>, now: Date): MlCandidate[] {
    if (!this.ml) return [];
    const nowMs = now.getTime();
    if (this.lastMlRunMs !== null && nowMs - this.lastMlRunMs < this.settings.ml.inferenceIntervalSecs * 1000) {
      return [];
    }
    this.lastMlRunMs = nowMs;

    const rows: MlCandidate['features'][] = [];
    const marketIds: string[] = [];
    for (const [marketId, snapshot] of snapshots) {
      const features = extractFeatures(snapshot.market, snapshot.latest, snapshot.recent, snapshot.peerPrices, now);
      if (!features) continue;
      rows.push(features);
      marketIds.push(marketId);
    }
    if (rows.length === 0) return [];

    const started = Date.now();
    let probabilities: number[];
    try {
      probabilities = this.ml.predictProbabilities(rows);
    } catch (error) {
      advancedLogger.error('ML inference failed', error, { component: 'rules_engine', operation: 'ml_inference' });
      return [];
    }
    this.deps.metrics.recordHistogram('ml_inference_ms', Date.now() - started);

    const candidates: MlCandidate[] = [];
    probabilities.forEach((probability, index) => {
      if (index >= rows.length || !(probability >= this.settings.ml.confidenceThreshold)) return;
      candidates.push({
        marketId: marketIds[index],
        confidence: probability,
        features: rows[index],
        reason: `ML confidence ${(probability * 100).toFixed(1)}%`,
      });
    });
    return candidates;
  }
}
