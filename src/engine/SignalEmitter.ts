import { FusedSignal, MarketSnapshot, NewSignal, NotificationStatus, SignalLevel, SignalPayload, SignalRecord } from '../types';
import { KpiRepository, SignalRepository } from '../data/repositories';
import { Notifier } from '../services/interfaces';
import { CircuitBreaker } from '../risk/CircuitBreaker';
import { CooldownTracker } from './CooldownTracker';
import { MetricsCollector } from '../monitoring/MetricsCollector';
import { advancedLogger } from '../utils/AdvancedLogger';
import { num } from '../detectors/detectorHelpers';

export type EmitOutcome =
  | { status: 'emitted'; signal: SignalRecord | null; notification: NotificationStatus }
  | { status: 'breaker_open' }
  | { status: 'cooldown' };

export type SignalListener = (signal: SignalRecord) => void;

export interface SignalEmitterDeps {
  signals: SignalRepository;
  kpis: KpiRepository;
  notifier: Notifier;
  breaker: CircuitBreaker;
  cooldowns: CooldownTracker;
  metrics: MetricsCollector;
  defaultCooldownSecs: number;
  mlCooldownSecs: number;
  clock?: () => Date;
}

const ML_RULE_NAME = 'ML';

/** Extra message lines summarising the suggested trade and the book. */
export function summaryLines(payload: SignalPayload): string[] {
  const lines: string[] = [];
  const trade = payload.suggestedTrade;
  if (trade) {
    if (trade.legs.length > 0) {
      const legs = trade.legs.slice(0, 3).map(leg => {
        const price = num(leg.referencePrice) || num(leg.limitPrice);
        return `${leg.side.toUpperCase()} ${leg.label || leg.optionId}:${price.toFixed(3)}`;
      });
      lines.push(`Trade ${trade.action}: ${legs.join(' | ')}`);
    }
    if (trade.rationale) {
      lines.push(`Plan: ${trade.rationale}`);
    }
  }
  const book = payload.bookSnapshot ?? [];
  if (book.length > 0) {
    const entries = book.slice(0, 3).map(entry => `${entry.label || entry.optionId}:${num(entry.price).toFixed(3)}`);
    lines.push(`Book: ${entries.join(', ')}`);
  }
  return lines;
}

/**
 * Final gate between a fused signal and the outside world: breaker and
 * cooldown filtering, enrichment, notification, then the best-effort
 * persistence chain (signal row, daily KPI, audit entry).
 */
export class SignalEmitter {
  private readonly clock: () => Date;
  private listeners: SignalListener[] = [];

  constructor(private readonly deps: SignalEmitterDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  onEmitted(listener: SignalListener): void {
    this.listeners.push(listener);
  }

  async emit(fused: FusedSignal, snapshot?: MarketSnapshot): Promise<EmitOutcome> {
    const { rule, marketId } = fused;
    const ruleName = rule ? rule.name : ML_RULE_NAME;
    if (this.deps.breaker.isOpen(ruleName, marketId)) {
      return { status: 'breaker_open' };
    }

    const cooldownSecs = rule
      ? rule.document.dedupe.cooldown_secs ?? this.deps.defaultCooldownSecs
      : this.deps.mlCooldownSecs;
    const now = this.clock();
    if (!this.deps.cooldowns.tryAcquire(rule ? rule.id : -1, marketId, cooldownSecs, now.getTime())) {
      return { status: 'cooldown' };
    }

    const payload: SignalPayload = { ...fused.payload, details: { ...fused.payload.details } };
    if (snapshot && payload.marketTitle === undefined) {
      payload.marketTitle = snapshot.market.title;
    }
    payload.ruleName = ruleName;
    payload.ruleId = rule ? rule.id : null;
    payload.ruleType = rule ? rule.type : ML_RULE_NAME;
    payload.edgeScore = fused.edgeScore;

    const extraLines = summaryLines(payload);
    const message = extraLines.length > 0 ? `${fused.message}\n${extraLines.join('\n')}` : fused.message;

    const context = { component: 'signal_emitter', marketId, ruleName };
    let notification: NotificationStatus;
    try {
      notification = await this.deps.notifier.send(message, `${rule ? rule.id : 'ml'}:${marketId}`, cooldownSecs);
    } catch (error) {
      advancedLogger.error('Notifier threw while sending signal', error, { ...context, operation: 'notify' });
      notification = 'error';
    }
    this.deps.metrics.incrementCounter('notifications', 1, { status: notification });
    if (notification === 'sent') {
      this.deps.breaker.reset(ruleName, marketId);
      payload.details.transport = 'discord';
    } else {
      this.deps.breaker.recordFailure(ruleName, marketId);
      payload.details.transport = 'discord-dry-run';
    }

    const level: SignalLevel = fused.level ?? rule?.document.outputs.level ?? 'P2';
    const ruleType = rule ? rule.type : ML_RULE_NAME;
    const newSignal: NewSignal = {
      marketId,
      optionId: fused.optionId ?? null,
      ruleId: rule ? rule.id : null,
      level,
      score: Number.isFinite(fused.score) ? fused.score : fused.edgeScore,
      edgeScore: fused.edgeScore,
      payload,
      source: fused.source,
      confidence: fused.confidence,
      features: fused.features,
      reason: fused.reason,
      message,
    };

    let record: SignalRecord | null = null;
    try {
      const id = await this.deps.signals.insertSignal(newSignal, now);
      record = { ...newSignal, id, createdAt: now };
    } catch (error) {
      advancedLogger.error('Failed to persist signal', error, { ...context, operation: 'insert_signal' });
    }

    try {
      await this.deps.kpis.recordKpi({
        day: now.toISOString().slice(0, 10),
        ruleType,
        level,
        gap: payload.gap ?? null,
        estEdgeBps: payload.estimatedEdgeBps ?? null,
      });
    } catch (error) {
      advancedLogger.error('Failed to record rule KPI', error, { ...context, operation: 'record_kpi' });
    }

    try {
      await this.deps.signals.insertAudit({
        actor: 'rules_engine',
        action: 'signal_emitted',
        targetId: record ? String(record.id) : null,
        meta: { rule: ruleName, market_id: marketId },
      });
    } catch (error) {
      advancedLogger.error('Failed to write audit entry', error, { ...context, operation: 'insert_audit' });
    }

    this.deps.metrics.incrementCounter('signals_emitted', 1, { rule: ruleType, source: fused.source });
    advancedLogger.logSignalEmission(ruleName, marketId, newSignal.score, {
      source: fused.source,
      level,
      transport: payload.details.transport,
    });

    if (record) {
      for (const listener of this.listeners) {
        try {
          listener(record);
        } catch (error) {
          advancedLogger.error('Signal listener failed', error, { ...context, operation: 'notify_listener' });
        }
      }
    }

    return { status: 'emitted', signal: record, notification };
  }
}
