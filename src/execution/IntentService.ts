import { ExecutionPolicy, OrderIntent, SignalLevel, Tick, TradeSide } from '../types';
import { ExecutionRepository, SignalRepository, TickRepository } from '../data/repositories';
import { ExecutionConfig } from '../config/ConfigManager';
import { MetricsCollector } from '../monitoring/MetricsCollector';
import { num } from '../detectors/detectorHelpers';
import { referencePrice } from '../risk/Guardrails';
import { InvalidRequestError, NotFoundError } from '../utils/ErrorHandler';
import { logger } from '../utils/logger';

export interface IntentRequest {
  signalId: number;
  side?: TradeSide;
  qtyOverride?: number;
  limitPriceOverride?: number;
  ttlSecs?: number;
}

export type IntentSettings = Pick<
  ExecutionConfig,
  'mode' | 'maxNotionalPerOrder' | 'maxConcurrentOrders' | 'maxDailyNotional' | 'slippageBps' | 'signalMaxAgeSecs' | 'intentTtlSecs' | 'defaultPolicyName'
>;

const ACTIONABLE_LEVELS: readonly SignalLevel[] = ['P1', 'P2'];

/**
 * Turns a fresh, high-severity signal into a `suggested` order intent whose
 * limit already sits inside the slippage band around the traded option's
 * own reference.
 */
export class IntentService {
  private readonly clock: () => Date;

  constructor(
    private readonly signals: SignalRepository,
    private readonly ticks: TickRepository,
    private readonly execution: ExecutionRepository,
    private readonly settings: IntentSettings,
    private readonly metrics: MetricsCollector,
    clock?: () => Date
  ) {
    this.clock = clock ?? (() => new Date());
  }

  bootstrapPolicy(): Promise<ExecutionPolicy> {
    return this.execution.getOrCreatePolicy(this.settings.defaultPolicyName, {
      maxNotionalPerOrder: this.settings.maxNotionalPerOrder,
      maxConcurrentOrders: this.settings.maxConcurrentOrders,
      maxDailyNotional: this.settings.maxDailyNotional,
      slippageBps: this.settings.slippageBps,
    });
  }

  async createIntent(request: IntentRequest): Promise<OrderIntent> {
    if (this.settings.mode === 'manual') {
      throw new InvalidRequestError('execution mode is manual', { signalId: request.signalId });
    }
    const signal = await this.signals.getSignal(request.signalId);
    if (!signal) throw new NotFoundError('signal', request.signalId);

    const now = this.clock();
    const ageSecs = (now.getTime() - signal.createdAt.getTime()) / 1000;
    if (ageSecs > this.settings.signalMaxAgeSecs) {
      throw new InvalidRequestError('signal expired', { signalId: signal.id, ageSecs });
    }
    if (!ACTIONABLE_LEVELS.includes(signal.level)) {
      throw new InvalidRequestError('signal level too low', { signalId: signal.id, level: signal.level });
    }

    const latest = await this.ticks.latestPerOption(signal.marketId);
    if (latest.size === 0) {
      throw new InvalidRequestError('market has no liquidity', { marketId: signal.marketId });
    }

    const { payload } = signal;
    const plan = payload.suggestedTrade;
    const primaryLeg = plan && plan.legs.length > 0 ? plan.legs[0] : null;
    const optionId = primaryLeg ? primaryLeg.optionId : signal.optionId ?? favouriteOption(latest.values());

    const tradedTick = optionId ? latest.get(optionId) : undefined;
    const reference = tradedTick ? referencePrice(tradedTick) : 0;
    if (!tradedTick || reference <= 0) {
      throw new InvalidRequestError('option has no usable tick', { marketId: signal.marketId, optionId });
    }

    let qty = request.qtyOverride ?? (primaryLeg ? primaryLeg.qty || 1 : 1);
    let limitPrice = request.limitPriceOverride
      ?? (primaryLeg ? num(primaryLeg.limitPrice) || num(primaryLeg.referencePrice) || reference : reference);
    let side: TradeSide = request.side ?? (primaryLeg ? primaryLeg.side : signal.level === 'P1' ? 'buy' : 'sell');

    if (payload.ruleType === 'ENDGAME_SWEEP') {
      qty = request.qtyOverride ?? 1;
      limitPrice = request.limitPriceOverride ?? Math.min(0.99, reference);
      side = 'buy';
    }

    const allowance = reference * (this.settings.slippageBps / 10000);
    limitPrice = side === 'buy'
      ? Math.min(limitPrice, reference + allowance)
      : Math.max(limitPrice, reference - allowance);

    const policy = await this.bootstrapPolicy();
    const intent = await this.execution.createIntent({
      signalId: signal.id,
      marketId: signal.marketId,
      optionId: tradedTick.optionId,
      side,
      qty,
      limitPrice,
      ttlSecs: request.ttlSecs ?? this.settings.intentTtlSecs,
      policyId: policy.id,
      status: 'suggested',
      detail: {
        signalLevel: signal.level,
        rule: payload.ruleName ?? null,
        ruleType: payload.ruleType ?? null,
        transport: payload.details.transport ?? null,
        edgeScore: payload.edgeScore ?? null,
        estimatedEdgeBps: payload.estimatedEdgeBps ?? null,
        tradePlanHint: plan ?? null,
        primaryOptionId: tradedTick.optionId,
        referencePrice: reference,
      },
    }, now);

    this.metrics.incrementCounter('order_intents', 1, { status: intent.status });
    logger.info(`Intent ${intent.id} suggested for signal ${signal.id}: ${side} ${qty} @ ${limitPrice.toFixed(3)}`);
    return intent;
  }
}

function favouriteOption(ticks: Iterable<Tick>): string | null {
  let best: Tick | null = null;
  for (const tick of ticks) {
    if (!best || num(tick.price) > num(best.price)) best = tick;
  }
  return best ? best.optionId : null;
}
