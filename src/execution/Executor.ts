import { ExecutionPolicy, IntentStatus, OrderIntent } from '../types';
import { ExecutionLedger, ExecutionRepository, SignalRepository, TickRepository } from '../data/repositories';
import { evaluateLimits, utcDayStart } from '../risk/RiskLimits';
import { evaluateGuardrails } from '../risk/Guardrails';
import { MetricsCollector } from '../monitoring/MetricsCollector';
import { advancedLogger } from '../utils/AdvancedLogger';
import { InvalidRequestError, NotFoundError } from '../utils/ErrorHandler';

export interface ExecutorOptions {
  /** Approved intents are marked filled instead of sent. */
  simulateFills: boolean;
  clock?: () => Date;
}

export interface ValidationResult {
  approved: boolean;
  reasons: string[];
}

function primaryOptionId(intent: OrderIntent): string | null {
  if (intent.optionId) return intent.optionId;
  const hinted = intent.detail.primaryOptionId;
  return typeof hinted === 'string' && hinted.length > 0 ? hinted : null;
}

/**
 * Confirms suggested intents. Limits and guardrails both run and every
 * violated constraint is reported; the whole check-and-update sequence
 * holds the execution ledger lock.
 */
export class Executor {
  private readonly clock: () => Date;

  constructor(
    private readonly execution: ExecutionRepository,
    private readonly ticks: TickRepository,
    private readonly signals: SignalRepository,
    private readonly policy: () => Promise<ExecutionPolicy>,
    private readonly metrics: MetricsCollector,
    private readonly options: ExecutorOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async validate(ledger: ExecutionLedger, intent: OrderIntent, policy: ExecutionPolicy, now: Date): Promise<ValidationResult> {
    const reasons: string[] = [];

    const limits = await evaluateLimits(
      ledger,
      { qty: intent.qty, limitPrice: intent.limitPrice, dayStart: utcDayStart(now), excludeIntentId: intent.id },
      policy
    );
    reasons.push(...limits.reasons);

    const optionId = primaryOptionId(intent);
    if (!optionId) {
      reasons.push('missing option for guardrail');
      return { approved: false, reasons };
    }

    const guardrail = await evaluateGuardrails(this.ticks, {
      marketId: intent.marketId,
      optionId,
      side: intent.side,
      limitPrice: intent.limitPrice,
      slippageBps: policy.slippageBps,
    });
    if (!guardrail.ok && guardrail.reason) {
      reasons.push(guardrail.reason);
    }

    return { approved: reasons.length === 0, reasons };
  }

  async confirm(intentId: number): Promise<OrderIntent> {
    const policy = await this.policy();

    const updated = await this.execution.withLedgerLock(async ledger => {
      const intent = await ledger.getIntent(intentId);
      if (!intent) throw new NotFoundError('intent', intentId);
      if (intent.status !== 'suggested') {
        throw new InvalidRequestError(`intent is already ${intent.status}`, { intentId, status: intent.status });
      }

      const now = this.clock();
      const { approved, reasons } = await this.validate(ledger, intent, policy, now);
      let status: IntentStatus = approved ? 'sent' : 'rejected';
      if (approved && this.options.simulateFills) status = 'filled';

      const detail = { ...intent.detail, checks: { reasons, approved } };
      return ledger.updateIntentStatus(intentId, status, detail, now);
    });

    this.metrics.incrementCounter('order_intents', 1, { status: updated.status });
    advancedLogger.info(`Intent ${updated.id} ${updated.status}`, {
      component: 'executor',
      operation: 'confirm_intent',
      marketId: updated.marketId,
      status: updated.status,
    });

    try {
      await this.signals.insertAudit({
        actor: 'executor',
        action: 'intent_confirmed',
        targetId: String(updated.id),
        meta: { status: updated.status, market_id: updated.marketId },
      });
    } catch (error) {
      advancedLogger.error('Failed to write audit entry', error, { component: 'executor', operation: 'insert_audit' });
    }

    return updated;
  }
}
