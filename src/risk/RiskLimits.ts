import { CheckResult } from '../types';
import { ExecutionLedger } from '../data/repositories';

export interface LimitSettings {
  maxNotionalPerOrder: number;
  maxConcurrentOrders: number;
  maxDailyNotional: number;
}

export interface LimitRequest {
  qty: number;
  limitPrice: number;
  /** UTC midnight of the trading day. */
  dayStart: Date;
  /** The intent under confirmation, left out of the open count. */
  excludeIntentId?: number;
}

const SCALE = 1e9;

/** Fixed-point representation used for every money comparison. */
export function toFixedPoint(value: number): number {
  return Math.round(value * SCALE);
}

export function utcDayStart(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}

/**
 * Notional, concurrency and daily caps. Every violated cap is reported;
 * callers holding the ledger lock get a consistent count.
 */
export async function evaluateLimits(
  ledger: ExecutionLedger,
  request: LimitRequest,
  limits: LimitSettings
): Promise<CheckResult> {
  const reasons: string[] = [];
  const notional = toFixedPoint(request.qty * request.limitPrice);

  if (notional > toFixedPoint(limits.maxNotionalPerOrder)) {
    reasons.push('per-order notional exceeded');
  }

  const openOrders = await ledger.openIntentsCount(request.excludeIntentId);
  if (openOrders >= limits.maxConcurrentOrders) {
    reasons.push('max concurrent intents reached');
  }

  const dayNotional = toFixedPoint(await ledger.dailyNotional(request.dayStart));
  if (dayNotional + notional > toFixedPoint(limits.maxDailyNotional)) {
    reasons.push('daily notional cap reached');
  }

  return { ok: reasons.length === 0, reasons };
}
