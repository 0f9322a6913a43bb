import { LatestTicks, Tick, TradeSide } from '../types';
import { TickRepository } from '../data/repositories';
import { num } from '../detectors/detectorHelpers';
import { toFixedPoint } from './RiskLimits';

export interface GuardrailRequest {
  marketId: string;
  optionId: string;
  side: TradeSide;
  limitPrice: number;
  slippageBps: number;
}

export interface GuardrailResult {
  ok: boolean;
  reason: string | null;
}

/** Mid of a two-sided book, otherwise the last traded price. */
export function referencePrice(tick: Tick): number {
  const bid = num(tick.bestBid);
  const ask = num(tick.bestAsk);
  if (bid > 0 && ask > 0) return (bid + ask) / 2;
  return num(tick.price);
}

/**
 * Slippage check against the traded option's own reference. A buy may not
 * exceed `ref + ref * bps / 1e4`; a sell may not go below `ref - allowance`.
 */
export function checkSlippage(latest: LatestTicks, request: GuardrailRequest): GuardrailResult {
  if (latest.size === 0) return { ok: false, reason: 'no market depth' };

  const tick = latest.get(request.optionId);
  if (!tick) return { ok: false, reason: 'option depth missing' };

  const reference = toFixedPoint(referencePrice(tick));
  if (reference <= 0) return { ok: false, reason: 'invalid reference price' };

  const allowance = Math.round((reference * request.slippageBps) / 10000);
  const limit = toFixedPoint(request.limitPrice);

  if (request.side === 'buy' && limit > reference + allowance) {
    return { ok: false, reason: 'slippage too high' };
  }
  if (request.side === 'sell' && limit < reference - allowance) {
    return { ok: false, reason: 'slippage too high' };
  }
  return { ok: true, reason: null };
}

export async function evaluateGuardrails(ticks: TickRepository, request: GuardrailRequest): Promise<GuardrailResult> {
  const latest = await ticks.latestPerOption(request.marketId);
  return checkSlippage(latest, request);
}
