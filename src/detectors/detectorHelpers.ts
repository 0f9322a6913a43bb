import {
  ActiveRule,
  BookEntry,
  LatestTicks,
  Market,
  MarketOption,
  Tick,
  TradeLeg,
  TradePlan,
  TradeSide,
} from '../types';
import { CryptoSymbol } from '../services/interfaces';
import { computeScore } from '../statistics/Scoring';

export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/** Coerce anything that is not a finite number to 0. */
export function num(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/** Numeric rule parameter, or `fallback` when missing or not numeric. */
export function param(rule: ActiveRule, key: string, fallback: number): number {
  const value = rule.document.params[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function ruleScore(rule: ActiveRule, defaultBase: number, metrics: Record<string, number>): number {
  const score = rule.document.outputs.score;
  return computeScore(score?.base ?? defaultBase, score?.weights ?? {}, metrics);
}

export function labelFor(options: MarketOption[], optionId: string): string {
  return options.find(option => option.id === optionId)?.label ?? optionId;
}

export interface PrimaryOption {
  optionId: string;
  label: string;
  tick: Tick;
}

/** The highest-priced latest tick; the first one wins a tie. */
export function primaryOption(latest: LatestTicks, options: MarketOption[]): PrimaryOption | null {
  let best: Tick | undefined;
  for (const tick of latest.values()) {
    if (!best || num(tick.price) > num(best.price)) {
      best = tick;
    }
  }
  if (!best) return null;
  return { optionId: best.optionId, label: labelFor(options, best.optionId), tick: best };
}

/**
 * A single trade leg whose limit already includes the slippage allowance,
 * kept strictly inside (0, 1).
 */
export function buildTradeLeg(
  marketId: string,
  optionId: string,
  side: TradeSide,
  price: number,
  slippageBps: number,
  options: { label?: string; qty?: number } = {}
): TradeLeg {
  const reference = num(price);
  const slip = slippageBps / 10000;
  const limitPrice = side === 'buy'
    ? Math.min(0.999, reference ? reference * (1 + slip) : slip)
    : Math.max(0.001, reference * (1 - slip));

  return {
    marketId,
    optionId,
    side,
    qty: options.qty ?? 1,
    referencePrice: reference,
    limitPrice,
    label: options.label || optionId,
  };
}

export function tradePlan(
  action: string,
  rationale: string,
  legs: TradeLeg[],
  estimatedEdgeBps: number | null = null,
  confidence: number | null = null
): TradePlan {
  return { action, rationale, legs, estimatedEdgeBps, confidence };
}

/**
 * Latest book per label for display. Synthetic option ids (containing `-`)
 * are skipped; on a label collision the newer tick wins. With no usable
 * ticks the option list is shown at zero prices.
 */
export function bookSnapshot(options: MarketOption[], latest: LatestTicks): BookEntry[] {
  const byLabel = new Map<string, BookEntry>();

  for (const [optionId, tick] of latest) {
    if (optionId.includes('-')) continue;

    const entry: BookEntry = {
      optionId,
      label: labelFor(options, optionId),
      price: num(tick.price),
      bestBid: num(tick.bestBid),
      bestAsk: num(tick.bestAsk),
      liquidity: num(tick.liquidity),
      ts: tick.ts.toISOString(),
    };
    const key = entry.label || optionId;
    const previous = byLabel.get(key);
    if (!previous || (entry.ts ?? '') > (previous.ts ?? '')) {
      byLabel.set(key, entry);
    }
  }

  let snapshot = Array.from(byLabel.values());
  if (snapshot.length === 0) {
    snapshot = options.map(option => ({
      optionId: option.id,
      label: option.label,
      price: 0,
      bestBid: 0,
      bestAsk: 0,
      liquidity: 0,
      ts: null,
    }));
  }

  return snapshot.sort((a, b) => compareText(a.label || a.optionId, b.label || b.optionId));
}

export function formatMessage(rule: ActiveRule, market: Market, insight: string, detailBaseUrl: string): string {
  return [
    `*${rule.name}*`,
    `Market: ${market.title}`,
    `Insight: ${insight}`,
    `Detail: ${detailBaseUrl}/${market.id}`,
  ].join('\n');
}

/** Minutes until the market ends, floored at 0; null without an end time. */
export function minutesToEnd(market: Market, now: Date): number | null {
  if (!market.endsAt) return null;
  return Math.max((market.endsAt.getTime() - now.getTime()) / 60000, 0);
}

export function normalizeTitle(title: string): string {
  return title.toLowerCase().replace(/[^a-z\s]/g, '');
}

export function mapCryptoSymbol(title: string): CryptoSymbol | null {
  const lowered = title.toLowerCase();
  if (lowered.includes('bitcoin') || lowered.includes('btc')) return 'BTC';
  if (lowered.includes('ethereum') || lowered.includes('eth')) return 'ETH';
  if (lowered.includes('solana') || lowered.includes('sol')) return 'SOL';
  return null;
}
