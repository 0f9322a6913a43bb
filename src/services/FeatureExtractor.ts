import { FEATURE_NAMES, FeatureRow, LatestTicks, Market, Tick } from '../types';
import { mean, sampleStdev } from '../statistics/StatisticalModels';

const FIVE_MINUTES_MS = 5 * 60 * 1000;
const VELOCITY_WINDOW_SECS = 10;

function finite(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

function midPrice(bestBid: number, bestAsk: number, fallback: number): number {
  if (bestBid && bestAsk) return (bestBid + bestAsk) / 2;
  if (bestBid) return bestBid;
  if (bestAsk) return bestAsk;
  return fallback;
}

function spreadZscore(recent: Tick[], now: Date): number {
  const cutoff = now.getTime() - FIVE_MINUTES_MS;
  const spreads = recent
    .filter(tick => tick.ts.getTime() >= cutoff && tick.bestBid && tick.bestAsk)
    .map(tick => Math.max(tick.bestAsk - tick.bestBid, 0));

  if (spreads.length < 2) return 0;
  const std = sampleStdev(spreads) || 1;
  return (spreads[0] - mean(spreads)) / std;
}

function priceVelocity(recent: Tick[], now: Date): number {
  if (recent.length === 0) return 0;
  const latestPrice = finite(recent[0].price);
  const past = recent.find(tick => (now.getTime() - tick.ts.getTime()) / 1000 >= VELOCITY_WINDOW_SECS);
  return latestPrice - (past ? finite(past.price) : latestPrice);
}

function untilExpiry(market: Market, now: Date, unitMs: number): number {
  if (!market.endsAt) return 0;
  return Math.max((market.endsAt.getTime() - now.getTime()) / unitMs, 0);
}

function synonymDelta(mid: number, peerPrices: number[]): number {
  if (peerPrices.length === 0) return 0;
  const avgPeer = mean(peerPrices);
  const diffs = peerPrices.map(price => price - avgPeer);
  const std = diffs.length >= 2 ? sampleStdev(diffs) || 1 : 1;
  return (mid - avgPeer) / std;
}

function priceVolatility(recent: Tick[], now: Date): number {
  const cutoff = now.getTime() - FIVE_MINUTES_MS;
  const prices = recent.filter(tick => tick.ts.getTime() >= cutoff).map(tick => finite(tick.price));
  return prices.length < 2 ? 0 : sampleStdev(prices);
}

/**
 * Build the fixed ML feature row for one market. The "top" tick is the
 * latest tick with the highest volume. Bid/ask sizes are proxied by volume,
 * so `sizeImbalance` stays 0 until real depth is available.
 *
 * Returns null when there are no ticks or any feature is not a finite number.
 */
export function extractFeatures(
  market: Market,
  latest: LatestTicks,
  recent: Tick[],
  peerPrices: number[],
  now: Date
): FeatureRow | null {
  let top: Tick | undefined;
  for (const tick of latest.values()) {
    if (!top || finite(tick.volume) > finite(top.volume)) {
      top = tick;
    }
  }
  if (!top) return null;

  const bestBid = finite(top.bestBid);
  const bestAsk = finite(top.bestAsk);
  const mid = midPrice(bestBid, bestAsk, finite(top.price));
  const volume = finite(top.volume);
  const bestBidSize = volume;
  const bestAskSize = volume;
  const sizeImbalance = bestBidSize || bestAskSize
    ? (bestBidSize - bestAskSize) / Math.max(bestBidSize + bestAskSize, 1e-6)
    : 0;

  const row: FeatureRow = {
    midPrice: mid,
    spread: bestBid && bestAsk ? bestAsk - bestBid : 0,
    volume,
    bestBidSize,
    bestAskSize,
    sizeImbalance,
    zscoreSpread5m: spreadZscore(recent, now),
    priceVelocity10s: priceVelocity(recent, now),
    timeToExpiryMinutes: untilExpiry(market, now, 60 * 1000),
    daysToExpiry: untilExpiry(market, now, 24 * 60 * 60 * 1000),
    synonymPriceDeltaZscore: synonymDelta(mid, peerPrices),
    volatility5m: priceVolatility(recent, now),
  };

  if (FEATURE_NAMES.some(name => !Number.isFinite(row[name]))) {
    return null;
  }
  return row;
}

export function featureVector(row: FeatureRow): number[] {
  return FEATURE_NAMES.map(name => row[name]);
}
