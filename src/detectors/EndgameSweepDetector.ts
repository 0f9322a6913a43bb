import { MarketDetector } from './types';
import {
  bookSnapshot,
  buildTradeLeg,
  formatMessage,
  labelFor,
  minutesToEnd,
  num,
  param,
  ruleScore,
  tradePlan,
} from './detectorHelpers';
import { mean, sampleStdev } from '../statistics/StatisticalModels';

const VOLUME_SAMPLE = 20;

/**
 * Near-certain option in the last minutes before expiry with a volume surge.
 * Always a buy.
 */
export const detectEndgameSweep: MarketDetector = (rule, snapshot, context) => {
  const minPrice = param(rule, 'min_price', 0.95);
  const minutesLimit = param(rule, 'minutes_to_end', 30);
  const minLiquidity = param(rule, 'min_liquidity', 0);
  const minZ = param(rule, 'vol_surge_z', 1.0);

  const remaining = minutesToEnd(snapshot.market, context.now);
  if (remaining === null || remaining > minutesLimit) return null;

  for (const [optionId, tick] of snapshot.latest) {
    const price = num(tick.price);
    const liquidity = num(tick.liquidity);
    if (price < minPrice || liquidity < minLiquidity) continue;

    const optionTicks = snapshot.recent.filter(entry => entry.optionId === optionId);
    if (optionTicks.length < 3) continue;

    const volumes = optionTicks.slice(0, VOLUME_SAMPLE).map(entry => num(entry.volume));
    if (volumes.length < 2) continue;

    const zScore = (volumes[0] - mean(volumes)) / Math.max(sampleStdev(volumes), 1);
    if (zScore < minZ) continue;

    const label = labelFor(snapshot.options, optionId);
    const edge = Math.max(0, price - minPrice);
    const left = remaining.toFixed(1);

    return {
      score: ruleScore(rule, 60, {
        time_to_end: minutesLimit - remaining,
        liquidity: liquidity / 10,
        vol_surge: zScore * 10,
      }),
      message: formatMessage(rule, snapshot.market, `${label} trades at ${price.toFixed(2)} with ${left}m left`, context.detailBaseUrl),
      optionId,
      edgeScore: edge,
      payload: {
        bookSnapshot: bookSnapshot(snapshot.options, snapshot.latest),
        suggestedTrade: tradePlan(
          'endgame_sweep',
          `Buy ${label} at ${price.toFixed(2)} with ${left}m to expiry (z=${zScore.toFixed(2)})`,
          [buildTradeLeg(snapshot.market.id, optionId, 'buy', price, context.slippageBps, { label })],
          edge * 10000
        ),
        details: { price, minutesToEnd: remaining, zScore },
      },
    };
  }

  return null;
};
