import { MarketDetector } from './types';
import { bookSnapshot, buildTradeLeg, formatMessage, labelFor, num, param, ruleScore, tradePlan } from './detectorHelpers';
import { mean } from '../statistics/StatisticalModels';

/**
 * Latest price against the mean of a longer lookback window. Needs
 * `min_points` observations of the option inside the window.
 */
export const detectTrendBreakout: MarketDetector = (rule, snapshot, context) => {
  const lookbackSecs = param(rule, 'lookback_secs', 300);
  const minPoints = param(rule, 'min_points', 5);
  const threshold = param(rule, 'deviation_gt', 0.05);
  const minLiquidity = param(rule, 'min_liquidity', 0);

  const nowMs = context.now.getTime();
  const window = snapshot.recent.filter(tick => (nowMs - tick.ts.getTime()) / 1000 <= lookbackSecs);

  for (const [optionId, latest] of snapshot.latest) {
    const prices = window.filter(tick => tick.optionId === optionId).map(tick => num(tick.price));
    if (prices.length < minPoints) continue;

    const liquidity = num(latest.liquidity);
    if (liquidity < minLiquidity) continue;

    const price = num(latest.price);
    const avg = mean(prices);
    const deviation = (price - avg) / Math.max(avg, 0.01);
    if (Math.abs(deviation) <= threshold) continue;

    const up = deviation > 0;
    const label = labelFor(snapshot.options, optionId);
    const devText = (deviation * 100).toFixed(2);

    return {
      score: ruleScore(rule, 55, {
        breakout: Math.abs(deviation) * 100,
        liquidity: liquidity / 10,
      }),
      message: formatMessage(
        rule,
        snapshot.market,
        `${label} broke ${up ? 'above' : 'below'} ${lookbackSecs}s mean by ${devText}%`,
        context.detailBaseUrl
      ),
      optionId,
      edgeScore: Math.abs(deviation),
      payload: {
        bookSnapshot: bookSnapshot(snapshot.options, snapshot.latest),
        suggestedTrade: tradePlan(
          'trend_follow',
          `${label} at ${price.toFixed(3)} vs mean ${avg.toFixed(3)} over ${prices.length} points`,
          [buildTradeLeg(snapshot.market.id, optionId, up ? 'buy' : 'sell', price, context.slippageBps, { label })],
          Math.abs(price - avg) * 10000
        ),
        details: { deviation, mean: avg, points: prices.length, lookbackSecs },
      },
    };
  }

  return null;
};
