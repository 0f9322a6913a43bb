import { MarketDetector } from './types';
import { bookSnapshot, buildTradeLeg, formatMessage, num, param, ruleScore, tradePlan } from './detectorHelpers';

/**
 * Fires when the latest prices of all options sum below `sum_price_lt`:
 * buying every leg costs less than the guaranteed payout.
 */
export const detectDutchBook: MarketDetector = (rule, snapshot, context) => {
  const ticks = Array.from(snapshot.latest.values());
  if (ticks.length === 0) return null;

  const threshold = param(rule, 'sum_price_lt', 0.995);
  const minLiquidityFloor = param(rule, 'min_liquidity', 0);

  const total = ticks.reduce((sum, tick) => sum + num(tick.price), 0);
  const minLiquidity = Math.min(...ticks.map(tick => num(tick.liquidity)));
  if (total >= threshold || minLiquidity < minLiquidityFloor) {
    return null;
  }

  const edge = Math.max(0, 1 - total);
  const avgSpread = ticks.reduce((sum, tick) => sum + Math.max(0, num(tick.bestAsk) - num(tick.bestBid)), 0) / ticks.length;

  const score = ruleScore(rule, 75, {
    liquidity: minLiquidity / 10,
    spread: 1 / Math.max(avgSpread, 0.01),
    edge: edge * 100,
  });

  const marketId = snapshot.market.id;
  const legs = ticks.map(tick => buildTradeLeg(marketId, tick.optionId, 'buy', tick.price, context.slippageBps));
  const edgePct = (edge * 100).toFixed(2);

  return {
    score,
    message: formatMessage(rule, snapshot.market, `Dutch edge ${edgePct}% (sum=${total.toFixed(3)})`, context.detailBaseUrl),
    edgeScore: edge,
    payload: {
      estimatedEdgeBps: edge * 10000,
      bookSnapshot: bookSnapshot(snapshot.options, snapshot.latest),
      suggestedTrade: tradePlan(
        'dutch_book_basket',
        `Allocate across ${legs.length} legs to capture ${edgePct}% Dutch edge`,
        legs,
        edge * 10000
      ),
      details: {
        totalPrice: total,
        edge,
        legs: ticks.map(tick => ({ optionId: tick.optionId, price: num(tick.price), liquidity: num(tick.liquidity) })),
      },
    },
  };
};
