import { MarketDetector } from './types';
import { buildTradeLeg, formatMessage, mapCryptoSymbol, num, param, primaryOption, ruleScore, tradePlan } from './detectorHelpers';

/**
 * A fast move on the spot feed that the prediction market has not priced
 * yet. Skips when the market's primary option already drifted away from
 * its newest recent tick.
 */
export const detectCryptoLeadLag: MarketDetector = (rule, snapshot, context) => {
  const symbol = mapCryptoSymbol(snapshot.market.title);
  if (!symbol || !context.cryptoFeed) return null;

  const quote = context.cryptoFeed.getReturn(symbol);
  if (!quote) return null;

  const threshold = param(rule, 'return_threshold', 0.003);
  const driftThreshold = param(rule, 'poly_drift_threshold', 0.002);
  if (Math.abs(quote.return1s) < threshold) return null;

  const primary = primaryOption(snapshot.latest, snapshot.options);
  if (!primary) return null;

  const marketPrice = num(primary.tick.price);
  const recentTick = snapshot.recent.find(tick => tick.optionId === primary.optionId);
  if (recentTick && Math.abs(marketPrice - num(recentTick.price)) > driftThreshold) {
    return null;
  }

  const latencyGapSecs = Math.abs(quote.ts - primary.tick.ts.getTime()) / 1000;
  const side = quote.return1s > 0 ? 'buy' : 'sell';
  const returnText = (quote.return1s * 100).toFixed(2);

  return {
    score: ruleScore(rule, 55, {
      momentum: Math.abs(quote.return1s) * 1000,
      liquidity: num(primary.tick.liquidity) / 10,
    }),
    message: formatMessage(rule, snapshot.market, `${symbol} lead-lag ${returnText}%`, context.detailBaseUrl),
    optionId: primary.optionId,
    edgeScore: Math.abs(quote.return1s),
    payload: {
      suggestedTrade: tradePlan(
        'lead_lag_follow',
        `${symbol} 1s return ${returnText}% vs prediction market lag`,
        [buildTradeLeg(snapshot.market.id, primary.optionId, side, marketPrice, context.slippageBps, { label: primary.label })],
        Math.abs(quote.return1s) * 10000
      ),
      details: {
        symbol,
        spotPrice: quote.price,
        marketPrice,
        latencyGapSecs,
      },
    },
  };
};
