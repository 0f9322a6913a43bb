import { MarketDetector } from './types';
import { buildTradeLeg, formatMessage, num, param, primaryOption, tradePlan } from './detectorHelpers';
import { extractFeatures } from '../services/FeatureExtractor';

/**
 * Follows the side of a lopsided book when the spread is tight. Reads
 * `sizeImbalance` and `spread` from the feature extractor.
 */
export const detectOrderBookImbalance: MarketDetector = (rule, snapshot, context) => {
  const features = extractFeatures(snapshot.market, snapshot.latest, snapshot.recent, snapshot.peerPrices, context.now);
  if (!features) return null;

  const imbalance = features.sizeImbalance;
  const spread = features.spread;
  const threshold = param(rule, 'imbalance_threshold', 0.8);
  const maxSpread = param(rule, 'max_spread', 0.02);
  if (Math.abs(imbalance) <= threshold || spread > maxSpread) return null;

  const primary = primaryOption(snapshot.latest, snapshot.options);
  if (!primary) return null;

  const side = imbalance > 0 ? 'buy' : 'sell';
  const price = num(primary.tick.price);

  return {
    score: 55 + Math.abs(imbalance) * 10,
    message: formatMessage(rule, snapshot.market, `Order book imbalance ${imbalance.toFixed(2)}`, context.detailBaseUrl),
    optionId: primary.optionId,
    edgeScore: Math.abs(imbalance),
    payload: {
      suggestedTrade: tradePlan(
        'orderbook_follow',
        `Imbalance ${imbalance.toFixed(2)} spread ${spread.toFixed(3)}`,
        [buildTradeLeg(snapshot.market.id, primary.optionId, side, price, context.slippageBps, { label: primary.label })],
        (maxSpread - spread) * 10000
      ),
      details: { sizeImbalance: imbalance, spread },
    },
  };
};
