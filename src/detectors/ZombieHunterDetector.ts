import { MarketDetector } from './types';
import { buildTradeLeg, formatMessage, num, param, primaryOption, tradePlan } from './detectorHelpers';
import { extractFeatures } from '../services/FeatureExtractor';

/**
 * Sells a cheap tail outcome close to expiry that the model rates as
 * practically impossible. Needs a model.
 */
export const detectZombieHunter: MarketDetector = (rule, snapshot, context) => {
  if (!context.ml) return null;

  const features = extractFeatures(snapshot.market, snapshot.latest, snapshot.recent, snapshot.peerPrices, context.now);
  if (!features) return null;

  const maxPrice = param(rule, 'max_price', 0.03);
  const minLiquidity = param(rule, 'min_liquidity', 500);
  const expiryLimit = param(rule, 'expiry_days_limit', 7);
  const maxConfidence = param(rule, 'ml_max_confidence', 0.01);

  const primary = primaryOption(snapshot.latest, snapshot.options);
  if (!primary) return null;

  const price = num(primary.tick.price);
  if (price > maxPrice || num(primary.tick.liquidity) < minLiquidity) return null;

  const daysToExpiry = features.daysToExpiry;
  if (daysToExpiry > expiryLimit) return null;

  const probabilities = context.ml.predictProbabilities([features]);
  if (probabilities.length === 0) return null;
  const probability = probabilities[0];
  if (probability >= maxConfidence) return null;

  return {
    score: 50 + (1 - probability) * 25,
    message: formatMessage(rule, snapshot.market, `Zombie Hunter: expiry ${daysToExpiry.toFixed(1)}d`, context.detailBaseUrl),
    optionId: primary.optionId,
    edgeScore: price - probability,
    payload: {
      suggestedTrade: tradePlan(
        'zombie_hunter',
        `Sell overpriced tail risk (${price.toFixed(3)}, model ${probability.toFixed(3)})`,
        [buildTradeLeg(snapshot.market.id, primary.optionId, 'sell', price, context.slippageBps, { label: primary.label })],
        (price - probability) * 10000,
        1 - probability
      ),
      details: { daysToExpiry, impliedProb: price, modelProb: probability },
    },
  };
};
