import { MarketDetector } from './types';
import { buildTradeLeg, formatMessage, num, param, primaryOption, tradePlan } from './detectorHelpers';
import { extractFeatures } from '../services/FeatureExtractor';

/**
 * Buys into a sharp short-term drop when the model still rates the outcome
 * likely. Needs a model.
 */
export const detectVolatilityHarvest: MarketDetector = (rule, snapshot, context) => {
  if (!context.ml) return null;

  const features = extractFeatures(snapshot.market, snapshot.latest, snapshot.recent, snapshot.peerPrices, context.now);
  if (!features) return null;

  const dropThreshold = param(rule, 'drop_threshold', -0.05);
  const spreadLimit = param(rule, 'spread_limit', 0.1);
  const minLiquidity = param(rule, 'min_liquidity', 1000);
  const minConfidence = param(rule, 'ml_min_confidence', 0.6);

  const mid = features.midPrice;
  const dropPct = features.priceVelocity10s / Math.max(mid, 1e-6);
  if (dropPct >= dropThreshold || features.spread > spreadLimit) return null;

  const primary = primaryOption(snapshot.latest, snapshot.options);
  if (!primary || num(primary.tick.liquidity) < minLiquidity) return null;

  const probabilities = context.ml.predictProbabilities([features]);
  if (probabilities.length === 0) return null;
  const probability = probabilities[0];
  if (probability < minConfidence) return null;

  const fairValueGap = probability - mid;
  const dropText = (dropPct * 100).toFixed(2);

  return {
    score: 60 + probability * 20,
    message: formatMessage(rule, snapshot.market, `Volatility harvest ${dropText}% drop`, context.detailBaseUrl),
    optionId: primary.optionId,
    edgeScore: Math.abs(fairValueGap),
    payload: {
      suggestedTrade: tradePlan(
        'volatility_harvest',
        `Drop ${dropText}% but ML confidence ${(probability * 100).toFixed(1)}%`,
        [buildTradeLeg(snapshot.market.id, primary.optionId, 'buy', mid, context.slippageBps, { label: primary.label })],
        fairValueGap * 10000,
        probability
      ),
      details: { dropPct, mlConfidence: probability, fairValueGap },
    },
  };
};
