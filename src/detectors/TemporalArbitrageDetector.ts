import { MarketDetector } from './types';
import { buildTradeLeg, formatMessage, normalizeTitle, num, param, primaryOption, tradePlan } from './detectorHelpers';

/**
 * Two synonym peers with the same normalized title and different expiries.
 * Fires when the nearer market's primary price exceeds the farther one's by
 * more than `spread_gt`; sells near, buys far.
 */
export const detectTemporalArbitrage: MarketDetector = (rule, snapshot, context) => {
  const market = snapshot.market;
  if (snapshot.synonymIds.length === 0 || !market.endsAt) return null;

  const baseTitle = normalizeTitle(market.title);
  const threshold = param(rule, 'spread_gt', 0.02);

  for (const peerId of snapshot.synonymIds) {
    const peer = context.snapshots.get(peerId);
    if (!peer || !peer.market.endsAt) continue;
    if (normalizeTitle(peer.market.title) !== baseTitle) continue;

    const [near, far] = peer.market.endsAt.getTime() < market.endsAt.getTime()
      ? [peer, snapshot]
      : [snapshot, peer];

    const nearOption = primaryOption(near.latest, near.options);
    const farOption = primaryOption(far.latest, far.options);
    if (!nearOption || !farOption) continue;

    const nearPrice = num(nearOption.tick.price);
    const farPrice = num(farOption.tick.price);
    const gap = nearPrice - farPrice;
    if (gap <= threshold) continue;

    const gapText = (gap * 100).toFixed(2);

    return {
      score: 60 + gap * 500,
      message: formatMessage(rule, market, `Temporal arbitrage ${gapText}%`, context.detailBaseUrl),
      edgeScore: gap,
      payload: {
        gap,
        suggestedTrade: tradePlan(
          'temporal_spread',
          `Sell ${near.market.id} buy ${far.market.id} gap ${gapText}%`,
          [
            buildTradeLeg(near.market.id, nearOption.optionId, 'sell', nearPrice, context.slippageBps, { label: nearOption.label }),
            buildTradeLeg(far.market.id, farOption.optionId, 'buy', farPrice, context.slippageBps, { label: farOption.label }),
          ],
          gap * 10000
        ),
        details: { nearMarket: near.market.id, farMarket: far.market.id },
      },
    };
  }

  return null;
};
