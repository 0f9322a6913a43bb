import { Market, MarketSnapshot } from '../types';
import { GroupDetector, GroupSignal } from './types';
import {
  bookSnapshot,
  buildTradeLeg,
  formatMessage,
  minutesToEnd,
  num,
  param,
  ruleScore,
  tradePlan,
} from './detectorHelpers';

interface LabelledOption {
  market: Market;
  optionId: string;
  label: string;
  price: number;
  liquidity: number;
}

interface PairCandidate {
  gap: number;
  leader: LabelledOption;
  laggard: LabelledOption;
  label: string;
  liquidity: number;
}

/**
 * Latest options of a market keyed by lower-cased label. When two options
 * share a label the more liquid one is kept.
 */
export function labelledOptions(snapshot: MarketSnapshot): Map<string, LabelledOption> {
  const labels = new Map<string, string>();
  for (const option of snapshot.options) {
    const label = (option.label || option.id).trim();
    if (label) labels.set(option.id, label);
  }

  const entries = new Map<string, LabelledOption>();
  for (const [optionId, tick] of snapshot.latest) {
    const label = labels.get(optionId) ?? optionId;
    const key = label.toLowerCase();
    const liquidity = num(tick.liquidity);
    const existing = entries.get(key);
    if (existing && liquidity <= existing.liquidity) continue;

    entries.set(key, {
      market: snapshot.market,
      optionId,
      label,
      price: num(tick.price),
      liquidity,
    });
  }
  return entries;
}

/**
 * For each synonym group, the single widest same-label price gap between
 * two member markets. The signal is attributed to the cheaper (laggard)
 * market: buy the laggard, sell the leader.
 */
export const detectCrossMarket: GroupDetector = (rule, groups, context) => {
  const minSize = param(rule, 'group_min_size', 2);
  const gapThreshold = param(rule, 'price_diff_threshold', 0.05);
  const minLiquidity = param(rule, 'min_liquidity', 0);
  const signals: GroupSignal[] = [];

  for (const group of groups) {
    const members: Map<string, LabelledOption>[] = [];
    for (const marketId of group.members) {
      const snapshot = context.snapshots.get(marketId);
      if (!snapshot) continue;
      const labelled = labelledOptions(snapshot);
      if (labelled.size > 0) members.push(labelled);
    }
    if (members.length < minSize) continue;

    let best: PairCandidate | null = null;
    for (let i = 0; i < members.length; i++) {
      for (let j = i + 1; j < members.length; j++) {
        for (const [labelKey, optionA] of members[i]) {
          const optionB = members[j].get(labelKey);
          if (!optionB) continue;

          const liquidity = Math.min(optionA.liquidity, optionB.liquidity);
          if (liquidity < minLiquidity) continue;

          const gap = Math.abs(optionA.price - optionB.price);
          if (gap < gapThreshold) continue;

          const [leader, laggard] = optionA.price >= optionB.price ? [optionA, optionB] : [optionB, optionA];
          if (!best || gap > best.gap) {
            best = { gap, leader, laggard, label: optionA.label, liquidity };
          }
        }
      }
    }
    if (!best) continue;

    const { leader, laggard, label, gap } = best;
    const gapText = (gap * 100).toFixed(2);
    const laggardSnapshot = context.snapshots.get(laggard.market.id);

    const score = ruleScore(rule, 65, {
      gap: gap * 100,
      liquidity: best.liquidity / 10,
      time_to_end: (minutesToEnd(laggard.market, context.now) ?? 0) / 10,
    });

    signals.push({
      marketId: laggard.market.id,
      draft: {
        score,
        message: formatMessage(
          rule,
          laggard.market,
          `${label} misprice ${gapText}% (${leader.market.title} vs ${laggard.market.title})`,
          context.detailBaseUrl
        ),
        optionId: laggard.optionId,
        edgeScore: gap,
        payload: {
          gap,
          estimatedEdgeBps: gap * 10000,
          bookSnapshot: laggardSnapshot ? bookSnapshot(laggardSnapshot.options, laggardSnapshot.latest) : [],
          suggestedTrade: tradePlan(
            'cross_market_pair',
            `Buy ${laggard.market.title} (${laggard.market.id}) ${label} and sell ` +
              `${leader.market.title} (${leader.market.id}) ${label} gap ${gapText}%`,
            [
              buildTradeLeg(laggard.market.id, laggard.optionId, 'buy', laggard.price, context.slippageBps, { label }),
              buildTradeLeg(leader.market.id, leader.optionId, 'sell', leader.price, context.slippageBps, { label }),
            ],
            gap * 10000
          ),
          details: {
            leader: leader.market.id,
            laggard: laggard.market.id,
            targetLabel: label,
            comparables: [
              { marketId: leader.market.id, title: leader.market.title, price: leader.price, liquidity: leader.liquidity, role: 'leader', label },
              { marketId: laggard.market.id, title: laggard.market.title, price: laggard.price, liquidity: laggard.liquidity, role: 'laggard', label },
            ],
          },
        },
      },
    });
  }

  return signals;
};
