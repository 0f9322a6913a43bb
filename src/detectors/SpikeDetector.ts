import { Tick } from '../types';
import { MarketDetector } from './types';
import { bookSnapshot, buildTradeLeg, formatMessage, labelFor, num, param, ruleScore, tradePlan } from './detectorHelpers';

/**
 * Percent move of one option between the oldest and newest tick inside the
 * trailing window. Options are scanned in order of first appearance and the
 * first one past the threshold wins.
 */
export const detectSpike: MarketDetector = (rule, snapshot, context) => {
  const windowSecs = param(rule, 'window_secs', 10);
  const pctThreshold = param(rule, 'pct_change_gt', 0.03);
  const minLiquidity = param(rule, 'min_liquidity', 0);

  const nowMs = context.now.getTime();
  const inWindow = snapshot.recent
    .filter(tick => (nowMs - tick.ts.getTime()) / 1000 <= windowSecs)
    .reverse();
  if (inWindow.length === 0) return null;

  const byOption = new Map<string, Tick[]>();
  for (const tick of inWindow) {
    const series = byOption.get(tick.optionId);
    if (series) series.push(tick);
    else byOption.set(tick.optionId, [tick]);
  }

  for (const [optionId, series] of byOption) {
    if (series.length < 2) continue;

    const startPrice = num(series[0].price);
    const endPrice = num(series[series.length - 1].price);
    const pctChange = (endPrice - startPrice) / Math.max(startPrice, 0.01);
    const latest = snapshot.latest.get(optionId);
    const liquidity = num(latest?.liquidity);

    if (Math.abs(pctChange) < pctThreshold || liquidity < minLiquidity) {
      continue;
    }

    const up = pctChange > 0;
    const direction = up ? 'up' : 'down';
    const label = labelFor(snapshot.options, optionId);
    const pctText = (pctChange * 100).toFixed(2);

    const score = ruleScore(rule, 50, {
      velocity: Math.abs(pctChange) * 100,
      liquidity: liquidity / 10,
      spread: 1,
    });

    return {
      score,
      message: formatMessage(rule, snapshot.market, `${label} ${direction} ${pctText}%/${windowSecs}s`, context.detailBaseUrl),
      optionId,
      edgeScore: Math.abs(pctChange),
      payload: {
        bookSnapshot: bookSnapshot(snapshot.options, snapshot.latest),
        suggestedTrade: tradePlan(
          up ? 'momentum_follow' : 'mean_revert',
          `${label} moved ${pctText}% over ${windowSecs}s (${direction})`,
          [buildTradeLeg(snapshot.market.id, optionId, up ? 'buy' : 'sell', num(latest?.price), context.slippageBps, { label })],
          Math.abs(pctChange) * 10000
        ),
        details: { pctChange, windowSecs },
      },
    };
  }

  return null;
};
