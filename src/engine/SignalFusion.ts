import { FusedSignal, MlCandidate, RuleCandidate, SignalSource } from '../types';

export interface FusionWeights {
  /** Multiplier on `confidence * 100` for ML candidates. */
  confidenceWeight: number;
  /** Flat edge added when a rule fired for the market. */
  ruleBonus: number;
}

/**
 * Collapse rule and ML candidates to one signal per market.
 *
 * The strongest rule candidate per market wins (ties keep the first seen);
 * the last ML candidate per market wins. Markets are returned in the order
 * they first appear among rule candidates, then ML-only markets.
 */
export function fuseSignals(
  ruleCandidates: RuleCandidate[],
  mlCandidates: MlCandidate[],
  weights: FusionWeights
): FusedSignal[] {
  const ruleMap = new Map<string, RuleCandidate>();
  for (const candidate of ruleCandidates) {
    const existing = ruleMap.get(candidate.marketId);
    if (!existing || candidate.draft.score > existing.draft.score) {
      ruleMap.set(candidate.marketId, candidate);
    }
  }

  const mlMap = new Map<string, MlCandidate>();
  for (const candidate of mlCandidates) {
    mlMap.set(candidate.marketId, candidate);
  }

  const marketIds = [...ruleMap.keys()];
  for (const marketId of mlMap.keys()) {
    if (!ruleMap.has(marketId)) marketIds.push(marketId);
  }

  return marketIds.map(marketId => fuseOne(marketId, ruleMap.get(marketId), mlMap.get(marketId), weights));
}

function fuseOne(
  marketId: string,
  ruleEntry: RuleCandidate | undefined,
  mlEntry: MlCandidate | undefined,
  weights: FusionWeights
): FusedSignal {
  const reasonParts: string[] = [];
  let edge = 0;
  let source: SignalSource = 'rule';

  if (mlEntry) {
    edge += mlEntry.confidence * 100 * weights.confidenceWeight;
    reasonParts.push(mlEntry.reason);
    source = 'ml';
  }

  if (ruleEntry) {
    const { draft } = ruleEntry;
    edge += weights.ruleBonus;
    reasonParts.push(draft.message);
    const rationale = draft.payload.suggestedTrade?.rationale;
    if (rationale) reasonParts.push(rationale);
    if (mlEntry) source = 'hybrid';

    return {
      marketId,
      rule: ruleEntry.rule,
      optionId: draft.optionId,
      message: draft.message,
      score: draft.score,
      edgeScore: edge,
      level: null,
      payload: { ...draft.payload, details: { ...draft.payload.details } },
      source,
      confidence: mlEntry ? mlEntry.confidence : null,
      features: mlEntry ? mlEntry.features : null,
      reason: reasonParts.join('; '),
    };
  }

  return {
    marketId,
    rule: null,
    message: mlEntry ? mlEntry.reason : 'ML signal',
    score: edge,
    edgeScore: edge,
    level: 'P2',
    payload: { details: {} },
    source,
    confidence: mlEntry ? mlEntry.confidence : null,
    features: mlEntry ? mlEntry.features : null,
    reason: reasonParts.length > 0 ? reasonParts.join('; ') : null,
  };
}
