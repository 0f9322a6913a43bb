/**
 * Weighted score: `base + Σ weight·metric`, clamped to [0, 100] and rounded
 * to 2 decimals. Metrics missing from `metrics` contribute nothing.
 */
export function computeScore(
  base: number,
  weights: Record<string, number>,
  metrics: Record<string, number>
): number {
  let score = base;
  for (const [key, weight] of Object.entries(weights)) {
    const value = metrics[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
      score += weight * value;
    }
  }

  const clamped = Math.max(0, Math.min(100, score));
  return Math.round(clamped * 100) / 100;
}
