import { extractFeatures, featureVector } from '../../services/FeatureExtractor';
import { MarketDataMocks, NOW } from '../mocks/MarketDataMocks';

function ago(ms: number): Date {
  return new Date(NOW.getTime() - ms);
}

describe('FeatureExtractor', () => {
  const market = MarketDataMocks.market();
  const latest = MarketDataMocks.latest([
    MarketDataMocks.tick({ optionId: 'yes', price: 0.5, volume: 100, bestBid: 0.49, bestAsk: 0.51 }),
    MarketDataMocks.tick({ optionId: 'no', price: 0.4, volume: 300, bestBid: 0.39, bestAsk: 0.43 }),
  ]);
  const recent = [
    MarketDataMocks.tick({ ts: NOW, price: 0.42, bestBid: 0.4, bestAsk: 0.44 }),
    MarketDataMocks.tick({ ts: ago(5_000), price: 0.41, bestBid: 0.4, bestAsk: 0.42 }),
    MarketDataMocks.tick({ ts: ago(12_000), price: 0.38, bestBid: 0.37, bestAsk: 0.39 }),
    MarketDataMocks.tick({ ts: ago(400_000), price: 0.1, bestBid: 0.05, bestAsk: 0.5 }),
  ];

  test('should describe the highest-volume option', () => {
    const row = extractFeatures(market, latest, recent, [0.3, 0.5], NOW);

    expect(row).not.toBeNull();
    if (!row) return;
    expect(row.midPrice).toBeCloseTo(0.41, 10);
    expect(row.spread).toBeCloseTo(0.04, 10);
    expect(row.volume).toBe(300);
    expect(row.bestBidSize).toBe(300);
    expect(row.sizeImbalance).toBe(0);
    expect(row.timeToExpiryMinutes).toBe(120);
    expect(row.daysToExpiry).toBeCloseTo(1 / 12, 10);
  });

  test('should derive windowed statistics from recent ticks', () => {
    const row = extractFeatures(market, latest, recent, [0.3, 0.5], NOW);

    expect(row?.zscoreSpread5m).toBeCloseTo(2 / Math.sqrt(3), 6);
    expect(row?.priceVelocity10s).toBeCloseTo(0.04, 10);
    expect(row?.volatility5m).toBeCloseTo(0.020817, 5);
    expect(row?.synonymPriceDeltaZscore).toBeCloseTo(0.01 / Math.sqrt(0.02), 6);
  });

  test('should default history-based features to zero', () => {
    const row = extractFeatures(MarketDataMocks.market({ endsAt: null }), latest, [], [], NOW);

    expect(row).toEqual(expect.objectContaining({
      zscoreSpread5m: 0,
      priceVelocity10s: 0,
      volatility5m: 0,
      synonymPriceDeltaZscore: 0,
      timeToExpiryMinutes: 0,
      daysToExpiry: 0,
    }));
  });

  test('should return null without ticks or with a non-finite feature', () => {
    expect(extractFeatures(market, new Map(), recent, [], NOW)).toBeNull();
    expect(extractFeatures(MarketDataMocks.market({ endsAt: new Date(Number.NaN) }), latest, recent, [], NOW)).toBeNull();
  });

  test('should order the vector by feature name', () => {
    const row = extractFeatures(market, latest, [], [], NOW);
    if (!row) throw new Error('expected a feature row');

    const vector = featureVector(row);

    expect(vector).toHaveLength(12);
    expect(vector.slice(2, 6)).toEqual([300, 300, 300, 0]);
    expect(vector[8]).toBe(120);
  });
});
