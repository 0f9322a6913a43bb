import { MockMarketSource, seededRandom } from '../../services/MockMarketSource';
import { NOW } from '../mocks/MarketDataMocks';

describe('MockMarketSource', () => {
  const clock = () => NOW;

  test('should draw the same sequence for the same seed', () => {
    const first = seededRandom(42);
    const second = seededRandom(42);
    const draws = Array.from({ length: 5 }, () => first());

    expect(Array.from({ length: 5 }, () => second())).toEqual(draws);
    draws.forEach(value => {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    });
  });

  test('should list markets relative to the clock', async () => {
    const source = new MockMarketSource({ seed: 7, clock });

    const listed = await source.listMarkets(10);

    expect(listed.map(entry => entry.market.id)).toEqual(['mock-election', 'mock-fed', 'mock-endgame']);
    expect(listed[1].options.map(option => option.id)).toEqual(['fed_hike', 'fed_hold', 'fed_cut']);
    expect(listed[2].market.endsAt).toEqual(new Date(NOW.getTime() + 25 * 60 * 1000));
    expect(listed[0].market.platform).toBe('mock');
    expect(listed[0].market.embedding).toBeUndefined();
    expect(await source.listMarkets(1)).toHaveLength(1);
  });

  test('should attach title embeddings on request', async () => {
    const source = new MockMarketSource({ seed: 7, clock, withEmbeddings: true, platform: 'polymarket' });

    const [first] = await source.listMarkets(1);

    expect(first.market.platform).toBe('polymarket');
    expect(first.market.embedding).toHaveLength(64);
  });

  test('should replay identical ticks for the same seed', async () => {
    const ids = ['mock-election', 'mock-fed', 'mock-endgame'];
    const a = new MockMarketSource({ seed: 11, clock });
    const b = new MockMarketSource({ seed: 11, clock });

    for (let round = 0; round < 3; round++) {
      expect(await a.pollTicks(ids)).toEqual(await b.pollTicks(ids));
    }
  });

  test('should emit one bounded tick per option of known markets', async () => {
    const source = new MockMarketSource({ seed: 3, clock });

    const ticks = await source.pollTicks(['mock-fed', 'unknown']);

    expect(ticks.map(tick => tick.optionId)).toEqual(['fed_hike', 'fed_hold', 'fed_cut']);
    for (const tick of ticks) {
      expect(tick.ts).toBe(NOW);
      expect(tick.price).toBeGreaterThanOrEqual(0.01);
      expect(tick.price).toBeLessThanOrEqual(0.99);
      expect(tick.bestBid).toBeLessThan(tick.bestAsk);
      expect(tick.liquidity).toBeGreaterThanOrEqual(150);
    }
  });
});
