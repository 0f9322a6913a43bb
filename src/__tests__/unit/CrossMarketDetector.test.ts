import { detectCrossMarket, labelledOptions } from '../../detectors/CrossMarketDetector';
import { SynonymGroup } from '../../types';
import { MarketDataMocks } from '../mocks/MarketDataMocks';

describe('CROSS_MARKET_MISPRICE', () => {
  const leaderMarket = MarketDataMocks.market({ id: 'm-a', title: 'Candidate A wins (exchange one)' });
  const laggardMarket = MarketDataMocks.market({ id: 'm-b', title: 'Candidate A wins (exchange two)' });

  const leader = MarketDataMocks.snapshot(leaderMarket, [MarketDataMocks.option('m-a', 'a_yes', 'Yes')], [
    MarketDataMocks.tick({ marketId: 'm-a', optionId: 'a_yes', price: 0.3 }),
  ]);
  const laggard = MarketDataMocks.snapshot(laggardMarket, [MarketDataMocks.option('m-b', 'b_yes', 'Yes')], [
    MarketDataMocks.tick({ marketId: 'm-b', optionId: 'b_yes', price: 0.15 }),
  ]);
  const group: SynonymGroup = { name: 'candidate-a', method: 'keyword', members: ['m-a', 'm-b'] };

  test('should attribute the gap to the cheaper market', () => {
    const rule = MarketDataMocks.rule('CROSS_MARKET_MISPRICE');
    const signals = detectCrossMarket(rule, [group], MarketDataMocks.context([leader, laggard]));

    expect(signals).toHaveLength(1);
    const [{ marketId, draft }] = signals;
    expect(marketId).toBe('m-b');
    expect(draft.optionId).toBe('b_yes');
    expect(draft.score).toBe(65);
    expect(draft.edgeScore).toBeCloseTo(0.15, 10);
    expect(draft.payload.gap).toBeCloseTo(0.15, 10);
    expect(draft.payload.details.leader).toBe('m-a');
    expect(draft.payload.details.laggard).toBe('m-b');
    expect(draft.message).toContain('Yes misprice 15.00%');
  });

  test('should buy the laggard and sell the leader', () => {
    const rule = MarketDataMocks.rule('CROSS_MARKET_MISPRICE');
    const [signal] = detectCrossMarket(rule, [group], MarketDataMocks.context([leader, laggard]));
    const legs = signal.draft.payload.suggestedTrade?.legs ?? [];

    expect(legs.map(leg => [leg.marketId, leg.side])).toEqual([['m-b', 'buy'], ['m-a', 'sell']]);
    expect(legs[0].limitPrice).toBeCloseTo(0.1515, 10);
    expect(legs[1].limitPrice).toBeCloseTo(0.297, 10);
  });

  test('should skip gaps under the threshold', () => {
    const rule = MarketDataMocks.rule('CROSS_MARKET_MISPRICE', { params: { price_diff_threshold: 0.2 } });

    expect(detectCrossMarket(rule, [group], MarketDataMocks.context([leader, laggard]))).toEqual([]);
  });

  test('should skip groups with too few snapshotted members', () => {
    const rule = MarketDataMocks.rule('CROSS_MARKET_MISPRICE');

    expect(detectCrossMarket(rule, [group], MarketDataMocks.context([leader]))).toEqual([]);
  });

  test('should keep the more liquid option when labels collide', () => {
    const market = MarketDataMocks.market({ id: 'm-c' });
    const snapshot = MarketDataMocks.snapshot(
      market,
      [MarketDataMocks.option('m-c', 'c_one', 'Yes'), MarketDataMocks.option('m-c', 'c_two', 'yes')],
      [
        MarketDataMocks.tick({ marketId: 'm-c', optionId: 'c_one', price: 0.4, liquidity: 100 }),
        MarketDataMocks.tick({ marketId: 'm-c', optionId: 'c_two', price: 0.6, liquidity: 900 }),
      ]
    );

    const labelled = labelledOptions(snapshot);

    expect(labelled.size).toBe(1);
    expect(labelled.get('yes')?.optionId).toBe('c_two');
  });
});
