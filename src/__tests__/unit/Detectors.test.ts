import { detectDutchBook } from '../../detectors/DutchBookDetector';
import { detectSpike } from '../../detectors/SpikeDetector';
import { detectTrendBreakout } from '../../detectors/TrendBreakoutDetector';
import { detectEndgameSweep } from '../../detectors/EndgameSweepDetector';
import { detectOrderBookImbalance } from '../../detectors/OrderBookImbalanceDetector';
import { detectCryptoLeadLag } from '../../detectors/CryptoLeadLagDetector';
import { detectTemporalArbitrage } from '../../detectors/TemporalArbitrageDetector';
import { detectVolatilityHarvest } from '../../detectors/VolatilityHarvestDetector';
import { detectZombieHunter } from '../../detectors/ZombieHunterDetector';
import { MARKET_DETECTORS } from '../../detectors/DetectorRegistry';
import { DETECTOR_KINDS } from '../../types';
import { CryptoFeed, MLPredictor } from '../../services/interfaces';
import { MarketDataMocks, NOW } from '../mocks/MarketDataMocks';

const secondsAgo = (secs: number) => new Date(NOW.getTime() - secs * 1000);
const fixedModel = (probability: number): MLPredictor => ({
  predictProbabilities: rows => rows.map(() => probability),
});

describe('Market detectors', () => {
  const market = MarketDataMocks.market();
  const options = [
    MarketDataMocks.option(market.id, 'yes', 'Yes'),
    MarketDataMocks.option(market.id, 'no', 'No'),
  ];

  describe('DUTCH_BOOK_DETECT', () => {
    test('should fire when option prices sum below the threshold', () => {
      const rule = MarketDataMocks.rule('DUTCH_BOOK_DETECT');
      const snapshot = MarketDataMocks.snapshot(market, options, [
        MarketDataMocks.tick({ optionId: 'yes', price: 0.4 }),
        MarketDataMocks.tick({ optionId: 'no', price: 0.45 }),
      ]);

      const draft = detectDutchBook(rule, snapshot, MarketDataMocks.context([snapshot]));

      expect(draft).not.toBeNull();
      expect(draft?.score).toBe(75);
      expect(draft?.edgeScore).toBeCloseTo(0.15, 10);
      expect(draft?.payload.estimatedEdgeBps).toBeCloseTo(1500, 6);
      expect(draft?.message).toContain('Dutch edge 15.00% (sum=0.850)');
      expect(draft?.payload.suggestedTrade?.action).toBe('dutch_book_basket');
      expect(draft?.payload.suggestedTrade?.legs.map(leg => leg.side)).toEqual(['buy', 'buy']);
      expect(draft?.payload.suggestedTrade?.legs[0].limitPrice).toBeCloseTo(0.404, 10);
      expect(draft?.payload.bookSnapshot?.map(entry => entry.label)).toEqual(['No', 'Yes']);
    });

    test('should apply score weights from the rule document', () => {
      const rule = MarketDataMocks.rule('DUTCH_BOOK_DETECT', {
        outputs: { level: 'P1', score: { base: 70, weights: { edge: 1 } } },
      });
      const snapshot = MarketDataMocks.snapshot(market, options, [
        MarketDataMocks.tick({ optionId: 'yes', price: 0.4 }),
        MarketDataMocks.tick({ optionId: 'no', price: 0.45 }),
      ]);

      expect(detectDutchBook(rule, snapshot, MarketDataMocks.context())?.score).toBe(85);
    });

    test('should stay quiet for a fairly priced book', () => {
      const rule = MarketDataMocks.rule('DUTCH_BOOK_DETECT');
      const snapshot = MarketDataMocks.snapshot(market, options, [
        MarketDataMocks.tick({ optionId: 'yes', price: 0.5 }),
        MarketDataMocks.tick({ optionId: 'no', price: 0.5 }),
      ]);

      expect(detectDutchBook(rule, snapshot, MarketDataMocks.context())).toBeNull();
    });

    test('should respect the liquidity floor', () => {
      const rule = MarketDataMocks.rule('DUTCH_BOOK_DETECT', { params: { min_liquidity: 600 } });
      const snapshot = MarketDataMocks.snapshot(market, options, [
        MarketDataMocks.tick({ optionId: 'yes', price: 0.4, liquidity: 500 }),
        MarketDataMocks.tick({ optionId: 'no', price: 0.45, liquidity: 900 }),
      ]);

      expect(detectDutchBook(rule, snapshot, MarketDataMocks.context())).toBeNull();
    });

    test('should return null without ticks', () => {
      const rule = MarketDataMocks.rule('DUTCH_BOOK_DETECT');
      const snapshot = MarketDataMocks.snapshot(market, options, []);

      expect(detectDutchBook(rule, snapshot, MarketDataMocks.context())).toBeNull();
    });
  });

  describe('SPIKE_DETECT', () => {
    test('should follow an upward move inside the window', () => {
      const rule = MarketDataMocks.rule('SPIKE_DETECT');
      const latest = MarketDataMocks.tick({ optionId: 'yes', price: 0.55 });
      const snapshot = MarketDataMocks.snapshot(market, options, [latest], [
        latest,
        MarketDataMocks.tick({ optionId: 'yes', price: 0.5, ts: secondsAgo(5) }),
      ]);

      const draft = detectSpike(rule, snapshot, MarketDataMocks.context());

      expect(draft?.optionId).toBe('yes');
      expect(draft?.edgeScore).toBeCloseTo(0.1, 10);
      expect(draft?.payload.suggestedTrade?.action).toBe('momentum_follow');
      expect(draft?.payload.suggestedTrade?.legs[0].side).toBe('buy');
      expect(draft?.message).toContain('Yes up 10.00%/10s');
    });

    test('should fade a downward move', () => {
      const rule = MarketDataMocks.rule('SPIKE_DETECT');
      const latest = MarketDataMocks.tick({ optionId: 'yes', price: 0.45 });
      const snapshot = MarketDataMocks.snapshot(market, options, [latest], [
        latest,
        MarketDataMocks.tick({ optionId: 'yes', price: 0.5, ts: secondsAgo(5) }),
      ]);

      const draft = detectSpike(rule, snapshot, MarketDataMocks.context());

      expect(draft?.payload.suggestedTrade?.action).toBe('mean_revert');
      expect(draft?.payload.suggestedTrade?.legs[0].side).toBe('sell');
    });

    test('should ignore ticks older than the window', () => {
      const rule = MarketDataMocks.rule('SPIKE_DETECT');
      const latest = MarketDataMocks.tick({ optionId: 'yes', price: 0.55 });
      const snapshot = MarketDataMocks.snapshot(market, options, [latest], [
        latest,
        MarketDataMocks.tick({ optionId: 'yes', price: 0.5, ts: secondsAgo(20) }),
      ]);

      expect(detectSpike(rule, snapshot, MarketDataMocks.context())).toBeNull();
    });
  });

  describe('TREND_BREAKOUT', () => {
    test('should fire when the latest price leaves the lookback mean', () => {
      const rule = MarketDataMocks.rule('TREND_BREAKOUT');
      const latest = MarketDataMocks.tick({ optionId: 'yes', price: 0.6 });
      const history = [60, 120, 180, 240].map(secs =>
        MarketDataMocks.tick({ optionId: 'yes', price: 0.5, ts: secondsAgo(secs) })
      );
      const snapshot = MarketDataMocks.snapshot(market, options, [latest], [latest, ...history]);

      const draft = detectTrendBreakout(rule, snapshot, MarketDataMocks.context());

      expect(draft?.message).toContain('Yes broke above 300s mean by 15.38%');
      expect(draft?.payload.suggestedTrade?.legs[0].side).toBe('buy');
      expect(draft?.payload.details.points).toBe(5);
    });

    test('should need min_points observations', () => {
      const rule = MarketDataMocks.rule('TREND_BREAKOUT');
      const latest = MarketDataMocks.tick({ optionId: 'yes', price: 0.6 });
      const snapshot = MarketDataMocks.snapshot(market, options, [latest], [
        latest,
        MarketDataMocks.tick({ optionId: 'yes', price: 0.5, ts: secondsAgo(60) }),
      ]);

      expect(detectTrendBreakout(rule, snapshot, MarketDataMocks.context())).toBeNull();
    });
  });

  describe('ENDGAME_SWEEP', () => {
    const closing = MarketDataMocks.market({ endsAt: new Date(NOW.getTime() + 10 * 60 * 1000) });
    const volumeHistory = [500, 100, 100, 100].map((volume, index) =>
      MarketDataMocks.tick({ marketId: closing.id, optionId: 'yes', price: 0.97, volume, ts: secondsAgo(index * 5) })
    );

    test('should buy the favourite on a volume surge near expiry', () => {
      const rule = MarketDataMocks.rule('ENDGAME_SWEEP');
      const latest = MarketDataMocks.tick({ marketId: closing.id, optionId: 'yes', price: 0.97, liquidity: 800 });
      const snapshot = MarketDataMocks.snapshot(closing, options, [latest], volumeHistory);

      const draft = detectEndgameSweep(rule, snapshot, MarketDataMocks.context());

      expect(draft?.message).toContain('Yes trades at 0.97 with 10.0m left');
      expect(draft?.edgeScore).toBeCloseTo(0.02, 10);
      expect(draft?.payload.details.zScore).toBeCloseTo(1.5, 10);
      expect(draft?.payload.suggestedTrade?.legs[0].side).toBe('buy');
    });

    test('should wait until the final minutes', () => {
      const rule = MarketDataMocks.rule('ENDGAME_SWEEP');
      const later = MarketDataMocks.market({ endsAt: new Date(NOW.getTime() + 45 * 60 * 1000) });
      const latest = MarketDataMocks.tick({ optionId: 'yes', price: 0.97 });
      const snapshot = MarketDataMocks.snapshot(later, options, [latest], volumeHistory);

      expect(detectEndgameSweep(rule, snapshot, MarketDataMocks.context())).toBeNull();
    });
  });

  describe('ORDER_BOOK_IMBALANCE', () => {
    test('should not fire while book sizes are proxied by volume', () => {
      const rule = MarketDataMocks.rule('ORDER_BOOK_IMBALANCE');
      const snapshot = MarketDataMocks.snapshot(market, options, [MarketDataMocks.tick()]);

      expect(detectOrderBookImbalance(rule, snapshot, MarketDataMocks.context())).toBeNull();
    });
  });

  describe('CRYPTO_LEAD_LAG', () => {
    const btcMarket = MarketDataMocks.market({ id: 'btc-mkt', title: 'Will Bitcoin close above 100k?' });
    const feed = (return1s: number): CryptoFeed => ({
      getReturn: symbol => (symbol === 'BTC' ? { price: 100000, return1s, ts: NOW.getTime() } : null),
    });

    test('should follow a spot move the market has not priced', () => {
      const rule = MarketDataMocks.rule('CRYPTO_LEAD_LAG');
      const latest = MarketDataMocks.tick({ marketId: btcMarket.id, optionId: 'yes', price: 0.6 });
      const snapshot = MarketDataMocks.snapshot(btcMarket, options, [latest], [latest]);

      const draft = detectCryptoLeadLag(rule, snapshot, MarketDataMocks.context([], { cryptoFeed: feed(0.005) }));

      expect(draft?.score).toBe(55);
      expect(draft?.message).toContain('BTC lead-lag 0.50%');
      expect(draft?.payload.suggestedTrade?.legs[0].side).toBe('buy');
      expect(draft?.payload.details.latencyGapSecs).toBe(0);
    });

    test('should ignore small spot returns', () => {
      const rule = MarketDataMocks.rule('CRYPTO_LEAD_LAG');
      const latest = MarketDataMocks.tick({ marketId: btcMarket.id, optionId: 'yes', price: 0.6 });
      const snapshot = MarketDataMocks.snapshot(btcMarket, options, [latest], [latest]);

      expect(detectCryptoLeadLag(rule, snapshot, MarketDataMocks.context([], { cryptoFeed: feed(0.001) }))).toBeNull();
    });

    test('should skip markets without a crypto symbol', () => {
      const rule = MarketDataMocks.rule('CRYPTO_LEAD_LAG');
      const snapshot = MarketDataMocks.snapshot(market, options, [MarketDataMocks.tick()]);

      expect(detectCryptoLeadLag(rule, snapshot, MarketDataMocks.context([], { cryptoFeed: feed(0.01) }))).toBeNull();
    });
  });

  describe('TEMPORAL_ARBITRAGE', () => {
    test('should sell the nearer expiry and buy the farther one', () => {
      const rule = MarketDataMocks.rule('TEMPORAL_ARBITRAGE');
      const near = MarketDataMocks.market({
        id: 'near',
        title: 'Will the bill pass?',
        endsAt: new Date(NOW.getTime() + 24 * 60 * 60 * 1000),
      });
      const far = MarketDataMocks.market({
        id: 'far',
        title: 'Will the bill pass?',
        endsAt: new Date(NOW.getTime() + 30 * 24 * 60 * 60 * 1000),
      });
      const nearSnapshot = {
        ...MarketDataMocks.snapshot(near, [MarketDataMocks.option('near', 'near_yes', 'Yes')], [
          MarketDataMocks.tick({ marketId: 'near', optionId: 'near_yes', price: 0.6 }),
        ]),
        synonymIds: ['far'],
      };
      const farSnapshot = MarketDataMocks.snapshot(far, [MarketDataMocks.option('far', 'far_yes', 'Yes')], [
        MarketDataMocks.tick({ marketId: 'far', optionId: 'far_yes', price: 0.5 }),
      ]);

      const draft = detectTemporalArbitrage(rule, nearSnapshot, MarketDataMocks.context([nearSnapshot, farSnapshot]));
      const legs = draft?.payload.suggestedTrade?.legs ?? [];

      expect(draft?.score).toBeCloseTo(110, 6);
      expect(draft?.message).toContain('Temporal arbitrage 10.00%');
      expect(legs.map(leg => [leg.marketId, leg.side])).toEqual([['near', 'sell'], ['far', 'buy']]);
    });

    test('should need synonym peers', () => {
      const rule = MarketDataMocks.rule('TEMPORAL_ARBITRAGE');
      const snapshot = MarketDataMocks.snapshot(market, options, [MarketDataMocks.tick()]);

      expect(detectTemporalArbitrage(rule, snapshot, MarketDataMocks.context([snapshot]))).toBeNull();
    });
  });

  describe('VOLATILITY_HARVEST', () => {
    const latest = MarketDataMocks.tick({ optionId: 'yes', price: 0.4, bestBid: 0.39, bestAsk: 0.41, liquidity: 1500 });
    const recent = [latest, MarketDataMocks.tick({ optionId: 'yes', price: 0.5, ts: secondsAgo(15) })];

    test('should buy a sharp drop the model still believes in', () => {
      const rule = MarketDataMocks.rule('VOLATILITY_HARVEST');
      const snapshot = MarketDataMocks.snapshot(market, options, [latest], recent);

      const draft = detectVolatilityHarvest(rule, snapshot, MarketDataMocks.context([], { ml: fixedModel(0.8) }));

      expect(draft?.score).toBeCloseTo(76, 10);
      expect(draft?.edgeScore).toBeCloseTo(0.4, 10);
      expect(draft?.payload.suggestedTrade?.legs[0].side).toBe('buy');
    });

    test('should do nothing without a model', () => {
      const rule = MarketDataMocks.rule('VOLATILITY_HARVEST');
      const snapshot = MarketDataMocks.snapshot(market, options, [latest], recent);

      expect(detectVolatilityHarvest(rule, snapshot, MarketDataMocks.context())).toBeNull();
    });

    test('should skip when the model confidence is low', () => {
      const rule = MarketDataMocks.rule('VOLATILITY_HARVEST');
      const snapshot = MarketDataMocks.snapshot(market, options, [latest], recent);

      expect(detectVolatilityHarvest(rule, snapshot, MarketDataMocks.context([], { ml: fixedModel(0.3) }))).toBeNull();
    });
  });

  describe('ZOMBIE_HUNTER', () => {
    const tail = MarketDataMocks.tick({ optionId: 'yes', price: 0.02, liquidity: 600 });

    test('should sell a tail outcome the model rules out', () => {
      const rule = MarketDataMocks.rule('ZOMBIE_HUNTER');
      const snapshot = MarketDataMocks.snapshot(market, options, [tail]);

      const draft = detectZombieHunter(rule, snapshot, MarketDataMocks.context([], { ml: fixedModel(0.001) }));

      expect(draft?.score).toBeCloseTo(74.975, 10);
      expect(draft?.edgeScore).toBeCloseTo(0.019, 10);
      expect(draft?.payload.suggestedTrade?.legs[0].side).toBe('sell');
    });

    test('should leave outcomes the model still gives a chance', () => {
      const rule = MarketDataMocks.rule('ZOMBIE_HUNTER');
      const snapshot = MarketDataMocks.snapshot(market, options, [tail]);

      expect(detectZombieHunter(rule, snapshot, MarketDataMocks.context([], { ml: fixedModel(0.05) }))).toBeNull();
    });
  });

  test('should register a detector for every per-market rule kind', () => {
    const registered = Object.keys(MARKET_DETECTORS).sort();
    const expected = DETECTOR_KINDS.filter(kind => kind !== 'CROSS_MARKET_MISPRICE').sort();

    expect(registered).toEqual(expected);
  });
});
