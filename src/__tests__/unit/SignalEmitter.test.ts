import { SignalEmitter, summaryLines } from '../../engine/SignalEmitter';
import { CooldownTracker } from '../../engine/CooldownTracker';
import { CircuitBreaker } from '../../risk/CircuitBreaker';
import { MetricsCollector } from '../../monitoring/MetricsCollector';
import { Notifier } from '../../services/interfaces';
import { FusedSignal, NotificationStatus, SignalPayload, SignalRecord } from '../../types';
import { InMemorySignalStore } from '../mocks/InMemoryRepositories';
import { MarketDataMocks, NOW } from '../mocks/MarketDataMocks';

class FakeNotifier implements Notifier {
  readonly sent: { text: string; key: string; cooldownSecs: number }[] = [];
  constructor(public status: NotificationStatus | Error = 'sent') {}

  async send(text: string, key: string, cooldownSecs: number): Promise<NotificationStatus> {
    this.sent.push({ text, key, cooldownSecs });
    if (this.status instanceof Error) throw this.status;
    return this.status;
  }

  async close(): Promise<void> {}
}

const tradePayload: SignalPayload = {
  gap: 0.12,
  estimatedEdgeBps: 1200,
  suggestedTrade: {
    action: 'dutch_book_basket',
    rationale: 'Allocate across 2 legs',
    legs: [
      { marketId: 'mkt', optionId: 'yes', side: 'buy', qty: 1, referencePrice: 0.4, limitPrice: 0.404, label: 'Yes' },
      { marketId: 'mkt', optionId: 'no', side: 'buy', qty: 1, referencePrice: 0.45, limitPrice: 0.4545, label: 'No' },
    ],
    estimatedEdgeBps: 1500,
    confidence: null,
  },
  details: {},
};

function ruleSignal(overrides: Partial<FusedSignal> = {}): FusedSignal {
  return {
    marketId: 'mkt',
    rule: MarketDataMocks.rule('DUTCH_BOOK_DETECT', { dedupe: { cooldown_secs: 120 } }, 7),
    message: '*Dutch book*',
    score: 80,
    edgeScore: 20,
    level: null,
    payload: { details: {} },
    source: 'rule',
    confidence: null,
    features: null,
    reason: null,
    ...overrides,
  };
}

describe('SignalEmitter', () => {
  let store: InMemorySignalStore;
  let notifier: FakeNotifier;
  let breaker: CircuitBreaker;
  let emitter: SignalEmitter;

  beforeEach(() => {
    store = new InMemorySignalStore();
    notifier = new FakeNotifier();
    breaker = new CircuitBreaker({ threshold: 1, cooldownSecs: 300, clock: () => NOW.getTime() });
    emitter = new SignalEmitter({
      signals: store,
      kpis: store,
      notifier,
      breaker,
      cooldowns: new CooldownTracker(),
      metrics: new MetricsCollector(),
      defaultCooldownSecs: 300,
      mlCooldownSecs: 60,
      clock: () => NOW,
    });
  });

  test('should persist, notify and audit an emitted rule signal', async () => {
    const outcome = await emitter.emit(ruleSignal());

    expect(outcome).toEqual(expect.objectContaining({ status: 'emitted', notification: 'sent' }));
    expect(store.signals).toHaveLength(1);
    const [signal] = store.signals;
    expect(signal.level).toBe('P1');
    expect(signal.ruleId).toBe(7);
    expect(signal.payload.ruleName).toBe('dutch_book_detect rule');
    expect(signal.payload.ruleType).toBe('DUTCH_BOOK_DETECT');
    expect(signal.payload.edgeScore).toBe(20);
    expect(signal.payload.details.transport).toBe('discord');
    expect(signal.createdAt).toBe(NOW);

    expect(notifier.sent).toEqual([{ text: '*Dutch book*', key: '7:mkt', cooldownSecs: 120 }]);
    expect(store.kpis).toEqual([{ day: '2026-03-02', ruleType: 'DUTCH_BOOK_DETECT', level: 'P1', gap: null, estEdgeBps: null }]);
    expect(store.audit).toEqual([
      { actor: 'rules_engine', action: 'signal_emitted', targetId: '1', meta: { rule: 'dutch_book_detect rule', market_id: 'mkt' } },
    ]);
  });

  test('should append trade and book summary lines to the message', async () => {
    await emitter.emit(ruleSignal({ payload: tradePayload }));

    expect(notifier.sent[0].text).toBe(
      '*Dutch book*\nTrade dutch_book_basket: BUY Yes:0.400 | BUY No:0.450\nPlan: Allocate across 2 legs'
    );
    expect(store.kpis[0]).toEqual(expect.objectContaining({ gap: 0.12, estEdgeBps: 1200 }));
  });

  test('should suppress a repeat inside the rule cooldown', async () => {
    await emitter.emit(ruleSignal());
    const second = await emitter.emit(ruleSignal());

    expect(second).toEqual({ status: 'cooldown' });
    expect(store.signals).toHaveLength(1);
  });

  test('should record a failed delivery and then hold the pair while the breaker is open', async () => {
    notifier.status = 'dry-run';
    const zeroCooldown = { rule: MarketDataMocks.rule('DUTCH_BOOK_DETECT', { dedupe: { cooldown_secs: 0 } }, 7) };

    const first = await emitter.emit(ruleSignal(zeroCooldown));
    const second = await emitter.emit(ruleSignal(zeroCooldown));

    expect(first).toEqual(expect.objectContaining({ status: 'emitted', notification: 'dry-run' }));
    expect(store.signals[0].payload.details.transport).toBe('discord-dry-run');
    expect(second).toEqual({ status: 'breaker_open' });
  });

  test('should treat a throwing notifier as an error delivery', async () => {
    notifier.status = new Error('webhook down');

    const outcome = await emitter.emit(ruleSignal());

    expect(outcome).toEqual(expect.objectContaining({ status: 'emitted', notification: 'error' }));
    expect(store.signals).toHaveLength(1);
  });

  test('should still record the KPI and audit when the signal insert fails', async () => {
    store.failInserts = true;

    const outcome = await emitter.emit(ruleSignal());

    expect(outcome).toEqual(expect.objectContaining({ status: 'emitted', signal: null }));
    expect(store.kpis).toHaveLength(1);
    expect(store.audit[0].targetId).toBeNull();
  });

  test('should emit ML-only signals under the ML name and cooldown', async () => {
    const outcome = await emitter.emit(ruleSignal({ rule: null, level: 'P2', source: 'ml', confidence: 0.9 }));

    expect(outcome.status).toBe('emitted');
    expect(notifier.sent[0]).toEqual({ text: '*Dutch book*', key: 'ml:mkt', cooldownSecs: 60 });
    expect(store.signals[0]).toEqual(expect.objectContaining({ ruleId: null, level: 'P2', source: 'ml', confidence: 0.9 }));
    expect(store.signals[0].payload.ruleType).toBe('ML');
  });

  test('should notify listeners with the stored record', async () => {
    const received: SignalRecord[] = [];
    emitter.onEmitted(signal => received.push(signal));
    emitter.onEmitted(() => {
      throw new Error('listener failure');
    });

    await emitter.emit(ruleSignal());

    expect(received.map(signal => signal.id)).toEqual([1]);
  });

  test('should add the market title from the snapshot', async () => {
    const market = MarketDataMocks.market({ id: 'mkt', title: 'Title from snapshot' });
    await emitter.emit(ruleSignal(), MarketDataMocks.snapshot(market, [], []));

    expect(store.signals[0].payload.marketTitle).toBe('Title from snapshot');
  });
});

describe('summaryLines', () => {
  test('should summarise at most three book entries', () => {
    const lines = summaryLines({
      bookSnapshot: ['A', 'B', 'C', 'D'].map((label, index) => ({
        optionId: label.toLowerCase(),
        label,
        price: index / 10,
        bestBid: 0,
        bestAsk: 0,
        liquidity: 0,
        ts: null,
      })),
      details: {},
    });

    expect(lines).toEqual(['Book: A:0.000, B:0.100, C:0.200']);
  });
});
