import { TickIngestor, chunkRoundRobin } from '../../services/TickIngestor';
import { MarketDataSource, SourceMarket } from '../../services/interfaces';
import { MetricsCollector } from '../../monitoring/MetricsCollector';
import { Tick } from '../../types';
import { InMemoryMarketStore, InMemoryTickStore } from '../mocks/InMemoryRepositories';
import { MarketDataMocks, NOW } from '../mocks/MarketDataMocks';

class ScriptedSource implements MarketDataSource {
  readonly name = 'scripted';
  readonly polls: string[][] = [];
  prices: Record<string, number> = { a: 0.5, b: 0.3, c: 0.7 };
  ts: Date = NOW;
  failure: Error | null = null;

  async listMarkets(limit: number): Promise<SourceMarket[]> {
    return ['a', 'b', 'c'].slice(0, limit).map(id => ({
      market: MarketDataMocks.market({ id }),
      options: [MarketDataMocks.option(id, `${id}_yes`, 'Yes')],
    }));
  }

  async pollTicks(marketIds: string[]): Promise<Tick[]> {
    this.polls.push(marketIds);
    if (this.failure) throw this.failure;
    return marketIds.map(id => MarketDataMocks.tick({ ts: this.ts, marketId: id, optionId: `${id}_yes`, price: this.prices[id] }));
  }

  async close(): Promise<void> {}
}

describe('TickIngestor', () => {
  let source: ScriptedSource;
  let markets: InMemoryMarketStore;
  let ticks: InMemoryTickStore;
  let metrics: MetricsCollector;
  let ingestor: TickIngestor;

  beforeEach(() => {
    source = new ScriptedSource();
    markets = new InMemoryMarketStore();
    ticks = new InMemoryTickStore();
    metrics = new MetricsCollector();
    ingestor = new TickIngestor(source, markets, ticks, metrics, {
      intervalSecs: 2,
      parallelism: 2,
      maxBackoffSecs: 30,
      marketLimit: 10,
    });
  });

  describe('chunkRoundRobin', () => {
    test('should deal items across chunks in turn', () => {
      expect(chunkRoundRobin([1, 2, 3, 4, 5], 2)).toEqual([[1, 3, 5], [2, 4]]);
    });

    test('should drop empty chunks and treat a bad count as one', () => {
      expect(chunkRoundRobin(['a'], 4)).toEqual([['a']]);
      expect(chunkRoundRobin(['a', 'b'], 0)).toEqual([['a', 'b']]);
    });
  });

  test('should store listed markets and options on initialize', async () => {
    expect(await ingestor.initialize()).toEqual(['a', 'b', 'c']);

    expect(markets.markets.size).toBe(3);
    expect(await markets.listOptions('b')).toEqual([{ id: 'b_yes', marketId: 'b', label: 'Yes' }]);
  });

  test('should poll in round-robin chunks and store every first tick', async () => {
    await ingestor.initialize();

    expect(await ingestor.ingestOnce()).toBe(3);
    expect(source.polls).toEqual([['a', 'c'], ['b']]);
    expect(ingestor.getStatus()).toEqual({
      running: false,
      source: 'scripted',
      markets: 3,
      polls: 1,
      lastTickAt: NOW.toISOString(),
      lastError: null,
    });
    expect(metrics.getHistogramSummary('ingest_latency_ms', { source: 'scripted' })?.count).toBe(1);
  });

  test('should skip ticks whose price has not moved past the epsilon', async () => {
    await ingestor.initialize();
    await ingestor.ingestOnce();

    source.ts = new Date(NOW.getTime() + 2000);
    source.prices = { a: 0.50005, b: 0.31, c: 0.7 };

    expect(await ingestor.ingestOnce()).toBe(1);
    expect(ticks.ticks.map(tick => `${tick.marketId}:${tick.price}`)).toEqual(['a:0.5', 'c:0.7', 'b:0.3', 'b:0.31']);
  });

  test('should share one in-flight poll between concurrent callers', async () => {
    await ingestor.initialize();

    const [first, second] = await Promise.all([ingestor.ingestOnce(), ingestor.ingestOnce()]);

    expect(first).toBe(3);
    expect(second).toBe(3);
    expect(source.polls).toHaveLength(2);
  });

  test('should retry ticks whose insert failed on the next poll', async () => {
    await ingestor.initialize();
    const insert = jest.spyOn(ticks, 'insertTicks').mockRejectedValueOnce(new Error('store unavailable'));

    await expect(ingestor.ingestOnce()).rejects.toThrow('store unavailable');
    source.ts = new Date(NOW.getTime() + 2000);

    expect(await ingestor.ingestOnce()).toBe(3);
    expect(insert).toHaveBeenCalledTimes(2);
    expect(ticks.ticks.map(tick => tick.marketId)).toEqual(['a', 'c', 'b']);
  });

  test('should surface a failing source', async () => {
    await ingestor.initialize();
    source.failure = new Error('upstream down');

    await expect(ingestor.ingestOnce()).rejects.toThrow('upstream down');
  });

  describe('filterTicks', () => {
    test('should treat a non-finite price as zero', () => {
      const nan = MarketDataMocks.tick({ price: Number.NaN });

      expect(ingestor.filterTicks([nan])).toEqual([nan]);
      ingestor.rememberPrices([nan]);
      expect(ingestor.filterTicks([MarketDataMocks.tick({ price: 0.00005 })])).toEqual([]);
    });

    test('should drop a repeat of the same option inside one batch', () => {
      const first = MarketDataMocks.tick({ price: 0.5 });
      const repeat = MarketDataMocks.tick({ price: 0.50005, ts: new Date(NOW.getTime() + 1000) });

      expect(ingestor.filterTicks([first, repeat])).toEqual([first]);
    });
  });
});
