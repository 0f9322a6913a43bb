import { Market, MarketOption, Tick } from '../types';
import { MarketDataSource, SourceMarket } from './interfaces';
import { hashEmbedding } from '../statistics/StatisticalModels';

interface MockMarketDefinition {
  id: string;
  title: string;
  tags: string[];
  endsInMs: number;
  options: Array<{ id: string; label: string }>;
}

interface OptionState {
  price: number;
  liquidity: number;
}

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

const MOCK_MARKETS: MockMarketDefinition[] = [
  {
    id: 'mock-election',
    title: 'Will candidate A win the election?',
    tags: ['politics'],
    endsInMs: 5 * HOUR,
    options: [
      { id: 'election_yes', label: 'Yes' },
      { id: 'election_no', label: 'No' },
    ],
  },
  {
    id: 'mock-fed',
    title: 'Will the Fed raise rates in December?',
    tags: ['rates'],
    endsInMs: 48 * HOUR,
    options: [
      { id: 'fed_hike', label: 'Hike' },
      { id: 'fed_hold', label: 'Hold' },
      { id: 'fed_cut', label: 'Cut' },
    ],
  },
  {
    id: 'mock-endgame',
    title: 'Will Team X sweep the finals?',
    tags: ['sports'],
    endsInMs: 25 * MINUTE,
    options: [
      { id: 'endgame_yes', label: 'Sweep' },
      { id: 'endgame_no', label: 'No sweep' },
    ],
  },
];

const ENDGAME_FAVOURITE = 'endgame_yes';

/** mulberry32: small seeded PRNG so mock runs are reproducible. */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function round(value: number, digits: number): number {
  const factor = Math.pow(10, digits);
  return Math.round(value * factor) / factor;
}

export interface MockMarketSourceOptions {
  seed: number;
  platform?: string;
  withEmbeddings?: boolean;
  clock?: () => Date;
}

/**
 * Deterministic random-walk markets for local runs and tests. Prices drift a
 * couple of cents per poll with occasional jumps; the three-way market is
 * sometimes rescaled below a full book and the endgame favourite climbs.
 */
export class MockMarketSource implements MarketDataSource {
  readonly name = 'mock';
  private readonly random: () => number;
  private readonly clock: () => Date;
  private readonly markets: SourceMarket[];
  private readonly state: Map<string, OptionState> = new Map();

  constructor(options: MockMarketSourceOptions) {
    this.random = seededRandom(options.seed);
    this.clock = options.clock ?? (() => new Date());

    const now = this.clock().getTime();
    const platform = options.platform ?? 'mock';
    this.markets = MOCK_MARKETS.map(definition => {
      const market: Market = {
        id: definition.id,
        title: definition.title,
        status: 'active',
        platform,
        tags: [...definition.tags],
        startsAt: new Date(now - 24 * HOUR),
        endsAt: new Date(now + definition.endsInMs),
      };
      if (options.withEmbeddings) market.embedding = hashEmbedding(definition.title);
      const marketOptions: MarketOption[] = definition.options.map(option => ({
        id: option.id,
        marketId: definition.id,
        label: option.label,
      }));
      return { market, options: marketOptions };
    });

    for (const { options: marketOptions } of this.markets) {
      for (const option of marketOptions) {
        this.state.set(option.id, {
          price: this.uniform(0.3, 0.7),
          liquidity: this.uniform(200, 800),
        });
      }
    }
  }

  async listMarkets(limit: number): Promise<SourceMarket[]> {
    return this.markets.slice(0, limit).map(entry => ({
      market: { ...entry.market, tags: [...entry.market.tags] },
      options: entry.options.map(option => ({ ...option })),
    }));
  }

  async pollTicks(marketIds: string[]): Promise<Tick[]> {
    const ts = this.clock();
    const ticks: Tick[] = [];

    for (const marketId of marketIds) {
      const entry = this.markets.find(candidate => candidate.market.id === marketId);
      if (!entry) continue;

      const prices = new Map<string, number>();
      for (const option of entry.options) {
        const state = this.optionState(option.id);
        let drift = this.uniform(-0.02, 0.02);
        if (this.random() < 0.07) drift += this.random() < 0.5 ? -0.08 : 0.09;

        state.price = Math.min(0.99, Math.max(0.01, state.price + drift));
        state.liquidity = Math.max(150, Math.min(1200, state.liquidity + this.uniform(-50, 60)));
        const volume = this.uniform(50, 300) * (1 + this.random());

        ticks.push({
          ts,
          marketId,
          optionId: option.id,
          price: round(state.price, 4),
          volume: round(volume, 4),
          liquidity: round(state.liquidity, 2),
          bestBid: round(Math.max(0, state.price - this.uniform(0.005, 0.02)), 4),
          bestAsk: round(Math.min(1, state.price + this.uniform(0.005, 0.02)), 4),
        });
        prices.set(option.id, state.price);
      }

      if (entry.options.length > 2 && this.random() < 0.35) {
        const scale = this.uniform(0.7, 0.95);
        for (const [optionId, price] of prices) {
          this.optionState(optionId).price = Math.max(0.01, Math.min(0.99, price * scale));
        }
      }

      if (marketId === 'mock-endgame' && this.random() < 0.5) {
        const favourite = this.optionState(ENDGAME_FAVOURITE);
        favourite.price = Math.max(0.92, favourite.price + 0.05);
        favourite.liquidity = 650;
      }
    }

    return ticks;
  }

  async close(): Promise<void> {
    this.state.clear();
  }

  private optionState(optionId: string): OptionState {
    let state = this.state.get(optionId);
    if (!state) {
      state = { price: 0.5, liquidity: 500 };
      this.state.set(optionId, state);
    }
    return state;
  }

  private uniform(min: number, max: number): number {
    return min + (max - min) * this.random();
  }
}
