import { LatestTicks, Market, MarketSnapshot } from '../types';
import { MarketRepository, TickRepository } from '../data/repositories';
import { num } from '../detectors/detectorHelpers';

export interface SnapshotOptions {
  marketLimit: number;
  recentWindowMinutes: number;
  recentWindowLimit: number;
  /** Lower-cased platform names; ignored in mock mode. */
  enabledPlatforms: string[];
  mockMode: boolean;
}

export function isMarketEnabled(market: Market, options: Pick<SnapshotOptions, 'enabledPlatforms' | 'mockMode'>): boolean {
  if (options.mockMode) return true;
  const platform = (market.platform || 'polymarket').toLowerCase();
  return options.enabledPlatforms.some(enabled => enabled.toLowerCase() === platform);
}

function topPrice(latest: LatestTicks): number | null {
  let best: number | null = null;
  for (const tick of latest.values()) {
    const price = num(tick.price);
    if (best === null || price > best) best = price;
  }
  return best;
}

/**
 * Builds the per-cycle view of every enabled active market. Reads for
 * different markets run concurrently; peer prices reuse books already
 * loaded this cycle and only fetch peers outside the active set.
 */
export class SnapshotBuilder {
  constructor(
    private readonly markets: MarketRepository,
    private readonly ticks: TickRepository,
    private readonly options: SnapshotOptions
  ) {}

  async build(now: Date): Promise<Map<string, MarketSnapshot>> {
    const active = await this.markets.listMarkets({ status: 'active', limit: this.options.marketLimit });
    const enabled = active.filter(market => isMarketEnabled(market, this.options));
    const since = new Date(now.getTime() - this.options.recentWindowMinutes * 60 * 1000);

    const loaded = await Promise.all(enabled.map(async market => {
      const [latest, recent, options, synonymIds] = await Promise.all([
        this.ticks.latestPerOption(market.id),
        this.ticks.recentWindow(market.id, since, this.options.recentWindowLimit),
        this.markets.listOptions(market.id),
        this.markets.synonymPeers(market.id),
      ]);
      return { market, latest, recent, options, synonymIds };
    }));

    const books = new Map<string, LatestTicks>();
    for (const entry of loaded) {
      books.set(entry.market.id, entry.latest);
    }

    const outside = new Set<string>();
    for (const entry of loaded) {
      for (const peerId of entry.synonymIds) {
        if (!books.has(peerId)) outside.add(peerId);
      }
    }
    const outsideBooks = await Promise.all(
      [...outside].map(async peerId => [peerId, await this.ticks.latestPerOption(peerId)] as const)
    );
    for (const [peerId, latest] of outsideBooks) {
      books.set(peerId, latest);
    }

    const snapshots = new Map<string, MarketSnapshot>();
    for (const entry of loaded) {
      const peerPrices: number[] = [];
      for (const peerId of entry.synonymIds) {
        const peerBook = books.get(peerId);
        const price = peerBook ? topPrice(peerBook) : null;
        if (price !== null) peerPrices.push(price);
      }
      snapshots.set(entry.market.id, { ...entry, peerPrices });
    }
    return snapshots;
  }
}
