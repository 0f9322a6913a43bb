import { Tick } from '../types';
import { MarketDataSource } from './interfaces';
import { MarketRepository, TickRepository } from '../data/repositories';
import { MetricsCollector } from '../monitoring/MetricsCollector';
import { advancedLogger } from '../utils/AdvancedLogger';
import { errorMessage } from '../utils/ErrorHandler';
import { logger } from '../utils/logger';

const PRICE_EPSILON = 1e-4;

export interface TickIngestorSettings {
  intervalSecs: number;
  parallelism: number;
  maxBackoffSecs: number;
  marketLimit: number;
}

export interface IngestStatus {
  running: boolean;
  source: string;
  markets: number;
  polls: number;
  lastTickAt: string | null;
  lastError: string | null;
}

function tickKey(tick: Tick): string {
  return `${tick.marketId}:${tick.optionId}`;
}

function tickPrice(tick: Tick): number {
  return Number.isFinite(tick.price) ? tick.price : 0;
}

/** Round-robin split so each chunk gets a similar share of markets. */
export function chunkRoundRobin<T>(items: T[], chunks: number): T[][] {
  const count = Math.max(1, Math.floor(chunks));
  const buckets: T[][] = Array.from({ length: count }, () => []);
  items.forEach((item, index) => buckets[index % count].push(item));
  return buckets.filter(bucket => bucket.length > 0);
}

/**
 * Polls a market data source on an interval and stores ticks whose price
 * actually moved. Failures back off exponentially up to `maxBackoffSecs`.
 */
export class TickIngestor {
  private marketIds: string[] = [];
  private readonly lastPrices: Map<string, number> = new Map();
  private timer?: NodeJS.Timeout;
  private running = false;
  private inFlight: Promise<number> | null = null;
  private backoffSecs = 1;
  private polls = 0;
  private lastTickAt: Date | null = null;
  private lastError: string | null = null;

  constructor(
    private readonly source: MarketDataSource,
    private readonly markets: MarketRepository,
    private readonly ticks: TickRepository,
    private readonly metrics: MetricsCollector,
    private readonly settings: TickIngestorSettings
  ) {}

  /** Load markets and options from the source into the store. */
  async initialize(): Promise<string[]> {
    const listed = await this.source.listMarkets(this.settings.marketLimit);
    for (const { market, options } of listed) {
      await this.markets.upsertMarket(market);
      await this.markets.upsertOptions(options);
    }
    this.marketIds = listed.map(entry => entry.market.id);
    logger.info(`Ingestion initialized from ${this.source.name}: ${this.marketIds.length} markets`);
    return this.marketIds;
  }

  /**
   * Keep only ticks whose price differs from the cached one by more than 1e-4.
   * The cache is left alone until `rememberPrices` runs after a stored insert.
   */
  filterTicks(ticks: Tick[]): Tick[] {
    const fresh: Tick[] = [];
    const seen = new Map<string, number>();
    for (const tick of ticks) {
      const key = tickKey(tick);
      const price = tickPrice(tick);
      const cached = seen.get(key) ?? this.lastPrices.get(key);
      if (cached === undefined || Math.abs(cached - price) > PRICE_EPSILON) {
        seen.set(key, price);
        fresh.push(tick);
      }
    }
    return fresh;
  }

  rememberPrices(ticks: Tick[]): void {
    for (const tick of ticks) {
      this.lastPrices.set(tickKey(tick), tickPrice(tick));
    }
  }

  /** One poll of every known market. Returns the number of ticks stored. */
  async ingestOnce(): Promise<number> {
    if (this.inFlight) return this.inFlight;
    const run = this.poll().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  async start(): Promise<void> {
    if (this.running) return;
    if (this.marketIds.length === 0) {
      await this.initialize();
    }
    this.running = true;
    logger.info(`Tick ingestion started (${this.source.name}, every ${this.settings.intervalSecs}s)`);
    this.loop();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.inFlight) {
      await this.inFlight.catch(() => 0);
    }
    logger.info('Tick ingestion stopped');
  }

  getStatus(): IngestStatus {
    return {
      running: this.running,
      source: this.source.name,
      markets: this.marketIds.length,
      polls: this.polls,
      lastTickAt: this.lastTickAt ? this.lastTickAt.toISOString() : null,
      lastError: this.lastError,
    };
  }

  private async poll(): Promise<number> {
    const startTime = Date.now();
    const batches = await Promise.all(
      chunkRoundRobin(this.marketIds, this.settings.parallelism).map(chunk => this.source.pollTicks(chunk))
    );
    const fresh = this.filterTicks(batches.flat());

    let stored = 0;
    if (fresh.length > 0) {
      stored = await this.ticks.insertTicks(fresh);
      this.rememberPrices(fresh);
      this.lastTickAt = fresh.reduce((latest, tick) => (tick.ts > latest ? tick.ts : latest), fresh[0].ts);
    }

    this.polls++;
    this.metrics.recordHistogram('ingest_latency_ms', Date.now() - startTime, { source: this.source.name });
    return stored;
  }

  private loop(): void {
    if (!this.running) return;
    void this.ingestOnce()
      .then(() => {
        this.lastError = null;
        this.backoffSecs = 1;
        return this.settings.intervalSecs;
      })
      .catch(error => {
        this.lastError = errorMessage(error);
        advancedLogger.error('Tick ingestion failed', error, {
          component: 'tick_ingestor',
          operation: 'poll',
          metadata: { backoffSecs: this.backoffSecs },
        });
        const delay = this.backoffSecs;
        this.backoffSecs = Math.min(this.backoffSecs * 2, this.settings.maxBackoffSecs);
        return delay;
      })
      .then(delaySecs => {
        if (!this.running) return;
        this.timer = setTimeout(() => this.loop(), delaySecs * 1000);
      });
  }
}
