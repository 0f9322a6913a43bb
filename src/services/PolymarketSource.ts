import { z } from 'zod';
import { Market, MarketOption, Tick } from '../types';
import { MarketDataSource, SourceMarket } from './interfaces';
import { HttpTransport, getJson, nodeFetchTransport } from '../utils/http';
import { RateLimiter, polymarketRateLimiter } from '../utils/RateLimiter';
import { errorHandler, errorMessage } from '../utils/ErrorHandler';
import { advancedLogger } from '../utils/AdvancedLogger';

const DETAIL_TTL_MS = 120 * 1000;
const BOOK_TTL_MS = 5 * 1000;

const listish = z.union([z.array(z.union([z.string(), z.number()])), z.string()]).nullish();
const numeric = z.union([z.string(), z.number()]).nullish();

const gammaMarketSchema = z.object({
  id: z.union([z.string(), z.number()]),
  question: z.string().nullish(),
  title: z.string().nullish(),
  closed: z.boolean().nullish(),
  startDate: z.string().nullish(),
  endDate: z.string().nullish(),
  categories: z.array(z.string()).nullish(),
  tags: z.array(z.union([z.string(), z.object({ label: z.string() })])).nullish(),
  outcomes: listish,
  outcomePrices: listish,
  clobTokenIds: listish,
  liquidity: numeric,
  liquidityClob: numeric,
  volume24hr: numeric,
  volume24hrClob: numeric,
});

type GammaMarket = z.infer<typeof gammaMarketSchema>;

const gammaListSchema = z.union([
  z.array(z.unknown()),
  z.object({ markets: z.array(z.unknown()) }),
]);

const bookSchema = z.object({
  bids: z.array(z.object({ price: numeric })).nullish(),
  asks: z.array(z.object({ price: numeric })).nullish(),
  timestamp: numeric,
});

type Book = z.infer<typeof bookSchema>;

interface DetailOption {
  optionId: string;
  tokenId: string | null;
  label: string;
  price: number | null;
}

interface MarketDetail {
  market: Market;
  options: DetailOption[];
  liquidity: number;
  volume: number;
}

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export interface PolymarketSourceOptions {
  gammaBaseUrl: string;
  clobBaseUrl: string;
  requestTimeoutMs: number;
  transport?: HttpTransport;
  rateLimiter?: RateLimiter;
  clock?: () => number;
  maxRetries?: number;
}

function toNumber(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined || value === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Gamma returns some arrays as JSON-encoded strings. */
export function parseList(raw: z.infer<typeof listish>): string[] {
  if (!raw) return [];
  if (Array.isArray(raw)) return raw.map(item => String(item));
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.map(item => String(item)) : [];
  } catch {
    return [raw];
  }
}

function parseDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function bestPrice(book: Book | null, side: 'bid' | 'ask'): number | null {
  const rows = book ? (side === 'bid' ? book.bids : book.asks) : null;
  if (!rows || rows.length === 0) return null;
  const prices = rows.map(row => toNumber(row.price)).filter((price): price is number => price !== null);
  if (prices.length === 0) return null;
  return side === 'bid' ? Math.max(...prices) : Math.min(...prices);
}

/** Mid of the book averaged with the quoted outcome price, 0.5 when nothing is known. */
export function resolvePrice(optionPrice: number | null, bid: number | null, ask: number | null): number {
  let mid: number | null = null;
  if (bid !== null && ask !== null) mid = (bid + ask) / 2;
  else mid = bid ?? ask;

  if (mid === null) mid = optionPrice ?? 0.5;
  else if (optionPrice !== null) mid = (mid + optionPrice) / 2;
  return Math.round(mid * 10000) / 10000;
}

export function normalizeMarket(raw: GammaMarket): MarketDetail {
  const id = String(raw.id);
  const outcomes = parseList(raw.outcomes);
  const labels = outcomes.length > 0 ? outcomes : ['Yes', 'No'];
  const tokens = parseList(raw.clobTokenIds);
  const prices = parseList(raw.outcomePrices).map(price => toNumber(price));

  const options: DetailOption[] = labels.map((label, index) => {
    const tokenId = index < tokens.length ? tokens[index] : null;
    return {
      optionId: tokenId ?? `${id}-${index}`,
      tokenId,
      label,
      price: index < prices.length ? prices[index] : null,
    };
  });

  const tags = raw.categories ?? (raw.tags ?? []).map(tag => (typeof tag === 'string' ? tag : tag.label));

  return {
    market: {
      id,
      title: raw.question ?? raw.title ?? id,
      status: raw.closed ? 'closed' : 'active',
      platform: 'polymarket',
      tags,
      startsAt: parseDate(raw.startDate),
      endsAt: parseDate(raw.endDate),
    },
    options,
    liquidity: toNumber(raw.liquidityClob ?? raw.liquidity) ?? 0,
    volume: toNumber(raw.volume24hrClob ?? raw.volume24hr) ?? 0,
  };
}

/**
 * Live Polymarket data: market metadata from Gamma, order books from the CLOB.
 * Details are cached for two minutes and books for five seconds.
 */
export class PolymarketSource implements MarketDataSource {
  readonly name = 'polymarket';
  private readonly transport: HttpTransport;
  private readonly rateLimiter: RateLimiter;
  private readonly clock: () => number;
  private readonly details: Map<string, CacheEntry<MarketDetail>> = new Map();
  private readonly books: Map<string, CacheEntry<Book>> = new Map();

  constructor(private readonly options: PolymarketSourceOptions) {
    this.transport = options.transport ?? nodeFetchTransport;
    this.rateLimiter = options.rateLimiter ?? polymarketRateLimiter;
    this.clock = options.clock ?? Date.now;
  }

  async listMarkets(limit: number): Promise<SourceMarket[]> {
    const url = `${this.options.gammaBaseUrl}/markets?limit=${limit}&offset=0&closed=false`;
    const payload = gammaListSchema.parse(await this.request('gamma', url));
    const items = Array.isArray(payload) ? payload : payload.markets;

    const markets: SourceMarket[] = [];
    for (const item of items.slice(0, limit)) {
      const parsed = gammaMarketSchema.safeParse(item);
      if (!parsed.success) continue;
      const detail = normalizeMarket(parsed.data);
      this.cache(this.details, detail.market.id, detail, DETAIL_TTL_MS);
      markets.push({ market: detail.market, options: this.toOptions(detail) });
    }
    return markets;
  }

  async pollTicks(marketIds: string[]): Promise<Tick[]> {
    const buckets = await Promise.all(marketIds.map(marketId => this.marketTicks(marketId)));
    return buckets.flat();
  }

  async close(): Promise<void> {
    this.details.clear();
    this.books.clear();
  }

  private toOptions(detail: MarketDetail): MarketOption[] {
    return detail.options.map(option => ({
      id: option.optionId,
      marketId: detail.market.id,
      label: option.label,
    }));
  }

  private async marketTicks(marketId: string): Promise<Tick[]> {
    let detail: MarketDetail;
    try {
      detail = await this.marketDetail(marketId);
    } catch (error) {
      advancedLogger.warn('Market detail fetch failed', {
        component: 'polymarket_source',
        operation: 'market_detail',
        marketId,
        metadata: { error: errorMessage(error) },
      });
      return [];
    }

    const books = await Promise.all(detail.options.map(option => this.orderbook(option.tokenId)));
    return detail.options.map((option, index) => {
      const book = books[index];
      const bid = bestPrice(book, 'bid');
      const ask = bestPrice(book, 'ask');
      const price = resolvePrice(option.price, bid, ask);
      const bookTs = book ? toNumber(book.timestamp) : null;
      return {
        ts: bookTs !== null ? new Date(bookTs) : new Date(this.clock()),
        marketId,
        optionId: option.optionId,
        price,
        volume: detail.volume,
        liquidity: detail.liquidity,
        bestBid: bid ?? price,
        bestAsk: ask ?? price,
      };
    });
  }

  private async marketDetail(marketId: string): Promise<MarketDetail> {
    const cached = this.cached(this.details, marketId);
    if (cached) return cached;
    const raw = gammaMarketSchema.parse(
      await this.request('gamma', `${this.options.gammaBaseUrl}/markets/${encodeURIComponent(marketId)}`)
    );
    const detail = normalizeMarket(raw);
    this.cache(this.details, marketId, detail, DETAIL_TTL_MS);
    return detail;
  }

  private async orderbook(tokenId: string | null): Promise<Book | null> {
    if (!tokenId) return null;
    const cached = this.cached(this.books, tokenId);
    if (cached) return cached;
    try {
      const book = bookSchema.parse(
        await this.request('clob', `${this.options.clobBaseUrl}/book?token_id=${encodeURIComponent(tokenId)}`)
      );
      this.cache(this.books, tokenId, book, BOOK_TTL_MS);
      return book;
    } catch (error) {
      advancedLogger.warn('Order book fetch failed', {
        component: 'polymarket_source',
        operation: 'orderbook',
        metadata: { tokenId, error: errorMessage(error) },
      });
      return null;
    }
  }

  private request(service: string, url: string): Promise<unknown> {
    return this.rateLimiter.execute(
      () => errorHandler.executeWithRetry(
        () => getJson(this.transport, `polymarket_${service}`, url, this.options.requestTimeoutMs),
        `polymarket_${service}`,
        { maxRetries: this.options.maxRetries ?? 2, delayMs: 500, maxDelayMs: 4000 }
      ),
      'polymarket'
    );
  }

  private cached<T>(store: Map<string, CacheEntry<T>>, key: string): T | null {
    const entry = store.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.clock()) {
      store.delete(key);
      return null;
    }
    return entry.value;
  }

  private cache<T>(store: Map<string, CacheEntry<T>>, key: string, value: T, ttlMs: number): void {
    store.set(key, { value, expiresAt: this.clock() + ttlMs });
  }
}
