import { PolymarketSource, bestPrice, normalizeMarket, parseList, resolvePrice } from '../../services/PolymarketSource';
import { HttpRequest, HttpResult } from '../../utils/http';
import { RateLimiter } from '../../utils/RateLimiter';
import { NOW } from '../mocks/MarketDataMocks';

const GAMMA = 'http://gamma.test';
const CLOB = 'http://clob.test';
const BOOK_TS = 1772452800000;

describe('PolymarketSource', () => {
  describe('helpers', () => {
    test('should parse lists given as arrays or JSON strings', () => {
      expect(parseList('["Yes",1]')).toEqual(['Yes', '1']);
      expect(parseList([0.4, '0.6'])).toEqual(['0.4', '0.6']);
      expect(parseList('plain')).toEqual(['plain']);
      expect(parseList('{"a":1}')).toEqual([]);
      expect(parseList(null)).toEqual([]);
    });

    test('should take the best bid and ask from a book', () => {
      const book = { bids: [{ price: '0.55' }, { price: 0.58 }], asks: [{ price: '0.65' }, { price: '0.62' }, { price: null }] };

      expect(bestPrice(book, 'bid')).toBe(0.58);
      expect(bestPrice(book, 'ask')).toBe(0.62);
      expect(bestPrice({ bids: [], asks: null }, 'bid')).toBeNull();
      expect(bestPrice(null, 'ask')).toBeNull();
    });

    test('should blend the book mid with the quoted price', () => {
      expect(resolvePrice(null, null, null)).toBe(0.5);
      expect(resolvePrice(0.3, null, null)).toBe(0.3);
      expect(resolvePrice(null, 0.4, null)).toBe(0.4);
      expect(resolvePrice(null, 0.4, 0.6)).toBe(0.5);
      expect(resolvePrice(0.7, 0.4, 0.6)).toBe(0.6);
    });

    test('should default outcomes and synthesize option ids without tokens', () => {
      const detail = normalizeMarket({ id: 5 });

      expect(detail.market).toEqual({
        id: '5',
        title: '5',
        status: 'active',
        platform: 'polymarket',
        tags: [],
        startsAt: null,
        endsAt: null,
      });
      expect(detail.options).toEqual([
        { optionId: '5-0', tokenId: null, label: 'Yes', price: null },
        { optionId: '5-1', tokenId: null, label: 'No', price: null },
      ]);
      expect(detail.liquidity).toBe(0);
    });

    test('should prefer categories and CLOB figures when present', () => {
      const detail = normalizeMarket({
        id: 'm',
        title: 'Fallback title',
        closed: true,
        categories: ['crypto'],
        tags: ['ignored'],
        liquidity: '10',
        liquidityClob: '20',
        volume24hr: 1,
        volume24hrClob: 2,
      });

      expect(detail.market.title).toBe('Fallback title');
      expect(detail.market.status).toBe('closed');
      expect(detail.market.tags).toEqual(['crypto']);
      expect(detail.liquidity).toBe(20);
      expect(detail.volume).toBe(2);
    });
  });

  describe('source', () => {
    let requests: string[];
    let rateLimiter: RateLimiter;
    let source: PolymarketSource;

    const routes: Record<string, HttpResult> = {
      [`${GAMMA}/markets?limit=5&offset=0&closed=false`]: {
        status: 200,
        body: JSON.stringify([
          {
            id: 101,
            question: 'Will it rain tomorrow?',
            outcomes: '["Yes","No"]',
            outcomePrices: '["0.6","0.4"]',
            clobTokenIds: '["t1","t2"]',
            liquidity: '1500',
            volume24hr: 300,
            endDate: '2026-03-03T00:00:00Z',
            tags: [{ label: 'Weather' }],
          },
          { question: 'no id' },
        ]),
      },
      [`${CLOB}/book?token_id=t1`]: {
        status: 200,
        body: JSON.stringify({ bids: [{ price: '0.58' }], asks: [{ price: '0.62' }], timestamp: String(BOOK_TS) }),
      },
      [`${CLOB}/book?token_id=t2`]: { status: 500, body: '' },
    };

    const transport = async (request: HttpRequest): Promise<HttpResult> => {
      requests.push(request.url);
      return routes[request.url] ?? { status: 404, body: '' };
    };

    beforeEach(() => {
      requests = [];
      rateLimiter = new RateLimiter({ maxRequests: 100, windowMs: 60000 });
      source = new PolymarketSource({
        gammaBaseUrl: GAMMA,
        clobBaseUrl: CLOB,
        requestTimeoutMs: 1000,
        transport,
        rateLimiter,
        clock: () => NOW.getTime(),
        maxRetries: 0,
      });
    });

    afterEach(() => {
      rateLimiter.destroy();
    });

    test('should list valid markets with their token options', async () => {
      const listed = await source.listMarkets(5);

      expect(listed).toEqual([
        {
          market: {
            id: '101',
            title: 'Will it rain tomorrow?',
            status: 'active',
            platform: 'polymarket',
            tags: ['Weather'],
            startsAt: null,
            endsAt: new Date('2026-03-03T00:00:00Z'),
          },
          options: [
            { id: 't1', marketId: '101', label: 'Yes' },
            { id: 't2', marketId: '101', label: 'No' },
          ],
        },
      ]);
    });

    test('should build ticks from cached details and order books', async () => {
      await source.listMarkets(5);

      const ticks = await source.pollTicks(['101']);

      expect(ticks).toEqual([
        {
          ts: new Date(BOOK_TS),
          marketId: '101',
          optionId: 't1',
          price: 0.6,
          volume: 300,
          liquidity: 1500,
          bestBid: 0.58,
          bestAsk: 0.62,
        },
        {
          ts: NOW,
          marketId: '101',
          optionId: 't2',
          price: 0.4,
          volume: 300,
          liquidity: 1500,
          bestBid: 0.4,
          bestAsk: 0.4,
        },
      ]);
      expect(requests.filter(url => url.startsWith(GAMMA))).toHaveLength(1);
    });

    test('should reuse cached books inside their TTL', async () => {
      await source.listMarkets(5);
      await source.pollTicks(['101']);
      await source.pollTicks(['101']);

      expect(requests.filter(url => url.endsWith('token_id=t1'))).toHaveLength(1);
    });

    test('should skip markets whose details cannot be fetched', async () => {
      expect(await source.pollTicks(['missing'])).toEqual([]);
      expect(requests).toEqual([`${GAMMA}/markets/missing`]);
    });
  });
});
