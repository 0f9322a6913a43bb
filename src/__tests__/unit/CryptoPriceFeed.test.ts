import { createServer, Server, Socket } from 'net';
import { CryptoPriceFeed } from '../../services/CryptoPriceFeed';

function trade(symbol: string, price: string | number, ts: number): string {
  return JSON.stringify({ e: 'trade', s: symbol, p: price, T: ts });
}

describe('CryptoPriceFeed', () => {
  let feed: CryptoPriceFeed;

  beforeEach(() => {
    feed = new CryptoPriceFeed({ url: 'ws://localhost/stream', streams: ['btcusdt'] });
  });

  test('should start with no quotes', () => {
    expect(feed.getReturn('BTC')).toBeNull();
  });

  test('should record trades and report a zero return for the first one', () => {
    expect(feed.handleMessage(trade('BTCUSDT', '100', 1000))).toBe('BTC');

    expect(feed.getReturn('BTC')).toEqual({ price: 100, return1s: 0, ts: 1000 });
  });

  test('should measure the return against the oldest trade inside one second', () => {
    feed.handleMessage(trade('BTCUSDT', '100', 1000));
    feed.handleMessage(trade('BTCUSDT', 101, 1500));
    feed.handleMessage(trade('BTCUSDT', '102', 2100));

    const quote = feed.getReturn('BTC');
    expect(quote?.price).toBe(102);
    expect(quote?.return1s).toBeCloseTo(1 / 101, 12);
    expect(feed.getReturn('ETH')).toBeNull();
  });

  test('should keep symbols apart', () => {
    feed.handleMessage(trade('ETHUSDT', '2000', 1000));
    feed.handleMessage(trade('SOLUSDT', '150', 1000));

    expect(feed.getReturn('ETH')?.price).toBe(2000);
    expect(feed.getReturn('SOL')?.price).toBe(150);
  });

  test('should ignore frames that are not usable trades', () => {
    expect(feed.handleMessage('')).toBeNull();
    expect(feed.handleMessage('not json')).toBeNull();
    expect(feed.handleMessage(JSON.stringify({ e: 'depthUpdate', s: 'BTCUSDT' }))).toBeNull();
    expect(feed.handleMessage(trade('DOGEUSDT', '0.1', 1000))).toBeNull();
    expect(feed.handleMessage(trade('BTCUSDT', '-5', 1000))).toBeNull();
    expect(feed.handleMessage(trade('BTCUSDT', 'abc', 1000))).toBeNull();
    expect(feed.handleMessage('x'.repeat(10001))).toBeNull();
    expect(feed.getReturn('BTC')).toBeNull();
  });

  test('should hand out copies of the stored quote', () => {
    feed.handleMessage(trade('BTCUSDT', '100', 1000));
    const quote = feed.getReturn('BTC');
    if (quote) quote.price = 1;

    expect(feed.getReturn('BTC')?.price).toBe(100);
  });
});

describe('CryptoPriceFeed shutdown', () => {
  let server: Server;
  let accepted: Promise<Socket>;
  const sockets: Socket[] = [];

  beforeEach(done => {
    // Accepts the TCP connection but never answers the upgrade, so the socket stays CONNECTING.
    accepted = new Promise<Socket>(resolve => {
      server = createServer(socket => {
        sockets.push(socket);
        resolve(socket);
      });
    });
    server.listen(0, '127.0.0.1', done);
  });

  afterEach(done => {
    for (const socket of sockets.splice(0)) socket.destroy();
    server.close(() => done());
  });

  test('should stop while the handshake is still pending', async () => {
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no port');
    const feed = new CryptoPriceFeed({
      url: `ws://127.0.0.1:${address.port}/stream`,
      streams: ['btcusdt'],
      connectTimeoutMs: 5000,
    });

    feed.start();
    await accepted;
    feed.stop();
    await new Promise(resolve => setTimeout(resolve, 20));

    expect(feed.getReturn('BTC')).toBeNull();
  });
});
