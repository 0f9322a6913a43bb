import WebSocket from 'ws';
import { z } from 'zod';
import { CryptoFeed, CryptoQuote, CryptoSymbol } from './interfaces';
import { RingBuffer } from '../utils/RingBuffer';
import { logger } from '../utils/logger';

const STREAM_SYMBOLS: Record<string, CryptoSymbol> = {
  btcusdt: 'BTC',
  ethusdt: 'ETH',
  solusdt: 'SOL',
};

const HISTORY_SIZE = 500;
const RETURN_WINDOW_MS = 1000;
const MAX_MESSAGE_SIZE = 10000;

const tradeMessageSchema = z.object({
  e: z.literal('trade'),
  s: z.string(),
  p: z.union([z.string(), z.number()]),
  T: z.number(),
});

interface PricePoint {
  ts: number;
  price: number;
}

export type SocketFactory = (url: string) => WebSocket;

export interface CryptoPriceFeedOptions {
  url: string;
  /** Exchange stream names, e.g. `btcusdt`. */
  streams: string[];
  maxBackoffMs?: number;
  connectTimeoutMs?: number;
  socketFactory?: SocketFactory;
}

/**
 * Trade stream of the major crypto pairs, kept as a short price history per
 * symbol so lead-lag rules can ask for the trailing one-second return.
 */
export class CryptoPriceFeed implements CryptoFeed {
  private ws: WebSocket | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private connectTimer: NodeJS.Timeout | null = null;
  private reconnectAttempts = 0;
  private running = false;
  private readonly history: Map<CryptoSymbol, RingBuffer<PricePoint>> = new Map();
  private readonly quotes: Map<CryptoSymbol, CryptoQuote> = new Map();
  private readonly socketFactory: SocketFactory;

  constructor(private readonly options: CryptoPriceFeedOptions) {
    this.socketFactory = options.socketFactory ?? (url => new WebSocket(url));
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.connect();
  }

  stop(): void {
    this.running = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
    const ws = this.ws;
    this.ws = null;
    if (ws) {
      // Terminating mid-handshake emits one last error; keep it from going uncaught.
      ws.removeAllListeners();
      ws.on('error', (error: Error) => logger.debug('Crypto feed closed during handshake:', error.message));
      ws.terminate();
    }
    logger.info('Crypto price feed stopped');
  }

  getReturn(symbol: CryptoSymbol): CryptoQuote | null {
    const quote = this.quotes.get(symbol);
    return quote ? { ...quote } : null;
  }

  /** Applies one raw stream frame; returns the symbol it updated, if any. */
  handleMessage(raw: string): CryptoSymbol | null {
    if (!raw || raw.length > MAX_MESSAGE_SIZE) return null;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      logger.debug('Crypto feed: unparseable frame', error);
      return null;
    }

    const parsed = tradeMessageSchema.safeParse(decoded);
    if (!parsed.success) return null;

    const symbol = STREAM_SYMBOLS[parsed.data.s.toLowerCase()];
    const price = Number(parsed.data.p);
    if (!symbol || !Number.isFinite(price) || price <= 0) return null;

    this.record(symbol, { ts: parsed.data.T, price });
    return symbol;
  }

  private record(symbol: CryptoSymbol, point: PricePoint): void {
    let buffer = this.history.get(symbol);
    if (!buffer) {
      buffer = new RingBuffer<PricePoint>(HISTORY_SIZE);
      this.history.set(symbol, buffer);
    }
    buffer.push(point);

    const base = buffer.findOldest(entry => entry.ts >= point.ts - RETURN_WINDOW_MS);
    const basePrice = base ? base.price : point.price;
    this.quotes.set(symbol, {
      price: point.price,
      return1s: (point.price - basePrice) / basePrice,
      ts: point.ts,
    });
  }

  private connect(): void {
    const url = this.options.url;
    logger.info(`Connecting to crypto feed: ${url}`);

    const ws = this.socketFactory(url);
    this.ws = ws;

    const timeoutId = setTimeout(() => {
      this.connectTimer = null;
      if (ws.readyState !== WebSocket.OPEN) {
        logger.warn('Crypto feed connection timeout');
        ws.terminate();
      }
    }, this.options.connectTimeoutMs ?? 10000);
    this.connectTimer = timeoutId;

    ws.on('open', () => {
      clearTimeout(timeoutId);
      this.connectTimer = null;
      this.reconnectAttempts = 0;
      const params = this.options.streams.map(stream => `${stream.toLowerCase()}@trade`);
      ws.send(JSON.stringify({ method: 'SUBSCRIBE', params, id: 1 }));
      logger.info(`Crypto feed subscribed: ${params.join(', ')}`);
    });

    ws.on('message', (data: WebSocket.Data) => {
      this.handleMessage(data.toString());
    });

    ws.on('close', (code: number) => {
      clearTimeout(timeoutId);
      if (this.connectTimer === timeoutId) this.connectTimer = null;
      logger.warn(`Crypto feed closed: ${code}`);
      if (this.ws === ws) this.ws = null;
      this.scheduleReconnect();
    });

    ws.on('error', (error: Error) => {
      logger.error('Crypto feed error:', error);
    });
  }

  private scheduleReconnect(): void {
    if (!this.running || this.reconnectTimer) return;

    const maxBackoff = this.options.maxBackoffMs ?? 30000;
    const delay = Math.min(1000 * Math.pow(2, this.reconnectAttempts), maxBackoff);
    this.reconnectAttempts++;
    logger.info(`Crypto feed reconnecting in ${delay}ms (attempt ${this.reconnectAttempts})`);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.running) this.connect();
    }, delay);
    this.reconnectTimer.unref();
  }
}
