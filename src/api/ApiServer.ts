import express, { NextFunction, Request, Response } from 'express';
import { Server as HttpServer, createServer } from 'http';
import { Server as SocketIO } from 'socket.io';
import { z } from 'zod';
import { SignalRecord } from '../types';
import {
  ExecutionRepository,
  KpiRepository,
  MarketRepository,
  SignalRepository,
  TickRepository,
} from '../data/repositories';
import { RuleLoader } from '../engine/RuleLoader';
import { EngineStatus } from '../engine/RulesEngine';
import { IntentService } from '../execution/IntentService';
import { Executor } from '../execution/Executor';
import { Notifier } from '../services/interfaces';
import { MetricsCollector } from '../monitoring/MetricsCollector';
import { RateLimiter } from '../utils/RateLimiter';
import {
  ApplicationError,
  InvalidRequestError,
  NotFoundError,
  RateLimitError,
  RuleValidationError,
  errorMessage,
} from '../utils/ErrorHandler';
import { advancedLogger } from '../utils/AdvancedLogger';

const HEARTBEAT_OK_SECS = 30;
const SPARKLINE_MINUTES = 5;
const SPARKLINE_LIMIT = 200;
const KPI_ROW_LIMIT = 500;

export interface ApiEngine {
  reloadRules(): Promise<unknown>;
  getStatus(): EngineStatus;
}

export interface ApiDependencies {
  markets: MarketRepository;
  ticks: TickRepository;
  signals: SignalRepository;
  kpis: KpiRepository;
  execution: ExecutionRepository;
  ruleLoader: RuleLoader;
  engine: ApiEngine;
  intents: IntentService;
  executor: Executor;
  notifier: Notifier;
  metrics: MetricsCollector;
  databaseHealthy: () => Promise<boolean>;
  clock?: () => Date;
}

export interface ApiSettings {
  port: number;
  adminToken: string | null;
  rateLimitRequests: number;
  rateLimitWindowSecs: number;
  rulePayloadMaxBytes: number;
  corsOrigins?: string[];
}

const limitQuery = (fallback: number, max: number) =>
  z.coerce.number().int().min(1).max(max).optional().transform(value => value ?? fallback);

const signalsQuerySchema = z.object({
  level: z.enum(['P1', 'P2', 'P3']).optional(),
  market_id: z.string().min(1).optional(),
  limit: limitQuery(20, 200),
});

const marketsQuerySchema = z.object({
  status: z.enum(['active', 'closed', 'all']).optional().transform(value => value ?? 'active'),
  limit: limitQuery(20, 200),
});

const intentBodySchema = z.object({
  signal_id: z.number().int().positive(),
  side: z.enum(['buy', 'sell']).optional(),
  qty: z.number().positive().optional(),
  limit_price: z.number().gt(0).lt(1).optional(),
  ttl_secs: z.number().int().positive().optional(),
});

const kpiQuerySchema = z.object({
  days: limitQuery(7, 90),
});

const intentsQuerySchema = z.object({
  status: z.enum(['suggested', 'confirmed', 'sent', 'rejected', 'filled']).optional(),
  limit: limitQuery(50, 500),
});

const alertBodySchema = z.object({
  text: z.string().min(1).max(2000).default('Signal engine test alert'),
});

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new InvalidRequestError(issues.join('; '), { issues });
  }
  return parsed.data;
}

function parseId(raw: string, entity: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new InvalidRequestError(`invalid ${entity} id`, { id: raw });
  }
  return id;
}

/** Body-parser errors carry their own 4xx status. */
function isClientHttpError(error: unknown): error is Error & { status: number } {
  if (!(error instanceof Error) || !('status' in error)) return false;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500;
}

/** HTTP status and body for an error raised by a handler. */
export function errorResponse(error: unknown): { status: number; body: Record<string, unknown> } {
  if (error instanceof RuleValidationError) {
    return { status: 400, body: { error: error.message, issues: error.issues } };
  }
  if (error instanceof InvalidRequestError) {
    return { status: 400, body: { error: error.message, ...(error.context ?? {}) } };
  }
  if (error instanceof NotFoundError) {
    return { status: 404, body: { error: error.message } };
  }
  if (error instanceof RateLimitError) {
    return { status: 429, body: { error: error.message } };
  }
  if (isClientHttpError(error)) {
    return { status: error.status, body: { error: error.message } };
  }
  if (error instanceof ApplicationError) {
    return { status: 500, body: { error: error.message, code: error.code } };
  }
  return { status: 500, body: { error: 'internal error' } };
}

export function heartbeatStatus(lastSignalAt: Date | null, now: Date): 'ok' | 'lagging' | 'stale' {
  if (!lastSignalAt) return 'stale';
  return (now.getTime() - lastSignalAt.getTime()) / 1000 < HEARTBEAT_OK_SECS ? 'ok' : 'lagging';
}

/**
 * Thin HTTP surface over the stores plus a socket.io feed of emitted
 * signals. Rule uploads need the admin token in `x-api-key`.
 */
export class ApiServer {
  readonly app: express.Application;
  private readonly server: HttpServer;
  private readonly io: SocketIO;
  private readonly limiter: RateLimiter;
  private readonly clock: () => Date;
  private listening = false;

  constructor(
    private readonly deps: ApiDependencies,
    private readonly settings: ApiSettings
  ) {
    this.clock = deps.clock ?? (() => new Date());
    this.app = express();
    this.server = createServer(this.app);
    this.io = new SocketIO(this.server, {
      cors: { origin: settings.corsOrigins ?? '*', methods: ['GET', 'POST'] },
    });
    this.limiter = new RateLimiter({
      maxRequests: settings.rateLimitRequests,
      windowMs: settings.rateLimitWindowSecs * 1000,
    });

    this.setupMiddleware();
    this.setupRoutes();
    this.setupSocketIO();
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.settings.port, () => {
        this.server.off('error', reject);
        resolve();
      });
    });
    this.listening = true;
    advancedLogger.info(`API server listening on port ${this.settings.port}`, {
      component: 'api_server',
      operation: 'start',
    });
  }

  async stop(): Promise<void> {
    this.limiter.destroy();
    if (!this.listening) return;
    this.listening = false;
    await new Promise<void>(resolve => {
      this.io.close(() => resolve());
    });
    advancedLogger.info('API server stopped', { component: 'api_server', operation: 'stop' });
  }

  broadcastSignal(signal: SignalRecord): void {
    this.io.emit('signal', {
      id: signal.id,
      marketId: signal.marketId,
      level: signal.level,
      source: signal.source,
      score: signal.score,
      message: signal.message,
      createdAt: signal.createdAt.toISOString(),
    });
  }

  private setupMiddleware(): void {
    this.app.use((req, res, next) => {
      const client = req.ip ?? 'unknown';
      if (!this.limiter.isAllowed(client)) {
        const info = this.limiter.getInfo(client);
        res.setHeader('Retry-After', String(info.retryAfter));
        res.status(429).json({ error: 'rate limit exceeded' });
        return;
      }
      next();
    });

    // Rule uploads keep the raw text for size checks and versioning.
    this.app.post(
      '/api/rules',
      express.text({ type: '*/*', limit: this.settings.rulePayloadMaxBytes * 2 }),
      asyncRoute(async (req, res) => {
        const token = req.header('x-api-key');
        if (!this.settings.adminToken || token !== this.settings.adminToken) {
          res.status(401).json({ error: 'invalid token' });
          return;
        }
        const raw = typeof req.body === 'string' ? req.body : '';
        const saved = await this.deps.ruleLoader.saveRule(raw, 'upload', this.settings.rulePayloadMaxBytes);
        await this.deps.engine.reloadRules();
        res.status(201).json({ rule_id: saved.id, name: saved.document.name, version: saved.version });
      })
    );

    this.app.use(express.json({ limit: '64kb' }));
  }

  private setupRoutes(): void {
    const { markets, ticks, signals, kpis, execution } = this.deps;

    this.app.get('/api/healthz', asyncRoute(async (_req, res) => {
      const dbHealthy = await this.deps.databaseHealthy();
      const [latest] = dbHealthy ? await signals.fetchSignals({ limit: 1 }) : [];
      res.status(dbHealthy ? 200 : 503).json({
        status: dbHealthy ? 'ok' : 'degraded',
        time: this.clock().toISOString(),
        db: dbHealthy ? 'ok' : 'down',
        rules_heartbeat: heartbeatStatus(latest ? latest.createdAt : null, this.clock()),
        engine: this.deps.engine.getStatus(),
      });
    }));

    this.app.get('/api/markets', asyncRoute(async (req, res) => {
      const query = parseInput(marketsQuerySchema, req.query);
      const list = await markets.listMarkets({
        status: query.status === 'all' ? undefined : query.status,
        limit: query.limit,
      });

      const summaries = await Promise.all(list.map(async market => {
        const [latest, options] = await Promise.all([
          ticks.latestPerOption(market.id),
          markets.listOptions(market.id),
        ]);
        let lastUpdated: Date | null = null;
        for (const tick of latest.values()) {
          if (!lastUpdated || tick.ts > lastUpdated) lastUpdated = tick.ts;
        }
        return {
          ...market,
          options: options.map(option => {
            const tick = latest.get(option.id);
            return {
              optionId: option.id,
              label: option.label,
              lastPrice: tick ? tick.price : null,
              lastTs: tick ? tick.ts : null,
            };
          }),
          lastUpdated,
        };
      }));
      res.json(summaries);
    }));

    this.app.get('/api/markets/:id', asyncRoute(async (req, res) => {
      const marketId = req.params.id;
      const market = await markets.getMarket(marketId);
      if (!market) throw new NotFoundError('market', marketId);

      const since = new Date(this.clock().getTime() - SPARKLINE_MINUTES * 60 * 1000);
      const [options, latest, sparkline, synonyms] = await Promise.all([
        markets.listOptions(marketId),
        ticks.latestPerOption(marketId),
        ticks.recentWindow(marketId, since, SPARKLINE_LIMIT),
        markets.synonymPeers(marketId),
      ]);

      res.json({
        ...market,
        options: options.map(option => {
          const tick = latest.get(option.id);
          return {
            optionId: option.id,
            label: option.label,
            lastPrice: tick ? tick.price : null,
            lastTs: tick ? tick.ts : null,
          };
        }),
        sparkline,
        synonyms,
      });
    }));

    this.app.get('/api/signals', asyncRoute(async (req, res) => {
      const query = parseInput(signalsQuerySchema, req.query);
      res.json(await signals.fetchSignals({ level: query.level, marketId: query.market_id, limit: query.limit }));
    }));

    this.app.get('/api/kpi/daily', asyncRoute(async (req, res) => {
      const query = parseInput(kpiQuerySchema, req.query);
      const cutoff = new Date(this.clock().getTime() - query.days * 24 * 60 * 60 * 1000).toISOString().slice(0, 10);
      const rows = await kpis.dailyKpis(KPI_ROW_LIMIT);
      res.json(rows.filter(row => row.day >= cutoff));
    }));

    this.app.post('/api/alerts/test', asyncRoute(async (req, res) => {
      const body = parseInput(alertBodySchema, req.body ?? {});
      const status = await this.deps.notifier.send(body.text, 'test', 0);
      res.json({ status });
    }));

    this.app.post('/api/execution/intent', asyncRoute(async (req, res) => {
      const body = parseInput(intentBodySchema, req.body);
      const intent = await this.deps.intents.createIntent({
        signalId: body.signal_id,
        side: body.side,
        qtyOverride: body.qty,
        limitPriceOverride: body.limit_price,
        ttlSecs: body.ttl_secs,
      });
      res.status(201).json(intent);
    }));

    this.app.post('/api/execution/confirm/:id', asyncRoute(async (req, res) => {
      const intent = await this.deps.executor.confirm(parseId(req.params.id, 'intent'));
      res.json(intent);
    }));

    this.app.get('/api/execution/intents', asyncRoute(async (req, res) => {
      const query = parseInput(intentsQuerySchema, req.query);
      res.json(await execution.listIntents({ status: query.status, limit: query.limit }));
    }));

    this.app.get('/api/metrics', (_req, res) => {
      res.json(this.deps.metrics.snapshot());
    });

    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      const { status, body } = errorResponse(error);
      if (status >= 500) {
        advancedLogger.error(`API request failed: ${req.method} ${req.path}`, error, {
          component: 'api_server',
          operation: 'handle_request',
        });
      } else {
        advancedLogger.debug(`API request rejected: ${req.method} ${req.path} (${errorMessage(error)})`, {
          component: 'api_server',
          status: String(status),
        });
      }
      res.status(status).json(body);
    });
  }

  private setupSocketIO(): void {
    this.io.on('connection', socket => {
      advancedLogger.debug('Signal feed client connected', {
        component: 'api_server',
        metadata: { socketId: socket.id },
      });
      socket.on('disconnect', () => {
        advancedLogger.debug('Signal feed client disconnected', {
          component: 'api_server',
          metadata: { socketId: socket.id },
        });
      });
    });
  }
}
