import path from 'path';
import { SystemConfig, configManager } from '../config/ConfigManager';
import { getDatabaseConfig, validateDatabaseConfig } from '../config/database.config';
import { DatabaseManager } from '../data/database';
import { DataAccessLayer } from '../data/DataAccessLayer';
import { RuleLoader } from '../engine/RuleLoader';
import { RulesEngine } from '../engine/RulesEngine';
import { SignalEmitter } from '../engine/SignalEmitter';
import { CooldownTracker } from '../engine/CooldownTracker';
import { IntentService } from '../execution/IntentService';
import { Executor } from '../execution/Executor';
import { CircuitBreaker } from '../risk/CircuitBreaker';
import { ApiServer } from '../api/ApiServer';
import { MarketDataSource, MLPredictor } from '../services/interfaces';
import { MockMarketSource } from '../services/MockMarketSource';
import { PolymarketSource } from '../services/PolymarketSource';
import { TickIngestor } from '../services/TickIngestor';
import { CryptoPriceFeed } from '../services/CryptoPriceFeed';
import { DiscordNotifier } from '../services/DiscordNotifier';
import { SynonymMatcher, loadSynonymConfig } from '../services/SynonymMatcher';
import { loadModel } from '../services/MLPredictor';
import { MetricsCollector, metricsCollector } from '../monitoring/MetricsCollector';
import { advancedLogger } from '../utils/AdvancedLogger';
import { logger } from '../utils/logger';

export interface BotHealth {
  running: boolean;
  uptimeMs: number;
  database: boolean;
  ingestion: ReturnType<TickIngestor['getStatus']>;
  engine: ReturnType<RulesEngine['getStatus']>;
}

export interface SignalBotOptions {
  /** Skip the HTTP API even when the configuration enables it. */
  withoutApi?: boolean;
  /** Skip tick ingestion; the engine then reads whatever is already stored. */
  withoutIngestion?: boolean;
}

function resolvePath(relative: string): string {
  return path.isAbsolute(relative) ? relative : path.join(process.cwd(), relative);
}

/**
 * Composition root: builds the store, sources, engine, execution and API
 * from one configuration snapshot and owns their lifecycle.
 */
export class SignalBot {
  readonly database: DatabaseManager;
  readonly dataLayer: DataAccessLayer;
  readonly engine: RulesEngine;
  readonly ruleLoader: RuleLoader;
  readonly intents: IntentService;
  readonly executor: Executor;
  private readonly source: MarketDataSource;
  private readonly ingestor: TickIngestor;
  private readonly notifier: DiscordNotifier;
  private readonly cryptoFeed: CryptoPriceFeed | null;
  private readonly api: ApiServer | null;
  private readonly metrics: MetricsCollector;
  private isRunning = false;
  private startedAt = 0;

  constructor(
    private readonly config: SystemConfig = configManager.getConfig(),
    private readonly options: SignalBotOptions = {}
  ) {
    this.metrics = metricsCollector;

    const dbConfig = getDatabaseConfig();
    validateDatabaseConfig(dbConfig);
    this.database = new DatabaseManager(dbConfig);
    this.dataLayer = new DataAccessLayer(this.database);

    const { engine, ml, execution, notification, ingestion, synonyms, api } = config;
    const mockMode = ingestion.dataSource === 'mock';

    this.source = mockMode
      ? new MockMarketSource({ seed: ingestion.mockSeed, withEmbeddings: synonyms.method !== 'keyword' })
      : new PolymarketSource({
        gammaBaseUrl: ingestion.gammaBaseUrl,
        clobBaseUrl: ingestion.clobBaseUrl,
        requestTimeoutMs: ingestion.requestTimeoutMs,
      });

    this.ingestor = new TickIngestor(this.source, this.dataLayer, this.dataLayer, this.metrics, {
      intervalSecs: ingestion.intervalSecs,
      parallelism: ingestion.parallelism,
      maxBackoffSecs: ingestion.maxBackoffSecs,
      marketLimit: ingestion.marketLimit,
    });

    this.cryptoFeed = ingestion.cryptoFeedEnabled
      ? new CryptoPriceFeed({ url: ingestion.cryptoFeedUrl, streams: ingestion.cryptoSymbols })
      : null;

    this.notifier = new DiscordNotifier({
      webhookUrl: notification.discordWebhookUrl,
      dedupeTtlSecs: notification.dedupeTtlSecs,
      dedupeMaxKeys: notification.dedupeMaxKeys,
      timeoutMs: notification.timeoutMs,
      username: 'Signal Engine',
    });

    let predictor: MLPredictor | null = null;
    if (ml.enabled) {
      predictor = loadModel(resolvePath(ml.modelPath));
      logger.info(`ML model loaded from ${ml.modelPath}`);
    }

    const emitter = new SignalEmitter({
      signals: this.dataLayer,
      kpis: this.dataLayer,
      notifier: this.notifier,
      breaker: new CircuitBreaker({ threshold: engine.breakerThreshold, cooldownSecs: engine.breakerCooldownSecs }),
      cooldowns: new CooldownTracker(),
      metrics: this.metrics,
      defaultCooldownSecs: engine.defaultCooldownSecs,
      mlCooldownSecs: ml.cooldownSecs,
    });

    this.ruleLoader = new RuleLoader(resolvePath(engine.rulesDir), this.dataLayer);
    const synonymMatcher = new SynonymMatcher(this.dataLayer, loadSynonymConfig(resolvePath(synonyms.path)), {
      method: synonyms.method,
      similarityThreshold: synonyms.similarityThreshold,
      minClusterSize: synonyms.minClusterSize,
    });

    this.engine = new RulesEngine(
      {
        markets: this.dataLayer,
        ticks: this.dataLayer,
        ruleLoader: this.ruleLoader,
        emitter,
        synonymMatcher,
        metrics: this.metrics,
        ml: predictor,
        cryptoFeed: this.cryptoFeed,
      },
      {
        intervalSecs: engine.intervalSecs,
        marketLimit: engine.marketLimit,
        recentWindowMinutes: engine.recentWindowMinutes,
        recentWindowLimit: engine.recentWindowLimit,
        enabledPlatforms: engine.enabledPlatforms,
        mockMode,
        detailBaseUrl: engine.detailBaseUrl,
        slippageBps: execution.slippageBps,
        shutdownTimeoutMs: engine.shutdownTimeoutMs,
        ml: {
          confidenceThreshold: ml.confidenceThreshold,
          inferenceIntervalSecs: ml.inferenceIntervalSecs,
          confidenceWeight: ml.confidenceWeight,
          ruleBonus: ml.ruleBonus,
        },
      }
    );

    this.intents = new IntentService(this.dataLayer, this.dataLayer, this.dataLayer, execution, this.metrics);
    this.executor = new Executor(
      this.dataLayer,
      this.dataLayer,
      this.dataLayer,
      () => this.intents.bootstrapPolicy(),
      this.metrics,
      { simulateFills: mockMode }
    );

    this.api = api.enabled && !options.withoutApi
      ? new ApiServer(
        {
          markets: this.dataLayer,
          ticks: this.dataLayer,
          signals: this.dataLayer,
          kpis: this.dataLayer,
          execution: this.dataLayer,
          ruleLoader: this.ruleLoader,
          engine: this.engine,
          intents: this.intents,
          executor: this.executor,
          notifier: this.notifier,
          metrics: this.metrics,
          databaseHealthy: async () => (await this.database.healthCheck()).healthy,
        },
        {
          port: api.port,
          adminToken: api.adminToken,
          rateLimitRequests: api.rateLimitRequests,
          rateLimitWindowSecs: api.rateLimitWindowSecs,
          rulePayloadMaxBytes: api.rulePayloadMaxBytes,
        }
      )
      : null;

    const apiServer = this.api;
    if (apiServer) {
      emitter.onEmitted(signal => apiServer.broadcastSignal(signal));
    }
  }

  /** Connect the store, register the default policy and load market metadata. */
  async initialize(): Promise<void> {
    await this.database.initialize();
    const policy = await this.intents.bootstrapPolicy();
    logger.info(`Execution policy '${policy.name}' ready (mode ${this.config.execution.mode})`);

    if (!this.options.withoutIngestion) {
      await this.ingestor.initialize();
    }
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Signal bot is already running');
      return;
    }

    if (!this.options.withoutIngestion) {
      await this.ingestor.start();
    }
    this.cryptoFeed?.start();
    await this.engine.start();
    if (this.api) {
      await this.api.start();
    }
    this.metrics.start();

    this.isRunning = true;
    this.startedAt = Date.now();
    advancedLogger.info('Signal bot started', {
      component: 'signal_bot',
      operation: 'start',
      metadata: {
        source: this.source.name,
        rules: this.engine.getRules().length,
        api: this.api !== null,
        cryptoFeed: this.cryptoFeed !== null,
      },
    });
  }

  /** Stop the loops first, then release outbound clients and the store. */
  async stop(): Promise<void> {
    this.isRunning = false;

    await this.engine.stop();
    await this.ingestor.stop();
    this.cryptoFeed?.stop();
    if (this.api) {
      await this.api.stop();
    }
    this.metrics.stop();

    await this.notifier.close();
    await this.source.close();
    await this.database.close();
    logger.info('Signal bot stopped');
  }

  async getHealthStatus(): Promise<BotHealth> {
    const database = await this.database.healthCheck();
    return {
      running: this.isRunning,
      uptimeMs: this.isRunning ? Date.now() - this.startedAt : 0,
      database: database.healthy,
      ingestion: this.ingestor.getStatus(),
      engine: this.engine.getStatus(),
    };
  }
}
