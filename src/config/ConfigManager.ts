import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { advancedLogger } from '../utils/AdvancedLogger';
import { ConfigurationError } from '../utils/ErrorHandler';

const engineSchema = z.object({
  intervalSecs: z.number().positive(),
  rulesDir: z.string().min(1),
  marketLimit: z.number().int().positive(),
  recentWindowMinutes: z.number().positive(),
  recentWindowLimit: z.number().int().positive(),
  enabledPlatforms: z.array(z.string()),
  detailBaseUrl: z.string().min(1),
  defaultCooldownSecs: z.number().nonnegative(),
  breakerThreshold: z.number().int().positive(),
  breakerCooldownSecs: z.number().positive(),
  shutdownTimeoutMs: z.number().int().positive(),
});

const mlSchema = z.object({
  enabled: z.boolean(),
  modelPath: z.string().min(1),
  confidenceThreshold: z.number().min(0).max(1),
  inferenceIntervalSecs: z.number().nonnegative(),
  confidenceWeight: z.number().nonnegative(),
  ruleBonus: z.number().nonnegative(),
  cooldownSecs: z.number().nonnegative(),
});

const executionSchema = z.object({
  mode: z.enum(['manual', 'semi_auto']),
  maxNotionalPerOrder: z.number().positive(),
  maxConcurrentOrders: z.number().int().positive(),
  maxDailyNotional: z.number().positive(),
  slippageBps: z.number().min(0).max(10000),
  signalMaxAgeSecs: z.number().positive(),
  intentTtlSecs: z.number().int().positive(),
  defaultPolicyName: z.string().min(1),
});

const notificationSchema = z.object({
  discordWebhookUrl: z.string().nullable(),
  dedupeTtlSecs: z.number().nonnegative(),
  dedupeMaxKeys: z.number().int().positive(),
  timeoutMs: z.number().int().positive(),
});

const ingestionSchema = z.object({
  dataSource: z.enum(['mock', 'real']),
  intervalSecs: z.number().positive(),
  parallelism: z.number().int().positive(),
  maxBackoffSecs: z.number().positive(),
  marketLimit: z.number().int().positive(),
  gammaBaseUrl: z.string().url(),
  clobBaseUrl: z.string().url(),
  requestTimeoutMs: z.number().int().positive(),
  mockSeed: z.number().int(),
  cryptoFeedEnabled: z.boolean(),
  cryptoFeedUrl: z.string().min(1),
  cryptoSymbols: z.array(z.string()),
});

const synonymsSchema = z.object({
  path: z.string().min(1),
  method: z.enum(['keyword', 'embedding', 'auto']),
  similarityThreshold: z.number().min(0).max(1),
  minClusterSize: z.number().int().min(2),
});

const apiSchema = z.object({
  enabled: z.boolean(),
  port: z.number().int().min(1).max(65535),
  adminToken: z.string().nullable(),
  rateLimitRequests: z.number().int().positive(),
  rateLimitWindowSecs: z.number().positive(),
  rulePayloadMaxBytes: z.number().int().positive(),
});

const environmentSchema = z.object({
  nodeEnv: z.string(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
});

export const systemConfigSchema = z.object({
  engine: engineSchema,
  ml: mlSchema,
  execution: executionSchema,
  notification: notificationSchema,
  ingestion: ingestionSchema,
  synonyms: synonymsSchema,
  api: apiSchema,
  environment: environmentSchema,
});

export type SystemConfig = z.infer<typeof systemConfigSchema>;
export type EngineConfig = SystemConfig['engine'];
export type MlConfig = SystemConfig['ml'];
export type ExecutionConfig = SystemConfig['execution'];
export type NotificationConfig = SystemConfig['notification'];
export type IngestionConfig = SystemConfig['ingestion'];
export type SynonymsConfig = SystemConfig['synonyms'];
export type ApiConfig = SystemConfig['api'];

export type ConfigSection = keyof SystemConfig;

export type ConfigUpdate = { [K in ConfigSection]?: Partial<SystemConfig[K]> };

type JsonObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: JsonObject, source: JsonObject): JsonObject {
  const merged: JsonObject = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const existing = merged[key];
    if (isPlainObject(value) && isPlainObject(existing)) {
      merged[key] = deepMerge(existing, value);
    } else if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

export function loadDefaultConfig(): SystemConfig {
  return {
    engine: {
      intervalSecs: 2,
      rulesDir: 'config/rules',
      marketLimit: 100,
      recentWindowMinutes: 5,
      recentWindowLimit: 250,
      enabledPlatforms: ['polymarket'],
      detailBaseUrl: 'http://localhost:5173/markets',
      defaultCooldownSecs: 300,
      breakerThreshold: 3,
      breakerCooldownSecs: 300,
      shutdownTimeoutMs: 10000,
    },
    ml: {
      enabled: false,
      modelPath: 'models/ml-model.json',
      confidenceThreshold: 0.7,
      inferenceIntervalSecs: 5,
      confidenceWeight: 1.0,
      ruleBonus: 20,
      cooldownSecs: 300,
    },
    execution: {
      mode: 'semi_auto',
      maxNotionalPerOrder: 200,
      maxConcurrentOrders: 2,
      maxDailyNotional: 1000,
      slippageBps: 80,
      signalMaxAgeSecs: 60,
      intentTtlSecs: 60,
      defaultPolicyName: 'default-policy',
    },
    notification: {
      discordWebhookUrl: null,
      dedupeTtlSecs: 300,
      dedupeMaxKeys: 512,
      timeoutMs: 5000,
    },
    ingestion: {
      dataSource: 'mock',
      intervalSecs: 1,
      parallelism: 3,
      maxBackoffSecs: 30,
      marketLimit: 500,
      gammaBaseUrl: 'https://gamma-api.polymarket.com',
      clobBaseUrl: 'https://clob.polymarket.com',
      requestTimeoutMs: 10000,
      mockSeed: 7,
      cryptoFeedEnabled: false,
      cryptoFeedUrl: 'wss://stream.binance.us:9443/ws',
      cryptoSymbols: ['btcusdt', 'ethusdt', 'solusdt'],
    },
    synonyms: {
      path: 'config/synonyms.json',
      method: 'auto',
      similarityThreshold: 0.75,
      minClusterSize: 2,
    },
    api: {
      enabled: true,
      port: 8000,
      adminToken: null,
      rateLimitRequests: 120,
      rateLimitWindowSecs: 60,
      rulePayloadMaxBytes: 16000,
    },
    environment: {
      nodeEnv: 'development',
      logLevel: 'info',
    },
  };
}

function readNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

function readBoolean(name: string): boolean | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

/**
 * Overrides taken from the process environment. Secrets only ever come from here.
 */
export function environmentOverrides(): JsonObject {
  const env = process.env;
  return {
    engine: {
      intervalSecs: readNumber('RULES_INTERVAL_SECS'),
      rulesDir: env.RULES_DIR || undefined,
      detailBaseUrl: env.DETAIL_BASE_URL || undefined,
    },
    ml: {
      enabled: readBoolean('ML_ENABLED'),
      modelPath: env.ML_MODEL_PATH || undefined,
      confidenceThreshold: readNumber('ML_CONFIDENCE_THRESHOLD'),
      inferenceIntervalSecs: readNumber('ML_INFERENCE_INTERVAL_SECS'),
    },
    execution: {
      mode: env.EXEC_MODE || undefined,
      maxNotionalPerOrder: readNumber('EXEC_MAX_NOTIONAL_PER_ORDER'),
      maxConcurrentOrders: readNumber('EXEC_MAX_CONCURRENT_ORDERS'),
      maxDailyNotional: readNumber('EXEC_MAX_DAILY_NOTIONAL'),
      slippageBps: readNumber('EXEC_SLIPPAGE_BPS'),
    },
    notification: {
      discordWebhookUrl: env.DISCORD_WEBHOOK_URL || undefined,
    },
    ingestion: {
      dataSource: env.DATA_SOURCE || undefined,
      intervalSecs: readNumber('INGEST_INTERVAL_SECS'),
      parallelism: readNumber('INGEST_PARALLELISM'),
      mockSeed: readNumber('MOCK_SEED'),
      cryptoFeedEnabled: readBoolean('CRYPTO_FEED_ENABLED'),
    },
    api: {
      port: readNumber('API_PORT'),
      adminToken: env.ADMIN_API_TOKEN || undefined,
    },
    environment: {
      nodeEnv: env.NODE_ENV || undefined,
      logLevel: env.LOG_LEVEL || undefined,
    },
  };
}

export interface ConfigManagerOptions {
  configPath?: string;
  persist?: boolean;
  useEnvironment?: boolean;
}

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: SystemConfig;
  private configPath: string;
  private persist: boolean;
  private useEnvironment: boolean;
  private watchers: Map<string, (config: SystemConfig) => void> = new Map();
  private lastModified: number = 0;
  private watchInterval?: NodeJS.Timeout;

  constructor(options: ConfigManagerOptions = {}) {
    this.configPath = options.configPath ?? path.join(process.cwd(), 'config', 'engine-config.json');
    this.persist = options.persist ?? true;
    this.useEnvironment = options.useEnvironment ?? true;
    this.config = this.buildConfig();
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  public getConfig(): SystemConfig {
    return structuredClone(this.config);
  }

  public getSection<K extends ConfigSection>(section: K): SystemConfig[K] {
    return structuredClone(this.config[section]);
  }

  /**
   * Merge, validate and persist an update. Invalid updates leave the current
   * configuration untouched and throw.
   */
  public updateConfig(updates: ConfigUpdate): void {
    const oldConfig = this.config;
    const candidate = this.validate(deepMerge(this.toObject(oldConfig), updates));

    this.config = candidate;
    advancedLogger.info('Configuration updated successfully', {
      component: 'config_manager',
      operation: 'update_config',
      metadata: { changedFields: getChangedFields(this.toObject(oldConfig), this.toObject(candidate)) }
    });

    this.notifyWatchers();
    if (this.persist) {
      this.saveConfigToFile();
    }
  }

  public onConfigChange(id: string, callback: (config: SystemConfig) => void): void {
    this.watchers.set(id, callback);
  }

  public offConfigChange(id: string): void {
    this.watchers.delete(id);
  }

  public reloadConfig(): void {
    try {
      this.config = this.buildConfig();
      this.notifyWatchers();
      advancedLogger.info('Configuration reloaded from file', {
        component: 'config_manager',
        operation: 'reload_config'
      });
    } catch (error) {
      advancedLogger.error('Failed to reload configuration', error, {
        component: 'config_manager',
        operation: 'reload_config'
      });
    }
  }

  /**
   * Write the effective configuration, secrets excluded.
   */
  public exportConfig(filePath?: string): string {
    const exportPath = filePath || path.join(process.cwd(), 'config', 'exported-config.json');
    fs.mkdirSync(path.dirname(exportPath), { recursive: true });
    fs.writeFileSync(exportPath, JSON.stringify(redactSecrets(this.config), null, 2));
    return exportPath;
  }

  public redacted(): SystemConfig {
    return redactSecrets(this.config);
  }

  public startWatching(intervalMs: number = 5000): void {
    if (this.watchInterval) return;
    this.watchInterval = setInterval(() => this.checkForFileChange(), intervalMs);
    this.watchInterval.unref();
  }

  public stopWatching(): void {
    if (this.watchInterval) {
      clearInterval(this.watchInterval);
      this.watchInterval = undefined;
    }
  }

  private buildConfig(): SystemConfig {
    let merged = this.toObject(loadDefaultConfig());

    const fileConfig = this.loadConfigFromFile();
    if (fileConfig) {
      merged = deepMerge(merged, fileConfig);
    }
    if (this.useEnvironment) {
      merged = deepMerge(merged, environmentOverrides());
    }

    return this.validate(merged);
  }

  private loadConfigFromFile(): JsonObject | null {
    if (!fs.existsSync(this.configPath)) {
      return null;
    }

    const parsed: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
    if (!isPlainObject(parsed)) {
      throw new ConfigurationError('Configuration file must contain a JSON object', { configPath: this.configPath });
    }
    this.lastModified = fs.statSync(this.configPath).mtime.getTime();

    advancedLogger.debug('Configuration loaded from file', {
      component: 'config_manager',
      operation: 'load_config',
      metadata: { configPath: this.configPath }
    });
    return parsed;
  }

  private saveConfigToFile(): void {
    try {
      fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
      fs.writeFileSync(this.configPath, JSON.stringify(redactSecrets(this.config), null, 2));
      this.lastModified = fs.statSync(this.configPath).mtime.getTime();
    } catch (error) {
      advancedLogger.error('Failed to save configuration file', error, {
        component: 'config_manager',
        operation: 'save_config'
      });
    }
  }

  private checkForFileChange(): void {
    try {
      if (!fs.existsSync(this.configPath)) return;
      const currentModified = fs.statSync(this.configPath).mtime.getTime();
      if (currentModified > this.lastModified) {
        this.lastModified = currentModified;
        this.reloadConfig();
      }
    } catch (error) {
      logger.debug('Config watcher could not stat configuration file', error);
    }
  }

  private notifyWatchers(): void {
    for (const [id, callback] of this.watchers) {
      try {
        callback(this.getConfig());
      } catch (error) {
        advancedLogger.error(`Configuration watcher error for ${id}`, error, {
          component: 'config_manager',
          operation: 'notify_watchers'
        });
      }
    }
  }

  private validate(candidate: JsonObject): SystemConfig {
    const result = systemConfigSchema.safeParse(candidate);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Configuration validation failed: ${issues.join('; ')}`, { issues });
    }
    if (result.data.execution.maxNotionalPerOrder > result.data.execution.maxDailyNotional) {
      throw new ConfigurationError('Configuration validation failed: execution.maxNotionalPerOrder exceeds maxDailyNotional');
    }
    return result.data;
  }

  private toObject(config: SystemConfig): JsonObject {
    return { ...config };
  }
}

function redactSecrets(config: SystemConfig): SystemConfig {
  const copy = structuredClone(config);
  copy.api.adminToken = null;
  copy.notification.discordWebhookUrl = null;
  return copy;
}

function getChangedFields(oldConfig: JsonObject, newConfig: JsonObject, prefix: string = ''): string[] {
  const changes: string[] = [];
  for (const key of Object.keys(newConfig)) {
    const currentPath = prefix ? `${prefix}.${key}` : key;
    const before = oldConfig[key];
    const after = newConfig[key];
    if (isPlainObject(after) && isPlainObject(before)) {
      changes.push(...getChangedFields(before, after, currentPath));
    } else if (JSON.stringify(before) !== JSON.stringify(after)) {
      changes.push(currentPath);
    }
  }
  return changes;
}

export const configManager = ConfigManager.getInstance();
