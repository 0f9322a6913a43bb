import { logger } from './logger';
import { SystemConfig } from '../config/ConfigManager';

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export const MIN_ADMIN_TOKEN_LENGTH = 12;

export function validateEnvironmentVariables(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const dataSource = env.DATA_SOURCE;
  if (dataSource && !['mock', 'real'].includes(dataSource.toLowerCase())) {
    errors.push(`DATA_SOURCE must be 'mock' or 'real', got: ${dataSource}`);
  }

  if (!env.DISCORD_WEBHOOK_URL) {
    warnings.push('DISCORD_WEBHOOK_URL not set - notifications run in dry-run mode');
  } else if (!isValidDiscordWebhook(env.DISCORD_WEBHOOK_URL)) {
    errors.push('Invalid Discord webhook URL format');
  }

  const provider = env.DATABASE_PROVIDER;
  if (provider && !['postgresql', 'postgres', 'sqlite', 'memory'].includes(provider.toLowerCase())) {
    errors.push(`DATABASE_PROVIDER must be postgresql, sqlite or memory, got: ${provider}`);
  }
  if (env.DATABASE_URL && !isValidUrl(env.DATABASE_URL)) {
    errors.push('Invalid URL for DATABASE_URL');
  }

  const numericValidations = [
    { name: 'API_PORT', value: env.API_PORT, min: 1, max: 65535 },
    { name: 'RULES_INTERVAL_SECS', value: env.RULES_INTERVAL_SECS, min: 0.1, max: 3600 },
    { name: 'INGEST_INTERVAL_SECS', value: env.INGEST_INTERVAL_SECS, min: 0.1, max: 3600 },
    { name: 'INGEST_PARALLELISM', value: env.INGEST_PARALLELISM, min: 1, max: 64 },
    { name: 'EXEC_MAX_NOTIONAL_PER_ORDER', value: env.EXEC_MAX_NOTIONAL_PER_ORDER, min: 0, max: 10000000 },
    { name: 'EXEC_MAX_CONCURRENT_ORDERS', value: env.EXEC_MAX_CONCURRENT_ORDERS, min: 0, max: 1000 },
    { name: 'EXEC_MAX_DAILY_NOTIONAL', value: env.EXEC_MAX_DAILY_NOTIONAL, min: 0, max: 100000000 },
    { name: 'EXEC_SLIPPAGE_BPS', value: env.EXEC_SLIPPAGE_BPS, min: 0, max: 10000 },
    { name: 'ML_CONFIDENCE_THRESHOLD', value: env.ML_CONFIDENCE_THRESHOLD, min: 0, max: 1 },
  ];

  for (const validation of numericValidations) {
    if (validation.value !== undefined && validation.value !== '') {
      const numValue = parseFloat(validation.value);
      if (isNaN(numValue)) {
        errors.push(`${validation.name} must be a valid number, got: ${validation.value}`);
      } else if (numValue < validation.min || numValue > validation.max) {
        errors.push(`${validation.name} must be between ${validation.min} and ${validation.max}, got: ${numValue}`);
      }
    }
  }

  const logLevel = env.LOG_LEVEL;
  const validLogLevels = ['debug', 'info', 'warn', 'error'];
  if (logLevel && !validLogLevels.includes(logLevel.toLowerCase())) {
    errors.push(`LOG_LEVEL must be one of: ${validLogLevels.join(', ')}, got: ${logLevel}`);
  }

  for (const name of ['ML_ENABLED', 'CRYPTO_FEED_ENABLED']) {
    const value = env[name];
    if (value !== undefined && value !== '' && !isValidBoolean(value)) {
      errors.push(`${name} must be 'true' or 'false', got: ${value}`);
    }
  }

  return { isValid: errors.length === 0, errors, warnings };
}

/** Settings the process refuses to start without. */
export function validateSystemConfig(config: SystemConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.api.enabled) {
    const token = config.api.adminToken;
    if (!token) {
      errors.push('ADMIN_API_TOKEN is required when the API is enabled');
    } else if (token.length < MIN_ADMIN_TOKEN_LENGTH) {
      errors.push(`ADMIN_API_TOKEN must be at least ${MIN_ADMIN_TOKEN_LENGTH} characters`);
    }
  }

  if (config.execution.mode === 'manual') {
    warnings.push('Execution mode is manual; order intents are disabled');
  }
  if (config.ml.enabled && config.ml.confidenceThreshold < 0.5) {
    warnings.push(`ML confidence threshold ${config.ml.confidenceThreshold} admits weak predictions`);
  }
  if (config.ingestion.dataSource === 'mock' && config.environment.nodeEnv === 'production') {
    warnings.push('Mock market data in production');
  }

  return { isValid: errors.length === 0, errors, warnings };
}

function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

function isValidDiscordWebhook(url: string): boolean {
  try {
    const parsed = new URL(url);
    return (parsed.hostname === 'discord.com' || parsed.hostname === 'discordapp.com') &&
           parsed.pathname.startsWith('/api/webhooks/') &&
           parsed.pathname.split('/').length >= 5;
  } catch {
    return false;
  }
}

function isValidBoolean(value: string): boolean {
  return value.toLowerCase() === 'true' || value.toLowerCase() === 'false';
}

export function validateAndLogConfiguration(config: SystemConfig): void {
  const envResult = validateEnvironmentVariables();
  const configResult = validateSystemConfig(config);
  const warnings = [...envResult.warnings, ...configResult.warnings];
  const errors = [...envResult.errors, ...configResult.errors];

  if (warnings.length > 0) {
    logger.warn('Configuration warnings:');
    warnings.forEach(warning => logger.warn(`  - ${warning}`));
  }

  if (errors.length > 0) {
    logger.error('Configuration validation failed:');
    errors.forEach(error => logger.error(`  - ${error}`));
    throw new Error('Invalid configuration. Please check your environment variables.');
  }

  logger.info('Configuration validation passed');
}
