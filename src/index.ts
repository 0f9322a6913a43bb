import dotenv from 'dotenv';
dotenv.config();

import { SignalBot } from './bot/SignalBot';
import { configManager } from './config/ConfigManager';
import { logger } from './utils/logger';
import { validateAndLogConfiguration } from './utils/configValidator';

let bot: SignalBot | null = null;

async function main() {
  const config = configManager.getConfig();
  validateAndLogConfiguration(config);

  logger.info('Starting signal engine...');

  try {
    bot = new SignalBot(config);
    await bot.initialize();
    await bot.start();

    const health = await bot.getHealthStatus();
    logger.info('Signal engine is running', {
      database: health.database,
      markets: health.ingestion.markets,
      rules: health.engine.rules.length,
    });
  } catch (error) {
    logger.error('Failed to start signal engine:', error);
    process.exit(1);
  }
}

let isShuttingDown = false;

async function gracefulShutdown(signal: string) {
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress, forcing exit...');
    process.exit(1);
  }

  isShuttingDown = true;
  logger.info(`Received ${signal}, shutting down gracefully...`);

  try {
    if (bot) {
      const shutdownTimeoutMs = configManager.getSection('engine').shutdownTimeoutMs + 5000;
      let timer: NodeJS.Timeout | undefined;
      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error('Shutdown timeout')), shutdownTimeoutMs);
      });
      try {
        await Promise.race([bot.stop(), timeoutPromise]);
      } finally {
        if (timer) clearTimeout(timer);
      }
    }

    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown:', error);
    process.exit(1);
  }
}

process.on('SIGINT', () => {
  gracefulShutdown('SIGINT').catch(err => {
    logger.error('Error during SIGINT shutdown:', err);
    process.exit(1);
  });
});

process.on('SIGTERM', () => {
  gracefulShutdown('SIGTERM').catch(err => {
    logger.error('Error during SIGTERM shutdown:', err);
    process.exit(1);
  });
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  gracefulShutdown('uncaughtException').catch(err => {
    logger.error('Error during uncaughtException shutdown:', err);
    process.exit(1);
  });
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection:', reason);
  gracefulShutdown('unhandledRejection').catch(err => {
    logger.error('Error during unhandledRejection shutdown:', err);
    process.exit(1);
  });
});

main().catch((error) => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
