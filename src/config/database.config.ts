import { DatabaseConfig } from '../data/database';
import { DatabaseProvider } from '../data/DatabaseDialect';
import { ConfigurationError } from '../utils/ErrorHandler';
import { logger } from '../utils/logger';

function readProvider(raw: string | undefined): DatabaseProvider {
  const provider = (raw || 'sqlite').toLowerCase();
  if (provider === 'postgresql' || provider === 'postgres') return 'postgresql';
  if (provider === 'sqlite' || provider === 'memory') return provider;
  throw new ConfigurationError(`Unsupported database provider: ${provider}`);
}

export function getDatabaseConfig(): DatabaseConfig {
  const provider = readProvider(process.env.DATABASE_PROVIDER);

  logger.info(`Using database provider: ${provider}`);

  switch (provider) {
    case 'postgresql':
      return {
        provider: 'postgresql',
        connectionString: process.env.DATABASE_URL,
        host: process.env.DB_HOST || 'localhost',
        port: parseInt(process.env.DB_PORT || '5432', 10),
        database: process.env.DB_NAME || 'signals',
        username: process.env.DB_USER || 'postgres',
        password: process.env.DB_PASSWORD,
      };

    case 'sqlite':
      return {
        provider: 'sqlite',
        database: process.env.SQLITE_PATH || './data/signals.db',
      };

    case 'memory':
      return { provider: 'memory' };
  }
}

export function validateDatabaseConfig(config: DatabaseConfig): void {
  switch (config.provider) {
    case 'postgresql':
      if (!config.connectionString && (!config.host || !config.database || !config.username)) {
        throw new ConfigurationError('PostgreSQL requires either DATABASE_URL or DB_HOST, DB_NAME, and DB_USER');
      }
      break;

    case 'sqlite':
      if (!config.database) {
        throw new ConfigurationError('SQLite requires SQLITE_PATH');
      }
      break;

    case 'memory':
      logger.warn('Using in-memory database - no data will persist between restarts');
      break;
  }
}
