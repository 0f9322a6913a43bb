#!/usr/bin/env node

/**
 * Seeds the configured store with the mock catalogue and a short tick
 * history, so the engine and API have something to read without a feed.
 *
 *   SEED_ROUNDS=40 npm run seed
 */

import dotenv from 'dotenv';
dotenv.config();

import { getDatabaseConfig, validateDatabaseConfig } from '../src/config/database.config';
import { DatabaseManager } from '../src/data/database';
import { DataAccessLayer } from '../src/data/DataAccessLayer';
import { configManager } from '../src/config/ConfigManager';
import { MockMarketSource } from '../src/services/MockMarketSource';
import { logger } from '../src/utils/logger';

const ROUNDS = parseInt(process.env.SEED_ROUNDS || '30', 10);
const STEP_MS = 2000;

async function seed(): Promise<void> {
  const dbConfig = getDatabaseConfig();
  validateDatabaseConfig(dbConfig);
  const database = new DatabaseManager(dbConfig);
  const dal = new DataAccessLayer(database);

  // Ticks are laid out backwards from now so the recent window covers them.
  let now = Date.now() - ROUNDS * STEP_MS;
  const source = new MockMarketSource({
    seed: configManager.getSection('ingestion').mockSeed,
    clock: () => new Date(now),
  });

  try {
    await database.initialize();

    const catalogue = await source.listMarkets(100);
    for (const { market, options } of catalogue) {
      await dal.upsertMarket(market);
      await dal.upsertOptions(options);
    }
    console.log(`Seeded ${catalogue.length} markets`);

    const marketIds = catalogue.map(entry => entry.market.id);
    let inserted = 0;
    for (let round = 0; round < ROUNDS; round++) {
      inserted += await dal.insertTicks(await source.pollTicks(marketIds));
      now += STEP_MS;
    }
    console.log(`Inserted ${inserted} ticks over ${ROUNDS} rounds`);
  } finally {
    await source.close();
    await database.close();
  }
}

seed().catch(error => {
  logger.error('Seeding failed:', error);
  process.exit(1);
});
