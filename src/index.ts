#!/usr/bin/env node
import { config } from './config.js';
import { sql } from './db/pool.js';
import { PostgresStore } from './db/postgres-store.js';
import { StorageService } from './storage/storage-service.js';
import { ingestMatches } from './pipeline/ingest.js';
import { getSource } from './sources/index.js';
import { Bo3Client } from './sources/bo3/client.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  logger.info('Starting esports-ingest...');

  const store = new PostgresStore(sql);
  try {
    const client = new Bo3Client();
    const payloads = await client.getMatchesWithPredictions({
      daysAhead: config.INGEST_DAYS_AHEAD,
      tier: config.INGEST_TIERS,
      requireOdds: config.INGEST_REQUIRE_ODDS,
    });

    const summary = await ingestMatches(new StorageService(store), getSource('bo3'), payloads);
    logger.info(summary, 'Ingestion pass finished');
  } finally {
    await store.end();
  }
}

main().catch((err) => {
  logger.fatal(err, 'Ingestion failed');
  process.exit(1);
});
