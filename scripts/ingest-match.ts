/**
 * Fetch one match from the upstream API and store it.
 * Usage: npx tsx scripts/ingest-match.ts <matchId> [sourceType]
 */
import { sql } from '../src/db/pool.js';
import { PostgresStore } from '../src/db/postgres-store.js';
import { StorageService } from '../src/storage/storage-service.js';
import { ingestMatches } from '../src/pipeline/ingest.js';
import { getSource } from '../src/sources/index.js';
import { Bo3Client } from '../src/sources/bo3/client.js';

const matchId = Number(process.argv[2]);
const sourceType = process.argv[3] || 'bo3';

if (!Number.isInteger(matchId) || matchId <= 0) {
  console.error('Usage: tsx scripts/ingest-match.ts <matchId> [sourceType]');
  process.exit(1);
}

const store = new PostgresStore(sql);
try {
  const payload = await new Bo3Client().fetchMatchById(matchId);
  if (!payload) {
    console.log(`Match ${matchId} not found upstream`);
  } else {
    const summary = await ingestMatches(new StorageService(store), getSource(sourceType), [payload]);
    console.log(`Ingested match ${matchId}:`, summary);
  }
} finally {
  await store.end();
}
