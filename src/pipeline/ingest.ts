import type { StorageService } from '../storage/storage-service.js';
import type { DataSource } from '../types/source.js';
import { PersistenceError, ValidationError } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface IngestSummary {
  matches: number;
  predictions: number;
  odds: number;
  failed: number;
}

function describePayload(payload: unknown): unknown {
  if (payload && typeof payload === 'object' && 'id' in payload) return payload.id;
  return null;
}

/**
 * Parse and store a batch of match payloads from one source, with the AI
 * prediction and betting odds each payload embeds. A payload that fails
 * validation or persistence is logged and counted; the batch goes on.
 */
export async function ingestMatches(
  storage: StorageService,
  source: DataSource,
  payloads: readonly unknown[],
): Promise<IngestSummary> {
  const summary: IngestSummary = { matches: 0, predictions: 0, odds: 0, failed: 0 };
  const log = logger.child({ source: source.sourceType });
  const { mutation } = source;

  for (const payload of payloads) {
    try {
      const match = source.parseMatch(payload);
      const matchId = await storage.saveMatch(mutation.matchToStorageFields(match));
      summary.matches++;

      if (match.aiPrediction) {
        await storage.saveAIPrediction(
          matchId,
          mutation.predictionToStorageFields(match.aiPrediction, matchId),
        );
        summary.predictions++;
      }

      if (match.bettingOdds) {
        await storage.saveBettingOdds(matchId, mutation.oddsToStorageFields(match.bettingOdds, matchId));
        summary.odds++;
      }
    } catch (err) {
      if (!(err instanceof ValidationError || err instanceof PersistenceError)) throw err;
      summary.failed++;
      log.warn({ err, payloadId: describePayload(payload) }, 'Skipping match payload');
    }
  }

  log.info(summary, 'Ingest batch complete');
  return summary;
}
