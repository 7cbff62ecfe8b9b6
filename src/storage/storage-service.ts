import { z } from 'zod';
import type { Store, StoreTx } from '../db/store.js';
import { PersistenceError, ValidationError } from '../errors.js';
import { jsonObjectSchema } from '../utils/json.js';
import { logger } from '../utils/logger.js';
import type {
  TeamFields,
  TournamentFields,
  MatchFields,
  MatchUpdate,
  PredictionFields,
  OddsFields,
  MatchRow,
  PredictionRow,
  OddsRow,
  MatchFilter,
} from '../types/storage.js';

/** The only match columns an update may touch. Unknown keys are stripped. */
const matchUpdateSchema = z
  .object({
    team1_score: z.number().int().nullable(),
    team2_score: z.number().int().nullable(),
    status: z.string().min(1),
    winner_team_id: z.string().nullable(),
    loser_team_id: z.string().nullable(),
    raw_data: jsonObjectSchema,
  })
  .partial();

interface IdentityOps<F> {
  label: string;
  find: () => Promise<string | null>;
  insert: (fields: F) => Promise<string | null>;
}

/**
 * Look up a row by its identity key and insert it when missing. An insert
 * that lost a race to a concurrent writer returns no id; the winner's row is
 * read back instead.
 */
async function getOrCreate<F>(fields: F, ops: IdentityOps<F>): Promise<string> {
  const existing = await ops.find();
  if (existing) return existing;

  const created = await ops.insert(fields);
  if (created) return created;

  const raced = await ops.find();
  if (!raced) throw new PersistenceError(`${ops.label} insert conflicted but no row was found`);
  return raced;
}

function resolveTeamRef(
  sourceId: number | null,
  teams: { sourceId: number; id: string }[],
): string | null {
  if (sourceId == null) return null;
  return teams.find((t) => t.sourceId === sourceId)?.id ?? null;
}

/**
 * Writes matches and their teams, tournaments, AI predictions and betting
 * odds. Every public call is one unit of work on the store.
 */
export class StorageService {
  private readonly log = logger.child({ component: 'storage' });

  constructor(private readonly store: Store) {}

  // ===== Matches =====

  /**
   * Save a match, creating its teams and tournament first. Re-saving the same
   * `(source_type, source_id)` updates the stored match in place.
   * Resolves to the internal match id.
   */
  async saveMatch(fields: MatchFields): Promise<string> {
    const { team1, team2, tournament } = fields.refs;
    if (!team1 || !team2) {
      throw new ValidationError('match must have team1 and team2 data');
    }

    return this.run('save match', { sourceType: fields.source_type, sourceId: fields.source_id }, async (tx) => {
      const team1Id = await this.resolveTeam(tx, team1);
      const team2Id = await this.resolveTeam(tx, team2);
      const tournamentId = tournament ? await this.resolveTournament(tx, tournament) : null;

      const teams = [
        { sourceId: team1.source_id, id: team1Id },
        { sourceId: team2.source_id, id: team2Id },
      ];
      const updates: MatchUpdate = {
        team1_score: fields.team1_score,
        team2_score: fields.team2_score,
        status: fields.status,
        winner_team_id: resolveTeamRef(fields.winner_source_id, teams),
        loser_team_id: resolveTeamRef(fields.loser_source_id, teams),
        raw_data: fields.raw_data,
      };

      const existing = await tx.findMatchId(fields.source_type, fields.source_id);
      if (existing) {
        await tx.updateMatch(existing, updates);
        this.log.debug({ matchId: existing, sourceId: fields.source_id }, 'Updated existing match');
        return existing;
      }

      const created = await tx.insertMatch({
        source_type: fields.source_type,
        source_id: fields.source_id,
        slug: fields.slug,
        team1_id: team1Id,
        team2_id: team2Id,
        tournament_id: tournamentId,
        status: fields.status,
        start_date: fields.start_date,
        bo_type: fields.bo_type,
        tier: fields.tier,
        team1_score: fields.team1_score,
        team2_score: fields.team2_score,
        winner_team_id: updates.winner_team_id ?? null,
        loser_team_id: updates.loser_team_id ?? null,
        raw_data: fields.raw_data,
      });

      if (created) {
        this.log.info(
          { matchId: created, sourceType: fields.source_type, sourceId: fields.source_id },
          'Saved match',
        );
        return created;
      }

      // A concurrent writer inserted the same match first
      const raced = await tx.findMatchId(fields.source_type, fields.source_id);
      if (!raced) throw new PersistenceError('match insert conflicted but no row was found');
      await tx.updateMatch(raced, updates);
      return raced;
    });
  }

  /**
   * Apply the mutable fields among `updates` (scores, status, winner/loser,
   * raw data) to a stored match. Other keys are ignored. Resolves to false
   * when nothing was applied.
   */
  async updateMatch(matchId: string, updates: Readonly<Record<string, unknown>>): Promise<boolean> {
    const parsed = matchUpdateSchema.safeParse(updates);
    if (!parsed.success) {
      throw new ValidationError(`Invalid match update: ${parsed.error.issues[0]?.message ?? 'unknown'}`, {
        cause: parsed.error,
      });
    }

    const applicable = Object.fromEntries(
      Object.entries(parsed.data).filter(([, value]) => value !== undefined),
    );
    if (Object.keys(applicable).length === 0) return false;

    const applied = await this.run('update match', { matchId }, (tx) => tx.updateMatch(matchId, parsed.data));
    if (applied) this.log.info({ matchId, fields: Object.keys(applicable) }, 'Updated match');
    return applied;
  }

  async getMatch(matchId: string): Promise<MatchRow | null> {
    return this.run('get match', { matchId }, (tx) => tx.getMatch(matchId));
  }

  async getMatches(filter: MatchFilter = {}): Promise<MatchRow[]> {
    return this.run('list matches', { ...filter }, (tx) => tx.listMatches(filter));
  }

  // ===== Teams & Tournaments =====

  async getOrCreateTeam(fields: TeamFields): Promise<string> {
    return this.run('get or create team', { sourceId: fields.source_id }, (tx) =>
      this.resolveTeam(tx, fields),
    );
  }

  async getOrCreateTournament(fields: TournamentFields): Promise<string> {
    return this.run('get or create tournament', { sourceId: fields.source_id }, (tx) =>
      this.resolveTournament(tx, fields),
    );
  }

  async getTeamBySource(sourceType: string, sourceId: number): Promise<string | null> {
    return this.run('find team', { sourceType, sourceId }, (tx) => tx.findTeamId(sourceType, sourceId));
  }

  // ===== AI Predictions =====

  /** One prediction per match and source: re-saving overwrites the stored one. */
  async saveAIPrediction(matchId: string, fields: PredictionFields): Promise<string> {
    this.assertSameMatch(matchId, fields.match_id);

    return this.run('save AI prediction', { matchId }, async (tx) => {
      const existing = await tx.findPredictionId(matchId, fields.source_type);
      if (existing) {
        await tx.updatePrediction(existing, fields);
        return existing;
      }

      const created = await tx.insertPrediction(fields);
      if (created) {
        this.log.info({ predictionId: created, matchId }, 'Saved AI prediction');
        return created;
      }

      const raced = await tx.findPredictionId(matchId, fields.source_type);
      if (!raced) throw new PersistenceError('prediction insert conflicted but no row was found');
      await tx.updatePrediction(raced, fields);
      return raced;
    });
  }

  async getAIPredictions(matchId: string): Promise<PredictionRow[]> {
    return this.run('list AI predictions', { matchId }, (tx) => tx.listPredictions(matchId));
  }

  // ===== Betting Odds =====

  /** One odds row per match, source and provider. */
  async saveBettingOdds(matchId: string, fields: OddsFields): Promise<string> {
    this.assertSameMatch(matchId, fields.match_id);

    return this.run('save betting odds', { matchId, provider: fields.provider }, async (tx) => {
      const existing = await tx.findOddsId(matchId, fields.source_type, fields.provider);
      if (existing) {
        await tx.updateOdds(existing, fields);
        return existing;
      }

      const created = await tx.insertOdds(fields);
      if (created) {
        this.log.info({ oddsId: created, matchId, provider: fields.provider }, 'Saved betting odds');
        return created;
      }

      const raced = await tx.findOddsId(matchId, fields.source_type, fields.provider);
      if (!raced) throw new PersistenceError('odds insert conflicted but no row was found');
      await tx.updateOdds(raced, fields);
      return raced;
    });
  }

  async getBettingOdds(matchId: string, provider?: string): Promise<OddsRow[]> {
    return this.run('list betting odds', { matchId, provider }, (tx) => tx.listOdds(matchId, provider));
  }

  // ===== internals =====

  private resolveTeam(tx: StoreTx, fields: TeamFields): Promise<string> {
    return getOrCreate(fields, {
      label: 'team',
      find: () => tx.findTeamId(fields.source_type, fields.source_id),
      insert: (f) => tx.insertTeam(f),
    });
  }

  private resolveTournament(tx: StoreTx, fields: TournamentFields): Promise<string> {
    return getOrCreate(fields, {
      label: 'tournament',
      find: () => tx.findTournamentId(fields.source_type, fields.source_id),
      insert: (f) => tx.insertTournament(f),
    });
  }

  private assertSameMatch(matchId: string, fieldsMatchId: string): void {
    if (matchId !== fieldsMatchId) {
      throw new ValidationError(`Field set belongs to match ${fieldsMatchId}, not ${matchId}`);
    }
  }

  /**
   * Run one unit of work. Validation errors pass through unchanged; anything
   * else is logged and surfaced as a PersistenceError carrying the cause.
   */
  private async run<T>(
    operation: string,
    context: Record<string, unknown>,
    work: (tx: StoreTx) => Promise<T>,
  ): Promise<T> {
    try {
      return await this.store.begin(work);
    } catch (err) {
      if (err instanceof ValidationError) {
        this.log.warn({ ...context, err }, `Rejected ${operation}`);
        throw err;
      }
      this.log.error({ ...context, err }, `Failed to ${operation}, rolled back`);
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(`Failed to ${operation}`, { cause: err });
    }
  }
}
