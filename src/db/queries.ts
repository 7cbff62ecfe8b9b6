import type { PendingQuery, Row, Sql } from 'postgres';
import type {
  TeamFields,
  TournamentFields,
  MatchInsert,
  MatchUpdate,
  PredictionFields,
  OddsFields,
  MatchRow,
  PredictionRow,
  OddsRow,
  MatchFilter,
} from '../types/storage.js';

// Every query takes the connection or transaction it runs on.

// ===== Teams & Tournaments =====

export async function findTeamId(db: Sql, sourceType: string, sourceId: number): Promise<string | null> {
  const [team] = await db<{ id: string }[]>`
    SELECT id FROM teams WHERE source_type = ${sourceType} AND source_id = ${sourceId}
  `;
  return team?.id ?? null;
}

export async function insertTeam(db: Sql, fields: TeamFields): Promise<string | null> {
  const [team] = await db<{ id: string }[]>`
    INSERT INTO teams (source_type, source_id, name, slug, country_code, logo_url, metadata)
    VALUES (
      ${fields.source_type}, ${fields.source_id}, ${fields.name}, ${fields.slug},
      ${fields.country_code}, ${fields.logo_url}, ${db.json(fields.metadata)}
    )
    ON CONFLICT (source_type, source_id) DO NOTHING
    RETURNING id
  `;
  return team?.id ?? null;
}

export async function findTournamentId(
  db: Sql,
  sourceType: string,
  sourceId: number,
): Promise<string | null> {
  const [tournament] = await db<{ id: string }[]>`
    SELECT id FROM tournaments WHERE source_type = ${sourceType} AND source_id = ${sourceId}
  `;
  return tournament?.id ?? null;
}

export async function insertTournament(db: Sql, fields: TournamentFields): Promise<string | null> {
  const [tournament] = await db<{ id: string }[]>`
    INSERT INTO tournaments (
      source_type, source_id, name, slug, tier, tier_rank,
      prize_pool, discipline_id, status, start_date, end_date, metadata
    )
    VALUES (
      ${fields.source_type}, ${fields.source_id}, ${fields.name}, ${fields.slug},
      ${fields.tier}, ${fields.tier_rank}, ${fields.prize_pool}, ${fields.discipline_id},
      ${fields.status}, ${fields.start_date}, ${fields.end_date}, ${db.json(fields.metadata)}
    )
    ON CONFLICT (source_type, source_id) DO NOTHING
    RETURNING id
  `;
  return tournament?.id ?? null;
}

// ===== Matches =====

export async function findMatchId(db: Sql, sourceType: string, sourceId: number): Promise<string | null> {
  const [match] = await db<{ id: string }[]>`
    SELECT id FROM matches WHERE source_type = ${sourceType} AND source_id = ${sourceId}
  `;
  return match?.id ?? null;
}

export async function insertMatch(db: Sql, row: MatchInsert): Promise<string | null> {
  const [match] = await db<{ id: string }[]>`
    INSERT INTO matches (
      source_type, source_id, slug,
      team1_id, team2_id, tournament_id,
      status, start_date, bo_type, tier,
      team1_score, team2_score, winner_team_id, loser_team_id,
      raw_data, last_fetched_at
    )
    VALUES (
      ${row.source_type}, ${row.source_id}, ${row.slug},
      ${row.team1_id}, ${row.team2_id}, ${row.tournament_id},
      ${row.status}, ${row.start_date}, ${row.bo_type}, ${row.tier},
      ${row.team1_score}, ${row.team2_score}, ${row.winner_team_id}, ${row.loser_team_id},
      ${db.json(row.raw_data)}, NOW()
    )
    ON CONFLICT (source_type, source_id) DO NOTHING
    RETURNING id
  `;
  return match?.id ?? null;
}

export async function updateMatch(db: Sql, id: string, updates: MatchUpdate): Promise<boolean> {
  const assignments: PendingQuery<Row[]>[] = [];
  if (updates.team1_score !== undefined) assignments.push(db`team1_score = ${updates.team1_score}`);
  if (updates.team2_score !== undefined) assignments.push(db`team2_score = ${updates.team2_score}`);
  if (updates.status !== undefined) assignments.push(db`status = ${updates.status}`);
  if (updates.winner_team_id !== undefined) {
    assignments.push(db`winner_team_id = ${updates.winner_team_id}`);
  }
  if (updates.loser_team_id !== undefined) {
    assignments.push(db`loser_team_id = ${updates.loser_team_id}`);
  }
  if (updates.raw_data !== undefined) assignments.push(db`raw_data = ${db.json(updates.raw_data)}`);

  const [first, ...rest] = assignments;
  if (!first) return false;
  const setList = rest.reduce((acc, part) => db`${acc}, ${part}`, first);

  const result = await db`
    UPDATE matches
    SET ${setList}, updated_at = NOW(), last_fetched_at = NOW()
    WHERE id = ${id}
  `;
  return result.count > 0;
}

const MATCH_COLUMNS = [
  'id', 'source_type', 'source_id', 'slug',
  'team1_id', 'team2_id', 'tournament_id',
  'status', 'start_date', 'bo_type', 'tier',
  'team1_score', 'team2_score', 'winner_team_id', 'loser_team_id',
  'raw_data', 'created_at', 'updated_at', 'last_fetched_at',
];

export async function getMatch(db: Sql, id: string): Promise<MatchRow | null> {
  const [match] = await db<MatchRow[]>`
    SELECT ${db(MATCH_COLUMNS)} FROM matches WHERE id = ${id}
  `;
  return match ?? null;
}

export async function listMatches(db: Sql, filter: MatchFilter = {}): Promise<MatchRow[]> {
  const rows = await db<MatchRow[]>`
    SELECT ${db(MATCH_COLUMNS)}
    FROM matches
    WHERE 1=1
      ${filter.status ? db`AND status = ${filter.status}` : db``}
      ${filter.sourceType ? db`AND source_type = ${filter.sourceType}` : db``}
      ${filter.startDateFrom ? db`AND start_date >= ${filter.startDateFrom}` : db``}
      ${filter.startDateTo ? db`AND start_date <= ${filter.startDateTo}` : db``}
    ORDER BY start_date DESC NULLS LAST
    ${filter.limit ? db`LIMIT ${filter.limit}` : db``}
  `;
  return [...rows];
}

// ===== AI Predictions =====

export async function findPredictionId(
  db: Sql,
  matchId: string,
  sourceType: string,
): Promise<string | null> {
  const [prediction] = await db<{ id: string }[]>`
    SELECT id FROM ai_predictions WHERE match_id = ${matchId} AND source_type = ${sourceType}
  `;
  return prediction?.id ?? null;
}

export async function insertPrediction(db: Sql, fields: PredictionFields): Promise<string | null> {
  const [prediction] = await db<{ id: string }[]>`
    INSERT INTO ai_predictions (match_id, source_type, source_id, prediction_data)
    VALUES (
      ${fields.match_id}, ${fields.source_type}, ${fields.source_id}, ${db.json(fields.prediction_data)}
    )
    ON CONFLICT (match_id, source_type) DO NOTHING
    RETURNING id
  `;
  return prediction?.id ?? null;
}

export async function updatePrediction(db: Sql, id: string, fields: PredictionFields): Promise<void> {
  await db`
    UPDATE ai_predictions
    SET prediction_data = ${db.json(fields.prediction_data)},
        source_id = ${fields.source_id},
        updated_at = NOW()
    WHERE id = ${id}
  `;
}

export async function listPredictions(db: Sql, matchId: string): Promise<PredictionRow[]> {
  const rows = await db<PredictionRow[]>`
    SELECT id, source_type, source_id, prediction_data, created_at, updated_at
    FROM ai_predictions
    WHERE match_id = ${matchId}
    ORDER BY created_at
  `;
  return [...rows];
}

// ===== Betting Odds =====

export async function findOddsId(
  db: Sql,
  matchId: string,
  sourceType: string,
  provider: string,
): Promise<string | null> {
  const [odds] = await db<{ id: string }[]>`
    SELECT id FROM betting_odds
    WHERE match_id = ${matchId} AND source_type = ${sourceType} AND provider = ${provider}
  `;
  return odds?.id ?? null;
}

export async function insertOdds(db: Sql, fields: OddsFields): Promise<string | null> {
  const [odds] = await db<{ id: string }[]>`
    INSERT INTO betting_odds (
      match_id, source_type, provider,
      team1_odds, team2_odds, team1_implied_prob, team2_implied_prob,
      odds_data, fetched_at
    )
    VALUES (
      ${fields.match_id}, ${fields.source_type}, ${fields.provider},
      ${fields.team1_odds}, ${fields.team2_odds},
      ${fields.team1_implied_prob}, ${fields.team2_implied_prob},
      ${db.json(fields.odds_data)}, NOW()
    )
    ON CONFLICT (match_id, source_type, provider) DO NOTHING
    RETURNING id
  `;
  return odds?.id ?? null;
}

export async function updateOdds(db: Sql, id: string, fields: OddsFields): Promise<void> {
  await db`
    UPDATE betting_odds
    SET team1_odds = ${fields.team1_odds},
        team2_odds = ${fields.team2_odds},
        team1_implied_prob = ${fields.team1_implied_prob},
        team2_implied_prob = ${fields.team2_implied_prob},
        odds_data = ${db.json(fields.odds_data)},
        updated_at = NOW(),
        fetched_at = NOW()
    WHERE id = ${id}
  `;
}

export async function listOdds(db: Sql, matchId: string, provider?: string): Promise<OddsRow[]> {
  // DECIMAL columns come back as strings unless cast
  const rows = await db<OddsRow[]>`
    SELECT id, source_type, provider,
           team1_odds::float8 AS team1_odds, team2_odds::float8 AS team2_odds,
           team1_implied_prob::float8 AS team1_implied_prob,
           team2_implied_prob::float8 AS team2_implied_prob,
           odds_data, created_at, updated_at, fetched_at
    FROM betting_odds
    WHERE match_id = ${matchId}
      ${provider ? db`AND provider = ${provider}` : db``}
    ORDER BY provider
  `;
  return [...rows];
}
