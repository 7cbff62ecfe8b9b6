import type { JsonObject } from './json.js';

// Storage-ready field sets. Keys follow the column names of the schema.

export interface TeamFields {
  source_type: string;
  source_id: number;
  name: string;
  slug: string | null;
  country_code: string | null;
  logo_url: string | null;
  metadata: JsonObject;
}

export interface TournamentFields {
  source_type: string;
  source_id: number;
  name: string;
  slug: string | null;
  tier: string | null;
  tier_rank: number | null;
  prize_pool: number | null;
  discipline_id: number | null;
  status: string | null;
  start_date: Date | null;
  end_date: Date | null;
  metadata: JsonObject;
}

/** Team and tournament records the coordinator resolves before writing the match. */
export interface MatchRefs {
  team1: TeamFields | null;
  team2: TeamFields | null;
  tournament: TournamentFields | null;
}

export interface MatchFields {
  source_type: string;
  source_id: number;
  slug: string | null;
  status: string;
  start_date: Date | null;
  bo_type: number | null;
  tier: string | null;
  team1_score: number | null;
  team2_score: number | null;
  /** Source team id of the winner; mapped onto an internal id on save */
  winner_source_id: number | null;
  loser_source_id: number | null;
  raw_data: JsonObject;
  refs: MatchRefs;
}

/** Row written on first insert of a match, after refs are resolved. */
export interface MatchInsert extends Omit<MatchFields, 'refs' | 'winner_source_id' | 'loser_source_id'> {
  team1_id: string;
  team2_id: string;
  tournament_id: string | null;
  winner_team_id: string | null;
  loser_team_id: string | null;
}

/** Mutable columns of a stored match. */
export interface MatchUpdate {
  team1_score?: number | null;
  team2_score?: number | null;
  status?: string;
  winner_team_id?: string | null;
  loser_team_id?: string | null;
  raw_data?: JsonObject;
}

export interface PredictionFields {
  match_id: string;
  source_type: string;
  source_id: number;
  prediction_data: JsonObject;
}

export interface OddsFields {
  match_id: string;
  source_type: string;
  provider: string;
  team1_odds: number | null;
  team2_odds: number | null;
  team1_implied_prob: number | null;
  team2_implied_prob: number | null;
  odds_data: JsonObject;
}

// Rows as read back from the store.

export interface MatchRow {
  id: string;
  source_type: string;
  source_id: number;
  slug: string | null;
  team1_id: string | null;
  team2_id: string | null;
  tournament_id: string | null;
  status: string;
  start_date: Date | null;
  bo_type: number | null;
  tier: string | null;
  team1_score: number | null;
  team2_score: number | null;
  winner_team_id: string | null;
  loser_team_id: string | null;
  raw_data: JsonObject | null;
  created_at: Date;
  updated_at: Date;
  last_fetched_at: Date | null;
}

export interface PredictionRow {
  id: string;
  source_type: string;
  source_id: number | null;
  prediction_data: JsonObject;
  created_at: Date;
  updated_at: Date;
}

export interface OddsRow {
  id: string;
  source_type: string;
  provider: string;
  team1_odds: number | null;
  team2_odds: number | null;
  team1_implied_prob: number | null;
  team2_implied_prob: number | null;
  odds_data: JsonObject;
  created_at: Date;
  updated_at: Date;
  fetched_at: Date | null;
}

export interface MatchFilter {
  status?: string;
  sourceType?: string;
  startDateFrom?: Date;
  startDateTo?: Date;
  limit?: number;
}
