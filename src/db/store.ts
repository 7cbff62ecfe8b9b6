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

/**
 * Row-level operations available inside one unit of work.
 * Inserts return null when the identity key is already taken.
 */
export interface StoreTx {
  findTeamId(sourceType: string, sourceId: number): Promise<string | null>;
  insertTeam(fields: TeamFields): Promise<string | null>;

  findTournamentId(sourceType: string, sourceId: number): Promise<string | null>;
  insertTournament(fields: TournamentFields): Promise<string | null>;

  findMatchId(sourceType: string, sourceId: number): Promise<string | null>;
  insertMatch(row: MatchInsert): Promise<string | null>;
  /** Stamps updated_at and last_fetched_at. False when no such match. */
  updateMatch(id: string, updates: MatchUpdate): Promise<boolean>;

  findPredictionId(matchId: string, sourceType: string): Promise<string | null>;
  insertPrediction(fields: PredictionFields): Promise<string | null>;
  updatePrediction(id: string, fields: PredictionFields): Promise<void>;

  findOddsId(matchId: string, sourceType: string, provider: string): Promise<string | null>;
  insertOdds(fields: OddsFields): Promise<string | null>;
  updateOdds(id: string, fields: OddsFields): Promise<void>;

  getMatch(id: string): Promise<MatchRow | null>;
  listMatches(filter: MatchFilter): Promise<MatchRow[]>;
  listPredictions(matchId: string): Promise<PredictionRow[]>;
  listOdds(matchId: string, provider?: string): Promise<OddsRow[]>;
}

export interface Store {
  /** Runs `work` in one transaction: committed when it resolves, rolled back when it throws. */
  begin<T>(work: (tx: StoreTx) => Promise<T>): Promise<T>;
  end(): Promise<void>;
}
