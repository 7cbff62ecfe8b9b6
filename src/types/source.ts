import type { Team, Tournament } from './team.js';
import type { Match } from './match.js';
import type { AIPrediction, BettingOdds } from './prediction.js';
import type {
  TeamFields,
  TournamentFields,
  MatchFields,
  PredictionFields,
  OddsFields,
} from './storage.js';

/** Maps a source's domain records onto storage field sets. Pure. */
export interface SourceMutation {
  readonly sourceType: string;

  teamToStorageFields(team: Team): TeamFields;
  tournamentToStorageFields(tournament: Tournament): TournamentFields;
  /** Team and tournament records are embedded under `refs`, unresolved. */
  matchToStorageFields(match: Match): MatchFields;
  predictionToStorageFields(prediction: AIPrediction, matchId: string): PredictionFields;
  oddsToStorageFields(odds: BettingOdds, matchId: string): OddsFields;
}

/** An upstream provider: how to read its payloads and how to store them. */
export interface DataSource {
  readonly sourceType: string;
  readonly mutation: SourceMutation;

  /** Throws ValidationError when the payload has no match identity. */
  parseMatch(payload: unknown): Match;
}
