export type { JsonValue, JsonObject, JsonPrimitive } from './json.js';
export type { Team, Tournament } from './team.js';
export type { Match } from './match.js';
export type {
  AIPrediction,
  PredictionScoresData,
  BettingOdds,
  BettingTeamOdds,
} from './prediction.js';
export type {
  TeamFields,
  TournamentFields,
  MatchFields,
  MatchRefs,
  MatchInsert,
  MatchUpdate,
  PredictionFields,
  OddsFields,
  MatchRow,
  PredictionRow,
  OddsRow,
  MatchFilter,
} from './storage.js';
export type { SourceMutation, DataSource } from './source.js';
