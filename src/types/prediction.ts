import type { JsonObject, JsonValue } from './json.js';

export interface PredictionScoresData {
  predictedScore: number;
  /** Keys like "(2, 0)", values usually probabilities; stored as received */
  proximityFactors: JsonObject;
  closestValidScore: JsonValue[];
  overallProximityFactor: number;
  neighborProximityFactor: number;
}

export interface AIPrediction {
  id: number;
  /** Source match id */
  matchId: number;
  predictionTeam1Score: number;
  predictionTeam2Score: number;
  predictionWinnerTeamId: number;
  scoresData: PredictionScoresData;
}

export interface BettingTeamOdds {
  name: string;
  /** Decimal coefficient, 0 when the provider gave none */
  coeff: number;
  active: boolean;
  teamId: number;
  maxCoeff: number;
  agreementScore: number;
}

export interface BettingOdds {
  provider: string;
  team1: BettingTeamOdds;
  team2: BettingTeamOdds;
  path: string | null;
  marketsCount: number | null;
  additionalMarkets: JsonObject[] | null;
}
