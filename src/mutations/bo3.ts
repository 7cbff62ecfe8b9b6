import { toIsoString } from '../utils/date.js';
import type { SourceMutation } from '../types/source.js';
import type { JsonObject } from '../types/json.js';
import type { Team, Tournament } from '../types/team.js';
import type { Match } from '../types/match.js';
import type { AIPrediction, BettingOdds, BettingTeamOdds } from '../types/prediction.js';
import type {
  TeamFields,
  TournamentFields,
  MatchFields,
  PredictionFields,
  OddsFields,
} from '../types/storage.js';

/** Implied win probability of a decimal coefficient; null when there is none. */
export function impliedProbability(coeff: number | null | undefined): number | null {
  return coeff ? 1 / coeff : null;
}

export class Bo3Mutation implements SourceMutation {
  readonly sourceType = 'bo3';

  teamToStorageFields(team: Team): TeamFields {
    return {
      source_type: this.sourceType,
      source_id: team.id,
      name: team.name,
      slug: team.slug,
      country_code: team.countryCode,
      logo_url: team.logoUrl,
      metadata: {
        id: team.id,
        name: team.name,
        slug: team.slug,
        country_code: team.countryCode,
        logo_url: team.logoUrl,
      },
    };
  }

  tournamentToStorageFields(tournament: Tournament): TournamentFields {
    return {
      source_type: this.sourceType,
      source_id: tournament.id,
      name: tournament.name,
      slug: tournament.slug,
      tier: tournament.tier,
      tier_rank: tournament.tierRank,
      prize_pool: tournament.prize,
      discipline_id: tournament.disciplineId,
      status: tournament.status,
      start_date: tournament.startDate,
      end_date: tournament.endDate,
      metadata: {
        id: tournament.id,
        name: tournament.name,
        slug: tournament.slug,
        tier: tournament.tier,
        tier_rank: tournament.tierRank,
        prize: tournament.prize,
        discipline_id: tournament.disciplineId,
        status: tournament.status,
        start_date: toIsoString(tournament.startDate),
        end_date: toIsoString(tournament.endDate),
      },
    };
  }

  matchToStorageFields(match: Match): MatchFields {
    return {
      source_type: this.sourceType,
      source_id: match.id,
      slug: match.slug,
      status: match.status,
      start_date: match.startDate,
      bo_type: match.boType,
      tier: match.tier,
      team1_score: match.team1Score,
      team2_score: match.team2Score,
      winner_source_id: match.winnerTeamId,
      loser_source_id: match.loserTeamId,
      raw_data: Object.keys(match.rawPayload).length > 0 ? match.rawPayload : this.summarizeMatch(match),
      refs: {
        team1: match.team1 ? this.teamToStorageFields(match.team1) : null,
        team2: match.team2 ? this.teamToStorageFields(match.team2) : null,
        tournament: match.tournament ? this.tournamentToStorageFields(match.tournament) : null,
      },
    };
  }

  predictionToStorageFields(prediction: AIPrediction, matchId: string): PredictionFields {
    const scores = prediction.scoresData;
    return {
      match_id: matchId,
      source_type: this.sourceType,
      source_id: prediction.id,
      prediction_data: {
        id: prediction.id,
        match_id: prediction.matchId,
        prediction_team1_score: prediction.predictionTeam1Score,
        prediction_team2_score: prediction.predictionTeam2Score,
        prediction_winner_team_id: prediction.predictionWinnerTeamId,
        prediction_scores_data: {
          predicted_score: scores.predictedScore,
          proximity_factors: { ...scores.proximityFactors },
          closest_valid_score: [...scores.closestValidScore],
          overall_proximity_factor: scores.overallProximityFactor,
          neighbor_proximity_factor: scores.neighborProximityFactor,
        },
      },
    };
  }

  oddsToStorageFields(odds: BettingOdds, matchId: string): OddsFields {
    return {
      match_id: matchId,
      source_type: this.sourceType,
      provider: odds.provider,
      team1_odds: odds.team1.coeff,
      team2_odds: odds.team2.coeff,
      team1_implied_prob: impliedProbability(odds.team1.coeff),
      team2_implied_prob: impliedProbability(odds.team2.coeff),
      odds_data: {
        path: odds.path,
        provider: odds.provider,
        team_1: this.bettingTeamDocument(odds.team1),
        team_2: this.bettingTeamDocument(odds.team2),
        markets_count: odds.marketsCount,
        additional_markets: odds.additionalMarkets,
      },
    };
  }

  private bettingTeamDocument(side: BettingTeamOdds): JsonObject {
    return {
      name: side.name,
      coeff: side.coeff,
      active: side.active,
      team_id: side.teamId,
      max_coeff: side.maxCoeff,
      aggrement_score: side.agreementScore,
    };
  }

  /** Stand-in audit document for records built without a payload. */
  private summarizeMatch(match: Match): JsonObject {
    return {
      id: match.id,
      slug: match.slug,
      team1_id: match.team1Id,
      team2_id: match.team2Id,
      status: match.status,
      start_date: toIsoString(match.startDate),
      bo_type: match.boType,
      tier: match.tier,
      team1_score: match.team1Score,
      team2_score: match.team2Score,
      winner_team_id: match.winnerTeamId,
      loser_team_id: match.loserTeamId,
      tournament_id: match.tournamentId,
    };
  }
}
