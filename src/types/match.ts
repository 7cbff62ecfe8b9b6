import type { JsonObject } from './json.js';
import type { Team, Tournament } from './team.js';
import type { AIPrediction, BettingOdds } from './prediction.js';

/**
 * Match as described by an upstream source. Team and tournament ids are the
 * source's own; nested records are present when the payload embedded them.
 */
export interface Match {
  id: number;
  slug: string | null;
  team1Id: number | null;
  team2Id: number | null;
  tournamentId: number | null;
  /** upcoming, current or finished; kept verbatim from the source */
  status: string;
  startDate: Date | null;
  /** Best-of format (1, 3, 5) */
  boType: number | null;
  tier: string | null;
  team1Score: number | null;
  team2Score: number | null;
  winnerTeamId: number | null;
  loserTeamId: number | null;

  team1: Team | null;
  team2: Team | null;
  tournament: Tournament | null;
  aiPrediction: AIPrediction | null;
  bettingOdds: BettingOdds | null;

  /** Full payload as received, kept for audit */
  rawPayload: JsonObject;
}
