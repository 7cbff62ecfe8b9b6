import { z } from 'zod';
import { ValidationError } from '../../errors.js';
import { parseIsoDate } from '../../utils/date.js';
import { jsonObjectSchema, jsonValueSchema } from '../../utils/json.js';
import type { Team, Tournament } from '../../types/team.js';
import type { Match } from '../../types/match.js';
import type {
  AIPrediction,
  BettingOdds,
  BettingTeamOdds,
  PredictionScoresData,
} from '../../types/prediction.js';

// --- field schemas ---

/** Upstream identifiers: positive integers, sometimes sent as strings. */
const idSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+$/)])
  .pipe(z.coerce.number().int().positive());

const nameSchema = z.string().trim().min(1);

// Optional descriptive fields: wrong type or absent both become null.
const optionalText = z.string().nullish().catch(null).transform((v) => v ?? null);
const optionalInt = z.number().int().nullish().catch(null).transform((v) => v ?? null);
const optionalId = idSchema.nullish().catch(null).transform((v) => v ?? null);
const optionalDate = z.unknown().transform(parseIsoDate);

// Prediction and odds numbers default to zero when absent.
const numberOrZero = z.preprocess((v) => v ?? undefined, z.coerce.number().default(0));
const intOrZero = numberOrZero.transform(Math.trunc);

/** An object with at least one key; empty objects count as missing. */
const nonEmptyObject = z
  .record(z.unknown())
  .refine((o) => Object.keys(o).length > 0, { message: 'Expected a non-empty object' });

// --- record schemas ---

const teamSchema = z
  .object({
    id: idSchema,
    name: nameSchema,
    slug: optionalText,
    country_code: optionalText,
    logo_url: optionalText,
  })
  .transform(
    (t): Team => ({
      id: t.id,
      name: t.name,
      slug: t.slug,
      countryCode: t.country_code,
      logoUrl: t.logo_url,
    }),
  );

const tournamentSchema = z
  .object({
    id: idSchema,
    name: nameSchema,
    slug: optionalText,
    tier: optionalText,
    tier_rank: optionalInt,
    prize: optionalInt,
    discipline_id: optionalInt,
    status: optionalText,
    start_date: optionalDate,
    end_date: optionalDate,
  })
  .transform(
    (t): Tournament => ({
      id: t.id,
      name: t.name,
      slug: t.slug,
      tier: t.tier,
      tierRank: t.tier_rank,
      prize: t.prize,
      disciplineId: t.discipline_id,
      status: t.status,
      startDate: t.start_date,
      endDate: t.end_date,
    }),
  );

const scoresDataSchema = nonEmptyObject.pipe(
  z
    .object({
      predicted_score: numberOrZero,
      // Contents are opaque here; only their container shape is checked
      proximity_factors: z.record(jsonValueSchema).nullish().catch(null),
      closest_valid_score: z.array(jsonValueSchema).nullish().catch(null),
      overall_proximity_factor: numberOrZero,
      neighbor_proximity_factor: numberOrZero,
    })
    .transform(
      (s): PredictionScoresData => ({
        predictedScore: s.predicted_score,
        proximityFactors: s.proximity_factors ?? {},
        closestValidScore: s.closest_valid_score ?? [],
        overallProximityFactor: s.overall_proximity_factor,
        neighborProximityFactor: s.neighbor_proximity_factor,
      }),
    ),
);

const predictionSchema = z
  .object({
    id: idSchema,
    match_id: idSchema,
    prediction_team1_score: intOrZero,
    prediction_team2_score: intOrZero,
    prediction_winner_team_id: intOrZero,
    prediction_scores_data: scoresDataSchema,
  })
  .transform(
    (p): AIPrediction => ({
      id: p.id,
      matchId: p.match_id,
      predictionTeam1Score: p.prediction_team1_score,
      predictionTeam2Score: p.prediction_team2_score,
      predictionWinnerTeamId: p.prediction_winner_team_id,
      scoresData: p.prediction_scores_data,
    }),
  );

const bettingTeamSchema = nonEmptyObject.pipe(
  z
    .object({
      name: z.string().nullish(),
      coeff: numberOrZero,
      active: z.unknown().transform(Boolean),
      team_id: intOrZero,
      max_coeff: numberOrZero,
      // Upstream spelling
      aggrement_score: numberOrZero,
    })
    .transform(
      (t): BettingTeamOdds => ({
        name: t.name ?? '',
        coeff: t.coeff,
        active: t.active,
        teamId: t.team_id,
        maxCoeff: t.max_coeff,
        agreementScore: t.aggrement_score,
      }),
    ),
);

const oddsSchema = z
  .object({
    provider: nameSchema,
    team_1: bettingTeamSchema,
    team_2: bettingTeamSchema,
    path: optionalText,
    markets_count: optionalInt,
    additional_markets: z.array(jsonObjectSchema).nullish().catch(null),
  })
  .transform(
    (o): BettingOdds => ({
      provider: o.provider,
      team1: o.team_1,
      team2: o.team_2,
      path: o.path,
      marketsCount: o.markets_count,
      additionalMarkets: o.additional_markets ?? null,
    }),
  );

const matchFieldsSchema = z.object({
  slug: optionalText,
  team1_id: optionalId,
  team2_id: optionalId,
  tournament_id: optionalId,
  status: z.string().min(1).catch('upcoming'),
  start_date: optionalDate,
  bo_type: optionalInt,
  tier: optionalText,
  team1_score: optionalInt,
  team2_score: optionalInt,
  winner_team_id: optionalId,
  loser_team_id: optionalId,
});

// --- parsers ---

function parseOptional<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> | null {
  const result = schema.safeParse(data);
  return result.success ? result.data : null;
}

/** Null when the payload is not an object or lacks `id` or `name`. */
export function parseTeam(data: unknown): Team | null {
  return parseOptional(teamSchema, data);
}

export function parseTournament(data: unknown): Tournament | null {
  return parseOptional(tournamentSchema, data);
}

/** A prediction without its scoring-proximity data is discarded whole. */
export function parseAIPrediction(data: unknown): AIPrediction | null {
  return parseOptional(predictionSchema, data);
}

/** Requires a provider and both team sides. */
export function parseBettingOdds(data: unknown): BettingOdds | null {
  return parseOptional(oddsSchema, data);
}

/**
 * Parse a match payload. The match identity is mandatory; nested records
 * that fail validation are dropped rather than failing the match.
 */
export function parseMatch(payload: unknown): Match {
  const raw = jsonObjectSchema.safeParse(payload);
  if (!raw.success) {
    throw new ValidationError('Match payload must be a JSON object');
  }

  const id = idSchema.safeParse(raw.data['id']);
  if (!id.success) {
    throw new ValidationError("Match data must include an 'id' field");
  }

  const fields = matchFieldsSchema.parse(raw.data);
  const team1 = parseTeam(raw.data['team1']);
  const team2 = parseTeam(raw.data['team2']);
  const tournament = parseTournament(raw.data['tournament']);

  return {
    id: id.data,
    slug: fields.slug,
    team1Id: team1?.id ?? fields.team1_id,
    team2Id: team2?.id ?? fields.team2_id,
    tournamentId: tournament?.id ?? fields.tournament_id,
    status: fields.status,
    startDate: fields.start_date,
    boType: fields.bo_type,
    tier: fields.tier,
    team1Score: fields.team1_score,
    team2Score: fields.team2_score,
    winnerTeamId: fields.winner_team_id,
    loserTeamId: fields.loser_team_id,
    team1,
    team2,
    tournament,
    aiPrediction: parseAIPrediction(raw.data['ai_predictions']),
    bettingOdds: parseBettingOdds(raw.data['bet_updates']),
    rawPayload: raw.data,
  };
}
