import { describe, it, expect } from 'vitest';
import { Bo3Mutation, getMutation, impliedProbability } from '../../src/mutations/index.js';
import { parseMatch } from '../../src/sources/bo3/parser.js';
import type { Match } from '../../src/types/match.js';
import { loadJsonFixture } from '../helpers/fixture-loader.js';

const mutation = new Bo3Mutation();
const MATCH_ID = '5f0c6a4e-1b9d-4c7e-9a53-2d8e1f0b7a61';

function fixtureMatch(): Match {
  return parseMatch(loadJsonFixture('bo3', 'match-103084.json'));
}

describe('impliedProbability', () => {
  it('should be the reciprocal of the coefficient', () => {
    expect(impliedProbability(2.0)).toBe(0.5);
    expect(impliedProbability(4)).toBe(0.25);
  });

  it('should be absent without a coefficient', () => {
    expect(impliedProbability(0)).toBeNull();
    expect(impliedProbability(null)).toBeNull();
    expect(impliedProbability(undefined)).toBeNull();
  });
});

describe('getMutation', () => {
  it('should return the bo3 mutation', () => {
    expect(getMutation('bo3')).toBeInstanceOf(Bo3Mutation);
    expect(getMutation('bo3').sourceType).toBe('bo3');
  });

  it('should throw for an unknown source type', () => {
    expect(() => getMutation('unknown')).toThrow('Unknown source type: unknown');
  });
});

describe('Bo3Mutation', () => {
  it('should map a team with its metadata document', () => {
    const fields = mutation.teamToStorageFields({
      id: 736,
      name: 'Alpha Wolves',
      slug: 'alpha-wolves',
      countryCode: 'DE',
      logoUrl: null,
    });

    expect(fields).toEqual({
      source_type: 'bo3',
      source_id: 736,
      name: 'Alpha Wolves',
      slug: 'alpha-wolves',
      country_code: 'DE',
      logo_url: null,
      metadata: {
        id: 736,
        name: 'Alpha Wolves',
        slug: 'alpha-wolves',
        country_code: 'DE',
        logo_url: null,
      },
    });
  });

  it('should map a tournament with dates serialized in metadata', () => {
    const tournament = fixtureMatch().tournament;
    if (!tournament) throw new Error('fixture has no tournament');

    const fields = mutation.tournamentToStorageFields(tournament);

    expect(fields.prize_pool).toBe(250000);
    expect(fields.tier_rank).toBe(1);
    expect(fields.start_date?.toISOString()).toBe('2026-11-01T00:00:00.000Z');
    expect(fields.metadata['start_date']).toBe('2026-11-01T00:00:00.000Z');
    expect(fields.metadata['prize']).toBe(250000);
  });

  it('should map a match with source team ids and unresolved refs', () => {
    const fields = mutation.matchToStorageFields(fixtureMatch());

    expect(fields.source_type).toBe('bo3');
    expect(fields.source_id).toBe(103084);
    expect(fields.status).toBe('upcoming');
    expect(fields.winner_source_id).toBeNull();
    expect(fields.refs.team1?.source_id).toBe(736);
    expect(fields.refs.team2?.source_id).toBe(7631);
    expect(fields.refs.tournament?.source_id).toBe(3578);
    expect(fields.raw_data).toEqual(loadJsonFixture('bo3', 'match-103084.json'));
  });

  it('should summarize the match when there is no raw payload', () => {
    const fields = mutation.matchToStorageFields({ ...fixtureMatch(), rawPayload: {} });

    expect(fields.raw_data).toEqual({
      id: 103084,
      slug: 'alpha-wolves-vs-harbor-five-10-11-2026',
      team1_id: 736,
      team2_id: 7631,
      status: 'upcoming',
      start_date: '2026-11-10T17:00:00.000Z',
      bo_type: 3,
      tier: 's',
      team1_score: 0,
      team2_score: 0,
      winner_team_id: null,
      loser_team_id: null,
      tournament_id: 3578,
    });
  });

  it('should map a prediction onto the internal match id', () => {
    const prediction = fixtureMatch().aiPrediction;
    if (!prediction) throw new Error('fixture has no prediction');

    const fields = mutation.predictionToStorageFields(prediction, MATCH_ID);

    expect(fields.match_id).toBe(MATCH_ID);
    expect(fields.source_type).toBe('bo3');
    expect(fields.source_id).toBe(55120);
    expect(fields.prediction_data).toEqual({
      id: 55120,
      match_id: 103084,
      prediction_team1_score: 2,
      prediction_team2_score: 1,
      prediction_winner_team_id: 736,
      prediction_scores_data: {
        predicted_score: 2.1,
        proximity_factors: { '(2, 0)': 0.31, '(2, 1)': 0.29, '(1, 2)': 0.22, '(0, 2)': 0.18 },
        closest_valid_score: [2, 1],
        overall_proximity_factor: 0.62,
        neighbor_proximity_factor: 0.41,
      },
    });
  });

  it('should map odds with implied probabilities', () => {
    const odds = fixtureMatch().bettingOdds;
    if (!odds) throw new Error('fixture has no odds');

    const fields = mutation.oddsToStorageFields(odds, MATCH_ID);

    expect(fields.provider).toBe('examplebet');
    expect(fields.team1_odds).toBe(1.6);
    expect(fields.team2_odds).toBe(2.5);
    expect(fields.team1_implied_prob).toBeCloseTo(0.625);
    expect(fields.team2_implied_prob).toBeCloseTo(0.4);
    expect(fields.odds_data['team_1']).toEqual({
      name: 'Alpha Wolves',
      coeff: 1.6,
      active: true,
      team_id: 736,
      max_coeff: 1.7,
      aggrement_score: 0.8,
    });
    expect(fields.odds_data['path']).toBe('/match/103084');
    expect(fields.odds_data['markets_count']).toBe(12);
  });

  it('should leave implied probability absent for a zero coefficient', () => {
    const odds = fixtureMatch().bettingOdds;
    if (!odds) throw new Error('fixture has no odds');

    const fields = mutation.oddsToStorageFields({ ...odds, team2: { ...odds.team2, coeff: 0 } }, MATCH_ID);

    expect(fields.team2_odds).toBe(0);
    expect(fields.team2_implied_prob).toBeNull();
  });
});
