import { describe, it, expect } from 'vitest';
import {
  parseMatch,
  parseTeam,
  parseTournament,
  parseAIPrediction,
  parseBettingOdds,
} from '../../../src/sources/bo3/parser.js';
import { ValidationError } from '../../../src/errors.js';
import { loadJsonFixture } from '../../helpers/fixture-loader.js';

const fixture = () => loadJsonFixture('bo3', 'match-103084.json');

describe('bo3 parser', () => {
  describe('parseMatch', () => {
    it('should parse a full match payload', () => {
      const match = parseMatch(fixture());

      expect(match.id).toBe(103084);
      expect(match.slug).toBe('alpha-wolves-vs-harbor-five-10-11-2026');
      expect(match.team1Id).toBe(736);
      expect(match.team2Id).toBe(7631);
      expect(match.tournamentId).toBe(3578);
      expect(match.status).toBe('upcoming');
      expect(match.startDate?.toISOString()).toBe('2026-11-10T17:00:00.000Z');
      expect(match.boType).toBe(3);
      expect(match.tier).toBe('s');
      expect(match.team1Score).toBe(0);
      expect(match.winnerTeamId).toBeNull();
      expect(match.rawPayload).toEqual(fixture());
    });

    it('should parse nested teams and tournament', () => {
      const match = parseMatch(fixture());

      expect(match.team1).toEqual({
        id: 736,
        name: 'Alpha Wolves',
        slug: 'alpha-wolves',
        countryCode: 'DE',
        logoUrl: 'https://example.test/logos/736.png',
      });
      expect(match.team2?.logoUrl).toBeNull();
      expect(match.tournament?.name).toBe('Northern Masters 2026');
      expect(match.tournament?.tierRank).toBe(1);
      expect(match.tournament?.prize).toBe(250000);
      expect(match.tournament?.startDate?.toISOString()).toBe('2026-11-01T00:00:00.000Z');
    });

    it('should parse the embedded prediction and odds', () => {
      const match = parseMatch(fixture());

      expect(match.aiPrediction?.id).toBe(55120);
      expect(match.aiPrediction?.predictionWinnerTeamId).toBe(736);
      expect(match.aiPrediction?.scoresData.proximityFactors['(2, 1)']).toBe(0.29);
      expect(match.aiPrediction?.scoresData.closestValidScore).toEqual([2, 1]);
      expect(match.bettingOdds?.provider).toBe('examplebet');
      expect(match.bettingOdds?.team1.agreementScore).toBe(0.8);
      expect(match.bettingOdds?.team2.coeff).toBe(2.5);
      expect(match.bettingOdds?.additionalMarkets).toEqual([]);
    });

    it('should accept a numeric string id', () => {
      expect(parseMatch({ ...fixture(), id: '103084' }).id).toBe(103084);
    });

    it('should reject a payload without an id', () => {
      const { id: _id, ...rest } = fixture();

      expect(() => parseMatch(rest)).toThrow(ValidationError);
      expect(() => parseMatch(rest)).toThrow("Match data must include an 'id' field");
      expect(() => parseMatch({ ...rest, id: 0 })).toThrow(ValidationError);
      expect(() => parseMatch({ ...rest, id: 'abc' })).toThrow(ValidationError);
    });

    it('should reject payloads that are not objects', () => {
      expect(() => parseMatch([])).toThrow('Match payload must be a JSON object');
      expect(() => parseMatch(null)).toThrow(ValidationError);
      expect(() => parseMatch('103084')).toThrow(ValidationError);
    });

    it('should default a missing status to upcoming', () => {
      const { status: _status, ...rest } = fixture();

      expect(parseMatch(rest).status).toBe('upcoming');
      expect(parseMatch({ ...rest, status: null }).status).toBe('upcoming');
    });

    it('should fall back to flat reference ids when nested records are missing', () => {
      const match = parseMatch({ ...fixture(), team1: null, tournament: 'unknown' });

      expect(match.team1).toBeNull();
      expect(match.team1Id).toBe(736);
      expect(match.tournament).toBeNull();
      expect(match.tournamentId).toBe(3578);
    });

    it('should null out descriptive fields of the wrong type', () => {
      const match = parseMatch({ ...fixture(), bo_type: 'three', start_date: 'soon', slug: 12 });

      expect(match.boType).toBeNull();
      expect(match.startDate).toBeNull();
      expect(match.slug).toBeNull();
    });

    it('should drop predictions and odds that fail validation', () => {
      const match = parseMatch({ ...fixture(), ai_predictions: {}, bet_updates: { provider: 'examplebet' } });

      expect(match.aiPrediction).toBeNull();
      expect(match.bettingOdds).toBeNull();
    });
  });

  describe('parseTeam', () => {
    it('should require an id and a name', () => {
      expect(parseTeam({ id: 736 })).toBeNull();
      expect(parseTeam({ name: 'Alpha Wolves' })).toBeNull();
      expect(parseTeam({ id: 736, name: '   ' })).toBeNull();
      expect(parseTeam('Alpha Wolves')).toBeNull();
    });

    it('should null optional fields of the wrong type', () => {
      expect(parseTeam({ id: 736, name: 'Alpha Wolves', country_code: 42 })).toEqual({
        id: 736,
        name: 'Alpha Wolves',
        slug: null,
        countryCode: null,
        logoUrl: null,
      });
    });
  });

  describe('parseTournament', () => {
    it('should parse a minimal tournament', () => {
      const tournament = parseTournament({ id: 3578, name: 'Northern Masters 2026' });

      expect(tournament).toEqual({
        id: 3578,
        name: 'Northern Masters 2026',
        slug: null,
        tier: null,
        tierRank: null,
        prize: null,
        disciplineId: null,
        status: null,
        startDate: null,
        endDate: null,
      });
    });
  });

  describe('parseAIPrediction', () => {
    it('should default absent numbers to zero', () => {
      const prediction = parseAIPrediction({
        id: 1,
        match_id: 103084,
        prediction_team2_score: null,
        prediction_scores_data: { predicted_score: 1.5 },
      });

      expect(prediction).toEqual({
        id: 1,
        matchId: 103084,
        predictionTeam1Score: 0,
        predictionTeam2Score: 0,
        predictionWinnerTeamId: 0,
        scoresData: {
          predictedScore: 1.5,
          proximityFactors: {},
          closestValidScore: [],
          overallProximityFactor: 0,
          neighborProximityFactor: 0,
        },
      });
    });

    it('should discard a prediction without scores data', () => {
      expect(parseAIPrediction({ id: 1, match_id: 103084 })).toBeNull();
      expect(parseAIPrediction({ id: 1, match_id: 103084, prediction_scores_data: {} })).toBeNull();
    });

    it('should keep scoring data whose entries are not numbers', () => {
      const prediction = parseAIPrediction({
        id: 1,
        match_id: 103084,
        prediction_scores_data: {
          predicted_score: 2,
          proximity_factors: { '(2, 0)': 0.31, '(0, 0)': null },
          closest_valid_score: ['2', '1'],
        },
      });

      expect(prediction?.scoresData.proximityFactors).toEqual({ '(2, 0)': 0.31, '(0, 0)': null });
      expect(prediction?.scoresData.closestValidScore).toEqual(['2', '1']);
    });

    it('should require the prediction and match ids', () => {
      expect(parseAIPrediction({ id: 1, prediction_scores_data: { predicted_score: 2 } })).toBeNull();
    });
  });

  describe('parseBettingOdds', () => {
    const side = { name: 'Alpha Wolves', coeff: 1.6, team_id: 736 };

    it('should require a provider and both sides', () => {
      expect(parseBettingOdds({ team_1: side, team_2: side })).toBeNull();
      expect(parseBettingOdds({ provider: '  ', team_1: side, team_2: side })).toBeNull();
      expect(parseBettingOdds({ provider: 'examplebet', team_1: side, team_2: {} })).toBeNull();
    });

    it('should coerce coefficients and fill absent side fields', () => {
      const odds = parseBettingOdds({
        provider: 'examplebet',
        team_1: { coeff: '1.85', active: 1 },
        team_2: side,
      });

      expect(odds?.team1).toEqual({
        name: '',
        coeff: 1.85,
        active: true,
        teamId: 0,
        maxCoeff: 0,
        agreementScore: 0,
      });
      expect(odds?.path).toBeNull();
      expect(odds?.marketsCount).toBeNull();
      expect(odds?.additionalMarkets).toBeNull();
    });
  });
});
