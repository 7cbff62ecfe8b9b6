import type { DataSource } from '../../types/source.js';
import { getMutation } from '../../mutations/index.js';
import { parseMatch } from './parser.js';

export const bo3Source: DataSource = {
  sourceType: 'bo3',
  mutation: getMutation('bo3'),
  parseMatch,
};

export { Bo3Client, collectTournamentIds } from './client.js';
export type { Bo3ClientOptions, MatchQuery } from './client.js';
export { parseMatch, parseTeam, parseTournament, parseAIPrediction, parseBettingOdds } from './parser.js';
