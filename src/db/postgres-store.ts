import type { Sql } from 'postgres';
import type { Store, StoreTx } from './store.js';
import * as q from './queries.js';

function bindQueries(db: Sql): StoreTx {
  return {
    findTeamId: (sourceType, sourceId) => q.findTeamId(db, sourceType, sourceId),
    insertTeam: (fields) => q.insertTeam(db, fields),
    findTournamentId: (sourceType, sourceId) => q.findTournamentId(db, sourceType, sourceId),
    insertTournament: (fields) => q.insertTournament(db, fields),
    findMatchId: (sourceType, sourceId) => q.findMatchId(db, sourceType, sourceId),
    insertMatch: (row) => q.insertMatch(db, row),
    updateMatch: (id, updates) => q.updateMatch(db, id, updates),
    findPredictionId: (matchId, sourceType) => q.findPredictionId(db, matchId, sourceType),
    insertPrediction: (fields) => q.insertPrediction(db, fields),
    updatePrediction: (id, fields) => q.updatePrediction(db, id, fields),
    findOddsId: (matchId, sourceType, provider) => q.findOddsId(db, matchId, sourceType, provider),
    insertOdds: (fields) => q.insertOdds(db, fields),
    updateOdds: (id, fields) => q.updateOdds(db, id, fields),
    getMatch: (id) => q.getMatch(db, id),
    listMatches: (filter) => q.listMatches(db, filter),
    listPredictions: (matchId) => q.listPredictions(db, matchId),
    listOdds: (matchId, provider) => q.listOdds(db, matchId, provider),
  };
}

/** Store backed by PostgreSQL; each unit of work is one `BEGIN ... COMMIT`. */
export class PostgresStore implements Store {
  constructor(private readonly sql: Sql) {}

  async begin<T>(work: (tx: StoreTx) => Promise<T>): Promise<T> {
    const result = await this.sql.begin(async (tx) => ({ value: await work(bindQueries(tx)) }));
    return result.value;
  }

  async end(): Promise<void> {
    await this.sql.end();
  }
}
