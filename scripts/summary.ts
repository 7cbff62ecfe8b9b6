/**
 * Print a summary of the database state.
 */
import { sql } from '../src/db/pool.js';

try {
  const counts = await sql<{ name: string; count: number }[]>`
    SELECT 'teams' AS name, count(*)::int AS count FROM teams
    UNION ALL SELECT 'tournaments', count(*)::int FROM tournaments
    UNION ALL SELECT 'matches', count(*)::int FROM matches
    UNION ALL SELECT 'ai_predictions', count(*)::int FROM ai_predictions
    UNION ALL SELECT 'betting_odds', count(*)::int FROM betting_odds
  `;
  console.log('=== Rows ===');
  for (const r of counts) console.log(`  ${r.name}: ${r.count}`);

  const byStatus = await sql<{ status: string; count: number }[]>`
    SELECT status, count(*)::int AS count FROM matches GROUP BY status ORDER BY count DESC
  `;
  console.log('\n=== Matches by Status ===');
  for (const r of byStatus) console.log(`  ${r.status}: ${r.count}`);

  const upcoming = await sql<{ start_date: Date | null; team1: string; team2: string; tournament: string | null }[]>`
    SELECT m.start_date, t1.name AS team1, t2.name AS team2, tr.name AS tournament
    FROM matches m
    JOIN teams t1 ON t1.id = m.team1_id
    JOIN teams t2 ON t2.id = m.team2_id
    LEFT JOIN tournaments tr ON tr.id = m.tournament_id
    WHERE m.status = 'upcoming'
    ORDER BY m.start_date NULLS LAST
    LIMIT 20
  `;
  console.log(`\n=== Next Upcoming (${upcoming.length}) ===`);
  for (const m of upcoming) {
    const date = m.start_date ? m.start_date.toISOString().slice(0, 16).replace('T', ' ') : 'TBD';
    console.log(`  ${date}  ${m.team1} vs ${m.team2}${m.tournament ? ` (${m.tournament})` : ''}`);
  }

  const providers = await sql<{ provider: string; count: number }[]>`
    SELECT provider, count(*)::int AS count FROM betting_odds GROUP BY provider ORDER BY count DESC
  `;
  console.log('\n=== Odds by Provider ===');
  for (const p of providers) console.log(`  ${p.provider}: ${p.count}`);
} finally {
  await sql.end();
}
