import { sql } from '../src/db/pool.js';
import { runMigrations } from '../migrations/runner.js';

try {
  await runMigrations(sql);
} finally {
  await sql.end();
}
