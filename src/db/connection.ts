// ──────────────────────────────────────────
// Database connection: Knex instance
// ──────────────────────────────────────────

import knex, { Knex } from 'knex';

let db: Knex | null = null;

export function getDb(databaseUrl = process.env.DATABASE_URL): Knex {
  if (!db) {
    db = knex({
      client: 'pg',
      connection: databaseUrl,
      pool: { min: 0, max: 4 },
    });
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
  }
}
