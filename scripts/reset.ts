// ──────────────────────────────────────────
// Script: Reset: drop the warehouse tables and re-run migrations
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { getDb, closeDb } from '../src/db/connection';
import { MIGRATIONS_DIR } from '../src/db/knexfile';

async function reset() {
  const db = getDb();
  console.log('[Reset] Dropping warehouse tables...');

  // Drop in reverse FK order
  await db.raw('DROP TABLE IF EXISTS fact_traffic CASCADE');
  await db.raw('DROP TABLE IF EXISTS fact_sales_aggregate CASCADE');
  await db.raw('DROP TABLE IF EXISTS fact_orders CASCADE');
  await db.raw('DROP TABLE IF EXISTS dim_order CASCADE');
  await db.raw('DROP TABLE IF EXISTS dim_product_variant CASCADE');
  await db.raw('DROP TABLE IF EXISTS dim_product CASCADE');
  await db.raw('DROP TABLE IF EXISTS dim_customer CASCADE');
  await db.raw('DROP TABLE IF EXISTS dim_time CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations_lock CASCADE');

  console.log('[Reset] Running migrations...');
  await db.migrate.latest({ directory: MIGRATIONS_DIR, extension: 'ts' });

  console.log('[Reset] ✅ Done, warehouse tables recreated');
  await closeDb();
  process.exit(0);
}

reset().catch((err) => {
  console.error('[Reset] Error:', err);
  process.exit(1);
});
