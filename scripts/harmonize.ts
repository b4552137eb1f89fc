// ──────────────────────────────────────────
// Script: Harmonize: one run over the staging directory
// ──────────────────────────────────────────
// Usage: tsx scripts/harmonize.ts [--db]
//   --db  also load the tables into DATABASE_URL

import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from '../src/config';
import { getDb, closeDb } from '../src/db/connection';
import { MIGRATIONS_DIR } from '../src/db/knexfile';
import { TableSink } from '../src/shared/contracts';
import { StagingRepo } from '../src/domains/staging/staging.repo';
import { CsvTableWriter } from '../src/domains/warehouse/csv-writer';
import { WarehouseRepo } from '../src/domains/warehouse/warehouse.repo';
import { HarmonizationPipeline } from '../src/domains/harmonization/pipeline';
import { HarmonizationJob } from '../src/domains/harmonization/harmonization.job';
import { Runtime } from '../src/runtime';

async function harmonize() {
  const config = loadConfig();
  const sinks: TableSink[] = [new CsvTableWriter(config.outputDir)];

  if (process.argv.includes('--db')) {
    if (!config.databaseUrl) throw new Error('--db needs DATABASE_URL');
    const db = getDb(config.databaseUrl);
    await db.migrate.latest({ directory: MIGRATIONS_DIR, extension: 'ts' });
    sinks.push(new WarehouseRepo(db));
  }

  const staging = new StagingRepo(config.stagingDir);
  const pipeline = new HarmonizationPipeline({ timeRange: config.timeRange, utcOffsetMinutes: config.utcOffsetMinutes });
  const summary = await new Runtime(new HarmonizationJob(staging, pipeline, sinks), 0).runOnce();

  console.log(`[Harmonize] Row counts: ${JSON.stringify(summary.row_counts)}`);
  for (const violation of summary.violations) {
    console.error(`[Harmonize]   ${violation}`);
  }

  await closeDb();
  process.exit(summary.status === 'completed' ? 0 : 1);
}

harmonize().catch((err) => {
  console.error('[Harmonize] Error:', err);
  process.exit(1);
});
