// ──────────────────────────────────────────
// App entry point: bootstrap + Express server
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from './config';
import { getDb, closeDb } from './db/connection';
import { MIGRATIONS_DIR } from './db/knexfile';
import { TableSink } from './shared/contracts';
import { createApp } from './server';

// Staging + warehouse
import { StagingRepo } from './domains/staging/staging.repo';
import { CsvTableWriter } from './domains/warehouse/csv-writer';
import { WarehouseRepo } from './domains/warehouse/warehouse.repo';

// Harmonization
import { HarmonizationPipeline } from './domains/harmonization/pipeline';
import { HarmonizationJob } from './domains/harmonization/harmonization.job';

// Runtime
import { Runtime } from './runtime';

async function main() {
  const config = loadConfig();

  // ── Sinks ──
  const sinks: TableSink[] = [new CsvTableWriter(config.outputDir)];
  if (config.databaseUrl) {
    const db = getDb(config.databaseUrl);
    await db.migrate.latest({ directory: MIGRATIONS_DIR, extension: 'ts' });
    sinks.push(new WarehouseRepo(db));
  }

  // ── Harmonization ──
  const staging = new StagingRepo(config.stagingDir);
  const pipeline = new HarmonizationPipeline({ timeRange: config.timeRange, utcOffsetMinutes: config.utcOffsetMinutes });
  const job = new HarmonizationJob(staging, pipeline, sinks);

  // ── Runtime ──
  const runtime = new Runtime(job, config.intervalMs);

  if (!config.apiKey) {
    console.warn('[App] HARMONIZE_API_KEY is not set; harmonization routes are open');
  }
  const app = createApp({ job, staging, apiKey: config.apiKey });

  // Start
  runtime.start();
  const server = app.listen(config.port, () => {
    console.log(`[App] Marketplace warehouse listening on port ${config.port}`);
  });

  // Graceful shutdown
  const shutdown = async () => {
    console.log('[App] Shutting down...');
    runtime.stop();
    server.close();
    await closeDb();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[App] Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  console.error('[App] Fatal error:', err);
  process.exit(1);
});
