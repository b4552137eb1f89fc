// ──────────────────────────────────────────
// Express app: routes + auth middleware
// ──────────────────────────────────────────

import express, { Express } from 'express';
import { StagingContract } from './shared/contracts';
import { apiKeyAuth } from './platform/auth';
import { HarmonizationJob } from './domains/harmonization/harmonization.job';
import { createHarmonizationRoutes } from './domains/harmonization/routes';

export interface AppDeps {
  job: HarmonizationJob;
  staging: StagingContract;
  apiKey: string | null;
}

export function createApp({ job, staging, apiKey }: AppDeps): Express {
  const app = express();
  app.use(express.json());

  app.use('/api/v1/harmonize', apiKeyAuth(apiKey), createHarmonizationRoutes(job, staging));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  return app;
}
