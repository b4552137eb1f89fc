// ──────────────────────────────────────────
// Harmonization: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { StagingContract } from '../../shared/contracts';
import { ValidationError, errorMessage } from '../../shared/errors';
import { HarmonizationJob } from './harmonization.job';

export function createHarmonizationRoutes(job: HarmonizationJob, staging: StagingContract): Router {
  const router = Router();

  // POST /runs: run the pipeline now; joins a run already in flight
  router.post('/runs', async (_req: Request, res: Response) => {
    try {
      const summary = await job.run();
      res.status(summary.status === 'completed' ? 201 : 500).json(summary);
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  // GET /runs?limit=10: newest first
  router.get('/runs', (req: Request, res: Response) => {
    try {
      const limit = parseLimit(req.query.limit);
      res.json({ data: job.listRuns(limit), running: job.isRunning });
    } catch (err) {
      const status = err instanceof ValidationError ? 400 : 500;
      res.status(status).json({ error: errorMessage(err) });
    }
  });

  // GET /runs/:id
  router.get('/runs/:id', (req: Request, res: Response) => {
    const run = job.getRun(req.params.id);
    if (!run) {
      res.status(404).json({ error: `Run not found: ${req.params.id}` });
      return;
    }
    res.json(run);
  });

  // GET /staging: which raw collections are present
  router.get('/staging', async (_req: Request, res: Response) => {
    try {
      res.json({ data: await staging.describe() });
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  return router;
}

function parseLimit(raw: unknown): number | undefined {
  if (raw === undefined) return undefined;
  if (typeof raw !== 'string' || !/^\d+$/.test(raw) || Number(raw) < 1) {
    throw new ValidationError('limit must be a positive integer');
  }
  return Number(raw);
}
