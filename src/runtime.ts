// ──────────────────────────────────────────
// Runtime: Background job scheduler
// ──────────────────────────────────────────

import { RunSummary } from './shared/types';

export interface ScheduledJob {
  run(): Promise<RunSummary>;
}

export class Runtime {
  private intervals: NodeJS.Timeout[] = [];

  constructor(
    private harmonizationJob: ScheduledJob,
    private intervalMs: number
  ) {}

  start(): void {
    if (this.intervalMs <= 0) {
      console.log('[Runtime] Scheduled harmonization disabled');
      return;
    }

    this.intervals.push(
      setInterval(() => {
        this.harmonizationJob.run().catch((err) =>
          console.error('[Runtime] HarmonizationJob error:', err instanceof Error ? err.message : err)
        );
      }, this.intervalMs)
    );

    console.log(`[Runtime] Started background jobs (harmonize: ${this.intervalMs}ms)`);
  }

  stop(): void {
    this.intervals.forEach(clearInterval);
    this.intervals = [];
    console.log('[Runtime] Stopped background jobs');
  }

  async runOnce(): Promise<RunSummary> {
    console.log('[Runtime] Running harmonization once...');
    const summary = await this.harmonizationJob.run();
    console.log(`[Runtime] Completed single run (${summary.status})`);
    return summary;
  }
}
